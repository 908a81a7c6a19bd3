import { z } from 'zod';
import { BaseService, WriteOptions } from './BaseService';
import { CoreAPI } from '../api/CoreAPI';
import {
    LOOKUP_CATEGORIES,
    LookupCategory,
    LookupValue,
    LookupValueCreateInput,
    LookupValueUpdateInput,
} from '../models/LookupValue';
import { Project } from '../models/Project';
import { CoreEvents } from '../events/CoreEvents';
import { ConflictError, NotFoundError, ValidationIssue } from '../errors/CoreErrors';
import { ValidationUtils } from '../utils/ValidationUtils';

const categorySchema = z.enum(LOOKUP_CATEGORIES);

const createSchema = z.object({
    name: z.string().trim().min(1, 'name is required'),
    code: z.string().trim().default(''),
});

const updateSchema = z.object({
    name: z.string().trim().min(1, 'name is required').optional(),
    code: z.string().trim().optional(),
});

/**
 * Project fields that hold a lookup id, with the category they point into
 */
export const PROJECT_LOOKUP_FIELDS = [
    ['campus_id', 'campuses'],
    ['offer_id', 'offers'],
    ['sub_offer_id', 'sub_offers'],
    ['effort_type_id', 'effort_types'],
    ['status_id', 'statuses'],
] as const satisfies ReadonlyArray<readonly [keyof Project, LookupCategory]>;

export interface LookupUsage {
    projectIds: string[];
    timeEntryCount: number;
}

export interface LookupImportResult {
    created: number;
    skipped: number;
}

/**
 * Lookup Service
 * Shared categories (employees, work types, campuses...) stored together in
 * team_data.json
 */
export class LookupService extends BaseService {
    constructor(core: CoreAPI) {
        super(core, 'LookupService');
    }

    /**
     * Check that `id` names a value of `category`; returns the issue, if any
     */
    static checkReference(
        values: LookupValue[],
        category: LookupCategory,
        id: string,
        field: string,
        requireActive: boolean
    ): ValidationIssue | null {
        const value = values.find(candidate => candidate.id === id);
        if (!value || value.category !== category) {
            return { path: field, message: `no ${category} value with id ${id}` };
        }
        if (requireActive && !value.active) {
            return { path: field, message: `${category} value "${value.name}" is inactive` };
        }
        return null;
    }

    /**
     * Get every lookup value, all categories
     */
    async listAll(): Promise<LookupValue[]> {
        return await this.store.load('lookups');
    }

    /**
     * Get values of one category, in stored order
     */
    async list(category: LookupCategory, options: { includeInactive?: boolean } = {}): Promise<LookupValue[]> {
        const values = await this.listAll();
        return values.filter(value =>
            value.category === category && (options.includeInactive || value.active)
        );
    }

    /**
     * Get value by ID
     */
    async getById(id: string): Promise<LookupValue> {
        const values = await this.listAll();
        const value = values.find(candidate => candidate.id === id);
        if (!value) {
            throw new NotFoundError('Lookup value', id);
        }
        return value;
    }

    /**
     * Get value by display name (case-insensitive), active or not
     */
    async findByName(category: LookupCategory, name: string): Promise<LookupValue | null> {
        const key = ValidationUtils.nameKey(name);
        const values = await this.list(category, { includeInactive: true });
        return values.find(value => ValidationUtils.nameKey(value.name) === key) ?? null;
    }

    /**
     * Get value by external code (case-insensitive)
     */
    async findByCode(category: LookupCategory, code: string): Promise<LookupValue | null> {
        const key = ValidationUtils.nameKey(code);
        if (!key) return null;
        const values = await this.list(category, { includeInactive: true });
        return values.find(value => ValidationUtils.nameKey(value.code) === key) ?? null;
    }

    /**
     * Match an OS username to an active employee, by code then by id
     */
    async identifyUser(username: string): Promise<LookupValue | null> {
        const employees = await this.list('employees');
        const key = ValidationUtils.nameKey(username);
        if (!key) return null;
        return employees.find(employee => ValidationUtils.nameKey(employee.code) === key)
            ?? employees.find(employee => employee.id === username)
            ?? null;
    }

    /**
     * Create a new value
     */
    async create(category: LookupCategory, input: LookupValueCreateInput): Promise<LookupValue> {
        const validCategory = ValidationUtils.parse(categorySchema, category, 'Invalid lookup category');
        const data = ValidationUtils.parse(createSchema, input, `Invalid ${validCategory} value`);

        const now = this.timestamp();
        const value: LookupValue = {
            id: this.newId(),
            category: validCategory,
            name: data.name,
            code: data.code,
            active: true,
            created_at: now,
            updated_at: now,
        };

        await this.store.modify('lookups', values => {
            this.assertUnique(values, validCategory, data.name, data.code, null);
            return [...values, value];
        });

        this.logger.info(`Created ${validCategory} value "${value.name}" (${value.id})`);
        this.events.emit(CoreEvents.LOOKUP_CREATED, value);

        return value;
    }

    /**
     * Update a value's name or code
     */
    async update(id: string, input: LookupValueUpdateInput, options: WriteOptions = {}): Promise<LookupValue> {
        const data = ValidationUtils.parse(updateSchema, input, 'Invalid lookup update');

        const values = await this.listAll();
        const current = values.find(candidate => candidate.id === id);
        if (!current) {
            throw new NotFoundError('Lookup value', id);
        }
        this.assertUnchanged(`Lookup value "${current.name}"`, current, options);

        const name = data.name ?? current.name;
        const code = data.code ?? current.code;
        this.assertUnique(values, current.category, name, code, id);

        const updated: LookupValue = { ...current, name, code, updated_at: this.timestamp() };
        await this.store.appendOrReplace('lookups', updated);

        this.events.emit(CoreEvents.LOOKUP_UPDATED, updated);
        return updated;
    }

    /**
     * Hide a value from new selections. Existing references stay valid.
     */
    async deactivate(id: string): Promise<LookupValue> {
        return this.setActive(id, false);
    }

    async activate(id: string): Promise<LookupValue> {
        return this.setActive(id, true);
    }

    /**
     * Where a value is referenced
     */
    async getUsage(id: string): Promise<LookupUsage> {
        const projects = await this.store.load('projects');
        const projectIds = projects
            .filter(project =>
                PROJECT_LOOKUP_FIELDS.some(([field]) => project[field] === id)
                || Object.entries(project.team_assignments).some(([roleId, employeeId]) => roleId === id || employeeId === id)
            )
            .map(project => project.id);

        const entries = await this.store.load('time_entries');
        const timeEntryCount = entries.filter(entry => entry.user_id === id || entry.work_type_id === id).length;

        return { projectIds, timeEntryCount };
    }

    async isInUse(id: string): Promise<boolean> {
        const usage = await this.getUsage(id);
        return usage.projectIds.length > 0 || usage.timeEntryCount > 0;
    }

    /**
     * Delete a value that nothing references
     */
    async delete(id: string): Promise<void> {
        const value = await this.getById(id);
        const usage = await this.getUsage(id);
        if (usage.projectIds.length > 0 || usage.timeEntryCount > 0) {
            throw new ConflictError(
                `Cannot delete ${value.category} value "${value.name}": referenced by ${usage.projectIds.length} project(s) and ${usage.timeEntryCount} time entr${usage.timeEntryCount === 1 ? 'y' : 'ies'}; deactivate it instead`
            );
        }

        await this.store.remove('lookups', id);

        this.logger.info(`Deleted ${value.category} value "${value.name}" (${id})`);
        this.events.emit(CoreEvents.LOOKUP_DELETED, { id });
    }

    /**
     * Add a list of names to a category in one write, skipping blanks and
     * names already present
     */
    async importValues(category: LookupCategory, names: string[]): Promise<LookupImportResult> {
        const validCategory = ValidationUtils.parse(categorySchema, category, 'Invalid lookup category');
        const now = this.timestamp();
        const added: LookupValue[] = [];
        let skipped = 0;

        await this.store.modify('lookups', values => {
            const seen = new Set(
                values.filter(value => value.category === validCategory).map(value => ValidationUtils.nameKey(value.name))
            );
            for (const raw of names) {
                const name = raw.trim();
                const key = ValidationUtils.nameKey(name);
                if (!key || seen.has(key)) {
                    skipped++;
                    continue;
                }
                seen.add(key);
                added.push({
                    id: this.newId(),
                    category: validCategory,
                    name,
                    code: '',
                    active: true,
                    created_at: now,
                    updated_at: now,
                });
            }
            return added.length > 0 ? [...values, ...added] : values;
        });
        added.forEach(value => this.events.emit(CoreEvents.LOOKUP_CREATED, value));

        this.logger.info(`Imported ${added.length} ${validCategory} value(s), skipped ${skipped}`);
        return { created: added.length, skipped };
    }

    private async setActive(id: string, active: boolean): Promise<LookupValue> {
        const current = await this.getById(id);
        if (current.active === active) {
            return current;
        }

        const updated: LookupValue = { ...current, active, updated_at: this.timestamp() };
        await this.store.appendOrReplace('lookups', updated);

        this.events.emit(CoreEvents.LOOKUP_UPDATED, updated);
        return updated;
    }

    private assertUnique(
        values: LookupValue[],
        category: LookupCategory,
        name: string,
        code: string,
        selfId: string | null
    ): void {
        const others = values.filter(value => value.category === category && value.id !== selfId);

        const nameKey = ValidationUtils.nameKey(name);
        if (others.some(value => ValidationUtils.nameKey(value.name) === nameKey)) {
            throw new ConflictError(`A ${category} value named "${name}" already exists`);
        }

        const codeKey = ValidationUtils.nameKey(code);
        if (codeKey && others.some(value => ValidationUtils.nameKey(value.code) === codeKey)) {
            throw new ConflictError(`A ${category} value with code "${code}" already exists`);
        }
    }
}
