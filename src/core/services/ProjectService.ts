import { z } from 'zod';
import { BaseService, WriteOptions } from './BaseService';
import { LookupService, PROJECT_LOOKUP_FIELDS } from './LookupService';
import { CoreAPI } from '../api/CoreAPI';
import {
    Project,
    ProjectCreateInput,
    ProjectFilter,
    ProjectImportError,
    ProjectImportResult,
    ProjectImportRow,
    ProjectUpdateInput,
} from '../models/Project';
import { LookupCategory, LookupValue } from '../models/LookupValue';
import { CoreEvents } from '../events/CoreEvents';
import { ConflictError, NotFoundError, ValidationError, ValidationIssue } from '../errors/CoreErrors';
import { LoadOptions } from '../storage/RecordStore';
import { ValidationUtils } from '../utils/ValidationUtils';

const lookupId = z.string().trim().min(1).nullable();
const targetViewHours = z
    .number({ invalid_type_error: 'must be a number' })
    .finite('must be a finite number')
    .nonnegative('must be 0 or more');
const tagList = z
    .array(z.string().trim())
    .transform(tags => Array.from(new Set(tags.filter(tag => tag.length > 0))));

const createSchema = z.object({
    name: z.string().trim().min(1, 'name is required'),
    code: z.string().trim().default(''),
    target_view_hours: targetViewHours,
    campus_id: lookupId.default(null),
    offer_id: lookupId.default(null),
    sub_offer_id: lookupId.default(null),
    effort_type_id: lookupId.default(null),
    status_id: lookupId.default(null),
    team_assignments: z.record(z.string().trim().min(1)).default({}),
    tags: tagList.default([]),
    notes: z.string().default(''),
});

const updateSchema = z.object({
    name: z.string().trim().min(1, 'name is required').optional(),
    code: z.string().trim().optional(),
    target_view_hours: targetViewHours.optional(),
    campus_id: lookupId.optional(),
    offer_id: lookupId.optional(),
    sub_offer_id: lookupId.optional(),
    effort_type_id: lookupId.optional(),
    status_id: lookupId.optional(),
    team_assignments: z.record(z.string().trim().min(1)).optional(),
    tags: tagList.optional(),
    notes: z.string().optional(),
});

type ProjectFields = z.infer<typeof createSchema>;

/** Import columns holding a lookup display name, and the field each resolves to */
const IMPORT_LOOKUP_COLUMNS = [
    ['campus', 'campus_id', 'campuses'],
    ['offer', 'offer_id', 'offers'],
    ['sub_offer', 'sub_offer_id', 'sub_offers'],
    ['effort_type', 'effort_type_id', 'effort_types'],
    ['status', 'status_id', 'statuses'],
] as const satisfies ReadonlyArray<readonly [keyof ProjectImportRow, keyof Project, LookupCategory]>;

export interface BulkImportOptions {
    signal?: AbortSignal;
    actor?: string;
}

export interface UserProjectList {
    starred: Project[];
    others: Project[];
}

type ResolvedImportRow = { input: ProjectCreateInput } | { error: ProjectImportError };

/**
 * Project Service
 * One file per project under projects/, plus per-user starred lists
 */
export class ProjectService extends BaseService {
    constructor(core: CoreAPI) {
        super(core, 'ProjectService');
    }

    /**
     * Get projects, sorted by name
     */
    async list(filter: ProjectFilter = {}, loadOptions: LoadOptions = {}): Promise<Project[]> {
        const projects = await this.store.load('projects', loadOptions);
        const search = filter.search ? ValidationUtils.nameKey(filter.search) : '';
        const tag = filter.tag ? ValidationUtils.nameKey(filter.tag) : '';

        return projects
            .filter(project => {
                if (project.archived && !filter.includeArchived) return false;
                if (filter.statusId !== undefined && project.status_id !== filter.statusId) return false;
                if (filter.campusId !== undefined && project.campus_id !== filter.campusId) return false;
                if (tag && !project.tags.some(candidate => ValidationUtils.nameKey(candidate) === tag)) return false;
                if (search
                    && !ValidationUtils.nameKey(project.name).includes(search)
                    && !ValidationUtils.nameKey(project.code).includes(search)) {
                    return false;
                }
                return true;
            })
            .sort((a, b) => a.name.localeCompare(b.name));
    }

    /**
     * Get project by ID
     */
    async getById(id: string): Promise<Project> {
        const records = await this.store.load('projects', { partition: id });
        const project = records.find(candidate => candidate.id === id);
        if (!project) {
            throw new NotFoundError('Project', id);
        }
        return project;
    }

    /**
     * Get project by name (case-insensitive), archived included
     */
    async getByName(name: string): Promise<Project | null> {
        const key = ValidationUtils.nameKey(name);
        const projects = await this.store.load('projects');
        return projects.find(project => ValidationUtils.nameKey(project.name) === key) ?? null;
    }

    /**
     * Create a new project
     */
    async create(input: ProjectCreateInput, options: WriteOptions = {}): Promise<Project> {
        const data = ValidationUtils.parse(createSchema, input, 'Invalid project');

        await this.assertNameAvailable(data.name, null);
        await this.assertReferences(data, null);

        const now = this.timestamp();
        const actor = options.actor ?? '';
        const project: Project = {
            id: this.newId(),
            ...data,
            archived: false,
            created_at: now,
            created_by: actor,
            updated_at: now,
            updated_by: actor,
        };

        await this.store.appendOrReplace('projects', project, project.id);

        this.logger.info(`Created project "${project.name}" (${project.id})`);
        this.events.emit(CoreEvents.PROJECT_CREATED, project);

        return project;
    }

    /**
     * Update a project
     */
    async update(id: string, input: ProjectUpdateInput, options: WriteOptions = {}): Promise<Project> {
        const patch = ValidationUtils.parse(updateSchema, input, 'Invalid project update');

        const current = await this.getById(id);
        this.assertUnchanged(`Project "${current.name}"`, current, options);

        const fields: ProjectFields = {
            name: patch.name ?? current.name,
            code: patch.code ?? current.code,
            target_view_hours: patch.target_view_hours ?? current.target_view_hours,
            campus_id: patch.campus_id !== undefined ? patch.campus_id : current.campus_id,
            offer_id: patch.offer_id !== undefined ? patch.offer_id : current.offer_id,
            sub_offer_id: patch.sub_offer_id !== undefined ? patch.sub_offer_id : current.sub_offer_id,
            effort_type_id: patch.effort_type_id !== undefined ? patch.effort_type_id : current.effort_type_id,
            status_id: patch.status_id !== undefined ? patch.status_id : current.status_id,
            team_assignments: patch.team_assignments ?? current.team_assignments,
            tags: patch.tags ?? current.tags,
            notes: patch.notes ?? current.notes,
        };

        if (ValidationUtils.nameKey(fields.name) !== ValidationUtils.nameKey(current.name)) {
            await this.assertNameAvailable(fields.name, id);
        }
        await this.assertReferences(fields, current);

        const updated: Project = {
            ...current,
            ...fields,
            updated_at: this.timestamp(),
            updated_by: options.actor ?? current.updated_by,
        };
        await this.store.appendOrReplace('projects', updated, id);

        this.events.emit(CoreEvents.PROJECT_UPDATED, updated);
        return updated;
    }

    /**
     * Archive a project. Archiving twice is a no-op.
     */
    async archive(id: string, options: WriteOptions = {}): Promise<Project> {
        const current = await this.getById(id);
        if (current.archived) {
            return current;
        }

        const archived: Project = {
            ...current,
            archived: true,
            updated_at: this.timestamp(),
            updated_by: options.actor ?? current.updated_by,
        };
        await this.store.appendOrReplace('projects', archived, id);

        this.logger.info(`Archived project "${archived.name}" (${id})`);
        this.events.emit(CoreEvents.PROJECT_ARCHIVED, archived);
        return archived;
    }

    /**
     * Bring an archived project back
     */
    async restore(id: string, options: WriteOptions = {}): Promise<Project> {
        const current = await this.getById(id);
        if (!current.archived) {
            return current;
        }

        const restored: Project = {
            ...current,
            archived: false,
            updated_at: this.timestamp(),
            updated_by: options.actor ?? current.updated_by,
        };
        await this.store.appendOrReplace('projects', restored, id);

        this.events.emit(CoreEvents.PROJECT_UPDATED, restored);
        return restored;
    }

    /**
     * Delete a project and its chunking units. Refused while any time entry
     * points at it; archive those instead.
     */
    async delete(id: string): Promise<void> {
        const project = await this.getById(id);

        const entries = await this.store.load('time_entries');
        const referencing = entries.filter(entry => entry.project_id === id).length;
        if (referencing > 0) {
            throw new ConflictError(
                `Cannot delete project "${project.name}": ${referencing} time entr${referencing === 1 ? 'y' : 'ies'} reference it; archive it instead`
            );
        }

        await this.core.services.chunkingUnits.deleteAllForProject(id);
        await this.store.remove('projects', id, id);

        this.logger.info(`Deleted project "${project.name}" (${id})`);
        this.events.emit(CoreEvents.PROJECT_DELETED, { id });
    }

    /**
     * Create projects from imported rows, one write per row. Bad rows are
     * reported and skipped; existing names are skipped as duplicates.
     */
    async bulkImport(rows: ProjectImportRow[], options: BulkImportOptions = {}): Promise<ProjectImportResult> {
        const result: ProjectImportResult = {
            createdCount: 0,
            skippedCount: 0,
            errors: [],
            duplicates: [],
            cancelled: false,
        };

        const lookups = await this.store.load('lookups');
        const projects = await this.store.load('projects');
        const names = new Set(projects.map(project => ValidationUtils.nameKey(project.name)));

        for (let index = 0; index < rows.length; index++) {
            if (options.signal?.aborted) {
                result.cancelled = true;
                this.logger.info(`Project import cancelled after ${index} of ${rows.length} rows`);
                break;
            }

            const rowNumber = rows[index].row_number ?? index + 1;
            const resolved = this.resolveImportRow(rows[index], rowNumber, lookups);
            if ('error' in resolved) {
                result.errors.push(resolved.error);
                continue;
            }

            const key = ValidationUtils.nameKey(resolved.input.name);
            if (names.has(key)) {
                result.duplicates.push(resolved.input.name);
                continue;
            }

            try {
                await this.create(resolved.input, { actor: options.actor });
            } catch (error) {
                if (error instanceof ValidationError || error instanceof ConflictError) {
                    result.errors.push(importError(rowNumber, error));
                    continue;
                }
                throw error;
            }
            names.add(key);
            result.createdCount++;
        }

        result.skippedCount = result.errors.length + result.duplicates.length;

        this.logger.info(
            `Imported ${result.createdCount} project(s); ${result.errors.length} error(s), ${result.duplicates.length} duplicate(s)`
        );
        this.events.emit(CoreEvents.PROJECTS_IMPORTED, result);
        return result;
    }

    /**
     * Hours logged on a project across all users, running timers excluded
     */
    async getTotalHours(projectId: string): Promise<number> {
        await this.getById(projectId);
        return this.core.services.timeEntries.getTotalHours({ projectId });
    }

    /**
     * Starred project ids of a user, in the order they were starred
     */
    async getStarred(userId: string): Promise<string[]> {
        const records = await this.store.load('starred', { partition: userId });
        return records.find(record => record.id === userId)?.project_ids ?? [];
    }

    /**
     * Star or unstar a project for a user
     */
    async setStarred(userId: string, projectId: string, starred: boolean): Promise<string[]> {
        await this.getById(projectId);

        const current = await this.getStarred(userId);
        const next = starred
            ? (current.includes(projectId) ? current : [...current, projectId])
            : current.filter(id => id !== projectId);

        if (next !== current) {
            await this.store.appendOrReplace('starred', { id: userId, project_ids: next }, userId);
        }
        return next;
    }

    /**
     * Active projects for a user's picker: starred first, then the rest;
     * each group ordered by the user's latest entry, then by last update
     */
    async listForUser(userId: string): Promise<UserProjectList> {
        const projects = await this.list();
        const starredIds = new Set(await this.getStarred(userId));
        const entries = await this.core.services.timeEntries.list({ userId });

        const lastActivity = new Map<string, string>();
        for (const entry of entries) {
            const previous = lastActivity.get(entry.project_id);
            if (previous === undefined || Date.parse(entry.start_time) > Date.parse(previous)) {
                lastActivity.set(entry.project_id, entry.start_time);
            }
        }

        const activityOf = (project: Project): number => {
            const last = lastActivity.get(project.id);
            return last === undefined ? 0 : Date.parse(last);
        };
        const ordered = [...projects].sort((a, b) =>
            activityOf(b) - activityOf(a) || Date.parse(b.updated_at) - Date.parse(a.updated_at)
        );

        return {
            starred: ordered.filter(project => starredIds.has(project.id)),
            others: ordered.filter(project => !starredIds.has(project.id)),
        };
    }

    private async assertNameAvailable(name: string, selfId: string | null): Promise<void> {
        const existing = await this.getByName(name);
        if (existing && existing.id !== selfId) {
            throw new ConflictError(`A project named "${existing.name}" already exists (${existing.id})`);
        }
    }

    /**
     * Newly assigned lookup references must exist, in the right category,
     * and be active. Unchanged ones are left alone.
     */
    private async assertReferences(fields: ProjectFields, previous: Project | null): Promise<void> {
        const lookups = await this.store.load('lookups');
        const issues: ValidationIssue[] = [];

        for (const [field, category] of PROJECT_LOOKUP_FIELDS) {
            const id = fields[field];
            if (id === null || (previous !== null && previous[field] === id)) continue;
            const issue = LookupService.checkReference(lookups, category, id, field, true);
            if (issue) issues.push(issue);
        }

        for (const [roleId, employeeId] of Object.entries(fields.team_assignments)) {
            const before = previous?.team_assignments[roleId];
            if (before === employeeId) continue;
            if (before === undefined) {
                const roleIssue = LookupService.checkReference(lookups, 'team_roles', roleId, 'team_assignments', true);
                if (roleIssue) issues.push(roleIssue);
            }
            const issue = LookupService.checkReference(lookups, 'employees', employeeId, `team_assignments.${roleId}`, true);
            if (issue) issues.push(issue);
        }

        if (issues.length > 0) {
            throw new ValidationError('Invalid project references', issues);
        }
    }

    /**
     * Turn one import row into a create input, resolving lookup names
     */
    private resolveImportRow(row: ProjectImportRow, rowNumber: number, lookups: LookupValue[]): ResolvedImportRow {
        const name = (row.name ?? '').trim();
        if (!name) {
            return { error: { row: rowNumber, field: 'name', message: 'Project name is required' } };
        }

        const target = parseTarget(row.target_view_hours);
        if (target === null) {
            return {
                error: {
                    row: rowNumber,
                    field: 'target_view_hours',
                    message: `Target view hours must be a number of 0 or more, got "${String(row.target_view_hours)}"`,
                },
            };
        }

        const input: ProjectCreateInput = {
            name,
            code: (row.code ?? '').trim(),
            target_view_hours: target,
            tags: parseTags(row.tags),
        };

        for (const [column, field, category] of IMPORT_LOOKUP_COLUMNS) {
            const label = (row[column] ?? '').trim();
            if (!label) continue;
            const key = ValidationUtils.nameKey(label);
            const value = lookups.find(candidate =>
                candidate.category === category && ValidationUtils.nameKey(candidate.name) === key
            );
            if (!value) {
                return { error: { row: rowNumber, field: column, message: `Unknown ${category} value "${label}"` } };
            }
            input[field] = value.id;
        }

        return { input };
    }
}

/** Plain decimal: digits with an optional fraction, no sign, exponent or radix prefix */
const DECIMAL = /^(?:\d+(?:\.\d*)?|\.\d+)$/;

/**
 * Blank means 0. Returns null for anything that is not a number >= 0.
 */
function parseTarget(value: number | string | undefined): number | null {
    if (value === undefined) return 0;
    if (typeof value === 'number') {
        return Number.isFinite(value) && value >= 0 ? value : null;
    }
    const text = value.trim();
    if (!text) return 0;
    if (!DECIMAL.test(text)) return null;
    return Number(text);
}

function parseTags(value: string | string[] | undefined): string[] {
    if (value === undefined) return [];
    const parts = Array.isArray(value) ? value : value.split(/[,;]/);
    return parts.map(tag => tag.trim()).filter(tag => tag.length > 0);
}

function importError(row: number, error: ValidationError | ConflictError): ProjectImportError {
    const issue = error instanceof ValidationError ? error.issues[0] : undefined;
    return { row, field: issue?.path || null, message: error.message };
}
