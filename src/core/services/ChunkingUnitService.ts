import { z } from 'zod';
import { BaseService, WriteOptions } from './BaseService';
import { CoreAPI } from '../api/CoreAPI';
import {
    CHUNKING_UNIT_STATUSES,
    ChunkingUnit,
    ChunkingUnitCreateInput,
    ChunkingUnitUpdateInput,
} from '../models/ChunkingUnit';
import { CoreEvents } from '../events/CoreEvents';
import { ConflictError, NotFoundError } from '../errors/CoreErrors';
import { ValidationUtils } from '../utils/ValidationUtils';

const sequenceSchema = z.number().int('sequence must be a whole number').positive('sequence must be 1 or more');

const createSchema = z.object({
    name: z.string().trim().default(''),
    status: z.enum(CHUNKING_UNIT_STATUSES).default('not_started'),
    sequence: sequenceSchema.optional(),
});

const updateSchema = z.object({
    name: z.string().trim().optional(),
    status: z.enum(CHUNKING_UNIT_STATUSES).optional(),
    sequence: sequenceSchema.optional(),
});

/**
 * Chunking Unit Service
 * Manages the TMs of a project (chunking/<projectId>.json)
 */
export class ChunkingUnitService extends BaseService {
    constructor(core: CoreAPI) {
        super(core, 'ChunkingUnitService');
    }

    /**
     * Get the units of a project, by sequence
     */
    async list(projectId: string): Promise<ChunkingUnit[]> {
        await this.core.services.projects.getById(projectId);
        return this.loadUnits(projectId);
    }

    /**
     * Get unit by ID. Pass the project id when known to read one file only.
     */
    async getById(id: string, projectId?: string): Promise<ChunkingUnit> {
        const units = projectId !== undefined
            ? await this.store.load('chunking_units', { partition: projectId })
            : await this.store.load('chunking_units');
        const unit = units.find(candidate => candidate.id === id);
        if (!unit) {
            throw new NotFoundError('Chunking unit', id);
        }
        return unit;
    }

    /**
     * Add a unit to a project. Without a sequence it goes last.
     */
    async create(projectId: string, input: ChunkingUnitCreateInput = {}): Promise<ChunkingUnit> {
        const data = ValidationUtils.parse(createSchema, input, 'Invalid chunking unit');
        const units = await this.list(projectId);

        const sequence = data.sequence ?? units.reduce((max, unit) => Math.max(max, unit.sequence), 0) + 1;
        this.assertSequenceFree(units, projectId, sequence, null);

        const now = this.timestamp();
        const unit: ChunkingUnit = {
            id: this.newId(),
            project_id: projectId,
            sequence,
            name: data.name,
            status: data.status,
            created_at: now,
            updated_at: now,
        };

        await this.store.appendOrReplace('chunking_units', unit, projectId);

        this.events.emit(CoreEvents.CHUNKING_UNIT_CREATED, unit);
        return unit;
    }

    /**
     * Update a unit's name, status or position
     */
    async update(id: string, input: ChunkingUnitUpdateInput, options: WriteOptions = {}): Promise<ChunkingUnit> {
        const patch = ValidationUtils.parse(updateSchema, input, 'Invalid chunking unit update');

        const current = await this.getById(id);
        this.assertUnchanged(`Chunking unit ${current.sequence}`, current, options);

        if (patch.sequence !== undefined && patch.sequence !== current.sequence) {
            const units = await this.loadUnits(current.project_id);
            this.assertSequenceFree(units, current.project_id, patch.sequence, id);
        }

        const updated: ChunkingUnit = {
            ...current,
            name: patch.name ?? current.name,
            status: patch.status ?? current.status,
            sequence: patch.sequence ?? current.sequence,
            updated_at: this.timestamp(),
        };
        await this.store.appendOrReplace('chunking_units', updated, current.project_id);

        this.events.emit(CoreEvents.CHUNKING_UNIT_UPDATED, updated);
        return updated;
    }

    /**
     * Delete a unit
     */
    async delete(id: string): Promise<void> {
        const unit = await this.getById(id);
        await this.store.remove('chunking_units', id, unit.project_id);
        this.events.emit(CoreEvents.CHUNKING_UNIT_DELETED, { id, project_id: unit.project_id });
    }

    /**
     * Remove every unit of a project; returns how many there were
     */
    async deleteAllForProject(projectId: string): Promise<number> {
        const units = await this.loadUnits(projectId);
        if (units.length === 0) return 0;

        await this.store.save('chunking_units', [], projectId);

        this.logger.info(`Deleted ${units.length} chunking unit(s) of project ${projectId}`);
        units.forEach(unit => this.events.emit(CoreEvents.CHUNKING_UNIT_DELETED, { id: unit.id, project_id: projectId }));
        return units.length;
    }

    private async loadUnits(projectId: string): Promise<ChunkingUnit[]> {
        const units = await this.store.load('chunking_units', { partition: projectId });
        return units.sort((a, b) => a.sequence - b.sequence);
    }

    private assertSequenceFree(units: ChunkingUnit[], projectId: string, sequence: number, selfId: string | null): void {
        if (units.some(unit => unit.sequence === sequence && unit.id !== selfId)) {
            throw new ConflictError(`Project ${projectId} already has a chunking unit with sequence ${sequence}`);
        }
    }
}
