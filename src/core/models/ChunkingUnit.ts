export const CHUNKING_UNIT_STATUSES = ['not_started', 'in_progress', 'complete'] as const;

export type ChunkingUnitStatus = (typeof CHUNKING_UNIT_STATUSES)[number];

/**
 * A chunking unit (TM) - production sub-division of a project, no time data
 */
export interface ChunkingUnit {
    id: string;
    project_id: string;
    sequence: number;
    name: string;
    status: ChunkingUnitStatus;
    created_at: string;
    updated_at: string;
}

export interface ChunkingUnitCreateInput {
    name?: string;
    status?: ChunkingUnitStatus;
    sequence?: number;
}

export interface ChunkingUnitUpdateInput {
    name?: string;
    status?: ChunkingUnitStatus;
    sequence?: number;
}
