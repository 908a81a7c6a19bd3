import { z } from 'zod';
import { LookupValue } from '../models/LookupValue';
import { Project, StarredProjects } from '../models/Project';
import { ChunkingUnit } from '../models/ChunkingUnit';
import { TimeEntry } from '../models/TimeEntry';
import {
    chunkingUnitSchema,
    lookupValueSchema,
    projectSchema,
    starredProjectsSchema,
    timeEntrySchema,
} from './schemas';

/**
 * Record type held by each collection
 */
export interface CollectionRecordMap {
    lookups: LookupValue;
    projects: Project;
    chunking_units: ChunkingUnit;
    time_entries: TimeEntry;
    starred: StarredProjects;
}

export type CollectionKind = keyof CollectionRecordMap;

export type RecordOf<K extends CollectionKind> = CollectionRecordMap[K];

export interface CollectionDefinition<K extends CollectionKind> {
    kind: K;
    /**
     * Relative to the root folder: the file of a single-file collection, or
     * the directory holding one file per partition
     */
    location: string;
    partitioned: boolean;
    schema: z.ZodType<RecordOf<K>, z.ZodTypeDef, unknown>;
}

export const COLLECTIONS: { [K in CollectionKind]: CollectionDefinition<K> } = {
    lookups: {
        kind: 'lookups',
        location: 'team_data.json',
        partitioned: false,
        schema: lookupValueSchema,
    },
    projects: {
        kind: 'projects',
        location: 'projects',
        partitioned: true,
        schema: projectSchema,
    },
    chunking_units: {
        kind: 'chunking_units',
        location: 'chunking',
        partitioned: true,
        schema: chunkingUnitSchema,
    },
    time_entries: {
        kind: 'time_entries',
        location: 'time',
        partitioned: true,
        schema: timeEntrySchema,
    },
    starred: {
        kind: 'starred',
        location: 'starred',
        partitioned: true,
        schema: starredProjectsSchema,
    },
};

export function getCollection<K extends CollectionKind>(kind: K): CollectionDefinition<K> {
    return COLLECTIONS[kind];
}
