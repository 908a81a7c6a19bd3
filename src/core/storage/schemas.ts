import { z } from 'zod';
import { LOOKUP_CATEGORIES, LookupValue } from '../models/LookupValue';
import { Project, StarredProjects } from '../models/Project';
import { CHUNKING_UNIT_STATUSES, ChunkingUnit } from '../models/ChunkingUnit';
import { TimeEntry } from '../models/TimeEntry';

const isoTimestamp = z.string().datetime({ offset: true });

export const lookupValueSchema: z.ZodType<LookupValue, z.ZodTypeDef, unknown> = z.object({
    id: z.string().min(1),
    category: z.enum(LOOKUP_CATEGORIES),
    name: z.string().min(1),
    code: z.string().default(''),
    active: z.boolean().default(true),
    created_at: isoTimestamp,
    updated_at: isoTimestamp,
});

export const projectSchema: z.ZodType<Project, z.ZodTypeDef, unknown> = z.object({
    id: z.string().min(1),
    name: z.string().min(1),
    code: z.string().default(''),
    target_view_hours: z.number().finite().nonnegative(),
    campus_id: z.string().nullable().default(null),
    offer_id: z.string().nullable().default(null),
    sub_offer_id: z.string().nullable().default(null),
    effort_type_id: z.string().nullable().default(null),
    status_id: z.string().nullable().default(null),
    team_assignments: z.record(z.string()).default({}),
    tags: z.array(z.string()).default([]),
    notes: z.string().default(''),
    archived: z.boolean().default(false),
    created_at: isoTimestamp,
    created_by: z.string().default(''),
    updated_at: isoTimestamp,
    updated_by: z.string().default(''),
});

export const chunkingUnitSchema: z.ZodType<ChunkingUnit, z.ZodTypeDef, unknown> = z.object({
    id: z.string().min(1),
    project_id: z.string().min(1),
    sequence: z.number().int().positive(),
    name: z.string().default(''),
    status: z.enum(CHUNKING_UNIT_STATUSES).default('not_started'),
    created_at: isoTimestamp,
    updated_at: isoTimestamp,
});

export const timeEntrySchema: z.ZodType<TimeEntry, z.ZodTypeDef, unknown> = z
    .object({
        id: z.string().min(1),
        project_id: z.string().min(1),
        user_id: z.string().min(1),
        work_type_id: z.string().min(1),
        start_time: isoTimestamp,
        end_time: isoTimestamp.nullable(),
        notes: z.string().default(''),
        manual: z.boolean().default(false),
        created_at: isoTimestamp,
        updated_at: isoTimestamp,
    })
    .refine(
        entry => entry.end_time === null || Date.parse(entry.end_time) > Date.parse(entry.start_time),
        { message: 'end_time must be after start_time', path: ['end_time'] }
    );

export const starredProjectsSchema: z.ZodType<StarredProjects, z.ZodTypeDef, unknown> = z.object({
    id: z.string().min(1),
    project_ids: z.array(z.string()),
});

/**
 * Envelope wrapped around every persisted file
 */
export const envelopeSchema = z.object({
    schemaVersion: z.number().int().positive(),
    kind: z.string(),
    records: z.array(z.unknown()),
});
