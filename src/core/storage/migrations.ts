import { CollectionKind } from './collections';

/**
 * Version written by this build. Files carrying a newer version are rejected.
 */
export const CURRENT_SCHEMA_VERSION = 2;

/**
 * Rewrites the raw records of one file from version N to N + 1
 */
export type Migration = (records: unknown[]) => unknown[];

type MigrationTable = { [K in CollectionKind]: { [fromVersion: number]: Migration } };

function isPlainObject(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function mapObjects(records: unknown[], transform: (record: Record<string, unknown>) => Record<string, unknown>): unknown[] {
    return records.map(record => (isPlainObject(record) ? transform(record) : record));
}

const identity: Migration = records => records;

/**
 * v1 projects stored the target as `target_hours`
 */
const renameTargetHours: Migration = records =>
    mapObjects(records, ({ target_hours, ...rest }) => {
        if (rest.target_view_hours === undefined && target_hours !== undefined) {
            return { ...rest, target_view_hours: target_hours };
        }
        return rest;
    });

/**
 * v1 time entries stored a redundant `duration_minutes`. It must agree with
 * start/end (to the minute) and is then dropped.
 */
const dropStoredDuration: Migration = records =>
    mapObjects(records, ({ duration_minutes, ...rest }) => {
        if (duration_minutes === undefined || duration_minutes === null) return rest;
        if (typeof rest.start_time !== 'string' || typeof rest.end_time !== 'string') return rest;

        const derived = (Date.parse(rest.end_time) - Date.parse(rest.start_time)) / 60000;
        if (typeof duration_minutes !== 'number' || Math.abs(derived - duration_minutes) >= 1) {
            throw new Error(
                `entry ${String(rest.id)} stores duration_minutes=${String(duration_minutes)} but start/end span ${derived.toFixed(1)} minutes`
            );
        }
        return rest;
    });

/**
 * v1 lookup values used `is_active`
 */
const renameIsActive: Migration = records =>
    mapObjects(records, ({ is_active, ...rest }) => {
        if (rest.active === undefined && typeof is_active === 'boolean') {
            return { ...rest, active: is_active };
        }
        return rest;
    });

const MIGRATIONS: MigrationTable = {
    lookups: { 1: renameIsActive },
    projects: { 1: renameTargetHours },
    chunking_units: { 1: identity },
    time_entries: { 1: dropStoredDuration },
    starred: { 1: identity },
};

/**
 * Bring raw records from `fromVersion` up to CURRENT_SCHEMA_VERSION
 */
export function migrateRecords(kind: CollectionKind, fromVersion: number, records: unknown[]): unknown[] {
    let migrated = records;
    for (let version = fromVersion; version < CURRENT_SCHEMA_VERSION; version++) {
        const step = MIGRATIONS[kind][version];
        if (!step) {
            throw new Error(`no migration for ${kind} from schema version ${version}`);
        }
        migrated = step(migrated);
    }
    return migrated;
}
