import fs from 'fs-extra';
import * as path from 'path';
import { setTimeout as delay } from 'timers/promises';
import { v4 as uuidv4 } from 'uuid';
import { RecordStore, LoadOptions } from './RecordStore';
import { CollectionKind, RecordOf, getCollection } from './collections';
import { CURRENT_SCHEMA_VERSION, migrateRecords } from './migrations';
import { envelopeSchema } from './schemas';
import { DEFAULT_LOOKUPS } from './defaults';
import { LookupValue } from '../models/LookupValue';
import {
    CorruptRecordFileError,
    IOFailureError,
    IOOperation,
    SchemaVersionError,
    ValidationError,
} from '../errors/CoreErrors';
import { KeyedMutex } from '../utils/KeyedMutex';
import { Logger } from '../utils/logger';
import { Clock, systemClock } from '../utils/Clock';
import { ValidationUtils } from '../utils/ValidationUtils';
import { writeFileAtomic } from '../utils/atomicWrite';

const TRANSIENT_CODES = new Set(['EBUSY', 'EAGAIN', 'EMFILE', 'ENFILE', 'ETIMEDOUT']);

/**
 * In-process write serialisation shared by every store instance, keyed by
 * absolute file path
 */
const pathLocks = new KeyedMutex();

export interface FileRecordStoreOptions {
    /** Root of the shared data folder */
    root: string;
    logger?: Logger | null;
    clock?: Clock;
    /** Pause before the single retry of a transient I/O failure */
    retryDelayMs?: number;
    /** Leftover *.tmp files older than this are removed on initialize */
    staleTempFileMs?: number;
    /** Write default lookups when team_data.json is missing */
    seedDefaults?: boolean;
}

function errorCode(error: unknown): string | null {
    if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
        return error.code;
    }
    return null;
}

function isRecordObject(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * File-backed record store for a shared (sync-service) folder.
 *
 * Layout, relative to the root:
 *   team_data.json                  lookups
 *   projects/<projectId>.json       one project per file
 *   chunking/<projectId>.json       chunking units of one project
 *   time/<userId>_<yyyy-MM>.json    one user's entries for one month
 *   starred/<userId>.json           one user's starred projects
 *
 * Every write goes to a temporary file in the target directory and is then
 * renamed over the target. Concurrent writers in other processes are
 * last-writer-wins per file.
 */
export class FileRecordStore implements RecordStore {
    private readonly root: string;
    private readonly logger: Logger | null;
    private readonly clock: Clock;
    private readonly retryDelayMs: number;
    private readonly staleTempFileMs: number;
    private readonly seedDefaults: boolean;
    private connected: boolean = false;

    constructor(options: FileRecordStoreOptions) {
        this.root = path.resolve(options.root);
        this.logger = options.logger ?? null;
        this.clock = options.clock ?? systemClock;
        this.retryDelayMs = options.retryDelayMs ?? 250;
        this.staleTempFileMs = options.staleTempFileMs ?? 60 * 60 * 1000;
        this.seedDefaults = options.seedDefaults ?? true;
    }

    /**
     * Create the folder layout, seed team data, clear stale temp files
     */
    async initialize(): Promise<void> {
        await this.withRetry('mkdir', this.root, () => fs.ensureDir(this.root));
        for (const kind of ['projects', 'chunking_units', 'time_entries', 'starred'] as const) {
            const dir = path.join(this.root, getCollection(kind).location);
            await this.withRetry('mkdir', dir, () => fs.ensureDir(dir));
        }

        const teamData = this.filePath('lookups');
        const hasTeamData = await this.withRetry('stat', teamData, () => fs.pathExists(teamData));
        if (!hasTeamData && this.seedDefaults) {
            await this.writeRecords('lookups', teamData, this.defaultLookups());
            this.logger?.info(`Created ${teamData} with default lookups`);
        }

        await this.removeStaleTempFiles();
        this.connected = true;
    }

    async load<K extends CollectionKind>(kind: K, options: LoadOptions = {}): Promise<RecordOf<K>[]> {
        this.assertConnected();
        const definition = getCollection(kind);

        const files = definition.partitioned
            ? (options.partition !== undefined
                ? [options.partition]
                : options.partitions ?? await this.listPartitions(kind)
            ).map(partition => this.filePath(kind, partition))
            : [this.filePath(kind)];

        const records: RecordOf<K>[] = [];
        for (const file of files) {
            try {
                records.push(...await this.readRecords(kind, file));
            } catch (error) {
                if (error instanceof CorruptRecordFileError && options.skipCorrupt) {
                    this.logger?.warn(`Skipping unreadable file: ${error.message}`);
                    options.onCorrupt?.(error);
                    continue;
                }
                throw error;
            }
        }
        return records;
    }

    async save<K extends CollectionKind>(kind: K, records: RecordOf<K>[], partition?: string): Promise<void> {
        this.assertConnected();
        const file = this.filePath(kind, partition);
        this.assertUniqueIds(file, records);

        await pathLocks.run(file, async () => {
            if (records.length === 0 && getCollection(kind).partitioned) {
                await this.removeFile(file);
            } else {
                await this.writeRecords(kind, file, records);
            }
        });
    }

    async appendOrReplace<K extends CollectionKind>(kind: K, record: RecordOf<K>, partition?: string): Promise<void> {
        this.assertConnected();
        const file = this.filePath(kind, partition);

        await pathLocks.run(file, async () => {
            // a corrupt target raises here and is left untouched
            const records = await this.readRecords(kind, file);
            const index = records.findIndex(existing => existing.id === record.id);
            if (index >= 0) {
                records[index] = record;
            } else {
                records.push(record);
            }
            await this.writeRecords(kind, file, records);
        });
    }

    async remove(kind: CollectionKind, id: string, partition?: string): Promise<boolean> {
        this.assertConnected();
        const file = this.filePath(kind, partition);

        return pathLocks.run(file, async () => {
            const records = await this.readRecords(kind, file);
            const remaining = records.filter(record => record.id !== id);
            if (remaining.length === records.length) return false;

            if (remaining.length === 0 && getCollection(kind).partitioned) {
                await this.removeFile(file);
            } else {
                await this.writeRecords(kind, file, remaining);
            }
            return true;
        });
    }

    async modify<K extends CollectionKind>(
        kind: K,
        change: (records: RecordOf<K>[]) => RecordOf<K>[] | Promise<RecordOf<K>[]>,
        partition?: string
    ): Promise<RecordOf<K>[]> {
        this.assertConnected();
        const file = this.filePath(kind, partition);

        return pathLocks.run(file, async () => {
            const records = await this.readRecords(kind, file);
            const next = await change(records);
            if (next === records) return records;
            this.assertUniqueIds(file, next);

            if (next.length === 0 && getCollection(kind).partitioned) {
                await this.removeFile(file);
            } else {
                await this.writeRecords(kind, file, next);
            }
            return next;
        });
    }

    async listPartitions(kind: CollectionKind): Promise<string[]> {
        const definition = getCollection(kind);
        if (!definition.partitioned) return [];

        const dir = path.join(this.root, definition.location);
        const names = await this.withRetry('list', dir, async () => {
            try {
                return await fs.readdir(dir);
            } catch (error) {
                if (errorCode(error) === 'ENOENT') return [];
                throw error;
            }
        });

        return names
            .filter(name => name.endsWith('.json'))
            .map(name => name.slice(0, -'.json'.length))
            .sort();
    }

    async modifiedAt(kind: CollectionKind, partition?: string): Promise<Date | null> {
        const file = this.filePath(kind, partition);
        return this.withRetry('stat', file, async () => {
            try {
                const stats = await fs.stat(file);
                return stats.mtime;
            } catch (error) {
                if (errorCode(error) === 'ENOENT') return null;
                throw error;
            }
        });
    }

    describe(kind: CollectionKind, partition?: string): string {
        return this.filePath(kind, partition);
    }

    async close(): Promise<void> {
        this.connected = false;
    }

    isConnected(): boolean {
        return this.connected;
    }

    private filePath(kind: CollectionKind, partition?: string): string {
        const definition = getCollection(kind);
        if (!definition.partitioned) {
            return path.join(this.root, definition.location);
        }
        if (!partition) {
            throw new ValidationError(`Collection ${kind} needs a partition key`);
        }
        return path.join(this.root, definition.location, `${ValidationUtils.fileKey(partition)}.json`);
    }

    private assertConnected(): void {
        if (!this.connected) {
            throw new Error('Record store not initialized');
        }
    }

    private assertUniqueIds(file: string, records: Array<{ id: string }>): void {
        const seen = new Set<string>();
        for (const record of records) {
            if (seen.has(record.id)) {
                throw new ValidationError(`Duplicate record id ${record.id} for ${file}`);
            }
            seen.add(record.id);
        }
    }

    /**
     * Read, version-check, migrate and validate one file. Missing file = empty.
     */
    private async readRecords<K extends CollectionKind>(kind: K, file: string): Promise<RecordOf<K>[]> {
        const raw = await this.withRetry('read', file, async () => {
            try {
                return await fs.readFile(file, 'utf8');
            } catch (error) {
                if (errorCode(error) === 'ENOENT') return null;
                throw error;
            }
        });
        if (raw === null) return [];

        let parsed: unknown;
        try {
            parsed = JSON.parse(raw);
        } catch (error) {
            throw new CorruptRecordFileError(file, error);
        }

        if (!isRecordObject(parsed) || parsed.schemaVersion === undefined) {
            throw new SchemaVersionError(file, undefined, CURRENT_SCHEMA_VERSION);
        }
        const version = parsed.schemaVersion;
        if (typeof version !== 'number' || !Number.isInteger(version) || version < 1 || version > CURRENT_SCHEMA_VERSION) {
            throw new SchemaVersionError(file, version, CURRENT_SCHEMA_VERSION);
        }

        const envelope = envelopeSchema.safeParse(parsed);
        if (!envelope.success) {
            throw new CorruptRecordFileError(file, envelope.error);
        }
        if (envelope.data.kind !== kind) {
            throw new CorruptRecordFileError(file, `expected kind "${kind}", found "${envelope.data.kind}"`);
        }

        let records = envelope.data.records;
        if (version < CURRENT_SCHEMA_VERSION) {
            try {
                records = migrateRecords(kind, version, records);
            } catch (error) {
                throw new CorruptRecordFileError(file, error);
            }
            this.logger?.debug(`Migrated ${file} from schema version ${version}`);
        }

        const schema = getCollection(kind).schema;
        return records.map((record, index) => {
            const result = schema.safeParse(record);
            if (!result.success) {
                const detail = result.error.issues
                    .map(issue => `${issue.path.join('.') || '(record)'}: ${issue.message}`)
                    .join('; ');
                throw new CorruptRecordFileError(file, `record ${index}: ${detail}`);
            }
            return result.data;
        });
    }

    /**
     * Validate and write atomically: temp file in the same directory, then rename
     */
    private async writeRecords<K extends CollectionKind>(kind: K, file: string, records: RecordOf<K>[]): Promise<void> {
        const schema = getCollection(kind).schema;
        const validated = records.map(record => ValidationUtils.parse(schema, record, `Invalid ${kind} record`));

        const body = JSON.stringify(
            { schemaVersion: CURRENT_SCHEMA_VERSION, kind, records: validated },
            null,
            2
        ) + '\n';

        await writeFileAtomic(file, body, {
            run: (operation, target, work) => this.withRetry(operation, target, work),
            onCleanupFailure: (temp, error) => this.logger?.error(`Could not remove ${temp} after a failed write`, error),
        });
    }

    private async removeFile(file: string): Promise<void> {
        await this.withRetry('remove', file, () => fs.remove(file));
    }

    /**
     * Run an I/O step, retrying once after a pause when the failure looks
     * like a transient lock (sync clients, antivirus)
     */
    private async withRetry<T>(operation: IOOperation, target: string, work: () => Promise<T>): Promise<T> {
        try {
            return await work();
        } catch (error) {
            const code = errorCode(error);
            const transient = code !== null
                && (TRANSIENT_CODES.has(code) || (code === 'EPERM' && operation === 'rename'));
            if (!transient) {
                throw new IOFailureError(target, operation, error);
            }

            this.logger?.warn(`Transient ${code} during ${operation} of ${target}, retrying once`);
            await delay(this.retryDelayMs);
            try {
                return await work();
            } catch (retryError) {
                throw new IOFailureError(target, operation, retryError);
            }
        }
    }

    private async removeStaleTempFiles(): Promise<void> {
        const dirs = [this.root];
        for (const kind of ['projects', 'chunking_units', 'time_entries', 'starred'] as const) {
            dirs.push(path.join(this.root, getCollection(kind).location));
        }

        const cutoff = this.clock.now().getTime() - this.staleTempFileMs;
        for (const dir of dirs) {
            const names = await this.withRetry('list', dir, () => fs.readdir(dir));
            for (const name of names.filter(entry => entry.endsWith('.tmp'))) {
                const temp = path.join(dir, name);
                const stats = await this.withRetry('stat', temp, () => fs.stat(temp));
                if (stats.mtime.getTime() < cutoff) {
                    await this.withRetry('remove', temp, () => fs.remove(temp));
                    this.logger?.info(`Removed stale temporary file ${temp}`);
                }
            }
        }
    }

    private defaultLookups(): LookupValue[] {
        const now = this.clock.now().toISOString();
        return DEFAULT_LOOKUPS.flatMap(({ category, names }) =>
            names.map(name => ({
                id: uuidv4(),
                category,
                name,
                code: '',
                active: true,
                created_at: now,
                updated_at: now,
            }))
        );
    }
}
