import { z } from 'zod';
import { BaseService, WriteOptions } from './BaseService';
import { LookupService } from './LookupService';
import { CoreAPI } from '../api/CoreAPI';
import { TimeEntry, TimeEntryCreateInput, TimeEntryFilter, TimeEntryUpdateInput } from '../models/TimeEntry';
import { CoreEvents } from '../events/CoreEvents';
import {
    AlreadyRunningError,
    ConflictError,
    CorruptRecordFileError,
    InvalidDurationError,
    NotFoundError,
    ValidationError,
    ValidationIssue,
} from '../errors/CoreErrors';
import { LoadOptions } from '../storage/RecordStore';
import { TimeUtils } from '../utils/TimeUtils';
import { ValidationUtils } from '../utils/ValidationUtils';

const PARTITION_PATTERN = /^(.+)_(\d{4}-\d{2})$/;

const timestamp = z
    .string()
    .datetime({ offset: true, message: 'must be an ISO 8601 timestamp' })
    .transform(value => new Date(value).toISOString());

const createSchema = z.object({
    project_id: z.string().min(1, 'project_id is required'),
    user_id: z.string().min(1, 'user_id is required'),
    work_type_id: z.string().min(1, 'work_type_id is required'),
    start_time: timestamp,
    end_time: timestamp.nullable(),
    notes: z.string().default(''),
    manual: z.boolean().default(false),
});

const updateSchema = z.object({
    project_id: z.string().min(1).optional(),
    work_type_id: z.string().min(1).optional(),
    start_time: timestamp.optional(),
    end_time: timestamp.nullable().optional(),
    notes: z.string().optional(),
});

export type EntryLoadOptions = Pick<LoadOptions, 'skipCorrupt' | 'onCorrupt'>;

export interface EntryWriteOptions extends WriteOptions {
    /** Owner of the entry, when known; only that user's files are searched */
    userId?: string;
}

interface LocatedEntry {
    entry: TimeEntry;
    partition: string;
    /** Other partitions holding a stale copy (interrupted move) */
    strays: string[];
}

/**
 * Time Entry Service
 * Entries are stored per user and UTC month: time/<userId>_<yyyy-MM>.json
 */
export class TimeEntryService extends BaseService {
    constructor(core: CoreAPI) {
        super(core, 'TimeEntryService');
    }

    /**
     * Partition key of an entry
     */
    static partitionFor(userId: string, startTime: string): string {
        return `${ValidationUtils.fileKey(userId)}_${TimeUtils.monthKey(startTime)}`;
    }

    /**
     * Get entries matching a filter, oldest first
     */
    async list(filter: TimeEntryFilter = {}, loadOptions: EntryLoadOptions = {}): Promise<TimeEntry[]> {
        const partitions = await this.partitionsFor(filter);
        const records = await this.store.load('time_entries', { ...loadOptions, partitions });

        return dedupe(records)
            .filter(entry => matches(entry, filter))
            .sort((a, b) =>
                Date.parse(a.start_time) - Date.parse(b.start_time) || a.created_at.localeCompare(b.created_at)
            );
    }

    /**
     * Get entry by ID
     */
    async getById(id: string): Promise<TimeEntry> {
        const located = await this.locate(id);
        return located.entry;
    }

    /**
     * The user's running entry, if any. With several, the first in store order.
     */
    async findOpen(userId: string): Promise<TimeEntry | null> {
        const open = await this.openEntriesInStoreOrder(userId);
        return open[0] ?? null;
    }

    /**
     * Create an entry. An entry without end_time starts a timer and is
     * refused when the user already has one running.
     */
    async create(input: TimeEntryCreateInput): Promise<TimeEntry> {
        const data = ValidationUtils.parse(createSchema, input, 'Invalid time entry');
        if (data.end_time !== null && TimeUtils.durationMs(data.start_time, data.end_time) <= 0) {
            throw new InvalidDurationError(data.start_time, data.end_time);
        }

        await this.assertProjectOpen(data.project_id);
        await this.assertReferences(data.user_id, data.work_type_id);

        if (data.end_time === null) {
            const running = await this.findOpen(data.user_id);
            if (running) {
                throw new AlreadyRunningError(data.user_id, running.id);
            }
        }

        const now = this.timestamp();
        const entry: TimeEntry = {
            id: this.newId(),
            ...data,
            created_at: now,
            updated_at: now,
        };
        const partition = TimeEntryService.partitionFor(entry.user_id, entry.start_time);

        await this.store.appendOrReplace('time_entries', entry, partition);

        if (entry.end_time === null) {
            await this.confirmSoleOpenEntry(entry, partition);
        }

        this.logger.debug(`Created time entry ${entry.id} in ${partition}`);
        this.events.emit(CoreEvents.TIME_ENTRY_CREATED, entry);
        return entry;
    }

    /**
     * Update an entry. A new start month moves it to another file.
     */
    async update(id: string, input: TimeEntryUpdateInput, options: EntryWriteOptions = {}): Promise<TimeEntry> {
        const patch = ValidationUtils.parse(updateSchema, input, 'Invalid time entry update');

        const located = await this.locate(id, options.userId);
        const current = located.entry;
        this.assertUnchanged(`Time entry ${id}`, current, options);

        const updated: TimeEntry = {
            ...current,
            project_id: patch.project_id ?? current.project_id,
            work_type_id: patch.work_type_id ?? current.work_type_id,
            start_time: patch.start_time ?? current.start_time,
            end_time: patch.end_time !== undefined ? patch.end_time : current.end_time,
            notes: patch.notes ?? current.notes,
            updated_at: this.timestamp(),
        };

        if (updated.end_time !== null && TimeUtils.durationMs(updated.start_time, updated.end_time) <= 0) {
            throw new InvalidDurationError(updated.start_time, updated.end_time);
        }
        if (updated.project_id !== current.project_id) {
            await this.assertProjectOpen(updated.project_id);
        }
        if (updated.work_type_id !== current.work_type_id) {
            await this.assertReferences(null, updated.work_type_id);
        }
        if (updated.end_time === null && current.end_time !== null) {
            const running = await this.findOpen(updated.user_id);
            if (running && running.id !== id) {
                throw new AlreadyRunningError(updated.user_id, running.id);
            }
        }

        const partition = TimeEntryService.partitionFor(updated.user_id, updated.start_time);
        await this.store.appendOrReplace('time_entries', updated, partition);

        // new location written first; a crash here leaves a duplicate that list() resolves
        const previous = [located.partition, ...located.strays].filter(key => key !== partition);
        for (const key of previous) {
            await this.store.remove('time_entries', id, key);
        }

        this.events.emit(CoreEvents.TIME_ENTRY_UPDATED, updated);
        return updated;
    }

    /**
     * Delete an entry
     */
    async delete(id: string, options: Pick<EntryWriteOptions, 'userId'> = {}): Promise<void> {
        const located = await this.locate(id, options.userId);
        for (const key of [located.partition, ...located.strays]) {
            await this.store.remove('time_entries', id, key);
        }

        this.logger.info(`Deleted time entry ${id}`);
        this.events.emit(CoreEvents.TIME_ENTRY_DELETED, { id });
    }

    /**
     * Sum of closed entries matching a filter, in hours
     */
    async getTotalHours(filter: TimeEntryFilter = {}): Promise<number> {
        const entries = await this.list({ ...filter, open: false });
        const totalMs = entries.reduce((sum, entry) => sum + entryDurationMs(entry), 0);
        return TimeUtils.msToHours(totalMs);
    }

    /**
     * Partitions that can hold entries for the filter's user and range
     */
    private async partitionsFor(filter: TimeEntryFilter): Promise<string[]> {
        const partitions = await this.store.listPartitions('time_entries');
        const userKey = filter.userId !== undefined ? ValidationUtils.fileKey(filter.userId) : null;
        const fromMonth = filter.from ? TimeUtils.monthKey(filter.from) : null;
        const toMonth = filter.to ? TimeUtils.monthKey(filter.to) : null;

        return partitions.filter(partition => {
            const match = PARTITION_PATTERN.exec(partition);
            if (!match) return userKey === null;
            const [, user, month] = match;
            if (userKey !== null && user !== userKey) return false;
            if (fromMonth !== null && month < fromMonth) return false;
            if (toMonth !== null && month > toMonth) return false;
            return true;
        });
    }

    /**
     * Find which partition holds an entry, scanning one file at a time.
     * user_id never changes, so every copy lives in its owner's files.
     * Unreadable files are skipped; the first one is raised only when the
     * entry is found nowhere else.
     */
    private async locate(id: string, userId?: string): Promise<LocatedEntry> {
        const partitions = userId !== undefined
            ? await this.partitionsFor({ userId })
            : await this.store.listPartitions('time_entries');
        const skipped: CorruptRecordFileError[] = [];
        let located: LocatedEntry | null = null;

        for (const partition of partitions) {
            const records = await this.store.load('time_entries', {
                partition,
                skipCorrupt: true,
                onCorrupt: error => {
                    skipped.push(error);
                    this.events.emit(CoreEvents.STORE_CORRUPT_FILE_SKIPPED, { path: error.path, message: error.message });
                },
            });
            const entry = records.find(candidate => candidate.id === id);
            if (!entry) continue;

            if (located === null) {
                located = { entry, partition, strays: [] };
            } else if (entry.updated_at > located.entry.updated_at) {
                located = { entry, partition, strays: [...located.strays, located.partition] };
            } else {
                located.strays.push(partition);
            }
        }

        if (!located) {
            if (skipped.length > 0) {
                throw skipped[0];
            }
            throw new NotFoundError('Time entry', id);
        }
        return located;
    }

    private async openEntriesInStoreOrder(userId: string): Promise<TimeEntry[]> {
        const partitions = await this.partitionsFor({ userId });
        const records = await this.store.load('time_entries', { partitions });
        return dedupe(records).filter(entry => entry.end_time === null && entry.user_id === userId);
    }

    /**
     * Re-read after writing an open entry. When another process wrote an
     * open entry for the same user first, ours is withdrawn.
     */
    private async confirmSoleOpenEntry(entry: TimeEntry, partition: string): Promise<void> {
        const open = await this.openEntriesInStoreOrder(entry.user_id);
        const position = open.findIndex(candidate => candidate.id === entry.id);

        if (position === 0) return;

        if (position > 0) {
            await this.store.remove('time_entries', entry.id, partition);
            this.logger.warn(`Withdrew time entry ${entry.id}: ${entry.user_id} already has open entry ${open[0].id}`);
            throw new AlreadyRunningError(entry.user_id, open[0].id);
        }
        if (open.length > 0) {
            throw new AlreadyRunningError(entry.user_id, open[0].id);
        }
        throw new ConflictError(`Time entry ${entry.id} was removed from ${this.store.describe('time_entries', partition)} while it was being created`);
    }

    private async assertProjectOpen(projectId: string): Promise<void> {
        const project = await this.core.services.projects.getById(projectId);
        if (project.archived) {
            throw new ConflictError(`Project "${project.name}" is archived and takes no new time`);
        }
    }

    /**
     * The user must be an active employee and the work type active
     */
    private async assertReferences(userId: string | null, workTypeId: string): Promise<void> {
        const lookups = await this.store.load('lookups');
        const issues: ValidationIssue[] = [];

        if (userId !== null) {
            const issue = LookupService.checkReference(lookups, 'employees', userId, 'user_id', true);
            if (issue) issues.push(issue);
        }
        const issue = LookupService.checkReference(lookups, 'work_types', workTypeId, 'work_type_id', true);
        if (issue) issues.push(issue);

        if (issues.length > 0) {
            throw new ValidationError('Invalid time entry references', issues);
        }
    }
}

/**
 * Duration of a closed entry; 0 while running
 */
export function entryDurationMs(entry: TimeEntry): number {
    return entry.end_time === null ? 0 : TimeUtils.durationMs(entry.start_time, entry.end_time);
}

/**
 * Keep one copy per id, the most recently updated
 */
function dedupe(entries: TimeEntry[]): TimeEntry[] {
    const byId = new Map<string, TimeEntry>();
    for (const entry of entries) {
        const existing = byId.get(entry.id);
        if (!existing || entry.updated_at > existing.updated_at) {
            byId.set(entry.id, entry);
        }
    }
    return Array.from(byId.values());
}

function matches(entry: TimeEntry, filter: TimeEntryFilter): boolean {
    if (filter.userId !== undefined && entry.user_id !== filter.userId) return false;
    if (filter.projectId !== undefined && entry.project_id !== filter.projectId) return false;
    if (filter.workTypeId !== undefined && entry.work_type_id !== filter.workTypeId) return false;
    if (filter.open !== undefined && (entry.end_time === null) !== filter.open) return false;

    const start = Date.parse(entry.start_time);
    if (filter.from && start < filter.from.getTime()) return false;
    if (filter.to && start > filter.to.getTime()) return false;
    return true;
}
