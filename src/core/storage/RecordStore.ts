import { CorruptRecordFileError } from '../errors/CoreErrors';
import { CollectionKind, RecordOf } from './collections';

export interface LoadOptions {
    /** Read a single partition of a partitioned collection */
    partition?: string;
    /** Read only these partitions; missing ones count as empty */
    partitions?: string[];
    /** Skip unreadable files instead of failing the whole load */
    skipCorrupt?: boolean;
    onCorrupt?: (error: CorruptRecordFileError) => void;
}

/**
 * Record Store Interface
 * Persists typed records of each collection. Implementations must never
 * expose a half-written file and must re-read storage on every load.
 */
export interface RecordStore {
    /**
     * Prepare the storage location
     */
    initialize(): Promise<void>;

    /**
     * Load every record of a collection (or of the selected partitions)
     */
    load<K extends CollectionKind>(kind: K, options?: LoadOptions): Promise<RecordOf<K>[]>;

    /**
     * Replace the full content of a collection file
     */
    save<K extends CollectionKind>(kind: K, records: RecordOf<K>[], partition?: string): Promise<void>;

    /**
     * Insert a record, or replace the stored record with the same id
     */
    appendOrReplace<K extends CollectionKind>(kind: K, record: RecordOf<K>, partition?: string): Promise<void>;

    /**
     * Remove one record; resolves false when it was not there
     */
    remove(kind: CollectionKind, id: string, partition?: string): Promise<boolean>;

    /**
     * Read one file, pass its records to `change` and write back what it
     * returns, all under the file's write lock. Returning the same array
     * skips the write. Resolves with the resulting records.
     */
    modify<K extends CollectionKind>(
        kind: K,
        change: (records: RecordOf<K>[]) => RecordOf<K>[] | Promise<RecordOf<K>[]>,
        partition?: string
    ): Promise<RecordOf<K>[]>;

    /**
     * Partition keys currently present for a collection, sorted
     */
    listPartitions(kind: CollectionKind): Promise<string[]>;

    /**
     * Last modification time of a collection file, null when absent
     */
    modifiedAt(kind: CollectionKind, partition?: string): Promise<Date | null>;

    /**
     * Human-readable location of a collection file, for error messages
     */
    describe(kind: CollectionKind, partition?: string): string;

    close(): Promise<void>;

    isConnected(): boolean;
}
