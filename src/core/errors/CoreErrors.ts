import { ZodIssue } from 'zod';

export type CoreErrorCode =
    | 'VALIDATION'
    | 'INVALID_DURATION'
    | 'NOT_FOUND'
    | 'CONFLICT'
    | 'ALREADY_RUNNING'
    | 'NO_ACTIVE_TIMER'
    | 'CORRUPT_RECORD_FILE'
    | 'SCHEMA_VERSION'
    | 'IO_FAILURE'
    | 'CANCELLED';

/**
 * Base class for every error raised by the core
 */
export class CoreError extends Error {
    readonly code: CoreErrorCode;

    constructor(code: CoreErrorCode, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
        this.code = code;
    }
}

export interface ValidationIssue {
    path: string;
    message: string;
}

/**
 * Bad input shape or value. Never persisted.
 */
export class ValidationError extends CoreError {
    readonly issues: ValidationIssue[];

    constructor(message: string, issues: ValidationIssue[] = [], code: CoreErrorCode = 'VALIDATION') {
        super(code, issues.length > 0 ? `${message}: ${formatIssues(issues)}` : message);
        this.issues = issues;
    }

    static fromZod(context: string, issues: ZodIssue[]): ValidationError {
        return new ValidationError(
            context,
            issues.map(issue => ({
                path: issue.path.join('.'),
                message: issue.message,
            }))
        );
    }
}

/**
 * End time not strictly after start time
 */
export class InvalidDurationError extends ValidationError {
    readonly startTime: string;
    readonly endTime: string;

    constructor(startTime: string, endTime: string) {
        super(`Invalid duration: end ${endTime} is not after start ${startTime}`, [], 'INVALID_DURATION');
        this.startTime = startTime;
        this.endTime = endTime;
    }
}

export class NotFoundError extends CoreError {
    readonly entity: string;
    readonly id: string;

    constructor(entity: string, id: string) {
        super('NOT_FOUND', `${entity} not found: ${id}`);
        this.entity = entity;
        this.id = id;
    }
}

/**
 * Invariant violation (duplicate name, value in use, stale update...)
 */
export class ConflictError extends CoreError {
    constructor(message: string, code: CoreErrorCode = 'CONFLICT') {
        super(code, message);
    }
}

export class AlreadyRunningError extends ConflictError {
    readonly userId: string;
    readonly entryId: string | null;

    constructor(userId: string, entryId: string | null) {
        super(
            entryId
                ? `A timer is already running for ${userId} (entry ${entryId})`
                : `A timer is already running for ${userId}`,
            'ALREADY_RUNNING'
        );
        this.userId = userId;
        this.entryId = entryId;
    }
}

export class NoActiveTimerError extends ConflictError {
    readonly userId: string;

    constructor(userId: string) {
        super(`No active timer for ${userId}`, 'NO_ACTIVE_TIMER');
        this.userId = userId;
    }
}

/**
 * A persisted file that cannot be parsed. Never deleted automatically.
 */
export class CorruptRecordFileError extends CoreError {
    readonly path: string;

    constructor(path: string, cause: unknown, code: CoreErrorCode = 'CORRUPT_RECORD_FILE') {
        super(code, `Corrupt record file ${path}: ${describeCause(cause)}`, { cause });
        this.path = path;
    }
}

export class SchemaVersionError extends CorruptRecordFileError {
    readonly found: unknown;
    readonly supported: number;

    constructor(path: string, found: unknown, supported: number) {
        super(
            path,
            found === undefined
                ? 'missing schemaVersion'
                : `unsupported schemaVersion ${String(found)} (this reader supports up to ${supported})`,
            'SCHEMA_VERSION'
        );
        this.found = found;
        this.supported = supported;
    }
}

export type IOOperation = 'read' | 'write' | 'rename' | 'remove' | 'list' | 'stat' | 'mkdir';

export class IOFailureError extends CoreError {
    readonly path: string;
    readonly operation: IOOperation;

    constructor(path: string, operation: IOOperation, cause: unknown) {
        super('IO_FAILURE', `Failed to ${operation} ${path}: ${describeCause(cause)}`, { cause });
        this.path = path;
        this.operation = operation;
    }
}

export class OperationCancelledError extends CoreError {
    constructor(operation: string) {
        super('CANCELLED', `${operation} was cancelled`);
    }
}

function formatIssues(issues: ValidationIssue[]): string {
    return issues.map(issue => (issue.path ? `${issue.path}: ${issue.message}` : issue.message)).join('; ');
}

function describeCause(cause: unknown): string {
    if (cause instanceof Error) return cause.message;
    return String(cause);
}
