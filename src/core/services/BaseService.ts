import { v4 as uuidv4 } from 'uuid';
import { CoreAPI } from '../api/CoreAPI';
import { EventBus } from '../events/EventBus';
import { CoreEventMap } from '../events/CoreEvents';
import { StateManager } from '../state/StateManager';
import { RecordStore } from '../storage/RecordStore';
import { ConflictError, OperationCancelledError } from '../errors/CoreErrors';
import { Logger } from '../utils/logger';
import { Clock } from '../utils/Clock';

/**
 * Options accepted by every mutating repository call
 */
export interface WriteOptions {
    /** User recorded as created_by / updated_by where the record has one */
    actor?: string;
    /**
     * updated_at the caller last saw. The update fails with ConflictError
     * when the stored record has changed since.
     */
    expectedUpdatedAt?: string;
}

/**
 * Base Service class
 * Provides common functionality for all services
 */
export abstract class BaseService {
    protected core: CoreAPI;
    protected events: EventBus<CoreEventMap>;
    protected state: StateManager;
    protected store: RecordStore;
    protected clock: Clock;
    protected logger: Logger;

    constructor(core: CoreAPI, context: string) {
        this.core = core;
        this.events = core.events;
        this.state = core.state;
        this.clock = core.clock;
        this.logger = core.logger.child(context);

        if (!core.store) {
            throw new Error('Record store not initialized');
        }
        this.store = core.store;
    }

    /**
     * Current time as an ISO timestamp
     */
    protected timestamp(): string {
        return this.clock.now().toISOString();
    }

    protected newId(): string {
        return uuidv4();
    }

    /**
     * Optional staleness check before an update
     */
    protected assertUnchanged(label: string, current: { updated_at: string }, options: WriteOptions): void {
        if (options.expectedUpdatedAt !== undefined && options.expectedUpdatedAt !== current.updated_at) {
            throw new ConflictError(
                `${label} was modified at ${current.updated_at} since it was read (${options.expectedUpdatedAt}); reload before saving`
            );
        }
    }

    /**
     * Cancellation point between units of work
     */
    protected throwIfAborted(signal: AbortSignal | undefined, operation: string): void {
        if (signal?.aborted) {
            this.logger.info(`${operation} cancelled`);
            throw new OperationCancelledError(operation);
        }
    }
}
