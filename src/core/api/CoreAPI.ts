import * as winston from 'winston';
import { EventBus } from '../events/EventBus';
import { CoreEventMap, CoreEvents } from '../events/CoreEvents';
import { StateManager } from '../state/StateManager';
import { RecordStore } from '../storage/RecordStore';
import { FileRecordStore } from '../storage/FileRecordStore';
import { LookupService } from '../services/LookupService';
import { ProjectService } from '../services/ProjectService';
import { ChunkingUnitService } from '../services/ChunkingUnitService';
import { TimeEntryService } from '../services/TimeEntryService';
import { TimerService } from '../services/TimerService';
import { ReportService } from '../services/ReportService';
import { ImportService } from '../services/ImportService';
import { ExportService } from '../services/ExportService';
import { Clock, systemClock } from '../utils/Clock';
import { Logger, LoggerOptions, createCoreLogger } from '../utils/logger';

/**
 * Core API Services
 */
export interface CoreServices {
    lookups: LookupService;
    projects: ProjectService;
    chunkingUnits: ChunkingUnitService;
    timeEntries: TimeEntryService;
    timer: TimerService;
    reports: ReportService;
    imports: ImportService;
    exports: ExportService;
}

export interface CoreOptions {
    clock?: Clock;
    /** An existing winston logger; otherwise one is built from `logging` */
    logger?: winston.Logger;
    logging?: LoggerOptions;
}

/**
 * Core API
 * Main interface for interacting with the application core. Construct one
 * per application run and pass it to whatever needs it.
 */
export class CoreAPI {
    public events: EventBus<CoreEventMap>;
    public state: StateManager;
    public store: RecordStore | null;
    public clock: Clock;
    public logger: Logger;
    public services!: CoreServices;

    private initialized: boolean;

    constructor(options: CoreOptions = {}) {
        this.clock = options.clock ?? systemClock;
        this.logger = new Logger('Core', options.logger ?? createCoreLogger(options.logging));
        this.events = new EventBus<CoreEventMap>(this.logger.child('EventBus'));
        this.state = new StateManager(this.events);
        this.store = null;
        this.initialized = false;
    }

    /**
     * Initialize Core with a record store
     */
    async initialize(store: RecordStore): Promise<void> {
        if (this.initialized) {
            throw new Error('Core already initialized');
        }

        this.store = store;
        await this.store.initialize();

        // Initialize services
        this.services = {
            lookups: new LookupService(this),
            projects: new ProjectService(this),
            chunkingUnits: new ChunkingUnitService(this),
            timeEntries: new TimeEntryService(this),
            timer: new TimerService(this),
            reports: new ReportService(this),
            imports: new ImportService(this),
            exports: new ExportService(this),
        };

        this.events.emit(CoreEvents.STORE_CONNECTED, { location: this.store.describe('lookups') });
        this.events.emit(CoreEvents.CORE_INITIALIZED, undefined);

        this.initialized = true;
        this.logger.info('Core initialized');
    }

    /**
     * Shutdown core
     */
    async shutdown(): Promise<void> {
        if (this.store) {
            await this.store.close();
        }
        this.events.clear();
        this.state.reset();
        this.initialized = false;
    }
}

export interface OpenCoreOptions extends CoreOptions {
    /** Root of the shared data folder */
    dataFolder: string;
    retryDelayMs?: number;
}

/**
 * Build a CoreAPI over a FileRecordStore rooted at `dataFolder`
 */
export async function openCore(options: OpenCoreOptions): Promise<CoreAPI> {
    const core = new CoreAPI(options);
    const store = new FileRecordStore({
        root: options.dataFolder,
        logger: core.logger.child('FileRecordStore'),
        clock: core.clock,
        retryDelayMs: options.retryDelayMs,
    });
    await core.initialize(store);
    return core;
}
