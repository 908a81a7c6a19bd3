/**
 * TimeLedger Core - file-backed time tracking and reporting
 *
 * Platform-independent business logic over a shared data folder, usable by
 * any front end (desktop, CLI, service).
 */

// API
export { CoreAPI, CoreServices, CoreOptions, OpenCoreOptions, openCore } from './api/CoreAPI';

// Models
export { LookupValue, LookupCategory, LookupValueCreateInput, LookupValueUpdateInput, LOOKUP_CATEGORIES } from './models/LookupValue';
export {
    Project,
    ProjectCreateInput,
    ProjectUpdateInput,
    ProjectFilter,
    ProjectImportRow,
    ProjectImportError,
    ProjectImportResult,
    StarredProjects,
} from './models/Project';
export { ChunkingUnit, ChunkingUnitCreateInput, ChunkingUnitUpdateInput, ChunkingUnitStatus, CHUNKING_UNIT_STATUSES } from './models/ChunkingUnit';
export { TimeEntry, TimeEntryCreateInput, TimeEntryUpdateInput, TimeEntryFilter } from './models/TimeEntry';
export type {
    Report,
    ReportFilter,
    ReportRow,
    ReportSummary,
    ProjectSubtotal,
    WorkTypeSubtotal,
    UserSubtotal,
    DaySubtotal,
} from './models/Report';

// Services
export { BaseService, WriteOptions } from './services/BaseService';
export { LookupService, LookupUsage, LookupImportResult } from './services/LookupService';
export { ProjectService, BulkImportOptions, UserProjectList } from './services/ProjectService';
export { ChunkingUnitService } from './services/ChunkingUnitService';
export { TimeEntryService, EntryLoadOptions, EntryWriteOptions, entryDurationMs } from './services/TimeEntryService';
export { TimerService, TimerState } from './services/TimerService';
export { ReportService, GenerateReportOptions } from './services/ReportService';
export { ImportService } from './services/ImportService';
export { ExportService } from './services/ExportService';

// Storage
export { RecordStore, LoadOptions } from './storage/RecordStore';
export { FileRecordStore, FileRecordStoreOptions } from './storage/FileRecordStore';
export { CollectionKind, CollectionRecordMap, RecordOf, COLLECTIONS } from './storage/collections';
export { CURRENT_SCHEMA_VERSION } from './storage/migrations';

// Reports, import and export
export { buildReport, ReportSource, BuildReportOptions } from './reports/ReportBuilder';
export * from './exporters';
export { readProjectRowsFromCsv, readProjectRowsFromWorkbook } from './importers/projectReaders';
export { readLookupNamesFromCsv, readLookupNamesFromJson } from './importers/lookupReaders';

// Errors
export * from './errors/CoreErrors';

// State
export { StateManager, TrackingState } from './state/StateManager';

// Events
export { EventBus } from './events/EventBus';
export { CoreEvents, CoreEventType, CoreEventMap } from './events/CoreEvents';

// Config
export { LocalConfig, LocalConfigData, LocalConfigOptions, DATA_FOLDER_ENV } from './config/LocalConfig';

// Utils
export { Clock, systemClock } from './utils/Clock';
export { Logger, LoggerOptions, LogLevel, createCoreLogger } from './utils/logger';
export { TimeUtils } from './utils/TimeUtils';
export { DateFilters } from './utils/DateFilters';
export type { DateRange, DateFilterPreset } from './utils/DateFilters';
export { ValidationUtils } from './utils/ValidationUtils';
