import { LookupValue } from '../models/LookupValue';
import { Project, ProjectImportResult } from '../models/Project';
import { ChunkingUnit } from '../models/ChunkingUnit';
import { TimeEntry } from '../models/TimeEntry';
import { TrackingState } from '../state/StateManager';

/**
 * Event names published on the core EventBus
 */
export const CoreEvents = {
    CORE_INITIALIZED: 'core:initialized',
    STORE_CONNECTED: 'store:connected',
    STORE_CORRUPT_FILE_SKIPPED: 'store:corrupt-file-skipped',

    LOOKUP_CREATED: 'lookup:created',
    LOOKUP_UPDATED: 'lookup:updated',
    LOOKUP_DELETED: 'lookup:deleted',

    PROJECT_CREATED: 'project:created',
    PROJECT_UPDATED: 'project:updated',
    PROJECT_ARCHIVED: 'project:archived',
    PROJECT_DELETED: 'project:deleted',
    PROJECTS_IMPORTED: 'project:imported',

    CHUNKING_UNIT_CREATED: 'chunking-unit:created',
    CHUNKING_UNIT_UPDATED: 'chunking-unit:updated',
    CHUNKING_UNIT_DELETED: 'chunking-unit:deleted',

    TIME_ENTRY_CREATED: 'time-entry:created',
    TIME_ENTRY_UPDATED: 'time-entry:updated',
    TIME_ENTRY_DELETED: 'time-entry:deleted',

    TRACKING_STARTED: 'tracking:started',
    TRACKING_STOPPED: 'tracking:stopped',
    TRACKING_RECOVERED: 'tracking:recovered',
    TRACKING_UPDATED: 'state:tracking-updated',
} as const;

export type CoreEventType = (typeof CoreEvents)[keyof typeof CoreEvents];

export interface CoreEventMap {
    'core:initialized': undefined;
    'store:connected': { location: string };
    'store:corrupt-file-skipped': { path: string; message: string };

    'lookup:created': LookupValue;
    'lookup:updated': LookupValue;
    'lookup:deleted': { id: string };

    'project:created': Project;
    'project:updated': Project;
    'project:archived': Project;
    'project:deleted': { id: string };
    'project:imported': ProjectImportResult;

    'chunking-unit:created': ChunkingUnit;
    'chunking-unit:updated': ChunkingUnit;
    'chunking-unit:deleted': { id: string; project_id: string };

    'time-entry:created': TimeEntry;
    'time-entry:updated': TimeEntry;
    'time-entry:deleted': { id: string };

    'tracking:started': TimeEntry;
    'tracking:stopped': TimeEntry;
    'tracking:recovered': { userId: string; entry: TimeEntry; action: 'resume' | 'close' | 'discard' };
    'state:tracking-updated': TrackingState;
}
