import { BaseService } from './BaseService';
import { CoreAPI } from '../api/CoreAPI';
import { TimeEntry } from '../models/TimeEntry';
import { CoreEvents } from '../events/CoreEvents';
import { InvalidDurationError, NoActiveTimerError } from '../errors/CoreErrors';
import { TimeUtils } from '../utils/TimeUtils';

export type TimerState =
    | { status: 'idle'; userId: string }
    | {
        status: 'running';
        userId: string;
        entry: TimeEntry;
        projectId: string;
        workTypeId: string;
        startedAt: string;
    };

/**
 * Timer Service
 * Idle / Running per user, derived from the user's open time entry on every
 * call. The clock is read only when a transition needs a timestamp.
 */
export class TimerService extends BaseService {
    /** Open entries started or adopted by this instance */
    private sessions: Set<string> = new Set();

    constructor(core: CoreAPI) {
        super(core, 'TimerService');
    }

    /**
     * Get current timer state of a user
     */
    async getState(userId: string): Promise<TimerState> {
        const open = await this.core.services.timeEntries.findOpen(userId);
        this.syncState(userId, open);
        if (!open) {
            return { status: 'idle', userId };
        }
        return {
            status: 'running',
            userId,
            entry: open,
            projectId: open.project_id,
            workTypeId: open.work_type_id,
            startedAt: open.start_time,
        };
    }

    /**
     * Start a timer
     */
    async clockIn(userId: string, projectId: string, workTypeId: string, notes: string = ''): Promise<TimeEntry> {
        const entry = await this.core.services.timeEntries.create({
            project_id: projectId,
            user_id: userId,
            work_type_id: workTypeId,
            start_time: this.timestamp(),
            end_time: null,
            notes,
        });

        this.sessions.add(entry.id);
        this.syncState(userId, entry);

        this.logger.info(`${userId} clocked in on project ${projectId}`);
        this.events.emit(CoreEvents.TRACKING_STARTED, entry);
        return entry;
    }

    /**
     * Stop the running timer at the current time
     */
    async clockOut(userId: string, notes?: string): Promise<TimeEntry> {
        const open = await this.core.services.timeEntries.findOpen(userId);
        if (!open) {
            throw new NoActiveTimerError(userId);
        }

        const endTime = this.timestamp();
        if (TimeUtils.durationMs(open.start_time, endTime) <= 0) {
            throw new InvalidDurationError(open.start_time, endTime);
        }

        const closed = await this.core.services.timeEntries.update(open.id, {
            end_time: endTime,
            notes: notes ?? open.notes,
        }, { userId });

        this.sessions.delete(open.id);
        this.syncState(userId, null);

        this.logger.info(`${userId} clocked out after ${TimeUtils.formatDuration(TimeUtils.durationMs(open.start_time, endTime))}`);
        this.events.emit(CoreEvents.TRACKING_STOPPED, closed);
        return closed;
    }

    /**
     * Record a closed entry directly; the timer is not involved
     */
    async manualEntry(
        userId: string,
        projectId: string,
        workTypeId: string,
        start: string | Date,
        end: string | Date,
        notes: string = ''
    ): Promise<TimeEntry> {
        return this.core.services.timeEntries.create({
            project_id: projectId,
            user_id: userId,
            work_type_id: workTypeId,
            start_time: TimeUtils.toTimestamp(start, 'start_time'),
            end_time: TimeUtils.toTimestamp(end, 'end_time'),
            notes,
            manual: true,
        });
    }

    /**
     * An open entry this instance did not start: left by a crash or by
     * another session
     */
    async getRecoverableTimer(userId: string): Promise<TimeEntry | null> {
        const open = await this.core.services.timeEntries.findOpen(userId);
        if (!open || this.sessions.has(open.id)) {
            return null;
        }
        return open;
    }

    /**
     * Keep the recovered timer running
     */
    async resumeTimer(userId: string): Promise<TimeEntry> {
        const entry = await this.requireRecoverable(userId);

        this.sessions.add(entry.id);
        this.syncState(userId, entry);

        this.logger.info(`Resumed timer ${entry.id} for ${userId}`);
        this.events.emit(CoreEvents.TRACKING_RECOVERED, { userId, entry, action: 'resume' });
        return entry;
    }

    /**
     * Close the recovered timer at a time the user picks
     */
    async closeTimer(userId: string, end: string | Date, notes?: string): Promise<TimeEntry> {
        const entry = await this.requireRecoverable(userId);
        const endTime = TimeUtils.toTimestamp(end, 'end_time');
        if (TimeUtils.durationMs(entry.start_time, endTime) <= 0) {
            throw new InvalidDurationError(entry.start_time, endTime);
        }

        const closed = await this.core.services.timeEntries.update(entry.id, {
            end_time: endTime,
            notes: notes ?? entry.notes,
        }, { userId });
        this.syncState(userId, null);

        this.logger.info(`Closed recovered timer ${entry.id} for ${userId} at ${endTime}`);
        this.events.emit(CoreEvents.TRACKING_RECOVERED, { userId, entry: closed, action: 'close' });
        return closed;
    }

    /**
     * Throw the recovered timer away
     */
    async discardTimer(userId: string): Promise<TimeEntry> {
        const entry = await this.requireRecoverable(userId);
        await this.core.services.timeEntries.delete(entry.id, { userId });
        this.syncState(userId, null);

        this.logger.info(`Discarded recovered timer ${entry.id} for ${userId}`);
        this.events.emit(CoreEvents.TRACKING_RECOVERED, { userId, entry, action: 'discard' });
        return entry;
    }

    /**
     * Milliseconds on the running timer, 0 when idle
     */
    async getElapsedMs(userId: string): Promise<number> {
        const state = await this.getState(userId);
        if (state.status === 'idle') return 0;
        return Math.max(0, TimeUtils.durationMs(state.startedAt, this.timestamp()));
    }

    private async requireRecoverable(userId: string): Promise<TimeEntry> {
        const entry = await this.getRecoverableTimer(userId);
        if (!entry) {
            throw new NoActiveTimerError(userId);
        }
        return entry;
    }

    /**
     * Mirror the store into the observer snapshot when it differs
     */
    private syncState(userId: string, open: TimeEntry | null): void {
        const current = this.state.getTrackingState(userId);
        if ((open?.id ?? null) === current.currentEntryId && current.isTracking === (open !== null)) {
            return;
        }

        this.state.updateTrackingState(userId, {
            isTracking: open !== null,
            currentEntryId: open?.id ?? null,
            currentProjectId: open?.project_id ?? null,
            currentWorkTypeId: open?.work_type_id ?? null,
            startTime: open?.start_time ?? null,
        });
    }
}
