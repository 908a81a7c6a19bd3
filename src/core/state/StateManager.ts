import { EventBus } from '../events/EventBus';
import { CoreEventMap, CoreEvents } from '../events/CoreEvents';

/**
 * Tracking state for one user
 */
export interface TrackingState {
    userId: string;
    isTracking: boolean;
    currentEntryId: string | null;
    currentProjectId: string | null;
    currentWorkTypeId: string | null;
    startTime: string | null;
}

/**
 * State Manager
 * In-memory snapshot of each user's timer for observers. The store stays the
 * source of truth; the timer engine refreshes this after every transition.
 */
export class StateManager {
    private tracking: Map<string, TrackingState>;
    private events: EventBus<CoreEventMap>;

    constructor(events: EventBus<CoreEventMap>) {
        this.events = events;
        this.tracking = new Map();
    }

    private getInitialState(userId: string): TrackingState {
        return {
            userId,
            isTracking: false,
            currentEntryId: null,
            currentProjectId: null,
            currentWorkTypeId: null,
            startTime: null,
        };
    }

    /**
     * Get tracking state for a user
     */
    getTrackingState(userId: string): TrackingState {
        const state = this.tracking.get(userId);
        return state ? { ...state } : this.getInitialState(userId);
    }

    /**
     * Update tracking state
     */
    updateTrackingState(userId: string, update: Partial<Omit<TrackingState, 'userId'>>): void {
        const next: TrackingState = {
            ...this.getTrackingState(userId),
            ...update,
            userId,
        };
        this.tracking.set(userId, next);
        this.events.emit(CoreEvents.TRACKING_UPDATED, { ...next });
    }

    isTracking(userId: string): boolean {
        return this.tracking.get(userId)?.isTracking ?? false;
    }

    /**
     * Reset state to initial
     */
    reset(): void {
        this.tracking.clear();
    }
}
