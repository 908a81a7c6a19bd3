import fs from 'fs-extra';
import * as path from 'path';
import {
    AlreadyRunningError,
    ConflictError,
    InvalidDurationError,
    NoActiveTimerError,
} from '../core/errors/CoreErrors';
import { CoreAPI } from '../core/api/CoreAPI';
import { CoreEvents } from '../core/events/CoreEvents';
import { Project } from '../core/models/Project';
import type { FileRecordStore } from '../core/storage/FileRecordStore';
import type { CollectionKind, RecordOf } from '../core/storage/collections';
import { HOUR, MINUTE, TestContext, openTestCore, setupCore, teardown } from './helpers';

/**
 * A FileRecordStore class from a fresh module registry, so its write locks
 * are not shared with the store of the main core (as in another process)
 */
async function loadSeparateStoreClass(): Promise<typeof FileRecordStore> {
    const loaded: { store?: typeof FileRecordStore } = {};
    await jest.isolateModulesAsync(async () => {
        loaded.store = (await import('../core/storage/FileRecordStore')).FileRecordStore;
    });
    if (!loaded.store) {
        throw new Error('FileRecordStore did not load');
    }
    return loaded.store;
}

describe('TimerService', () => {
    let context: TestContext;
    let project: Project;

    beforeEach(async () => {
        context = await setupCore();
        project = await context.core.services.projects.create({ name: 'Safety Basics', target_view_hours: 20 });
    });

    afterEach(async () => {
        await teardown(context);
    });

    describe('clockIn / clockOut', () => {
        it('should run from Idle to Running and back', async () => {
            const timer = context.core.services.timer;
            const startedAt = context.clock.now().toISOString();

            expect(await timer.getState(context.alice.id)).toEqual({ status: 'idle', userId: context.alice.id });

            const entry = await timer.clockIn(context.alice.id, project.id, context.creation.id, 'storyboard');
            expect(entry.start_time).toBe(startedAt);
            expect(entry.end_time).toBeNull();
            expect(await timer.getState(context.alice.id)).toMatchObject({
                status: 'running',
                projectId: project.id,
                workTypeId: context.creation.id,
                startedAt,
            });

            context.clock.advance(30 * MINUTE);
            expect(await timer.getElapsedMs(context.alice.id)).toBe(30 * MINUTE);

            const closed = await timer.clockOut(context.alice.id);
            expect(closed.end_time).toBe(context.clock.now().toISOString());
            expect(closed.notes).toBe('storyboard');
            expect((await timer.getState(context.alice.id)).status).toBe('idle');
            expect(await timer.getElapsedMs(context.alice.id)).toBe(0);
        });

        it('should clock out while another user has an unreadable month file', async () => {
            const entry = await context.core.services.timer.clockIn(context.alice.id, project.id, context.creation.id);
            await fs.writeFile(path.join(context.dataFolder, 'time', 'someoneelse_2023-01.json'), '{ not json');
            context.clock.advance(HOUR);

            const closed = await context.core.services.timer.clockOut(context.alice.id);

            expect(closed.id).toBe(entry.id);
            expect(closed.end_time).toBe(context.clock.now().toISOString());
            expect(await context.core.services.timeEntries.findOpen(context.alice.id)).toBeNull();
        });

        it('should refuse a second timer for the same user', async () => {
            const first = await context.core.services.timer.clockIn(context.alice.id, project.id, context.creation.id);
            context.clock.advance(MINUTE);

            await expect(
                context.core.services.timer.clockIn(context.alice.id, project.id, context.review.id)
            ).rejects.toMatchObject({ code: 'ALREADY_RUNNING', entryId: first.id });
        });

        it('should refuse to clock out while idle', async () => {
            await expect(context.core.services.timer.clockOut(context.alice.id)).rejects.toThrow(NoActiveTimerError);
        });

        it('should keep the entry open when the clock moved backwards', async () => {
            const entry = await context.core.services.timer.clockIn(context.alice.id, project.id, context.creation.id);
            context.clock.advance(-5 * MINUTE);

            await expect(context.core.services.timer.clockOut(context.alice.id)).rejects.toThrow(InvalidDurationError);
            expect(await context.core.services.timeEntries.findOpen(context.alice.id)).toEqual(entry);
        });

        it('should refuse a zero-length entry', async () => {
            await context.core.services.timer.clockIn(context.alice.id, project.id, context.creation.id);
            await expect(context.core.services.timer.clockOut(context.alice.id)).rejects.toThrow(InvalidDurationError);
        });

        it('should refuse an archived project', async () => {
            await context.core.services.projects.archive(project.id);
            await expect(
                context.core.services.timer.clockIn(context.alice.id, project.id, context.creation.id)
            ).rejects.toThrow(ConflictError);
            expect(await context.core.services.timeEntries.list()).toEqual([]);
        });

        it('should mirror transitions into the state manager', async () => {
            const handler = jest.fn();
            context.core.events.on(CoreEvents.TRACKING_UPDATED, handler);

            const entry = await context.core.services.timer.clockIn(context.alice.id, project.id, context.creation.id);

            expect(context.core.state.getTrackingState(context.alice.id)).toEqual({
                userId: context.alice.id,
                isTracking: true,
                currentEntryId: entry.id,
                currentProjectId: project.id,
                currentWorkTypeId: context.creation.id,
                startTime: entry.start_time,
            });
            expect(handler).toHaveBeenCalledTimes(1);

            context.clock.advance(MINUTE);
            await context.core.services.timer.clockOut(context.alice.id);
            expect(context.core.state.isTracking(context.alice.id)).toBe(false);
            expect(handler).toHaveBeenCalledTimes(2);
        });
    });

    describe('two sessions on one folder', () => {
        let second: CoreAPI;

        beforeEach(async () => {
            second = await openTestCore(context.dataFolder, context.clock);
        });

        afterEach(async () => {
            await second.shutdown();
        });

        it('should let exactly one of two simultaneous clock-ins in one process win', async () => {
            const results = await Promise.allSettled([
                context.core.services.timer.clockIn(context.alice.id, project.id, context.creation.id),
                second.services.timer.clockIn(context.alice.id, project.id, context.review.id),
            ]);

            const fulfilled = results.filter(result => result.status === 'fulfilled');
            const rejected = results.filter(
                (result): result is PromiseRejectedResult => result.status === 'rejected'
            );
            expect(fulfilled).toHaveLength(1);
            expect(rejected).toHaveLength(1);
            expect(rejected[0].reason).toBeInstanceOf(AlreadyRunningError);
            expect(await context.core.services.timeEntries.list({ userId: context.alice.id, open: true })).toHaveLength(1);
        });

        it('should withdraw a clock-in that was written after another session started a timer', async () => {
            const SeparateStore = await loadSeparateStoreClass();
            let signalReached: () => void = () => undefined;
            let releaseWrite: () => void = () => undefined;
            const reached = new Promise<void>(resolve => {
                signalReached = resolve;
            });
            const held = new Promise<void>(resolve => {
                releaseWrite = resolve;
            });

            class HeldStore extends SeparateStore {
                private holding = true;

                async appendOrReplace<K extends CollectionKind>(kind: K, record: RecordOf<K>, partition?: string): Promise<void> {
                    if (this.holding) {
                        this.holding = false;
                        signalReached();
                        await held;
                    }
                    await super.appendOrReplace(kind, record, partition);
                }
            }

            const other = new CoreAPI({ clock: context.clock, logging: { silent: true } });
            await other.initialize(new HeldStore({ root: context.dataFolder, clock: context.clock, retryDelayMs: 0 }));
            try {
                // checked for a running timer, write not yet made
                const late = other.services.timer.clockIn(context.alice.id, project.id, context.review.id);
                await reached;

                const first = await context.core.services.timer.clockIn(context.alice.id, project.id, context.creation.id);
                releaseWrite();

                await expect(late).rejects.toMatchObject({ code: 'ALREADY_RUNNING', entryId: first.id });
                expect(await context.core.services.timeEntries.list({ userId: context.alice.id, open: true })).toEqual([first]);
                expect(await other.services.timer.getState(context.alice.id)).toMatchObject({ status: 'running', entry: first });
            } finally {
                await other.shutdown();
            }
        });

        it('should offer an open entry left by another session for recovery', async () => {
            const entry = await context.core.services.timer.clockIn(context.alice.id, project.id, context.creation.id);

            expect(await context.core.services.timer.getRecoverableTimer(context.alice.id)).toBeNull();
            expect(await second.services.timer.getRecoverableTimer(context.alice.id)).toEqual(entry);
        });

        it('should resume a recovered timer', async () => {
            const entry = await context.core.services.timer.clockIn(context.alice.id, project.id, context.creation.id);
            const recovered = jest.fn();
            second.events.on(CoreEvents.TRACKING_RECOVERED, recovered);

            expect(await second.services.timer.resumeTimer(context.alice.id)).toEqual(entry);

            expect(await second.services.timer.getRecoverableTimer(context.alice.id)).toBeNull();
            expect(recovered).toHaveBeenCalledWith({ userId: context.alice.id, entry, action: 'resume' });
            context.clock.advance(10 * MINUTE);
            expect((await second.services.timer.clockOut(context.alice.id)).end_time).toBe(context.clock.now().toISOString());
        });

        it('should close a recovered timer at a chosen time', async () => {
            const entry = await context.core.services.timer.clockIn(context.alice.id, project.id, context.creation.id);
            const end = new Date(Date.parse(entry.start_time) + 45 * MINUTE);

            await expect(
                second.services.timer.closeTimer(context.alice.id, entry.start_time)
            ).rejects.toThrow(InvalidDurationError);
            const closed = await second.services.timer.closeTimer(context.alice.id, end, 'closed after restart');

            expect(closed.end_time).toBe(end.toISOString());
            expect(closed.notes).toBe('closed after restart');
            expect(await second.services.timeEntries.findOpen(context.alice.id)).toBeNull();
        });

        it('should discard a recovered timer', async () => {
            const entry = await context.core.services.timer.clockIn(context.alice.id, project.id, context.creation.id);

            await second.services.timer.discardTimer(context.alice.id);

            await expect(context.core.services.timeEntries.getById(entry.id)).rejects.toThrow('Time entry not found');
        });

        it('should refuse recovery when nothing is left open', async () => {
            await expect(second.services.timer.resumeTimer(context.alice.id)).rejects.toThrow(NoActiveTimerError);
        });
    });

    describe('manualEntry', () => {
        it('should record a closed manual entry without touching the timer', async () => {
            const entry = await context.core.services.timer.manualEntry(
                context.alice.id,
                project.id,
                context.review.id,
                new Date('2024-03-12T13:00:00.000Z'),
                '2024-03-12T14:15:00.000Z',
                'review notes'
            );

            expect(entry).toMatchObject({
                manual: true,
                start_time: '2024-03-12T13:00:00.000Z',
                end_time: '2024-03-12T14:15:00.000Z',
                notes: 'review notes',
            });
            expect((await context.core.services.timer.getState(context.alice.id)).status).toBe('idle');
        });

        it('should refuse an end before the start', async () => {
            await expect(
                context.core.services.timer.manualEntry(
                    context.alice.id, project.id, context.review.id, '2024-03-12T14:00:00.000Z', '2024-03-12T13:00:00.000Z'
                )
            ).rejects.toThrow(InvalidDurationError);
        });
    });
});
