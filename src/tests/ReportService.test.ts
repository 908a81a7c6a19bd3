import fs from 'fs-extra';
import * as path from 'path';
import { CorruptRecordFileError, OperationCancelledError, ValidationError } from '../core/errors/CoreErrors';
import { CoreEvents } from '../core/events/CoreEvents';
import { Project } from '../core/models/Project';
import { TimeEntryService } from '../core/services/TimeEntryService';
import { TestContext, localTime, setupCore, teardown } from './helpers';

describe('ReportService', () => {
    let context: TestContext;
    let project: Project;
    const march = { from: new Date(2024, 2, 1), to: new Date(2024, 2, 31) };

    beforeEach(async () => {
        context = await setupCore();
        project = await context.core.services.projects.create({ name: 'Safety Basics', target_view_hours: 50 });
        const timer = context.core.services.timer;
        await timer.manualEntry(context.alice.id, project.id, context.creation.id, localTime(2024, 3, 11, 9), localTime(2024, 3, 11, 12));
        await timer.manualEntry(context.alice.id, project.id, context.review.id, localTime(2024, 3, 12, 9), localTime(2024, 3, 12, 10, 30));
        await timer.manualEntry(context.bob.id, project.id, context.creation.id, localTime(2024, 2, 20, 9), localTime(2024, 2, 20, 10));
    });

    afterEach(async () => {
        await teardown(context);
    });

    async function corruptBobsMarch(): Promise<string> {
        const partition = TimeEntryService.partitionFor(context.bob.id, '2024-03-15T12:00:00.000Z');
        const file = path.join(context.dataFolder, 'time', `${partition}.json`);
        await fs.writeFile(file, '{ not json');
        return file;
    }

    describe('generate', () => {
        it('should aggregate the stored entries of the range', async () => {
            const report = await context.core.services.reports.generate(march);

            expect(report.generated_at).toBe(context.clock.now().toISOString());
            expect(report.summary.total_hours).toBe(4.5);
            expect(report.summary.entry_count).toBe(2);
            expect(report.by_project).toHaveLength(1);
            expect(report.by_project[0]).toMatchObject({ project_name: 'Safety Basics', hours: 4.5, ratio: 0.09 });
            expect(report.by_user.map(subtotal => subtotal.user_name)).toEqual(['Alice Example']);
            expect(report.by_work_type.map(subtotal => subtotal.work_type_name)).toEqual(['Creation', 'Review']);
        });

        it('should reject a range that ends before it starts', async () => {
            await expect(
                context.core.services.reports.generate({ from: new Date(2024, 2, 2), to: new Date(2024, 2, 1) })
            ).rejects.toThrow(ValidationError);
        });

        it('should reject invalid dates', async () => {
            await expect(
                context.core.services.reports.generate({ from: new Date('not a date'), to: new Date(2024, 2, 1) })
            ).rejects.toThrow(ValidationError);
        });

        it('should stop on an aborted signal', async () => {
            const controller = new AbortController();
            controller.abort();

            await expect(
                context.core.services.reports.generate(march, { signal: controller.signal })
            ).rejects.toThrow(OperationCancelledError);
        });

        it('should fail on a corrupt month file by default', async () => {
            await corruptBobsMarch();

            await expect(context.core.services.reports.generate(march)).rejects.toThrow(CorruptRecordFileError);
        });

        it('should report and skip corrupt files on request', async () => {
            const file = await corruptBobsMarch();
            const onCorrupt = jest.fn();
            const skipped = jest.fn();
            context.core.events.on(CoreEvents.STORE_CORRUPT_FILE_SKIPPED, skipped);

            const report = await context.core.services.reports.generate(march, { skipCorrupt: true, onCorrupt });

            expect(report.summary.total_hours).toBe(4.5);
            expect(onCorrupt).toHaveBeenCalledTimes(1);
            expect(onCorrupt.mock.calls[0][0]).toBeInstanceOf(CorruptRecordFileError);
            expect(onCorrupt.mock.calls[0][0].path).toBe(file);
            expect(skipped).toHaveBeenCalledWith(expect.objectContaining({ path: file }));
        });
    });

    describe('resolvePeriod', () => {
        it('should resolve presets against the core clock', () => {
            const reports = context.core.services.reports;

            expect(reports.resolvePeriod('today')).toEqual({
                start: new Date(2024, 2, 15),
                end: new Date(2024, 2, 15, 23, 59, 59, 999),
            });
            expect(reports.resolvePeriod('this-month').start).toEqual(new Date(2024, 2, 1));
            expect(reports.resolvePeriod('last-week')).toEqual({
                start: new Date(2024, 2, 4),
                end: new Date(2024, 2, 10, 23, 59, 59, 999),
            });
            expect(reports.resolvePeriod('last-month')).toEqual({
                start: new Date(2024, 1, 1),
                end: new Date(2024, 1, 29, 23, 59, 59, 999),
            });
        });

        it('should use whole days for a custom range', () => {
            const range = context.core.services.reports.resolvePeriod('custom', {
                start: new Date(2024, 2, 3, 14),
                end: new Date(2024, 2, 5, 8),
            });

            expect(range).toEqual({ start: new Date(2024, 2, 3), end: new Date(2024, 2, 5, 23, 59, 59, 999) });
        });
    });
});
