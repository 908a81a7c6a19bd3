import { endOfDay, isValid, startOfDay } from 'date-fns';
import { BaseService } from './BaseService';
import { CoreAPI } from '../api/CoreAPI';
import { Report, ReportFilter } from '../models/Report';
import { CoreEvents } from '../events/CoreEvents';
import { CorruptRecordFileError, OperationCancelledError, ValidationError } from '../errors/CoreErrors';
import { buildReport } from '../reports/ReportBuilder';
import { DateFilterPreset, DateFilters, DateRange } from '../utils/DateFilters';

export interface GenerateReportOptions {
    signal?: AbortSignal;
    /** Leave out unreadable files instead of failing */
    skipCorrupt?: boolean;
    onCorrupt?: (error: CorruptRecordFileError) => void;
}

/**
 * Report Service
 * Loads one snapshot of the store and hands it to buildReport
 */
export class ReportService extends BaseService {
    constructor(core: CoreAPI) {
        super(core, 'ReportService');
    }

    /**
     * Build a report for a filter. Only the month files the range touches are read.
     */
    async generate(filter: ReportFilter, options: GenerateReportOptions = {}): Promise<Report> {
        if (!isValid(filter.from) || !isValid(filter.to)) {
            throw new ValidationError('Invalid report range', [{ path: 'from', message: 'from and to must be valid dates' }]);
        }
        if (startOfDay(filter.from) > startOfDay(filter.to)) {
            throw new ValidationError('Invalid report range', [{ path: 'to', message: 'to is before from' }]);
        }
        this.throwIfAborted(options.signal, 'Report generation');

        const loadOptions = {
            skipCorrupt: options.skipCorrupt,
            onCorrupt: (error: CorruptRecordFileError) => {
                this.events.emit(CoreEvents.STORE_CORRUPT_FILE_SKIPPED, { path: error.path, message: error.message });
                options.onCorrupt?.(error);
            },
        };

        const entries = await this.core.services.timeEntries.list(
            { from: startOfDay(filter.from), to: endOfDay(filter.to) },
            loadOptions
        );
        const projects = await this.store.load('projects', loadOptions);
        const lookups = await this.store.load('lookups');
        this.throwIfAborted(options.signal, 'Report generation');

        try {
            const report = buildReport({ entries, projects, lookups }, filter, {
                signal: options.signal,
                now: this.clock.now(),
            });
            this.logger.debug(`Report ${report.filter.from}..${report.filter.to}: ${report.summary.entry_count} entries`);
            return report;
        } catch (error) {
            if (error instanceof OperationCancelledError) {
                this.logger.info('Report generation cancelled');
            }
            throw error;
        }
    }

    /**
     * Date range of a period preset, relative to the core clock
     */
    resolvePeriod(preset: DateFilterPreset, custom?: DateRange): DateRange {
        return DateFilters.getRangeByPreset(preset, this.clock.now(), custom);
    }
}
