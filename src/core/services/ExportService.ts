import { BaseService } from './BaseService';
import { CoreAPI } from '../api/CoreAPI';
import { Report } from '../models/Report';
import { IOFailureError, ValidationError } from '../errors/CoreErrors';
import { EXPORT_FORMATS, ExportAdapter, ExportFormat, createExportAdapters } from '../exporters';
import { IORunner, writeFileAtomic } from '../utils/atomicWrite';

const wrapIOErrors: IORunner = async (operation, target, work) => {
    try {
        return await work();
    } catch (error) {
        throw new IOFailureError(target, operation, error);
    }
};

function isExportFormat(value: string): value is ExportFormat {
    return EXPORT_FORMATS.some(format => format === value);
}

/**
 * Export Service
 */
export class ExportService extends BaseService {
    private adapters: Record<ExportFormat, ExportAdapter>;

    constructor(core: CoreAPI) {
        super(core, 'ExportService');
        this.adapters = createExportAdapters();
    }

    /**
     * Adapter for a format name
     */
    getAdapter(format: string): ExportAdapter {
        if (!isExportFormat(format)) {
            throw new ValidationError(`Unknown export format "${format}"`, [
                { path: 'format', message: `expected one of ${EXPORT_FORMATS.join(', ')}` },
            ]);
        }
        return this.adapters[format];
    }

    /**
     * Serialise a report
     */
    exportReport(report: Report, format: ExportFormat): Buffer {
        return this.getAdapter(format).serialize(report);
    }

    /**
     * Serialise a report and write it atomically
     */
    async exportToFile(report: Report, format: ExportFormat, filePath: string): Promise<void> {
        const data = this.exportReport(report, format);
        await writeFileAtomic(filePath, data, {
            run: wrapIOErrors,
            onCleanupFailure: (temp, error) => this.logger.error(`Could not remove ${temp}`, error),
        });
        this.logger.info(`Exported ${report.summary.entry_count} entries as ${format} to ${filePath}`);
    }
}
