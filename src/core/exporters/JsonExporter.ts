import { ExportAdapter } from './ExportAdapter';
import { Report } from '../models/Report';

/** Version of the exported document layout */
export const EXPORT_SCHEMA_VERSION = 1;

export class JsonExporter implements ExportAdapter {
    readonly format = 'json';
    readonly extension = 'json';
    readonly mediaType = 'application/json';

    serialize(report: Report): Buffer {
        const document = {
            schemaVersion: EXPORT_SCHEMA_VERSION,
            generated_at: report.generated_at,
            filter: report.filter,
            summary: report.summary,
            by_project: report.by_project,
            by_work_type: report.by_work_type,
            by_user: report.by_user,
            by_day: report.by_day,
            entries: report.rows,
        };
        return Buffer.from(JSON.stringify(document, null, 2) + '\n', 'utf8');
    }
}
