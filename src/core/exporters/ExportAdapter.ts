import { Report } from '../models/Report';

export const EXPORT_FORMATS = ['csv', 'xlsx', 'json'] as const;

export type ExportFormat = (typeof EXPORT_FORMATS)[number];

/**
 * Serialises a report to one file format
 */
export interface ExportAdapter {
    readonly format: ExportFormat;
    /** Without the dot */
    readonly extension: string;
    readonly mediaType: string;
    serialize(report: Report): Buffer;
}
