import * as XLSX from 'xlsx';
import { ExportAdapter } from './ExportAdapter';
import { Report } from '../models/Report';
import { entryTable } from './tables';

/**
 * One header line, then one line per entry. Fields holding a comma, quote
 * or line break are quoted.
 */
export class CsvExporter implements ExportAdapter {
    readonly format = 'csv';
    readonly extension = 'csv';
    readonly mediaType = 'text/csv';

    serialize(report: Report): Buffer {
        const sheet = XLSX.utils.aoa_to_sheet(entryTable(report));
        return Buffer.from(XLSX.utils.sheet_to_csv(sheet), 'utf8');
    }
}
