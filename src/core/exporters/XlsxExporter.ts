import * as XLSX from 'xlsx';
import { ExportAdapter } from './ExportAdapter';
import { Report } from '../models/Report';
import { Cell, dayTable, entryTable, projectTable, summaryTable, workTypeTable } from './tables';

export const XLSX_SHEETS = ['Entries', 'By Project', 'By Work Type', 'By Day', 'Summary'] as const;

/**
 * Workbook with the entry table and one sheet per subtotal list
 */
export class XlsxExporter implements ExportAdapter {
    readonly format = 'xlsx';
    readonly extension = 'xlsx';
    readonly mediaType = 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet';

    serialize(report: Report): Buffer {
        const tables: Record<(typeof XLSX_SHEETS)[number], Cell[][]> = {
            'Entries': entryTable(report),
            'By Project': projectTable(report),
            'By Work Type': workTypeTable(report),
            'By Day': dayTable(report),
            'Summary': summaryTable(report),
        };

        const book = XLSX.utils.book_new();
        for (const name of XLSX_SHEETS) {
            XLSX.utils.book_append_sheet(book, XLSX.utils.aoa_to_sheet(tables[name]), name);
        }
        return Buffer.from(XLSX.write(book, { bookType: 'xlsx', type: 'buffer' }));
    }
}
