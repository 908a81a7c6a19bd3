import fs from 'fs-extra';
import csv from 'csv-parser';
import * as XLSX from 'xlsx';
import { ProjectImportRow } from '../models/Project';
import { ValidationError } from '../errors/CoreErrors';
import { isRecordObject, toProjectImportRow } from './columns';

/**
 * Read project rows from a CSV file with a header line
 */
export async function readProjectRowsFromCsv(filePath: string): Promise<ProjectImportRow[]> {
    const rows: ProjectImportRow[] = [];
    const stream = fs.createReadStream(filePath).pipe(csv({ strict: false }));

    let rowNumber = 0;
    for await (const raw of stream) {
        rowNumber++;
        if (!isRecordObject(raw)) continue;
        const row = toProjectImportRow(raw, rowNumber);
        if (row) rows.push(row);
    }
    return rows;
}

/**
 * Read project rows from the first sheet of a workbook (xlsx, xls, ods)
 */
export function readProjectRowsFromWorkbook(data: Buffer): ProjectImportRow[] {
    const book = XLSX.read(data, { type: 'buffer' });
    const sheetName = book.SheetNames[0];
    if (sheetName === undefined) {
        throw new ValidationError('Workbook has no sheets');
    }

    const records = XLSX.utils.sheet_to_json<Record<string, unknown>>(book.Sheets[sheetName], {
        defval: '',
        raw: true,
        blankrows: true,
    });

    const rows: ProjectImportRow[] = [];
    records.forEach((raw, index) => {
        const row = toProjectImportRow(raw, index + 1);
        if (row) rows.push(row);
    });
    return rows;
}
