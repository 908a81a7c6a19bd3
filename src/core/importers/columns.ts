import { ProjectImportRow } from '../models/Project';

type ImportField = Exclude<keyof ProjectImportRow, 'row_number'>;

/** Accepted header spellings, after normalizeHeader */
const HEADER_ALIASES: Record<string, ImportField> = {
    'name': 'name',
    'project name': 'name',
    'code': 'code',
    'project id': 'code',
    'project code': 'code',
    'target hours': 'target_view_hours',
    'target view hours': 'target_view_hours',
    'view hours': 'target_view_hours',
    'campus': 'campus',
    'offer': 'offer',
    'sub offer': 'sub_offer',
    'effort type': 'effort_type',
    'status': 'status',
    'tags': 'tags',
};

/**
 * Lower case, BOM dropped, runs of spaces / underscores / dashes made one space
 */
export function normalizeHeader(header: string): string {
    return header.replace(/^\uFEFF/, '').trim().toLowerCase().replace(/[\s_-]+/g, ' ');
}

export function isRecordObject(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function cellText(value: unknown): string {
    if (value === null || value === undefined) return '';
    if (value instanceof Date) return value.toISOString();
    return String(value).trim();
}

/**
 * Map one header-keyed row onto ProjectImportRow. Unknown columns are
 * ignored; null when every known column is blank.
 */
export function toProjectImportRow(raw: Record<string, unknown>, rowNumber: number): ProjectImportRow | null {
    const row: ProjectImportRow = { row_number: rowNumber };
    let filled = false;

    for (const [header, value] of Object.entries(raw)) {
        const field = HEADER_ALIASES[normalizeHeader(header)];
        if (field === undefined) continue;

        if (field === 'target_view_hours' && typeof value === 'number') {
            row.target_view_hours = value;
            filled = true;
            continue;
        }

        const text = cellText(value);
        if (text) filled = true;
        row[field] = text;
    }

    return filled ? row : null;
}
