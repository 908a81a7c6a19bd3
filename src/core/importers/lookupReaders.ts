import fs from 'fs-extra';
import csv from 'csv-parser';
import { isRecordObject } from './columns';

const NAME_KEYS = ['name', 'value', 'label', 'title'];

/**
 * Names from a JSON array: plain strings, or objects with a name-like field
 */
export function readLookupNamesFromJson(text: string): string[] {
    const parsed: unknown = JSON.parse(text);
    if (!Array.isArray(parsed)) return [];

    const names: string[] = [];
    for (const item of parsed) {
        if (typeof item === 'string') {
            names.push(item.trim());
        } else if (isRecordObject(item)) {
            const key = NAME_KEYS.find(candidate => item[candidate] !== undefined);
            if (key !== undefined) names.push(String(item[key]).trim());
        }
    }
    return names.filter(name => name.length > 0);
}

/**
 * First column of every CSV line. A first line reading "name" is a header.
 */
export async function readLookupNamesFromCsv(filePath: string): Promise<string[]> {
    const names: string[] = [];
    const stream = fs.createReadStream(filePath).pipe(csv({ headers: false }));
    let firstLine = true;

    for await (const raw of stream) {
        if (!isRecordObject(raw)) continue;
        const first = raw['0'];
        if (typeof first !== 'string') continue;
        const name = first.replace(/^\uFEFF/, '').trim();
        const header = firstLine && NAME_KEYS.includes(name.toLowerCase());
        firstLine = false;
        if (name && !header) names.push(name);
    }
    return names;
}
