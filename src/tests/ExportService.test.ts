import fs from 'fs-extra';
import * as path from 'path';
import * as XLSX from 'xlsx';
import { buildReport } from '../core/reports/ReportBuilder';
import { Report } from '../core/models/Report';
import { ValidationError } from '../core/errors/CoreErrors';
import { XLSX_SHEETS } from '../core/exporters';
import { TestContext, makeEntry, makeProject, setupCore, teardown } from './helpers';

function sampleReport(): Report {
    return buildReport(
        {
            projects: [makeProject({ target_view_hours: 50 })],
            lookups: [
                {
                    id: 'work-1',
                    category: 'work_types',
                    name: 'Creation',
                    code: '',
                    active: true,
                    created_at: '2024-01-01T00:00:00.000Z',
                    updated_at: '2024-01-01T00:00:00.000Z',
                },
            ],
            entries: [
                makeEntry({
                    start_time: '2024-03-15T09:00:00.000Z',
                    end_time: '2024-03-15T10:30:00.000Z',
                    notes: 'slides, "draft" version',
                }),
            ],
        },
        { from: new Date('2024-03-10T12:00:00.000Z'), to: new Date('2024-03-20T12:00:00.000Z') },
        { now: new Date('2024-03-21T08:00:00.000Z') }
    );
}

describe('ExportService', () => {
    let context: TestContext;
    let report: Report;

    beforeEach(async () => {
        context = await setupCore();
        report = sampleReport();
    });

    afterEach(async () => {
        await teardown(context);
    });

    describe('csv', () => {
        it('should write a header line and one line per entry', () => {
            const lines = context.core.services.exports.exportReport(report, 'csv').toString('utf8').split('\n');

            expect(lines[0]).toBe('Date,User ID,User,Project ID,Project Code,Project Name,Work Type,Hours,Start,End,Manual,Notes');
            expect(lines[1]).toBe(
                `${report.rows[0].date},user-1,,project-1,SB-100,Safety Basics,Creation,1.5,` +
                '2024-03-15T09:00:00.000Z,2024-03-15T10:30:00.000Z,No,"slides, ""draft"" version"'
            );
        });
    });

    describe('xlsx', () => {
        it('should write one sheet per table', () => {
            const data = context.core.services.exports.exportReport(report, 'xlsx');
            const book = XLSX.read(data, { type: 'buffer' });

            expect(book.SheetNames).toEqual([...XLSX_SHEETS]);
            expect(XLSX.utils.sheet_to_json(book.Sheets['By Project'], { header: 1 })).toEqual([
                ['Project ID', 'Project Code', 'Project Name', 'Target View Hours', 'Hours', 'Entries', 'Ratio'],
                ['project-1', 'SB-100', 'Safety Basics', 50, 1.5, 1, 0.03],
            ]);
            expect(XLSX.utils.sheet_to_json(book.Sheets['Summary'], { header: 1 })).toContainEqual(['Total Hours', 1.5]);
        });
    });

    describe('json', () => {
        it('should write the report with its subtotals', () => {
            const text = context.core.services.exports.exportReport(report, 'json').toString('utf8');
            const document: Record<string, unknown> = JSON.parse(text);

            expect(text.endsWith('}\n')).toBe(true);
            expect(Object.keys(document)).toEqual([
                'schemaVersion',
                'generated_at',
                'filter',
                'summary',
                'by_project',
                'by_work_type',
                'by_user',
                'by_day',
                'entries',
            ]);
            expect(document.schemaVersion).toBe(1);
            expect(document.generated_at).toBe('2024-03-21T08:00:00.000Z');
            expect(document.entries).toEqual(report.rows);
        });
    });

    describe('exportToFile', () => {
        it('should write the file and leave no temporary file behind', async () => {
            const target = path.join(context.dataFolder, 'exports', 'march.json');

            await context.core.services.exports.exportToFile(report, 'json', target);

            expect(await fs.readFile(target, 'utf8')).toBe(
                context.core.services.exports.exportReport(report, 'json').toString('utf8')
            );
            expect(await fs.readdir(path.dirname(target))).toEqual(['march.json']);
        });
    });

    it('should reject an unknown format', () => {
        expect(() => context.core.services.exports.getAdapter('pdf')).toThrow(ValidationError);
        expect(context.core.services.exports.getAdapter('xlsx').extension).toBe('xlsx');
    });
});
