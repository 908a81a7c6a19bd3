import { buildReport, ReportSource } from '../core/reports/ReportBuilder';
import { LookupValue } from '../core/models/LookupValue';
import { ReportFilter } from '../core/models/Report';
import { OperationCancelledError } from '../core/errors/CoreErrors';
import { HOUR, localTime, makeEntry, makeProject } from './helpers';

function lookup(id: string, category: LookupValue['category'], name: string): LookupValue {
    return {
        id,
        category,
        name,
        code: '',
        active: true,
        created_at: '2024-01-01T00:00:00.000Z',
        updated_at: '2024-01-01T00:00:00.000Z',
    };
}

function sampleSource(): ReportSource {
    return {
        projects: [
            makeProject({ id: 'project-1', name: 'Safety Basics', code: 'SB-100', target_view_hours: 50 }),
            makeProject({ id: 'project-2', name: 'Fire Drills', code: 'FD-200', target_view_hours: 0 }),
        ],
        lookups: [
            lookup('user-1', 'employees', 'Alice Example'),
            lookup('work-1', 'work_types', 'Creation'),
            lookup('work-2', 'work_types', 'Review'),
        ],
        entries: [
            makeEntry({
                id: 'e1',
                start_time: localTime(2024, 3, 11, 9),
                end_time: localTime(2024, 3, 11, 12),
                notes: 'storyboard',
            }),
            makeEntry({
                id: 'e2',
                work_type_id: 'work-2',
                start_time: localTime(2024, 3, 12, 9),
                end_time: localTime(2024, 3, 12, 10, 30),
            }),
            makeEntry({
                id: 'e3',
                project_id: 'project-2',
                user_id: 'user-2',
                start_time: localTime(2024, 3, 12, 13),
                end_time: localTime(2024, 3, 12, 14),
                manual: true,
            }),
            makeEntry({ id: 'e4', start_time: localTime(2024, 3, 13, 9), end_time: null }),
            makeEntry({
                id: 'e5',
                project_id: 'gone',
                start_time: localTime(2024, 3, 13, 10),
                end_time: localTime(2024, 3, 13, 10, 30),
            }),
        ],
    };
}

const MARCH: ReportFilter = { from: new Date(2024, 2, 1), to: new Date(2024, 2, 31) };

describe('buildReport', () => {
    it('should sum closed entries and skip running ones', () => {
        const report = buildReport(sampleSource(), MARCH, { now: new Date('2024-04-01T08:00:00.000Z') });

        expect(report.generated_at).toBe('2024-04-01T08:00:00.000Z');
        expect(report.filter).toEqual({
            from: '2024-03-01',
            to: '2024-03-31',
            project_ids: [],
            work_type_ids: [],
            user_ids: [],
            include_archived: true,
        });
        expect(report.summary).toEqual({
            total_duration_ms: 6 * HOUR,
            total_hours: 6,
            entry_count: 4,
            project_count: 3,
            day_count: 3,
            average_hours_per_day: 2,
            average_ratio: 4.5 / 50,
        });
        expect(report.rows.map(row => row.notes === 'storyboard' ? 'e1' : row.project_id)).toEqual([
            'e1',
            'project-1',
            'project-2',
            'gone',
        ]);
    });

    it('should describe each entry row with names', () => {
        const report = buildReport(sampleSource(), MARCH);

        expect(report.rows[0]).toEqual({
            date: '2024-03-11',
            user_id: 'user-1',
            user_name: 'Alice Example',
            project_id: 'project-1',
            project_code: 'SB-100',
            project_name: 'Safety Basics',
            work_type_id: 'work-1',
            work_type_name: 'Creation',
            start_time: localTime(2024, 3, 11, 9),
            end_time: localTime(2024, 3, 11, 12),
            duration_ms: 3 * HOUR,
            hours: 3,
            manual: false,
            notes: 'storyboard',
        });
        expect(report.rows[2]).toMatchObject({ user_name: '', project_name: 'Fire Drills', manual: true });
        expect(report.rows[3]).toMatchObject({ project_code: '', project_name: '' });
    });

    it('should order project subtotals by time and compute ratios', () => {
        const report = buildReport(sampleSource(), MARCH);

        expect(report.by_project).toEqual([
            {
                project_id: 'project-1',
                project_name: 'Safety Basics',
                project_code: 'SB-100',
                target_view_hours: 50,
                duration_ms: 4.5 * HOUR,
                hours: 4.5,
                entry_count: 2,
                ratio: 4.5 / 50,
            },
            {
                project_id: 'project-2',
                project_name: 'Fire Drills',
                project_code: 'FD-200',
                target_view_hours: 0,
                duration_ms: HOUR,
                hours: 1,
                entry_count: 1,
                ratio: null,
            },
            {
                project_id: 'gone',
                project_name: '',
                project_code: '',
                target_view_hours: null,
                duration_ms: 0.5 * HOUR,
                hours: 0.5,
                entry_count: 1,
                ratio: null,
            },
        ]);
    });

    it('should give 0.9 for 45 hours against a 50 hour target', () => {
        const source: ReportSource = {
            projects: [makeProject({ target_view_hours: 50 })],
            lookups: [],
            entries: [
                makeEntry({
                    start_time: localTime(2024, 3, 4, 8),
                    end_time: new Date(Date.parse(localTime(2024, 3, 4, 8)) + 45 * HOUR).toISOString(),
                }),
            ],
        };

        const report = buildReport(source, MARCH);

        expect(report.by_project[0].ratio).toBe(0.9);
        expect(report.by_day).toEqual([{ date: '2024-03-04', duration_ms: 45 * HOUR, hours: 45, entry_count: 1 }]);
    });

    it('should give 0.9 for 2, 3 and 4 hours against 10, and null against a zero target', () => {
        const entry = (id: string, projectId: string, day: number, hours: number) => makeEntry({
            id,
            project_id: projectId,
            start_time: localTime(2024, 3, day, 9),
            end_time: localTime(2024, 3, day, 9 + hours),
        });
        const source: ReportSource = {
            projects: [
                makeProject({ id: 'p1', name: 'P1', target_view_hours: 10 }),
                makeProject({ id: 'p2', name: 'P2', target_view_hours: 0 }),
            ],
            lookups: [],
            entries: [entry('a', 'p1', 18, 2), entry('b', 'p1', 19, 3), entry('c', 'p1', 20, 4), entry('d', 'p2', 21, 5)],
        };

        const report = buildReport(source, MARCH);

        expect(report.by_project.map(s => [s.project_id, s.hours, s.ratio])).toEqual([
            ['p1', 9, 0.9],
            ['p2', 5, null],
        ]);
    });

    it('should make every subtotal list add up to the total', () => {
        const report = buildReport(sampleSource(), MARCH);
        const sum = (values: { duration_ms: number }[]): number =>
            values.reduce((total, value) => total + value.duration_ms, 0);

        expect(sum(report.by_project)).toBe(report.summary.total_duration_ms);
        expect(sum(report.by_work_type)).toBe(report.summary.total_duration_ms);
        expect(sum(report.by_user)).toBe(report.summary.total_duration_ms);
        expect(sum(report.by_day)).toBe(report.summary.total_duration_ms);
    });

    it('should keep millisecond subtotals exact when derived hours round', () => {
        const at = (ms: number): string => new Date(Date.parse(localTime(2024, 3, 5, 9)) + ms).toISOString();
        const source: ReportSource = {
            projects: [makeProject({ id: 'p1' }), makeProject({ id: 'p2', name: 'P2' }), makeProject({ id: 'p3', name: 'P3' })],
            lookups: [],
            entries: [
                makeEntry({ id: 'a', project_id: 'p1', start_time: at(0), end_time: at(1) }),
                makeEntry({ id: 'b', project_id: 'p2', start_time: at(10), end_time: at(12) }),
                makeEntry({ id: 'c', project_id: 'p3', start_time: at(20), end_time: at(27) }),
            ],
        };

        const report = buildReport(source, MARCH);

        expect(report.by_project.map(s => s.duration_ms)).toEqual([7, 2, 1]);
        expect(report.by_project.reduce((total, s) => total + s.duration_ms, 0)).toBe(report.summary.total_duration_ms);
        expect(report.summary.total_duration_ms).toBe(10);
        expect(report.summary.total_hours).toBe(10 / HOUR);
        expect(report.by_project.map(s => s.hours)).toEqual([7 / HOUR, 2 / HOUR, 1 / HOUR]);
    });

    it('should split by work type, user and day', () => {
        const report = buildReport(sampleSource(), MARCH);

        expect(report.by_work_type.map(s => [s.work_type_name, s.hours, s.percentage])).toEqual([
            ['Creation', 4.5, 75],
            ['Review', 1.5, 25],
        ]);
        expect(report.by_user.map(s => [s.user_id, s.user_name, s.hours])).toEqual([
            ['user-1', 'Alice Example', 5],
            ['user-2', '', 1],
        ]);
        expect(report.by_day.map(s => [s.date, s.hours, s.entry_count])).toEqual([
            ['2024-03-11', 3, 1],
            ['2024-03-12', 2.5, 2],
            ['2024-03-13', 0.5, 1],
        ]);
    });

    it('should count only entries starting inside the range', () => {
        const day = new Date(2024, 2, 12);
        const report = buildReport(sampleSource(), { from: day, to: day });

        expect(report.rows.map(row => row.start_time)).toEqual([
            localTime(2024, 3, 12, 9),
            localTime(2024, 3, 12, 13),
        ]);
        expect(report.summary.total_hours).toBe(2.5);
        expect(report.filter.from).toBe('2024-03-12');
    });

    it('should apply id filters', () => {
        expect(buildReport(sampleSource(), { ...MARCH, projectIds: ['project-2'] }).summary.total_hours).toBe(1);
        expect(buildReport(sampleSource(), { ...MARCH, workTypeIds: ['work-2'] }).summary.total_hours).toBe(1.5);
        expect(buildReport(sampleSource(), { ...MARCH, userIds: ['user-1'] }).summary.total_hours).toBe(5);
    });

    it('should leave archived projects out on request', () => {
        const source = sampleSource();
        source.projects[1] = { ...source.projects[1], archived: true };

        expect(buildReport(source, MARCH).summary.total_hours).toBe(6);
        const report = buildReport(source, { ...MARCH, includeArchived: false });
        expect(report.summary.total_hours).toBe(5);
        expect(report.filter.include_archived).toBe(false);
    });

    it('should report null averages when nothing matches', () => {
        const report = buildReport(sampleSource(), { ...MARCH, userIds: ['nobody'] });

        expect(report.summary).toEqual({
            total_duration_ms: 0,
            total_hours: 0,
            entry_count: 0,
            project_count: 0,
            day_count: 0,
            average_hours_per_day: null,
            average_ratio: null,
        });
        expect(report.by_project).toEqual([]);
    });

    it('should stop when the signal is aborted', () => {
        const controller = new AbortController();
        controller.abort();

        expect(() => buildReport(sampleSource(), MARCH, { signal: controller.signal })).toThrow(OperationCancelledError);
    });
});
