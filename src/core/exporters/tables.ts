import { Report, ReportRow } from '../models/Report';
import { TimeUtils } from '../utils/TimeUtils';

export type Cell = string | number;

/** Column order of the entry table, shared by CSV and the Entries sheet */
export const ENTRY_COLUMNS = [
    'Date',
    'User ID',
    'User',
    'Project ID',
    'Project Code',
    'Project Name',
    'Work Type',
    'Hours',
    'Start',
    'End',
    'Manual',
    'Notes',
] as const;

function entryCells(row: ReportRow): Cell[] {
    return [
        row.date,
        row.user_id,
        row.user_name,
        row.project_id,
        row.project_code,
        row.project_name,
        row.work_type_name,
        TimeUtils.roundHours(row.hours),
        row.start_time,
        row.end_time,
        row.manual ? 'Yes' : 'No',
        row.notes,
    ];
}

/**
 * Header plus one line per entry
 */
export function entryTable(report: Report): Cell[][] {
    return [[...ENTRY_COLUMNS], ...report.rows.map(entryCells)];
}

export function projectTable(report: Report): Cell[][] {
    return [
        ['Project ID', 'Project Code', 'Project Name', 'Target View Hours', 'Hours', 'Entries', 'Ratio'],
        ...report.by_project.map(subtotal => [
            subtotal.project_id,
            subtotal.project_code,
            subtotal.project_name,
            subtotal.target_view_hours ?? '',
            TimeUtils.roundHours(subtotal.hours),
            subtotal.entry_count,
            subtotal.ratio === null ? '' : TimeUtils.roundHours(subtotal.ratio, 4),
        ]),
    ];
}

export function workTypeTable(report: Report): Cell[][] {
    return [
        ['Work Type ID', 'Work Type', 'Hours', 'Entries', 'Percentage'],
        ...report.by_work_type.map(subtotal => [
            subtotal.work_type_id,
            subtotal.work_type_name,
            TimeUtils.roundHours(subtotal.hours),
            subtotal.entry_count,
            TimeUtils.roundHours(subtotal.percentage, 1),
        ]),
    ];
}

export function dayTable(report: Report): Cell[][] {
    return [
        ['Date', 'Hours', 'Entries'],
        ...report.by_day.map(subtotal => [subtotal.date, TimeUtils.roundHours(subtotal.hours), subtotal.entry_count]),
    ];
}

/**
 * Two-column label / value sheet
 */
export function summaryTable(report: Report): Cell[][] {
    const { summary } = report;
    return [
        ['Field', 'Value'],
        ['From', report.filter.from],
        ['To', report.filter.to],
        ['Total Hours', TimeUtils.roundHours(summary.total_hours)],
        ['Entries', summary.entry_count],
        ['Projects', summary.project_count],
        ['Days', summary.day_count],
        ['Average Hours Per Day', summary.average_hours_per_day === null ? '' : TimeUtils.roundHours(summary.average_hours_per_day)],
        ['Average Ratio', summary.average_ratio === null ? '' : TimeUtils.roundHours(summary.average_ratio, 4)],
        ['Generated At', report.generated_at],
    ];
}
