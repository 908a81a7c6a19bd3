import { endOfDay, format, startOfDay } from 'date-fns';
import { TimeEntry } from '../models/TimeEntry';
import { Project } from '../models/Project';
import { LookupValue } from '../models/LookupValue';
import {
    DaySubtotal,
    ProjectSubtotal,
    Report,
    ReportFilter,
    ReportRow,
    ReportSummary,
    UserSubtotal,
    WorkTypeSubtotal,
} from '../models/Report';
import { OperationCancelledError } from '../errors/CoreErrors';
import { TimeUtils } from '../utils/TimeUtils';

/** Entries processed between two cancellation checks */
export const CANCEL_CHECK_INTERVAL = 500;

export interface ReportSource {
    entries: TimeEntry[];
    projects: Project[];
    lookups: LookupValue[];
}

export interface BuildReportOptions {
    signal?: AbortSignal;
    /** Stamped as generated_at */
    now?: Date;
}

interface Bucket {
    durationMs: number;
    count: number;
}

function addTo(buckets: Map<string, Bucket>, key: string, durationMs: number): void {
    const bucket = buckets.get(key);
    if (bucket) {
        bucket.durationMs += durationMs;
        bucket.count++;
    } else {
        buckets.set(key, { durationMs, count: 1 });
    }
}

function toSet(ids: string[] | undefined): Set<string> | null {
    return ids && ids.length > 0 ? new Set(ids) : null;
}

/**
 * Aggregate closed entries into a report. Pure: reads nothing but its
 * arguments.
 *
 * Entries count on the local calendar day they start. Durations are summed
 * in whole milliseconds, so every subtotal list adds up to the total exactly.
 */
export function buildReport(source: ReportSource, filter: ReportFilter, options: BuildReportOptions = {}): Report {
    const from = startOfDay(filter.from).getTime();
    const to = endOfDay(filter.to).getTime();
    const includeArchived = filter.includeArchived ?? true;
    const projectIds = toSet(filter.projectIds);
    const workTypeIds = toSet(filter.workTypeIds);
    const userIds = toSet(filter.userIds);

    const projects = new Map(source.projects.map(project => [project.id, project]));
    const lookups = new Map(source.lookups.map(value => [value.id, value]));
    const nameOf = (id: string): string => lookups.get(id)?.name ?? '';

    const byProject = new Map<string, Bucket>();
    const byWorkType = new Map<string, Bucket>();
    const byUser = new Map<string, Bucket>();
    const byDay = new Map<string, Bucket>();
    const rows: ReportRow[] = [];
    let totalMs = 0;

    source.entries.forEach((entry, index) => {
        if (index % CANCEL_CHECK_INTERVAL === 0 && options.signal?.aborted) {
            throw new OperationCancelledError('Report generation');
        }
        if (entry.end_time === null) return;

        const start = Date.parse(entry.start_time);
        if (start < from || start > to) return;
        if (projectIds && !projectIds.has(entry.project_id)) return;
        if (workTypeIds && !workTypeIds.has(entry.work_type_id)) return;
        if (userIds && !userIds.has(entry.user_id)) return;

        const project = projects.get(entry.project_id);
        if (!includeArchived && project?.archived) return;

        const durationMs = TimeUtils.durationMs(entry.start_time, entry.end_time);
        if (durationMs <= 0) return;
        const date = TimeUtils.dayKey(entry.start_time);

        totalMs += durationMs;
        addTo(byProject, entry.project_id, durationMs);
        addTo(byWorkType, entry.work_type_id, durationMs);
        addTo(byUser, entry.user_id, durationMs);
        addTo(byDay, date, durationMs);

        rows.push({
            date,
            user_id: entry.user_id,
            user_name: nameOf(entry.user_id),
            project_id: entry.project_id,
            project_code: project?.code ?? '',
            project_name: project?.name ?? '',
            work_type_id: entry.work_type_id,
            work_type_name: nameOf(entry.work_type_id),
            start_time: entry.start_time,
            end_time: entry.end_time,
            duration_ms: durationMs,
            hours: TimeUtils.msToHours(durationMs),
            manual: entry.manual,
            notes: entry.notes,
        });
    });

    const projectSubtotals: ProjectSubtotal[] = Array.from(byProject, ([projectId, bucket]) => {
        const project = projects.get(projectId);
        const hours = TimeUtils.msToHours(bucket.durationMs);
        const target = project ? project.target_view_hours : null;
        return {
            project_id: projectId,
            project_name: project?.name ?? '',
            project_code: project?.code ?? '',
            target_view_hours: target,
            duration_ms: bucket.durationMs,
            hours,
            entry_count: bucket.count,
            ratio: TimeUtils.calculateRatio(hours, target),
        };
    }).sort((a, b) => b.duration_ms - a.duration_ms || a.project_name.localeCompare(b.project_name));

    const workTypeSubtotals: WorkTypeSubtotal[] = Array.from(byWorkType, ([workTypeId, bucket]) => ({
        work_type_id: workTypeId,
        work_type_name: nameOf(workTypeId),
        duration_ms: bucket.durationMs,
        hours: TimeUtils.msToHours(bucket.durationMs),
        entry_count: bucket.count,
        percentage: totalMs > 0 ? (bucket.durationMs / totalMs) * 100 : 0,
    })).sort((a, b) => b.duration_ms - a.duration_ms || a.work_type_name.localeCompare(b.work_type_name));

    const userSubtotals: UserSubtotal[] = Array.from(byUser, ([userId, bucket]) => ({
        user_id: userId,
        user_name: nameOf(userId),
        duration_ms: bucket.durationMs,
        hours: TimeUtils.msToHours(bucket.durationMs),
        entry_count: bucket.count,
    })).sort((a, b) => b.duration_ms - a.duration_ms || a.user_name.localeCompare(b.user_name));

    const daySubtotals: DaySubtotal[] = Array.from(byDay, ([date, bucket]) => ({
        date,
        duration_ms: bucket.durationMs,
        hours: TimeUtils.msToHours(bucket.durationMs),
        entry_count: bucket.count,
    })).sort((a, b) => a.date.localeCompare(b.date));

    rows.sort((a, b) => Date.parse(a.start_time) - Date.parse(b.start_time));

    const totalHours = TimeUtils.msToHours(totalMs);
    const ratios = projectSubtotals
        .map(subtotal => subtotal.ratio)
        .filter((ratio): ratio is number => ratio !== null);

    const summary: ReportSummary = {
        total_duration_ms: totalMs,
        total_hours: totalHours,
        entry_count: rows.length,
        project_count: projectSubtotals.length,
        day_count: daySubtotals.length,
        average_hours_per_day: daySubtotals.length > 0 ? totalHours / daySubtotals.length : null,
        average_ratio: ratios.length > 0 ? ratios.reduce((sum, ratio) => sum + ratio, 0) / ratios.length : null,
    };

    return {
        generated_at: (options.now ?? new Date()).toISOString(),
        filter: {
            from: format(filter.from, 'yyyy-MM-dd'),
            to: format(filter.to, 'yyyy-MM-dd'),
            project_ids: filter.projectIds ?? [],
            work_type_ids: filter.workTypeIds ?? [],
            user_ids: filter.userIds ?? [],
            include_archived: includeArchived,
        },
        summary,
        by_project: projectSubtotals,
        by_work_type: workTypeSubtotals,
        by_user: userSubtotals,
        by_day: daySubtotals,
        rows,
    };
}
