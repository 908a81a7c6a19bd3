export interface ReportFilter {
    /** First calendar day included (local time) */
    from: Date;
    /** Last calendar day included (local time) */
    to: Date;
    projectIds?: string[];
    workTypeIds?: string[];
    userIds?: string[];
    /** Defaults to true: archived projects keep their history in reports */
    includeArchived?: boolean;
}

export interface ProjectSubtotal {
    project_id: string;
    project_name: string;
    project_code: string;
    /** null when the project no longer exists */
    target_view_hours: number | null;
    duration_ms: number;
    hours: number;
    entry_count: number;
    /** hours / target_view_hours; null when the target is zero or unknown */
    ratio: number | null;
}

export interface WorkTypeSubtotal {
    work_type_id: string;
    work_type_name: string;
    duration_ms: number;
    hours: number;
    entry_count: number;
    /** Share of the report total, 0..100 */
    percentage: number;
}

export interface UserSubtotal {
    user_id: string;
    user_name: string;
    duration_ms: number;
    hours: number;
    entry_count: number;
}

export interface DaySubtotal {
    /** yyyy-MM-dd */
    date: string;
    duration_ms: number;
    hours: number;
    entry_count: number;
}

export interface ReportRow {
    date: string;
    user_id: string;
    user_name: string;
    project_id: string;
    project_code: string;
    project_name: string;
    work_type_id: string;
    work_type_name: string;
    start_time: string;
    end_time: string;
    duration_ms: number;
    hours: number;
    manual: boolean;
    notes: string;
}

/**
 * Every subtotal list sums exactly to total_duration_ms. The `hours` fields
 * are duration_ms / 3 600 000 and carry float rounding; add durations, not hours.
 */
export interface ReportSummary {
    total_duration_ms: number;
    total_hours: number;
    entry_count: number;
    project_count: number;
    day_count: number;
    /** total hours / days with at least one entry; null when there are none */
    average_hours_per_day: number | null;
    /** Mean ratio over projects with a positive target; null when there are none */
    average_ratio: number | null;
}

export interface Report {
    generated_at: string;
    filter: {
        from: string;
        to: string;
        project_ids: string[];
        work_type_ids: string[];
        user_ids: string[];
        include_archived: boolean;
    };
    summary: ReportSummary;
    by_project: ProjectSubtotal[];
    by_work_type: WorkTypeSubtotal[];
    by_user: UserSubtotal[];
    by_day: DaySubtotal[];
    rows: ReportRow[];
}
