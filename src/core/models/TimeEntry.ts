export interface TimeEntry {
    id: string;
    project_id: string;
    user_id: string;
    work_type_id: string;
    start_time: string;
    /** null while the timer is running */
    end_time: string | null;
    notes: string;
    manual: boolean;
    created_at: string;
    updated_at: string;
}

export interface TimeEntryCreateInput {
    project_id: string;
    user_id: string;
    work_type_id: string;
    start_time: string;
    end_time: string | null;
    notes?: string;
    manual?: boolean;
}

export interface TimeEntryUpdateInput {
    project_id?: string;
    work_type_id?: string;
    start_time?: string;
    end_time?: string | null;
    notes?: string;
}

export interface TimeEntryFilter {
    userId?: string;
    projectId?: string;
    workTypeId?: string;
    /** Entries starting at or after this instant */
    from?: Date;
    /** Entries starting at or before this instant */
    to?: Date;
    open?: boolean;
}
