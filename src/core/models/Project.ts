export interface Project {
    id: string;
    name: string;
    /** External/corporate project id, may be empty */
    code: string;
    target_view_hours: number;
    campus_id: string | null;
    offer_id: string | null;
    sub_offer_id: string | null;
    effort_type_id: string | null;
    status_id: string | null;
    /** role name -> employee id */
    /** team_roles id -> employees id */
    team_assignments: Record<string, string>;
    tags: string[];
    notes: string;
    archived: boolean;
    created_at: string;
    created_by: string;
    updated_at: string;
    updated_by: string;
}

export interface ProjectCreateInput {
    name: string;
    code?: string;
    target_view_hours: number;
    campus_id?: string | null;
    offer_id?: string | null;
    sub_offer_id?: string | null;
    effort_type_id?: string | null;
    status_id?: string | null;
    team_assignments?: Record<string, string>;
    tags?: string[];
    notes?: string;
}

export interface ProjectUpdateInput {
    name?: string;
    code?: string;
    target_view_hours?: number;
    campus_id?: string | null;
    offer_id?: string | null;
    sub_offer_id?: string | null;
    effort_type_id?: string | null;
    status_id?: string | null;
    team_assignments?: Record<string, string>;
    tags?: string[];
    notes?: string;
}

export interface ProjectFilter {
    includeArchived?: boolean;
    statusId?: string;
    campusId?: string;
    tag?: string;
    /** Case-insensitive match on name or code */
    search?: string;
}

/**
 * One row handed to bulk import. Lookup columns carry display names,
 * resolved against team data during import.
 */
export interface ProjectImportRow {
    name?: string;
    code?: string;
    target_view_hours?: number | string;
    campus?: string;
    offer?: string;
    sub_offer?: string;
    effort_type?: string;
    status?: string;
    tags?: string | string[];
    /** Data row in the source file, 1 = first row under the header; blank rows count */
    row_number?: number;
}

export interface ProjectImportError {
    /** The row's row_number, else its 1-based position in the batch */
    row: number;
    field: string | null;
    message: string;
}

export interface ProjectImportResult {
    createdCount: number;
    skippedCount: number;
    errors: ProjectImportError[];
    /** Names of rows skipped because the project already exists */
    duplicates: string[];
    cancelled: boolean;
}

/**
 * Per-user starred project list
 */
export interface StarredProjects {
    /** The user id */
    id: string;
    project_ids: string[];
}
