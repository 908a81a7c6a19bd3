/**
 * Shared lookup categories kept in team_data.json
 */
export const LOOKUP_CATEGORIES = [
    'employees',
    'work_types',
    'campuses',
    'offers',
    'sub_offers',
    'effort_types',
    'statuses',
    'team_roles',
] as const;

export type LookupCategory = (typeof LOOKUP_CATEGORIES)[number];

export interface LookupValue {
    id: string;
    category: LookupCategory;
    name: string;
    /** External key; for employees, the OS username */
    code: string;
    active: boolean;
    created_at: string;
    updated_at: string;
}

export interface LookupValueCreateInput {
    name: string;
    code?: string;
}

export interface LookupValueUpdateInput {
    name?: string;
    code?: string;
}
