import { LookupCategory } from '../models/LookupValue';

/**
 * Lookup values written to a new team_data.json
 */
export const DEFAULT_LOOKUPS: Array<{ category: LookupCategory; names: string[] }> = [
    {
        category: 'work_types',
        names: ['Planning', 'Creation', 'Review', 'Production', 'Admin', 'Meetings', 'Miscellaneous'],
    },
    {
        category: 'statuses',
        names: ['Not Started', 'In Progress', 'Complete'],
    },
    {
        category: 'effort_types',
        names: ['New Build', 'Revision', 'Maintenance'],
    },
    {
        category: 'team_roles',
        names: ['Owner', 'Contributor', 'Reviewer'],
    },
];
