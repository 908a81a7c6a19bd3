/**
 * Date filtering and range utilities
 * Pure business logic - NO UI dependencies
 */
import {
    endOfDay,
    endOfMonth,
    endOfWeek,
    startOfDay,
    startOfMonth,
    startOfQuarter,
    startOfWeek,
    startOfYear,
    subDays,
    subMonths,
    subWeeks,
} from 'date-fns';

/**
 * Date range representation
 */
export interface DateRange {
    start: Date;
    end: Date;
}

/**
 * Date filter preset types
 */
export type DateFilterPreset =
    | 'today'
    | 'yesterday'
    | 'this-week'
    | 'last-week'
    | 'last-7-days'
    | 'this-month'
    | 'last-month'
    | 'last-30-days'
    | 'this-quarter'
    | 'this-year'
    | 'all-time'
    | 'custom';

/**
 * Date filtering utilities. Weeks start on Monday.
 */
export class DateFilters {
    /**
     * Whole calendar days from the start of `from` to the end of `to`
     */
    static dayRange(from: Date, to: Date): DateRange {
        return { start: startOfDay(from), end: endOfDay(to) };
    }

    /**
     * Get date range for "last N days", today included
     */
    static getLastNDays(days: number, now: Date): DateRange {
        return this.dayRange(subDays(now, days - 1), now);
    }

    /**
     * Get date range for "all time"
     */
    static getAllTime(): DateRange {
        return {
            start: new Date(1970, 0, 1),
            end: endOfDay(new Date(2099, 11, 31)),
        };
    }

    /**
     * Get date range by preset. Open-ended presets ("this month") end today.
     */
    static getRangeByPreset(preset: DateFilterPreset, now: Date, customRange?: DateRange): DateRange {
        switch (preset) {
            case 'today':
                return this.dayRange(now, now);
            case 'yesterday': {
                const yesterday = subDays(now, 1);
                return this.dayRange(yesterday, yesterday);
            }
            case 'this-week':
                return this.dayRange(startOfWeek(now, { weekStartsOn: 1 }), now);
            case 'last-week': {
                const lastWeek = subWeeks(now, 1);
                return {
                    start: startOfWeek(lastWeek, { weekStartsOn: 1 }),
                    end: endOfWeek(lastWeek, { weekStartsOn: 1 }),
                };
            }
            case 'last-7-days':
                return this.getLastNDays(7, now);
            case 'this-month':
                return this.dayRange(startOfMonth(now), now);
            case 'last-month': {
                const lastMonth = subMonths(now, 1);
                return { start: startOfMonth(lastMonth), end: endOfMonth(lastMonth) };
            }
            case 'last-30-days':
                return this.getLastNDays(30, now);
            case 'this-quarter':
                return this.dayRange(startOfQuarter(now), now);
            case 'this-year':
                return this.dayRange(startOfYear(now), now);
            case 'all-time':
                return this.getAllTime();
            case 'custom':
                return customRange ? this.dayRange(customRange.start, customRange.end) : this.getAllTime();
        }
    }
}
