import { format, isValid, parseISO } from 'date-fns';
import { ValidationError } from '../errors/CoreErrors';

const MS_PER_HOUR = 60 * 60 * 1000;

export class TimeUtils {
    /**
     * Format milliseconds to HH:MM:SS
     */
    static formatDuration(ms: number): string {
        if (!ms || ms < 0) return '00:00:00';
        const totalSeconds = Math.floor(ms / 1000);
        const hours = Math.floor(totalSeconds / 3600);
        const minutes = Math.floor((totalSeconds % 3600) / 60);
        const secs = totalSeconds % 60;
        return `${hours.toString().padStart(2, '0')}:${minutes.toString().padStart(2, '0')}:${secs.toString().padStart(2, '0')}`;
    }

    /**
     * Signed duration in milliseconds between two ISO timestamps
     */
    static durationMs(startTime: string, endTime: string): number {
        return parseISO(endTime).getTime() - parseISO(startTime).getTime();
    }

    static msToHours(ms: number): number {
        return ms / MS_PER_HOUR;
    }

    /**
     * Round hours for display and export
     */
    static roundHours(hours: number, decimals: number = 2): number {
        const factor = 10 ** decimals;
        return Math.round(hours * factor) / factor;
    }

    /**
     * Logged hours over target view hours. null when the target is zero.
     */
    static calculateRatio(hours: number, targetViewHours: number | null): number | null {
        if (targetViewHours === null || targetViewHours <= 0) return null;
        return hours / targetViewHours;
    }

    /**
     * Parse an ISO timestamp or Date, rejecting invalid values
     */
    static parseTimestamp(value: string | Date, field: string): Date {
        const date = typeof value === 'string' ? parseISO(value) : value;
        if (!isValid(date)) {
            throw new ValidationError('Invalid timestamp', [{ path: field, message: `not a valid date: ${String(value)}` }]);
        }
        return date;
    }

    static toTimestamp(value: string | Date, field: string): string {
        return TimeUtils.parseTimestamp(value, field).toISOString();
    }

    /**
     * Local calendar day of a timestamp (yyyy-MM-dd)
     */
    static dayKey(timestamp: string | Date): string {
        const date = typeof timestamp === 'string' ? parseISO(timestamp) : timestamp;
        return format(date, 'yyyy-MM-dd');
    }

    /**
     * UTC calendar month of a timestamp (yyyy-MM). Used for file partitions,
     * so the key does not depend on the machine's time zone.
     */
    static monthKey(timestamp: string | Date): string {
        const date = typeof timestamp === 'string' ? parseISO(timestamp) : timestamp;
        return date.toISOString().slice(0, 7);
    }
}
