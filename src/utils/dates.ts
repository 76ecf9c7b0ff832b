/**
 * Calendar helpers. Target dates are plain YYYY-MM-DD strings interpreted in UTC.
 */

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

const WEEKDAYS = ['sunday', 'monday', 'tuesday', 'wednesday', 'thursday', 'friday', 'saturday'] as const;
export type Weekday = typeof WEEKDAYS[number];

const MONTHS = [
    'January', 'February', 'March', 'April', 'May', 'June',
    'July', 'August', 'September', 'October', 'November', 'December',
] as const;

/**
 * True for real calendar dates only (rejects 2026-02-30)
 */
export function isIsoDate(value: string): boolean {
    const match = ISO_DATE.exec(value);
    if (!match) return false;
    const date = new Date(`${value}T00:00:00Z`);
    return !Number.isNaN(date.getTime()) && date.toISOString().slice(0, 10) === value;
}

function toUtcDate(isoDate: string): Date {
    if (!isIsoDate(isoDate)) {
        throw new RangeError(`Not a YYYY-MM-DD date: ${isoDate}`);
    }
    return new Date(`${isoDate}T00:00:00Z`);
}

export function formatIsoDate(date: Date): string {
    return date.toISOString().slice(0, 10);
}

/**
 * Today in UTC, shifted back by `daysBack` days
 */
export function utcToday(daysBack: number = 0, now: Date = new Date()): string {
    const shifted = new Date(now.getTime() - daysBack * 86_400_000);
    return formatIsoDate(shifted);
}

/**
 * Unix seconds at 00:00 UTC of the date
 */
export function toUnixSeconds(isoDate: string): number {
    return Math.floor(toUtcDate(isoDate).getTime() / 1000);
}

export function weekdayOf(isoDate: string): Weekday {
    const day = WEEKDAYS[toUtcDate(isoDate).getUTCDay()];
    if (day === undefined) {
        throw new RangeError(`No weekday for ${isoDate}`);
    }
    return day;
}

export function yearOf(isoDate: string): number {
    return toUtcDate(isoDate).getUTCFullYear();
}

/**
 * "February 2026" and "Feb 2026"
 */
export function monthLabels(isoDate: string): { long: string; short: string } {
    const date = toUtcDate(isoDate);
    const month = MONTHS[date.getUTCMonth()] ?? '';
    const year = date.getUTCFullYear();
    return {
        long: `${month} ${year}`,
        short: `${month.slice(0, 3)} ${year}`,
    };
}
