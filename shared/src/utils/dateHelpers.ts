/**
 * Calendar Date Utilities
 *
 * Dates in the availability pipeline are plain calendar days ("YYYY-MM-DD").
 * They carry no time of day and no zone, so comparisons are lexical and every
 * arithmetic step runs on UTC midnight to stay server-timezone agnostic.
 */

/** ISO calendar day, e.g. "2025-03-17" */
export type CalendarDate = string;

const DAY_MS = 24 * 60 * 60 * 1000;

const ISO_DATE = /^(\d{4})-(\d{1,2})-(\d{1,2})(?:[T ].*)?$/;
// Day-first formats used by the ERP exports: 17.03.2025, 17.03.25, 17/03/2025, 17-03-2025
const DAY_FIRST_DATE = /^(\d{1,2})[./-](\d{1,2})[./-](\d{4}|\d{2})(?:[T ,].*)?$/;

/**
 * Build a calendar date from components, rejecting impossible days (31.02.).
 * @param month - 1-based month
 */
export function toCalendarDate(year: number, month: number, day: number): CalendarDate | null {
    if (!Number.isInteger(year) || !Number.isInteger(month) || !Number.isInteger(day)) return null;
    if (year < 1900 || year > 9999) return null;

    const d = new Date(Date.UTC(year, month - 1, day));
    if (d.getUTCFullYear() !== year || d.getUTCMonth() !== month - 1 || d.getUTCDate() !== day) {
        return null;
    }
    return formatUTCDate(d);
}

/**
 * Format a Date's UTC components as a calendar date
 */
export function formatUTCDate(date: Date): CalendarDate {
    return date.toISOString().slice(0, 10);
}

/**
 * Parse the loosely formatted date values found in the source feeds.
 * Day-first is assumed for dotted/slashed dates. Numbers are epoch milliseconds.
 * Returns null for anything unparseable.
 */
export function parseCalendarDate(value: unknown): CalendarDate | null {
    if (value instanceof Date) {
        return isNaN(value.getTime()) ? null : formatUTCDate(value);
    }
    if (typeof value === 'number') {
        if (!Number.isFinite(value)) return null;
        const d = new Date(value);
        return isNaN(d.getTime()) ? null : formatUTCDate(d);
    }
    if (typeof value !== 'string') return null;

    const trimmed = value.trim();
    if (!trimmed) return null;

    const iso = trimmed.match(ISO_DATE);
    if (iso) {
        return toCalendarDate(Number(iso[1]), Number(iso[2]), Number(iso[3]));
    }

    const dayFirst = trimmed.match(DAY_FIRST_DATE);
    if (dayFirst) {
        const rawYear = Number(dayFirst[3]);
        const year = dayFirst[3].length === 2 ? 2000 + rawYear : rawYear;
        return toCalendarDate(year, Number(dayFirst[2]), Number(dayFirst[1]));
    }

    return null;
}

/**
 * UTC midnight of a calendar date
 */
export function calendarDateToUTC(date: CalendarDate): Date {
    return new Date(`${date}T00:00:00.000Z`);
}

/**
 * Unix timestamp (seconds) of a calendar date at 00:00 UTC
 */
export function toUnixSeconds(date: CalendarDate): number {
    return Math.floor(calendarDateToUTC(date).getTime() / 1000);
}

export function addCalendarDays(date: CalendarDate, days: number): CalendarDate {
    return formatUTCDate(new Date(calendarDateToUTC(date).getTime() + days * DAY_MS));
}

/**
 * Saturday or Sunday
 */
export function isWeekend(date: CalendarDate): boolean {
    const weekday = calendarDateToUTC(date).getUTCDay();
    return weekday === 0 || weekday === 6;
}

/**
 * Advance a date by a number of business days (Monday–Friday).
 *
 * Each step moves to the next weekday, so weekends are rolled over.
 * Zero (or a negative count) returns the start date unchanged, even on a weekend.
 *
 * @example
 * addBusinessDays('2025-03-17', 5) // Monday → '2025-03-24' (next Monday)
 * addBusinessDays('2025-03-22', 1) // Saturday → '2025-03-24'
 */
export function addBusinessDays(start: CalendarDate, businessDays: number): CalendarDate {
    let remaining = Math.max(0, Math.floor(businessDays));
    let current = start;
    while (remaining > 0) {
        current = addCalendarDays(current, 1);
        if (!isWeekend(current)) remaining--;
    }
    return current;
}

/**
 * Today's calendar date as seen in the given IANA time zone
 */
export function todayInTimeZone(timeZone: string, now: Date = new Date()): CalendarDate {
    const parts = new Intl.DateTimeFormat('en-US', {
        timeZone,
        year: 'numeric',
        month: '2-digit',
        day: '2-digit',
    }).formatToParts(now);

    const part = (type: Intl.DateTimeFormatPartTypes): string =>
        parts.find(p => p.type === type)?.value ?? '';

    return `${part('year')}-${part('month')}-${part('day')}`;
}
