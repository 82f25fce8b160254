import {
    addBusinessDays,
    addCalendarDays,
    isWeekend,
    parseCalendarDate,
    toCalendarDate,
    todayInTimeZone,
    toUnixSeconds,
} from '../dateHelpers.js';

describe('dateHelpers', () => {
    describe('parseCalendarDate', () => {
        it('parses day-first ERP formats', () => {
            expect(parseCalendarDate('18.03.2025')).toBe('2025-03-18');
            expect(parseCalendarDate('18.03.25')).toBe('2025-03-18');
            expect(parseCalendarDate('18/03/2025')).toBe('2025-03-18');
            expect(parseCalendarDate('18-03-2025')).toBe('2025-03-18');
            expect(parseCalendarDate('1.4.2025 00:00:00')).toBe('2025-04-01');
        });

        it('parses ISO dates with or without a time part', () => {
            expect(parseCalendarDate('2025-03-18')).toBe('2025-03-18');
            expect(parseCalendarDate('2025-03-18T14:30:00')).toBe('2025-03-18');
            expect(parseCalendarDate(' 2025-03-18 08:00 ')).toBe('2025-03-18');
        });

        it('treats numbers as epoch milliseconds', () => {
            expect(parseCalendarDate(Date.UTC(2025, 2, 18, 12))).toBe('2025-03-18');
        });

        it('accepts Date instances', () => {
            expect(parseCalendarDate(new Date(Date.UTC(2025, 0, 2)))).toBe('2025-01-02');
        });

        it('returns null for impossible or unparseable values', () => {
            expect(parseCalendarDate('31.02.2025')).toBeNull();
            expect(parseCalendarDate('tomorrow')).toBeNull();
            expect(parseCalendarDate('')).toBeNull();
            expect(parseCalendarDate(null)).toBeNull();
            expect(parseCalendarDate(Number.NaN)).toBeNull();
            expect(parseCalendarDate(new Date('invalid'))).toBeNull();
        });
    });

    describe('toCalendarDate', () => {
        it('builds zero-padded dates', () => {
            expect(toCalendarDate(2025, 1, 5)).toBe('2025-01-05');
        });

        it('rejects out-of-range components', () => {
            expect(toCalendarDate(2025, 13, 1)).toBeNull();
            expect(toCalendarDate(1899, 12, 31)).toBeNull();
            expect(toCalendarDate(2024, 2, 29)).toBe('2024-02-29');
            expect(toCalendarDate(2025, 2, 29)).toBeNull();
        });
    });

    describe('isWeekend', () => {
        it('detects Saturday and Sunday', () => {
            expect(isWeekend('2025-03-22')).toBe(true);
            expect(isWeekend('2025-03-23')).toBe(true);
            expect(isWeekend('2025-03-21')).toBe(false);
            expect(isWeekend('2025-03-24')).toBe(false);
        });
    });

    describe('addBusinessDays', () => {
        it('skips the weekend', () => {
            // Monday + 5 business days = next Monday
            expect(addBusinessDays('2025-03-17', 5)).toBe('2025-03-24');
            // Friday + 1 = Monday
            expect(addBusinessDays('2025-03-21', 1)).toBe('2025-03-24');
        });

        it('rolls forward from a weekend start', () => {
            expect(addBusinessDays('2025-03-22', 1)).toBe('2025-03-24');
        });

        it('returns the start date for zero or negative counts', () => {
            expect(addBusinessDays('2025-03-22', 0)).toBe('2025-03-22');
            expect(addBusinessDays('2025-03-17', -3)).toBe('2025-03-17');
        });

        it('truncates fractional counts', () => {
            expect(addBusinessDays('2025-03-17', 2.9)).toBe('2025-03-19');
        });

        it('crosses month and year boundaries', () => {
            // Tuesday 2024-12-31 + 3 = Friday 2025-01-03
            expect(addBusinessDays('2024-12-31', 3)).toBe('2025-01-03');
        });
    });

    describe('addCalendarDays / toUnixSeconds', () => {
        it('adds plain days', () => {
            expect(addCalendarDays('2025-02-27', 2)).toBe('2025-03-01');
        });

        it('returns UTC midnight in seconds', () => {
            expect(toUnixSeconds('2025-03-24')).toBe(1742774400);
            expect(toUnixSeconds('1970-01-02')).toBe(86400);
        });
    });

    describe('todayInTimeZone', () => {
        it('uses the calendar day of the given zone', () => {
            // 23:30 UTC on 2025-03-16 is already 00:30 on 2025-03-17 in Berlin (CET)
            const now = new Date(Date.UTC(2025, 2, 16, 23, 30));
            expect(todayInTimeZone('Europe/Berlin', now)).toBe('2025-03-17');
            expect(todayInTimeZone('UTC', now)).toBe('2025-03-16');
        });
    });
});
