/**
 * Cell coercion helpers
 *
 * Every helper accepts whatever a feed delivered and never throws:
 * unusable input comes back as null (numbers/dates) or '' (text).
 */

/**
 * Parse a number from JSON or CSV text.
 *
 * Handles German and English separators:
 * "1.234,5" → 1234.5, "1,234.5" → 1234.5, "3,5" → 3.5, "1.234.567" → 1234567.
 * A single dot is always a decimal point ("1.234" → 1.234).
 */
export function parseNumber(value: unknown): number | null {
    if (typeof value === 'number') return Number.isFinite(value) ? value : null;
    if (typeof value !== 'string') return null;

    let s = value.replace(/[\s"']/g, '');
    if (!s) return null;

    const lastComma = s.lastIndexOf(',');
    const lastDot = s.lastIndexOf('.');
    const commaCount = s.split(',').length - 1;
    const dotCount = s.split('.').length - 1;

    if (lastComma > -1 && lastDot > -1) {
        s = lastComma > lastDot
            ? s.replace(/\./g, '').replace(',', '.')
            : s.replace(/,/g, '');
    } else if (commaCount > 1) {
        s = s.replace(/,/g, '');
    } else if (commaCount === 1) {
        s = s.replace(',', '.');
    } else if (dotCount > 1) {
        s = s.replace(/\./g, '');
    }

    if (!/^[-+]?(\d+\.?\d*|\.\d+)(e[-+]?\d+)?$/i.test(s)) return null;
    const n = Number(s);
    return Number.isFinite(n) ? n : null;
}

/**
 * Non-negative quantity; negatives and garbage become 0
 */
export function toQuantity(value: unknown): number {
    const n = parseNumber(value);
    return n === null || n < 0 ? 0 : n;
}

/**
 * Signed quantity (stock may be negative); garbage becomes 0
 */
export function toSignedQuantity(value: unknown): number {
    return parseNumber(value) ?? 0;
}

/**
 * Whole, non-negative day count ("5", 5.7 → 5, -2 → 0)
 */
export function toDayCount(value: unknown): number {
    const n = parseNumber(value);
    return n === null || n < 0 ? 0 : Math.trunc(n);
}

/**
 * Free text, trimmed; '' when absent
 */
export function toText(value: unknown): string {
    if (typeof value === 'string') return value.trim();
    if (typeof value === 'number' || typeof value === 'bigint' || typeof value === 'boolean') {
        return String(value);
    }
    return '';
}

/**
 * A cell counts as empty when it is missing, null or whitespace only
 */
export function isEmptyCell(value: unknown): boolean {
    return value === null || value === undefined || (typeof value === 'string' && value.trim() === '');
}
