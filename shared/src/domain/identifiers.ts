/**
 * Part Identifiers
 *
 * Part numbers are typed by hand in three different systems and arrive with
 * stray BOMs, quotes, NBSPs and line breaks. Every join runs on the canonical
 * key produced here, never on the raw value.
 */

// Control characters, BOM, NBSP/narrow NBSP and straight/typographic quotes
// eslint-disable-next-line no-control-regex
const IDENTIFIER_NOISE = /[\u0000-\u001F\u007F-\u009F\uFEFF\u00A0\u202F"'\u201C\u201D\u201E\u2018\u2019\u00AB\u00BB]/g;

function identifierText(raw: unknown): string {
    if (typeof raw === 'string') return raw;
    if (typeof raw === 'number' || typeof raw === 'bigint') return String(raw);
    return '';
}

/**
 * Strip identifier noise but keep the original casing (used for display)
 */
export function cleanPartIdentifier(raw: unknown): string {
    return identifierText(raw).replace(IDENTIFIER_NOISE, '').trim();
}

/**
 * Canonical join key: cleaned and lowercased.
 *
 * @example
 * toPartKey('\uFEFF"ABC123" \n') // 'abc123'
 */
export function toPartKey(raw: unknown): string {
    return cleanPartIdentifier(raw).toLowerCase();
}
