/**
 * Unit tests for part identifier canonicalization
 */

import { cleanPartIdentifier, toPartKey } from '../identifiers.js';

describe('identifiers', () => {
    describe('toPartKey', () => {
        it('maps noisy variants of one identifier to the same key', () => {
            const variants = ['ABC123', ' abc123\n', '\uFEFFABC123', '"ABC123"'];
            expect(variants.map(toPartKey)).toEqual(['abc123', 'abc123', 'abc123', 'abc123']);
        });

        it('strips non-breaking spaces, tabs and typographic quotes', () => {
            expect(toPartKey('\u00A0„Abc-42“\t')).toBe('abc-42');
            expect(toPartKey("'P1'\r\n")).toBe('p1');
        });

        it('keeps inner spaces and punctuation', () => {
            expect(toPartKey(' 4711 / B ')).toBe('4711 / b');
        });

        it('stringifies numeric identifiers', () => {
            expect(toPartKey(4711)).toBe('4711');
        });

        it('returns an empty key for missing or non-text values', () => {
            expect(toPartKey(undefined)).toBe('');
            expect(toPartKey(null)).toBe('');
            expect(toPartKey({ part: 'P1' })).toBe('');
            expect(toPartKey('""')).toBe('');
        });
    });

    describe('cleanPartIdentifier', () => {
        it('keeps the original casing', () => {
            expect(cleanPartIdentifier('\uFEFF"Abc123" ')).toBe('Abc123');
        });
    });
});
