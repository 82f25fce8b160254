import {
    MAX_PARTS_PER_REQUEST,
    calculateRequestSchema,
    healthQuerySchema,
    resultFormatQuerySchema,
} from '../availability.js';
import { calendarDateSchema } from '../common.js';

describe('calculateRequestSchema', () => {
    it('accepts string and numeric articles', () => {
        expect(calculateRequestSchema.parse({ article: ['P1', 4711] })).toEqual({ article: ['P1', '4711'] });
    });

    it('rejects empty lists, blank entries and oversized batches', () => {
        expect(calculateRequestSchema.safeParse({ article: [] }).success).toBe(false);
        expect(calculateRequestSchema.safeParse({ article: ['  '] }).success).toBe(false);
        expect(calculateRequestSchema.safeParse({ article: 'P1' }).success).toBe(false);

        const tooMany = Array.from({ length: MAX_PARTS_PER_REQUEST + 1 }, (_, i) => `P${i}`);
        expect(calculateRequestSchema.safeParse({ article: tooMany }).success).toBe(false);
    });
});

describe('query schemas', () => {
    it('parses the deep flag', () => {
        expect(healthQuerySchema.parse({ deep: 'true' })).toEqual({ deep: true });
        expect(healthQuerySchema.parse({})).toEqual({});
        expect(healthQuerySchema.safeParse({ deep: 'yes' }).success).toBe(false);
    });

    it('defaults the result format', () => {
        expect(resultFormatQuerySchema.parse({})).toEqual({ format: 'standard' });
        expect(resultFormatQuerySchema.parse({ format: 'legacy' })).toEqual({ format: 'legacy' });
    });
});

describe('calendarDateSchema', () => {
    it('accepts real calendar days only', () => {
        expect(calendarDateSchema.safeParse('2025-03-17').success).toBe(true);
        expect(calendarDateSchema.safeParse('2025-02-30').success).toBe(false);
        expect(calendarDateSchema.safeParse('17.03.2025').success).toBe(false);
    });
});
