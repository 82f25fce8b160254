/**
 * Common Zod Schemas
 *
 * Base schemas used by other domain schemas.
 * This file should NOT import from index.ts to avoid circular dependencies.
 */

import { z } from 'zod';
import { toCalendarDate } from '../utils/dateHelpers.js';

/** ISO calendar day that actually exists ("2025-02-30" fails) */
export const calendarDateSchema = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, 'Expected YYYY-MM-DD')
  .refine(value => {
    const [year, month, day] = value.split('-').map(Number);
    return toCalendarDate(year, month, day) === value;
  }, 'Not a valid calendar date');

/** Part identifier as typed by users; numbers are accepted and stringified */
export const partIdentifierSchema = z
  .union([z.string(), z.number()])
  .transform(value => String(value))
  .refine(value => value.trim().length > 0, 'Part identifier must not be empty');

/** "true"/"false" query and env flags */
export const booleanFlagSchema = z
  .enum(['true', 'false'])
  .transform(value => value === 'true');
