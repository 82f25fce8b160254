/**
 * Availability API Schemas
 *
 * Request validation for the availability endpoints.
 */

import { z } from 'zod';
import { AVAILABILITY_POLICY_NAMES } from '../domain/availability/policies.js';
import { RESULT_FORMATS } from '../domain/availability/legacyFormat.js';
import { booleanFlagSchema, partIdentifierSchema } from './common.js';

/** Maximum number of parts accepted by one calculate request */
export const MAX_PARTS_PER_REQUEST = 1000;

/**
 * POST /calculate body
 *
 * `article` is the field name existing clients already send.
 */
export const calculateRequestSchema = z.object({
  article: z
    .array(partIdentifierSchema)
    .min(1, 'At least one article is required')
    .max(MAX_PARTS_PER_REQUEST, `At most ${MAX_PARTS_PER_REQUEST} articles per request`),
});

export const debugParamsSchema = z.object({
  part: partIdentifierSchema,
});

export const healthQuerySchema = z.object({
  deep: booleanFlagSchema.optional(),
});

/** Policy preset names; validates AVAILABILITY_POLICY at startup */
export const availabilityPolicyNameSchema = z.enum(AVAILABILITY_POLICY_NAMES);

export const resultFormatQuerySchema = z.object({
  format: z.enum(RESULT_FORMATS).default('standard'),
});
