/**
 * Shared Zod schemas
 */

export * from './common.js';
export * from './availability.js';
