/**
 * Domain Layer
 *
 * Availability computation, free of I/O.
 * The server feeds it raw tables; everything from normalization to the final
 * figure happens here.
 */

export * from './constants.js';
export * from './types.js';
export * from './identifiers.js';
export * from './normalization/index.js';
export * from './leadTime.js';
export * from './availability/index.js';
