/**
 * @bestand/shared - Availability domain shared by the server and its tools
 *
 * Domain logic (normalization, lead-time windows, availability) lives in
 * ./domain, request schemas in ./schemas, pure helpers in ./utils.
 */

export * from './domain/index.js';
export * from './schemas/index.js';
export * from './utils/index.js';
