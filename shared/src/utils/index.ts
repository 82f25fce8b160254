/**
 * Shared utilities (pure functions, no I/O)
 */

export * from './dateHelpers.js';
