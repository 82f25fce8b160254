/**
 * Configuration barrel
 */

export * from './env.js';
export * from './logging.js';
export * from './sources.js';
export * from './engine.js';
