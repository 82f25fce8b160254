export * from './policies.js';
export * from './classification.js';
export * from './calculator.js';
export * from './legacyFormat.js';
