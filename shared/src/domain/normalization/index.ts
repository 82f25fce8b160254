export * from './values.js';
export * from './tableNormalizer.js';
export * from './datasets.js';
