export { AvailabilityEngine } from './engine.js';
export type { HealthCheckOptions, HealthStatus } from './engine.js';
export { inspectPart } from './debugInspector.js';
export type { DebugDiagnostics, DebugReport, RawRowMatch } from './debugInspector.js';
export type { Snapshot } from './snapshot.js';
