import type { NormalizedSnapshot, RawDatasets } from '@bestand/shared';

/**
 * One fetch of the three feeds, raw and normalized. Built per request, never cached.
 */
export interface Snapshot extends NormalizedSnapshot {
    raw: RawDatasets;
}
