/**
 * Source adapter contract
 */

import type { RawDatasets } from '@bestand/shared';
import type { SourceConfig } from '../../config/engine.js';

export interface SourceAdapter {
    readonly mode: SourceConfig['mode'];
    /**
     * Retrieve all three feeds. Rejects with UpstreamUnavailableError when any
     * of them cannot be retrieved; there is never a partial snapshot.
     */
    fetchAll(): Promise<RawDatasets>;
    /** Where the feeds come from, for logs and health output */
    describe(): Record<string, string>;
}
