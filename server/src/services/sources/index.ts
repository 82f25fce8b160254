/**
 * Source adapters
 *
 * createSourceAdapter picks the implementation for the configured mode.
 */

import type { AxiosInstance } from 'axios';
import type { SourceConfig } from '../../config/engine.js';
import { LocalSourceAdapter } from './localSource.js';
import { RemoteSourceAdapter } from './remoteSource.js';
import type { SourceAdapter } from './types.js';

export type { SourceAdapter } from './types.js';
export { LocalSourceAdapter } from './localSource.js';
export { RemoteSourceAdapter, extractRows } from './remoteSource.js';
export { parseCsvTable, unwrapQuotedLine, detectDelimiter, stripBom } from './csvTable.js';
export { needsStockRepair, repairStockTable, repairDatasets, parseEmbeddedPair } from './stockRepair.js';

export function createSourceAdapter(config: SourceConfig, client?: AxiosInstance): SourceAdapter {
    switch (config.mode) {
        case 'local':
            return new LocalSourceAdapter(config);
        case 'remote':
            return new RemoteSourceAdapter(config, client);
    }
}
