/**
 * Source Feed Configuration
 *
 * Fixed addresses of the data service and default local export names.
 *
 * TO CHANGE AN ENDPOINT:
 * Update SOURCE_ENDPOINTS; paths are relative to SOURCE_API_BASE.
 */

import type { DatasetName } from '@bestand/shared';

/** Data service host of the ERP export API */
export const DEFAULT_SOURCE_API_BASE = 'http://vpc379:8100';

/**
 * Endpoint per feed
 * - leadTimes: S_artikel (Teil, WBZ)
 * - transactions: MMT_MRP_Account (Teil, Termin, Bedarfsmenge, Deckungsmenge, KommNr, SubRefObj)
 * - stock: MLA_Onhand grouped per part (Teil, Anzahl)
 */
export const SOURCE_ENDPOINTS: Readonly<Record<DatasetName, string>> = {
    leadTimes: '/wbz',
    transactions: '/dispo',
    stock: '/stockgrouped',
};

/** Default file names in local mode */
export const DEFAULT_SOURCE_FILES: Readonly<Record<DatasetName, string>> = {
    leadTimes: 'wbz.csv',
    transactions: 'dispo.csv',
    stock: 'stock.csv',
};

/** Human-readable feed names for logs and error messages */
export const SOURCE_LABELS: Readonly<Record<DatasetName, string>> = {
    leadTimes: 'lead-time master',
    transactions: 'transaction log',
    stock: 'stock',
};
