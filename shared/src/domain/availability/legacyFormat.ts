/**
 * Legacy row format
 *
 * Consumers built against the first version of the service read the result
 * under the ERP's German column names. `?format=legacy` on the HTTP routes
 * maps each result onto that shape.
 */

import type { AvailabilityResult } from '../types.js';

export interface LegacyAvailabilityRow {
    'Teil': string;
    'Bestand (Heute)': number;
    'kum Bedarfsmenge': number;
    'kum Deckungsmenge': number;
    'Heute frei verfügbar': number;
    'Datum (Ende WBZ) Num': number;
}

export const RESULT_FORMATS = ['standard', 'legacy'] as const;
export type ResultFormat = (typeof RESULT_FORMATS)[number];

export function toLegacyRow(result: AvailabilityResult): LegacyAvailabilityRow {
    return {
        'Teil': result.part,
        'Bestand (Heute)': result.stockOnHand,
        'kum Bedarfsmenge': result.cumulativeDemand,
        'kum Deckungsmenge': result.cumulativeSupply,
        'Heute frei verfügbar': result.availableToday,
        'Datum (Ende WBZ) Num': result.leadTimeEndTimestamp,
    };
}
