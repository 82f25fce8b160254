/**
 * Availability Domain Types
 *
 * Typed records produced by the normalizer. Each feed row becomes exactly one
 * record with every field present (defaults applied), so nothing downstream
 * checks for column presence again.
 */

import type { CalendarDate } from '../utils/dateHelpers.js';

// ============================================
// RAW SOURCE SHAPES
// ============================================

/** One row as delivered by a feed (JSON object or parsed CSV record) */
export type RawRow = Record<string, unknown>;

export interface RawTable {
    /** Column names exactly as delivered (uncleaned) */
    columns: string[];
    rows: RawRow[];
}

export type DatasetName = 'leadTimes' | 'transactions' | 'stock';

export const DATASET_NAMES: readonly DatasetName[] = ['leadTimes', 'transactions', 'stock'] as const;

/** The three feeds of one snapshot */
export type RawDatasets = Record<DatasetName, RawTable>;

/**
 * Build a per-feed record from one callback
 */
export function mapDatasets<T>(fn: (name: DatasetName) => T): Record<DatasetName, T> {
    return {
        leadTimes: fn('leadTimes'),
        transactions: fn('transactions'),
        stock: fn('stock'),
    };
}

// ============================================
// NORMALIZED RECORDS
// ============================================

export interface PartRef {
    /** Display identifier: cleaned, original casing */
    part: string;
    /** Canonical join key */
    partKey: string;
    /** Position of the originating row in its raw table */
    sourceIndex: number;
}

export interface LeadTimeRecord extends PartRef {
    /** Non-negative whole business days */
    leadTimeDays: number;
}

export interface Transaction extends PartRef {
    /** null when missing or unparseable */
    date: CalendarDate | null;
    demandQuantity: number;
    supplyQuantity: number;
    commissionNumber: string;
    subReference: string;
    bookingInfo: string;
}

export interface StockRecord extends PartRef {
    /** On-hand quantity; may be negative */
    quantity: number;
}

export interface NormalizedDatasets {
    leadTimes: LeadTimeRecord[];
    transactions: Transaction[];
    stock: StockRecord[];
}

// ============================================
// RESULT
// ============================================

export type LeadTimeSource = 'lead-time' | 'override';

export interface AvailabilityResult {
    part: string;
    partKey: string;
    stockOnHand: number;
    cumulativeDemand: number;
    cumulativeSupply: number;
    /** stockOnHand - cumulativeDemand + cumulativeSupply */
    availableToday: number;
    leadTimeDays: number;
    /** Inclusive end of the replenishment window */
    leadTimeEndDate: CalendarDate;
    /** leadTimeEndDate at 00:00 UTC, in Unix seconds */
    leadTimeEndTimestamp: number;
    leadTimeSource: LeadTimeSource;
}
