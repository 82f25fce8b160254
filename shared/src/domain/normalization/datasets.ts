/**
 * Dataset normalizers for the three feeds
 */

import { parseCalendarDate } from '../../utils/dateHelpers.js';
import { LEAD_TIME_COLUMNS, STOCK_COLUMNS, TRANSACTION_COLUMNS } from '../constants.js';
import type {
    DatasetName,
    LeadTimeRecord,
    NormalizedDatasets,
    RawDatasets,
    RawTable,
    StockRecord,
    Transaction,
} from '../types.js';
import { normalizeTable, type NormalizationReport, type NormalizedTable } from './tableNormalizer.js';
import { toDayCount, toQuantity, toSignedQuantity, toText } from './values.js';

export function normalizeLeadTimes(table: RawTable): NormalizedTable<LeadTimeRecord> {
    return normalizeTable('leadTimes', table, LEAD_TIME_COLUMNS, (cell, ref) => ({
        ...ref,
        leadTimeDays: toDayCount(cell('leadTimeDays')),
    }));
}

export function normalizeTransactions(table: RawTable): NormalizedTable<Transaction> {
    return normalizeTable('transactions', table, TRANSACTION_COLUMNS, (cell, ref) => ({
        ...ref,
        date: parseCalendarDate(cell('date')),
        demandQuantity: toQuantity(cell('demandQuantity')),
        supplyQuantity: toQuantity(cell('supplyQuantity')),
        commissionNumber: toText(cell('commissionNumber')),
        subReference: toText(cell('subReference')),
        bookingInfo: toText(cell('bookingInfo')),
    }));
}

export function normalizeStock(table: RawTable): NormalizedTable<StockRecord> {
    return normalizeTable('stock', table, STOCK_COLUMNS, (cell, ref) => ({
        ...ref,
        quantity: toSignedQuantity(cell('quantity')),
    }));
}

export interface NormalizedSnapshot {
    datasets: NormalizedDatasets;
    reports: Record<DatasetName, NormalizationReport>;
}

/**
 * Normalize all three feeds of a snapshot
 */
export function normalizeDatasets(raw: RawDatasets): NormalizedSnapshot {
    const leadTimes = normalizeLeadTimes(raw.leadTimes);
    const transactions = normalizeTransactions(raw.transactions);
    const stock = normalizeStock(raw.stock);

    return {
        datasets: {
            leadTimes: leadTimes.records,
            transactions: transactions.records,
            stock: stock.records,
        },
        reports: {
            leadTimes: leadTimes.report,
            transactions: transactions.report,
            stock: stock.report,
        },
    };
}
