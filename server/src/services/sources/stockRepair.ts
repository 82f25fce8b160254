/**
 * Malformed stock export repair
 *
 * Some stock exports arrive as a single column whose cells hold the whole
 * "(part, quantity)" pair as text: `"P1","5"`, `P1,5` or `P1;5`. Such a table
 * is rebuilt with the canonical Teil/Anzahl columns before normalization.
 */

import {
    CANONICAL_COLUMNS,
    STOCK_COLUMNS,
    cleanColumnName,
    collectColumnKeys,
    isEmptyCell,
    toSignedQuantity,
    toText,
    type RawDatasets,
    type RawRow,
    type RawTable,
} from '@bestand/shared';
import { sourceLogger } from '../../utils/logger.js';

const EMBEDDED_PAIR = /^\s*"?([^",;]*?)"?\s*[,;]\s*"?([^"]*?)"?\s*$/;

const QUANTITY_ALIASES = new Set(STOCK_COLUMNS.quantity.map(alias => alias.toLowerCase()));

/**
 * Rows present, exactly one column, and that column is not a populated quantity column
 */
export function needsStockRepair(table: RawTable): boolean {
    const keys = collectColumnKeys(table);
    if (keys.length !== 1 || table.rows.length === 0) return false;

    const [key] = keys;
    const isQuantityColumn = QUANTITY_ALIASES.has(cleanColumnName(key).toLowerCase());
    return !isQuantityColumn || table.rows.every(row => isEmptyCell(row[key]));
}

/**
 * Split one embedded pair. Unmatched text becomes the part with quantity 0;
 * a non-numeric quantity is 0 as well.
 */
export function parseEmbeddedPair(text: string): { part: string; quantity: number } {
    const match = EMBEDDED_PAIR.exec(text);
    if (!match) return { part: text.trim(), quantity: 0 };
    return { part: match[1].trim(), quantity: toSignedQuantity(match[2].trim()) };
}

export function repairStockTable(table: RawTable): RawTable {
    const [key] = collectColumnKeys(table);
    const { part: partColumn, stockQuantity: quantityColumn } = CANONICAL_COLUMNS;

    let unmatched = 0;
    const rows = table.rows.map((row): RawRow => {
        const text = toText(row[key]);
        if (!EMBEDDED_PAIR.test(text)) unmatched++;
        const { part, quantity } = parseEmbeddedPair(text);
        return { [partColumn]: part, [quantityColumn]: quantity };
    });

    sourceLogger.warn({ column: key, rows: rows.length, unmatched }, 'Repaired single-column stock feed');
    return { columns: [partColumn, quantityColumn], rows };
}

/**
 * Apply the stock repair to a snapshot where needed
 */
export function repairDatasets(raw: RawDatasets): RawDatasets {
    if (!needsStockRepair(raw.stock)) return raw;
    return { ...raw, stock: repairStockTable(raw.stock) };
}
