/**
 * Building RawTables from parsed payloads
 */

import type { RawRow, RawTable } from '@bestand/shared';

export function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Column names in order of first appearance across all rows
 */
export function columnsOf(rows: readonly RawRow[]): string[] {
    const seen = new Set<string>();
    for (const row of rows) {
        for (const key of Object.keys(row)) seen.add(key);
    }
    return [...seen];
}

/**
 * Rows of a JSON feed. Scalar elements become single-column rows under `value`.
 */
export function tableFromRecords(elements: readonly unknown[]): RawTable {
    const rows: RawRow[] = elements.map(element => (isRecord(element) ? { ...element } : { value: element }));
    return { columns: columnsOf(rows), rows };
}

/**
 * Header row + value rows (CSV). Duplicate header names get a numeric suffix;
 * missing trailing cells are absent keys. Non-empty surplus cells are folded
 * back into the last column, joined by the delimiter, so a one-column export
 * keeps the whole line.
 */
export function tableFromMatrix(
    header: readonly string[],
    records: readonly (readonly string[])[],
    delimiter = ',',
): RawTable {
    const used = new Map<string, number>();
    const columns = header.map(name => {
        const count = used.get(name) ?? 0;
        used.set(name, count + 1);
        return count === 0 ? name : `${name}_${count}`;
    });

    const rows = records.map(record => {
        const row: RawRow = {};
        columns.forEach((column, index) => {
            if (index < record.length) row[column] = record[index];
        });

        const surplus = record.slice(columns.length);
        if (columns.length > 0 && surplus.some(cell => cell !== '')) {
            const last = columns[columns.length - 1];
            row[last] = [record[columns.length - 1], ...surplus].join(delimiter);
        }
        return row;
    });

    return { columns, rows };
}
