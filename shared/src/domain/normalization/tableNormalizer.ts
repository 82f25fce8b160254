/**
 * Schema Normalizer
 *
 * Turns a raw feed table into typed records:
 * 1. headers are trimmed and de-quoted (BOM removed)
 * 2. the part column is located by the "teil" token and keyed canonically
 * 3. every declared field is resolved once from its alias list
 * 4. cells are coerced by the dataset's row builder (defaults, never throws)
 *
 * Missing columns and bad cells degrade to neutral values; the only rows
 * dropped are those without any part identifier, because they cannot be joined.
 */

import { PART_COLUMN_TOKEN } from '../constants.js';
import { cleanPartIdentifier, toPartKey } from '../identifiers.js';
import type { DatasetName, PartRef, RawRow, RawTable } from '../types.js';

// ============================================
// TYPES
// ============================================

/** Field name → column aliases in priority order */
export type FieldAliases = Readonly<Record<string, readonly string[]>>;

/** Reads one declared field from the current row; undefined when the column is absent */
export type CellReader<F extends FieldAliases> = (field: keyof F & string) => unknown;

export interface NormalizationReport {
    dataset: DatasetName;
    /** Cleaned column names, in delivery order */
    columns: string[];
    /** Cleaned name of the part column, null if none matched */
    partColumn: string | null;
    /** Field → cleaned column used, null when the field fell back to its default */
    fieldColumns: Record<string, string | null>;
    rowCount: number;
    /** Rows dropped for lack of a part identifier */
    skippedRows: number;
}

export interface NormalizedTable<T> {
    records: T[];
    report: NormalizationReport;
}

interface ResolvedColumn {
    /** Key as it appears in the raw rows */
    key: string;
    /** Cleaned display name */
    name: string;
}

// ============================================
// HEADER HELPERS
// ============================================

/**
 * Trim, strip BOM and surrounding quote characters from a header
 */
export function cleanColumnName(name: string): string {
    return name
        .replace(/\uFEFF/g, '')
        .trim()
        .replace(/^["']+|["']+$/g, '')
        .trim();
}

/**
 * All column keys of a table: declared columns first, then any extra keys found in rows
 */
export function collectColumnKeys(table: RawTable): string[] {
    const keys = new Set<string>(table.columns);
    for (const row of table.rows) {
        for (const key of Object.keys(row)) keys.add(key);
    }
    return [...keys];
}

function indexColumns(table: RawTable): ResolvedColumn[] {
    return collectColumnKeys(table).map(key => ({ key, name: cleanColumnName(key) }));
}

/**
 * First column matching any alias (case-insensitive, alias order decides)
 */
function findColumn(columns: ResolvedColumn[], aliases: readonly string[]): ResolvedColumn | null {
    for (const alias of aliases) {
        const wanted = alias.toLowerCase();
        const match = columns.find(c => c.name.toLowerCase() === wanted);
        if (match) return match;
    }
    return null;
}

/**
 * Part column: exact token match first ("Teil"), then the first header containing it
 */
export function findPartColumn(columnNames: string[], token: string = PART_COLUMN_TOKEN): string | null {
    const cleaned = columnNames.map(cleanColumnName);
    const lowered = cleaned.map(c => c.toLowerCase());
    const exact = lowered.indexOf(token);
    if (exact >= 0) return columnNames[exact];
    const partial = lowered.findIndex(c => c.includes(token));
    return partial >= 0 ? columnNames[partial] : null;
}

// ============================================
// NORMALIZATION
// ============================================

/**
 * Normalize a raw table with a dataset-specific row builder.
 *
 * @example
 * normalizeTable('stock', table, { quantity: ['Anzahl'] }, (cell, ref) => ({
 *     ...ref,
 *     quantity: toSignedQuantity(cell('quantity')),
 * }));
 */
export function normalizeTable<T, F extends FieldAliases>(
    dataset: DatasetName,
    table: RawTable,
    fields: F,
    buildRecord: (cell: CellReader<F>, ref: PartRef, row: RawRow) => T,
): NormalizedTable<T> {
    const columns = indexColumns(table);
    const partKeyName = findPartColumn(columns.map(c => c.key));
    const partColumn = columns.find(c => c.key === partKeyName) ?? null;

    const resolved = new Map<string, ResolvedColumn | null>();
    for (const [field, aliases] of Object.entries(fields)) {
        resolved.set(field, findColumn(columns, aliases));
    }

    const records: T[] = [];
    let skippedRows = 0;

    table.rows.forEach((row, sourceIndex) => {
        const rawPart = partColumn ? row[partColumn.key] : undefined;
        const partKey = toPartKey(rawPart);
        if (!partKey) {
            skippedRows++;
            return;
        }

        const cell: CellReader<F> = field => {
            const column = resolved.get(field);
            return column ? row[column.key] : undefined;
        };

        records.push(buildRecord(cell, { part: cleanPartIdentifier(rawPart), partKey, sourceIndex }, row));
    });

    const fieldColumns: Record<string, string | null> = {};
    for (const [field, column] of resolved) {
        fieldColumns[field] = column ? column.name : null;
    }

    return {
        records,
        report: {
            dataset,
            columns: columns.map(c => c.name),
            partColumn: partColumn ? partColumn.name : null,
            fieldColumns,
            rowCount: table.rows.length,
            skippedRows,
        },
    };
}
