/**
 * CSV parsing for local export files
 *
 * The ERP exports are not quite CSV:
 * - UTF-8 BOM at the start
 * - tab or semicolon delimiters depending on the export profile
 * - the transaction export sometimes wraps each whole line in one quote level,
 *   doubling the quotes inside: "P1,01.02.2025,""K 1"",3"
 */

import { parse } from 'csv-parse/sync';
import type { RawTable } from '@bestand/shared';
import { tableFromMatrix } from './rawTable.js';

export type CsvDelimiter = ',' | ';' | '\t';

/**
 * Strip a leading UTF-8 byte-order mark
 */
export function stripBom(content: string): string {
    return content.charCodeAt(0) === 0xFEFF ? content.slice(1) : content;
}

/**
 * Auto-detect delimiter by checking the header line
 */
export function detectDelimiter(headerLine: string): CsvDelimiter {
    if (headerLine.includes('\t')) return '\t';
    if (headerLine.includes(';') && !headerLine.includes(',')) return ';';
    return ',';
}

/**
 * Unwrap a line fully wrapped in one quote level.
 *
 * Applies only when the line starts and ends with a quote and the inner text,
 * once its doubled quotes are removed, contains no other quote. A line such as
 * `"a","b"` is ordinary quoting and stays as it is.
 */
export function unwrapQuotedLine(line: string): string {
    const trimmed = line.trim();
    if (trimmed.length < 2 || !trimmed.startsWith('"') || !trimmed.endsWith('"')) return line;

    const inner = trimmed.slice(1, -1);
    if (inner.replace(/""/g, '').includes('"')) return line;

    return inner.replace(/""/g, '"');
}

function isStringMatrix(value: unknown): value is string[][] {
    return Array.isArray(value) && value.every(
        row => Array.isArray(row) && row.every(cell => typeof cell === 'string'),
    );
}

/**
 * Parse delimited text into a RawTable. Throws on content csv-parse cannot read.
 */
export function parseCsvTable(content: string): RawTable {
    const lines = stripBom(content)
        .split(/\r?\n/)
        .map(unwrapQuotedLine)
        .filter(line => line.trim() !== '');

    if (lines.length === 0) return { columns: [], rows: [] };

    const delimiter = detectDelimiter(lines[0]);
    const parsed: unknown = parse(lines.join('\n'), {
        delimiter,
        skip_empty_lines: true,
        trim: true,
        bom: true,
        relax_column_count: true,
        relax_quotes: true,
    });

    if (!isStringMatrix(parsed)) {
        throw new Error('CSV parser returned an unexpected shape');
    }

    const [header = [], ...records] = parsed;
    return tableFromMatrix(header, records, delimiter);
}
