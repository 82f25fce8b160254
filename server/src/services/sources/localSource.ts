/**
 * Local source adapter
 *
 * Reads the three ERP export files from a directory. Files are read on every
 * fetch; the exports are append-only and may change between requests.
 */

import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { DATASET_NAMES, type DatasetName, type RawDatasets, type RawTable } from '@bestand/shared';
import type { LocalSourceConfig } from '../../config/engine.js';
import { SOURCE_LABELS } from '../../config/sources.js';
import { UpstreamUnavailableError, toError } from '../../utils/errors.js';
import { sourceLogger } from '../../utils/logger.js';
import { parseCsvTable } from './csvTable.js';
import { repairDatasets } from './stockRepair.js';
import type { SourceAdapter } from './types.js';

export class LocalSourceAdapter implements SourceAdapter {
    readonly mode = 'local' as const;

    constructor(private readonly config: LocalSourceConfig) {}

    filePath(name: DatasetName): string {
        return path.resolve(this.config.directory, this.config.files[name]);
    }

    describe(): Record<string, string> {
        const described: Record<string, string> = {};
        for (const name of DATASET_NAMES) {
            described[name] = this.filePath(name);
        }
        return described;
    }

    async fetchAll(): Promise<RawDatasets> {
        const started = Date.now();
        const [leadTimes, transactions, stock] = await Promise.all(DATASET_NAMES.map(name => this.readDataset(name)));

        sourceLogger.debug({
            leadTimes: leadTimes.rows.length,
            transactions: transactions.rows.length,
            stock: stock.rows.length,
            durationMs: Date.now() - started,
        }, 'Local feeds read');

        return repairDatasets({ leadTimes, transactions, stock });
    }

    private async readDataset(name: DatasetName): Promise<RawTable> {
        const file = this.filePath(name);

        let content: string;
        try {
            content = await readFile(file, 'utf-8');
        } catch (error) {
            throw new UpstreamUnavailableError(
                `Cannot read ${SOURCE_LABELS[name]} file ${file}`,
                name,
                toError(error),
            );
        }

        try {
            return parseCsvTable(content);
        } catch (error) {
            const cause = toError(error);
            throw new UpstreamUnavailableError(
                `Cannot parse ${SOURCE_LABELS[name]} file ${file}: ${cause.message}`,
                name,
                cause,
            );
        }
    }
}
