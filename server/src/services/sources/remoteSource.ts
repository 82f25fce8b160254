/**
 * Remote source adapter
 *
 * Three read-only GETs against the ERP data service, run concurrently.
 * The first failure aborts the other requests and rejects the whole fetch.
 */

import axios, { type AxiosInstance } from 'axios';
import { DATASET_NAMES, type DatasetName, type RawDatasets, type RawTable } from '@bestand/shared';
import type { RemoteSourceConfig } from '../../config/engine.js';
import { SOURCE_LABELS } from '../../config/sources.js';
import { UpstreamUnavailableError, toError } from '../../utils/errors.js';
import { sourceLogger } from '../../utils/logger.js';
import { axiosWithRetry } from './httpRetry.js';
import { isRecord, tableFromRecords } from './rawTable.js';
import { repairDatasets } from './stockRepair.js';
import type { SourceAdapter } from './types.js';

/**
 * Accepts a bare JSON array or an object wrapping one under `data` or `rows`
 */
export function extractRows(payload: unknown): unknown[] | null {
    if (Array.isArray(payload)) return payload;
    if (isRecord(payload)) {
        if (Array.isArray(payload.data)) return payload.data;
        if (Array.isArray(payload.rows)) return payload.rows;
    }
    return null;
}

function describeFailure(error: Error): string {
    if (axios.isAxiosError(error)) {
        if (error.response) return `HTTP ${error.response.status}`;
        if (error.code) return error.code;
    }
    return error.message;
}

export class RemoteSourceAdapter implements SourceAdapter {
    readonly mode = 'remote' as const;
    private readonly client: AxiosInstance;

    constructor(
        private readonly config: RemoteSourceConfig,
        client?: AxiosInstance,
    ) {
        this.client = client ?? axios.create({
            baseURL: config.baseUrl,
            timeout: config.timeoutMs,
            headers: { Accept: 'application/json' },
        });
    }

    describe(): Record<string, string> {
        const described: Record<string, string> = {};
        for (const name of DATASET_NAMES) {
            described[name] = `${this.config.baseUrl}${this.config.endpoints[name]}`;
        }
        return described;
    }

    async fetchAll(): Promise<RawDatasets> {
        const controller = new AbortController();
        const started = Date.now();

        const fetchOne = async (name: DatasetName): Promise<RawTable> => {
            try {
                return await this.fetchDataset(name, controller.signal);
            } catch (error) {
                controller.abort();
                throw error;
            }
        };

        const [leadTimes, transactions, stock] = await Promise.all(DATASET_NAMES.map(fetchOne));

        sourceLogger.debug({
            leadTimes: leadTimes.rows.length,
            transactions: transactions.rows.length,
            stock: stock.rows.length,
            durationMs: Date.now() - started,
        }, 'Remote feeds fetched');

        return repairDatasets({ leadTimes, transactions, stock });
    }

    private async fetchDataset(name: DatasetName, signal: AbortSignal): Promise<RawTable> {
        const path = this.config.endpoints[name];
        let payload: unknown;

        try {
            const response = await axiosWithRetry(
                () => this.client.get<unknown>(path, {
                    baseURL: this.config.baseUrl,
                    timeout: this.config.timeoutMs,
                    signal,
                }),
                `GET ${path}`,
                { retries: this.config.retries, initialDelayMs: this.config.retryDelayMs, signal },
            );
            payload = response.data;
        } catch (error) {
            const cause = toError(error);
            throw new UpstreamUnavailableError(
                `Failed to fetch ${SOURCE_LABELS[name]} feed (${path}): ${describeFailure(cause)}`,
                name,
                cause,
            );
        }

        const rows = extractRows(payload);
        if (!rows) {
            throw new UpstreamUnavailableError(
                `Unexpected payload from ${SOURCE_LABELS[name]} feed (${path}): expected a JSON array`,
                name,
            );
        }
        return tableFromRecords(rows);
    }
}
