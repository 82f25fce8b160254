/**
 * Remote adapter tests run against an axios instance whose adapter answers
 * in-process, so no request leaves the test.
 */

import axios, { AxiosError, CanceledError, type AxiosResponse, type InternalAxiosRequestConfig } from 'axios';
import type { RemoteSourceConfig } from '../../../config/engine.js';
import { SOURCE_ENDPOINTS } from '../../../config/sources.js';
import { UpstreamUnavailableError } from '../../../utils/errors.js';
import { extractRows, RemoteSourceAdapter } from '../remoteSource.js';

type Reply = { status: number; data: unknown } | 'hang';

const FEEDS: Record<string, unknown> = {
    '/wbz': [{ Teil: 'P1', WBZ: 5 }],
    '/dispo': [{ Teil: 'P1', Termin: '18.03.2025', Bedarfsmenge: 3 }],
    '/stockgrouped': [{ Teil: 'P1', Anzahl: 10 }],
};

function config(overrides: Partial<RemoteSourceConfig> = {}): RemoteSourceConfig {
    return {
        mode: 'remote',
        baseUrl: 'http://erp.test',
        endpoints: SOURCE_ENDPOINTS,
        timeoutMs: 1000,
        retries: 0,
        retryDelayMs: 0,
        ...overrides,
    };
}

function respond(requestConfig: InternalAxiosRequestConfig, status: number, data: unknown): AxiosResponse {
    const response: AxiosResponse = { data, status, statusText: String(status), headers: {}, config: requestConfig };
    if (status >= 400) {
        throw new AxiosError(`Request failed with status code ${status}`, AxiosError.ERR_BAD_RESPONSE, requestConfig, null, response);
    }
    return response;
}

/**
 * axios instance answering from `reply`; records every requested path and every aborted one
 */
function fakeClient(reply: (url: string, attempt: number) => Reply) {
    const calls: string[] = [];
    const aborted: string[] = [];

    const client = axios.create({
        adapter: async (requestConfig) => {
            const url = requestConfig.url ?? '';
            const attempt = calls.filter(c => c === url).length;
            calls.push(url);

            const answer = reply(url, attempt);
            if (answer === 'hang') {
                return new Promise<AxiosResponse>((_, reject) => {
                    if (requestConfig.signal?.aborted) {
                        aborted.push(url);
                        reject(new CanceledError());
                        return;
                    }
                    requestConfig.signal?.addEventListener?.('abort', () => {
                        aborted.push(url);
                        reject(new CanceledError());
                    });
                });
            }
            return respond(requestConfig, answer.status, answer.data);
        },
    });

    return { client, calls, aborted };
}

describe('RemoteSourceAdapter', () => {
    it('fetches the three feeds into raw tables', async () => {
        const { client, calls } = fakeClient(url => ({ status: 200, data: FEEDS[url] }));
        const raw = await new RemoteSourceAdapter(config(), client).fetchAll();

        expect([...calls].sort()).toEqual(['/dispo', '/stockgrouped', '/wbz']);
        expect(raw.leadTimes).toEqual({ columns: ['Teil', 'WBZ'], rows: [{ Teil: 'P1', WBZ: 5 }] });
        expect(raw.stock.rows).toEqual([{ Teil: 'P1', Anzahl: 10 }]);
    });

    it('accepts arrays wrapped in an object', async () => {
        const { client } = fakeClient(url => ({ status: 200, data: { data: FEEDS[url] } }));
        const raw = await new RemoteSourceAdapter(config(), client).fetchAll();
        expect(raw.transactions.rows).toHaveLength(1);
    });

    it('repairs a single-column stock payload', async () => {
        const { client } = fakeClient(url => ({
            status: 200,
            data: url === '/stockgrouped' ? [{ 'Teil,Anzahl': 'P1,7' }] : FEEDS[url],
        }));
        const raw = await new RemoteSourceAdapter(config(), client).fetchAll();
        expect(raw.stock.rows).toEqual([{ Teil: 'P1', Anzahl: 7 }]);
    });

    it('aborts the other requests when one feed fails', async () => {
        const { client, aborted } = fakeClient(url => (url === '/stockgrouped' ? { status: 503, data: 'down' } : 'hang'));
        const error = await new RemoteSourceAdapter(config(), client).fetchAll().catch((e: unknown) => e);

        expect(error).toBeInstanceOf(UpstreamUnavailableError);
        expect(error).toMatchObject({
            source: 'stock',
            message: 'Failed to fetch stock feed (/stockgrouped): HTTP 503',
        });
        expect([...aborted].sort()).toEqual(['/dispo', '/wbz']);
    });

    it('retries server errors with backoff', async () => {
        const { client, calls } = fakeClient((url, attempt) => (
            url === '/dispo' && attempt < 2 ? { status: 502, data: null } : { status: 200, data: FEEDS[url] }
        ));
        const raw = await new RemoteSourceAdapter(config({ retries: 2 }), client).fetchAll();

        expect(calls.filter(c => c === '/dispo')).toHaveLength(3);
        expect(raw.transactions.rows).toHaveLength(1);
    });

    it('does not retry client errors', async () => {
        const { client, calls } = fakeClient(url => (url === '/wbz' ? { status: 404, data: null } : { status: 200, data: FEEDS[url] }));
        const error = await new RemoteSourceAdapter(config({ retries: 3 }), client).fetchAll().catch((e: unknown) => e);

        expect(error).toMatchObject({ source: 'leadTimes', statusCode: 502 });
        expect(calls.filter(c => c === '/wbz')).toHaveLength(1);
    });

    it('rejects payloads that are not row arrays', async () => {
        const { client } = fakeClient(url => ({ status: 200, data: url === '/wbz' ? { error: 'maintenance' } : FEEDS[url] }));
        const error = await new RemoteSourceAdapter(config(), client).fetchAll().catch((e: unknown) => e);

        expect(error).toMatchObject({
            source: 'leadTimes',
            message: 'Unexpected payload from lead-time master feed (/wbz): expected a JSON array',
        });
    });

    it('describes the feed URLs', () => {
        expect(new RemoteSourceAdapter(config()).describe()).toEqual({
            leadTimes: 'http://erp.test/wbz',
            transactions: 'http://erp.test/dispo',
            stock: 'http://erp.test/stockgrouped',
        });
    });
});

describe('extractRows', () => {
    it('unwraps known envelopes and rejects anything else', () => {
        expect(extractRows([1])).toEqual([1]);
        expect(extractRows({ rows: [] })).toEqual([]);
        expect(extractRows('[]')).toBeNull();
        expect(extractRows(null)).toBeNull();
    });
});
