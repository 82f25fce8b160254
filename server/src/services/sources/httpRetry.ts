/**
 * Axios retry helper for the remote feeds
 */

import axios from 'axios';
import { sourceLogger } from '../../utils/logger.js';
import { toError } from '../../utils/errors.js';

export interface RetryOptions {
    /** Retries after the first attempt */
    retries: number;
    /** Backoff before the first retry, doubled per attempt */
    initialDelayMs: number;
    /** Stops retrying (and waiting) once aborted */
    signal?: AbortSignal;
}

const RETRYABLE_CODES = new Set(['ECONNABORTED', 'ECONNREFUSED', 'ECONNRESET', 'ENOTFOUND', 'ETIMEDOUT']);

/**
 * Network errors, timeouts and 5xx are retryable; 4xx and cancellations are not.
 */
export function isRetryableError(error: unknown): boolean {
    if (!axios.isAxiosError(error)) return false;
    if (axios.isCancel(error) || error.code === 'ERR_CANCELED') return false;

    const status = error.response?.status;
    if (status !== undefined) return status >= 500;

    return error.code === undefined || RETRYABLE_CODES.has(error.code) || error.code === 'ERR_NETWORK';
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise(resolve => {
        if (signal?.aborted) {
            resolve();
            return;
        }
        const timer = setTimeout(done, ms);
        function done(): void {
            clearTimeout(timer);
            signal?.removeEventListener('abort', done);
            resolve();
        }
        signal?.addEventListener('abort', done, { once: true });
    });
}

/**
 * Execute an axios request with retry logic and exponential backoff.
 * Retries on network errors and 5xx server errors, not on 4xx client errors.
 */
export async function axiosWithRetry<T>(
    requestFn: () => Promise<T>,
    context: string,
    options: RetryOptions,
): Promise<T> {
    let lastError: Error | null = null;

    for (let attempt = 0; attempt <= options.retries; attempt++) {
        try {
            return await requestFn();
        } catch (error: unknown) {
            lastError = toError(error);

            const retryable = isRetryableError(error) && !options.signal?.aborted;
            if (!retryable || attempt === options.retries) {
                sourceLogger.debug({ context, error: lastError.message, attempt, retryable }, 'Feed request failed');
                throw lastError;
            }

            const delay = options.initialDelayMs * Math.pow(2, attempt);
            sourceLogger.warn({ context, error: lastError.message, attempt, nextRetryMs: delay }, 'Feed request failed - retrying');
            await sleep(delay, options.signal);
        }
    }

    throw lastError ?? new Error('Request failed after retries');
}
