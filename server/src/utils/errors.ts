/**
 * Custom error classes for better error handling
 * Use these instead of generic Error for specific error types
 *
 * Only UpstreamUnavailableError ever reaches a caller of the engine: bad cells
 * and missing columns are absorbed during normalization.
 */

import type { DatasetName } from '@bestand/shared';

/**
 * Base interface for custom errors with HTTP status codes
 */
export interface CustomError extends Error {
    readonly statusCode: number;
}

/**
 * Validation error - thrown when request input is rejected
 *
 * @example
 * throw new ValidationError('Unknown policy', { policy: 'foo' });
 */
export class ValidationError extends Error implements CustomError {
    readonly name = 'ValidationError' as const;
    readonly statusCode = 400 as const;
    readonly details: unknown;

    constructor(message: string, details: unknown = null) {
        super(message);
        this.details = details;
        Object.setPrototypeOf(this, ValidationError.prototype);
    }
}

/**
 * Upstream unavailable - a source feed could not be retrieved
 * (network failure, non-success status, unreadable file, unusable payload).
 * Aborts the whole computation; there are no partial results.
 *
 * @example
 * throw new UpstreamUnavailableError('Stock feed returned 503', 'stock', err);
 */
export class UpstreamUnavailableError extends Error implements CustomError {
    readonly name = 'UpstreamUnavailableError' as const;
    readonly statusCode = 502 as const;
    readonly source: DatasetName | null;
    readonly originalError: Error | null;

    constructor(
        message: string,
        source: DatasetName | null = null,
        originalError: Error | null = null
    ) {
        super(message);
        this.source = source;
        this.originalError = originalError;
        Object.setPrototypeOf(this, UpstreamUnavailableError.prototype);
    }
}

/**
 * Type guard to check if an error is a custom error with statusCode
 */
export function isCustomError(error: unknown): error is CustomError {
    return (
        error instanceof Error &&
        'statusCode' in error &&
        typeof error.statusCode === 'number'
    );
}

/**
 * Normalize anything thrown into an Error
 */
export function toError(error: unknown): Error {
    return error instanceof Error ? error : new Error(String(error));
}
