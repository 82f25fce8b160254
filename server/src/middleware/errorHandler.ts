/**
 * Centralized Error Handler Middleware
 * Handles all errors thrown in async routes and provides consistent error responses
 *
 * Must be added AFTER all routes in Express app:
 * app.use(errorHandler);
 */

import type { Request, Response, NextFunction, ErrorRequestHandler } from 'express';
import { ZodError } from 'zod';
import { UpstreamUnavailableError, ValidationError, isCustomError, toError } from '../utils/errors.js';
import { httpLogger } from '../utils/logger.js';

/**
 * Global error handling middleware
 * Catches all errors and formats consistent responses
 */
export const errorHandler: ErrorRequestHandler = (
    thrown: unknown,
    req: Request,
    res: Response,
    _next: NextFunction
): void => {
    const err = toError(thrown);

    // Upstream feed failure: the whole request fails, no partial results
    if (err instanceof UpstreamUnavailableError) {
        httpLogger.error({
            method: req.method,
            path: req.path,
            source: err.source,
            cause: err.originalError?.message,
        }, err.message);
        res.status(502).json({
            error: err.message,
            type: 'UpstreamUnavailableError',
            source: err.source,
        });
        return;
    }

    if (err instanceof ValidationError) {
        res.status(400).json({
            error: err.message,
            type: 'ValidationError',
            details: err.details,
        });
        return;
    }

    // Handle Zod validation errors
    if (err instanceof ZodError) {
        res.status(400).json({
            error: 'Validation failed',
            type: 'ValidationError',
            details: err.issues.map(issue => ({
                path: issue.path.join('.'),
                message: issue.message,
            })),
        });
        return;
    }

    // Malformed JSON bodies surface from express.json() as SyntaxError with status 400
    const statusCode = isCustomError(err) ? err.statusCode : readStatus(thrown) ?? 500;

    httpLogger.error({
        method: req.method,
        path: req.path,
        error: err.message,
        type: err.name,
        stack: process.env.NODE_ENV === 'development' ? err.stack : undefined,
    }, 'Unhandled request error');

    const response: {
        error: string;
        type: string;
        stack?: string;
    } = {
        error: statusCode >= 500 ? 'Internal server error' : err.message,
        type: err.name || 'Error',
    };

    // Include stack trace in development
    if (process.env.NODE_ENV === 'development') {
        response.stack = err.stack;
    }

    res.status(statusCode).json(response);
};

function readStatus(thrown: unknown): number | null {
    if (typeof thrown !== 'object' || thrown === null || !('status' in thrown)) return null;
    const { status } = thrown;
    return typeof status === 'number' && status >= 400 && status < 600 ? status : null;
}

export default errorHandler;
