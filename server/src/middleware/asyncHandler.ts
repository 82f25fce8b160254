/**
 * Async Handler Middleware
 *
 * asyncHandler — wraps async route handlers to catch errors automatically
 * validate     — Zod parse that throws into the error handler on failure
 */

import type { Request, Response, NextFunction, RequestHandler } from 'express';
import type { z } from 'zod';

// ============================================
// Core types
// ============================================

type AsyncRequestHandler = (
    req: Request,
    res: Response,
    next: NextFunction
) => Promise<void | Response>;

// ============================================
// asyncHandler
// ============================================

export function asyncHandler(fn: AsyncRequestHandler): RequestHandler {
    return (req: Request, res: Response, next: NextFunction): void => {
        Promise.resolve(fn(req, res, next)).catch(next);
    };
}

// ============================================
// validate
// ============================================

/**
 * Parse request input with a Zod schema; the ZodError is mapped to 400 by errorHandler.
 *
 * @example
 * router.post('/calculate', asyncHandler(async (req, res) => {
 *     const { article } = validate(calculateRequestSchema, req.body);
 * }));
 */
export function validate<T extends z.ZodTypeAny>(schema: T, input: unknown): z.output<T> {
    return schema.parse(input);
}

export default asyncHandler;
