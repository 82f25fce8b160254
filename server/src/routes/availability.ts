/**
 * Availability Routes (Express)
 *
 * POST /calculate       - results for the listed articles
 * GET  /calculate_all   - results for every part in any feed
 * GET  /debug/:part     - one result with its diagnostics
 *
 * The list endpoints accept ?format=legacy for the ERP column names.
 */

import { Router } from 'express';
import type { Request, Response } from 'express';
import {
    calculateRequestSchema,
    debugParamsSchema,
    resultFormatQuerySchema,
    toLegacyRow,
    type AvailabilityResult,
    type LegacyAvailabilityRow,
    type ResultFormat,
} from '@bestand/shared';
import { asyncHandler, validate } from '../middleware/asyncHandler.js';
import type { AvailabilityEngine } from '../services/availability/index.js';

function formatResults(
    results: AvailabilityResult[],
    format: ResultFormat,
): AvailabilityResult[] | LegacyAvailabilityRow[] {
    return format === 'legacy' ? results.map(toLegacyRow) : results;
}

export function createAvailabilityRouter(engine: AvailabilityEngine): Router {
    const router: Router = Router();

    router.post('/calculate', asyncHandler(async (req: Request, res: Response) => {
        const { article } = validate(calculateRequestSchema, req.body);
        const { format } = validate(resultFormatQuerySchema, req.query);

        const results = await engine.calculate(article);
        res.json(formatResults(results, format));
    }));

    router.get('/calculate_all', asyncHandler(async (req: Request, res: Response) => {
        const { format } = validate(resultFormatQuerySchema, req.query);

        const results = await engine.calculateAll();
        res.json(formatResults(results, format));
    }));

    router.get('/debug/:part', asyncHandler(async (req: Request, res: Response) => {
        const { part } = validate(debugParamsSchema, req.params);

        res.json(await engine.debug(part));
    }));

    return router;
}
