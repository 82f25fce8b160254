/**
 * Health Route
 *
 * GET /health            - configuration summary, no upstream calls
 * GET /health?deep=true  - also fetches all three feeds; 503 when any fails
 */

import { Router } from 'express';
import type { Request, Response } from 'express';
import { healthQuerySchema } from '@bestand/shared';
import { asyncHandler, validate } from '../middleware/asyncHandler.js';
import type { AvailabilityEngine } from '../services/availability/index.js';

export function createHealthRouter(engine: AvailabilityEngine): Router {
    const router: Router = Router();

    router.get('/health', asyncHandler(async (req: Request, res: Response) => {
        const { deep } = validate(healthQuerySchema, req.query);
        const health = await engine.healthCheck({ deep });

        res.status(health.status === 'ok' ? 200 : 503).json(health);
    }));

    return router;
}
