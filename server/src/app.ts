/**
 * Express application factory
 *
 * The engine is injected so tests can run the full HTTP stack against fake feeds.
 */

import express from 'express';
import type { Express, Request, Response } from 'express';
import { errorHandler } from './middleware/errorHandler.js';
import { createAvailabilityRouter } from './routes/availability.js';
import { createHealthRouter } from './routes/health.js';
import type { AvailabilityEngine } from './services/availability/index.js';
import { requestLogger } from './utils/logger.js';

/** Body size ceiling; 1000 identifiers fit comfortably */
const JSON_BODY_LIMIT = '1mb';

export function createApp(engine: AvailabilityEngine): Express {
    const app = express();

    app.disable('x-powered-by');
    app.use(express.json({ limit: JSON_BODY_LIMIT }));
    app.use(requestLogger);

    app.use(createHealthRouter(engine));
    app.use(createAvailabilityRouter(engine));

    app.use((req: Request, res: Response) => {
        res.status(404).json({ error: `Route not found: ${req.method} ${req.path}`, type: 'NotFoundError' });
    });

    // Must be last
    app.use(errorHandler);

    return app;
}
