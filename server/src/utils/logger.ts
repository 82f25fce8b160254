/**
 * Centralized logger using Pino
 *
 * Development: pretty, colorized output via pino-pretty
 * Production: JSON lines on stdout
 * Test: silent unless LOG_LEVEL says otherwise
 */
import pino from 'pino';
import type { Logger, LoggerOptions } from 'pino';
import type { Request, Response, NextFunction } from 'express';
import { resolveLoggerSettings } from '../config/logging.js';

/** Requests slower than this are logged as warnings */
const SLOW_REQUEST_MS = 1000;

// process.env already holds .env values here: config/env.ts loads them on import
const settings = resolveLoggerSettings(process.env);

const options: LoggerOptions = {
    level: settings.level,
};

// Create the logger instance
const logger: Logger = settings.pretty
    ? pino({
        ...options,
        transport: {
            target: 'pino-pretty',
            options: {
                colorize: true,
                translateTime: 'SYS:standard',
                ignore: 'pid,hostname',
            },
        },
    })
    : pino({
        ...options,
        formatters: {
            level: (label: string) => ({ level: label }),
        },
    });

// Create child loggers for different modules
export const sourceLogger: Logger = logger.child({ module: 'sources' });
export const availabilityLogger: Logger = logger.child({ module: 'availability' });
export const httpLogger: Logger = logger.child({ module: 'http' });

// Export the base logger as default
export default logger;

// Request logging middleware
export function requestLogger(req: Request, res: Response, next: NextFunction): void {
    const start = Date.now();

    res.on('finish', () => {
        const duration = Date.now() - start;
        const logData = {
            method: req.method,
            url: req.originalUrl,
            status: res.statusCode,
            duration: `${duration}ms`,
        };

        if (res.statusCode >= 500) {
            httpLogger.error(logData, 'Request error');
        } else if (res.statusCode >= 400) {
            httpLogger.warn(logData, 'Request warning');
        } else if (duration > SLOW_REQUEST_MS) {
            httpLogger.warn(logData, 'Slow request');
        } else {
            httpLogger.debug(logData, 'Request completed');
        }
    });

    next();
}
