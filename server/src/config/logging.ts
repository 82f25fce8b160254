/**
 * Logger settings derived from NODE_ENV and LOG_LEVEL
 *
 * Read by utils/logger.ts when it is first imported; config/env.ts validates
 * the same variables for the startup report.
 */

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export interface LoggerSettings {
    level: LogLevel;
    /** pino-pretty transport (development only) */
    pretty: boolean;
}

function isLogLevel(value: string): value is LogLevel {
    return LOG_LEVELS.some(level => level === value);
}

/**
 * Unknown levels fall back to the NODE_ENV default so that the logger still
 * comes up and env validation can report the bad value.
 */
export function resolveLoggerSettings(source: Record<string, string | undefined>): LoggerSettings {
    const nodeEnv = source.NODE_ENV?.trim() || 'development';
    const requested = source.LOG_LEVEL?.trim() ?? '';

    let fallback: LogLevel = 'info';
    if (nodeEnv === 'test') fallback = 'silent';
    else if (nodeEnv === 'development') fallback = 'debug';

    return {
        level: isLogLevel(requested) ? requested : fallback,
        pretty: nodeEnv === 'development',
    };
}
