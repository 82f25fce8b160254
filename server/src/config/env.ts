/**
 * Centralized Environment Variable Validation
 *
 * This module validates ALL environment variables at startup using Zod.
 * If validation fails, the application will fail fast with clear error messages.
 *
 * USAGE:
 * - Import this module before anything else in the entry point: it loads .env,
 *   which the logger reads when it is first imported
 * - Call `loadEnv` there; everything else receives explicit config
 * - `parseEnv` takes any record, so tests never touch process.env
 *
 * TO ADD A NEW ENV VAR:
 * 1. Add it to the schema below with appropriate validation
 * 2. Add JSDoc comment explaining the variable
 * 3. Map it in config/engine.ts if the engine needs it
 */

// Load dotenv FIRST - must happen before anything reads process.env
import dotenv from 'dotenv';
dotenv.config();

import { z } from 'zod';
import { availabilityPolicyNameSchema, calendarDateSchema } from '@bestand/shared';
import { LOG_LEVELS } from './logging.js';
import { DEFAULT_SOURCE_API_BASE, DEFAULT_SOURCE_FILES } from './sources.js';

// ============================================
// SCHEMA DEFINITION
// ============================================

const commaList = z
    .string()
    .transform(value => value.split(',').map(item => item.trim()).filter(Boolean));

function isTimeZone(value: string): boolean {
    try {
        new Intl.DateTimeFormat('en-US', { timeZone: value });
        return true;
    } catch {
        return false;
    }
}

const envSchema = z.object({
    // ----------------------------------------
    // SERVER
    // ----------------------------------------

    /** Environment mode */
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

    /** Server port */
    PORT: z.coerce.number().int().positive().default(8000),

    /** Pino log level (defaults depend on NODE_ENV, see utils/logger.ts) */
    LOG_LEVEL: z.enum(LOG_LEVELS).optional(),

    // ----------------------------------------
    // SOURCE FEEDS
    // ----------------------------------------

    /** Where the three feeds come from */
    SOURCE_MODE: z.enum(['remote', 'local']).default('remote'),

    /** Base URL of the data service exposing /wbz, /dispo and /stockgrouped */
    SOURCE_API_BASE: z.string().url().default(DEFAULT_SOURCE_API_BASE),

    /** Per-request timeout for remote feeds */
    SOURCE_TIMEOUT_MS: z.coerce.number().int().positive().default(15000),

    /** Retries per remote feed (network errors, timeouts, 5xx) */
    SOURCE_RETRIES: z.coerce.number().int().min(0).max(5).default(2),

    /** Initial backoff between retries, doubled per attempt */
    SOURCE_RETRY_DELAY_MS: z.coerce.number().int().min(0).default(500),

    /** Directory holding the local export files */
    SOURCE_DATA_DIR: z.string().min(1).default('./data'),

    /** Local file names */
    SOURCE_FILE_LEAD_TIMES: z.string().min(1).default(DEFAULT_SOURCE_FILES.leadTimes),
    SOURCE_FILE_TRANSACTIONS: z.string().min(1).default(DEFAULT_SOURCE_FILES.transactions),
    SOURCE_FILE_STOCK: z.string().min(1).default(DEFAULT_SOURCE_FILES.stock),

    // ----------------------------------------
    // CALCULATION RULES
    // ----------------------------------------

    /** Active classification/pairing policy preset */
    AVAILABILITY_POLICY: availabilityPolicyNameSchema.default('transfer-supply'),

    /** Comma-separated stock-relevant sub-reference prefixes (overrides the preset) */
    STOCK_RELEVANT_PREFIXES: commaList.optional(),

    /** Booking-info marker of lead-time document rows */
    LEAD_TIME_MARKER: z.string().default('WBZ-Beleg'),

    /** Preferred sub-variant among several lead-time document rows */
    LEAD_TIME_PREFERRED_MARKER: z.string().default('DisB 0'),

    /** Fixed "today" (YYYY-MM-DD), for reproducible runs */
    AVAILABILITY_TODAY: calendarDateSchema.optional(),

    /** IANA zone that defines "today" */
    TIMEZONE: z.string().refine(isTimeZone, 'Unknown IANA time zone').default('Europe/Berlin'),
});

// ============================================
// TYPE EXPORT
// ============================================

export type Env = z.infer<typeof envSchema>;

// ============================================
// PARSE AND VALIDATE
// ============================================

/**
 * Validate an environment record. Throws ZodError on invalid input.
 * Empty strings count as unset so that blank lines in .env fall back to defaults.
 */
export function parseEnv(source: Record<string, string | undefined>): Env {
    const present: Record<string, string> = {};
    for (const [key, value] of Object.entries(source)) {
        if (value !== undefined && value.trim() !== '') present[key] = value;
    }
    return envSchema.parse(present);
}

/**
 * Validate process.env (with .env already loaded) and exit with a readable report on failure
 */
export function loadEnv(): Env {
    try {
        return parseEnv(process.env);
    } catch (error) {
        if (error instanceof z.ZodError) {
            const issues = error.issues.map(issue => {
                const path = issue.path.join('.');
                return `  - ${path}: ${issue.message}`;
            }).join('\n');

            console.error('Environment validation failed:\n' + issues);
            process.exit(1);
        }
        throw error;
    }
}
