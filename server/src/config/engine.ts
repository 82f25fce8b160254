/**
 * Engine Configuration
 *
 * Maps validated env vars onto the explicit config object the availability
 * engine and source adapters take. Nothing below config/ reads process.env.
 */

import {
    getAvailabilityPolicy,
    type AvailabilityPolicy,
    type CalendarDate,
    type DatasetName,
    type LeadTimeMarkers,
} from '@bestand/shared';
import type { Env } from './env.js';
import { SOURCE_ENDPOINTS } from './sources.js';

// ============================================
// TYPES
// ============================================

export interface RemoteSourceConfig {
    mode: 'remote';
    baseUrl: string;
    endpoints: Readonly<Record<DatasetName, string>>;
    timeoutMs: number;
    retries: number;
    retryDelayMs: number;
}

export interface LocalSourceConfig {
    mode: 'local';
    directory: string;
    files: Readonly<Record<DatasetName, string>>;
}

export type SourceConfig = RemoteSourceConfig | LocalSourceConfig;

export interface EngineConfig {
    source: SourceConfig;
    policy: AvailabilityPolicy;
    markers: LeadTimeMarkers;
    /** IANA zone in which "today" is determined */
    timeZone: string;
    /** Fixed evaluation day; the current day in timeZone when absent */
    today?: CalendarDate;
}

// ============================================
// BUILDERS
// ============================================

export function buildSourceConfig(env: Env): SourceConfig {
    if (env.SOURCE_MODE === 'local') {
        return {
            mode: 'local',
            directory: env.SOURCE_DATA_DIR,
            files: {
                leadTimes: env.SOURCE_FILE_LEAD_TIMES,
                transactions: env.SOURCE_FILE_TRANSACTIONS,
                stock: env.SOURCE_FILE_STOCK,
            },
        };
    }

    return {
        mode: 'remote',
        baseUrl: env.SOURCE_API_BASE.replace(/\/+$/, ''),
        endpoints: SOURCE_ENDPOINTS,
        timeoutMs: env.SOURCE_TIMEOUT_MS,
        retries: env.SOURCE_RETRIES,
        retryDelayMs: env.SOURCE_RETRY_DELAY_MS,
    };
}

export function buildEngineConfig(env: Env): EngineConfig {
    const policy = env.STOCK_RELEVANT_PREFIXES
        ? getAvailabilityPolicy(env.AVAILABILITY_POLICY, { stockRelevantPrefixes: env.STOCK_RELEVANT_PREFIXES })
        : getAvailabilityPolicy(env.AVAILABILITY_POLICY);

    return {
        source: buildSourceConfig(env),
        policy,
        markers: {
            document: env.LEAD_TIME_MARKER,
            preferred: env.LEAD_TIME_PREFERRED_MARKER,
        },
        timeZone: env.TIMEZONE,
        today: env.AVAILABILITY_TODAY,
    };
}
