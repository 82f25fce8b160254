/**
 * Availability Engine
 *
 * Entry point for every computation. Each call fetches a fresh snapshot of the
 * three feeds, normalizes it, and runs the pure domain calculation from
 * @bestand/shared. No state is kept between calls.
 *
 * Operations:
 * - calculate(parts): results for the requested parts only
 * - calculateAll(): results for every part in any feed
 * - debug(part): one result plus the diagnostics behind it
 * - healthCheck({ deep }): configuration summary, optionally probing the feeds
 */

import {
    computePartAvailability,
    groupByPart,
    isBlockedByEmptySources,
    normalizeDatasets,
    todayInTimeZone,
    toPartKey,
    cleanPartIdentifier,
    type AvailabilityContext,
    type AvailabilityPolicy,
    type AvailabilityResult,
    type CalendarDate,
    type DatasetName,
    type NormalizedDatasets,
    type PartInputs,
} from '@bestand/shared';
import type { EngineConfig } from '../../config/engine.js';
import { ValidationError, toError } from '../../utils/errors.js';
import { availabilityLogger } from '../../utils/logger.js';
import { createSourceAdapter, type SourceAdapter } from '../sources/index.js';
import { inspectPart, type DebugReport } from './debugInspector.js';
import type { Snapshot } from './snapshot.js';

// ============================================
// TYPES
// ============================================

export interface HealthCheckOptions {
    /** Probe all three feeds */
    deep?: boolean;
}

export interface HealthStatus {
    status: 'ok' | 'unavailable';
    sourceMode: EngineConfig['source']['mode'];
    policy: string;
    today: CalendarDate;
    checkedAt: string;
    sources: Record<string, string>;
    /** Raw row count per feed (deep check only) */
    rowCounts?: Record<DatasetName, number>;
    error?: string;
}

// ============================================
// ENGINE
// ============================================

export class AvailabilityEngine {
    private readonly source: SourceAdapter;

    constructor(
        private readonly config: EngineConfig,
        source?: SourceAdapter,
    ) {
        this.source = source ?? createSourceAdapter(config.source);
    }

    get policy(): AvailabilityPolicy {
        return this.config.policy;
    }

    /** Evaluation day: the fixed day from config, else today in the configured zone */
    today(): CalendarDate {
        return this.config.today ?? todayInTimeZone(this.config.timeZone);
    }

    private context(): AvailabilityContext {
        return {
            today: this.today(),
            policy: this.config.policy,
            markers: this.config.markers,
        };
    }

    /**
     * Fetch and normalize all three feeds
     */
    async loadSnapshot(): Promise<Snapshot> {
        const raw = await this.source.fetchAll();
        const { datasets, reports } = normalizeDatasets(raw);

        for (const report of Object.values(reports)) {
            const defaulted = Object.entries(report.fieldColumns)
                .filter(([, column]) => column === null)
                .map(([field]) => field);

            if (report.partColumn === null && report.rowCount > 0) {
                availabilityLogger.warn({ dataset: report.dataset, columns: report.columns }, 'No part column found; feed ignored');
            }
            if (defaulted.length > 0 || report.skippedRows > 0) {
                availabilityLogger.debug({
                    dataset: report.dataset,
                    defaultedFields: defaulted,
                    skippedRows: report.skippedRows,
                }, 'Normalization fell back to defaults');
            }
        }

        return { raw, datasets, reports };
    }

    /**
     * Results for the given parts (matched by canonical key), ordered as in the feeds
     */
    async calculate(parts: readonly string[]): Promise<AvailabilityResult[]> {
        const keys = new Set(parts.map(toPartKey).filter(key => key !== ''));
        if (keys.size === 0) {
            throw new ValidationError('No usable part identifiers', { parts });
        }

        const snapshot = await this.loadSnapshot();
        const { datasets } = snapshot;
        const context = this.context();

        if (isBlockedByEmptySources(datasets, context.policy)) {
            this.logEmptySources(datasets);
            return [];
        }

        const requested: NormalizedDatasets = {
            leadTimes: datasets.leadTimes.filter(r => keys.has(r.partKey)),
            transactions: datasets.transactions.filter(r => keys.has(r.partKey)),
            stock: datasets.stock.filter(r => keys.has(r.partKey)),
        };

        const results = this.computeParts(groupByPart(requested), context);
        availabilityLogger.info({ requested: keys.size, found: results.length, today: context.today }, 'Availability calculated');
        return results;
    }

    /**
     * Results for every part present in any feed
     */
    async calculateAll(): Promise<AvailabilityResult[]> {
        const started = Date.now();
        const snapshot = await this.loadSnapshot();
        const { datasets } = snapshot;
        const context = this.context();

        if (isBlockedByEmptySources(datasets, context.policy)) {
            this.logEmptySources(datasets);
            return [];
        }

        const results = this.computeParts(groupByPart(datasets), context);
        availabilityLogger.info({
            parts: results.length,
            leadTimes: datasets.leadTimes.length,
            transactions: datasets.transactions.length,
            stock: datasets.stock.length,
            today: context.today,
            durationMs: Date.now() - started,
        }, 'Availability calculated for all parts');
        return results;
    }

    /**
     * One part with its diagnostics. Unknown parts yield a zero-filled result.
     */
    async debug(part: string): Promise<DebugReport> {
        const partKey = toPartKey(part);
        if (!partKey) {
            throw new ValidationError('Part identifier is empty after normalization', { part });
        }

        const snapshot = await this.loadSnapshot();
        const report = inspectPart(snapshot, part, { part: cleanPartIdentifier(part), partKey }, this.context());
        this.warnOnConflicts(report.result.part, report.diagnostics.window.conflictingDates);
        return report;
    }

    /**
     * Configuration summary; with `deep`, also fetches every feed
     */
    async healthCheck(options: HealthCheckOptions = {}): Promise<HealthStatus> {
        const status: HealthStatus = {
            status: 'ok',
            sourceMode: this.source.mode,
            policy: this.config.policy.name,
            today: this.today(),
            checkedAt: new Date().toISOString(),
            sources: this.source.describe(),
        };

        if (!options.deep) return status;

        try {
            const raw = await this.source.fetchAll();
            status.rowCounts = {
                leadTimes: raw.leadTimes.rows.length,
                transactions: raw.transactions.rows.length,
                stock: raw.stock.rows.length,
            };
        } catch (error) {
            const err = toError(error);
            availabilityLogger.warn({ error: err.message }, 'Deep health check failed');
            status.status = 'unavailable';
            status.error = err.message;
        }
        return status;
    }

    // ----------------------------------------
    // internals
    // ----------------------------------------

    private computeParts(parts: PartInputs[], context: AvailabilityContext): AvailabilityResult[] {
        return parts.map(inputs => {
            const computed = computePartAvailability(inputs, context);
            this.warnOnConflicts(inputs.part, computed.window.conflictingDates);
            return computed.result;
        });
    }

    private warnOnConflicts(part: string, conflictingDates: CalendarDate[]): void {
        if (conflictingDates.length === 0) return;
        availabilityLogger.warn({ part, conflictingDates }, 'Lead-time documents disagree on the window end');
    }

    private logEmptySources(datasets: NormalizedDatasets): void {
        availabilityLogger.warn({
            policy: this.config.policy.name,
            leadTimes: datasets.leadTimes.length,
            transactions: datasets.transactions.length,
            stock: datasets.stock.length,
        }, 'A feed is empty; policy returns no results');
    }
}
