/**
 * Debug Inspector
 *
 * Re-runs the calculation for one part over a loaded snapshot and explains it:
 * which window applied, which transactions counted and why, and which raw rows
 * of each feed the part was built from. Read-only.
 */

import {
    computePartAvailability,
    inputsForPart,
    isBlockedByEmptySources,
    mapDatasets,
    type AvailabilityContext,
    type AvailabilityPolicy,
    type AvailabilityResult,
    type CalendarDate,
    type DatasetName,
    type LeadTimeWindow,
    type NormalizationReport,
    type PartRef,
    type RawRow,
    type TransactionOutcome,
    type TransactionTrace,
} from '@bestand/shared';
import type { Snapshot } from './snapshot.js';

// ============================================
// TYPES
// ============================================

export interface RawRowMatch {
    /** Position in the raw feed */
    index: number;
    row: RawRow;
}

export interface DebugDiagnostics {
    /** Identifier as requested */
    query: string;
    part: string;
    partKey: string;
    today: CalendarDate;
    policy: AvailabilityPolicy;
    /** Matching normalized rows per feed; all zero for an unknown part */
    found: Record<DatasetName, number>;
    /** True when the active policy returns no results for this snapshot */
    blockedByEmptySources: boolean;
    window: LeadTimeWindow;
    /** Dated transactions up to the window end, with their outcome */
    withinWindow: TransactionTrace[];
    /** Count of the remaining transactions per exclusion reason */
    excluded: Partial<Record<TransactionOutcome, number>>;
    pairedCommissions: string[];
    /** Raw rows the part was built from, before normalization */
    rawRows: Record<DatasetName, RawRowMatch[]>;
    /** Columns discovered in each feed */
    columns: Record<DatasetName, string[]>;
    normalization: Record<DatasetName, NormalizationReport>;
}

export interface DebugReport {
    result: AvailabilityResult;
    diagnostics: DebugDiagnostics;
}

// ============================================
// INSPECTION
// ============================================

function isWithinWindow(trace: TransactionTrace): boolean {
    return trace.outcome !== 'no-date' && trace.outcome !== 'outside-window';
}

export function inspectPart(
    snapshot: Snapshot,
    query: string,
    identity: { part: string; partKey: string },
    context: AvailabilityContext,
): DebugReport {
    const { datasets, reports, raw } = snapshot;
    const { part, partKey } = identity;

    const inputs = inputsForPart(datasets, partKey, part);
    const computed = computePartAvailability(inputs, context);

    const excluded: Partial<Record<TransactionOutcome, number>> = {};
    for (const trace of computed.trace) {
        if (isWithinWindow(trace)) continue;
        excluded[trace.outcome] = (excluded[trace.outcome] ?? 0) + 1;
    }

    const matches = mapDatasets(name => {
        const records: readonly PartRef[] = datasets[name];
        return records.filter(record => record.partKey === partKey);
    });
    const found = mapDatasets(name => matches[name].length);
    const rawRows = mapDatasets(name => matches[name].map(record => ({
        index: record.sourceIndex,
        row: raw[name].rows[record.sourceIndex],
    })));
    const columns = mapDatasets(name => reports[name].columns);

    return {
        result: computed.result,
        diagnostics: {
            query,
            part: computed.result.part,
            partKey,
            today: context.today,
            policy: context.policy,
            found,
            blockedByEmptySources: isBlockedByEmptySources(datasets, context.policy),
            window: computed.window,
            withinWindow: computed.trace.filter(isWithinWindow),
            excluded,
            pairedCommissions: computed.pairedCommissions,
            rawRows,
            columns,
            normalization: reports,
        },
    };
}
