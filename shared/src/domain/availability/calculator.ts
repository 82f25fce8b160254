/**
 * Availability Calculator — Pure Functions
 *
 * Heute frei verfügbar = Bestand (heute) - kum. Bedarfsmenge + kum. Deckungsmenge
 *
 * Per part:
 * 1. resolve the window end (Ende WBZ)
 * 2. drop undated rows and rows after the window end
 * 3. drop commission groups that pair out (policy)
 * 4. count demand/supply per classification rule (policy)
 * 5. sum and derive availableToday
 *
 * No I/O. Every step is traced so the debug view can show why a row counted.
 */

import { toUnixSeconds, type CalendarDate } from '../../utils/dateHelpers.js';
import { resolveLeadTimeWindow, type LeadTimeMarkers, type LeadTimeWindow } from '../leadTime.js';
import type { AvailabilityResult, NormalizedDatasets, Transaction } from '../types.js';
import { classifyTransaction, findPairedCommissions } from './classification.js';
import type { AvailabilityPolicy } from './policies.js';

// ============================================
// TYPES
// ============================================

export interface AvailabilityContext {
    today: CalendarDate;
    policy: AvailabilityPolicy;
    markers?: LeadTimeMarkers;
}

/** Everything the calculation needs for one part */
export interface PartInputs {
    part: string;
    partKey: string;
    leadTimeDays: number;
    stockOnHand: number;
    transactions: Transaction[];
}

export type TransactionOutcome =
    | 'no-date'
    | 'outside-window'
    | 'paired'
    | 'counted'
    | 'not-classified';

export interface TransactionTrace {
    transaction: Transaction;
    outcome: TransactionOutcome;
    countedDemand: number;
    countedSupply: number;
}

export interface PartAvailability {
    result: AvailabilityResult;
    window: LeadTimeWindow;
    /** One entry per transaction, in source order */
    trace: TransactionTrace[];
    /** Commission numbers excluded as transfer pairs */
    pairedCommissions: string[];
}

// ============================================
// PER-PART CALCULATION
// ============================================

function traceOf(transaction: Transaction, outcome: TransactionOutcome, countedDemand = 0, countedSupply = 0): TransactionTrace {
    return { transaction, outcome, countedDemand, countedSupply };
}

export function computePartAvailability(inputs: PartInputs, context: AvailabilityContext): PartAvailability {
    const { policy } = context;
    const window = resolveLeadTimeWindow({
        today: context.today,
        leadTimeDays: inputs.leadTimeDays,
        transactions: inputs.transactions,
        markers: context.markers,
    });

    const inWindow = inputs.transactions.filter(tx => tx.date !== null && tx.date <= window.endDate);
    const paired = policy.pairingRemoval ? findPairedCommissions(inWindow) : new Set<string>();

    let cumulativeDemand = 0;
    let cumulativeSupply = 0;

    const trace = inputs.transactions.map((tx): TransactionTrace => {
        if (tx.date === null) return traceOf(tx, 'no-date');
        if (tx.date > window.endDate) return traceOf(tx, 'outside-window');
        if (paired.has(tx.commissionNumber.trim())) return traceOf(tx, 'paired');

        const counted = classifyTransaction(tx, policy);
        cumulativeDemand += counted.demand;
        cumulativeSupply += counted.supply;

        const outcome = counted.demand > 0 || counted.supply > 0 ? 'counted' : 'not-classified';
        return traceOf(tx, outcome, counted.demand, counted.supply);
    });

    return {
        result: {
            part: inputs.part,
            partKey: inputs.partKey,
            stockOnHand: inputs.stockOnHand,
            cumulativeDemand,
            cumulativeSupply,
            availableToday: inputs.stockOnHand - cumulativeDemand + cumulativeSupply,
            leadTimeDays: inputs.leadTimeDays,
            leadTimeEndDate: window.endDate,
            leadTimeEndTimestamp: toUnixSeconds(window.endDate),
            leadTimeSource: window.source,
        },
        window,
        trace,
        pairedCommissions: [...paired],
    };
}

// ============================================
// JOINING THE FEEDS
// ============================================

/**
 * Join the three feeds on canonical part key.
 *
 * Every key present in any feed yields one entry (stock order first, then lead
 * times, then transactions). Missing values default to zero. Duplicate stock
 * rows are summed; for duplicate lead-time rows the first wins.
 */
export function groupByPart(datasets: NormalizedDatasets): PartInputs[] {
    const parts = new Map<string, PartInputs>();

    const entry = (partKey: string, part: string): PartInputs => {
        let inputs = parts.get(partKey);
        if (!inputs) {
            inputs = { part, partKey, leadTimeDays: 0, stockOnHand: 0, transactions: [] };
            parts.set(partKey, inputs);
        }
        return inputs;
    };

    for (const record of datasets.stock) {
        entry(record.partKey, record.part).stockOnHand += record.quantity;
    }

    const seenLeadTimes = new Set<string>();
    for (const record of datasets.leadTimes) {
        const inputs = entry(record.partKey, record.part);
        if (seenLeadTimes.has(record.partKey)) continue;
        seenLeadTimes.add(record.partKey);
        inputs.leadTimeDays = record.leadTimeDays;
    }

    for (const tx of datasets.transactions) {
        entry(tx.partKey, tx.part).transactions.push(tx);
    }

    return [...parts.values()];
}

/**
 * True when the policy refuses to compute over this snapshot
 */
export function isBlockedByEmptySources(datasets: NormalizedDatasets, policy: AvailabilityPolicy): boolean {
    if (policy.emptySources === 'lenient') return false;
    return datasets.leadTimes.length === 0 || datasets.transactions.length === 0 || datasets.stock.length === 0;
}

/**
 * Availability for every part in the snapshot
 */
export function calculateAvailability(datasets: NormalizedDatasets, context: AvailabilityContext): AvailabilityResult[] {
    if (isBlockedByEmptySources(datasets, context.policy)) return [];
    return groupByPart(datasets).map(inputs => computePartAvailability(inputs, context).result);
}

/**
 * Inputs for a single part, zero-filled when the part appears nowhere
 */
export function inputsForPart(datasets: NormalizedDatasets, partKey: string, part: string): PartInputs {
    const found = groupByPart({
        leadTimes: datasets.leadTimes.filter(r => r.partKey === partKey),
        transactions: datasets.transactions.filter(r => r.partKey === partKey),
        stock: datasets.stock.filter(r => r.partKey === partKey),
    });
    return found[0] ?? { part, partKey, leadTimeDays: 0, stockOnHand: 0, transactions: [] };
}
