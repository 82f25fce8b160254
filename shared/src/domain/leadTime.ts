/**
 * Lead-Time Resolver
 *
 * Determines the inclusive end of a part's replenishment window (Ende WBZ).
 *
 * Rules:
 * - default: today + leadTimeDays business days (Mon–Fri)
 * - override: a transaction whose booking info mentions the lead-time document
 *   marker supplies the end date from its own date
 * - several override rows: the preferred sub-variant wins, otherwise the first
 *   in source order; disagreeing dates in that pool are reported as a conflict
 *
 * Marker matching is a substring heuristic on free text, not a contract.
 */

import { addBusinessDays, type CalendarDate } from '../utils/dateHelpers.js';
import { LEAD_TIME_MARKERS } from './constants.js';
import type { LeadTimeSource, Transaction } from './types.js';

// ============================================
// TYPES
// ============================================

export interface LeadTimeMarkers {
    /** Marker identifying a lead-time document row */
    document: string;
    /** Sub-variant preferred among several document rows */
    preferred: string;
}

export interface LeadTimeOverrideCandidate {
    sourceIndex: number;
    date: CalendarDate;
    bookingInfo: string;
    preferred: boolean;
}

export interface LeadTimeWindow {
    /** Inclusive end date of the window */
    endDate: CalendarDate;
    source: LeadTimeSource;
    leadTimeDays: number;
    /** End date the business-day rule yields, whether or not it was used */
    defaultEndDate: CalendarDate;
    /** Source index of the transaction that supplied the override */
    overrideIndex: number | null;
    /** Every dated transaction carrying the document marker */
    candidates: LeadTimeOverrideCandidate[];
    /** Distinct dates among the candidates the choice was made from, when more than one */
    conflictingDates: CalendarDate[];
}

export interface LeadTimeInput {
    today: CalendarDate;
    leadTimeDays: number;
    transactions: readonly Transaction[];
    markers?: LeadTimeMarkers;
}

// ============================================
// RESOLUTION
// ============================================

function containsMarker(text: string, marker: string): boolean {
    const needle = marker.trim().toLowerCase();
    return needle !== '' && text.toLowerCase().includes(needle);
}

/**
 * Dated transactions carrying the lead-time document marker, in source order
 */
export function findOverrideCandidates(
    transactions: readonly Transaction[],
    markers: LeadTimeMarkers = LEAD_TIME_MARKERS,
): LeadTimeOverrideCandidate[] {
    const candidates: LeadTimeOverrideCandidate[] = [];
    for (const tx of transactions) {
        if (!tx.date || !containsMarker(tx.bookingInfo, markers.document)) continue;
        candidates.push({
            sourceIndex: tx.sourceIndex,
            date: tx.date,
            bookingInfo: tx.bookingInfo,
            preferred: containsMarker(tx.bookingInfo, markers.preferred),
        });
    }
    return candidates;
}

export function resolveLeadTimeWindow(input: LeadTimeInput): LeadTimeWindow {
    const { today, leadTimeDays, transactions, markers = LEAD_TIME_MARKERS } = input;
    const defaultEndDate = addBusinessDays(today, leadTimeDays);
    const candidates = findOverrideCandidates(transactions, markers);

    if (candidates.length === 0) {
        return {
            endDate: defaultEndDate,
            source: 'lead-time',
            leadTimeDays,
            defaultEndDate,
            overrideIndex: null,
            candidates,
            conflictingDates: [],
        };
    }

    const preferred = candidates.filter(c => c.preferred);
    const pool = preferred.length > 0 ? preferred : candidates;
    const chosen = pool[0];
    const distinctDates = [...new Set(pool.map(c => c.date))];

    return {
        endDate: chosen.date,
        source: 'override',
        leadTimeDays,
        defaultEndDate,
        overrideIndex: chosen.sourceIndex,
        candidates,
        conflictingDates: distinctDates.length > 1 ? distinctDates : [],
    };
}
