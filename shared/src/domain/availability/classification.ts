/**
 * Classification and pairing rules for in-window transactions
 */

import { PAIRING_TOLERANCE } from '../constants.js';
import type { Transaction } from '../types.js';
import type { AvailabilityPolicy } from './policies.js';

export interface CountedQuantities {
    demand: number;
    supply: number;
}

function hasPrefix(value: string, prefixes: readonly string[]): boolean {
    const normalized = value.trim().toUpperCase();
    return prefixes.some(prefix => {
        const p = prefix.trim().toUpperCase();
        return p !== '' && normalized.startsWith(p);
    });
}

export function isTransferIn(tx: Transaction, policy: AvailabilityPolicy): boolean {
    return hasPrefix(tx.subReference, policy.transferSubReferencePrefixes);
}

export function isPlannedOrder(tx: Transaction, policy: AvailabilityPolicy): boolean {
    return hasPrefix(tx.commissionNumber, policy.plannedOrderCommissionPrefixes);
}

export function isStockRelevant(tx: Transaction, policy: AvailabilityPolicy): boolean {
    return hasPrefix(tx.subReference, policy.stockRelevantPrefixes);
}

/**
 * Quantities of a transaction that count towards the part's totals
 */
export function classifyTransaction(tx: Transaction, policy: AvailabilityPolicy): CountedQuantities {
    switch (policy.classification) {
        case 'transfer-supply': {
            const supplyCounts = isTransferIn(tx, policy) || isPlannedOrder(tx, policy);
            return {
                demand: tx.demandQuantity,
                supply: supplyCounts ? tx.supplyQuantity : 0,
            };
        }
        case 'stock-relevant': {
            const relevant = isStockRelevant(tx, policy);
            return {
                demand: relevant ? tx.demandQuantity : 0,
                supply: relevant ? tx.supplyQuantity : 0,
            };
        }
    }
}

/**
 * Commission numbers whose rows cancel out: total demand equals total supply
 * and both are positive. Blank commission numbers never form a group.
 */
export function findPairedCommissions(transactions: readonly Transaction[]): Set<string> {
    const totals = new Map<string, CountedQuantities>();
    for (const tx of transactions) {
        const key = tx.commissionNumber.trim();
        if (!key) continue;
        const total = totals.get(key) ?? { demand: 0, supply: 0 };
        total.demand += tx.demandQuantity;
        total.supply += tx.supplyQuantity;
        totals.set(key, total);
    }

    const paired = new Set<string>();
    for (const [key, total] of totals) {
        if (total.demand > 0 && total.supply > 0 && Math.abs(total.demand - total.supply) < PAIRING_TOLERANCE) {
            paired.add(key);
        }
    }
    return paired;
}
