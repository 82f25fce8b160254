/**
 * Availability Policies
 *
 * The ERP exports were evaluated with diverging rules over time. Instead of
 * letting code paths differ silently, each variant is a named policy and
 * exactly one is active per deployment.
 *
 * Which variant reflects the planners' intent is unresolved; see DESIGN.md.
 */

// ============================================
// TYPES
// ============================================

/**
 * How rows qualify as countable demand/supply:
 * - transfer-supply: every demand counts; supply only for transfer-in
 *   sub-references (ZV-/ZL-) or planned-order commissions (V-)
 * - stock-relevant: demand and supply only for stock-relevant sub-references
 */
export type ClassificationRule = 'transfer-supply' | 'stock-relevant';

/**
 * What happens when one of the three feeds is empty:
 * - lenient: compute over whatever exists
 * - strict: return no results at all
 */
export type EmptySourceHandling = 'lenient' | 'strict';

export interface AvailabilityPolicy {
    name: string;
    classification: ClassificationRule;
    /** Drop commission groups whose demand equals their supply */
    pairingRemoval: boolean;
    emptySources: EmptySourceHandling;
    /** Sub-reference prefixes marking transfer-in supply */
    transferSubReferencePrefixes: readonly string[];
    /** Commission-number prefixes marking planned orders counted as supply */
    plannedOrderCommissionPrefixes: readonly string[];
    /** Sub-reference prefixes marking stock-relevant rows */
    stockRelevantPrefixes: readonly string[];
}

// ============================================
// PRESETS
// ============================================

const TRANSFER_PREFIXES = ['ZV-', 'ZL-'] as const;
const PLANNED_ORDER_PREFIXES = ['V-'] as const;
const STOCK_RELEVANT_PREFIXES = ['LR-'] as const;

export const AVAILABILITY_POLICY_NAMES = [
    'transfer-supply',
    'transfer-supply-unpaired',
    'transfer-supply-strict',
    'stock-relevant',
] as const;

export type AvailabilityPolicyName = (typeof AVAILABILITY_POLICY_NAMES)[number];

export const AVAILABILITY_POLICIES: Record<AvailabilityPolicyName, AvailabilityPolicy> = {
    /** Default: transfer-in supply, transfer pairs removed, partial feeds allowed */
    'transfer-supply': {
        name: 'transfer-supply',
        classification: 'transfer-supply',
        pairingRemoval: true,
        emptySources: 'lenient',
        transferSubReferencePrefixes: TRANSFER_PREFIXES,
        plannedOrderCommissionPrefixes: PLANNED_ORDER_PREFIXES,
        stockRelevantPrefixes: STOCK_RELEVANT_PREFIXES,
    },
    /** Same classification without pairing removal */
    'transfer-supply-unpaired': {
        name: 'transfer-supply-unpaired',
        classification: 'transfer-supply',
        pairingRemoval: false,
        emptySources: 'lenient',
        transferSubReferencePrefixes: TRANSFER_PREFIXES,
        plannedOrderCommissionPrefixes: PLANNED_ORDER_PREFIXES,
        stockRelevantPrefixes: STOCK_RELEVANT_PREFIXES,
    },
    /** Refuses to answer when any feed is empty */
    'transfer-supply-strict': {
        name: 'transfer-supply-strict',
        classification: 'transfer-supply',
        pairingRemoval: true,
        emptySources: 'strict',
        transferSubReferencePrefixes: TRANSFER_PREFIXES,
        plannedOrderCommissionPrefixes: PLANNED_ORDER_PREFIXES,
        stockRelevantPrefixes: STOCK_RELEVANT_PREFIXES,
    },
    'stock-relevant': {
        name: 'stock-relevant',
        classification: 'stock-relevant',
        pairingRemoval: true,
        emptySources: 'lenient',
        transferSubReferencePrefixes: TRANSFER_PREFIXES,
        plannedOrderCommissionPrefixes: PLANNED_ORDER_PREFIXES,
        stockRelevantPrefixes: STOCK_RELEVANT_PREFIXES,
    },
};

export const DEFAULT_AVAILABILITY_POLICY: AvailabilityPolicy = AVAILABILITY_POLICIES['transfer-supply'];

export function isAvailabilityPolicyName(value: string): value is AvailabilityPolicyName {
    return AVAILABILITY_POLICY_NAMES.some(name => name === value);
}

/**
 * Look up a preset, optionally overriding individual settings
 */
export function getAvailabilityPolicy(
    name: AvailabilityPolicyName,
    overrides: Partial<Omit<AvailabilityPolicy, 'name'>> = {},
): AvailabilityPolicy {
    return { ...AVAILABILITY_POLICIES[name], ...overrides };
}
