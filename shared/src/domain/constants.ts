/**
 * Domain Constants
 *
 * Source-format constants shared by the normalizer, the resolver and the server.
 * Change here → takes effect everywhere.
 */

/**
 * Token identifying the part column in every feed ("Teil", "Teilenummer", "\"Teil\"").
 * An exact match wins over a column that merely contains the token.
 */
export const PART_COLUMN_TOKEN = 'teil';

/**
 * Canonical column names used when a feed has to be rebuilt (malformed stock export)
 */
export const CANONICAL_COLUMNS = {
  part: 'Teil',
  stockQuantity: 'Anzahl',
} as const;

/**
 * Column aliases per dataset, in priority order. First alias present wins.
 * Lookup is case-insensitive on cleaned headers.
 */
export const LEAD_TIME_COLUMNS = {
  leadTimeDays: ['WBZ', 'Wiederbeschaffungszeit', 'LeadTime', 'LeadTimeDays'],
} as const;

export const TRANSACTION_COLUMNS = {
  date: ['Termin', 'Datum', 'Date'],
  demandQuantity: ['Bedarfsmenge', 'Bedarf', 'Demand'],
  supplyQuantity: ['Deckungsmenge', 'Deckung', 'Supply'],
  commissionNumber: ['KommNr', 'Kommissionsnummer', 'CommissionNumber'],
  subReference: ['SubRefObj', 'SubRef', 'SubReference'],
  bookingInfo: ['Buchungsinfo', 'Buchungstext', 'Info', 'Text', 'BookingInfo'],
} as const;

export const STOCK_COLUMNS = {
  quantity: ['Anzahl', 'Bestand', 'Menge', 'Quantity'],
} as const;

/**
 * Lead-time override markers searched in the transaction booking info.
 *
 * A row mentioning the lead-time document supplies the window end date itself.
 * Matching is a case-insensitive substring heuristic on free text.
 */
export const LEAD_TIME_MARKERS = {
  /** Marks a lead-time document row */
  document: 'WBZ-Beleg',
  /** Sub-variant preferred when several document rows exist */
  preferred: 'DisB 0',
} as const;

/** Demand/supply totals closer than this are treated as equal when pairing */
export const PAIRING_TOLERANCE = 1e-9;
