/**
 * Constants for the Intercompany Reconciliation Matching Engine
 *
 * Both sides of an intercompany transfer are booked independently, so the
 * two records rarely agree to the cent or to the day. These tolerances
 * define how far apart they may drift and still be considered the same transfer.
 */

import { Decimal } from 'decimal.js';

// ============================================
// PROVIDERS
// ============================================

/**
 * Accounting systems transactions are ingested from.
 * A matched pair always has one record from each.
 */
export const PROVIDERS = ['xero', 'quickbooks'] as const;

// ============================================
// STATUSES
// ============================================

/**
 * Reconciliation lifecycle. `matched` is terminal.
 */
export const RECONCILIATION_STATUSES = ['pending', 'matched'] as const;

// ============================================
// TOLERANCES
// ============================================

/**
 * Maximum absolute amount difference between the two sides (inclusive).
 *
 * - 100.00 vs 100.01 → matches
 * - 100.00 vs 100.02 → does not match
 */
export const AMOUNT_TOLERANCE = new Decimal('0.01');

/**
 * Maximum absolute calendar-day difference between the two sides (inclusive).
 *
 * - 2024-01-01 vs 2024-01-04 → matches
 * - 2024-01-01 vs 2024-01-05 → does not match
 */
export const DATE_WINDOW_DAYS = 3;

/** Precision amounts are stored and compared at */
export const AMOUNT_DECIMAL_PLACES = 2;
