/**
 * Ledger Domain Types
 *
 * Type definitions for ledger entries and query results.
 */

import type { LedgerError } from './ledger-errors.js';

export const TRANSACTION_TYPES = ['Income', 'Expense'] as const;

export type TransactionType = (typeof TRANSACTION_TYPES)[number];

/**
 * Calendar date formatted as YYYY-MM-DD
 */
export type CalendarDate = string;

/**
 * A recorded income or expense. Frozen once created.
 */
export interface Transaction {
  readonly date: CalendarDate;
  readonly description: string;
  readonly amount: number;
  readonly category: string;
  readonly type: TransactionType;
}

/**
 * Input for a new ledger entry
 *
 * `type` is a plain string because callers pass user input straight
 * through; the ledger narrows it.
 */
export interface NewTransactionInput {
  date: CalendarDate;
  description: string;
  amount: number;
  category: string;
  type: string;
}

export interface BalancePoint {
  date: CalendarDate;
  balance: number;
}

export type ExpensesByCategory = Record<string, number>;

/**
 * Outcome of a ledger mutation. Expected validation failures come back as
 * `success: false` instead of being thrown.
 */
export type LedgerResult<T, E extends LedgerError = LedgerError> =
  | { success: true; data: T }
  | { success: false; error: E };
