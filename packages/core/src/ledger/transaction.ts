/**
 * Transaction factory
 *
 * The only place a Transaction is built, so the amount and type rules are
 * checked once instead of at every call site.
 */

import { InvalidAmountError, InvalidTypeError } from './ledger-errors.js';
import { TRANSACTION_TYPES } from './ledger-types.js';
import type {
  LedgerResult,
  NewTransactionInput,
  Transaction,
  TransactionType,
} from './ledger-types.js';

export function isTransactionType(value: string): value is TransactionType {
  return (TRANSACTION_TYPES as readonly string[]).includes(value);
}

/**
 * Validate input and build a frozen Transaction
 *
 * Checks run in order: amount first, then type. Date, description and
 * category are kept exactly as given.
 */
export function createTransaction(
  input: NewTransactionInput
): LedgerResult<Transaction, InvalidAmountError | InvalidTypeError> {
  const { date, description, amount, category, type } = input;

  // Rejects NaN and Infinity too
  if (!Number.isFinite(amount) || amount <= 0) {
    return { success: false, error: new InvalidAmountError(amount) };
  }

  if (!isTransactionType(type)) {
    return { success: false, error: new InvalidTypeError(type) };
  }

  const transaction: Transaction = Object.freeze({ date, description, amount, category, type });
  return { success: true, data: transaction };
}

/**
 * Signed contribution of a transaction to the balance
 */
export function signedAmount(transaction: Transaction): number {
  return transaction.type === 'Income' ? transaction.amount : -transaction.amount;
}
