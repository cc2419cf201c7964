/**
 * Ledger Domain
 *
 * Exports the ledger, transaction factory, errors, and types.
 */

export { Ledger } from './ledger.js';

export { createTransaction, isTransactionType, signedAmount } from './transaction.js';

export {
  LedgerError,
  InvalidAmountError,
  InvalidTypeError,
  IndexOutOfRangeError,
} from './ledger-errors.js';
export type { LedgerErrorCode } from './ledger-errors.js';

export { TRANSACTION_TYPES } from './ledger-types.js';
export type {
  BalancePoint,
  CalendarDate,
  ExpensesByCategory,
  LedgerResult,
  NewTransactionInput,
  Transaction,
  TransactionType,
} from './ledger-types.js';
