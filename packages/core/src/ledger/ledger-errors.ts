/**
 * Ledger Domain Errors
 *
 * Validation failures reported by ledger mutations.
 * Returned inside a LedgerResult rather than thrown; the API maps them to HTTP status codes.
 */

export type LedgerErrorCode = 'InvalidAmount' | 'InvalidType' | 'IndexOutOfRange';

export class LedgerError extends Error {
  readonly code: LedgerErrorCode;

  constructor(code: LedgerErrorCode, message: string) {
    super(message);
    this.code = code;
    this.name = 'LedgerError';
  }
}

export class InvalidAmountError extends LedgerError {
  constructor(amount: number) {
    super('InvalidAmount', `Amount must be greater than 0, got ${amount}`);
    this.name = 'InvalidAmountError';
  }
}

export class InvalidTypeError extends LedgerError {
  constructor(type: string) {
    super('InvalidType', `Transaction type must be Income or Expense, got "${type}"`);
    this.name = 'InvalidTypeError';
  }
}

export class IndexOutOfRangeError extends LedgerError {
  constructor(index: number, length: number) {
    super(
      'IndexOutOfRange',
      length === 0
        ? `No transaction at index ${index}: ledger is empty`
        : `No transaction at index ${index}: valid range is 0-${length - 1}`
    );
    this.name = 'IndexOutOfRangeError';
  }
}
