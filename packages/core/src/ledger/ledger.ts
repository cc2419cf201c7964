/**
 * Ledger
 *
 * In-memory, ordered record of transactions for a single session.
 * Entries keep insertion order; a transaction's index is its position in
 * that order and shifts down when an earlier entry is deleted.
 */

import { IndexOutOfRangeError } from './ledger-errors.js';
import type { InvalidAmountError, InvalidTypeError } from './ledger-errors.js';
import { createTransaction, signedAmount } from './transaction.js';
import type {
  BalancePoint,
  ExpensesByCategory,
  LedgerResult,
  NewTransactionInput,
  Transaction,
  TransactionType,
} from './ledger-types.js';

export class Ledger {
  private transactions: Transaction[] = [];

  /**
   * Build a ledger by adding each entry in order
   *
   * Stops at the first rejected entry.
   */
  static fromTransactions(
    entries: readonly NewTransactionInput[]
  ): LedgerResult<Ledger, InvalidAmountError | InvalidTypeError> {
    const ledger = new Ledger();

    for (const entry of entries) {
      const result = ledger.add(entry);
      if (!result.success) {
        return result;
      }
    }

    return { success: true, data: ledger };
  }

  get size(): number {
    return this.transactions.length;
  }

  /**
   * Append a transaction
   *
   * @returns The stored transaction and its index, or the validation error
   */
  add(
    input: NewTransactionInput
  ): LedgerResult<{ index: number; transaction: Transaction }, InvalidAmountError | InvalidTypeError> {
    const created = createTransaction(input);
    if (!created.success) {
      return created;
    }

    this.transactions.push(created.data);
    return { success: true, data: { index: this.transactions.length - 1, transaction: created.data } };
  }

  /**
   * Remove the transaction at `index`
   *
   * @returns The removed transaction, or IndexOutOfRangeError with the ledger untouched
   */
  delete(index: number): LedgerResult<Transaction, IndexOutOfRangeError> {
    if (!this.isValidIndex(index)) {
      return { success: false, error: new IndexOutOfRangeError(index, this.transactions.length) };
    }

    const [removed] = this.transactions.splice(index, 1);
    if (!removed) {
      return { success: false, error: new IndexOutOfRangeError(index, this.transactions.length) };
    }
    return { success: true, data: removed };
  }

  at(index: number): Transaction | undefined {
    return this.isValidIndex(index) ? this.transactions[index] : undefined;
  }

  list(): Transaction[] {
    return [...this.transactions];
  }

  /**
   * Drop every transaction
   *
   * @returns How many transactions were removed
   */
  clear(): number {
    const count = this.transactions.length;
    this.transactions = [];
    return count;
  }

  totalIncome(): number {
    return this.sumWhere('Income');
  }

  totalExpenses(): number {
    return this.sumWhere('Expense');
  }

  balance(): number {
    return this.totalIncome() - this.totalExpenses();
  }

  /**
   * Sum expense amounts per category
   *
   * Only categories with at least one expense get a key; keys follow the
   * order in which each category first appears.
   */
  expensesByCategory(): ExpensesByCategory {
    const totals = new Map<string, number>();

    for (const transaction of this.transactions) {
      if (transaction.type !== 'Expense') continue;
      totals.set(transaction.category, (totals.get(transaction.category) ?? 0) + transaction.amount);
    }

    return Object.fromEntries(totals);
  }

  /**
   * Running balance after each transaction, in date order
   *
   * Array.prototype.sort is stable, so entries sharing a date stay in
   * insertion order. One point per transaction, duplicate dates included.
   */
  cumulativeBalanceSeries(): BalancePoint[] {
    const ordered = [...this.transactions].sort((a, b) =>
      a.date < b.date ? -1 : a.date > b.date ? 1 : 0
    );

    let running = 0;
    return ordered.map((transaction) => {
      running += signedAmount(transaction);
      return { date: transaction.date, balance: running };
    });
  }

  private sumWhere(type: TransactionType): number {
    return this.transactions.reduce(
      (total, transaction) => (transaction.type === type ? total + transaction.amount : total),
      0
    );
  }

  private isValidIndex(index: number): boolean {
    return Number.isInteger(index) && index >= 0 && index < this.transactions.length;
  }
}
