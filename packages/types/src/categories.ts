/**
 * Default transaction categories
 *
 * The ledger accepts any category string. This list only drives the
 * category picker offered by clients, which is why it lives here and not
 * in @kasbook/core.
 */

export const DEFAULT_CATEGORIES = [
  'Food',
  'Transport',
  'Entertainment',
  'Bills',
  'Salary',
  'Other',
] as const;
