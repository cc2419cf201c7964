/**
 * @kasbook/core - Domain logic for Kasbook
 *
 * This package contains the ledger model, budget analysis, and CSV export.
 * Everything here is framework-free and consumed by the API and tooling.
 */

export * from './ledger/index.js';
export * from './budgets/index.js';
export * from './export/index.js';
export * from './format/index.js';
