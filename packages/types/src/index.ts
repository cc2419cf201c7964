export * from './categories.js';
export * from './transaction.schema.js';
export * from './budget.schema.js';
