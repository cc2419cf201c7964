/**
 * Export Domain
 */

export {
  CSV_HEADER,
  transactionsToCsv,
  parseTransactionsCsv,
  ledgerFromCsv,
} from './transactions-csv.js';

export { CsvFormatError } from './export-errors.js';
