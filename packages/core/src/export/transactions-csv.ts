/**
 * Transaction CSV export/import
 *
 * Format: header `date,description,amount,category,type`, one row per
 * transaction, `\n` line endings. Fields containing a comma, quote, CR or
 * LF are quoted with inner quotes doubled.
 */

import { Ledger } from '../ledger/ledger.js';
import { createTransaction } from '../ledger/transaction.js';
import type { Transaction } from '../ledger/ledger-types.js';
import { CsvFormatError } from './export-errors.js';

const CSV_COLUMNS = ['date', 'description', 'amount', 'category', 'type'] as const;

export const CSV_HEADER = CSV_COLUMNS.join(',');

/**
 * Ledger dates must be real YYYY-MM-DD dates so that string order is
 * calendar order
 */
function isCalendarDate(value: string): boolean {
  if (!/^\d{4}-\d{2}-\d{2}$/.test(value)) {
    return false;
  }
  const parsed = new Date(`${value}T00:00:00Z`);
  return !Number.isNaN(parsed.getTime()) && parsed.toISOString().startsWith(value);
}

const csvEscape = (value: string) => {
  if (value.includes('"') || value.includes(',') || value.includes('\n') || value.includes('\r')) {
    return `"${value.replaceAll('"', '""')}"`;
  }
  return value;
};

/**
 * Serialise transactions in the given order
 */
export function transactionsToCsv(transactions: readonly Transaction[]): string {
  const lines = [CSV_HEADER];

  for (const transaction of transactions) {
    lines.push(
      [
        csvEscape(transaction.date),
        csvEscape(transaction.description),
        String(transaction.amount),
        csvEscape(transaction.category),
        csvEscape(transaction.type),
      ].join(',')
    );
  }

  return `${lines.join('\n')}\n`;
}

interface CsvRecord {
  line: number;
  fields: string[];
}

/**
 * Split CSV text into records, honouring quoted fields that span lines
 */
function readRecords(text: string): CsvRecord[] {
  const records: CsvRecord[] = [];
  let fields: string[] = [];
  let field = '';
  let inQuotes = false;
  let line = 1;
  let recordLine = 1;

  const endRecord = () => {
    fields.push(field);
    // A blank line is a single empty field; skip it
    if (fields.length > 1 || fields[0] !== '') {
      records.push({ line: recordLine, fields });
    }
    fields = [];
    field = '';
  };

  for (let i = 0; i < text.length; i += 1) {
    const char = text.charAt(i);

    if (inQuotes) {
      if (char === '"') {
        if (text.charAt(i + 1) === '"') {
          field += '"';
          i += 1;
        } else {
          inQuotes = false;
        }
      } else {
        if (char === '\n') line += 1;
        field += char;
      }
      continue;
    }

    if (char === '"' && field === '') {
      inQuotes = true;
    } else if (char === ',') {
      fields.push(field);
      field = '';
    } else if (char === '\n' || char === '\r') {
      if (char === '\r' && text.charAt(i + 1) === '\n') i += 1;
      endRecord();
      line += 1;
      recordLine = line;
    } else {
      field += char;
    }
  }

  if (inQuotes) {
    throw new CsvFormatError(recordLine, 'unterminated quoted field');
  }
  if (field !== '' || fields.length > 0) {
    endRecord();
  }

  return records;
}

/**
 * Parse exported CSV back into transactions
 *
 * @throws {CsvFormatError} On a wrong header, a row with the wrong number of
 * fields, a date that is not YYYY-MM-DD, a non-numeric amount, or a row the
 * ledger would reject
 */
export function parseTransactionsCsv(text: string): Transaction[] {
  const records = readRecords(text.startsWith('\uFEFF') ? text.slice(1) : text);
  const [header, ...rows] = records;

  if (!header || header.fields.join(',') !== CSV_HEADER) {
    throw new CsvFormatError(header?.line ?? 1, `expected header "${CSV_HEADER}"`);
  }

  return rows.map(({ line, fields }) => {
    const [date, description, rawAmount, category, type] = fields;
    if (
      fields.length !== CSV_COLUMNS.length ||
      date === undefined ||
      description === undefined ||
      rawAmount === undefined ||
      category === undefined ||
      type === undefined
    ) {
      throw new CsvFormatError(line, `expected ${CSV_COLUMNS.length} fields, got ${fields.length}`);
    }

    if (!isCalendarDate(date)) {
      throw new CsvFormatError(line, `date "${date}" is not a YYYY-MM-DD calendar date`);
    }

    const amount = rawAmount.trim() === '' ? Number.NaN : Number(rawAmount);
    if (Number.isNaN(amount)) {
      throw new CsvFormatError(line, `amount "${rawAmount}" is not a number`);
    }

    const created = createTransaction({ date, description, amount, category, type });
    if (!created.success) {
      throw new CsvFormatError(line, created.error.message);
    }
    return created.data;
  });
}

/**
 * Rebuild a ledger from exported CSV, keeping row order
 *
 * @throws {CsvFormatError} See parseTransactionsCsv
 */
export function ledgerFromCsv(text: string): Ledger {
  const rebuilt = Ledger.fromTransactions(parseTransactionsCsv(text));
  if (!rebuilt.success) {
    // Rows were already validated by parseTransactionsCsv
    throw rebuilt.error;
  }
  return rebuilt.data;
}
