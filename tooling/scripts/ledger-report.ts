#!/usr/bin/env tsx
/**
 * Print a report for an exported transactions CSV
 *
 * Usage: tsx tooling/scripts/ledger-report.ts <transaksi.csv>
 */

import { readFileSync } from 'node:fs';
import { CsvFormatError, ledgerFromCsv } from '@kasbook/core';
import { renderLedgerReport } from './lib/render-ledger-report.js';

const ARGS = process.argv.slice(2);
const FILE = ARGS[0];

if (!FILE || ARGS.length > 1) {
  console.error('Usage: tsx tooling/scripts/ledger-report.ts <transaksi.csv>');
  process.exit(1);
}

function main(file: string) {
  let text: string;
  try {
    text = readFileSync(file, 'utf8');
  } catch (error) {
    console.error(`Error: cannot read ${file}: ${error instanceof Error ? error.message : String(error)}`);
    process.exit(1);
  }

  try {
    const ledger = ledgerFromCsv(text);
    console.log(renderLedgerReport(ledger).join('\n'));
  } catch (error) {
    if (error instanceof CsvFormatError) {
      console.error(`Error: ${file}: ${error.message}`);
      process.exit(1);
    }
    throw error;
  }
}

main(FILE);
