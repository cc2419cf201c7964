import type { LedgerError } from '@kasbook/core';

/**
 * HTTP status for a ledger validation failure
 */
export function ledgerErrorStatus(error: LedgerError): 400 | 404 {
  switch (error.code) {
    case 'IndexOutOfRange':
      return 404;
    case 'InvalidAmount':
    case 'InvalidType':
      return 400;
  }
}

export function ledgerErrorBody(error: LedgerError) {
  return { error: error.message, code: error.code };
}
