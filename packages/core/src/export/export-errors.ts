/**
 * Export Domain Errors
 */

export class CsvFormatError extends Error {
  readonly line: number;

  constructor(line: number, message: string) {
    super(`Line ${line}: ${message}`);
    this.line = line;
    this.name = 'CsvFormatError';
  }
}
