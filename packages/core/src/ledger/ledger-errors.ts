/**
 * Ledger Domain Errors
 *
 * Custom error classes for ledger addressing and record validation failures.
 */

export class LedgerError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'LedgerError';
  }
}

export class RecordIndexOutOfRangeError extends LedgerError {
  readonly index: number;
  readonly size: number;

  constructor(index: number, size: number) {
    super(`No record at index ${index} (ledger holds ${size} record${size === 1 ? '' : 's'})`);
    this.name = 'RecordIndexOutOfRangeError';
    this.index = index;
    this.size = size;
  }
}

export class InvalidRecordError extends LedgerError {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidRecordError';
  }
}

export class InvalidSearchFiltersError extends LedgerError {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidSearchFiltersError';
  }
}
