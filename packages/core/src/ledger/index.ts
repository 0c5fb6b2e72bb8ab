/**
 * Ledger Domain
 *
 * Exports the ledger store, file repository, codec, errors, and types.
 */

export { LedgerStore } from './ledger-store.js';

export { LedgerFileRepository } from './ledger-repository.js';
export type { LedgerRepository } from './ledger-repository.js';

export {
  parseLedger,
  parseAmount,
  formatAmount,
  serializeLedger,
  serializeRecord,
} from './ledger-codec.js';

export {
  LedgerError,
  RecordIndexOutOfRangeError,
  InvalidRecordError,
  InvalidSearchFiltersError,
} from './ledger-errors.js';

export {
  FIELD_LABELS,
  FIELD_ORDER,
  BLOCK_DELIMITER,
  FIELD_SEPARATOR,
  INCOME_CATEGORY,
  EXPENSE_CATEGORY,
} from './ledger-types.js';
export type {
  LedgerField,
  FinanceSummary,
  ParseIssue,
  ParseIssueKind,
  ParseResult,
  MutationResult,
} from './ledger-types.js';
