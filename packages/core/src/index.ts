/**
 * @pocket-ledger/core - Domain logic for Pocket Ledger
 *
 * Record persistence and queries over a flat-file ledger. Consumed by the
 * interactive CLI.
 */

export * from './ledger/index.js';
export type { LedgerRecord, SearchFilters } from '@pocket-ledger/types';
export { LedgerRecordSchema, SearchFiltersSchema } from '@pocket-ledger/types';
