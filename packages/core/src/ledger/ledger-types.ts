/**
 * Ledger Domain Types
 *
 * File vocabulary and result shapes for the ledger store.
 */

import type { LedgerRecord } from '@pocket-ledger/types';
import type { RecordIndexOutOfRangeError } from './ledger-errors.js';

/**
 * Labels written in front of each value in the ledger file.
 * Matched exactly and case-sensitively when reading; not user-configurable.
 */
export const FIELD_LABELS = {
  date: 'Date',
  category: 'Category',
  amount: 'Amount',
  description: 'Description',
} as const satisfies Record<keyof LedgerRecord, string>;

export type LedgerField = keyof typeof FIELD_LABELS;

/** Order in which fields are written within a block */
export const FIELD_ORDER: readonly LedgerField[] = ['date', 'category', 'amount', 'description'];

/** Line that terminates every block */
export const BLOCK_DELIMITER = '---';

/** Key/value separator within a block line */
export const FIELD_SEPARATOR = ': ';

export const INCOME_CATEGORY = 'Income';
export const EXPENSE_CATEGORY = 'Expense';

export interface FinanceSummary {
  balance: number;
  totalIncome: number;
  totalExpense: number;
}

export type ParseIssueKind = 'unparsable-line' | 'missing-field' | 'invalid-amount';

/**
 * A problem found while reading the ledger file.
 * The offending line (or block) is skipped; reading carries on.
 */
export interface ParseIssue {
  kind: ParseIssueKind;
  /** 1-based position of the block among non-empty blocks */
  block: number;
  message: string;
  line?: string;
  field?: string;
}

export interface ParseResult {
  records: LedgerRecord[];
  issues: ParseIssue[];
}

/**
 * Outcome of a positional mutation. On success `record` is the record
 * that was replaced or removed.
 */
export type MutationResult =
  | { ok: true; record: LedgerRecord }
  | { ok: false; error: RecordIndexOutOfRangeError };
