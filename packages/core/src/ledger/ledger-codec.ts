/**
 * Ledger Codec
 *
 * Converts between the block-based ledger file format and records.
 *
 *   Date: 2024-01-15
 *   Category: Expense
 *   Amount: 12.5
 *   Description: Lunch
 *   ---
 *
 * Reading never throws: lines and blocks that cannot be read are skipped
 * and reported as issues.
 */

import type { LedgerRecord } from '@pocket-ledger/types';
import {
  BLOCK_DELIMITER,
  FIELD_LABELS,
  FIELD_ORDER,
  FIELD_SEPARATOR,
} from './ledger-types.js';
import type { ParseIssue, ParseResult } from './ledger-types.js';

const DECIMAL_PATTERN = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

/**
 * Parse an amount written as a decimal number
 *
 * @returns The number, or null when the text is not a finite decimal
 */
export function parseAmount(text: string): number | null {
  const trimmed = text.trim();
  if (!DECIMAL_PATTERN.test(trimmed)) {
    return null;
  }
  const value = Number(trimmed);
  return Number.isFinite(value) ? value : null;
}

export function formatAmount(amount: number): string {
  return String(amount);
}

/**
 * Split a trimmed line into key and value on the first separator.
 * A bare `Key:` (what an empty value trims down to) yields an empty value.
 */
function splitLine(line: string): [key: string, value: string] | null {
  const separatorIndex = line.indexOf(FIELD_SEPARATOR);
  if (separatorIndex !== -1) {
    return [
      line.slice(0, separatorIndex).trim(),
      line.slice(separatorIndex + FIELD_SEPARATOR.length).trim(),
    ];
  }
  if (line.endsWith(':') && line.length > 1) {
    return [line.slice(0, -1).trim(), ''];
  }
  return null;
}

function buildRecord(
  fields: Map<string, string>,
  block: number
): { record: LedgerRecord } | { issue: ParseIssue } {
  const date = fields.get(FIELD_LABELS.date);
  const category = fields.get(FIELD_LABELS.category);
  const amountText = fields.get(FIELD_LABELS.amount);
  const description = fields.get(FIELD_LABELS.description);

  if (
    date === undefined ||
    category === undefined ||
    amountText === undefined ||
    description === undefined
  ) {
    const missing =
      FIELD_ORDER.map((field) => FIELD_LABELS[field]).find((label) => !fields.has(label)) ??
      FIELD_LABELS.date;
    return {
      issue: {
        kind: 'missing-field',
        block,
        field: missing,
        message: `Block ${block} is missing the "${missing}" field`,
      },
    };
  }

  const amount = parseAmount(amountText);
  if (amount === null) {
    return {
      issue: {
        kind: 'invalid-amount',
        block,
        field: FIELD_LABELS.amount,
        message: `Block ${block} has a non-numeric amount: "${amountText}"`,
      },
    };
  }

  return { record: { date, category, amount, description } };
}

/**
 * Parse the text of a ledger file
 *
 * @param content - Full file content
 * @returns Records that could be read, in file order, plus the issues found
 */
export function parseLedger(content: string): ParseResult {
  const records: LedgerRecord[] = [];
  const issues: ParseIssue[] = [];

  let block = 1;
  let fields = new Map<string, string>();
  let hasLines = false;

  const closeBlock = () => {
    if (!hasLines) {
      return;
    }
    const result = buildRecord(fields, block);
    if ('record' in result) {
      records.push(result.record);
    } else {
      issues.push(result.issue);
    }
    block += 1;
    fields = new Map<string, string>();
    hasLines = false;
  };

  for (const rawLine of content.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (line === BLOCK_DELIMITER) {
      closeBlock();
      continue;
    }
    if (!line) {
      continue;
    }

    hasLines = true;
    const pair = splitLine(line);
    if (!pair) {
      issues.push({
        kind: 'unparsable-line',
        block,
        line,
        message: `Cannot parse line in block ${block}: "${line}"`,
      });
      continue;
    }
    fields.set(pair[0], pair[1]);
  }
  closeBlock();

  return { records, issues };
}

/**
 * Serialize one record as a block, delimiter line included
 */
export function serializeRecord(record: LedgerRecord): string {
  const lines = FIELD_ORDER.map((field) => {
    const value = field === 'amount' ? formatAmount(record.amount) : record[field];
    return `${FIELD_LABELS[field]}${FIELD_SEPARATOR}${value}`;
  });
  lines.push(BLOCK_DELIMITER);
  return `${lines.join('\n')}\n`;
}

/**
 * Serialize a full ledger; an empty ledger is an empty string
 */
export function serializeLedger(records: readonly LedgerRecord[]): string {
  return records.map(serializeRecord).join('');
}
