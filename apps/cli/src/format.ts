import { BLOCK_DELIMITER, FIELD_LABELS, formatAmount } from '@pocket-ledger/core';
import type { FinanceSummary, LedgerRecord } from '@pocket-ledger/core';

/**
 * Lines shown for one record; same layout as a block in the ledger file
 */
export function formatRecord(record: LedgerRecord): string[] {
  return [
    `${FIELD_LABELS.date}: ${record.date}`,
    `${FIELD_LABELS.category}: ${record.category}`,
    `${FIELD_LABELS.amount}: ${formatAmount(record.amount)}`,
    `${FIELD_LABELS.description}: ${record.description}`,
    BLOCK_DELIMITER,
  ];
}

export function formatSummary(summary: FinanceSummary): string[] {
  return [
    `Total income: ${formatAmount(summary.totalIncome)}`,
    `Total expense: ${formatAmount(summary.totalExpense)}`,
    `Balance: ${formatAmount(summary.balance)}`,
  ];
}
