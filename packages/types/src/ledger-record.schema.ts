/**
 * Ledger record schemas
 * Shared by the record store (validation on write) and the CLI (input parsing)
 */

import { z } from "zod";

/**
 * One ledger entry.
 * - date: expected as YYYY-MM-DD, not checked against the calendar
 * - category: free-form; "Income" and "Expense" take part in totals
 * - amount: any finite number, the sign is left to the caller
 * - text fields: a single line each
 */
/**
 * Every field is written on its own line of the ledger file, so text values
 * cannot contain line breaks
 */
const SingleLineSchema = z.string().regex(/^[^\r\n]*$/, "Must not contain line breaks");

export const LedgerRecordSchema = z.object({
  date: SingleLineSchema,
  category: SingleLineSchema,
  amount: z.number().finite("Amount must be a finite number"),
  description: SingleLineSchema,
});

export type LedgerRecord = z.infer<typeof LedgerRecordSchema>;

/**
 * Search filters; an absent field matches every record
 */
export const SearchFiltersSchema = z
  .object({
    category: z.string().optional(),
    date: z.string().optional(),
    amount: z.number().finite().optional(),
  })
  .strict();

export type SearchFilters = z.infer<typeof SearchFiltersSchema>;
