/**
 * Ledger Store
 *
 * Holds the ordered list of records for a session and mirrors every change
 * to the backing file. Records are addressed by zero-based position.
 * Each mutation rewrites the whole file; there is no locking, so the last
 * writer wins.
 */

import { logger as defaultLogger } from '@pocket-ledger/observability';
import type { Logger } from '@pocket-ledger/observability';
import { LedgerRecordSchema, SearchFiltersSchema } from '@pocket-ledger/types';
import type { LedgerRecord, SearchFilters } from '@pocket-ledger/types';
import { parseLedger, serializeLedger } from './ledger-codec.js';
import {
  InvalidRecordError,
  InvalidSearchFiltersError,
  RecordIndexOutOfRangeError,
} from './ledger-errors.js';
import { LedgerFileRepository } from './ledger-repository.js';
import type { LedgerRepository } from './ledger-repository.js';
import { EXPENSE_CATEGORY, INCOME_CATEGORY } from './ledger-types.js';
import type { FinanceSummary, MutationResult } from './ledger-types.js';

type Position =
  | { ok: true; index: number; record: LedgerRecord }
  | { ok: false; error: RecordIndexOutOfRangeError };

export class LedgerStore {
  private records: LedgerRecord[] = [];
  private readonly logger: Logger;

  constructor(
    private readonly repository: LedgerRepository,
    logger: Logger = defaultLogger.child({ module: 'ledger' })
  ) {
    this.logger = logger;
    this.load();
  }

  /**
   * Open the ledger stored at a file path
   */
  static open(filePath: string, logger?: Logger): LedgerStore {
    return new LedgerStore(new LedgerFileRepository(filePath), logger);
  }

  get size(): number {
    return this.records.length;
  }

  /**
   * (Re)load records from the backing file
   *
   * A missing file is an empty ledger. Unreadable blocks are skipped and
   * logged; I/O errors propagate.
   *
   * @returns The loaded records
   */
  load(): LedgerRecord[] {
    const content = this.repository.read();

    if (content === null) {
      this.records = [];
      this.logger.debug({ location: this.repository.location }, 'No ledger file, starting empty');
      return [];
    }

    const { records, issues } = parseLedger(content.trimEnd());
    for (const issue of issues) {
      this.logger.warn(
        { location: this.repository.location, kind: issue.kind, block: issue.block },
        issue.message
      );
    }

    this.records = records;
    this.logger.debug(
      { location: this.repository.location, count: records.length, skipped: issues.length },
      'Ledger loaded'
    );
    return this.list();
  }

  /**
   * Write every record to the backing file, replacing its content
   */
  save(): void {
    this.repository.write(serializeLedger(this.records));
  }

  /**
   * Append a record and persist
   *
   * @throws InvalidRecordError if the record is not well-formed
   */
  add(record: LedgerRecord): void {
    const valid = this.validateRecord(record);
    this.records.push(valid);
    this.save();
    this.logger.debug({ index: this.records.length - 1, record: valid }, 'Record added');
  }

  /**
   * Replace the record at a position and persist
   *
   * The position is checked first: an out-of-range position changes nothing
   * and is reported in the result rather than thrown, whatever the record.
   *
   * @throws InvalidRecordError if the position exists and the new record is not well-formed
   */
  edit(index: number, record: LedgerRecord): MutationResult {
    const position = this.locate(index);

    if (!position.ok) {
      this.logger.warn({ index, size: this.records.length }, 'Edit skipped: index out of range');
      return position;
    }

    const valid = this.validateRecord(record);

    this.records[position.index] = valid;
    this.save();
    this.logger.debug({ index, record: valid, previous: position.record }, 'Record edited');
    return { ok: true, record: position.record };
  }

  /**
   * Remove the record at a position and persist
   *
   * @returns The removed record
   * @throws RecordIndexOutOfRangeError if no record sits at that position
   */
  delete(index: number): LedgerRecord {
    const result = this.tryDelete(index);
    if (!result.ok) {
      throw result.error;
    }
    return result.record;
  }

  /**
   * Same as delete, with an out-of-range position reported in the result
   */
  tryDelete(index: number): MutationResult {
    const position = this.locate(index);

    if (!position.ok) {
      return position;
    }

    this.records.splice(position.index, 1);
    this.save();
    this.logger.debug({ index, record: position.record }, 'Record deleted');
    return { ok: true, record: position.record };
  }

  /**
   * Records matching every given filter, in ledger order
   *
   * Category and date compare as exact strings, amount numerically.
   *
   * @throws InvalidSearchFiltersError on unknown filter keys or a non-finite amount
   */
  search(filters: SearchFilters = {}): LedgerRecord[] {
    const { category, date, amount } = this.validateFilters(filters);

    return this.records
      .filter(
        (record) =>
          (category === undefined || record.category === category) &&
          (date === undefined || record.date === date) &&
          (amount === undefined || record.amount === amount)
      )
      .map((record) => ({ ...record }));
  }

  /**
   * Totals over the Income and Expense categories; other categories are ignored
   */
  aggregate(): FinanceSummary {
    let totalIncome = 0;
    let totalExpense = 0;

    for (const record of this.records) {
      if (record.category === INCOME_CATEGORY) {
        totalIncome += record.amount;
      } else if (record.category === EXPENSE_CATEGORY) {
        totalExpense += record.amount;
      }
    }

    return {
      balance: totalIncome - totalExpense,
      totalIncome,
      totalExpense,
    };
  }

  /**
   * All records in ledger order
   */
  list(): LedgerRecord[] {
    return this.records.map((record) => ({ ...record }));
  }

  /**
   * Shared addressing step for edit and delete
   */
  private locate(index: number): Position {
    const record = Number.isInteger(index) ? this.records[index] : undefined;

    if (record === undefined) {
      return { ok: false, error: new RecordIndexOutOfRangeError(index, this.records.length) };
    }

    return { ok: true, index, record };
  }

  /**
   * Validate search filters using the shared Zod schema
   *
   * @throws InvalidSearchFiltersError if validation fails
   */
  private validateFilters(filters: SearchFilters): SearchFilters {
    const result = SearchFiltersSchema.safeParse(filters);

    if (!result.success) {
      const errors = result.error.errors
        .map((e) => `${e.path.join('.') || 'filters'}: ${e.message}`)
        .join(', ');
      throw new InvalidSearchFiltersError(`Invalid search filters: ${errors}`);
    }

    return result.data;
  }

  /**
   * Validate a record using the shared Zod schema
   *
   * @returns A copy holding only the record fields
   * @throws InvalidRecordError if validation fails
   */
  private validateRecord(record: LedgerRecord): LedgerRecord {
    const result = LedgerRecordSchema.safeParse(record);

    if (!result.success) {
      const errors = result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`).join(', ');
      throw new InvalidRecordError(`Invalid record: ${errors}`);
    }

    return result.data;
  }
}
