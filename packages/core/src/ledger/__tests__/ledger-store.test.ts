/**
 * Ledger Store Tests
 *
 * Runs against a real ledger file in a temporary directory.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { createLogger } from '@pocket-ledger/observability';
import type { LedgerRecord } from '@pocket-ledger/types';
import { LedgerStore } from '../ledger-store.js';
import type { LedgerRepository } from '../ledger-repository.js';
import {
  InvalidRecordError,
  InvalidSearchFiltersError,
  RecordIndexOutOfRangeError,
} from '../ledger-errors.js';

const groceries: LedgerRecord = {
  date: '2024-01-01',
  category: 'Expense',
  amount: 40,
  description: 'Groceries',
};
const salary: LedgerRecord = {
  date: '2024-01-01',
  category: 'Income',
  amount: 100,
  description: 'Salary',
};
const taxi: LedgerRecord = {
  date: '2024-01-02',
  category: 'Expense',
  amount: 40,
  description: 'Taxi',
};
const coffee: LedgerRecord = {
  date: '2024-01-01',
  category: 'Expense',
  amount: 15.5,
  description: 'Coffee',
};

const silentLogger = createLogger({ level: 'silent' });

function captureLogger() {
  const logs: string[] = [];
  const logger = createLogger(
    { level: 'debug' },
    {
      write: (log: string) => {
        logs.push(log);
      },
    }
  );
  const entries = (): Array<Record<string, unknown>> => logs.map((line) => JSON.parse(line));
  return { logger, entries };
}

describe('LedgerStore', () => {
  let dir: string;
  let filePath: string;

  const openStore = () => LedgerStore.open(filePath, silentLogger);

  const seed = (records: LedgerRecord[]) => {
    const store = openStore();
    records.forEach((record) => store.add(record));
    return store;
  };

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'ledger-store-'));
    filePath = join(dir, 'ledger.txt');
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  describe('load', () => {
    it('should start empty when the file does not exist', () => {
      const store = openStore();

      expect(store.size).toBe(0);
      expect(store.list()).toEqual([]);
      expect(existsSync(filePath)).toBe(false);
    });

    it('should skip malformed blocks and log a warning for each', () => {
      writeFileSync(
        filePath,
        [
          'Date: 2024-01-01',
          'Category: Income',
          'Amount: 100',
          'Description: Salary',
          '---',
          'Date: 2024-01-02',
          'Category: Expense',
          'Description: Coffee',
          '---',
          '',
          '',
        ].join('\n')
      );
      const { logger, entries } = captureLogger();

      const store = LedgerStore.open(filePath, logger);

      expect(store.list()).toEqual([salary]);
      const warnings = entries().filter((entry) => entry.level === 40);
      expect(warnings).toHaveLength(1);
      expect(warnings[0]?.msg).toBe('Block 2 is missing the "Amount" field');
      expect(warnings[0]?.kind).toBe('missing-field');
    });

    it('should replace the in-memory records when called again', () => {
      const store = seed([salary]);
      writeFileSync(filePath, 'Date: 2024-01-02\nCategory: Expense\nAmount: 40\nDescription: Taxi\n---\n');

      expect(store.load()).toEqual([taxi]);
      expect(store.list()).toEqual([taxi]);
    });

    it('should let I/O errors propagate', () => {
      expect(() => LedgerStore.open(dir, silentLogger)).toThrow();
    });
  });

  describe('add', () => {
    it('should append and persist the record', () => {
      const store = seed([salary]);

      store.add(groceries);

      expect(store.list()).toEqual([salary, groceries]);
      expect(readFileSync(filePath, 'utf8')).toBe(
        'Date: 2024-01-01\nCategory: Income\nAmount: 100\nDescription: Salary\n---\n' +
          'Date: 2024-01-01\nCategory: Expense\nAmount: 40\nDescription: Groceries\n---\n'
      );
    });

    it('should be visible to a fresh store on the same file', () => {
      seed([salary, groceries]);

      const reopened = openStore();

      expect(reopened.size).toBe(2);
      expect(reopened.list()[1]).toEqual(groceries);
    });

    it('should keep duplicates and negative amounts', () => {
      const refund = { ...groceries, amount: -40 };
      const store = seed([groceries, groceries, refund]);

      expect(openStore().list()).toEqual([groceries, groceries, refund]);
      expect(store.size).toBe(3);
    });

    it('should reject a record whose amount is not a finite number', () => {
      const store = openStore();

      expect(() => store.add({ ...groceries, amount: Number.NaN })).toThrow(InvalidRecordError);
      expect(store.size).toBe(0);
      expect(existsSync(filePath)).toBe(false);
    });

    it.each(['date', 'category', 'description'] as const)(
      'should reject a line break in %s and leave the file as it was',
      (field) => {
        const store = seed([salary]);
        const before = readFileSync(filePath, 'utf8');
        const record: LedgerRecord = { ...groceries };
        record[field] = 'a\n---\nDate: x';

        expect(() => store.add(record)).toThrow(InvalidRecordError);
        expect(store.list()).toEqual([salary]);
        expect(readFileSync(filePath, 'utf8')).toBe(before);
        expect(openStore().list()).toEqual([salary]);
      }
    );

    it('should store a copy of the record', () => {
      const record = { ...groceries };
      const store = seed([record]);

      record.amount = 1;

      expect(store.list()).toEqual([groceries]);
    });
  });

  describe('edit', () => {
    it('should replace the record and return the previous one', () => {
      const store = seed([salary, groceries]);

      const result = store.edit(1, taxi);

      expect(result).toEqual({ ok: true, record: groceries });
      expect(store.list()).toEqual([salary, taxi]);
      expect(openStore().list()).toEqual([salary, taxi]);
    });

    it.each([-1, 2, 0.5])('should leave the ledger untouched for index %s', (index) => {
      const store = seed([salary, groceries]);
      const before = readFileSync(filePath, 'utf8');

      const result = store.edit(index, taxi);

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toBeInstanceOf(RecordIndexOutOfRangeError);
        expect(result.error.index).toBe(index);
        expect(result.error.size).toBe(2);
      }
      expect(store.list()).toEqual([salary, groceries]);
      expect(readFileSync(filePath, 'utf8')).toBe(before);
    });

    it('should log a warning when the index is out of range', () => {
      const { logger, entries } = captureLogger();
      const store = LedgerStore.open(filePath, logger);

      store.edit(0, taxi);

      const warning = entries().find((entry) => entry.level === 40);
      expect(warning?.msg).toBe('Edit skipped: index out of range');
      expect(warning?.index).toBe(0);
    });

    it('should reject an invalid replacement even at a valid index', () => {
      const store = seed([salary]);

      expect(() => store.edit(0, { ...taxi, amount: Number.POSITIVE_INFINITY })).toThrow(
        InvalidRecordError
      );
      expect(store.list()).toEqual([salary]);
    });

    it('should reject a replacement with a line break', () => {
      const store = seed([salary]);

      expect(() => store.edit(0, { ...taxi, description: 'Taxi\r\nto airport' })).toThrow(
        InvalidRecordError
      );
      expect(openStore().list()).toEqual([salary]);
    });

    it('should report an out-of-range index before looking at the record', () => {
      const store = seed([salary]);
      const before = readFileSync(filePath, 'utf8');

      const result = store.edit(5, { ...taxi, amount: Number.NaN });

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toBeInstanceOf(RecordIndexOutOfRangeError);
      }
      expect(readFileSync(filePath, 'utf8')).toBe(before);
    });
  });

  describe('delete', () => {
    it('should remove the record, persist, and return it', () => {
      const store = seed([salary, groceries, taxi]);

      const removed = store.delete(1);

      expect(removed).toEqual(groceries);
      expect(store.list()).toEqual([salary, taxi]);
      expect(openStore().list()).toEqual([salary, taxi]);
    });

    it.each([-1, 2])('should throw for index %s and leave the ledger untouched', (index) => {
      const store = seed([salary, groceries]);
      const before = readFileSync(filePath, 'utf8');

      expect(() => store.delete(index)).toThrow(RecordIndexOutOfRangeError);
      expect(store.list()).toEqual([salary, groceries]);
      expect(readFileSync(filePath, 'utf8')).toBe(before);
    });

    it('should describe the range in the error message', () => {
      const store = seed([salary, groceries]);

      expect(() => store.delete(2)).toThrow('No record at index 2 (ledger holds 2 records)');
    });

    it('should write an empty file after removing the last record', () => {
      const store = seed([salary]);

      store.delete(0);

      expect(readFileSync(filePath, 'utf8')).toBe('');
    });
  });

  describe('tryDelete', () => {
    it('should report an out-of-range index without writing', () => {
      const repository: LedgerRepository = {
        location: 'memory',
        read: vi.fn(() => 'Date: 2024-01-01\nCategory: Income\nAmount: 100\nDescription: Salary\n---\n'),
        write: vi.fn(),
      };
      const store = new LedgerStore(repository, silentLogger);

      const result = store.tryDelete(5);

      expect(result.ok).toBe(false);
      expect(repository.write).not.toHaveBeenCalled();
      expect(store.size).toBe(1);
    });

    it('should write the remaining records on success', () => {
      const repository: LedgerRepository = {
        location: 'memory',
        read: vi.fn(() => null),
        write: vi.fn(),
      };
      const store = new LedgerStore(repository, silentLogger);
      store.add(salary);

      const result = store.tryDelete(0);

      expect(result).toEqual({ ok: true, record: salary });
      expect(repository.write).toHaveBeenLastCalledWith('');
    });
  });

  describe('search', () => {
    it('should return records matching every given filter', () => {
      const store = seed([groceries, salary, taxi, coffee]);

      expect(store.search({ category: 'Expense', date: '2024-01-01' })).toEqual([
        groceries,
        coffee,
      ]);
    });

    it('should return every record in order when no filter is given', () => {
      const store = seed([groceries, salary, taxi, coffee]);

      expect(store.search()).toEqual([groceries, salary, taxi, coffee]);
      expect(store.search({})).toEqual([groceries, salary, taxi, coffee]);
    });

    it('should compare amounts numerically', () => {
      const store = seed([groceries, salary, taxi, coffee]);

      expect(store.search({ amount: 40 })).toEqual([groceries, taxi]);
      expect(store.search({ amount: 15.5, category: 'Expense' })).toEqual([coffee]);
    });

    it('should return an empty list when nothing matches', () => {
      const store = seed([groceries, salary]);

      expect(store.search({ category: 'Other' })).toEqual([]);
      expect(store.search({ category: 'expense' })).toEqual([]);
    });

    it('should reject unknown filter keys', () => {
      const store = seed([groceries]);
      const filters = { category: 'Expense', description: 'Groceries' };

      expect(() => store.search(filters)).toThrow(InvalidSearchFiltersError);
    });

    it('should reject a non-finite amount filter', () => {
      const store = seed([groceries]);

      expect(() => store.search({ amount: Number.NaN })).toThrow(InvalidSearchFiltersError);
    });

    it('should not write to the file', () => {
      const repository: LedgerRepository = {
        location: 'memory',
        read: vi.fn(() => null),
        write: vi.fn(),
      };
      const store = new LedgerStore(repository, silentLogger);

      store.search({ category: 'Expense' });
      store.aggregate();
      store.list();

      expect(repository.write).not.toHaveBeenCalled();
    });
  });

  describe('aggregate', () => {
    it('should total income and expense and ignore other categories', () => {
      const store = seed([
        { ...salary, amount: 100 },
        { ...groceries, amount: 40 },
        { date: '2024-01-03', category: 'Other', amount: 999, description: 'Gift' },
      ]);

      expect(store.aggregate()).toEqual({ balance: 60, totalIncome: 100, totalExpense: 40 });
    });

    it('should return zeros for an empty ledger', () => {
      expect(openStore().aggregate()).toEqual({ balance: 0, totalIncome: 0, totalExpense: 0 });
    });

    it('should allow a negative balance', () => {
      const store = seed([salary, groceries, taxi, { ...groceries, amount: 35 }]);

      expect(store.aggregate()).toEqual({ balance: -15, totalIncome: 100, totalExpense: 115 });
    });
  });

  describe('list', () => {
    it('should return copies of the records', () => {
      const store = seed([salary]);

      const [first] = store.list();
      if (first) {
        first.amount = 0;
      }

      expect(store.list()).toEqual([salary]);
    });
  });
});
