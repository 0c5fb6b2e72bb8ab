/**
 * Interactive menu over a ledger store
 *
 * Records are shown and chosen with 1-based numbers; the store works with
 * zero-based positions.
 */

import { parseAmount, RecordIndexOutOfRangeError } from '@pocket-ledger/core';
import type { LedgerRecord, LedgerStore, SearchFilters } from '@pocket-ledger/core';
import { formatRecord, formatSummary } from './format.js';
import type { Prompter } from './prompt.js';

export const MENU = [
  'Enter your choice (1-7):',
  '1 - Add a record',
  '2 - Edit a record',
  '3 - Delete a record',
  '4 - Search records',
  '5 - Show all records',
  '6 - Show balance',
  '7 - Exit',
  '',
].join('\n');

export const MESSAGES = {
  invalidChoice: 'Invalid choice. Please pick one of the listed options.',
  goodbye: 'Goodbye.',
  added: 'Record added.',
  updated: 'Record updated.',
  deleted: 'Record deleted.',
  empty: 'No records yet.',
  notFound: 'No records found.',
  invalidAmount: 'Error: the amount must be a number.',
  invalidNumber: 'Error: please enter a numeric record number.',
  noSuchRecord: 'Error: there is no record with that number.',
} as const;

/** Raised when the input ends in the middle of a dialogue */
class InputClosedError extends Error {
  constructor() {
    super('Input closed');
    this.name = 'InputClosedError';
  }
}

type Action = () => Promise<void> | void;

export class LedgerCli {
  private readonly actions: Record<string, Action> = {
    '1': () => this.addRecord(),
    '2': () => this.editRecord(),
    '3': () => this.deleteRecord(),
    '4': () => this.searchRecords(),
    '5': () => this.viewAllRecords(),
    '6': () => this.displayFinances(),
  };

  constructor(
    private store: LedgerStore,
    private prompter: Prompter,
    private print: (line: string) => void = (line) => console.log(line)
  ) {}

  /**
   * Show the menu until the user exits or input ends
   */
  async run(): Promise<void> {
    try {
      for (;;) {
        const choice = await this.ask(MENU);
        if (choice === '7') {
          this.print(MESSAGES.goodbye);
          return;
        }

        const action = this.actions[choice];
        if (!action) {
          this.print(MESSAGES.invalidChoice);
          continue;
        }
        await action();
      }
    } catch (error) {
      if (error instanceof InputClosedError) {
        return;
      }
      throw error;
    }
  }

  async addRecord(): Promise<void> {
    const record = await this.askRecord('');
    if (!record) {
      return;
    }
    this.store.add(record);
    this.print(MESSAGES.added);
  }

  async editRecord(): Promise<void> {
    this.viewAllRecords();
    const index = await this.askIndex('Number of the record to edit: ');
    if (index === null) {
      return;
    }

    const record = await this.askRecord('new ');
    if (!record) {
      return;
    }

    const result = this.store.edit(index, record);
    this.print(result.ok ? MESSAGES.updated : MESSAGES.noSuchRecord);
  }

  async deleteRecord(): Promise<void> {
    this.viewAllRecords();
    const index = await this.askIndex('Number of the record to delete: ');
    if (index === null) {
      return;
    }

    try {
      this.store.delete(index);
      this.print(MESSAGES.deleted);
    } catch (error) {
      if (error instanceof RecordIndexOutOfRangeError) {
        this.print(MESSAGES.noSuchRecord);
        return;
      }
      throw error;
    }
  }

  async searchRecords(): Promise<void> {
    const category = await this.ask('Category to search for (leave empty to skip): ');
    const date = await this.ask('Date to search for, YYYY-MM-DD (leave empty to skip): ');
    const amountInput = await this.ask('Amount to search for (leave empty to skip): ');

    const filters: SearchFilters = {};
    if (category) {
      filters.category = category;
    }
    if (date) {
      filters.date = date;
    }
    if (amountInput) {
      const amount = parseAmount(amountInput);
      if (amount === null) {
        this.print(MESSAGES.invalidAmount);
        return;
      }
      filters.amount = amount;
    }

    const results = this.store.search(filters);
    if (results.length === 0) {
      this.print(MESSAGES.notFound);
      return;
    }
    results.forEach((record) => this.printRecord(record));
  }

  viewAllRecords(): void {
    const records = this.store.list();
    if (records.length === 0) {
      this.print(MESSAGES.empty);
      return;
    }
    records.forEach((record, index) => {
      this.print(`#${index + 1}`);
      this.printRecord(record);
    });
  }

  displayFinances(): void {
    formatSummary(this.store.aggregate()).forEach((line) => this.print(line));
  }

  private printRecord(record: LedgerRecord): void {
    formatRecord(record).forEach((line) => this.print(line));
  }

  /**
   * Ask for the four fields of a record
   *
   * @param qualifier - Word put in front of each field name ("new " when editing)
   * @returns The record, or null after reporting a non-numeric amount
   */
  private async askRecord(qualifier: string): Promise<LedgerRecord | null> {
    const date = await this.ask(`Enter the ${qualifier}date (YYYY-MM-DD): `);
    const category = await this.ask(`Enter the ${qualifier}category (Income/Expense): `);
    const amountInput = await this.ask(`Enter the ${qualifier}amount: `);
    const description = await this.ask(`Enter the ${qualifier}description: `);

    const amount = parseAmount(amountInput);
    if (amount === null) {
      this.print(MESSAGES.invalidAmount);
      return null;
    }

    return { date, category, amount, description };
  }

  /**
   * Ask for a 1-based record number
   *
   * @returns The zero-based position, or null after reporting bad input
   */
  private async askIndex(question: string): Promise<number | null> {
    const answer = await this.ask(question);
    if (!/^\d+$/.test(answer)) {
      this.print(MESSAGES.invalidNumber);
      return null;
    }
    return Number(answer) - 1;
  }

  private async ask(question: string): Promise<string> {
    const answer = await this.prompter.ask(question);
    if (answer === null) {
      throw new InputClosedError();
    }
    return answer;
  }
}
