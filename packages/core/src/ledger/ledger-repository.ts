/**
 * Ledger Repository
 *
 * Data access layer for the ledger file.
 * Raw text in and out, no parsing and no business logic.
 */

import { existsSync, readFileSync, writeFileSync } from 'node:fs';

export interface LedgerRepository {
  /** Where the ledger lives, for log lines */
  readonly location: string;

  /**
   * Read the whole ledger
   *
   * @returns File content, or null when there is no ledger yet
   */
  read(): string | null;

  /** Replace the whole ledger */
  write(content: string): void;
}

export class LedgerFileRepository implements LedgerRepository {
  constructor(readonly location: string) {}

  read(): string | null {
    if (!existsSync(this.location)) {
      return null;
    }
    return readFileSync(this.location, 'utf8');
  }

  write(content: string): void {
    writeFileSync(this.location, content, 'utf8');
  }
}
