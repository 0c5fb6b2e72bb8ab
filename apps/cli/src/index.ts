#!/usr/bin/env tsx

/**
 * Pocket Ledger interactive CLI
 *
 * Usage:
 *   pocket-ledger [ledger-file]
 *
 * Without an argument the ledger path is read from PATH_TO_FILE (a .env file
 * in the working directory is loaded first).
 */

import 'dotenv/config';
import { LedgerStore } from '@pocket-ledger/core';
import { logger } from '@pocket-ledger/observability';
import { ConfigError, loadConfig } from './config.js';
import { LedgerCli } from './ledger-cli.js';
import { createReadlinePrompter } from './prompt.js';

async function main() {
  const config = loadConfig();
  const log = logger.child({ app: 'cli' }, { level: config.logLevel });

  log.debug({ ledgerFile: config.ledgerFile }, 'Opening ledger');
  const store = LedgerStore.open(config.ledgerFile, log.child({ module: 'ledger' }));

  const prompter = createReadlinePrompter();
  try {
    await new LedgerCli(store, prompter).run();
  } finally {
    prompter.close();
  }
}

main().catch((error: unknown) => {
  if (error instanceof ConfigError) {
    console.error(error.message);
  } else {
    logger.fatal({ err: error }, 'Pocket Ledger stopped unexpectedly');
  }
  process.exitCode = 1;
});
