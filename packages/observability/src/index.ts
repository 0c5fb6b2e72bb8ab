/**
 * @pocket-ledger/observability
 *
 * Structured logging for Pocket Ledger, built on Pino.
 */

export { createLogger, logger, REDACTION_PATHS } from './logger.js';
export type { Logger } from './logger.js';
