import pino from 'pino';
import type { DestinationStream, Logger, LoggerOptions } from 'pino';

export type { Logger };

/**
 * Descriptions are free text typed by the user and stay out of log output.
 * The store logs records under `record` and the replaced one under `previous`.
 */
export const REDACTION_PATHS = ['record.description', 'previous.description'];

/**
 * LOG_LEVEL when it names a Pino level, info otherwise. Pino throws on an
 * unknown level, and the default logger is built at import time, before any
 * configuration check can report the bad value.
 */
function levelFromEnv(): string {
  const level = process.env.LOG_LEVEL;
  if (level && (level === 'silent' || pino.levels.values[level] !== undefined)) {
    return level;
  }
  return 'info';
}

/**
 * Create a structured logger instance with Pino
 *
 * - Level from LOG_LEVEL (default and fallback: info)
 * - ISO 8601 timestamps
 * - Record descriptions censored
 *
 * Pass a destination to capture output (tests) or to keep logs off stdout.
 */
export function createLogger(options?: LoggerOptions, destination?: DestinationStream): Logger {
  const config: LoggerOptions = {
    level: levelFromEnv(),
    redact: {
      paths: REDACTION_PATHS,
      censor: '[REDACTED]',
    },
    serializers: {
      err: pino.stdSerializers.err,
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    ...options,
  };

  return destination ? pino(config, destination) : pino(config);
}

/**
 * Default logger instance, written to stderr so it never mixes with the
 * interactive prompts on stdout
 */
export const logger = createLogger({}, pino.destination(2));
