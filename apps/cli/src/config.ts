/**
 * CLI configuration
 *
 * The ledger file comes from the first positional argument, falling back to
 * PATH_TO_FILE (which may be set in a .env file).
 */

import { resolve } from 'node:path';
import { z } from 'zod';

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

const ConfigSchema = z.object({
  ledgerFile: z
    .string()
    .trim()
    .min(1, 'Ledger file path is required: pass it as an argument or set PATH_TO_FILE'),
  logLevel: z.enum(LOG_LEVELS).default('info'),
});

export type Config = z.infer<typeof ConfigSchema>;

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Build the CLI configuration from the environment and arguments
 *
 * @throws ConfigError if the ledger path is missing or LOG_LEVEL is unknown
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  argv: string[] = process.argv.slice(2)
): Config {
  const result = ConfigSchema.safeParse({
    ledgerFile: argv[0] ?? env.PATH_TO_FILE ?? '',
    logLevel: env.LOG_LEVEL || undefined,
  });

  if (!result.success) {
    const errors = result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`).join(', ');
    throw new ConfigError(`Invalid configuration: ${errors}`);
  }

  return { ...result.data, ledgerFile: resolve(result.data.ledgerFile) };
}
