import { pino } from 'pino';
import type { BaseLogger, LevelWithSilent, Logger } from 'pino';
import { resolveConfig } from './config.js';
import { ConfigurationError } from './errors.js';

export type { BaseLogger };

export interface ResolvedLogLevel {
  level: LevelWithSilent;
  /** Set when the configured value was rejected and the default was used instead. */
  problem?: string;
}

/** Reads the log level from the environment, falling back to `warn` when the configuration is invalid. */
export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): ResolvedLogLevel {
  try {
    return { level: resolveConfig({}, env).logLevel };
  } catch (err) {
    if (err instanceof ConfigurationError) return { level: 'warn', problem: err.message };
    throw err;
  }
}

export function createLogger(level: LevelWithSilent): Logger {
  return pino({ name: 'crudforge', level });
}

const initial = resolveLogLevel();

/** Module logger used when no logger is passed in (fastify hands over `request.log`). */
export const logger: Logger = createLogger(initial.level);

if (initial.problem !== undefined) {
  logger.warn({ problem: initial.problem }, 'invalid configuration, logging at warn');
}
