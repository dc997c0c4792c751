/**
 * cronstamp: Logging Utilities
 *
 * Structured logging using Pino. Output goes to stderr so that CLI
 * stdout stays clean for scripting.
 *
 * @module utils/logger
 */

import pino from 'pino';
import { getConfig } from '../config/config.js';
import { LogLevelSchema, type LogLevel } from '../types/index.js';

// ═══════════════════════════════════════════════════════════════════════════
// LOGGER FACTORY
// ═══════════════════════════════════════════════════════════════════════════

export const LOG_LEVEL_ENV = 'CRONSTAMP_LOG_LEVEL';

export function resolveLogLevel(override?: LogLevel): LogLevel {
  if (override !== undefined) return override;

  const fromEnv = LogLevelSchema.safeParse(process.env[LOG_LEVEL_ENV]);
  if (fromEnv.success) return fromEnv.data;

  return getConfig().logging.level;
}

const loggers = new Set<pino.Logger>();

export function createLogger(name: string, options?: { level?: LogLevel }): pino.Logger {
  const opts: pino.LoggerOptions = {
    name: `cronstamp:${name}`,
    level: resolveLogLevel(options?.level),
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label: string) => ({ level: label }),
    },
  };

  const logger = pino(opts, pino.destination({ fd: 2, sync: true }));
  loggers.add(logger);
  return logger;
}

/** Apply a level to every logger created so far (e.g. after loading --config). */
export function setLogLevel(level: LogLevel): void {
  for (const logger of loggers) {
    logger.level = level;
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// UTILITIES
// ═══════════════════════════════════════════════════════════════════════════

export function formatError(error: unknown): {
  message: string;
  stack?: string;
  code?: string;
  name?: string;
} {
  if (error instanceof Error) {
    const result: { message: string; stack?: string; code?: string; name?: string } = {
      message: error.message,
      name: error.name,
    };
    if (error.stack !== undefined) {
      result.stack = error.stack;
    }
    const code: unknown = 'code' in error ? error.code : undefined;
    if (typeof code === 'string') {
      result.code = code;
    }
    return result;
  }

  return { message: String(error) };
}
