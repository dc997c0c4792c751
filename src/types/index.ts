/**
 * cronstamp: Core Type Definitions
 *
 * Configuration schema, schedule types and the Result helpers shared
 * across the project. Uses Zod for runtime validation with TypeScript
 * inference.
 *
 * @module types
 */

import { z } from 'zod';

// ═══════════════════════════════════════════════════════════════════════════
// ENUMS & CONSTANTS
// ═══════════════════════════════════════════════════════════════════════════

export const LogLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']);
export type LogLevel = z.infer<typeof LogLevelSchema>;

/**
 * Which day the weekday field counts from.
 * 'monday' → 0 = Monday … 6 = Sunday; 'sunday' → 0 = Sunday … 6 = Saturday.
 */
export const WeekdayStartSchema = z.enum(['monday', 'sunday']);
export type WeekdayStart = z.infer<typeof WeekdayStartSchema>;

// ═══════════════════════════════════════════════════════════════════════════
// CONFIGURATION SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════

export const ConfigSchema = z.object({
  paths: z.object({
    base_dir: z.string().default('~/.cronstamp'),
    cache_dir: z.string().default('cache'),
    config_file: z.string().default('config.json'),
  }),
  schedule: z.object({
    lookback_days: z.number().int().min(1).max(366).default(8),
    weekday_start: WeekdayStartSchema.default('monday'),
    lock: z.boolean().default(false),
    lock_timeout_ms: z.number().int().positive().default(5000),
  }),
  logging: z.object({
    level: LogLevelSchema.default('info'),
  }),
});
export type Config = z.infer<typeof ConfigSchema>;

// ═══════════════════════════════════════════════════════════════════════════
// SCHEDULE TYPES
// ═══════════════════════════════════════════════════════════════════════════

/** The five parsed fields of a cron expression. */
export interface CronFields {
  readonly minute: ReadonlySet<number>;
  readonly hour: ReadonlySet<number>;
  readonly dayOfMonth: ReadonlySet<number>;
  readonly month: ReadonlySet<number>;
  readonly weekday: ReadonlySet<number>;
}

export type CronFieldName = keyof CronFields;

export interface EvaluateOptions {
  /** Calendar days inspected, today included. */
  lookbackDays?: number;
  weekdayStart?: WeekdayStart;
}

/** Identity of a persisted stamp: one per (expression, task) pair. */
export interface StampKey {
  cronExpr: string;
  taskId: string;
}

export type Task = () => void | Promise<void>;

export type RunOutcome =
  | { status: 'not-scheduled' }
  | { status: 'not-due'; scheduledAt: Date; lastRunEpoch: number }
  | { status: 'ran'; scheduledAt: Date; durationMs: number };

// ═══════════════════════════════════════════════════════════════════════════
// RESULT TYPE (Functional Error Handling)
// ═══════════════════════════════════════════════════════════════════════════

export type Result<T, E = Error> = { success: true; data: T } | { success: false; error: E };

export function ok<T>(data: T): Result<T, never> {
  return { success: true, data };
}

export function err<E>(error: E): Result<never, E> {
  return { success: false, error };
}

export function isOk<T, E>(result: Result<T, E>): result is { success: true; data: T } {
  return result.success;
}

export function isErr<T, E>(result: Result<T, E>): result is { success: false; error: E } {
  return !result.success;
}
