import { format, formatDistance, isAfter, isValid, parseISO } from 'date-fns';
import { type RunOutcome } from '../types/index.js';

export const INSTANT_FORMAT = 'yyyy-MM-dd HH:mm';

export function out(line: string): void {
  process.stdout.write(`${line}\n`);
}

export function fail(message: string, exitCode: number = 1): void {
  process.stderr.write(`Error: ${message}\n`);
  process.exitCode = exitCode;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function formatInstant(date: Date | null): string {
  return date === null ? 'none' : format(date, INSTANT_FORMAT);
}

/** `--at` value, or the wall clock when absent. */
export function parseInstant(value: string | undefined): Date {
  if (value === undefined) return new Date();
  const parsed = parseISO(value);
  if (!isValid(parsed)) {
    throw new Error(`Invalid --at value "${value}" (expected ISO 8601, e.g. 2026-10-12T07:30)`);
  }
  return parsed;
}

/**
 * `--at` for commands that write a stamp. A future instant would record a
 * run that has not happened and block real runs until then.
 */
export function parseRecordableInstant(value: string | undefined): Date {
  const instant = parseInstant(value);
  if (isAfter(instant, new Date())) {
    throw new Error(`--at ${formatInstant(instant)} is in the future; only past instants can be recorded`);
  }
  return instant;
}

export function describeOutcome(outcome: RunOutcome, now: Date): string {
  switch (outcome.status) {
    case 'not-scheduled':
      return 'not scheduled';
    case 'not-due':
      return `not due (already ran for ${formatInstant(new Date(outcome.lastRunEpoch * 1000))})`;
    case 'ran':
      return `ran for ${formatInstant(outcome.scheduledAt)} (${formatDistance(outcome.scheduledAt, now, { addSuffix: true })})`;
  }
}
