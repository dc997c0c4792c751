/**
 * Schedule Evaluator
 *
 * Finds the most recent scheduled instant at or before a reference time
 * by walking back one calendar day at a time over a bounded window.
 * All arithmetic is in local time, at minute resolution. Wall-clock
 * times that do not exist on a given day (skipped by a daylight-saving
 * jump) never match.
 */

import { setHours, setMinutes, startOfMinute, subDays } from 'date-fns';
import { type CronFields, type EvaluateOptions, type WeekdayStart } from '../types/index.js';
import { FIELD_RANGES, parseCronExpression } from './cron.js';

/** Today plus seven days back. */
export const DEFAULT_LOOKBACK_DAYS = 8;

export function toEpochSeconds(date: Date): number {
  return Math.floor(date.getTime() / 1000);
}

/** Weekday number of `date` under the given convention. */
export function weekdayOf(date: Date, weekdayStart: WeekdayStart = 'monday'): number {
  const sundayZero = date.getDay();
  return weekdayStart === 'sunday' ? sundayZero : (sundayZero + 6) % 7;
}

function dayMatches(fields: CronFields, day: Date, weekdayStart: WeekdayStart): boolean {
  return (
    fields.month.has(day.getMonth() + 1) &&
    fields.dayOfMonth.has(day.getDate()) &&
    fields.weekday.has(weekdayOf(day, weekdayStart))
  );
}

/** Values of a field that can occur on a clock, highest first. */
function descendingValid(values: ReadonlySet<number>, range: { min: number; max: number }): number[] {
  return [...values].filter((v) => v >= range.min && v <= range.max).sort((a, b) => b - a);
}

function atTime(day: Date, hour: number, minute: number): Date {
  return setMinutes(setHours(day, hour), minute);
}

/**
 * Latest instant at or before `now` matching already-parsed fields.
 * Returns null when no day in the lookback window matches.
 */
export function latestMatchAtOrBefore(fields: CronFields, now: Date, options: EvaluateOptions = {}): Date | null {
  const lookbackDays = options.lookbackDays ?? DEFAULT_LOOKBACK_DAYS;
  const weekdayStart = options.weekdayStart ?? 'monday';

  const hours = descendingValid(fields.hour, FIELD_RANGES.hour);
  const minutes = descendingValid(fields.minute, FIELD_RANGES.minute);
  if (hours.length === 0 || minutes.length === 0) {
    return null;
  }

  const today = startOfMinute(now);
  const currentHour = today.getHours();
  const currentMinute = today.getMinutes();

  for (let daysBack = 0; daysBack < lookbackDays; daysBack++) {
    const day = subDays(today, daysBack);
    if (!dayMatches(fields, day, weekdayStart)) continue;
    const isToday = daysBack === 0;

    // Past days take the first (latest) time of day that exists on the clock
    for (const hour of hours) {
      if (isToday && hour > currentHour) continue;
      for (const minute of minutes) {
        if (isToday && hour === currentHour && minute > currentMinute) continue;
        const candidate = atTime(day, hour, minute);
        if (candidate.getHours() !== hour) continue;
        if (toEpochSeconds(candidate) <= toEpochSeconds(now)) {
          return candidate;
        }
      }
    }
  }

  return null;
}

/**
 * Most recent instant at or before `now` that satisfies `cronExpr`.
 *
 * Throws CronParseError for a malformed expression. Expressions that fire
 * less often than the lookback window report null even when an older
 * match exists.
 */
export function latestScheduledAtOrBefore(cronExpr: string, now: Date, options: EvaluateOptions = {}): Date | null {
  return latestMatchAtOrBefore(parseCronExpression(cronExpr), now, options);
}
