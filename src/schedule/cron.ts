/**
 * Cron Expression Parsing
 *
 * 5-field expressions: minute hour day-of-month month weekday.
 * Each field is `*`, an integer, an inclusive range `a-b`, or a comma
 * list of integers and ranges. Steps (`*\/15`) are not part of the grammar.
 *
 * Explicit values are not checked against the field's range: an
 * out-of-range literal parses fine and never matches a real time.
 */

import { type CronFieldName, type CronFields } from '../types/index.js';
import { CronParseError } from './errors.js';

export const FIELD_RANGES: Readonly<Record<CronFieldName, { min: number; max: number }>> = {
  minute: { min: 0, max: 59 },
  hour: { min: 0, max: 23 },
  dayOfMonth: { min: 1, max: 31 },
  month: { min: 1, max: 12 },
  weekday: { min: 0, max: 6 },
};

const INTEGER_PATTERN = /^-?\d+$/;

function parseInteger(raw: string, field: string, expression: string): number {
  if (!INTEGER_PATTERN.test(raw)) {
    throw new CronParseError(`Non-numeric value "${raw}" in field "${field}"`, expression, field);
  }
  return parseInt(raw, 10);
}

/**
 * Parse one cron field into the set of integers it matches.
 *
 * @param field - Raw field text, e.g. `"0,15-17"`
 * @param min - Lowest value `*` expands to
 * @param max - Highest value `*` expands to
 * @param name - Field name used in error messages
 */
export function parseCronField(field: string, min: number, max: number, name: string = 'field'): Set<number> {
  const values = new Set<number>();

  if (field === '*') {
    for (let v = min; v <= max; v++) {
      values.add(v);
    }
    return values;
  }

  for (const part of field.split(',')) {
    if (part.includes('-') && !part.startsWith('-')) {
      const bounds = part.split('-');
      if (bounds.length !== 2) {
        throw new CronParseError(`Invalid range "${part}" in field "${name}"`, field, name);
      }
      const start = parseInteger(bounds[0] ?? '', name, field);
      const end = parseInteger(bounds[1] ?? '', name, field);
      for (let v = start; v <= end; v++) {
        values.add(v);
      }
    } else {
      values.add(parseInteger(part, name, field));
    }
  }

  return values;
}

/**
 * Split a cron expression into its five fields and parse each one.
 * Throws CronParseError for a wrong field count or a malformed field.
 */
export function parseCronExpression(expression: string): CronFields {
  const parts = expression.trim().split(/\s+/).filter((p) => p.length > 0);
  if (parts.length !== 5) {
    throw new CronParseError(`Expected 5 fields, got ${parts.length}`, expression);
  }

  const parseAt = (name: CronFieldName, index: number): Set<number> => {
    const { min, max } = FIELD_RANGES[name];
    try {
      return parseCronField(parts[index] ?? '', min, max, name);
    } catch (error) {
      if (error instanceof CronParseError) {
        throw new CronParseError(error.message, expression, name);
      }
      throw error;
    }
  };

  return {
    minute: parseAt('minute', 0),
    hour: parseAt('hour', 1),
    dayOfMonth: parseAt('dayOfMonth', 2),
    month: parseAt('month', 3),
    weekday: parseAt('weekday', 4),
  };
}
