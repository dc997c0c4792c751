import { describe, it, expect } from 'vitest';
import { parseCronField, parseCronExpression } from '../../../src/schedule/cron.js';
import { CronParseError } from '../../../src/schedule/errors.js';

const sorted = (values: ReadonlySet<number>): number[] => [...values].sort((a, b) => a - b);

describe('parseCronField', () => {
  it('expands * to the full range', () => {
    const minutes = parseCronField('*', 0, 59);
    expect(minutes.size).toBe(60);
    expect(minutes.has(0)).toBe(true);
    expect(minutes.has(59)).toBe(true);
  });

  it('parses a single value', () => {
    expect(sorted(parseCronField('5', 0, 59))).toEqual([5]);
  });

  it('parses a list', () => {
    expect(sorted(parseCronField('1,3,5', 0, 59))).toEqual([1, 3, 5]);
  });

  it('parses an inclusive range', () => {
    expect(sorted(parseCronField('10-12', 0, 23))).toEqual([10, 11, 12]);
  });

  it('parses a mix of values and ranges', () => {
    expect(sorted(parseCronField('0,15-17', 0, 23))).toEqual([0, 15, 16, 17]);
  });

  it('collapses duplicates', () => {
    expect(sorted(parseCronField('3,1-3,3', 0, 59))).toEqual([1, 2, 3]);
  });

  it('accepts out-of-range literals without validation', () => {
    expect(sorted(parseCronField('99', 0, 59))).toEqual([99]);
  });

  it('yields nothing for a reversed range', () => {
    expect(parseCronField('12-10', 0, 23).size).toBe(0);
  });

  it('treats a leading minus as a negative literal', () => {
    expect(sorted(parseCronField('-5', 0, 59))).toEqual([-5]);
  });

  it('rejects non-numeric tokens', () => {
    expect(() => parseCronField('abc', 0, 59)).toThrow(CronParseError);
    expect(() => parseCronField('1,,2', 0, 59)).toThrow(CronParseError);
    expect(() => parseCronField('*/15', 0, 59)).toThrow(CronParseError);
  });

  it('rejects a range with more than two ends', () => {
    expect(() => parseCronField('1-2-3', 0, 59, 'minute')).toThrow('Invalid range "1-2-3" in field "minute"');
  });
});

describe('parseCronExpression', () => {
  it('parses all five fields', () => {
    const fields = parseCronExpression('0 7 * * 1');
    expect(sorted(fields.minute)).toEqual([0]);
    expect(sorted(fields.hour)).toEqual([7]);
    expect(fields.dayOfMonth.size).toBe(31);
    expect(fields.month.size).toBe(12);
    expect(sorted(fields.weekday)).toEqual([1]);
  });

  it('expands the weekday wildcard to 0-6', () => {
    expect(sorted(parseCronExpression('* * * * *').weekday)).toEqual([0, 1, 2, 3, 4, 5, 6]);
  });

  it('tolerates surrounding and repeated whitespace', () => {
    const fields = parseCronExpression('  30   9-17 * *  0-4 ');
    expect(sorted(fields.minute)).toEqual([30]);
    expect(sorted(fields.hour)).toEqual([9, 10, 11, 12, 13, 14, 15, 16, 17]);
    expect(sorted(fields.weekday)).toEqual([0, 1, 2, 3, 4]);
  });

  it('rejects the wrong field count', () => {
    expect(() => parseCronExpression('0 7 *')).toThrow('Expected 5 fields, got 3');
    expect(() => parseCronExpression('0 7 * * 1 2026')).toThrow('Expected 5 fields, got 6');
    expect(() => parseCronExpression('')).toThrow('Expected 5 fields, got 0');
  });

  it('reports the offending field and expression', () => {
    let caught: unknown;
    try {
      parseCronExpression('0 x * * *');
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(CronParseError);
    expect(caught).toMatchObject({ field: 'hour', expression: '0 x * * *' });
  });
});
