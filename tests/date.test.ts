import { describe, expect, it } from 'vitest';
import {
  articleDay,
  dayStrategies,
  isoCalendarDay,
  naturalCalendarDay,
  STRICT_DAY_STRATEGIES,
} from '../src/utils/date.js';
import { extractFirst, parseLooseNumber } from '../src/utils/extract.js';

describe('isoCalendarDay', () => {
  it('keeps the date written in the timestamp offset', () => {
    expect(isoCalendarDay('2025-12-14T01:00:00+05:30')).toBe('2025-12-14');
    expect(isoCalendarDay('2025-12-14T23:30:00-08:00')).toBe('2025-12-14');
    expect(isoCalendarDay('2025-12-14')).toBe('2025-12-14');
  });

  it('rejects impossible dates and times', () => {
    expect(isoCalendarDay('2025-02-30T00:00:00Z')).toBeUndefined();
    expect(isoCalendarDay('2025-12-14T24:00:00Z')).toBeUndefined();
    expect(isoCalendarDay('14/12/2025')).toBeUndefined();
  });
});

describe('articleDay', () => {
  it('falls back from scraped_at to updated_at', () => {
    const record = { scraped_at: 'not a date', updated_at: '2025-12-15T08:00:00Z' };
    expect(articleDay(record)).toBe('2025-12-15');
    expect(extractFirst(record, STRICT_DAY_STRATEGIES)).toEqual({ value: '2025-12-15', strategy: 'updated_at' });
  });

  it('returns undefined when no strategy yields a day', () => {
    expect(articleDay({})).toBeUndefined();
    expect(articleDay({ scraped_at: 'December 14, 2025 10:00' })).toBeUndefined();
  });

  it('accepts written-out dates only in lenient mode', () => {
    const record = { scraped_at: 'December 14, 2025 10:00' };
    expect(articleDay(record, dayStrategies(true))).toBe('2025-12-14');
  });
});

describe('naturalCalendarDay', () => {
  it('ignores relative dates', () => {
    expect(naturalCalendarDay('yesterday')).toBeUndefined();
    expect(naturalCalendarDay('nothing to see')).toBeUndefined();
  });
});

describe('parseLooseNumber', () => {
  it('reads numbers and numeric strings', () => {
    expect(parseLooseNumber(0.25)).toBe(0.25);
    expect(parseLooseNumber(' -0.4 ')).toBe(-0.4);
  });

  it('treats anything else as absent', () => {
    expect(parseLooseNumber('abc')).toBeUndefined();
    expect(parseLooseNumber('')).toBeUndefined();
    expect(parseLooseNumber(Number.NaN)).toBeUndefined();
    expect(parseLooseNumber(Number.POSITIVE_INFINITY)).toBeUndefined();
    expect(parseLooseNumber(null)).toBeUndefined();
  });
});
