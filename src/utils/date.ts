import * as chrono from 'chrono-node';
import type { ArticleRecord } from '../types.js';
import { extractFirst, type NamedStrategy } from './extract.js';

// YYYY-MM-DD, optionally followed by a time and a Z / +HH:MM / +HHMM / +HH offset
const ISO_TIMESTAMP =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.\d+)?)?)?(?:Z|[+-]\d{2}(?::?\d{2})?)?$/;

function formatDay(year: number, month: number, day: number): string | undefined {
  const d = new Date(Date.UTC(year, month - 1, day));
  if (d.getUTCFullYear() !== year || d.getUTCMonth() !== month - 1 || d.getUTCDate() !== day) {
    return undefined;
  }
  return `${String(year).padStart(4, '0')}-${String(month).padStart(2, '0')}-${String(day).padStart(2, '0')}`;
}

/**
 * Calendar day (YYYY-MM-DD) of a strict ISO-8601 timestamp.
 * The day is the one written in the timestamp's own offset; nothing is
 * converted to UTC, so "2025-12-14T01:00:00+05:30" is 2025-12-14.
 */
export function isoCalendarDay(timestamp: string): string | undefined {
  const m = ISO_TIMESTAMP.exec(timestamp.trim());
  if (!m) return undefined;
  const [, y, mo, d, hh, mm, ss] = m;
  if (hh !== undefined && Number(hh) > 23) return undefined;
  if (mm !== undefined && Number(mm) > 59) return undefined;
  if (ss !== undefined && Number(ss) > 59) return undefined;
  return formatDay(Number(y), Number(mo), Number(d));
}

/**
 * Calendar day of a free-form date ("Dec 14, 2025 10:00", "14 December 2025").
 * Only fully specified dates count; relative phrases such as "yesterday"
 * would make the result depend on when the run happens.
 */
export function naturalCalendarDay(text: string): string | undefined {
  const [result] = chrono.parse(text);
  // chrono marks "yesterday" as certain too, so insist on a written year
  if (!result || !/\b\d{4}\b/.test(result.text)) return undefined;
  const { start } = result;
  if (!start.isCertain('year') || !start.isCertain('month') || !start.isCertain('day')) {
    return undefined;
  }
  const year = start.get('year');
  const month = start.get('month');
  const day = start.get('day');
  if (year === null || month === null || day === null) return undefined;
  return formatDay(year, month, day);
}

type DatedRecord = Pick<ArticleRecord, 'scraped_at' | 'updated_at'>;
export type DayStrategy = NamedStrategy<DatedRecord, string>;

function fieldStrategy(
  field: keyof DatedRecord,
  parse: (text: string) => string | undefined,
  suffix = '',
): DayStrategy {
  return {
    name: `${field}${suffix}`,
    extract: (record) => {
      const raw = record[field];
      return raw ? parse(raw) : undefined;
    },
  };
}

export const STRICT_DAY_STRATEGIES: ReadonlyArray<DayStrategy> = [
  fieldStrategy('scraped_at', isoCalendarDay),
  fieldStrategy('updated_at', isoCalendarDay),
];

export const LENIENT_DAY_STRATEGIES: ReadonlyArray<DayStrategy> = [
  ...STRICT_DAY_STRATEGIES,
  fieldStrategy('scraped_at', naturalCalendarDay, ':natural'),
  fieldStrategy('updated_at', naturalCalendarDay, ':natural'),
];

export function dayStrategies(lenient: boolean): ReadonlyArray<DayStrategy> {
  return lenient ? LENIENT_DAY_STRATEGIES : STRICT_DAY_STRATEGIES;
}

/**
 * Calendar day an article belongs to, or undefined when no strategy yields one.
 */
export function articleDay(
  record: DatedRecord,
  strategies: ReadonlyArray<DayStrategy> = STRICT_DAY_STRATEGIES,
): string | undefined {
  return extractFirst(record, strategies)?.value;
}
