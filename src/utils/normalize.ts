/**
 * Generic numeric and string helpers.
 * These utilities are used across the aggregator and every analytic.
 */

/**
 * Round to a fixed number of decimals. Returns a number (not string) and never -0.
 */
export function roundTo(n: number, decimals: number): number {
  const factor = 10 ** decimals;
  const rounded = Math.round(n * factor) / factor;
  return rounded === 0 ? 0 : rounded;
}

export function round2(n: number): number {
  return roundTo(n, 2);
}

export function round3(n: number): number {
  return roundTo(n, 3);
}

/**
 * Arithmetic mean; 0 for an empty list.
 */
export function mean(values: readonly number[]): number {
  if (!values.length) return 0;
  return values.reduce((a, b) => a + b, 0) / values.length;
}

/**
 * Population standard deviation (divides by N, not N - 1).
 */
export function populationStd(values: readonly number[], center = mean(values)): number {
  if (!values.length) return 0;
  const variance = values.reduce((a, b) => a + (b - center) * (b - center), 0) / values.length;
  return Math.sqrt(variance);
}

/**
 * Collapse runs of whitespace and trim.
 */
export function collapseWhitespace(text: string): string {
  return text.split(/\s+/).filter(Boolean).join(' ');
}

/**
 * Increment a frequency counter. Map keeps first-seen order, which is what
 * ties fall back to when ranking.
 */
export function tally(counts: Map<string, number>, key: string, by = 1): void {
  counts.set(key, (counts.get(key) ?? 0) + by);
}

/**
 * Top `limit` entries by descending count. Array.prototype.sort is stable,
 * so equal counts keep first-encountered order.
 */
export function rankCounts(counts: Map<string, number>, limit: number): Array<[string, number]> {
  return Array.from(counts.entries())
    .sort(([, a], [, b]) => b - a)
    .slice(0, limit);
}
