/**
 * Ordered fallback chains. Each strategy returns a value or undefined; the
 * first defined value wins. Keeping the chain as data lets tests see which
 * inputs fall through every strategy.
 */

export type Strategy<I, O> = (input: I) => O | undefined;

export interface NamedStrategy<I, O> {
  name: string;
  extract: Strategy<I, O>;
}

export interface Extraction<O> {
  value: O;
  strategy: string;
}

export function extractFirst<I, O>(
  input: I,
  strategies: ReadonlyArray<NamedStrategy<I, O>>,
): Extraction<O> | undefined {
  for (const { name, extract } of strategies) {
    const value = extract(input);
    if (value !== undefined) {
      return { value, strategy: name };
    }
  }
  return undefined;
}

/**
 * Strategies for reading a sentiment score (or any float) from loosely typed input.
 */
export const NUMBER_STRATEGIES: ReadonlyArray<NamedStrategy<unknown, number>> = [
  {
    name: 'finite-number',
    extract: (raw) => (typeof raw === 'number' && Number.isFinite(raw) ? raw : undefined),
  },
  {
    name: 'numeric-string',
    extract: (raw) => {
      if (typeof raw !== 'string' || raw.trim() === '') return undefined;
      const n = Number(raw.trim());
      return Number.isFinite(n) ? n : undefined;
    },
  },
];

export function parseLooseNumber(raw: unknown): number | undefined {
  return extractFirst(raw, NUMBER_STRATEGIES)?.value;
}
