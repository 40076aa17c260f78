import { z } from 'zod';
import type { ArticleRecord, EntityCategory } from '../types.js';
import { parseLooseNumber } from '../utils/extract.js';

/**
 * Lenient validation of enriched article records. A record must be an
 * object; any single malformed field degrades to "absent" instead of
 * rejecting the whole record.
 */

const optionalString = z.unknown().transform((v) => (typeof v === 'string' ? v : undefined));

const stringList = z
  .unknown()
  .transform((v) => (Array.isArray(v) ? v.filter((item): item is string => typeof item === 'string') : []));

const ENTITY_CATEGORIES: readonly EntityCategory[] = ['PERSON', 'ORG', 'GPE', 'LOC'];

const entityMap = z.unknown().transform((v) => {
  const entities: Partial<Record<EntityCategory, string[]>> = {};
  if (!v || typeof v !== 'object' || Array.isArray(v)) return entities;
  for (const category of ENTITY_CATEGORIES) {
    const list: unknown = Reflect.get(v, category);
    if (Array.isArray(list)) {
      entities[category] = list.filter((item): item is string => typeof item === 'string');
    }
  }
  return entities;
});

const sentimentLabel = z
  .unknown()
  .transform((v) => (typeof v === 'string' ? v.toLowerCase() : v))
  .pipe(z.enum(['positive', 'neutral', 'negative']).optional().catch(undefined));

const looseNumber = z.unknown().transform((v) => parseLooseNumber(v));

export const ArticleRecordSchema = z.object({
  title: optionalString,
  url: optionalString,
  source: optionalString,
  sentiment_score: looseNumber,
  sentiment_label: sentimentLabel,
  sectors: stringList,
  entities: entityMap,
  keywords: stringList,
  word_count: looseNumber.transform((n) => (n === undefined ? 0 : Math.max(0, Math.trunc(n)))),
  scraped_at: optionalString,
  updated_at: optionalString,
  update_count: looseNumber,
});

/**
 * Parse one raw record; undefined when it is not a record at all.
 */
export function parseArticleRecord(raw: unknown): ArticleRecord | undefined {
  const result = ArticleRecordSchema.safeParse(raw);
  return result.success ? result.data : undefined;
}
