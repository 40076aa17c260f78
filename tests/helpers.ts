import { EMPTY_NOISE_LISTS, type NoiseLists } from '../src/constants/noise.js';
import { NoiseFilter } from '../src/services/noiseFilter.js';
import type { ArticleRecord, Snapshot } from '../src/types.js';

let seq = 0;

export function article(fields: Partial<ArticleRecord> = {}): ArticleRecord {
  seq += 1;
  return {
    title: `Article ${seq}`,
    url: `https://example.test/a/${seq}`,
    source: 'example.test',
    ...fields,
  };
}

export function snapshot(...records: ArticleRecord[]): Snapshot {
  return Object.freeze(records.map((r) => Object.freeze(r)));
}

export function testNoiseFilter(lists: Partial<NoiseLists> = {}, minTopicLength?: number): NoiseFilter {
  return new NoiseFilter({ lists: { ...EMPTY_NOISE_LISTS, ...lists }, minTopicLength });
}

/**
 * 12 articles over two days: 3 finance-only, 3 tourism-only, 6 tagged with both.
 */
export function twoSectorScenario(): Snapshot {
  const day1 = '2025-12-13T09:00:00Z';
  const day2 = '2025-12-14T09:00:00Z';
  return snapshot(
    article({ sectors: ['finance'], sentiment_score: 0.4, scraped_at: day1 }),
    article({ sectors: ['tourism'], sentiment_score: -0.4, scraped_at: day1 }),
    article({ sectors: ['finance', 'tourism'], sentiment_score: 0, scraped_at: day1 }),
    article({ sectors: ['finance', 'tourism'], sentiment_score: 0, scraped_at: day1 }),
    article({ sectors: ['finance', 'tourism'], sentiment_score: 0, scraped_at: day1 }),
    article({ sectors: ['finance'], sentiment_score: 0.5, scraped_at: day2 }),
    article({ sectors: ['finance'], sentiment_score: 0.6, scraped_at: day2 }),
    article({ sectors: ['tourism'], sentiment_score: -0.5, scraped_at: day2 }),
    article({ sectors: ['tourism'], sentiment_score: -0.6, scraped_at: day2 }),
    article({ sectors: ['finance', 'tourism'], sentiment_score: 0, scraped_at: day2 }),
    article({ sectors: ['finance', 'tourism'], sentiment_score: 0, scraped_at: day2 }),
    article({ sectors: ['finance', 'tourism'], sentiment_score: 0, scraped_at: day2 }),
  );
}
