import type {
  NationalIndicators,
  SectorIndicator,
  SectorIndicators,
  SentimentLabel,
  Snapshot,
  TopicSummary,
} from '../types.js';
import { collapseWhitespace, mean, rankCounts, round3, tally } from '../utils/normalize.js';
import type { NoiseFilter } from './noiseFilter.js';
import { defaultSentimentPolicy, type SentimentPolicy } from './sentimentPolicy.js';

export interface AggregatorOptions {
  noise: NoiseFilter;
  policy?: SentimentPolicy;
  /** Sectors that always get a record, even when no article carries them. */
  knownSectors?: readonly string[];
}

const TOP_SECTORS = 5;
const TOP_ORGANIZATIONS = 10;
const TOP_LOCATIONS = 10;
const TOP_TOPICS = 10;
const TOPIC_SECTORS = 3;

const SECTOR_KEYWORDS_PER_ARTICLE = 5;
const SECTOR_TOP_KEYWORDS = 10;
const SECTOR_TOP_ORGANIZATIONS = 5;

/**
 * Most frequent cleaned keywords across the snapshot, each with the sectors
 * it shows up in most.
 */
export function buildTopTopics(articles: Snapshot, noise: NoiseFilter, limit = TOP_TOPICS): TopicSummary[] {
  const topicCounts = new Map<string, number>();
  const topicSectors = new Map<string, Map<string, number>>();

  for (const article of articles) {
    const sectors = article.sectors ?? [];
    for (const keyword of article.keywords ?? []) {
      const topic = noise.cleanTopic(keyword);
      if (!topic) continue;

      tally(topicCounts, topic);
      let perSector = topicSectors.get(topic);
      if (!perSector) {
        perSector = new Map();
        topicSectors.set(topic, perSector);
      }
      for (const sector of sectors) tally(perSector, sector);
    }
  }

  return rankCounts(topicCounts, limit).map(([topic, count]) => ({
    topic,
    count,
    top_sectors: rankCounts(topicSectors.get(topic) ?? new Map(), TOPIC_SECTORS).map(([sector, c]) => ({
      sector,
      count: c,
    })),
  }));
}

/**
 * Headline indicators for the whole corpus.
 */
export function buildNationalIndicators(articles: Snapshot, opts: AggregatorOptions): NationalIndicators {
  const { noise } = opts;

  const scores: number[] = [];
  const distribution: Record<SentimentLabel, number> = { positive: 0, neutral: 0, negative: 0 };
  const sectorCounts = new Map<string, number>();
  const orgCounts = new Map<string, number>();
  const locationCounts = new Map<string, number>();

  for (const article of articles) {
    if (article.sentiment_score !== undefined) scores.push(article.sentiment_score);

    distribution[article.sentiment_label ?? 'neutral'] += 1;

    for (const sector of article.sectors ?? []) tally(sectorCounts, sector);

    for (const raw of article.entities?.ORG ?? []) {
      const org = noise.cleanOrganization(raw);
      if (org) tally(orgCounts, org);
    }

    const places = [...(article.entities?.GPE ?? []), ...(article.entities?.LOC ?? [])];
    for (const raw of places) {
      const location = collapseWhitespace(raw);
      if (location) tally(locationCounts, location);
    }
  }

  return {
    overall_sentiment: round3(mean(scores)),
    sentiment_distribution: distribution,
    total_articles: articles.length,
    top_sectors: rankCounts(sectorCounts, TOP_SECTORS).map(([sector, count]) => ({ sector, count })),
    top_organizations: rankCounts(orgCounts, TOP_ORGANIZATIONS).map(([org, count]) => ({ org, count })),
    top_locations: rankCounts(locationCounts, TOP_LOCATIONS).map(([location, count]) => ({ location, count })),
    top_topics: buildTopTopics(articles, noise),
  };
}

interface SectorBucket {
  scores: number[];
  keywords: Map<string, number>;
  organizations: Map<string, number>;
}

function emptyBucket(): SectorBucket {
  return { scores: [], keywords: new Map(), organizations: new Map() };
}

/**
 * Per-sector indicators. An article carrying k sectors lands in k buckets;
 * a missing sentiment score counts as 0.
 */
export function buildSectorIndicators(articles: Snapshot, opts: AggregatorOptions): SectorIndicators {
  const { noise } = opts;
  const policy = opts.policy ?? defaultSentimentPolicy;
  const buckets = new Map<string, SectorBucket>();

  for (const sector of opts.knownSectors ?? []) {
    if (!buckets.has(sector)) buckets.set(sector, emptyBucket());
  }

  for (const article of articles) {
    const sentiment = article.sentiment_score ?? 0;
    const keywords = (article.keywords ?? [])
      .slice(0, SECTOR_KEYWORDS_PER_ARTICLE)
      .map((k) => noise.cleanTopic(k))
      .filter((k): k is string => k !== undefined);
    const organizations = (article.entities?.ORG ?? [])
      .map((o) => noise.cleanOrganization(o))
      .filter((o): o is string => o !== undefined);

    for (const sector of article.sectors ?? []) {
      let bucket = buckets.get(sector);
      if (!bucket) {
        bucket = emptyBucket();
        buckets.set(sector, bucket);
      }
      bucket.scores.push(sentiment);
      for (const keyword of keywords) tally(bucket.keywords, keyword);
      for (const org of organizations) tally(bucket.organizations, org);
    }
  }

  const indicators: SectorIndicators = {};
  for (const [sector, bucket] of buckets) {
    const avg = mean(bucket.scores);
    const record: SectorIndicator = {
      article_count: bucket.scores.length,
      avg_sentiment: round3(avg),
      sentiment_label: policy.label(avg),
      top_keywords: rankCounts(bucket.keywords, SECTOR_TOP_KEYWORDS).map(([keyword, count]) => ({
        keyword,
        count,
      })),
      top_organizations: rankCounts(bucket.organizations, SECTOR_TOP_ORGANIZATIONS).map(([org, count]) => ({
        org,
        count,
      })),
    };
    indicators[sector] = record;
  }
  return indicators;
}
