import { ErrorCode } from '@modelcontextprotocol/sdk/types.js';
import { getConfig, type AppConfig } from '../config.js';
import { logger } from '../logger.js';
import type { IndicatorSet, Snapshot, SnapshotStats } from '../types.js';
import { articleDay, dayStrategies, type DayStrategy } from '../utils/date.js';
import { buildNationalIndicators, buildSectorIndicators } from './aggregator.js';
import { detectAnomalies } from './anomalies.js';
import { ArticleStoreError, createArticleStore, type ArticleStore } from './articleStore.js';
import { clusterSectors } from './clustering.js';
import { analyzeCorrelations } from './correlation.js';
import { createNoiseFilter, type NoiseFilter } from './noiseFilter.js';
import { IndicatorPublisher, PublishError } from './publisher.js';
import { detectRisksOpportunities } from './riskOpportunity.js';
import { defaultSentimentPolicy, type SentimentPolicy } from './sentimentPolicy.js';
import { analyzeTemporalTrends } from './trends.js';
import { analyzeVelocity } from './velocity.js';

export class IndicatorRunError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    public readonly details?: unknown,
  ) {
    super(message);
    this.name = 'IndicatorRunError';
  }
}

export interface ComputeOptions {
  noise: NoiseFilter;
  policy?: SentimentPolicy;
  knownSectors?: readonly string[];
  dayStrategies?: ReadonlyArray<DayStrategy>;
  clusterSeed?: number;
  clusterRestarts?: number;
}

/**
 * Every analytic over one immutable snapshot. Pure: no I/O, no clock.
 */
export function computeIndicators(articles: Snapshot, opts: ComputeOptions): IndicatorSet {
  const policy = opts.policy ?? defaultSentimentPolicy;
  const aggregate = { noise: opts.noise, policy, knownSectors: opts.knownSectors };

  return {
    national: buildNationalIndicators(articles, aggregate),
    sectors: buildSectorIndicators(articles, aggregate),
    insights: detectRisksOpportunities(articles, policy),
    trends: analyzeTemporalTrends(articles, { dayStrategies: opts.dayStrategies }),
    anomalies: detectAnomalies(articles),
    clusters: clusterSectors(articles, { policy, seed: opts.clusterSeed, restarts: opts.clusterRestarts }),
    correlations: analyzeCorrelations(articles),
    velocity: analyzeVelocity(articles, { policy, dayStrategies: opts.dayStrategies }),
  };
}

/**
 * Counts of records each analytic has to work around.
 */
export function describeSnapshot(
  articles: Snapshot,
  strategies: ReadonlyArray<DayStrategy> = dayStrategies(false),
): SnapshotStats {
  const sources = new Set<string>();
  let updated = 0;
  let missingSentiment = 0;
  let undated = 0;

  for (const article of articles) {
    if (article.source) sources.add(article.source);
    if ((article.update_count ?? 0) > 0) updated++;
    if (article.sentiment_score === undefined) missingSentiment++;
    if (!articleDay(article, strategies)) undated++;
  }

  return {
    total_articles: articles.length,
    sources: sources.size,
    updated_articles: updated,
    missing_sentiment: missingSentiment,
    undated,
  };
}

export interface PipelineDeps {
  config?: AppConfig;
  store?: ArticleStore;
  publisher?: IndicatorPublisher;
  noise?: NoiseFilter;
  policy?: SentimentPolicy;
  now?: () => Date;
}

export interface PipelineResult {
  indicators: IndicatorSet;
  stats: SnapshotStats;
  artifacts: string[];
  generatedAt: string;
  indicatorsDir: string;
}

/**
 * One full run: read the snapshot once, compute every analytic, publish all
 * artifacts. A store failure aborts before anything is written, leaving the
 * previous run's artifacts as the last known good state.
 */
export async function runIndicatorPipeline(deps: PipelineDeps = {}): Promise<PipelineResult> {
  const cfg = deps.config ?? getConfig();
  const now = deps.now ?? (() => new Date());
  const started = now();
  const store = deps.store ?? createArticleStore(cfg);
  const publisher = deps.publisher ?? new IndicatorPublisher(cfg.indicatorsDir);
  const strategies = dayStrategies(cfg.lenientTimestamps);

  let articles: Snapshot;
  try {
    articles = await store.readSnapshot();
  } catch (err) {
    logger.error({ err, store: store.description }, 'Article store unavailable; nothing published');
    if (err instanceof ArticleStoreError) {
      throw new IndicatorRunError(err.message, ErrorCode.InternalError, err.details);
    }
    throw err;
  }

  const stats = describeSnapshot(articles, strategies);
  if (stats.missing_sentiment > 0 || stats.undated > 0) {
    logger.info(
      { missingSentiment: stats.missing_sentiment, undated: stats.undated },
      'Some records are excluded from analytics that need the missing field',
    );
  }

  const indicators = computeIndicators(articles, {
    noise: deps.noise ?? createNoiseFilter(cfg),
    policy: deps.policy,
    knownSectors: cfg.knownSectors,
    dayStrategies: strategies,
    clusterSeed: cfg.clustering.seed,
    clusterRestarts: cfg.clustering.restarts,
  });
  logNoResultStates(indicators);

  const generatedAt = started.toISOString();
  let artifacts: string[];
  try {
    artifacts = await publisher.publish(indicators, {
      generated_at: generatedAt,
      duration_ms: now().getTime() - started.getTime(),
      snapshot: stats,
    });
  } catch (err) {
    logger.error({ err, dir: publisher.dir }, 'Publishing indicators failed');
    if (err instanceof PublishError) {
      throw new IndicatorRunError(err.message, ErrorCode.InternalError, err.details);
    }
    throw err;
  }

  return { indicators, stats, artifacts, generatedAt, indicatorsDir: publisher.dir };
}

function logNoResultStates(set: IndicatorSet): void {
  const notes: Record<string, string | undefined> = {
    trends: set.trends.message,
    anomalies: set.anomalies.message,
    clusters: set.clusters.message,
    correlations: set.correlations.message,
    velocity: set.velocity.message,
  };
  for (const [analytic, message] of Object.entries(notes)) {
    if (message) logger.info({ analytic }, message);
  }
}
