import type { DailyPoint, Snapshot, TemporalTrendReport } from '../types.js';
import { articleDay, STRICT_DAY_STRATEGIES, type DayStrategy } from '../utils/date.js';
import { mean, rankCounts, round3, tally } from '../utils/normalize.js';

export interface TrendOptions {
  dayStrategies?: ReadonlyArray<DayStrategy>;
}

// Recent window vs the window right before it, in days.
const WINDOW_DAYS = 3;
const TOP_DAILY_SECTORS = 3;

interface DayBucket {
  scores: number[];
  sectors: Map<string, number>;
}

/**
 * Daily sentiment timeline and an improving/declining verdict comparing the
 * last three days of data against the three before them.
 */
export function analyzeTemporalTrends(articles: Snapshot, opts: TrendOptions = {}): TemporalTrendReport {
  const strategies = opts.dayStrategies ?? STRICT_DAY_STRATEGIES;
  const days = new Map<string, DayBucket>();

  for (const article of articles) {
    const day = articleDay(article, strategies);
    if (!day) continue;

    let bucket = days.get(day);
    if (!bucket) {
      bucket = { scores: [], sectors: new Map() };
      days.set(day, bucket);
    }
    bucket.scores.push(article.sentiment_score ?? 0);
    for (const sector of article.sectors ?? []) tally(bucket.sectors, sector);
  }

  const dates = Array.from(days.keys()).sort();
  const dailyAverages: number[] = [];
  const timeline: DailyPoint[] = dates.map((date) => {
    const bucket = days.get(date) ?? { scores: [], sectors: new Map<string, number>() };
    const avg = mean(bucket.scores);
    dailyAverages.push(avg);
    return {
      date,
      avg_sentiment: round3(avg),
      article_count: bucket.scores.length,
      top_sectors: rankCounts(bucket.sectors, TOP_DAILY_SECTORS).map(([sector, count]) => ({ sector, count })),
    };
  });

  if (dailyAverages.length < WINDOW_DAYS * 2) {
    return {
      timeline,
      trend: 'insufficient_data',
      trend_strength: 0,
      total_days: timeline.length,
      message: `Trend needs at least ${WINDOW_DAYS * 2} days of data, found ${timeline.length}`,
    };
  }

  const recent = mean(dailyAverages.slice(-WINDOW_DAYS));
  const previous = mean(dailyAverages.slice(-WINDOW_DAYS * 2, -WINDOW_DAYS));

  return {
    timeline,
    trend: recent > previous ? 'improving' : 'declining',
    trend_strength: round3(Math.abs(recent - previous)),
    total_days: timeline.length,
  };
}
