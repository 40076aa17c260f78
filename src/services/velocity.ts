import type { SectorVelocity, Snapshot, VelocityReport } from '../types.js';
import { articleDay, STRICT_DAY_STRATEGIES, type DayStrategy } from '../utils/date.js';
import { mean, round3 } from '../utils/normalize.js';
import { defaultSentimentPolicy, type SentimentPolicy } from './sentimentPolicy.js';

export interface VelocityOptions {
  policy?: SentimentPolicy;
  dayStrategies?: ReadonlyArray<DayStrategy>;
}

/**
 * Day-over-day change of each sector's mean sentiment: latest day with data
 * minus the day with data before it. Sectors seen on a single day are left out.
 */
export function analyzeVelocity(articles: Snapshot, opts: VelocityOptions = {}): VelocityReport {
  const policy = opts.policy ?? defaultSentimentPolicy;
  const strategies = opts.dayStrategies ?? STRICT_DAY_STRATEGIES;
  const timelines = new Map<string, Map<string, number[]>>();

  for (const article of articles) {
    const day = articleDay(article, strategies);
    if (!day) continue;
    const sentiment = article.sentiment_score ?? 0;

    for (const sector of article.sectors ?? []) {
      let byDay = timelines.get(sector);
      if (!byDay) {
        byDay = new Map();
        timelines.set(sector, byDay);
      }
      const scores = byDay.get(day);
      if (scores) scores.push(sentiment);
      else byDay.set(day, [sentiment]);
    }
  }

  const ranked: Array<{ velocity: number; entry: SectorVelocity }> = [];
  for (const [sector, byDay] of timelines) {
    const dates = Array.from(byDay.keys()).sort();
    if (dates.length < 2) continue;

    const current = mean(byDay.get(dates[dates.length - 1]) ?? []);
    const previous = mean(byDay.get(dates[dates.length - 2]) ?? []);
    const velocity = current - previous;

    ranked.push({
      velocity,
      entry: {
        sector,
        current_sentiment: round3(current),
        previous_sentiment: round3(previous),
        velocity: round3(velocity),
        trend: policy.velocityTrend(velocity),
        data_points: dates.length,
      },
    });
  }

  ranked.sort((a, b) => Math.abs(b.velocity) - Math.abs(a.velocity));

  const report: VelocityReport = {
    sector_velocities: ranked.map((r) => r.entry),
    fastest_improving: ranked.filter((r) => policy.isImproving(r.velocity)).map((r) => r.entry),
    fastest_declining: ranked.filter((r) => policy.isDeclining(r.velocity)).map((r) => r.entry),
  };
  if (!ranked.length) {
    report.message = 'No sector has sentiment data on two or more distinct days';
  }
  return report;
}
