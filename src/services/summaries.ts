import { RunSummarySchema, type RunSummary } from '../schemas/indicators.js';
import type { IndicatorSet } from '../types.js';
import type { PipelineResult } from './pipeline.js';

function pct(part: number, total: number): string {
  if (!total) return '0';
  return ((part / total) * 100).toFixed(0);
}

export function summarizeRun(result: PipelineResult): RunSummary {
  const { indicators } = result;
  return RunSummarySchema.parse({
    generated_at: result.generatedAt,
    total_articles: indicators.national.total_articles,
    overall_sentiment: indicators.national.overall_sentiment,
    sectors: Object.keys(indicators.sectors).length,
    trend: indicators.trends.trend,
    trend_strength: indicators.trends.trend_strength,
    total_risks: indicators.insights.total_risks,
    total_opportunities: indicators.insights.total_opportunities,
    total_anomalies: indicators.anomalies.total_anomalies,
    clusters: indicators.clusters.clusters.length,
    total_correlations: indicators.correlations.total_correlations,
    sector_velocities: indicators.velocity.sector_velocities.length,
    indicators_dir: result.indicatorsDir,
  });
}

export function describeNationalMood(score: number): string {
  return score >= 0.3
    ? 'Coverage is strongly positive across the national news cycle.'
    : score > 0.1
      ? 'Coverage leans positive, with favorable developments outweighing concerns.'
      : score >= -0.1
        ? 'Coverage is balanced without a strong directional bias.'
        : score > -0.3
          ? 'Coverage leans cautious, with mixed but predominantly negative signals.'
          : 'Coverage is strongly negative, highlighting risks across sectors.';
}

/**
 * Plain-text digest of one run for tool output and the CLI.
 */
export function formatRunDigest(summary: RunSummary, indicators: IndicatorSet): string {
  const { national, trends, insights, velocity } = indicators;
  if (!summary.total_articles) {
    return `Sector Pulse: no articles in the store yet. Indicators written to ${summary.indicators_dir}.`;
  }

  const dist = national.sentiment_distribution;
  const total = national.total_articles;
  const lines = [
    `Sector Pulse: ${summary.generated_at}`,
    describeNationalMood(summary.overall_sentiment),
    `Overall sentiment ${summary.overall_sentiment.toFixed(3)} from ${total} articles across ${summary.sectors} sectors`,
    `Distribution: ${pct(dist.positive, total)}% positive, ${pct(dist.neutral, total)}% neutral, ${pct(dist.negative, total)}% negative`,
  ];

  const leaders = national.top_sectors.map((s) => `${s.sector} (${s.count})`);
  if (leaders.length) lines.push(`Most covered sectors: ${leaders.join(', ')}`);

  lines.push(
    trends.trend === 'insufficient_data'
      ? `Trend: not enough history (${trends.total_days} days)`
      : `Trend: ${trends.trend} by ${trends.trend_strength.toFixed(3)} over the last three days`,
  );
  lines.push(`Risks: ${insights.total_risks}, opportunities: ${insights.total_opportunities}`);
  lines.push(`Anomalies: ${summary.total_anomalies}, sector correlations: ${summary.total_correlations}`);

  const mover = velocity.sector_velocities[0];
  if (mover) {
    lines.push(`Fastest mover: ${mover.sector} (${mover.velocity >= 0 ? '+' : ''}${mover.velocity.toFixed(3)})`);
  }
  lines.push(`Indicators written to ${summary.indicators_dir}`);
  return lines.join('\n');
}
