import { describe, expect, it } from 'vitest';
import { analyzeTemporalTrends } from '../src/services/trends.js';
import { article, snapshot, twoSectorScenario } from './helpers.js';

function dated(day: number, score: number, sectors: string[] = ['finance']) {
  return article({ sentiment_score: score, sectors, scraped_at: `2025-12-${String(day).padStart(2, '0')}T10:00:00Z` });
}

describe('analyzeTemporalTrends', () => {
  it('needs six distinct days for a verdict', () => {
    const report = analyzeTemporalTrends(twoSectorScenario());
    expect(report.trend).toBe('insufficient_data');
    expect(report.trend_strength).toBe(0);
    expect(report.total_days).toBe(2);
    expect(report.message).toBe('Trend needs at least 6 days of data, found 2');
    expect(report.timeline.map((d) => [d.date, d.article_count, d.avg_sentiment])).toEqual([
      ['2025-12-13', 5, 0],
      ['2025-12-14', 7, 0],
    ]);
  });

  it('compares the last three days with the three before them', () => {
    const articles = snapshot(
      dated(6, 0.3),
      dated(5, 0.3),
      dated(4, 0.3),
      dated(3, 0),
      dated(2, 0),
      dated(1, 0),
      dated(1, 0.9, ['energy']),
    );
    const report = analyzeTemporalTrends(articles);
    expect(report.timeline.map((d) => d.date)).toEqual([
      '2025-12-01',
      '2025-12-02',
      '2025-12-03',
      '2025-12-04',
      '2025-12-05',
      '2025-12-06',
    ]);
    // 2025-12-01 averages 0.45, so the older window is 0.15
    expect(report.trend).toBe('improving');
    expect(report.trend_strength).toBe(0.15);
    expect(report.message).toBeUndefined();
  });

  it('calls an unchanged window declining', () => {
    const articles = snapshot(...[1, 2, 3, 4, 5, 6].map((d) => dated(d, 0.2)));
    const report = analyzeTemporalTrends(articles);
    expect(report.trend).toBe('declining');
    expect(report.trend_strength).toBe(0);
  });

  it('reports the top sectors of each day and skips undated articles', () => {
    const report = analyzeTemporalTrends(
      snapshot(
        dated(1, 0.1, ['finance', 'energy']),
        dated(1, 0.1, ['energy']),
        article({ sentiment_score: 0.9, sectors: ['energy'], scraped_at: 'someday' }),
      ),
    );
    expect(report.timeline).toEqual([
      {
        date: '2025-12-01',
        avg_sentiment: 0.1,
        article_count: 2,
        top_sectors: [
          { sector: 'energy', count: 2 },
          { sector: 'finance', count: 1 },
        ],
      },
    ]);
  });
});
