import { describe, expect, it } from 'vitest';
import { detectAnomalies } from '../src/services/anomalies.js';
import { article, snapshot, twoSectorScenario } from './helpers.js';

function scored(...scores: number[]) {
  return scores.map((s) => article({ sentiment_score: s, sectors: ['finance'] }));
}

describe('detectAnomalies', () => {
  it('refuses to score fewer than ten articles', () => {
    const report = detectAnomalies(snapshot(...scored(-1, -1, -1, 1, 1, 1, 0, 0, 0)));
    expect(report).toEqual({
      anomalies: [],
      total_anomalies: 0,
      message: 'Insufficient data for anomaly detection',
    });
  });

  it('ignores articles without a score when counting', () => {
    const report = detectAnomalies(snapshot(...scored(0, 0, 0, 0, 0, 0, 0, 0, 0.9), article()));
    expect(report.message).toBe('Insufficient data for anomaly detection');
  });

  it('flags a single strong outlier', () => {
    const outlier = article({ title: 'x'.repeat(150), source: 'wire', sentiment_score: 0.9, sectors: ['energy'] });
    const report = detectAnomalies(snapshot(...scored(0, 0, 0, 0, 0, 0, 0, 0, 0), outlier));

    expect(report.mean_sentiment).toBe(0.09);
    expect(report.std_sentiment).toBe(0.27);
    expect(report.total_anomalies).toBe(1);
    expect(report.anomalies).toEqual([
      {
        title: 'x'.repeat(100),
        url: outlier.url,
        source: 'wire',
        sectors: ['energy'],
        sentiment: 0.9,
        z_score: 3,
        z_score_signed: 3,
        anomaly_type: 'extremely_positive',
      },
    ]);
  });

  it('marks negative outliers with a negative signed z', () => {
    const report = detectAnomalies(snapshot(...scored(0, 0, 0, 0, 0, 0, 0, 0, 0, -0.9)));
    expect(report.anomalies[0].anomaly_type).toBe('extremely_negative');
    expect(report.anomalies[0].z_score).toBe(3);
    expect(report.anomalies[0].z_score_signed).toBe(-3);
  });

  it('reports zero variance instead of dividing by it', () => {
    const report = detectAnomalies(snapshot(...scored(...Array<number>(10).fill(0.5))));
    expect(report).toEqual({
      anomalies: [],
      total_anomalies: 0,
      mean_sentiment: 0.5,
      std_sentiment: 0,
      message: 'No sentiment variance; z-scores are undefined',
    });
  });

  it('finds nothing in a symmetric spread', () => {
    const report = detectAnomalies(twoSectorScenario());
    expect(report.total_anomalies).toBe(0);
    expect(report.mean_sentiment).toBe(0);
    expect(report.std_sentiment).toBe(0.358);
    expect(report.message).toBeUndefined();
  });
});
