import type { AnomalyReport, ArticleRecord, SentimentAnomaly, Snapshot } from '../types.js';
import { mean, populationStd, round2, round3 } from '../utils/normalize.js';

export interface AnomalyConfig {
  minArticles: number; // below this no detection is attempted
  zThreshold: number; // |z| strictly above this is anomalous
  maxReported: number;
  titleLength: number;
}

export const DEFAULT_ANOMALY_CONFIG: AnomalyConfig = {
  minArticles: 10,
  zThreshold: 2,
  maxReported: 20,
  titleLength: 100,
};

// below this the spread is float noise from summing identical scores
const MIN_STD = 1e-12;

/**
 * Flags articles whose sentiment is a z-score outlier against the whole
 * snapshot (population mean and standard deviation).
 */
export function detectAnomalies(articles: Snapshot, config: Partial<AnomalyConfig> = {}): AnomalyReport {
  const cfg = { ...DEFAULT_ANOMALY_CONFIG, ...config };
  const scored = articles.filter(
    (a): a is Readonly<ArticleRecord> & { sentiment_score: number } => a.sentiment_score !== undefined,
  );

  if (scored.length < cfg.minArticles) {
    return {
      anomalies: [],
      total_anomalies: 0,
      message: 'Insufficient data for anomaly detection',
    };
  }

  const scores = scored.map((a) => a.sentiment_score);
  const center = mean(scores);
  const std = populationStd(scores, center);

  if (std < MIN_STD) {
    return {
      anomalies: [],
      total_anomalies: 0,
      mean_sentiment: round3(center),
      std_sentiment: 0,
      message: 'No sentiment variance; z-scores are undefined',
    };
  }

  const flagged: Array<{ absZ: number; anomaly: SentimentAnomaly }> = [];
  for (const article of scored) {
    const z = (article.sentiment_score - center) / std;
    const absZ = Math.abs(z);
    if (absZ <= cfg.zThreshold) continue;

    flagged.push({
      absZ,
      anomaly: {
        title: (article.title ?? '').slice(0, cfg.titleLength),
        url: article.url ?? '',
        source: article.source ?? '',
        sectors: [...(article.sectors ?? [])],
        sentiment: round3(article.sentiment_score),
        z_score: round2(absZ),
        z_score_signed: round2(z),
        anomaly_type: z < 0 ? 'extremely_negative' : 'extremely_positive',
      },
    });
  }

  flagged.sort((a, b) => b.absZ - a.absZ);

  return {
    anomalies: flagged.slice(0, cfg.maxReported).map((f) => f.anomaly),
    total_anomalies: flagged.length,
    mean_sentiment: round3(center),
    std_sentiment: round3(std),
  };
}
