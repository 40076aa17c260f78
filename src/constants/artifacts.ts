import type { IndicatorName } from '../schemas/indicators.js';

/**
 * File name of each published artifact inside the indicators directory.
 * Dashboard and chatbot readers load these names directly.
 */
export const ARTIFACT_FILES: Readonly<Record<IndicatorName, string>> = {
  national: 'national_indicators.json',
  sectors: 'sector_indicators.json',
  insights: 'risk_opportunity_insights.json',
  trends: 'temporal_trends.json',
  anomalies: 'anomalies.json',
  clusters: 'sector_clusters.json',
  correlations: 'sector_correlations.json',
  velocity: 'sentiment_velocity.json',
};

export const MANIFEST_FILE = 'manifest.json';
