/**
 * Shared types for Sector Pulse.
 * Input records come from the enrichment stage; every other type here is a
 * derived artifact rebuilt from scratch on each run.
 */

export type SentimentLabel = 'positive' | 'neutral' | 'negative';

export type EntityCategory = 'PERSON' | 'ORG' | 'GPE' | 'LOC';

export interface ArticleRecord {
  title?: string;
  url?: string;
  source?: string;
  sentiment_score?: number; // conventionally -1..1
  sentiment_label?: SentimentLabel;
  sectors?: string[]; // lower-cased canonical tags
  entities?: Partial<Record<EntityCategory, string[]>>;
  keywords?: string[];
  word_count?: number;
  scraped_at?: string; // ISO-8601
  updated_at?: string; // ISO-8601
  update_count?: number;
}

export type Snapshot = ReadonlyArray<Readonly<ArticleRecord>>;

/** Reference to a source article inside a derived artifact. */
export interface ArticleRef {
  title: string;
  url: string;
  sectors: string[];
  sentiment: number;
}

// National / sector aggregates

export interface SectorCount {
  sector: string;
  count: number;
}

export interface TopicSummary {
  topic: string;
  count: number;
  top_sectors: SectorCount[];
}

export interface NationalIndicators {
  overall_sentiment: number;
  sentiment_distribution: Record<SentimentLabel, number>;
  total_articles: number;
  top_sectors: SectorCount[];
  top_organizations: Array<{ org: string; count: number }>;
  top_locations: Array<{ location: string; count: number }>;
  top_topics: TopicSummary[];
}

export interface SectorIndicator {
  article_count: number;
  avg_sentiment: number;
  sentiment_label: SentimentLabel;
  top_keywords: Array<{ keyword: string; count: number }>;
  top_organizations: Array<{ org: string; count: number }>;
}

export type SectorIndicators = Record<string, SectorIndicator>;

// Risks and opportunities

export type Tier = 'high' | 'medium';

export interface RiskInsight extends ArticleRef {
  severity: Tier;
  type: 'negative_sentiment';
}

export interface OpportunityInsight extends ArticleRef {
  impact: Tier;
  type: 'positive_sentiment';
}

export interface RiskOpportunityInsights {
  risks: RiskInsight[];
  opportunities: OpportunityInsight[];
  total_risks: number;
  total_opportunities: number;
}

// Temporal trends

export type TrendVerdict = 'improving' | 'declining' | 'insufficient_data';

export interface DailyPoint {
  date: string; // YYYY-MM-DD
  avg_sentiment: number;
  article_count: number;
  top_sectors: SectorCount[];
}

export interface TemporalTrendReport {
  timeline: DailyPoint[];
  trend: TrendVerdict;
  trend_strength: number;
  total_days: number;
  message?: string;
}

// Anomalies

export type AnomalyType = 'extremely_negative' | 'extremely_positive';

export interface SentimentAnomaly {
  title: string;
  url: string;
  source: string;
  sectors: string[];
  sentiment: number;
  z_score: number; // absolute
  z_score_signed: number;
  anomaly_type: AnomalyType;
}

export interface AnomalyReport {
  anomalies: SentimentAnomaly[];
  total_anomalies: number;
  mean_sentiment?: number;
  std_sentiment?: number;
  message?: string;
}

// Sector clusters

export type ClusterLabel = 'High Performance Sectors' | 'Stable Sectors' | 'Challenged Sectors';

export interface ClusterMember {
  sector: string;
  avg_sentiment: number;
  article_count: number;
}

export interface SectorCluster {
  cluster_id: number;
  label: ClusterLabel;
  avg_sentiment: number;
  sectors: ClusterMember[];
}

export interface SectorClusterReport {
  clusters: SectorCluster[];
  total_sectors: number;
  message?: string;
}

// Sector co-occurrence

export type CorrelationStrength = 'very_strong' | 'strong' | 'moderate';

export interface SectorCorrelation {
  sector1: string;
  sector2: string;
  co_occurrence_count: number;
  sector1_article_count: number;
  sector2_article_count: number;
  jaccard: number;
  global_fraction: number;
  avg_sentiment: number;
  score: number;
  correlation_strength: CorrelationStrength;
}

export interface CorrelationReport {
  top_correlations: SectorCorrelation[];
  total_correlations: number;
  thresholds: {
    min_co_mentions: number;
    min_jaccard: number;
    min_global_fraction: number;
  };
  message?: string;
}

// Sentiment velocity

export type VelocityTrend = 'accelerating' | 'decelerating' | 'stable';

export interface SectorVelocity {
  sector: string;
  current_sentiment: number;
  previous_sentiment: number;
  velocity: number;
  trend: VelocityTrend;
  data_points: number;
}

export interface VelocityReport {
  sector_velocities: SectorVelocity[];
  fastest_improving: SectorVelocity[];
  fastest_declining: SectorVelocity[];
  message?: string;
}

// Whole run

export interface IndicatorSet {
  national: NationalIndicators;
  sectors: SectorIndicators;
  insights: RiskOpportunityInsights;
  trends: TemporalTrendReport;
  anomalies: AnomalyReport;
  clusters: SectorClusterReport;
  correlations: CorrelationReport;
  velocity: VelocityReport;
}

export interface SnapshotStats {
  total_articles: number;
  sources: number;
  updated_articles: number;
  missing_sentiment: number;
  undated: number;
}
