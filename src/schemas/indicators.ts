import { z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';

const SectorCountSchema = z.object({
  sector: z.string(),
  count: z.number(),
});

const OrgCountSchema = z.object({ org: z.string(), count: z.number() });

const ArticleRefSchema = z.object({
  title: z.string(),
  url: z.string(),
  sectors: z.array(z.string()),
  sentiment: z.number(),
});

const TierSchema = z.enum(['high', 'medium']);

export const NationalIndicatorsSchema = z.object({
  overall_sentiment: z.number(),
  sentiment_distribution: z.object({
    positive: z.number(),
    neutral: z.number(),
    negative: z.number(),
  }),
  total_articles: z.number(),
  top_sectors: z.array(SectorCountSchema),
  top_organizations: z.array(OrgCountSchema),
  top_locations: z.array(z.object({ location: z.string(), count: z.number() })),
  top_topics: z.array(
    z.object({
      topic: z.string(),
      count: z.number(),
      top_sectors: z.array(SectorCountSchema),
    }),
  ),
});

export const SectorIndicatorsSchema = z.record(
  z.object({
    article_count: z.number(),
    avg_sentiment: z.number(),
    sentiment_label: z.enum(['positive', 'neutral', 'negative']),
    top_keywords: z.array(z.object({ keyword: z.string(), count: z.number() })),
    top_organizations: z.array(OrgCountSchema),
  }),
);

export const RiskOpportunityInsightsSchema = z.object({
  risks: z.array(
    ArticleRefSchema.extend({
      severity: TierSchema,
      type: z.literal('negative_sentiment'),
    }),
  ),
  opportunities: z.array(
    ArticleRefSchema.extend({
      impact: TierSchema,
      type: z.literal('positive_sentiment'),
    }),
  ),
  total_risks: z.number(),
  total_opportunities: z.number(),
});

export const TemporalTrendReportSchema = z.object({
  timeline: z.array(
    z.object({
      date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/),
      avg_sentiment: z.number(),
      article_count: z.number(),
      top_sectors: z.array(SectorCountSchema),
    }),
  ),
  trend: z.enum(['improving', 'declining', 'insufficient_data']),
  trend_strength: z.number(),
  total_days: z.number(),
  message: z.string().optional(),
});

export const AnomalyReportSchema = z.object({
  anomalies: z.array(
    z.object({
      title: z.string(),
      url: z.string(),
      source: z.string(),
      sectors: z.array(z.string()),
      sentiment: z.number(),
      z_score: z.number(),
      z_score_signed: z.number(),
      anomaly_type: z.enum(['extremely_negative', 'extremely_positive']),
    }),
  ),
  total_anomalies: z.number(),
  mean_sentiment: z.number().optional(),
  std_sentiment: z.number().optional(),
  message: z.string().optional(),
});

export const SectorClusterReportSchema = z.object({
  clusters: z.array(
    z.object({
      cluster_id: z.number(),
      label: z.enum(['High Performance Sectors', 'Stable Sectors', 'Challenged Sectors']),
      avg_sentiment: z.number(),
      sectors: z.array(
        z.object({
          sector: z.string(),
          avg_sentiment: z.number(),
          article_count: z.number(),
        }),
      ),
    }),
  ),
  total_sectors: z.number(),
  message: z.string().optional(),
});

export const CorrelationReportSchema = z.object({
  top_correlations: z.array(
    z.object({
      sector1: z.string(),
      sector2: z.string(),
      co_occurrence_count: z.number(),
      sector1_article_count: z.number(),
      sector2_article_count: z.number(),
      jaccard: z.number(),
      global_fraction: z.number(),
      avg_sentiment: z.number(),
      score: z.number(),
      correlation_strength: z.enum(['very_strong', 'strong', 'moderate']),
    }),
  ),
  total_correlations: z.number(),
  thresholds: z.object({
    min_co_mentions: z.number(),
    min_jaccard: z.number(),
    min_global_fraction: z.number(),
  }),
  message: z.string().optional(),
});

const SectorVelocitySchema = z.object({
  sector: z.string(),
  current_sentiment: z.number(),
  previous_sentiment: z.number(),
  velocity: z.number(),
  trend: z.enum(['accelerating', 'decelerating', 'stable']),
  data_points: z.number(),
});

export const VelocityReportSchema = z.object({
  sector_velocities: z.array(SectorVelocitySchema),
  fastest_improving: z.array(SectorVelocitySchema),
  fastest_declining: z.array(SectorVelocitySchema),
  message: z.string().optional(),
});

export const ManifestSchema = z.object({
  generated_at: z.string(),
  duration_ms: z.number(),
  artifacts: z.array(z.string()),
  snapshot: z.object({
    total_articles: z.number(),
    sources: z.number(),
    updated_articles: z.number(),
    missing_sentiment: z.number(),
    undated: z.number(),
  }),
});

export type Manifest = z.infer<typeof ManifestSchema>;

/**
 * Summary returned by the build_indicators tool.
 */
export const RunSummarySchema = z.object({
  generated_at: z.string(),
  total_articles: z.number(),
  overall_sentiment: z.number(),
  sectors: z.number(),
  trend: z.enum(['improving', 'declining', 'insufficient_data']),
  trend_strength: z.number(),
  total_risks: z.number(),
  total_opportunities: z.number(),
  total_anomalies: z.number(),
  clusters: z.number(),
  total_correlations: z.number(),
  sector_velocities: z.number(),
  indicators_dir: z.string(),
});

export type RunSummary = z.infer<typeof RunSummarySchema>;

export const INDICATOR_SCHEMAS = {
  national: NationalIndicatorsSchema,
  sectors: SectorIndicatorsSchema,
  insights: RiskOpportunityInsightsSchema,
  trends: TemporalTrendReportSchema,
  anomalies: AnomalyReportSchema,
  clusters: SectorClusterReportSchema,
  correlations: CorrelationReportSchema,
  velocity: VelocityReportSchema,
} as const;

export type IndicatorName = keyof typeof INDICATOR_SCHEMAS;

export const INDICATOR_NAMES = [
  'national',
  'sectors',
  'insights',
  'trends',
  'anomalies',
  'clusters',
  'correlations',
  'velocity',
] as const satisfies readonly IndicatorName[];

export function indicatorJsonSchema(name: IndicatorName) {
  return zodToJsonSchema(INDICATOR_SCHEMAS[name], name);
}
