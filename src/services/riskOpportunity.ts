import type {
  ArticleRecord,
  ArticleRef,
  OpportunityInsight,
  RiskInsight,
  RiskOpportunityInsights,
  Snapshot,
} from '../types.js';
import { round3 } from '../utils/normalize.js';
import { defaultSentimentPolicy, type SentimentPolicy } from './sentimentPolicy.js';

const MAX_INSIGHTS = 10;

function toRef(article: Readonly<ArticleRecord>, sentiment: number): ArticleRef {
  return {
    title: article.title ?? '',
    url: article.url ?? '',
    sectors: [...(article.sectors ?? [])],
    sentiment: round3(sentiment),
  };
}

/**
 * Article-level risks (strongly negative) and opportunities (strongly
 * positive). Most articles land in neither list.
 */
export function detectRisksOpportunities(
  articles: Snapshot,
  policy: SentimentPolicy = defaultSentimentPolicy,
): RiskOpportunityInsights {
  const risks: Array<{ score: number; insight: RiskInsight }> = [];
  const opportunities: Array<{ score: number; insight: OpportunityInsight }> = [];

  for (const article of articles) {
    const score = article.sentiment_score;
    if (score === undefined) continue;

    const severity = policy.riskSeverity(score);
    if (severity) {
      risks.push({ score, insight: { ...toRef(article, score), severity, type: 'negative_sentiment' } });
    }

    const impact = policy.opportunityImpact(score);
    if (impact) {
      opportunities.push({ score, insight: { ...toRef(article, score), impact, type: 'positive_sentiment' } });
    }
  }

  // most negative first / most positive first
  risks.sort((a, b) => a.score - b.score);
  opportunities.sort((a, b) => b.score - a.score);

  return {
    risks: risks.slice(0, MAX_INSIGHTS).map((r) => r.insight),
    opportunities: opportunities.slice(0, MAX_INSIGHTS).map((o) => o.insight),
    total_risks: risks.length,
    total_opportunities: opportunities.length,
  };
}

/**
 * Smaller slice of the same ranking, e.g. the top 5 for a headline panel.
 */
export function topInsights(insights: RiskOpportunityInsights, limit = 5): RiskOpportunityInsights {
  return {
    ...insights,
    risks: insights.risks.slice(0, limit),
    opportunities: insights.opportunities.slice(0, limit),
  };
}
