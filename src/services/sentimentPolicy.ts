import type { ClusterLabel, SentimentLabel, Tier, VelocityTrend } from '../types.js';

/**
 * Every sentiment cut-off used by the analytics, in one place. Components
 * take a policy instead of hard-coding thresholds, so the aggregator, the
 * detector and the velocity engine cannot drift apart.
 */
export interface SentimentThresholds {
  /** label: > positive is "positive", < negative is "negative" */
  label: { positive: number; negative: number };
  /** risk when score < risk, high severity when < highRisk */
  risk: { risk: number; highRisk: number };
  /** opportunity when score > opportunity, high impact when > highOpportunity */
  opportunity: { opportunity: number; highOpportunity: number };
  /** cluster mean: > highPerformance / < challenged */
  cluster: { highPerformance: number; challenged: number };
  /** velocity: > accelerating / < -accelerating; movers beyond +-mover */
  velocity: { accelerating: number; mover: number };
}

export const DEFAULT_THRESHOLDS: SentimentThresholds = Object.freeze({
  label: { positive: 0.1, negative: -0.1 },
  risk: { risk: -0.3, highRisk: -0.5 },
  opportunity: { opportunity: 0.3, highOpportunity: 0.5 },
  cluster: { highPerformance: 0.2, challenged: -0.1 },
  velocity: { accelerating: 0.1, mover: 0.05 },
});

export class SentimentPolicy {
  constructor(readonly thresholds: SentimentThresholds = DEFAULT_THRESHOLDS) {}

  label(score: number): SentimentLabel {
    const { positive, negative } = this.thresholds.label;
    if (score > positive) return 'positive';
    if (score < negative) return 'negative';
    return 'neutral';
  }

  /** Severity tier when the score is a risk, otherwise undefined. */
  riskSeverity(score: number): Tier | undefined {
    const { risk, highRisk } = this.thresholds.risk;
    if (!(score < risk)) return undefined;
    return score < highRisk ? 'high' : 'medium';
  }

  /** Impact tier when the score is an opportunity, otherwise undefined. */
  opportunityImpact(score: number): Tier | undefined {
    const { opportunity, highOpportunity } = this.thresholds.opportunity;
    if (!(score > opportunity)) return undefined;
    return score > highOpportunity ? 'high' : 'medium';
  }

  clusterLabel(meanSentiment: number): ClusterLabel {
    const { highPerformance, challenged } = this.thresholds.cluster;
    if (meanSentiment > highPerformance) return 'High Performance Sectors';
    if (meanSentiment < challenged) return 'Challenged Sectors';
    return 'Stable Sectors';
  }

  velocityTrend(velocity: number): VelocityTrend {
    const { accelerating } = this.thresholds.velocity;
    if (velocity > accelerating) return 'accelerating';
    if (velocity < -accelerating) return 'decelerating';
    return 'stable';
  }

  isImproving(velocity: number): boolean {
    return velocity > this.thresholds.velocity.mover;
  }

  isDeclining(velocity: number): boolean {
    return velocity < -this.thresholds.velocity.mover;
  }
}

export const defaultSentimentPolicy = new SentimentPolicy();
