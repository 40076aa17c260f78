import { describe, expect, it } from 'vitest';
import { detectRisksOpportunities, topInsights } from '../src/services/riskOpportunity.js';
import { article, snapshot, twoSectorScenario } from './helpers.js';

describe('detectRisksOpportunities', () => {
  it('uses strict thresholds and tiers', () => {
    const result = detectRisksOpportunities(
      snapshot(
        article({ title: 'edge-risk', sentiment_score: -0.3 }),
        article({ title: 'edge-opp', sentiment_score: 0.3 }),
        article({ title: 'medium-risk', sentiment_score: -0.5 }),
        article({ title: 'high-risk', sentiment_score: -0.51 }),
        article({ title: 'medium-opp', sentiment_score: 0.5 }),
        article({ title: 'high-opp', sentiment_score: 0.9 }),
        article({ title: 'unscored' }),
      ),
    );

    expect(result.risks.map((r) => [r.title, r.severity])).toEqual([
      ['high-risk', 'high'],
      ['medium-risk', 'medium'],
    ]);
    expect(result.opportunities.map((o) => [o.title, o.impact])).toEqual([
      ['high-opp', 'high'],
      ['medium-opp', 'medium'],
    ]);
    expect(result.risks[0].type).toBe('negative_sentiment');
    expect(result.opportunities[0].type).toBe('positive_sentiment');
  });

  it('ranks most extreme first', () => {
    const result = detectRisksOpportunities(twoSectorScenario());
    expect(result.risks.map((r) => r.sentiment)).toEqual([-0.6, -0.5, -0.4]);
    expect(result.opportunities.map((o) => o.sentiment)).toEqual([0.6, 0.5, 0.4]);
    expect(result.risks[0].sectors).toEqual(['tourism']);
  });

  it('caps each list at ten but reports the full totals', () => {
    const many = snapshot(...Array.from({ length: 12 }, (_, i) => article({ sentiment_score: -0.31 - i * 0.01 })));
    const result = detectRisksOpportunities(many);
    expect(result.risks).toHaveLength(10);
    expect(result.total_risks).toBe(12);
    expect(result.total_opportunities).toBe(0);
    expect(result.risks[0].sentiment).toBe(-0.42);

    const top = topInsights(result, 5);
    expect(top.risks).toHaveLength(5);
    expect(top.risks[0]).toEqual(result.risks[0]);
    expect(top.total_risks).toBe(12);
  });
});
