import type { CorrelationReport, CorrelationStrength, SectorCorrelation, Snapshot } from '../types.js';
import { mean, round3 } from '../utils/normalize.js';

export interface CorrelationConfig {
  minCoMentionsBase: number;
  dynamicFraction: number; // of the largest pair count
  minJaccard: number;
  minGlobalFraction: number;
  maxReported: number;
}

export const DEFAULT_CORRELATION_CONFIG: CorrelationConfig = {
  minCoMentionsBase: 2,
  dynamicFraction: 0.01,
  minJaccard: 0.05,
  minGlobalFraction: 0.02,
  maxReported: 20,
};

interface PairStats {
  sector1: string;
  sector2: string;
  count: number;
  sentiments: number[];
}

function classifyStrength(count: number, jaccard: number): CorrelationStrength {
  if (count >= 8 && jaccard >= 0.15) return 'very_strong';
  if (count >= 4 && jaccard >= 0.1) return 'strong';
  return 'moderate';
}

/**
 * Sector co-occurrence: every unordered pair of distinct sectors sharing an
 * article. A pair is reported only when it clears a count floor scaled to
 * the busiest pair, a Jaccard floor and a share-of-corpus floor.
 */
export function analyzeCorrelations(
  articles: Snapshot,
  config: Partial<CorrelationConfig> = {},
): CorrelationReport {
  const cfg = { ...DEFAULT_CORRELATION_CONFIG, ...config };
  const sectorArticles = new Map<string, Set<number>>();
  const pairs = new Map<string, PairStats>();

  articles.forEach((article, index) => {
    const sectors = Array.from(new Set((article.sectors ?? []).map((s) => s.toLowerCase()))).sort();
    // single-sector articles take no part in pairing, Jaccard sets included
    if (sectors.length < 2) return;
    const sentiment = article.sentiment_score ?? 0;

    for (const sector of sectors) {
      let seen = sectorArticles.get(sector);
      if (!seen) {
        seen = new Set();
        sectorArticles.set(sector, seen);
      }
      seen.add(index);
    }

    for (let i = 0; i < sectors.length; i++) {
      for (let j = i + 1; j < sectors.length; j++) {
        const key = `${sectors[i]}\u0000${sectors[j]}`;
        let pair = pairs.get(key);
        if (!pair) {
          pair = { sector1: sectors[i], sector2: sectors[j], count: 0, sentiments: [] };
          pairs.set(key, pair);
        }
        pair.count += 1;
        pair.sentiments.push(sentiment);
      }
    }
  });

  const maxCount = Math.max(0, ...Array.from(pairs.values(), (p) => p.count));
  const minCoMentions = Math.max(cfg.minCoMentionsBase, Math.floor(cfg.dynamicFraction * maxCount));
  const thresholds = {
    min_co_mentions: minCoMentions,
    min_jaccard: cfg.minJaccard,
    min_global_fraction: cfg.minGlobalFraction,
  };

  if (!pairs.size) {
    return {
      top_correlations: [],
      total_correlations: 0,
      thresholds,
      message: 'No article mentions two or more sectors',
    };
  }

  const total = articles.length;
  const scored: Array<{ score: number; entry: SectorCorrelation }> = [];

  for (const pair of pairs.values()) {
    if (pair.count < minCoMentions) continue;

    const set1 = sectorArticles.get(pair.sector1) ?? new Set<number>();
    const set2 = sectorArticles.get(pair.sector2) ?? new Set<number>();
    const union = new Set([...set1, ...set2]).size;
    const jaccard = union > 0 ? pair.count / union : 0;
    const globalFraction = pair.count / total;

    if (jaccard < cfg.minJaccard) continue;
    if (globalFraction < cfg.minGlobalFraction) continue;

    const score = 0.5 * (pair.count / maxCount) + 0.3 * jaccard + 0.2 * globalFraction;
    scored.push({
      score,
      entry: {
        sector1: pair.sector1,
        sector2: pair.sector2,
        co_occurrence_count: pair.count,
        sector1_article_count: set1.size,
        sector2_article_count: set2.size,
        jaccard: round3(jaccard),
        global_fraction: round3(globalFraction),
        avg_sentiment: round3(mean(pair.sentiments)),
        score: round3(score),
        correlation_strength: classifyStrength(pair.count, jaccard),
      },
    });
  }

  scored.sort((a, b) => b.score - a.score);

  const report: CorrelationReport = {
    top_correlations: scored.slice(0, cfg.maxReported).map((s) => s.entry),
    total_correlations: scored.length,
    thresholds,
  };
  if (!scored.length) {
    report.message = 'No sector pair passed the significance thresholds';
  }
  return report;
}
