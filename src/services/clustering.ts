import type { ClusterMember, SectorCluster, SectorClusterReport, Snapshot } from '../types.js';
import { kmeans, standardize } from '../utils/kmeans.js';
import { mean, round3 } from '../utils/normalize.js';
import { defaultSentimentPolicy, type SentimentPolicy } from './sentimentPolicy.js';

export interface ClusterOptions {
  policy?: SentimentPolicy;
  seed?: number;
  restarts?: number;
}

const MIN_SECTORS = 3;
const MAX_CLUSTERS = 3;

interface SectorFeatures {
  scores: number[];
  organizationMentions: number;
  wordCounts: number[];
}

/**
 * Feature vector per sector:
 * [mean sentiment, article count, raw ORG mentions, mean word count].
 */
export function buildSectorFeatures(articles: Snapshot): Map<string, SectorFeatures> {
  const features = new Map<string, SectorFeatures>();

  for (const article of articles) {
    const sentiment = article.sentiment_score ?? 0;
    const words = article.word_count ?? 0;
    const orgs = article.entities?.ORG?.length ?? 0;

    for (const sector of article.sectors ?? []) {
      let f = features.get(sector);
      if (!f) {
        f = { scores: [], organizationMentions: 0, wordCounts: [] };
        features.set(sector, f);
      }
      f.scores.push(sentiment);
      f.organizationMentions += orgs;
      f.wordCounts.push(words);
    }
  }
  return features;
}

/**
 * Groups sectors into behavioural clusters with k-means over standardized
 * features, then names each cluster after its members' mean sentiment.
 */
export function clusterSectors(articles: Snapshot, opts: ClusterOptions = {}): SectorClusterReport {
  const policy = opts.policy ?? defaultSentimentPolicy;
  const features = buildSectorFeatures(articles);
  const sectors = Array.from(features.keys());

  if (sectors.length < MIN_SECTORS) {
    return {
      clusters: [],
      total_sectors: sectors.length,
      message: 'Insufficient sectors for clustering',
    };
  }

  const members: ClusterMember[] = [];
  const rawMeans: number[] = [];
  const rows = sectors.map((sector) => {
    const f = features.get(sector) ?? { scores: [], organizationMentions: 0, wordCounts: [] };
    const avg = mean(f.scores);
    rawMeans.push(avg);
    members.push({ sector, avg_sentiment: round3(avg), article_count: f.scores.length });
    return [avg, f.scores.length, f.organizationMentions, mean(f.wordCounts)];
  });

  const { labels } = kmeans(standardize(rows), {
    k: Math.min(MAX_CLUSTERS, sectors.length),
    seed: opts.seed ?? 42,
    restarts: opts.restarts ?? 10,
  });

  const grouped = new Map<number, number[]>();
  labels.forEach((label, i) => {
    const list = grouped.get(label);
    if (list) list.push(i);
    else grouped.set(label, [i]);
  });

  const ranked: Array<{ avg: number; cluster: SectorCluster }> = [];
  for (const label of Array.from(grouped.keys()).sort((a, b) => a - b)) {
    const indices = grouped.get(label) ?? [];
    const avg = mean(indices.map((i) => rawMeans[i]));
    ranked.push({
      avg,
      cluster: {
        cluster_id: label,
        label: policy.clusterLabel(avg),
        avg_sentiment: round3(avg),
        sectors: indices.map((i) => members[i]).sort((a, b) => b.article_count - a.article_count),
      },
    });
  }

  ranked.sort((a, b) => b.avg - a.avg);
  return {
    clusters: ranked.map((r) => r.cluster),
    total_sectors: sectors.length,
  };
}
