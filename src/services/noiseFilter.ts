import type { AppConfig } from '../config.js';
import { DEFAULT_NOISE_LISTS_PATH, loadNoiseLists, type NoiseLists } from '../constants/noise.js';
import { collapseWhitespace } from '../utils/normalize.js';

export interface NoiseFilterOptions {
  lists: NoiseLists;
  minTopicLength?: number;
  minOrganizationLength?: number;
}

const NUMERIC_ONLY = /^[\d\s.,:%+\-/]+$/;

/**
 * Shared gate for keyword and organization strings coming out of entity and
 * keyword extraction. Every method returns undefined for "drop this token";
 * callers skip it rather than substituting a default.
 */
export class NoiseFilter {
  private readonly blacklist: ReadonlySet<string>;
  private readonly garbage: readonly RegExp[];
  private readonly publisherFragments: readonly string[];
  private readonly minTopicLength: number;
  private readonly minOrganizationLength: number;

  constructor(opts: NoiseFilterOptions) {
    const { lists } = opts;
    this.blacklist = new Set(
      [...lists.stopwords, ...lists.buzzwords, ...lists.uiArtifacts].map((w) =>
        collapseWhitespace(w).toLowerCase(),
      ),
    );
    this.garbage = lists.garbagePatterns.map((p) => new RegExp(p, 'iu'));
    this.publisherFragments = lists.publisherFragments.map((f) => f.toLowerCase()).filter(Boolean);
    this.minTopicLength = opts.minTopicLength ?? 5;
    this.minOrganizationLength = opts.minOrganizationLength ?? 2;
  }

  /**
   * Normalized (lower-cased, whitespace-collapsed) topic, or undefined if it is noise.
   */
  cleanTopic(raw: string): string | undefined {
    const topic = collapseWhitespace(raw ?? '').toLowerCase();
    if (topic.length < this.minTopicLength) return undefined;
    return this.isNoise(topic) ? undefined : topic;
  }

  /**
   * Organization name with its original casing (whitespace collapsed), or
   * undefined if it is noise or a news publisher.
   */
  cleanOrganization(raw: string): string | undefined {
    const org = collapseWhitespace(raw ?? '');
    if (org.length < this.minOrganizationLength) return undefined;
    const key = org.toLowerCase();
    if (this.isNoise(key) || this.isPublisher(key)) return undefined;
    return org;
  }

  isPublisher(name: string): boolean {
    if (!name) return false;
    const n = name.toLowerCase().trim();
    return this.publisherFragments.some((fragment) => n.includes(fragment));
  }

  private isNoise(lowered: string): boolean {
    if (this.blacklist.has(lowered)) return true;
    if (NUMERIC_ONLY.test(lowered)) return true;
    if (new Set(lowered.replace(/\s+/g, '')).size <= 2) return true;
    return this.garbage.some((re) => re.test(lowered));
  }
}

export function createNoiseFilter(cfg: AppConfig): NoiseFilter {
  return new NoiseFilter({
    lists: loadNoiseLists(cfg.noise.listsPath ?? DEFAULT_NOISE_LISTS_PATH),
    minTopicLength: cfg.noise.minTopicLength,
    minOrganizationLength: cfg.noise.minOrganizationLength,
  });
}
