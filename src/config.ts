/**
 * Centralized configuration loader for Sector Pulse.
 * Reads environment variables, parses types, and exposes a typed config object.
 *
 * Environment variables (see .env.example):
 * - ARTICLE_STORE=file|http (default: file)
 * - ARTICLES_PATH (default: data/raw/articles.json)
 * - ARTICLE_STORE_URL (required when ARTICLE_STORE=http)
 * - ARTICLE_STORE_TIMEOUT_MS (default: 30000)
 * - INDICATORS_DIR (default: data/indicators)
 * - LOG_LEVEL (default: info)
 * - NOISE_LISTS_PATH (optional, replaces the bundled noise lists)
 * - NOISE_MIN_TOPIC_LENGTH (default: 5)
 * - NOISE_MIN_ORGANIZATION_LENGTH (default: 2)
 * - KNOWN_SECTORS (optional comma list)
 * - CLUSTER_SEED (default: 42)
 * - CLUSTER_RESTARTS (default: 10)
 * - LENIENT_TIMESTAMPS=1|0 (default: 0)
 */

import { config } from 'dotenv';

// Load environment variables from .env file
config();

export type StoreKind = 'file' | 'http';

export interface AppConfig {
  store: {
    kind: StoreKind;
    articlesPath: string;
    url?: string;
    timeoutMs: number;
  };
  indicatorsDir: string;
  logLevel: string;
  noise: {
    listsPath?: string;
    minTopicLength: number;
    minOrganizationLength: number;
  };
  knownSectors: string[];
  clustering: {
    seed: number;
    restarts: number;
  };
  lenientTimestamps: boolean;
}

function parseNumber(value: string | undefined): number | undefined {
  if (!value || value.trim() === '') return undefined;
  const n = Number(value);
  return Number.isFinite(n) ? n : undefined;
}

function parseFlag(value: string | undefined): boolean {
  return value === '1' || value?.toLowerCase() === 'true';
}

function parseList(value: string | undefined): string[] {
  return (value ?? '')
    .split(',')
    .map((item) => item.trim().toLowerCase())
    .filter(Boolean);
}

export function getConfig(): AppConfig {
  const kind: StoreKind = process.env.ARTICLE_STORE === 'http' ? 'http' : 'file';

  const store = {
    kind,
    articlesPath: process.env.ARTICLES_PATH?.trim() || 'data/raw/articles.json',
    url: process.env.ARTICLE_STORE_URL?.trim() || undefined,
    timeoutMs: parseNumber(process.env.ARTICLE_STORE_TIMEOUT_MS) ?? 30000,
  };

  const noise = {
    listsPath: process.env.NOISE_LISTS_PATH?.trim() || undefined,
    minTopicLength: parseNumber(process.env.NOISE_MIN_TOPIC_LENGTH) ?? 5,
    minOrganizationLength: parseNumber(process.env.NOISE_MIN_ORGANIZATION_LENGTH) ?? 2,
  };

  const clustering = {
    seed: parseNumber(process.env.CLUSTER_SEED) ?? 42,
    restarts: Math.max(1, parseNumber(process.env.CLUSTER_RESTARTS) ?? 10),
  };

  return {
    store,
    indicatorsDir: process.env.INDICATORS_DIR?.trim() || 'data/indicators',
    logLevel: process.env.LOG_LEVEL?.trim() || 'info',
    noise,
    knownSectors: parseList(process.env.KNOWN_SECTORS),
    clustering,
    lenientTimestamps: parseFlag(process.env.LENIENT_TIMESTAMPS),
  };
}

/**
 * Guard for settings that only matter for some store kinds.
 */
export function assertRequiredConfig(cfg: AppConfig) {
  if (cfg.store.kind === 'http' && !cfg.store.url) {
    throw new Error('ARTICLE_STORE_URL environment variable is required when ARTICLE_STORE=http');
  }
}
