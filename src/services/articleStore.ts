import axios, { type AxiosInstance } from 'axios';
import { promises as fs } from 'node:fs';
import type { AppConfig } from '../config.js';
import { logger } from '../logger.js';
import { parseArticleRecord } from '../schemas/articles.js';
import type { ArticleRecord, Snapshot } from '../types.js';

/**
 * Raised when the store cannot be read at all. Fatal to a run: nothing is
 * published and the previous artifacts stay in place.
 */
export class ArticleStoreError extends Error {
  constructor(
    message: string,
    public readonly details?: unknown,
  ) {
    super(message);
    this.name = 'ArticleStoreError';
  }
}

/**
 * Read-only view of the enrichment stage's article store. A run reads the
 * snapshot once and never goes back to the store mid-computation.
 */
export interface ArticleStore {
  readonly description: string;
  readSnapshot(): Promise<Snapshot>;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Pull the raw record list out of a store payload. Accepted shapes:
 * - an array of records
 * - `{ "articles": [...] }`
 * - a document-store dump `{ "<table>": { "<id>": record } }`, ids in ascending order
 */
export function collectRecords(payload: unknown): unknown[] {
  if (Array.isArray(payload)) return payload;
  if (!isPlainObject(payload)) {
    throw new ArticleStoreError('Article store payload is not a collection of records');
  }
  const { articles } = payload;
  if (Array.isArray(articles)) return articles;

  const tables = Object.values(payload);
  if (!tables.every(isPlainObject)) {
    throw new ArticleStoreError('Article store payload is neither a record list nor a table of records');
  }
  return tables.flatMap((table) => Object.values(table));
}

/**
 * Validate raw records one by one and freeze the result. Records that are not
 * objects are dropped and counted.
 */
export function toSnapshot(rawRecords: readonly unknown[], origin: string): Snapshot {
  const records: Array<Readonly<ArticleRecord>> = [];
  let rejected = 0;
  for (const raw of rawRecords) {
    const record = parseArticleRecord(raw);
    if (record) records.push(Object.freeze(record));
    else rejected++;
  }
  if (rejected > 0) {
    logger.warn({ origin, rejected, accepted: records.length }, 'Dropped malformed article records');
  }
  logger.info({ origin, articles: records.length }, 'Article snapshot loaded');
  return Object.freeze(records);
}

export class JsonFileArticleStore implements ArticleStore {
  constructor(private readonly filePath: string) {}

  get description(): string {
    return `file:${this.filePath}`;
  }

  async readSnapshot(): Promise<Snapshot> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, 'utf-8');
    } catch (err) {
      throw new ArticleStoreError(`Article store unreadable at ${this.filePath}`, errorMessage(err));
    }

    let payload: unknown;
    try {
      payload = JSON.parse(raw);
    } catch (err) {
      throw new ArticleStoreError(`Article store at ${this.filePath} is not valid JSON`, errorMessage(err));
    }
    return toSnapshot(collectRecords(payload), this.description);
  }
}

export interface HttpArticleStoreOptions {
  url: string;
  timeoutMs?: number;
  client?: AxiosInstance;
}

/**
 * Store exposed over HTTP: one GET returning the records as JSON.
 */
export class HttpArticleStore implements ArticleStore {
  private readonly url: string;
  private readonly http: AxiosInstance;

  constructor(opts: HttpArticleStoreOptions) {
    this.url = opts.url;
    this.http = opts.client ?? axios.create({ timeout: opts.timeoutMs ?? 30000 });
  }

  get description(): string {
    return `http:${this.url}`;
  }

  async readSnapshot(): Promise<Snapshot> {
    let payload: unknown;
    try {
      const { data } = await this.http.get<unknown>(this.url, { responseType: 'json' });
      payload = data;
    } catch (err) {
      if (axios.isAxiosError(err)) {
        const status = err.response?.status;
        throw new ArticleStoreError(`Article store request failed: status=${status ?? 'n/a'} ${err.message}`, {
          status,
        });
      }
      throw new ArticleStoreError('Article store request failed', errorMessage(err));
    }
    if (typeof payload === 'string') {
      try {
        payload = JSON.parse(payload);
      } catch (err) {
        throw new ArticleStoreError('Article store response is not valid JSON', errorMessage(err));
      }
    }
    return toSnapshot(collectRecords(payload), this.description);
  }
}

export function createArticleStore(cfg: AppConfig): ArticleStore {
  if (cfg.store.kind === 'http') {
    if (!cfg.store.url) {
      throw new ArticleStoreError('ARTICLE_STORE_URL is required for the http article store');
    }
    return new HttpArticleStore({ url: cfg.store.url, timeoutMs: cfg.store.timeoutMs });
  }
  return new JsonFileArticleStore(cfg.store.articlesPath);
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
