import { promises as fs } from 'node:fs';
import path from 'node:path';
import { ARTIFACT_FILES, MANIFEST_FILE } from '../constants/artifacts.js';
import { logger } from '../logger.js';
import {
  INDICATOR_NAMES,
  INDICATOR_SCHEMAS,
  ManifestSchema,
  type IndicatorName,
  type Manifest,
} from '../schemas/indicators.js';
import type { IndicatorSet } from '../types.js';

export class PublishError extends Error {
  constructor(
    message: string,
    public readonly details?: unknown,
  ) {
    super(message);
    this.name = 'PublishError';
  }
}

export interface PublishedIndicator {
  name: IndicatorName;
  file: string;
  document: unknown;
}

interface StagedFile {
  target: string;
  temp: string;
}

function serialize(document: unknown): string {
  return `${JSON.stringify(document, null, 2)}\n`;
}

/**
 * Writes one JSON document per analytic, replacing the previous run's files.
 * Every document is validated and written to a temporary sibling first; the
 * renames only start once all of them are on disk, and each rename swaps a
 * complete file in, so readers never see a half-written document.
 */
export class IndicatorPublisher {
  constructor(readonly dir: string) {}

  async publish(set: IndicatorSet, manifest: Omit<Manifest, 'artifacts'>): Promise<string[]> {
    const documents: Array<{ file: string; body: string }> = [];

    for (const name of INDICATOR_NAMES) {
      const check = INDICATOR_SCHEMAS[name].safeParse(set[name]);
      if (!check.success) {
        throw new PublishError(`Artifact "${name}" failed validation`, check.error.issues);
      }
      documents.push({ file: ARTIFACT_FILES[name], body: serialize(set[name]) });
    }

    const files = documents.map((d) => d.file);
    const fullManifest: Manifest = { ...manifest, artifacts: files };
    documents.push({ file: MANIFEST_FILE, body: serialize(ManifestSchema.parse(fullManifest)) });

    await fs.mkdir(this.dir, { recursive: true });
    const staged = await this.stage(documents);

    let renamed = 0;
    try {
      for (const { temp, target } of staged) {
        await fs.rename(temp, target);
        renamed++;
      }
    } catch (err) {
      const leftovers = staged.slice(renamed);
      await Promise.all(leftovers.map(({ temp }) => fs.rm(temp, { force: true })));
      throw new PublishError(
        `Could not replace ${path.basename(leftovers[0]?.target ?? this.dir)} in ${this.dir}`,
        err instanceof Error ? err.message : err,
      );
    }
    logger.info({ dir: this.dir, artifacts: files.length }, 'Indicators published');
    return files;
  }

  /**
   * Latest published document for one analytic, or undefined when it has not
   * been published yet.
   */
  async read(name: IndicatorName): Promise<PublishedIndicator | undefined> {
    const file = ARTIFACT_FILES[name];
    const document = await this.readJson(file);
    if (document === undefined) return undefined;

    const check = INDICATOR_SCHEMAS[name].safeParse(document);
    if (!check.success) {
      throw new PublishError(`Published artifact "${name}" does not match its schema`, check.error.issues);
    }
    return { name, file, document };
  }

  async readManifest(): Promise<Manifest | undefined> {
    const document = await this.readJson(MANIFEST_FILE);
    return document === undefined ? undefined : ManifestSchema.parse(document);
  }

  private async readJson(file: string): Promise<unknown> {
    let raw: string;
    try {
      raw = await fs.readFile(path.join(this.dir, file), 'utf-8');
    } catch (err) {
      if (isNotFound(err)) return undefined;
      throw err;
    }
    return JSON.parse(raw);
  }

  private async stage(documents: ReadonlyArray<{ file: string; body: string }>): Promise<StagedFile[]> {
    const staged: StagedFile[] = [];
    const suffix = `.${process.pid}.${Date.now()}.tmp`;
    try {
      for (const { file, body } of documents) {
        const target = path.join(this.dir, file);
        const temp = `${target}${suffix}`;
        staged.push({ target, temp });
        await fs.writeFile(temp, body, 'utf-8');
      }
    } catch (err) {
      await Promise.all(staged.map(({ temp }) => fs.rm(temp, { force: true })));
      throw new PublishError(`Could not stage artifacts in ${this.dir}`, err instanceof Error ? err.message : err);
    }
    return staged;
  }
}

function isNotFound(err: unknown): boolean {
  return typeof err === 'object' && err !== null && Reflect.get(err, 'code') === 'ENOENT';
}
