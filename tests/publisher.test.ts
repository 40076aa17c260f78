import { promises as fs } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ARTIFACT_FILES, MANIFEST_FILE } from '../src/constants/artifacts.js';
import { indicatorJsonSchema } from '../src/schemas/indicators.js';
import { computeIndicators, describeSnapshot } from '../src/services/pipeline.js';
import { IndicatorPublisher, PublishError } from '../src/services/publisher.js';
import { article, snapshot, testNoiseFilter, twoSectorScenario } from './helpers.js';

const articles = twoSectorScenario();
const indicators = computeIndicators(articles, { noise: testNoiseFilter() });
const manifest = { generated_at: '2025-12-15T00:00:00.000Z', duration_ms: 12, snapshot: describeSnapshot(articles) };

describe('IndicatorPublisher', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'sector-pulse-out-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('writes one file per analytic plus the manifest', async () => {
    const publisher = new IndicatorPublisher(path.join(dir, 'indicators'));
    const files = await publisher.publish(indicators, manifest);

    expect(files).toEqual(Object.values(ARTIFACT_FILES));
    const written = (await fs.readdir(publisher.dir)).sort();
    expect(written).toEqual([...files, MANIFEST_FILE].sort());

    const stored = await publisher.readManifest();
    expect(stored).toEqual({ ...manifest, artifacts: files });
  });

  it('republishes byte-identical artifacts for an unchanged snapshot', async () => {
    const threeSectors = snapshot(
      ...articles,
      article({ sectors: ['energy'], sentiment_score: 0.3, word_count: 400, scraped_at: '2025-12-14T10:00:00Z' }),
      article({ sectors: ['energy'], sentiment_score: 0.1, word_count: 250, scraped_at: '2025-12-13T10:00:00Z' }),
    );
    const publisher = new IndicatorPublisher(dir);
    const first = computeIndicators(threeSectors, { noise: testNoiseFilter() });
    expect(first.clusters.clusters.length).toBeGreaterThan(0);

    await publisher.publish(first, manifest);
    const before = await Promise.all(
      Object.values(ARTIFACT_FILES).map((file) => fs.readFile(path.join(dir, file), 'utf-8')),
    );

    const again = computeIndicators(threeSectors, { noise: testNoiseFilter() });
    await publisher.publish(again, { ...manifest, generated_at: '2025-12-16T00:00:00.000Z' });
    const after = await Promise.all(
      Object.values(ARTIFACT_FILES).map((file) => fs.readFile(path.join(dir, file), 'utf-8')),
    );

    expect(after).toEqual(before);
    expect(before.every((body) => body.endsWith('\n'))).toBe(true);
  });

  it('removes staged files when replacing an artifact fails', async () => {
    const publisher = new IndicatorPublisher(dir);
    // a non-empty directory where a file should go makes that rename fail
    await fs.mkdir(path.join(dir, ARTIFACT_FILES.anomalies));
    await fs.writeFile(path.join(dir, ARTIFACT_FILES.anomalies, 'keep.txt'), 'x');

    await expect(publisher.publish(indicators, manifest)).rejects.toThrow(PublishError);

    const left = await fs.readdir(dir);
    expect(left.filter((name) => name.endsWith('.tmp'))).toEqual([]);
    expect(left.sort()).toEqual(
      [ARTIFACT_FILES.national, ARTIFACT_FILES.sectors, ARTIFACT_FILES.insights, ARTIFACT_FILES.trends, ARTIFACT_FILES.anomalies].sort(),
    );
  });

  it('reads back a published artifact and reports missing ones', async () => {
    const publisher = new IndicatorPublisher(dir);
    expect(await publisher.read('velocity')).toBeUndefined();
    expect(await publisher.readManifest()).toBeUndefined();

    await publisher.publish(indicators, manifest);
    const published = await publisher.read('national');
    expect(published?.file).toBe('national_indicators.json');
    expect(published?.document).toEqual(indicators.national);
  });

  it('writes nothing when an artifact fails validation', async () => {
    const publisher = new IndicatorPublisher(dir);
    const broken = { ...indicators, trends: { ...indicators.trends, trend_strength: Number.NaN } };

    await expect(publisher.publish(broken, manifest)).rejects.toThrow(PublishError);
    expect(await fs.readdir(dir)).toEqual([]);
  });
});

describe('indicatorJsonSchema', () => {
  it('describes the artifact fields', () => {
    const schema = JSON.stringify(indicatorJsonSchema('correlations'));
    expect(schema).toContain('"co_occurrence_count"');
    expect(schema).toContain('"min_jaccard"');
  });
});
