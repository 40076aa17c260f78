#!/usr/bin/env node
import { promises as fs } from 'node:fs';
import path from 'node:path';
import { ARTIFACT_FILES } from '../constants/artifacts.js';
import { getConfig } from '../config.js';
import { logger } from '../logger.js';
import { INDICATOR_NAMES, indicatorJsonSchema } from '../schemas/indicators.js';

// Usage: schemas.mjs [outDir], defaults to <INDICATORS_DIR>/schemas
async function main() {
  const outDir = process.argv[2] ?? path.join(getConfig().indicatorsDir, 'schemas');
  await fs.mkdir(outDir, { recursive: true });

  for (const name of INDICATOR_NAMES) {
    const file = path.join(outDir, ARTIFACT_FILES[name].replace(/\.json$/, '.schema.json'));
    await fs.writeFile(file, `${JSON.stringify(indicatorJsonSchema(name), null, 2)}\n`, 'utf-8');
  }
  logger.info({ outDir, schemas: INDICATOR_NAMES.length }, 'Indicator schemas written');
}

main().catch((err: unknown) => {
  logger.error({ err }, 'Writing schemas failed');
  process.exit(1);
});
