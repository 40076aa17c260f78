#!/usr/bin/env node
import { assertRequiredConfig, getConfig } from '../config.js';
import { logger } from '../logger.js';
import { runIndicatorPipeline } from '../services/pipeline.js';
import { formatRunDigest, summarizeRun } from '../services/summaries.js';

async function main() {
  const config = getConfig();
  assertRequiredConfig(config);

  const result = await runIndicatorPipeline({ config });
  const summary = summarizeRun(result);
  logger.info({ summary, artifacts: result.artifacts }, 'Indicator run complete');
  process.stdout.write(`${formatRunDigest(summary, result.indicators)}\n`);
}

main().then(
  () => process.exit(0),
  (err: unknown) => {
    logger.error({ err }, 'Indicator run failed');
    process.exit(1);
  },
);
