/**
 * FAULT SAMPLE GENERATOR - Entrypoint
 *
 * Loads the fault corpus, then appends one random sample to the verdict store
 * every GENERATOR_INTERVAL_SEC seconds until SIGINT/SIGTERM.
 *
 * Run: npx tsx backend/src/generator.ts
 */

import { CorpusEmptyError } from './common/errors.js';
import { createConsoleLogger } from './common/host.deps.js';
import { loadEnv } from './config/env.js';
import { DEFAULT_CORPUS, loadCorpus } from './modules/corpus/index.js';
import { IngestionAppender, SampleSynthesizer } from './modules/generator/index.js';
import { openVerdictStore } from './modules/verdicts/index.js';

async function main() {
  console.log('='.repeat(70));
  console.log('MOTOR DRIVE FAULT DIAGNOSIS - DATA GENERATOR');
  console.log('='.repeat(70));

  const env = loadEnv();
  const logger = createConsoleLogger('Generator');

  const { datasets, failures } = loadCorpus(env.CORPUS_DIR, DEFAULT_CORPUS, logger);
  if (datasets.size === 0) {
    throw new CorpusEmptyError(failures);
  }

  const { store, close } = await openVerdictStore(env);

  const appender = new IngestionAppender(
    store,
    new SampleSynthesizer({
      confidenceFloor: env.SYNTH_CONFIDENCE_FLOOR,
      location: env.GENERATOR_LOCATION,
    }),
    { intervalMs: env.GENERATOR_INTERVAL_SEC * 1000, logger },
  );

  const stop = (signal: string) => {
    logger.info({ signal }, 'Stop requested, finishing current iteration');
    appender.stop();
  };
  process.once('SIGINT', () => stop('SIGINT'));
  process.once('SIGTERM', () => stop('SIGTERM'));

  try {
    await appender.run(datasets);
  } finally {
    await close();
  }
}

main().catch((err) => {
  console.error('[Generator] Fatal error:', err);
  process.exit(1);
});
