/**
 * DASHBOARD SERVER - Entrypoint
 *
 * Serves live feed, analytics and report endpoints over the verdict store.
 * With EMBEDDED_GENERATOR=1 the appender loop runs in this process too,
 * which is how VERDICT_STORE=memory becomes useful for local demos.
 *
 * Run: npx tsx backend/src/server.ts
 */

import { buildApp } from './app.js';
import { errorMessage } from './common/errors.js';
import { createConsoleLogger, defaultClock } from './common/host.deps.js';
import { loadEnv, type Env } from './config/env.js';
import { DEFAULT_CORPUS, loadCorpus } from './modules/corpus/index.js';
import {
  IngestionAppender,
  SampleSynthesizer,
  type AppenderRunResult,
} from './modules/generator/index.js';
import { openVerdictStore, VerdictQueryService, type VerdictStore } from './modules/verdicts/index.js';

interface EmbeddedGenerator {
  appender: IngestionAppender;
  done: Promise<AppenderRunResult>;
}

function startEmbeddedGenerator(env: Env, store: VerdictStore): EmbeddedGenerator | null {
  const logger = createConsoleLogger('Generator');
  const { datasets } = loadCorpus(env.CORPUS_DIR, DEFAULT_CORPUS, logger);

  if (datasets.size === 0) {
    logger.error({ dir: env.CORPUS_DIR }, 'No CSV files loaded, embedded generator not started');
    return null;
  }

  const appender = new IngestionAppender(
    store,
    new SampleSynthesizer({
      confidenceFloor: env.SYNTH_CONFIDENCE_FLOOR,
      location: env.GENERATOR_LOCATION,
    }),
    { intervalMs: env.GENERATOR_INTERVAL_SEC * 1000, logger },
  );

  const done = appender.run(datasets);
  done.catch((err) => logger.error({ err: errorMessage(err) }, 'Embedded generator stopped'));

  return { appender, done };
}

async function main() {
  const env = loadEnv();
  const { store, close } = await openVerdictStore(env);

  const query = new VerdictQueryService(store, {
    ttlMs: env.VERDICT_CACHE_TTL_MS,
    clock: defaultClock,
    logger: createConsoleLogger('Dashboard'),
  });

  const app = buildApp({ query, clock: defaultClock, config: env });
  const generator = env.EMBEDDED_GENERATOR ? startEmbeddedGenerator(env, store) : null;

  const shutdown = async (signal: string) => {
    app.log.info(`[Dashboard] ${signal} received, shutting down...`);
    try {
      if (generator) {
        generator.appender.stop();
        await generator.done;
      }
      await app.close();
      await close();
      process.exit(0);
    } catch (err) {
      console.error('[Dashboard] Shutdown failed:', errorMessage(err));
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));

  await app.listen({ port: env.PORT, host: '0.0.0.0' });
  console.log(`[Dashboard] Listening on port ${env.PORT} (cache TTL ${env.VERDICT_CACHE_TTL_MS}ms, refresh ${env.REFRESH_INTERVAL_MS}ms)`);
}

main().catch((err) => {
  console.error('[Dashboard] Fatal error:', err);
  process.exit(1);
});
