/**
 * Picks the verdict store named by VERDICT_STORE and opens it
 */

import type { Env } from '../../../config/env.js';
import { connectMongo, disconnectMongo } from '../../../db/mongodb.js';
import { InMemoryVerdictStore } from './verdict.memory.js';
import { ensureVerdictIndexes, MongoVerdictStore } from './verdict.mongo.js';
import type { VerdictStore } from './verdict.store.port.js';

export interface OpenedVerdictStore {
  store: VerdictStore;
  close: () => Promise<void>;
}

export async function openVerdictStore(
  env: Pick<Env, 'VERDICT_STORE' | 'MONGO_URL' | 'MONGO_DB' | 'VERDICTS_COLLECTION'>,
): Promise<OpenedVerdictStore> {
  if (env.VERDICT_STORE === 'memory') {
    console.log('[Verdicts] Using in-memory store (data is lost on exit)');
    return { store: new InMemoryVerdictStore(), close: async () => undefined };
  }

  const db = await connectMongo(env.MONGO_URL, env.MONGO_DB);
  await ensureVerdictIndexes(db, env.VERDICTS_COLLECTION);

  return {
    store: MongoVerdictStore.fromDb(db, env.VERDICTS_COLLECTION),
    close: disconnectMongo,
  };
}
