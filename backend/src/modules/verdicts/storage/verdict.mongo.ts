/**
 * VERDICTS — MongoDB storage
 *
 * Collection: verdicts
 *
 * Writes go through an upsert on a fresh ObjectId so `$currentDate` can stamp
 * `timestamp` with the server clock. The collection is never updated in place.
 */

import {
  ObjectId,
  type Db,
  type Document,
  type Filter,
  type Sort,
  type UpdateFilter,
  type UpdateOptions,
  type UpdateResult,
} from 'mongodb';
import { AppError } from '../../../common/errors.js';
import { parseVerdictInput, type RawVerdictDocument, type VerdictInput } from '../contracts/verdict.types.js';
import type { VerdictStore } from './verdict.store.port.js';

/**
 * The slice of a native Collection this store touches
 */
export interface VerdictCollection {
  updateOne(
    filter: Filter<Document>,
    update: UpdateFilter<Document>,
    options: UpdateOptions,
  ): Promise<UpdateResult>;
  find(filter: Filter<Document>): {
    sort(sort: Sort): { toArray(): Promise<Document[]> };
  };
}

export class MongoVerdictStore implements VerdictStore {
  constructor(private readonly collection: VerdictCollection) {}

  static fromDb(db: Db, collectionName = 'verdicts'): MongoVerdictStore {
    return new MongoVerdictStore(db.collection(collectionName));
  }

  async append(input: VerdictInput): Promise<void> {
    const doc = parseVerdictInput(input);

    const result = await this.collection.updateOne(
      { _id: new ObjectId() },
      {
        $setOnInsert: doc,
        $currentDate: { timestamp: true },
      },
      { upsert: true },
    );

    if (!result.acknowledged || result.upsertedCount !== 1) {
      throw new AppError('APPEND_REJECTED', 'Verdict write was not acknowledged by MongoDB', 502);
    }
  }

  async queryDescendingByTime(): Promise<ReadonlyArray<RawVerdictDocument>> {
    return this.collection.find({}).sort({ timestamp: -1, _id: -1 }).toArray();
  }
}

export async function ensureVerdictIndexes(db: Db, collectionName = 'verdicts'): Promise<void> {
  const col = db.collection(collectionName);
  await col.createIndex({ timestamp: -1 });
  await col.createIndex({ fault_label: 1, timestamp: -1 });
  console.log(`[DB] ${collectionName} indexes ensured`);
}
