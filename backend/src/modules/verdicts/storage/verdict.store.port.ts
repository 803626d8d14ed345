/**
 * VERDICT STORE PORT — append-only, time-ordered collection
 *
 * The store, not the caller, assigns `timestamp` on acceptance.
 * Today: MongoDB or in-memory. Readers never mutate.
 */

import type { RawVerdictDocument, VerdictInput } from '../contracts/verdict.types.js';

export interface VerdictStore {
  /**
   * Persist one record; resolves once the store has accepted it
   */
  append(input: VerdictInput): Promise<void>;

  /**
   * Every record, newest first
   */
  queryDescendingByTime(): Promise<ReadonlyArray<RawVerdictDocument>>;
}
