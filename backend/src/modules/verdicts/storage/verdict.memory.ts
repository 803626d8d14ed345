/**
 * VERDICTS — in-process storage
 *
 * Same contract as the MongoDB store: the store's clock stamps each record.
 * Backs the embedded demo mode and the tests.
 */

import { defaultClock, type Clock } from '../../../common/host.deps.js';
import {
  parseVerdictInput,
  VerdictSchema,
  type RawVerdictDocument,
  type Verdict,
  type VerdictInput,
} from '../contracts/verdict.types.js';
import type { VerdictStore } from './verdict.store.port.js';

export class InMemoryVerdictStore implements VerdictStore {
  private readonly records: Verdict[] = [];

  constructor(private readonly clock: Clock = defaultClock) {}

  async append(input: VerdictInput): Promise<void> {
    const doc = parseVerdictInput(input);
    this.records.push({ ...doc, timestamp: this.clock.utcNow() });
  }

  /**
   * Import records that already carry a store timestamp
   */
  load(records: readonly Verdict[]): void {
    for (const record of records) {
      this.records.push(VerdictSchema.parse(record));
    }
  }

  async queryDescendingByTime(): Promise<ReadonlyArray<RawVerdictDocument>> {
    return this.records
      .map((record, seq) => ({ record, seq }))
      .sort((a, b) => b.record.timestamp.getTime() - a.record.timestamp.getTime() || b.seq - a.seq)
      .map(({ record }) => ({ ...record }));
  }

  size(): number {
    return this.records.length;
  }
}
