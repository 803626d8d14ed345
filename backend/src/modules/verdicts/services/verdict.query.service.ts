/**
 * VERDICT QUERY SERVICE — cached, descending-time reads
 * =====================================================
 *
 * Many pollers, one upstream read per TTL window:
 * - fresh cache entry (age < ttl) → served without touching the store
 * - expired or empty → one descending read, concurrent callers coalesced
 * - store failure → DataUnavailableError, the stale entry is never served
 *
 * Documents that fail the verdict schema on read-back are dropped and counted.
 */

import { DataUnavailableError, errorMessage } from '../../../common/errors.js';
import { defaultClock, silentLogger, type Clock, type Logger } from '../../../common/host.deps.js';
import { RequestCoalescer } from '../../shared/runtime/request-coalescer.js';
import { TtlCache, type CacheEntry } from '../../shared/runtime/ttl-cache.js';
import { safeParseVerdict, type RawVerdictDocument, type Verdict } from '../contracts/verdict.types.js';
import type { VerdictStore } from '../storage/verdict.store.port.js';

const SNAPSHOT_KEY = 'verdicts:all';

interface CachedRead {
  verdicts: readonly Verdict[];
  rejected: number;
}

export interface VerdictSnapshot {
  verdicts: readonly Verdict[];
  capturedAt: Date;
  fromCache: boolean;
  rejected: number;
}

export interface VerdictQueryOptions {
  ttlMs: number;
  clock?: Clock;
  logger?: Logger;
}

export class VerdictQueryService {
  private readonly cache: TtlCache<CachedRead>;
  private readonly coalescer = new RequestCoalescer<CacheEntry<CachedRead>>();
  private readonly logger: Logger;
  private readonly clock: Clock;
  private upstreamReads = 0;
  private failedReads = 0;

  constructor(
    private readonly store: VerdictStore,
    options: VerdictQueryOptions,
  ) {
    this.clock = options.clock ?? defaultClock;
    this.cache = new TtlCache<CachedRead>(options.ttlMs, this.clock);
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Snapshot of the whole store, newest first
   */
  async fetchAll(): Promise<readonly Verdict[]> {
    return (await this.fetchSnapshot()).verdicts;
  }

  async fetchSnapshot(): Promise<VerdictSnapshot> {
    const cached = this.cache.get(SNAPSHOT_KEY);
    if (cached) {
      return toSnapshot(cached, true);
    }

    const fresh = await this.coalescer.run(SNAPSHOT_KEY, () => this.readThrough());
    return toSnapshot(fresh, false);
  }

  invalidate(): void {
    this.cache.del(SNAPSHOT_KEY);
  }

  stats() {
    return {
      ttlMs: this.cache.ttl,
      upstreamReads: this.upstreamReads,
      failedReads: this.failedReads,
      ...this.cache.stats(),
    };
  }

  private async readThrough(): Promise<CacheEntry<CachedRead>> {
    this.upstreamReads++;
    // age counts from when the read was issued, not when it returned
    const readStartedAt = this.clock.now();

    let docs: ReadonlyArray<RawVerdictDocument>;
    try {
      docs = await this.store.queryDescendingByTime();
    } catch (err) {
      this.failedReads++;
      this.cache.del(SNAPSHOT_KEY);
      this.logger.error({ err: errorMessage(err) }, '[VerdictQuery] Store read failed');
      throw new DataUnavailableError(`Verdict store read failed: ${errorMessage(err)}`, err);
    }

    const verdicts: Verdict[] = [];
    let rejected = 0;
    for (const doc of docs) {
      const verdict = safeParseVerdict(doc);
      if (verdict) {
        verdicts.push(verdict);
      } else {
        rejected++;
      }
    }

    if (rejected > 0) {
      this.logger.warn({ rejected, accepted: verdicts.length }, '[VerdictQuery] Rejected invalid documents');
    }

    return this.cache.set(SNAPSHOT_KEY, { verdicts: Object.freeze(verdicts), rejected }, readStartedAt);
  }
}

function toSnapshot(entry: CacheEntry<CachedRead>, fromCache: boolean): VerdictSnapshot {
  return {
    verdicts: entry.value.verdicts,
    capturedAt: new Date(entry.capturedAt),
    fromCache,
    rejected: entry.value.rejected,
  };
}
