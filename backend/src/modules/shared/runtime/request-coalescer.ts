/**
 * REQUEST COALESCER
 * =================
 *
 * Anti-stampede pattern: concurrent callers asking for the same key
 * share one in-flight promise.
 *
 * If 10 viewers poll an expired snapshot at once:
 * - Only 1 store read happens
 * - All 10 wait for the same result
 */

export class RequestCoalescer<T> {
  private inflight = new Map<string, Promise<T>>();

  /**
   * Run `fn` unless the same key is already running
   */
  run(key: string, fn: () => Promise<T>): Promise<T> {
    const existing = this.inflight.get(key);
    if (existing) {
      return existing;
    }

    const p = (async () => {
      try {
        return await fn();
      } finally {
        this.inflight.delete(key);
      }
    })();

    this.inflight.set(key, p);
    return p;
  }
}
