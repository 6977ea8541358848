/**
 * REQUEST COALESCER
 * =================
 *
 * Anti-stampede pattern: concurrent callers asking for the same key share
 * one in-flight promise. The entry is removed once it settles, so a later
 * call starts fresh.
 */

export class RequestCoalescer<T> {
  private inflight = new Map<string, Promise<T>>();

  /**
   * Run fn, or join the run already in flight for key
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
