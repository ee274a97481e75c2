import type { Logger } from '../../utils/logger.js';

interface Entry<V> {
  value: V;
  storedAt: number;
}

/**
 * Keyed cache with a fixed TTL. An expired or missing entry is refetched before
 * use; when the refetch fails the last good value is served and the failure is
 * only logged. With nothing to fall back on the error reaches the caller.
 */
export class TtlCache<V> {
  private entries: ReadonlyMap<string, Entry<V>> = new Map();
  private readonly inflight = new Map<string, Promise<V>>();

  constructor(
    private readonly name: string,
    private readonly ttlMs: number,
    private readonly log: Logger,
    private readonly now: () => number = Date.now,
  ) {}

  peek(key: string): V | undefined {
    return this.entries.get(key)?.value;
  }

  async get(key: string, fetcher: () => Promise<V>): Promise<V> {
    const entry = this.entries.get(key);
    if (entry && this.now() - entry.storedAt <= this.ttlMs) {
      return entry.value;
    }

    let pending = this.inflight.get(key);
    if (!pending) {
      pending = this.load(key, fetcher).finally(() => this.inflight.delete(key));
      this.inflight.set(key, pending);
    }
    return pending;
  }

  private async load(key: string, fetcher: () => Promise<V>): Promise<V> {
    try {
      const value = await fetcher();
      const next = new Map(this.entries);
      next.set(key, { value, storedAt: this.now() });
      this.entries = next;
      return value;
    } catch (err) {
      const stale = this.entries.get(key);
      if (stale) {
        this.log.warn({ err, cache: this.name, key }, 'Refresh failed; serving stale entry');
        return stale.value;
      }
      this.log.error({ err, cache: this.name, key }, 'Refresh failed with nothing cached');
      throw err;
    }
  }
}
