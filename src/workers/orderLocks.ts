/**
 * Per-key mutual exclusion. The first caller for a key runs at once; later
 * callers wait in that key's mailbox and are handed the key in arrival order.
 * Different keys never wait on each other.
 */
export class KeyedLock<K> {
  private readonly inflight = new Set<K>();
  private readonly mailboxes = new Map<K, Array<() => void>>();

  isLocked(key: K): boolean {
    return this.inflight.has(key);
  }

  async runExclusive<T>(key: K, task: () => Promise<T>): Promise<T> {
    await this.acquire(key);
    try {
      return await task();
    } finally {
      this.release(key);
    }
  }

  private acquire(key: K): Promise<void> {
    if (!this.inflight.has(key)) {
      this.inflight.add(key);
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      const q = this.mailboxes.get(key) ?? [];
      q.push(resolve);
      this.mailboxes.set(key, q);
    });
  }

  private release(key: K): void {
    const q = this.mailboxes.get(key);
    const next = q?.shift();
    if (q && !q.length) this.mailboxes.delete(key);
    if (next) {
      // ownership passes straight to the next waiter; the key stays in flight
      next();
      return;
    }
    this.inflight.delete(key);
  }
}
