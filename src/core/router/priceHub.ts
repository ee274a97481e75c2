import { z } from 'zod';
import type { TickerSnapshot } from '../types.js';
import { componentLogger, type Logger } from '../../utils/logger.js';

/** One open price-stream connection. `send` rejects once the peer is gone. */
export interface PriceSubscriber {
  readonly id: string;
  send(data: string): Promise<void>;
  /** Called when the hub drops the connection after a failed push. */
  close?(): void;
}

export interface PriceMessage {
  type: 'price';
  data: { symbol: string; price: number; ts: number };
}

const inboundSchema = z.object({
  action: z.string(),
  symbol: z.string().trim().optional(),
});

export type InboundOutcome = 'subscribed' | 'unsubscribed' | 'ignored' | 'invalid';

const INVALID_MESSAGE = JSON.stringify({ type: 'error', error: 'invalid_message' });

/**
 * Registry of price-stream connections and the symbols each one follows.
 * Subscription sets are swapped for new ones on change, never edited in place,
 * so a broadcast in progress always iterates a stable view.
 */
export class PriceHub {
  private subscriptions = new Map<PriceSubscriber, ReadonlySet<string>>();
  private readonly log: Logger;

  constructor(log?: Logger) {
    this.log = log ?? componentLogger('price-hub');
  }

  get size(): number {
    return this.subscriptions.size;
  }

  register(sub: PriceSubscriber): void {
    if (!this.subscriptions.has(sub)) {
      this.subscriptions.set(sub, new Set());
    }
    this.log.info({ subscriber: sub.id, clients: this.subscriptions.size }, 'Price subscriber registered');
  }

  unregister(sub: PriceSubscriber): void {
    if (this.subscriptions.delete(sub)) {
      this.log.info({ subscriber: sub.id, clients: this.subscriptions.size }, 'Price subscriber removed');
    }
  }

  symbolsFor(sub: PriceSubscriber): ReadonlySet<string> {
    return this.subscriptions.get(sub) ?? new Set();
  }

  subscribe(sub: PriceSubscriber, symbol: string): void {
    const current = this.subscriptions.get(sub);
    if (!current) return;
    const next = new Set(current);
    next.add(symbol.trim().toUpperCase());
    this.subscriptions.set(sub, next);
  }

  unsubscribe(sub: PriceSubscriber, symbol: string): void {
    const current = this.subscriptions.get(sub);
    if (!current) return;
    const next = new Set(current);
    next.delete(symbol.trim().toUpperCase());
    this.subscriptions.set(sub, next);
  }

  /**
   * Applies an inbound `{action, symbol}` message. Unknown actions are ignored;
   * unparseable messages get an error reply and the connection stays open.
   */
  async handleMessage(sub: PriceSubscriber, raw: string): Promise<InboundOutcome> {
    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch {
      return this.rejectMessage(sub, raw);
    }

    const parsed = inboundSchema.safeParse(json);
    if (!parsed.success) return this.rejectMessage(sub, raw);

    const { action, symbol } = parsed.data;
    if (action !== 'subscribe' && action !== 'unsubscribe') return 'ignored';
    if (!symbol) return this.rejectMessage(sub, raw);

    if (action === 'subscribe') {
      this.subscribe(sub, symbol);
      this.log.debug({ subscriber: sub.id, symbol }, 'Subscribed');
      return 'subscribed';
    }
    this.unsubscribe(sub, symbol);
    this.log.debug({ subscriber: sub.id, symbol }, 'Unsubscribed');
    return 'unsubscribed';
  }

  /**
   * Pushes one message per followed symbol that has a price in `snapshot`.
   * Connections are served concurrently, each in symbol order. Connections
   * whose send fails are dropped after the pass completes.
   */
  async broadcast(snapshot: TickerSnapshot): Promise<number> {
    const targets = Array.from(this.subscriptions);
    const results = await Promise.allSettled(targets.map(([sub, symbols]) => this.push(sub, symbols, snapshot)));

    let sent = 0;
    results.forEach((result, i) => {
      if (result.status === 'fulfilled') {
        sent += result.value;
        return;
      }
      const sub = targets[i]?.[0];
      if (!sub) return;
      this.log.info({ subscriber: sub.id, err: result.reason }, 'Price push failed; dropping connection');
      this.unregister(sub);
      sub.close?.();
    });
    return sent;
  }

  private async push(sub: PriceSubscriber, symbols: ReadonlySet<string>, snapshot: TickerSnapshot): Promise<number> {
    let sent = 0;
    for (const symbol of symbols) {
      const price = snapshot.prices.get(symbol);
      if (price === undefined) continue;
      const msg: PriceMessage = { type: 'price', data: { symbol, price, ts: snapshot.refreshedAt } };
      await sub.send(JSON.stringify(msg));
      sent++;
    }
    return sent;
  }

  private async rejectMessage(sub: PriceSubscriber, raw: string): Promise<InboundOutcome> {
    this.log.warn({ subscriber: sub.id, raw: raw.slice(0, 200) }, 'Malformed price stream message');
    try {
      await sub.send(INVALID_MESSAGE);
    } catch (err) {
      this.log.debug({ subscriber: sub.id, err }, 'Could not deliver error reply');
    }
    return 'invalid';
  }
}
