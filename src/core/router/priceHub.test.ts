import { describe, expect, it } from 'vitest';
import type { TickerSnapshot } from '../types.js';
import { PriceHub, type PriceSubscriber } from './priceHub.js';

class FakeSubscriber implements PriceSubscriber {
  sent: string[] = [];
  broken = false;

  constructor(readonly id: string) {}

  async send(data: string): Promise<void> {
    if (this.broken) throw new Error('socket closed');
    this.sent.push(data);
  }

  messages(): unknown[] {
    return this.sent.map((s) => JSON.parse(s));
  }
}

/** Holds every send until `fail` is called, like a peer that stopped reading. */
class StalledSubscriber implements PriceSubscriber {
  closed = false;
  private readonly waiting: Array<(err: Error) => void> = [];

  constructor(readonly id: string) {}

  send(): Promise<void> {
    return new Promise<void>((_resolve, reject) => {
      this.waiting.push(reject);
    });
  }

  fail(): void {
    for (const reject of this.waiting.splice(0)) reject(new Error('send timed out'));
  }

  close(): void {
    this.closed = true;
  }
}

const snapshot: TickerSnapshot = {
  prices: new Map([
    ['BTCUSDT', 60000],
    ['ETHUSDT', 3000],
  ]),
  refreshedAt: 1_700_000_000_000,
};

describe('PriceHub', () => {
  it('sends only the symbols a subscriber follows', async () => {
    const hub = new PriceHub();
    const a = new FakeSubscriber('a');
    const b = new FakeSubscriber('b');
    hub.register(a);
    hub.register(b);
    await hub.handleMessage(a, '{"action":"subscribe","symbol":"btcusdt"}');
    await hub.handleMessage(b, '{"action":"subscribe","symbol":"ETHUSDT"}');
    await hub.handleMessage(b, '{"action":"subscribe","symbol":"XRPUSDT"}');

    expect(await hub.broadcast(snapshot)).toBe(2);
    expect(a.messages()).toEqual([
      { type: 'price', data: { symbol: 'BTCUSDT', price: 60000, ts: 1_700_000_000_000 } },
    ]);
    expect(b.messages()).toEqual([{ type: 'price', data: { symbol: 'ETHUSDT', price: 3000, ts: 1_700_000_000_000 } }]);
  });

  it('sends nothing to a subscriber with an empty set', async () => {
    const hub = new PriceHub();
    const a = new FakeSubscriber('a');
    hub.register(a);

    expect(await hub.broadcast(snapshot)).toBe(0);
    expect(a.sent).toEqual([]);
  });

  it('stops sending after unsubscribe', async () => {
    const hub = new PriceHub();
    const a = new FakeSubscriber('a');
    hub.register(a);
    expect(await hub.handleMessage(a, '{"action":"subscribe","symbol":"BTCUSDT"}')).toBe('subscribed');
    expect(await hub.handleMessage(a, '{"action":"unsubscribe","symbol":"btcusdt"}')).toBe('unsubscribed');

    expect(hub.symbolsFor(a).size).toBe(0);
    expect(await hub.broadcast(snapshot)).toBe(0);
  });

  it('drops a connection whose send fails and keeps the others', async () => {
    const hub = new PriceHub();
    const dead = new FakeSubscriber('dead');
    const live = new FakeSubscriber('live');
    hub.register(dead);
    hub.register(live);
    hub.subscribe(dead, 'BTCUSDT');
    hub.subscribe(live, 'BTCUSDT');
    dead.broken = true;

    expect(await hub.broadcast(snapshot)).toBe(1);
    expect(hub.size).toBe(1);
    expect(live.sent).toHaveLength(1);
  });

  it('serves other connections while one is stalled, then drops and closes it', async () => {
    const hub = new PriceHub();
    const stalled = new StalledSubscriber('stalled');
    const live = new FakeSubscriber('live');
    hub.register(stalled);
    hub.register(live);
    hub.subscribe(stalled, 'BTCUSDT');
    hub.subscribe(live, 'BTCUSDT');
    hub.subscribe(live, 'ETHUSDT');

    const pass = hub.broadcast(snapshot);
    await new Promise((resolve) => setTimeout(resolve, 0));
    expect(live.messages()).toEqual([
      { type: 'price', data: { symbol: 'BTCUSDT', price: 60000, ts: 1_700_000_000_000 } },
      { type: 'price', data: { symbol: 'ETHUSDT', price: 3000, ts: 1_700_000_000_000 } },
    ]);
    expect(hub.size).toBe(2);

    stalled.fail();
    expect(await pass).toBe(2);
    expect(hub.size).toBe(1);
    expect(stalled.closed).toBe(true);
  });

  it('answers malformed messages with an error and keeps the connection', async () => {
    const hub = new PriceHub();
    const a = new FakeSubscriber('a');
    hub.register(a);

    expect(await hub.handleMessage(a, 'not json')).toBe('invalid');
    expect(await hub.handleMessage(a, '{"action":"subscribe"}')).toBe('invalid');
    expect(await hub.handleMessage(a, '{"symbol":"BTCUSDT"}')).toBe('invalid');
    expect(a.messages()).toEqual([
      { type: 'error', error: 'invalid_message' },
      { type: 'error', error: 'invalid_message' },
      { type: 'error', error: 'invalid_message' },
    ]);
    expect(hub.size).toBe(1);
  });

  it('ignores unknown actions', async () => {
    const hub = new PriceHub();
    const a = new FakeSubscriber('a');
    hub.register(a);

    expect(await hub.handleMessage(a, '{"action":"ping"}')).toBe('ignored');
    expect(a.sent).toEqual([]);
  });

  it('replaces the subscription set instead of mutating it', () => {
    const hub = new PriceHub();
    const a = new FakeSubscriber('a');
    hub.register(a);
    const before = hub.symbolsFor(a);
    hub.subscribe(a, 'BTCUSDT');

    expect(before.size).toBe(0);
    expect(Array.from(hub.symbolsFor(a))).toEqual(['BTCUSDT']);
  });

  it('ignores subscriptions for unregistered connections', () => {
    const hub = new PriceHub();
    const a = new FakeSubscriber('a');
    hub.subscribe(a, 'BTCUSDT');
    expect(hub.size).toBe(0);
    expect(hub.symbolsFor(a).size).toBe(0);
  });
});
