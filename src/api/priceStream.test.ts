import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import Fastify, { type FastifyInstance } from 'fastify';
import websocket from '@fastify/websocket';
import type { WebSocket } from 'ws';
import { PriceHub } from '../core/router/priceHub.js';
import type { TickerSnapshot } from '../core/types.js';
import priceStream, { rawToString, socketSubscriber, type PushSocket } from './priceStream.js';

class FakeSocket implements PushSocket {
  readonly OPEN = 1;
  readyState = 1;
  bufferedAmount = 0;
  terminated = false;
  sent: string[] = [];
  /** When set, the send callback is held instead of being called. */
  hold = false;
  failWith: Error | null = null;

  send(data: string, cb: (err?: Error) => void): void {
    this.sent.push(data);
    if (this.hold) return;
    if (this.failWith) cb(this.failWith);
    else cb();
  }

  terminate(): void {
    this.terminated = true;
    this.readyState = 3;
  }
}

const snapshot: TickerSnapshot = {
  prices: new Map([
    ['BTCUSDT', 60000],
    ['ETHUSDT', 3000],
  ]),
  refreshedAt: 1_700_000_000_000,
};

describe('rawToString', () => {
  it('decodes buffers, fragments and array buffers', () => {
    expect(rawToString(Buffer.from('{"a":1}'))).toBe('{"a":1}');
    expect(rawToString([Buffer.from('{"a"'), Buffer.from(':1}')])).toBe('{"a":1}');
    const ab = new ArrayBuffer(2);
    new Uint8Array(ab).set([104, 105]);
    expect(rawToString(ab)).toBe('hi');
  });
});

describe('socketSubscriber', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('resolves once the socket has written the frame', async () => {
    const socket = new FakeSocket();
    const sub = socketSubscriber(socket);

    await expect(sub.send('x')).resolves.toBeUndefined();
    expect(socket.sent).toEqual(['x']);
    expect(sub.id).toHaveLength(10);
  });

  it('rejects when the socket is not open', async () => {
    const socket = new FakeSocket();
    socket.readyState = 2;

    await expect(socketSubscriber(socket).send('x')).rejects.toThrow('socket not open');
    expect(socket.sent).toEqual([]);
  });

  it('rejects with the write error', async () => {
    const socket = new FakeSocket();
    socket.failWith = new Error('EPIPE');

    await expect(socketSubscriber(socket).send('x')).rejects.toThrow('EPIPE');
  });

  it('rejects when too much is already buffered', async () => {
    const socket = new FakeSocket();
    socket.bufferedAmount = 2048;

    await expect(socketSubscriber(socket, { maxBufferedBytes: 1024 }).send('x')).rejects.toThrow(
      'send buffer above 1024 bytes',
    );
    expect(socket.sent).toEqual([]);
  });

  it('rejects a write that does not complete in time', async () => {
    vi.useFakeTimers();
    const socket = new FakeSocket();
    socket.hold = true;
    const pending = socketSubscriber(socket, { sendTimeoutMs: 50 }).send('x');
    const settled = expect(pending).rejects.toThrow('send timed out after 50ms');

    await vi.advanceTimersByTimeAsync(50);
    await settled;
  });

  it('terminates the socket on close', () => {
    const socket = new FakeSocket();
    socketSubscriber(socket).close?.();
    expect(socket.terminated).toBe(true);
  });
});

describe('price stream route', () => {
  let app: FastifyInstance;
  let hub: PriceHub;
  const clients: WebSocket[] = [];

  beforeEach(async () => {
    hub = new PriceHub();
    app = Fastify();
    await app.register(websocket);
    await app.register(priceStream, { prefix: '/trade', hub });
    await app.ready();
  });

  afterEach(async () => {
    for (const ws of clients.splice(0)) ws.terminate();
    await app.close();
  });

  async function connect(path = '/trade/ws/price') {
    const ws = await app.injectWS(path);
    clients.push(ws);
    const received: unknown[] = [];
    ws.on('message', (data) => {
      received.push(JSON.parse(String(data)));
    });
    return { ws, received };
  }

  it('pushes only the followed symbol and answers bad input', async () => {
    const { ws, received } = await connect('/trade/ws/price?token=test-token');
    await vi.waitFor(() => expect(hub.size).toBe(1));

    ws.send('{"action":"ping"}');
    ws.send('{"action":"subscribe","symbol":"btcusdt"}');
    ws.send('not json');
    await vi.waitFor(() => expect(received).toHaveLength(1));
    expect(received[0]).toEqual({ type: 'error', error: 'invalid_message' });

    expect(await hub.broadcast(snapshot)).toBe(1);
    await vi.waitFor(() => expect(received).toHaveLength(2));
    expect(received[1]).toEqual({
      type: 'price',
      data: { symbol: 'BTCUSDT', price: 60000, ts: 1_700_000_000_000 },
    });
  });

  it('drops the connection from the hub once the client closes', async () => {
    const { ws } = await connect();
    await vi.waitFor(() => expect(hub.size).toBe(1));

    ws.terminate();
    await vi.waitFor(() => expect(hub.size).toBe(0));
  });

  it('accepts a repeated token parameter', async () => {
    const { ws } = await connect('/trade/ws/price?token=a&token=b');

    await vi.waitFor(() => expect(hub.size).toBe(1));
    expect(ws.readyState).toBe(ws.OPEN);
  });
});
