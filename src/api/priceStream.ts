// src/api/priceStream.ts
import type { FastifyInstance } from 'fastify';
import { nanoid } from 'nanoid';
import type { RawData } from 'ws';
import type { PriceHub, PriceSubscriber } from '../core/router/priceHub.js';
import { priceStreamQuerySchema } from './schemas.js';

export type PriceStreamOptions = {
  hub: PriceHub;
  sendTimeoutMs?: number;
  maxBufferedBytes?: number;
};

/** The part of a `ws` socket a subscriber pushes through. */
export interface PushSocket {
  readonly readyState: number;
  readonly OPEN: number;
  readonly bufferedAmount: number;
  send(data: string, cb: (err?: Error) => void): void;
  terminate(): void;
}

export interface SocketSubscriberOptions {
  sendTimeoutMs?: number;
  maxBufferedBytes?: number;
}

const SEND_TIMEOUT_MS = 5_000;
const MAX_BUFFERED_BYTES = 1_048_576;

export function rawToString(data: RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf8');
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString('utf8');
  return data.toString('utf8');
}

export function socketSubscriber(socket: PushSocket, opts: SocketSubscriberOptions = {}): PriceSubscriber {
  const timeoutMs = opts.sendTimeoutMs ?? SEND_TIMEOUT_MS;
  const maxBuffered = opts.maxBufferedBytes ?? MAX_BUFFERED_BYTES;

  return {
    id: nanoid(10),
    send: (data) =>
      new Promise<void>((resolve, reject) => {
        if (socket.readyState !== socket.OPEN) {
          reject(new Error('socket not open'));
          return;
        }
        if (socket.bufferedAmount > maxBuffered) {
          reject(new Error(`send buffer above ${maxBuffered} bytes`));
          return;
        }
        const timer = setTimeout(() => reject(new Error(`send timed out after ${timeoutMs}ms`)), timeoutMs);
        socket.send(data, (err) => {
          clearTimeout(timer);
          if (err) reject(err);
          else resolve();
        });
      }),
    close: () => socket.terminate(),
  };
}

export default async function priceStream(app: FastifyInstance, opts: PriceStreamOptions) {
  const { hub } = opts;

  app.get('/ws/price', { websocket: true }, (socket, req) => {
    const query = priceStreamQuerySchema.safeParse(req.query);
    const token = query.success ? query.data.token : '';
    const sub = socketSubscriber(socket, { sendTimeoutMs: opts.sendTimeoutMs, maxBufferedBytes: opts.maxBufferedBytes });
    // token is accepted as-is; auth sits in front of this service
    req.log.info({ subscriber: sub.id, hasToken: token.length > 0 }, 'Price stream connected');
    hub.register(sub);

    socket.on('message', (data: RawData) => {
      hub.handleMessage(sub, rawToString(data)).catch((err: unknown) => {
        req.log.error({ err, subscriber: sub.id }, 'Price stream message failed');
      });
    });
    socket.on('close', () => hub.unregister(sub));
    socket.on('error', (err) => {
      req.log.warn({ err, subscriber: sub.id }, 'Price stream socket error');
      hub.unregister(sub);
    });
  });
}
