// src/infra/bus/nats.ts
import { connect, StringCodec, type NatsConnection } from 'nats';
import type { TickerSnapshot } from '../../core/types.js';
import { componentLogger } from '../../utils/logger.js';

const log = componentLogger('price-bus');

/** Minimal publishing surface, so the fan-out can be tested without a server. */
export interface BusPublisher {
  publish(subject: string, data: Uint8Array): void;
}

export type PriceBus = {
  publishSnapshot: (snapshot: TickerSnapshot) => number;
  close: () => Promise<void>;
};

const sc = StringCodec();

export function priceSubject(prefix: string, symbol: string): string {
  return `${prefix}.${symbol.replace(/[^\w-]/g, '_')}`;
}

/** Publishes every price of a snapshot to `<prefix>.<SYMBOL>`. */
export function createPriceBus(
  publisher: BusPublisher,
  prefix: string,
  close: () => Promise<void> = async () => {},
): PriceBus {
  return {
    publishSnapshot(snapshot) {
      let count = 0;
      for (const [symbol, price] of snapshot.prices) {
        const body = JSON.stringify({ symbol, price, ts: snapshot.refreshedAt });
        publisher.publish(priceSubject(prefix, symbol), sc.encode(body));
        count++;
      }
      return count;
    },
    close,
  };
}

export async function connectPriceBus(opts: {
  url: string;
  user?: string;
  pass?: string;
  subjectPrefix: string;
}): Promise<PriceBus> {
  const nc: NatsConnection = await connect({
    servers: opts.url,
    user: opts.user,
    pass: opts.pass,
  });
  log.info({ server: nc.getServer(), prefix: opts.subjectPrefix }, 'Connected to NATS');

  return createPriceBus(nc, opts.subjectPrefix, async () => {
    await nc.drain();
    log.info('NATS connection drained');
  });
}
