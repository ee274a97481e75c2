// src/index.ts
import 'dotenv/config';
import { createServer } from './api/server.js';
import { CoinDcxClient } from './brokers/coindcx/client.js';
import { cfg } from './config/index.js';
import { InstrumentCache } from './core/market/instrumentCache.js';
import { MarketDataCache } from './core/market/marketDataCache.js';
import { OrderQueue } from './core/queue/orderQueue.js';
import { PriceHub } from './core/router/priceHub.js';
import { WalletCache } from './core/wallet/walletCache.js';
import { connectPriceBus, type PriceBus } from './infra/bus/nats.js';
import { closeAgents } from './infra/http/agent.js';
import { logger } from './utils/logger.js';
import { OrderExecutor } from './workers/orderExecutor.js';

process.on('unhandledRejection', (err) => {
  logger.error({ err }, 'Unhandled promise rejection');
});
process.on('uncaughtException', (err) => {
  logger.error({ err }, 'Uncaught exception');
  process.exit(1);
});

async function main() {
  const exchange = new CoinDcxClient({
    baseUrl: cfg.exchange.baseUrl,
    apiKey: cfg.exchange.apiKey,
    apiSecret: cfg.exchange.apiSecret,
    timeoutMs: cfg.exchange.timeoutMs,
  });

  const marketData = new MarketDataCache(exchange, {
    ttlMs: cfg.market.tickerTtlMs,
    refreshIntervalMs: cfg.market.refreshIntervalMs,
  });
  const instruments = new InstrumentCache(exchange, { ttlMs: cfg.market.instrumentTtlMs });
  const wallets = new WalletCache(exchange, { ttlMs: cfg.wallet.ttlMs });
  const queue = new OrderQueue({ maxLeverage: cfg.trading.maxLeverage });
  const executor = new OrderExecutor({
    queue,
    marketData,
    instruments,
    wallets,
    exchange,
    marginCurrency: cfg.trading.marginCurrency,
    fxSymbol: cfg.trading.fxSymbol,
    fxFallbackRate: cfg.trading.fxFallbackRate,
    dryRun: cfg.trading.dryRun,
  });
  const hub = new PriceHub();

  let bus: PriceBus | null = null;
  if (cfg.nats.url) {
    bus = await connectPriceBus({
      url: cfg.nats.url,
      user: cfg.nats.user,
      pass: cfg.nats.pass,
      subjectPrefix: cfg.nats.subjectPrefix,
    });
  }

  marketData.onRefresh(async (snapshot) => {
    const pushed = await hub.broadcast(snapshot);
    const published = bus ? bus.publishSnapshot(snapshot) : 0;
    logger.debug({ pushed, published }, 'Prices fanned out');
  });

  // Warm the caches; failures here only mean the first request fetches again
  if (!(await marketData.refresh())) {
    logger.warn('Initial ticker fetch failed; poller will retry');
  }
  try {
    await instruments.getActiveInstruments(cfg.trading.marginCurrency);
  } catch (err) {
    logger.warn({ err }, 'Initial active instrument fetch failed');
  }
  try {
    await wallets.refresh();
  } catch (err) {
    logger.warn({ err }, 'Initial wallet fetch failed');
  }

  marketData.start();

  const app = await createServer({ queue, executor, marketData, wallets, hub });
  await app.listen({ host: cfg.host, port: cfg.port });
  logger.info(
    { host: cfg.host, port: cfg.port, marginCurrency: cfg.trading.marginCurrency, dryRun: cfg.trading.dryRun },
    'Order gateway listening',
  );

  // Graceful shutdown hooks
  const shutdown = async (sig: string) => {
    try {
      logger.info({ sig }, 'Shutting down gracefully');
      await marketData.stop();
      await app.close();
      await bus?.close();
      await closeAgents();
      process.exit(0);
    } catch (err) {
      logger.error({ err }, 'Error during shutdown');
      process.exit(1);
    }
  };

  for (const sig of ['SIGINT', 'SIGTERM'] as const) {
    process.once(sig, () => void shutdown(sig));
  }
}

main().catch((err: unknown) => {
  logger.error({ err }, 'Failed to start');
  process.exit(1);
});
