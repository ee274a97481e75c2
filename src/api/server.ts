import Fastify, { type FastifyBaseLogger } from 'fastify';
import websocket from '@fastify/websocket';
import type { MarketDataCache } from '../core/market/marketDataCache.js';
import type { OrderQueue } from '../core/queue/orderQueue.js';
import type { PriceHub } from '../core/router/priceHub.js';
import type { WalletCache } from '../core/wallet/walletCache.js';
import { logger } from '../utils/logger.js';
import type { OrderExecutor } from '../workers/orderExecutor.js';
import { errorHandler } from './errorHandler.js';
import marketRoutes from './marketRoutes.js';
import orderRoutes from './orderRoutes.js';
import priceStream from './priceStream.js';

export type ServerDeps = {
  queue: OrderQueue;
  executor: OrderExecutor;
  marketData: MarketDataCache;
  wallets: WalletCache;
  hub: PriceHub;
  logger?: FastifyBaseLogger;
};

export async function createServer(deps: ServerDeps) {
  const baseLogger: FastifyBaseLogger = deps.logger ?? logger;
  const app = Fastify({ logger: baseLogger });

  app.setErrorHandler(errorHandler);

  // Health check
  app.get('/health', async () => ({
    ok: true,
    tickers: deps.marketData.current.prices.size,
    ticker_refreshed_at: deps.marketData.current.refreshedAt || null,
    price_clients: deps.hub.size,
  }));

  await app.register(websocket);

  // Order queue, market data and price stream under /trade/*
  await app.register(orderRoutes, { prefix: '/trade', queue: deps.queue, executor: deps.executor });
  await app.register(marketRoutes, { prefix: '/trade', marketData: deps.marketData, wallets: deps.wallets });
  await app.register(priceStream, { prefix: '/trade', hub: deps.hub });

  return app;
}
