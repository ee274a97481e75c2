// src/api/marketRoutes.ts
import type { FastifyInstance } from 'fastify';
import type { MarketDataCache } from '../core/market/marketDataCache.js';
import { normalizeCurrency, type WalletCache } from '../core/wallet/walletCache.js';
import type { WalletEntry } from '../core/types.js';
import { CredentialsMissingError, NotFoundError } from '../utils/errors.js';
import { balanceQuerySchema, symbolParamsSchema } from './schemas.js';

export type MarketRoutesOptions = {
  marketData: MarketDataCache;
  wallets: WalletCache;
};

function toWalletResponse(w: WalletEntry) {
  return {
    id: w.id,
    currency: w.currency,
    balance: w.balance,
    locked_balance: w.lockedBalance,
  };
}

export default async function marketRoutes(app: FastifyInstance, opts: MarketRoutesOptions) {
  const { marketData, wallets } = opts;

  /** Symbols currently in the ticker cache */
  app.get('/securities', async () => {
    const symbols = marketData.symbols();
    return { count: symbols.length, symbols };
  });

  app.get('/price/:symbol', async (req) => {
    const { symbol } = symbolParamsSchema.parse(req.params);
    const quote = await marketData.get(symbol);
    return {
      symbol: quote.symbol,
      price: quote.price,
      refreshed_at: new Date(quote.refreshedAt).toISOString(),
    };
  });

  app.get('/balance', async (req) => {
    const { currency } = balanceQuerySchema.parse(req.query);
    if (!wallets.enabled) throw new CredentialsMissingError();
    const cur = normalizeCurrency(currency);
    const wallet = await wallets.getWallet(cur);
    if (!wallet) throw new NotFoundError('Wallet not found', { currency: cur });
    return toWalletResponse(wallet);
  });

  /** Fresh wallet list, bypassing the cache TTL */
  app.get('/wallets', async () => {
    const list = await wallets.refresh();
    if (!list) throw new CredentialsMissingError();
    return { wallets: list.map(toWalletResponse) };
  });
}
