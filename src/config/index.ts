function num(value: string | undefined, fallback: number): number {
  const parsed = value != null && value !== '' ? Number(value) : Number.NaN;
  return Number.isFinite(parsed) ? parsed : fallback;
}

export const cfg = {
  host: process.env.HOST ?? '0.0.0.0',
  port: num(process.env.PORT, 8080),
  exchange: {
    baseUrl: (process.env.EXCHANGE_BASE_URL ?? 'https://api.coindcx.com').replace(/\/+$/, ''),
    apiKey: process.env.COINDCX_API_KEY || undefined,
    apiSecret: process.env.COINDCX_API_SECRET || undefined,
    timeoutMs: num(process.env.EXCHANGE_TIMEOUT_MS, 20_000),
  },
  market: {
    refreshIntervalMs: num(process.env.TICKER_REFRESH_INTERVAL, 10) * 1000,
    tickerTtlMs: num(process.env.TICKER_TTL_MS, 10_000),
    instrumentTtlMs: num(process.env.INSTRUMENT_TTL_MS, 60_000),
  },
  wallet: {
    ttlMs: num(process.env.WALLET_TTL_MS, 30_000),
  },
  trading: {
    marginCurrency: (process.env.MARGIN_CURRENCY ?? 'INR').toUpperCase(),
    fxSymbol: (process.env.FX_SYMBOL ?? 'USDTINR').toUpperCase(),
    fxFallbackRate: num(process.env.FX_FALLBACK_RATE, 90),
    maxLeverage: num(process.env.MAX_LEVERAGE, 100),
    dryRun: process.env.DRY_RUN === 'true',
  },
  nats: {
    url: process.env.NATS_URL || undefined,
    user: process.env.NATS_USER,
    pass: process.env.NATS_PASS,
    subjectPrefix: process.env.NATS_PRICE_SUBJECT ?? 'prices',
  },
};
