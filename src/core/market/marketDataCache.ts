import type { PriceQuote, TickerSnapshot, TickerSource } from '../types.js';
import { SymbolNotFoundError } from '../../utils/errors.js';
import { componentLogger, type Logger } from '../../utils/logger.js';
import { PeriodicJob } from '../../workers/periodicJob.js';
import { parseTickers } from './tickerFields.js';

export type RefreshListener = (snapshot: TickerSnapshot) => void | Promise<void>;

export interface MarketDataCacheOptions {
  ttlMs: number;
  refreshIntervalMs: number;
  now?: () => number;
  log?: Logger;
}

const EMPTY: TickerSnapshot = { prices: new Map(), refreshedAt: 0 };

function normalizeSymbol(symbol: string): string {
  return symbol.trim().toUpperCase();
}

/**
 * Last-price cache fed by the exchange's bulk ticker. The snapshot is replaced
 * wholesale on every successful refresh and a failed refresh keeps the previous
 * one, so readers always see a complete map from a single cycle.
 */
export class MarketDataCache {
  private snapshot: TickerSnapshot = EMPTY;
  private inflight: Promise<boolean> | null = null;
  private readonly listeners = new Set<RefreshListener>();
  private readonly poller: PeriodicJob;
  private readonly now: () => number;
  private readonly log: Logger;

  constructor(
    private readonly source: TickerSource,
    private readonly opts: MarketDataCacheOptions,
  ) {
    this.now = opts.now ?? Date.now;
    this.log = opts.log ?? componentLogger('market-data');
    this.poller = new PeriodicJob(
      'ticker-refresh',
      opts.refreshIntervalMs,
      async () => {
        await this.refresh();
      },
      this.log,
    );
  }

  get current(): TickerSnapshot {
    return this.snapshot;
  }

  get polling(): boolean {
    return this.poller.running;
  }

  onRefresh(listener: RefreshListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Fetches the full ticker list. Resolves `true` when the snapshot was
   * replaced; failures are logged and resolve `false`. Concurrent callers
   * share the same request. Listeners are started once the request has
   * settled and are not awaited.
   */
  refresh(): Promise<boolean> {
    return (this.inflight ??= this.doRefresh()
      .finally(() => {
        this.inflight = null;
      })
      .then((next) => {
        if (next) this.notify(next);
        return next !== null;
      }));
  }

  private async doRefresh(): Promise<TickerSnapshot | null> {
    let prices: Map<string, number>;
    try {
      prices = parseTickers(await this.source.fetchTickers());
    } catch (err) {
      this.log.error({ err }, 'Ticker cache update failed');
      return null;
    }

    if (prices.size === 0) {
      this.log.warn('Ticker refresh returned no usable entries; keeping previous snapshot');
      return null;
    }

    const next: TickerSnapshot = { prices, refreshedAt: this.now() };
    this.snapshot = next;
    this.log.debug({ symbols: prices.size }, 'Ticker cache refreshed');
    return next;
  }

  private notify(snapshot: TickerSnapshot): void {
    for (const listener of this.listeners) {
      try {
        const pending = listener(snapshot);
        if (pending instanceof Promise) {
          pending.catch((err: unknown) => {
            this.log.error({ err }, 'Ticker refresh listener failed');
          });
        }
      } catch (err) {
        this.log.error({ err }, 'Ticker refresh listener failed');
      }
    }
  }

  isStale(): boolean {
    return this.now() - this.snapshot.refreshedAt > this.opts.ttlMs;
  }

  /** Cached price without triggering a refresh. */
  peek(symbol: string): PriceQuote | undefined {
    const key = normalizeSymbol(symbol);
    const { prices, refreshedAt } = this.snapshot;
    const price = prices.get(key);
    return price === undefined ? undefined : { symbol: key, price, refreshedAt };
  }

  async get(symbol: string): Promise<PriceQuote> {
    const key = normalizeSymbol(symbol);
    if (!this.snapshot.prices.has(key) || this.isStale()) {
      await this.refresh();
    }
    const quote = this.peek(key);
    if (!quote) throw new SymbolNotFoundError(key);
    return quote;
  }

  symbols(): string[] {
    return Array.from(this.snapshot.prices.keys()).sort();
  }

  start(): void {
    this.poller.start();
  }

  stop(): Promise<void> {
    return this.poller.stop();
  }
}
