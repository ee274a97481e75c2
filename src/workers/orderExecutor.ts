import { buildOrderPayload, toFuturesPair } from '../brokers/coindcx/payload.js';
import {
  checkActiveInstrument,
  sizeOrder,
  type SizingErrorCode,
  type SizingFigures,
} from '../core/allocator/sizing.js';
import { buildClientOrderId } from '../core/idempotency/keys.js';
import type { InstrumentCache } from '../core/market/instrumentCache.js';
import type { MarketDataCache } from '../core/market/marketDataCache.js';
import type { OrderQueue } from '../core/queue/orderQueue.js';
import type { FuturesOrderPayload, OrderSubmitter, QueuedOrder } from '../core/types.js';
import type { WalletCache } from '../core/wallet/walletCache.js';
import { CredentialsMissingError, SymbolNotFoundError, UpstreamError } from '../utils/errors.js';
import { componentLogger, type Logger } from '../utils/logger.js';
import { KeyedLock } from './orderLocks.js';

export type ExecutionErrorCode =
  | SizingErrorCode
  | 'order_not_queued'
  | 'price_unavailable'
  | 'no_futures_wallet'
  | 'credentials_missing'
  | 'upstream_error'
  | 'internal_error'
  | 'exchange_rejected'
  | 'dry_run';

// rejections caused by the order itself; anything else leaves it queued for a retry
const TERMINAL_ERRORS: ReadonlySet<ExecutionErrorCode> = new Set<ExecutionErrorCode>([
  'instrument_not_active',
  'invalid_price',
  'trade_size_too_small_for_instrument',
  'trade_size_too_large_for_instrument',
  'estimated_margin_exceeds_balance',
  'exchange_rejected',
]);

export interface SentResult {
  sent: true;
  success: boolean;
  error?: 'exchange_rejected';
  clientOrderId: string;
  payload: FuturesOrderPayload;
  responseStatus: number;
  responseText: string;
  sizing: SizingFigures;
}

export interface UnsentResult {
  sent: false;
  success: false;
  error: ExecutionErrorCode;
  message?: string;
  details?: Record<string, unknown>;
  payload?: FuturesOrderPayload;
}

export type ExecutionResult = SentResult | UnsentResult;

export interface BatchResult {
  executed: QueuedOrder[];
  failed: Array<{ id: number; error: ExecutionErrorCode }>;
  notFound: number[];
  debug: Array<{ localId: number; symbol: string; result: ExecutionResult }>;
}

export interface OrderExecutorDeps {
  queue: OrderQueue;
  marketData: MarketDataCache;
  instruments: InstrumentCache;
  wallets: WalletCache;
  exchange: OrderSubmitter;
  marginCurrency: string;
  fxSymbol: string;
  fxFallbackRate: number;
  dryRun?: boolean;
  now?: () => number;
  log?: Logger;
}

interface PreparedOrder {
  payload: FuturesOrderPayload;
  clientOrderId: string;
  sizing: SizingFigures;
}

type Preparation = { ok: true; prepared: PreparedOrder } | { ok: false; result: UnsentResult };

function unsent(error: ExecutionErrorCode, details?: Record<string, unknown>, message?: string): UnsentResult {
  return { sent: false, success: false, error, message, details };
}

const SUCCESS_STATUSES = new Set([200, 201]);

/**
 * Runs queued orders through price lookup, sizing, signing and submission.
 * Each order id is processed under its own lock and claimed (PENDING) before
 * anything is sent, so two overlapping batches can never submit it twice.
 */
export class OrderExecutor {
  private readonly locks = new KeyedLock<number>();
  private readonly now: () => number;
  private readonly log: Logger;

  constructor(private readonly deps: OrderExecutorDeps) {
    this.now = deps.now ?? Date.now;
    this.log = deps.log ?? componentLogger('executor');
  }

  async executeBatch(ids: readonly number[]): Promise<BatchResult> {
    const batch: BatchResult = { executed: [], failed: [], notFound: [], debug: [] };

    for (const id of ids) {
      const found = this.deps.queue.get(id);
      if (!found) {
        batch.notFound.push(id);
        continue;
      }

      const { order, result } = await this.locks.runExclusive(id, () => this.executeOne(id));
      batch.debug.push({ localId: id, symbol: found.symbol, result });

      if (result.success && order) {
        batch.executed.push(order);
      } else {
        batch.failed.push({ id, error: result.error ?? 'exchange_rejected' });
      }
    }

    this.log.info(
      {
        executed: batch.executed.map((o) => o.id),
        failed: batch.failed,
        notFound: batch.notFound,
      },
      'Batch execution finished',
    );
    return batch;
  }

  private async executeOne(id: number): Promise<{ order: QueuedOrder | null; result: ExecutionResult }> {
    const { queue } = this.deps;
    const claimed = queue.claim(id);
    if (!claimed) {
      return { order: null, result: unsent('order_not_queued', { id, status: queue.get(id)?.status }) };
    }

    try {
      const prep = await this.prepare(claimed);
      if (!prep.ok) {
        const order = TERMINAL_ERRORS.has(prep.result.error)
          ? queue.markFailed(id, prep.result.error)
          : queue.release(id, prep.result.error);
        return { order, result: prep.result };
      }

      const { payload, clientOrderId, sizing } = prep.prepared;

      if (this.deps.dryRun) {
        this.log.warn({ id, payload }, 'Dry run enabled; order not sent');
        return { order: queue.release(id, 'dry_run'), result: { ...unsent('dry_run'), payload } };
      }

      const res = await this.deps.exchange.submitOrder(payload);
      const success = SUCCESS_STATUSES.has(res.status);
      const result: SentResult = {
        sent: true,
        success,
        ...(success ? {} : { error: 'exchange_rejected' as const }),
        clientOrderId,
        payload,
        responseStatus: res.status,
        responseText: res.body,
        sizing,
      };

      if (success) {
        return { order: queue.markExecuted(id, clientOrderId), result };
      }
      this.log.error({ id, status: res.status, body: res.body }, 'Exchange rejected order');
      return { order: queue.markFailed(id, 'exchange_rejected', clientOrderId), result };
    } catch (err) {
      const error: ExecutionErrorCode =
        err instanceof CredentialsMissingError
          ? 'credentials_missing'
          : err instanceof UpstreamError
            ? 'upstream_error'
            : 'internal_error';
      this.log.error({ err, id }, 'Order execution aborted');
      const message = err instanceof Error ? err.message : String(err);
      return { order: queue.release(id, error), result: unsent(error, { id }, message) };
    }
  }

  private async prepare(order: QueuedOrder): Promise<Preparation> {
    const { marketData, instruments, wallets, marginCurrency } = this.deps;
    const symbol = order.symbol;

    let price: number;
    if (order.limitPrice != null) {
      price = order.limitPrice;
    } else {
      try {
        price = (await marketData.get(symbol)).price;
      } catch (err) {
        if (err instanceof SymbolNotFoundError) {
          return { ok: false, result: unsent('price_unavailable', { symbol }) };
        }
        throw err;
      }
    }

    const pair = toFuturesPair(symbol);

    if (!wallets.enabled) {
      return { ok: false, result: unsent('credentials_missing') };
    }
    const wallet = await wallets.getWallet(marginCurrency);
    if (!wallet) {
      this.log.error({ marginCurrency }, 'No futures wallet found; cannot place order');
      return { ok: false, result: unsent('no_futures_wallet', { margin_currency: marginCurrency }) };
    }
    this.log.info(
      { walletId: wallet.id, balance: wallet.balance, lockedBalance: wallet.lockedBalance },
      'Using futures wallet for this order',
    );

    const active = await instruments.getActiveInstruments(marginCurrency);
    const inactive = checkActiveInstrument(pair, active);
    if (inactive) {
      this.log.error({ pair, symbol, marginCurrency }, 'Pair not active for margin currency');
      return { ok: false, result: unsent(inactive.error, { ...inactive.details, symbol, margin_currency: marginCurrency }) };
    }

    const instrument = await instruments.getInstrument(pair, marginCurrency);
    const fxRate = await this.resolveFxRate();

    const sized = sizeOrder({
      pair,
      activeInstruments: active,
      notionalInr: order.qty,
      price,
      instrument,
      fxRate,
      leverage: order.leverage,
      walletBalance: wallet.balance,
    });
    if (!sized.ok) {
      this.log.error({ id: order.id, error: sized.error, ...sized.details }, 'Order sizing rejected');
      return { ok: false, result: unsent(sized.error, { ...sized.details, symbol }) };
    }
    this.log.info({ id: order.id, ...sized.figures }, 'Futures sizing');

    const timestamp = this.now();
    const clientOrderId = buildClientOrderId(order.id, timestamp);
    const payload = buildOrderPayload({
      order,
      pair,
      price,
      totalQuantity: sized.totalQuantity,
      marginCurrency,
      clientOrderId,
      timestamp,
    });
    return { ok: true, prepared: { payload, clientOrderId, sizing: sized.figures } };
  }

  private async resolveFxRate(): Promise<number> {
    const { marketData, fxSymbol, fxFallbackRate } = this.deps;
    try {
      return (await marketData.get(fxSymbol)).price;
    } catch (err) {
      if (!(err instanceof SymbolNotFoundError)) throw err;
      this.log.warn({ fxSymbol, fallback: fxFallbackRate }, 'FX ticker not found; using fallback rate');
      return fxFallbackRate;
    }
  }
}
