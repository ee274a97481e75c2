import type { OrderDraft, OrderStatus, QueuedOrder } from '../types.js';
import { LeverageLimitError, NotFoundError, OrderNotUpdatableError } from '../../utils/errors.js';
import { componentLogger, type Logger } from '../../utils/logger.js';

export interface OrderQueueOptions {
  maxLeverage: number;
  now?: () => number;
  log?: Logger;
}

export interface ListOptions {
  status?: OrderStatus;
  limit?: number;
}

export type BulkItemResult =
  | { ok: true; order: QueuedOrder }
  | { ok: false; index: number; error: string; message: string };

/**
 * Order store keyed by a monotonic id. Records are frozen and replaced on every
 * change, so a reader holding an order never sees it half-updated. Ids are never
 * reused, even after a cancel.
 */
export class OrderQueue {
  private orders = new Map<number, QueuedOrder>();
  private nextId = 1;
  private readonly now: () => number;
  private readonly log: Logger;

  constructor(private readonly opts: OrderQueueOptions) {
    this.now = opts.now ?? Date.now;
    this.log = opts.log ?? componentLogger('order-queue');
  }

  create(draft: OrderDraft): QueuedOrder {
    this.assertLeverage(draft.leverage);
    const ts = this.now();
    const order: QueuedOrder = {
      ...draft,
      symbol: draft.symbol.toUpperCase(),
      id: this.nextId++,
      status: 'QUEUED',
      createdAt: ts,
      updatedAt: ts,
      executedAt: null,
      clientOrderId: null,
      lastError: null,
    };
    this.orders.set(order.id, Object.freeze(order));
    this.log.info({ order }, 'Order queued');
    return order;
  }

  /** Creates each draft independently; one rejected item does not stop the rest. */
  bulkCreate(drafts: readonly OrderDraft[]): BulkItemResult[] {
    return drafts.map((draft, index): BulkItemResult => {
      try {
        return { ok: true, order: this.create(draft) };
      } catch (err) {
        if (err instanceof LeverageLimitError) {
          return { ok: false, index, error: err.code, message: err.message };
        }
        throw err;
      }
    });
  }

  get(id: number): QueuedOrder | undefined {
    return this.orders.get(id);
  }

  require(id: number): QueuedOrder {
    const order = this.orders.get(id);
    if (!order) throw new NotFoundError('Order not found', { id });
    return order;
  }

  update(id: number, draft: OrderDraft): QueuedOrder {
    const existing = this.requireQueued(id);
    this.assertLeverage(draft.leverage);
    const updated = this.replace(existing, { ...draft, symbol: draft.symbol.toUpperCase() });
    this.log.info({ order: updated }, 'Order updated');
    return updated;
  }

  delete(id: number): QueuedOrder {
    const existing = this.requireQueued(id);
    const cancelled = this.replace(existing, { status: 'CANCELLED' });
    this.log.info({ id }, 'Order cancelled');
    return cancelled;
  }

  /** Cancels every queued order and returns how many were cancelled. */
  clearQueued(): number {
    let count = 0;
    for (const order of this.orders.values()) {
      if (order.status !== 'QUEUED') continue;
      this.replace(order, { status: 'CANCELLED' });
      count++;
    }
    this.log.info({ count }, 'Queue cleared');
    return count;
  }

  /** Oldest first; with a `limit`, the newest `limit` orders, still oldest first. */
  list(opts: ListOptions = {}): QueuedOrder[] {
    const rows = Array.from(this.orders.values())
      .filter((o) => opts.status === undefined || o.status === opts.status)
      .sort((a, b) => a.createdAt - b.createdAt || a.id - b.id);
    if (opts.limit === undefined || rows.length <= opts.limit) return rows;
    return rows.slice(rows.length - opts.limit);
  }

  /* ------------- execution lifecycle ------------- */

  /** QUEUED → PENDING. Returns null when the order is not queued any more. */
  claim(id: number): QueuedOrder | null {
    const order = this.orders.get(id);
    if (!order || order.status !== 'QUEUED') return null;
    return this.replace(order, { status: 'PENDING' });
  }

  markExecuted(id: number, clientOrderId: string): QueuedOrder {
    const ts = this.now();
    return this.transition(id, { status: 'EXECUTED', executedAt: ts, clientOrderId, lastError: null });
  }

  markFailed(id: number, error: string, clientOrderId: string | null = null): QueuedOrder {
    return this.transition(id, { status: 'FAILED', lastError: error, clientOrderId });
  }

  /** PENDING → QUEUED after an attempt that never reached the exchange. */
  release(id: number, error: string): QueuedOrder {
    return this.transition(id, { status: 'QUEUED', lastError: error });
  }

  private transition(id: number, patch: Partial<QueuedOrder>): QueuedOrder {
    const order = this.require(id);
    if (order.status !== 'PENDING') {
      throw new OrderNotUpdatableError(id, order.status);
    }
    return this.replace(order, patch);
  }

  private requireQueued(id: number): QueuedOrder {
    const order = this.require(id);
    if (order.status !== 'QUEUED') {
      throw new OrderNotUpdatableError(id, order.status);
    }
    return order;
  }

  private replace(order: QueuedOrder, patch: Partial<QueuedOrder>): QueuedOrder {
    const next: QueuedOrder = {
      ...order,
      ...patch,
      id: order.id,
      createdAt: order.createdAt,
      updatedAt: this.now(),
    };
    this.orders.set(order.id, Object.freeze(next));
    return next;
  }

  private assertLeverage(leverage: number): void {
    if (leverage > this.opts.maxLeverage) {
      throw new LeverageLimitError(leverage, this.opts.maxLeverage);
    }
  }
}
