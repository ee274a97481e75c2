import { z } from 'zod';
import { ORDER_STATUSES, type OrderDraft, type QueuedOrder } from '../core/types.js';

export const orderInputSchema = z
  .object({
    symbol: z.string().trim().min(1),
    side: z.enum(['BUY', 'SELL']),
    order_type: z.enum(['market', 'limit']),
    qty: z.number().positive(), // INR notional
    leverage: z.number().int().min(1).max(100).default(1),
    limit_price: z.number().positive().nullish(),
    margin: z.number().nonnegative().nullish(),
  })
  .refine((o) => o.order_type !== 'limit' || o.limit_price != null, {
    message: 'limit_price is required for limit orders',
    path: ['limit_price'],
  })
  .transform(
    (o): OrderDraft => ({
      symbol: o.symbol.toUpperCase(),
      side: o.side,
      orderType: o.order_type,
      qty: o.qty,
      leverage: o.leverage,
      limitPrice: o.limit_price ?? null,
      margin: o.margin ?? null,
    }),
  );

export const bulkOrdersSchema = z.object({
  orders: z.array(orderInputSchema).min(1).max(50),
});

export const executeSchema = z.object({
  ids: z.array(z.number().int()).min(1),
});

export const orderIdParamsSchema = z.object({
  id: z.coerce.number().int().positive(),
});

export const listOrdersQuerySchema = z.object({
  status: z
    .string()
    .transform((s) => s.toUpperCase())
    .pipe(z.enum(ORDER_STATUSES))
    .optional(),
  limit: z.coerce.number().int().min(1).max(500).default(100),
});

export const symbolParamsSchema = z.object({
  symbol: z.string().trim().min(1),
});

export const balanceQuerySchema = z.object({
  currency: z.string().trim().min(1).default('INR'),
});

export const priceStreamQuerySchema = z.object({
  token: z.string().default(''),
});

/** Wire shape of a queued order. */
export function toOrderResponse(o: QueuedOrder) {
  return {
    id: o.id,
    symbol: o.symbol,
    side: o.side,
    order_type: o.orderType,
    qty: o.qty,
    leverage: o.leverage,
    limit_price: o.limitPrice,
    margin: o.margin,
    status: o.status.toLowerCase(),
    created_at: new Date(o.createdAt).toISOString(),
    updated_at: new Date(o.updatedAt).toISOString(),
    executed_at: o.executedAt === null ? null : new Date(o.executedAt).toISOString(),
    client_order_id: o.clientOrderId,
    last_error: o.lastError,
  };
}
