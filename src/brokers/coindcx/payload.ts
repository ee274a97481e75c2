import type { FuturesOrderPayload, QueuedOrder } from '../../core/types.js';

const QUOTE_SUFFIXES = ['USDT', 'INR', 'USD'] as const;

/** BTCUSDT / BTCINR / BTC → B-BTC_USDT (futures pairs are always USDT-quoted). */
export function toFuturesPair(symbol: string): string {
  let base = symbol.trim().toUpperCase();
  for (const suffix of QUOTE_SUFFIXES) {
    base = base.split(suffix).join('');
  }
  return `B-${base}_USDT`;
}

export interface OrderPayloadInput {
  order: QueuedOrder;
  pair: string;
  price: number;
  totalQuantity: number;
  marginCurrency: string;
  clientOrderId: string;
  timestamp: number;
}

export function buildOrderPayload(p: OrderPayloadInput): FuturesOrderPayload {
  return {
    timestamp: p.timestamp,
    order: {
      pair: p.pair,
      side: p.order.side === 'BUY' ? 'buy' : 'sell',
      order_type: p.order.orderType === 'limit' ? 'limit_order' : 'market_order',
      price: p.price,
      total_quantity: p.totalQuantity,
      leverage: Math.trunc(p.order.leverage),
      time_in_force: 'good_till_cancel',
      margin_currency_short_name: p.marginCurrency,
      client_order_id: p.clientOrderId,
    },
  };
}
