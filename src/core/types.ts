export type Side = 'BUY' | 'SELL';
export type OrderType = 'market' | 'limit';

export const ORDER_STATUSES = ['QUEUED', 'PENDING', 'EXECUTED', 'FAILED', 'CANCELLED'] as const;
export type OrderStatus = (typeof ORDER_STATUSES)[number];

/** Fields a client supplies when queueing or editing an order. */
export interface OrderDraft {
  symbol: string;
  side: Side;
  orderType: OrderType;
  qty: number; // INR notional
  leverage: number;
  limitPrice: number | null;
  margin: number | null;
}

export interface QueuedOrder extends OrderDraft {
  id: number;
  status: OrderStatus;
  createdAt: number;
  updatedAt: number;
  executedAt: number | null;
  clientOrderId: string | null;
  lastError: string | null;
}

export interface PriceQuote {
  symbol: string;
  price: number;
  refreshedAt: number;
}

export interface TickerSnapshot {
  prices: ReadonlyMap<string, number>;
  refreshedAt: number;
}

export interface InstrumentSpec {
  pair: string;
  marginCurrency: string;
  unitContractValue: number;
  quantityIncrement: number;
  minQuantity: number;
  maxQuantity: number;
  maxLeverageLong: number;
  maxLeverageShort: number;
}

export interface WalletEntry {
  id: string | null;
  currency: string;
  balance: number;
  lockedBalance: number;
}

/** Body of a futures create-order call, serialized verbatim before signing. */
export interface FuturesOrderPayload {
  timestamp: number;
  order: {
    pair: string;
    side: 'buy' | 'sell';
    order_type: 'limit_order' | 'market_order';
    price: number;
    total_quantity: number;
    leverage: number;
    time_in_force: 'good_till_cancel';
    margin_currency_short_name: string;
    client_order_id: string;
  };
}

export interface ExchangeResponse {
  status: number;
  body: string;
}

export interface TickerSource {
  fetchTickers(): Promise<unknown>;
}

export interface InstrumentSource {
  fetchActiveInstruments(marginCurrency: string): Promise<string[]>;
  fetchInstrument(pair: string, marginCurrency: string): Promise<InstrumentSpec>;
}

export interface WalletSource {
  hasCredentials(): boolean;
  fetchWallets(): Promise<WalletEntry[]>;
}

export interface OrderSubmitter {
  submitOrder(payload: FuturesOrderPayload): Promise<ExchangeResponse>;
}

export type ExchangeGateway = TickerSource & InstrumentSource & WalletSource & OrderSubmitter;
