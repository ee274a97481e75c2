// Ticker entries from the exchange do not share one shape: the symbol may sit
// under `market`, `symbol` or `pair`, the price under `last` or `last_price`,
// sometimes nested in a `ticker` object. Each candidate is an extractor and the
// first one that yields a value wins.

export type TickerItem = Record<string, unknown>;
export type FieldExtractor<T> = (item: TickerItem) => T | undefined;

const SYMBOL_KEYS = ['market', 'symbol', 'pair', 'market_symbol'] as const;
const NESTED_SYMBOL_KEYS = ['symbol', 'pair'] as const;
const PRICE_KEYS = ['last', 'last_price', 'price', 'close'] as const;
const NESTED_PRICE_KEYS = ['last', 'last_price', 'close', 'price'] as const;

export function isRecord(value: unknown): value is TickerItem {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Parses a positive, finite price; accepts strings with thousands separators. */
export function toPrice(value: unknown): number | undefined {
  let n: number;
  if (typeof value === 'number') {
    n = value;
  } else if (typeof value === 'string' && value.trim() !== '') {
    n = Number(value.replace(/,/g, ''));
  } else {
    return undefined;
  }
  return Number.isFinite(n) && n > 0 ? n : undefined;
}

export function stringField(key: string): FieldExtractor<string> {
  return (item) => {
    const value = item[key];
    return typeof value === 'string' && value.trim() !== '' ? value.trim().toUpperCase() : undefined;
  };
}

export function nestedStringField(parent: string, key: string): FieldExtractor<string> {
  return (item) => {
    const inner = item[parent];
    if (!isRecord(inner)) return undefined;
    const value = inner[key];
    if (value == null) return undefined;
    const text = String(value).trim();
    return text !== '' ? text.toUpperCase() : undefined;
  };
}

export function priceField(key: string): FieldExtractor<number> {
  return (item) => toPrice(item[key]);
}

export function nestedPriceField(parent: string, key: string): FieldExtractor<number> {
  return (item) => {
    const inner = item[parent];
    return isRecord(inner) ? toPrice(inner[key]) : undefined;
  };
}

export const SYMBOL_EXTRACTORS: ReadonlyArray<FieldExtractor<string>> = [
  ...SYMBOL_KEYS.map(stringField),
  ...NESTED_SYMBOL_KEYS.map((k) => nestedStringField('ticker', k)),
];

export const PRICE_EXTRACTORS: ReadonlyArray<FieldExtractor<number>> = [
  ...PRICE_KEYS.map(priceField),
  ...NESTED_PRICE_KEYS.map((k) => nestedPriceField('ticker', k)),
];

export function firstMatch<T>(extractors: ReadonlyArray<FieldExtractor<T>>, item: TickerItem): T | undefined {
  for (const extract of extractors) {
    const value = extract(item);
    if (value !== undefined) return value;
  }
  return undefined;
}

/**
 * Builds a symbol → last price map from a raw ticker payload. Entries without a
 * recognizable symbol or a usable price are skipped; later duplicates win.
 */
export function parseTickers(payload: unknown): Map<string, number> {
  const prices = new Map<string, number>();
  if (!Array.isArray(payload)) return prices;

  for (const item of payload) {
    if (!isRecord(item)) continue;
    const symbol = firstMatch(SYMBOL_EXTRACTORS, item);
    const price = firstMatch(PRICE_EXTRACTORS, item);
    if (symbol !== undefined && price !== undefined) {
      prices.set(symbol, price);
    }
  }
  return prices;
}
