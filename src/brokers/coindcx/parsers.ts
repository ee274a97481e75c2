// Normalizers for CoinDCX futures payloads. Numeric fields arrive as numbers or
// numeric strings depending on the endpoint.
import type { InstrumentSpec, WalletEntry } from '../../core/types.js';
import { isRecord } from '../../core/market/tickerFields.js';
import { UpstreamError } from '../../utils/errors.js';

export function toNumber(value: unknown): number | undefined {
  if (typeof value === 'number') return Number.isFinite(value) ? value : undefined;
  if (typeof value === 'string' && value.trim() !== '') {
    const n = Number(value.replace(/,/g, ''));
    return Number.isFinite(n) ? n : undefined;
  }
  return undefined;
}

// a zero from the exchange means "not set", same as a missing field
function nonZeroOr(value: unknown, fallback: number): number {
  const n = toNumber(value);
  return n !== undefined && n !== 0 ? n : fallback;
}

export function parseActiveInstruments(payload: unknown): string[] {
  if (!Array.isArray(payload)) {
    throw new UpstreamError('Unexpected active instruments response', { payload });
  }
  return payload.map((x) => String(x));
}

/** Accepts the bare instrument object or one wrapped under `instrument`. */
export function parseInstrument(payload: unknown, pair: string, marginCurrency: string): InstrumentSpec {
  const inst = isRecord(payload) && isRecord(payload.instrument) ? payload.instrument : payload;
  if (!isRecord(inst)) {
    throw new UpstreamError(`Unexpected instrument response for ${pair}/${marginCurrency}`, { payload });
  }

  const quantityIncrement = nonZeroOr(inst.quantity_increment, 1);
  const minQuantity = nonZeroOr(inst.min_quantity, quantityIncrement);
  const maxQuantity = nonZeroOr(inst.max_quantity, 1e18);
  const maxLeverageLong = nonZeroOr(inst.max_leverage_long, 0);

  const spec: InstrumentSpec = {
    pair,
    marginCurrency,
    unitContractValue: nonZeroOr(inst.unit_contract_value, 1),
    quantityIncrement,
    minQuantity,
    maxQuantity,
    maxLeverageLong,
    maxLeverageShort: nonZeroOr(inst.max_leverage_short, maxLeverageLong),
  };

  if (!(spec.quantityIncrement > 0) || !(spec.unitContractValue > 0) || spec.minQuantity > spec.maxQuantity) {
    throw new UpstreamError(`Invalid instrument constraints for ${pair}/${marginCurrency}`, { instrument: spec });
  }
  return spec;
}

export function parseWallets(payload: unknown): WalletEntry[] {
  const rows = Array.isArray(payload) ? payload : [payload];
  const wallets: WalletEntry[] = [];
  for (const row of rows) {
    if (!isRecord(row)) continue;
    const currency = typeof row.currency_short_name === 'string' ? row.currency_short_name.toUpperCase() : '';
    if (!currency) continue;
    wallets.push({
      id: row.id == null ? null : String(row.id),
      currency,
      balance: toNumber(row.balance) ?? 0,
      lockedBalance: toNumber(row.locked_balance) ?? 0,
    });
  }
  return wallets;
}
