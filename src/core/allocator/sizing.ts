// src/core/allocator/sizing.ts
import type { InstrumentSpec } from '../types.js';

export type SizingErrorCode =
  | 'instrument_not_active'
  | 'invalid_price'
  | 'trade_size_too_small_for_instrument'
  | 'trade_size_too_large_for_instrument'
  | 'estimated_margin_exceeds_balance';

export interface SizingInput {
  pair: string;
  activeInstruments: ReadonlySet<string>;
  notionalInr: number;         // requested trade size, ₹
  price: number;               // USDT per unit of base
  instrument: InstrumentSpec;
  fxRate: number;              // INR per USDT
  leverage: number;
  walletBalance: number;       // ₹ available in the margin wallet
}

export interface SizingFigures {
  pair: string;
  notionalInr: number;
  price: number;
  fxRate: number;
  unitContractValue: number;
  quantityIncrement: number;
  minQuantity: number;
  maxQuantity: number;
  maxLeverageLong: number;
  maxLeverageShort: number;
  inrPerContract: number;
  contractsRaw: number;
  contracts: number;
  leverage: number;
  notionalUsdt: number;
  orderNotionalInr: number;
  estimatedMargin: number;
  walletBalance: number;
}

export type SizingResult =
  | { ok: true; totalQuantity: number; figures: SizingFigures }
  | { ok: false; error: SizingErrorCode; details: Record<string, unknown> };

export const QUANTITY_DECIMALS = 8;

// keeps exact multiples such as 1.852 / 0.001 from flooring one step short
const STEP_EPSILON = 1e-9;

/* ----------------- helpers ----------------- */

export function toFixedPrecision(value: number, decimals = QUANTITY_DECIMALS): number {
  return Number(value.toFixed(decimals));
}

/** Decimal places in a step such as 0.001 or 1e-10. */
export function stepDecimals(step: number): number {
  const [mantissa = '', exponent = '0'] = step.toString().split('e');
  const fraction = mantissa.split('.')[1]?.length ?? 0;
  return Math.min(100, Math.max(0, fraction - Number(exponent)));
}

export function floorToStep(value: number, step: number): number {
  if (!(step > 0)) return value;
  const steps = Math.floor(value / step + STEP_EPSILON);
  return toFixedPrecision(Math.max(0, steps) * step, Math.max(QUANTITY_DECIMALS, stepDecimals(step)));
}

export function estimateMargin(notional: number, leverage: number): number {
  return leverage > 0 ? notional / leverage : notional;
}

export type InactiveRejection = { ok: false; error: 'instrument_not_active'; details: Record<string, unknown> };

/** Gate applied before any quantity math: the pair must be tradable for the margin currency. */
export function checkActiveInstrument(pair: string, active: ReadonlySet<string>): InactiveRejection | null {
  if (active.has(pair)) return null;
  return {
    ok: false,
    error: 'instrument_not_active',
    details: { pair, known_instruments_sample: Array.from(active).sort().slice(0, 30) },
  };
}

/* --------------- sizing logic --------------- */

/**
 * Turn an INR notional into an exchange-valid contract quantity and check that
 * the resulting margin fits the wallet. Rejections come back as values so a
 * batch can report them next to successes; nothing here touches the network.
 */
export function sizeOrder(input: SizingInput): SizingResult {
  const { pair, instrument, price, fxRate, notionalInr, leverage, walletBalance } = input;

  const inactive = checkActiveInstrument(pair, input.activeInstruments);
  if (inactive) return inactive;

  if (!(price > 0) || !(fxRate > 0)) {
    return { ok: false, error: 'invalid_price', details: { pair, price, fx_rate: fxRate } };
  }

  const { unitContractValue, quantityIncrement, minQuantity, maxQuantity } = instrument;

  // 1) raw contracts for the requested notional
  const inrPerContract = price * unitContractValue * fxRate;
  const contractsRaw = notionalInr / inrPerContract;

  // 2) round down to the instrument's quantity step
  const contracts = floorToStep(contractsRaw, quantityIncrement);

  // 3) instrument bounds
  if (contracts < minQuantity) {
    return {
      ok: false,
      error: 'trade_size_too_small_for_instrument',
      details: { pair, contracts, min_quantity: minQuantity, quantity_increment: quantityIncrement },
    };
  }
  if (contracts > maxQuantity) {
    return {
      ok: false,
      error: 'trade_size_too_large_for_instrument',
      details: { pair, contracts, max_quantity: maxQuantity },
    };
  }

  // 4) margin affordability
  const notionalUsdt = price * unitContractValue * contracts;
  const orderNotionalInr = notionalUsdt * fxRate;
  const estimatedMargin = estimateMargin(orderNotionalInr, leverage);

  if (estimatedMargin > walletBalance) {
    return {
      ok: false,
      error: 'estimated_margin_exceeds_balance',
      details: { pair, estimated_margin: estimatedMargin, wallet_balance: walletBalance },
    };
  }

  return {
    ok: true,
    totalQuantity: toFixedPrecision(contracts),
    figures: {
      pair,
      notionalInr,
      price,
      fxRate,
      unitContractValue,
      quantityIncrement,
      minQuantity,
      maxQuantity,
      maxLeverageLong: instrument.maxLeverageLong,
      maxLeverageShort: instrument.maxLeverageShort,
      inrPerContract,
      contractsRaw,
      contracts,
      leverage,
      notionalUsdt,
      orderNotionalInr,
      estimatedMargin,
      walletBalance,
    },
  };
}
