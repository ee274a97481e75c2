import { describe, expect, it } from 'vitest';
import { UpstreamError } from '../../utils/errors.js';
import { parseActiveInstruments, parseInstrument, parseWallets, toNumber } from './parsers.js';

describe('toNumber', () => {
  it('reads numbers and numeric strings', () => {
    expect(toNumber(3)).toBe(3);
    expect(toNumber('1,000.5')).toBe(1000.5);
    expect(toNumber('')).toBeUndefined();
    expect(toNumber('n/a')).toBeUndefined();
    expect(toNumber(Number.POSITIVE_INFINITY)).toBeUndefined();
  });
});

describe('parseActiveInstruments', () => {
  it('returns the pairs as strings', () => {
    expect(parseActiveInstruments(['B-BTC_USDT', 'B-ETH_USDT'])).toEqual(['B-BTC_USDT', 'B-ETH_USDT']);
  });

  it('rejects a non-array payload', () => {
    expect(() => parseActiveInstruments({ error: 'bad' })).toThrow(UpstreamError);
  });
});

describe('parseInstrument', () => {
  it('unwraps an instrument envelope and reads string numbers', () => {
    const spec = parseInstrument(
      {
        instrument: {
          unit_contract_value: '0.001',
          quantity_increment: '0.001',
          min_quantity: '0.002',
          max_quantity: '500',
          max_leverage_long: '25',
          max_leverage_short: '20',
        },
      },
      'B-BTC_USDT',
      'INR',
    );
    expect(spec).toEqual({
      pair: 'B-BTC_USDT',
      marginCurrency: 'INR',
      unitContractValue: 0.001,
      quantityIncrement: 0.001,
      minQuantity: 0.002,
      maxQuantity: 500,
      maxLeverageLong: 25,
      maxLeverageShort: 20,
    });
  });

  it('fills missing or zero fields with defaults', () => {
    const spec = parseInstrument({ quantity_increment: 0.1, max_leverage_long: 10 }, 'B-ETH_USDT', 'INR');
    expect(spec).toEqual({
      pair: 'B-ETH_USDT',
      marginCurrency: 'INR',
      unitContractValue: 1,
      quantityIncrement: 0.1,
      minQuantity: 0.1,
      maxQuantity: 1e18,
      maxLeverageLong: 10,
      maxLeverageShort: 10,
    });
  });

  it('rejects impossible constraints', () => {
    expect(() => parseInstrument({ quantity_increment: -1 }, 'B-X_USDT', 'INR')).toThrow(UpstreamError);
    expect(() => parseInstrument({ min_quantity: 10, max_quantity: 5 }, 'B-X_USDT', 'INR')).toThrow(
      'Invalid instrument constraints for B-X_USDT/INR',
    );
    expect(() => parseInstrument('nope', 'B-X_USDT', 'INR')).toThrow(UpstreamError);
  });
});

describe('parseWallets', () => {
  it('normalizes wallet rows and skips rows without a currency', () => {
    const wallets = parseWallets([
      { id: 'abc', currency_short_name: 'inr', balance: '5000.5', locked_balance: '10' },
      { id: 7, currency_short_name: 'USDT', balance: 0 },
      { balance: 1 },
      'junk',
    ]);
    expect(wallets).toEqual([
      { id: 'abc', currency: 'INR', balance: 5000.5, lockedBalance: 10 },
      { id: '7', currency: 'USDT', balance: 0, lockedBalance: 0 },
    ]);
  });

  it('accepts a single wallet object', () => {
    expect(parseWallets({ currency_short_name: 'INR', balance: 1 })).toEqual([
      { id: null, currency: 'INR', balance: 1, lockedBalance: 0 },
    ]);
  });
});
