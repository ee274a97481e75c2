// src/brokers/coindcx/client.ts
import { request, type Dispatcher } from 'undici';
import type {
  ExchangeGateway,
  ExchangeResponse,
  FuturesOrderPayload,
  InstrumentSpec,
  WalletEntry,
} from '../../core/types.js';
import { getAgent } from '../../infra/http/agent.js';
import { CredentialsMissingError, UpstreamError, errorMessage } from '../../utils/errors.js';
import { componentLogger, type Logger } from '../../utils/logger.js';
import { parseActiveInstruments, parseInstrument, parseWallets } from './parsers.js';
import { signPayload, type ApiCredentials } from './signing.js';

export const PATHS = {
  ticker: '/exchange/ticker',
  activeInstruments: '/exchange/v1/derivatives/futures/data/active_instruments',
  instrument: '/exchange/v1/derivatives/futures/data/instrument',
  wallets: '/exchange/v1/derivatives/futures/wallets',
  createOrder: '/exchange/v1/derivatives/futures/orders/create',
} as const;

export interface CoinDcxClientOptions {
  baseUrl: string;
  apiKey?: string;
  apiSecret?: string;
  timeoutMs: number;
  dispatcher?: Dispatcher;
  now?: () => number;
  log?: Logger;
}

interface CallOptions {
  query?: Record<string, string>;
  body?: string;
  headers?: Record<string, string>;
}

export class CoinDcxClient implements ExchangeGateway {
  private readonly dispatcher: Dispatcher;
  private readonly now: () => number;
  private readonly log: Logger;

  constructor(private readonly opts: CoinDcxClientOptions) {
    this.dispatcher = opts.dispatcher ?? getAgent('coindcx');
    this.now = opts.now ?? Date.now;
    this.log = opts.log ?? componentLogger('coindcx');
    if (!this.hasCredentials()) {
      this.log.warn('CoinDCX API credentials are not set (COINDCX_API_KEY / COINDCX_API_SECRET)');
    }
  }

  hasCredentials(): boolean {
    return Boolean(this.opts.apiKey && this.opts.apiSecret);
  }

  /* ---------------- public market data ---------------- */

  fetchTickers(): Promise<unknown> {
    return this.getJson(PATHS.ticker);
  }

  async fetchActiveInstruments(marginCurrency: string): Promise<string[]> {
    const data = await this.getJson(PATHS.activeInstruments, {
      query: { 'margin_currency_short_name[]': marginCurrency },
    });
    return parseActiveInstruments(data);
  }

  async fetchInstrument(pair: string, marginCurrency: string): Promise<InstrumentSpec> {
    const data = await this.getJson(PATHS.instrument, {
      query: { pair, margin_currency_short_name: marginCurrency },
    });
    return parseInstrument(data, pair, marginCurrency);
  }

  /* ---------------- signed account calls ---------------- */

  async fetchWallets(): Promise<WalletEntry[]> {
    const signed = signPayload(this.credentials(), { timestamp: this.now() });
    const data = await this.getJson(PATHS.wallets, signed);
    return parseWallets(data);
  }

  /**
   * Sends the order as-is. Any HTTP answer is returned to the caller for
   * interpretation; only transport failures throw.
   */
  async submitOrder(payload: FuturesOrderPayload): Promise<ExchangeResponse> {
    const signed = signPayload(this.credentials(), payload);
    this.log.info(
      { path: PATHS.createOrder, clientOrderId: payload.order.client_order_id, body: signed.body },
      'Submitting futures order',
    );
    const res = await this.call('POST', PATHS.createOrder, signed);
    this.log.info({ status: res.status, body: res.body }, 'Futures order response');
    return res;
  }

  /* ---------------- transport ---------------- */

  private credentials(): ApiCredentials {
    const { apiKey, apiSecret } = this.opts;
    if (!apiKey || !apiSecret) throw new CredentialsMissingError();
    return { apiKey, apiSecret };
  }

  private async getJson(path: string, opts: CallOptions = {}): Promise<unknown> {
    const res = await this.call('GET', path, opts);
    if (res.status < 200 || res.status >= 300) {
      throw new UpstreamError(`GET ${path} returned ${res.status}`, {
        status: res.status,
        body: res.body.slice(0, 500),
      });
    }
    try {
      return JSON.parse(res.body);
    } catch (err) {
      throw new UpstreamError(`GET ${path} returned invalid JSON: ${errorMessage(err)}`, { status: res.status });
    }
  }

  private async call(method: 'GET' | 'POST', path: string, opts: CallOptions): Promise<ExchangeResponse> {
    const qs = opts.query ? `?${new URLSearchParams(opts.query).toString()}` : '';
    const url = `${this.opts.baseUrl}${path}${qs}`;
    try {
      const res = await request(url, {
        method,
        headers: opts.headers,
        body: opts.body,
        dispatcher: this.dispatcher,
        headersTimeout: this.opts.timeoutMs,
        bodyTimeout: this.opts.timeoutMs,
      });
      return { status: res.statusCode, body: await res.body.text() };
    } catch (err) {
      throw new UpstreamError(`${method} ${path} failed: ${errorMessage(err)}`, { path });
    }
  }
}
