import type { InstrumentSource, InstrumentSpec } from '../types.js';
import { componentLogger, type Logger } from '../../utils/logger.js';
import { TtlCache } from './ttlCache.js';

export interface InstrumentCacheOptions {
  ttlMs: number;
  now?: () => number;
  log?: Logger;
}

/** Active futures pairs per margin currency and instrument specs per pair. */
export class InstrumentCache {
  private readonly active: TtlCache<ReadonlySet<string>>;
  private readonly specs: TtlCache<InstrumentSpec>;
  private readonly log: Logger;

  constructor(
    private readonly source: InstrumentSource,
    opts: InstrumentCacheOptions,
  ) {
    this.log = opts.log ?? componentLogger('instruments');
    this.active = new TtlCache('active-instruments', opts.ttlMs, this.log, opts.now);
    this.specs = new TtlCache('instrument-details', opts.ttlMs, this.log, opts.now);
  }

  getActiveInstruments(marginCurrency: string): Promise<ReadonlySet<string>> {
    const mc = marginCurrency.toUpperCase();
    return this.active.get(mc, async () => {
      const pairs = new Set(await this.source.fetchActiveInstruments(mc));
      this.log.info(
        { marginCurrency: mc, total: pairs.size, sample: Array.from(pairs).sort().slice(0, 20) },
        'Active futures instruments refreshed',
      );
      return pairs;
    });
  }

  getInstrument(pair: string, marginCurrency: string): Promise<InstrumentSpec> {
    const mc = marginCurrency.toUpperCase();
    return this.specs.get(`${pair}|${mc}`, async () => {
      const spec = await this.source.fetchInstrument(pair, mc);
      this.log.info({ instrument: spec }, 'Instrument details refreshed');
      return spec;
    });
  }
}
