import type { WalletEntry, WalletSource } from '../types.js';
import { componentLogger, type Logger } from '../../utils/logger.js';

export interface WalletCacheOptions {
  ttlMs: number;
  now?: () => number;
  log?: Logger;
}

interface WalletSnapshot {
  wallets: readonly WalletEntry[];
  fetchedAt: number;
}

export function normalizeCurrency(currency: string): string {
  const cur = currency.trim().toUpperCase();
  return cur === 'USD' ? 'USDT' : cur;
}

/**
 * Futures wallet balances of the configured account. The whole wallet list is
 * refetched once it is older than the TTL and swapped in as one value.
 */
export class WalletCache {
  private snapshot: WalletSnapshot | null = null;
  private inflight: Promise<WalletSnapshot> | null = null;
  private readonly now: () => number;
  private readonly log: Logger;

  constructor(
    private readonly source: WalletSource,
    private readonly opts: WalletCacheOptions,
  ) {
    this.now = opts.now ?? Date.now;
    this.log = opts.log ?? componentLogger('wallets');
  }

  get enabled(): boolean {
    return this.source.hasCredentials();
  }

  /**
   * Returns the wallet for `currency`, or `null` when credentials are missing
   * or the account has no such wallet. A zero balance is still a wallet.
   */
  async getWallet(currency: string): Promise<WalletEntry | null> {
    const wallets = await this.getWallets();
    if (!wallets) return null;
    const cur = normalizeCurrency(currency);
    return wallets.find((w) => w.currency === cur) ?? null;
  }

  async getWallets(): Promise<readonly WalletEntry[] | null> {
    if (!this.enabled) {
      this.log.warn('Exchange API credentials missing; skipping wallet fetch');
      return null;
    }
    const snap = this.snapshot;
    if (snap && this.now() - snap.fetchedAt <= this.opts.ttlMs) {
      return snap.wallets;
    }
    return (await this.load(false)).wallets;
  }

  /** Refetches regardless of age; failures propagate. */
  async refresh(): Promise<readonly WalletEntry[] | null> {
    if (!this.enabled) {
      this.log.warn('Exchange API credentials missing; skipping wallet fetch');
      return null;
    }
    return (await this.load(true)).wallets;
  }

  private load(strict: boolean): Promise<WalletSnapshot> {
    const pending = (this.inflight ??= this.fetchSnapshot().finally(() => {
      this.inflight = null;
    }));
    if (strict) return pending;

    return pending.catch((err: unknown) => {
      const stale = this.snapshot;
      if (!stale) throw err;
      this.log.warn({ err, ageMs: this.now() - stale.fetchedAt }, 'Wallet refresh failed; serving stale snapshot');
      return stale;
    });
  }

  private async fetchSnapshot(): Promise<WalletSnapshot> {
    const wallets = await this.source.fetchWallets();
    const next: WalletSnapshot = { wallets, fetchedAt: this.now() };
    this.snapshot = next;
    for (const w of wallets) {
      this.log.info(
        { currency: w.currency, walletId: w.id, balance: w.balance, lockedBalance: w.lockedBalance },
        'Futures wallet',
      );
    }
    return next;
  }
}
