/**
 * @coinpurse/fx — FX rate provider.
 *
 * Resolves currency pair rates through cache → store → API and writes
 * every successful lookup back to the faster tiers.
 *
 * Rules:
 * - Same currency is exactly "1.000000" and touches no tier
 * - Rates are decimal strings with RATE_DECIMALS digits, always > 0
 * - A pair that no tier can resolve throws RATE_UNAVAILABLE
 * - Concurrent lookups of one key share a single API call
 */

import { FinanceError, RATE_DECIMALS, isCurrencyCode, isIsoDate } from "@coinpurse/types";
import type { Currency } from "@coinpurse/types";
import type {
  FxEvent,
  FxRateProviderOptions,
  RateApi,
  RateCache,
  RateSource,
  RateStore,
  TransactionRates,
} from "./types.js";

const IDENTITY_RATE = (1).toFixed(RATE_DECIMALS);

/**
 * Upper-case and validate a currency code.
 */
export function normalizeCurrency(code: string): Currency {
  const upper = code.trim().toUpperCase();
  if (!isCurrencyCode(upper)) {
    throw new FinanceError("VALIDATION_ERROR", `Invalid currency code: "${code}"`);
  }
  return upper;
}

/**
 * Format an API rate with RATE_DECIMALS digits.
 * Returns undefined for non-finite values and values that round to zero.
 */
export function normalizeRate(value: number): string | undefined {
  if (!Number.isFinite(value) || value <= 0) {
    return undefined;
  }
  const fixed = value.toFixed(RATE_DECIMALS);
  return /^0\.0+$/.test(fixed) ? undefined : fixed;
}

export function cacheKey(from: Currency, to: Currency, date: string): string {
  return `fx:${from}:${to}:${date}`;
}

function utcDate(d: Date): string {
  return d.toISOString().slice(0, 10);
}

export class FxRateProvider implements RateSource {
  private readonly _cache: RateCache;
  private readonly _store: RateStore;
  private readonly _api: RateApi | undefined;
  private readonly _onEvent: ((event: FxEvent) => void) | undefined;
  private readonly _now: () => Date;
  private readonly _inFlight = new Map<string, Promise<string | undefined>>();

  constructor(options: FxRateProviderOptions) {
    this._cache = options.cache;
    this._store = options.store;
    this._api = options.api;
    this._onEvent = options.onEvent;
    this._now = options.now ?? (() => new Date());
  }

  /**
   * Today's date (UTC) according to the provider's clock.
   */
  today(): string {
    return utcDate(this._now());
  }

  /**
   * Rate converting one unit of `from` into `to`, as of `asOfDate`
   * (YYYY-MM-DD, default today).
   */
  async getRate(from: Currency, to: Currency, asOfDate?: string): Promise<string> {
    const fromCode = normalizeCurrency(from);
    const toCode = normalizeCurrency(to);
    if (fromCode === toCode) {
      return IDENTITY_RATE;
    }

    const date = asOfDate ?? this.today();
    if (!isIsoDate(date)) {
      throw new FinanceError("VALIDATION_ERROR", `Invalid rate date: "${date}"`);
    }

    const key = cacheKey(fromCode, toCode, date);

    // 1. Cache
    const cached = this.readCache(key, fromCode, toCode, date);
    if (cached !== undefined) {
      this.emit({ type: "cache_hit", from: fromCode, to: toCode, date, rate: cached });
      return cached;
    }

    // 2. Store
    const stored = this._store.findLatestRate(fromCode, toCode, date);
    if (stored !== undefined) {
      this.writeCache(key, stored.rate, fromCode, toCode, date);
      this.emit({ type: "store_hit", from: fromCode, to: toCode, date, rate: stored.rate });
      return stored.rate;
    }

    // 3. API
    const fetched = await this.fetchShared(key, fromCode, toCode, date);
    if (fetched === undefined) {
      throw new FinanceError("RATE_UNAVAILABLE", `${fromCode} -> ${toCode}`);
    }
    return fetched;
  }

  /**
   * Rates of `currency` into EUR and USD for the same as-of date.
   */
  async getRatesForTransaction(currency: Currency, asOfDate?: string): Promise<TransactionRates> {
    const date = asOfDate ?? this.today();
    const eur = await this.getRate(currency, "EUR", date);
    const usd = await this.getRate(currency, "USD", date);
    return { eur, usd };
  }

  // ─── Tiers ──────────────────────────────────────────────────────────

  private fetchShared(
    key: string,
    from: Currency,
    to: Currency,
    date: string,
  ): Promise<string | undefined> {
    const pending = this._inFlight.get(key);
    if (pending !== undefined) {
      return pending;
    }
    const request = this.fetchFromApi(key, from, to, date).finally(() => {
      this._inFlight.delete(key);
    });
    this._inFlight.set(key, request);
    return request;
  }

  private async fetchFromApi(
    key: string,
    from: Currency,
    to: Currency,
    date: string,
  ): Promise<string | undefined> {
    if (this._api === undefined) {
      this.emit({ type: "api_failure", from, to, date, reason: "No rate API configured" });
      return undefined;
    }

    const result = await this._api.fetchRate(from, to);
    if (!result.ok) {
      this.emit({ type: "api_failure", from, to, date, reason: result.reason });
      return undefined;
    }

    const rate = normalizeRate(result.rate);
    if (rate === undefined) {
      this.emit({ type: "api_failure", from, to, date, reason: `Unusable rate ${result.rate}` });
      return undefined;
    }

    try {
      this._store.insertRate({
        fromCurrency: from,
        toCurrency: to,
        date,
        rate,
        fetchedAt: this._now().toISOString(),
      });
    } catch (error) {
      this.emit({ type: "store_write_failed", from, to, date, error });
    }
    this.writeCache(key, rate, from, to, date);
    this.emit({ type: "api_fetch", from, to, date, rate });
    return rate;
  }

  private readCache(key: string, from: Currency, to: Currency, date: string): string | undefined {
    try {
      return this._cache.get(key);
    } catch (error) {
      this.emit({ type: "cache_error", from, to, date, error });
      return undefined;
    }
  }

  private writeCache(key: string, rate: string, from: Currency, to: Currency, date: string): void {
    try {
      this._cache.set(key, rate);
    } catch (error) {
      this.emit({ type: "cache_error", from, to, date, error });
    }
  }

  private emit(event: FxEvent): void {
    this._onEvent?.(event);
  }
}
