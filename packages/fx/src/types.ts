/**
 * @coinpurse/fx — Core types.
 *
 * The provider resolves a rate through three tiers, in order:
 * 1. RateCache (volatile, TTL-bounded)
 * 2. RateStore (durable, most recent rate on or before the date)
 * 3. RateApi (external service, latest rate)
 *
 * Nothing here ever falls back to 1:1 for differing currencies.
 */

import type { Currency, FxRate } from "@coinpurse/types";

// =============================================================================
// Tiers
// =============================================================================

/**
 * Volatile key/value cache for rates.
 * Implementations may throw; the provider treats every cache failure as
 * a miss.
 */
export interface RateCache {
  get(key: string): string | undefined;
  set(key: string, rate: string): void;
  clear(): void;
}

/**
 * The durable rate table. A FinanceStore satisfies this.
 */
export interface RateStore {
  findLatestRate(from: Currency, to: Currency, onOrBefore: string): FxRate | undefined;
  insertRate(rate: FxRate): boolean;
}

export type RateFetchResult =
  | { readonly ok: true; readonly rate: number }
  | { readonly ok: false; readonly reason: string };

/**
 * External rate source. Never throws; failures come back as
 * `{ ok: false }`.
 */
export interface RateApi {
  fetchRate(from: Currency, to: Currency): Promise<RateFetchResult>;
}

// =============================================================================
// Events
// =============================================================================

interface FxEventBase {
  readonly from: Currency;
  readonly to: Currency;
  readonly date: string;
}

export type FxEvent =
  | (FxEventBase & { readonly type: "cache_hit" | "store_hit" | "api_fetch"; readonly rate: string })
  | (FxEventBase & { readonly type: "api_failure"; readonly reason: string })
  | (FxEventBase & { readonly type: "cache_error" | "store_write_failed"; readonly error: unknown });

export type FxEventType = FxEvent["type"];

// =============================================================================
// Provider
// =============================================================================

export interface FxRateProviderOptions {
  readonly cache: RateCache;
  readonly store: RateStore;
  /** Omit to resolve from cache and store only */
  readonly api?: RateApi | undefined;
  readonly onEvent?: ((event: FxEvent) => void) | undefined;
  /** Clock used for the default as-of date and fetchedAt stamps */
  readonly now?: (() => Date) | undefined;
}

/** Rates of one currency into both reference currencies. */
export interface TransactionRates {
  readonly eur: string;
  readonly usd: string;
}

/**
 * What the ledger and the debt book need from the FX layer.
 */
export interface RateSource {
  getRate(from: Currency, to: Currency, asOfDate?: string): Promise<string>;
  getRatesForTransaction(currency: Currency, asOfDate?: string): Promise<TransactionRates>;
}
