/**
 * @coinpurse/fx — Exchange rates for the finance core.
 *
 * Provides:
 * - FxRateProvider: tiered rate resolution (cache → store → API)
 * - InMemoryRateCache: TTL cache with a background sweeper
 * - ExchangeRateApiClient: fetch-based client for the external rate API
 */

export type {
  RateCache,
  RateStore,
  RateApi,
  RateFetchResult,
  FxEvent,
  FxEventType,
  FxRateProviderOptions,
  TransactionRates,
  RateSource,
} from "./types.js";

export { FxRateProvider, normalizeCurrency, normalizeRate, cacheKey } from "./provider.js";
export { InMemoryRateCache, DEFAULT_RATE_TTL_MS } from "./cache.js";
export type { InMemoryRateCacheOptions } from "./cache.js";
export {
  ExchangeRateApiClient,
  DEFAULT_FX_API_URL,
  DEFAULT_FX_TIMEOUT_MS,
} from "./api-client.js";
export type { ExchangeRateApiClientOptions } from "./api-client.js";
