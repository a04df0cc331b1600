/**
 * FxRateProvider Tests
 *
 * Verifies:
 * - Identity rate for equal currencies
 * - Tier order: cache → store → API, with write-back
 * - Exactly one API call for repeated and concurrent lookups
 * - RATE_UNAVAILABLE when every tier misses (never 1:1)
 * - Cache and store failures don't fail a lookup
 * - Currency code normalisation
 */

import { describe, it, expect, beforeEach } from "vitest";
import { FinanceError } from "@coinpurse/types";
import type { FxRate } from "@coinpurse/types";
import { InMemoryFinanceStore } from "@coinpurse/store";
import { FxRateProvider, normalizeRate, cacheKey } from "../src/provider.js";
import { InMemoryRateCache } from "../src/cache.js";
import type { FxEvent, RateApi, RateCache, RateFetchResult, RateStore } from "../src/types.js";

// =============================================================================
// Fakes
// =============================================================================

class FakeRateApi implements RateApi {
  readonly calls: string[] = [];
  private readonly _rates: Record<string, number>;

  constructor(rates: Record<string, number>) {
    this._rates = rates;
  }

  async fetchRate(from: string, to: string): Promise<RateFetchResult> {
    this.calls.push(`${from}/${to}`);
    const rate = this._rates[`${from}/${to}`];
    return rate === undefined ? { ok: false, reason: "unknown pair" } : { ok: true, rate };
  }
}

class ThrowingCache implements RateCache {
  get(): string | undefined {
    throw new Error("cache down");
  }
  set(): void {
    throw new Error("cache down");
  }
  clear(): void {}
}

const NOW = new Date("2026-03-10T12:00:00.000Z");

function rateRow(date: string, rate: string): FxRate {
  return { fromCurrency: "RSD", toCurrency: "EUR", date, rate, fetchedAt: `${date}T00:00:00.000Z` };
}

async function captureRejection(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (err: unknown) {
    return err;
  }
  return undefined;
}

// =============================================================================
// Tests
// =============================================================================

describe("FxRateProvider", () => {
  let store: InMemoryFinanceStore;
  let cache: InMemoryRateCache;
  let api: FakeRateApi;
  let events: FxEvent[];
  let provider: FxRateProvider;

  beforeEach(() => {
    store = new InMemoryFinanceStore();
    cache = new InMemoryRateCache({ now: () => NOW.getTime() });
    api = new FakeRateApi({ "RSD/EUR": 0.0085321, "RSD/USD": 0.00921, "EUR/USD": 1.08 });
    events = [];
    provider = new FxRateProvider({
      cache,
      store,
      api,
      onEvent: (e) => events.push(e),
      now: () => NOW,
    });
  });

  it("returns exactly 1 for equal currencies without touching any tier", async () => {
    expect(await provider.getRate("EUR", "EUR")).toBe("1.000000");
    expect(await provider.getRate("eur", "EUR", "2020-01-01")).toBe("1.000000");
    expect(api.calls).toEqual([]);
    expect(events).toEqual([]);
  });

  it("calls the API once, then serves repeats from the cache", async () => {
    const first = await provider.getRate("RSD", "EUR", "2026-03-10");
    const second = await provider.getRate("RSD", "EUR", "2026-03-10");

    expect(first).toBe("0.008532");
    expect(second).toBe("0.008532");
    expect(api.calls).toEqual(["RSD/EUR"]);
    expect(events.map((e) => e.type)).toEqual(["api_fetch", "cache_hit"]);
  });

  it("persists API rates under the requested date", async () => {
    await provider.getRate("RSD", "EUR", "2026-03-08");

    const stored = store.findLatestRate("RSD", "EUR", "2026-03-08");
    expect(stored?.date).toBe("2026-03-08");
    expect(stored?.rate).toBe("0.008532");
    expect(stored?.fetchedAt).toBe("2026-03-10T12:00:00.000Z");
    expect(cache.get(cacheKey("RSD", "EUR", "2026-03-08"))).toBe("0.008532");
  });

  it("serves the most recent stored rate on or before the date", async () => {
    store.insertRate(rateRow("2026-03-01", "0.008400"));
    store.insertRate(rateRow("2026-03-05", "0.008450"));
    store.insertRate(rateRow("2026-03-20", "0.008900"));

    expect(await provider.getRate("RSD", "EUR", "2026-03-10")).toBe("0.008450");
    expect(api.calls).toEqual([]);
    expect(events.map((e) => e.type)).toEqual(["store_hit"]);

    // Written back to the cache
    expect(await provider.getRate("RSD", "EUR", "2026-03-10")).toBe("0.008450");
    expect(events.map((e) => e.type)).toEqual(["store_hit", "cache_hit"]);
  });

  it("shares one API call between concurrent lookups of a key", async () => {
    const [a, b] = await Promise.all([
      provider.getRate("RSD", "USD", "2026-03-10"),
      provider.getRate("RSD", "USD", "2026-03-10"),
    ]);

    expect(a).toBe("0.009210");
    expect(b).toBe("0.009210");
    expect(api.calls).toEqual(["RSD/USD"]);
  });

  it("throws RATE_UNAVAILABLE when every tier misses", async () => {
    const err = await captureRejection(provider.getRate("XAU", "EUR", "2026-03-10"));

    expect(err).toBeInstanceOf(FinanceError);
    expect(err instanceof FinanceError && err.code).toBe("RATE_UNAVAILABLE");
    expect(err instanceof FinanceError && err.message).toBe("XAU -> EUR");
    expect(store.findLatestRate("XAU", "EUR", "2026-03-10")).toBeUndefined();
    expect(events).toEqual([
      { type: "api_failure", from: "XAU", to: "EUR", date: "2026-03-10", reason: "unknown pair" },
    ]);
  });

  it("throws RATE_UNAVAILABLE without an API when cache and store miss", async () => {
    const offline = new FxRateProvider({ cache, store, now: () => NOW });
    const err = await captureRejection(offline.getRate("RSD", "EUR"));
    expect(err instanceof FinanceError && err.code).toBe("RATE_UNAVAILABLE");
  });

  it("rejects rates that are zero after normalisation", async () => {
    const tiny = new FxRateProvider({
      cache,
      store,
      api: new FakeRateApi({ "VND/EUR": 0.0000001 }),
      now: () => NOW,
    });
    const err = await captureRejection(tiny.getRate("VND", "EUR"));
    expect(err instanceof FinanceError && err.code).toBe("RATE_UNAVAILABLE");
  });

  it("upper-cases currency codes and rejects malformed ones", async () => {
    expect(await provider.getRate("rsd", "eur", "2026-03-10")).toBe("0.008532");
    expect(api.calls).toEqual(["RSD/EUR"]);

    const err = await captureRejection(provider.getRate("EURO", "USD"));
    expect(err instanceof FinanceError && err.code).toBe("VALIDATION_ERROR");
  });

  it("rejects a malformed as-of date", async () => {
    const err = await captureRejection(provider.getRate("RSD", "EUR", "2026-02-30"));
    expect(err instanceof FinanceError && err.code).toBe("VALIDATION_ERROR");
  });

  it("treats a failing cache as a miss", async () => {
    const withBrokenCache = new FxRateProvider({
      cache: new ThrowingCache(),
      store,
      api,
      onEvent: (e) => events.push(e),
      now: () => NOW,
    });

    expect(await withBrokenCache.getRate("RSD", "EUR", "2026-03-10")).toBe("0.008532");
    expect(events.map((e) => e.type)).toEqual(["cache_error", "cache_error", "api_fetch"]);
  });

  it("still returns an API rate when persisting it fails", async () => {
    const readOnly: RateStore = {
      findLatestRate: () => undefined,
      insertRate: () => {
        throw new Error("disk full");
      },
    };
    const p = new FxRateProvider({
      cache,
      store: readOnly,
      api,
      onEvent: (e) => events.push(e),
      now: () => NOW,
    });

    expect(await p.getRate("RSD", "EUR", "2026-03-10")).toBe("0.008532");
    expect(events.map((e) => e.type)).toEqual(["store_write_failed", "api_fetch"]);
  });

  it("resolves both reference rates for one date", async () => {
    const rates = await provider.getRatesForTransaction("RSD");

    expect(rates).toEqual({ eur: "0.008532", usd: "0.009210" });
    expect(store.findLatestRate("RSD", "USD", "2026-03-10")?.date).toBe("2026-03-10");
  });

  it("needs one API call for a reference currency", async () => {
    const rates = await provider.getRatesForTransaction("EUR", "2026-03-10");

    expect(rates).toEqual({ eur: "1.000000", usd: "1.080000" });
    expect(api.calls).toEqual(["EUR/USD"]);
  });

  it("reports today's date from its clock", () => {
    expect(provider.today()).toBe("2026-03-10");
  });
});

describe("normalizeRate", () => {
  it("formats with six digits", () => {
    expect(normalizeRate(117.2)).toBe("117.200000");
    expect(normalizeRate(1)).toBe("1.000000");
  });

  it("rejects values that are not positive", () => {
    expect(normalizeRate(0)).toBeUndefined();
    expect(normalizeRate(-1.5)).toBeUndefined();
    expect(normalizeRate(Number.NaN)).toBeUndefined();
    expect(normalizeRate(0.0000001)).toBeUndefined();
  });
});
