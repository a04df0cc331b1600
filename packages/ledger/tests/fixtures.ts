/**
 * Shared fixtures for ledger tests.
 */

import { FinanceError } from "@coinpurse/types";
import type { RateSource, TransactionRates } from "@coinpurse/fx";
import { InMemoryFinanceStore } from "@coinpurse/store";

/** Rates every ledger test resolves against. */
export const TEST_RATES: Readonly<Record<string, string>> = {
  "RSD/EUR": "0.008532",
  "RSD/USD": "0.009210",
  "EUR/USD": "1.080000",
  "USD/EUR": "0.925926",
  "EUR/RSD": "117.200000",
  "USD/RSD": "108.580000",
};

/**
 * Rate source backed by a fixed table. Records every lookup.
 */
export class FixedRates implements RateSource {
  readonly requests: string[] = [];
  private readonly _table: Readonly<Record<string, string>>;

  constructor(table: Readonly<Record<string, string>> = TEST_RATES) {
    this._table = table;
  }

  async getRate(from: string, to: string, asOfDate?: string): Promise<string> {
    this.requests.push(`${from}/${to}@${asOfDate ?? "today"}`);
    if (from === to) return "1.000000";
    const rate = this._table[`${from}/${to}`];
    if (rate === undefined) {
      throw new FinanceError("RATE_UNAVAILABLE", `${from} -> ${to}`);
    }
    return rate;
  }

  async getRatesForTransaction(currency: string, asOfDate?: string): Promise<TransactionRates> {
    return {
      eur: await this.getRate(currency, "EUR", asOfDate),
      usd: await this.getRate(currency, "USD", asOfDate),
    };
  }
}

/** Sequential id generator: prefix-1, prefix-2, … */
export function sequentialIds(prefix: string): () => string {
  let n = 0;
  return () => `${prefix}-${++n}`;
}

/**
 * A store with accounts 1 (prefers EUR) and 2 (prefers RSD) and the
 * categories Food(1), Transport(2), Salary(3) owned by account 1.
 */
export function seededStore(): InMemoryFinanceStore {
  const store = new InMemoryFinanceStore();
  store.insertAccount({
    externalId: "ext-1",
    displayName: "Ana",
    defaultCurrency: "RSD",
    preferredReportCurrency: "EUR",
    createdAt: "2026-01-01T00:00:00.000Z",
  });
  store.insertAccount({
    externalId: "ext-2",
    displayName: "Marko",
    defaultCurrency: "RSD",
    preferredReportCurrency: "RSD",
    createdAt: "2026-01-01T00:00:00.000Z",
  });
  store.insertCategory({ accountId: 1, name: "Food", icon: "🍔", flowKind: "EXPENSE", isDefault: true });
  store.insertCategory({ accountId: 1, name: "Transport", icon: "🚌", flowKind: "EXPENSE", isDefault: true });
  store.insertCategory({ accountId: 1, name: "Salary", icon: "💰", flowKind: "INCOME", isDefault: true });
  return store;
}

export async function captureRejection(run: () => Promise<unknown> | unknown): Promise<unknown> {
  try {
    await run();
  } catch (err: unknown) {
    return err;
  }
  return undefined;
}
