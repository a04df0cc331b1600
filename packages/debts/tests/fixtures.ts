/**
 * Shared fixtures for debt book tests.
 */

import { FinanceError } from "@coinpurse/types";
import type { Debt } from "@coinpurse/types";
import type { RateSource, TransactionRates } from "@coinpurse/fx";
import { InMemoryFinanceStore } from "@coinpurse/store";

export const TEST_RATES: Readonly<Record<string, string>> = {
  "RSD/EUR": "0.008532",
  "RSD/USD": "0.009210",
  "EUR/USD": "1.080000",
  "USD/EUR": "0.925926",
};

/**
 * Rate source backed by a fixed table. Records every lookup.
 */
export class FixedRates implements RateSource {
  readonly requests: string[] = [];

  async getRate(from: string, to: string, asOfDate?: string): Promise<string> {
    this.requests.push(`${from}/${to}@${asOfDate ?? "today"}`);
    if (from === to) return "1.000000";
    const rate = TEST_RATES[`${from}/${to}`];
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

/**
 * Rate source that only knows the identity rate, as when the rate
 * service is unreachable and nothing is cached.
 */
export class SameCurrencyOnlyRates extends FixedRates {
  override async getRate(from: string, to: string, asOfDate?: string): Promise<string> {
    this.requests.push(`${from}/${to}@${asOfDate ?? "today"}`);
    if (from === to) return "1.000000";
    throw new FinanceError("RATE_UNAVAILABLE", `${from} -> ${to}`);
  }
}

export function sequentialIds(prefix: string): () => string {
  let n = 0;
  return () => `${prefix}-${++n}`;
}

/**
 * Accounts 1 (Ana), 2 (Marko), 3 (no display name) and the expense
 * category Food(1) of account 1.
 */
export function seededStore<S extends InMemoryFinanceStore>(store: S): S {
  const names: (string | null)[] = ["Ana", "Marko", null];
  names.forEach((displayName, i) => {
    store.insertAccount({
      externalId: `ext-${i + 1}`,
      displayName,
      defaultCurrency: "RSD",
      preferredReportCurrency: "EUR",
      createdAt: "2026-01-01T00:00:00.000Z",
    });
  });
  store.insertCategory({ accountId: 1, name: "Food", icon: "🍔", flowKind: "EXPENSE", isDefault: true });
  return store;
}

/**
 * In-memory store whose compare-and-set fails for one debt id, as if
 * another process had settled it first.
 */
export class RacingStore extends InMemoryFinanceStore {
  private readonly _loseRaceFor: string;

  constructor(loseRaceFor: string) {
    super();
    this._loseRaceFor = loseRaceFor;
  }

  override markDebtSettled(id: string, settledAt: string): boolean {
    if (id === this._loseRaceFor) {
      return false;
    }
    return super.markDebtSettled(id, settledAt);
  }
}

/**
 * In-memory store that records `extra` right after the first listing of
 * the debts between two accounts, as if another writer added a debt
 * while rates were being fetched.
 */
export class ShiftingStore extends InMemoryFinanceStore {
  private _extra: Debt | undefined;

  constructor(extra: Debt) {
    super();
    this._extra = extra;
  }

  override listUnsettledDebtsBetween(accountA: number, accountB: number): readonly Debt[] {
    const debts = super.listUnsettledDebtsBetween(accountA, accountB);
    if (this._extra !== undefined) {
      this.insertDebt(this._extra);
      this._extra = undefined;
    }
    return debts;
  }
}

export function codeOf(err: unknown): string | undefined {
  return err instanceof FinanceError ? err.code : undefined;
}

export async function captureRejection(run: () => Promise<unknown> | unknown): Promise<unknown> {
  try {
    await run();
  } catch (err: unknown) {
    return err;
  }
  return undefined;
}

export function ids(debts: readonly Debt[]): string[] {
  return debts.map((d) => d.id);
}
