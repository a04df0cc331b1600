/**
 * @coinpurse/store — In-memory FinanceStore implementation.
 *
 * Stores records in plain maps and arrays. Suitable for:
 * - Unit and integration tests
 * - Short-lived processes
 * - Development and prototyping
 *
 * Not suitable for production (all state lost on process exit).
 *
 * Units of work copy the tables on entry and restore the copy if the
 * work throws. Records are immutable objects, so a shallow copy of each
 * table is enough.
 */

import { FinanceError } from "@coinpurse/types";
import type {
  Account,
  Category,
  Currency,
  Debt,
  FxRate,
  Transaction,
} from "@coinpurse/types";
import type {
  AccountPatch,
  CategoryFilter,
  CategoryPatch,
  FinanceStore,
  FinanceUnit,
  NewAccount,
  NewCategory,
} from "./types.js";

interface Tables {
  accounts: Map<number, Account>;
  categories: Map<number, Category>;
  /** Insertion order doubles as the final tie-breaker */
  transactions: Transaction[];
  reversals: Map<string, string>;
  debts: Debt[];
  rates: Map<string, FxRate>;
  nextAccountId: number;
  nextCategoryId: number;
}

function emptyTables(): Tables {
  return {
    accounts: new Map(),
    categories: new Map(),
    transactions: [],
    reversals: new Map(),
    debts: [],
    rates: new Map(),
    nextAccountId: 1,
    nextCategoryId: 1,
  };
}

function copyTables(t: Tables): Tables {
  return {
    accounts: new Map(t.accounts),
    categories: new Map(t.categories),
    transactions: [...t.transactions],
    reversals: new Map(t.reversals),
    debts: [...t.debts],
    rates: new Map(t.rates),
    nextAccountId: t.nextAccountId,
    nextCategoryId: t.nextCategoryId,
  };
}

function rateKey(from: string, to: string, date: string): string {
  return `${from}:${to}:${date}`;
}

/** Newest first by atTime, then createdAt; ties keep reverse insertion order. */
function newestFirst(
  a: { tx: Transaction; seq: number },
  b: { tx: Transaction; seq: number },
): number {
  if (a.tx.atTime !== b.tx.atTime) return a.tx.atTime < b.tx.atTime ? 1 : -1;
  if (a.tx.createdAt !== b.tx.createdAt) return a.tx.createdAt < b.tx.createdAt ? 1 : -1;
  return b.seq - a.seq;
}

/**
 * In-memory finance store.
 */
export class InMemoryFinanceStore implements FinanceStore {
  private _tables: Tables = emptyTables();
  private _inUnit = false;

  // ─── Unit of Work ───────────────────────────────────────────────────

  transaction<T>(work: (unit: FinanceUnit) => T): T {
    // Nested units join the outer one
    if (this._inUnit) {
      return work(this);
    }

    const saved = copyTables(this._tables);
    this._inUnit = true;
    try {
      return work(this);
    } catch (err: unknown) {
      this._tables = saved;
      throw err;
    } finally {
      this._inUnit = false;
    }
  }

  close(): void {
    this._tables = emptyTables();
  }

  // ─── Accounts ───────────────────────────────────────────────────────

  getAccount(id: number): Account | undefined {
    return this._tables.accounts.get(id);
  }

  findAccountByExternalId(externalId: string): Account | undefined {
    for (const account of this._tables.accounts.values()) {
      if (account.externalId === externalId) {
        return account;
      }
    }
    return undefined;
  }

  insertAccount(account: NewAccount): Account {
    if (this.findAccountByExternalId(account.externalId) !== undefined) {
      throw new FinanceError(
        "CONFLICT",
        `Account with external id "${account.externalId}" already exists`,
      );
    }
    const stored: Account = { id: this._tables.nextAccountId++, ...account };
    this._tables.accounts.set(stored.id, stored);
    return stored;
  }

  updateAccount(id: number, patch: AccountPatch): Account {
    const current = this._tables.accounts.get(id);
    if (current === undefined) {
      throw new FinanceError("NOT_FOUND", `Account ${id} not found`);
    }
    const updated: Account = {
      ...current,
      displayName: patch.displayName !== undefined ? patch.displayName : current.displayName,
      defaultCurrency: patch.defaultCurrency ?? current.defaultCurrency,
      preferredReportCurrency: patch.preferredReportCurrency ?? current.preferredReportCurrency,
    };
    this._tables.accounts.set(id, updated);
    return updated;
  }

  // ─── Categories ─────────────────────────────────────────────────────

  insertCategory(category: NewCategory): Category {
    const stored: Category = {
      id: this._tables.nextCategoryId++,
      ...category,
      isArchived: false,
    };
    this._tables.categories.set(stored.id, stored);
    return stored;
  }

  getCategory(id: number): Category | undefined {
    return this._tables.categories.get(id);
  }

  listCategories(accountId: number, filter?: CategoryFilter): readonly Category[] {
    const includeArchived = filter?.includeArchived ?? false;
    return [...this._tables.categories.values()]
      .filter((c) => {
        if (c.accountId !== accountId) return false;
        if (filter?.flowKind !== undefined && c.flowKind !== filter.flowKind) return false;
        if (!includeArchived && c.isArchived) return false;
        return true;
      })
      .sort((a, b) => {
        if (a.isDefault !== b.isDefault) return a.isDefault ? -1 : 1;
        return a.name.localeCompare(b.name);
      });
  }

  updateCategory(id: number, patch: CategoryPatch): Category {
    const current = this._tables.categories.get(id);
    if (current === undefined) {
      throw new FinanceError("NOT_FOUND", `Category ${id} not found`);
    }
    const updated: Category = {
      ...current,
      name: patch.name ?? current.name,
      icon: patch.icon ?? current.icon,
      isArchived: patch.isArchived ?? current.isArchived,
    };
    this._tables.categories.set(id, updated);
    return updated;
  }

  // ─── Transactions ───────────────────────────────────────────────────

  insertTransaction(transaction: Transaction): void {
    if (this._tables.transactions.some((t) => t.id === transaction.id)) {
      throw new FinanceError("CONFLICT", `Transaction ${transaction.id} already exists`);
    }
    const reverses = transaction.reversesTransactionId;
    if (reverses !== null) {
      if (this._tables.reversals.has(reverses)) {
        throw new FinanceError("CONFLICT", `Transaction ${reverses} already has a reversal`);
      }
      this._tables.reversals.set(reverses, transaction.id);
    }
    this._tables.transactions.push(transaction);
  }

  getTransaction(id: string): Transaction | undefined {
    return this._tables.transactions.find((t) => t.id === id);
  }

  findReversalOf(transactionId: string): Transaction | undefined {
    const reversalId = this._tables.reversals.get(transactionId);
    return reversalId === undefined ? undefined : this.getTransaction(reversalId);
  }

  listTransactions(accountId: number, limit: number): readonly Transaction[] {
    return this._tables.transactions
      .map((tx, seq) => ({ tx, seq }))
      .filter(({ tx }) => tx.accountId === accountId)
      .sort(newestFirst)
      .slice(0, limit)
      .map(({ tx }) => tx);
  }

  listTransactionsBetween(
    accountId: number,
    fromTime: string,
    toTime: string,
  ): readonly Transaction[] {
    return this._tables.transactions
      .map((tx, seq) => ({ tx, seq }))
      .filter(({ tx }) => tx.accountId === accountId && tx.atTime >= fromTime && tx.atTime <= toTime)
      .sort((a, b) => newestFirst(b, a))
      .map(({ tx }) => tx);
  }

  listRecentCurrencies(accountId: number, limit: number): readonly Currency[] {
    const lastUse = new Map<Currency, string>();
    for (const tx of this._tables.transactions) {
      if (tx.accountId !== accountId) continue;
      const seen = lastUse.get(tx.currency);
      if (seen === undefined || tx.createdAt > seen) {
        lastUse.set(tx.currency, tx.createdAt);
      }
    }
    return [...lastUse.entries()]
      .sort((a, b) => (a[1] < b[1] ? 1 : a[1] > b[1] ? -1 : 0))
      .slice(0, limit)
      .map(([currency]) => currency);
  }

  // ─── Debts ──────────────────────────────────────────────────────────

  insertDebt(debt: Debt): void {
    if (this._tables.debts.some((d) => d.id === debt.id)) {
      throw new FinanceError("CONFLICT", `Debt ${debt.id} already exists`);
    }
    this._tables.debts.push(debt);
  }

  getDebt(id: string): Debt | undefined {
    return this._tables.debts.find((d) => d.id === id);
  }

  listDebtsForAccount(accountId: number, onlyUnsettled: boolean): readonly Debt[] {
    return this._tables.debts
      .map((debt, seq) => ({ debt, seq }))
      .filter(({ debt }) => {
        if (debt.creditorId !== accountId && debt.debtorId !== accountId) return false;
        return !onlyUnsettled || !debt.isSettled;
      })
      .sort((a, b) => {
        if (a.debt.createdAt !== b.debt.createdAt) {
          return a.debt.createdAt < b.debt.createdAt ? 1 : -1;
        }
        return b.seq - a.seq;
      })
      .map(({ debt }) => debt);
  }

  listUnsettledDebtsBetween(accountA: number, accountB: number): readonly Debt[] {
    return this._tables.debts.filter(
      (d) =>
        !d.isSettled &&
        ((d.creditorId === accountA && d.debtorId === accountB) ||
          (d.creditorId === accountB && d.debtorId === accountA)),
    );
  }

  markDebtSettled(id: string, settledAt: string): boolean {
    const index = this._tables.debts.findIndex((d) => d.id === id);
    const current = this._tables.debts[index];
    if (current === undefined || current.isSettled) {
      return false;
    }
    this._tables.debts[index] = { ...current, isSettled: true, settledAt };
    return true;
  }

  // ─── FX Rates ───────────────────────────────────────────────────────

  findLatestRate(from: Currency, to: Currency, onOrBefore: string): FxRate | undefined {
    let best: FxRate | undefined;
    for (const rate of this._tables.rates.values()) {
      if (rate.fromCurrency !== from || rate.toCurrency !== to || rate.date > onOrBefore) {
        continue;
      }
      if (best === undefined || rate.date > best.date) {
        best = rate;
      }
    }
    return best;
  }

  insertRate(rate: FxRate): boolean {
    const key = rateKey(rate.fromCurrency, rate.toCurrency, rate.date);
    if (this._tables.rates.has(key)) {
      return false;
    }
    this._tables.rates.set(key, rate);
    return true;
  }
}
