/**
 * @coinpurse/store — Core types.
 *
 * Defines the persistence interface shared by the ledger, the debt book
 * and the FX provider.
 *
 * Design principles:
 * - Transactions and FX rates are append-only (no UPDATE, no DELETE)
 * - The only in-place update of a debt is the settle flag, done by
 *   compare-and-set
 * - Every mutating core operation runs inside one synchronous unit of
 *   work; a unit never awaits, so in-flight requests cannot interleave
 *   inside it
 */

import type {
  Account,
  Category,
  Currency,
  Debt,
  FlowKind,
  FxRate,
  Transaction,
} from "@coinpurse/types";

// =============================================================================
// Inputs
// =============================================================================

export interface NewAccount {
  readonly externalId: string;
  readonly displayName: string | null;
  readonly defaultCurrency: Currency;
  readonly preferredReportCurrency: Currency;
  readonly createdAt: string;
}

export interface AccountPatch {
  readonly displayName?: string | null | undefined;
  readonly defaultCurrency?: Currency | undefined;
  readonly preferredReportCurrency?: Currency | undefined;
}

export interface NewCategory {
  readonly accountId: number;
  readonly name: string;
  readonly icon: string;
  readonly flowKind: FlowKind;
  readonly isDefault: boolean;
}

/** Fields of a category that may change; absent fields are kept. */
export interface CategoryPatch {
  readonly name?: string | undefined;
  readonly icon?: string | undefined;
  readonly isArchived?: boolean | undefined;
}

export interface CategoryFilter {
  readonly flowKind?: FlowKind | undefined;
  readonly includeArchived?: boolean | undefined;
}

// =============================================================================
// Unit of Work
// =============================================================================

/**
 * Reads and writes available inside a unit of work.
 *
 * Ordering contracts:
 * - listTransactions: newest first by atTime, then createdAt, then
 *   insertion order
 * - listTransactionsBetween: oldest first, both bounds inclusive
 * - listDebtsForAccount: newest first by createdAt, then insertion order
 * - listUnsettledDebtsBetween: oldest first
 */
export interface FinanceUnit {
  // ─── Accounts ───────────────────────────────────────────────────────
  getAccount(id: number): Account | undefined;
  findAccountByExternalId(externalId: string): Account | undefined;
  insertAccount(account: NewAccount): Account;
  /** Throws FinanceError NOT_FOUND for an unknown id */
  updateAccount(id: number, patch: AccountPatch): Account;

  // ─── Categories ─────────────────────────────────────────────────────
  insertCategory(category: NewCategory): Category;
  getCategory(id: number): Category | undefined;
  listCategories(accountId: number, filter?: CategoryFilter): readonly Category[];
  /** Throws FinanceError NOT_FOUND for an unknown id */
  updateCategory(id: number, patch: CategoryPatch): Category;

  // ─── Transactions ───────────────────────────────────────────────────
  /** Throws FinanceError CONFLICT when the transaction already has a reversal */
  insertTransaction(transaction: Transaction): void;
  getTransaction(id: string): Transaction | undefined;
  findReversalOf(transactionId: string): Transaction | undefined;
  listTransactions(accountId: number, limit: number): readonly Transaction[];
  listTransactionsBetween(
    accountId: number,
    fromTime: string,
    toTime: string,
  ): readonly Transaction[];
  /** Distinct currencies ordered by most recent createdAt */
  listRecentCurrencies(accountId: number, limit: number): readonly Currency[];

  // ─── Debts ──────────────────────────────────────────────────────────
  insertDebt(debt: Debt): void;
  getDebt(id: string): Debt | undefined;
  listDebtsForAccount(accountId: number, onlyUnsettled: boolean): readonly Debt[];
  listUnsettledDebtsBetween(accountA: number, accountB: number): readonly Debt[];
  /**
   * Flip isSettled from false to true.
   * Returns false (and writes nothing) if the debt is missing or already
   * settled.
   */
  markDebtSettled(id: string, settledAt: string): boolean;

  // ─── FX Rates ───────────────────────────────────────────────────────
  /** Most recent rate for the pair with date <= onOrBefore */
  findLatestRate(from: Currency, to: Currency, onOrBefore: string): FxRate | undefined;
  /** Insert unless the (from, to, date) key exists. Returns whether it was written. */
  insertRate(rate: FxRate): boolean;
}

/**
 * The durable store. Single source of truth and sole arbiter of
 * conflicting writes.
 *
 * Methods called directly on the store run as their own implicit unit.
 */
export interface FinanceStore extends FinanceUnit {
  /**
   * Run `work` atomically. If it throws, none of its writes persist and
   * the error propagates unchanged.
   */
  transaction<T>(work: (unit: FinanceUnit) => T): T;

  close(): void;
}
