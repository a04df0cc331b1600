/**
 * @coinpurse/store — SQLite FinanceStore implementation.
 *
 * Durable store backed by better-sqlite3.
 *
 * Properties:
 * - Units of work map onto BEGIN IMMEDIATE transactions, so the write
 *   lock is taken up front and concurrent processes serialise
 * - WAL journal for concurrent readers
 * - Debt settlement is a compare-and-set UPDATE (… WHERE is_settled = 0)
 * - A transaction can be reversed once: reverses_transaction_id is UNIQUE
 * - FX rates are INSERT OR IGNORE on their natural key (first writer wins)
 *
 * Pass ":memory:" as the path for an in-process database.
 */

import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import Database from "better-sqlite3";
import { FinanceError } from "@coinpurse/types";
import type {
  Account,
  Category,
  Currency,
  Debt,
  FlowKind,
  FxRate,
  Transaction,
  TransactionKind,
} from "@coinpurse/types";
import { SCHEMA_SQL } from "./schema.js";
import type {
  AccountPatch,
  CategoryFilter,
  CategoryPatch,
  FinanceStore,
  FinanceUnit,
  NewAccount,
  NewCategory,
} from "./types.js";

/**
 * Options for creating a SqliteFinanceStore.
 */
export interface SqliteFinanceStoreOptions {
  /** Path to the database file, or ":memory:" */
  readonly filePath: string;
}

// =============================================================================
// Row shapes
// =============================================================================

interface AccountRow {
  id: number;
  external_id: string;
  display_name: string | null;
  default_currency: string;
  preferred_report_currency: string;
  created_at: string;
}

interface CategoryRow {
  id: number;
  account_id: number;
  name: string;
  icon: string;
  flow_kind: FlowKind;
  is_default: number;
  is_archived: number;
}

interface TransactionRow {
  id: string;
  account_id: number;
  kind: TransactionKind;
  amount_minor: number;
  currency: string;
  amount_eur: string;
  amount_usd: string;
  fx_rate_to_eur: string;
  fx_rate_to_usd: string;
  category_id: number | null;
  note: string | null;
  at_time: string;
  created_at: string;
  related_debt_id: string | null;
  reverses_transaction_id: string | null;
}

interface DebtRow {
  id: string;
  creditor_id: number;
  debtor_id: number;
  amount_minor: number;
  currency: string;
  amount_eur: string;
  amount_usd: string;
  fx_rate_to_eur: string;
  fx_rate_to_usd: string;
  category_id: number | null;
  note: string | null;
  related_transaction_id: string | null;
  is_settled: number;
  settled_at: string | null;
  created_at: string;
}

interface FxRateRow {
  from_currency: string;
  to_currency: string;
  date: string;
  rate: string;
  fetched_at: string;
}

// =============================================================================
// Row mapping
// =============================================================================

function toAccount(row: AccountRow): Account {
  return {
    id: row.id,
    externalId: row.external_id,
    displayName: row.display_name,
    defaultCurrency: row.default_currency,
    preferredReportCurrency: row.preferred_report_currency,
    createdAt: row.created_at,
  };
}

function toCategory(row: CategoryRow): Category {
  return {
    id: row.id,
    accountId: row.account_id,
    name: row.name,
    icon: row.icon,
    flowKind: row.flow_kind,
    isDefault: row.is_default === 1,
    isArchived: row.is_archived === 1,
  };
}

function toTransaction(row: TransactionRow): Transaction {
  return {
    id: row.id,
    accountId: row.account_id,
    kind: row.kind,
    amountMinor: row.amount_minor,
    currency: row.currency,
    amountEur: row.amount_eur,
    amountUsd: row.amount_usd,
    fxRateToEur: row.fx_rate_to_eur,
    fxRateToUsd: row.fx_rate_to_usd,
    categoryId: row.category_id,
    note: row.note,
    atTime: row.at_time,
    createdAt: row.created_at,
    relatedDebtId: row.related_debt_id,
    reversesTransactionId: row.reverses_transaction_id,
  };
}

function fromTransaction(tx: Transaction): TransactionRow {
  return {
    id: tx.id,
    account_id: tx.accountId,
    kind: tx.kind,
    amount_minor: tx.amountMinor,
    currency: tx.currency,
    amount_eur: tx.amountEur,
    amount_usd: tx.amountUsd,
    fx_rate_to_eur: tx.fxRateToEur,
    fx_rate_to_usd: tx.fxRateToUsd,
    category_id: tx.categoryId,
    note: tx.note,
    at_time: tx.atTime,
    created_at: tx.createdAt,
    related_debt_id: tx.relatedDebtId,
    reverses_transaction_id: tx.reversesTransactionId,
  };
}

function toDebt(row: DebtRow): Debt {
  return {
    id: row.id,
    creditorId: row.creditor_id,
    debtorId: row.debtor_id,
    amountMinor: row.amount_minor,
    currency: row.currency,
    amountEur: row.amount_eur,
    amountUsd: row.amount_usd,
    fxRateToEur: row.fx_rate_to_eur,
    fxRateToUsd: row.fx_rate_to_usd,
    categoryId: row.category_id,
    note: row.note,
    relatedTransactionId: row.related_transaction_id,
    isSettled: row.is_settled === 1,
    settledAt: row.settled_at,
    createdAt: row.created_at,
  };
}

function fromDebt(debt: Debt): DebtRow {
  return {
    id: debt.id,
    creditor_id: debt.creditorId,
    debtor_id: debt.debtorId,
    amount_minor: debt.amountMinor,
    currency: debt.currency,
    amount_eur: debt.amountEur,
    amount_usd: debt.amountUsd,
    fx_rate_to_eur: debt.fxRateToEur,
    fx_rate_to_usd: debt.fxRateToUsd,
    category_id: debt.categoryId,
    note: debt.note,
    related_transaction_id: debt.relatedTransactionId,
    is_settled: debt.isSettled ? 1 : 0,
    settled_at: debt.settledAt,
    created_at: debt.createdAt,
  };
}

function toFxRate(row: FxRateRow): FxRate {
  return {
    fromCurrency: row.from_currency,
    toCurrency: row.to_currency,
    date: row.date,
    rate: row.rate,
    fetchedAt: row.fetched_at,
  };
}

/**
 * Translate constraint violations into the store contract's errors.
 */
function translateConstraint(err: unknown, context: string): unknown {
  if (err instanceof Database.SqliteError) {
    if (err.code === "SQLITE_CONSTRAINT_UNIQUE" || err.code === "SQLITE_CONSTRAINT_PRIMARYKEY") {
      return new FinanceError("CONFLICT", `${context}: ${err.message}`);
    }
    if (err.code === "SQLITE_CONSTRAINT_FOREIGNKEY") {
      return new FinanceError("NOT_FOUND", `${context}: referenced record does not exist`);
    }
    if (err.code === "SQLITE_CONSTRAINT_CHECK") {
      return new FinanceError("VALIDATION_ERROR", `${context}: ${err.message}`);
    }
  }
  return err;
}

// =============================================================================
// Store
// =============================================================================

const TRANSACTION_COLUMNS =
  "id, account_id, kind, amount_minor, currency, amount_eur, amount_usd, " +
  "fx_rate_to_eur, fx_rate_to_usd, category_id, note, at_time, created_at, " +
  "related_debt_id, reverses_transaction_id";

const DEBT_COLUMNS =
  "id, creditor_id, debtor_id, amount_minor, currency, amount_eur, amount_usd, " +
  "fx_rate_to_eur, fx_rate_to_usd, category_id, note, related_transaction_id, " +
  "is_settled, settled_at, created_at";

/**
 * SQLite-backed finance store.
 *
 * The schema is created on construction. The parent directory of a file
 * database is created if it doesn't exist.
 */
export class SqliteFinanceStore implements FinanceStore {
  private readonly _db: Database.Database;

  constructor(options: SqliteFinanceStoreOptions) {
    if (options.filePath !== ":memory:") {
      mkdirSync(dirname(options.filePath), { recursive: true });
    }

    this._db = new Database(options.filePath);
    this._db.pragma("journal_mode = WAL");
    this._db.pragma("foreign_keys = ON");
    this._db.exec(SCHEMA_SQL);
  }

  // ─── Unit of Work ───────────────────────────────────────────────────

  transaction<T>(work: (unit: FinanceUnit) => T): T {
    const run = this._db.transaction(() => work(this));
    return run.immediate();
  }

  close(): void {
    if (this._db.open) {
      this._db.close();
    }
  }

  // ─── Accounts ───────────────────────────────────────────────────────

  getAccount(id: number): Account | undefined {
    const row = this._db
      .prepare<[number], AccountRow>("SELECT * FROM accounts WHERE id = ?")
      .get(id);
    return row === undefined ? undefined : toAccount(row);
  }

  findAccountByExternalId(externalId: string): Account | undefined {
    const row = this._db
      .prepare<[string], AccountRow>("SELECT * FROM accounts WHERE external_id = ?")
      .get(externalId);
    return row === undefined ? undefined : toAccount(row);
  }

  insertAccount(account: NewAccount): Account {
    try {
      const result = this._db
        .prepare<[string, string | null, string, string, string]>(
          `INSERT INTO accounts
             (external_id, display_name, default_currency, preferred_report_currency, created_at)
           VALUES (?, ?, ?, ?, ?)`,
        )
        .run(
          account.externalId,
          account.displayName,
          account.defaultCurrency,
          account.preferredReportCurrency,
          account.createdAt,
        );
      return { id: Number(result.lastInsertRowid), ...account };
    } catch (err: unknown) {
      throw translateConstraint(err, `Account "${account.externalId}"`);
    }
  }

  updateAccount(id: number, patch: AccountPatch): Account {
    const current = this.getAccount(id);
    if (current === undefined) {
      throw new FinanceError("NOT_FOUND", `Account ${id} not found`);
    }
    const updated: Account = {
      ...current,
      displayName: patch.displayName !== undefined ? patch.displayName : current.displayName,
      defaultCurrency: patch.defaultCurrency ?? current.defaultCurrency,
      preferredReportCurrency: patch.preferredReportCurrency ?? current.preferredReportCurrency,
    };
    this._db
      .prepare<[string | null, string, string, number]>(
        `UPDATE accounts
            SET display_name = ?, default_currency = ?, preferred_report_currency = ?
          WHERE id = ?`,
      )
      .run(updated.displayName, updated.defaultCurrency, updated.preferredReportCurrency, id);
    return updated;
  }

  // ─── Categories ─────────────────────────────────────────────────────

  insertCategory(category: NewCategory): Category {
    try {
      const result = this._db
        .prepare<[number, string, string, string, number]>(
          `INSERT INTO categories (account_id, name, icon, flow_kind, is_default)
           VALUES (?, ?, ?, ?, ?)`,
        )
        .run(
          category.accountId,
          category.name,
          category.icon,
          category.flowKind,
          category.isDefault ? 1 : 0,
        );
      return { id: Number(result.lastInsertRowid), ...category, isArchived: false };
    } catch (err: unknown) {
      throw translateConstraint(err, `Category "${category.name}"`);
    }
  }

  getCategory(id: number): Category | undefined {
    const row = this._db
      .prepare<[number], CategoryRow>("SELECT * FROM categories WHERE id = ?")
      .get(id);
    return row === undefined ? undefined : toCategory(row);
  }

  listCategories(accountId: number, filter?: CategoryFilter): readonly Category[] {
    const includeArchived = filter?.includeArchived ?? false;
    const flowKind = filter?.flowKind ?? null;
    const rows = this._db
      .prepare<[number, string | null, string | null, number], CategoryRow>(
        `SELECT * FROM categories
          WHERE account_id = ?
            AND (? IS NULL OR flow_kind = ?)
            AND (? = 1 OR is_archived = 0)
          ORDER BY is_default DESC, name`,
      )
      .all(accountId, flowKind, flowKind, includeArchived ? 1 : 0);
    return rows.map(toCategory);
  }

  updateCategory(id: number, patch: CategoryPatch): Category {
    const current = this.getCategory(id);
    if (current === undefined) {
      throw new FinanceError("NOT_FOUND", `Category ${id} not found`);
    }
    const updated: Category = {
      ...current,
      name: patch.name ?? current.name,
      icon: patch.icon ?? current.icon,
      isArchived: patch.isArchived ?? current.isArchived,
    };
    this._db
      .prepare<[string, string, number, number]>(
        "UPDATE categories SET name = ?, icon = ?, is_archived = ? WHERE id = ?",
      )
      .run(updated.name, updated.icon, updated.isArchived ? 1 : 0, id);
    return updated;
  }

  // ─── Transactions ───────────────────────────────────────────────────

  insertTransaction(transaction: Transaction): void {
    try {
      this._db
        .prepare<TransactionRow>(
          `INSERT INTO transactions (${TRANSACTION_COLUMNS})
           VALUES (@id, @account_id, @kind, @amount_minor, @currency, @amount_eur, @amount_usd,
                   @fx_rate_to_eur, @fx_rate_to_usd, @category_id, @note, @at_time, @created_at,
                   @related_debt_id, @reverses_transaction_id)`,
        )
        .run(fromTransaction(transaction));
    } catch (err: unknown) {
      throw translateConstraint(err, `Transaction ${transaction.id}`);
    }
  }

  getTransaction(id: string): Transaction | undefined {
    const row = this._db
      .prepare<[string], TransactionRow>(`SELECT ${TRANSACTION_COLUMNS} FROM transactions WHERE id = ?`)
      .get(id);
    return row === undefined ? undefined : toTransaction(row);
  }

  findReversalOf(transactionId: string): Transaction | undefined {
    const row = this._db
      .prepare<[string], TransactionRow>(
        `SELECT ${TRANSACTION_COLUMNS} FROM transactions WHERE reverses_transaction_id = ?`,
      )
      .get(transactionId);
    return row === undefined ? undefined : toTransaction(row);
  }

  listTransactions(accountId: number, limit: number): readonly Transaction[] {
    const rows = this._db
      .prepare<[number, number], TransactionRow>(
        `SELECT ${TRANSACTION_COLUMNS} FROM transactions
          WHERE account_id = ?
          ORDER BY at_time DESC, created_at DESC, rowid DESC
          LIMIT ?`,
      )
      .all(accountId, limit);
    return rows.map(toTransaction);
  }

  listTransactionsBetween(
    accountId: number,
    fromTime: string,
    toTime: string,
  ): readonly Transaction[] {
    const rows = this._db
      .prepare<[number, string, string], TransactionRow>(
        `SELECT ${TRANSACTION_COLUMNS} FROM transactions
          WHERE account_id = ? AND at_time >= ? AND at_time <= ?
          ORDER BY at_time, created_at, rowid`,
      )
      .all(accountId, fromTime, toTime);
    return rows.map(toTransaction);
  }

  listRecentCurrencies(accountId: number, limit: number): readonly Currency[] {
    const rows = this._db
      .prepare<[number, number], { currency: string }>(
        `SELECT currency FROM transactions
          WHERE account_id = ?
          GROUP BY currency
          ORDER BY MAX(created_at) DESC
          LIMIT ?`,
      )
      .all(accountId, limit);
    return rows.map((r) => r.currency);
  }

  // ─── Debts ──────────────────────────────────────────────────────────

  insertDebt(debt: Debt): void {
    try {
      this._db
        .prepare<DebtRow>(
          `INSERT INTO debts (${DEBT_COLUMNS})
           VALUES (@id, @creditor_id, @debtor_id, @amount_minor, @currency, @amount_eur,
                   @amount_usd, @fx_rate_to_eur, @fx_rate_to_usd, @category_id, @note,
                   @related_transaction_id, @is_settled, @settled_at, @created_at)`,
        )
        .run(fromDebt(debt));
    } catch (err: unknown) {
      throw translateConstraint(err, `Debt ${debt.id}`);
    }
  }

  getDebt(id: string): Debt | undefined {
    const row = this._db
      .prepare<[string], DebtRow>(`SELECT ${DEBT_COLUMNS} FROM debts WHERE id = ?`)
      .get(id);
    return row === undefined ? undefined : toDebt(row);
  }

  listDebtsForAccount(accountId: number, onlyUnsettled: boolean): readonly Debt[] {
    const rows = this._db
      .prepare<[number, number, number], DebtRow>(
        `SELECT ${DEBT_COLUMNS} FROM debts
          WHERE (creditor_id = ? OR debtor_id = ?)
            AND (? = 0 OR is_settled = 0)
          ORDER BY created_at DESC, rowid DESC`,
      )
      .all(accountId, accountId, onlyUnsettled ? 1 : 0);
    return rows.map(toDebt);
  }

  listUnsettledDebtsBetween(accountA: number, accountB: number): readonly Debt[] {
    const rows = this._db
      .prepare<[number, number, number, number], DebtRow>(
        `SELECT ${DEBT_COLUMNS} FROM debts
          WHERE is_settled = 0
            AND ((creditor_id = ? AND debtor_id = ?) OR (creditor_id = ? AND debtor_id = ?))
          ORDER BY rowid`,
      )
      .all(accountA, accountB, accountB, accountA);
    return rows.map(toDebt);
  }

  markDebtSettled(id: string, settledAt: string): boolean {
    const result = this._db
      .prepare<[string, string]>(
        "UPDATE debts SET is_settled = 1, settled_at = ? WHERE id = ? AND is_settled = 0",
      )
      .run(settledAt, id);
    return result.changes === 1;
  }

  // ─── FX Rates ───────────────────────────────────────────────────────

  findLatestRate(from: Currency, to: Currency, onOrBefore: string): FxRate | undefined {
    const row = this._db
      .prepare<[string, string, string], FxRateRow>(
        `SELECT * FROM fx_rates
          WHERE from_currency = ? AND to_currency = ? AND date <= ?
          ORDER BY date DESC
          LIMIT 1`,
      )
      .get(from, to, onOrBefore);
    return row === undefined ? undefined : toFxRate(row);
  }

  insertRate(rate: FxRate): boolean {
    const result = this._db
      .prepare<[string, string, string, string, string]>(
        `INSERT OR IGNORE INTO fx_rates (from_currency, to_currency, date, rate, fetched_at)
         VALUES (?, ?, ?, ?, ?)`,
      )
      .run(rate.fromCurrency, rate.toCurrency, rate.date, rate.rate, rate.fetchedAt);
    return result.changes === 1;
  }
}
