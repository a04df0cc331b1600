/**
 * @coinpurse/ledger — Core Ledger class.
 *
 * Append-only multi-currency ledger. Once a transaction is written it is
 * permanent. Corrections are new REVERSAL transactions.
 *
 * API surface:
 * - createTransaction() — Record an expense or income with frozen rates
 * - reverseTransaction() — Cancel a transaction by appending its mirror
 * - getHistory() — Most recent transactions of an account
 * - getTransaction() — Single owned transaction
 * - getReport() — Category breakdown of a period in a display currency
 * - getRecentCurrencies() — Currencies the account used last
 *
 * Every mutation resolves its exchange rates first, then performs all of
 * its reads and writes inside one store unit of work.
 */

import { randomUUID } from "node:crypto";
import { FinanceError, isFlowKind } from "@coinpurse/types";
import type { Currency, Report, ReportPeriod, Transaction } from "@coinpurse/types";
import { normalizeCurrency } from "@coinpurse/fx";
import type { RateSource } from "@coinpurse/fx";
import type { FinanceStore } from "@coinpurse/store";
import {
  normalizeInstant,
  normalizeNote,
  requireAccount,
  requireCategory,
  requireOwnedTransaction,
} from "./access.js";
import { freezeAmount, toPositiveMinorUnits } from "./money-math.js";
import { periodBounds } from "./periods.js";
import { buildReport, referenceCurrencyFor } from "./report.js";
import type { CreateTransactionInput, FinanceCoreOptions } from "./types.js";
import { DEFAULT_HISTORY_LIMIT, DEFAULT_RECENT_CURRENCIES } from "./types.js";

const IDENTITY_RATE = "1.000000";

export function requirePositiveInteger(value: number, name: string): number {
  if (!Number.isInteger(value) || value < 1) {
    throw new FinanceError("VALIDATION_ERROR", `${name} must be a positive integer`);
  }
  return value;
}

/**
 * Append-only multi-currency ledger.
 */
export class Ledger {
  private readonly _store: FinanceStore;
  private readonly _rates: RateSource;
  private readonly _now: () => Date;
  private readonly _newId: () => string;

  constructor(options: FinanceCoreOptions) {
    this._store = options.store;
    this._rates = options.rates;
    this._now = options.now ?? (() => new Date());
    this._newId = options.newId ?? randomUUID;
  }

  // ─── Writes ──────────────────────────────────────────────────────────

  /**
   * Record an EXPENSE or INCOME.
   *
   * Rates are resolved as of the UTC date of `atTime` and frozen into
   * the record together with both reference amounts.
   */
  async createTransaction(input: CreateTransactionInput): Promise<Transaction> {
    if (!isFlowKind(input.kind)) {
      throw new FinanceError("VALIDATION_ERROR", `Invalid transaction kind: "${String(input.kind)}"`);
    }
    const amountMinor = toPositiveMinorUnits(input.amount);
    const currency = normalizeCurrency(input.currency);
    const atTime = normalizeInstant(input.atTime ?? this._now().toISOString());
    const note = normalizeNote(input.note);
    const categoryId = input.categoryId ?? null;

    // Fail before any rate lookup
    requireAccount(this._store, input.accountId);
    if (categoryId !== null) {
      requireCategory(this._store, categoryId, input.accountId, input.kind);
    }

    const rates = await this._rates.getRatesForTransaction(currency, atTime.slice(0, 10));

    return this._store.transaction((unit) => {
      requireAccount(unit, input.accountId);

      const transaction: Transaction = {
        id: this._newId(),
        accountId: input.accountId,
        kind: input.kind,
        ...freezeAmount(amountMinor, currency, rates),
        categoryId,
        note,
        atTime,
        createdAt: this._now().toISOString(),
        relatedDebtId: null,
        reversesTransactionId: null,
      };
      unit.insertTransaction(transaction);
      return transaction;
    });
  }

  /**
   * Cancel a transaction by appending a REVERSAL with the same frozen
   * amounts. A transaction can be reversed once; a reversal can't be
   * reversed.
   */
  reverseTransaction(transactionId: string, accountId: number): Transaction {
    return this._store.transaction((unit) => {
      const original = requireOwnedTransaction(unit, transactionId, accountId);

      if (original.kind === "REVERSAL") {
        throw new FinanceError("INVALID_OPERATION", "A reversal cannot be reversed");
      }
      if (unit.findReversalOf(original.id) !== undefined) {
        throw new FinanceError("INVALID_OPERATION", "Transaction has already been reversed");
      }

      const now = this._now().toISOString();
      const reversal: Transaction = {
        id: this._newId(),
        accountId,
        kind: "REVERSAL",
        amountMinor: original.amountMinor,
        currency: original.currency,
        amountEur: original.amountEur,
        amountUsd: original.amountUsd,
        fxRateToEur: original.fxRateToEur,
        fxRateToUsd: original.fxRateToUsd,
        categoryId: original.categoryId,
        note: `Reversal of transaction ${original.id}`,
        atTime: now,
        createdAt: now,
        relatedDebtId: null,
        reversesTransactionId: original.id,
      };
      unit.insertTransaction(reversal);
      return reversal;
    });
  }

  // ─── Reads ───────────────────────────────────────────────────────────

  getHistory(accountId: number, limit: number = DEFAULT_HISTORY_LIMIT): readonly Transaction[] {
    requirePositiveInteger(limit, "limit");
    return this._store.transaction((unit) => {
      requireAccount(unit, accountId);
      return unit.listTransactions(accountId, limit);
    });
  }

  getTransaction(transactionId: string, accountId: number): Transaction {
    return requireOwnedTransaction(this._store, transactionId, accountId);
  }

  getRecentCurrencies(
    accountId: number,
    limit: number = DEFAULT_RECENT_CURRENCIES,
  ): readonly Currency[] {
    requirePositiveInteger(limit, "limit");
    return this._store.listRecentCurrencies(accountId, limit);
  }

  /**
   * Expense and income breakdown of a period.
   *
   * Amounts are summed in the reference currency (USD for a USD report,
   * EUR otherwise) and converted once into the display currency at
   * today's rate.
   */
  async getReport(
    accountId: number,
    period: ReportPeriod,
    displayCurrency?: Currency,
  ): Promise<Report> {
    const bounds = periodBounds(period);
    const account = requireAccount(this._store, accountId);
    const display = normalizeCurrency(displayCurrency ?? account.preferredReportCurrency);
    const reference = referenceCurrencyFor(display);

    let conversionRate = IDENTITY_RATE;
    let conversionDate: string | null = null;
    if (display !== reference) {
      conversionDate = this._now().toISOString().slice(0, 10);
      conversionRate = await this._rates.getRate(reference, display, conversionDate);
    }

    return this._store.transaction((unit) =>
      buildReport({
        period,
        displayCurrency: display,
        referenceCurrency: reference,
        conversionRate,
        conversionDate,
        transactions: unit.listTransactionsBetween(accountId, bounds.fromTime, bounds.toTime),
        findTransaction: (id) => unit.getTransaction(id),
        findCategory: (id) => unit.getCategory(id),
      }),
    );
  }
}
