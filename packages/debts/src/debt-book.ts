/**
 * @coinpurse/debts — Peer-to-peer debt book.
 *
 * API surface:
 * - createDebt() — Record an obligation with frozen rates
 * - getDebtsForAccount() / getDebt() — Party-only reads
 * - settleDebt() — Compare-and-set settle plus a SETTLEMENT entry
 * - getDebtSummary() — Unsettled totals per counterparty and currency
 * - calculateNetDebts() — Bilateral position in EUR or USD (read-only)
 * - cancelMutualDebts() — Settle both directions, keep one residual debt
 * - splitBill() — Full-amount expense plus a debt for the other share
 *
 * A settled debt is terminal. Every mutation runs in one store unit of
 * work after its rates have been resolved.
 */

import { randomUUID } from "node:crypto";
import { FinanceError, MINOR_DECIMALS, REFERENCE_DECIMALS } from "@coinpurse/types";
import type {
  Account,
  CancelMutualDebtsResult,
  CounterpartyTotals,
  Currency,
  Debt,
  DebtSummary,
  NetCalculation,
  ReferenceCurrency,
  Transaction,
} from "@coinpurse/types";
import { normalizeCurrency } from "@coinpurse/fx";
import type { RateSource } from "@coinpurse/fx";
import type { FinanceStore, FinanceUnit } from "@coinpurse/store";
import {
  formatMinor,
  freezeAmount,
  normalizeInstant,
  normalizeNote,
  parseAmount,
  requireAccount,
  requireCategory,
  rescale,
  toMinorUnits,
  toPositiveMinorUnits,
} from "@coinpurse/ledger";
import type { FinanceCoreOptions } from "@coinpurse/ledger";
import { computeNet, requireBaseCurrency } from "./net.js";
import type {
  CreateDebtInput,
  SettleDebtResult,
  SplitBillInput,
  SplitBillResult,
} from "./types.js";
import { NET_TOLERANCE } from "./types.js";

// ─── Helpers ─────────────────────────────────────────────────────────────

function requireDebtParty(unit: FinanceUnit, debtId: string, accountId: number): Debt {
  const debt = unit.getDebt(debtId);
  if (debt === undefined) {
    throw new FinanceError("NOT_FOUND", `Debt ${debtId} not found`);
  }
  if (debt.creditorId !== accountId && debt.debtorId !== accountId) {
    throw new FinanceError("ACCESS_DENIED", `Debt ${debtId} is not a debt of account ${accountId}`);
  }
  return debt;
}

function requireDistinct(a: number, b: number): void {
  if (a === b) {
    throw new FinanceError("INVALID_OPERATION", "A debt needs two different parties");
  }
}

/** Display name of a counterparty in summaries. */
export function counterpartyName(account: Account): string {
  return account.displayName ?? `User ${account.externalId}`;
}

function addTo(
  totals: Map<string, Map<Currency, bigint>>,
  name: string,
  currency: Currency,
  amountMinor: number,
): void {
  let byCurrency = totals.get(name);
  if (byCurrency === undefined) {
    byCurrency = new Map();
    totals.set(name, byCurrency);
  }
  byCurrency.set(currency, (byCurrency.get(currency) ?? 0n) + BigInt(amountMinor));
}

function toCounterpartyTotals(totals: Map<string, Map<Currency, bigint>>): CounterpartyTotals {
  const result: Record<string, Record<Currency, string>> = {};
  for (const [name, byCurrency] of totals) {
    const amounts: Record<Currency, string> = {};
    for (const [currency, minor] of byCurrency) {
      amounts[currency] = formatMinor(minor);
    }
    result[name] = amounts;
  }
  return result;
}

// ─── Debt Book ───────────────────────────────────────────────────────────

export class DebtBook {
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

  async createDebt(input: CreateDebtInput): Promise<Debt> {
    requireDistinct(input.creditorId, input.debtorId);
    const amountMinor = toPositiveMinorUnits(input.amount);
    const currency = normalizeCurrency(input.currency);
    const note = normalizeNote(input.note);

    requireAccount(this._store, input.creditorId);
    requireAccount(this._store, input.debtorId);

    const rates = await this._rates.getRatesForTransaction(currency, this.today());

    return this._store.transaction((unit) => {
      requireAccount(unit, input.creditorId);
      requireAccount(unit, input.debtorId);

      const debt: Debt = {
        id: this._newId(),
        creditorId: input.creditorId,
        debtorId: input.debtorId,
        ...freezeAmount(amountMinor, currency, rates),
        categoryId: input.categoryId ?? null,
        note,
        relatedTransactionId: input.relatedTransactionId ?? null,
        isSettled: false,
        settledAt: null,
        createdAt: this._now().toISOString(),
      };
      unit.insertDebt(debt);
      return debt;
    });
  }

  /**
   * Settle a debt on behalf of either party.
   *
   * Of two concurrent settles exactly one succeeds; the other fails with
   * ALREADY_SETTLED and writes nothing.
   */
  settleDebt(debtId: string, actingAccountId: number): SettleDebtResult {
    return this._store.transaction((unit) => {
      const debt = requireDebtParty(unit, debtId, actingAccountId);
      if (debt.isSettled) {
        throw new FinanceError("ALREADY_SETTLED", `Debt ${debtId} is already settled`);
      }

      const now = this._now().toISOString();
      if (!unit.markDebtSettled(debt.id, now)) {
        throw new FinanceError("ALREADY_SETTLED", `Debt ${debtId} is already settled`);
      }

      const settlement: Transaction = {
        id: this._newId(),
        accountId: actingAccountId,
        kind: "SETTLEMENT",
        amountMinor: debt.amountMinor,
        currency: debt.currency,
        amountEur: debt.amountEur,
        amountUsd: debt.amountUsd,
        fxRateToEur: debt.fxRateToEur,
        fxRateToUsd: debt.fxRateToUsd,
        categoryId: debt.categoryId,
        note: `Settlement of debt ${debt.id}`,
        atTime: now,
        createdAt: now,
        relatedDebtId: debt.id,
        reversesTransactionId: null,
      };
      unit.insertTransaction(settlement);

      return { debt: { ...debt, isSettled: true, settledAt: now }, settlement };
    });
  }

  /**
   * Cancel every unsettled debt between two accounts and replace them by
   * a single debt for the net amount in the base currency.
   *
   * The net is recomputed inside the unit of work, so debts added or
   * settled meanwhile are accounted for. No residual debt is written when
   * |net| ≤ 0.01, and then no rate is looked up either.
   */
  async cancelMutualDebts(
    accountA: number,
    accountB: number,
    baseCurrency: string,
  ): Promise<CancelMutualDebtsResult> {
    requireDistinct(accountA, accountB);
    const base = requireBaseCurrency(baseCurrency);
    requireAccount(this._store, accountA);
    requireAccount(this._store, accountB);

    const preview = computeNet(
      accountA,
      accountB,
      base,
      this._store.listUnsettledDebtsBetween(accountA, accountB),
    );
    const rates =
      netMagnitude(preview) > NET_TOLERANCE
        ? await this._rates.getRatesForTransaction(base, this.today())
        : undefined;

    return this._store.transaction((unit) => {
      requireAccount(unit, accountA);
      requireAccount(unit, accountB);

      const calculation = computeNet(
        accountA,
        accountB,
        base,
        unit.listUnsettledDebtsBetween(accountA, accountB),
      );
      if (calculation.debts.length === 0) {
        throw new FinanceError("INVALID_OPERATION", "There are no unsettled debts to cancel");
      }

      const now = this._now().toISOString();
      for (const debt of calculation.debts) {
        if (!unit.markDebtSettled(debt.id, now)) {
          throw new FinanceError("CONFLICT", `Debt ${debt.id} was settled concurrently`);
        }
      }

      const net = parseAmount(calculation.netAmount, REFERENCE_DECIMALS);
      const magnitude = netMagnitude(calculation);
      const cancelledDebtIds = calculation.debts.map((d) => d.id);

      if (magnitude <= NET_TOLERANCE) {
        return { cancelledDebtIds, calculation };
      }
      if (rates === undefined) {
        throw new FinanceError(
          "CONFLICT",
          "Debts between the accounts changed during cancellation",
        );
      }

      const netDebt: Debt = {
        id: this._newId(),
        // Positive net: A owes B
        creditorId: net > 0n ? accountB : accountA,
        debtorId: net > 0n ? accountA : accountB,
        ...freezeAmount(Number(rescale(magnitude, REFERENCE_DECIMALS, MINOR_DECIMALS)), base, rates),
        categoryId: null,
        note: `Net of ${calculation.debts.length} mutual debts`,
        relatedTransactionId: null,
        isSettled: false,
        settledAt: null,
        createdAt: now,
      };
      unit.insertDebt(netDebt);

      return { cancelledDebtIds, netDebt, calculation };
    });
  }

  /**
   * Record a bill paid in full by `payerId`: an EXPENSE for the total on
   * the payer and a debt of `otherId` for their share. Both records use
   * the same rates.
   */
  async splitBill(input: SplitBillInput): Promise<SplitBillResult> {
    if (input.payerId === input.otherId) {
      throw new FinanceError("INVALID_OPERATION", "Cannot split a bill with yourself");
    }
    const totalMinor = toPositiveMinorUnits(input.total);
    const shareMinor =
      input.otherShare === "half" ? Math.round(totalMinor / 2) : toMinorUnits(input.otherShare);
    if (shareMinor <= 0 || shareMinor >= totalMinor) {
      throw new FinanceError(
        "VALIDATION_ERROR",
        "The other share must be greater than zero and less than the total",
      );
    }
    const currency = normalizeCurrency(input.currency);
    const atTime = normalizeInstant(input.atTime ?? this._now().toISOString());
    const userNote = normalizeNote(input.note);
    const note = userNote === null ? null : `Split bill: ${userNote}`;
    const categoryId = input.categoryId ?? null;

    requireAccount(this._store, input.payerId);
    requireAccount(this._store, input.otherId);
    if (categoryId !== null) {
      requireCategory(this._store, categoryId, input.payerId, "EXPENSE");
    }

    const rates = await this._rates.getRatesForTransaction(currency, atTime.slice(0, 10));

    return this._store.transaction((unit) => {
      requireAccount(unit, input.payerId);
      requireAccount(unit, input.otherId);

      const createdAt = this._now().toISOString();
      const transaction: Transaction = {
        id: this._newId(),
        accountId: input.payerId,
        kind: "EXPENSE",
        ...freezeAmount(totalMinor, currency, rates),
        categoryId,
        note,
        atTime,
        createdAt,
        relatedDebtId: null,
        reversesTransactionId: null,
      };
      unit.insertTransaction(transaction);

      const debt: Debt = {
        id: this._newId(),
        creditorId: input.payerId,
        debtorId: input.otherId,
        ...freezeAmount(shareMinor, currency, rates),
        categoryId,
        note,
        relatedTransactionId: transaction.id,
        isSettled: false,
        settledAt: null,
        createdAt,
      };
      unit.insertDebt(debt);

      return { transaction, debt };
    });
  }

  // ─── Reads ───────────────────────────────────────────────────────────

  getDebtsForAccount(accountId: number, onlyUnsettled: boolean = true): readonly Debt[] {
    return this._store.transaction((unit) => {
      requireAccount(unit, accountId);
      return unit.listDebtsForAccount(accountId, onlyUnsettled);
    });
  }

  getDebt(debtId: string, accountId: number): Debt {
    return requireDebtParty(this._store, debtId, accountId);
  }

  /**
   * Unsettled totals per counterparty, each in the debts' own currencies.
   */
  getDebtSummary(accountId: number, displayCurrency?: Currency): DebtSummary {
    return this._store.transaction((unit) => {
      const account = requireAccount(unit, accountId);
      const owedToMe = new Map<string, Map<Currency, bigint>>();
      const iOwe = new Map<string, Map<Currency, bigint>>();

      for (const debt of unit.listDebtsForAccount(accountId, true)) {
        const iAmCreditor = debt.creditorId === accountId;
        const counterpartyId = iAmCreditor ? debt.debtorId : debt.creditorId;
        const counterparty = unit.getAccount(counterpartyId);
        const name = counterparty === undefined ? `Account ${counterpartyId}` : counterpartyName(counterparty);
        addTo(iAmCreditor ? owedToMe : iOwe, name, debt.currency, debt.amountMinor);
      }

      return {
        displayCurrency: normalizeCurrency(displayCurrency ?? account.preferredReportCurrency),
        owedToMe: toCounterpartyTotals(owedToMe),
        iOwe: toCounterpartyTotals(iOwe),
      };
    });
  }

  /**
   * Net position between two accounts over their unsettled debts, in
   * EUR or USD. Read-only.
   */
  calculateNetDebts(accountA: number, accountB: number, baseCurrency: string): NetCalculation {
    requireDistinct(accountA, accountB);
    const base: ReferenceCurrency = requireBaseCurrency(baseCurrency);
    return this._store.transaction((unit) => {
      requireAccount(unit, accountA);
      requireAccount(unit, accountB);
      return computeNet(accountA, accountB, base, unit.listUnsettledDebtsBetween(accountA, accountB));
    });
  }

  private today(): string {
    return this._now().toISOString().slice(0, 10);
  }
}

function netMagnitude(calculation: NetCalculation): bigint {
  const net = parseAmount(calculation.netAmount, REFERENCE_DECIMALS);
  return net < 0n ? -net : net;
}
