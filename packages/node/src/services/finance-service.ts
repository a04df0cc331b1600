/**
 * FinanceService — Composition root for all domain packages.
 *
 * Route handlers delegate to this service; they never import domain
 * packages directly. One instance serves every account; isolation is by
 * account id inside the core.
 */

import { randomUUID } from "node:crypto";
import { FinanceError, isIsoDate } from "@coinpurse/types";
import type {
  Account,
  CancelMutualDebtsResult,
  Category,
  Currency,
  Debt,
  DebtSummary,
  FlowKind,
  NetCalculation,
  Report,
  ReportPeriod,
  Transaction,
} from "@coinpurse/types";
import { SqliteFinanceStore } from "@coinpurse/store";
import type { FinanceStore } from "@coinpurse/store";
import {
  ExchangeRateApiClient,
  FxRateProvider,
  InMemoryRateCache,
} from "@coinpurse/fx";
import type { FxEvent, RateSource } from "@coinpurse/fx";
import { Ledger, dateRangePeriod, monthlyPeriod } from "@coinpurse/ledger";
import { DebtBook, counterpartyName } from "@coinpurse/debts";
import type { SettleDebtResult, SplitBillResult } from "@coinpurse/debts";
import {
  DEFAULT_FLOW_TTL_MS,
  parseDateRange,
  startExpense,
  startIncome,
  startSplit,
  stepFlow,
} from "@coinpurse/flows";
import type { FlowCommand, FlowState } from "@coinpurse/flows";
import type { AppConfig } from "../config.js";
import { CategoryStore } from "./category-store.js";
import type { CategoryChanges, DefaultCategory, NewCategoryInput } from "./category-store.js";
import { FlowSessions } from "./flow-sessions.js";
import { UserDirectory } from "./user-directory.js";

// =============================================================================
// Configuration
// =============================================================================

/** Something opened with the service and closed before the store. */
export interface ServiceResource {
  open(): void;
  close(): void;
}

export interface FinanceServiceDeps {
  readonly store: FinanceStore;
  readonly rates: RateSource;
  readonly defaultCurrency: Currency;
  /** Currencies offered as suggestions, in order */
  readonly supportedCurrencies: readonly Currency[];
  readonly flowTtlMs?: number | undefined;
  readonly defaultCategories?: readonly DefaultCategory[] | undefined;
  readonly now?: (() => Date) | undefined;
  readonly newId?: (() => string) | undefined;
  readonly onAccountCreated?: ((account: Account) => void) | undefined;
  readonly resources?: readonly ServiceResource[] | undefined;
}

export interface FinanceServiceHooks {
  readonly onFxEvent?: ((event: FxEvent) => void) | undefined;
  readonly onAccountCreated?: ((account: Account) => void) | undefined;
  /** Custom fetch for the rate API */
  readonly fetchFn?: typeof fetch | undefined;
}

// =============================================================================
// Inputs and Results
// =============================================================================

export interface PreferencesInput {
  readonly defaultCurrency?: Currency | undefined;
  readonly preferredReportCurrency?: Currency | undefined;
}

export interface NewTransactionInput {
  readonly kind: FlowKind;
  readonly amount: string | number;
  readonly currency: Currency;
  readonly categoryId?: number | null | undefined;
  readonly note?: string | null | undefined;
  readonly atTime?: string | undefined;
}

export interface NewDebtInput {
  readonly counterparty: string;
  readonly direction: "owed_to_me" | "i_owe";
  readonly amount: string | number;
  readonly currency: Currency;
  readonly categoryId?: number | null | undefined;
  readonly note?: string | null | undefined;
}

export interface NewSplitInput {
  readonly counterparty: string;
  readonly total: string | number;
  readonly otherShare: "half" | string | number;
  readonly currency: Currency;
  readonly categoryId?: number | null | undefined;
  readonly note?: string | null | undefined;
  readonly atTime?: string | undefined;
}

export interface CurrencySuggestions {
  /** Most recently used first */
  readonly recent: readonly Currency[];
  readonly supported: readonly Currency[];
}

export interface NetPosition {
  readonly counterparty: Account;
  readonly calculation: NetCalculation;
}

export type FlowKindName = "expense" | "income" | "split";

export type FlowInputResult =
  | { readonly status: "advance"; readonly state: FlowState }
  | { readonly status: "error"; readonly state: FlowState; readonly message: string }
  | { readonly status: "complete"; readonly kind: "transaction"; readonly transaction: Transaction }
  | { readonly status: "complete"; readonly kind: "split"; readonly split: SplitBillResult };

// =============================================================================
// Service
// =============================================================================

export class FinanceService {
  readonly ledger: Ledger;
  readonly debts: DebtBook;
  readonly users: UserDirectory;
  readonly categories: CategoryStore;

  private readonly _store: FinanceStore;
  private readonly _supported: readonly Currency[];
  private readonly _flows: FlowSessions;
  private readonly _resources: readonly ServiceResource[];
  private readonly _now: () => Date;
  private _state: "idle" | "open" | "closed" = "idle";

  constructor(deps: FinanceServiceDeps) {
    this._store = deps.store;
    this._supported = deps.supportedCurrencies;
    this._resources = deps.resources ?? [];
    this._now = deps.now ?? (() => new Date());
    this._flows = new FlowSessions(deps.flowTtlMs ?? DEFAULT_FLOW_TTL_MS);

    const core = {
      store: deps.store,
      rates: deps.rates,
      now: this._now,
      newId: deps.newId ?? randomUUID,
    };
    this.ledger = new Ledger(core);
    this.debts = new DebtBook(core);
    this.categories = new CategoryStore(deps.store, deps.defaultCategories);
    this.users = new UserDirectory({
      store: deps.store,
      categories: this.categories,
      defaultCurrency: deps.defaultCurrency,
      now: this._now,
      onAccountCreated: deps.onAccountCreated,
    });
  }

  /**
   * Wire the durable stack from configuration: SQLite store, TTL cache,
   * and the rate API when a key is configured.
   */
  static fromConfig(
    config: AppConfig,
    supportedCurrencies: readonly Currency[],
    hooks: FinanceServiceHooks = {},
  ): FinanceService {
    const store = new SqliteFinanceStore({ filePath: config.DATABASE_PATH });
    const cache = new InMemoryRateCache({ ttlMs: config.FX_CACHE_TTL_MS });
    const api =
      config.FX_API_KEY === undefined
        ? undefined
        : new ExchangeRateApiClient({
            apiKey: config.FX_API_KEY,
            baseUrl: config.FX_API_URL,
            timeoutMs: config.FX_TIMEOUT_MS,
            fetchFn: hooks.fetchFn,
          });
    const rates = new FxRateProvider({ cache, store, api, onEvent: hooks.onFxEvent });

    return new FinanceService({
      store,
      rates,
      defaultCurrency: config.DEFAULT_CURRENCY,
      supportedCurrencies,
      flowTtlMs: config.FLOW_TTL_MS,
      onAccountCreated: hooks.onAccountCreated,
      resources: [cache],
    });
  }

  // ─── Lifecycle ─────────────────────────────────────────────────────

  open(): void {
    if (this._state !== "idle") {
      throw new Error(`FinanceService cannot be opened when ${this._state}`);
    }
    for (const resource of this._resources) {
      resource.open();
    }
    this._state = "open";
  }

  /** Idempotent. Closes resources, then the store. */
  close(): void {
    if (this._state === "closed") {
      return;
    }
    this._state = "closed";
    this._flows.clear();
    for (const resource of this._resources) {
      resource.close();
    }
    this._store.close();
  }

  isReady(): boolean {
    return this._state === "open";
  }

  // ─── Accounts ──────────────────────────────────────────────────────

  resolveAccount(externalId: string, displayName?: string | null): Account {
    return this.users.resolve(externalId, displayName);
  }

  updatePreferences(accountId: number, input: PreferencesInput): Account {
    let account: Account | undefined;
    if (input.defaultCurrency !== undefined) {
      account = this.users.updateDefaultCurrency(accountId, input.defaultCurrency);
    }
    if (input.preferredReportCurrency !== undefined) {
      account = this.users.updatePreferredReportCurrency(accountId, input.preferredReportCurrency);
    }
    if (account === undefined) {
      throw new FinanceError("VALIDATION_ERROR", "Nothing to update");
    }
    return account;
  }

  // ─── Categories ────────────────────────────────────────────────────

  listCategories(accountId: number, flowKind?: FlowKind, includeArchived?: boolean): readonly Category[] {
    return this.categories.list(accountId, flowKind, includeArchived);
  }

  createCategory(accountId: number, input: NewCategoryInput): Category {
    return this.categories.create(accountId, input);
  }

  updateCategory(accountId: number, categoryId: number, changes: CategoryChanges): Category {
    return this.categories.update(accountId, categoryId, changes);
  }

  archiveCategory(accountId: number, categoryId: number): Category {
    return this.categories.archive(accountId, categoryId);
  }

  unarchiveCategory(accountId: number, categoryId: number): Category {
    return this.categories.unarchive(accountId, categoryId);
  }

  findCategory(id: number): Category | undefined {
    return this._store.getCategory(id);
  }

  // ─── Transactions ──────────────────────────────────────────────────

  createTransaction(accountId: number, input: NewTransactionInput): Promise<Transaction> {
    return this.ledger.createTransaction({ accountId, ...input });
  }

  getHistory(accountId: number, limit?: number): readonly Transaction[] {
    return this.ledger.getHistory(accountId, limit);
  }

  getTransaction(transactionId: string, accountId: number): Transaction {
    return this.ledger.getTransaction(transactionId, accountId);
  }

  reverseTransaction(transactionId: string, accountId: number): Transaction {
    return this.ledger.reverseTransaction(transactionId, accountId);
  }

  getCurrencySuggestions(accountId: number): CurrencySuggestions {
    return { recent: this.ledger.getRecentCurrencies(accountId), supported: this._supported };
  }

  // ─── Reports ───────────────────────────────────────────────────────

  getMonthlyReport(accountId: number, year: number, month: number, currency?: Currency): Promise<Report> {
    return this.ledger.getReport(accountId, monthlyPeriod(year, month), currency);
  }

  /**
   * Range report. Dates are YYYY-MM-DD, or DD.MM[.YYYY] as typed in chat.
   */
  getRangeReport(accountId: number, start: string, end: string, currency?: Currency): Promise<Report> {
    const period: ReportPeriod =
      isIsoDate(start) && isIsoDate(end)
        ? dateRangePeriod(start, end)
        : parseDateRange(`${start}-${end}`, this._now());
    return this.ledger.getReport(accountId, period, currency);
  }

  // ─── Debts ─────────────────────────────────────────────────────────

  createDebt(accountId: number, input: NewDebtInput): Promise<Debt> {
    const other = this.requireCounterparty(input.counterparty);
    const owedToMe = input.direction === "owed_to_me";
    return this.debts.createDebt({
      creditorId: owedToMe ? accountId : other.id,
      debtorId: owedToMe ? other.id : accountId,
      amount: input.amount,
      currency: input.currency,
      categoryId: input.categoryId,
      note: input.note,
    });
  }

  getDebts(accountId: number, includeSettled: boolean = false): readonly Debt[] {
    return this.debts.getDebtsForAccount(accountId, !includeSettled);
  }

  getDebtSummary(accountId: number, currency?: Currency): DebtSummary {
    return this.debts.getDebtSummary(accountId, currency);
  }

  calculateNet(accountId: number, counterparty: string, base: string): NetPosition {
    const other = this.requireCounterparty(counterparty);
    return { counterparty: other, calculation: this.debts.calculateNetDebts(accountId, other.id, base) };
  }

  cancelMutualDebts(accountId: number, counterparty: string, base: string): Promise<CancelMutualDebtsResult> {
    const other = this.requireCounterparty(counterparty);
    return this.debts.cancelMutualDebts(accountId, other.id, base);
  }

  settleDebt(debtId: string, accountId: number): SettleDebtResult {
    return this.debts.settleDebt(debtId, accountId);
  }

  splitBill(accountId: number, input: NewSplitInput): Promise<SplitBillResult> {
    const other = this.requireCounterparty(input.counterparty);
    return this.debts.splitBill({
      payerId: accountId,
      otherId: other.id,
      total: input.total,
      otherShare: input.otherShare,
      currency: input.currency,
      categoryId: input.categoryId,
      note: input.note,
      atTime: input.atTime,
    });
  }

  /** Name shown for an account in summaries and net positions. */
  displayName(account: Account): string {
    return counterpartyName(account);
  }

  // ─── Flows ─────────────────────────────────────────────────────────

  startFlow(accountId: number, kind: FlowKindName): FlowState {
    const now = this._now();
    const state =
      kind === "expense"
        ? startExpense(accountId, now)
        : kind === "income"
          ? startIncome(accountId, now)
          : startSplit(accountId, now);
    this._flows.set(state);
    return state;
  }

  getFlow(accountId: number): FlowState | undefined {
    return this._flows.get(accountId, this._now());
  }

  cancelFlow(accountId: number): boolean {
    return this._flows.delete(accountId);
  }

  /**
   * Feed one input to the account's pending flow. A finished flow is
   * removed before its command runs.
   */
  async submitFlowInput(accountId: number, text: string): Promise<FlowInputResult> {
    const now = this._now();
    const state = this._flows.get(accountId, now);
    if (state === undefined) {
      throw new FinanceError("INVALID_OPERATION", "There is no active flow; start one first");
    }

    const result = stepFlow(state, text, now);
    if (result.status !== "complete") {
      if (result.status === "advance") {
        this._flows.set(result.state);
      }
      return result;
    }

    this._flows.delete(accountId);
    return this.executeCommand(result.command);
  }

  private async executeCommand(command: FlowCommand): Promise<FlowInputResult> {
    if (command.type === "createTransaction") {
      const transaction = await this.ledger.createTransaction(command);
      return { status: "complete", kind: "transaction", transaction };
    }
    const split = await this.splitBill(command.payerId, {
      counterparty: command.counterpartyExternalId,
      total: command.total,
      otherShare: command.otherShare,
      currency: command.currency,
      categoryId: command.categoryId,
      note: command.note,
    });
    return { status: "complete", kind: "split", split };
  }

  // ─── Helpers ───────────────────────────────────────────────────────

  private requireCounterparty(externalId: string): Account {
    const account = this.users.findByExternalId(externalId.trim());
    if (account === undefined) {
      throw new FinanceError("NOT_FOUND", `User ${externalId} not found`);
    }
    return account;
  }
}
