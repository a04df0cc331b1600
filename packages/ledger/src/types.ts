/**
 * @coinpurse/ledger — Ledger-specific types.
 *
 * Rules:
 * - All types are readonly
 * - Amount inputs are major units (string or number); storage is minor units
 * - Fail-closed: invalid input throws FinanceError, never silently succeeds
 */

import type { Currency, FlowKind } from "@coinpurse/types";
import type { RateSource } from "@coinpurse/fx";
import type { FinanceStore } from "@coinpurse/store";

/** Default page size of getHistory(). */
export const DEFAULT_HISTORY_LIMIT = 10;

/** Default length of getRecentCurrencies(). */
export const DEFAULT_RECENT_CURRENCIES = 3;

export const UNCATEGORIZED_NAME = "Uncategorized";
export const UNCATEGORIZED_ICON = "📦";

/**
 * Collaborators shared by the ledger and the debt book.
 */
export interface FinanceCoreOptions {
  readonly store: FinanceStore;
  readonly rates: RateSource;
  /** Clock for createdAt stamps and default dates */
  readonly now?: (() => Date) | undefined;
  /** Id generator for transactions and debts (default: random UUID) */
  readonly newId?: (() => string) | undefined;
}

export interface CreateTransactionInput {
  readonly accountId: number;
  /** Major units, e.g. "12.50" or 12.5 */
  readonly amount: string | number;
  readonly currency: Currency;
  readonly kind: FlowKind;
  readonly categoryId?: number | null | undefined;
  readonly note?: string | null | undefined;
  /** Effective time (ISO-8601); defaults to now */
  readonly atTime?: string | undefined;
}

/** [fromTime, toTime], both inclusive ISO-8601 instants. */
export interface PeriodBounds {
  readonly fromTime: string;
  readonly toTime: string;
}
