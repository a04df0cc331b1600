/**
 * Financial Types
 *
 * Core records of the ledger and debt book.
 *
 * Rules:
 * - Money is an integer count of minor units plus an explicit currency
 * - Every monetary record freezes its EUR and USD conversions at creation
 * - Decimal values (rates, reference amounts) are strings, never floats
 * - Records are append-mostly: only Debt.isSettled ever flips
 */

/** ISO 4217-style three-letter code, upper case (e.g. "RSD", "EUR"). */
export type Currency = string;

/** The two currencies every monetary record is converted into. */
export const REFERENCE_CURRENCIES = ["EUR", "USD"] as const;

export type ReferenceCurrency = (typeof REFERENCE_CURRENCIES)[number];

/** Fractional digits kept for stored exchange rates. */
export const RATE_DECIMALS = 6;

/** Minor-unit digits; every currency is tracked in hundredths. */
export const MINOR_DECIMALS = 2;

/**
 * Fractional digits of frozen reference amounts.
 * MINOR_DECIMALS + RATE_DECIMALS, so amount × rate is stored exactly.
 */
export const REFERENCE_DECIMALS = MINOR_DECIMALS + RATE_DECIMALS;

/**
 * The monetary part shared by transactions and debts.
 */
export interface FrozenAmount {
  /** Amount in minor units (hundredths), always positive */
  readonly amountMinor: number;

  /** Currency of amountMinor */
  readonly currency: Currency;

  /** amountMinor / 100 × fxRateToEur, REFERENCE_DECIMALS digits */
  readonly amountEur: string;

  /** amountMinor / 100 × fxRateToUsd, REFERENCE_DECIMALS digits */
  readonly amountUsd: string;

  /** currency → EUR rate used at creation, RATE_DECIMALS digits */
  readonly fxRateToEur: string;

  /** currency → USD rate used at creation, RATE_DECIMALS digits */
  readonly fxRateToUsd: string;
}

/**
 * An internal identity. Created on first contact from the chat layer.
 */
export interface Account {
  readonly id: number;
  /** Identity on the host messaging platform */
  readonly externalId: string;
  readonly displayName: string | null;
  readonly defaultCurrency: Currency;
  readonly preferredReportCurrency: Currency;
  readonly createdAt: string;
}

export type TransactionKind = "EXPENSE" | "INCOME" | "REVERSAL" | "SETTLEMENT";

/** Kinds a user can record directly. */
export type FlowKind = Extract<TransactionKind, "EXPENSE" | "INCOME">;

/**
 * A single ledger entry. Immutable once written.
 */
export interface Transaction extends FrozenAmount {
  readonly id: string;
  readonly accountId: number;
  readonly kind: TransactionKind;
  readonly categoryId: number | null;
  readonly note: string | null;

  /** Effective time of the movement (user-assignable) */
  readonly atTime: string;

  /** When the row was written */
  readonly createdAt: string;

  /** Debt discharged by this entry (SETTLEMENT only) */
  readonly relatedDebtId: string | null;

  /** Transaction cancelled by this entry (REVERSAL only) */
  readonly reversesTransactionId: string | null;
}

/**
 * An obligation of the debtor towards the creditor.
 * Once isSettled is true the debt is terminal.
 */
export interface Debt extends FrozenAmount {
  readonly id: string;
  readonly creditorId: number;
  readonly debtorId: number;
  readonly categoryId: number | null;
  readonly note: string | null;

  /** Transaction that spawned this debt (e.g. a split bill) */
  readonly relatedTransactionId: string | null;

  readonly isSettled: boolean;
  readonly settledAt: string | null;
  readonly createdAt: string;
}

/**
 * A durable exchange rate. (fromCurrency, toCurrency, date) is unique.
 */
export interface FxRate {
  readonly fromCurrency: Currency;
  readonly toCurrency: Currency;
  /** YYYY-MM-DD */
  readonly date: string;
  /** RATE_DECIMALS digits */
  readonly rate: string;
  readonly fetchedAt: string;
}

/**
 * A user-owned label for expenses or income.
 */
export interface Category {
  readonly id: number;
  readonly accountId: number;
  readonly name: string;
  readonly icon: string;
  readonly flowKind: FlowKind;
  readonly isDefault: boolean;
  readonly isArchived: boolean;
}
