/**
 * @coinpurse/debts — Debt book types.
 */

import type { Currency, Debt, Transaction } from "@coinpurse/types";

/**
 * Net positions with an absolute value at or below this threshold
 * (REFERENCE_DECIMALS scale, i.e. 0.01) count as balanced.
 */
export const NET_TOLERANCE = 1_000_000n;

export interface CreateDebtInput {
  /** The party owed */
  readonly creditorId: number;
  /** The party owing */
  readonly debtorId: number;
  /** Major units */
  readonly amount: string | number;
  readonly currency: Currency;
  readonly categoryId?: number | null | undefined;
  readonly note?: string | null | undefined;
  readonly relatedTransactionId?: string | null | undefined;
}

export interface SettleDebtResult {
  readonly debt: Debt;
  /** SETTLEMENT recorded for the acting account */
  readonly settlement: Transaction;
}

/** The other party's share: half the total, or an explicit amount. */
export type SplitShare = "half" | string | number;

export interface SplitBillInput {
  /** Who paid the whole bill */
  readonly payerId: number;
  /** Who owes the payer their share */
  readonly otherId: number;
  /** Major units */
  readonly total: string | number;
  readonly otherShare: SplitShare;
  readonly currency: Currency;
  readonly categoryId?: number | null | undefined;
  readonly note?: string | null | undefined;
  readonly atTime?: string | undefined;
}

export interface SplitBillResult {
  /** EXPENSE of the full total on the payer */
  readonly transaction: Transaction;
  /** other → payer, for the other share */
  readonly debt: Debt;
}
