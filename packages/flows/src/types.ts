/**
 * @coinpurse/flows — Conversation flow types.
 *
 * A flow collects the inputs of one operation across several messages.
 * States are plain readonly records, so a host can keep them anywhere
 * (memory, a session store) and feed them back with the next input.
 */

import type { Currency, FlowKind } from "@coinpurse/types";
import type { CreateTransactionInput } from "@coinpurse/ledger";

// =============================================================================
// States
// =============================================================================

export type TransactionFlowStep = "amount" | "currency" | "category" | "note" | "date";

export type SplitFlowStep = "amount" | "currency" | "category" | "share" | "counterparty" | "note";

interface FlowStateBase {
  readonly accountId: number;
  /** ISO-8601 */
  readonly startedAt: string;
  /** ISO-8601, bumped on every accepted input */
  readonly updatedAt: string;
  /** Total in major units, 2 digits */
  readonly amount?: string | undefined;
  readonly currency?: Currency | undefined;
  /** null when the user skipped the category */
  readonly categoryId?: number | null | undefined;
}

export interface PendingExpense extends FlowStateBase {
  readonly kind: "expense";
  readonly step: TransactionFlowStep;
  readonly note?: string | null | undefined;
}

export interface PendingIncome extends FlowStateBase {
  readonly kind: "income";
  readonly step: TransactionFlowStep;
  readonly note?: string | null | undefined;
}

export interface PendingSplit extends FlowStateBase {
  readonly kind: "split";
  readonly step: SplitFlowStep;
  /** "half" or major units */
  readonly otherShare?: string | undefined;
  readonly counterpartyExternalId?: string | undefined;
}

export type PendingTransaction = PendingExpense | PendingIncome;

export type FlowState = PendingExpense | PendingIncome | PendingSplit;

// =============================================================================
// Commands
// =============================================================================

export interface CreateTransactionCommand extends CreateTransactionInput {
  readonly type: "createTransaction";
  readonly kind: FlowKind;
  readonly categoryId: number | null;
  readonly note: string | null;
  readonly atTime: string;
}

/**
 * A split as collected from the user. The counterparty is still an
 * external id; the host resolves it to an account.
 */
export interface SplitBillCommand {
  readonly type: "splitBill";
  readonly payerId: number;
  readonly counterpartyExternalId: string;
  readonly total: string;
  readonly otherShare: string;
  readonly currency: Currency;
  readonly categoryId: number | null;
  readonly note: string | null;
}

export type FlowCommand = CreateTransactionCommand | SplitBillCommand;

// =============================================================================
// Results
// =============================================================================

export type FlowStepResult<S extends FlowState = FlowState> =
  | { readonly status: "advance"; readonly state: S }
  | { readonly status: "complete"; readonly command: FlowCommand }
  | { readonly status: "error"; readonly state: S; readonly message: string };

/** Inputs that mean "leave this optional field empty". */
export const SKIP_INPUTS: ReadonlySet<string> = new Set(["-", "skip"]);

/** Default idle time after which a flow is abandoned (15 minutes). */
export const DEFAULT_FLOW_TTL_MS = 15 * 60 * 1000;
