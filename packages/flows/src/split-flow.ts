/**
 * Split bill flow: amount → currency → category → share → counterparty → note.
 */

import { FinanceError } from "@coinpurse/types";
import { toMinorUnits } from "@coinpurse/ledger";
import {
  attempt,
  parseAmountInput,
  parseCategoryInput,
  parseCurrencyInput,
  parseNoteInput,
} from "./inputs.js";
import type { FlowStepResult, PendingSplit, SplitBillCommand, SplitFlowStep } from "./types.js";

const SHARE_BOUNDS_MESSAGE = "The other share must be greater than zero and less than the total";
const MAX_EXTERNAL_ID_LENGTH = 64;

export function startSplit(accountId: number, now: Date): PendingSplit {
  const at = now.toISOString();
  return { kind: "split", step: "amount", accountId, startedAt: at, updatedAt: at };
}

/**
 * "half", or an amount strictly between zero and the total.
 */
export function parseShareInput(input: string, total: string): string {
  const text = input.trim().toLowerCase();
  const totalMinor = toMinorUnits(total);
  if (text === "half") {
    if (Math.round(totalMinor / 2) >= totalMinor) {
      throw new FinanceError("VALIDATION_ERROR", SHARE_BOUNDS_MESSAGE);
    }
    return "half";
  }
  const share = parseAmountInput(text);
  if (toMinorUnits(share) >= totalMinor) {
    throw new FinanceError("VALIDATION_ERROR", SHARE_BOUNDS_MESSAGE);
  }
  return share;
}

export function parseCounterpartyInput(input: string): string {
  const externalId = input.trim();
  if (externalId === "" || externalId.length > MAX_EXTERNAL_ID_LENGTH || /\s/.test(externalId)) {
    throw new FinanceError("VALIDATION_ERROR", "Enter the other person's id");
  }
  return externalId;
}

/**
 * Apply one user input to a split flow.
 */
export function stepSplitFlow(state: PendingSplit, input: string, now: Date): FlowStepResult<PendingSplit> {
  const updatedAt = now.toISOString();
  const step: SplitFlowStep = state.step;

  switch (step) {
    case "amount": {
      const parsed = attempt(() => parseAmountInput(input));
      if (!parsed.ok) return { status: "error", state, message: parsed.message };
      return { status: "advance", state: { ...state, amount: parsed.value, step: "currency", updatedAt } };
    }
    case "currency": {
      const parsed = attempt(() => parseCurrencyInput(input));
      if (!parsed.ok) return { status: "error", state, message: parsed.message };
      return { status: "advance", state: { ...state, currency: parsed.value, step: "category", updatedAt } };
    }
    case "category": {
      const parsed = attempt(() => parseCategoryInput(input));
      if (!parsed.ok) return { status: "error", state, message: parsed.message };
      return { status: "advance", state: { ...state, categoryId: parsed.value, step: "share", updatedAt } };
    }
    case "share": {
      const { amount } = state;
      if (amount === undefined) {
        return { status: "error", state, message: "The flow is missing its amount" };
      }
      const parsed = attempt(() => parseShareInput(input, amount));
      if (!parsed.ok) return { status: "error", state, message: parsed.message };
      return { status: "advance", state: { ...state, otherShare: parsed.value, step: "counterparty", updatedAt } };
    }
    case "counterparty": {
      const parsed = attempt(() => parseCounterpartyInput(input));
      if (!parsed.ok) return { status: "error", state, message: parsed.message };
      return {
        status: "advance",
        state: { ...state, counterpartyExternalId: parsed.value, step: "note", updatedAt },
      };
    }
    case "note": {
      const parsed = attempt(() => parseNoteInput(input));
      if (!parsed.ok) return { status: "error", state, message: parsed.message };
      const { amount, currency, otherShare, counterpartyExternalId } = state;
      if (
        amount === undefined ||
        currency === undefined ||
        otherShare === undefined ||
        counterpartyExternalId === undefined
      ) {
        return { status: "error", state, message: "The flow is missing earlier answers" };
      }
      const command: SplitBillCommand = {
        type: "splitBill",
        payerId: state.accountId,
        counterpartyExternalId,
        total: amount,
        otherShare,
        currency,
        categoryId: state.categoryId ?? null,
        note: parsed.value,
      };
      return { status: "complete", command };
    }
  }
}
