/**
 * Expense and income flows: amount → currency → category → note → date.
 */

import { FinanceError } from "@coinpurse/types";
import type { FlowKind } from "@coinpurse/types";
import { parseSingleDate } from "./date-input.js";
import {
  attempt,
  isSkip,
  parseAmountInput,
  parseCategoryInput,
  parseCurrencyInput,
  parseNoteInput,
} from "./inputs.js";
import type {
  CreateTransactionCommand,
  FlowStepResult,
  PendingExpense,
  PendingIncome,
  PendingTransaction,
  TransactionFlowStep,
} from "./types.js";

export function startExpense(accountId: number, now: Date): PendingExpense {
  const at = now.toISOString();
  return { kind: "expense", step: "amount", accountId, startedAt: at, updatedAt: at };
}

export function startIncome(accountId: number, now: Date): PendingIncome {
  const at = now.toISOString();
  return { kind: "income", step: "amount", accountId, startedAt: at, updatedAt: at };
}

function flowKindOf(state: PendingTransaction): FlowKind {
  return state.kind === "expense" ? "EXPENSE" : "INCOME";
}

/**
 * Effective time for a date answer. Today (or a skip) means now; an
 * earlier day is booked at noon UTC.
 */
function parseDateInput(input: string, now: Date): string {
  if (isSkip(input) || input.trim().toLowerCase() === "today") {
    return now.toISOString();
  }
  const date = parseSingleDate(input, now);
  const today = now.toISOString().slice(0, 10);
  if (date > today) {
    throw new FinanceError("VALIDATION_ERROR", "Date cannot be in the future");
  }
  return date === today ? now.toISOString() : `${date}T12:00:00.000Z`;
}

function complete<S extends PendingTransaction>(state: S, atTime: string): FlowStepResult<S> {
  const { amount, currency } = state;
  if (amount === undefined || currency === undefined) {
    return { status: "error", state, message: "The flow is missing its amount or currency" };
  }
  const command: CreateTransactionCommand = {
    type: "createTransaction",
    accountId: state.accountId,
    kind: flowKindOf(state),
    amount,
    currency,
    categoryId: state.categoryId ?? null,
    note: state.note ?? null,
    atTime,
  };
  return { status: "complete", command };
}

/**
 * Apply one user input to an expense or income flow.
 */
export function stepTransactionFlow<S extends PendingTransaction>(
  state: S,
  input: string,
  now: Date,
): FlowStepResult<S> {
  const updatedAt = now.toISOString();
  const step: TransactionFlowStep = state.step;

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
      return { status: "advance", state: { ...state, categoryId: parsed.value, step: "note", updatedAt } };
    }
    case "note": {
      const parsed = attempt(() => parseNoteInput(input));
      if (!parsed.ok) return { status: "error", state, message: parsed.message };
      return { status: "advance", state: { ...state, note: parsed.value, step: "date", updatedAt } };
    }
    case "date": {
      const parsed = attempt(() => parseDateInput(input, now));
      if (!parsed.ok) return { status: "error", state, message: parsed.message };
      return complete(state, parsed.value);
    }
  }
}
