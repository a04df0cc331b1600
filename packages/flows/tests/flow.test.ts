/**
 * Tests for the expense, income and split flows.
 */

import { describe, it, expect } from "vitest";
import { isExpired, stepFlow } from "../src/flow.js";
import { startSplit, stepSplitFlow } from "../src/split-flow.js";
import { startExpense, startIncome, stepTransactionFlow } from "../src/transaction-flow.js";
import type { FlowState, FlowStepResult } from "../src/types.js";

const NOW = new Date("2026-03-20T10:00:00.000Z");
const LATER = new Date("2026-03-20T10:01:00.000Z");

/** Feed inputs one by one, failing on anything but an advance. */
function feed<S extends FlowState>(
  state: S,
  inputs: readonly string[],
  step: (state: S, input: string, now: Date) => FlowStepResult<S>,
): S {
  let current = state;
  for (const input of inputs) {
    const result = step(current, input, NOW);
    if (result.status !== "advance") {
      throw new Error(`Input "${input}" did not advance: ${result.status}`);
    }
    current = result.state;
  }
  return current;
}

describe("expense flow", () => {
  it("starts at the amount step", () => {
    expect(startExpense(1, NOW)).toEqual({
      kind: "expense",
      step: "amount",
      accountId: 1,
      startedAt: "2026-03-20T10:00:00.000Z",
      updatedAt: "2026-03-20T10:00:00.000Z",
    });
  });

  it("walks amount → currency → category → note → date", () => {
    const state = feed(startExpense(1, NOW), ["12,5", "eur", "1", "  coffee "], stepTransactionFlow);

    expect(state).toMatchObject({
      step: "date",
      amount: "12.50",
      currency: "EUR",
      categoryId: 1,
      note: "coffee",
    });

    expect(stepTransactionFlow(state, "today", NOW)).toEqual({
      status: "complete",
      command: {
        type: "createTransaction",
        accountId: 1,
        kind: "EXPENSE",
        amount: "12.50",
        currency: "EUR",
        categoryId: 1,
        note: "coffee",
        atTime: "2026-03-20T10:00:00.000Z",
      },
    });
  });

  it("books an earlier day at noon UTC", () => {
    const state = feed(startExpense(1, NOW), ["5", "RSD", "-", "skip"], stepTransactionFlow);
    const result = stepTransactionFlow(state, "18.03", NOW);

    expect(result.status).toBe("complete");
    if (result.status === "complete") {
      expect(result.command).toMatchObject({
        categoryId: null,
        note: null,
        atTime: "2026-03-18T12:00:00.000Z",
      });
    }
  });

  it("rejects a future date and keeps the state", () => {
    const state = feed(startExpense(1, NOW), ["5", "RSD", "-", "-"], stepTransactionFlow);

    expect(stepTransactionFlow(state, "21.03", NOW)).toEqual({
      status: "error",
      state,
      message: "Date cannot be in the future",
    });
  });

  it("reports invalid answers without advancing", () => {
    const start = startExpense(1, NOW);
    expect(stepTransactionFlow(start, "abc", NOW)).toEqual({
      status: "error",
      state: start,
      message: 'Invalid amount format: "abc"',
    });
    expect(stepTransactionFlow(start, "0", NOW)).toMatchObject({
      status: "error",
      message: "Amount must be greater than zero",
    });

    const atCurrency = feed(start, ["5"], stepTransactionFlow);
    expect(stepTransactionFlow(atCurrency, "eu", NOW)).toMatchObject({
      status: "error",
      message: 'Invalid currency code: "eu"',
    });

    const atCategory = feed(atCurrency, ["EUR"], stepTransactionFlow);
    expect(stepTransactionFlow(atCategory, "food", NOW)).toMatchObject({
      status: "error",
      message: 'Invalid category: "food"',
    });
  });

  it("bumps updatedAt on every accepted input", () => {
    const result = stepTransactionFlow(startExpense(1, NOW), "5", LATER);

    expect(result.status).toBe("advance");
    if (result.status === "advance") {
      expect(result.state.startedAt).toBe("2026-03-20T10:00:00.000Z");
      expect(result.state.updatedAt).toBe("2026-03-20T10:01:00.000Z");
    }
  });
});

describe("income flow", () => {
  it("completes with an INCOME command", () => {
    const state = feed(startIncome(2, NOW), ["1000", "EUR", "3", "-"], stepTransactionFlow);
    const result = stepFlow(state, "-", NOW);

    expect(result.status).toBe("complete");
    if (result.status === "complete") {
      expect(result.command).toMatchObject({ type: "createTransaction", accountId: 2, kind: "INCOME" });
    }
  });
});

describe("split flow", () => {
  it("walks amount → currency → category → share → counterparty → note", () => {
    const state = feed(startSplit(1, NOW), ["3000", "rsd", "skip", "Half", "ext-2"], stepSplitFlow);

    expect(state).toMatchObject({
      kind: "split",
      step: "note",
      amount: "3000.00",
      currency: "RSD",
      categoryId: null,
      otherShare: "half",
      counterpartyExternalId: "ext-2",
    });

    expect(stepSplitFlow(state, "dinner", NOW)).toEqual({
      status: "complete",
      command: {
        type: "splitBill",
        payerId: 1,
        counterpartyExternalId: "ext-2",
        total: "3000.00",
        otherShare: "half",
        currency: "RSD",
        categoryId: null,
        note: "dinner",
      },
    });
  });

  it("takes a custom share below the total", () => {
    const state = feed(startSplit(1, NOW), ["30", "EUR", "1", "12.5"], stepSplitFlow);

    expect(state.otherShare).toBe("12.50");
    expect(state.step).toBe("counterparty");
  });

  it("rejects shares outside (0, total)", () => {
    const atShare = feed(startSplit(1, NOW), ["30", "EUR", "1"], stepSplitFlow);

    expect(stepSplitFlow(atShare, "30", NOW)).toEqual({
      status: "error",
      state: atShare,
      message: "The other share must be greater than zero and less than the total",
    });
    expect(stepSplitFlow(atShare, "0", NOW).status).toBe("error");

    const tiny = feed(startSplit(1, NOW), ["0.01", "EUR", "1"], stepSplitFlow);
    expect(stepSplitFlow(tiny, "half", NOW).status).toBe("error");
  });

  it("requires a counterparty id", () => {
    const atCounterparty = feed(startSplit(1, NOW), ["30", "EUR", "1", "half"], stepSplitFlow);

    expect(stepSplitFlow(atCounterparty, "   ", NOW)).toMatchObject({
      status: "error",
      message: "Enter the other person's id",
    });
  });

  it("is reachable through stepFlow", () => {
    const result = stepFlow(startSplit(1, NOW), "10", NOW);

    expect(result.status).toBe("advance");
    if (result.status === "advance") {
      expect(result.state.kind).toBe("split");
    }
  });
});

describe("isExpired", () => {
  const state = startExpense(1, NOW);

  it("keeps a flow alive up to the TTL", () => {
    expect(isExpired(state, new Date("2026-03-20T10:15:00.000Z"))).toBe(false);
  });

  it("expires an idle flow after the TTL", () => {
    expect(isExpired(state, new Date("2026-03-20T10:15:00.001Z"))).toBe(true);
  });

  it("takes a custom TTL", () => {
    expect(isExpired(state, LATER, 30_000)).toBe(true);
    expect(isExpired(state, LATER, 60_000)).toBe(false);
  });
});
