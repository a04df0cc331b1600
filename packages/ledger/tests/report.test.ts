/**
 * Tests for period reports.
 *
 * Covers:
 * - Per-category sums in the reference currency
 * - Single conversion into the display currency
 * - Reversals netting their original to zero
 * - Settlements excluded, uncategorised lines, period bounds
 */

import { describe, it, expect, beforeEach } from "vitest";
import type { Transaction } from "@coinpurse/types";
import type { InMemoryFinanceStore } from "@coinpurse/store";
import { Ledger } from "../src/ledger.js";
import { referenceCurrencyFor } from "../src/report.js";
import { FixedRates, seededStore, sequentialIds } from "./fixtures.js";

const NOW = new Date("2026-03-20T10:00:00.000Z");
const MARCH = { kind: "monthly", year: 2026, month: 3 } as const;

describe("Ledger.getReport", () => {
  let store: InMemoryFinanceStore;
  let rates: FixedRates;
  let ledger: Ledger;

  beforeEach(async () => {
    store = seededStore();
    rates = new FixedRates();
    ledger = new Ledger({ store, rates, now: () => NOW, newId: sequentialIds("tx") });

    // tx-1: Food 1050 RSD → 8.9586 EUR / 9.6705 USD
    await ledger.createTransaction({
      accountId: 1, amount: "1050", currency: "RSD", kind: "EXPENSE", categoryId: 1,
      atTime: "2026-03-02T09:00:00.000Z",
    });
    // tx-2: Food 20 EUR, reversed below
    await ledger.createTransaction({
      accountId: 1, amount: "20", currency: "EUR", kind: "EXPENSE", categoryId: 1,
      atTime: "2026-03-03T09:00:00.000Z",
    });
    // tx-3: Transport 15.50 USD → 14.351853 EUR
    await ledger.createTransaction({
      accountId: 1, amount: "15.50", currency: "USD", kind: "EXPENSE", categoryId: 2,
      atTime: "2026-03-04T09:00:00.000Z",
    });
    // tx-4: Salary 1000 EUR
    await ledger.createTransaction({
      accountId: 1, amount: "1000", currency: "EUR", kind: "INCOME", categoryId: 3,
      atTime: "2026-03-01T00:00:00.000Z",
    });
    // tx-5: reversal of tx-2
    ledger.reverseTransaction("tx-2", 1);
  });

  it("reports in the account's preferred currency by default", async () => {
    const report = await ledger.getReport(1, MARCH);

    expect(report).toEqual({
      period: MARCH,
      displayCurrency: "EUR",
      referenceCurrency: "EUR",
      conversionRate: "1.000000",
      conversionDate: null,
      expenses: [
        { categoryId: 1, name: "Food", icon: "🍔", amount: "8.96" },
        { categoryId: 2, name: "Transport", icon: "🚌", amount: "14.35" },
      ],
      income: [{ categoryId: 3, name: "Salary", icon: "💰", amount: "1000.00" }],
      totals: { expenses: "23.31", income: "1000.00", balance: "976.69" },
    });
  });

  it("sums USD reports over the frozen USD amounts", async () => {
    const report = await ledger.getReport(1, MARCH, "USD");

    expect(report.referenceCurrency).toBe("USD");
    expect(report.conversionRate).toBe("1.000000");
    expect(report.expenses.map((l) => l.amount)).toEqual(["9.67", "15.50"]);
    expect(report.totals).toEqual({ expenses: "25.17", income: "1080.00", balance: "1054.83" });
  });

  it("converts the EUR sums once into another display currency", async () => {
    const report = await ledger.getReport(1, MARCH, "rsd");

    expect(report.displayCurrency).toBe("RSD");
    expect(report.referenceCurrency).toBe("EUR");
    expect(report.conversionRate).toBe("117.200000");
    expect(report.conversionDate).toBe("2026-03-20");
    expect(report.expenses.map((l) => l.amount)).toEqual(["1049.95", "1682.04"]);
    expect(report.totals).toEqual({
      expenses: "2731.99",
      income: "117200.00",
      balance: "114468.01",
    });
    expect(rates.requests.at(-1)).toBe("EUR/RSD@2026-03-20");
  });

  it("drops lines that net to zero", async () => {
    ledger.reverseTransaction("tx-3", 1);

    const report = await ledger.getReport(1, MARCH);

    expect(report.expenses.map((l) => l.name)).toEqual(["Food"]);
    expect(report.totals.expenses).toBe("8.96");
  });

  it("shows transactions without a category as Uncategorized", async () => {
    await ledger.createTransaction({
      accountId: 1, amount: "5", currency: "EUR", kind: "EXPENSE",
      atTime: "2026-03-10T09:00:00.000Z",
    });

    const report = await ledger.getReport(1, MARCH);

    expect(report.expenses.map((l) => [l.name, l.amount])).toEqual([
      ["Food", "8.96"],
      ["Transport", "14.35"],
      ["Uncategorized", "5.00"],
    ]);
  });

  it("leaves settlements out", async () => {
    const settlement: Transaction = {
      id: "settle-1",
      accountId: 1,
      kind: "SETTLEMENT",
      amountMinor: 5000,
      currency: "EUR",
      amountEur: "50.00000000",
      amountUsd: "54.00000000",
      fxRateToEur: "1.000000",
      fxRateToUsd: "1.080000",
      categoryId: 1,
      note: "Settlement of debt d-1",
      atTime: "2026-03-15T09:00:00.000Z",
      createdAt: "2026-03-15T09:00:00.000Z",
      relatedDebtId: "d-1",
      reversesTransactionId: null,
    };
    store.insertTransaction(settlement);

    const report = await ledger.getReport(1, MARCH);

    expect(report.totals.expenses).toBe("23.31");
  });

  it("includes only transactions inside the period", async () => {
    await ledger.createTransaction({
      accountId: 1, amount: "7", currency: "EUR", kind: "EXPENSE", categoryId: 2,
      atTime: "2026-02-28T23:59:59.999Z",
    });
    await ledger.createTransaction({
      accountId: 1, amount: "3", currency: "EUR", kind: "EXPENSE", categoryId: 2,
      atTime: "2026-03-31T23:59:59.999Z",
    });

    const report = await ledger.getReport(1, MARCH);

    expect(report.expenses.find((l) => l.name === "Transport")?.amount).toBe("17.35");
  });

  it("reports an inclusive date range", async () => {
    const report = await ledger.getReport(1, { kind: "range", start: "2026-03-02", end: "2026-03-02" });

    expect(report.expenses).toEqual([{ categoryId: 1, name: "Food", icon: "🍔", amount: "8.96" }]);
    expect(report.income).toEqual([]);
    expect(report.totals).toEqual({ expenses: "8.96", income: "0.00", balance: "-8.96" });
  });

  it("rejects an invalid period", async () => {
    await expect(ledger.getReport(1, { kind: "monthly", year: 2026, month: 13 })).rejects.toThrow(
      "Invalid report month: 13",
    );
    await expect(
      ledger.getReport(1, { kind: "range", start: "2026-03-10", end: "2026-03-01" }),
    ).rejects.toThrow("Start date must not be after end date");
  });
});

describe("referenceCurrencyFor", () => {
  it("uses USD only for USD reports", () => {
    expect(referenceCurrencyFor("USD")).toBe("USD");
    expect(referenceCurrencyFor("EUR")).toBe("EUR");
    expect(referenceCurrencyFor("RSD")).toBe("EUR");
  });
});
