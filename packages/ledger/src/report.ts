/**
 * Report aggregation.
 *
 * Sums frozen reference amounts per (kind, category), then converts the
 * sums into the display currency in one step.
 *
 * - EXPENSE and INCOME add to their own line
 * - REVERSAL subtracts from the line of the transaction it reverses
 * - SETTLEMENT is not part of reports
 * - Lines netting to zero are dropped
 */

import { MINOR_DECIMALS } from "@coinpurse/types";
import type {
  Category,
  Currency,
  FlowKind,
  ReferenceCurrency,
  Report,
  ReportLine,
  ReportPeriod,
  Transaction,
} from "@coinpurse/types";
import { convertReference, formatAmount, parseAmount, referenceAmount } from "./money-math.js";
import { UNCATEGORIZED_ICON, UNCATEGORIZED_NAME } from "./types.js";

export interface ReportInput {
  readonly period: ReportPeriod;
  readonly displayCurrency: Currency;
  readonly referenceCurrency: ReferenceCurrency;
  readonly conversionRate: string;
  readonly conversionDate: string | null;
  /** Transactions of the period, any kind */
  readonly transactions: readonly Transaction[];
  readonly findTransaction: (id: string) => Transaction | undefined;
  readonly findCategory: (id: number) => Category | undefined;
}

interface LineTotal {
  readonly kind: FlowKind;
  readonly categoryId: number | null;
  total: bigint;
}

/** Reference currency used for a display currency. */
export function referenceCurrencyFor(displayCurrency: Currency): ReferenceCurrency {
  return displayCurrency === "USD" ? "USD" : "EUR";
}

/**
 * The kind and category a transaction counts towards, with its sign.
 */
function attribution(
  tx: Transaction,
  findTransaction: (id: string) => Transaction | undefined,
): { kind: FlowKind; categoryId: number | null; sign: 1n | -1n } | undefined {
  switch (tx.kind) {
    case "EXPENSE":
    case "INCOME":
      return { kind: tx.kind, categoryId: tx.categoryId, sign: 1n };
    case "REVERSAL": {
      if (tx.reversesTransactionId === null) return undefined;
      const original = findTransaction(tx.reversesTransactionId);
      if (original === undefined) return undefined;
      if (original.kind !== "EXPENSE" && original.kind !== "INCOME") return undefined;
      return { kind: original.kind, categoryId: original.categoryId, sign: -1n };
    }
    case "SETTLEMENT":
      return undefined;
  }
}

export function buildReport(input: ReportInput): Report {
  const lines = new Map<string, LineTotal>();

  for (const tx of input.transactions) {
    const target = attribution(tx, input.findTransaction);
    if (target === undefined) continue;

    const key = `${target.kind}:${target.categoryId ?? "none"}`;
    let line = lines.get(key);
    if (line === undefined) {
      line = { kind: target.kind, categoryId: target.categoryId, total: 0n };
      lines.set(key, line);
    }
    line.total += target.sign * referenceAmount(tx, input.referenceCurrency);
  }

  const expenses: ReportLine[] = [];
  const income: ReportLine[] = [];
  let expenseTotal = 0n;
  let incomeTotal = 0n;

  for (const line of lines.values()) {
    if (line.total === 0n) continue;

    const category = line.categoryId === null ? undefined : input.findCategory(line.categoryId);
    const reportLine: ReportLine = {
      categoryId: line.categoryId,
      name:
        line.categoryId === null
          ? UNCATEGORIZED_NAME
          : (category?.name ?? `Category #${line.categoryId}`),
      icon: category?.icon ?? UNCATEGORIZED_ICON,
      amount: convertReference(line.total, input.conversionRate),
    };

    if (line.kind === "EXPENSE") {
      expenses.push(reportLine);
      expenseTotal += line.total;
    } else {
      income.push(reportLine);
      incomeTotal += line.total;
    }
  }

  const byName = (a: ReportLine, b: ReportLine): number =>
    a.name.localeCompare(b.name) || (a.categoryId ?? 0) - (b.categoryId ?? 0);
  expenses.sort(byName);
  income.sort(byName);

  const expensesDisplay = convertReference(expenseTotal, input.conversionRate);
  const incomeDisplay = convertReference(incomeTotal, input.conversionRate);
  const balance =
    parseAmount(incomeDisplay, MINOR_DECIMALS) - parseAmount(expensesDisplay, MINOR_DECIMALS);

  return {
    period: input.period,
    displayCurrency: input.displayCurrency,
    referenceCurrency: input.referenceCurrency,
    conversionRate: input.conversionRate,
    conversionDate: input.conversionDate,
    expenses,
    income,
    totals: {
      expenses: expensesDisplay,
      income: incomeDisplay,
      balance: formatAmount(balance, MINOR_DECIMALS),
    },
  };
}
