/**
 * ReportFormatter — plain-text rendering of reports, debt summaries,
 * net positions and transaction history.
 */

import { MINOR_DECIMALS, REFERENCE_DECIMALS } from "@coinpurse/types";
import type {
  Category,
  CounterpartyTotals,
  DebtSummary,
  NetCalculation,
  Report,
  ReportLine,
  Transaction,
  TransactionKind,
} from "@coinpurse/types";
import {
  UNCATEGORIZED_ICON,
  UNCATEGORIZED_NAME,
  formatMinor,
  parseAmount,
  roundDecimal,
} from "@coinpurse/ledger";
import { NET_TOLERANCE } from "@coinpurse/debts";

const MONTH_NAMES = [
  "January", "February", "March", "April", "May", "June",
  "July", "August", "September", "October", "November", "December",
];

const KIND_EMOJI: Readonly<Record<TransactionKind, string>> = {
  EXPENSE: "💸",
  INCOME: "💰",
  REVERSAL: "↩️",
  SETTLEMENT: "🤝",
};

/** YYYY-MM-DD → DD.MM.YYYY */
function dotted(date: string): string {
  const [year, month, day] = date.split("-");
  return `${day ?? ""}.${month ?? ""}.${year ?? ""}`;
}

function periodTitle(report: Report): string {
  const { period } = report;
  if (period.kind === "monthly") {
    return `📊 Monthly Report - ${MONTH_NAMES[period.month - 1] ?? period.month} ${period.year}`;
  }
  return `📊 Report ${dotted(period.start)} - ${dotted(period.end)}`;
}

function section(
  title: string,
  lines: readonly ReportLine[],
  total: string,
  totalLabel: string,
  currency: string,
  emptyText: string,
): string[] {
  if (lines.length === 0) {
    return [`${title} ${emptyText}`, ""];
  }
  return [
    title,
    ...lines.map((line) => `${line.icon} ${line.name}: ${line.amount} ${currency}`),
    "",
    `${totalLabel}: ${total} ${currency}`,
    "",
  ];
}

export function formatReport(report: Report): string {
  const currency = report.displayCurrency;
  const span = report.period.kind === "monthly" ? "this month" : "in this period";
  const { totals } = report;

  const out = [
    periodTitle(report),
    "",
    ...section("💸 Expenses:", report.expenses, totals.expenses, "📉 Total expenses", currency, `No expenses ${span}`),
    ...section("💰 Income:", report.income, totals.income, "📈 Total income", currency, `No income ${span}`),
    `${totals.balance.startsWith("-") ? "❤️" : "💚"} Balance: ${totals.balance} ${currency}`,
  ];
  if (report.conversionDate !== null) {
    out.push(
      `💱 Converted from ${report.referenceCurrency} at ${report.conversionRate} (${report.conversionDate})`,
    );
  }
  return out.join("\n");
}

function counterpartyLines(totals: CounterpartyTotals): string[] {
  const out: string[] = [];
  for (const [name, byCurrency] of Object.entries(totals)) {
    out.push(`👤 ${name}:`);
    for (const [currency, amount] of Object.entries(byCurrency)) {
      out.push(`  • ${amount} ${currency}`);
    }
  }
  return out;
}

export function formatDebtSummary(summary: DebtSummary): string {
  const owedToMe = counterpartyLines(summary.owedToMe);
  const iOwe = counterpartyLines(summary.iOwe);
  if (owedToMe.length === 0 && iOwe.length === 0) {
    return "✅ No outstanding debts!";
  }

  const out = ["💸 Debt Summary"];
  if (owedToMe.length > 0) {
    out.push("", "💰 Money owed to you:", ...owedToMe);
  }
  if (iOwe.length > 0) {
    out.push("", "💸 What you owe:", ...iOwe);
  }
  return out.join("\n");
}

export interface NetPartyNames {
  readonly a: string;
  readonly b: string;
}

/**
 * Net position from A's side. Reference amounts are shown with 2 digits.
 */
export function formatNetCalculation(calculation: NetCalculation, names: NetPartyNames): string {
  const base = calculation.baseCurrency;
  const show = (value: string): string => roundDecimal(value, MINOR_DECIMALS);
  const net = parseAmount(calculation.netAmount, REFERENCE_DECIMALS);
  const magnitude = net < 0n ? -net : net;

  const out = [
    `⚖️ Net position (${base})`,
    "",
    `${names.a} owes ${names.b}: ${show(calculation.totalAOwesB)} ${base}`,
    `${names.b} owes ${names.a}: ${show(calculation.totalBOwesA)} ${base}`,
    "",
  ];
  if (magnitude <= NET_TOLERANCE) {
    out.push("✅ Balanced");
  } else if (net > 0n) {
    out.push(`➡️ ${names.a} owes ${names.b} ${show(calculation.netAmount)} ${base}`);
  } else {
    out.push(`➡️ ${names.b} owes ${names.a} ${show(calculation.netAmount.slice(1))} ${base}`);
  }
  return out.join("\n");
}

/**
 * Numbered history list, newest first as given.
 */
export function formatHistory(
  transactions: readonly Transaction[],
  findCategory: (id: number) => Category | undefined,
): string {
  if (transactions.length === 0) {
    return "📜 No transactions yet";
  }

  const out = ["📜 Recent Transactions:", ""];
  transactions.forEach((tx, i) => {
    const category = tx.categoryId === null ? undefined : findCategory(tx.categoryId);
    out.push(
      `${i + 1}. ${KIND_EMOJI[tx.kind]} ${formatMinor(tx.amountMinor)} ${tx.currency}`,
      `   ${category?.icon ?? UNCATEGORIZED_ICON} ${category?.name ?? UNCATEGORIZED_NAME}`,
      `   🕐 ${tx.atTime.slice(0, 10)} ${tx.atTime.slice(11, 16)}`,
    );
    if (tx.note !== null) {
      out.push(`   📝 ${tx.note}`);
    }
    out.push(`   🆔 ${tx.id}`, "");
  });
  return out.join("\n").trimEnd();
}
