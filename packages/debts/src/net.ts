/**
 * Bilateral netting.
 *
 * Works on the frozen base-currency amounts of the unsettled debts
 * between two accounts; no rate is looked up.
 */

import { FinanceError, REFERENCE_DECIMALS, isReferenceCurrency } from "@coinpurse/types";
import type { Debt, NetBreakdownLine, NetCalculation, ReferenceCurrency } from "@coinpurse/types";
import { formatAmount, referenceAmount } from "@coinpurse/ledger";

/**
 * Upper-case and check a netting base currency (EUR or USD).
 */
export function requireBaseCurrency(code: string): ReferenceCurrency {
  const upper = code.trim().toUpperCase();
  if (!isReferenceCurrency(upper)) {
    throw new FinanceError("VALIDATION_ERROR", `Base currency must be EUR or USD, got "${code}"`);
  }
  return upper;
}

/**
 * Net position of accountA towards accountB over the given debts.
 * Debts not between the two accounts are ignored.
 */
export function computeNet(
  accountA: number,
  accountB: number,
  baseCurrency: ReferenceCurrency,
  debts: readonly Debt[],
): NetCalculation {
  const included: Debt[] = [];
  const breakdown: NetBreakdownLine[] = [];
  let aOwesB = 0n;
  let bOwesA = 0n;

  for (const debt of debts) {
    const aToB = debt.debtorId === accountA && debt.creditorId === accountB;
    const bToA = debt.debtorId === accountB && debt.creditorId === accountA;
    if (!aToB && !bToA) continue;

    const base = referenceAmount(debt, baseCurrency);
    if (aToB) {
      aOwesB += base;
    } else {
      bOwesA += base;
    }

    included.push(debt);
    breakdown.push({
      debtId: debt.id,
      direction: aToB ? "A_OWES_B" : "B_OWES_A",
      amountMinor: debt.amountMinor,
      currency: debt.currency,
      baseAmount: formatAmount(base, REFERENCE_DECIMALS),
    });
  }

  return {
    accountA,
    accountB,
    baseCurrency,
    debts: included,
    breakdown,
    totalAOwesB: formatAmount(aOwesB, REFERENCE_DECIMALS),
    totalBOwesA: formatAmount(bOwesA, REFERENCE_DECIMALS),
    netAmount: formatAmount(aOwesB - bOwesA, REFERENCE_DECIMALS),
  };
}
