/**
 * @coinpurse/debts — Peer-to-peer debts, settlement and netting.
 *
 * Invariants:
 * - A debt always has two different parties
 * - Settlement is terminal and happens at most once
 * - Netting uses the frozen reference amounts, never fresh rates
 * - Cancelling mutual debts is all-or-nothing
 */

export { DebtBook, counterpartyName } from "./debt-book.js";
export { computeNet, requireBaseCurrency } from "./net.js";
export type {
  CreateDebtInput,
  SettleDebtResult,
  SplitShare,
  SplitBillInput,
  SplitBillResult,
} from "./types.js";
export { NET_TOLERANCE } from "./types.js";
