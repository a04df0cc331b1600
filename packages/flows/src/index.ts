/**
 * @coinpurse/flows — Conversation flows and text formatting.
 *
 * Flows are pure: a state and one user input go in, a new state, a
 * validation message or a finished command comes out. The host decides
 * where states live and executes the commands.
 */

// Flow engine
export { stepFlow, isExpired } from "./flow.js";
export { startExpense, startIncome, stepTransactionFlow } from "./transaction-flow.js";
export { startSplit, stepSplitFlow, parseShareInput, parseCounterpartyInput } from "./split-flow.js";
export {
  isSkip,
  parseAmountInput,
  parseCurrencyInput,
  parseCategoryInput,
  parseNoteInput,
} from "./inputs.js";

// Dates
export { parseSingleDate, parseDateRange } from "./date-input.js";

// Formatting
export {
  formatReport,
  formatDebtSummary,
  formatNetCalculation,
  formatHistory,
} from "./formatter.js";
export type { NetPartyNames } from "./formatter.js";

// Types
export type {
  TransactionFlowStep,
  SplitFlowStep,
  PendingExpense,
  PendingIncome,
  PendingSplit,
  PendingTransaction,
  FlowState,
  CreateTransactionCommand,
  SplitBillCommand,
  FlowCommand,
  FlowStepResult,
} from "./types.js";
export { SKIP_INPUTS, DEFAULT_FLOW_TTL_MS } from "./types.js";
