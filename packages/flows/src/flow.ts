/**
 * Flow dispatch and expiry.
 */

import { stepSplitFlow } from "./split-flow.js";
import { stepTransactionFlow } from "./transaction-flow.js";
import type { FlowState, FlowStepResult } from "./types.js";
import { DEFAULT_FLOW_TTL_MS } from "./types.js";

/** Apply one user input to any flow. */
export function stepFlow(state: FlowState, input: string, now: Date): FlowStepResult {
  return state.kind === "split"
    ? stepSplitFlow(state, input, now)
    : stepTransactionFlow(state, input, now);
}

/** True once the flow has been idle for longer than ttlMs. */
export function isExpired(state: FlowState, now: Date, ttlMs: number = DEFAULT_FLOW_TTL_MS): boolean {
  return now.getTime() - Date.parse(state.updatedAt) > ttlMs;
}
