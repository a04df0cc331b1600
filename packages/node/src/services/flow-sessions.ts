/**
 * FlowSessions — The pending conversation flow of each account.
 *
 * One flow per account; starting a new one replaces the old. Idle flows
 * expire after the configured TTL and are dropped on the next read.
 */

import { isExpired } from "@coinpurse/flows";
import type { FlowState } from "@coinpurse/flows";

export class FlowSessions {
  private readonly _flows = new Map<number, FlowState>();
  private readonly _ttlMs: number;

  constructor(ttlMs: number) {
    this._ttlMs = ttlMs;
  }

  get(accountId: number, now: Date): FlowState | undefined {
    const state = this._flows.get(accountId);
    if (state !== undefined && isExpired(state, now, this._ttlMs)) {
      this._flows.delete(accountId);
      return undefined;
    }
    return state;
  }

  set(state: FlowState): void {
    this._flows.set(state.accountId, state);
  }

  delete(accountId: number): boolean {
    return this._flows.delete(accountId);
  }

  clear(): void {
    this._flows.clear();
  }

  get size(): number {
    return this._flows.size;
  }
}
