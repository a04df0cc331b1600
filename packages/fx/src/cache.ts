/**
 * In-memory rate cache with per-entry TTL.
 *
 * Expired entries are dropped on read. A sweeper started by open()
 * also purges them periodically so idle keys don't accumulate.
 */

import type { RateCache } from "./types.js";

/** 24 hours */
export const DEFAULT_RATE_TTL_MS = 86_400_000;

interface CacheEntry {
  readonly rate: string;
  readonly expiresAt: number;
}

export interface InMemoryRateCacheOptions {
  readonly ttlMs?: number | undefined;
  /** Sweep interval; defaults to ttlMs, capped at one hour */
  readonly sweepIntervalMs?: number | undefined;
  readonly now?: (() => number) | undefined;
}

export class InMemoryRateCache implements RateCache {
  private readonly _entries = new Map<string, CacheEntry>();
  private readonly _ttlMs: number;
  private readonly _sweepIntervalMs: number;
  private readonly _now: () => number;
  private _sweeper: ReturnType<typeof setInterval> | undefined;

  constructor(options: InMemoryRateCacheOptions = {}) {
    this._ttlMs = options.ttlMs ?? DEFAULT_RATE_TTL_MS;
    this._sweepIntervalMs = options.sweepIntervalMs ?? Math.min(this._ttlMs, 3_600_000);
    this._now = options.now ?? Date.now;
  }

  get(key: string): string | undefined {
    const entry = this._entries.get(key);
    if (entry === undefined) {
      return undefined;
    }
    if (entry.expiresAt <= this._now()) {
      this._entries.delete(key);
      return undefined;
    }
    return entry.rate;
  }

  set(key: string, rate: string): void {
    this._entries.set(key, { rate, expiresAt: this._now() + this._ttlMs });
  }

  clear(): void {
    this._entries.clear();
  }

  get size(): number {
    return this._entries.size;
  }

  /** Remove expired entries. Returns how many were dropped. */
  sweep(): number {
    const now = this._now();
    let removed = 0;
    for (const [key, entry] of this._entries) {
      if (entry.expiresAt <= now) {
        this._entries.delete(key);
        removed++;
      }
    }
    return removed;
  }

  open(): void {
    if (this._sweeper !== undefined) {
      return;
    }
    this._sweeper = setInterval(() => {
      this.sweep();
    }, this._sweepIntervalMs);
    this._sweeper.unref();
  }

  close(): void {
    if (this._sweeper !== undefined) {
      clearInterval(this._sweeper);
      this._sweeper = undefined;
    }
    this.clear();
  }

  get isOpen(): boolean {
    return this._sweeper !== undefined;
  }
}
