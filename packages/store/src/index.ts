/**
 * @coinpurse/store — Persistence for the finance core.
 *
 * Provides:
 * - FinanceStore: the unit-of-work persistence interface
 * - InMemoryFinanceStore: map-backed store for tests and development
 * - SqliteFinanceStore: durable store on better-sqlite3
 */

export type {
  NewAccount,
  AccountPatch,
  NewCategory,
  CategoryFilter,
  CategoryPatch,
  FinanceUnit,
  FinanceStore,
} from "./types.js";

export { InMemoryFinanceStore } from "./in-memory-store.js";
export { SqliteFinanceStore } from "./sqlite-store.js";
export type { SqliteFinanceStoreOptions } from "./sqlite-store.js";
export { SCHEMA_SQL } from "./schema.js";
