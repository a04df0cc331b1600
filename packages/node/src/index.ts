/**
 * @coinpurse/node — HTTP surface and composition root.
 */

export { FinanceService } from "./services/finance-service.js";
export type {
  FinanceServiceDeps,
  FinanceServiceHooks,
  ServiceResource,
  PreferencesInput,
  NewTransactionInput,
  NewDebtInput,
  NewSplitInput,
  CurrencySuggestions,
  NetPosition,
  FlowKindName,
  FlowInputResult,
} from "./services/finance-service.js";
export { UserDirectory } from "./services/user-directory.js";
export type { UserDirectoryOptions } from "./services/user-directory.js";
export { CategoryStore, loadDefaultCategories } from "./services/category-store.js";
export type { CategoryChanges, DefaultCategory, NewCategoryInput } from "./services/category-store.js";
export { FlowSessions } from "./services/flow-sessions.js";
export { loadConfig, parseSupportedCurrencies, ConfigSchema } from "./config.js";
export type { AppConfig } from "./config.js";
export { createApp } from "./app.js";
export type { CreateAppOptions } from "./app.js";
export * from "./middleware/index.js";
export * from "./routes/index.js";
export * from "./types/index.js";
