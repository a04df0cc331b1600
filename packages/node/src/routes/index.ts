/**
 * Route barrel — re-exports all route modules.
 */

export { createHealthRoutes } from "./health.js";
export { createMeRoutes } from "./me.js";
export { createCategoryRoutes } from "./categories.js";
export { createTransactionRoutes } from "./transactions.js";
export { createReportRoutes } from "./reports.js";
export { createDebtRoutes } from "./debts.js";
export { createSplitRoutes } from "./splits.js";
export { createFlowRoutes } from "./flows.js";
