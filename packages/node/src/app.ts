/**
 * Hono application factory.
 *
 * Creates the Hono app with middleware and routes. Separated from
 * main.ts so tests create the app without starting the HTTP server.
 */

import { Hono } from "hono";
import type { AppEnv } from "./types/api-contract.js";
import type { FinanceService } from "./services/finance-service.js";
import { createErrorEnvelope } from "./types/error.js";
import { createErrorHandler } from "./middleware/error-handler.js";
import type { UnexpectedErrorHook } from "./middleware/error-handler.js";
import { requestIdMiddleware } from "./middleware/request-id.js";
import { loggerMiddleware } from "./middleware/logger.js";
import type { RequestLogEntry } from "./middleware/logger.js";
import { accountMiddleware } from "./middleware/account.js";
import { createHealthRoutes } from "./routes/health.js";
import { createMeRoutes } from "./routes/me.js";
import { createCategoryRoutes } from "./routes/categories.js";
import { createTransactionRoutes } from "./routes/transactions.js";
import { createReportRoutes } from "./routes/reports.js";
import { createDebtRoutes } from "./routes/debts.js";
import { createSplitRoutes } from "./routes/splits.js";
import { createFlowRoutes } from "./routes/flows.js";

// =============================================================================
// App Config
// =============================================================================

export interface CreateAppOptions {
  readonly service: FinanceService;
  readonly logFn?: ((entry: RequestLogEntry) => void) | undefined;
  /** Called for errors answered with 500 */
  readonly onUnexpectedError?: UnexpectedErrorHook | undefined;
  /** Clock for health timestamps */
  readonly now?: (() => Date) | undefined;
}

// =============================================================================
// Factory
// =============================================================================

/**
 * Create the Hono application with all middleware and routes.
 */
export function createApp(options: CreateAppOptions): Hono<AppEnv> {
  const { service } = options;
  const app = new Hono<AppEnv>();

  // ─── Global Middleware ───────────────────────────────────────────
  app.use("*", requestIdMiddleware());

  if (options.logFn !== undefined) {
    app.use("*", loggerMiddleware(options.logFn));
  }

  app.use("*", async (c, next) => {
    c.set("service", service);
    await next();
  });

  // ─── Error Handling ─────────────────────────────────────────────
  app.onError(createErrorHandler(options.onUnexpectedError));
  app.notFound((c) => c.json(createErrorEnvelope("NOT_FOUND", "Route not found"), 404));

  // ─── Health Routes (no identity required) ───────────────────────
  app.route("/", createHealthRoutes(options.now));

  // ─── API Routes ─────────────────────────────────────────────────
  app.use("/api/*", accountMiddleware());

  app.route("/api/v1/me", createMeRoutes());
  app.route("/api/v1/categories", createCategoryRoutes());
  app.route("/api/v1/transactions", createTransactionRoutes());
  app.route("/api/v1/reports", createReportRoutes());
  app.route("/api/v1/debts", createDebtRoutes());
  app.route("/api/v1/splits", createSplitRoutes());
  app.route("/api/v1/flows", createFlowRoutes());

  return app;
}
