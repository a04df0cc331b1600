/**
 * Hono application environment type.
 *
 * Defines the typed context variables available in all route handlers.
 * These are set by middleware and consumed by route handlers.
 */

import type { Account } from "@coinpurse/types";
import type { FinanceService } from "../services/finance-service.js";

/**
 * Hono environment type for the coinpurse app.
 *
 * Middleware populates Variables; route handlers read them via c.get().
 */
export interface AppEnv {
  Variables: {
    /** Unique request identifier (set by request-id middleware) */
    requestId: string;

    /** The finance service shared by all requests */
    service: FinanceService;

    /** Caller's account (set by account middleware on /api routes) */
    account: Account;
  };
}
