/**
 * Account middleware.
 *
 * Resolves the caller from X-External-Id (required) and X-Display-Name
 * (optional), creating the account on first contact.
 */

import type { MiddlewareHandler } from "hono";
import { FinanceError } from "@coinpurse/types";
import type { AppEnv } from "../types/api-contract.js";

export const EXTERNAL_ID_HEADER = "X-External-Id";
export const DISPLAY_NAME_HEADER = "X-Display-Name";

const MAX_EXTERNAL_ID_LENGTH = 64;

export function accountMiddleware(): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const externalId = c.req.header(EXTERNAL_ID_HEADER)?.trim() ?? "";
    if (externalId === "") {
      throw new FinanceError("VALIDATION_ERROR", `${EXTERNAL_ID_HEADER} header is required`);
    }
    if (externalId.length > MAX_EXTERNAL_ID_LENGTH) {
      throw new FinanceError(
        "VALIDATION_ERROR",
        `${EXTERNAL_ID_HEADER} must be at most ${MAX_EXTERNAL_ID_LENGTH} characters`,
      );
    }

    const account = c.get("service").resolveAccount(externalId, c.req.header(DISPLAY_NAME_HEADER));
    c.set("account", account);
    await next();
  };
}
