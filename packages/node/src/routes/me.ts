/**
 * Account routes.
 *
 * GET   /api/v1/me              — The caller's account
 * PATCH /api/v1/me/preferences  — Default and report currency
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { UpdatePreferencesSchema } from "../types/dto.js";
import { parseJsonBody } from "../middleware/validate.js";

export function createMeRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", (c) => {
    return c.json({ data: c.get("account") });
  });

  routes.patch("/preferences", async (c) => {
    const body = await parseJsonBody(c, UpdatePreferencesSchema);
    const account = c.get("service").updatePreferences(c.get("account").id, body);
    return c.json({ data: account });
  });

  return routes;
}
