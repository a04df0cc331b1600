/**
 * Split bill route.
 *
 * POST /api/v1/splits — The caller paid the whole bill; the counterparty
 * owes their share.
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { SplitBillSchema } from "../types/dto.js";
import { parseJsonBody } from "../middleware/validate.js";

export function createSplitRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/", async (c) => {
    const body = await parseJsonBody(c, SplitBillSchema);
    const result = await c.get("service").splitBill(c.get("account").id, body);
    return c.json({ data: result }, 201);
  });

  return routes;
}
