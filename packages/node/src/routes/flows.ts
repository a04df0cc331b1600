/**
 * Conversation flow routes.
 *
 * POST   /api/v1/flows        — Start an expense, income or split flow
 * GET    /api/v1/flows        — The pending flow, or null
 * POST   /api/v1/flows/input  — Answer the current step
 * DELETE /api/v1/flows        — Abandon the pending flow
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { FlowInputSchema, StartFlowSchema } from "../types/dto.js";
import { parseJsonBody } from "../middleware/validate.js";

export function createFlowRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/", async (c) => {
    const body = await parseJsonBody(c, StartFlowSchema);
    const state = c.get("service").startFlow(c.get("account").id, body.kind);
    return c.json({ data: state }, 201);
  });

  routes.get("/", (c) => {
    return c.json({ data: c.get("service").getFlow(c.get("account").id) ?? null });
  });

  routes.post("/input", async (c) => {
    const body = await parseJsonBody(c, FlowInputSchema);
    const result = await c.get("service").submitFlowInput(c.get("account").id, body.text);
    return c.json({ data: result }, result.status === "complete" ? 201 : 200);
  });

  routes.delete("/", (c) => {
    return c.json({ data: { cancelled: c.get("service").cancelFlow(c.get("account").id) } });
  });

  return routes;
}
