/**
 * Debt routes.
 *
 * POST /api/v1/debts                              — Record a debt with another user
 * GET  /api/v1/debts                              — Caller's debts (?all=true includes settled)
 * GET  /api/v1/debts/summary                      — Unsettled totals per counterparty
 * GET  /api/v1/debts/net/:counterparty            — Net position (?base=EUR|USD)
 * POST /api/v1/debts/net/:counterparty/cancel     — Replace mutual debts with one net debt
 * POST /api/v1/debts/:id/settle                   — Settle one debt
 *
 * Counterparties are addressed by external id.
 */

import { Hono } from "hono";
import { formatDebtSummary, formatNetCalculation } from "@coinpurse/flows";
import type { AppEnv } from "../types/api-contract.js";
import {
  CancelMutualDebtsSchema,
  CreateDebtSchema,
  DebtSummaryQuerySchema,
  ListDebtsQuerySchema,
  NetQuerySchema,
} from "../types/dto.js";
import { parseJsonBody, parseQuery } from "../middleware/validate.js";

export function createDebtRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/", async (c) => {
    const body = await parseJsonBody(c, CreateDebtSchema);
    const debt = await c.get("service").createDebt(c.get("account").id, body);
    return c.json({ data: debt }, 201);
  });

  routes.get("/", (c) => {
    const query = parseQuery(c, ListDebtsQuerySchema);
    return c.json({ data: c.get("service").getDebts(c.get("account").id, query.all) });
  });

  routes.get("/summary", (c) => {
    const query = parseQuery(c, DebtSummaryQuerySchema);
    const summary = c.get("service").getDebtSummary(c.get("account").id, query.currency);
    return query.format === "text" ? c.text(formatDebtSummary(summary)) : c.json({ data: summary });
  });

  routes.get("/net/:counterparty", (c) => {
    const service = c.get("service");
    const account = c.get("account");
    const query = parseQuery(c, NetQuerySchema);
    const { counterparty, calculation } = service.calculateNet(
      account.id,
      c.req.param("counterparty"),
      query.base,
    );

    if (query.format === "text") {
      const names = { a: service.displayName(account), b: service.displayName(counterparty) };
      return c.text(formatNetCalculation(calculation, names));
    }
    return c.json({ data: calculation });
  });

  routes.post("/net/:counterparty/cancel", async (c) => {
    const body = await parseJsonBody(c, CancelMutualDebtsSchema);
    const result = await c
      .get("service")
      .cancelMutualDebts(c.get("account").id, c.req.param("counterparty"), body.base);
    return c.json({ data: result });
  });

  routes.post("/:id/settle", (c) => {
    const result = c.get("service").settleDebt(c.req.param("id"), c.get("account").id);
    return c.json({ data: result });
  });

  return routes;
}
