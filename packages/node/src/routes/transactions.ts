/**
 * Transaction routes.
 *
 * POST /api/v1/transactions                    — Record an expense or income
 * GET  /api/v1/transactions                    — History, newest first (?limit=&format=)
 * GET  /api/v1/transactions/recent-currencies  — Currency suggestions
 * GET  /api/v1/transactions/:id                — One transaction
 * POST /api/v1/transactions/:id/reverse        — Append a REVERSAL
 */

import { Hono } from "hono";
import { formatHistory } from "@coinpurse/flows";
import type { AppEnv } from "../types/api-contract.js";
import { CreateTransactionSchema, HistoryQuerySchema } from "../types/dto.js";
import { parseJsonBody, parseQuery } from "../middleware/validate.js";

export function createTransactionRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/", async (c) => {
    const body = await parseJsonBody(c, CreateTransactionSchema);
    const transaction = await c.get("service").createTransaction(c.get("account").id, body);
    return c.json({ data: transaction }, 201);
  });

  routes.get("/", (c) => {
    const service = c.get("service");
    const query = parseQuery(c, HistoryQuerySchema);
    const transactions = service.getHistory(c.get("account").id, query.limit);

    if (query.format === "text") {
      return c.text(formatHistory(transactions, (id) => service.findCategory(id)));
    }
    return c.json({ data: transactions });
  });

  routes.get("/recent-currencies", (c) => {
    return c.json({ data: c.get("service").getCurrencySuggestions(c.get("account").id) });
  });

  routes.get("/:id", (c) => {
    const transaction = c.get("service").getTransaction(c.req.param("id"), c.get("account").id);
    return c.json({ data: transaction });
  });

  routes.post("/:id/reverse", (c) => {
    const reversal = c.get("service").reverseTransaction(c.req.param("id"), c.get("account").id);
    return c.json({ data: reversal }, 201);
  });

  return routes;
}
