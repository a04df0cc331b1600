/**
 * Report routes.
 *
 * GET /api/v1/reports/monthly?year=&month=&currency=&format=
 * GET /api/v1/reports/range?start=&end=&currency=&format=
 */

import { Hono } from "hono";
import { formatReport } from "@coinpurse/flows";
import type { AppEnv } from "../types/api-contract.js";
import { MonthlyReportQuerySchema, RangeReportQuerySchema } from "../types/dto.js";
import { parseQuery } from "../middleware/validate.js";

export function createReportRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/monthly", async (c) => {
    const query = parseQuery(c, MonthlyReportQuerySchema);
    const report = await c
      .get("service")
      .getMonthlyReport(c.get("account").id, query.year, query.month, query.currency);
    return query.format === "text" ? c.text(formatReport(report)) : c.json({ data: report });
  });

  routes.get("/range", async (c) => {
    const query = parseQuery(c, RangeReportQuerySchema);
    const report = await c
      .get("service")
      .getRangeReport(c.get("account").id, query.start, query.end, query.currency);
    return query.format === "text" ? c.text(formatReport(report)) : c.json({ data: report });
  });

  return routes;
}
