/**
 * Health check routes.
 *
 * GET /health — Liveness probe (always 200 if server is running)
 * GET /ready  — Readiness probe (503 until the service is open)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";

export function createHealthRoutes(now: () => Date = () => new Date()): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/health", (c) => {
    return c.json({
      status: "ok",
      timestamp: now().toISOString(),
    });
  });

  routes.get("/ready", (c) => {
    const ready = c.get("service").isReady();
    return c.json(
      {
        status: ready ? "ready" : "not_ready",
        timestamp: now().toISOString(),
      },
      ready ? 200 : 503,
    );
  });

  return routes;
}
