/**
 * @coinpurse/node — Entry point.
 *
 * Loads config, opens the finance service, starts the HTTP server and
 * handles graceful shutdown.
 */

import { serve } from "@hono/node-server";
import pino from "pino";
import type { FxEvent } from "@coinpurse/fx";
import { loadConfig, parseSupportedCurrencies } from "./config.js";
import { createApp } from "./app.js";
import { FinanceService } from "./services/finance-service.js";

function fxEventLevel(event: FxEvent): "debug" | "warn" | "error" {
  switch (event.type) {
    case "cache_hit":
    case "store_hit":
    case "api_fetch":
      return "debug";
    case "api_failure":
      return "warn";
    case "cache_error":
    case "store_write_failed":
      return "error";
  }
}

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = pino({
    level: config.LOG_LEVEL,
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });

  if (config.FX_API_KEY === undefined) {
    logger.warn("No FX_API_KEY configured; rates come from the local store only");
  }

  const fxLog = logger.child({ component: "fx" });
  const service = FinanceService.fromConfig(config, parseSupportedCurrencies(config.SUPPORTED_CURRENCIES), {
    onFxEvent: (event) => {
      fxLog[fxEventLevel(event)](event, `fx ${event.type}`);
    },
    onAccountCreated: (account) => {
      logger.info({ accountId: account.id }, "Account created");
    },
  });
  service.open();

  const app = createApp({
    service,
    logFn: (entry) => {
      logger.info(entry, `${entry.method} ${entry.path} ${entry.status}`);
    },
    onUnexpectedError: (err, c) => {
      logger.error({ err, requestId: c.get("requestId") }, "Unhandled error");
    },
  });

  const server = serve({
    fetch: app.fetch,
    port: config.PORT,
    hostname: config.HOST,
  });

  logger.info(
    { port: config.PORT, host: config.HOST, database: config.DATABASE_PATH },
    "coinpurse node started",
  );

  // Graceful shutdown
  const shutdown = (signal: string): void => {
    logger.info({ signal }, "Shutdown signal received");
    server.close(() => {
      service.close();
      logger.info("Shutdown complete");
      process.exit(0);
    });
  };

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

main().catch((err: unknown) => {
  // eslint-disable-next-line no-console
  console.error("Fatal startup error:", err);
  process.exit(1);
});
