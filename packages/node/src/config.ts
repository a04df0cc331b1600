/**
 * @coinpurse/node — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import { z } from "zod";
import { isCurrencyCode } from "@coinpurse/types";
import type { Currency } from "@coinpurse/types";
import { DEFAULT_FX_API_URL, DEFAULT_FX_TIMEOUT_MS, DEFAULT_RATE_TTL_MS } from "@coinpurse/fx";
import { DEFAULT_FLOW_TTL_MS } from "@coinpurse/flows";

// =============================================================================
// Schema
// =============================================================================

export const ConfigSchema = z
  .object({
    PORT: z.coerce.number().int().min(1).max(65535).default(3000),
    HOST: z.string().default("0.0.0.0"),
    LOG_LEVEL: z
      .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
      .default("info"),
    NODE_ENV: z
      .enum(["development", "production", "test"])
      .default("development"),

    // Storage
    DATABASE_PATH: z.string().min(1).default("./data/coinpurse.db"),

    // Exchange rates
    FX_API_URL: z.string().url().default(DEFAULT_FX_API_URL),
    FX_API_KEY: z.string().min(1).optional(),
    FX_TIMEOUT_MS: z.coerce.number().int().min(1).default(DEFAULT_FX_TIMEOUT_MS),
    FX_CACHE_TTL_MS: z.coerce.number().int().min(1000).default(DEFAULT_RATE_TTL_MS),

    // Domain defaults
    DEFAULT_CURRENCY: z
      .string()
      .transform((v) => v.trim().toUpperCase())
      .refine(isCurrencyCode, "DEFAULT_CURRENCY must be a three-letter code")
      .default("RSD"),
    SUPPORTED_CURRENCIES: z.string().default("RSD,EUR,USD,CHF,GBP"),

    // Conversation flows
    FLOW_TTL_MS: z.coerce.number().int().min(1000).default(DEFAULT_FLOW_TTL_MS),
  })
  .superRefine((config, ctx) => {
    if (config.NODE_ENV === "production" && config.FX_API_KEY === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["FX_API_KEY"],
        message: "FX_API_KEY is required in production",
      });
    }
  });

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// Currency List Parsing
// =============================================================================

/**
 * Parse the SUPPORTED_CURRENCIES env var.
 *
 * Format: "RSD,EUR,USD". Codes are upper-cased and de-duplicated in order.
 */
export function parseSupportedCurrencies(raw: string): readonly Currency[] {
  const currencies: Currency[] = [];

  for (const entry of raw.split(",")) {
    const code = entry.trim().toUpperCase();
    if (code === "") {
      continue;
    }
    if (!isCurrencyCode(code)) {
      throw new Error(
        `Invalid SUPPORTED_CURRENCIES entry: "${entry.trim()}". Expected a three-letter code`,
      );
    }
    if (!currencies.includes(code)) {
      currencies.push(code);
    }
  }

  if (currencies.length === 0) {
    throw new Error("SUPPORTED_CURRENCIES must name at least one currency");
  }
  return currencies;
}

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if required env vars are missing or invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  return ConfigSchema.parse(env);
}
