/**
 * @coinpurse/fx — ExchangeRate-API client.
 *
 * Wraps native fetch() with:
 * - Timeout handling (AbortController)
 * - Response shape validation
 * - Failure normalisation: every error becomes `{ ok: false, reason }`
 *
 * Endpoint: GET {baseUrl}/{apiKey}/pair/{FROM}/{TO}
 * Success body: { "result": "success", "conversion_rate": 117.2 }
 */

import type { Currency } from "@coinpurse/types";
import type { RateApi, RateFetchResult } from "./types.js";

export const DEFAULT_FX_API_URL = "https://v6.exchangerate-api.com/v6";
export const DEFAULT_FX_TIMEOUT_MS = 10_000;

export interface ExchangeRateApiClientOptions {
  readonly apiKey: string;
  readonly baseUrl?: string | undefined;
  readonly timeoutMs?: number | undefined;
  /** Custom fetch function for testing */
  readonly fetchFn?: typeof fetch | undefined;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

/**
 * Extract the conversion rate from a response body.
 */
function readConversionRate(body: unknown): RateFetchResult {
  if (!isRecord(body)) {
    return { ok: false, reason: "Response body is not an object" };
  }
  if (body["result"] !== "success") {
    const errorType = body["error-type"];
    return {
      ok: false,
      reason: typeof errorType === "string" ? `API error: ${errorType}` : "API did not report success",
    };
  }
  const rate = body["conversion_rate"];
  if (typeof rate !== "number" || !Number.isFinite(rate)) {
    return { ok: false, reason: "Response has no numeric conversion_rate" };
  }
  return { ok: true, rate };
}

export class ExchangeRateApiClient implements RateApi {
  private readonly baseUrl: string;
  private readonly apiKey: string;
  private readonly timeout: number;
  private readonly fetchFn: typeof fetch;

  constructor(options: ExchangeRateApiClientOptions) {
    // Strip trailing slash
    this.baseUrl = (options.baseUrl ?? DEFAULT_FX_API_URL).replace(/\/+$/, "");
    this.apiKey = options.apiKey;
    this.timeout = options.timeoutMs ?? DEFAULT_FX_TIMEOUT_MS;
    this.fetchFn = options.fetchFn ?? globalThis.fetch;
  }

  async fetchRate(from: Currency, to: Currency): Promise<RateFetchResult> {
    const url = `${this.baseUrl}/${encodeURIComponent(this.apiKey)}/pair/${from}/${to}`;

    // The timer covers the body read as well as the response headers
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeout);

    try {
      return await this.request(url, controller.signal);
    } catch (error) {
      if (controller.signal.aborted) {
        return { ok: false, reason: `Request timed out after ${this.timeout}ms` };
      }
      return { ok: false, reason: error instanceof Error ? error.message : "Network error" };
    } finally {
      clearTimeout(timeoutId);
    }
  }

  private async request(url: string, signal: AbortSignal): Promise<RateFetchResult> {
    const response = await this.fetchFn(url, {
      method: "GET",
      headers: { Accept: "application/json" },
      signal,
    });

    if (!response.ok) {
      return { ok: false, reason: `HTTP ${response.status}` };
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      if (signal.aborted) {
        throw error;
      }
      return { ok: false, reason: "Response body is not valid JSON" };
    }

    return readConversionRate(body);
  }
}
