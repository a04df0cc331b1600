/**
 * @coinpurse/ledger — Deterministic monetary arithmetic.
 *
 * All arithmetic uses bigint internally for precision.
 * String amounts are converted to/from bigint via decimal scaling.
 *
 * Rules:
 * - No floating-point arithmetic on stored values
 * - Rounding is half-up (away from zero on ties)
 * - Amounts must be valid decimal strings
 * - Zero runtime dependencies
 */

import { FinanceError, MINOR_DECIMALS, RATE_DECIMALS, REFERENCE_DECIMALS } from "@coinpurse/types";
import type { Currency, FrozenAmount } from "@coinpurse/types";

const DECIMAL_PATTERN = /^-?\d+(\.\d+)?$/;

// ─── Scaling ─────────────────────────────────────────────────────────────

/**
 * Parse a decimal string amount into a bigint scaled by decimals.
 *
 * "100.50" with decimals=2 → 10050n
 * "100" with decimals=6 → 100000000n
 * "-50.25" with decimals=2 → -5025n
 */
export function parseAmount(amount: string, decimals: number): bigint {
  const trimmed = amount.trim();

  if (!DECIMAL_PATTERN.test(trimmed)) {
    throw new FinanceError("VALIDATION_ERROR", `Invalid amount format: "${trimmed}"`);
  }

  const negative = trimmed.startsWith("-");
  const abs = negative ? trimmed.slice(1) : trimmed;
  const parts = abs.split(".");
  const intPart = parts[0] ?? "0";
  const fracPart = parts[1] ?? "";

  if (fracPart.length > decimals) {
    throw new FinanceError(
      "VALIDATION_ERROR",
      `Amount "${trimmed}" has ${String(fracPart.length)} decimal places, but at most ${String(decimals)} are allowed`,
    );
  }

  const value = BigInt(intPart + fracPart.padEnd(decimals, "0"));
  return negative ? -value : value;
}

/**
 * Convert a scaled bigint back to a decimal string.
 *
 * 10050n with decimals=2 → "100.50"
 * 100000000n with decimals=6 → "100.000000"
 * -5025n with decimals=2 → "-50.25"
 */
export function formatAmount(scaled: bigint, decimals: number): string {
  if (decimals === 0) {
    return scaled.toString();
  }

  const negative = scaled < 0n;
  const abs = negative ? -scaled : scaled;
  const str = abs.toString().padStart(decimals + 1, "0");
  const intPart = str.slice(0, str.length - decimals);
  const fracPart = str.slice(str.length - decimals);
  const result = `${intPart}.${fracPart}`;

  return negative ? `-${result}` : result;
}

/**
 * Change the scale of a bigint, rounding half-up when digits are dropped.
 *
 * rescale(12345n, 3, 2) → 1235n   (12.345 → 12.35)
 * rescale(-12345n, 3, 2) → -1235n
 * rescale(5n, 0, 2) → 500n
 */
export function rescale(scaled: bigint, fromDecimals: number, toDecimals: number): bigint {
  if (toDecimals >= fromDecimals) {
    return scaled * 10n ** BigInt(toDecimals - fromDecimals);
  }

  const divisor = 10n ** BigInt(fromDecimals - toDecimals);
  const negative = scaled < 0n;
  const abs = negative ? -scaled : scaled;
  let quotient = abs / divisor;
  if ((abs % divisor) * 2n >= divisor) {
    quotient += 1n;
  }
  return negative ? -quotient : quotient;
}

/**
 * Round a decimal string of any precision to `decimals` digits, half-up.
 *
 * roundDecimal("2.675", 2) → "2.68"
 * roundDecimal("0.0085321", 6) → "0.008532"
 */
export function roundDecimal(amount: string, decimals: number): string {
  const trimmed = amount.trim();
  if (!DECIMAL_PATTERN.test(trimmed)) {
    throw new FinanceError("VALIDATION_ERROR", `Invalid amount format: "${trimmed}"`);
  }
  const fracLength = trimmed.split(".")[1]?.length ?? 0;
  const scaled = parseAmount(trimmed, fracLength);
  return formatAmount(rescale(scaled, fracLength, decimals), decimals);
}

// ─── Minor units ─────────────────────────────────────────────────────────

/**
 * Render a JS number as a plain decimal string (no exponent).
 */
function numberToDecimal(value: number): string {
  if (!Number.isFinite(value)) {
    throw new FinanceError("VALIDATION_ERROR", `Invalid amount: ${String(value)}`);
  }
  const text = String(value);
  return /e/i.test(text) ? value.toFixed(20) : text;
}

/**
 * Convert a major-unit amount into minor units, rounding half-up.
 *
 * "12.345" → 1235, 10 → 1000, "0.004" → 0
 *
 * Throws VALIDATION_ERROR for malformed input or values beyond the safe
 * integer range. Does not check the sign.
 */
export function toMinorUnits(amountMajor: string | number): number {
  const text = typeof amountMajor === "number" ? numberToDecimal(amountMajor) : amountMajor.trim();
  if (!DECIMAL_PATTERN.test(text)) {
    throw new FinanceError("VALIDATION_ERROR", `Invalid amount format: "${text}"`);
  }

  const minor = parseAmount(roundDecimal(text, MINOR_DECIMALS), MINOR_DECIMALS);
  if (minor > BigInt(Number.MAX_SAFE_INTEGER) || minor < -BigInt(Number.MAX_SAFE_INTEGER)) {
    throw new FinanceError("VALIDATION_ERROR", `Amount is too large: "${text}"`);
  }
  return Number(minor);
}

/**
 * Parse a user-facing amount that must be strictly positive after
 * rounding to minor units.
 */
export function toPositiveMinorUnits(amountMajor: string | number): number {
  const minor = toMinorUnits(amountMajor);
  if (minor <= 0) {
    throw new FinanceError("VALIDATION_ERROR", "Amount must be greater than zero");
  }
  return minor;
}

/** 1050 → "10.50" */
export function formatMinor(amountMinor: number | bigint): string {
  return formatAmount(BigInt(amountMinor), MINOR_DECIMALS);
}

// ─── Reference amounts ───────────────────────────────────────────────────

/**
 * amountMinor / 100 × rate, exact, with REFERENCE_DECIMALS digits.
 *
 * (1050, "0.008532") → "0.08958600"
 */
export function convertMinor(amountMinor: number, rate: string): string {
  const scaled = BigInt(amountMinor) * parseAmount(rate, RATE_DECIMALS);
  return formatAmount(scaled, REFERENCE_DECIMALS);
}

/**
 * Build the frozen monetary part of a transaction or debt.
 */
export function freezeAmount(
  amountMinor: number,
  currency: Currency,
  rates: { readonly eur: string; readonly usd: string },
): FrozenAmount {
  return {
    amountMinor,
    currency,
    amountEur: convertMinor(amountMinor, rates.eur),
    amountUsd: convertMinor(amountMinor, rates.usd),
    fxRateToEur: rates.eur,
    fxRateToUsd: rates.usd,
  };
}

/**
 * Frozen amount in one reference currency, as a REFERENCE_DECIMALS bigint.
 */
export function referenceAmount(frozen: FrozenAmount, reference: "EUR" | "USD"): bigint {
  return parseAmount(reference === "EUR" ? frozen.amountEur : frozen.amountUsd, REFERENCE_DECIMALS);
}

/**
 * Convert a REFERENCE_DECIMALS amount with a RATE_DECIMALS rate and
 * round the product half-up to MINOR_DECIMALS.
 *
 * (89586000n, "117.200000") → "104.99"  (0.89586 × 117.2 = 104.994792)
 */
export function convertReference(referenceScaled: bigint, rate: string): string {
  const product = referenceScaled * parseAmount(rate, RATE_DECIMALS);
  return formatAmount(rescale(product, REFERENCE_DECIMALS + RATE_DECIMALS, MINOR_DECIMALS), MINOR_DECIMALS);
}
