/**
 * Runtime type guard tests for @coinpurse/types
 *
 * Validates that guards narrow correctly for valid inputs
 * and reject malformed inputs at system boundaries.
 */
import { describe, it, expect } from "vitest";
import {
  isCurrencyCode,
  isReferenceCurrency,
  isTransactionKind,
  isFlowKind,
  isIsoDate,
  isDecimalString,
  isFrozenAmount,
} from "../src/guards.js";

// =============================================================================
// Currency guards
// =============================================================================

describe("isCurrencyCode", () => {
  it("accepts three upper-case letters", () => {
    expect(isCurrencyCode("RSD")).toBe(true);
    expect(isCurrencyCode("EUR")).toBe(true);
  });

  it("rejects lower case, wrong length and non-strings", () => {
    expect(isCurrencyCode("eur")).toBe(false);
    expect(isCurrencyCode("EU")).toBe(false);
    expect(isCurrencyCode("EURO")).toBe(false);
    expect(isCurrencyCode("E1R")).toBe(false);
    expect(isCurrencyCode(978)).toBe(false);
    expect(isCurrencyCode(null)).toBe(false);
  });
});

describe("isReferenceCurrency", () => {
  it("accepts only EUR and USD", () => {
    expect(isReferenceCurrency("EUR")).toBe(true);
    expect(isReferenceCurrency("USD")).toBe(true);
    expect(isReferenceCurrency("GBP")).toBe(false);
    expect(isReferenceCurrency(undefined)).toBe(false);
  });
});

// =============================================================================
// Kind guards
// =============================================================================

describe("isTransactionKind", () => {
  it("accepts the four ledger kinds", () => {
    for (const kind of ["EXPENSE", "INCOME", "REVERSAL", "SETTLEMENT"]) {
      expect(isTransactionKind(kind)).toBe(true);
    }
  });

  it("rejects unknown kinds", () => {
    expect(isTransactionKind("expense")).toBe(false);
    expect(isTransactionKind("TRANSFER")).toBe(false);
  });
});

describe("isFlowKind", () => {
  it("accepts only user-recordable kinds", () => {
    expect(isFlowKind("EXPENSE")).toBe(true);
    expect(isFlowKind("INCOME")).toBe(true);
    expect(isFlowKind("REVERSAL")).toBe(false);
    expect(isFlowKind("SETTLEMENT")).toBe(false);
  });
});

// =============================================================================
// Value guards
// =============================================================================

describe("isIsoDate", () => {
  it("accepts real calendar days", () => {
    expect(isIsoDate("2024-02-29")).toBe(true);
    expect(isIsoDate("2025-12-31")).toBe(true);
  });

  it("rejects impossible days and other shapes", () => {
    expect(isIsoDate("2025-02-29")).toBe(false);
    expect(isIsoDate("2025-13-01")).toBe(false);
    expect(isIsoDate("2025-1-01")).toBe(false);
    expect(isIsoDate("01.02.2025")).toBe(false);
    expect(isIsoDate(20250101)).toBe(false);
  });
});

describe("isDecimalString", () => {
  it("accepts signed decimals", () => {
    expect(isDecimalString("10")).toBe(true);
    expect(isDecimalString("-0.25")).toBe(true);
  });

  it("rejects exponents and blanks", () => {
    expect(isDecimalString("1e-7")).toBe(false);
    expect(isDecimalString("")).toBe(false);
    expect(isDecimalString(".5")).toBe(false);
  });
});

describe("isFrozenAmount", () => {
  const valid = {
    amountMinor: 1050,
    currency: "RSD",
    amountEur: "0.08957550",
    amountUsd: "0.09765000",
    fxRateToEur: "0.008531",
    fxRateToUsd: "0.009300",
  };

  it("accepts a complete frozen amount", () => {
    expect(isFrozenAmount(valid)).toBe(true);
  });

  it("rejects fractional minor units", () => {
    expect(isFrozenAmount({ ...valid, amountMinor: 10.5 })).toBe(false);
  });

  it("rejects numeric rates", () => {
    expect(isFrozenAmount({ ...valid, fxRateToEur: 0.008531 })).toBe(false);
  });

  it("rejects null", () => {
    expect(isFrozenAmount(null)).toBe(false);
  });
});
