import { describe, it, expect } from "vitest";
import { FinanceError, isFinanceError, userMessage } from "../src/errors.js";

describe("FinanceError", () => {
  it("carries a code and a name", () => {
    const err = new FinanceError("NOT_FOUND", "Transaction abc not found");
    expect(err).toBeInstanceOf(Error);
    expect(err.code).toBe("NOT_FOUND");
    expect(err.name).toBe("FinanceError");
    expect(err.message).toBe("Transaction abc not found");
  });

  it("is recognised by isFinanceError", () => {
    expect(isFinanceError(new FinanceError("CONFLICT", "x"))).toBe(true);
    expect(isFinanceError(new Error("x"))).toBe(false);
    expect(isFinanceError({ code: "NOT_FOUND", message: "x" })).toBe(false);
  });
});

describe("userMessage", () => {
  it("merges NOT_FOUND and ACCESS_DENIED into one message", () => {
    const notFound = userMessage(new FinanceError("NOT_FOUND", "Debt d-1 not found"));
    const denied = userMessage(new FinanceError("ACCESS_DENIED", "Debt d-1 belongs to others"));
    expect(notFound).toBe("Not found or access denied");
    expect(denied).toBe(notFound);
  });

  it("reports unavailable rates as an unsupported currency", () => {
    const err = new FinanceError("RATE_UNAVAILABLE", "XYZ -> EUR");
    expect(userMessage(err)).toBe("Currency not supported: XYZ -> EUR");
  });

  it("passes validation and invalid-operation messages through", () => {
    expect(userMessage(new FinanceError("VALIDATION_ERROR", "Amount must be positive"))).toBe(
      "Amount must be positive",
    );
    expect(
      userMessage(new FinanceError("INVALID_OPERATION", "A reversal cannot be reversed")),
    ).toBe("A reversal cannot be reversed");
  });

  it("has fixed texts for settled debts and conflicts", () => {
    expect(userMessage(new FinanceError("ALREADY_SETTLED", "d-1"))).toBe("Debt is already settled");
    expect(userMessage(new FinanceError("CONFLICT", "d-1"))).toBe(
      "The records changed while processing, please try again",
    );
  });
});
