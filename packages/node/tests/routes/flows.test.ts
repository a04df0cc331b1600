/**
 * Conversation Flow Routes Tests
 *
 * Verifies:
 * - Step-by-step expense entry ending in a transaction
 * - Validation messages keep the step
 * - Split flow ending in a transaction and a debt
 * - Expiry and cancellation
 */

import { describe, it, expect } from "vitest";
import type { Hono } from "hono";
import { createTestApp, jsonRequest, withTwoUsers } from "../setup.js";
import type { AppEnv } from "../../src/types/api-contract.js";

function answer(app: Hono<AppEnv>, text: string): Promise<Response> | Response {
  return app.request(jsonRequest("/api/v1/flows/input", { method: "POST", body: { text } }));
}

async function answerAll(app: Hono<AppEnv>, inputs: readonly string[]): Promise<Response> {
  let last: Response | undefined;
  for (const text of inputs) {
    last = await answer(app, text);
  }
  if (last === undefined) {
    throw new Error("no inputs");
  }
  return last;
}

describe("/api/v1/flows", () => {
  it("walks an expense through to a transaction", async () => {
    const { app } = createTestApp();

    const start = await app.request(jsonRequest("/api/v1/flows", { method: "POST", body: { kind: "expense" } }));
    expect(start.status).toBe(201);
    expect(await start.json()).toEqual({
      data: {
        kind: "expense",
        step: "amount",
        accountId: 1,
        startedAt: "2026-03-15T10:00:00.000Z",
        updatedAt: "2026-03-15T10:00:00.000Z",
      },
    });

    const first = await answer(app, "12,5");
    expect(first.status).toBe(200);
    expect(await first.json()).toMatchObject({
      data: { status: "advance", state: { step: "currency", amount: "12.50" } },
    });

    const done = await answerAll(app, ["eur", "1", "-", "14.03"]);
    expect(done.status).toBe(201);
    expect(await done.json()).toMatchObject({
      data: {
        status: "complete",
        kind: "transaction",
        transaction: {
          id: "id-1",
          kind: "EXPENSE",
          amountMinor: 1250,
          currency: "EUR",
          categoryId: 1,
          note: null,
          atTime: "2026-03-14T12:00:00.000Z",
        },
      },
    });

    const pending = await app.request(jsonRequest("/api/v1/flows"));
    expect(await pending.json()).toEqual({ data: null });
  });

  it("keeps the step on invalid input", async () => {
    const { app } = createTestApp();
    await app.request(jsonRequest("/api/v1/flows", { method: "POST", body: { kind: "income" } }));

    const res = await answer(app, "abc");

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      data: { status: "error", message: 'Invalid amount format: "abc"', state: { kind: "income", step: "amount" } },
    });
  });

  it("rejects a future date", async () => {
    const { app } = createTestApp();
    await app.request(jsonRequest("/api/v1/flows", { method: "POST", body: { kind: "expense" } }));

    const res = await answerAll(app, ["5", "EUR", "-", "-", "16.03"]);

    expect(await res.json()).toMatchObject({
      data: { status: "error", message: "Date cannot be in the future", state: { step: "date" } },
    });
  });

  it("walks a split through to a transaction and a debt", async () => {
    const { app } = withTwoUsers();
    await app.request(jsonRequest("/api/v1/flows", { method: "POST", body: { kind: "split" } }));

    const res = await answerAll(app, ["3000", "RSD", "1", "half", "marko", "Dinner"]);

    expect(res.status).toBe(201);
    expect(await res.json()).toMatchObject({
      data: {
        status: "complete",
        kind: "split",
        split: {
          transaction: { id: "id-1", amountMinor: 300000, note: "Split bill: Dinner" },
          debt: { id: "id-2", creditorId: 1, debtorId: 2, amountMinor: 150000 },
        },
      },
    });
  });

  it("answers 422 without an active flow", async () => {
    const { app } = createTestApp();

    const res = await answer(app, "10");

    expect(res.status).toBe(422);
    expect(await res.json()).toEqual({
      error: { code: "INVALID_OPERATION", message: "There is no active flow; start one first" },
    });
  });

  it("drops a flow left idle past its TTL", async () => {
    const { app, clock } = createTestApp({ flowTtlMs: 60_000 });
    await app.request(jsonRequest("/api/v1/flows", { method: "POST", body: { kind: "expense" } }));
    clock.set("2026-03-15T10:01:00.001Z");

    const res = await answer(app, "10");

    expect(res.status).toBe(422);
  });

  it("cancels the pending flow", async () => {
    const { app } = createTestApp();
    await app.request(jsonRequest("/api/v1/flows", { method: "POST", body: { kind: "expense" } }));

    const first = await app.request(jsonRequest("/api/v1/flows", { method: "DELETE" }));
    const second = await app.request(jsonRequest("/api/v1/flows", { method: "DELETE" }));

    expect(await first.json()).toEqual({ data: { cancelled: true } });
    expect(await second.json()).toEqual({ data: { cancelled: false } });
  });
});
