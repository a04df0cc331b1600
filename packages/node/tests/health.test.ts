/**
 * Tests for health routes.
 */

import { describe, it, expect } from "vitest";
import { createTestApp } from "./setup.js";

describe("GET /health", () => {
  it("returns ok without an identity", async () => {
    const { app } = createTestApp();

    const res = await app.request("/health");

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ status: "ok", timestamp: "2026-03-15T10:00:00.000Z" });
  });
});

describe("GET /ready", () => {
  it("is ready while the service is open", async () => {
    const { app } = createTestApp();

    const res = await app.request("/ready");

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ status: "ready", timestamp: "2026-03-15T10:00:00.000Z" });
  });

  it("answers 503 once the service is closed", async () => {
    const { app, service } = createTestApp();
    service.close();

    const res = await app.request("/ready");

    expect(res.status).toBe(503);
    expect(await res.json()).toMatchObject({ status: "not_ready" });
  });
});
