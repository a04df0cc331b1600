/**
 * Account and Category Routes Tests
 *
 * Verifies:
 * - Accounts are created on first contact with seeded categories
 * - Display names follow the header
 * - Preferences update
 * - Category listing and creation
 * - Category rename, archive and unarchive
 */

import { describe, it, expect } from "vitest";
import { createTestApp, jsonRequest, withTwoUsers } from "../setup.js";

describe("GET /api/v1/me", () => {
  it("creates the account on first contact", async () => {
    const { app, created } = createTestApp();

    const res = await app.request(jsonRequest("/api/v1/me", { displayName: "  Ana  " }));

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      data: {
        id: 1,
        externalId: "ana",
        displayName: "Ana",
        defaultCurrency: "RSD",
        preferredReportCurrency: "RSD",
        createdAt: "2026-03-15T10:00:00.000Z",
      },
    });
    expect(created.map((a) => a.externalId)).toEqual(["ana"]);
  });

  it("reuses the account and takes over a new display name", async () => {
    const { app, created } = createTestApp();
    await app.request(jsonRequest("/api/v1/me", { displayName: "Ana" }));

    const res = await app.request(jsonRequest("/api/v1/me", { displayName: "Ana P." }));

    expect(await res.json()).toMatchObject({ data: { id: 1, displayName: "Ana P." } });
    expect(created).toHaveLength(1);
  });

  it("requires the external id header", async () => {
    const { app } = createTestApp();

    const res = await app.request(jsonRequest("/api/v1/me", { as: null }));

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: { code: "VALIDATION_ERROR", message: "X-External-Id header is required" },
    });
  });
});

describe("PATCH /api/v1/me/preferences", () => {
  it("updates both currencies", async () => {
    const { app } = createTestApp();

    const res = await app.request(
      jsonRequest("/api/v1/me/preferences", {
        method: "PATCH",
        body: { defaultCurrency: "eur", preferredReportCurrency: "USD" },
      }),
    );

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      data: { defaultCurrency: "EUR", preferredReportCurrency: "USD" },
    });
  });

  it("rejects an empty update", async () => {
    const { app } = createTestApp();

    const res = await app.request(jsonRequest("/api/v1/me/preferences", { method: "PATCH", body: {} }));

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: {
        code: "VALIDATION_ERROR",
        message: "Request body validation failed",
        details: { issues: [{ path: "", message: "Provide defaultCurrency or preferredReportCurrency" }] },
      },
    });
  });
});

describe("/api/v1/categories", () => {
  it("lists the seeded categories, filtered by kind", async () => {
    const { app } = createTestApp();

    const all = await app.request(jsonRequest("/api/v1/categories"));
    expect(await all.json()).toEqual({
      data: [
        { id: 1, accountId: 1, name: "Food", icon: "🍔", flowKind: "EXPENSE", isDefault: true, isArchived: false },
        { id: 2, accountId: 1, name: "Salary", icon: "💰", flowKind: "INCOME", isDefault: true, isArchived: false },
      ],
    });

    const income = (await (await app.request(jsonRequest("/api/v1/categories?flowKind=INCOME"))).json()) as {
      data: { name: string }[];
    };
    expect(income.data.map((c) => c.name)).toEqual(["Salary"]);
  });

  it("creates a custom category after the defaults", async () => {
    const { app } = createTestApp();

    const res = await app.request(
      jsonRequest("/api/v1/categories", {
        method: "POST",
        body: { name: " Books ", icon: "📚", flowKind: "EXPENSE" },
      }),
    );

    expect(res.status).toBe(201);
    expect(await res.json()).toEqual({
      data: { id: 3, accountId: 1, name: "Books", icon: "📚", flowKind: "EXPENSE", isDefault: false, isArchived: false },
    });

    const list = (await (await app.request(jsonRequest("/api/v1/categories?flowKind=EXPENSE"))).json()) as {
      data: { name: string }[];
    };
    expect(list.data.map((c) => c.name)).toEqual(["Food", "Books"]);
  });

  it("rejects a duplicate name regardless of case", async () => {
    const { app } = createTestApp();

    const res = await app.request(
      jsonRequest("/api/v1/categories", { method: "POST", body: { name: "food", icon: "🥗", flowKind: "EXPENSE" } }),
    );

    expect(res.status).toBe(422);
    expect(await res.json()).toEqual({
      error: { code: "INVALID_OPERATION", message: 'Category "food" already exists' },
    });
  });
});

describe("/api/v1/categories/:id", () => {
  it("renames a category and keeps its other fields", async () => {
    const { app } = createTestApp();

    const res = await app.request(
      jsonRequest("/api/v1/categories/1", { method: "PATCH", body: { name: " Groceries " } }),
    );

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      data: { id: 1, accountId: 1, name: "Groceries", icon: "🍔", flowKind: "EXPENSE", isDefault: true, isArchived: false },
    });
  });

  it("requires a name or an icon", async () => {
    const { app } = createTestApp();

    const res = await app.request(jsonRequest("/api/v1/categories/1", { method: "PATCH", body: {} }));

    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({
      error: { code: "VALIDATION_ERROR", message: "Request body validation failed" },
    });
  });

  it("rejects an id that is not a positive integer", async () => {
    const { app } = createTestApp();

    const res = await app.request(jsonRequest("/api/v1/categories/abc/archive", { method: "POST" }));

    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({
      error: { code: "VALIDATION_ERROR", message: "Invalid path parameters" },
    });
  });

  it("archives a category out of lists and new transactions, then restores it", async () => {
    const { app } = createTestApp();

    const archived = await app.request(jsonRequest("/api/v1/categories/1/archive", { method: "POST" }));
    expect(archived.status).toBe(200);
    expect(await archived.json()).toMatchObject({ data: { id: 1, isArchived: true } });

    const visible = (await (await app.request(jsonRequest("/api/v1/categories"))).json()) as {
      data: { name: string }[];
    };
    expect(visible.data.map((c) => c.name)).toEqual(["Salary"]);

    const everything = (await (
      await app.request(jsonRequest("/api/v1/categories?includeArchived=true"))
    ).json()) as { data: { name: string; isArchived: boolean }[] };
    expect(everything.data.map((c) => [c.name, c.isArchived])).toEqual([
      ["Food", true],
      ["Salary", false],
    ]);

    const rejected = await app.request(
      jsonRequest("/api/v1/transactions", {
        method: "POST",
        body: { kind: "EXPENSE", amount: "100", currency: "RSD", categoryId: 1 },
      }),
    );
    expect(rejected.status).toBe(422);
    expect(await rejected.json()).toEqual({
      error: { code: "INVALID_OPERATION", message: 'Category "Food" is archived' },
    });

    const restored = await app.request(jsonRequest("/api/v1/categories/1/unarchive", { method: "POST" }));
    expect(await restored.json()).toMatchObject({ data: { id: 1, isArchived: false } });
    const again = (await (await app.request(jsonRequest("/api/v1/categories"))).json()) as {
      data: { name: string }[];
    };
    expect(again.data.map((c) => c.name)).toEqual(["Food", "Salary"]);
  });

  it("hides another account's category", async () => {
    const { app } = withTwoUsers();

    const res = await app.request(
      jsonRequest("/api/v1/categories/1/archive", { method: "POST", as: "marko" }),
    );

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({
      error: { code: "NOT_FOUND", message: "Not found or access denied" },
    });
  });
});
