/**
 * Category routes.
 *
 * GET   /api/v1/categories              — List (?flowKind=EXPENSE|INCOME&includeArchived=true)
 * POST  /api/v1/categories              — Create a custom category
 * PATCH /api/v1/categories/:id          — Rename or change the icon
 * POST  /api/v1/categories/:id/archive  — Hide from lists and flows
 * POST  /api/v1/categories/:id/unarchive
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import {
  CategoryParamsSchema,
  CreateCategorySchema,
  ListCategoriesQuerySchema,
  UpdateCategorySchema,
} from "../types/dto.js";
import { parseJsonBody, parseParams, parseQuery } from "../middleware/validate.js";

export function createCategoryRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", (c) => {
    const query = parseQuery(c, ListCategoriesQuerySchema);
    const categories = c
      .get("service")
      .listCategories(c.get("account").id, query.flowKind, query.includeArchived);
    return c.json({ data: categories });
  });

  routes.post("/", async (c) => {
    const body = await parseJsonBody(c, CreateCategorySchema);
    const category = c.get("service").createCategory(c.get("account").id, body);
    return c.json({ data: category }, 201);
  });

  routes.patch("/:id", async (c) => {
    const { id } = parseParams(c, CategoryParamsSchema);
    const body = await parseJsonBody(c, UpdateCategorySchema);
    const category = c.get("service").updateCategory(c.get("account").id, id, body);
    return c.json({ data: category });
  });

  routes.post("/:id/archive", (c) => {
    const { id } = parseParams(c, CategoryParamsSchema);
    return c.json({ data: c.get("service").archiveCategory(c.get("account").id, id) });
  });

  routes.post("/:id/unarchive", (c) => {
    const { id } = parseParams(c, CategoryParamsSchema);
    return c.json({ data: c.get("service").unarchiveCategory(c.get("account").id, id) });
  });

  return routes;
}
