/**
 * Zod request parsing.
 *
 * Route handlers call these with a schema and get the parsed value back
 * with its type; failures throw RequestValidationError, which the error
 * handler answers with 400 and the list of issues.
 */

import type { Context } from "hono";
import type { ZodError, ZodType, ZodTypeDef } from "zod";

export interface ValidationIssue {
  readonly path: string;
  readonly message: string;
}

export class RequestValidationError extends Error {
  readonly issues: readonly ValidationIssue[];

  constructor(message: string, issues: readonly ValidationIssue[] = []) {
    super(message);
    this.name = "RequestValidationError";
    this.issues = issues;
  }
}

/**
 * Parse the JSON request body. An empty body counts as `{}`.
 */
export async function parseJsonBody<T>(
  c: Context,
  schema: ZodType<T, ZodTypeDef, unknown>,
): Promise<T> {
  const raw = await c.req.text();
  let body: unknown = {};
  if (raw.trim() !== "") {
    try {
      body = JSON.parse(raw);
    } catch {
      throw new RequestValidationError("Invalid JSON in request body");
    }
  }

  const result = schema.safeParse(body);
  if (!result.success) {
    throw new RequestValidationError("Request body validation failed", formatZodErrors(result.error));
  }
  return result.data;
}

/**
 * Parse the query string.
 */
export function parseQuery<T>(c: Context, schema: ZodType<T, ZodTypeDef, unknown>): T {
  const result = schema.safeParse(c.req.query());
  if (!result.success) {
    throw new RequestValidationError("Invalid query parameters", formatZodErrors(result.error));
  }
  return result.data;
}

/**
 * Parse the route's path parameters, e.g. a numeric `:id`.
 */
export function parseParams<T>(c: Context, schema: ZodType<T, ZodTypeDef, unknown>): T {
  const result = schema.safeParse(c.req.param());
  if (!result.success) {
    throw new RequestValidationError("Invalid path parameters", formatZodErrors(result.error));
  }
  return result.data;
}

function formatZodErrors(error: ZodError): readonly ValidationIssue[] {
  return error.issues.map((issue) => ({
    path: issue.path.join("."),
    message: issue.message,
  }));
}
