/**
 * Input Validation Helpers
 *
 * Zod-based request parsing for Hono routes. On failure the caller gets a
 * ready structured 400 response to return; on success the parsed data.
 */

import type { Context } from "hono";
import type { z } from "zod";
import { apiError } from "../lib/errors.ts";

export type Parsed<T> =
  | { success: true; data: T }
  | { success: false; response: Response };

function issuesOf(error: z.ZodError): Array<{ path: string; message: string }> {
  return error.issues.map((i) => ({
    path: i.path.map(String).join("."),
    message: i.message,
  }));
}

/**
 * Parse the JSON request body against `schema`.
 */
export async function parseJsonBody<T>(c: Context, schema: z.ZodType<T>): Promise<Parsed<T>> {
  let body: unknown;
  try {
    body = await c.req.json();
  } catch {
    return {
      success: false,
      response: apiError(c, "INVALID_JSON", "Request body must be valid JSON", {
        issues: [{ path: "body", message: "Failed to parse JSON" }],
      }),
    };
  }

  const result = schema.safeParse(body);
  if (!result.success) {
    return {
      success: false,
      response: apiError(c, "VALIDATION_FAILED", "Validation failed", {
        issues: issuesOf(result.error),
      }),
    };
  }
  return { success: true, data: result.data };
}

/**
 * Parse query string parameters against `schema`.
 */
export function parseQuery<T>(c: Context, schema: z.ZodType<T>): Parsed<T> {
  const result = schema.safeParse(c.req.query());
  if (!result.success) {
    return {
      success: false,
      response: apiError(c, "VALIDATION_FAILED", "Invalid query parameters", {
        issues: issuesOf(result.error),
      }),
    };
  }
  return { success: true, data: result.data };
}
