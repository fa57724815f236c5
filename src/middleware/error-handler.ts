/**
 * Global Error Handler Middleware
 *
 * Catches unhandled errors in any route and returns a consistent
 * structured JSON response. Also logs errors with timestamps for
 * debugging.
 */

import type { Context } from "hono";
import type { ContentfulStatusCode } from "hono/utils/http-status";
import { ZodError } from "zod";
import { AppError } from "../lib/errors.ts";

// ---------------------------------------------------------------------------
// Error response type
// ---------------------------------------------------------------------------

export interface StructuredError {
  error: string;
  code: string;
  status: ContentfulStatusCode;
  details?: unknown;
}

// ---------------------------------------------------------------------------
// Error mapper: known error types → structured response
// ---------------------------------------------------------------------------

function toStatus(code: number): ContentfulStatusCode {
  switch (code) {
    case 400:
    case 401:
    case 404:
    case 409:
    case 422:
    case 503:
      return code;
    default:
      return 500;
  }
}

export function mapErrorToResponse(err: unknown): StructuredError {
  if (err instanceof AppError) {
    // Repository causes stay in the logs
    const exposeDetails = err.statusCode < 500 && err.details !== undefined;
    return {
      error: err.message,
      code: err.errorCode,
      status: toStatus(err.statusCode),
      ...(exposeDetails && { details: err.details }),
    };
  }

  if (err instanceof ZodError) {
    return {
      error: "Validation failed",
      code: "VALIDATION_FAILED",
      status: 400,
      details: {
        issues: err.issues.map((i) => ({
          path: i.path.map(String).join("."),
          message: i.message,
        })),
      },
    };
  }

  if (err instanceof SyntaxError && err.message.includes("JSON")) {
    return {
      error: "Invalid request body",
      code: "INVALID_JSON",
      status: 400,
    };
  }

  return {
    error: "Internal server error",
    code: "INTERNAL_ERROR",
    status: 500,
  };
}

// ---------------------------------------------------------------------------
// Logging helper
// ---------------------------------------------------------------------------

function logError(err: unknown, path: string, method: string): void {
  const timestamp = new Date().toISOString();
  const errMsg =
    err instanceof Error ? `${err.name}: ${err.message}` : String(err);
  const stack = err instanceof Error ? err.stack : undefined;

  console.error(
    JSON.stringify({
      level: "error",
      timestamp,
      method,
      path,
      error: errMsg,
      ...(stack && { stack }),
    }),
  );
}

// ---------------------------------------------------------------------------
// Hono onError handler
// ---------------------------------------------------------------------------

/**
 * Global error handler for Hono's app.onError().
 *
 * Client errors (4xx) are answered without logging; everything else is
 * logged once here.
 */
export function globalErrorHandler(err: Error, c: Context): Response {
  const structured = mapErrorToResponse(err);

  if (structured.status >= 500) {
    logError(err, c.req.path, c.req.method);
  }

  return c.json(structured, structured.status);
}

// ---------------------------------------------------------------------------
// 404 Not Found handler
// ---------------------------------------------------------------------------

/**
 * Global 404 handler for Hono's app.notFound().
 */
export function notFoundHandler(c: Context): Response {
  return c.json(
    {
      error: `Route ${c.req.method} ${c.req.path} not found`,
      code: "NOT_FOUND",
      status: 404,
    },
    404,
  );
}
