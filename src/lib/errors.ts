/**
 * Standardized Error Handling
 *
 * Typed application errors and the consistent error response format used
 * across all API routes.
 * Format: { error: string, code: string, status: number, details?: unknown }
 *
 * "Not enough data" is never an error here: statistical services return an
 * `insufficientData` result variant instead.
 */

import type { Context } from "hono";

export interface ApiError {
  error: string;
  code: string;
  status: number;
  details?: unknown;
}

/**
 * Standard error codes mapped to HTTP status codes
 */
export const ErrorCodes = {
  // 400 Bad Request
  VALIDATION_FAILED: { status: 400, code: "VALIDATION_FAILED" },
  INVALID_JSON: { status: 400, code: "INVALID_JSON" },

  // 401 Unauthorized
  UNAUTHORIZED: { status: 401, code: "UNAUTHORIZED" },

  // 404 Not Found
  NOT_FOUND: { status: 404, code: "NOT_FOUND" },

  // 409 Conflict
  CONFLICTING_STATE: { status: 409, code: "CONFLICTING_STATE" },

  // 422 Unprocessable Entity
  INVALID_INPUT: { status: 422, code: "INVALID_INPUT" },

  // 500 Internal Server Error
  INTERNAL_ERROR: { status: 500, code: "INTERNAL_ERROR" },

  // 503 Service Unavailable
  REPOSITORY_FAILURE: { status: 503, code: "REPOSITORY_FAILURE" },
} as const;

export type ErrorCodeKey = keyof typeof ErrorCodes;

// ---------------------------------------------------------------------------
// Application error classes
// ---------------------------------------------------------------------------

export class AppError extends Error {
  public readonly statusCode: number;
  public readonly errorCode: string;
  public readonly details?: unknown;

  constructor(
    statusCode: number,
    errorCode: string,
    message: string,
    details?: unknown,
  ) {
    super(message);
    this.name = "AppError";
    this.statusCode = statusCode;
    this.errorCode = errorCode;
    this.details = details;
  }
}

function fromCode(key: ErrorCodeKey): { status: number; code: string } {
  return ErrorCodes[key];
}

/** Reliability, confidence level, flag value or other input outside its domain */
export class InvalidInputError extends AppError {
  constructor(message: string, details?: unknown) {
    const { status, code } = fromCode("INVALID_INPUT");
    super(status, code, message, details);
    this.name = "InvalidInputError";
  }
}

/** Unknown item or session */
export class NotFoundError extends AppError {
  constructor(entity: "item" | "session", id: string) {
    const { status, code } = fromCode("NOT_FOUND");
    super(status, code, `${entity} ${id} not found`, { entity, id });
    this.name = "NotFoundError";
  }
}

/** Operation not allowed in the entity's current state */
export class ConflictingStateError extends AppError {
  constructor(message: string, details?: unknown) {
    const { status, code } = fromCode("CONFLICTING_STATE");
    super(status, code, message, details);
    this.name = "ConflictingStateError";
  }
}

/** Storage-layer failure; the cause is kept but not exposed to clients */
export class RepositoryFailureError extends AppError {
  public readonly operation: string;

  constructor(operation: string, cause: unknown) {
    const { status, code } = fromCode("REPOSITORY_FAILURE");
    super(status, code, `Repository operation failed: ${operation}`);
    this.name = "RepositoryFailureError";
    this.operation = operation;
    this.cause = cause;
  }
}

// ---------------------------------------------------------------------------
// Response helpers
// ---------------------------------------------------------------------------

/**
 * Create a standardized API error response
 */
export function apiError(
  c: Context,
  errorCode: ErrorCodeKey,
  message: string,
  details?: unknown,
) {
  const { status, code } = ErrorCodes[errorCode];
  const response: ApiError = {
    error: message,
    code,
    status,
    ...(details !== undefined && { details }),
  };
  return c.json(response, status);
}

/**
 * Extract a message from an unknown thrown value.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
