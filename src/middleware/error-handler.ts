/**
 * Global Error Handler Middleware
 *
 * Catches unhandled errors in any route and returns a consistent
 * structured JSON response. Also logs each error through the structured
 * logger with the request's method and path.
 */

import type { Context } from "hono";
import type { ContentfulStatusCode } from "hono/utils/http-status";
import { ZodError } from "zod";
import { ErrorCodes, RiskEngineError, toError } from "../lib/errors.ts";
import { logger } from "../services/structured-logger.ts";

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

export function mapErrorToResponse(err: unknown): StructuredError {
  if (err instanceof RiskEngineError) {
    const { status, code } = ErrorCodes[err.code];
    return { error: err.message, code, status };
  }

  if (err instanceof ZodError) {
    const { status, code } = ErrorCodes.VALIDATION_FAILED;
    return {
      error: "Validation failed",
      code,
      status,
      details: {
        issues: err.issues.map((i) => ({ path: i.path.join("."), message: i.message })),
      },
    };
  }

  if (err instanceof SyntaxError && err.message.includes("JSON")) {
    const { status, code } = ErrorCodes.INVALID_JSON;
    return { error: "Invalid request body", code, status };
  }

  const { status, code } = ErrorCodes.INTERNAL_ERROR;
  return {
    error: err instanceof Error ? "Internal server error" : "An unexpected error occurred",
    code,
    status,
  };
}

// ---------------------------------------------------------------------------
// Hono onError handler
// ---------------------------------------------------------------------------

/**
 * Global error handler for Hono's app.onError().
 *
 * Usage:
 *   app.onError(globalErrorHandler);
 */
export function globalErrorHandler(err: Error, c: Context): Response {
  const structured = mapErrorToResponse(err);

  const data = { method: c.req.method, path: c.req.path, status: structured.status };
  if (structured.status >= 500) {
    logger.error("http", "Request failed", toError(err), data);
  } else {
    logger.warn("http", `Request rejected: ${structured.code}`, data);
  }

  return c.json(structured, structured.status);
}

// ---------------------------------------------------------------------------
// 404 Not Found handler
// ---------------------------------------------------------------------------

/**
 * Global 404 handler for Hono's app.notFound().
 *
 * Usage:
 *   app.notFound(notFoundHandler);
 */
export function notFoundHandler(c: Context): Response {
  return c.json(
    {
      error: `Route ${c.req.method} ${c.req.path} not found`,
      code: "not_found",
      status: 404,
    },
    404,
  );
}
