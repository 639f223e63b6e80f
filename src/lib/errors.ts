/**
 * Standardized Error Handling
 *
 * Domain error taxonomy for the risk engine plus the consistent error
 * response format used by the HTTP routes.
 * Format: { error: string, code: string, details?: unknown }
 */

import type { Context } from "hono";

export interface ApiError {
  error: string;
  code: string;
  details?: unknown;
}

/**
 * Standard error codes mapped to HTTP status codes
 */
export const ErrorCodes = {
  // 400 Bad Request
  VALIDATION_FAILED: { status: 400, code: "validation_failed" },
  INVALID_JSON: { status: 400, code: "invalid_json" },
  INVALID_PORTFOLIO: { status: 400, code: "invalid_portfolio" },

  // 422 Unprocessable Entity
  INSUFFICIENT_DATA: { status: 422, code: "insufficient_data" },

  // 500 Internal Server Error
  INTERNAL_ERROR: { status: 500, code: "internal_error" },
  ANALYZER_FAILURE: { status: 500, code: "analyzer_failure" },

  // 503 Service Unavailable
  KNOWLEDGE_LOOKUP_UNAVAILABLE: { status: 503, code: "knowledge_lookup_unavailable" },
  ANALYSIS_FAILED: { status: 503, code: "analysis_failed" },

  // 504 Gateway Timeout
  ANALYZER_TIMEOUT: { status: 504, code: "analyzer_timeout" },
  DEADLINE_EXCEEDED: { status: 504, code: "deadline_exceeded" },
} as const;

export type ErrorCode = keyof typeof ErrorCodes;

// ---------------------------------------------------------------------------
// Domain errors
// ---------------------------------------------------------------------------

/**
 * Base class for every error the engine raises on purpose. The `code` field
 * is picked up by the structured logger.
 */
export class RiskEngineError extends Error {
  public readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "RiskEngineError";
    this.code = code;
  }
}

/** Snapshot or holding failed construction-time validation. */
export class InvalidPortfolioError extends RiskEngineError {
  constructor(message: string) {
    super("INVALID_PORTFOLIO", message);
    this.name = "InvalidPortfolioError";
  }
}

/** Not enough price history to compute a co-movement coefficient. */
export class InsufficientDataError extends RiskEngineError {
  constructor(message: string) {
    super("INSUFFICIENT_DATA", message);
    this.name = "InsufficientDataError";
  }
}

export class AnalyzerTimeoutError extends RiskEngineError {
  public readonly timeoutMs: number;

  constructor(label: string, timeoutMs: number) {
    super("ANALYZER_TIMEOUT", `${label} did not complete within ${timeoutMs}ms`);
    this.name = "AnalyzerTimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

/** An analyzer answered with something other than a usable result. */
export class AnalyzerFailureError extends RiskEngineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("ANALYZER_FAILURE", message, options);
    this.name = "AnalyzerFailureError";
  }
}

export class DeadlineExceededError extends RiskEngineError {
  constructor(label: string, deadlineMs: number) {
    super("DEADLINE_EXCEEDED", `${label} exceeded the ${deadlineMs}ms request deadline`);
    this.name = "DeadlineExceededError";
  }
}

export class KnowledgeLookupError extends RiskEngineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("KNOWLEDGE_LOOKUP_UNAVAILABLE", message, options);
    this.name = "KnowledgeLookupError";
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/**
 * Extract a printable message from anything that was thrown.
 */
export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

/**
 * Normalize a thrown value into an Error instance for logging.
 */
export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

/**
 * Create a standardized API error response
 */
export function apiError(
  c: Context,
  errorCode: ErrorCode,
  details?: unknown,
) {
  const { status, code } = ErrorCodes[errorCode];
  const response: ApiError = {
    error: code,
    code,
    ...(details !== undefined && { details }),
  };
  return c.json(response, status);
}
