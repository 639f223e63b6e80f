/**
 * Input Validation Middleware
 *
 * Zod-based request validation for Hono routes.
 */

import type { Context, Next } from "hono";
import { z } from "zod";
import { apiError } from "../lib/errors.ts";

// ---------------------------------------------------------------------------
// Validation error details
// ---------------------------------------------------------------------------

export interface ValidationIssue {
  path: string;
  message: string;
}

export function toValidationIssues(error: z.ZodError): ValidationIssue[] {
  return error.issues.map((i) => ({
    path: i.path.join("."),
    message: i.message,
  }));
}

// ---------------------------------------------------------------------------
// Generic validator middleware factory
// ---------------------------------------------------------------------------

/**
 * Creates Hono middleware that validates the JSON request body
 * against a Zod schema. On failure, returns a structured 400 error.
 * On success, the parsed data is available at c.get("validatedBody").
 */
export function validateBody<T extends z.ZodTypeAny>(schema: T) {
  return async (c: Context, next: Next) => {
    let body: unknown;
    try {
      body = await c.req.json();
    } catch {
      return apiError(c, "INVALID_JSON", {
        issues: [{ path: "body", message: "Failed to parse JSON" }],
      });
    }

    const result = schema.safeParse(body);
    if (!result.success) {
      return apiError(c, "VALIDATION_FAILED", { issues: toValidationIssues(result.error) });
    }

    c.set("validatedBody", result.data);
    await next();
  };
}
