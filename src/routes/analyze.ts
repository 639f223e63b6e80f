/**
 * Analysis Routes
 *
 * POST /api/v1/analyze runs one portfolio snapshot through the coordinator.
 * A completed report (full or partial) answers 200; an AnalysisFailure
 * answers 503 with the same body shape the coordinator returned.
 */

import { Hono } from "hono";
import { analyzeRequestSchema, type AnalyzeRequestInput } from "../schemas/portfolio.ts";
import { validateBody } from "../middleware/validation.ts";
import { createPortfolioSnapshot } from "../services/portfolio.ts";
import { ErrorCodes } from "../lib/errors.ts";
import type { Coordinator } from "../agents/coordinator.ts";

type AnalyzeEnv = {
  Variables: {
    validatedBody: AnalyzeRequestInput;
  };
};

export function createAnalyzeRoutes(coordinator: Coordinator) {
  const analyzeRoutes = new Hono<AnalyzeEnv>();

  analyzeRoutes.post("/", validateBody(analyzeRequestSchema), async (c) => {
    const body = c.get("validatedBody");
    const snapshot = createPortfolioSnapshot(body.portfolio);

    const outcome = await coordinator.analyze(
      { correlationId: body.correlationId, snapshot },
      body.config,
    );

    if (outcome.status === "failed") {
      return c.json(outcome, ErrorCodes.ANALYSIS_FAILED.status);
    }
    return c.json(outcome);
  });

  return analyzeRoutes;
}
