import { Hono } from "hono";
import { healthRoutes } from "./routes/health.ts";
import { createAnalyzeRoutes } from "./routes/analyze.ts";
import { createScenarioRoutes } from "./routes/scenarios.ts";
import { globalErrorHandler, notFoundHandler } from "./middleware/error-handler.ts";
import type { RiskEngine } from "./agents/risk-engine.ts";

export function createApp(engine: RiskEngine) {
  const app = new Hono();

  app.onError(globalErrorHandler);
  app.notFound(notFoundHandler);

  // Health check (public)
  app.route("/health", healthRoutes);

  // Portfolio risk analysis
  app.route("/api/v1/analyze", createAnalyzeRoutes(engine.coordinator));

  // Historical scenario catalogue
  app.route("/api/v1/scenarios", createScenarioRoutes(engine.knowledge));

  return app;
}
