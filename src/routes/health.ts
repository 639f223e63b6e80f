import { Hono } from "hono";
import { checkHealth, getHardeningMetrics } from "../services/production-hardening.ts";
import { getLoggerStats } from "../services/structured-logger.ts";

const healthRoutes = new Hono();

/** Track server start time for uptime calculation */
const serverStartTime = Date.now();

/**
 * GET /health - Service health from recent request outcomes
 *
 * Returns:
 * - status: "ok", "degraded" or "critical"
 * - uptime: milliseconds since server start
 * - checks: individual health checks
 * - metrics: request, timeout and knowledge-store counters
 * - logs: log volume by level
 * - timestamp: current ISO timestamp
 */
healthRoutes.get("/", (c) => {
  const health = checkHealth();

  return c.json({
    status: health.status === "healthy" ? "ok" : health.status,
    uptime: Date.now() - serverStartTime,
    checks: health.checks,
    metrics: getHardeningMetrics(),
    logs: getLoggerStats(),
    timestamp: health.checkedAt,
  });
});

export { healthRoutes };
