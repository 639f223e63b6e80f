/**
 * Production Hardening Layer
 *
 * Time bounds and health bookkeeping for the analysis pipeline:
 *
 * 1. Abortable Call Timeout: hard limit on each analyzer call
 * 2. Request Deadline: remaining budget shared by every step of one request
 * 3. Health Monitoring: detect degraded service state from recent outcomes
 */

import { AnalyzerTimeoutError } from "../lib/errors.ts";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface HealthStatus {
  /** Overall health: "healthy", "degraded", "critical" */
  status: "healthy" | "degraded" | "critical";
  checks: HealthCheck[];
  checkedAt: string;
}

export interface HealthCheck {
  name: string;
  status: "pass" | "warn" | "fail";
  message: string;
  value?: number;
}

export interface HardeningMetrics {
  totalRequests: number;
  completedReports: number;
  partialReports: number;
  failedRequests: number;
  analyzerTimeouts: number;
  deadlineOverruns: number;
  knowledgeFallbacks: number;
  knowledgeUnavailable: number;
  lastCompletedAt: string | null;
  timeoutsByAnalyzer: Record<string, number>;
}

export type RequestOutcome = "completed" | "partial" | "failed";

/** Remaining time budget for one request. */
export interface Deadline {
  readonly totalMs: number;
  readonly startedAt: number;
  remainingMs(): number;
  elapsedMs(): number;
  expired(): boolean;
}

// ---------------------------------------------------------------------------
// Metrics State
// ---------------------------------------------------------------------------

function emptyMetrics(): HardeningMetrics {
  return {
    totalRequests: 0,
    completedReports: 0,
    partialReports: 0,
    failedRequests: 0,
    analyzerTimeouts: 0,
    deadlineOverruns: 0,
    knowledgeFallbacks: 0,
    knowledgeUnavailable: 0,
    lastCompletedAt: null,
    timeoutsByAnalyzer: {},
  };
}

let metrics: HardeningMetrics = emptyMetrics();

// ---------------------------------------------------------------------------
// Call Timeout Protection
// ---------------------------------------------------------------------------

/**
 * Run `run` with a hard timeout. The callee receives an AbortSignal that
 * fires when the timeout elapses; the returned promise rejects with the
 * error built by `onTimeout` (AnalyzerTimeoutError by default).
 */
export async function withAbortableTimeout<T>(
  label: string,
  run: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  onTimeout: (label: string, timeoutMs: number) => Error = (l, ms) =>
    new AnalyzerTimeoutError(l, ms),
): Promise<T> {
  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;

  const timeoutPromise = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const err = onTimeout(label, timeoutMs);
      controller.abort(err);
      reject(err);
    }, Math.max(0, timeoutMs));
  });

  try {
    return await Promise.race([run(controller.signal), timeoutPromise]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Start a request deadline. Reads the clock through Date.now() so fake
 * timers drive it in tests.
 */
export function startDeadline(totalMs: number): Deadline {
  const startedAt = Date.now();
  return {
    totalMs,
    startedAt,
    elapsedMs: () => Date.now() - startedAt,
    remainingMs: () => Math.max(0, totalMs - (Date.now() - startedAt)),
    expired: () => Date.now() - startedAt >= totalMs,
  };
}

// ---------------------------------------------------------------------------
// Outcome Recording
// ---------------------------------------------------------------------------

export function recordAnalyzerTimeout(analyzer: string): void {
  metrics.analyzerTimeouts++;
  metrics.timeoutsByAnalyzer[analyzer] = (metrics.timeoutsByAnalyzer[analyzer] ?? 0) + 1;
}

export function recordDeadlineOverrun(): void {
  metrics.deadlineOverruns++;
}

export function recordKnowledgeFallback(): void {
  metrics.knowledgeFallbacks++;
}

export function recordKnowledgeUnavailable(): void {
  metrics.knowledgeUnavailable++;
}

export function recordRequestOutcome(outcome: RequestOutcome): void {
  metrics.totalRequests++;
  if (outcome === "failed") {
    metrics.failedRequests++;
    return;
  }
  if (outcome === "partial") metrics.partialReports++;
  else metrics.completedReports++;
  metrics.lastCompletedAt = new Date().toISOString();
}

// ---------------------------------------------------------------------------
// Health Monitoring
// ---------------------------------------------------------------------------

/**
 * Summarize recent request outcomes into a health status.
 */
export function checkHealth(): HealthStatus {
  const checks: HealthCheck[] = [];
  const total = metrics.totalRequests;

  const failureRate = total > 0 ? metrics.failedRequests / total : 0;
  checks.push({
    name: "failed_requests",
    status: failureRate > 0.5 ? "fail" : failureRate > 0.2 ? "warn" : "pass",
    message: `${metrics.failedRequests} failed of ${total} requests (${(failureRate * 100).toFixed(1)}% rate)`,
    value: metrics.failedRequests,
  });

  const partialRate = total > 0 ? metrics.partialReports / total : 0;
  checks.push({
    name: "partial_reports",
    status: partialRate > 0.2 ? "warn" : "pass",
    message: `${metrics.partialReports} partial reports, ${metrics.analyzerTimeouts} analyzer timeouts`,
    value: metrics.partialReports,
  });

  checks.push({
    name: "knowledge_store",
    status: metrics.knowledgeUnavailable > 0 ? "warn" : "pass",
    message: `${metrics.knowledgeFallbacks} fallback lookups, ${metrics.knowledgeUnavailable} unavailable`,
    value: metrics.knowledgeUnavailable,
  });

  const hasFail = checks.some((c) => c.status === "fail");
  const hasWarn = checks.some((c) => c.status === "warn");
  const overallStatus = hasFail ? "critical" : hasWarn ? "degraded" : "healthy";

  return {
    status: overallStatus,
    checks,
    checkedAt: new Date().toISOString(),
  };
}

// ---------------------------------------------------------------------------
// Metrics
// ---------------------------------------------------------------------------

export function getHardeningMetrics(): HardeningMetrics {
  return { ...metrics, timeoutsByAnalyzer: { ...metrics.timeoutsByAnalyzer } };
}

/**
 * Reset hardening metrics (tests and admin use).
 */
export function resetHardeningMetrics(): void {
  metrics = emptyMetrics();
}
