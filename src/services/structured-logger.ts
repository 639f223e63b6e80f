/**
 * Structured Logging & Metrics Pipeline
 *
 * JSON logging with context propagation for the risk engine.
 *
 * Features:
 * - JSON structured logs in production, readable lines in development
 * - Log levels: DEBUG, INFO, WARN, ERROR, FATAL
 * - Request context (correlationId, analyzer) carried through async calls,
 *   so concurrent requests never see each other's context
 * - Analyzer call lifecycle logging
 * - In-memory metric buffer
 * - Ring buffer for recent logs (in-memory access)
 */

import { AsyncLocalStorage } from "node:async_hooks";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type LogLevel = "DEBUG" | "INFO" | "WARN" | "ERROR" | "FATAL";

export interface LogContext {
  /** Caller-supplied correlation identifier of the analysis request */
  correlationId?: string;
  /** Analyzer currently doing work (correlation / concentration) */
  analyzer?: string;
}

export interface StructuredLogEntry extends LogContext {
  /** ISO timestamp */
  timestamp: string;
  level: LogLevel;
  /** Service/module that generated the log */
  service: string;
  message: string;
  /** Additional structured data */
  data?: Record<string, unknown>;
  error?: {
    message: string;
    code?: string;
    stack?: string;
  };
}

export interface MetricEntry {
  name: string;
  value: number;
  unit: MetricUnit;
  dimensions: Record<string, string>;
  timestamp: string;
}

export type MetricUnit = "Count" | "Milliseconds" | "Percent" | "None";

export interface LoggerConfig {
  /** Minimum log level to output (default: INFO in production, DEBUG otherwise) */
  minLevel: LogLevel;
  /** Whether to output as JSON */
  jsonOutput: boolean;
  includeStackTraces: boolean;
  /** Suppress console output entirely (entries still reach the ring buffer) */
  silent: boolean;
  /** Maximum number of logs to keep in memory ring buffer */
  ringBufferSize: number;
}

export interface LoggerStats {
  totalLogs: number;
  logsByLevel: Record<LogLevel, number>;
  metricsEmitted: number;
  errorsLogged: number;
}

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  DEBUG: 0,
  INFO: 1,
  WARN: 2,
  ERROR: 3,
  FATAL: 4,
};

const isProduction = process.env.NODE_ENV === "production";

const config: LoggerConfig = {
  minLevel: isProduction ? "INFO" : "DEBUG",
  jsonOutput: isProduction,
  includeStackTraces: !isProduction,
  silent: process.env.NODE_ENV === "test" || process.env.VITEST === "true",
  ringBufferSize: 500,
};

// ---------------------------------------------------------------------------
// State
// ---------------------------------------------------------------------------

const ringBuffer: StructuredLogEntry[] = [];
const metricBuffer: MetricEntry[] = [];
const MAX_METRIC_BUFFER = 200;

function emptyStats(): LoggerStats {
  return {
    totalLogs: 0,
    logsByLevel: { DEBUG: 0, INFO: 0, WARN: 0, ERROR: 0, FATAL: 0 },
    metricsEmitted: 0,
    errorsLogged: 0,
  };
}

let stats = emptyStats();

const contextStorage = new AsyncLocalStorage<LogContext>();

// ---------------------------------------------------------------------------
// Context Management
// ---------------------------------------------------------------------------

/**
 * Execute a function with a logging context layered on the current one.
 * Every log emitted inside `fn` (including across awaits) carries it.
 */
export function withContext<T>(ctx: LogContext, fn: () => Promise<T>): Promise<T> {
  const merged = { ...contextStorage.getStore(), ...ctx };
  return contextStorage.run(merged, fn);
}

export function getContext(): LogContext {
  return { ...contextStorage.getStore() };
}

// ---------------------------------------------------------------------------
// Core Logging
// ---------------------------------------------------------------------------

function errorDetails(error: Error): StructuredLogEntry["error"] {
  return {
    message: error.message,
    code: "code" in error && typeof error.code === "string" ? error.code : undefined,
    stack: config.includeStackTraces ? error.stack : undefined,
  };
}

/** Human-readable line for development consoles. */
function formatLine(entry: StructuredLogEntry): string {
  const tags = [entry.level, entry.service, entry.analyzer].filter(Boolean).join("][");
  const request = entry.correlationId ? ` (req:${entry.correlationId.slice(0, 12)})` : "";
  const data = entry.data ? ` ${JSON.stringify(entry.data)}` : "";
  const error = entry.error ? ` ERROR: ${entry.error.message}` : "";
  return `[${tags}]${request} ${entry.message}${data}${error}`;
}

function remember(entry: StructuredLogEntry): void {
  stats.totalLogs++;
  stats.logsByLevel[entry.level]++;
  if (entry.error) stats.errorsLogged++;

  ringBuffer.push(entry);
  const overflow = ringBuffer.length - config.ringBufferSize;
  if (overflow > 0) ringBuffer.splice(0, overflow);
}

function log(
  level: LogLevel,
  service: string,
  message: string,
  data?: Record<string, unknown>,
  error?: Error,
): void {
  if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[config.minLevel]) return;

  const entry: StructuredLogEntry = {
    timestamp: new Date().toISOString(),
    level,
    service,
    message,
    ...contextStorage.getStore(),
    data,
    error: error ? errorDetails(error) : undefined,
  };
  remember(entry);

  if (config.silent) return;

  const line = config.jsonOutput ? JSON.stringify(entry) : formatLine(entry);
  if (LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY.ERROR) console.error(line);
  else if (level === "WARN") console.warn(line);
  else console.log(line);
}

// ---------------------------------------------------------------------------
// Log Level Methods
// ---------------------------------------------------------------------------

export const logger = {
  debug(service: string, message: string, data?: Record<string, unknown>): void {
    log("DEBUG", service, message, data);
  },

  info(service: string, message: string, data?: Record<string, unknown>): void {
    log("INFO", service, message, data);
  },

  warn(service: string, message: string, data?: Record<string, unknown>, error?: Error): void {
    log("WARN", service, message, data, error);
  },

  error(service: string, message: string, error?: Error, data?: Record<string, unknown>): void {
    log("ERROR", service, message, data, error);
  },

  fatal(service: string, message: string, error?: Error, data?: Record<string, unknown>): void {
    log("FATAL", service, message, data, error);
  },
};

// ---------------------------------------------------------------------------
// Analyzer Call Lifecycle Logging
// ---------------------------------------------------------------------------

/**
 * Log the outcome of one analyzer call with its wall-clock duration and
 * the identity of the analyzer that answered.
 */
export function logAnalyzerCall(
  analyzer: string,
  status: string,
  durationMs: number,
  analyzerId: string | null,
  error?: Error,
): void {
  const data = { analyzer, status, durationMs, analyzerId };
  if (status === "succeeded") {
    logger.info("coordinator", `Analyzer call ${analyzer} succeeded`, data);
  } else {
    logger.warn("coordinator", `Analyzer call ${analyzer} ${status}`, data, error);
  }

  emitMetric("AnalyzerCall", 1, "Count", { analyzer, status });
  emitMetric("AnalyzerCallLatency", durationMs, "Milliseconds", { analyzer });
}

// ---------------------------------------------------------------------------
// Metrics
// ---------------------------------------------------------------------------

export function emitMetric(
  name: string,
  value: number,
  unit: MetricUnit,
  dimensions: Record<string, string>,
): void {
  stats.metricsEmitted++;

  metricBuffer.push({
    name,
    value,
    unit,
    dimensions,
    timestamp: new Date().toISOString(),
  });
  if (metricBuffer.length > MAX_METRIC_BUFFER) {
    metricBuffer.splice(0, metricBuffer.length - MAX_METRIC_BUFFER);
  }
}

// ---------------------------------------------------------------------------
// Performance Timing
// ---------------------------------------------------------------------------

/**
 * Time an async operation and log the result.
 */
export async function timeOperation<T>(
  service: string,
  operationName: string,
  fn: () => Promise<T>,
): Promise<{ result: T; durationMs: number }> {
  const startMs = Date.now();
  const elapsed = () => ({ operation: operationName, durationMs: Date.now() - startMs });

  let result: T;
  try {
    result = await fn();
  } catch (err) {
    const data = elapsed();
    const error = err instanceof Error ? err : new Error(String(err));
    logger.error(service, `${operationName} failed after ${data.durationMs}ms`, error, data);
    throw err;
  }

  const data = elapsed();
  logger.debug(service, `${operationName} completed in ${data.durationMs}ms`, data);
  return { result, durationMs: data.durationMs };
}

// ---------------------------------------------------------------------------
// Log Access & Querying
// ---------------------------------------------------------------------------

export interface LogQuery {
  /** Minimum level */
  level?: LogLevel;
  service?: string;
  correlationId?: string;
  /** Newest entries to return (default 50) */
  limit?: number;
}

/**
 * Newest entries from the ring buffer matching every given filter.
 */
export function getRecentLogs(query: LogQuery = {}): StructuredLogEntry[] {
  const { level, service, correlationId, limit = 50 } = query;
  const minPriority = level ? LOG_LEVEL_PRIORITY[level] : 0;

  return ringBuffer
    .filter(
      (entry) =>
        LOG_LEVEL_PRIORITY[entry.level] >= minPriority &&
        (service === undefined || entry.service === service) &&
        (correlationId === undefined || entry.correlationId === correlationId),
    )
    .slice(-limit);
}

export function getRecentMetrics(limit = 50): MetricEntry[] {
  return metricBuffer.slice(-limit);
}

// ---------------------------------------------------------------------------
// Configuration & Stats
// ---------------------------------------------------------------------------

export function configureLogger(updates: Partial<LoggerConfig>): LoggerConfig {
  Object.assign(config, updates);
  return { ...config };
}

export function getLoggerStats(): LoggerStats {
  return { ...stats, logsByLevel: { ...stats.logsByLevel } };
}

/**
 * Reset logger statistics and buffers.
 */
export function resetLoggerStats(): void {
  stats = emptyStats();
  ringBuffer.length = 0;
  metricBuffer.length = 0;
}
