/**
 * Risk Engine Configuration - Single Source of Truth
 *
 * Every threshold and timeout the engine uses is supplied through this
 * object at Coordinator construction (and optionally overridden per
 * request). Nothing below the Coordinator reads process.env.
 */

import { z } from "zod";

/** Trailing window for the co-movement calculation (days of returns). */
export const DEFAULT_WINDOW_DAYS = 90;

/** A category holding strictly more than this share is "concentrated". */
export const DEFAULT_DANGER_THRESHOLD_PCT = 60;

/** Largest category at or above this share (and not over danger) is "Moderate". */
export const DEFAULT_MODERATE_THRESHOLD_PCT = 40;

/** Correlation percentage that must be exceeded for compounding risk. */
export const DEFAULT_COMPOUNDING_CORRELATION_PCT = 85;

/** Compounding portfolios above this correlation are Critical rather than High. */
export const DEFAULT_CRITICAL_CORRELATION_PCT = 90;

export const DEFAULT_PER_CALL_TIMEOUT_MS = 10_000;
export const DEFAULT_OVERALL_DEADLINE_MS = 60_000;
export const DEFAULT_KNOWLEDGE_LOOKUP_TIMEOUT_MS = 2_000;

export const knowledgeBackendEnum = z.enum(["graph", "table"]);

export type KnowledgeBackend = z.infer<typeof knowledgeBackendEnum>;

export const riskEngineConfigSchema = z
  .object({
    windowDays: z.number().int().min(2).default(DEFAULT_WINDOW_DAYS),
    dangerThresholdPct: z.number().min(0).max(100).default(DEFAULT_DANGER_THRESHOLD_PCT),
    moderateThresholdPct: z.number().min(0).max(100).default(DEFAULT_MODERATE_THRESHOLD_PCT),
    compoundingCorrelationPct: z
      .number()
      .min(0)
      .max(100)
      .default(DEFAULT_COMPOUNDING_CORRELATION_PCT),
    criticalCorrelationPct: z
      .number()
      .min(0)
      .max(100)
      .default(DEFAULT_CRITICAL_CORRELATION_PCT),
    perCallTimeoutMs: z.number().int().positive().default(DEFAULT_PER_CALL_TIMEOUT_MS),
    overallDeadlineMs: z.number().int().positive().default(DEFAULT_OVERALL_DEADLINE_MS),
    knowledgeLookupTimeoutMs: z
      .number()
      .int()
      .positive()
      .default(DEFAULT_KNOWLEDGE_LOOKUP_TIMEOUT_MS),
    knowledgeBackend: knowledgeBackendEnum.default("graph"),
  })
  .refine((cfg) => cfg.moderateThresholdPct <= cfg.dangerThresholdPct, {
    message: "moderateThresholdPct must not exceed dangerThresholdPct",
    path: ["moderateThresholdPct"],
  });

export type RiskEngineConfig = z.infer<typeof riskEngineConfigSchema>;

export type RiskEngineConfigInput = z.input<typeof riskEngineConfigSchema>;

/** Thresholds the synthesis step reads. */
export type SynthesisThresholds = Pick<
  RiskEngineConfig,
  | "dangerThresholdPct"
  | "moderateThresholdPct"
  | "compoundingCorrelationPct"
  | "criticalCorrelationPct"
>;

/**
 * Validate a (partial) configuration and fill in defaults.
 * Throws a ZodError on invalid input.
 */
export function resolveRiskEngineConfig(input: RiskEngineConfigInput = {}): RiskEngineConfig {
  return riskEngineConfigSchema.parse(input);
}

/**
 * Layer request-scoped overrides on top of an already resolved config.
 * The base object is never modified.
 */
export function mergeRiskEngineConfig(
  base: RiskEngineConfig,
  overrides: RiskEngineConfigInput | undefined,
): RiskEngineConfig {
  if (!overrides) return base;
  const defined = Object.fromEntries(
    Object.entries(overrides).filter(([, value]) => value !== undefined),
  );
  return riskEngineConfigSchema.parse({ ...base, ...defined });
}
