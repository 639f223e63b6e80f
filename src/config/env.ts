import { z } from "zod";
import { knowledgeBackendEnum, type RiskEngineConfigInput } from "./risk-config.ts";

const optionalNumber = z.coerce.number().optional();

const envSchema = z.object({
  PORT: z.coerce.number().default(3000),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Reference data (JSON files, loaded once at startup)
  SCENARIOS_PATH: z.string().default("data/scenarios.json"),
  CATEGORY_MAPPINGS_PATH: z.string().default("data/category-mappings.json"),
  PRICE_HISTORY_PATH: z.string().default("data/price-history.json"),
  REFERENCE_SYMBOL: z.string().min(1).default("ETH"),

  KNOWLEDGE_BACKEND: knowledgeBackendEnum.default("graph"),

  LOG_LEVEL: z.enum(["DEBUG", "INFO", "WARN", "ERROR", "FATAL"]).optional(),
  LOG_FORMAT: z.enum(["json", "text"]).optional(),

  // Engine overrides (optional; defaults live in risk-config.ts)
  WINDOW_DAYS: optionalNumber,
  DANGER_THRESHOLD_PCT: optionalNumber,
  MODERATE_THRESHOLD_PCT: optionalNumber,
  COMPOUNDING_CORRELATION_PCT: optionalNumber,
  PER_CALL_TIMEOUT_MS: optionalNumber,
  OVERALL_DEADLINE_MS: optionalNumber,
});

export type Env = z.infer<typeof envSchema>;

function loadEnv(): Env {
  const result = envSchema.safeParse(process.env);

  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `  ${issue.path.join(".")}: ${issue.message}`)
      .join("\n");
    throw new Error(`Environment validation failed:\n${issues}`);
  }

  return result.data;
}

/**
 * Translate the environment into engine config input. Only the server entry
 * point calls this; the engine itself receives an explicit config object.
 */
export function engineConfigFromEnv(source: Env): RiskEngineConfigInput {
  return {
    knowledgeBackend: source.KNOWLEDGE_BACKEND,
    ...(source.WINDOW_DAYS !== undefined && { windowDays: source.WINDOW_DAYS }),
    ...(source.DANGER_THRESHOLD_PCT !== undefined && {
      dangerThresholdPct: source.DANGER_THRESHOLD_PCT,
    }),
    ...(source.MODERATE_THRESHOLD_PCT !== undefined && {
      moderateThresholdPct: source.MODERATE_THRESHOLD_PCT,
    }),
    ...(source.COMPOUNDING_CORRELATION_PCT !== undefined && {
      compoundingCorrelationPct: source.COMPOUNDING_CORRELATION_PCT,
    }),
    ...(source.PER_CALL_TIMEOUT_MS !== undefined && {
      perCallTimeoutMs: source.PER_CALL_TIMEOUT_MS,
    }),
    ...(source.OVERALL_DEADLINE_MS !== undefined && {
      overallDeadlineMs: source.OVERALL_DEADLINE_MS,
    }),
  };
}

export const env = loadEnv();
