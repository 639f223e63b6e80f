/**
 * Portfolio Validation Schemas
 *
 * Zod schemas for the inbound analysis request. Construction-time rules
 * (positive quantity and price, non-empty holdings) are enforced here and
 * again by the snapshot factory, so both the HTTP surface and direct callers
 * get the same guarantees.
 */

import { z } from "zod";
import { riskEngineConfigSchema } from "../config/risk-config.ts";

/** Longest symbol we accept (tickers, token symbols, ISINs). */
const SYMBOL_MAX_LENGTH = 16;

export const holdingInputSchema = z.object({
  symbol: z.string().trim().min(1, "Symbol is required").max(SYMBOL_MAX_LENGTH),
  quantity: z.number().positive("Quantity must be positive").finite(),
  unitPrice: z.number().positive("Unit price must be positive").finite(),
});

export type HoldingInput = z.infer<typeof holdingInputSchema>;

export const portfolioSnapshotInputSchema = z.object({
  ownerId: z.string().min(1, "Owner identifier is required"),
  holdings: z.array(holdingInputSchema).min(1, "Portfolio must contain at least one holding"),
  /** Optional caller-declared total; checked against the sum of holding values */
  totalValue: z.number().positive().optional(),
  snapshotTime: z.string().datetime().optional(),
});

export type PortfolioSnapshotInput = z.infer<typeof portfolioSnapshotInputSchema>;

/**
 * Request-scoped config overrides. Every field is optional; the refinement
 * on the full schema runs after merging with the Coordinator's config.
 * The knowledge backend is fixed when the engine is built.
 */
export const configOverridesSchema = riskEngineConfigSchema
  .innerType()
  .omit({ knowledgeBackend: true, knowledgeLookupTimeoutMs: true })
  .partial();

export type ConfigOverrides = z.infer<typeof configOverridesSchema>;

export const analyzeRequestSchema = z.object({
  correlationId: z.string().min(1, "correlationId is required").max(128),
  portfolio: portfolioSnapshotInputSchema,
  config: configOverridesSchema.optional(),
});

export type AnalyzeRequestInput = z.infer<typeof analyzeRequestSchema>;
