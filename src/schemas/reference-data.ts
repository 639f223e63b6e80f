/**
 * Reference Data Schemas
 *
 * Shape of the static inputs the engine consumes: historical stress
 * scenarios, the symbol→category table and daily price history.
 */

import { z } from "zod";

export const bracketEnum = z.enum(["High", "Moderate", "Low"]);

export type CoMovementBracket = z.infer<typeof bracketEnum>;

export const opportunityCostSchema = z.object({
  category: z.string().min(1),
  bestPerformer: z.string().min(1),
  recoveryGainPct: z.number(),
  reason: z.string(),
});

export const jointLossSchema = z.object({
  bracket: bracketEnum,
  category: z.string().min(1),
  lossPct: z.number(),
});

export const scenarioRecordSchema = z.object({
  scenarioId: z.string().min(1),
  displayName: z.string().min(1),
  periodLabel: z.string().min(1),
  referenceDrawdownPct: z.number(),
  marketAvgLossPct: z.number(),
  bracketLosses: z.object({
    High: z.number(),
    Moderate: z.number(),
    Low: z.number(),
  }),
  categoryLosses: z.record(z.string(), z.number()),
  jointLosses: z.array(jointLossSchema).default([]),
  recoveryWinners: z.array(z.string()).default([]),
  recoveryPeriodLabel: z.string().min(1),
  opportunityCosts: z.array(opportunityCostSchema).default([]),
});

export type ScenarioRecord = z.infer<typeof scenarioRecordSchema>;
export type OpportunityCost = z.infer<typeof opportunityCostSchema>;
export type JointLoss = z.infer<typeof jointLossSchema>;

export const scenarioFileSchema = z.object({
  scenarios: z.array(scenarioRecordSchema).min(1),
});

/** symbol → category name */
export const categoryMappingSchema = z.record(z.string(), z.string().min(1));

export type CategoryMapping = z.infer<typeof categoryMappingSchema>;

export const pricePointSchema = z.object({
  date: z.string().date(),
  price: z.number().positive(),
});

export type PricePoint = z.infer<typeof pricePointSchema>;

/** symbol → daily prices, oldest first */
export const priceHistorySchema = z.record(z.string(), z.array(pricePointSchema));

export type PriceHistory = z.infer<typeof priceHistorySchema>;
