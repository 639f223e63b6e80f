/**
 * Reference Data Loader
 *
 * Reads scenario records, the symbol→category table and daily price history
 * from JSON files, validates them and returns deep-frozen structures.
 * Loaded once at startup and shared read-only by every request.
 */

import { readFile } from "node:fs/promises";
import { z } from "zod";
import {
  categoryMappingSchema,
  priceHistorySchema,
  scenarioFileSchema,
  type CategoryMapping,
  type PriceHistory,
  type ScenarioRecord,
} from "../schemas/reference-data.ts";
import { RiskEngineError, errorMessage } from "../lib/errors.ts";
import { logger } from "./structured-logger.ts";

export interface ReferenceData {
  scenarios: readonly ScenarioRecord[];
  categories: CategoryMapping;
  prices: PriceHistory;
}

export interface ReferenceDataPaths {
  scenariosPath: string;
  categoriesPath: string;
  /** Optional; a missing file means no price history */
  pricesPath: string;
}

export class ReferenceDataError extends RiskEngineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("INTERNAL_ERROR", message, options);
    this.name = "ReferenceDataError";
  }
}

/**
 * Freeze an object graph in place and return it.
 */
export function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

/** File contents, or null when the file does not exist. */
async function readOptional(path: string): Promise<string | null> {
  try {
    return await readFile(path, "utf8");
  } catch (err) {
    if (isMissingFile(err)) return null;
    throw new ReferenceDataError(`Cannot read ${path}: ${errorMessage(err)}`, { cause: err });
  }
}

function parseJson<T extends z.ZodTypeAny>(path: string, raw: string, schema: T): z.infer<T> {
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (err) {
    throw new ReferenceDataError(`${path} is not valid JSON: ${errorMessage(err)}`, { cause: err });
  }

  const result = schema.safeParse(data);
  if (!result.success) {
    const issues = result.error.issues
      .slice(0, 5)
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ReferenceDataError(`${path} failed validation: ${issues}`);
  }
  return result.data;
}

async function readRequired<T extends z.ZodTypeAny>(path: string, schema: T): Promise<z.infer<T>> {
  const raw = await readOptional(path);
  if (raw === null) throw new ReferenceDataError(`Reference data file not found: ${path}`);
  return parseJson(path, raw, schema);
}

/**
 * Validate in-memory reference data (tests, embedding callers).
 */
export function parseReferenceData(input: {
  scenarios: unknown;
  categories: unknown;
  prices?: unknown;
}): ReferenceData {
  return deepFreeze({
    scenarios: scenarioFileSchema.parse({ scenarios: input.scenarios }).scenarios,
    categories: categoryMappingSchema.parse(input.categories),
    prices: priceHistorySchema.parse(input.prices ?? {}),
  });
}

export async function loadReferenceData(paths: ReferenceDataPaths): Promise<ReferenceData> {
  const [scenarioFile, categories, rawPrices] = await Promise.all([
    readRequired(paths.scenariosPath, scenarioFileSchema),
    readRequired(paths.categoriesPath, categoryMappingSchema),
    readOptional(paths.pricesPath),
  ]);

  let prices: PriceHistory = {};
  if (rawPrices === null) {
    logger.warn("reference-data", "Price history file not found; correlation will report insufficient data", {
      path: paths.pricesPath,
    });
  } else {
    prices = parseJson(paths.pricesPath, rawPrices, priceHistorySchema);
  }

  logger.info("reference-data", "Reference data loaded", {
    scenarios: scenarioFile.scenarios.length,
    mappedSymbols: Object.keys(categories).length,
    pricedSymbols: Object.keys(prices).length,
  });

  return deepFreeze({ scenarios: scenarioFile.scenarios, categories, prices });
}
