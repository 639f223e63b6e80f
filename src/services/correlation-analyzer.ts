/**
 * Correlation Analyzer
 *
 * Measures how closely the portfolio moves with the reference asset:
 *
 * 1. Take the trailing window of daily prices for every holding
 * 2. Convert to simple daily returns
 * 3. Combine holdings into one return series, weighted by value share at
 *    snapshot time (weights are held fixed over the window; no rebalancing)
 * 4. Pearson coefficient against the reference asset's returns
 * 5. Bracket the absolute percentage and attach historical scenario context
 *
 * Holdings without a full window of prices are excluded and named in the
 * narrative. When nothing usable remains the result says "insufficient data"
 * instead of throwing.
 */

import type { RiskEngineConfig } from "../config/risk-config.ts";
import type { CoMovementBracket, PriceHistory } from "../schemas/reference-data.ts";
import type {
  ComputedCorrelation,
  CorrelationResult,
  ExcludedHolding,
  InsufficientCorrelation,
  ScenarioContext,
} from "../agents/base-analyzer.ts";
import type { KnowledgeStore } from "./knowledge-types.ts";
import type { PortfolioSnapshot } from "./portfolio.ts";
import { InsufficientDataError } from "../lib/errors.ts";
import {
  clamp,
  pearsonCorrelation,
  round,
  simpleReturns,
  weightedSeries,
} from "../lib/math-utils.ts";
import { formatList, formatMagnitude } from "../lib/format-utils.ts";
import { logger } from "./structured-logger.ts";

const SERVICE = "correlation-analyzer";

/** Percentages strictly above this are "High". */
export const HIGH_BRACKET_ABOVE_PCT = 85;

/** Percentages at or above this (and not High) are "Moderate". */
export const MODERATE_BRACKET_FROM_PCT = 70;

export interface CorrelationAnalyzerDeps {
  prices: PriceHistory;
  referenceSymbol: string;
  knowledge: KnowledgeStore;
}

interface WindowedHolding {
  symbol: string;
  value: number;
  prices: number[];
}

/**
 * Co-movement percentage for a coefficient: round(|coefficient| × 100).
 */
export function toCoMovementPercentage(coefficient: number): number {
  return clamp(Math.round(Math.abs(coefficient) * 100), 0, 100);
}

export function bracketFor(percentage: number): CoMovementBracket {
  if (percentage > HIGH_BRACKET_ABOVE_PCT) return "High";
  if (percentage >= MODERATE_BRACKET_FROM_PCT) return "Moderate";
  return "Low";
}

/**
 * Last `required` prices for `symbol`, oldest first.
 * Throws InsufficientDataError when the history is shorter than that.
 */
export function trailingPrices(
  prices: PriceHistory,
  symbol: string,
  required: number,
): number[] {
  const series = Object.hasOwn(prices, symbol) ? prices[symbol] : undefined;
  if (!series || series.length === 0) {
    throw new InsufficientDataError("missing price history");
  }
  if (series.length < required) {
    throw new InsufficientDataError(`only ${series.length} of ${required} required prices`);
  }
  return series.slice(-required).map((point) => point.price);
}

export class CorrelationAnalyzer {
  private readonly deps: CorrelationAnalyzerDeps;

  constructor(deps: CorrelationAnalyzerDeps) {
    this.deps = deps;
  }

  async analyze(
    snapshot: PortfolioSnapshot,
    config: Pick<RiskEngineConfig, "windowDays">,
    signal?: AbortSignal,
  ): Promise<CorrelationResult> {
    const { prices, referenceSymbol, knowledge } = this.deps;
    const windowDays = config.windowDays;
    const required = windowDays + 1;

    const included: WindowedHolding[] = [];
    const excluded: ExcludedHolding[] = [];
    for (const holding of snapshot.holdings) {
      try {
        included.push({
          symbol: holding.symbol,
          value: holding.value,
          prices: trailingPrices(prices, holding.symbol, required),
        });
      } catch (err) {
        if (!(err instanceof InsufficientDataError)) throw err;
        excluded.push({ symbol: holding.symbol, reason: err.message });
      }
    }

    let referencePrices: number[];
    try {
      referencePrices = trailingPrices(prices, referenceSymbol, required);
    } catch (err) {
      if (!(err instanceof InsufficientDataError)) throw err;
      return insufficient(
        windowDays,
        referenceSymbol,
        excluded,
        `reference asset ${referenceSymbol}: ${err.message}`,
      );
    }

    if (included.length === 0) {
      return insufficient(
        windowDays,
        referenceSymbol,
        excluded,
        `no holding has the ${required} daily prices a ${windowDays}-day window needs`,
      );
    }

    const includedValue = included.reduce((sum, h) => sum + h.value, 0);
    const weights = included.map((h) => h.value / includedValue);
    const portfolioReturns = weightedSeries(
      included.map((h) => simpleReturns(h.prices)),
      weights,
    );
    const referenceReturns = simpleReturns(referencePrices);

    const raw = pearsonCorrelation(portfolioReturns, referenceReturns);
    const percentage = toCoMovementPercentage(raw);
    const bracket = bracketFor(percentage);

    const excerpts = await knowledge.lookupBracketPerformance(bracket);
    signal?.throwIfAborted();

    const scenarioContexts: ScenarioContext[] = excerpts.map((e) => ({
      scenarioId: e.scenarioId,
      displayName: e.displayName,
      periodLabel: e.periodLabel,
      expectedLossPct: e.lossPct,
      referenceLossPct: e.referenceDrawdownPct,
    }));

    const coefficient = round(raw, 4);
    logger.debug(SERVICE, "Correlation computed", {
      coefficient,
      percentage,
      bracket,
      included: included.length,
      excluded: excluded.length,
    });

    const result: Omit<ComputedCorrelation, "narrative"> = {
      status: "computed",
      coefficient,
      percentage,
      bracket,
      windowDays,
      referenceSymbol,
      includedSymbols: included.map((h) => h.symbol),
      excludedHoldings: excluded,
      scenarioContexts,
    };
    return { ...result, narrative: describeCorrelation(result) };
  }
}

// ---------------------------------------------------------------------------
// Narratives
// ---------------------------------------------------------------------------

function directionOf(coefficient: number): string {
  if (coefficient > 0) return "a positive";
  if (coefficient < 0) return "an inverse";
  return "no";
}

function exclusionNote(excluded: readonly ExcludedHolding[]): string | null {
  if (excluded.length === 0) return null;
  const items = excluded.map((e) => `${e.symbol} (${e.reason})`);
  return `Excluded from the calculation: ${formatList(items)}.`;
}

export function describeCorrelation(result: Omit<ComputedCorrelation, "narrative">): string {
  const lines = [
    `Portfolio returns show ${directionOf(result.coefficient)} correlation (coefficient ` +
      `${result.coefficient.toFixed(2)}) with ${result.referenceSymbol} over the last ` +
      `${result.windowDays} days (${result.percentage}% co-movement, ${result.bracket} bracket).`,
  ];

  if (result.scenarioContexts.length === 0) {
    lines.push("No historical scenario context is available for this bracket.");
  }
  for (const ctx of result.scenarioContexts) {
    lines.push(
      `During ${ctx.displayName} (${ctx.periodLabel}), portfolios in this bracket lost ` +
        `${formatMagnitude(ctx.expectedLossPct)} vs ${formatMagnitude(ctx.referenceLossPct)} ` +
        `for ${result.referenceSymbol}.`,
    );
  }

  const note = exclusionNote(result.excludedHoldings);
  if (note) lines.push(note);

  return lines.join("\n");
}

function insufficient(
  windowDays: number,
  referenceSymbol: string,
  excluded: ExcludedHolding[],
  reason: string,
): InsufficientCorrelation {
  logger.warn(SERVICE, "Insufficient price history for correlation", {
    reason,
    excluded: excluded.length,
  });

  const lines = [`Correlation with ${referenceSymbol} could not be computed: insufficient data (${reason}).`];
  const note = exclusionNote(excluded);
  if (note) lines.push(note);

  return {
    status: "insufficient_data",
    windowDays,
    referenceSymbol,
    excludedHoldings: excluded,
    reason,
    narrative: lines.join("\n"),
  };
}
