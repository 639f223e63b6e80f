/**
 * Concentration Analyzer
 *
 * Groups holdings by category, computes each category's share of total
 * portfolio value, flags categories above the danger threshold and attaches
 * how those categories fared in historical stress scenarios.
 *
 * Symbols with no category mapping are reported separately. Their value is
 * left out of the breakdown but stays in the denominator, so category shares
 * plus the unknown share always add up to 100.
 */

import { Decimal } from "decimal.js";
import type { RiskEngineConfig } from "../config/risk-config.ts";
import type { CategoryMapping } from "../schemas/reference-data.ts";
import type {
  CategoryHolding,
  CategoryRisk,
  ConcentrationResult,
  DiversificationLabel,
} from "../agents/base-analyzer.ts";
import type { KnowledgeStore } from "./knowledge-types.ts";
import type { PortfolioSnapshot } from "./portfolio.ts";
import { formatMagnitude, formatShare } from "../lib/format-utils.ts";
import { logger } from "./structured-logger.ts";

const SERVICE = "concentration-analyzer";

export type ConcentrationThresholds = Pick<
  RiskEngineConfig,
  "dangerThresholdPct" | "moderateThresholdPct"
>;

export interface ConcentrationAnalyzerDeps {
  categories: CategoryMapping;
  knowledge: KnowledgeStore;
}

interface CategoryAccumulator {
  value: Decimal;
  members: string[];
  firstSeen: number;
}

export function diversificationLabelFor(
  largestPct: number | null,
  concentratedCount: number,
  thresholds: ConcentrationThresholds,
): DiversificationLabel {
  if (concentratedCount > 0) return "HighConcentration";
  if (largestPct !== null && largestPct >= thresholds.moderateThresholdPct) return "Moderate";
  return "WellDiversified";
}

export class ConcentrationAnalyzer {
  private readonly deps: ConcentrationAnalyzerDeps;

  constructor(deps: ConcentrationAnalyzerDeps) {
    this.deps = deps;
  }

  async analyze(
    snapshot: PortfolioSnapshot,
    thresholds: ConcentrationThresholds,
    signal?: AbortSignal,
  ): Promise<ConcentrationResult> {
    const { categories, knowledge } = this.deps;
    const total = new Decimal(snapshot.totalValue);

    const groups = new Map<string, CategoryAccumulator>();
    const unknownSymbols: string[] = [];
    let unknownValue = new Decimal(0);

    snapshot.holdings.forEach((holding, index) => {
      const category = Object.hasOwn(categories, holding.symbol) ? categories[holding.symbol] : undefined;
      if (category === undefined) {
        unknownValue = unknownValue.add(holding.value);
        if (!unknownSymbols.includes(holding.symbol)) unknownSymbols.push(holding.symbol);
        return;
      }
      const group = groups.get(category);
      if (group) {
        group.value = group.value.add(holding.value);
        if (!group.members.includes(holding.symbol)) group.members.push(holding.symbol);
      } else {
        groups.set(category, {
          value: new Decimal(holding.value),
          members: [holding.symbol],
          firstSeen: index,
        });
      }
    });

    const share = (value: Decimal): number => value.div(total).mul(100).toNumber();

    const holdings: CategoryHolding[] = [...groups.entries()]
      .sort(([, a], [, b]) => b.value.comparedTo(a.value) || a.firstSeen - b.firstSeen)
      .map(([categoryName, group]) => ({
        categoryName,
        value: group.value.toNumber(),
        percentage: share(group.value),
        memberSymbols: group.members,
      }));

    const breakdown: Record<string, CategoryHolding> = Object.fromEntries(
      holdings.map((holding) => [holding.categoryName, holding]),
    );

    const concentrated = holdings.filter((h) => h.percentage > thresholds.dangerThresholdPct);
    const largest = holdings[0] ?? null;
    const diversificationLabel = diversificationLabelFor(
      largest ? largest.percentage : null,
      concentrated.length,
      thresholds,
    );

    const categoryRisks: CategoryRisk[] = await Promise.all(
      concentrated.map(async (holding) => {
        const [excerpts, opportunityCostNarrative] = await Promise.all([
          knowledge.lookupCategoryPerformance(holding.categoryName),
          knowledge.lookupOpportunityCost(holding.categoryName),
        ]);
        return {
          categoryName: holding.categoryName,
          percentage: holding.percentage,
          scenarioContexts: excerpts.map((e) => ({
            scenarioId: e.scenarioId,
            displayName: e.displayName,
            periodLabel: e.periodLabel,
            categoryLossPct: e.lossPct,
            marketAvgLossPct: e.marketAvgLossPct,
          })),
          opportunityCostNarrative,
        };
      }),
    );
    signal?.throwIfAborted();

    logger.debug(SERVICE, "Concentration computed", {
      categories: holdings.length,
      concentrated: concentrated.length,
      unknownSymbols: unknownSymbols.length,
      label: diversificationLabel,
    });

    const result: Omit<ConcentrationResult, "narrative"> = {
      breakdown,
      concentratedCategories: concentrated.map((h) => h.categoryName),
      diversificationLabel,
      largestCategory: largest
        ? { categoryName: largest.categoryName, percentage: largest.percentage }
        : null,
      categoryRisks,
      unknownSymbols,
      unknownValue: unknownValue.toNumber(),
      unknownPercentage: share(unknownValue),
      totalValue: snapshot.totalValue,
    };
    return { ...result, narrative: describeConcentration(result, thresholds) };
  }
}

// ---------------------------------------------------------------------------
// Narrative
// ---------------------------------------------------------------------------

export function describeConcentration(
  result: Omit<ConcentrationResult, "narrative">,
  thresholds: ConcentrationThresholds,
): string {
  const lines: string[] = [];
  const danger = thresholds.dangerThresholdPct;
  const exposures = Object.values(result.breakdown).map(
    (h) => `${h.categoryName} ${formatShare(h.percentage)}`,
  );

  if (exposures.length > 0) {
    lines.push(`Category exposure: ${exposures.join(", ")}.`);
  }
  if (result.unknownSymbols.length > 0) {
    lines.push(
      `Unclassified holdings (${result.unknownSymbols.join(", ")}) make up ` +
        `${formatShare(result.unknownPercentage)} of value.`,
    );
  }

  if (result.categoryRisks.length === 0) {
    lines.push(
      result.largestCategory
        ? `No concentration warnings: the largest category, ${result.largestCategory.categoryName} at ` +
            `${formatShare(result.largestCategory.percentage)}, is within the ${danger}% danger threshold.`
        : "No concentration warnings: no holding maps to a known category.",
    );
    return lines.join("\n");
  }

  for (const risk of result.categoryRisks) {
    lines.push(
      `${risk.categoryName} makes up ${formatShare(risk.percentage)} of the portfolio, ` +
        `above the ${danger}% danger threshold.`,
    );
    for (const ctx of risk.scenarioContexts) {
      lines.push(
        `During ${ctx.displayName} (${ctx.periodLabel}), ${risk.categoryName} holdings lost ` +
          `${formatMagnitude(ctx.categoryLossPct)} vs a market average of ` +
          `${formatMagnitude(ctx.marketAvgLossPct)}.`,
      );
    }
    if (risk.opportunityCostNarrative) lines.push(risk.opportunityCostNarrative);
  }

  return lines.join("\n");
}
