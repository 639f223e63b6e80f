/**
 * Synthesis Engine
 *
 * Combines the correlation and concentration analyses into one risk
 * judgment. The core (`synthesizeAnalyses`, `synthesizePartial`) is pure:
 * same inputs, same output, no I/O. `SynthesisEngine` adds the one lookup
 * the multiplier needs (joint bracket × category records) and delegates.
 *
 * Risk level, first match wins:
 *   Critical  compounding and co-movement above the critical threshold
 *   High      compounding, a High bracket, or any concentrated category
 *   Moderate  Moderate bracket or Moderate diversification label
 *   Low       otherwise
 */

import type { SynthesisThresholds } from "../config/risk-config.ts";
import type {
  AnalyzerName,
  CategoryScenarioContext,
  ComputedCorrelation,
  ConcentrationResult,
  MissingOutcome,
  Recommendation,
  RiskLevel,
  ScenarioContext,
  SynthesisResult,
} from "../agents/base-analyzer.ts";
import type { JointExcerpt, KnowledgeStore } from "./knowledge-types.ts";
import { mean, round2 } from "../lib/math-utils.ts";
import { formatMagnitude, formatShare } from "../lib/format-utils.ts";
import { MODERATE_BRACKET_FROM_PCT } from "./correlation-analyzer.ts";
import { logger } from "./structured-logger.ts";

const SERVICE = "synthesis-engine";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface SynthesisInput {
  correlation: ComputedCorrelation;
  concentration: ConcentrationResult;
  /** Joint records for (bracket, top concentrated category); may be empty */
  jointRecords: readonly JointExcerpt[];
}

export type PartialSynthesisInput =
  | {
      correlation: ComputedCorrelation;
      concentration: null;
      missing: "concentration";
      outcome: MissingOutcome;
      detail: string;
    }
  | {
      correlation: null;
      concentration: ConcentrationResult;
      missing: "correlation";
      outcome: MissingOutcome;
      detail: string;
    };

interface Multiplier {
  riskMultiplier: number;
  multiplierSource: "historical" | "estimate";
  scenarioCount: number;
}

const ESTIMATE: Multiplier = { riskMultiplier: 1.0, multiplierSource: "estimate", scenarioCount: 0 };

// ---------------------------------------------------------------------------
// Rules
// ---------------------------------------------------------------------------

export function isCompounding(
  correlation: ComputedCorrelation,
  concentration: ConcentrationResult,
  thresholds: SynthesisThresholds,
): boolean {
  return (
    correlation.percentage > thresholds.compoundingCorrelationPct &&
    concentration.concentratedCategories.length > 0
  );
}

/**
 * Mean joint loss over mean bracket loss for the same scenarios.
 * Without joint records (or with a zero bracket loss) the multiplier is an
 * estimate of 1.0.
 */
export function computeRiskMultiplier(jointRecords: readonly JointExcerpt[]): Multiplier {
  if (jointRecords.length === 0) return ESTIMATE;
  const bracketMean = mean(jointRecords.map((r) => r.bracketLossPct));
  if (bracketMean === 0) return ESTIMATE;
  const jointMean = mean(jointRecords.map((r) => r.jointLossPct));
  return {
    riskMultiplier: round2(jointMean / bracketMean),
    multiplierSource: "historical",
    scenarioCount: jointRecords.length,
  };
}

/**
 * First match wins: Critical (compounding above the critical correlation),
 * High (compounding), Moderate (Moderate bracket or label), Low.
 */
export function overallRiskLevel(
  correlation: ComputedCorrelation | null,
  concentration: ConcentrationResult | null,
  compounding: boolean,
  thresholds: SynthesisThresholds,
): RiskLevel {
  if (compounding && correlation && correlation.percentage > thresholds.criticalCorrelationPct) {
    return "Critical";
  }
  if (compounding) return "High";
  if (correlation?.bracket === "Moderate" || concentration?.diversificationLabel === "Moderate") {
    return "Moderate";
  }
  return "Low";
}

// ---------------------------------------------------------------------------
// Recommendations
// ---------------------------------------------------------------------------

type Draft = Omit<Recommendation, "rank">;

function topConcentrated(concentration: ConcentrationResult): { name: string; pct: number } | null {
  const name = concentration.concentratedCategories[0];
  if (name === undefined) return null;
  const holding = concentration.breakdown[name];
  return { name, pct: holding ? holding.percentage : 0 };
}

function reduceConcentration(
  concentration: ConcentrationResult,
  thresholds: SynthesisThresholds,
): Draft | null {
  const top = topConcentrated(concentration);
  if (!top) return null;

  const risk = concentration.categoryRisks.find((r) => r.categoryName === top.name);
  const worst = risk?.scenarioContexts.reduce<CategoryScenarioContext | null>(
    (acc, ctx) => (acc === null || ctx.categoryLossPct < acc.categoryLossPct ? ctx : acc),
    null,
  );
  const history = worst
    ? ` ${top.name} holdings lost ${formatMagnitude(worst.categoryLossPct)} during ${worst.displayName}.`
    : "";
  const opportunity = risk?.opportunityCostNarrative ? ` ${risk.opportunityCostNarrative}` : "";

  return {
    action: `Reduce ${top.name} exposure from ${formatShare(top.pct)} to below ${thresholds.moderateThresholdPct}% of portfolio value`,
    rationale:
      `${top.name} makes up ${formatShare(top.pct)} of the portfolio, above the ` +
      `${thresholds.dangerThresholdPct}% danger threshold, so a downturn in that one category ` +
      `drives most of the portfolio's losses.${history}`,
    expectedImpact:
      `Bringing ${top.name} below ${thresholds.moderateThresholdPct}% caps how much a ` +
      `single-category drawdown can take from the portfolio.${opportunity}`,
  };
}

function reduceCorrelation(correlation: ComputedCorrelation): Draft {
  const worst = correlation.scenarioContexts.reduce<ScenarioContext | null>(
    (acc, ctx) => (acc === null || ctx.expectedLossPct < acc.expectedLossPct ? ctx : acc),
    null,
  );
  const history = worst
    ? ` Portfolios in the ${correlation.bracket} bracket lost ${formatMagnitude(worst.expectedLossPct)} ` +
      `during ${worst.displayName}, when ${correlation.referenceSymbol} fell ` +
      `${formatMagnitude(worst.referenceLossPct)}.`
    : "";

  return {
    action:
      `Add holdings that move independently of ${correlation.referenceSymbol} to bring ` +
      `co-movement from ${correlation.percentage}% below ${MODERATE_BRACKET_FROM_PCT}%`,
    rationale:
      `At ${correlation.percentage}% co-movement the portfolio tracks ` +
      `${correlation.referenceSymbol} closely (${correlation.bracket} bracket).${history}`,
    expectedImpact:
      `Moving into the Low bracket reduces how much of a ${correlation.referenceSymbol} ` +
      `drawdown passes through to the portfolio.`,
  };
}

function prioritizeConcentration(
  correlation: ComputedCorrelation,
  concentration: ConcentrationResult,
): Draft {
  const name = concentration.concentratedCategories[0] ?? "the concentrated category";
  return {
    action: `Address ${name} concentration before reducing correlation`,
    rationale:
      `Concentration amplifies co-movement here: while ${name} itself moves with ` +
      `${correlation.referenceSymbol}, trimming it lowers both exposures at once.`,
    expectedImpact:
      `Reducing ${name} first lowers both risk dimensions together, so fewer further ` +
      `changes are needed to reach the correlation target.`,
  };
}

function trimLargest(
  concentration: ConcentrationResult,
  thresholds: SynthesisThresholds,
): Draft | null {
  const largest = concentration.largestCategory;
  if (!largest) return null;
  return {
    action: `Trim ${largest.categoryName} from ${formatShare(largest.percentage)} to below ${thresholds.moderateThresholdPct}% of portfolio value`,
    rationale:
      `${largest.categoryName} is the largest category at ${formatShare(largest.percentage)}: ` +
      `within the ${thresholds.dangerThresholdPct}% danger threshold but at or above the ` +
      `${thresholds.moderateThresholdPct}% watch level.`,
    expectedImpact:
      `Keeps the portfolio clear of the danger threshold if ${largest.categoryName} ` +
      `outperforms and grows its share.`,
  };
}

function maintain(
  correlation: ComputedCorrelation | null,
  concentration: ConcentrationResult | null,
  thresholds: SynthesisThresholds,
): Draft {
  const parts: string[] = [];
  if (correlation) {
    parts.push(
      `co-movement with ${correlation.referenceSymbol} is ${correlation.percentage}% (${correlation.bracket} bracket)`,
    );
  }
  if (concentration) {
    parts.push(
      concentration.largestCategory
        ? `the largest category, ${concentration.largestCategory.categoryName}, holds ` +
            `${formatShare(concentration.largestCategory.percentage)} of value`
        : "no holding maps to a known category",
    );
  }
  const summary = parts.join(" and ");

  return {
    action: "Maintain current balanced portfolio structure",
    rationale: `${summary.charAt(0).toUpperCase()}${summary.slice(1)}, which keeps compounding risk limited.`,
    expectedImpact:
      `Review periodically and revisit if any category reaches ${thresholds.moderateThresholdPct}% ` +
      `or co-movement reaches ${MODERATE_BRACKET_FROM_PCT}%.`,
  };
}

/**
 * Deterministic, 1 to 3 entries. With compounding, concentration always
 * ranks ahead of correlation.
 */
export function buildRecommendations(
  correlation: ComputedCorrelation | null,
  concentration: ConcentrationResult | null,
  compounding: boolean,
  thresholds: SynthesisThresholds,
): Recommendation[] {
  const drafts: Draft[] = [];

  if (compounding && correlation && concentration) {
    const reduce = reduceConcentration(concentration, thresholds);
    if (reduce) drafts.push(reduce);
    drafts.push(reduceCorrelation(correlation));
    drafts.push(prioritizeConcentration(correlation, concentration));
  } else {
    if (concentration && concentration.concentratedCategories.length > 0) {
      const reduce = reduceConcentration(concentration, thresholds);
      if (reduce) drafts.push(reduce);
    }
    if (correlation && correlation.bracket !== "Low") {
      drafts.push(reduceCorrelation(correlation));
    }
    if (concentration && concentration.diversificationLabel === "Moderate") {
      const trim = trimLargest(concentration, thresholds);
      if (trim) drafts.push(trim);
    }
  }

  if (drafts.length === 0) drafts.push(maintain(correlation, concentration, thresholds));

  return drafts.slice(0, 3).map((draft, index) => ({ rank: index + 1, ...draft }));
}

// ---------------------------------------------------------------------------
// Narrative
// ---------------------------------------------------------------------------

function multiplierSentence(
  multiplier: Multiplier,
  correlation: ComputedCorrelation,
  category: string,
): string {
  if (multiplier.multiplierSource === "historical") {
    return (
      `Across ${multiplier.scenarioCount} historical scenario${multiplier.scenarioCount === 1 ? "" : "s"}, ` +
      `portfolios combining a ${correlation.bracket} bracket with ${category} concentration lost ` +
      `${multiplier.riskMultiplier}x what the bracket lost on its own.`
    );
  }
  return (
    `No joint historical record exists for the ${correlation.bracket} bracket with ${category} ` +
    `concentration, so the risk multiplier of 1.0 is an estimate, not a historically validated figure.`
  );
}

function describeSynthesis(
  correlation: ComputedCorrelation,
  concentration: ConcentrationResult,
  compounding: boolean,
  multiplier: Multiplier,
  level: RiskLevel,
  thresholds: SynthesisThresholds,
): string {
  const lines: string[] = [];
  const top = topConcentrated(concentration);

  if (compounding && top) {
    lines.push(
      `Compounding risk detected: ${correlation.percentage}% co-movement with ` +
        `${correlation.referenceSymbol} combined with ${top.name} at ${formatShare(top.pct)} ` +
        `of the portfolio means both exposures fall together.`,
    );
    lines.push(multiplierSentence(multiplier, correlation, top.name));
  } else if (correlation.percentage <= thresholds.compoundingCorrelationPct) {
    lines.push(
      `No compounding risk detected: co-movement of ${correlation.percentage}% is within the ` +
        `${thresholds.compoundingCorrelationPct}% compounding threshold.`,
    );
  } else {
    lines.push(
      `No compounding risk detected: no category is above the ` +
        `${thresholds.dangerThresholdPct}% danger threshold.`,
    );
  }

  lines.push(`Overall risk level: ${level}.`);
  return lines.join("\n");
}

// ---------------------------------------------------------------------------
// Synthesis
// ---------------------------------------------------------------------------

export function synthesizeAnalyses(
  input: SynthesisInput,
  thresholds: SynthesisThresholds,
): SynthesisResult {
  const { correlation, concentration } = input;
  const compoundingDetected = isCompounding(correlation, concentration, thresholds);
  const multiplier = compoundingDetected ? computeRiskMultiplier(input.jointRecords) : ESTIMATE;
  const level = overallRiskLevel(correlation, concentration, compoundingDetected, thresholds);

  return {
    correlation,
    concentration,
    compoundingDetected,
    riskMultiplier: multiplier.riskMultiplier,
    multiplierSource: multiplier.multiplierSource,
    overallRiskLevel: level,
    recommendations: buildRecommendations(
      correlation,
      concentration,
      compoundingDetected,
      thresholds,
    ),
    degraded: null,
    narrative: describeSynthesis(
      correlation,
      concentration,
      compoundingDetected,
      multiplier,
      level,
      thresholds,
    ),
  };
}

const OUTCOME_PHRASES: Record<MissingOutcome, string> = {
  timed_out: "timed out",
  failed: "failed",
  insufficient_data: "had insufficient data",
};

function otherAnalyzer(missing: AnalyzerName): AnalyzerName {
  return missing === "correlation" ? "concentration" : "correlation";
}

/**
 * One analysis is missing. Compounding cannot be assessed, so the same
 * ladder runs with compounding off and only the available side: Moderate
 * or Low, never High or Critical.
 */
export function synthesizePartial(
  input: PartialSynthesisInput,
  thresholds: SynthesisThresholds,
): SynthesisResult {
  const level = overallRiskLevel(input.correlation, input.concentration, false, thresholds);

  const note =
    `The ${input.missing} analysis ${OUTCOME_PHRASES[input.outcome]} (${input.detail}), so this ` +
    `risk judgment is based on partial information from the ${otherAnalyzer(input.missing)} ` +
    `analysis alone and compounding risk could not be assessed.`;

  return {
    correlation: input.correlation,
    concentration: input.concentration,
    compoundingDetected: false,
    riskMultiplier: ESTIMATE.riskMultiplier,
    multiplierSource: ESTIMATE.multiplierSource,
    overallRiskLevel: level,
    recommendations: buildRecommendations(
      input.correlation,
      input.concentration,
      false,
      thresholds,
    ),
    degraded: { missing: input.missing, outcome: input.outcome, note },
    narrative: `${note}\nOverall risk level: ${level}.`,
  };
}

// ---------------------------------------------------------------------------
// Engine
// ---------------------------------------------------------------------------

export class SynthesisEngine {
  private readonly knowledge: KnowledgeStore;

  constructor(knowledge: KnowledgeStore) {
    this.knowledge = knowledge;
  }

  async synthesize(
    correlation: ComputedCorrelation,
    concentration: ConcentrationResult,
    thresholds: SynthesisThresholds,
  ): Promise<SynthesisResult> {
    let jointRecords: JointExcerpt[] = [];
    const category = concentration.concentratedCategories[0];
    if (category !== undefined && isCompounding(correlation, concentration, thresholds)) {
      jointRecords = await this.knowledge.lookupJointPerformance(correlation.bracket, category);
    }

    const result = synthesizeAnalyses({ correlation, concentration, jointRecords }, thresholds);
    logger.info(SERVICE, "Synthesis complete", {
      overallRiskLevel: result.overallRiskLevel,
      compoundingDetected: result.compoundingDetected,
      riskMultiplier: result.riskMultiplier,
      multiplierSource: result.multiplierSource,
    });
    return result;
  }

  synthesizePartial(input: PartialSynthesisInput, thresholds: SynthesisThresholds): SynthesisResult {
    const result = synthesizePartial(input, thresholds);
    logger.warn(SERVICE, "Degraded synthesis", {
      missing: input.missing,
      outcome: input.outcome,
      overallRiskLevel: result.overallRiskLevel,
    });
    return result;
  }
}
