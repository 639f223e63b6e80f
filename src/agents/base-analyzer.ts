/**
 * Base Analyzer Types
 *
 * Core interfaces shared by the two analyzers, the synthesis engine and the
 * coordinator, plus the channel contract the coordinator talks through.
 * Every result value is created fresh per request and never mutated.
 */

import type { RiskEngineConfig } from "../config/risk-config.ts";
import type { CoMovementBracket } from "../schemas/reference-data.ts";
import type { PortfolioSnapshot } from "../services/portfolio.ts";

export type { CoMovementBracket } from "../schemas/reference-data.ts";

// ---------------------------------------------------------------------------
// Core Types
// ---------------------------------------------------------------------------

export type AnalyzerName = "correlation" | "concentration";

export type RiskLevel = "Low" | "Moderate" | "High" | "Critical";

export type DiversificationLabel = "WellDiversified" | "Moderate" | "HighConcentration";

/** How a bracket fared in one historical scenario */
export interface ScenarioContext {
  scenarioId: string;
  displayName: string;
  periodLabel: string;
  /** Loss for portfolios in the bracket (negative = loss) */
  expectedLossPct: number;
  /** Reference asset drawdown over the same scenario */
  referenceLossPct: number;
}

export interface ExcludedHolding {
  symbol: string;
  reason: string;
}

/** Co-movement with the reference asset, computed over the trailing window */
export interface ComputedCorrelation {
  status: "computed";
  coefficient: number;
  /** round(|coefficient| × 100) */
  percentage: number;
  bracket: CoMovementBracket;
  windowDays: number;
  referenceSymbol: string;
  includedSymbols: string[];
  excludedHoldings: ExcludedHolding[];
  scenarioContexts: ScenarioContext[];
  narrative: string;
}

export interface InsufficientCorrelation {
  status: "insufficient_data";
  windowDays: number;
  referenceSymbol: string;
  excludedHoldings: ExcludedHolding[];
  reason: string;
  narrative: string;
}

export type CorrelationResult = ComputedCorrelation | InsufficientCorrelation;

export interface CategoryHolding {
  categoryName: string;
  value: number;
  /** Share of total portfolio value, 0-100 */
  percentage: number;
  memberSymbols: string[];
}

/** How a category fared in one historical scenario */
export interface CategoryScenarioContext {
  scenarioId: string;
  displayName: string;
  periodLabel: string;
  categoryLossPct: number;
  marketAvgLossPct: number;
}

export interface CategoryRisk {
  categoryName: string;
  percentage: number;
  scenarioContexts: CategoryScenarioContext[];
  /** Empty when the knowledge store has no opportunity-cost entry */
  opportunityCostNarrative: string;
}

export interface ConcentrationResult {
  breakdown: Record<string, CategoryHolding>;
  /** Sorted by share, largest first */
  concentratedCategories: string[];
  diversificationLabel: DiversificationLabel;
  largestCategory: { categoryName: string; percentage: number } | null;
  categoryRisks: CategoryRisk[];
  unknownSymbols: string[];
  unknownValue: number;
  unknownPercentage: number;
  totalValue: number;
  narrative: string;
}

export interface Recommendation {
  rank: number;
  action: string;
  rationale: string;
  expectedImpact: string;
}

/** Why an analysis is absent from a degraded synthesis */
export type MissingOutcome = "timed_out" | "failed" | "insufficient_data";

export interface DegradedNote {
  missing: AnalyzerName;
  outcome: MissingOutcome;
  note: string;
}

export interface SynthesisResult {
  correlation: ComputedCorrelation | null;
  concentration: ConcentrationResult | null;
  compoundingDetected: boolean;
  riskMultiplier: number;
  multiplierSource: "historical" | "estimate";
  overallRiskLevel: RiskLevel;
  recommendations: Recommendation[];
  degraded: DegradedNote | null;
  narrative: string;
}

// ---------------------------------------------------------------------------
// Coordinator Types
// ---------------------------------------------------------------------------

export type CallStatus = "succeeded" | "timed_out" | "failed";

/** Outcome of one analyzer call, as recorded in the report */
export interface AnalyzerCallRecord {
  analyzer: AnalyzerName;
  status: CallStatus;
  durationMs: number;
  /** Identity of the analyzer that answered; null when none did */
  analyzerId: string | null;
  error: string | null;
}

export interface AnalyzerCalls {
  correlation: AnalyzerCallRecord;
  concentration: AnalyzerCallRecord;
}

export interface AnalysisReport {
  status: "completed";
  correlationId: string;
  correlation: CorrelationResult | null;
  concentration: ConcentrationResult | null;
  synthesis: SynthesisResult;
  calls: AnalyzerCalls;
  partial: boolean;
  totalDurationMs: number;
  completedAt: string;
}

export interface FailureCause {
  stage: AnalyzerName | "synthesis";
  code: string;
  message: string;
}

export interface AnalysisFailure {
  status: "failed";
  correlationId: string;
  causes: FailureCause[];
  calls: AnalyzerCalls;
  totalDurationMs: number;
}

export type AnalysisOutcome = AnalysisReport | AnalysisFailure;

export interface AnalyzeRequest {
  correlationId: string;
  snapshot: PortfolioSnapshot;
}

// ---------------------------------------------------------------------------
// Channel contract
// ---------------------------------------------------------------------------

export interface AnalyzerRequestMessage {
  requestId: string;
  snapshot: PortfolioSnapshot;
  config: RiskEngineConfig;
}

export interface AnalyzerResponseMessage<T> {
  requestId: string;
  analyzerId: string;
  payload: T;
  processingTimeMs: number;
}

/**
 * Async request/response transport to one analyzer. Implementations must
 * reject once `signal` aborts.
 */
export interface AnalyzerChannel<T> {
  readonly analyzer: AnalyzerName;
  request(message: AnalyzerRequestMessage, signal: AbortSignal): Promise<AnalyzerResponseMessage<T>>;
}
