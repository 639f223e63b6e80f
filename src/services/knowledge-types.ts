/**
 * Historical Knowledge Types
 *
 * The lookup contract both knowledge backends implement, the excerpt shapes
 * they return, and the opportunity-cost selection they share so that the
 * two backends answer every question identically.
 */

import type { CoMovementBracket } from "../schemas/reference-data.ts";
import { round1 } from "../lib/math-utils.ts";

// ---------------------------------------------------------------------------
// Excerpts
// ---------------------------------------------------------------------------

/** One scenario's figure for a bracket or category. */
export interface ScenarioExcerpt {
  scenarioId: string;
  displayName: string;
  periodLabel: string;
  /** Loss for the queried bracket or category (negative = loss) */
  lossPct: number;
  referenceDrawdownPct: number;
  marketAvgLossPct: number;
}

/** A scenario holding a joint (bracket, category) figure. */
export interface JointExcerpt {
  scenarioId: string;
  displayName: string;
  periodLabel: string;
  jointLossPct: number;
  /** The bracket's own loss in the same scenario */
  bracketLossPct: number;
}

export interface ScenarioSummary {
  scenarioId: string;
  displayName: string;
  periodLabel: string;
  referenceDrawdownPct: number;
  marketAvgLossPct: number;
  recoveryPeriodLabel: string;
  recoveryWinners: string[];
}

// ---------------------------------------------------------------------------
// Store contract
// ---------------------------------------------------------------------------

/**
 * Read-only access to historical stress scenarios. All list results are in
 * scenario load order.
 */
export interface KnowledgeStore {
  lookupBracketPerformance(bracket: CoMovementBracket): Promise<ScenarioExcerpt[]>;
  lookupCategoryPerformance(category: string): Promise<ScenarioExcerpt[]>;
  /** Narrative, or "" when no scenario offers one. */
  lookupOpportunityCost(category: string): Promise<string>;
  lookupJointPerformance(bracket: CoMovementBracket, category: string): Promise<JointExcerpt[]>;
  listScenarios(): Promise<ScenarioSummary[]>;
}

/** A concrete backend; the name only reaches logs. */
export interface KnowledgeBackendStore extends KnowledgeStore {
  readonly name: string;
}

// ---------------------------------------------------------------------------
// Opportunity cost
// ---------------------------------------------------------------------------

export interface OpportunityCandidate {
  displayName: string;
  recoveryPeriodLabel: string;
  category: string;
  bestPerformer: string;
  recoveryGainPct: number;
  reason: string;
}

/**
 * Pick the strongest recovery among categories other than `queried`.
 * Candidates must arrive in scenario order; ties keep the earliest.
 */
export function pickOpportunityCost(
  candidates: readonly OpportunityCandidate[],
  queried: string,
): OpportunityCandidate | null {
  let best: OpportunityCandidate | null = null;
  for (const candidate of candidates) {
    if (candidate.category === queried) continue;
    if (best === null || candidate.recoveryGainPct > best.recoveryGainPct) {
      best = candidate;
    }
  }
  return best;
}

export function describeOpportunityCost(candidate: OpportunityCandidate, queried: string): string {
  return (
    `During the ${candidate.recoveryPeriodLabel} after ${candidate.displayName}, ` +
    `${candidate.category} holdings such as ${candidate.bestPerformer} gained ` +
    `${round1(candidate.recoveryGainPct)}% while capital sat in ${queried}. ${candidate.reason}`
  ).trim();
}

export function opportunityCostNarrative(
  candidates: readonly OpportunityCandidate[],
  queried: string,
): string {
  const best = pickOpportunityCost(candidates, queried);
  return best ? describeOpportunityCost(best, queried) : "";
}
