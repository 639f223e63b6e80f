/**
 * Table Knowledge Backend
 *
 * Direct indexed lookups over the scenario records. Serves as the fallback
 * behind the graph backend, or as the only backend when configured so.
 */

import type { CoMovementBracket, ScenarioRecord } from "../schemas/reference-data.ts";
import {
  opportunityCostNarrative,
  type JointExcerpt,
  type KnowledgeBackendStore,
  type OpportunityCandidate,
  type ScenarioExcerpt,
  type ScenarioSummary,
} from "./knowledge-types.ts";

export class TableKnowledgeBackend implements KnowledgeBackendStore {
  readonly name = "table";

  private readonly records: readonly ScenarioRecord[];
  private readonly opportunityCandidates: OpportunityCandidate[];

  constructor(records: readonly ScenarioRecord[]) {
    this.records = records;
    this.opportunityCandidates = records.flatMap((record) =>
      record.opportunityCosts.map((cost) => ({
        displayName: record.displayName,
        recoveryPeriodLabel: record.recoveryPeriodLabel,
        category: cost.category,
        bestPerformer: cost.bestPerformer,
        recoveryGainPct: cost.recoveryGainPct,
        reason: cost.reason,
      })),
    );
  }

  async lookupBracketPerformance(bracket: CoMovementBracket): Promise<ScenarioExcerpt[]> {
    return this.records.map((record) => excerpt(record, record.bracketLosses[bracket]));
  }

  async lookupCategoryPerformance(category: string): Promise<ScenarioExcerpt[]> {
    const results: ScenarioExcerpt[] = [];
    for (const record of this.records) {
      if (!Object.hasOwn(record.categoryLosses, category)) continue;
      results.push(excerpt(record, record.categoryLosses[category]));
    }
    return results;
  }

  async lookupOpportunityCost(category: string): Promise<string> {
    return opportunityCostNarrative(this.opportunityCandidates, category);
  }

  async lookupJointPerformance(
    bracket: CoMovementBracket,
    category: string,
  ): Promise<JointExcerpt[]> {
    const results: JointExcerpt[] = [];
    for (const record of this.records) {
      for (const joint of record.jointLosses) {
        if (joint.bracket !== bracket || joint.category !== category) continue;
        results.push({
          scenarioId: record.scenarioId,
          displayName: record.displayName,
          periodLabel: record.periodLabel,
          jointLossPct: joint.lossPct,
          bracketLossPct: record.bracketLosses[bracket],
        });
      }
    }
    return results;
  }

  async listScenarios(): Promise<ScenarioSummary[]> {
    return this.records.map((record) => ({
      scenarioId: record.scenarioId,
      displayName: record.displayName,
      periodLabel: record.periodLabel,
      referenceDrawdownPct: record.referenceDrawdownPct,
      marketAvgLossPct: record.marketAvgLossPct,
      recoveryPeriodLabel: record.recoveryPeriodLabel,
      recoveryWinners: [...record.recoveryWinners],
    }));
  }
}

function excerpt(record: ScenarioRecord, lossPct: number): ScenarioExcerpt {
  return {
    scenarioId: record.scenarioId,
    displayName: record.displayName,
    periodLabel: record.periodLabel,
    lossPct,
    referenceDrawdownPct: record.referenceDrawdownPct,
    marketAvgLossPct: record.marketAvgLossPct,
  };
}
