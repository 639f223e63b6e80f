/**
 * Graph Knowledge Backend
 *
 * Scenario records are loaded into a small fact graph: each fact is a tuple
 * whose first element is a predicate, e.g.
 *
 *   ["bracket_loss", "scn-1", "High", -62.5]
 *
 * Lookups are conjunctive pattern queries. A pattern element that is a
 * string beginning with "?" is a variable; a variable bound by an earlier
 * pattern must match the same value in later ones.
 *
 *   graph.query([
 *     ["scenario", "?id", "?name"],
 *     ["bracket_loss", "?id", "High", "?loss"],
 *   ])
 *
 * Caller-supplied values go in through the initial bindings rather than
 * inline, so data that happens to start with "?" is never read as a variable.
 *
 * Results come back in fact insertion order, which is scenario load order.
 */

import type { CoMovementBracket, ScenarioRecord } from "../schemas/reference-data.ts";
import { KnowledgeLookupError } from "../lib/errors.ts";
import {
  opportunityCostNarrative,
  type JointExcerpt,
  type KnowledgeBackendStore,
  type OpportunityCandidate,
  type ScenarioExcerpt,
  type ScenarioSummary,
} from "./knowledge-types.ts";

// ---------------------------------------------------------------------------
// Fact graph
// ---------------------------------------------------------------------------

export type Term = string | number;
export type Fact = readonly [predicate: string, ...args: Term[]];
export type Pattern = readonly [predicate: string, ...args: Term[]];
export type Bindings = ReadonlyMap<string, Term>;

function isVariable(term: Term): term is string {
  return typeof term === "string" && term.startsWith("?");
}

export class FactGraph {
  private readonly byPredicate = new Map<string, Fact[]>();
  private factCount = 0;

  add(fact: Fact): void {
    const [predicate] = fact;
    const bucket = this.byPredicate.get(predicate);
    if (bucket) bucket.push(fact);
    else this.byPredicate.set(predicate, [fact]);
    this.factCount++;
  }

  get size(): number {
    return this.factCount;
  }

  /**
   * Solve the patterns left to right, returning every consistent binding.
   */
  query(patterns: readonly Pattern[], initial: Bindings = new Map()): Bindings[] {
    let solutions: Bindings[] = [initial];
    for (const pattern of patterns) {
      const next: Bindings[] = [];
      const candidates = this.byPredicate.get(pattern[0]) ?? [];
      for (const bindings of solutions) {
        for (const fact of candidates) {
          const unified = unify(pattern, fact, bindings);
          if (unified) next.push(unified);
        }
      }
      solutions = next;
      if (solutions.length === 0) break;
    }
    return solutions;
  }
}

function unify(pattern: Pattern, fact: Fact, bindings: Bindings): Bindings | null {
  if (pattern.length !== fact.length) return null;

  let result: Map<string, Term> | null = null;
  for (let i = 1; i < pattern.length; i++) {
    const term = pattern[i];
    const value = fact[i];
    if (isVariable(term)) {
      const bound = (result ?? bindings).get(term);
      if (bound === undefined) {
        result ??= new Map(bindings);
        result.set(term, value);
      } else if (bound !== value) {
        return null;
      }
    } else if (term !== value) {
      return null;
    }
  }
  return result ?? bindings;
}

function text(bindings: Bindings, variable: string): string {
  const value = bindings.get(variable);
  if (typeof value !== "string") {
    throw new KnowledgeLookupError(`Graph binding ${variable} is not text`);
  }
  return value;
}

function numeric(bindings: Bindings, variable: string): number {
  const value = bindings.get(variable);
  if (typeof value !== "number") {
    throw new KnowledgeLookupError(`Graph binding ${variable} is not numeric`);
  }
  return value;
}

// ---------------------------------------------------------------------------
// Loading
// ---------------------------------------------------------------------------

/**
 * Translate scenario records into facts. Fact order follows record order.
 */
export function buildScenarioGraph(records: readonly ScenarioRecord[]): FactGraph {
  const graph = new FactGraph();

  for (const record of records) {
    const id = record.scenarioId;
    graph.add([
      "scenario",
      id,
      record.displayName,
      record.periodLabel,
      record.referenceDrawdownPct,
      record.marketAvgLossPct,
      record.recoveryPeriodLabel,
    ]);
    graph.add(["bracket_loss", id, "High", record.bracketLosses.High]);
    graph.add(["bracket_loss", id, "Moderate", record.bracketLosses.Moderate]);
    graph.add(["bracket_loss", id, "Low", record.bracketLosses.Low]);
    for (const [category, loss] of Object.entries(record.categoryLosses)) {
      graph.add(["category_loss", id, category, loss]);
    }
    for (const joint of record.jointLosses) {
      graph.add(["joint_loss", id, joint.bracket, joint.category, joint.lossPct]);
    }
    for (const symbol of record.recoveryWinners) {
      graph.add(["recovery_winner", id, symbol]);
    }
    for (const cost of record.opportunityCosts) {
      graph.add([
        "opportunity_cost",
        id,
        cost.category,
        cost.bestPerformer,
        cost.recoveryGainPct,
        cost.reason,
      ]);
    }
  }

  return graph;
}

const SCENARIO: Pattern = ["scenario", "?id", "?name", "?period", "?ref", "?market", "?recovery"];

// ---------------------------------------------------------------------------
// Backend
// ---------------------------------------------------------------------------

export class GraphKnowledgeBackend implements KnowledgeBackendStore {
  readonly name = "graph";

  private readonly graph: FactGraph;

  constructor(records: readonly ScenarioRecord[]) {
    this.graph = buildScenarioGraph(records);
  }

  async lookupBracketPerformance(bracket: CoMovementBracket): Promise<ScenarioExcerpt[]> {
    return this.graph
      .query(
        [SCENARIO, ["bracket_loss", "?id", "?bracket", "?loss"]],
        new Map([["?bracket", bracket]]),
      )
      .map(toExcerpt);
  }

  async lookupCategoryPerformance(category: string): Promise<ScenarioExcerpt[]> {
    return this.graph
      .query(
        [SCENARIO, ["category_loss", "?id", "?category", "?loss"]],
        new Map([["?category", category]]),
      )
      .map(toExcerpt);
  }

  async lookupOpportunityCost(category: string): Promise<string> {
    const candidates: OpportunityCandidate[] = this.graph
      .query([
        SCENARIO,
        ["opportunity_cost", "?id", "?other", "?best", "?gain", "?reason"],
      ])
      .map((b) => ({
        displayName: text(b, "?name"),
        recoveryPeriodLabel: text(b, "?recovery"),
        category: text(b, "?other"),
        bestPerformer: text(b, "?best"),
        recoveryGainPct: numeric(b, "?gain"),
        reason: text(b, "?reason"),
      }));
    return opportunityCostNarrative(candidates, category);
  }

  async lookupJointPerformance(
    bracket: CoMovementBracket,
    category: string,
  ): Promise<JointExcerpt[]> {
    return this.graph
      .query(
        [
          SCENARIO,
          ["joint_loss", "?id", "?bracket", "?category", "?joint"],
          ["bracket_loss", "?id", "?bracket", "?loss"],
        ],
        new Map<string, Term>([
          ["?bracket", bracket],
          ["?category", category],
        ]),
      )
      .map((b) => ({
        scenarioId: text(b, "?id"),
        displayName: text(b, "?name"),
        periodLabel: text(b, "?period"),
        jointLossPct: numeric(b, "?joint"),
        bracketLossPct: numeric(b, "?loss"),
      }));
  }

  async listScenarios(): Promise<ScenarioSummary[]> {
    return this.graph.query([SCENARIO]).map((b) => {
      const scenarioId = text(b, "?id");
      return {
        scenarioId,
        displayName: text(b, "?name"),
        periodLabel: text(b, "?period"),
        referenceDrawdownPct: numeric(b, "?ref"),
        marketAvgLossPct: numeric(b, "?market"),
        recoveryPeriodLabel: text(b, "?recovery"),
        recoveryWinners: this.graph
          .query([["recovery_winner", "?id", "?symbol"]], new Map([["?id", scenarioId]]))
          .map((w) => text(w, "?symbol")),
      };
    });
  }
}

function toExcerpt(b: Bindings): ScenarioExcerpt {
  return {
    scenarioId: text(b, "?id"),
    displayName: text(b, "?name"),
    periodLabel: text(b, "?period"),
    lossPct: numeric(b, "?loss"),
    referenceDrawdownPct: numeric(b, "?ref"),
    marketAvgLossPct: numeric(b, "?market"),
  };
}
