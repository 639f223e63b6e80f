/**
 * Historical Knowledge Store
 *
 * Puts a primary backend and an optional fallback behind the single
 * KnowledgeStore interface. Primary lookups are time-bounded; an error or
 * timeout is retried once against the fallback. When both fail the lookup
 * answers with an empty value and the analyzers carry on without context.
 */

import type { CoMovementBracket, ScenarioRecord } from "../schemas/reference-data.ts";
import {
  DEFAULT_KNOWLEDGE_LOOKUP_TIMEOUT_MS,
  type KnowledgeBackend,
} from "../config/risk-config.ts";
import { KnowledgeLookupError, toError } from "../lib/errors.ts";
import { logger } from "./structured-logger.ts";
import {
  recordKnowledgeFallback,
  recordKnowledgeUnavailable,
  withAbortableTimeout,
} from "./production-hardening.ts";
import { GraphKnowledgeBackend } from "./knowledge-graph.ts";
import { TableKnowledgeBackend } from "./knowledge-table.ts";
import type {
  JointExcerpt,
  KnowledgeBackendStore,
  KnowledgeStore,
  ScenarioExcerpt,
  ScenarioSummary,
} from "./knowledge-types.ts";

export type {
  JointExcerpt,
  KnowledgeBackendStore,
  KnowledgeStore,
  ScenarioExcerpt,
  ScenarioSummary,
} from "./knowledge-types.ts";

const SERVICE = "knowledge-store";

export interface ResilientStoreOptions {
  /** Bound on each backend call in ms */
  lookupTimeoutMs?: number;
}

function lookupTimeout(label: string, timeoutMs: number): Error {
  return new KnowledgeLookupError(`${label} did not complete within ${timeoutMs}ms`);
}

export class ResilientKnowledgeStore implements KnowledgeStore {
  private readonly primary: KnowledgeBackendStore;
  private readonly fallback: KnowledgeBackendStore | null;
  private readonly lookupTimeoutMs: number;

  constructor(
    primary: KnowledgeBackendStore,
    fallback: KnowledgeBackendStore | null,
    options: ResilientStoreOptions = {},
  ) {
    this.primary = primary;
    this.fallback = fallback;
    this.lookupTimeoutMs = options.lookupTimeoutMs ?? DEFAULT_KNOWLEDGE_LOOKUP_TIMEOUT_MS;
  }

  lookupBracketPerformance(bracket: CoMovementBracket): Promise<ScenarioExcerpt[]> {
    return this.guarded("lookupBracketPerformance", (s) => s.lookupBracketPerformance(bracket), []);
  }

  lookupCategoryPerformance(category: string): Promise<ScenarioExcerpt[]> {
    return this.guarded(
      "lookupCategoryPerformance",
      (s) => s.lookupCategoryPerformance(category),
      [],
    );
  }

  lookupOpportunityCost(category: string): Promise<string> {
    return this.guarded("lookupOpportunityCost", (s) => s.lookupOpportunityCost(category), "");
  }

  lookupJointPerformance(bracket: CoMovementBracket, category: string): Promise<JointExcerpt[]> {
    return this.guarded(
      "lookupJointPerformance",
      (s) => s.lookupJointPerformance(bracket, category),
      [],
    );
  }

  listScenarios(): Promise<ScenarioSummary[]> {
    return this.guarded("listScenarios", (s) => s.listScenarios(), []);
  }

  private async attempt<T>(
    store: KnowledgeBackendStore,
    operation: string,
    fn: (store: KnowledgeStore) => Promise<T>,
  ): Promise<{ ok: true; value: T } | { ok: false; error: Error }> {
    try {
      const value = await withAbortableTimeout(
        `${store.name} ${operation}`,
        () => fn(store),
        this.lookupTimeoutMs,
        lookupTimeout,
      );
      return { ok: true, value };
    } catch (err) {
      return { ok: false, error: toError(err) };
    }
  }

  private async guarded<T>(
    operation: string,
    fn: (store: KnowledgeStore) => Promise<T>,
    empty: T,
  ): Promise<T> {
    const first = await this.attempt(this.primary, operation, fn);
    if (first.ok) return first.value;

    const fallback = this.fallback;
    if (!fallback) {
      recordKnowledgeUnavailable();
      logger.error(SERVICE, "KnowledgeLookupUnavailable", first.error, {
        operation,
        backend: this.primary.name,
      });
      return empty;
    }

    recordKnowledgeFallback();
    logger.warn(
      SERVICE,
      "KnowledgeLookupDegraded",
      { operation, primary: this.primary.name, fallback: fallback.name },
      first.error,
    );

    const second = await this.attempt(fallback, operation, fn);
    if (second.ok) return second.value;

    recordKnowledgeUnavailable();
    logger.error(SERVICE, "KnowledgeLookupUnavailable", second.error, {
      operation,
      primary: this.primary.name,
      fallback: fallback.name,
      primaryError: first.error.message,
    });
    return empty;
  }
}

export interface KnowledgeStoreOptions extends ResilientStoreOptions {
  backend: KnowledgeBackend;
}

/**
 * "graph" puts the graph backend in front of the table backend;
 * "table" uses the table backend alone.
 */
export function createKnowledgeStore(
  records: readonly ScenarioRecord[],
  options: KnowledgeStoreOptions,
): KnowledgeStore {
  const table = new TableKnowledgeBackend(records);
  const { backend, ...rest } = options;
  if (backend === "table") {
    return new ResilientKnowledgeStore(table, null, rest);
  }
  return new ResilientKnowledgeStore(new GraphKnowledgeBackend(records), table, rest);
}
