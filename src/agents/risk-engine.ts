/**
 * Risk Engine Assembly
 *
 * Wires reference data, the knowledge store, both analyzers and the
 * synthesis engine into a Coordinator. Analyzers are reached through
 * in-process channels.
 */

import type { RiskEngineConfig } from "../config/risk-config.ts";
import type { ReferenceData } from "../services/reference-data.ts";
import { createKnowledgeStore, type KnowledgeStore } from "../services/knowledge-store.ts";
import { CorrelationAnalyzer } from "../services/correlation-analyzer.ts";
import { ConcentrationAnalyzer } from "../services/concentration-analyzer.ts";
import { SynthesisEngine } from "../services/synthesis-engine.ts";
import { createInProcessChannel } from "./analyzer-channel.ts";
import { Coordinator } from "./coordinator.ts";
import type { ConcentrationResult, CorrelationResult } from "./base-analyzer.ts";

export const CORRELATION_ANALYZER_ID = "correlation-analyzer";
export const CONCENTRATION_ANALYZER_ID = "concentration-analyzer";

export interface RiskEngineOptions {
  config: RiskEngineConfig;
  reference: ReferenceData;
  /** Symbol whose price series the portfolio is compared against */
  referenceSymbol: string;
  /** Supply a store directly instead of building one from the scenarios */
  knowledge?: KnowledgeStore;
}

export interface RiskEngine {
  coordinator: Coordinator;
  knowledge: KnowledgeStore;
}

export function createRiskEngine(options: RiskEngineOptions): RiskEngine {
  const { config, reference, referenceSymbol } = options;

  const knowledge =
    options.knowledge ??
    createKnowledgeStore(reference.scenarios, {
      backend: config.knowledgeBackend,
      lookupTimeoutMs: config.knowledgeLookupTimeoutMs,
    });

  const correlationAnalyzer = new CorrelationAnalyzer({
    prices: reference.prices,
    referenceSymbol,
    knowledge,
  });
  const concentrationAnalyzer = new ConcentrationAnalyzer({
    categories: reference.categories,
    knowledge,
  });

  const coordinator = new Coordinator({
    config,
    correlation: createInProcessChannel<CorrelationResult>(
      "correlation",
      CORRELATION_ANALYZER_ID,
      (message, signal) => correlationAnalyzer.analyze(message.snapshot, message.config, signal),
    ),
    concentration: createInProcessChannel<ConcentrationResult>(
      "concentration",
      CONCENTRATION_ANALYZER_ID,
      (message, signal) =>
        concentrationAnalyzer.analyze(message.snapshot, message.config, signal),
    ),
    synthesis: new SynthesisEngine(knowledge),
  });

  return { coordinator, knowledge };
}
