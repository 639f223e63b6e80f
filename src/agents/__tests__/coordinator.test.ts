/**
 * Coordinator Tests
 *
 * End-to-end runs through the in-process analyzers plus failure paths:
 * 1. Full synthesis for the reference portfolios
 * 2. Per-call timeout → degraded synthesis
 * 3. Insufficient price data → degraded synthesis
 * 4. Both analyzers failing → AnalysisFailure, never a thrown error
 * 5. Synthesis overrunning the request deadline
 */

import { describe, it, expect, beforeEach } from "vitest";
import { ZodError } from "zod";
import { Coordinator } from "../coordinator.ts";
import { createRiskEngine } from "../risk-engine.ts";
import { createInProcessChannel } from "../analyzer-channel.ts";
import { resolveRiskEngineConfig, type RiskEngineConfigInput } from "../../config/risk-config.ts";
import { SynthesisEngine } from "../../services/synthesis-engine.ts";
import { createKnowledgeStore } from "../../services/knowledge-store.ts";
import { ConcentrationAnalyzer } from "../../services/concentration-analyzer.ts";
import { CorrelationAnalyzer } from "../../services/correlation-analyzer.ts";
import { getHardeningMetrics, resetHardeningMetrics } from "../../services/production-hardening.ts";
import { getRecentLogs, resetLoggerStats } from "../../services/structured-logger.ts";
import type {
  AnalysisFailure,
  AnalysisOutcome,
  AnalysisReport,
  ConcentrationResult,
  CorrelationResult,
  SynthesisResult,
} from "../base-analyzer.ts";
import {
  ALPHA_HEAVY,
  EVEN_FIVE,
  EVEN_FOUR,
  REFERENCE_SYMBOL,
  WINDOW_DAYS,
  makeReference,
  makeSnapshot,
} from "../../services/__tests__/fixtures.ts";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function makeEngine(noise: number, config: RiskEngineConfigInput = {}) {
  return createRiskEngine({
    config: resolveRiskEngineConfig({ windowDays: WINDOW_DAYS, ...config }),
    reference: makeReference(noise),
    referenceSymbol: REFERENCE_SYMBOL,
  });
}

function expectReport(outcome: AnalysisOutcome): AnalysisReport {
  if (outcome.status !== "completed") {
    throw new Error(`expected a report, got failure: ${JSON.stringify(outcome.causes)}`);
  }
  return outcome;
}

function expectFailure(outcome: AnalysisOutcome): AnalysisFailure {
  if (outcome.status !== "failed") throw new Error("expected an AnalysisFailure");
  return outcome;
}

/** A coordinator with a real concentration analyzer and a custom correlation channel. */
function makeCoordinator(
  correlation: (signal: AbortSignal) => Promise<CorrelationResult>,
  options: { config?: RiskEngineConfigInput; synthesis?: SynthesisEngine; concentration?: () => Promise<ConcentrationResult> } = {},
) {
  const reference = makeReference(0.57);
  const knowledge = createKnowledgeStore(reference.scenarios, { backend: "table" });
  const analyzer = new ConcentrationAnalyzer({ categories: reference.categories, knowledge });
  const concentration = options.concentration;

  return new Coordinator({
    config: resolveRiskEngineConfig({ windowDays: WINDOW_DAYS, ...options.config }),
    correlation: createInProcessChannel("correlation", "corr-test", (_message, signal) => correlation(signal)),
    concentration: createInProcessChannel("concentration", "conc-test", (message, signal) =>
      concentration ? concentration() : analyzer.analyze(message.snapshot, message.config, signal),
    ),
    synthesis: options.synthesis ?? new SynthesisEngine(knowledge),
  });
}

const hang = () => new Promise<never>(() => {});

/** The 87% correlation result for ALPHA_HEAVY, computed outside any coordinator. */
function computeCorrelation(): Promise<CorrelationResult> {
  const reference = makeReference(0.57);
  const analyzer = new CorrelationAnalyzer({
    prices: reference.prices,
    referenceSymbol: REFERENCE_SYMBOL,
    knowledge: createKnowledgeStore(reference.scenarios, { backend: "table" }),
  });
  return analyzer.analyze(makeSnapshot(ALPHA_HEAVY), { windowDays: WINDOW_DAYS });
}

class StalledSynthesis extends SynthesisEngine {
  synthesize(): Promise<SynthesisResult> {
    return hang();
  }
}

class ExplodingSynthesis extends SynthesisEngine {
  async synthesize(): Promise<SynthesisResult> {
    throw new Error("synthesis exploded");
  }
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe("Coordinator", () => {
  beforeEach(() => {
    resetHardeningMetrics();
    resetLoggerStats();
  });

  describe("Full synthesis", () => {
    it("should detect compounding for 87% co-movement and a 68% category", async () => {
      const { coordinator } = makeEngine(0.57);
      const report = expectReport(
        await coordinator.analyze({ correlationId: "req-1", snapshot: makeSnapshot(ALPHA_HEAVY) }),
      );

      expect(report.correlationId).toBe("req-1");
      expect(report.partial).toBe(false);
      expect(report.correlation).toMatchObject({ status: "computed", percentage: 87, bracket: "High" });
      expect(report.concentration?.concentratedCategories).toEqual(["Alpha"]);
      expect(report.synthesis.compoundingDetected).toBe(true);
      expect(report.synthesis.overallRiskLevel).toBe("High");
      expect(report.synthesis.riskMultiplier).toBe(1.38);
      expect(report.synthesis.multiplierSource).toBe("historical");
      expect(report.synthesis.recommendations[0].action).toBe(
        "Reduce Alpha exposure from 68.0% to below 40% of portfolio value",
      );
      expect(report.calls.correlation).toMatchObject({
        analyzer: "correlation",
        status: "succeeded",
        analyzerId: "correlation-analyzer",
        error: null,
      });
      expect(report.calls.concentration.analyzerId).toBe("concentration-analyzer");
      expect(getHardeningMetrics().completedReports).toBe(1);
    });

    it("should rate compounding above 90% co-movement Critical", async () => {
      const { coordinator } = makeEngine(0.43);
      const report = expectReport(
        await coordinator.analyze({ correlationId: "req-2", snapshot: makeSnapshot(ALPHA_HEAVY) }),
      );
      expect(report.synthesis.overallRiskLevel).toBe("Critical");
    });

    it("should rate 83% co-movement with 25% categories Moderate", async () => {
      const { coordinator } = makeEngine(0.67);
      const report = expectReport(
        await coordinator.analyze({ correlationId: "req-3", snapshot: makeSnapshot(EVEN_FOUR) }),
      );
      expect(report.synthesis.compoundingDetected).toBe(false);
      expect(report.synthesis.overallRiskLevel).toBe("Moderate");
    });

    it("should frame 67% co-movement with a 21% largest category as maintain", async () => {
      const { coordinator } = makeEngine(1.1);
      const report = expectReport(
        await coordinator.analyze({ correlationId: "req-4", snapshot: makeSnapshot(EVEN_FIVE) }),
      );
      expect(report.concentration?.diversificationLabel).toBe("WellDiversified");
      expect(report.synthesis.overallRiskLevel).toBe("Low");
      expect(report.synthesis.recommendations.map((r) => r.action)).toEqual([
        "Maintain current balanced portfolio structure",
      ]);
    });

    it("should report unmapped symbols and exclude them from correlation", async () => {
      const { coordinator } = makeEngine(0.57);
      const report = expectReport(
        await coordinator.analyze({
          correlationId: "req-5",
          snapshot: makeSnapshot({ A1: 50, B1: 30, ZZZ: 20 }),
        }),
      );
      expect(report.concentration?.unknownSymbols).toEqual(["ZZZ"]);
      expect(report.concentration?.breakdown.Alpha.percentage).toBe(50);
      expect(report.correlation).toMatchObject({
        status: "computed",
        excludedHoldings: [{ symbol: "ZZZ", reason: "missing price history" }],
      });
    });

    it("should apply request overrides without changing the base config", async () => {
      const { coordinator } = makeEngine(0.57);
      const report = expectReport(
        await coordinator.analyze(
          { correlationId: "req-6", snapshot: makeSnapshot(ALPHA_HEAVY) },
          { dangerThresholdPct: 70 },
        ),
      );
      expect(report.synthesis.compoundingDetected).toBe(false);
      expect(coordinator.config.dangerThresholdPct).toBe(60);
    });

    it("should reject overrides that contradict each other", async () => {
      const { coordinator } = makeEngine(0.57);
      await expect(
        coordinator.analyze(
          { correlationId: "req-7", snapshot: makeSnapshot(ALPHA_HEAVY) },
          { moderateThresholdPct: 80 },
        ),
      ).rejects.toThrow(ZodError);
    });

    it("should tag every log line with the correlation id", async () => {
      const { coordinator } = makeEngine(0.57);
      await coordinator.analyze({ correlationId: "req-ctx", snapshot: makeSnapshot(EVEN_FOUR) });

      const logs = getRecentLogs({ service: "coordinator", correlationId: "req-ctx" });
      expect(logs[0].message).toBe("Analysis started");
      expect(logs.at(-1)?.message).toBe("Analysis completed");
    });
  });

  describe("Degraded synthesis", () => {
    it("should synthesize from concentration alone when correlation times out", async () => {
      let aborted = false;
      const coordinator = makeCoordinator(
        (signal) => {
          signal.addEventListener("abort", () => {
            aborted = true;
          });
          return hang();
        },
        { config: { perCallTimeoutMs: 100 } },
      );

      const report = expectReport(
        await coordinator.analyze({ correlationId: "req-8", snapshot: makeSnapshot(ALPHA_HEAVY) }),
      );

      expect(aborted).toBe(true);
      expect(report.partial).toBe(true);
      expect(report.correlation).toBeNull();
      expect(report.calls.correlation).toMatchObject({
        status: "timed_out",
        analyzerId: null,
        error: "correlation analyzer did not complete within 100ms",
      });
      expect(report.synthesis.degraded?.missing).toBe("correlation");
      expect(report.synthesis.degraded?.outcome).toBe("timed_out");
      expect(report.synthesis.degraded?.note).toContain("correlation analysis timed out");
      expect(report.synthesis.degraded?.note).toContain("partial information");
      expect(report.synthesis.overallRiskLevel).toBe("Low");
      expect(report.synthesis.compoundingDetected).toBe(false);

      const metrics = getHardeningMetrics();
      expect(metrics.analyzerTimeouts).toBe(1);
      expect(metrics.timeoutsByAnalyzer).toEqual({ correlation: 1 });
      expect(metrics.partialReports).toBe(1);
    });

    it("should synthesize from correlation alone when concentration fails", async () => {
      const computed = await computeCorrelation();
      const coordinator = makeCoordinator(async () => computed, {
        concentration: async () => {
          throw new Error("category table offline");
        },
      });
      const report = expectReport(
        await coordinator.analyze({ correlationId: "req-9", snapshot: makeSnapshot(ALPHA_HEAVY) }),
      );

      expect(report.concentration).toBeNull();
      expect(report.calls.concentration.status).toBe("failed");
      expect(report.synthesis.degraded?.missing).toBe("concentration");
      expect(report.synthesis.degraded?.outcome).toBe("failed");
      expect(report.synthesis.overallRiskLevel).toBe("Low");
    });

    it("should treat insufficient price history as a missing correlation", async () => {
      const { coordinator } = makeEngine(0.57);
      const report = expectReport(
        await coordinator.analyze(
          { correlationId: "req-10", snapshot: makeSnapshot(ALPHA_HEAVY) },
          { windowDays: 30 },
        ),
      );

      expect(report.calls.correlation.status).toBe("succeeded");
      expect(report.correlation).toMatchObject({ status: "insufficient_data" });
      expect(report.partial).toBe(true);
      expect(report.synthesis.degraded?.outcome).toBe("insufficient_data");
      expect(report.synthesis.degraded?.note).toContain(
        "had insufficient data (reference asset REF: only 5 of 31 required prices)",
      );
    });
  });

  describe("Failures", () => {
    it("should return an AnalysisFailure with both causes when both analyzers fail", async () => {
      const coordinator = makeCoordinator(
        async () => {
          throw new Error("price feed offline");
        },
        {
          concentration: async () => {
            throw new Error("category table offline");
          },
        },
      );

      const failure = expectFailure(
        await coordinator.analyze({ correlationId: "req-11", snapshot: makeSnapshot(ALPHA_HEAVY) }),
      );

      expect(failure.correlationId).toBe("req-11");
      expect(failure.causes).toEqual([
        { stage: "correlation", code: "ANALYZER_FAILURE", message: "price feed offline" },
        { stage: "concentration", code: "ANALYZER_FAILURE", message: "category table offline" },
      ]);
      expect(failure.calls.correlation.status).toBe("failed");
      expect(failure.calls.concentration.status).toBe("failed");
      expect(getHardeningMetrics().failedRequests).toBe(1);
    });

    it("should fail when synthesis overruns the request deadline", async () => {
      const computed = await computeCorrelation();
      const reference = makeReference(0.57);
      const coordinator = makeCoordinator(async () => computed, {
        config: { overallDeadlineMs: 100 },
        synthesis: new StalledSynthesis(createKnowledgeStore(reference.scenarios, { backend: "table" })),
      });

      const failure = expectFailure(
        await coordinator.analyze({ correlationId: "req-12", snapshot: makeSnapshot(ALPHA_HEAVY) }),
      );

      expect(failure.causes).toEqual([
        {
          stage: "synthesis",
          code: "DEADLINE_EXCEEDED",
          message: "synthesis exceeded the 100ms request deadline",
        },
      ]);
      expect(failure.calls.correlation.status).toBe("succeeded");
      expect(failure.calls.concentration.status).toBe("succeeded");
      expect(getHardeningMetrics().deadlineOverruns).toBe(1);
    });

    it("should fail with the synthesis error when synthesis throws", async () => {
      const computed = await computeCorrelation();
      const reference = makeReference(0.57);
      const coordinator = makeCoordinator(async () => computed, {
        synthesis: new ExplodingSynthesis(createKnowledgeStore(reference.scenarios, { backend: "table" })),
      });

      const failure = expectFailure(
        await coordinator.analyze({ correlationId: "req-13", snapshot: makeSnapshot(ALPHA_HEAVY) }),
      );

      expect(failure.causes).toEqual([
        { stage: "synthesis", code: "INTERNAL_ERROR", message: "synthesis exploded" },
      ]);
    });
  });
});
