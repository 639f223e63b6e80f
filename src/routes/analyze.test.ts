/**
 * Integration tests for the HTTP surface
 *
 * Tests all endpoints:
 * - POST /api/v1/analyze: Run one portfolio through the engine
 * - GET /api/v1/scenarios: Historical scenario catalogue
 * - GET /health: Health summary
 */

import { describe, it, expect, beforeEach } from "vitest";
import { createApp } from "../app.ts";
import { createRiskEngine, type RiskEngine } from "../agents/risk-engine.ts";
import { Coordinator } from "../agents/coordinator.ts";
import { createInProcessChannel } from "../agents/analyzer-channel.ts";
import { resolveRiskEngineConfig } from "../config/risk-config.ts";
import { createKnowledgeStore } from "../services/knowledge-store.ts";
import { SynthesisEngine } from "../services/synthesis-engine.ts";
import { resetHardeningMetrics } from "../services/production-hardening.ts";
import type { ConcentrationResult, CorrelationResult } from "../agents/base-analyzer.ts";
import { ALPHA_HEAVY, REFERENCE_SYMBOL, WINDOW_DAYS, makeReference } from "../services/__tests__/fixtures.ts";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function makeEngine(): RiskEngine {
  return createRiskEngine({
    config: resolveRiskEngineConfig({ windowDays: WINDOW_DAYS }),
    reference: makeReference(0.57),
    referenceSymbol: REFERENCE_SYMBOL,
  });
}

function makeFailingEngine(): RiskEngine {
  const reference = makeReference(0.57);
  const knowledge = createKnowledgeStore(reference.scenarios, { backend: "table" });
  const coordinator = new Coordinator({
    config: resolveRiskEngineConfig({ windowDays: WINDOW_DAYS }),
    correlation: createInProcessChannel<CorrelationResult>("correlation", "corr-test", async () => {
      throw new Error("price feed offline");
    }),
    concentration: createInProcessChannel<ConcentrationResult>("concentration", "conc-test", async () => {
      throw new Error("category table offline");
    }),
    synthesis: new SynthesisEngine(knowledge),
  });
  return { coordinator, knowledge };
}

function holdings(values: Record<string, number>) {
  return Object.entries(values).map(([symbol, unitPrice]) => ({ symbol, quantity: 1, unitPrice }));
}

function post(engine: RiskEngine, body: unknown) {
  return createApp(engine).request("/api/v1/analyze", {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body: typeof body === "string" ? body : JSON.stringify(body),
  });
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe("HTTP routes", () => {
  beforeEach(() => {
    resetHardeningMetrics();
  });

  describe("POST /api/v1/analyze", () => {
    it("should return the report for a valid portfolio", async () => {
      const res = await post(makeEngine(), {
        correlationId: "http-1",
        portfolio: { ownerId: "owner-1", holdings: holdings(ALPHA_HEAVY), totalValue: 100 },
      });

      expect(res.status).toBe(200);
      const body = await res.json();
      expect(body.status).toBe("completed");
      expect(body.correlationId).toBe("http-1");
      expect(body.synthesis.compoundingDetected).toBe(true);
      expect(body.synthesis.overallRiskLevel).toBe("High");
      expect(body.synthesis.recommendations.length).toBe(3);
    });

    it("should apply config overrides from the request", async () => {
      const res = await post(makeEngine(), {
        correlationId: "http-2",
        portfolio: { ownerId: "owner-1", holdings: holdings(ALPHA_HEAVY) },
        config: { dangerThresholdPct: 70 },
      });

      const body = await res.json();
      expect(body.concentration.concentratedCategories).toEqual([]);
      expect(body.synthesis.compoundingDetected).toBe(false);
    });

    it("should answer 503 with both causes when the analysis fails", async () => {
      const res = await post(makeFailingEngine(), {
        correlationId: "http-3",
        portfolio: { ownerId: "owner-1", holdings: holdings({ A1: 10 }) },
      });

      expect(res.status).toBe(503);
      const body = await res.json();
      expect(body.status).toBe("failed");
      expect(body.causes.map((c: { stage: string }) => c.stage)).toEqual(["correlation", "concentration"]);
    });

    it("should reject malformed JSON", async () => {
      const res = await post(makeEngine(), "{not json");

      expect(res.status).toBe(400);
      const body = await res.json();
      expect(body.code).toBe("invalid_json");
    });

    it("should reject a portfolio without holdings", async () => {
      const res = await post(makeEngine(), {
        correlationId: "http-4",
        portfolio: { ownerId: "owner-1", holdings: [] },
      });

      expect(res.status).toBe(400);
      const body = await res.json();
      expect(body.code).toBe("validation_failed");
      expect(body.details.issues).toEqual([
        { path: "portfolio.holdings", message: "Portfolio must contain at least one holding" },
      ]);
    });

    it("should reject a non-positive quantity", async () => {
      const res = await post(makeEngine(), {
        correlationId: "http-5",
        portfolio: { ownerId: "owner-1", holdings: [{ symbol: "A1", quantity: 0, unitPrice: 10 }] },
      });

      expect(res.status).toBe(400);
      const body = await res.json();
      expect(body.details.issues).toEqual([
        { path: "portfolio.holdings.0.quantity", message: "Quantity must be positive" },
      ]);
    });

    it("should reject a declared total that does not match the holdings", async () => {
      const res = await post(makeEngine(), {
        correlationId: "http-6",
        portfolio: { ownerId: "owner-1", holdings: holdings({ A1: 10, B1: 5 }), totalValue: 20 },
      });

      expect(res.status).toBe(400);
      const body = await res.json();
      expect(body).toEqual({
        error: "Declared total value 20 does not match sum of holdings 15",
        code: "invalid_portfolio",
        status: 400,
      });
    });

    it("should reject overrides that contradict each other", async () => {
      const res = await post(makeEngine(), {
        correlationId: "http-7",
        portfolio: { ownerId: "owner-1", holdings: holdings({ A1: 10 }) },
        config: { moderateThresholdPct: 80 },
      });

      expect(res.status).toBe(400);
      const body = await res.json();
      expect(body.code).toBe("validation_failed");
      expect(body.details.issues).toEqual([
        { path: "moderateThresholdPct", message: "moderateThresholdPct must not exceed dangerThresholdPct" },
      ]);
    });

    it("should not accept a knowledge backend override", async () => {
      const res = await post(makeEngine(), {
        correlationId: "http-8",
        portfolio: { ownerId: "owner-1", holdings: holdings({ A1: 10 }) },
        config: { knowledgeBackend: "table" },
      });

      // Unknown keys are stripped; the request still succeeds
      expect(res.status).toBe(200);
    });
  });

  describe("GET /api/v1/scenarios", () => {
    it("should list the loaded scenarios", async () => {
      const res = await createApp(makeEngine()).request("/api/v1/scenarios");

      expect(res.status).toBe(200);
      const body = await res.json();
      expect(body.count).toBe(2);
      expect(body.scenarios[0]).toEqual({
        scenarioId: "scn-a",
        displayName: "Test Crash A",
        periodLabel: "Period A",
        referenceDrawdownPct: -60,
        marketAvgLossPct: -50,
        recoveryPeriodLabel: "Recovery A",
        recoveryWinners: ["B1"],
      });
    });
  });

  describe("GET /health", () => {
    it("should report ok before any failure", async () => {
      const res = await createApp(makeEngine()).request("/health");

      expect(res.status).toBe(200);
      const body = await res.json();
      expect(body.status).toBe("ok");
      expect(body.checks.map((c: { name: string }) => c.name)).toEqual([
        "failed_requests",
        "partial_reports",
        "knowledge_store",
      ]);
      expect(body.metrics.totalRequests).toBe(0);
    });

    it("should report critical after a failed analysis", async () => {
      const engine = makeFailingEngine();
      await post(engine, {
        correlationId: "http-9",
        portfolio: { ownerId: "owner-1", holdings: holdings({ A1: 10 }) },
      });

      const body = await (await createApp(engine).request("/health")).json();
      expect(body.status).toBe("critical");
      expect(body.metrics.failedRequests).toBe(1);
    });
  });

  it("should answer unknown routes with a structured 404", async () => {
    const res = await createApp(makeEngine()).request("/api/v1/nowhere");

    expect(res.status).toBe(404);
    const body = await res.json();
    expect(body.code).toBe("not_found");
  });
});
