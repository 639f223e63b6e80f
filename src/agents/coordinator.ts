/**
 * Analysis Coordinator
 *
 * Runs both analyzers concurrently for one portfolio snapshot, collects
 * their results and hands them to the synthesis engine.
 *
 * Flow:
 * 1. Resolve the request-scoped config (construction config + overrides)
 * 2. Start both analyzer calls at once, each bounded by the per-call
 *    timeout and by whatever is left of the overall deadline
 * 3. Both usable → full synthesis; one usable → degraded synthesis with an
 *    explicit note; none → AnalysisFailure naming both causes
 * 4. Synthesis itself is bounded by the remaining deadline
 *
 * Analyzer failures never escape as exceptions; they are recorded per call
 * and surfaced in the outcome.
 */

import { mergeRiskEngineConfig, type RiskEngineConfig } from "../config/risk-config.ts";
import { configOverridesSchema, type ConfigOverrides } from "../schemas/portfolio.ts";
import {
  AnalyzerTimeoutError,
  DeadlineExceededError,
  RiskEngineError,
  errorMessage,
  toError,
} from "../lib/errors.ts";
import { logAnalyzerCall, logger, withContext } from "../services/structured-logger.ts";
import {
  recordAnalyzerTimeout,
  recordDeadlineOverrun,
  recordRequestOutcome,
  startDeadline,
  withAbortableTimeout,
  type Deadline,
} from "../services/production-hardening.ts";
import type { PartialSynthesisInput, SynthesisEngine } from "../services/synthesis-engine.ts";
import type {
  AnalysisFailure,
  AnalysisOutcome,
  AnalysisReport,
  AnalyzeRequest,
  AnalyzerCallRecord,
  AnalyzerCalls,
  AnalyzerChannel,
  AnalyzerName,
  ConcentrationResult,
  CorrelationResult,
  FailureCause,
  SynthesisResult,
} from "./base-analyzer.ts";

const SERVICE = "coordinator";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface CoordinatorDeps {
  config: RiskEngineConfig;
  correlation: AnalyzerChannel<CorrelationResult>;
  concentration: AnalyzerChannel<ConcentrationResult>;
  synthesis: SynthesisEngine;
}

interface CallResult<T> {
  record: AnalyzerCallRecord;
  payload: T | null;
  /** Error code when the call did not succeed */
  code: string | null;
}

type SynthesisStep =
  | { ok: true; synthesis: SynthesisResult }
  | { ok: false; cause: FailureCause };

// ---------------------------------------------------------------------------
// Coordinator
// ---------------------------------------------------------------------------

export class Coordinator {
  readonly config: RiskEngineConfig;
  private readonly correlation: AnalyzerChannel<CorrelationResult>;
  private readonly concentration: AnalyzerChannel<ConcentrationResult>;
  private readonly synthesis: SynthesisEngine;

  constructor(deps: CoordinatorDeps) {
    this.config = deps.config;
    this.correlation = deps.correlation;
    this.concentration = deps.concentration;
    this.synthesis = deps.synthesis;
  }

  /**
   * Analyze one snapshot. Resolves with a report or an AnalysisFailure;
   * rejects only when `overrides` fail validation.
   */
  async analyze(request: AnalyzeRequest, overrides?: ConfigOverrides): Promise<AnalysisOutcome> {
    const config = mergeRiskEngineConfig(
      this.config,
      overrides ? configOverridesSchema.parse(overrides) : undefined,
    );
    return withContext({ correlationId: request.correlationId }, () =>
      this.run(request, config),
    );
  }

  private async run(request: AnalyzeRequest, config: RiskEngineConfig): Promise<AnalysisOutcome> {
    const { correlationId, snapshot } = request;
    const deadline = startDeadline(config.overallDeadlineMs);

    logger.info(SERVICE, "Analysis started", {
      holdings: snapshot.holdings.length,
      perCallTimeoutMs: config.perCallTimeoutMs,
      overallDeadlineMs: config.overallDeadlineMs,
    });

    const [correlation, concentration] = await Promise.all([
      this.invoke(this.correlation, request, config, deadline),
      this.invoke(this.concentration, request, config, deadline),
    ]);
    const calls: AnalyzerCalls = {
      correlation: correlation.record,
      concentration: concentration.record,
    };

    const correlationCause = correlationProblem(correlation);
    const concentrationCause = callProblem("concentration", concentration);
    const computed = correlation.payload?.status === "computed" ? correlation.payload : null;

    let step: SynthesisStep;
    if (computed && concentration.payload) {
      const full = concentration.payload;
      step = await this.synthesizeWithin(deadline, config, () =>
        this.synthesis.synthesize(computed, full, config),
      );
    } else if (computed && concentrationCause) {
      step = await this.synthesizeWithin(deadline, config, async () =>
        this.synthesis.synthesizePartial(
          {
            correlation: computed,
            concentration: null,
            missing: "concentration",
            ...missingFrom(concentration, concentrationCause),
          },
          config,
        ),
      );
    } else if (concentration.payload && correlationCause) {
      const available = concentration.payload;
      step = await this.synthesizeWithin(deadline, config, async () =>
        this.synthesis.synthesizePartial(
          {
            correlation: null,
            concentration: available,
            missing: "correlation",
            ...missingFrom(correlation, correlationCause),
          },
          config,
        ),
      );
    } else {
      const causes = [correlationCause, concentrationCause].filter(
        (cause): cause is FailureCause => cause !== null,
      );
      return this.fail(correlationId, causes, calls, deadline);
    }

    if (!step.ok) {
      return this.fail(correlationId, [step.cause], calls, deadline);
    }

    const report: AnalysisReport = {
      status: "completed",
      correlationId,
      correlation: correlation.payload,
      concentration: concentration.payload,
      synthesis: step.synthesis,
      calls,
      partial: step.synthesis.degraded !== null,
      totalDurationMs: deadline.elapsedMs(),
      completedAt: new Date().toISOString(),
    };

    recordRequestOutcome(report.partial ? "partial" : "completed");
    const summary = report.partial ? "Analysis completed with partial results" : "Analysis completed";
    logger.info(SERVICE, summary, {
      overallRiskLevel: report.synthesis.overallRiskLevel,
      totalDurationMs: report.totalDurationMs,
      correlationAnalyzer: calls.correlation.analyzerId,
      correlationMs: calls.correlation.durationMs,
      concentrationAnalyzer: calls.concentration.analyzerId,
      concentrationMs: calls.concentration.durationMs,
    });
    return report;
  }

  /**
   * One analyzer call. Never rejects: the outcome is captured in the record.
   */
  private async invoke<T>(
    channel: AnalyzerChannel<T>,
    request: AnalyzeRequest,
    config: RiskEngineConfig,
    deadline: Deadline,
  ): Promise<CallResult<T>> {
    const analyzer = channel.analyzer;
    const timeoutMs = Math.min(config.perCallTimeoutMs, deadline.remainingMs());
    const startMs = Date.now();

    try {
      const response = await withAbortableTimeout(
        `${analyzer} analyzer`,
        (signal) =>
          channel.request(
            {
              requestId: `${request.correlationId}:${analyzer}`,
              snapshot: request.snapshot,
              config,
            },
            signal,
          ),
        timeoutMs,
      );
      const durationMs = Date.now() - startMs;
      logAnalyzerCall(analyzer, "succeeded", durationMs, response.analyzerId);
      return {
        record: {
          analyzer,
          status: "succeeded",
          durationMs,
          analyzerId: response.analyzerId,
          error: null,
        },
        payload: response.payload,
        code: null,
      };
    } catch (err) {
      const durationMs = Date.now() - startMs;
      const timedOut = err instanceof AnalyzerTimeoutError;
      if (timedOut) recordAnalyzerTimeout(analyzer);
      const status = timedOut ? "timed_out" : "failed";
      logAnalyzerCall(analyzer, status, durationMs, null, toError(err));
      return {
        record: { analyzer, status, durationMs, analyzerId: null, error: errorMessage(err) },
        payload: null,
        code: err instanceof RiskEngineError ? err.code : "ANALYZER_FAILURE",
      };
    }
  }

  private async synthesizeWithin(
    deadline: Deadline,
    config: RiskEngineConfig,
    fn: () => Promise<SynthesisResult>,
  ): Promise<SynthesisStep> {
    const overrun = () => new DeadlineExceededError("synthesis", config.overallDeadlineMs);
    try {
      if (deadline.expired()) throw overrun();
      const synthesis = await withAbortableTimeout("synthesis", fn, deadline.remainingMs(), overrun);
      return { ok: true, synthesis };
    } catch (err) {
      if (err instanceof DeadlineExceededError) recordDeadlineOverrun();
      logger.error(SERVICE, "Synthesis failed", toError(err));
      return {
        ok: false,
        cause: {
          stage: "synthesis",
          code: err instanceof RiskEngineError ? err.code : "INTERNAL_ERROR",
          message: errorMessage(err),
        },
      };
    }
  }

  private fail(
    correlationId: string,
    causes: FailureCause[],
    calls: AnalyzerCalls,
    deadline: Deadline,
  ): AnalysisFailure {
    recordRequestOutcome("failed");
    logger.error(SERVICE, "Analysis failed", undefined, {
      causes: causes.map((c) => `${c.stage}: ${c.code}`),
      totalDurationMs: deadline.elapsedMs(),
    });
    return {
      status: "failed",
      correlationId,
      causes,
      calls,
      totalDurationMs: deadline.elapsedMs(),
    };
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function callProblem<T>(analyzer: AnalyzerName, call: CallResult<T>): FailureCause | null {
  if (call.record.status === "succeeded") return null;
  return {
    stage: analyzer,
    code: call.code ?? "ANALYZER_FAILURE",
    message: call.record.error ?? `${analyzer} analyzer ${call.record.status}`,
  };
}

/** A correlation call that succeeded without a coefficient is still a problem. */
function correlationProblem(call: CallResult<CorrelationResult>): FailureCause | null {
  const problem = callProblem("correlation", call);
  if (problem) return problem;
  if (call.payload && call.payload.status === "insufficient_data") {
    return { stage: "correlation", code: "INSUFFICIENT_DATA", message: call.payload.reason };
  }
  return null;
}

function missingFrom<T>(
  call: CallResult<T>,
  cause: FailureCause,
): Pick<PartialSynthesisInput, "outcome" | "detail"> {
  if (call.record.status === "timed_out") return { outcome: "timed_out", detail: cause.message };
  if (call.record.status === "failed") return { outcome: "failed", detail: cause.message };
  return { outcome: "insufficient_data", detail: cause.message };
}
