/**
 * Fallacy Analysis Pipeline
 *
 * Orchestrates one request end to end:
 *
 *   Validating → Detecting → Explaining → Ranking → Rewriting → Assembling → Done
 *        └→ Failed
 *
 * Only validation can fail the request. Everything after it degrades into a
 * result: a failed detection yields an indeterminate result, failed
 * explanations fall back to the catalogue, a failed rewrite is dropped. A
 * single Deadline spans Detecting through Rewriting; stage boundaries check
 * it and its signal abandons calls still in flight.
 *
 * Invariant violations are recorded and re-thrown; they are never turned
 * into a result.
 *
 * @module analyzer/pipeline
 */

import { randomUUID } from "crypto";

import type { AnalyzerConfig } from "../config-schemas";
import { loadAnalyzerConfig } from "../config-loader";
import { applyMinConfidence, clampConfidence, rankFallacies } from "./confidence-ranking";
import { Deadline, systemClock, type Clock } from "./deadline";
import { debugLog } from "./debug";
import { runDetectionStage } from "./detector-stage";
import {
  DiagnosticsCollector,
  type DiagnosticEvent,
  type DiagnosticsSink,
} from "./diagnostics";
import { InternalInvariantViolation, type ValidationError } from "./errors";
import { runExplanationStage } from "./explanation-stage";
import { getReasoningService, type ReasoningService } from "./reasoning-service";
import { assembleResult, toDetectedFallacy } from "./result-assembler";
import { runRewriteStage } from "./rewrite-stage";
import type { StageContext } from "./stage-context";
import { validateInputText } from "./text-validator";
import type { AnalysisResult, AnalyzeOptions, PipelineState } from "./types";

// ============================================================================
// TYPES
// ============================================================================

export type AnalyzeResponse =
  | { ok: true; result: AnalysisResult }
  | { ok: false; error: ValidationError };

export interface PipelineRun {
  response: AnalyzeResponse;
  /** Every state entered, starting with Validating */
  states: PipelineState[];
  diagnostics: DiagnosticEvent[];
}

export interface PipelineDeps {
  service?: ReasoningService;
  config?: AnalyzerConfig;
  clock?: Clock;
  sink?: DiagnosticsSink;
}

// ============================================================================
// STATE MACHINE
// ============================================================================

const TRANSITIONS: Record<PipelineState, readonly PipelineState[]> = {
  Validating: ["Detecting", "Failed"],
  Detecting: ["Explaining"],
  Explaining: ["Ranking"],
  Ranking: ["Rewriting"],
  Rewriting: ["Assembling"],
  Assembling: ["Done"],
  Done: [],
  Failed: [],
};

export class PipelineStateMachine {
  private current: PipelineState = "Validating";
  private readonly history: PipelineState[] = ["Validating"];

  constructor(private readonly diagnostics: DiagnosticsCollector) {}

  get state(): PipelineState {
    return this.current;
  }

  get states(): PipelineState[] {
    return [...this.history];
  }

  transition(next: PipelineState): void {
    if (!TRANSITIONS[this.current].includes(next)) {
      throw new InternalInvariantViolation(`Illegal pipeline transition ${this.current} -> ${next}`);
    }
    this.diagnostics.record({
      type: "state_transition",
      stage: next,
      message: `${this.current} -> ${next}`,
    });
    this.current = next;
    this.history.push(next);
  }
}

// ============================================================================
// PIPELINE
// ============================================================================

function normalizeMinConfidence(value: number | undefined): number {
  if (value === undefined || !Number.isFinite(value)) return 0;
  return clampConfidence(value);
}

export async function runFallacyPipeline(
  raw: unknown,
  options: AnalyzeOptions = {},
  deps: PipelineDeps = {},
): Promise<PipelineRun> {
  const config = deps.config ?? loadAnalyzerConfig().config;
  const clock = deps.clock ?? systemClock;
  const requestId = options.requestId ?? randomUUID();
  const includeRewrite = options.includeRewrite ?? true;
  const minConfidence = normalizeMinConfidence(options.minConfidence);

  const diagnostics = new DiagnosticsCollector(
    requestId,
    { redact: config.redactDiagnostics, excerptChars: config.diagnosticsExcerptChars },
    deps.sink,
    () => clock.now(),
  );
  const machine = new PipelineStateMachine(diagnostics);

  const validation = validateInputText(raw, config);
  if (!validation.ok) {
    machine.transition("Failed");
    debugLog(`[Pipeline] ${requestId} rejected: ${validation.error.code}`);
    return {
      response: { ok: false, error: validation.error },
      states: machine.states,
      diagnostics: diagnostics.list(),
    };
  }

  const text = validation.text;
  const startedAt = clock.now();
  const deadline = new Deadline(config.budgetMs, clock);
  const ctx: StageContext = {
    service: deps.service ?? getReasoningService(config),
    deadline,
    diagnostics,
    config,
  };

  debugLog(`[Pipeline] ${requestId} started`, {
    length: text.length,
    budgetMs: config.budgetMs,
    includeRewrite,
    minConfidence,
  });

  try {
    machine.transition("Detecting");
    deadline.enterStage("Detecting");
    const detection = await runDetectionStage(text, ctx);

    // Anything under the threshold would be filtered after ranking anyway
    const eligible = applyMinConfidence(detection.candidates, minConfidence);

    machine.transition("Explaining");
    deadline.enterStage("Explaining");
    const explanation = await runExplanationStage(eligible, ctx);
    if (explanation.outcomes.length !== eligible.length) {
      throw new InternalInvariantViolation(
        `Explanation stage returned ${explanation.outcomes.length} outcomes for ${eligible.length} candidates`,
      );
    }

    machine.transition("Ranking");
    deadline.enterStage("Ranking");
    const detected = eligible.map((candidate, i) => toDetectedFallacy(candidate, explanation.outcomes[i]));
    const ranked = rankFallacies(applyMinConfidence(detected, minConfidence));

    machine.transition("Rewriting");
    deadline.enterStage("Rewriting");
    const rewrite = await runRewriteStage(text, ranked, ctx, includeRewrite);

    machine.transition("Assembling");
    const result = assembleResult({
      inputText: text,
      detectionStatus: detection.status,
      fallacies: ranked,
      rewrite,
      budgetExhausted: explanation.budgetExhausted,
      elapsedMs: clock.now() - startedAt,
    });
    machine.transition("Done");

    debugLog(`[Pipeline] ${requestId} done`, {
      status: result.status,
      detectionStatus: result.detectionStatus,
      fallacies: result.summary.totalFallacies,
      rewrite: rewrite.status,
      elapsedMs: result.elapsedMs,
    });

    return {
      response: { ok: true, result },
      states: machine.states,
      diagnostics: diagnostics.list(),
    };
  } catch (error) {
    if (error instanceof InternalInvariantViolation) {
      diagnostics.record({
        type: "invariant_violation",
        stage: machine.state,
        message: error.message,
      });
      console.error(`[Pipeline] ${requestId} invariant violation in ${machine.state}:`, error.message);
    }
    throw error;
  } finally {
    deadline.dispose();
  }
}

/**
 * Analyze a piece of text. Resolves with a result or a ValidationError; any
 * other rejection is a defect.
 */
export async function analyze(
  raw: unknown,
  options: AnalyzeOptions = {},
  deps: PipelineDeps = {},
): Promise<AnalyzeResponse> {
  const run = await runFallacyPipeline(raw, options, deps);
  return run.response;
}
