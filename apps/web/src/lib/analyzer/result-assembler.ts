/**
 * Result Assembler
 *
 * Builds the summary and the final AnalysisResult from the ranked fallacies,
 * checks the structural invariants every result must satisfy, and freezes
 * it. A breach here is a defect in the pipeline, not bad model output, so it
 * throws InternalInvariantViolation instead of degrading.
 *
 * @module analyzer/result-assembler
 */

import { averageConfidence, classifyConfidence } from "./confidence-ranking";
import { InternalInvariantViolation } from "./errors";
import { fallacyLabel } from "./fallacy-catalog";
import type {
  AnalysisResult,
  AnalysisStatus,
  AnalysisSummary,
  CandidateFallacy,
  DetectedFallacy,
  DetectionStatus,
  ExplanationOutcome,
  RewriteOutcome,
} from "./types";

// ============================================================================
// DETECTED FALLACIES
// ============================================================================

export function toDetectedFallacy(candidate: CandidateFallacy, outcome: ExplanationOutcome): DetectedFallacy {
  return {
    kind: candidate.kind,
    span: { ...candidate.span },
    excerpt: candidate.excerpt,
    confidence: candidate.confidence,
    explanation: { ...outcome.explanation },
    explanationSource: outcome.status === "explained" ? "service" : "fallback",
    confidenceLevel: classifyConfidence(candidate.confidence),
  };
}

// ============================================================================
// SUMMARY
// ============================================================================

function summaryMessage(fallacies: readonly DetectedFallacy[], detectionStatus: DetectionStatus): string {
  if (detectionStatus === "failed") {
    return "The text could not be analyzed because the reasoning service was unavailable.";
  }
  if (detectionStatus === "timed_out") {
    return "The analysis ran out of time before any fallacies could be detected.";
  }
  if (fallacies.length === 0) {
    return "No reasoning fallacies were detected in this text.";
  }
  const top = fallacies.reduce((best, f) => (f.confidence > best.confidence ? f : best), fallacies[0]);
  const noun = fallacies.length === 1 ? "fallacy" : "fallacies";
  return `Detected ${fallacies.length} potential ${noun}; most confident: ${fallacyLabel(top.kind)} (${top.confidence}/100).`;
}

export function buildSummary(
  fallacies: readonly DetectedFallacy[],
  detectionStatus: DetectionStatus,
): AnalysisSummary {
  // Kinds are model output; "constructor" must not resolve through the prototype
  const counts = new Map<string, number>();
  for (const f of fallacies) {
    counts.set(f.kind, (counts.get(f.kind) ?? 0) + 1);
  }

  return {
    totalFallacies: fallacies.length,
    countsByKind: Object.fromEntries(counts),
    averageConfidence: averageConfidence(fallacies),
    verdict: detectionStatus !== "succeeded" ? "indeterminate" : fallacies.length > 0 ? "fallacious" : "sound",
    message: summaryMessage(fallacies, detectionStatus),
  };
}

// ============================================================================
// INVARIANTS
// ============================================================================

function check(condition: boolean, message: string): void {
  if (!condition) throw new InternalInvariantViolation(message);
}

function checkFallacy(f: DetectedFallacy, index: number, inputText: string): void {
  const where = `detectedFallacies[${index}] (${f.kind})`;
  check(f.kind.length > 0, `${where}: empty kind`);
  check(
    Number.isInteger(f.span.start) && Number.isInteger(f.span.end) &&
      f.span.start >= 0 && f.span.start < f.span.end && f.span.end <= inputText.length,
    `${where}: span [${f.span.start}, ${f.span.end}) outside input of length ${inputText.length}`,
  );
  check(f.excerpt.trim().length > 0, `${where}: empty excerpt`);
  check(f.excerpt === inputText.slice(f.span.start, f.span.end), `${where}: excerpt does not match span`);
  check(
    Number.isInteger(f.confidence) && f.confidence >= 0 && f.confidence <= 100,
    `${where}: confidence ${f.confidence} outside [0, 100]`,
  );
  check(
    f.confidenceLevel === classifyConfidence(f.confidence),
    `${where}: level ${f.confidenceLevel} inconsistent with confidence ${f.confidence}`,
  );
}

function checkSummary(summary: AnalysisSummary, fallacies: readonly DetectedFallacy[]): void {
  check(summary.totalFallacies === fallacies.length, "summary.totalFallacies does not match detectedFallacies");
  const counted = Object.values(summary.countsByKind).reduce((sum, n) => sum + n, 0);
  check(counted === fallacies.length, "summary.countsByKind does not add up to totalFallacies");
}

// ============================================================================
// ASSEMBLY
// ============================================================================

export interface AssembleInput {
  inputText: string;
  detectionStatus: DetectionStatus;
  /** Ranked, filtered fallacies */
  fallacies: readonly DetectedFallacy[];
  rewrite: RewriteOutcome;
  /** The budget ran out after detection succeeded */
  budgetExhausted: boolean;
  elapsedMs: number;
}

function resolveStatus(input: AssembleInput): AnalysisStatus {
  if (input.detectionStatus !== "succeeded") return "indeterminate";
  const degraded =
    input.budgetExhausted ||
    input.fallacies.some((f) => f.explanationSource === "fallback") ||
    input.rewrite.status === "failed" ||
    (input.rewrite.status === "skipped" && input.rewrite.reason === "budget_exhausted");
  return degraded ? "partial" : "complete";
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}

export function assembleResult(input: AssembleInput): AnalysisResult {
  const { inputText, detectionStatus, fallacies } = input;

  check(
    detectionStatus === "succeeded" || fallacies.length === 0,
    `detection ${detectionStatus} but ${fallacies.length} fallacies were passed to assembly`,
  );
  fallacies.forEach((f, i) => checkFallacy(f, i, inputText));
  for (let i = 1; i < fallacies.length; i++) {
    check(fallacies[i - 1].confidence >= fallacies[i].confidence, "detectedFallacies are not ranked by confidence");
  }
  check(
    input.rewrite.status !== "succeeded" || fallacies.length > 0,
    "rewrite present without any detected fallacies",
  );

  const summary = buildSummary(fallacies, detectionStatus);
  checkSummary(summary, fallacies);

  const result: AnalysisResult = {
    inputText,
    status: resolveStatus(input),
    detectionStatus,
    detectedFallacies: fallacies.map((f) => ({ ...f, span: { ...f.span }, explanation: { ...f.explanation } })),
    summary,
    rewrite: input.rewrite.status === "succeeded" ? input.rewrite.rewrite : null,
    elapsedMs: Math.max(0, input.elapsedMs),
  };

  return deepFreeze(result);
}
