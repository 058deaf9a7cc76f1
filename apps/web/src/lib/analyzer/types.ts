/**
 * Fallacy Analyzer - Domain Types
 *
 * Shapes produced and consumed by the analysis pipeline. Everything returned
 * to a caller is deep-frozen by the result assembler.
 *
 * @module analyzer/types
 */

// ============================================================================
// CANDIDATES AND EXPLANATIONS
// ============================================================================

export interface TextSpan {
  /** Inclusive start offset (UTF-16 index into the normalized input) */
  start: number;
  /** Exclusive end offset */
  end: number;
}

/**
 * A detection that passed span and confidence normalization but has not been
 * explained or ranked yet.
 */
export interface CandidateFallacy {
  /** Normalized snake_case fallacy kind, e.g. "ad_hominem" */
  kind: string;
  span: TextSpan;
  excerpt: string;
  /** Integer score in [0, 100], clamped from what the reasoning service reported */
  confidence: number;
}

export interface Explanation {
  definition: string;
  rationale: string;
  educationalNote: string;
}

export type ExplanationSource = "service" | "fallback";

/** Per-fallacy explanation outcome carried forward as data */
export type ExplanationOutcome =
  | { status: "explained"; explanation: Explanation }
  | { status: "fallback"; explanation: Explanation; reason: string };

export type ConfidenceLevel = "low" | "medium" | "high";

export interface DetectedFallacy extends CandidateFallacy {
  explanation: Explanation;
  explanationSource: ExplanationSource;
  confidenceLevel: ConfidenceLevel;
}

// ============================================================================
// REWRITE
// ============================================================================

export interface RewriteChange {
  originalSegment: string;
  revisedSegment: string;
  reason: string;
}

export interface BalancedRewrite {
  text: string;
  changes: RewriteChange[];
}

export type RewriteSkipReason = "no_fallacies" | "not_requested" | "budget_exhausted";

export type RewriteOutcome =
  | { status: "skipped"; reason: RewriteSkipReason }
  | { status: "succeeded"; rewrite: BalancedRewrite }
  | { status: "failed"; error: string };

// ============================================================================
// RESULT
// ============================================================================

export type DetectionStatus = "succeeded" | "failed" | "timed_out";

export type AnalysisVerdict = "sound" | "fallacious" | "indeterminate";

export interface AnalysisSummary {
  totalFallacies: number;
  countsByKind: Record<string, number>;
  /** Mean confidence of the reported fallacies; null when there are none */
  averageConfidence: number | null;
  verdict: AnalysisVerdict;
  message: string;
}

/**
 * complete: every stage delivered its full content.
 * partial: something degraded (fallback explanation, rewrite lost, budget hit).
 * indeterminate: detection itself produced no data.
 */
export type AnalysisStatus = "complete" | "partial" | "indeterminate";

export interface AnalysisResult {
  inputText: string;
  status: AnalysisStatus;
  detectionStatus: DetectionStatus;
  detectedFallacies: DetectedFallacy[];
  summary: AnalysisSummary;
  rewrite: BalancedRewrite | null;
  elapsedMs: number;
}

// ============================================================================
// REQUEST
// ============================================================================

export interface AnalyzeOptions {
  includeRewrite?: boolean;
  minConfidence?: number;
  /** Correlates diagnostic events; generated when absent */
  requestId?: string;
}

export type PipelineState =
  | "Validating"
  | "Detecting"
  | "Explaining"
  | "Ranking"
  | "Rewriting"
  | "Assembling"
  | "Done"
  | "Failed";
