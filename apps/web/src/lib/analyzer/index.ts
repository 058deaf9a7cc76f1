/**
 * Fallacy Analyzer - Module Index
 *
 * Public entry point: the analyze() function, its result types and the
 * pieces hosts need to plug in their own reasoning service.
 *
 * @module analyzer
 */

// ============================================================================
// TYPE EXPORTS
// ============================================================================

export type {
  AnalysisResult,
  AnalysisStatus,
  AnalysisSummary,
  AnalysisVerdict,
  AnalyzeOptions,
  BalancedRewrite,
  CandidateFallacy,
  ConfidenceLevel,
  DetectedFallacy,
  DetectionStatus,
  Explanation,
  ExplanationSource,
  PipelineState,
  RewriteChange,
  TextSpan,
} from "./types";

export type { AnalyzeResponse, PipelineDeps, PipelineRun } from "./pipeline";
export type { DiagnosticEvent, DiagnosticEventType, DiagnosticsSink } from "./diagnostics";
export type { Clock } from "./deadline";

// ============================================================================
// PIPELINE
// ============================================================================

export { analyze, runFallacyPipeline } from "./pipeline";

// ============================================================================
// ERRORS
// ============================================================================

export {
  BudgetExceededError,
  InternalInvariantViolation,
  ReasoningServiceParseError,
  ReasoningServiceTransportError,
  ValidationError,
} from "./errors";

// ============================================================================
// REASONING SERVICE
// ============================================================================

export {
  getReasoningService,
  LLMReasoningService,
  registerReasoningService,
  resetReasoningService,
  type CandidateFallacyDraft,
  type ReasoningService,
  type RewriteDraft,
} from "./reasoning-service";

// ============================================================================
// DIAGNOSTICS
// ============================================================================

export { clearDiagnostics, getRecentDiagnostics } from "./diagnostics";

// ============================================================================
// UTILITIES
// ============================================================================

export { classifyConfidence, rankFallacies, applyMinConfidence } from "./confidence-ranking";
export { validateInputText } from "./text-validator";
export { fallacyLabel, getFallbackExplanation } from "./fallacy-catalog";
