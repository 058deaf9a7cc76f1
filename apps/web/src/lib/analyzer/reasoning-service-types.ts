/**
 * Reasoning Service Types
 *
 * The capability interface the pipeline depends on. The AI SDK client is the
 * default implementation; tests register in-process doubles.
 * Implementations must be safe to call concurrently from many requests.
 *
 * @module analyzer/reasoning-service-types
 */

import type { DiagnosticInput } from "./diagnostics";
import type { CandidateFallacy, Explanation, RewriteChange } from "./types";

// ============================================================================
// RESULTS
// ============================================================================

/**
 * A detection as reported by the service, before span and confidence
 * normalization. Offsets may be missing or wrong; confidence may be out of range.
 */
export interface CandidateFallacyDraft {
  kind: string;
  start: number | null;
  end: number | null;
  excerpt: string;
  confidence: number;
}

export interface RewriteDraft {
  rewrittenText: string;
  changes: RewriteChange[];
}

// ============================================================================
// CALL OPTIONS
// ============================================================================

export interface ReasoningCallOptions {
  /** Aborts when the request's budget is exhausted */
  signal?: AbortSignal;
  /** Receives retry/timeout/parse events for the calling request */
  onEvent?: (event: DiagnosticInput) => void;
}

/** Transport policy applied to every call */
export interface ReasoningCallPolicy {
  callTimeoutMs: number;
  maxTransportRetries: number;
  /** Fixed delay between attempts */
  retryDelayMs: number;
}

// ============================================================================
// SERVICE INTERFACE
// ============================================================================

export interface ReasoningService {
  detectFallacies(text: string, options?: ReasoningCallOptions): Promise<CandidateFallacyDraft[]>;

  explainFallacy(kind: string, excerpt: string, options?: ReasoningCallOptions): Promise<Explanation>;

  generateRewrite(
    text: string,
    fallacies: readonly CandidateFallacy[],
    options?: ReasoningCallOptions,
  ): Promise<RewriteDraft>;
}
