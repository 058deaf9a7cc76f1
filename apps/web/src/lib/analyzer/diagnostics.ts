/**
 * Structured diagnostic events for the analysis pipeline.
 *
 * Stages report parse failures, retries, timeouts and degradations here rather
 * than through the result. Events that refer to user text carry a TextReference
 * (length, short hash and an excerpt) instead of the text itself unless
 * redaction is turned off.
 *
 * @module analyzer/diagnostics
 */

import { createHash } from "crypto";
import { debugLog } from "./debug";

// ============================================================================
// TYPES
// ============================================================================

export type DiagnosticEventType =
  | "state_transition"
  | "parse_failure"
  | "transport_retry"
  | "retry_exhausted"
  | "call_timeout"
  | "budget_exceeded"
  | "stage_degraded"
  | "rewrite_skipped"
  | "rewrite_failed"
  | "invariant_violation";

export interface TextReference {
  length: number;
  sha256: string;
  excerpt: string;
  truncated: boolean;
}

export interface DiagnosticEvent {
  type: DiagnosticEventType;
  requestId: string;
  stage: string;
  message: string;
  at: number;
  textRef?: TextReference;
  detail?: Record<string, string | number | boolean | null>;
}

export type DiagnosticInput = Omit<DiagnosticEvent, "requestId" | "at" | "textRef"> & {
  /** Raw text the event concerns; converted to a TextReference before storage */
  text?: string;
};

export type DiagnosticsSink = (event: DiagnosticEvent) => void;

export interface RedactionPolicy {
  redact: boolean;
  excerptChars: number;
}

// ============================================================================
// TEXT REFERENCES
// ============================================================================

export function referenceText(text: string, policy: RedactionPolicy): TextReference {
  const sha256 = createHash("sha256").update(text).digest("hex").substring(0, 12);
  // Code points, as the text validator counts them
  const codePoints = Array.from(text);
  if (!policy.redact || codePoints.length <= policy.excerptChars) {
    return { length: codePoints.length, sha256, excerpt: text, truncated: false };
  }
  return {
    length: codePoints.length,
    sha256,
    excerpt: codePoints.slice(0, policy.excerptChars).join("") + "…",
    truncated: true,
  };
}

// ============================================================================
// SINKS AND BUFFER
// ============================================================================

const recentEvents: DiagnosticEvent[] = [];
const MAX_BUFFER_SIZE = 1000;

function bufferEvent(event: DiagnosticEvent): void {
  recentEvents.push(event);
  if (recentEvents.length > MAX_BUFFER_SIZE) {
    recentEvents.shift(); // Remove oldest
  }
}

/** Default sink: one debug log line per event */
export const debugLogSink: DiagnosticsSink = (event) => {
  debugLog(`[Diagnostics] ${event.type} @${event.stage} (${event.requestId}): ${event.message}`, {
    ...(event.detail ?? {}),
    ...(event.textRef ? { textRef: event.textRef } : {}),
  });
};

/**
 * Get recent diagnostic events across requests, newest last.
 */
export function getRecentDiagnostics(count: number = 100): DiagnosticEvent[] {
  return recentEvents.slice(-count);
}

export function clearDiagnostics(): void {
  recentEvents.length = 0;
}

// ============================================================================
// COLLECTOR
// ============================================================================

/**
 * Per-request event collector. Every recorded event is also forwarded to the
 * sink and to the process-wide buffer.
 */
export class DiagnosticsCollector {
  private readonly events: DiagnosticEvent[] = [];

  constructor(
    public readonly requestId: string,
    private readonly policy: RedactionPolicy,
    private readonly sink: DiagnosticsSink = debugLogSink,
    private readonly now: () => number = Date.now,
  ) {}

  record(input: DiagnosticInput): DiagnosticEvent {
    const { text, ...rest } = input;
    const event: DiagnosticEvent = {
      ...rest,
      requestId: this.requestId,
      at: this.now(),
      ...(text !== undefined ? { textRef: referenceText(text, this.policy) } : {}),
    };
    this.events.push(event);
    bufferEvent(event);
    this.sink(event);
    return event;
  }

  list(): DiagnosticEvent[] {
    return [...this.events];
  }
}
