/**
 * Detector Stage
 *
 * One detection call per input. Each reported draft is normalized into a
 * CandidateFallacy: kind slugged, confidence clamped, span checked against
 * the input and relocated from the excerpt when the offsets disagree with it.
 * Drafts that cannot be anchored in the input are dropped individually.
 *
 * A failed or timed-out call never throws; the stage reports a status and an
 * empty candidate list and the pipeline assembles an indeterminate result.
 *
 * @module analyzer/detector-stage
 */

import { clampConfidence } from "./confidence-ranking";
import { raceWithSignal } from "./deadline";
import { BudgetExceededError, errorMessage, InternalInvariantViolation } from "./errors";
import { normalizeFallacyKind } from "./fallacy-catalog";
import type { CandidateFallacyDraft } from "./reasoning-service-types";
import { reasoningCallOptions, type StageContext } from "./stage-context";
import type { CandidateFallacy, DetectionStatus, TextSpan } from "./types";

export interface DetectionStageResult {
  status: DetectionStatus;
  candidates: CandidateFallacy[];
}

export type DraftNormalization =
  | { ok: true; candidate: CandidateFallacy }
  | { ok: false; reason: string };

function collapseWhitespace(s: string): string {
  return s.replace(/\s+/g, " ").trim();
}

function isValidSpan(start: number | null, end: number | null, length: number): boolean {
  return start !== null && end !== null && start >= 0 && start < end && end <= length;
}

function resolveSpan(draft: CandidateFallacyDraft, text: string): TextSpan | null {
  const engineExcerpt = draft.excerpt.trim();
  const spanValid = isValidSpan(draft.start, draft.end, text.length);

  if (spanValid && draft.start !== null && draft.end !== null) {
    const slice = text.slice(draft.start, draft.end);
    if (slice.trim().length > 0) {
      if (!engineExcerpt || collapseWhitespace(slice) === collapseWhitespace(engineExcerpt)) {
        return { start: draft.start, end: draft.end };
      }
    }
  }

  // Offsets disagree with the excerpt (or are missing): trust the excerpt if it is in the text
  if (engineExcerpt) {
    const found = text.indexOf(engineExcerpt);
    if (found >= 0) {
      return { start: found, end: found + engineExcerpt.length };
    }
  }

  if (spanValid && draft.start !== null && draft.end !== null) {
    const slice = text.slice(draft.start, draft.end);
    if (slice.trim().length > 0) return { start: draft.start, end: draft.end };
  }

  return null;
}

/**
 * Normalize one draft against the input text.
 */
export function normalizeDraft(draft: CandidateFallacyDraft, text: string): DraftNormalization {
  const kind = normalizeFallacyKind(draft.kind);
  if (!kind) {
    return { ok: false, reason: "missing fallacy kind" };
  }
  if (!Number.isFinite(draft.confidence)) {
    return { ok: false, reason: "confidence is not a finite number" };
  }

  const span = resolveSpan(draft, text);
  if (!span) {
    return { ok: false, reason: "span is out of bounds and the excerpt does not occur in the input" };
  }

  return {
    ok: true,
    candidate: {
      kind,
      span,
      excerpt: text.slice(span.start, span.end),
      confidence: clampConfidence(draft.confidence),
    },
  };
}

export async function runDetectionStage(text: string, ctx: StageContext): Promise<DetectionStageResult> {
  const { deadline, diagnostics } = ctx;

  if (deadline.isExpired()) {
    diagnostics.record({ type: "budget_exceeded", stage: "Detecting", message: "Budget exhausted before detection started" });
    return { status: "timed_out", candidates: [] };
  }

  let drafts: CandidateFallacyDraft[];
  try {
    drafts = await raceWithSignal(
      ctx.service.detectFallacies(text, reasoningCallOptions(ctx)),
      deadline.signal,
    );
  } catch (error) {
    if (error instanceof InternalInvariantViolation) throw error;
    if (error instanceof BudgetExceededError || deadline.isExpired()) {
      diagnostics.record({
        type: "budget_exceeded",
        stage: "Detecting",
        message: "Budget exhausted during detection; no fallacy data available",
        text,
      });
      return { status: "timed_out", candidates: [] };
    }
    diagnostics.record({
      type: "stage_degraded",
      stage: "Detecting",
      message: `Detection failed: ${errorMessage(error)}`,
      text,
      detail: { error: error instanceof Error ? error.name : "unknown" },
    });
    console.warn(`[Detector] Detection failed, result will be indeterminate: ${errorMessage(error)}`);
    return { status: "failed", candidates: [] };
  }

  const candidates: CandidateFallacy[] = [];
  const seen = new Set<string>();

  drafts.forEach((draft, index) => {
    const normalized = normalizeDraft(draft, text);
    if (!normalized.ok) {
      diagnostics.record({
        type: "stage_degraded",
        stage: "Detecting",
        message: `Dropped detection #${index} (${draft.kind || "unknown"}): ${normalized.reason}`,
        text: draft.excerpt,
        detail: { start: draft.start, end: draft.end },
      });
      return;
    }

    const { candidate } = normalized;
    const key = `${candidate.kind}:${candidate.span.start}:${candidate.span.end}`;
    if (seen.has(key)) return;
    seen.add(key);
    candidates.push(candidate);
  });

  return { status: "succeeded", candidates };
}
