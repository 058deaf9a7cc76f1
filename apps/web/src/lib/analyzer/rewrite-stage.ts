/**
 * Rewrite Stage
 *
 * At most one generateRewrite call, made only when fallacies survived ranking
 * and the caller asked for a rewrite. A skipped rewrite and a failed one both
 * surface as `rewrite: null`; they are told apart by their diagnostics.
 *
 * @module analyzer/rewrite-stage
 */

import { raceWithSignal } from "./deadline";
import { BudgetExceededError, errorMessage, InternalInvariantViolation } from "./errors";
import { reasoningCallOptions, type StageContext } from "./stage-context";
import type { CandidateFallacy, RewriteOutcome, RewriteSkipReason } from "./types";

const SKIP_MESSAGES: Record<RewriteSkipReason, string> = {
  no_fallacies: "No fallacies survived ranking; nothing to rewrite",
  not_requested: "Rewrite not requested",
  budget_exhausted: "Budget exhausted before the rewrite could complete",
};

function skip(ctx: StageContext, reason: RewriteSkipReason): RewriteOutcome {
  ctx.diagnostics.record({
    type: "rewrite_skipped",
    stage: "Rewriting",
    message: SKIP_MESSAGES[reason],
    detail: { reason },
  });
  return { status: "skipped", reason };
}

export async function runRewriteStage(
  text: string,
  ranked: readonly CandidateFallacy[],
  ctx: StageContext,
  includeRewrite: boolean = true,
): Promise<RewriteOutcome> {
  if (ranked.length === 0) return skip(ctx, "no_fallacies");
  if (!includeRewrite) return skip(ctx, "not_requested");
  if (ctx.deadline.isExpired()) return skip(ctx, "budget_exhausted");

  try {
    const draft = await raceWithSignal(
      ctx.service.generateRewrite(text, ranked, reasoningCallOptions(ctx)),
      ctx.deadline.signal,
    );
    if (!draft.rewrittenText.trim()) {
      throw new Error("Rewrite response had empty rewrittenText");
    }
    return {
      status: "succeeded",
      rewrite: {
        text: draft.rewrittenText,
        changes: draft.changes.map((c) => ({ ...c })),
      },
    };
  } catch (error) {
    if (error instanceof InternalInvariantViolation) throw error;
    if (error instanceof BudgetExceededError || ctx.deadline.isExpired()) {
      return skip(ctx, "budget_exhausted");
    }
    ctx.diagnostics.record({
      type: "rewrite_failed",
      stage: "Rewriting",
      message: `Rewrite failed: ${errorMessage(error)}`,
      detail: { error: error instanceof Error ? error.name : "unknown" },
    });
    return { status: "failed", error: errorMessage(error) };
  }
}
