/**
 * Explanation Stage
 *
 * Fans out one explainFallacy call per candidate, bounded by
 * explanationConcurrency, and joins on all of them before returning. A
 * candidate whose call fails, or that never starts because the budget ran
 * out, gets the catalogue explanation for its kind instead.
 *
 * @module analyzer/explanation-stage
 */

import pLimit from "p-limit";

import { raceWithSignal } from "./deadline";
import { BudgetExceededError, errorMessage, InternalInvariantViolation } from "./errors";
import { getFallbackExplanation } from "./fallacy-catalog";
import { reasoningCallOptions, type StageContext } from "./stage-context";
import type { CandidateFallacy, ExplanationOutcome } from "./types";

export interface ExplanationStageResult {
  /** Same length and order as the candidates passed in */
  outcomes: ExplanationOutcome[];
  budgetExhausted: boolean;
}

function fallback(candidate: CandidateFallacy, reason: string): ExplanationOutcome {
  return {
    status: "fallback",
    explanation: getFallbackExplanation(candidate.kind, candidate.excerpt),
    reason,
  };
}

export async function runExplanationStage(
  candidates: readonly CandidateFallacy[],
  ctx: StageContext,
): Promise<ExplanationStageResult> {
  if (candidates.length === 0) {
    return { outcomes: [], budgetExhausted: false };
  }

  const { deadline, diagnostics } = ctx;
  const limit = pLimit(Math.max(1, ctx.config.explanationConcurrency));
  let budgetExhausted = false;

  const noteBudget = () => {
    if (budgetExhausted) return;
    budgetExhausted = true;
    diagnostics.record({
      type: "budget_exceeded",
      stage: "Explaining",
      message: "Budget exhausted during explanation; remaining items use catalogue explanations",
    });
  };

  const explainOne = async (candidate: CandidateFallacy, index: number): Promise<ExplanationOutcome> => {
    if (deadline.isExpired()) {
      noteBudget();
      return fallback(candidate, "budget_exhausted");
    }

    try {
      const explanation = await raceWithSignal(
        ctx.service.explainFallacy(candidate.kind, candidate.excerpt, reasoningCallOptions(ctx)),
        deadline.signal,
      );
      return { status: "explained", explanation };
    } catch (error) {
      if (error instanceof InternalInvariantViolation) throw error;
      if (error instanceof BudgetExceededError || deadline.isExpired()) {
        noteBudget();
        return fallback(candidate, "budget_exhausted");
      }
      diagnostics.record({
        type: "stage_degraded",
        stage: "Explaining",
        message: `Explanation #${index} (${candidate.kind}) failed: ${errorMessage(error)}`,
        text: candidate.excerpt,
        detail: { index, kind: candidate.kind },
      });
      return fallback(candidate, errorMessage(error));
    }
  };

  const settled = await Promise.allSettled(
    candidates.map((candidate, index) => limit(() => explainOne(candidate, index))),
  );

  const outcomes = settled.map((result) => {
    if (result.status === "rejected") {
      // explainOne only rejects for invariant violations
      throw result.reason;
    }
    return result.value;
  });

  const fallbackCount = outcomes.filter((o) => o.status === "fallback").length;
  if (fallbackCount > 0) {
    console.warn(`[Explanation] ${fallbackCount}/${outcomes.length} explanation(s) fell back to the catalogue`);
  }

  return { outcomes, budgetExhausted };
}
