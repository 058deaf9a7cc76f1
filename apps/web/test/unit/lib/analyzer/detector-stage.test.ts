import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { runDetectionStage } from "@/lib/analyzer/detector-stage";
import {
  BudgetExceededError,
  InternalInvariantViolation,
  ReasoningServiceTransportError,
} from "@/lib/analyzer/errors";
import type { CandidateFallacyDraft } from "@/lib/analyzer/reasoning-service-types";
import {
  createFakeReasoningService,
  disposeTestDeadlines,
  draftFor,
  makeStageContext,
  never,
} from "@test/helpers/test-helpers";

const TEXT =
  "You can't trust Dr. Smith's climate research because he is a terrible person who cheats at cards.";
const ATTACK = "he is a terrible person";

function contextDetecting(drafts: CandidateFallacyDraft[]) {
  return makeStageContext({
    service: createFakeReasoningService({ detectFallacies: async () => drafts }),
  });
}

describe("runDetectionStage", () => {
  beforeEach(() => {
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
  });

  afterEach(() => {
    disposeTestDeadlines();
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  it("normalizes kind and confidence of a well-formed detection", async () => {
    const ctx = contextDetecting([draftFor(TEXT, "Ad Hominem", ATTACK, 92.4)]);
    const start = TEXT.indexOf(ATTACK);

    const result = await runDetectionStage(TEXT, ctx);

    expect(result).toEqual({
      status: "succeeded",
      candidates: [
        { kind: "ad_hominem", span: { start, end: start + ATTACK.length }, excerpt: ATTACK, confidence: 92 },
      ],
    });
  });

  it("clamps out-of-range confidence", async () => {
    const ctx = contextDetecting([
      draftFor(TEXT, "ad_hominem", ATTACK, 150),
      draftFor(TEXT, "appeal_to_authority", "Dr. Smith", -5),
    ]);

    const { candidates } = await runDetectionStage(TEXT, ctx);

    expect(candidates.map((c) => c.confidence)).toEqual([100, 0]);
  });

  it("relocates a span whose offsets disagree with the excerpt", async () => {
    const ctx = contextDetecting([{ kind: "ad_hominem", start: 0, end: 5, excerpt: ATTACK, confidence: 80 }]);
    const start = TEXT.indexOf(ATTACK);

    const { candidates } = await runDetectionStage(TEXT, ctx);

    expect(candidates[0].span).toEqual({ start, end: start + ATTACK.length });
    expect(candidates[0].excerpt).toBe(ATTACK);
  });

  it("locates a span from the excerpt when offsets are missing", async () => {
    const ctx = contextDetecting([{ kind: "ad_hominem", start: null, end: null, excerpt: ATTACK, confidence: 80 }]);

    const { candidates } = await runDetectionStage(TEXT, ctx);

    expect(candidates[0].excerpt).toBe(ATTACK);
  });

  it("compares excerpts ignoring whitespace differences", async () => {
    const start = TEXT.indexOf(ATTACK);
    const ctx = contextDetecting([
      { kind: "ad_hominem", start, end: start + ATTACK.length, excerpt: "he  is a\nterrible person", confidence: 80 },
    ]);

    const { candidates } = await runDetectionStage(TEXT, ctx);

    expect(candidates[0].span).toEqual({ start, end: start + ATTACK.length });
    expect(candidates[0].excerpt).toBe(ATTACK);
  });

  it("trusts valid offsets when the excerpt is not in the text", async () => {
    const ctx = contextDetecting([
      { kind: "ad_hominem", start: 0, end: 3, excerpt: "something else entirely", confidence: 80 },
    ]);

    const { candidates } = await runDetectionStage(TEXT, ctx);

    expect(candidates).toEqual([{ kind: "ad_hominem", span: { start: 0, end: 3 }, excerpt: "You", confidence: 80 }]);
  });

  it("drops detections it cannot anchor, keeping the rest", async () => {
    const ctx = contextDetecting([
      { kind: "ad_hominem", start: 500, end: 520, excerpt: "not in the input", confidence: 80 },
      draftFor(TEXT, "appeal_to_authority", "Dr. Smith", 61),
    ]);

    const result = await runDetectionStage(TEXT, ctx);

    expect(result.status).toBe("succeeded");
    expect(result.candidates.map((c) => c.kind)).toEqual(["appeal_to_authority"]);
    const degraded = ctx.events.filter((e) => e.type === "stage_degraded");
    expect(degraded).toHaveLength(1);
    expect(degraded[0].message).toBe(
      "Dropped detection #0 (ad_hominem): span is out of bounds and the excerpt does not occur in the input",
    );
    expect(degraded[0].textRef?.excerpt).toBe("not in the input");
  });

  it("drops empty kinds and non-finite confidence", async () => {
    const ctx = contextDetecting([
      draftFor(TEXT, "  ", ATTACK, 80),
      draftFor(TEXT, "ad_hominem", ATTACK, Number.NaN),
      draftFor(TEXT, "ad_hominem", ATTACK, 70),
    ]);

    const { candidates } = await runDetectionStage(TEXT, ctx);

    expect(candidates).toHaveLength(1);
    expect(candidates[0].confidence).toBe(70);
    expect(ctx.events.filter((e) => e.type === "stage_degraded")).toHaveLength(2);
  });

  it("collapses exact duplicates", async () => {
    const ctx = contextDetecting([
      draftFor(TEXT, "ad_hominem", ATTACK, 80),
      draftFor(TEXT, "Ad Hominem", ATTACK, 75),
    ]);

    const { candidates } = await runDetectionStage(TEXT, ctx);

    expect(candidates).toHaveLength(1);
    expect(candidates[0].confidence).toBe(80);
  });

  it("reports failure instead of throwing when the service fails", async () => {
    const ctx = makeStageContext({
      service: createFakeReasoningService({
        detectFallacies: async () => {
          throw new ReasoningServiceTransportError("fetch failed", "detect", "network", true);
        },
      }),
    });

    await expect(runDetectionStage(TEXT, ctx)).resolves.toEqual({ status: "failed", candidates: [] });
    expect(ctx.events.map((e) => [e.type, e.message])).toEqual([["stage_degraded", "Detection failed: fetch failed"]]);
  });

  it("reports a timeout when the budget is exhausted during the call", async () => {
    const ctx = makeStageContext({
      service: createFakeReasoningService({
        detectFallacies: async () => {
          throw new BudgetExceededError("Detecting", 10_000);
        },
      }),
    });

    await expect(runDetectionStage(TEXT, ctx)).resolves.toEqual({ status: "timed_out", candidates: [] });
    expect(ctx.events.map((e) => e.type)).toEqual(["budget_exceeded"]);
  });

  it("does not call the service once the budget is gone", async () => {
    const service = createFakeReasoningService();
    const ctx = makeStageContext({ service });
    ctx.clock.advance(10_000);

    await expect(runDetectionStage(TEXT, ctx)).resolves.toEqual({ status: "timed_out", candidates: [] });
    expect(service.detectFallacies).not.toHaveBeenCalled();
  });

  it("abandons a call that is still in flight when the deadline fires", async () => {
    vi.useFakeTimers();
    const ctx = makeStageContext({
      service: createFakeReasoningService({ detectFallacies: () => never() }),
      config: { budgetMs: 1000 },
    });

    const pending = runDetectionStage(TEXT, ctx);
    await vi.advanceTimersByTimeAsync(1000);

    await expect(pending).resolves.toEqual({ status: "timed_out", candidates: [] });
  });

  it("re-throws invariant violations", async () => {
    const ctx = makeStageContext({
      service: createFakeReasoningService({
        detectFallacies: async () => {
          throw new InternalInvariantViolation("broken");
        },
      }),
    });

    await expect(runDetectionStage(TEXT, ctx)).rejects.toBeInstanceOf(InternalInvariantViolation);
  });
});
