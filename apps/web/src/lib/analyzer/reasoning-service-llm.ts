/**
 * LLM Reasoning Service
 *
 * Implementation of ReasoningService on top of the AI SDK. Each operation
 * renders its prompt, calls the model through the transport retry policy,
 * then parses the returned text defensively and validates it with zod.
 * Malformed output raises ReasoningServiceParseError and is not retried.
 *
 * @module analyzer/reasoning-service-llm
 */

import { z } from "zod";

import { DEFAULT_ANALYZER_CONFIG, type AnalyzerConfig } from "../config-schemas";
import { ReasoningServiceParseError, type ReasoningOperation } from "./errors";
import { fallacyLabel, listKnownFallacyKinds } from "./fallacy-catalog";
import { parseModelJson } from "./json";
import { createProductionModelCall, type ModelCallFn, type ModelTask } from "./llm";
import { getStructuredOutputGuidance } from "./prompts/config-adaptations/structured-output";
import {
  getBalancedRewriteSystemPrompt,
  getBalancedRewriteUserPrompt,
} from "./prompts/base/balanced-rewrite-base";
import {
  getDetectFallaciesSystemPrompt,
  getDetectFallaciesUserPrompt,
} from "./prompts/base/detect-fallacies-base";
import {
  getExplainFallacySystemPrompt,
  getExplainFallacyUserPrompt,
} from "./prompts/base/explain-fallacy-base";
import { callWithTransportRetry, defaultSleep, type SleepFn } from "./reasoning-retry";
import type {
  CandidateFallacyDraft,
  ReasoningCallOptions,
  ReasoningCallPolicy,
  ReasoningService,
  RewriteDraft,
} from "./reasoning-service-types";
import type { CandidateFallacy, Explanation } from "./types";

// ============================================================================
// ZOD SCHEMAS FOR VALIDATION
// ============================================================================

const nonEmptyText = z.string().trim().min(1);

const optionalOffset = z
  .union([z.number(), z.string(), z.null()])
  .optional()
  .transform((v) => {
    if (v === null || v === undefined || v === "") return null;
    const n = typeof v === "number" ? v : Number(v);
    return Number.isInteger(n) ? n : null;
  });

/** One detection, accepting the aliases models commonly use */
const FallacyDraftSchema = z
  .object({
    kind: z.string().optional(),
    type: z.string().optional(),
    name: z.string().optional(),
    start: optionalOffset,
    end: optionalOffset,
    excerpt: z.string().optional(),
    text: z.string().optional(),
    quote: z.string().optional(),
    confidence: z.coerce.number(),
  })
  .transform((d) => ({
    kind: (d.kind ?? d.type ?? d.name ?? "").trim(),
    start: d.start,
    end: d.end,
    excerpt: d.excerpt ?? d.text ?? d.quote ?? "",
    confidence: d.confidence,
  }))
  .refine((d) => d.kind.length > 0, { message: "kind is required" })
  .refine((d) => Number.isFinite(d.confidence), { message: "confidence must be a finite number" });

const DetectionEnvelopeSchema = z.union([
  z.object({ fallacies: z.array(z.unknown()) }),
  z.array(z.unknown()).transform((items) => ({ fallacies: items })),
]);

const ExplanationSchema = z.object({
  definition: nonEmptyText,
  rationale: nonEmptyText,
  educationalNote: nonEmptyText,
});

const RewriteSchema = z.object({
  rewrittenText: nonEmptyText,
  changes: z
    .array(
      z.object({
        originalSegment: z.string(),
        revisedSegment: z.string(),
        reason: z.string(),
      }),
    )
    .default([]),
});

// ============================================================================
// PARSING
// ============================================================================

function summarizeIssues(error: z.ZodError): string[] {
  return error.issues.slice(0, 10).map((issue) => `${issue.path.join(".") || "root"}: ${issue.message}`);
}

function parseOrThrow<T>(operation: ReasoningOperation, text: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T {
  const json = parseModelJson(text);
  if (json === undefined) {
    throw new ReasoningServiceParseError(`No JSON found in ${operation} response`, operation);
  }
  const parsed = schema.safeParse(json);
  if (!parsed.success) {
    const issues = summarizeIssues(parsed.error);
    throw new ReasoningServiceParseError(
      `Malformed ${operation} response: ${issues[0] ?? "schema mismatch"}`,
      operation,
      issues,
    );
  }
  return parsed.data;
}

/**
 * Parse a detection response. The envelope must hold a fallacy list; items
 * that fail validation are dropped one by one rather than failing the call.
 */
export function parseDetectionResponse(
  text: string,
  onDropped?: (index: number, issues: string[]) => void,
): CandidateFallacyDraft[] {
  const envelope = parseOrThrow("detect", text, DetectionEnvelopeSchema);
  const drafts: CandidateFallacyDraft[] = [];
  envelope.fallacies.forEach((item, index) => {
    const parsed = FallacyDraftSchema.safeParse(item);
    if (parsed.success) {
      drafts.push(parsed.data);
    } else {
      onDropped?.(index, summarizeIssues(parsed.error));
    }
  });
  return drafts;
}

export function parseExplanationResponse(text: string): Explanation {
  return parseOrThrow("explain", text, ExplanationSchema);
}

export function parseRewriteResponse(text: string): RewriteDraft {
  return parseOrThrow("rewrite", text, RewriteSchema);
}

// ============================================================================
// LLM REASONING SERVICE
// ============================================================================

export interface LLMReasoningServiceDeps {
  callModel?: ModelCallFn;
  sleep?: SleepFn;
}

export class LLMReasoningService implements ReasoningService {
  private readonly config: AnalyzerConfig;
  private readonly policy: ReasoningCallPolicy;
  private readonly callModel: ModelCallFn;
  private readonly sleep: SleepFn;

  constructor(config: AnalyzerConfig = DEFAULT_ANALYZER_CONFIG, deps: LLMReasoningServiceDeps = {}) {
    this.config = config;
    this.policy = {
      callTimeoutMs: config.callTimeoutMs,
      maxTransportRetries: config.maxTransportRetries,
      retryDelayMs: config.retryDelayMs,
    };
    this.callModel = deps.callModel ?? createProductionModelCall(config);
    this.sleep = deps.sleep ?? defaultSleep;
  }

  private withGuidance(system: string): string {
    return system + "\n" + getStructuredOutputGuidance(this.config.llmProvider);
  }

  /**
   * Make a model call under the transport policy and return its raw text.
   */
  private async invoke(
    task: ModelTask,
    system: string,
    prompt: string,
    options: ReasoningCallOptions,
  ): Promise<string> {
    return callWithTransportRetry(
      task,
      (abortSignal) => this.callModel({ task, system: this.withGuidance(system), prompt, abortSignal }),
      this.policy,
      options,
      this.sleep,
    );
  }

  private reportParseFailure(
    options: ReasoningCallOptions,
    operation: ReasoningOperation,
    error: unknown,
  ): void {
    if (error instanceof ReasoningServiceParseError) {
      options.onEvent?.({
        type: "parse_failure",
        stage: operation,
        message: error.message,
        detail: { issues: error.issues.join("; ") || null },
      });
    }
  }

  async detectFallacies(text: string, options: ReasoningCallOptions = {}): Promise<CandidateFallacyDraft[]> {
    const system = getDetectFallaciesSystemPrompt({
      kindsList: listKnownFallacyKinds().map((k) => `- ${k}`).join("\n"),
    });
    const responseText = await this.invoke("detect", system, getDetectFallaciesUserPrompt(text), options);

    try {
      return parseDetectionResponse(responseText, (index, issues) => {
        options.onEvent?.({
          type: "parse_failure",
          stage: "detect",
          message: `Dropped malformed detection item #${index}`,
          detail: { index, issues: issues.join("; ") },
        });
      });
    } catch (error) {
      this.reportParseFailure(options, "detect", error);
      throw error;
    }
  }

  async explainFallacy(kind: string, excerpt: string, options: ReasoningCallOptions = {}): Promise<Explanation> {
    const responseText = await this.invoke(
      "explain",
      getExplainFallacySystemPrompt(),
      getExplainFallacyUserPrompt({ kind, label: fallacyLabel(kind), excerpt }),
      options,
    );

    try {
      return parseExplanationResponse(responseText);
    } catch (error) {
      this.reportParseFailure(options, "explain", error);
      throw error;
    }
  }

  async generateRewrite(
    text: string,
    fallacies: readonly CandidateFallacy[],
    options: ReasoningCallOptions = {},
  ): Promise<RewriteDraft> {
    const fallaciesList = fallacies
      .map((f, i) => `${i + 1}. ${fallacyLabel(f.kind)} (${f.confidence}/100): "${f.excerpt}"`)
      .join("\n");
    const responseText = await this.invoke(
      "rewrite",
      getBalancedRewriteSystemPrompt(),
      getBalancedRewriteUserPrompt({ text, fallaciesList }),
      options,
    );

    try {
      return parseRewriteResponse(responseText);
    } catch (error) {
      this.reportParseFailure(options, "rewrite", error);
      throw error;
    }
  }
}
