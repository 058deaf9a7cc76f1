/**
 * Configuration Schemas
 *
 * Zod schemas for the analyzer's operational configuration and for the
 * inbound analyze request body.
 *
 * @module config-schemas
 * @version 1.0.0
 */

import { z } from "zod";

// ============================================================================
// TYPES
// ============================================================================

export const LLM_PROVIDERS = ["anthropic", "openai", "google", "mistral"] as const;
export type LLMProviderType = (typeof LLM_PROVIDERS)[number];

// ============================================================================
// ANALYZER CONFIG SCHEMA
// ============================================================================

export const AnalyzerConfigSchema = z.object({
  // === Model Selection ===
  llmProvider: z.enum(LLM_PROVIDERS).describe("Primary LLM provider for analysis"),
  llmTiering: z.boolean().describe("Use a cheaper model for per-fallacy explanations"),
  modelDetect: z.string().min(1).nullable().describe("Model override for fallacy detection (tiering only)"),
  modelExplain: z.string().min(1).nullable().describe("Model override for explanations (tiering only)"),
  modelRewrite: z.string().min(1).nullable().describe("Model override for balanced rewrites (tiering only)"),
  temperature: z.number().min(0).max(1),

  // === Budgets and retries ===
  budgetMs: z.number().int().min(1000).max(120_000).describe("Wall-clock budget from detection through rewrite"),
  callTimeoutMs: z.number().int().min(500).max(60_000).describe("Timeout for a single reasoning-service call"),
  maxTransportRetries: z.number().int().min(0).max(5),
  retryDelayMs: z.number().int().min(0).max(10_000).describe("Fixed backoff between transport retries"),
  explanationConcurrency: z.number().int().min(1).max(20),

  // === Input gate ===
  minTextLength: z.number().int().min(1),
  maxTextLength: z.number().int().min(1).max(100_000),
  asciiRatioThreshold: z.number().min(0).max(1),
  languagePolicy: z.enum(["reject", "allow"]).describe("What to do with text below the ASCII ratio threshold"),

  // === Diagnostics ===
  redactDiagnostics: z.boolean().describe("Only attach truncated text excerpts to diagnostic events"),
  diagnosticsExcerptChars: z.number().int().min(0).max(1000),
}).superRefine((c, ctx) => {
  if (c.minTextLength <= c.maxTextLength) return;
  for (const field of ["minTextLength", "maxTextLength"] as const) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: "minTextLength must not exceed maxTextLength",
      path: [field],
    });
  }
});

export type AnalyzerConfig = z.infer<typeof AnalyzerConfigSchema>;

export const DEFAULT_ANALYZER_CONFIG: AnalyzerConfig = {
  llmProvider: "anthropic",
  llmTiering: false,
  modelDetect: null,
  modelExplain: null,
  modelRewrite: null,
  temperature: 0.1,
  budgetMs: 10_000,
  callTimeoutMs: 8_000,
  maxTransportRetries: 2,
  retryDelayMs: 500,
  explanationConcurrency: 5,
  minTextLength: 10,
  maxTextLength: 5_000,
  asciiRatioThreshold: 0.7,
  languagePolicy: "reject",
  redactDiagnostics: true,
  diagnosticsExcerptChars: 80,
};

// ============================================================================
// REQUEST SCHEMA
// ============================================================================

/**
 * Body of `POST /api/analyze`. `text` stays untyped here: the text validator
 * owns the rules for it and reports them as a ValidationError.
 */
export const AnalyzeRequestSchema = z.object({
  text: z.unknown(),
  includeRewrite: z.boolean().default(true),
  minConfidence: z.number().int().min(0).max(100).default(0),
});
