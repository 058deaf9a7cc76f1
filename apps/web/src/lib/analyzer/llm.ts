/**
 * Fallacy Analyzer - LLM Provider Selection
 *
 * Model selection per reasoning task and the production model call used by
 * the LLM reasoning service.
 *
 * @module analyzer/llm
 */

import { generateText, type LanguageModel } from "ai";
import { openai } from "@ai-sdk/openai";
import { anthropic } from "@ai-sdk/anthropic";
import { google } from "@ai-sdk/google";
import { mistral } from "@ai-sdk/mistral";
import { DEFAULT_ANALYZER_CONFIG, type AnalyzerConfig, type LLMProviderType } from "../config-schemas";

// ============================================================================
// MODEL SELECTION
// ============================================================================

export interface ModelInfo {
  provider: LLMProviderType;
  modelName: string;
  model: LanguageModel;
}

export type ModelTask = "detect" | "explain" | "rewrite";

export function detectProviderFromModelName(modelName: string): LLMProviderType | null {
  const name = (modelName || "").toLowerCase();
  if (name.includes("claude")) return "anthropic";
  if (name.includes("gemini")) return "google";
  if (name.includes("mistral")) return "mistral";
  if (name.includes("gpt")) return "openai";
  return null;
}

/** Environment variable each AI SDK provider reads its API key from. */
export function providerApiKeyEnvVar(provider: LLMProviderType): string {
  switch (provider) {
    case "anthropic":
      return "ANTHROPIC_API_KEY";
    case "google":
      return "GOOGLE_GENERATIVE_AI_API_KEY";
    case "mistral":
      return "MISTRAL_API_KEY";
    case "openai":
      return "OPENAI_API_KEY";
  }
}

function modelOverrideForTask(task: ModelTask, config: AnalyzerConfig): string | null {
  switch (task) {
    case "detect":
      return config.modelDetect;
    case "explain":
      return config.modelExplain;
    case "rewrite":
      return config.modelRewrite;
  }
}

/** Single-model default, used for every task when tiering is off. */
function primaryModelName(provider: LLMProviderType): string {
  switch (provider) {
    case "anthropic":
      return "claude-sonnet-4-20250514";
    case "google":
      return "gemini-1.5-pro";
    case "mistral":
      return "mistral-large-latest";
    case "openai":
      return "gpt-4o";
  }
}

function defaultModelNameForTask(provider: LLMProviderType, task: ModelTask): string {
  // Explanations are short, independent and numerous: cheap/fast tier.
  if (task !== "explain") return primaryModelName(provider);
  switch (provider) {
    case "anthropic":
      return "claude-3-5-haiku-20241022";
    case "google":
      return "gemini-1.5-flash";
    case "mistral":
      return "mistral-small-latest";
    case "openai":
      return "gpt-4o-mini";
  }
}

function buildModel(provider: LLMProviderType, modelName: string): LanguageModel {
  switch (provider) {
    case "anthropic":
      return anthropic(modelName);
    case "google":
      return google(modelName);
    case "mistral":
      return mistral(modelName);
    case "openai":
      return openai(modelName);
  }
}

/**
 * Resolve the model name for a task without instantiating a provider client.
 *
 * Tiering off: the provider's primary model for every task.
 * Tiering on: per-task defaults, with per-task overrides from config honoured
 * unless the override obviously belongs to a different provider.
 */
export function resolveModelName(
  task: ModelTask,
  config: AnalyzerConfig = DEFAULT_ANALYZER_CONFIG,
): { provider: LLMProviderType; modelName: string } {
  const provider = config.llmProvider;
  if (!config.llmTiering) {
    return { provider, modelName: primaryModelName(provider) };
  }

  const overrideName = modelOverrideForTask(task, config);
  if (overrideName) {
    const inferredProvider = detectProviderFromModelName(overrideName);
    if (inferredProvider && inferredProvider !== provider) {
      console.warn(
        `[LLM] Ignoring model override "${overrideName}" for task "${task}" because provider is "${provider}"`,
      );
    } else {
      return { provider, modelName: overrideName };
    }
  }

  return { provider, modelName: defaultModelNameForTask(provider, task) };
}

/**
 * Get an LLM model for a pipeline task.
 */
export function getModelForTask(
  task: ModelTask,
  config: AnalyzerConfig = DEFAULT_ANALYZER_CONFIG,
): ModelInfo {
  const { provider, modelName } = resolveModelName(task, config);
  return { provider, modelName, model: buildModel(provider, modelName) };
}

// ============================================================================
// MODEL CALL
// ============================================================================

export interface ModelCallRequest {
  task: ModelTask;
  system: string;
  prompt: string;
  abortSignal: AbortSignal;
}

/** Returns the raw text the model produced. */
export type ModelCallFn = (request: ModelCallRequest) => Promise<string>;

/**
 * Production model call through the AI SDK. SDK-level retries are disabled:
 * the reasoning service owns the retry policy.
 */
export function createProductionModelCall(config: AnalyzerConfig): ModelCallFn {
  return async ({ task, system, prompt, abortSignal }) => {
    const modelInfo = getModelForTask(task, config);
    const result = await generateText({
      model: modelInfo.model,
      system,
      messages: [{ role: "user", content: prompt }],
      temperature: config.temperature,
      maxRetries: 0,
      abortSignal,
    });
    return result.text;
  };
}
