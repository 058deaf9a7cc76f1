/**
 * Configuration Loader
 *
 * Resolves the analyzer config from code defaults plus environment variable
 * overrides, validating every override against the schema before it is applied.
 * The resolved config is cached for the lifetime of the process.
 *
 * @module config-loader
 * @version 1.0.0
 */

import {
  AnalyzerConfigSchema,
  DEFAULT_ANALYZER_CONFIG,
  type AnalyzerConfig,
} from "./config-schemas";

// Re-export types for convenience
export type { AnalyzerConfig } from "./config-schemas";
export { DEFAULT_ANALYZER_CONFIG } from "./config-schemas";

// ============================================================================
// TYPES
// ============================================================================

export interface OverrideRecord {
  envVar: string;
  field: keyof AnalyzerConfig;
  appliedValue: string | number | boolean | null;
}

export interface ResolvedConfig<T> {
  config: T;
  overrides: OverrideRecord[];
  skippedOverrides: string[];
  fromCache: boolean;
}

// Override policy
type OverridePolicy = "on" | "off" | string; // string for "allowlist:VAR1,VAR2"

function getOverridePolicy(env: NodeJS.ProcessEnv): OverridePolicy {
  return env.FL_CONFIG_ENV_OVERRIDES || "on";
}

// ============================================================================
// ENVIRONMENT VARIABLE OVERRIDE MAPPING
// ============================================================================

type EnvParser = (v: string) => string | number | boolean | null;

const parseIntValue: EnvParser = (v) => parseInt(v, 10);
const parseFloatValue: EnvParser = (v) => parseFloat(v);
const parseBool: EnvParser = (v) => v.toLowerCase() === "true";
const parseNullableString: EnvParser = (v) => (v.trim() ? v.trim() : null);

const ANALYZER_ENV_MAP: Record<string, { field: keyof AnalyzerConfig; parser: EnvParser }> = {
  FL_LLM_PROVIDER: { field: "llmProvider", parser: (v) => v.toLowerCase().trim() },
  FL_LLM_TIERING: { field: "llmTiering", parser: parseBool },
  FL_MODEL_DETECT: { field: "modelDetect", parser: parseNullableString },
  FL_MODEL_EXPLAIN: { field: "modelExplain", parser: parseNullableString },
  FL_MODEL_REWRITE: { field: "modelRewrite", parser: parseNullableString },
  FL_LLM_TEMPERATURE: { field: "temperature", parser: parseFloatValue },
  FL_BUDGET_MS: { field: "budgetMs", parser: parseIntValue },
  FL_CALL_TIMEOUT_MS: { field: "callTimeoutMs", parser: parseIntValue },
  FL_MAX_TRANSPORT_RETRIES: { field: "maxTransportRetries", parser: parseIntValue },
  FL_RETRY_DELAY_MS: { field: "retryDelayMs", parser: parseIntValue },
  FL_EXPLANATION_CONCURRENCY: { field: "explanationConcurrency", parser: parseIntValue },
  FL_MIN_TEXT_LENGTH: { field: "minTextLength", parser: parseIntValue },
  FL_MAX_TEXT_LENGTH: { field: "maxTextLength", parser: parseIntValue },
  FL_ASCII_RATIO_THRESHOLD: { field: "asciiRatioThreshold", parser: parseFloatValue },
  FL_LANGUAGE_POLICY: { field: "languagePolicy", parser: (v) => v.toLowerCase().trim() },
  FL_REDACT_DIAGNOSTICS: { field: "redactDiagnostics", parser: parseBool },
  FL_DIAGNOSTICS_EXCERPT_CHARS: { field: "diagnosticsExcerptChars", parser: parseIntValue },
};

// ============================================================================
// OVERRIDE RESOLUTION
// ============================================================================

export function applyEnvOverrides(
  base: AnalyzerConfig,
  env: NodeJS.ProcessEnv = process.env,
): { result: AnalyzerConfig; overrides: OverrideRecord[]; skippedOverrides: string[] } {
  const policy = getOverridePolicy(env);
  const skippedOverrides: string[] = [];
  const overrides: OverrideRecord[] = [];

  if (policy === "off") {
    return { result: { ...base }, overrides, skippedOverrides };
  }

  let allowlist: Set<string> | null = null;
  if (policy.startsWith("allowlist:")) {
    allowlist = new Set(policy.slice("allowlist:".length).split(",").map((s) => s.trim()));
  }

  const pending: Array<OverrideRecord & { rawValue: string }> = [];

  for (const [envVar, mapping] of Object.entries(ANALYZER_ENV_MAP)) {
    if (allowlist && !allowlist.has(envVar)) continue;

    const envValue = env[envVar];
    if (envValue === undefined || envValue === "") continue;

    const parsed = mapping.parser(envValue);
    if (typeof parsed === "number" && Number.isNaN(parsed)) {
      console.warn(`[Config-Loader] Failed to parse ${envVar}=${envValue}`);
      skippedOverrides.push(`${envVar} (not a number)`);
      continue;
    }
    pending.push({ envVar, field: mapping.field, appliedValue: parsed, rawValue: envValue });
  }

  const skip = (entry: OverrideRecord & { rawValue: string }, message: string) => {
    console.warn(`[Config-Loader] Skipping invalid override ${entry.envVar}=${entry.rawValue}: ${message}`);
    skippedOverrides.push(`${entry.envVar} (invalid: ${message})`);
  };

  // Validate all overrides together so cross-field rules see the final values,
  // then drop the overrides the issues point at until the config is valid.
  let result: AnalyzerConfig = { ...base };
  while (true) {
    const tentative: Record<string, unknown> = { ...base };
    for (const entry of pending) tentative[entry.field] = entry.appliedValue;

    const validation = AnalyzerConfigSchema.safeParse(tentative);
    if (validation.success) {
      result = validation.data;
      break;
    }

    let dropped = false;
    for (const issue of validation.error.issues) {
      const index = pending.findIndex((entry) => entry.field === issue.path[0]);
      if (index < 0) continue;
      skip(pending[index], issue.message);
      pending.splice(index, 1);
      dropped = true;
    }

    if (!dropped) {
      // No issue points at an override: keep the defaults
      const message = validation.error.issues[0]?.message ?? "invalid";
      for (const entry of pending.splice(0)) skip(entry, message);
      result = { ...base };
      break;
    }
  }

  for (const { envVar, field, appliedValue } of pending) {
    overrides.push({ envVar, field, appliedValue });
  }

  return { result, overrides, skippedOverrides };
}

// ============================================================================
// CACHE
// ============================================================================

let cached: ResolvedConfig<AnalyzerConfig> | null = null;

/**
 * Load the analyzer config (defaults + env overrides). Cached until
 * {@link clearConfigCache} is called.
 */
export function loadAnalyzerConfig(): ResolvedConfig<AnalyzerConfig> {
  if (cached) {
    return { ...cached, fromCache: true };
  }

  const { result, overrides, skippedOverrides } = applyEnvOverrides(DEFAULT_ANALYZER_CONFIG);
  if (overrides.length > 0) {
    console.log(
      `[Config-Loader] Applied env overrides: ${overrides.map((o) => `${o.envVar}→${o.field}`).join(", ")}`,
    );
  }

  cached = { config: result, overrides, skippedOverrides, fromCache: false };
  return cached;
}

export function clearConfigCache(): void {
  cached = null;
}
