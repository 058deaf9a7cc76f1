/**
 * Config Loader Tests
 *
 * Environment overrides are parsed per key, validated against the schema
 * before being applied, and the resolved config is cached.
 */

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { applyEnvOverrides, clearConfigCache, loadAnalyzerConfig } from "@/lib/config-loader";
import { DEFAULT_ANALYZER_CONFIG } from "@/lib/config-schemas";

describe("applyEnvOverrides", () => {
  beforeEach(() => {
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("applies typed overrides and records them", () => {
    const { result, overrides, skippedOverrides } = applyEnvOverrides(DEFAULT_ANALYZER_CONFIG, {
      FL_BUDGET_MS: "5000",
      FL_LLM_TIERING: "true",
      FL_LANGUAGE_POLICY: "ALLOW",
    });

    expect(result.budgetMs).toBe(5000);
    expect(result.llmTiering).toBe(true);
    expect(result.languagePolicy).toBe("allow");
    expect(overrides).toEqual([
      { envVar: "FL_LLM_TIERING", field: "llmTiering", appliedValue: true },
      { envVar: "FL_BUDGET_MS", field: "budgetMs", appliedValue: 5000 },
      { envVar: "FL_LANGUAGE_POLICY", field: "languagePolicy", appliedValue: "allow" },
    ]);
    expect(skippedOverrides).toEqual([]);
  });

  it("skips values that are not numbers", () => {
    const { result, skippedOverrides } = applyEnvOverrides(DEFAULT_ANALYZER_CONFIG, { FL_BUDGET_MS: "soon" });
    expect(result.budgetMs).toBe(10_000);
    expect(skippedOverrides).toEqual(["FL_BUDGET_MS (not a number)"]);
  });

  it("skips values the schema rejects", () => {
    const { result, skippedOverrides } = applyEnvOverrides(DEFAULT_ANALYZER_CONFIG, {
      FL_EXPLANATION_CONCURRENCY: "0",
      FL_MIN_TEXT_LENGTH: "6000",
    });
    expect(result.explanationConcurrency).toBe(5);
    expect(result.minTextLength).toBe(10);
    expect(skippedOverrides).toHaveLength(2);
    expect(skippedOverrides[0]).toMatch(/^FL_EXPLANATION_CONCURRENCY \(invalid: /);
    expect(skippedOverrides[1]).toBe(
      "FL_MIN_TEXT_LENGTH (invalid: minTextLength must not exceed maxTextLength)",
    );
  });

  it("validates the length window against both overrides", () => {
    const { result, overrides, skippedOverrides } = applyEnvOverrides(DEFAULT_ANALYZER_CONFIG, {
      FL_MIN_TEXT_LENGTH: "6000",
      FL_MAX_TEXT_LENGTH: "10000",
    });
    expect(result.minTextLength).toBe(6000);
    expect(result.maxTextLength).toBe(10_000);
    expect(overrides.map((o) => o.envVar)).toEqual(["FL_MIN_TEXT_LENGTH", "FL_MAX_TEXT_LENGTH"]);
    expect(skippedOverrides).toEqual([]);
  });

  it("drops only the override that breaks the length window", () => {
    const { result, skippedOverrides } = applyEnvOverrides(DEFAULT_ANALYZER_CONFIG, {
      FL_MAX_TEXT_LENGTH: "5",
      FL_BUDGET_MS: "5000",
    });
    expect(result.maxTextLength).toBe(5_000);
    expect(result.budgetMs).toBe(5000);
    expect(skippedOverrides).toEqual([
      "FL_MAX_TEXT_LENGTH (invalid: minTextLength must not exceed maxTextLength)",
    ]);
  });

  it("ignores every override when the policy is off", () => {
    const { result, overrides } = applyEnvOverrides(DEFAULT_ANALYZER_CONFIG, {
      FL_CONFIG_ENV_OVERRIDES: "off",
      FL_BUDGET_MS: "5000",
    });
    expect(result).toEqual(DEFAULT_ANALYZER_CONFIG);
    expect(overrides).toEqual([]);
  });

  it("applies only allowlisted overrides", () => {
    const { result } = applyEnvOverrides(DEFAULT_ANALYZER_CONFIG, {
      FL_CONFIG_ENV_OVERRIDES: "allowlist:FL_LLM_TIERING",
      FL_LLM_TIERING: "true",
      FL_BUDGET_MS: "5000",
    });
    expect(result.llmTiering).toBe(true);
    expect(result.budgetMs).toBe(10_000);
  });

  it("does not mutate the base config", () => {
    applyEnvOverrides(DEFAULT_ANALYZER_CONFIG, { FL_BUDGET_MS: "5000" });
    expect(DEFAULT_ANALYZER_CONFIG.budgetMs).toBe(10_000);
  });
});

describe("loadAnalyzerConfig", () => {
  beforeEach(() => {
    clearConfigCache();
    vi.spyOn(console, "log").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
    clearConfigCache();
  });

  it("reads overrides from the environment and caches the result", () => {
    vi.stubEnv("FL_BUDGET_MS", "4000");

    const first = loadAnalyzerConfig();
    expect(first.fromCache).toBe(false);
    expect(first.config.budgetMs).toBe(4000);

    vi.stubEnv("FL_BUDGET_MS", "6000");
    const second = loadAnalyzerConfig();
    expect(second.fromCache).toBe(true);
    expect(second.config.budgetMs).toBe(4000);
  });

  it("re-resolves after the cache is cleared", () => {
    vi.stubEnv("FL_BUDGET_MS", "4000");
    loadAnalyzerConfig();
    clearConfigCache();
    vi.stubEnv("FL_BUDGET_MS", "6000");
    expect(loadAnalyzerConfig().config.budgetMs).toBe(6000);
  });
});
