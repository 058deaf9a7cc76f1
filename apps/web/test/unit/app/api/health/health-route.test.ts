import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { GET } from "@/app/api/health/route";
import { clearConfigCache } from "@/lib/config-loader";
import { APP_VERSION } from "@/lib/version";

describe("GET /api/health", () => {
  beforeEach(() => {
    clearConfigCache();
    vi.stubEnv("FL_LLM_PROVIDER", "anthropic");
    vi.spyOn(console, "log").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
    clearConfigCache();
  });

  it("is healthy when the provider key is present", async () => {
    vi.stubEnv("ANTHROPIC_API_KEY", "test-key");

    const response = await GET();

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({
      ok: true,
      service: "fallacy-lens",
      version: APP_VERSION,
      checks: { llmProvider: "anthropic", apiKeyVar: "ANTHROPIC_API_KEY", apiKeyPresent: true },
    });
  });

  it("is unavailable when the provider key is missing", async () => {
    vi.stubEnv("ANTHROPIC_API_KEY", "");

    const response = await GET();
    const body = await response.json();

    expect(response.status).toBe(503);
    expect(body.ok).toBe(false);
    expect(body.checks.apiKeyPresent).toBe(false);
  });

  it("checks the key of the configured provider", async () => {
    vi.stubEnv("FL_LLM_PROVIDER", "mistral");
    vi.stubEnv("MISTRAL_API_KEY", "test-key");

    const body = await (await GET()).json();

    expect(body.checks).toEqual({ llmProvider: "mistral", apiKeyVar: "MISTRAL_API_KEY", apiKeyPresent: true });
  });
});
