import { NextResponse } from "next/server";

import { loadAnalyzerConfig } from "@/lib/config-loader";
import { providerApiKeyEnvVar } from "@/lib/analyzer/llm";
import { APP_VERSION } from "@/lib/version";

export const runtime = "nodejs";

function isNonEmpty(s?: string | null) {
  return typeof s === "string" && s.trim().length > 0;
}

export async function GET() {
  const { config } = loadAnalyzerConfig();
  const apiKeyVar = providerApiKeyEnvVar(config.llmProvider);
  const checks = {
    llmProvider: config.llmProvider,
    apiKeyVar,
    apiKeyPresent: isNonEmpty(process.env[apiKeyVar]),
  };

  return NextResponse.json(
    { ok: checks.apiKeyPresent, service: "fallacy-lens", version: APP_VERSION, checks },
    { status: checks.apiKeyPresent ? 200 : 503 },
  );
}
