/**
 * POST /api/analyze - Analyze a passage for reasoning fallacies
 *
 * Body: { text: string, includeRewrite?: boolean, minConfidence?: number }
 */

import { NextResponse } from "next/server";

import { analyze } from "@/lib/analyzer";
import { AnalyzeRequestSchema } from "@/lib/config-schemas";

export const runtime = "nodejs";

export async function POST(req: Request) {
  let body: unknown;
  try {
    body = await req.json();
  } catch {
    return NextResponse.json(
      { ok: false, error: { code: "invalid_json", message: "Request body must be valid JSON" } },
      { status: 400 },
    );
  }

  const parsed = AnalyzeRequestSchema.safeParse(body);
  if (!parsed.success) {
    return NextResponse.json(
      {
        ok: false,
        error: {
          code: "invalid_request",
          message: "Request body does not match the expected shape",
          issues: parsed.error.issues.map((issue) => `${issue.path.join(".") || "root"}: ${issue.message}`),
        },
      },
      { status: 400 },
    );
  }

  const { text, includeRewrite, minConfidence } = parsed.data;

  try {
    const response = await analyze(text, { includeRewrite, minConfidence });

    if (!response.ok) {
      return NextResponse.json(
        { ok: false, error: { code: response.error.code, message: response.error.message } },
        { status: 400 },
      );
    }

    const { result } = response;
    if (result.detectionStatus === "failed") {
      return NextResponse.json(
        { ok: false, error: { code: "analysis_unavailable", message: result.summary.message }, result },
        { status: 503 },
      );
    }
    if (result.detectionStatus === "timed_out") {
      return NextResponse.json(
        { ok: false, error: { code: "analysis_timeout", message: result.summary.message }, result },
        { status: 504 },
      );
    }

    return NextResponse.json({ ok: true, result });
  } catch (err: unknown) {
    console.error("[Analyze-API] analysis error:", err);
    return NextResponse.json(
      { ok: false, error: { code: "internal_error", message: "Internal error while analyzing text" } },
      { status: 500 },
    );
  }
}
