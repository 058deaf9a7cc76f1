/**
 * Per-request context threaded through the pipeline stages.
 *
 * @module analyzer/stage-context
 */

import type { AnalyzerConfig } from "../config-schemas";
import type { Deadline } from "./deadline";
import type { DiagnosticsCollector } from "./diagnostics";
import type { ReasoningCallOptions, ReasoningService } from "./reasoning-service-types";

export interface StageContext {
  service: ReasoningService;
  deadline: Deadline;
  diagnostics: DiagnosticsCollector;
  config: AnalyzerConfig;
}

/** Call options binding a reasoning call to this request's budget and diagnostics */
export function reasoningCallOptions(ctx: StageContext): ReasoningCallOptions {
  return {
    signal: ctx.deadline.signal,
    onEvent: (event) => {
      ctx.diagnostics.record(event);
    },
  };
}
