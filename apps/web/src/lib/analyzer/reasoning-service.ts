/**
 * Reasoning Service
 *
 * Entry point for obtaining the ReasoningService the pipeline runs against.
 * The default is the AI SDK implementation built from the loaded config; tests
 * and alternative hosts register their own implementation.
 *
 * @module analyzer/reasoning-service
 */

import type { AnalyzerConfig } from "../config-schemas";
import { loadAnalyzerConfig } from "../config-loader";
import { LLMReasoningService } from "./reasoning-service-llm";
import type { ReasoningService } from "./reasoning-service-types";

// Re-export types for convenience
export * from "./reasoning-service-types";
export { LLMReasoningService } from "./reasoning-service-llm";

// ============================================================================
// SERVICE REGISTRY
// ============================================================================

let registered: ReasoningService | null = null;
let defaultService: { config: AnalyzerConfig; service: ReasoningService } | null = null;

/**
 * Register a service implementation, replacing the default.
 * Used for dependency injection and testing.
 */
export function registerReasoningService(service: ReasoningService): void {
  registered = service;
}

/** Drop any registered implementation and the cached default. */
export function resetReasoningService(): void {
  registered = null;
  defaultService = null;
}

/**
 * Get the reasoning service for the given (or currently loaded) config.
 * The default service is stateless per call and shared across requests.
 */
export function getReasoningService(config?: AnalyzerConfig): ReasoningService {
  if (registered) return registered;

  const effective = config ?? loadAnalyzerConfig().config;
  if (!defaultService || defaultService.config !== effective) {
    defaultService = { config: effective, service: new LLMReasoningService(effective) };
  }
  return defaultService.service;
}
