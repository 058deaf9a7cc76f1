/**
 * Structured Output Guidance - Provider-specific schema compliance hints
 *
 * Each LLM has different tendencies for structured JSON output. These blocks
 * are appended to every system prompt so the parser sees plain JSON as often
 * as possible.
 */

import type { LLMProviderType } from "../../../config-schemas";

export function getStructuredOutputGuidance(provider: LLMProviderType): string {
  switch (provider) {
    case "anthropic":
      return `
## JSON OUTPUT REQUIREMENTS
- Return ONLY a valid JSON object (no markdown code fences)
- Use "" for empty strings and [] for empty arrays (never null)
- Numbers are numbers, not strings`;

    case "openai":
      return `
## JSON OUTPUT REQUIREMENTS
- Return ONLY a valid JSON object
- Include ALL required fields even if empty
- Match field names exactly (case-sensitive); do not add extra fields`;

    case "google":
      return `
## JSON OUTPUT REQUIREMENTS
- Return ONLY a valid JSON object (no explanatory text before or after)
- Array fields are always arrays, even with a single item`;

    case "mistral":
      return `
## JSON OUTPUT REQUIREMENTS
- Return ONLY valid JSON
- Follow field naming exactly as specified and include all required fields`;
  }
}
