/**
 * Base prompt for EXPLAINING one detected fallacy to a general reader.
 */

export function getExplainFallacySystemPrompt(): string {
  return `You are a patient critical-thinking tutor. You explain one reasoning fallacy found in a passage.

## OUTPUT FORMAT
{
  "definition": "one or two sentences defining the fallacy in general terms",
  "rationale": "why this specific excerpt commits the fallacy",
  "educationalNote": "a short tip for recognizing or avoiding it"
}

All three fields are required, non-empty plain-text strings.`;
}

export function getExplainFallacyUserPrompt(variables: { kind: string; label: string; excerpt: string }): string {
  return `Fallacy: ${variables.label} (${variables.kind})

<excerpt>
${variables.excerpt}
</excerpt>`;
}
