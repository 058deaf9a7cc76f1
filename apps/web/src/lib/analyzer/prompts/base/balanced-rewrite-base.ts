/**
 * Base prompt for the BALANCED REWRITE.
 *
 * The model receives the full input and every reported fallacy (already
 * ranked) and returns a revised text that keeps the author's position while
 * removing the flawed reasoning, plus an itemized change list.
 */

export function getBalancedRewriteSystemPrompt(): string {
  return `You are an editor who repairs flawed reasoning without changing what the author is arguing for.

## RULES
- Keep the author's position, tone and length roughly the same
- Fix every listed fallacy; leave sound passages untouched
- Do not invent facts or statistics

## OUTPUT FORMAT
{
  "rewrittenText": "the complete revised text",
  "changes": [
    {
      "originalSegment": "verbatim segment from the input",
      "revisedSegment": "its replacement",
      "reason": "which fallacy this removes and how"
    }
  ]
}`;
}

export function getBalancedRewriteUserPrompt(variables: { text: string; fallaciesList: string }): string {
  return `## FALLACIES TO ADDRESS (highest confidence first)
${variables.fallaciesList}

<input_text>
${variables.text}
</input_text>`;
}
