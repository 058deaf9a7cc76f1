/**
 * JSON extraction utilities for recovering structured outputs from LLM text.
 *
 * These helpers do not attempt to parse arbitrary JavaScript; they locate the
 * first balanced JSON object or array, apply a couple of cheap repairs, and
 * hand the result to JSON.parse.
 */

/**
 * Remove a surrounding markdown code fence (```json ... ```), if any.
 */
export function stripCodeFences(text: string): string {
  const trimmed = text.trim();
  const fenced = trimmed.match(/^```[a-zA-Z]*\s*\n?([\s\S]*?)\n?```$/);
  return fenced ? fenced[1].trim() : trimmed;
}

/**
 * Extract the first balanced JSON object or array substring from arbitrary
 * text. Resilient to brackets inside quoted strings.
 */
export function extractFirstJsonValue(text: string): string | null {
  const raw = String(text ?? "");
  const objStart = raw.indexOf("{");
  const arrStart = raw.indexOf("[");
  const candidates = [objStart, arrStart].filter((i) => i >= 0);
  if (candidates.length === 0) return null;
  const start = Math.min(...candidates);

  let depth = 0;
  let inString = false;
  let escape = false;

  for (let i = start; i < raw.length; i++) {
    const ch = raw[i];

    if (inString) {
      if (escape) { escape = false; continue; }
      if (ch === "\\") { escape = true; continue; }
      if (ch === "\"") { inString = false; }
      continue;
    }

    if (ch === "\"") { inString = true; continue; }

    if (ch === "{" || ch === "[") depth++;
    if (ch === "}" || ch === "]") depth--;

    if (depth === 0) return raw.slice(start, i + 1);
  }

  return null;
}

/**
 * Drop trailing commas before a closing bracket, outside of strings.
 */
export function removeTrailingCommas(json: string): string {
  let out = "";
  let inString = false;
  let escape = false;

  for (let i = 0; i < json.length; i++) {
    const ch = json[i];

    if (inString) {
      out += ch;
      if (escape) { escape = false; continue; }
      if (ch === "\\") { escape = true; continue; }
      if (ch === "\"") { inString = false; }
      continue;
    }

    if (ch === "\"") { inString = true; out += ch; continue; }

    if (ch === ",") {
      let j = i + 1;
      while (j < json.length && /\s/.test(json[j])) j++;
      if (json[j] === "}" || json[j] === "]") continue;
    }

    out += ch;
  }

  return out;
}

/**
 * Parse model output into a JSON value: direct parse first, then fence
 * stripping, first-value extraction and trailing-comma repair.
 * Returns undefined when nothing parseable is found.
 */
export function parseModelJson(text: string): unknown {
  const attempts: string[] = [text];
  const unfenced = stripCodeFences(text);
  attempts.push(unfenced);
  const extracted = extractFirstJsonValue(unfenced);
  if (extracted) {
    attempts.push(extracted, removeTrailingCommas(extracted));
  }

  for (const candidate of attempts) {
    try {
      return JSON.parse(candidate);
    } catch {
      // next strategy
    }
  }
  return undefined;
}
