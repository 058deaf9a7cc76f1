/**
 * Input text gate.
 *
 * Pure and deterministic: trims the input, then applies the rules in order and
 * reports the first one that fails. Lengths are counted in Unicode code points.
 *
 * The ASCII-ratio check is a rough English-eligibility heuristic, not a
 * language detector. With `languagePolicy: "allow"` it is skipped.
 *
 * @module analyzer/text-validator
 */

import { DEFAULT_ANALYZER_CONFIG, type AnalyzerConfig } from "../config-schemas";
import { ValidationError } from "./errors";

export type TextValidationResult =
  | { ok: true; text: string }
  | { ok: false; error: ValidationError };

type ValidatorConfig = Pick<
  AnalyzerConfig,
  "minTextLength" | "maxTextLength" | "asciiRatioThreshold" | "languagePolicy"
>;

/** Fraction of code points in the single-byte ASCII range (0 for empty text). */
export function asciiRatio(text: string): number {
  const codePoints = Array.from(text);
  if (codePoints.length === 0) return 0;
  let ascii = 0;
  for (const ch of codePoints) {
    const cp = ch.codePointAt(0);
    if (cp !== undefined && cp <= 0x7f) ascii++;
  }
  return ascii / codePoints.length;
}

function fail(error: ValidationError): TextValidationResult {
  return { ok: false, error };
}

export function validateInputText(
  raw: unknown,
  config: ValidatorConfig = DEFAULT_ANALYZER_CONFIG,
): TextValidationResult {
  if (typeof raw !== "string") {
    return fail(new ValidationError("invalid_type", "Input text must be a string."));
  }

  const text = raw.trim();
  if (text.length === 0) {
    return fail(new ValidationError("empty", "Input text is empty."));
  }

  const length = Array.from(text).length;
  if (length < config.minTextLength) {
    return fail(
      new ValidationError(
        "too_short",
        `Input text is too short: ${length} characters (minimum ${config.minTextLength}).`,
      ),
    );
  }

  if (length > config.maxTextLength) {
    return fail(
      new ValidationError(
        "too_long",
        `Input text is too long: ${length} characters (maximum ${config.maxTextLength}). Shorten it and try again; it is not truncated automatically.`,
      ),
    );
  }

  if (config.languagePolicy === "reject") {
    const ratio = asciiRatio(text);
    if (ratio < config.asciiRatioThreshold) {
      return fail(
        new ValidationError(
          "language_mismatch",
          `Input text does not appear to be English (${Math.round(ratio * 100)}% ASCII characters, ` +
            `minimum ${Math.round(config.asciiRatioThreshold * 100)}%).`,
        ),
      );
    }
  }

  return { ok: true, text };
}
