/**
 * Fallacy catalogue
 *
 * Fixed educational text per fallacy kind, used as the fallback explanation
 * when the reasoning service cannot explain a detection, and as the list of
 * preferred kind identifiers in the detection prompt.
 *
 * @module analyzer/fallacy-catalog
 */

import { z } from "zod";
import catalogJson from "./data/fallacy-catalog.json";
import type { Explanation } from "./types";

const CatalogEntrySchema = z.object({
  label: z.string().min(1),
  definition: z.string().min(1),
  educationalNote: z.string().min(1),
});

const CatalogSchema = z.object({
  generic: CatalogEntrySchema,
  kinds: z.record(CatalogEntrySchema),
});

export type CatalogEntry = z.infer<typeof CatalogEntrySchema>;

const catalog = CatalogSchema.parse(catalogJson);

/**
 * Normalize a free-form kind ("Ad Hominem", "straw-man") to a snake_case slug.
 */
export function normalizeFallacyKind(raw: string): string {
  return raw
    .trim()
    .toLowerCase()
    .replace(/['’]/g, "")
    .replace(/[^a-z0-9]+/g, "_")
    .replace(/^_+|_+$/g, "");
}

export function isKnownFallacyKind(kind: string): boolean {
  return Object.prototype.hasOwnProperty.call(catalog.kinds, kind);
}

export function listKnownFallacyKinds(): string[] {
  return Object.keys(catalog.kinds);
}

export function getCatalogEntry(kind: string): CatalogEntry {
  return isKnownFallacyKind(kind) ? catalog.kinds[kind] : catalog.generic;
}

/** Human-readable label; unknown kinds are title-cased from their slug. */
export function fallacyLabel(kind: string): string {
  if (isKnownFallacyKind(kind)) return catalog.kinds[kind].label;
  const words = kind.split("_").filter(Boolean);
  if (words.length === 0) return catalog.generic.label;
  return words.map((w, i) => (i === 0 ? w.charAt(0).toUpperCase() + w.slice(1) : w)).join(" ");
}

/**
 * Boilerplate explanation for a kind. The rationale names the excerpt but
 * makes no claim about why it is fallacious, since nothing analyzed it.
 */
export function getFallbackExplanation(kind: string, excerpt: string): Explanation {
  const entry = getCatalogEntry(kind);
  const label = fallacyLabel(kind);
  const codePoints = Array.from(excerpt);
  const quoted = codePoints.length > 120 ? `${codePoints.slice(0, 117).join("")}...` : excerpt;
  return {
    definition: entry.definition,
    rationale: `The passage "${quoted}" was flagged as a possible instance of ${label.toLowerCase()}. A detailed explanation is not available for this item.`,
    educationalNote: entry.educationalNote,
  };
}
