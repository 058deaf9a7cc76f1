/**
 * Confidence & Ranking
 *
 * Pure, synchronous helpers: clamp reported scores, map scores to levels,
 * order fallacies and apply the caller's minimum-confidence filter.
 *
 * Ordering is by score descending. Equal scores keep the order the detector
 * reported them in; there is deliberately no secondary key.
 *
 * @module analyzer/confidence-ranking
 */

import type { ConfidenceLevel } from "./types";

export const MEDIUM_CONFIDENCE_THRESHOLD = 60;
export const HIGH_CONFIDENCE_THRESHOLD = 80;

/**
 * Round and clamp a reported confidence into an integer in [0, 100].
 */
export function clampConfidence(value: number): number {
  return Math.max(0, Math.min(100, Math.round(value)));
}

export function classifyConfidence(score: number): ConfidenceLevel {
  if (score >= HIGH_CONFIDENCE_THRESHOLD) return "high";
  if (score >= MEDIUM_CONFIDENCE_THRESHOLD) return "medium";
  return "low";
}

/**
 * Stable sort by confidence, highest first. Returns a new array.
 */
export function rankFallacies<T extends { confidence: number }>(items: readonly T[]): T[] {
  return items
    .map((item, index) => ({ item, index }))
    .sort((a, b) => b.item.confidence - a.item.confidence || a.index - b.index)
    .map(({ item }) => item);
}

/**
 * Drop items scored strictly below the threshold. A threshold of 0 keeps all.
 */
export function applyMinConfidence<T extends { confidence: number }>(
  items: readonly T[],
  minConfidence: number,
): T[] {
  return items.filter((item) => item.confidence >= minConfidence);
}

/** Arithmetic mean of the scores, or null for an empty list. */
export function averageConfidence(items: readonly { confidence: number }[]): number | null {
  if (items.length === 0) return null;
  return items.reduce((sum, item) => sum + item.confidence, 0) / items.length;
}
