import { describe, expect, it } from "vitest";

import {
  applyMinConfidence,
  averageConfidence,
  clampConfidence,
  classifyConfidence,
  rankFallacies,
} from "@/lib/analyzer/confidence-ranking";

describe("clampConfidence", () => {
  it("clamps into [0, 100] and rounds", () => {
    expect(clampConfidence(150)).toBe(100);
    expect(clampConfidence(-5)).toBe(0);
    expect(clampConfidence(72.6)).toBe(73);
    expect(clampConfidence(42)).toBe(42);
  });
});

describe("classifyConfidence", () => {
  it("maps the exact boundaries", () => {
    expect(classifyConfidence(0)).toBe("low");
    expect(classifyConfidence(59)).toBe("low");
    expect(classifyConfidence(60)).toBe("medium");
    expect(classifyConfidence(79)).toBe("medium");
    expect(classifyConfidence(80)).toBe("high");
    expect(classifyConfidence(100)).toBe("high");
  });

  it("assigns a level to every score in range", () => {
    for (let score = 0; score <= 100; score++) {
      expect(["low", "medium", "high"]).toContain(classifyConfidence(score));
    }
  });
});

describe("rankFallacies", () => {
  const items = [
    { id: "a", confidence: 70 },
    { id: "b", confidence: 90 },
    { id: "c", confidence: 70 },
    { id: "d", confidence: 90 },
    { id: "e", confidence: 10 },
  ];

  it("orders by confidence, keeping input order for ties", () => {
    expect(rankFallacies(items).map((i) => i.id)).toEqual(["b", "d", "a", "c", "e"]);
  });

  it("is idempotent", () => {
    const once = rankFallacies(items);
    expect(rankFallacies(once)).toEqual(once);
  });

  it("does not mutate its input", () => {
    const copy = items.map((i) => ({ ...i }));
    rankFallacies(items);
    expect(items).toEqual(copy);
  });
});

describe("applyMinConfidence", () => {
  const items = [{ confidence: 69 }, { confidence: 70 }, { confidence: 95 }];

  it("removes scores strictly below the threshold", () => {
    expect(applyMinConfidence(items, 70)).toEqual([{ confidence: 70 }, { confidence: 95 }]);
  });

  it("keeps everything at threshold 0", () => {
    expect(applyMinConfidence(items, 0)).toHaveLength(3);
  });
});

describe("averageConfidence", () => {
  it("is null for an empty list", () => {
    expect(averageConfidence([])).toBeNull();
  });

  it("is the arithmetic mean", () => {
    expect(averageConfidence([{ confidence: 60 }, { confidence: 91 }])).toBe(75.5);
  });
});
