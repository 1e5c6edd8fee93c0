// src/tests/thresholdClassifier.test.ts
import { DEFAULT_LEVEL_THRESHOLDS, clampPercent, classifyLevel } from "../utils/thresholdClassifier";

describe("Threshold classifier", () => {
  it("should map percentages onto the default cut points", () => {
    expect(classifyLevel(92, DEFAULT_LEVEL_THRESHOLDS)).toBe(3);
    expect(classifyLevel(85, DEFAULT_LEVEL_THRESHOLDS)).toBe(3);
    expect(classifyLevel(84.99, DEFAULT_LEVEL_THRESHOLDS)).toBe(2);
    expect(classifyLevel(70, DEFAULT_LEVEL_THRESHOLDS)).toBe(2);
    expect(classifyLevel(60, DEFAULT_LEVEL_THRESHOLDS)).toBe(1);
    expect(classifyLevel(59.99, DEFAULT_LEVEL_THRESHOLDS)).toBe(0);
    expect(classifyLevel(0, DEFAULT_LEVEL_THRESHOLDS)).toBe(0);
  });

  it("should never decrease as the percentage grows", () => {
    let previous = 0;
    for (let p = 0; p <= 100; p += 0.5) {
      const level = classifyLevel(p, DEFAULT_LEVEL_THRESHOLDS);
      expect(level).toBeGreaterThanOrEqual(previous);
      previous = level;
    }
    expect(previous).toBe(3);
  });

  it("should not depend on the order of the cut points", () => {
    const ascending = [...DEFAULT_LEVEL_THRESHOLDS].reverse();
    expect(classifyLevel(72, ascending)).toBe(2);
    expect(classifyLevel(99, ascending)).toBe(3);
  });

  it("should clamp out-of-range and NaN percentages", () => {
    expect(clampPercent(-5)).toBe(0);
    expect(clampPercent(140)).toBe(100);
    expect(clampPercent(NaN)).toBe(0);
    expect(classifyLevel(140, DEFAULT_LEVEL_THRESHOLDS)).toBe(3);
    expect(classifyLevel(NaN, DEFAULT_LEVEL_THRESHOLDS)).toBe(0);
  });

  it("should honor custom thresholds", () => {
    const strict = [
      { level: 3, minPercent: 90 },
      { level: 2, minPercent: 80 },
      { level: 1, minPercent: 50 },
    ];
    expect(classifyLevel(85, strict)).toBe(2);
    expect(classifyLevel(55, strict)).toBe(1);
    expect(classifyLevel(45, [])).toBe(0);
  });
});
