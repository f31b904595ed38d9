import { describe, it, expect } from "vitest";
import { expectedScore, performanceRating, roundRating, resolveRatingConfig } from "../../src/ratings";
import { ConfigError } from "../../src/errors";

describe("expectedScore", () => {
  it("is symmetric and bounded", () => {
    const eA = expectedScore(1600, 1400);
    const eB = expectedScore(1400, 1600);
    expect(eA + eB).toBeCloseTo(1, 10);
    expect(eA).toBeGreaterThan(0.5);
    expect(eB).toBeLessThan(0.5);
  });

  it("is 0.5 between equals and ~0.909 at a 400-point edge", () => {
    expect(expectedScore(1500, 1500)).toBe(0.5);
    expect(expectedScore(1900, 1500)).toBeCloseTo(10 / 11, 10);
  });
});

describe("performanceRating", () => {
  it("matches the average opponent at 50%", () => {
    expect(performanceRating(1600, 0.5, 800)).toBe(1600);
  });

  it("adds 400·log10(p/(1-p))", () => {
    expect(performanceRating(1600, 0.75, 800)).toBeCloseTo(1600 + 400 * Math.log10(3), 10);
  });

  it("clamps to the spread", () => {
    expect(performanceRating(1600, 0, 800)).toBe(800);
    expect(performanceRating(1600, 1, 800)).toBe(2400);
    expect(performanceRating(1600, 0.999, 300)).toBe(1900);
  });
});

describe("roundRating", () => {
  it("rounds halves to even", () => {
    expect(roundRating(1507.5, "half-even")).toBe(1508);
    expect(roundRating(1492.5, "half-even")).toBe(1492);
    expect(roundRating(1492.6, "half-even")).toBe(1493);
    expect(roundRating(1492.4, "half-even")).toBe(1492);
  });

  it("rounds halves up", () => {
    expect(roundRating(1492.5, "half-up")).toBe(1493);
    expect(roundRating(1507.5, "half-up")).toBe(1508);
  });
});

describe("resolveRatingConfig", () => {
  it("fills in defaults", () => {
    expect(resolveRatingConfig()).toEqual({
      defaultRating: 1500,
      provisionalThreshold: 30,
      kStandard: 15,
      kProvisional: 30,
      ratingFloor: 100,
      performanceSpread: 800,
      rounding: "half-even",
    });
  });

  it("keeps overrides", () => {
    expect(resolveRatingConfig({ kStandard: 20, rounding: "half-up" })).toMatchObject({
      kStandard: 20,
      rounding: "half-up",
      kProvisional: 30,
    });
  });

  it("names the source in errors", () => {
    expect(() => resolveRatingConfig({ provisionalThreshold: -3 }, "rating.json")).toThrow(
      "rating.json: provisionalThreshold must be a non-negative integer (got -3)"
    );
    expect(() => resolveRatingConfig({ kProvisional: Number.NaN })).toThrow(ConfigError);
  });
});
