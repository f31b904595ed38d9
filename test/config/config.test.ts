import { describe, it, expect } from "vitest";
import { parseConfigFile, readEnvConfig, resolveConfig } from "../../src/config";
import { parseLogLevel } from "../../src/logger";
import { ConfigError } from "../../src/errors";

describe("parseConfigFile", () => {
  it("accepts any subset of the rating constants", () => {
    expect(parseConfigFile('{"kStandard": 20, "rounding": "half-up"}', "rating.json")).toEqual({
      kStandard: 20,
      rounding: "half-up",
    });
  });

  it("rejects bad JSON, non-objects, wrong types and unknown keys", () => {
    expect(() => parseConfigFile("{", "rating.json")).toThrow(ConfigError);
    expect(() => parseConfigFile("[1]", "rating.json")).toThrow("rating.json must hold a JSON object");
    expect(() => parseConfigFile('{"kStandard": "20"}', "rating.json")).toThrow(
      "rating.json: kStandard must be a number"
    );
    expect(() => parseConfigFile('{"kFactor": 20}', "rating.json")).toThrow(
      'rating.json: unknown setting "kFactor"'
    );
  });
});

describe("readEnvConfig", () => {
  it("reads RATING_* variables and ignores blanks", () => {
    expect(
      readEnvConfig({ RATING_K_STANDARD: "20", RATING_FLOOR: " ", RATING_ROUNDING: "half-up", OTHER: "x" })
    ).toEqual({ kStandard: 20, rounding: "half-up" });
  });

  it("rejects values that are not numbers or rounding modes", () => {
    expect(() => readEnvConfig({ RATING_DEFAULT: "high" })).toThrow('RATING_DEFAULT must be a number (got "high")');
    expect(() => readEnvConfig({ RATING_ROUNDING: "down" })).toThrow(ConfigError);
  });
});

describe("resolveConfig", () => {
  it("layers defaults < file < environment < overrides", () => {
    const cfg = resolveConfig({
      file: { path: "rating.json", values: { kStandard: 20, kProvisional: 40, ratingFloor: 0 } },
      env: { RATING_K_STANDARD: "25", RATING_K_PROVISIONAL: "45" },
      overrides: { kProvisional: 50 },
    });
    expect(cfg).toEqual({
      defaultRating: 1500,
      provisionalThreshold: 30,
      kStandard: 25,
      kProvisional: 50,
      ratingFloor: 0,
      performanceSpread: 800,
      rounding: "half-even",
    });
  });

  it("names the layer an invalid value came from", () => {
    expect(() => resolveConfig({ file: { path: "rating.json", values: { ratingFloor: -1 } } })).toThrow(
      "rating.json: ratingFloor must be a non-negative integer (got -1)"
    );
    expect(() => resolveConfig({ env: { RATING_PERFORMANCE_SPREAD: "0" } })).toThrow(
      "environment: performanceSpread must be a positive number (got 0)"
    );
  });
});

describe("parseLogLevel", () => {
  it("defaults to info and accepts bunyan level names", () => {
    expect(parseLogLevel(undefined)).toBe("info");
    expect(parseLogLevel("")).toBe("info");
    expect(parseLogLevel(" DEBUG ")).toBe("debug");
  });

  it("rejects unknown levels", () => {
    expect(() => parseLogLevel("loud")).toThrow(ConfigError);
  });
});
