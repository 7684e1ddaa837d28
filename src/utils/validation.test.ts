import { describe, it, expect } from "vitest";
import {
  getOptional,
  isValidProjectKey,
  normalizeOptional,
  parseBoolean,
  parsePositiveInt,
} from "./validation";

describe("normalizeOptional", () => {
  it("treats missing and blank input as absent", () => {
    expect(normalizeOptional(undefined)).toBeNull();
    expect(normalizeOptional("")).toBeNull();
    expect(normalizeOptional("   ")).toBeNull();
  });

  it("trims a provided value", () => {
    expect(normalizeOptional("  status = Done ")).toBe("status = Done");
  });
});

describe("getOptional", () => {
  it("falls back to the default for blank values", () => {
    expect(getOptional("  ", "50")).toBe("50");
    expect(getOptional("10", "50")).toBe("10");
  });
});

describe("isValidProjectKey", () => {
  it("accepts upper-case keys and rejects others", () => {
    expect(isValidProjectKey("PY2")).toBe(true);
    expect(isValidProjectKey("test")).toBe(false);
  });
});

describe("parsePositiveInt", () => {
  it("rejects zero and fractions", () => {
    expect(parsePositiveInt("--max-results", "25", 50)).toBe(25);
    expect(() => parsePositiveInt("--max-results", "0", 50)).toThrow(
      "Invalid --max-results: 0"
    );
    expect(() => parsePositiveInt("--max-results", "1.5", 50)).toThrow(
      "Invalid --max-results: 1.5"
    );
  });
});

describe("parseBoolean", () => {
  it("reads common spellings", () => {
    expect(parseBoolean("SORT_CHANGELOG", " Yes ")).toBe(true);
    expect(parseBoolean("SORT_CHANGELOG", "0")).toBe(false);
    expect(() => parseBoolean("SORT_CHANGELOG", "maybe")).toThrow(
      "Invalid SORT_CHANGELOG: maybe"
    );
  });
});
