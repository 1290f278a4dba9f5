import { describe, expect, it } from "vitest";
import { BoPiValidationError } from "./errors.js";
import { normalizeSensor, requireNonNegative, requireRange } from "./helpers.js";

describe("normalizeSensor", () => {
  it("returns regular readings unchanged", () => {
    expect(normalizeSensor(25.5)).toBe(25.5);
    expect(normalizeSensor(50)).toBe(50);
  });

  it("keeps zero and negative readings", () => {
    expect(normalizeSensor(0)).toBe(0);
    expect(normalizeSensor(-10.5)).toBe(-10.5);
    expect(normalizeSensor(-126.9)).toBe(-126.9);
  });

  it("maps the disconnected reading to null", () => {
    expect(normalizeSensor(-127)).toBeNull();
  });
});

describe("requireNonNegative", () => {
  it("accepts zero and positive values", () => {
    expect(() => requireNonNegative("uptime", 0)).not.toThrow();
    expect(() => requireNonNegative("uptime", 100)).not.toThrow();
    expect(() => requireNonNegative("uptime", 1_000_000)).not.toThrow();
  });

  it("rejects negative values", () => {
    expect(() => requireNonNegative("uptime", -1)).toThrow(BoPiValidationError);
    expect(() => requireNonNegative("uptime", -1)).toThrow("uptime must be non-negative, got -1");
  });
});

describe("requireRange", () => {
  it("accepts values inside the range", () => {
    expect(() => requireRange("phvalue", 7.0, 0, 14)).not.toThrow();
    expect(() => requireRange("redoxvalue", 500, 0, 1000)).not.toThrow();
    expect(() => requireRange("boxhumidity", 50, 0, 100)).not.toThrow();
  });

  it("accepts both boundaries", () => {
    expect(() => requireRange("phvalue", 0, 0, 14)).not.toThrow();
    expect(() => requireRange("phvalue", 14, 0, 14)).not.toThrow();
  });

  it("rejects values below the minimum", () => {
    expect(() => requireRange("phvalue", -1, 0, 14)).toThrow(BoPiValidationError);
  });

  it("rejects values above the maximum", () => {
    expect(() => requireRange("boxhumidity", 101, 0, 100)).toThrow(BoPiValidationError);
    expect(() => requireRange("redoxvalue", 1001, 0, 1000)).toThrow(
      "redoxvalue must be between 0 and 1000, got 1001",
    );
  });

  it("reports the offending field", () => {
    try {
      requireRange("phvalue", 15, 0, 14);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(BoPiValidationError);
      expect(err).toMatchObject({ field: "phvalue", code: "VALIDATION_ERROR" });
    }
  });
});
