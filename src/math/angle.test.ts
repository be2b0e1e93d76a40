import { describe, it, expect } from "vitest";
import { fullTurn, toRadians, fromRadians, normalizeRadians } from "./angle";
import { gcd } from "./integer";

describe("angle", () => {
  it("reports a full turn per unit", () => {
    expect(fullTurn("degrees")).toBe(360);
    expect(fullTurn("radians")).toBe(Math.PI * 2);
  });

  it("converts between degrees and radians", () => {
    expect(toRadians(180, "degrees")).toBeCloseTo(Math.PI, 12);
    expect(fromRadians(Math.PI, "degrees")).toBeCloseTo(180, 10);
    expect(toRadians(1.5, "radians")).toBe(1.5);
    expect(fromRadians(1.5, "radians")).toBe(1.5);
  });

  describe("normalizeRadians", () => {
    it("keeps angles already in range", () => {
      expect(normalizeRadians(1)).toBe(1);
    });

    it("wraps negative angles", () => {
      expect(normalizeRadians(-Math.PI / 2)).toBeCloseTo((3 * Math.PI) / 2);
    });

    it("wraps angles past a full turn", () => {
      expect(normalizeRadians(5 * Math.PI)).toBeCloseTo(Math.PI);
    });

    it("never returns a full turn", () => {
      expect(normalizeRadians(-1e-17)).toBe(0);
    });
  });
});

describe("gcd", () => {
  it("computes common divisors", () => {
    expect(gcd(6, 2)).toBe(2);
    expect(gcd(12, 3)).toBe(3);
    expect(gcd(30, 12)).toBe(6);
    expect(gcd(7, 2)).toBe(1);
  });

  it("treats zero as the identity", () => {
    expect(gcd(5, 0)).toBe(5);
    expect(gcd(0, 5)).toBe(5);
  });
});
