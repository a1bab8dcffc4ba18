import { describe, it, expect } from "vitest";
import { gradient, trapz } from "../derivative";

describe("gradient", () => {
  it("handles trivial lengths", () => {
    expect(gradient([], [])).toEqual([]);
    expect(gradient([5], [0])).toEqual([0]);
  });
  it("uses central differences inside and one-sided at the ends", () => {
    expect(gradient([0, 1, 4, 9], [0, 1, 2, 3])).toEqual([1, 2, 4, 5]);
  });
  it("is exact for a parabola on an uneven grid", () => {
    const result = gradient([0, 1, 9], [0, 1, 3]);
    expect(result[1]).toBeCloseTo(2, 12);
    expect(result[0]).toBe(1);
    expect(result[2]).toBe(4);
  });
  it("rejects mismatched lengths", () => {
    expect(() => gradient([1, 2], [0])).toThrow(RangeError);
  });
});

describe("trapz", () => {
  it("integrates with the trapezoid rule", () => {
    expect(trapz([1, 1, 1], [0, 1, 2])).toBe(2);
    expect(trapz([0, 2], [0, 1])).toBe(1);
  });
});
