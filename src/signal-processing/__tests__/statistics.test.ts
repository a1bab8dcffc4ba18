import { describe, it, expect } from "vitest";
import { mean, sampleStd, sem, dot, argMin, argMax, rms } from "../statistics";
import { linearFit } from "../regression";

describe("mean", () => {
  it("returns NaN for empty input", () => {
    expect(mean([])).toBeNaN();
  });
  it("averages values", () => {
    expect(mean([1, 2, 3])).toBe(2);
  });
});

describe("sampleStd", () => {
  it("uses N-1 in the denominator", () => {
    expect(sampleStd([1, 2, 3])).toBe(1);
  });
  it("is undefined for a single value", () => {
    expect(sampleStd([5])).toBeNaN();
    expect(sem([5])).toBeNaN();
  });
});

describe("sem", () => {
  it("divides the sample std by sqrt(N)", () => {
    expect(sem([1, 2, 3])).toBeCloseTo(1 / Math.sqrt(3), 12);
  });
});

describe("dot", () => {
  it("multiplies and sums", () => {
    expect(dot([1, 2], [3, 4])).toBe(11);
  });
});

describe("argMin / argMax", () => {
  it("returns -1 for empty input", () => {
    expect(argMin([])).toBe(-1);
    expect(argMax([])).toBe(-1);
  });
  it("resolves ties to the first occurrence", () => {
    expect(argMin([3, 1, 1])).toBe(1);
    expect(argMax([2, 7, 7, 0])).toBe(1);
  });
});

describe("rms", () => {
  it("computes root mean square", () => {
    expect(rms([3, 4])).toBeCloseTo(Math.sqrt(12.5), 12);
  });
  it("returns NaN for empty input", () => {
    expect(rms([])).toBeNaN();
  });
});

describe("linearFit", () => {
  it("recovers an exact line", () => {
    const fit = linearFit([0, 1, 2, 3], [1, 3, 5, 7]);
    expect(fit.slope).toBe(2);
    expect(fit.intercept).toBe(1);
    expect(fit.rSquared).toBe(1);
  });
  it("reports NaN R² for constant y", () => {
    const fit = linearFit([0, 1, 2], [4, 4, 4]);
    expect(fit.slope).toBe(0);
    expect(fit.rSquared).toBeNaN();
  });
  it("is undetermined for fewer than two points or equal x", () => {
    expect(linearFit([1], [2]).slope).toBeNaN();
    expect(linearFit([1, 1], [2, 3]).slope).toBeNaN();
  });
});
