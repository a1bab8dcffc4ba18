import { describe, it, expect, vi, afterEach } from "vitest";
import { isAnalysisError } from "@/errors";
import type { Sweep } from "@/recording/types";
import { cropStimArtifact, templateSubtractStimArtifact } from "../stim-artifact";

function sweep(sweepId: number, voltage: number[], time?: number[]): Sweep {
  return {
    stimIntensity: 10,
    sweepId,
    time: time ?? voltage.map((_, i) => i / 10000),
    voltage,
    timeOffset: 0,
  };
}

const ramp = Array.from({ length: 10 }, (_, i) => i);

afterEach(() => {
  vi.restoreAllMocks();
});

describe("cropStimArtifact", () => {
  it("removes the artifact window and re-zeroes time", () => {
    const [cropped] = cropStimArtifact([sweep(1, ramp)], [0, 0.25]);
    expect(cropped.voltage).toEqual([3, 4, 5, 6, 7, 8, 9]);
    expect(cropped.time[0]).toBe(0);
    expect(cropped.time).toHaveLength(7);
    expect(cropped.timeOffset).toBe(3 / 10000);
  });
  it("is idempotent", () => {
    const once = cropStimArtifact([sweep(1, ramp)], [0, 0.25]);
    const twice = cropStimArtifact(once, [0, 0.25]);
    expect(twice).toEqual(once);
  });
  it("keeps time running across an interior window", () => {
    const [cropped] = cropStimArtifact([sweep(1, ramp)], [0.15, 0.25]);
    expect(cropped.voltage).toEqual([0, 1, 3, 4, 5, 6, 7, 8, 9]);
    expect(cropped.time[0]).toBe(0);
    expect(cropped.timeOffset).toBe(0);
  });
  it("returns an empty sweep when the window covers everything", () => {
    const [cropped] = cropStimArtifact([sweep(1, ramp)], [0, 10]);
    expect(cropped.time).toEqual([]);
    expect(cropped.voltage).toEqual([]);
  });
});

describe("templateSubtractStimArtifact", () => {
  it("subtracts the scaled template inside the window only", () => {
    const sweeps = [sweep(1, [2, 4, 2, 1, 1, 1]), sweep(2, [1, 2, 1, 5, 5, 5])];
    const [a, b] = templateSubtractStimArtifact(sweeps, [0, 0.25]);

    a.voltage.slice(0, 3).forEach((v) => expect(v).toBeCloseTo(0, 12));
    b.voltage.slice(0, 3).forEach((v) => expect(v).toBeCloseTo(0, 12));
    expect(a.voltage.slice(3)).toEqual([1, 1, 1]);
    expect(b.voltage.slice(3)).toEqual([5, 5, 5]);
  });
  it("leaves an intensity unchanged when the template has no energy", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const sweeps = [sweep(1, [0, 0, 0, 1, 2, 3]), sweep(2, [0, 0, 0, 4, 5, 6])];
    const result = templateSubtractStimArtifact(sweeps, [0, 0.25]);

    expect(result[0]).toBe(sweeps[0]);
    expect(result[1]).toBe(sweeps[1]);
    expect(warn).toHaveBeenCalledTimes(1);
  });
  it("rejects sweeps on different time grids", () => {
    const shifted = [0, 1, 2, 3, 4, 5].map((i) => i / 10000 + 0.00001);
    const sweeps = [sweep(1, [1, 2, 1, 0, 0, 0]), sweep(2, [1, 2, 1, 0, 0, 0], shifted)];

    let caught: unknown;
    try {
      templateSubtractStimArtifact(sweeps, [0, 0.25]);
    } catch (error) {
      caught = error;
    }
    expect(isAnalysisError(caught, "dataInconsistency")).toBe(true);
  });
  it("rejects sweeps of different lengths", () => {
    const sweeps = [sweep(1, [1, 2, 1, 0]), sweep(2, [1, 2, 1])];
    expect(() => templateSubtractStimArtifact(sweeps, [0, 0.25])).toThrow(/does not match the template/);
  });
});
