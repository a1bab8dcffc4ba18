import { describe, it, expect } from "vitest";
import { AnalysisError, isAnalysisError } from "@/errors";
import { buildRecordingContext, type AcquiredSweep } from "../loader";

function acquired(level: number): AcquiredSweep {
  return { time: [0, 0.0001, 0.0002], voltage: [level, level, level] };
}

describe("buildRecordingContext", () => {
  it("assigns intensities in blocks of repetitions", () => {
    const context = buildRecordingContext({
      sweeps: [1, 2, 3, 4].map(acquired),
      sampleRateHz: 10000,
      stimIntensities: [50, 25],
      repetitions: 2,
    });
    expect(context.sweeps.map((s) => [s.stimIntensity, s.sweepId, s.voltage[0]])).toEqual([
      [25, 1, 3],
      [25, 2, 4],
      [50, 1, 1],
      [50, 2, 2],
    ]);
    expect(context.sweeps.every((s) => s.timeOffset === 0)).toBe(true);
    expect(context.averaged).toBeNull();
    expect(context.metadata).toEqual({ stimIntensities: [50, 25], repetitions: 2 });
  });
  it("rejects a sweep count that does not fit the layout", () => {
    try {
      buildRecordingContext({
        sweeps: [1, 2, 3, 4, 5].map(acquired),
        sampleRateHz: 10000,
        stimIntensities: [10, 20],
        repetitions: 3,
      });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(AnalysisError);
      if (error instanceof AnalysisError) {
        expect(error.reason).toEqual({
          type: "shapeMismatch",
          expected: 6,
          found: 5,
          detail: "2 intensities x 3 repetitions",
        });
        expect(error.message).toBe("Expected 6 sweeps, found 5 (2 intensities x 3 repetitions)");
      }
    }
  });
  it("rejects a sweep with mismatched arrays", () => {
    let caught: unknown;
    try {
      buildRecordingContext({
        sweeps: [{ time: [0, 0.0001], voltage: [1] }],
        sampleRateHz: 10000,
        stimIntensities: [10],
        repetitions: 1,
      });
    } catch (error) {
      caught = error;
    }
    expect(isAnalysisError(caught, "dataInconsistency")).toBe(true);
  });
  it("rejects a time axis that does not increase", () => {
    expect(() =>
      buildRecordingContext({
        sweeps: [{ time: [0, 0.0002, 0.0001], voltage: [1, 2, 3] }],
        sampleRateHz: 10000,
        stimIntensities: [10],
        repetitions: 1,
      })
    ).toThrow("loader: sweep 0 time axis is not strictly increasing at sample 2");
  });
  it("rejects bad repetitions and sampling rates", () => {
    const base = { sweeps: [acquired(1)], stimIntensities: [10] };
    let caught: unknown;
    try {
      buildRecordingContext({ ...base, sampleRateHz: 10000, repetitions: 0 });
    } catch (error) {
      caught = error;
    }
    expect(isAnalysisError(caught, "invalidParameter")).toBe(true);
    expect(() => buildRecordingContext({ ...base, sampleRateHz: 0, repetitions: 1 })).toThrow(
      /sampling rate must be a positive number/
    );
  });
});
