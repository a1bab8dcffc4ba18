import { describe, it, expect } from "vitest";
import { isAnalysisError } from "@/errors";
import { createRecordingContext, withAveraged } from "@/recording/context";
import { peakProminences } from "@/signal-processing/peaks";
import { NO_SMOOTHING } from "@/signal-processing/types";
import { computeFiberVolley, createFiberVolleyFeature, parseFiberVolleyParams } from "../fiber-volley";
import type { SmoothedTrace } from "../traces";

function trace(voltage: number[], stimIntensity = 10): SmoothedTrace {
  return { stimIntensity, time: voltage.map((_, i) => i / 10000), voltage };
}

describe("parseFiberVolleyParams", () => {
  it("requires a window", () => {
    expect(() => parseFiberVolleyParams({})).toThrow("fiber_volley: missing required parameter 'windowMs'");
  });
  it("rejects a reversed window", () => {
    let caught: unknown;
    try {
      parseFiberVolleyParams({ windowMs: [1.5, 0] });
    } catch (error) {
      caught = error;
    }
    expect(isAnalysisError(caught, "invalidParameter")).toBe(true);
  });
});

describe("computeFiberVolley", () => {
  it("finds the trough inside the window", () => {
    const voltage = new Array<number>(30).fill(0);
    voltage[4] = -0.2;
    voltage[5] = -0.5;
    voltage[6] = -0.2;
    voltage[20] = -3;

    const [row] = computeFiberVolley([trace(voltage)], { windowMs: [0, 1.45] });
    expect(row).toEqual({ stimIntensity: 10, fvAmp: 0.5, fvTime: 0.0005, fvVoltage: -0.5 });
  });
  it("breaks prominence ties by depth", () => {
    // Both troughs have prominence 1; the second is deeper
    const [row] = computeFiberVolley([trace([0, -1, 0, -2, -1])], { windowMs: [0, 10] });
    expect(row.fvVoltage).toBe(-2);
    expect(row.fvAmp).toBe(2);
    expect(row.fvTime).toBe(0.0003);
  });
  it("prefers the more prominent of two equally deep troughs", () => {
    const voltage = [-0.8, -1, -0.9, 0, -1, 0];
    const [first, second] = peakProminences(voltage.map((v) => -v), [1, 4]);
    expect(first).toBeCloseTo(0.2, 10);
    expect(second).toBe(1);

    const [row] = computeFiberVolley([trace(voltage)], { windowMs: [0, 10] });
    expect(row).toEqual({ stimIntensity: 10, fvAmp: 1, fvTime: 0.0004, fvVoltage: -1 });
  });
  it("reports NaN when there is no trough", () => {
    const [row] = computeFiberVolley([trace([0, -1, -2, -3])], { windowMs: [0, 10] });
    expect(row.stimIntensity).toBe(10);
    expect(row.fvAmp).toBeNaN();
    expect(row.fvTime).toBeNaN();
  });
  it("returns one row per intensity", () => {
    const rows = computeFiberVolley([trace([0, -1, 0], 10), trace([0, -2, 0], 20)], { windowMs: [0, 10] });
    expect(rows.map((r) => [r.stimIntensity, r.fvAmp])).toEqual([
      [10, 1],
      [20, 2],
    ]);
  });
});

describe("createFiberVolleyFeature", () => {
  it("needs averaged traces", () => {
    const feature = createFiberVolleyFeature({ windowMs: [0, 1] }, NO_SMOOTHING);
    const context = createRecordingContext({ sweeps: [], sampleRateHz: 10000 });
    expect(() => feature.compute(context)).toThrow("fiber_volley requires a non-empty 'average_sweeps' result");
  });
  it("reads the averaged mean trace", () => {
    const feature = createFiberVolleyFeature({ windowMs: [0, 10] }, NO_SMOOTHING);
    const context = withAveraged(createRecordingContext({ sweeps: [], sampleRateHz: 10000 }), [
      { stimIntensity: 10, time: [0, 0.0001, 0.0002], mean: [0, -0.3, 0], sem: [0, 0, 0] },
    ]);
    expect(feature.compute(context)).toEqual([
      { stimIntensity: 10, fvAmp: 0.3, fvTime: 0.0001, fvVoltage: -0.3 },
    ]);
  });
});
