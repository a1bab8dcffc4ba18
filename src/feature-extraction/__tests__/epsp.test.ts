import { describe, it, expect } from "vitest";
import { createRecordingContext, withAveraged, withResult } from "@/recording/context";
import { NO_SMOOTHING } from "@/signal-processing/types";
import { computeEpsp, createEpspFeature, parseEpspParams, DEFAULT_FIT_DISTANCE } from "../epsp";
import type { FiberVolleyRow } from "../types";

// Flat, then a descent whose steepest sample is index 12, minimum -1 at
// index 16, then a slow recovery
function epspVoltage(): number[] {
  const voltage = new Array<number>(40).fill(0);
  const steps = [-0.125, -0.25, -0.25, -0.125, -0.125, -0.125];
  for (let i = 0; i < steps.length; i++) {
    voltage[11 + i] = voltage[10 + i] + steps[i];
  }
  for (let i = 17; i < 40; i++) {
    voltage[i] = -1 + 0.05 * (i - 16);
  }
  return voltage;
}

const time = Array.from({ length: 40 }, (_, i) => i / 10000);
const traces = [{ stimIntensity: 10, time, voltage: epspVoltage() }];

function fiberVolley(fvAmp: number): FiberVolleyRow[] {
  return [{ stimIntensity: 10, fvAmp, fvTime: 0.0005, fvVoltage: -fvAmp }];
}

describe("parseEpspParams", () => {
  it("defaults the fit distance", () => {
    expect(parseEpspParams({ windowMs: [1, 2] })).toEqual({ windowMs: [1, 2], fitDistance: DEFAULT_FIT_DISTANCE });
  });
  it("requires a window", () => {
    expect(() => parseEpspParams({ fitDistance: 2 })).toThrow("epsp: missing required parameter 'windowMs'");
  });
  it("rejects a fit distance below one", () => {
    expect(() => parseEpspParams({ windowMs: [1, 2], fitDistance: 0 })).toThrow(/fitDistance/);
  });
});

describe("computeEpsp", () => {
  it("finds the minimum and the steepest descent", () => {
    const [row] = computeEpsp(traces, { windowMs: [0.95, 3.45], fitDistance: 1 });
    expect(row.epspTime).toBe(time[16]);
    expect(row.epspVoltage).toBe(-1);
    expect(row.slopeMidTime).toBe(time[12]);
    expect(row.slopeMidVoltage).toBe(-0.375);
  });
  it("fits the slope around the steepest descent", () => {
    const [row] = computeEpsp(traces, { windowMs: [0.95, 3.45], fitDistance: 1 });
    expect(row.slope).toBeCloseTo(-2500, 6);
    expect(row.slopeMs).toBeCloseTo(-2.5, 9);
    expect(row.rSquared).toBeCloseTo(1, 10);
    expect(row.slopeToFvAmp).toBeNaN();
  });
  it("relates the slope to the fiber volley amplitude", () => {
    const [row] = computeEpsp(traces, { windowMs: [0.95, 3.45], fitDistance: 1 }, fiberVolley(0.5));
    expect(row.slopeToFvAmp).toBeCloseTo(-5, 9);
  });
  it("leaves the ratio undefined without a usable fiber volley", () => {
    const params = { windowMs: [0.95, 3.45] as const, fitDistance: 1 };
    expect(computeEpsp(traces, params, fiberVolley(NaN))[0].slopeToFvAmp).toBeNaN();
    expect(computeEpsp(traces, params, fiberVolley(0))[0].slopeToFvAmp).toBeNaN();
  });
  it("clamps the fit to the trace", () => {
    const [row] = computeEpsp(traces, { windowMs: [0.95, 3.45], fitDistance: 100 });
    expect(Number.isFinite(row.slope)).toBe(true);
  });
  it("reports NaN for a window outside the trace", () => {
    const [row] = computeEpsp(traces, { windowMs: [10, 20], fitDistance: 1 });
    expect(row.stimIntensity).toBe(10);
    expect(row.epspVoltage).toBeNaN();
    expect(row.slope).toBeNaN();
  });
});

describe("createEpspFeature", () => {
  it("uses fiber volley rows computed earlier", () => {
    const feature = createEpspFeature({ windowMs: [0.95, 3.45], fitDistance: 1 }, NO_SMOOTHING);
    let context = createRecordingContext({ sweeps: [], sampleRateHz: 10000 });
    context = withAveraged(context, [{ stimIntensity: 10, time, mean: epspVoltage(), sem: [] }]);
    context = withResult(context, "fiber_volley", fiberVolley(0.25));

    const [row] = feature.compute(context);
    expect(row.slopeToFvAmp).toBeCloseTo(-10, 9);
  });
});
