import { describe, it, expect } from "vitest";
import { createRecordingContext, withAveraged, withResult } from "@/recording/context";
import { exportResults, serializeResults } from "../results";

function finishedContext() {
  let context = createRecordingContext({ sweeps: [], sampleRateHz: 10000, metadata: { slice: "s1" } });
  context = withAveraged(context, [{ stimIntensity: 10, time: [0, 0.0001], mean: [1, 2], sem: [NaN, NaN] }]);
  return withResult(context, "fiber_volley", [
    { stimIntensity: 10, fvAmp: 0.5, fvTime: 0.0005, fvVoltage: -0.5 },
    { stimIntensity: 20, fvAmp: NaN, fvTime: NaN, fvVoltage: NaN },
  ]);
}

describe("exportResults", () => {
  it("flattens the averaged table into rows", () => {
    const document = exportResults(finishedContext());
    expect(document.sampleRateHz).toBe(10000);
    expect(document.metadata).toEqual({ slice: "s1" });
    expect(document.averaged).toHaveLength(2);
    expect(document.averaged[1]).toMatchObject({ stimIntensity: 10, time: 0.0001, mean: 2 });
    expect(document.results.fiber_volley).toHaveLength(2);
  });
  it("exports an empty averaged table before averaging", () => {
    const document = exportResults(createRecordingContext({ sweeps: [], sampleRateHz: 10000 }));
    expect(document.averaged).toEqual([]);
    expect(document.results).toEqual({});
  });
});

describe("serializeResults", () => {
  it("writes unmeasured values as null", () => {
    const parsed: unknown = JSON.parse(serializeResults(finishedContext()));
    expect(parsed).toEqual({
      sampleRateHz: 10000,
      metadata: { slice: "s1" },
      averaged: [
        { stimIntensity: 10, time: 0, mean: 1, sem: null },
        { stimIntensity: 10, time: 0.0001, mean: 2, sem: null },
      ],
      results: {
        fiber_volley: [
          { stimIntensity: 10, fvAmp: 0.5, fvTime: 0.0005, fvVoltage: -0.5 },
          { stimIntensity: 20, fvAmp: null, fvTime: null, fvVoltage: null },
        ],
      },
    });
  });
  it("honours the indent", () => {
    const context = createRecordingContext({ sweeps: [], sampleRateHz: 10000 });
    expect(serializeResults(context, 0)).toBe('{"sampleRateHz":10000,"metadata":{},"averaged":[],"results":{}}');
  });
});
