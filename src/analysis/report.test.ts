import { describe, it, expect } from "vitest";
import { assembleReport, type ReportInput } from "./report.js";
import { empty, ok, unavailable } from "./stage.js";

const t0 = 1705356000;

const stagePercentages = { deep_sleep: 20, light_sleep: 50, rem_sleep: 22, awake: 8 };

const sleepWindow = {
  window: { start: t0, end: t0 + 27000, stagePercentages },
  durationMinutes: 450,
  durationLabel: "7h 30m",
};

const heartRate = ok({
  lowest: { timestamp: t0 + 7200, value: 52 },
  drops: [{ timestamp: t0 + 300, fromValue: 72, toValue: 60, magnitude: 12, elapsedMinutes: 5 }],
  sampleCount: 8,
});

describe("assembleReport", () => {
  it("keeps heart rate results when temperature analysis failed", () => {
    const input: ReportInput = {
      sleepWindow,
      stagePercentages,
      heartRate,
      temperature: { status: "failed", reason: "boom" },
      hrv: ok({ average: 45, source: "samples", sampleCount: 3 }),
    };

    const result = assembleReport(input);

    expect(result.lowestHeartRate).toEqual({ timestamp: t0 + 7200, value: 52 });
    expect(result.heartRateDrops).toHaveLength(1);
    expect(result.temperatureProfile).toBeUndefined();
    expect(result.averageHrv).toBe(45);
    expect(result.hrvSource).toBe("samples");
    expect(result.heartRateSampleCount).toBe(8);
    expect(result.hrvSampleCount).toBe(3);
    expect(result.stages).toEqual({
      heartRate: { status: "ok" },
      temperature: { status: "failed", reason: "boom" },
      hrv: { status: "ok" },
    });
  });

  it("distinguishes no data from a measured zero", () => {
    const result = assembleReport({
      sleepWindow,
      stagePercentages,
      heartRate: empty("no heart rate readings during sleep"),
      temperature: empty("no temperature readings during sleep"),
      hrv: ok({ average: 0, source: "precomputed", sampleCount: 0 }),
    });

    expect(result.lowestHeartRate).toBeUndefined();
    expect(result.heartRateDrops).toEqual([]);
    expect(result.heartRateSampleCount).toBeUndefined();
    expect(result.averageHrv).toBe(0);
    expect(result.hrvSampleCount).toBe(0);
    expect(result.stages.heartRate).toEqual({ status: "empty", reason: "no heart rate readings during sleep" });
  });

  it("reports every analyzer as unavailable without a sleep window", () => {
    const result = assembleReport({
      sleepWindow: undefined,
      stagePercentages,
      heartRate: unavailable("sleep window is not available"),
      temperature: unavailable("sleep window is not available"),
      hrv: unavailable("sleep window is not available"),
    });

    expect(result.sleepWindow).toBeUndefined();
    expect(result.stagePercentages).toEqual(stagePercentages);
    expect(result.averageHrv).toBeUndefined();
    expect(result.hrvSource).toBeUndefined();
    expect(result.stages.hrv.status).toBe("unavailable");
  });
});
