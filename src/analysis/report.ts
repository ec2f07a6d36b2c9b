import type { HeartRateAnalysis } from "./heart-rate.js";
import type { HrvSource, HrvSummary } from "./hrv.js";
import { stageValue, type StageResult, type StageStatus } from "./stage.js";
import type { TemperatureProfile } from "./temperature.js";
import type { DropEvent, Sample, SleepWindowSummary, StagePercentages } from "./types.js";

export interface StageReport {
  status: StageStatus;
  reason?: string;
}

/**
 * Everything the renderer needs for one night.
 * undefined = never resolvable; [] = resolvable, nothing qualified; 0 = measured zero.
 */
export interface AnalysisResult {
  sleepWindow: SleepWindowSummary | undefined;
  stagePercentages: StagePercentages;
  lowestHeartRate: Sample | undefined;
  heartRateDrops: DropEvent[];
  /** Heart rate readings inside the sleep window */
  heartRateSampleCount: number | undefined;
  temperatureProfile: TemperatureProfile | undefined;
  averageHrv: number | undefined;
  hrvSource: HrvSource | undefined;
  /** HRV readings averaged; 0 when the precomputed value is used */
  hrvSampleCount: number | undefined;
  stages: {
    heartRate: StageReport;
    temperature: StageReport;
    hrv: StageReport;
  };
}

export interface ReportInput {
  sleepWindow: SleepWindowSummary | undefined;
  stagePercentages: StagePercentages;
  heartRate: StageResult<HeartRateAnalysis>;
  temperature: StageResult<TemperatureProfile>;
  hrv: StageResult<HrvSummary>;
}

function describeStage<T>(result: StageResult<T>): StageReport {
  return result.status === "ok" ? { status: "ok" } : { status: result.status, reason: result.reason };
}

export function assembleReport(input: ReportInput): AnalysisResult {
  const heartRate = stageValue(input.heartRate);
  const hrv = stageValue(input.hrv);

  return {
    sleepWindow: input.sleepWindow,
    stagePercentages: input.stagePercentages,
    lowestHeartRate: heartRate?.lowest,
    heartRateDrops: heartRate?.drops ?? [],
    heartRateSampleCount: heartRate?.sampleCount,
    temperatureProfile: stageValue(input.temperature),
    averageHrv: hrv?.average,
    hrvSource: hrv?.source,
    hrvSampleCount: hrv?.sampleCount,
    stages: {
      heartRate: describeStage(input.heartRate),
      temperature: describeStage(input.temperature),
      hrv: describeStage(input.hrv),
    },
  };
}
