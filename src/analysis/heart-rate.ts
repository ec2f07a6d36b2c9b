import { detectDrops, filterToRange, findLowest, type DropPolicy } from "./samples.js";
import { empty, ok, unavailable, type StageResult } from "./stage.js";
import type { DropEvent, Sample, SleepWindow } from "./types.js";

/** A fall of 10+ bpm between readings at most 30 minutes apart */
export const HEART_RATE_DROP_POLICY: DropPolicy = {
  minDrop: 10,
  maxElapsedMinutes: 30,
};

export interface HeartRateAnalysis {
  /** Lowest reading in the window; ties resolve to the first in input order */
  lowest: Sample;
  drops: DropEvent[];
  sampleCount: number;
}

export function analyzeHeartRate(
  samples: Sample[],
  window: SleepWindow | undefined
): StageResult<HeartRateAnalysis> {
  if (!window) return unavailable("sleep window is not available");

  const inWindow = filterToRange(samples, window);
  const lowest = findLowest(inWindow);
  if (!lowest) return empty("no heart rate readings during sleep");

  return ok({
    lowest,
    drops: detectDrops(inWindow, HEART_RATE_DROP_POLICY),
    sampleCount: inWindow.length,
  });
}
