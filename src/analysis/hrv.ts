import { mean } from "../utils/stats.js";
import { filterToRange } from "./samples.js";
import { empty, ok, unavailable, type StageResult } from "./stage.js";
import type { Sample, SleepRecord, SleepWindow } from "./types.js";

export type HrvSource = "precomputed" | "samples";

export interface HrvSummary {
  /** Average HRV in ms */
  average: number;
  source: HrvSource;
  /** Readings averaged; 0 when the ring's own value is used */
  sampleCount: number;
}

/**
 * Average HRV for the night. The provider's precomputed value wins over
 * the in-window mean; the mean is truncated to an integer.
 */
export function analyzeHrv(
  samples: Sample[],
  sleep: SleepRecord,
  window: SleepWindow | undefined
): StageResult<HrvSummary> {
  if (!window) return unavailable("sleep window is not available");

  if (sleep.averageHrv !== undefined) {
    return ok({ average: sleep.averageHrv, source: "precomputed", sampleCount: 0 });
  }

  const inWindow = filterToRange(samples, window);

  const average = mean(inWindow.map((s) => s.value));
  if (average === undefined) return empty("no HRV readings during sleep");

  return ok({ average: Math.trunc(average), source: "samples", sampleCount: inWindow.length });
}
