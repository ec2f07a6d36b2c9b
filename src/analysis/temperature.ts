/**
 * Skin temperature profile for the sleep window
 */

import { mean, roundOptional, roundTo } from "../utils/stats.js";
import {
  detectDrops,
  filterToRange,
  findHighest,
  findLowest,
  sortChronologically,
  type DropPolicy,
} from "./samples.js";
import { empty, ok, unavailable, type StageResult } from "./stage.js";
import type { DropEvent, Sample, SleepWindow } from "./types.js";

/** Length of the early and late sub-windows */
export const EDGE_WINDOW_SECONDS = 1800;

/** A fall of 1°C or more between consecutive readings, however far apart */
export const TEMPERATURE_DROP_POLICY: DropPolicy = {
  minDrop: 1.0,
};

export interface TemperatureProfile {
  min: number;
  max: number;
  mean: number;
  /** max - min */
  variation: number;
  /** First (chronological) reading at the minimum */
  minTimestamp: number;
  /** First (chronological) reading at the maximum */
  maxTimestamp: number;
  /** Mean over the first 30 minutes; undefined when no readings fall there */
  earlyMean: number | undefined;
  /** Mean over the last 30 minutes; undefined when no readings fall there */
  lateMean: number | undefined;
  /** lateMean - earlyMean, only when both are defined */
  lateMinusEarly: number | undefined;
  drops: DropEvent[];
  sampleCount: number;
}

function valuesOf(samples: Sample[]): number[] {
  return samples.map((s) => s.value);
}

export function analyzeTemperature(
  samples: Sample[],
  window: SleepWindow | undefined
): StageResult<TemperatureProfile> {
  if (!window) return unavailable("sleep window is not available");

  const inWindow = sortChronologically(filterToRange(samples, window));
  const lowest = findLowest(inWindow);
  const highest = findHighest(inWindow);
  const average = mean(valuesOf(inWindow));
  if (!lowest || !highest || average === undefined) {
    return empty("no temperature readings during sleep");
  }

  const early = inWindow.filter((s) => s.timestamp - window.start <= EDGE_WINDOW_SECONDS);
  const late = inWindow.filter((s) => window.end - s.timestamp <= EDGE_WINDOW_SECONDS);
  const earlyMean = mean(valuesOf(early));
  const lateMean = mean(valuesOf(late));

  return ok({
    min: roundTo(lowest.value, 2),
    max: roundTo(highest.value, 2),
    mean: roundTo(average, 2),
    variation: roundTo(highest.value - lowest.value, 2),
    minTimestamp: lowest.timestamp,
    maxTimestamp: highest.timestamp,
    earlyMean: roundOptional(earlyMean, 2),
    lateMean: roundOptional(lateMean, 2),
    lateMinusEarly:
      earlyMean !== undefined && lateMean !== undefined ? roundTo(lateMean - earlyMean, 2) : undefined,
    drops: detectDrops(inWindow, TEMPERATURE_DROP_POLICY),
    sampleCount: inWindow.length,
  });
}
