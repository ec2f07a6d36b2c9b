/**
 * Time-series helpers: window filtering, ordering, extremes, and drop detection
 */

import { roundTo } from "../utils/stats.js";
import type { DropEvent, Sample } from "./types.js";

export interface TimeRange {
  start: number;
  end: number;
}

export interface DropPolicy {
  /** Smallest decrease that counts as a drop */
  minDrop: number;
  /** Largest gap between the two samples; no ceiling when omitted */
  maxElapsedMinutes?: number;
}

/**
 * Keep samples with start <= timestamp <= end, preserving input order
 */
export function filterToRange(samples: Sample[], range: TimeRange): Sample[] {
  return samples.filter((s) => s.timestamp >= range.start && s.timestamp <= range.end);
}

/**
 * Stable sort by timestamp ascending (equal timestamps keep input order)
 */
export function sortChronologically(samples: Sample[]): Sample[] {
  return [...samples].sort((a, b) => a.timestamp - b.timestamp);
}

/**
 * Sample with the smallest value; ties go to the first one in the given order
 */
export function findLowest(samples: Sample[]): Sample | undefined {
  let lowest: Sample | undefined;
  for (const sample of samples) {
    if (lowest === undefined || sample.value < lowest.value) {
      lowest = sample;
    }
  }
  return lowest;
}

/**
 * Sample with the largest value; ties go to the first one in the given order
 */
export function findHighest(samples: Sample[]): Sample | undefined {
  let highest: Sample | undefined;
  for (const sample of samples) {
    if (highest === undefined || sample.value > highest.value) {
      highest = sample;
    }
  }
  return highest;
}

/**
 * Walk consecutive pairs in time order and report every pair whose value
 * fell by at least `minDrop` within the allowed gap.
 *
 * Events are not merged: a staircase decline yields one event per step.
 */
export function detectDrops(samples: Sample[], policy: DropPolicy): DropEvent[] {
  const sorted = sortChronologically(samples);
  const drops: DropEvent[] = [];

  for (let i = 1; i < sorted.length; i++) {
    const previous = sorted[i - 1];
    const current = sorted[i];
    const change = current.value - previous.value;
    if (change > -policy.minDrop) continue;

    const elapsedMinutes = (current.timestamp - previous.timestamp) / 60;
    if (policy.maxElapsedMinutes !== undefined && elapsedMinutes > policy.maxElapsedMinutes) {
      continue;
    }

    drops.push({
      timestamp: current.timestamp,
      fromValue: previous.value,
      toValue: current.value,
      magnitude: roundTo(Math.abs(change), 2),
      elapsedMinutes: roundTo(elapsedMinutes, 2),
    });
  }

  return drops;
}
