/**
 * Utilities for formatting Ultrahuman data into human-readable strings
 */

import { DateTime } from "luxon";
import type { StagePercentages } from "../analysis/types.js";

/**
 * Convert a duration in minutes to "{hours}h {minutes}m"
 * e.g., 450 -> "7h 30m", 480 -> "8h 0m"
 */
export function formatSleepDuration(totalMinutes: number): string {
  const hours = Math.floor(totalMinutes / 60);
  const minutes = totalMinutes % 60;
  return `${hours}h ${minutes}m`;
}

/**
 * Format an epoch-seconds timestamp as a clock time in the given zone
 * e.g., 1705356000 in "UTC" -> "10:00 PM"
 */
export function formatTime(epochSeconds: number, zone = "UTC"): string {
  const dt = DateTime.fromSeconds(epochSeconds, { zone });
  if (!dt.isValid) {
    console.warn(`formatTime: Invalid timestamp "${epochSeconds}" in zone "${zone}" - ${dt.invalidReason}`);
    return "Invalid Date";
  }
  return dt.toFormat("h:mm a");
}

/**
 * Get a date N days ago in YYYY-MM-DD format
 */
export function getDaysAgo(days: number): string {
  const date = new Date();
  date.setDate(date.getDate() - days);
  return date.toISOString().split("T")[0];
}

/**
 * Format a change with an explicit sign
 * e.g., (0.35, "°C") -> "+0.35°C", (-0.5, "°C") -> "-0.5°C"
 */
export function formatSignedDelta(value: number, unit: string): string {
  const sign = value > 0 ? "+" : "";
  return `${sign}${value}${unit}`;
}

/**
 * Format sleep stage percentages as a summary
 */
export function formatSleepStages(percentages: StagePercentages): string {
  return [
    `Deep: ${percentages.deep_sleep}%`,
    `Light: ${percentages.light_sleep}%`,
    `REM: ${percentages.rem_sleep}%`,
    `Awake: ${percentages.awake}%`,
  ].join(" | ");
}
