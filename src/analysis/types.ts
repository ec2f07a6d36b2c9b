/**
 * Shared types for the nightly analytics core
 */

/** A single reading: epoch seconds and the measured value */
export interface Sample {
  timestamp: number;
  value: number;
}

/** A consecutive-sample decrease that crossed a metric's drop threshold */
export interface DropEvent {
  /** Timestamp of the later sample of the pair */
  timestamp: number;
  fromValue: number;
  toValue: number;
  magnitude: number;
  elapsedMinutes: number;
}

export const SLEEP_STAGES = ["deep_sleep", "light_sleep", "rem_sleep", "awake"] as const;

export type SleepStage = (typeof SLEEP_STAGES)[number];

export type StagePercentages = Record<SleepStage, number>;

export interface SleepStageEntry {
  type: string;
  percentage: number;
}

/** The sleep stream, after validation. Fields of the wrong type are treated as absent. */
export interface SleepRecord {
  bedtimeStart?: number;
  bedtimeEnd?: number;
  stages: SleepStageEntry[];
  /** Average HRV precomputed by the provider (ms) */
  averageHrv?: number;
}

/** Epoch-second interval [start, end] that scopes every nocturnal analysis */
export interface SleepWindow {
  start: number;
  end: number;
  stagePercentages: StagePercentages;
}

export interface SleepWindowSummary {
  window: SleepWindow;
  durationMinutes: number;
  /** e.g. "7h 30m" */
  durationLabel: string;
}
