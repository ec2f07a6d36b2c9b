import { formatSleepDuration } from "../utils/formatters.js";
import { SLEEP_STAGES, type SleepRecord, type SleepWindowSummary, type StagePercentages } from "./types.js";

/**
 * Percentage for each canonical stage; the first entry with a matching tag wins
 * and stages that are not reported count as 0
 */
export function extractStagePercentages(sleep: SleepRecord): StagePercentages {
  const percentages: StagePercentages = {
    deep_sleep: 0,
    light_sleep: 0,
    rem_sleep: 0,
    awake: 0,
  };

  for (const stage of SLEEP_STAGES) {
    const entry = sleep.stages.find((candidate) => candidate.type === stage);
    if (entry !== undefined) {
      percentages[stage] = entry.percentage;
    }
  }

  return percentages;
}

/**
 * Resolve the sleep window from bedtime_start/bedtime_end.
 * Returns undefined when either bound is missing or end precedes start.
 */
export function resolveSleepWindow(sleep: SleepRecord): SleepWindowSummary | undefined {
  const { bedtimeStart, bedtimeEnd } = sleep;
  if (bedtimeStart === undefined || bedtimeEnd === undefined) return undefined;
  if (bedtimeStart > bedtimeEnd) return undefined;

  const durationMinutes = Math.floor((bedtimeEnd - bedtimeStart) / 60);

  return {
    window: {
      start: bedtimeStart,
      end: bedtimeEnd,
      stagePercentages: extractStagePercentages(sleep),
    },
    durationMinutes,
    durationLabel: formatSleepDuration(durationMinutes),
  };
}
