/**
 * Zod schemas for the provider's metrics document
 *
 * Everything here is lenient: malformed input never throws, it collapses
 * to "no data" at the smallest level that is broken (a field, a sample,
 * a stream, or the whole document).
 */

import { z } from "zod";
import type { Sample, SleepRecord, SleepStageEntry } from "./types.js";

export const rawDocumentSchema = z.object({
  data: z.object({
    metric_data: z.array(z.unknown()),
  }),
});

export const metricEntrySchema = z.object({
  type: z.string(),
  object: z.unknown(),
});

export const sampleSchema = z.object({
  timestamp: z.number().int(),
  value: z.number().finite(),
});

// The provider wraps readings as { values: [...] }; a bare array is accepted too
const sampleListSchema = z.union([
  z.array(z.unknown()),
  z.object({ values: z.array(z.unknown()) }).transform((payload) => payload.values),
]);

const sleepStageEntrySchema = z.object({
  type: z.string(),
  percentage: z.number().finite(),
});

const sleepRecordSchema = z.object({
  bedtime_start: z.number().finite().optional().catch(undefined),
  bedtime_end: z.number().finite().optional().catch(undefined),
  sleep_stages: z.array(z.unknown()).optional().catch(undefined),
  average_hrv: z.number().finite().optional().catch(undefined),
});

const objectSchema = z.record(z.string(), z.unknown());

/**
 * Parse a time-series payload, dropping samples without an integer
 * timestamp and a finite value
 */
export function parseSamples(payload: unknown): Sample[] {
  const list = sampleListSchema.safeParse(payload);
  if (!list.success) return [];

  const samples: Sample[] = [];
  for (const item of list.data) {
    const parsed = sampleSchema.safeParse(item);
    if (parsed.success) {
      samples.push(parsed.data);
    }
  }
  return samples;
}

/**
 * Parse the sleep payload. Returns undefined when it is not an object
 * or is an empty object (no sleep data).
 */
export function parseSleepRecord(payload: unknown): SleepRecord | undefined {
  const record = objectSchema.safeParse(payload);
  if (!record.success || Object.keys(record.data).length === 0) return undefined;

  const parsed = sleepRecordSchema.safeParse(record.data);
  if (!parsed.success) return undefined;

  const stages: SleepStageEntry[] = [];
  for (const entry of parsed.data.sleep_stages ?? []) {
    const stage = sleepStageEntrySchema.safeParse(entry);
    if (stage.success) {
      stages.push(stage.data);
    }
  }

  return {
    bedtimeStart: parsed.data.bedtime_start,
    bedtimeEnd: parsed.data.bedtime_end,
    stages,
    averageHrv: parsed.data.average_hrv,
  };
}
