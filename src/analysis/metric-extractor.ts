/**
 * Typed lookup of the metric streams inside a provider metrics document
 */

import { metricEntrySchema, parseSamples, parseSleepRecord, rawDocumentSchema } from "./schemas.js";
import type { Sample, SleepRecord } from "./types.js";

export const MetricType = {
  HeartRate: "hr",
  Sleep: "Sleep",
  Hrv: "hrv",
  Temperature: "temp",
} as const;

export type MetricType = (typeof MetricType)[keyof typeof MetricType];

export type SampleMetricType = Exclude<MetricType, typeof MetricType.Sleep>;

const METRIC_TYPES: ReadonlySet<string> = new Set<string>(Object.values(MetricType));

function isMetricType(value: string): value is MetricType {
  return METRIC_TYPES.has(value);
}

/**
 * Index of the first payload for each known metric type.
 * Later entries with an already-seen type are ignored.
 */
export class MetricIndex {
  private constructor(
    private readonly payloads: ReadonlyMap<MetricType, unknown>,
    /** Number of entries in metric_data, including unknown types */
    public readonly entryCount: number
  ) {}

  /**
   * Returns undefined when the document lacks data.metric_data
   */
  static fromDocument(document: unknown): MetricIndex | undefined {
    const parsed = rawDocumentSchema.safeParse(document);
    if (!parsed.success) return undefined;

    const entries = parsed.data.data.metric_data;
    const payloads = new Map<MetricType, unknown>();

    for (const entry of entries) {
      const metric = metricEntrySchema.safeParse(entry);
      if (!metric.success) continue;

      const { type, object } = metric.data;
      if (isMetricType(type) && !payloads.has(type)) {
        payloads.set(type, object);
      }
    }

    return new MetricIndex(payloads, entries.length);
  }

  has(type: MetricType): boolean {
    return this.payloads.has(type);
  }

  samples(type: SampleMetricType): Sample[] {
    return parseSamples(this.payloads.get(type));
  }

  sleep(): SleepRecord | undefined {
    return parseSleepRecord(this.payloads.get(MetricType.Sleep));
  }
}

export interface ExtractedMetrics {
  heartRate: Sample[];
  sleep: SleepRecord | undefined;
  hrv: Sample[];
  temperature: Sample[];
}

/**
 * Isolate the four streams the night analysis needs.
 * Absent streams come back empty; undefined means the document itself is unusable.
 */
export function extractMetrics(document: unknown): ExtractedMetrics | undefined {
  const index = MetricIndex.fromDocument(document);
  if (!index) return undefined;

  return {
    heartRate: index.samples(MetricType.HeartRate),
    sleep: index.sleep(),
    hrv: index.samples(MetricType.Hrv),
    temperature: index.samples(MetricType.Temperature),
  };
}
