/**
 * Night analysis pipeline
 *
 * fetch -> extract streams -> resolve sleep window -> analyzers -> assemble
 */

import { classifyFetchError, type FetchError } from "../utils/errors.js";
import { analyzeHeartRate } from "./heart-rate.js";
import { analyzeHrv } from "./hrv.js";
import { extractMetrics } from "./metric-extractor.js";
import { assembleReport, type AnalysisResult } from "./report.js";
import { extractStagePercentages, resolveSleepWindow } from "./sleep-window.js";
import { runStage } from "./stage.js";
import { analyzeTemperature } from "./temperature.js";

/**
 * Anything that can return the raw metrics document for an account and date
 */
export interface MetricsSource {
  getMetrics(email: string, date: string): Promise<unknown>;
}

export type DocumentOutcome =
  | { kind: "analysis"; result: AnalysisResult }
  | { kind: "no_usable_document" }
  | { kind: "no_heart_rate_data" }
  | { kind: "no_sleep_data" };

export type NightOutcome =
  | { kind: "no_account"; date: string }
  | { kind: "fetch_failed"; email: string; date: string; error: FetchError }
  | (DocumentOutcome & { email: string; date: string });

export interface NightRequest {
  email: string | undefined;
  /** YYYY-MM-DD */
  date: string;
}

/**
 * Analyze an already-fetched document. Pure and synchronous.
 */
export function analyzeDocument(document: unknown): DocumentOutcome {
  const metrics = extractMetrics(document);
  if (!metrics) return { kind: "no_usable_document" };
  if (metrics.heartRate.length === 0) return { kind: "no_heart_rate_data" };

  const sleep = metrics.sleep;
  if (!sleep) return { kind: "no_sleep_data" };

  const sleepWindow = resolveSleepWindow(sleep);
  const window = sleepWindow?.window;

  const result = assembleReport({
    sleepWindow,
    stagePercentages: extractStagePercentages(sleep),
    heartRate: runStage("heart rate", () => analyzeHeartRate(metrics.heartRate, window)),
    temperature: runStage("temperature", () => analyzeTemperature(metrics.temperature, window)),
    hrv: runStage("hrv", () => analyzeHrv(metrics.hrv, sleep, window)),
  });

  return { kind: "analysis", result };
}

/**
 * Fetch one night of metrics and analyze it.
 * A failed fetch ends the pipeline before any extraction.
 */
export async function analyzeNight(source: MetricsSource, request: NightRequest): Promise<NightOutcome> {
  const { date } = request;
  const email = request.email?.trim();
  if (!email) return { kind: "no_account", date };

  console.error(`Fetching Ultrahuman metrics for ${email} on ${date}`);

  let document: unknown;
  try {
    document = await source.getMetrics(email, date);
  } catch (error) {
    const fetchError = classifyFetchError(error);
    console.error(`Metrics fetch failed (${fetchError.kind}): ${fetchError.detail}`);
    return { kind: "fetch_failed", email, date, error: fetchError };
  }

  return { ...analyzeDocument(document), email, date };
}
