/**
 * MCP Tools for Ultrahuman Ring data
 *
 * analyze_night:        full nocturnal summary for one night
 * get_metrics_overview: which metric streams the provider returned for a day
 */

import { z } from "zod";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { analyzeNight, type MetricsSource, type NightOutcome } from "../analysis/pipeline.js";
import { MetricIndex, MetricType } from "../analysis/metric-extractor.js";
import { TEMPERATURE_DROP_POLICY } from "../analysis/temperature.js";
import { HEART_RATE_DROP_POLICY } from "../analysis/heart-rate.js";
import type { AnalysisResult, StageReport } from "../analysis/report.js";
import {
  formatError,
  formatSignedDelta,
  formatSleepStages,
  formatTime,
  getDaysAgo,
  getNoDataMessage,
  type FetchErrorKind,
} from "../utils/index.js";

export interface ToolOptions {
  /** Account used when a call gives no email */
  defaultEmail?: string;
  /** IANA zone for clock times */
  timezone: string;
}

const dateSchema = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, "Date must be in YYYY-MM-DD format");

const NO_ACCOUNT_MESSAGE =
  "No Ultrahuman account email provided. Pass `email`, or set ULTRAHUMAN_EMAIL for a default account.";

const FETCH_ERROR_LABELS: Record<FetchErrorKind, string> = {
  http_status: "HTTP error",
  network: "network error",
  invalid_body: "invalid response",
  unexpected: "unexpected error",
};

/** Explicit email first, then the configured default; blank counts as missing */
function resolveAccount(email: string | undefined, defaultEmail: string | undefined): string | undefined {
  return email?.trim() || defaultEmail?.trim() || undefined;
}

function textResult(text: string) {
  return {
    content: [
      {
        type: "text" as const,
        text,
      },
    ],
  };
}

// ─────────────────────────────────────────────────────────────
// Register Tools with McpServer
// ─────────────────────────────────────────────────────────────

export function registerTools(server: McpServer, client: MetricsSource, options: ToolOptions) {
  // ─────────────────────────────────────────────────────────────
  // analyze_night tool
  // ─────────────────────────────────────────────────────────────
  server.registerTool(
    "analyze_night",
    {
      description:
        "Analyze one night of Ultrahuman Ring data. Returns the sleep window and stage breakdown, lowest heart rate and significant heart rate drops, skin temperature profile (range, early vs late sleep, drops), and average HRV. Use this for a nocturnal health summary.",
      inputSchema: {
        email: z.string().email().optional().describe("Ultrahuman account email. Defaults to the configured account."),
        date: dateSchema.optional().describe("Night to analyze in YYYY-MM-DD format. Defaults to yesterday."),
      },
    },
    async ({ email, date }) => {
      try {
        const outcome = await analyzeNight(client, {
          email: resolveAccount(email, options.defaultEmail),
          date: date || getDaysAgo(1),
        });
        return textResult(formatNightOutcome(outcome, options.timezone));
      } catch (error) {
        return textResult(formatError(error));
      }
    }
  );

  // ─────────────────────────────────────────────────────────────
  // get_metrics_overview tool
  // ─────────────────────────────────────────────────────────────
  server.registerTool(
    "get_metrics_overview",
    {
      description:
        "List which metric streams (heart rate, sleep, HRV, skin temperature) the Ultrahuman API returned for a day, with reading counts. Use this to check data availability before analyzing a night.",
      inputSchema: {
        email: z.string().email().optional().describe("Ultrahuman account email. Defaults to the configured account."),
        date: dateSchema.optional().describe("Date in YYYY-MM-DD format. Defaults to yesterday."),
      },
    },
    async ({ email, date }) => {
      const account = resolveAccount(email, options.defaultEmail);
      const day = date || getDaysAgo(1);

      if (!account) {
        return textResult(NO_ACCOUNT_MESSAGE);
      }

      try {
        const document = await client.getMetrics(account, day);
        const index = MetricIndex.fromDocument(document);
        if (!index) {
          return textResult(`No usable data returned for ${account} on ${day}.`);
        }
        return textResult(formatMetricsOverview(index, account, day));
      } catch (error) {
        return textResult(formatError(error));
      }
    }
  );
}

// ─────────────────────────────────────────────────────────────
// Report rendering
// ─────────────────────────────────────────────────────────────

export function formatNightOutcome(outcome: NightOutcome, timezone: string): string {
  switch (outcome.kind) {
    case "no_account":
      return NO_ACCOUNT_MESSAGE;
    case "fetch_failed":
      return `Error fetching Ultrahuman data (${FETCH_ERROR_LABELS[outcome.error.kind]}): ${outcome.error.detail}`;
    case "no_usable_document":
      return `No usable data returned for ${outcome.email} on ${outcome.date}.`;
    case "no_heart_rate_data":
      return getNoDataMessage("heart rate", outcome.date);
    case "no_sleep_data":
      return getNoDataMessage("sleep", outcome.date);
    case "analysis":
      return formatAnalysis(outcome.result, outcome.date, timezone);
  }
}

function describeMissing(stage: StageReport): string {
  switch (stage.status) {
    case "failed":
      return `Analysis failed: ${stage.reason ?? "unknown error"}`;
    case "unavailable":
      return "No data (sleep window unavailable)";
    default:
      return "No readings during sleep";
  }
}

function formatAnalysis(result: AnalysisResult, date: string, timezone: string): string {
  const time = (timestamp: number) => formatTime(timestamp, timezone);
  const lines = [`## Night Analysis: ${date}`, ""];

  // Sleep
  if (result.sleepWindow) {
    const { window, durationLabel } = result.sleepWindow;
    lines.push(`**Sleep Window:** ${time(window.start)} → ${time(window.end)} (${durationLabel})`);
  } else {
    lines.push("**Sleep Window:** Not available (bedtime start or end missing)");
  }
  lines.push(`**Sleep Stages:** ${formatSleepStages(result.stagePercentages)}`);
  lines.push("");

  // Heart rate
  lines.push("**Heart Rate:**");
  if (result.lowestHeartRate) {
    lines.push(`- Lowest: ${result.lowestHeartRate.value} bpm at ${time(result.lowestHeartRate.timestamp)}`);
    if (result.heartRateSampleCount !== undefined) {
      lines.push(`- Readings during sleep: ${result.heartRateSampleCount}`);
    }
    const policy = `≥${HEART_RATE_DROP_POLICY.minDrop} bpm within ${HEART_RATE_DROP_POLICY.maxElapsedMinutes} min`;
    if (result.heartRateDrops.length === 0) {
      lines.push(`- No significant drops (${policy})`);
    } else {
      lines.push(`- Significant drops (${policy}): ${result.heartRateDrops.length}`);
      result.heartRateDrops.forEach((drop) => {
        lines.push(
          `  - ${time(drop.timestamp)}: ${drop.fromValue} → ${drop.toValue} bpm (-${drop.magnitude} bpm over ${drop.elapsedMinutes} min)`
        );
      });
    }
  } else {
    lines.push(`- ${describeMissing(result.stages.heartRate)}`);
  }
  lines.push("");

  // Skin temperature
  lines.push("**Skin Temperature:**");
  const profile = result.temperatureProfile;
  if (profile) {
    lines.push(`- Range: ${profile.min}°C – ${profile.max}°C (variation ${profile.variation}°C)`);
    lines.push(`- Average: ${profile.mean}°C`);
    lines.push(`- Lowest at ${time(profile.minTimestamp)}, highest at ${time(profile.maxTimestamp)}`);
    lines.push(
      `- First 30 min average: ${profile.earlyMean !== undefined ? `${profile.earlyMean}°C` : "no readings"}`
    );
    lines.push(
      `- Last 30 min average: ${profile.lateMean !== undefined ? `${profile.lateMean}°C` : "no readings"}`
    );
    if (profile.lateMinusEarly !== undefined) {
      lines.push(`- Change (last vs first 30 min): ${formatSignedDelta(profile.lateMinusEarly, "°C")}`);
    }
    if (profile.drops.length === 0) {
      lines.push(`- No drops of ${TEMPERATURE_DROP_POLICY.minDrop}°C or more`);
    } else {
      lines.push(`- Drops of ${TEMPERATURE_DROP_POLICY.minDrop}°C or more: ${profile.drops.length}`);
      profile.drops.forEach((drop) => {
        lines.push(
          `  - ${time(drop.timestamp)}: ${drop.fromValue}°C → ${drop.toValue}°C (-${drop.magnitude}°C over ${drop.elapsedMinutes} min)`
        );
      });
    }
  } else {
    lines.push(`- ${describeMissing(result.stages.temperature)}`);
  }
  lines.push("");

  // HRV
  if (result.averageHrv !== undefined) {
    const source =
      result.hrvSource === "precomputed"
        ? "reported by ring"
        : `average of ${result.hrvSampleCount ?? 0} readings during sleep`;
    lines.push(`**HRV:** ${result.averageHrv} ms (${source})`);
  } else {
    lines.push(`**HRV:** ${describeMissing(result.stages.hrv)}`);
  }

  return lines.join("\n");
}

const OVERVIEW_LABELS: Record<MetricType, string> = {
  hr: "Heart rate",
  Sleep: "Sleep",
  hrv: "HRV",
  temp: "Skin temperature",
};

function formatMetricsOverview(index: MetricIndex, account: string, day: string): string {
  const lines = [
    `## Ultrahuman Metrics: ${day}`,
    `Retrieved ${index.entryCount} metric entries for ${account}.`,
    "",
  ];

  const sampleTypes = [MetricType.HeartRate, MetricType.Hrv, MetricType.Temperature] as const;
  sampleTypes.forEach((type) => {
    const label = `${OVERVIEW_LABELS[type]} (${type})`;
    lines.push(index.has(type) ? `- ${label}: ${index.samples(type).length} readings` : `- ${label}: not present`);
  });

  const sleepLabel = `${OVERVIEW_LABELS.Sleep} (${MetricType.Sleep})`;
  if (!index.has(MetricType.Sleep)) {
    lines.push(`- ${sleepLabel}: not present`);
  } else {
    lines.push(index.sleep() ? `- ${sleepLabel}: present` : `- ${sleepLabel}: present (empty)`);
  }

  return lines.join("\n");
}
