/**
 * Custom error types and helpers for better error messages
 */

import { z } from "zod";

export class UltrahumanApiError extends Error {
  constructor(
    public readonly status: number,
    public readonly statusText: string,
    public readonly body: string
  ) {
    super(getErrorMessage(status, body));
    this.name = "UltrahumanApiError";
  }
}

/**
 * A 2xx response whose body could not be read as JSON
 */
export class UltrahumanResponseError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "UltrahumanResponseError";
  }
}

export class ConfigError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ConfigError";
  }
}

export type FetchErrorKind = "http_status" | "network" | "invalid_body" | "unexpected";

export interface FetchError {
  kind: FetchErrorKind;
  detail: string;
  /** HTTP status, for http_status errors */
  status?: number;
}

/**
 * Get a user-friendly error message based on HTTP status code
 */
function getErrorMessage(status: number, body: string): string {
  switch (status) {
    case 400:
      return `Invalid request: ${parseErrorBody(body) || "Check the account email and date format (YYYY-MM-DD)."}`;

    case 401:
      return "Authentication failed: Your Ultrahuman API token is invalid or expired. " +
        "Check ULTRAHUMAN_API_TOKEN.";

    case 403:
      return "Access denied: This token has no access to the requested account's data. " +
        "Make sure the account has shared its data with your partner token.";

    case 404:
      return "Not found: No Ultrahuman data exists for this account and date, " +
        "or the API endpoint has changed.";

    case 429:
      return "Rate limited: Too many requests to the Ultrahuman API. Please wait a moment and try again.";

    case 500:
    case 502:
    case 503:
    case 504:
      return `Ultrahuman API is temporarily unavailable (${status}). Please try again in a few minutes.`;

    default:
      return `Ultrahuman API error (${status}): ${parseErrorBody(body) || "Unknown error"}`;
  }
}

const errorBodySchema = z.object({
  detail: z.string().optional(),
  message: z.string().optional(),
  error: z.string().optional(),
});

/**
 * Try to parse error body for useful message
 */
function parseErrorBody(body: string): string | null {
  if (!body) return null;

  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch {
    // Not JSON, return as-is if it's short enough
    return body.length < 200 ? body : null;
  }

  const fields = errorBodySchema.safeParse(parsed);
  if (!fields.success) return null;
  return fields.data.detail || fields.data.message || fields.data.error || null;
}

function isTimeout(error: Error): boolean {
  return (
    error.name === "TimeoutError" ||
    error.name === "AbortError" ||
    error.message.includes("ETIMEDOUT") ||
    error.message.includes("timeout")
  );
}

function isNetworkFailure(error: Error): boolean {
  return (
    error.message.includes("fetch failed") ||
    error.message.includes("ENOTFOUND") ||
    error.message.includes("ECONNREFUSED") ||
    error.message.includes("ECONNRESET")
  );
}

/**
 * Classify anything thrown by the metrics fetch
 */
export function classifyFetchError(error: unknown): FetchError {
  if (error instanceof UltrahumanApiError) {
    return { kind: "http_status", detail: error.message, status: error.status };
  }

  if (error instanceof UltrahumanResponseError) {
    return { kind: "invalid_body", detail: error.message };
  }

  if (error instanceof Error) {
    if (isTimeout(error)) {
      return {
        kind: "network",
        detail: "Request timed out: Ultrahuman API took too long to respond. Please try again.",
      };
    }
    if (isNetworkFailure(error)) {
      return {
        kind: "network",
        detail: "Network error: Unable to connect to Ultrahuman API. Check your internet connection.",
      };
    }
    return { kind: "unexpected", detail: error.message };
  }

  return { kind: "unexpected", detail: "An unknown error occurred" };
}

/**
 * Format an error for display to the user
 */
export function formatError(error: unknown): string {
  return classifyFetchError(error).detail;
}

/**
 * Get helpful context for "no data" situations
 */
export function getNoDataMessage(dataType: string, date: string): string {
  const tips = [
    `No ${dataType} data found for ${date}.`,
    "",
    "This could mean:",
    "• Your Ultrahuman Ring hasn't synced yet - open the Ultrahuman app to sync",
    "• You didn't wear your ring that night",
    "• The data is still being processed (can take a few hours)",
  ];

  if (dataType === "sleep") {
    tips.push("• Nights can be filed under the day you woke up - try the following date");
  }

  return tips.join("\n");
}
