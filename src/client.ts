/**
 * Thin wrapper around the Ultrahuman partner API
 * https://partner.ultrahuman.com/api/v1
 */

import type { MetricsSource } from "./analysis/pipeline.js";
import { DEFAULT_API_BASE, DEFAULT_TIMEOUT_MS } from "./config.js";
import { UltrahumanApiError, UltrahumanResponseError } from "./utils/errors.js";

export interface UltrahumanClientConfig {
  apiToken: string;
  baseUrl?: string;
  timeoutMs?: number;
}

export class UltrahumanClient implements MetricsSource {
  private apiToken: string;
  private baseUrl: string;
  private timeoutMs: number;

  constructor(config: UltrahumanClientConfig) {
    this.apiToken = config.apiToken;
    this.baseUrl = (config.baseUrl ?? DEFAULT_API_BASE).replace(/\/+$/, "");
    this.timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  private async fetch(endpoint: string, params: Record<string, string>): Promise<unknown> {
    const url = new URL(`${this.baseUrl}/${endpoint}`);

    Object.entries(params).forEach(([key, value]) => {
      url.searchParams.append(key, value);
    });

    // The partner API takes the raw token, without a Bearer scheme
    const response = await fetch(url.toString(), {
      headers: {
        Authorization: this.apiToken,
      },
      signal: AbortSignal.timeout(this.timeoutMs),
    });

    const body = await response.text();

    if (!response.ok) {
      throw new UltrahumanApiError(response.status, response.statusText, body);
    }

    try {
      const parsed: unknown = JSON.parse(body);
      return parsed;
    } catch (error) {
      throw new UltrahumanResponseError(
        "Invalid response: Ultrahuman API returned a body that is not valid JSON.",
        { cause: error }
      );
    }
  }

  /**
   * Raw metrics document for one account and day
   */
  async getMetrics(email: string, date: string): Promise<unknown> {
    return this.fetch("metrics", { email, date });
  }
}
