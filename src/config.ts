/**
 * Environment configuration
 *
 *   ULTRAHUMAN_API_TOKEN   - partner API token (required)
 *   ULTRAHUMAN_EMAIL       - account analyzed when a tool call gives no email
 *   ULTRAHUMAN_API_BASE    - API base URL
 *   ULTRAHUMAN_TIMEOUT_MS  - fetch timeout
 *   ULTRAHUMAN_TIMEZONE    - IANA zone for clock times in reports
 */

import { IANAZone } from "luxon";
import { z } from "zod";
import { ConfigError } from "./utils/errors.js";

export const DEFAULT_API_BASE = "https://partner.ultrahuman.com/api/v1";
export const DEFAULT_TIMEOUT_MS = 30_000;

const configSchema = z.object({
  apiToken: z
    .string({ required_error: "ULTRAHUMAN_API_TOKEN is not set" })
    .min(1, "ULTRAHUMAN_API_TOKEN is not set"),
  defaultEmail: z.string().email("ULTRAHUMAN_EMAIL must be an email address").optional(),
  apiBase: z.string().url("ULTRAHUMAN_API_BASE must be a URL").default(DEFAULT_API_BASE),
  timeoutMs: z.coerce
    .number()
    .int()
    .positive("ULTRAHUMAN_TIMEOUT_MS must be a positive number of milliseconds")
    .default(DEFAULT_TIMEOUT_MS),
  timezone: z
    .string()
    .refine((zone) => IANAZone.isValidZone(zone), "ULTRAHUMAN_TIMEZONE must be an IANA time zone")
    .default("UTC"),
});

export type Config = z.infer<typeof configSchema>;

/**
 * Load and validate configuration; throws ConfigError when invalid
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  // Treat empty strings as unset
  const read = (key: string): string | undefined => {
    const value = env[key];
    return value === "" ? undefined : value;
  };

  const result = configSchema.safeParse({
    apiToken: read("ULTRAHUMAN_API_TOKEN"),
    defaultEmail: read("ULTRAHUMAN_EMAIL"),
    apiBase: read("ULTRAHUMAN_API_BASE"),
    timeoutMs: read("ULTRAHUMAN_TIMEOUT_MS"),
    timezone: read("ULTRAHUMAN_TIMEZONE"),
  });

  if (!result.success) {
    const issues = result.error.issues.map((issue) => issue.message).join("; ");
    throw new ConfigError(`Invalid configuration: ${issues}`);
  }

  return result.data;
}
