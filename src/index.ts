#!/usr/bin/env node
/**
 * Ultrahuman MCP Server
 *
 * An MCP server that analyzes a night of Ultrahuman Ring readings and returns
 * a human-readable nocturnal health summary.
 *
 * CLI:
 *   npx ultrahuman-ring-mcp          - Start the MCP server (stdio transport)
 *   npx ultrahuman-ring-mcp --http   - Start with HTTP transport (for remote deployment)
 */
import "dotenv/config";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";

import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { dirname, resolve } from "node:path";

import { UltrahumanClient } from "./client.js";
import { loadConfig, type Config } from "./config.js";
import { registerTools } from "./tools/index.js";
import { registerPrompts } from "./prompts/index.js";
import { formatError } from "./utils/errors.js";

// Read version from package.json
const __dirname = dirname(fileURLToPath(import.meta.url));
const pkg: { version: string } = JSON.parse(readFileSync(resolve(__dirname, "..", "package.json"), "utf-8"));
const VERSION = pkg.version;

const args = process.argv.slice(2);
const useHttpTransport = args.includes("--http") || args.includes("-H");

// ─────────────────────────────────────────────────────────────
// Configuration
// ─────────────────────────────────────────────────────────────

function resolveConfig(): Config {
  try {
    return loadConfig();
  } catch (error) {
    console.error(
      `Error: ${formatError(error)}\n\n` +
        "Set ULTRAHUMAN_API_TOKEN to your Ultrahuman partner API token,\n" +
        "and optionally ULTRAHUMAN_EMAIL to the account to analyze by default."
    );
    process.exit(1);
  }
}

// ─────────────────────────────────────────────────────────────
// Server Setup
// ─────────────────────────────────────────────────────────────

const config = resolveConfig();

const ultrahumanClient = new UltrahumanClient({
  apiToken: config.apiToken,
  baseUrl: config.apiBase,
  timeoutMs: config.timeoutMs,
});

function buildServer(): McpServer {
  const server = new McpServer({
    name: "ultrahuman-mcp",
    version: VERSION,
  });

  registerTools(server, ultrahumanClient, {
    defaultEmail: config.defaultEmail,
    timezone: config.timezone,
  });
  registerPrompts(server);

  return server;
}

if (!config.defaultEmail) {
  console.error("ULTRAHUMAN_EMAIL not set: tool calls must pass an email");
}

// ─────────────────────────────────────────────────────────────
// Start Server
// ─────────────────────────────────────────────────────────────

async function main() {
  if (useHttpTransport) {
    // HTTP transport for remote deployment
    const { startHttpServer } = await import("./transports/http.js");
    await startHttpServer(buildServer);
  } else {
    // Stdio transport for local use
    const transport = new StdioServerTransport();
    await buildServer().connect(transport);
    console.error("Ultrahuman MCP server running on stdio");
  }
}

main().catch((error) => {
  console.error("Failed to start server:", error);
  process.exit(1);
});
