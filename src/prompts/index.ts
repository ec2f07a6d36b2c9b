/**
 * MCP Prompts for Ultrahuman Ring data analysis
 *
 * Prompts are pre-defined templates that guide the LLM to the right tools
 * for common questions about a night's data.
 */

import { z } from "zod";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";

// ─────────────────────────────────────────────────────────────
// Register Prompts with McpServer
// ─────────────────────────────────────────────────────────────

export function registerPrompts(server: McpServer) {
  // ─────────────────────────────────────────────────────────────
  // night-review prompt
  // ─────────────────────────────────────────────────────────────
  server.registerPrompt(
    "night-review",
    {
      title: "Night Review",
      description:
        "Review one night of Ultrahuman Ring data: sleep window, heart rate drops, skin temperature and HRV, with an interpretation.",
      argsSchema: {
        date: z.string().optional().describe("Night to review in YYYY-MM-DD format (defaults to yesterday)"),
      },
    },
    async ({ date }) => {
      const night = date ? `the night of ${date}` : "last night";
      const toolArgs = date ? ` with date "${date}"` : "";

      return {
        messages: [
          {
            role: "user" as const,
            content: {
              type: "text" as const,
              text: `Please review my sleep for ${night}.

Use the analyze_night tool${toolArgs} and then:
1. Summarize when I slept, for how long, and how the time split across deep, light, REM and awake
2. Point out my lowest heart rate and any significant heart rate drops, and when they happened
3. Describe my skin temperature over the night, including how the last 30 minutes compared with the first 30
4. Comment on my average HRV
5. If any section reports no data or a failed analysis, say so plainly instead of guessing

If analyze_night reports missing data, call get_metrics_overview for the same date to see which streams were returned.

Finish with 1-2 practical observations based on the data.`,
            },
          },
        ],
      };
    }
  );
}
