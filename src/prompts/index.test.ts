/**
 * Tests for MCP prompts
 */
import { describe, it, expect, vi } from "vitest";
import { registerPrompts } from "./index.js";

type PromptHandler = (args: { date?: string }) => Promise<{
  messages: Array<{ role: string; content: { type: string; text: string } }>;
}>;

function createMockServer() {
  const prompts: Map<string, { config: unknown; handler: PromptHandler }> = new Map();

  return {
    registerPrompt: vi.fn((name: string, config: unknown, handler: PromptHandler) => {
      prompts.set(name, { config, handler });
    }),
    getPromptHandler: (name: string): PromptHandler => {
      const prompt = prompts.get(name);
      if (!prompt) throw new Error(`Prompt not registered: ${name}`);
      return prompt.handler;
    },
    getPromptCount: () => prompts.size,
  };
}

describe("registerPrompts", () => {
  it("should register the night-review prompt", () => {
    const server = createMockServer();
    registerPrompts(server as unknown as Parameters<typeof registerPrompts>[0]);

    expect(server.getPromptCount()).toBe(1);
    expect(server.registerPrompt).toHaveBeenCalledWith(
      "night-review",
      expect.objectContaining({ title: "Night Review" }),
      expect.any(Function)
    );
  });

  it("should review last night when no date is given", async () => {
    const server = createMockServer();
    registerPrompts(server as unknown as Parameters<typeof registerPrompts>[0]);

    const result = await server.getPromptHandler("night-review")({});
    const text = result.messages[0].content.text;

    expect(result.messages[0].role).toBe("user");
    expect(text.split("\n")[0]).toBe("Please review my sleep for last night.");
    expect(text).toContain("Use the analyze_night tool and then:");
  });

  it("should pass a given date to the tool", async () => {
    const server = createMockServer();
    registerPrompts(server as unknown as Parameters<typeof registerPrompts>[0]);

    const result = await server.getPromptHandler("night-review")({ date: "2024-01-15" });
    const text = result.messages[0].content.text;

    expect(text.split("\n")[0]).toBe("Please review my sleep for the night of 2024-01-15.");
    expect(text).toContain('Use the analyze_night tool with date "2024-01-15" and then:');
    expect(text).toContain("get_metrics_overview");
  });
});
