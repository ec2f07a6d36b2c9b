/**
 * Tests for MCP Server initialization
 *
 * Tests server setup, configuration handling, and startup behavior.
 */
import { readFileSync } from "node:fs";
import { resolve, dirname } from "node:path";
import { fileURLToPath } from "node:url";
import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";

const __dirname = dirname(fileURLToPath(import.meta.url));
const pkg: { version: string } = JSON.parse(readFileSync(resolve(__dirname, "..", "package.json"), "utf-8"));

// Create mock class constructors
class MockMcpServer {
  static instances: MockMcpServer[] = [];
  static lastConfig: unknown;

  connect = vi.fn().mockResolvedValue(undefined);
  registerTool = vi.fn();
  registerPrompt = vi.fn();

  constructor(config: unknown) {
    MockMcpServer.lastConfig = config;
    MockMcpServer.instances.push(this);
  }

  static reset() {
    MockMcpServer.instances = [];
    MockMcpServer.lastConfig = undefined;
  }
}

class MockStdioServerTransport {
  static instances: MockStdioServerTransport[] = [];

  constructor() {
    MockStdioServerTransport.instances.push(this);
  }

  static reset() {
    MockStdioServerTransport.instances = [];
  }
}

class MockUltrahumanClient {
  static instances: MockUltrahumanClient[] = [];
  static lastConfig: unknown;

  constructor(config: unknown) {
    MockUltrahumanClient.lastConfig = config;
    MockUltrahumanClient.instances.push(this);
  }

  static reset() {
    MockUltrahumanClient.instances = [];
    MockUltrahumanClient.lastConfig = undefined;
  }
}

const mockRegisterTools = vi.fn();
const mockRegisterPrompts = vi.fn();

// Mock the MCP SDK modules before importing index
vi.mock("@modelcontextprotocol/sdk/server/mcp.js", () => ({
  McpServer: MockMcpServer,
}));

vi.mock("@modelcontextprotocol/sdk/server/stdio.js", () => ({
  StdioServerTransport: MockStdioServerTransport,
}));

vi.mock("./client.js", () => ({
  UltrahumanClient: MockUltrahumanClient,
}));

vi.mock("./tools/index.js", () => ({
  registerTools: mockRegisterTools,
}));

vi.mock("./prompts/index.js", () => ({
  registerPrompts: mockRegisterPrompts,
}));

// Keep a local .env file out of the tests
vi.mock("dotenv/config", () => ({}));

const ENV_KEYS = [
  "ULTRAHUMAN_API_TOKEN",
  "ULTRAHUMAN_EMAIL",
  "ULTRAHUMAN_API_BASE",
  "ULTRAHUMAN_TIMEOUT_MS",
  "ULTRAHUMAN_TIMEZONE",
];

describe("MCP Server", () => {
  const originalEnv = process.env;
  const originalConsoleError = console.error;

  beforeEach(() => {
    // Reset modules to ensure fresh imports
    vi.resetModules();

    // Reset mock class state
    MockMcpServer.reset();
    MockStdioServerTransport.reset();
    MockUltrahumanClient.reset();
    mockRegisterTools.mockClear();
    mockRegisterPrompts.mockClear();

    process.env = { ...originalEnv };
    for (const key of ENV_KEYS) {
      delete process.env[key];
    }

    // Suppress console.error from server startup
    console.error = vi.fn();
  });

  afterEach(() => {
    process.env = originalEnv;
    console.error = originalConsoleError;
    vi.restoreAllMocks();
  });

  describe("configuration", () => {
    it("should create UltrahumanClient with defaults", async () => {
      process.env.ULTRAHUMAN_API_TOKEN = "test-secret";

      await import("./index.js");

      expect(MockUltrahumanClient.instances.length).toBe(1);
      expect(MockUltrahumanClient.lastConfig).toEqual({
        apiToken: "test-secret",
        baseUrl: "https://partner.ultrahuman.com/api/v1",
        timeoutMs: 30000,
      });
    });

    it("should pass environment overrides to the client", async () => {
      process.env.ULTRAHUMAN_API_TOKEN = "test-secret";
      process.env.ULTRAHUMAN_API_BASE = "http://localhost:8080/api/v1";
      process.env.ULTRAHUMAN_TIMEOUT_MS = "5000";

      await import("./index.js");

      expect(MockUltrahumanClient.lastConfig).toEqual({
        apiToken: "test-secret",
        baseUrl: "http://localhost:8080/api/v1",
        timeoutMs: 5000,
      });
    });

    it("should exit when the API token is missing", async () => {
      const exitSpy = vi.spyOn(process, "exit").mockImplementation(() => {
        throw new Error("process.exit called");
      });

      await expect(import("./index.js")).rejects.toThrow("process.exit called");

      expect(exitSpy).toHaveBeenCalledWith(1);
      expect(MockUltrahumanClient.instances.length).toBe(0);
    });

    it("should warn when no default email is configured", async () => {
      process.env.ULTRAHUMAN_API_TOKEN = "test-secret";

      await import("./index.js");

      expect(console.error).toHaveBeenCalledWith("ULTRAHUMAN_EMAIL not set: tool calls must pass an email");
    });
  });

  describe("server initialization", () => {
    it("should create McpServer with correct config", async () => {
      process.env.ULTRAHUMAN_API_TOKEN = "test-secret";

      await import("./index.js");
      await new Promise((resolve) => setTimeout(resolve, 10));

      expect(MockMcpServer.lastConfig).toEqual({
        name: "ultrahuman-mcp",
        version: pkg.version,
      });
    });

    it("should register tools with the default account and zone", async () => {
      process.env.ULTRAHUMAN_API_TOKEN = "test-secret";
      process.env.ULTRAHUMAN_EMAIL = "test@example.com";

      await import("./index.js");
      await new Promise((resolve) => setTimeout(resolve, 10));

      expect(mockRegisterTools).toHaveBeenCalledWith(
        MockMcpServer.instances[0],
        MockUltrahumanClient.instances[0],
        { defaultEmail: "test@example.com", timezone: "UTC" }
      );
      expect(mockRegisterPrompts).toHaveBeenCalledWith(MockMcpServer.instances[0]);
    });

    it("should create StdioServerTransport", async () => {
      process.env.ULTRAHUMAN_API_TOKEN = "test-secret";

      await import("./index.js");

      // Transport is created in main() which runs asynchronously
      await new Promise((resolve) => setTimeout(resolve, 10));

      expect(MockStdioServerTransport.instances.length).toBe(1);
    });

    it("should connect server to transport", async () => {
      process.env.ULTRAHUMAN_API_TOKEN = "test-secret";

      await import("./index.js");

      // Wait for main() to complete
      await new Promise((resolve) => setTimeout(resolve, 10));

      const serverInstance = MockMcpServer.instances[0];
      expect(serverInstance.connect).toHaveBeenCalledWith(MockStdioServerTransport.instances[0]);
    });
  });
});
