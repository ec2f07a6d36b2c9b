/**
 * Tests for the HTTP transport
 *
 * Servers bind to free local ports and are closed after each test.
 */
import { createServer as createNetServer, type Server as NetServer } from "node:net";
import type { Server } from "node:http";
import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { startHttpServer } from "./http.js";

function buildServer() {
  return new McpServer({ name: "ultrahuman-mcp", version: "0.0.0-test" });
}

function portOf(server: Server | NetServer): number {
  const address = server.address();
  if (typeof address !== "object" || address === null) {
    throw new Error("Server is not listening on a TCP port");
  }
  return address.port;
}

function close(server: Server | NetServer): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
  });
}

describe("startHttpServer", () => {
  const servers: Array<Server | NetServer> = [];

  beforeEach(() => {
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(async () => {
    await Promise.all(servers.splice(0).map(close));
    vi.restoreAllMocks();
  });

  it("should reject when the port is already in use", async () => {
    const blocker = createNetServer();
    await new Promise<void>((resolve) => blocker.listen(0, "0.0.0.0", resolve));
    servers.push(blocker);

    await expect(startHttpServer(buildServer, { port: portOf(blocker), secret: "test-secret" })).rejects.toMatchObject({
      code: "EADDRINUSE",
    });
    expect(console.error).not.toHaveBeenCalledWith(expect.stringContaining("server running"));
  });

  it("should log the bound port once listening", async () => {
    const server = await startHttpServer(buildServer, { port: 0, secret: "test-secret" });
    servers.push(server);

    expect(console.error).toHaveBeenCalledWith(
      `Ultrahuman MCP server running on http://0.0.0.0:${portOf(server)}`
    );
  });

  it("should answer health checks without credentials", async () => {
    const server = await startHttpServer(buildServer, { port: 0, secret: "test-secret" });
    servers.push(server);

    const response = await fetch(`http://127.0.0.1:${portOf(server)}/health`);

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({ status: "ok", service: "ultrahuman-mcp" });
  });

  it("should require the bearer secret on the MCP endpoint", async () => {
    const server = await startHttpServer(buildServer, { port: 0, secret: "test-secret" });
    servers.push(server);
    const url = `http://127.0.0.1:${portOf(server)}/mcp`;

    const missing = await fetch(url, { method: "POST" });
    expect(missing.status).toBe(401);
    expect(await missing.json()).toEqual({ error: "Missing Authorization header" });

    const wrong = await fetch(url, { method: "POST", headers: { Authorization: "Bearer wrong-secret" } });
    expect(wrong.status).toBe(401);
    expect(await wrong.json()).toEqual({ error: "Invalid credentials" });
  });

  it("should warn when no secret is configured", async () => {
    const server = await startHttpServer(buildServer, { port: 0, secret: "" });
    servers.push(server);

    expect(console.error).toHaveBeenCalledWith(
      "WARNING: No authentication configured! Set MCP_SECRET to require a bearer token."
    );
  });
});
