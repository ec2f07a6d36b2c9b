/**
 * HTTP Transport for the Ultrahuman MCP Server
 *
 * Enables remote deployment via Streamable HTTP transport (stateless).
 * Authentication: optional static bearer token via MCP_SECRET.
 *
 *   GET  /health  health check (no auth)
 *   POST /        MCP endpoint (also /mcp)
 */
import type { Server } from "node:http";
import express, { type Request, type Response } from "express";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";

// ─────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────

export interface HttpTransportOptions {
  /** Port to listen on (default: process.env.PORT || 3000; 0 picks a free port) */
  port?: number;
  /** Secret for bearer token auth (default: process.env.MCP_SECRET) */
  secret?: string;
}

// ─────────────────────────────────────────────────────────────
// App
// ─────────────────────────────────────────────────────────────

/** Builds a fresh McpServer for each stateless request */
export type McpServerFactory = () => McpServer;

export function createHttpApp(createServer: McpServerFactory, secret: string | undefined): express.Express {
  const app = express();

  app.use(express.json());

  // CORS for remote clients
  app.use((req, res, next) => {
    res.header("Access-Control-Allow-Origin", "*");
    res.header("Access-Control-Allow-Methods", "GET, POST, OPTIONS");
    res.header("Access-Control-Allow-Headers", "Content-Type, Authorization, Mcp-Session-Id");
    if (req.method === "OPTIONS") {
      res.sendStatus(204);
      return;
    }
    next();
  });

  // Health check endpoint (no auth required)
  app.get("/health", (_req, res) => {
    res.json({ status: "ok", service: "ultrahuman-mcp" });
  });

  if (secret) {
    app.use((req, res, next) => {
      const authHeader = req.headers.authorization;
      if (!authHeader) {
        res.status(401).json({ error: "Missing Authorization header" });
        return;
      }
      const [scheme, token] = authHeader.split(" ");
      if (scheme !== "Bearer" || token !== secret) {
        res.status(401).json({ error: "Invalid credentials" });
        return;
      }
      next();
    });
  }

  const mcpHandler = async (req: Request, res: Response) => {
    console.error(`[MCP] ${req.method} ${req.path} request received`);
    try {
      const server = createServer();
      const transport = new StreamableHTTPServerTransport({
        sessionIdGenerator: undefined,
      });
      res.on("close", () => {
        Promise.all([transport.close(), server.close()]).catch((error: unknown) => {
          console.error("MCP transport close error:", error);
        });
      });
      await server.connect(transport);
      await transport.handleRequest(req, res, req.body);
    } catch (error) {
      console.error("MCP request error:", error);
      if (!res.headersSent) {
        res.status(500).json({
          error: "Internal server error",
          message: error instanceof Error ? error.message : String(error),
        });
      }
    }
  };

  // Mount MCP handlers at both / and /mcp for compatibility
  app.post("/", mcpHandler);
  app.post("/mcp", mcpHandler);

  return app;
}

// ─────────────────────────────────────────────────────────────
// HTTP Server
// ─────────────────────────────────────────────────────────────

export async function startHttpServer(
  createServer: McpServerFactory,
  options: HttpTransportOptions = {}
): Promise<Server> {
  const port = options.port ?? parseInt(process.env.PORT || "3000", 10);
  const secret = options.secret ?? process.env.MCP_SECRET;

  if (!secret) {
    console.error("WARNING: No authentication configured! Set MCP_SECRET to require a bearer token.");
  }

  const app = createHttpApp(createServer, secret);

  return new Promise<Server>((resolve, reject) => {
    const server = app.listen(port, "0.0.0.0", (error?: Error) => {
      if (error) {
        reject(error);
        return;
      }
      const address = server.address();
      const boundPort = typeof address === "object" && address !== null ? address.port : port;
      console.error(`Ultrahuman MCP server running on http://0.0.0.0:${boundPort}`);
      console.error(`MCP endpoint: POST / (or /mcp)`);
      console.error(`Health check: GET /health`);
      resolve(server);
    });
  });
}
