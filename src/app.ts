import { Hono } from "hono";
import { cors } from "hono/cors";
import { logger as requestLogger } from "hono/logger";
import { ErrorCode, JSONRPCMessageSchema } from "@modelcontextprotocol/sdk/types.js";
import { createApiRouter, errorResponse } from "./api/routes.js";
import type { Config } from "./config.js";
import { logger } from "./logger.js";
import { createMcpServer, SERVER_NAME, SERVER_VERSION } from "./mcp/server.js";
import { SessionRegistry } from "./mcp/sessions.js";
import { auditLog } from "./middleware/audit.js";
import { rateLimit } from "./middleware/rate-limit.js";

export type AppConfig = Pick<Config, "server" | "rateLimit" | "defaultWindow">;

export interface HttpApp {
  app: Hono;
  sessions: SessionRegistry;
}

/** The HTTP surface: health check, the MCP endpoint and the REST API. */
export function createApp(config: AppConfig): HttpApp {
  const sessions = new SessionRegistry(() =>
    createMcpServer({ defaultWindow: config.defaultWindow })
  );
  const app = new Hono();
  const httpLog = logger.child({ component: "http" });

  // ── Middleware ──
  app.use(requestLogger((message) => httpLog.debug(message)));
  app.use(auditLog());
  app.use(
    cors({
      origin: config.server.corsOrigins,
      allowMethods: ["GET", "POST", "PUT", "DELETE", "OPTIONS"],
      allowHeaders: ["Content-Type", "Mcp-Session-Id"],
      exposeHeaders: ["Mcp-Session-Id", "X-RateLimit-Limit", "X-RateLimit-Remaining"],
    })
  );
  app.onError(errorResponse);

  // ── Health check ──
  app.get("/health", (c) =>
    c.json({ status: "ok", server: SERVER_NAME, version: SERVER_VERSION })
  );

  // ── MCP endpoint ──
  const limiter = rateLimit({ rpm: config.rateLimit.rpm });
  app.use("/mcp", limiter);
  app.use("/api/*", limiter);

  app.post("/mcp", async (c) => {
    let body: unknown;
    try {
      body = await c.req.json();
    } catch {
      return c.json(
        { jsonrpc: "2.0", id: null, error: { code: ErrorCode.ParseError, message: "Parse error" } },
        400
      );
    }
    const parsed = JSONRPCMessageSchema.safeParse(body);
    if (!parsed.success) {
      return c.json(
        {
          jsonrpc: "2.0",
          id: null,
          error: { code: ErrorCode.InvalidRequest, message: "Invalid JSON-RPC message" },
        },
        400
      );
    }

    const sessionId = c.req.header("mcp-session-id");
    const existing = sessionId ? sessions.get(sessionId) : undefined;
    const headers: Record<string, string> = {};
    let transport = existing?.transport;
    if (!transport) {
      const opened = await sessions.open();
      transport = opened.session.transport;
      headers["mcp-session-id"] = opened.id;
    }

    const response = await transport.handleJsonRpc(parsed.data);
    if (!response) return c.body(null, 202, headers);
    return c.json(response, 200, headers);
  });

  // ── REST API ──
  app.get("/api/v1/health", (c) =>
    c.json({ status: "ok", timestamp: new Date().toISOString() })
  );
  app.route("/api/v1/users", createApiRouter({ defaultWindow: config.defaultWindow }));

  return { app, sessions };
}
