#!/usr/bin/env node
/**
 * Budget Health Server
 *
 * Scores a user's finances, flags exceeded budgets and suggests fixes.
 * Runs as an MCP server over stdio, or over HTTP with a REST API beside it.
 *
 * Usage:
 *   node dist/index.js --transport stdio   # Local MCP client
 *   node dist/index.js --transport http    # HTTP server on port 3200
 */

import { loadConfig } from "./config.js";
import { errorFields, logger } from "./logger.js";
import { createMcpServer } from "./mcp/server.js";
import { closeStore, initStore } from "./store/store.js";

const config = loadConfig();

// stdout is the MCP channel in stdio mode
logger.configure({ level: config.logLevel, stderr: config.server.transport === "stdio" });

try {
  initStore(config.dbPath);
  if (config.server.transport === "stdio") {
    await startStdio();
  } else {
    await startHttp();
  }
} catch (error) {
  logger.error("startup failed", errorFields(error));
  closeStore();
  process.exit(1);
}

// ── stdio mode ──────────────────────────────────────────────────────────────

async function startStdio() {
  const { StdioServerTransport } = await import("@modelcontextprotocol/sdk/server/stdio.js");

  const server = createMcpServer({ defaultWindow: config.defaultWindow });
  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info("mcp server ready", { transport: "stdio", dbPath: config.dbPath });

  process.on("SIGINT", () => {
    server
      .close()
      .catch((error: unknown) => logger.warn("close failed", errorFields(error)))
      .finally(() => {
        closeStore();
        process.exit(0);
      });
  });
}

// ── HTTP mode ───────────────────────────────────────────────────────────────

async function startHttp() {
  const { serve } = await import("@hono/node-server");
  const { createApp } = await import("./app.js");

  const { app, sessions } = createApp(config);

  // Evict idle MCP sessions every 5 minutes
  const sweeper = setInterval(() => sessions.sweep(), 5 * 60_000);
  sweeper.unref();

  const port = config.server.port;
  const server = serve({ fetch: app.fetch, port }, (info) => {
    logger.info("http server listening", {
      url: `http://localhost:${info.port}`,
      mcp: "POST /mcp",
      api: "/api/v1/users",
      health: "GET /health",
    });
  });

  process.on("SIGINT", () => {
    clearInterval(sweeper);
    sessions.closeAll();
    server.close(() => {
      closeStore();
      process.exit(0);
    });
  });
}
