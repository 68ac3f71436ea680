import { LATEST_PROTOCOL_VERSION } from "@modelcontextprotocol/sdk/types.js";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { z } from "zod";
import { createApp, type AppConfig } from "./app.js";
import { logger } from "./logger.js";
import { closeStore, initStore } from "./store/store.js";

const config: AppConfig = {
  server: { port: 0, transport: "http", corsOrigins: ["http://localhost:5173"] },
  rateLimit: { rpm: 1000 },
  defaultWindow: "month",
};

const initialize = {
  jsonrpc: "2.0",
  id: 1,
  method: "initialize",
  params: {
    protocolVersion: LATEST_PROTOCOL_VERSION,
    capabilities: {},
    clientInfo: { name: "test-client", version: "1.0.0" },
  },
};

let handle: ReturnType<typeof createApp>;

beforeEach(() => {
  logger.configure({ level: "error" });
  initStore(":memory:");
  handle = createApp(config);
});

afterEach(() => {
  handle.sessions.closeAll();
  closeStore();
});

function postMcp(body: unknown, sessionId?: string) {
  return handle.app.request("/mcp", {
    method: "POST",
    body: JSON.stringify(body),
    headers: {
      "Content-Type": "application/json",
      ...(sessionId ? { "mcp-session-id": sessionId } : {}),
    },
  });
}

describe("GET /health", () => {
  test("reports the server name", async () => {
    const res = await handle.app.request("/health");

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ status: "ok", server: "budget-health", version: "0.1.0" });
  });
});

describe("POST /mcp", () => {
  test("opens a session on initialize and reuses it afterwards", async () => {
    const init = await postMcp(initialize);
    const sessionId = init.headers.get("mcp-session-id") ?? "";

    expect(init.status).toBe(200);
    expect(sessionId).not.toBe("");
    expect(await init.json()).toMatchObject({
      jsonrpc: "2.0",
      id: 1,
      result: { serverInfo: { name: "budget-health", version: "0.1.0" } },
    });

    const initialized = await postMcp({ jsonrpc: "2.0", method: "notifications/initialized" }, sessionId);
    expect(initialized.status).toBe(202);

    const list = await postMcp({ jsonrpc: "2.0", id: 2, method: "tools/list" }, sessionId);
    const body = z
      .object({ result: z.object({ tools: z.array(z.object({ name: z.string() })) }) })
      .parse(await list.json());

    expect(list.headers.get("mcp-session-id")).toBeNull();
    expect(body.result.tools.map((tool) => tool.name)).toContain("get_financial_health_score");
    expect(handle.sessions.size).toBe(1);
  });

  test("answers malformed JSON with a parse error", async () => {
    const res = await handle.app.request("/mcp", { method: "POST", body: "{" });

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      jsonrpc: "2.0",
      id: null,
      error: { code: -32700, message: "Parse error" },
    });
  });

  test("rejects JSON that is not a JSON-RPC message", async () => {
    const res = await postMcp({ hello: "world" });

    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({ error: { code: -32600 } });
    expect(handle.sessions.size).toBe(0);
  });
});

describe("rate limiting", () => {
  test("throttles /api once the per-minute limit is spent", async () => {
    const { app, sessions } = createApp({ ...config, rateLimit: { rpm: 2 } });

    expect((await app.request("/api/v1/health")).status).toBe(200);
    expect((await app.request("/api/v1/health")).status).toBe(200);
    const third = await app.request("/api/v1/health");

    expect(third.status).toBe(429);
    expect(await third.json()).toMatchObject({ error: "rate_limit_exceeded" });
    expect((await app.request("/health")).status).toBe(200);
    sessions.closeAll();
  });
});
