import crypto from "node:crypto";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { errorFields, logger } from "../logger.js";
import { HttpTransport } from "./transport.js";

export interface McpSession {
  server: McpServer;
  transport: HttpTransport;
  lastAccess: number;
}

const log = logger.child({ component: "mcp-sessions" });

/** In-memory MCP sessions for HTTP mode, evicted after a stretch of idleness. */
export class SessionRegistry {
  private readonly sessions = new Map<string, McpSession>();

  constructor(
    private readonly createServer: () => McpServer,
    private readonly idleMs = 30 * 60_000,
  ) {}

  get size(): number {
    return this.sessions.size;
  }

  /** The live session for `id`, marked as just used. */
  get(id: string, now = Date.now()): McpSession | undefined {
    const session = this.sessions.get(id);
    if (session) session.lastAccess = now;
    return session;
  }

  async open(now = Date.now()): Promise<{ id: string; session: McpSession }> {
    const id = crypto.randomUUID();
    const server = this.createServer();
    const transport = new HttpTransport();
    await server.connect(transport);

    const session: McpSession = { server, transport, lastAccess: now };
    this.sessions.set(id, session);
    log.debug("session opened", { sessionId: id });
    return { id, session };
  }

  /** Close sessions idle since before `now - idleMs`. Returns how many went. */
  sweep(now = Date.now()): number {
    const cutoff = now - this.idleMs;
    let evicted = 0;
    for (const [id, session] of this.sessions) {
      if (session.lastAccess < cutoff) {
        this.sessions.delete(id);
        this.shutdown(id, session);
        evicted++;
      }
    }
    if (evicted > 0) log.info("idle sessions evicted", { evicted, remaining: this.sessions.size });
    return evicted;
  }

  closeAll(): void {
    for (const [id, session] of this.sessions) this.shutdown(id, session);
    this.sessions.clear();
  }

  private shutdown(id: string, session: McpSession): void {
    session.server.close().catch((error: unknown) => {
      log.warn("session close failed", { sessionId: id, ...errorFields(error) });
    });
  }
}
