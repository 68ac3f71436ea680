import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { logger } from "../logger.js";
import { createMcpServer } from "./server.js";
import { SessionRegistry } from "./sessions.js";

let registry: SessionRegistry;

beforeEach(() => {
  logger.configure({ level: "error" });
  registry = new SessionRegistry(() => createMcpServer({ defaultWindow: "month" }), 1_000);
});

afterEach(() => {
  registry.closeAll();
});

describe("SessionRegistry", () => {
  test("hands back an opened session by id", async () => {
    const { id, session } = await registry.open(0);

    expect(registry.get(id, 500)).toBe(session);
    expect(session.lastAccess).toBe(500);
    expect(registry.get("unknown")).toBeUndefined();
  });

  test("evicts only sessions idle past the limit", async () => {
    const stale = await registry.open(0);
    const fresh = await registry.open(900);

    expect(registry.sweep(1_500)).toBe(1);
    expect(registry.get(stale.id)).toBeUndefined();
    expect(registry.get(fresh.id)).toBe(fresh.session);
    expect(registry.size).toBe(1);
  });
});
