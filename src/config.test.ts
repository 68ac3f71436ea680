import { describe, expect, test } from "vitest";
import { loadConfig } from "./config.js";

describe("loadConfig", () => {
  test("falls back to defaults", () => {
    const config = loadConfig({}, []);
    expect(config).toEqual({
      server: { port: 3200, transport: "stdio", corsOrigins: ["http://localhost:5173"] },
      rateLimit: { rpm: 60 },
      dbPath: "finance.db",
      logLevel: "info",
      defaultWindow: "month",
    });
  });

  test("reads environment variables", () => {
    const config = loadConfig(
      {
        PORT: "8080",
        TRANSPORT: "http",
        CORS_ORIGINS: "https://a.example, https://b.example",
        RATE_LIMIT_RPM: "10",
        DB_PATH: "/tmp/ledger.db",
        LOG_LEVEL: "debug",
        DEFAULT_WINDOW: "trailing30",
      },
      [],
    );
    expect(config.server).toEqual({
      port: 8080,
      transport: "http",
      corsOrigins: ["https://a.example", "https://b.example"],
    });
    expect(config.rateLimit.rpm).toBe(10);
    expect(config.dbPath).toBe("/tmp/ledger.db");
    expect(config.logLevel).toBe("debug");
    expect(config.defaultWindow).toBe("trailing30");
  });

  test("lets --transport override TRANSPORT", () => {
    expect(loadConfig({ TRANSPORT: "stdio" }, ["--transport", "http"]).server.transport).toBe("http");
  });

  test("rejects unknown values instead of guessing", () => {
    expect(() => loadConfig({ LOG_LEVEL: "verbose" }, [])).toThrow(
      'Invalid environment variable LOG_LEVEL: expected one of debug, info, warn, error, got "verbose"',
    );
    expect(() => loadConfig({ PORT: "80.5" }, [])).toThrow("PORT");
    expect(() => loadConfig({}, ["--transport", "carrier-pigeon"])).toThrow("--transport");
  });
});
