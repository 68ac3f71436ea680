import type { WindowMode } from "./engine/window.js";
import type { LogLevel } from "./logger.js";

export interface Config {
  server: {
    port: number;
    transport: "stdio" | "http";
    corsOrigins: string[];
  };
  rateLimit: {
    rpm: number;
  };
  dbPath: string;
  logLevel: LogLevel;
  defaultWindow: WindowMode;
}

export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  argv: string[] = process.argv.slice(2),
): Config {
  return {
    server: {
      port: parsePositiveInt("PORT", env.PORT, 3200),
      transport: resolveTransport(env, argv),
      corsOrigins: (env.CORS_ORIGINS || "http://localhost:5173")
        .split(",")
        .map((origin) => origin.trim())
        .filter(Boolean),
    },
    rateLimit: {
      rpm: parsePositiveInt("RATE_LIMIT_RPM", env.RATE_LIMIT_RPM, 60),
    },
    dbPath: env.DB_PATH || "finance.db",
    logLevel: parseChoice("LOG_LEVEL", env.LOG_LEVEL, ["debug", "info", "warn", "error"], "info"),
    defaultWindow: parseChoice("DEFAULT_WINDOW", env.DEFAULT_WINDOW, ["month", "trailing30"], "month"),
  };
}

function resolveTransport(env: NodeJS.ProcessEnv, argv: string[]): "stdio" | "http" {
  // CLI flag takes precedence
  const transportIdx = argv.indexOf("--transport");
  if (transportIdx !== -1) {
    const val = argv[transportIdx + 1];
    if (val === "stdio" || val === "http") return val;
    throw new Error(`Invalid --transport value: ${val ?? "(missing)"}. Expected stdio or http.`);
  }

  // Then env var
  return parseChoice("TRANSPORT", env.TRANSPORT, ["stdio", "http"], "stdio");
}

function parsePositiveInt(key: string, raw: string | undefined, fallback: number): number {
  if (!raw) return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`Invalid environment variable ${key}: expected a positive integer, got "${raw}"`);
  }
  return value;
}

function parseChoice<T extends string>(
  key: string,
  raw: string | undefined,
  choices: readonly T[],
  fallback: T,
): T {
  if (!raw) return fallback;
  const match = choices.find((choice) => choice === raw);
  if (match === undefined) {
    throw new Error(
      `Invalid environment variable ${key}: expected one of ${choices.join(", ")}, got "${raw}"`,
    );
  }
  return match;
}
