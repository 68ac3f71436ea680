import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import type { WindowMode } from "../engine/window.js";
import { errorFields, logger } from "../logger.js";

/** Settings every tool module reads. */
export interface ToolContext {
  defaultWindow: WindowMode;
}

const log = logger.child({ component: "tools" });

export const userIdParam = z
  .string()
  .min(1)
  .describe("The user's id, as returned by sign_in.");

/** Optional window bounds shared by every period-based tool. */
export const periodParams = {
  userId: userIdParam,
  startDate: z
    .string()
    .optional()
    .describe(
      "First day of the evaluation window in YYYY-MM-DD format. Defaults to the start of the current month (or 30 days ago, depending on server configuration)."
    ),
  endDate: z
    .string()
    .optional()
    .describe("Last day of the evaluation window in YYYY-MM-DD format. Defaults to today or the end of the current month."),
};

export function jsonResult(data: unknown): CallToolResult {
  return {
    content: [{ type: "text" as const, text: JSON.stringify(data, null, 2) }],
  };
}

/**
 * Run a tool body and wrap its value as JSON text. Failures come back as
 * an error result the client can show, never as a thrown exception.
 */
export function runTool(tool: string, body: () => unknown): CallToolResult {
  try {
    const value = body();
    return typeof value === "string"
      ? { content: [{ type: "text" as const, text: value }] }
      : jsonResult(value);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    log.warn("tool failed", { tool, ...errorFields(error) });
    return {
      content: [{ type: "text" as const, text: `Error: ${message}` }],
      isError: true,
    };
  }
}
