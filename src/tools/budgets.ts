import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { checkBudgets } from "../dashboard.js";
import { todayIso } from "../engine/window.js";
import { fetchBudgets, requireUser, setBudget } from "../store/store.js";
import { periodParams, runTool, userIdParam, type ToolContext } from "./result.js";

export function registerBudgetTools(server: McpServer, context: ToolContext) {
  server.registerTool(
    "set_budget",
    {
      description:
        "Set the monthly spending limit for a category. A new limit takes effect from effectiveFrom (default today) and does not change how earlier months are judged.",
      inputSchema: {
        userId: userIdParam,
        category: z.string().describe("Category the limit applies to, e.g. 'Food'."),
        limit: z.number().describe("Monthly limit as a positive amount, e.g. 500."),
        effectiveFrom: z
          .string()
          .optional()
          .describe("First day the limit applies, in YYYY-MM-DD format. Defaults to today."),
      },
    },
    ({ userId, category, limit, effectiveFrom }) =>
      runTool("set_budget", () =>
        setBudget(userId, { category, limit, ...(effectiveFrom ? { effectiveFrom } : {}) })
      )
  );

  server.registerTool(
    "get_budgets",
    {
      description:
        "List the budgets in force for a user on a given date, one per category. Use this to see the configured limits before checking them.",
      inputSchema: {
        userId: userIdParam,
        asOf: z
          .string()
          .optional()
          .describe("Date to read the limits at, in YYYY-MM-DD format. Defaults to today."),
      },
      annotations: { readOnlyHint: true },
    },
    ({ userId, asOf }) =>
      runTool("get_budgets", () => {
        requireUser(userId);
        return fetchBudgets(userId, asOf ?? todayIso());
      })
  );

  server.registerTool(
    "check_budgets",
    {
      description:
        "Compare a user's spending in a window against their budgets. Returns one alert per category whose spending exceeds its limit, largest overrun first (an empty list means every budget was kept), and the spent, remaining and percent-used figures of every budget.",
      inputSchema: periodParams,
      annotations: { readOnlyHint: true },
    },
    ({ userId, startDate, endDate }) =>
      runTool("check_budgets", () =>
        checkBudgets({ userId, start: startDate, end: endDate, mode: context.defaultWindow })
      )
  );
}
