import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { healthScore, insights, spendingSummary, spendingTrends } from "../dashboard.js";
import { periodParams, runTool, userIdParam, type ToolContext } from "./result.js";

export function registerAnalysisTools(server: McpServer, context: ToolContext) {
  server.registerTool(
    "get_financial_health_score",
    {
      description:
        "Calculate a 0-100 financial health score for a window. 50 is neutral. The score combines savings rate (40%), budget adherence (30%), expense volatility (20%) and category diversity (10%); each factor's raw value and contribution is returned so the user can see what moved the score.",
      inputSchema: periodParams,
      annotations: { readOnlyHint: true },
    },
    ({ userId, startDate, endDate }) =>
      runTool("get_financial_health_score", () =>
        healthScore({ userId, start: startDate, end: endDate, mode: context.defaultWindow })
      )
  );

  server.registerTool(
    "get_insights",
    {
      description:
        "Get plain-language tips for a window: one per exceeded budget, then one about the weakest part of the health score. Use this when the user asks what to improve.",
      inputSchema: periodParams,
      annotations: { readOnlyHint: true },
    },
    ({ userId, startDate, endDate }) =>
      runTool("get_insights", () =>
        insights({ userId, start: startDate, end: endDate, mode: context.defaultWindow })
      )
  );

  server.registerTool(
    "get_spending_summary",
    {
      description:
        "Summarize income, expenses and net savings for a window, with a per-category breakdown of spending (amount, share of total, transaction count) and the average daily expense.",
      inputSchema: periodParams,
      annotations: { readOnlyHint: true },
    },
    ({ userId, startDate, endDate }) =>
      runTool("get_spending_summary", () =>
        spendingSummary({ userId, start: startDate, end: endDate, mode: context.defaultWindow })
      )
  );

  server.registerTool(
    "get_spending_trends",
    {
      description:
        "Chart-ready series over recent calendar months: monthly expense totals with a trend direction, the running cumulative savings balance, expenses per day of the week, and the health score of each month.",
      inputSchema: {
        userId: userIdParam,
        months: z
          .number()
          .int()
          .optional()
          .describe("Number of calendar months to cover, this one included (1-36). Defaults to 6."),
      },
      annotations: { readOnlyHint: true },
    },
    ({ userId, months }) =>
      runTool("get_spending_trends", () => spendingTrends(userId, months ?? 6))
  );
}
