import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";

const userIdArg = { userId: z.string().describe("The user's id, as returned by sign_in.") };

export function registerPrompts(server: McpServer) {
  server.registerPrompt(
    "monthly-review",
    {
      description:
        "Monthly financial review covering cash flow, spending by category, budget alerts and the health score",
      argsSchema: userIdArg,
    },
    ({ userId }) => ({
      messages: [
        {
          role: "user" as const,
          content: {
            type: "text" as const,
            text: `Please give me a monthly financial review for user ${userId}. Use these tools in order:\n\n1. **get_spending_summary** - Show income vs expenses for this month and the net savings\n2. **check_budgets** - List any categories over their budget\n3. **get_financial_health_score** - Show the overall score and which factors raised or lowered it\n4. **get_insights** - Collect the suggested tips\n\nFormat the review with these sections:\n- **Cash Flow**: Income, expenses and net savings\n- **Spending Breakdown**: Top categories with their share of spending\n- **Budget Alerts**: Each exceeded budget with the amount over\n- **Health Score**: The score with its factor breakdown\n- **Recommendations**: 3-5 specific steps for next month`,
          },
        },
      ],
    })
  );

  server.registerPrompt(
    "budget-check",
    {
      description:
        "Check the current month's budgets, flag exceeded categories and suggest adjustments",
      argsSchema: userIdArg,
    },
    ({ userId }) => ({
      messages: [
        {
          role: "user" as const,
          content: {
            type: "text" as const,
            text: `Please check budget adherence this month for user ${userId}. Use these tools:\n\n1. **get_budgets** - Get the limits currently in force\n2. **get_spending_summary** - Get category-level spending for the month\n3. **check_budgets** - Find the categories over their limit and the percentage used of each\n\nProvide a report with:\n- **Budget Status**: For each budgeted category, the limit, amount spent and percentage used\n- **Over-Budget Alerts**: Categories over their limit, largest overrun first\n- **Pace**: Based on the day of the month, which categories are likely to finish over budget\n- **Recommendations**: Adjustments for the rest of the month`,
          },
        },
      ],
    })
  );
}
