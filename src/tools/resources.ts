import { ResourceTemplate, type McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { report } from "../dashboard.js";
import { DEFAULT_CATEGORIES } from "../store/store.js";
import type { ToolContext } from "./result.js";

export function registerResources(server: McpServer, context: ToolContext) {
  server.registerResource(
    "user-report",
    new ResourceTemplate("finance://users/{userId}/report", { list: undefined }),
    {
      description:
        "Report snapshot for the current period: spending summary, budget alerts, health score and insights",
      mimeType: "application/json",
    },
    (uri, variables) => {
      const raw = variables.userId;
      const userId = Array.isArray(raw) ? raw[0] : raw;
      if (!userId) {
        throw new Error(`Resource ${uri.href} is missing a user id`);
      }
      const snapshot = report({ userId, mode: context.defaultWindow });
      return {
        contents: [
          {
            uri: uri.href,
            mimeType: "application/json",
            text: JSON.stringify(snapshot, null, 2),
          },
        ],
      };
    }
  );

  server.registerResource(
    "default-categories",
    "finance://categories/defaults",
    {
      description: "Category labels offered to new users",
      mimeType: "application/json",
    },
    (uri) => ({
      contents: [
        {
          uri: uri.href,
          mimeType: "application/json",
          text: JSON.stringify(DEFAULT_CATEGORIES, null, 2),
        },
      ],
    })
  );
}
