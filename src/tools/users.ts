import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { ensureUser, listCategories, requireUser } from "../store/store.js";
import { runTool, userIdParam } from "./result.js";

export function registerUserTools(server: McpServer) {
  server.registerTool(
    "sign_in",
    {
      description:
        "Sign in with a username, creating the user on first use. Returns the user record; pass its id as userId to every other tool. There is no password: this only separates one person's ledger from another's.",
      inputSchema: {
        username: z.string().describe("Username to sign in as, e.g. 'alice'."),
        displayName: z
          .string()
          .optional()
          .describe("Name to show for a new user. Ignored for existing users."),
      },
    },
    ({ username, displayName }) => runTool("sign_in", () => ensureUser(username, displayName))
  );

  server.registerTool(
    "get_categories",
    {
      description:
        "List the categories a user has recorded transactions or budgets in, followed by the default category set. Use this before adding a transaction or budget to reuse existing labels.",
      inputSchema: { userId: userIdParam },
      annotations: { readOnlyHint: true },
    },
    ({ userId }) =>
      runTool("get_categories", () => {
        requireUser(userId);
        return listCategories(userId);
      })
  );
}
