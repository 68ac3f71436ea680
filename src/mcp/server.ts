import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import {
  registerAnalysisTools,
  registerBudgetTools,
  registerPrompts,
  registerResources,
  registerTransactionTools,
  registerUserTools,
  type ToolContext,
} from "../tools/index.js";

export const SERVER_NAME = "budget-health";
export const SERVER_VERSION = "0.1.0";

/**
 * Create an MCP server with every tool, resource and prompt registered.
 */
export function createMcpServer(context: ToolContext): McpServer {
  const server = new McpServer({
    name: SERVER_NAME,
    version: SERVER_VERSION,
  });

  // Ledger and budget configuration
  registerUserTools(server);
  registerTransactionTools(server, context);
  registerBudgetTools(server, context);

  // Scoring, alerts and insights
  registerAnalysisTools(server, context);

  registerResources(server, context);
  registerPrompts(server);

  return server;
}
