import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import {
  registerAnalysisTools,
  registerBudgetTools,
  registerExpenseTools,
  registerKeywordTools,
  registerPrompts,
  registerResources,
} from "../tools/index.js";

export const SERVER_NAME = "pocket-pilot";
export const SERVER_VERSION = "0.1.0";

/**
 * Create and configure a fully-loaded MCP server instance
 * with all tools, resources, and prompts registered.
 */
export function createMcpServer(): McpServer {
  const server = new McpServer({
    name: SERVER_NAME,
    version: SERVER_VERSION,
  });

  // Ledger tools: expenses, keywords, budgets
  registerExpenseTools(server);
  registerKeywordTools(server);
  registerBudgetTools(server);

  // Analysis tools: totals, forecasts, alerts
  registerAnalysisTools(server);

  // Resources: read-only data surfaces
  registerResources(server);

  // Prompts: canned analysis templates
  registerPrompts(server);

  return server;
}
