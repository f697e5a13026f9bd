import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { allBudgets, currentKeywords, spendingSummary } from "../service.js";

function jsonContents(uri: URL, data: unknown) {
  return {
    contents: [
      {
        uri: uri.href,
        mimeType: "application/json",
        text: JSON.stringify(data, null, 2),
      },
    ],
  };
}

export function registerResources(server: McpServer) {
  server.registerResource(
    "summary",
    "ledger://summary",
    { description: "Spending summary with totals, monthly series, forecasts and budget alerts" },
    async (uri) => jsonContents(uri, spendingSummary())
  );

  server.registerResource(
    "keywords",
    "ledger://keywords",
    { description: "Category keyword lists in matching order" },
    async (uri) => jsonContents(uri, currentKeywords())
  );

  server.registerResource(
    "budgets",
    "ledger://budgets",
    { description: "Monthly budget per category" },
    async (uri) => jsonContents(uri, allBudgets())
  );
}
