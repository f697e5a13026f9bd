import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { allBudgets, updateBudget } from "../service.js";
import { errorResult, jsonResult } from "./result.js";

export function registerBudgetTools(server: McpServer) {
  server.registerTool(
    "set_budget",
    {
      description:
        "Set the monthly budget ceiling for a category. Replaces any previous budget for that category. Budgets are compared against next month's forecast to raise alerts.",
      inputSchema: {
        category: z.string().min(1).describe("Category name, case-sensitive."),
        amount: z.number().nonnegative().describe("Monthly budget amount."),
      },
    },
    async ({ category, amount }) => {
      try {
        return jsonResult({ ok: true, ...updateBudget(category, amount) });
      } catch (error) {
        return errorResult(error);
      }
    }
  );

  server.registerTool(
    "get_budgets",
    {
      description: "Get every configured category budget.",
      annotations: { readOnlyHint: true },
    },
    async () => {
      try {
        return jsonResult(allBudgets());
      } catch (error) {
        return errorResult(error);
      }
    }
  );
}
