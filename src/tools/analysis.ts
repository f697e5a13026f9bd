import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { budgetAlerts, categoryReport, predictSpending, spendingSummary } from "../service.js";
import { errorResult, jsonResult } from "./result.js";

const horizonSchema = z
  .number()
  .int()
  .min(1)
  .max(36)
  .optional()
  .describe("Number of future months to forecast. Defaults to 3.");

export function registerAnalysisTools(server: McpServer) {
  server.registerTool(
    "get_spending_summary",
    {
      description:
        "Full spending report: totals per category, the combined monthly spending series, a per-category forecast for the coming months, budget alerts, current budgets and keyword lists, and the most recent expenses. Use this for any overview question about where money is going or whether budgets are at risk.",
      inputSchema: {
        horizon: horizonSchema,
        fill_gaps: z
          .boolean()
          .optional()
          .describe("Include months with no expenses as zero in the monthly series."),
      },
      annotations: { readOnlyHint: true },
    },
    async ({ horizon, fill_gaps }) => {
      try {
        return jsonResult(spendingSummary({ horizon, fillGaps: fill_gaps }));
      } catch (error) {
        return errorResult(error);
      }
    }
  );

  server.registerTool(
    "get_category_breakdown",
    {
      description:
        "Monthly series, total, forecast, budget and alert status for a single category. Returns an error if the category has no expenses, keywords or budget.",
      inputSchema: {
        category: z.string().min(1).describe("Category name, case-sensitive."),
        horizon: horizonSchema,
      },
      annotations: { readOnlyHint: true },
    },
    async ({ category, horizon }) => {
      try {
        return jsonResult(categoryReport(category, horizon));
      } catch (error) {
        return errorResult(error);
      }
    }
  );

  server.registerTool(
    "predict_spending",
    {
      description:
        "Forecast spending per category for the coming months using a least-squares trend line over each category's monthly totals. Forecasts are never negative. Use this when the user asks how much they are likely to spend.",
      inputSchema: { horizon: horizonSchema },
      annotations: { readOnlyHint: true },
    },
    async ({ horizon }) => {
      try {
        return jsonResult(predictSpending(horizon));
      } catch (error) {
        return errorResult(error);
      }
    }
  );

  server.registerTool(
    "get_budget_alerts",
    {
      description:
        "List categories whose forecast for next month exceeds their budget. Each alert carries the predicted amount and the budget. Alert order carries no meaning.",
      annotations: { readOnlyHint: true },
    },
    async () => {
      try {
        return jsonResult(budgetAlerts());
      } catch (error) {
        return errorResult(error);
      }
    }
  );
}
