import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { parseInput, ExpenseInput } from "../schemas.js";
import { findExpenses, importExpensesCsv, recordExpense } from "../service.js";
import { errorResult, jsonResult } from "./result.js";

export function registerExpenseTools(server: McpServer) {
  server.registerTool(
    "add_expense",
    {
      description:
        "Record a single expense in the ledger. The category is assigned automatically by matching the merchant and note against the configured keyword lists. Returns the stored expense with its category.",
      inputSchema: {
        date: z
          .string()
          .optional()
          .describe(
            "Date or date-time of the expense in ISO-8601 format (e.g. 2025-01-15 or 2025-01-15T09:30:00Z). Defaults to now."
          ),
        amount: z
          .number()
          .describe("Amount of the expense. Positive values are spending."),
        merchant: z.string().optional().describe("Merchant or payee name."),
        note: z.string().optional().describe("Free-text note about the expense."),
      },
    },
    async (args) => {
      try {
        const expense = recordExpense(parseInput(ExpenseInput, args));
        return jsonResult({ ok: true, category: expense.category, expense });
      } catch (error) {
        return errorResult(error);
      }
    }
  );

  server.registerTool(
    "list_expenses",
    {
      description:
        "List stored expenses, newest first. Optionally filter to one category. Use this to inspect individual transactions behind a total or forecast.",
      inputSchema: {
        category: z
          .string()
          .optional()
          .describe("Only return expenses in this category (exact, case-sensitive)."),
        limit: z
          .number()
          .int()
          .min(1)
          .max(1000)
          .optional()
          .describe("Maximum number of expenses to return. Defaults to 200."),
      },
      annotations: { readOnlyHint: true },
    },
    async ({ category, limit }) => {
      try {
        return jsonResult(findExpenses({ category, limit }));
      } catch (error) {
        return errorResult(error);
      }
    }
  );

  server.registerTool(
    "import_expenses_csv",
    {
      description:
        "Import expenses from CSV text. The first row must be a header; recognised columns are date or transaction_date, amount or value, and merchant or description. Each row is categorised on import. Returns the number of rows imported.",
      inputSchema: {
        csv: z.string().describe("Full CSV content including the header row."),
      },
    },
    async ({ csv }) => {
      try {
        return jsonResult(importExpensesCsv(csv));
      } catch (error) {
        return errorResult(error);
      }
    }
  );
}
