import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { categorizeText, currentKeywords, replaceKeywords } from "../service.js";
import { errorResult, jsonResult } from "./result.js";

export function registerKeywordTools(server: McpServer) {
  server.registerTool(
    "get_keywords",
    {
      description:
        "Get the keyword lists used to categorise expenses, in matching order. A category matches when any of its keywords appears in the merchant or note. The fallback category has no keywords and catches everything else.",
      annotations: { readOnlyHint: true },
    },
    async () => {
      try {
        return jsonResult(currentKeywords());
      } catch (error) {
        return errorResult(error);
      }
    }
  );

  server.registerTool(
    "update_keywords",
    {
      description:
        "Replace the keyword list of one category (the new list fully overwrites the old one). New categories are added at the end of the matching order. Stored expenses are re-categorised against the updated lists.",
      inputSchema: {
        category: z.string().min(1).describe("Category name, case-sensitive."),
        keywords: z
          .union([z.string(), z.array(z.string())])
          .describe(
            "Keywords as a comma-separated string (e.g. 'gym,yoga') or an array. Matching is case-insensitive."
          ),
      },
    },
    async ({ category, keywords }) => {
      try {
        return jsonResult({ ok: true, ...replaceKeywords(category, keywords) });
      } catch (error) {
        return errorResult(error);
      }
    }
  );

  server.registerTool(
    "categorize_expense",
    {
      description:
        "Show which category a merchant and note would be assigned, without storing anything. Useful for testing keyword changes.",
      inputSchema: {
        merchant: z.string().optional().describe("Merchant or payee name."),
        note: z.string().optional().describe("Free-text note."),
      },
      annotations: { readOnlyHint: true },
    },
    async ({ merchant, note }) => {
      try {
        return jsonResult({ category: categorizeText(merchant, note) });
      } catch (error) {
        return errorResult(error);
      }
    }
  );
}
