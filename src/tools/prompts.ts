import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";

export function registerPrompts(server: McpServer) {
  server.registerPrompt(
    "monthly-review",
    {
      description:
        "Monthly spending review covering category totals, month-over-month movement, forecasts and budget alerts",
    },
    async () => ({
      messages: [
        {
          role: "user" as const,
          content: {
            type: "text" as const,
            text: "Please review my spending for the month. Use these tools in order:\n\n1. **get_spending_summary** - Get category totals, the monthly series, forecasts and alerts\n2. **get_category_breakdown** - Drill into the three largest categories\n3. **list_expenses** - Look at the individual expenses behind anything surprising\n\nFormat the review with the following sections:\n- **Where the money went**: Totals per category with their share of spending\n- **Month over month**: How the latest month compares with earlier ones\n- **Outlook**: Forecast for the next three months per category\n- **Budget alerts**: Categories forecast to exceed their budget\n- **Recommendations**: 3 specific steps to stay on budget next month",
          },
        },
      ],
    })
  );

  server.registerPrompt(
    "budget-check",
    {
      description:
        "Check which categories are forecast to break their budget next month and suggest adjustments",
    },
    async () => ({
      messages: [
        {
          role: "user" as const,
          content: {
            type: "text" as const,
            text: "Please check my budgets against next month's forecast. Use these tools:\n\n1. **get_budgets** - Get the configured budgets\n2. **get_budget_alerts** - Find categories forecast to exceed their budget\n3. **predict_spending** - See the forecast for every category\n\nProvide a report with:\n- **At risk**: Each alerted category with predicted amount, budget and the gap\n- **Unbudgeted spending**: Categories with significant forecasts but no budget\n- **Suggestions**: Budget levels or spending changes that would clear each alert",
          },
        },
      ],
    })
  );
}
