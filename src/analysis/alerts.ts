// ── Budget Alerts ───────────────────────────────────────────────────
// Compares each category's next-month forecast against its budget.

import type { CategorySeries } from "./aggregation.js";
import { forecastSeries } from "./forecasting.js";

/** Category → non-negative spending ceiling */
export type Budgets = ReadonlyMap<string, number>;

export interface Alert {
  category: string;
  predicted: number;
  budget: number;
}

/**
 * Evaluate budget breaches.
 *
 * Only categories that have both a series and a budget can alert. Alert
 * order is unspecified; callers that need an order must sort.
 */
export function evaluateBudgetAlerts(
  perCategorySeries: ReadonlyMap<string, CategorySeries>,
  budgets: Budgets,
): Alert[] {
  const alerts: Alert[] = [];

  for (const [category, series] of perCategorySeries) {
    const budget = budgets.get(category);
    if (budget === undefined) continue;

    const [predicted = 0] = forecastSeries(series, 1);
    if (predicted > budget) {
      alerts.push({ category, predicted, budget });
    }
  }

  return alerts;
}
