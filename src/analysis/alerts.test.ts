import { describe, expect, test } from "vitest";
import type { CategorySeries } from "./aggregation.js";
import { evaluateBudgetAlerts } from "./alerts.js";

// Forecasts 120 for the next month
const food: CategorySeries = [
  { period: "2025-01", amount: 100 },
  { period: "2025-02", amount: 110 },
];

describe("evaluateBudgetAlerts", () => {
  test("alerts when the forecast exceeds the budget", () => {
    const alerts = evaluateBudgetAlerts(new Map([["Food", food]]), new Map([["Food", 100]]));
    expect(alerts).toEqual([{ category: "Food", predicted: 120, budget: 100 }]);
  });

  test("stays quiet when the forecast is within budget", () => {
    expect(evaluateBudgetAlerts(new Map([["Food", food]]), new Map([["Food", 150]]))).toEqual([]);
  });

  test("does not alert when the forecast equals the budget", () => {
    expect(evaluateBudgetAlerts(new Map([["Food", food]]), new Map([["Food", 120]]))).toEqual([]);
  });

  test("ignores categories without a budget", () => {
    expect(evaluateBudgetAlerts(new Map([["Food", food]]), new Map())).toEqual([]);
  });

  test("ignores budgets without a series", () => {
    expect(evaluateBudgetAlerts(new Map(), new Map([["Rent", 0]]))).toEqual([]);
  });

  test("matches budget keys exactly", () => {
    expect(evaluateBudgetAlerts(new Map([["Food", food]]), new Map([["food", 1]]))).toEqual([]);
  });

  test("reports every breached category", () => {
    const alerts = evaluateBudgetAlerts(
      new Map([
        ["Food", food],
        ["Rent", [{ period: "2025-02", amount: 900 }]],
        ["Bills", [{ period: "2025-02", amount: 20 }]],
      ]),
      new Map([
        ["Food", 100],
        ["Rent", 800],
        ["Bills", 50],
      ]),
    );
    expect(alerts).toHaveLength(2);
    expect(alerts).toContainEqual({ category: "Food", predicted: 120, budget: 100 });
    expect(alerts).toContainEqual({ category: "Rent", predicted: 900, budget: 800 });
  });
});
