import { describe, expect, test } from "vitest";
import type { Transaction } from "./aggregation.js";
import { createKeywordIndex, DEFAULT_KEYWORDS } from "./keywords.js";
import { buildSummary, categoryBreakdown, type SummaryInput } from "./summary.js";

const NOW = new Date(Date.UTC(2025, 4, 1));

const transactions: Transaction[] = [
  { timestamp: "2025-01-05", amount: 100, merchant: "Starbucks", note: null },
  { timestamp: "2025-02-07", amount: 110, merchant: "Cafe Mocha", note: null },
  { timestamp: "2025-02-10", amount: 40, merchant: "Uber", note: "airport" },
  { timestamp: "2025-04-01", amount: 1000, merchant: "Landlord", note: "April rent" },
];

const input: SummaryInput = {
  transactions,
  index: createKeywordIndex(DEFAULT_KEYWORDS),
  budgets: new Map([
    ["Food", 100],
    ["Rent", 2000],
  ]),
};

describe("buildSummary", () => {
  const summary = buildSummary(input, { now: NOW });

  test("totals per category, largest first", () => {
    expect(summary.totalsByCategory).toEqual([
      { category: "Rent", value: 1000 },
      { category: "Food", value: 210 },
      { category: "Transport", value: 40 },
    ]);
  });

  test("combined monthly series", () => {
    expect(summary.monthSeries).toEqual([
      { month: "2025-01", total: 100 },
      { month: "2025-02", total: 150 },
      { month: "2025-04", total: 1000 },
    ]);
  });

  test("forecasts three months per category by default", () => {
    expect(summary.forecasts).toEqual({
      Food: [120, 130, 140],
      Transport: [40, 40, 40],
      Rent: [1000, 1000, 1000],
    });
  });

  test("raises alerts only for breached budgets", () => {
    expect(summary.alerts).toEqual([{ category: "Food", predicted: 120, budget: 100 }]);
  });

  test("echoes budgets and keywords", () => {
    expect(summary.budgets).toEqual({ Food: 100, Rent: 2000 });
    expect(summary.keywords["Others"]).toEqual([]);
    expect(summary.keywords["Food"]).toContain("starbucks");
  });

  test("rounds budgets to cents", () => {
    const fractional = buildSummary(
      { ...input, budgets: new Map([["Transport", 75.456]]) },
      { now: NOW },
    );
    expect(fractional.budgets).toEqual({ Transport: 75.46 });
    expect(
      categoryBreakdown({ ...input, budgets: new Map([["Transport", 75.456]]) }, "Transport", {
        now: NOW,
      })?.budget,
    ).toBe(75.46);
  });

  test("lists recent transactions newest first with their category", () => {
    expect(summary.recent).toHaveLength(4);
    expect(summary.recent[0]).toEqual({ ...transactions[3], category: "Rent" });
    expect(summary.recent[3]!.category).toBe("Food");
    expect(summary.substitutedTimestamps).toBe(0);
  });

  test("honours horizon, recent limit and gap filling", () => {
    const custom = buildSummary(input, { now: NOW, horizon: 1, recentLimit: 2, fillGaps: true });
    expect(custom.forecasts["Food"]).toEqual([120]);
    expect(custom.recent.map((r) => r.category)).toEqual(["Rent", "Transport"]);
    expect(custom.monthSeries.map((m) => m.month)).toEqual([
      "2025-01",
      "2025-02",
      "2025-03",
      "2025-04",
    ]);
  });

  test("counts substituted timestamps", () => {
    const withBad = buildSummary(
      { ...input, transactions: [...transactions, { timestamp: "soon", amount: 5, merchant: "Uber" }] },
      { now: NOW },
    );
    expect(withBad.substitutedTimestamps).toBe(1);
    expect(withBad.monthSeries[withBad.monthSeries.length - 1]).toEqual({
      month: "2025-05",
      total: 5,
    });
  });
});

describe("categoryBreakdown", () => {
  test("describes a category with spending", () => {
    expect(categoryBreakdown(input, "Food", { now: NOW })).toEqual({
      category: "Food",
      total: 210,
      series: [
        { period: "2025-01", amount: 100 },
        { period: "2025-02", amount: 110 },
      ],
      forecast: [120, 130, 140],
      budget: 100,
      alert: { category: "Food", predicted: 120, budget: 100 },
    });
  });

  test("describes a configured category without spending", () => {
    expect(categoryBreakdown(input, "Salary", { now: NOW })).toEqual({
      category: "Salary",
      total: 0,
      series: [],
      forecast: [0, 0, 0],
      budget: null,
      alert: null,
    });
  });

  test("returns undefined for an unknown category", () => {
    expect(categoryBreakdown(input, "Pets", { now: NOW })).toBeUndefined();
  });
});
