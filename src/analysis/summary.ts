// ── Spending Summary ────────────────────────────────────────────────
// Assembles the report views from one snapshot of expenses, keywords
// and budgets. Everything is recomputed on each call.

import {
  aggregateByCategory,
  monthlyTotals,
  totalsByCategory,
  type CategorySeries,
  type CategoryTotal,
  type MonthTotal,
  type Transaction,
} from "./aggregation.js";
import { evaluateBudgetAlerts, type Alert, type Budgets } from "./alerts.js";
import { categorize } from "./categorizer.js";
import { forecastByCategory, forecastSeries } from "./forecasting.js";
import { keywordMap, type KeywordIndex } from "./keywords.js";

export interface SummaryInput<T extends Transaction = Transaction> {
  transactions: readonly T[];
  index: KeywordIndex;
  budgets: Budgets;
}

export interface SummaryOptions {
  /** Months to forecast per category (default: 3) */
  horizon?: number;
  /** Number of most recent transactions to include (default: 50) */
  recentLimit?: number;
  /** Zero-fill months without transactions in `monthSeries` */
  fillGaps?: boolean;
  /** Instant used for unreadable timestamps */
  now?: Date;
}

export interface SpendingSummary<T extends Transaction = Transaction> {
  totalsByCategory: CategoryTotal[];
  monthSeries: MonthTotal[];
  forecasts: Record<string, number[]>;
  /** Order is unspecified */
  alerts: Alert[];
  budgets: Record<string, number>;
  keywords: Record<string, string[]>;
  recent: Array<T & { category: string }>;
  substitutedTimestamps: number;
}

export interface CategoryBreakdown {
  category: string;
  total: number;
  series: CategorySeries;
  forecast: number[];
  budget: number | null;
  alert: Alert | null;
}

export function buildSummary<T extends Transaction>(
  input: SummaryInput<T>,
  options: SummaryOptions = {},
): SpendingSummary<T> {
  const horizon = options.horizon ?? 3;
  const recentLimit = options.recentLimit ?? 50;
  const { transactions, index, budgets } = input;

  const { series, substitutedTimestamps } = aggregateByCategory(
    transactions,
    index,
    { now: options.now },
  );

  const recent = [...transactions]
    .sort((a, b) => (b.timestamp ?? "").localeCompare(a.timestamp ?? ""))
    .slice(0, recentLimit)
    .map((tx) => ({ ...tx, category: categorize(tx, index) }));

  return {
    totalsByCategory: totalsByCategory(series),
    monthSeries: monthlyTotals(transactions, {
      now: options.now,
      fillGaps: options.fillGaps,
    }),
    forecasts: forecastByCategory(series, horizon),
    alerts: evaluateBudgetAlerts(series, budgets),
    budgets: Object.fromEntries(
      [...budgets].map(([category, amount]): [string, number] => [category, cents(amount)]),
    ),
    keywords: keywordMap(index),
    recent,
    substitutedTimestamps,
  };
}

/**
 * Drill into one category. Returns `undefined` when the category has no
 * transactions, no keyword entry and no budget.
 */
export function categoryBreakdown(
  input: SummaryInput,
  category: string,
  options: Pick<SummaryOptions, "horizon" | "now"> = {},
): CategoryBreakdown | undefined {
  const horizon = options.horizon ?? 3;
  const { series } = aggregateByCategory(input.transactions, input.index, {
    now: options.now,
  });

  const points = series.get(category);
  const budget = input.budgets.get(category);
  const configured = input.index.categories.some((c) => c.category === category);
  if (!points && budget === undefined && !configured) return undefined;

  const own = points ?? [];
  const single = new Map([[category, own]]);
  const [alert] = points ? evaluateBudgetAlerts(single, input.budgets) : [];

  return {
    category,
    total: cents(own.reduce((s, p) => s + p.amount, 0)),
    series: own,
    forecast: forecastSeries(own, horizon),
    budget: budget === undefined ? null : cents(budget),
    alert: alert ?? null,
  };
}

function cents(n: number): number {
  return Math.round(n * 100) / 100;
}
