// ── Series Aggregation ──────────────────────────────────────────────
// Groups transactions by category + calendar month and sums amounts.

import { categorize, type CategorizableText } from "./categorizer.js";
import type { KeywordIndex } from "./keywords.js";
import { densifyPeriods, periodKey, periodOf } from "./periods.js";

export interface Transaction extends CategorizableText {
  /** ISO-8601 date or date-time. Unreadable values count as "now". */
  timestamp?: string | null;
  amount: number; // signed
}

export interface SeriesPoint {
  period: string; // "YYYY-MM"
  amount: number;
}

/** Sorted ascending by period. Months without transactions are absent. */
export type CategorySeries = SeriesPoint[];

export interface AggregationResult {
  series: Map<string, CategorySeries>;
  /** Transactions whose timestamp was replaced by the current time */
  substitutedTimestamps: number;
}

export interface AggregationOptions {
  /** Instant used for unreadable timestamps (default: current time) */
  now?: Date;
}

export interface CategoryTotal {
  category: string;
  value: number;
}

export interface MonthTotal {
  month: string; // "YYYY-MM"
  total: number;
}

/**
 * Build one monthly series per category.
 *
 * Every transaction lands in exactly one (category, month) cell, so the
 * sum over all series equals the sum of all amounts.
 */
export function aggregateByCategory(
  transactions: Iterable<Transaction>,
  index: KeywordIndex,
  options: AggregationOptions = {},
): AggregationResult {
  const now = options.now ?? new Date();
  const categoryMonths = new Map<string, Map<string, number>>();
  let substitutedTimestamps = 0;

  for (const tx of transactions) {
    const category = categorize(tx, index);
    const bucket = periodOf(tx.timestamp, now);
    if (bucket.substituted) substitutedTimestamps++;
    const month = periodKey(bucket.period);

    let monthMap = categoryMonths.get(category);
    if (!monthMap) {
      monthMap = new Map<string, number>();
      categoryMonths.set(category, monthMap);
    }
    monthMap.set(month, (monthMap.get(month) ?? 0) + tx.amount);
  }

  const series = new Map<string, CategorySeries>();
  for (const [category, monthMap] of categoryMonths) {
    series.set(category, toSortedSeries(monthMap));
  }

  return { series, substitutedTimestamps };
}

/** Per-category totals, largest first. */
export function totalsByCategory(
  series: ReadonlyMap<string, CategorySeries>,
): CategoryTotal[] {
  const totals: CategoryTotal[] = [];
  for (const [category, points] of series) {
    const sum = points.reduce((s, p) => s + p.amount, 0);
    totals.push({ category, value: round(sum) });
  }
  totals.sort(
    (a, b) => b.value - a.value || a.category.localeCompare(b.category),
  );
  return totals;
}

/** Chronological monthly totals across every category. */
export function monthlyTotals(
  transactions: Iterable<Transaction>,
  options: AggregationOptions & { fillGaps?: boolean } = {},
): MonthTotal[] {
  const now = options.now ?? new Date();
  const months = new Map<string, number>();
  for (const tx of transactions) {
    const month = periodKey(periodOf(tx.timestamp, now).period);
    months.set(month, (months.get(month) ?? 0) + tx.amount);
  }

  let points = toSortedSeries(months);
  if (options.fillGaps) {
    points = densifyPeriods(points, (period) => ({ period, amount: 0 }));
  }
  return points.map((p) => ({ month: p.period, total: round(p.amount) }));
}

// ── Helpers ─────────────────────────────────────────────────────────

function toSortedSeries(monthMap: Map<string, number>): CategorySeries {
  const points: CategorySeries = [];
  for (const [period, amount] of monthMap) {
    points.push({ period, amount });
  }
  points.sort((a, b) => a.period.localeCompare(b.period));
  return points;
}

function round(n: number): number {
  return Math.round(n * 100) / 100;
}
