// ── Ledger Service ──────────────────────────────────────────────────
// Request-level operations shared by the REST API and the MCP tools.
// Each call reads one snapshot from the store and hands it to the
// analysis engine.

import {
  buildSummary,
  categorize,
  categoryBreakdown,
  evaluateBudgetAlerts,
  aggregateByCategory,
  forecastByCategory,
  keywordMap,
  type Alert,
  type CategoryBreakdown,
  type SpendingSummary,
} from "./analysis/index.js";
import { getConfig } from "./config.js";
import { NotFoundError } from "./errors.js";
import { parseExpenseCsv } from "./ingest/csv.js";
import { log } from "./logger.js";
import { toExpenseRecord, type ExpenseInput } from "./schemas.js";
import {
  addExpense,
  addExpenses,
  getBudget,
  getBudgets,
  getKeywordIndex,
  listExpenses,
  loadSnapshot,
  setBudget,
  setCategoryKeywords,
  type StoredExpense,
} from "./store/ledger.js";

function fallbackCategory(): string {
  return getConfig().ledger.fallbackCategory;
}

export function recordExpense(input: ExpenseInput): StoredExpense {
  const index = getKeywordIndex(fallbackCategory());
  const stored = addExpense(toExpenseRecord(input), index);
  log.debug("expense recorded", { id: stored.id, category: stored.category });
  return stored;
}

export function importExpensesCsv(text: string): { imported: number } {
  const rows = parseExpenseCsv(text);
  const imported = addExpenses(rows, getKeywordIndex(fallbackCategory()));
  log.info("csv imported", { imported });
  return { imported };
}

export function findExpenses(options: { category?: string; limit?: number }): StoredExpense[] {
  return listExpenses(options);
}

export function categorizeText(merchant?: string | null, note?: string | null): string {
  return categorize({ merchant, note }, getKeywordIndex(fallbackCategory()));
}

export function currentKeywords(): Record<string, string[]> {
  return keywordMap(getKeywordIndex(fallbackCategory()));
}

export function replaceKeywords(
  category: string,
  keywords: string | string[],
): { category: string; keywords: string[]; recategorized: number } {
  const { index, recategorized } = setCategoryKeywords(category, keywords, fallbackCategory());
  const name = category.trim();
  return { category: name, keywords: keywordMap(index)[name] ?? [], recategorized };
}

export function updateBudget(category: string, amount: number): { category: string; amount: number } {
  const saved = setBudget(category, amount);
  log.info("budget set", saved);
  return saved;
}

export function allBudgets(): Record<string, number> {
  return Object.fromEntries(getBudgets());
}

export function budgetFor(category: string): { category: string; amount: number } {
  const amount = getBudget(category);
  if (amount === undefined) {
    throw new NotFoundError("Budget", category);
  }
  return { category: category.trim(), amount };
}

export function spendingSummary(
  options: { horizon?: number; fillGaps?: boolean } = {},
): SpendingSummary<StoredExpense> {
  const { ledger } = getConfig();
  const snapshot = loadSnapshot(ledger.fallbackCategory);
  const summary = buildSummary(snapshot, {
    horizon: options.horizon ?? ledger.forecastHorizon,
    recentLimit: ledger.recentLimit,
    fillGaps: options.fillGaps,
  });
  if (summary.substitutedTimestamps > 0) {
    log.warn("unreadable expense dates bucketed into the current month", {
      count: summary.substitutedTimestamps,
    });
  }
  return summary;
}

export function categoryReport(category: string, horizon?: number): CategoryBreakdown {
  const { ledger } = getConfig();
  const report = categoryBreakdown(loadSnapshot(ledger.fallbackCategory), category.trim(), {
    horizon: horizon ?? ledger.forecastHorizon,
  });
  if (!report) {
    throw new NotFoundError("Category", category);
  }
  return report;
}

export function predictSpending(horizon?: number): Record<string, number[]> {
  const { ledger } = getConfig();
  const snapshot = loadSnapshot(ledger.fallbackCategory);
  const { series } = aggregateByCategory(snapshot.transactions, snapshot.index);
  return forecastByCategory(series, horizon ?? ledger.forecastHorizon);
}

export function budgetAlerts(): Alert[] {
  const snapshot = loadSnapshot(fallbackCategory());
  const { series } = aggregateByCategory(snapshot.transactions, snapshot.index);
  return evaluateBudgetAlerts(series, snapshot.budgets);
}
