// ── Analysis Engine ──────────────────────────────────────────────────
// Barrel export for all analysis modules.
// Pure functions only: no MCP, HTTP or storage dependencies.

export {
  createKeywordIndex,
  categoryFor,
  withCategoryKeywords,
  parseKeywordList,
  keywordMap,
  normalizeCategory,
  DEFAULT_KEYWORDS,
  DEFAULT_FALLBACK_CATEGORY,
  type KeywordIndex,
  type CategoryKeywords,
} from "./keywords.js";

export {
  categorize,
  matchText,
  type CategorizableText,
} from "./categorizer.js";

export {
  periodOf,
  parseTimestamp,
  periodKey,
  parsePeriodKey,
  comparePeriods,
  nextPeriod,
  densifyPeriods,
  type Period,
  type BucketedTimestamp,
} from "./periods.js";

export {
  aggregateByCategory,
  totalsByCategory,
  monthlyTotals,
  type Transaction,
  type SeriesPoint,
  type CategorySeries,
  type AggregationResult,
  type AggregationOptions,
  type CategoryTotal,
  type MonthTotal,
} from "./aggregation.js";

export {
  fitTrend,
  forecastSeries,
  forecastByCategory,
  type TrendLine,
} from "./forecasting.js";

export {
  evaluateBudgetAlerts,
  type Alert,
  type Budgets,
} from "./alerts.js";

export {
  buildSummary,
  categoryBreakdown,
  type SummaryInput,
  type SummaryOptions,
  type SpendingSummary,
  type CategoryBreakdown,
} from "./summary.js";
