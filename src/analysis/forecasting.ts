// ── Trend Forecasting ───────────────────────────────────────────────
// Ordinary least squares over sequential indices, projected forward.
// Gaps between months are not weighted: x is the position in the series.

import type { CategorySeries } from "./aggregation.js";

export interface TrendLine {
  slope: number;
  intercept: number;
  /** True when the regression denominator is zero (fewer than two points) */
  degenerate: boolean;
  mean: number;
}

/**
 * Fit y = intercept + slope·x with x = 1..n.
 */
export function fitTrend(values: readonly number[]): TrendLine {
  const n = values.length;
  if (n === 0) {
    return { slope: 0, intercept: 0, degenerate: true, mean: 0 };
  }

  let sumX = 0;
  let sumY = 0;
  let sumXY = 0;
  let sumXX = 0;

  for (let i = 0; i < n; i++) {
    const x = i + 1;
    const y = values[i]!;
    sumX += x;
    sumY += y;
    sumXY += x * y;
    sumXX += x * x;
  }

  const mean = sumY / n;
  const denominator = n * sumXX - sumX * sumX;
  if (denominator === 0) {
    return { slope: 0, intercept: mean, degenerate: true, mean };
  }

  const slope = (n * sumXY - sumX * sumY) / denominator;
  const intercept = (sumY - slope * sumX) / n;
  return { slope, intercept, degenerate: false, mean };
}

/**
 * Forecast the next `horizon` values of a series sorted by period.
 *
 * An empty series forecasts zeros. A degenerate fit forecasts the mean.
 * Values are clamped to zero and rounded to cents.
 */
export function forecastSeries(
  series: CategorySeries,
  horizon: number,
): number[] {
  if (!Number.isInteger(horizon) || horizon < 1) {
    throw new RangeError(`Forecast horizon must be a positive integer, got ${horizon}`);
  }

  if (series.length === 0) {
    return new Array<number>(horizon).fill(0);
  }

  const n = series.length;
  const trend = fitTrend(series.map((p) => p.amount));

  const predictions: number[] = [];
  for (let k = 1; k <= horizon; k++) {
    const y = trend.degenerate ? trend.mean : trend.intercept + trend.slope * (n + k);
    predictions.push(clampAndRound(y));
  }
  return predictions;
}

/** Forecast every category series with the same horizon. */
export function forecastByCategory(
  series: ReadonlyMap<string, CategorySeries>,
  horizon: number,
): Record<string, number[]> {
  const out: Record<string, number[]> = {};
  for (const [category, points] of series) {
    out[category] = forecastSeries(points, horizon);
  }
  return out;
}

// ── Helpers ─────────────────────────────────────────────────────────

function clampAndRound(y: number): number {
  if (!Number.isFinite(y) || y < 0) return 0;
  return Math.round(y * 100) / 100;
}
