/**
 * Statistical calculation functions for benchmark results.
 * Pure functions with no Effection dependencies.
 *
 * @module
 */

import type { SummaryStats } from "./schema.ts";

/**
 * Calculate summary statistics from per-rep values.
 *
 * @param values - Per-rep values, in the measurement's unit
 * @returns Computed statistics including mean, min, max, stdDev, and percentiles
 * @throws Error if values array is empty
 */
export function calculateStats(values: readonly number[]): SummaryStats {
  if (values.length === 0) {
    throw new Error("Cannot calculate stats from empty array");
  }

  const sorted = [...values].sort((a, b) => a - b);
  const sum = values.reduce((a, b) => a + b, 0);
  const mean = sum / values.length;
  const variance =
    values.reduce((acc, v) => acc + (v - mean) ** 2, 0) / values.length;

  return {
    count: values.length,
    mean,
    min: sorted[0],
    max: sorted[sorted.length - 1],
    stdDev: Math.sqrt(variance),
    p50: percentile(sorted, 50),
    p95: percentile(sorted, 95),
    p99: percentile(sorted, 99),
  };
}

/**
 * Calculate the p-th percentile from a sorted array (nearest rank).
 *
 * @param sorted - Pre-sorted array of values (ascending)
 * @param p - Percentile to calculate (0-100)
 * @throws Error if sorted array is empty
 */
export function percentile(sorted: readonly number[], p: number): number {
  if (sorted.length === 0) {
    throw new Error("Cannot calculate percentile from empty array");
  }

  const index = Math.ceil((p / 100) * sorted.length) - 1;
  return sorted[Math.max(0, index)];
}

/**
 * Indices of values outside Tukey's fences (1.5 IQR beyond the quartiles).
 * Fewer than four values never have outliers.
 */
export function findOutliers(values: readonly number[], k = 1.5): Set<number> {
  const outliers = new Set<number>();
  if (values.length < 4) {
    return outliers;
  }

  const sorted = [...values].sort((a, b) => a - b);
  const q1 = percentile(sorted, 25);
  const q3 = percentile(sorted, 75);
  const iqr = q3 - q1;
  const low = q1 - k * iqr;
  const high = q3 + k * iqr;

  values.forEach((value, index) => {
    if (value < low || value > high) {
      outliers.add(index);
    }
  });
  return outliers;
}
