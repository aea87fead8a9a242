/**
 * Folds trial results into the final report.
 *
 * Results are grouped by (method, instrument, parameters). Failed and
 * timed-out trials stay listed under their group but never feed the numbers.
 *
 * @module
 */

import { formatParams } from "./loader.ts";
import {
  SCHEMA_VERSION,
  type OutlierPolicy,
  type ParamAssignment,
  type ReportGroup,
  type RunReport,
  type SummaryStats,
  type TrialResult,
} from "./schema.ts";
import { calculateStats, findOutliers } from "./stats.ts";

/**
 * Options for building a report.
 */
export interface AggregateOpts {
  benchmark: string;
  dryRun: boolean;
  outlierPolicy: OutlierPolicy;
  results: readonly TrialResult[];
  warnings: readonly string[];
}

/**
 * Group key of a trial, e.g. "runtime:concat[size=10]".
 */
export function groupKey(method: string, instrument: string, params: ParamAssignment): string {
  const formatted = formatParams(params);
  return `${instrument}:${method}${formatted ? `[${formatted}]` : ""}`;
}

function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null) {
    Object.freeze(value);
    for (const key of Object.keys(value)) {
      const child: unknown = Reflect.get(value, key);
      deepFreeze(child);
    }
  }
  return value;
}

function summarize(
  results: readonly TrialResult[],
  policy: OutlierPolicy,
): { stats: SummaryStats | null; outliers: number; trimmed: boolean; unit: string | null } {
  const measurements = results
    .filter((result) => result.state === "SUCCESS")
    .flatMap((result) => result.measurements);
  if (measurements.length === 0) {
    return { stats: null, outliers: 0, trimmed: false, unit: null };
  }

  const unit = measurements[0].unit;
  const values = measurements.map((m) => m.value / m.weight);
  if (policy === "none") {
    return { stats: calculateStats(values), outliers: 0, trimmed: false, unit };
  }

  const outliers = findOutliers(values);
  if (policy === "trim" && outliers.size > 0) {
    const kept = values.filter((_, index) => !outliers.has(index));
    return { stats: calculateStats(kept), outliers: outliers.size, trimmed: true, unit };
  }
  return { stats: calculateStats(values), outliers: outliers.size, trimmed: false, unit };
}

/**
 * Build the immutable run report.
 */
export function aggregate(opts: AggregateOpts): RunReport {
  const ordered = [...opts.results].sort((a, b) => a.trialId - b.trialId);
  const grouped = new Map<string, TrialResult[]>();
  for (const result of ordered) {
    const key = groupKey(result.method, result.instrument, result.params);
    const members = grouped.get(key) ?? [];
    members.push(result);
    grouped.set(key, members);
  }

  const groups: ReportGroup[] = [];
  for (const [key, members] of grouped) {
    const [first] = members;
    groups.push({
      key,
      method: first.method,
      instrument: first.instrument,
      params: first.params,
      ...summarize(members, opts.outlierPolicy),
      partialWarmup: members.some((member) => member.partialWarmup),
      trials: members.map((member) => ({
        trialId: member.trialId,
        vm: member.vm,
        state: member.state,
        ...(member.reason === undefined ? {} : { reason: member.reason }),
        partialWarmup: member.partialWarmup,
      })),
    });
  }

  return deepFreeze({
    schemaVersion: SCHEMA_VERSION,
    benchmark: opts.benchmark,
    dryRun: opts.dryRun,
    groups,
    trials: ordered,
    warnings: [...opts.warnings],
  });
}
