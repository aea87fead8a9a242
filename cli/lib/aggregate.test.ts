import { describe, expect, it } from "vitest";
import { aggregate, groupKey } from "./aggregate.ts";
import type { Measurement, TrialResult, TrialState } from "./schema.ts";
import { calculateStats, findOutliers, percentile } from "./stats.ts";

function ns(value: number, weight = 1): Measurement {
  return { description: "runtime", value, unit: "ns", weight };
}

function result(
  trialId: number,
  method: string,
  state: TrialState,
  measurements: Measurement[] = [],
  extra: Partial<TrialResult> = {},
): TrialResult {
  return {
    trialId,
    method,
    instrument: "runtime",
    vm: "node",
    params: {},
    state,
    measurements,
    partialWarmup: false,
    reps: 1,
    gcEvents: 0,
    vmOptions: {},
    ...extra,
  };
}

describe("stats", () => {
  it("summarises values", () => {
    expect(calculateStats([4, 2, 6, 8])).toEqual({
      count: 4,
      mean: 5,
      min: 2,
      max: 8,
      stdDev: Math.sqrt(5),
      p50: 4,
      p95: 8,
      p99: 8,
    });
  });

  it("uses nearest-rank percentiles", () => {
    expect(percentile([10, 20, 30, 40, 50], 25)).toBe(20);
    expect(percentile([10, 20, 30, 40, 50], 0)).toBe(10);
  });

  it("refuses empty input", () => {
    expect(() => calculateStats([])).toThrow("Cannot calculate stats from empty array");
  });

  it("flags values outside the Tukey fences", () => {
    expect([...findOutliers([10, 11, 12, 13, 100])]).toEqual([4]);
    expect(findOutliers([1, 1000, 1]).size).toBe(0);
  });
});

describe("aggregate", () => {
  const base = { benchmark: "target", dryRun: false, warnings: [] };

  it("groups by method, instrument and parameters", () => {
    const report = aggregate({
      ...base,
      outlierPolicy: "none",
      results: [
        result(3, "b", "SUCCESS", [ns(30)]),
        result(1, "a", "SUCCESS", [ns(100, 10), ns(300, 10)]),
        result(2, "a", "SUCCESS", [ns(40, 2)], { vm: "other" }),
      ],
    });

    expect(report.groups.map((g) => g.key)).toEqual(["runtime:a", "runtime:b"]);
    expect(report.groups[0].stats?.mean).toBe(20);
    expect(report.groups[0].trials.map((t) => [t.trialId, t.vm])).toEqual([
      [1, "node"],
      [2, "other"],
    ]);
    expect(report.trials.map((t) => t.trialId)).toEqual([1, 2, 3]);
  });

  it("lists failed trials without counting them", () => {
    const report = aggregate({
      ...base,
      outlierPolicy: "flag",
      results: [
        result(1, "a", "SUCCESS", [ns(5)]),
        result(2, "a", "FAILED", [], { reason: "WorkerFailure: boom" }),
        result(3, "b", "TIMED_OUT", [], { reason: "Trial exceeded its 10ms deadline" }),
      ],
    });

    expect(report.groups[0].stats?.count).toBe(1);
    expect(report.groups[0].trials[1]).toEqual({
      trialId: 2,
      vm: "node",
      state: "FAILED",
      reason: "WorkerFailure: boom",
      partialWarmup: false,
    });
    expect(report.groups[1]).toMatchObject({ key: "runtime:b", stats: null, unit: null });
  });

  it("flags or trims outliers", () => {
    const measurements = [10, 11, 12, 13, 100].map((v) => ns(v));
    const flagged = aggregate({ ...base, outlierPolicy: "flag", results: [result(1, "a", "SUCCESS", measurements)] });
    const trimmed = aggregate({ ...base, outlierPolicy: "trim", results: [result(1, "a", "SUCCESS", measurements)] });

    expect(flagged.groups[0]).toMatchObject({ outliers: 1, trimmed: false });
    expect(flagged.groups[0].stats?.max).toBe(100);
    expect(trimmed.groups[0]).toMatchObject({ outliers: 1, trimmed: true });
    expect(trimmed.groups[0].stats?.max).toBe(13);
    expect(trimmed.groups[0].stats?.mean).toBe(11.5);
  });

  it("keys groups by parameters", () => {
    expect(groupKey("concat", "runtime", { size: 10, mode: "fast" })).toBe(
      "runtime:concat[mode=fast,size=10]",
    );
  });

  it("marks groups with a partial warmup", () => {
    const report = aggregate({
      ...base,
      outlierPolicy: "none",
      results: [result(1, "a", "SUCCESS", [ns(1)], { partialWarmup: true })],
    });

    expect(report.groups[0].partialWarmup).toBe(true);
  });

  it("returns a deeply frozen report", () => {
    const report = aggregate({
      ...base,
      outlierPolicy: "none",
      warnings: ["careful"],
      results: [result(1, "a", "SUCCESS", [ns(1)])],
    });

    expect(Object.isFrozen(report)).toBe(true);
    expect(Object.isFrozen(report.groups[0].stats)).toBe(true);
    expect(Object.isFrozen(report.trials[0].measurements)).toBe(true);
    expect(Object.isFrozen(report.warnings)).toBe(true);
  });
});
