/**
 * Trial enumeration and the top-level trial loop.
 *
 * @module
 */

import { all, type Operation } from "effection";
import type { RunEvent } from "./events.ts";
import type { InstrumentedMethod } from "./instruments/mod.ts";
import { parameterCombinations } from "./loader.ts";
import type { ParamValue, TrialResult, VmConfig } from "./schema.ts";
import { runTrial, trialLabel, type Trial, type TrialOpts } from "./trial.ts";
import type { WorkerPool } from "./workers/pool.ts";

/**
 * Build the trial list: every instrumented method on every VM with every
 * parameter assignment. Ids start at 1 in enumeration order.
 */
export function enumerateTrials(
  methods: readonly InstrumentedMethod[],
  vms: readonly VmConfig[],
  params: Readonly<Record<string, readonly ParamValue[]>>,
): Trial[] {
  const combinations = parameterCombinations(params);
  const trials: Trial[] = [];
  for (const instrumented of methods) {
    for (const vm of vms) {
      for (const assignment of combinations) {
        trials.push({ id: trials.length + 1, instrumented, vm, params: assignment, state: "PENDING" });
      }
    }
  }
  return trials;
}

/**
 * Scheduler options.
 */
export interface SchedulerOpts extends TrialOpts {
  /** Trials running at the same time */
  parallelism: number;
}

/**
 * Run every trial, at most `parallelism` at a time.
 *
 * @returns one result per trial, ordered by trial id
 */
export function* runTrials(
  trials: readonly Trial[],
  pool: WorkerPool,
  opts: SchedulerOpts,
  emit: (event: RunEvent) => void,
): Operation<TrialResult[]> {
  const results: TrialResult[] = [];
  const total = trials.length;
  let next = 0;

  function* runner(): Operation<void> {
    while (next < total) {
      const trial = trials[next++];
      const label = trialLabel(trial);
      emit({ type: "trial-started", trialId: trial.id, label, total });
      const result = yield* runTrial(trial, pool, opts);
      results.push(result);
      emit({ type: "trial-finished", result, label, completed: results.length, total });
    }
  }

  const runners = Math.max(1, Math.min(opts.parallelism, total));
  yield* all(Array.from({ length: runners }, () => runner()));

  return results.sort((a, b) => a.trialId - b.trialId);
}
