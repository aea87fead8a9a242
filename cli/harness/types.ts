/**
 * Type definitions for benchmark modules and the worker harness.
 *
 * A benchmark module default-exports the result of {@link defineBenchmark}.
 *
 * @module
 */

import type { ParamAssignment, ParamValue } from "../lib/schema.ts";

/**
 * A timed benchmark method. Runs its workload `reps` times per call.
 */
export type TimedFn = (reps: number, params: ParamAssignment) => unknown;

/**
 * A benchmark method that returns the value to record.
 */
export type ValueFn = (params: ParamAssignment) => number | Promise<number>;

/**
 * One benchmark method definition. Methods are listed in an array, so two
 * entries may share a name; such overloads are rejected at setup.
 */
export type BenchmarkMethodDefinition =
  | {
      name: string;
      kind: "timed-loop";
      fn: TimedFn;
    }
  | {
      name: string;
      kind: "single-shot";
      /** Unit of the returned value (e.g. "bytes") */
      unit: string;
      /** Label for the recorded value, defaults to the method name */
      description?: string;
      fn: ValueFn;
    };

/**
 * A benchmark target.
 */
export interface BenchmarkDefinition {
  /** Target name, used in reports */
  name: string;
  /** Parameter name to the values to sweep */
  params?: Record<string, readonly ParamValue[]>;
  methods: readonly BenchmarkMethodDefinition[];
}

/**
 * Declare a benchmark target with full type checking.
 */
export function defineBenchmark(definition: BenchmarkDefinition): BenchmarkDefinition {
  return definition;
}
