/**
 * Timing primitives used inside the worker.
 *
 * @module
 */

import { call, type Operation } from "effection";
import type { ParamAssignment } from "../lib/schema.ts";
import type { TimedFn, ValueFn } from "./types.ts";

/**
 * Monotonic nanosecond clock.
 */
export interface Clock {
  now(): bigint;
}

/**
 * The process high-resolution clock.
 */
export const hrtime: Clock = {
  now: () => process.hrtime.bigint(),
};

/**
 * Smallest observable clock step in nanoseconds, from `reads` back-to-back
 * readings. A clock that never moves reports 1.
 */
export function timerGranularity(clock: Clock, reads = 1_000): number {
  let smallest = Infinity;
  let previous = clock.now();
  for (let i = 0; i < reads; i++) {
    const current = clock.now();
    const delta = Number(current - previous);
    if (delta > 0 && delta < smallest) {
      smallest = delta;
    }
    previous = current;
  }
  return Number.isFinite(smallest) ? smallest : 1;
}

/**
 * Invoke a timed method once with `reps` and return the elapsed nanoseconds.
 * An async method is timed until its promise settles.
 */
export function* runTimedLoop(
  fn: TimedFn,
  reps: number,
  params: ParamAssignment,
  clock: Clock,
): Operation<number> {
  const start = clock.now();
  const result = fn(reps, params);
  if (result instanceof Promise) {
    yield* call(() => result);
  }
  return Number(clock.now() - start);
}

/**
 * Invoke a single-shot method and return the value it reports.
 */
export function* invokeValue(fn: ValueFn, params: ParamAssignment): Operation<number> {
  return yield* call(async () => await fn(params));
}
