/**
 * Timer calibration and warmup for instruments that time loops.
 *
 * Each worker moves through GRANULARITY_PROBE, WARMUP and READY. The probe
 * scales the reps per timed loop until one loop takes comfortably longer
 * than the worker's timer resolution; warmup then discards loops until
 * timings settle. Readings taken after READY are the real measurements.
 *
 * @module
 */

import type { Operation } from "effection";
import { CalibrationFailure } from "./errors.ts";

/**
 * When warmup is considered done.
 * - `cv`: the trailing window's coefficient of variation is below the threshold
 * - `duration`: accumulated loop time reached `minWarmupNs`
 */
export type WarmupStrategy = "cv" | "duration";

/**
 * Calibration settings, resolved from instrument options.
 */
export interface CalibrationSettings {
  /** A timed loop must exceed this multiple of the timer granularity */
  granularityMargin: number;
  /** Lower bound for one timed loop regardless of granularity */
  minLoopNs: number;
  /** Probe loops allowed before giving up */
  maxProbeAttempts: number;
  warmupStrategy: WarmupStrategy;
  cvThreshold: number;
  windowSize: number;
  minWarmupNs: number;
  maxWarmupNs: number;
  maxWarmupLoops: number;
}

export const DEFAULT_CALIBRATION: CalibrationSettings = {
  granularityMargin: 100,
  minLoopNs: 1_000_000,
  maxProbeAttempts: 20,
  warmupStrategy: "cv",
  cvThreshold: 0.05,
  windowSize: 5,
  minWarmupNs: 0,
  maxWarmupNs: 10_000_000_000,
  maxWarmupLoops: 10_000,
};

/**
 * What calibration needs from a worker.
 */
export interface LoopRunner {
  /** Smallest increment the worker's timer can resolve, in nanoseconds */
  probeGranularity(): Operation<number>;
  /** Run one timed loop of `reps` reps and return its elapsed nanoseconds */
  runLoop(reps: number): Operation<number>;
}

export type CalibrationState = "GRANULARITY_PROBE" | "WARMUP" | "READY" | "ABORTED";

/**
 * Outcome of a completed calibration.
 */
export interface Calibration {
  reps: number;
  granularityNs: number;
  targetNs: number;
  warmupLoops: number;
  warmupNs: number;
  partialWarmup: boolean;
}

/**
 * Pick the rep count for the next probe loop.
 *
 * With a fixed per-rep cost the returned count always projects strictly
 * above `targetNs`. A zero reading means the timer could not see the loop
 * at all, so the count grows tenfold.
 */
export function nextRepCount(reps: number, elapsedNs: number, targetNs: number): number {
  if (elapsedNs <= 0) {
    return reps * 10;
  }
  const projected = Math.floor((reps * targetNs) / elapsedNs) + 1;
  return Math.max(reps * 2, projected);
}

/**
 * Population coefficient of variation. Infinite for an empty or zero-mean set.
 */
export function coefficientOfVariation(values: readonly number[]): number {
  if (values.length === 0) {
    return Number.POSITIVE_INFINITY;
  }
  const mean = values.reduce((a, b) => a + b, 0) / values.length;
  if (mean <= 0) {
    return Number.POSITIVE_INFINITY;
  }
  const variance = values.reduce((acc, v) => acc + (v - mean) ** 2, 0) / values.length;
  return Math.sqrt(variance) / mean;
}

function* probe(
  runner: LoopRunner,
  settings: CalibrationSettings,
  targetNs: number,
): Operation<number | undefined> {
  let reps = 1;
  for (let attempt = 0; attempt < settings.maxProbeAttempts; attempt++) {
    const elapsed = yield* runner.runLoop(reps);
    if (elapsed > targetNs) {
      return reps;
    }
    reps = nextRepCount(reps, elapsed, targetNs);
  }
  return undefined;
}

/**
 * Drive a worker from GRANULARITY_PROBE to READY.
 *
 * @throws CalibrationFailure if the rep scaling does not converge
 */
export function* calibrate(
  runner: LoopRunner,
  settings: CalibrationSettings,
): Operation<Calibration> {
  let state: CalibrationState = "GRANULARITY_PROBE";
  let granularityNs = 0;
  let targetNs = 0;
  let reps = 1;
  let warmupLoops = 0;
  let warmupNs = 0;
  let partialWarmup = false;

  while (state !== "READY") {
    switch (state) {
      case "GRANULARITY_PROBE": {
        granularityNs = yield* runner.probeGranularity();
        targetNs = Math.max(settings.granularityMargin * granularityNs, settings.minLoopNs);
        const converged = yield* probe(runner, settings, targetNs);
        if (converged === undefined) {
          state = "ABORTED";
        } else {
          reps = converged;
          state = "WARMUP";
        }
        break;
      }
      case "WARMUP": {
        const window: number[] = [];
        for (;;) {
          const elapsed = yield* runner.runLoop(reps);
          warmupLoops++;
          warmupNs += elapsed;
          window.push(elapsed / reps);
          if (window.length > settings.windowSize) {
            window.shift();
          }
          if (isSettled(settings, window, warmupNs)) {
            break;
          }
          if (warmupNs >= settings.maxWarmupNs || warmupLoops >= settings.maxWarmupLoops) {
            partialWarmup = true;
            break;
          }
        }
        state = "READY";
        break;
      }
      case "ABORTED":
        throw new CalibrationFailure(
          `Timer calibration did not converge after ${settings.maxProbeAttempts} attempts ` +
            `(granularity ${granularityNs}ns, target ${targetNs}ns)`,
        );
    }
  }

  return { reps, granularityNs, targetNs, warmupLoops, warmupNs, partialWarmup };
}

function isSettled(
  settings: CalibrationSettings,
  window: readonly number[],
  warmupNs: number,
): boolean {
  if (warmupNs < settings.minWarmupNs) {
    return false;
  }
  switch (settings.warmupStrategy) {
    case "duration":
      return true;
    case "cv":
      return (
        window.length >= settings.windowSize &&
        coefficientOfVariation(window) < settings.cvThreshold
      );
  }
}
