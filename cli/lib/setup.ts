/**
 * Assembles a benchmark run from plain configuration.
 *
 * Everything is wired explicitly here: instruments, trials, the worker
 * pool and the event stream. Setup errors surface from {@link createRun}
 * before any worker process exists.
 *
 * @module
 */

import { createSignal, scoped, type Operation, type Stream } from "effection";
import { aggregate } from "./aggregate.ts";
import type { RunEvent } from "./events.ts";
import {
  createInstrumentedMethods,
  selectInstruments,
  type InstrumentFactory,
} from "./instruments/mod.ts";
import type { BenchmarkHandle } from "./loader.ts";
import { enumerateTrials, runTrials } from "./scheduler.ts";
import type { RunConfig, RunReport } from "./schema.ts";
import type { Trial } from "./trial.ts";
import { createProcessLauncher, type WorkerLauncher } from "./workers/launcher.ts";
import { useWorkerPool } from "./workers/pool.ts";

/**
 * Collaborators that can be swapped, mostly for tests.
 */
export interface RunDeps {
  launcher?: WorkerLauncher;
  registry?: Readonly<Record<string, InstrumentFactory>>;
}

/**
 * A prepared benchmark run.
 */
export interface BenchmarkRun {
  /** Every trial the run will execute, in id order */
  readonly trials: readonly Trial[];
  /** Progress and warnings. Subscribe before calling {@link run}. */
  readonly events: Stream<RunEvent, void>;
  /** Execute all trials and build the report */
  run(): Operation<RunReport>;
}

/**
 * Prepare a run.
 *
 * @throws ConfigurationError for unknown or unusable instruments, and
 *   InvalidBenchmarkError for overloaded, incompatible or unknown methods
 */
export function createRun(
  config: RunConfig,
  handle: BenchmarkHandle,
  deps: RunDeps = {},
): BenchmarkRun {
  const selection = selectInstruments({
    selected: config.instruments,
    defaults: config.defaultInstruments,
    options: config.instrumentOptions,
    vms: config.vms,
    registry: deps.registry,
  });
  const methods = createInstrumentedMethods(handle, selection.instruments, config.methods);
  const trials = enumerateTrials(methods, config.vms, handle.params);
  const launcher = deps.launcher ?? createProcessLauncher();
  const signal = createSignal<RunEvent, void>();
  const warnings: string[] = [];

  const emit = (event: RunEvent): void => {
    if (event.type === "warning") {
      warnings.push(event.message);
    }
    signal.send(event);
  };

  return {
    trials,
    events: signal,
    run() {
      return scoped(function* () {
        try {
          for (const message of selection.warnings) {
            emit({ type: "warning", message });
          }

          const pool = yield* useWorkerPool({
            launcher,
            modulePath: handle.modulePath,
            startupTimeoutMs: config.startupTimeoutMs,
            terminateGraceMs: config.terminateGraceMs,
            freshVmPerTrial: config.freshVmPerTrial,
            onWarning: (message) => emit({ type: "warning", message }),
          });

          const results = yield* runTrials(
            trials,
            pool,
            {
              parallelism: config.parallelism,
              trialTimeoutMs: config.trialTimeoutMs,
              startupRetryBackoffMs: config.startupRetryBackoffMs,
              dryRun: config.dryRun,
            },
            emit,
          );

          return aggregate({
            benchmark: handle.name,
            dryRun: config.dryRun,
            outlierPolicy: config.outlierPolicy,
            results,
            warnings,
          });
        } finally {
          signal.close();
        }
      });
    },
  };
}
