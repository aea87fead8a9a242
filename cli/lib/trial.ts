/**
 * Drives one trial on one worker: configure, calibrate, measure, release.
 *
 * @module
 */

import { race, sleep, type Operation } from "effection";
import { calibrate, type LoopRunner } from "./calibration.ts";
import {
  ChannelClosedError,
  ProtocolError,
  WorkerFailure,
  WorkerStartupFailure,
} from "./errors.ts";
import type { InstrumentedMethod } from "./instruments/mod.ts";
import { formatParams } from "./loader.ts";
import type { LogMessage, LogMessageOf, WorkerRequest } from "./protocol.ts";
import { isOk, wrapResult } from "./result.ts";
import type {
  Measurement,
  ParamAssignment,
  TrialResult,
  TrialState,
  VmConfig,
} from "./schema.ts";
import { describeExit, type WorkerHandle } from "./workers/handle.ts";
import type { Disposition, WorkerPool } from "./workers/pool.ts";

/**
 * One unit of work: a method, measured by an instrument, on a VM, with
 * one parameter assignment.
 */
export interface Trial {
  readonly id: number;
  readonly instrumented: InstrumentedMethod;
  readonly vm: VmConfig;
  readonly params: ParamAssignment;
  state: "PENDING" | "RUNNING" | TrialState;
}

/**
 * Options for driving a trial.
 */
export interface TrialOpts {
  trialTimeoutMs: number;
  startupRetryBackoffMs: number;
  dryRun: boolean;
}

type TrialOutcome =
  | { state: "SUCCESS"; measurements: Measurement[] }
  | { state: "TIMED_OUT" };

/**
 * Facts gathered while the trial runs, kept even when it fails.
 */
interface TrialProgress {
  reps: number;
  partialWarmup: boolean;
  gcEvents: number;
  vmOptions: Readonly<Record<string, string>>;
}

/**
 * Short human-readable name of a trial, e.g. "runtime:concat[size=10] on node".
 */
export function trialLabel(trial: Trial): string {
  const { method, instrument } = trial.instrumented;
  const params = formatParams(trial.params);
  return `${instrument.id}:${method.name}${params ? `[${params}]` : ""} on ${trial.vm.name}`;
}

/**
 * Send a request and collect messages up to and including its reply.
 * GC reports that arrive first are counted and kept with the reply.
 */
function* exchange(
  handle: WorkerHandle,
  request: WorkerRequest,
  progress: TrialProgress,
): Operation<LogMessage[]> {
  handle.send(request);
  const messages: LogMessage[] = [];
  for (;;) {
    const message = yield* handle.receive();
    switch (message.type) {
      case "channel-closed":
        throw new ChannelClosedError(
          `Worker ${handle.id} ${describeExit(message.exit)} while awaiting a reply to ${request.type}`,
        );
      case "failure":
        throw new WorkerFailure(message.message, message.stack);
      case "gc":
        progress.gcEvents++;
        messages.push(message);
        break;
      default:
        messages.push(message);
        return messages;
    }
  }
}

function isReply<T extends LogMessage["type"]>(
  message: LogMessage | undefined,
  type: T,
): message is LogMessageOf<T> {
  return message?.type === type;
}

function expectReply<T extends LogMessage["type"]>(
  messages: readonly LogMessage[],
  type: T,
): LogMessageOf<T> {
  const reply = messages[messages.length - 1];
  if (!isReply(reply, type)) {
    throw new ProtocolError(
      `Expected ${type} but worker replied ${reply?.type ?? "nothing"}`,
      JSON.stringify(reply ?? null),
    );
  }
  return reply;
}

function loopRunner(
  handle: WorkerHandle,
  instrumented: InstrumentedMethod,
  progress: TrialProgress,
): LoopRunner {
  return {
    *probeGranularity() {
      const messages = yield* exchange(handle, { type: "probe-timer" }, progress);
      return expectReply(messages, "timer-granularity").nanos;
    },
    *runLoop(reps) {
      const messages = yield* exchange(handle, { type: "run", reps }, progress);
      return instrumented.instrument.toMeasurement(messages).value;
    },
  };
}

function* measure(
  handle: WorkerHandle,
  trial: Trial,
  progress: TrialProgress,
): Operation<Measurement[]> {
  const { instrument, config } = trial.instrumented;

  const settings = instrument.calibration?.(config);
  if (settings) {
    const calibration = yield* calibrate(loopRunner(handle, trial.instrumented, progress), settings);
    progress.reps = calibration.reps;
    progress.partialWarmup = calibration.partialWarmup;
  }

  const measurements: Measurement[] = [];
  const count = instrument.measurementCount(config);
  for (let i = 0; i < count; i++) {
    const messages = yield* exchange(handle, { type: "run", reps: progress.reps }, progress);
    measurements.push(instrument.toMeasurement(messages));
  }
  return measurements;
}

function* dryRun(
  handle: WorkerHandle,
  trial: Trial,
  progress: TrialProgress,
): Operation<Measurement[]> {
  const messages = yield* exchange(handle, { type: "dry-run", trialId: trial.id }, progress);
  const reply = expectReply(messages, "dry-run-success");
  if (!reply.ids.includes(trial.id)) {
    throw new ProtocolError(`Dry run reply does not list trial ${trial.id}`, JSON.stringify(reply));
  }
  return [];
}

/**
 * Acquire a worker, retrying a failed startup once after a backoff.
 */
function* acquireWorker(pool: WorkerPool, vm: VmConfig, backoffMs: number): Operation<WorkerHandle> {
  try {
    return yield* pool.acquire(vm);
  } catch (error) {
    if (!(error instanceof WorkerStartupFailure)) {
      throw error;
    }
    yield* sleep(backoffMs);
    return yield* pool.acquire(vm);
  }
}

function* driveTrial(
  trial: Trial,
  pool: WorkerPool,
  opts: TrialOpts,
  progress: TrialProgress,
): Operation<TrialOutcome> {
  const handle = yield* acquireWorker(pool, trial.vm, opts.startupRetryBackoffMs);
  // Stays "kill" when the trial is halted by its deadline.
  let disposition: Disposition = "kill";
  try {
    const { method, instrument, config } = trial.instrumented;
    const messages = yield* exchange(
      handle,
      {
        type: "configure",
        trialId: trial.id,
        method: method.name,
        params: { ...trial.params },
        options: { ...config.options },
        loop: instrument.newWorkerLoop(config),
      },
      progress,
    );
    expectReply(messages, "configured");

    const measurements = opts.dryRun
      ? yield* dryRun(handle, trial, progress)
      : yield* measure(handle, trial, progress);
    disposition = "reuse";
    return { state: "SUCCESS", measurements };
  } catch (error) {
    disposition = handle.isOpen ? "discard" : "kill";
    throw error;
  } finally {
    progress.vmOptions = handle.vmOptions;
    yield* pool.release(handle, disposition);
  }
}

function* deadline(ms: number): Operation<TrialOutcome> {
  yield* sleep(ms);
  return { state: "TIMED_OUT" };
}

/**
 * Run one trial to a terminal state. Never throws for per-trial failures:
 * they are recorded in the returned result.
 */
export function* runTrial(trial: Trial, pool: WorkerPool, opts: TrialOpts): Operation<TrialResult> {
  trial.state = "RUNNING";
  const progress: TrialProgress = { reps: 1, partialWarmup: false, gcEvents: 0, vmOptions: {} };

  const outcome = yield* wrapResult(
    trialLabel(trial),
    race([driveTrial(trial, pool, opts, progress), deadline(opts.trialTimeoutMs)]),
  );

  let state: TrialState;
  let reason: string | undefined;
  let measurements: readonly Measurement[] = [];
  if (!isOk(outcome)) {
    state = "FAILED";
    reason = `${outcome.error.name}: ${outcome.error.message}`;
  } else if (outcome.value.state === "TIMED_OUT") {
    state = "TIMED_OUT";
    reason = `Trial exceeded its ${opts.trialTimeoutMs}ms deadline`;
  } else {
    state = "SUCCESS";
    measurements = Object.freeze(outcome.value.measurements);
  }
  trial.state = state;

  const { method, instrument } = trial.instrumented;
  const result: TrialResult = {
    trialId: trial.id,
    method: method.name,
    instrument: instrument.id,
    vm: trial.vm.name,
    params: trial.params,
    state,
    ...(reason === undefined ? {} : { reason }),
    measurements,
    partialWarmup: progress.partialWarmup,
    reps: progress.reps,
    gcEvents: progress.gcEvents,
    vmOptions: progress.vmOptions,
  };
  return Object.freeze(result);
}
