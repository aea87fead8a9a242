/**
 * Request handling inside a worker process.
 *
 * The worker answers every request with exactly one reply. Benchmark code
 * that throws is reported as a `failure` reply and the worker keeps
 * serving; the controller decides whether to keep it.
 *
 * @module
 */

import type { Operation } from "effection";
import { toError } from "../lib/errors.ts";
import type { LogMessage, WorkerLoopSpec, WorkerRequest } from "../lib/protocol.ts";
import type { ParamAssignment } from "../lib/schema.ts";
import { invokeValue, runTimedLoop, timerGranularity, type Clock } from "./measure.ts";
import type { BenchmarkDefinition, BenchmarkMethodDefinition } from "./types.ts";

/**
 * Where the worker writes its messages.
 */
export interface WorkerOutput {
  send(message: LogMessage): void;
}

/**
 * A worker's request handler.
 */
export interface Worker {
  /**
   * Answer one request.
   * @returns false once the worker was asked to stop
   */
  handle(request: WorkerRequest): Operation<boolean>;
  /** Whether the current configuration asked for this message type */
  emits(type: LogMessage["type"]): boolean;
}

interface Configured {
  trialId: number;
  method: BenchmarkMethodDefinition;
  params: ParamAssignment;
  loop: WorkerLoopSpec;
}

class RequestError extends Error {
  override name = "RequestError";
}

function modeOf(method: BenchmarkMethodDefinition): WorkerLoopSpec["mode"] {
  return method.kind === "timed-loop" ? "fixed-reps" : "single-invocation";
}

/**
 * Create the request handler for a loaded benchmark.
 */
export function createWorker(
  definition: BenchmarkDefinition,
  output: WorkerOutput,
  clock: Clock,
): Worker {
  let configured: Configured | undefined;

  const current = (request: WorkerRequest): Configured => {
    if (!configured) {
      throw new RequestError(`Received ${request.type} before configure`);
    }
    return configured;
  };

  function* run(reps: number, target: Configured): Operation<LogMessage> {
    const { method, params } = target;
    if (method.kind === "timed-loop") {
      const elapsedNs = yield* runTimedLoop(method.fn, reps, params, clock);
      return { type: "stop-measurement", reps, elapsedNs };
    }
    const value = yield* invokeValue(method.fn, params);
    return {
      type: "value-measurement",
      description: method.description ?? method.name,
      value,
      unit: method.unit,
    };
  }

  function* reply(request: WorkerRequest): Operation<LogMessage> {
    switch (request.type) {
      case "configure": {
        const method = definition.methods.find((m) => m.name === request.method);
        if (!method) {
          throw new RequestError(`${definition.name} has no benchmark method ${request.method}`);
        }
        if (modeOf(method) !== request.loop.mode) {
          throw new RequestError(
            `${request.method} is a ${method.kind} method and cannot run in ${request.loop.mode} mode`,
          );
        }
        configured = {
          trialId: request.trialId,
          method,
          params: Object.freeze({ ...request.params }),
          loop: request.loop,
        };
        return { type: "configured", trialId: request.trialId };
      }
      case "probe-timer":
        return { type: "timer-granularity", nanos: timerGranularity(clock) };
      case "run":
        return yield* run(request.reps, current(request));
      case "dry-run": {
        const target = current(request);
        yield* run(1, target);
        return { type: "dry-run-success", ids: [request.trialId] };
      }
      case "stop":
        configured = undefined;
        return { type: "stopped" };
    }
  }

  return {
    *handle(request) {
      try {
        output.send(yield* reply(request));
      } catch (error) {
        const { message, stack } = toError(error);
        output.send(stack === undefined ? { type: "failure", message } : { type: "failure", message, stack });
      }
      return request.type !== "stop";
    },
    emits(type) {
      return configured?.loop.emits.includes(type) ?? false;
    },
  };
}
