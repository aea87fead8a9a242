/**
 * In-process worker launcher for tests.
 *
 * Each fake worker runs the real harness request handler against a
 * benchmark definition and talks to the controller in encoded protocol
 * lines, exactly as a subprocess would over stdio. Faults (boot failures,
 * silent starts, crashes, stray output) are injected through options.
 *
 * @module
 */

import { createQueue, resource, spawn } from "effection";
import type { Clock } from "../../harness/measure.ts";
import type { BenchmarkDefinition } from "../../harness/types.ts";
import { createWorker } from "../../harness/worker.ts";
import {
  createLineFramer,
  decodeRequest,
  encodeMessage,
  type LogMessage,
  type WorkerRequest,
} from "../protocol.ts";
import type { WorkerExit, WorkerLauncher } from "./launcher.ts";

/**
 * A clock that only moves when told to.
 */
export interface ManualClock extends Clock {
  advance(ns: number): void;
}

export function createManualClock(): ManualClock {
  let now = 0n;
  return {
    now: () => now,
    advance(ns) {
      now += BigInt(ns);
    },
  };
}

/**
 * What happened to one fake worker.
 */
export interface FakeWorkerRecord {
  workerId: number;
  vm: string;
  /** Request types received, in order */
  requests: WorkerRequest["type"][];
  /** Answered a stop request and exited */
  stopped: boolean;
  /** Exited on its own because a crash was injected */
  crashed: boolean;
  /** Torn down by the controller without being stopped */
  killed: boolean;
  /** Received a kill while still running */
  sigkilled: boolean;
}

export interface FakeLauncherOpts {
  definition: BenchmarkDefinition;
  clock?: Clock;
  /** The first N launches exit before the handshake */
  failStarts?: number;
  /** The next N launches never send the handshake */
  silentStarts?: number;
  /** Exit instead of answering when this returns true */
  crash?(request: WorkerRequest, method: string | undefined): boolean;
  /** Raw lines written right after the handshake */
  noise?: readonly string[];
}

export interface FakeLauncher extends WorkerLauncher {
  readonly workers: readonly FakeWorkerRecord[];
}

export function createFakeLauncher(opts: FakeLauncherOpts): FakeLauncher {
  const workers: FakeWorkerRecord[] = [];
  const clock = opts.clock ?? createManualClock();
  const failStarts = opts.failStarts ?? 0;
  const silentStarts = opts.silentStarts ?? 0;

  return {
    workers,
    launch(vm, spec) {
      return resource(function* (provide) {
        const record: FakeWorkerRecord = {
          workerId: spec.workerId,
          vm: vm.name,
          requests: [],
          stopped: false,
          crashed: false,
          killed: false,
          sigkilled: false,
        };
        workers.push(record);
        const launchNumber = workers.length;

        const output = createQueue<string, WorkerExit>();
        const inbox = createQueue<string, void>();
        const write = (message: LogMessage) => output.add(encodeMessage(message));

        if (launchNumber <= failStarts) {
          output.close({ code: 1, signal: null, stderr: "fake boot failure" });
        } else if (launchNumber > failStarts + silentStarts) {
          write({ type: "process-started", workerId: spec.workerId, pid: 1000 + spec.workerId });
          write({ type: "vm-options", options: { runtime: "fake" } });
          for (const line of opts.noise ?? []) {
            output.add(`${line}\n`);
          }

          const worker = createWorker(opts.definition, { send: write }, clock);
          yield* spawn(function* () {
            const framer = createLineFramer();
            let method: string | undefined;
            for (let next = yield* inbox.next(); !next.done; next = yield* inbox.next()) {
              for (const line of framer.push(next.value)) {
                const request = decodeRequest(line);
                record.requests.push(request.type);
                if (request.type === "configure") {
                  method = request.method;
                }
                if (opts.crash?.(request, method)) {
                  record.crashed = true;
                  output.close({ code: 1, signal: null, stderr: "fake crash" });
                  return;
                }
                if (!(yield* worker.handle(request))) {
                  record.stopped = true;
                  output.close({ code: 0, signal: null, stderr: "" });
                  return;
                }
              }
            }
          });
        }

        try {
          yield* provide({
            send(data) {
              inbox.add(data);
            },
            kill() {
              if (!record.stopped && !record.crashed && !record.sigkilled) {
                record.sigkilled = true;
                output.close({ code: null, signal: "SIGKILL", stderr: "" });
              }
            },
            output,
          });
        } finally {
          record.killed = !record.stopped && !record.crashed;
        }
      });
    },
  };
}
