/**
 * Worker handle: one live worker process and its message channel.
 *
 * The worker runs in a task owned by the pool's scope, so it survives
 * from one trial to the next. Halting that task releases the process.
 *
 * @module
 */

import {
  race,
  sleep,
  suspend,
  withResolvers,
  type Operation,
  type Scope,
} from "effection";
import { ProtocolError, WorkerStartupFailure, toError } from "../errors.ts";
import {
  createLineFramer,
  decodeMessage,
  encodeRequest,
  type LogMessage,
  type WorkerRequest,
} from "../protocol.ts";
import type { VmConfig } from "../schema.ts";
import type { LaunchSpec, WorkerConnection, WorkerExit, WorkerLauncher } from "./launcher.ts";

/**
 * Returned by {@link WorkerHandle.receive} once the worker's channel ends.
 */
export interface ChannelClosed {
  type: "channel-closed";
  exit: WorkerExit;
}

/**
 * A started worker.
 */
export interface WorkerHandle {
  readonly id: number;
  readonly vm: VmConfig;
  readonly pid: number;
  /** Options the worker echoed after starting */
  readonly vmOptions: Readonly<Record<string, string>>;
  /** The channel is still readable and the worker was not terminated */
  readonly isOpen: boolean;
  send(request: WorkerRequest): void;
  /** Next message from the worker, in send order */
  receive(): Operation<LogMessage | ChannelClosed>;
  /**
   * Stop the worker. Asks it to stop unless forced, waits for the grace
   * period, then kills it. Calling it again does nothing.
   */
  terminate(opts?: { force?: boolean }): Operation<void>;
}

/**
 * Options for starting a worker.
 */
export interface WorkerStartOpts {
  startupTimeoutMs: number;
  terminateGraceMs: number;
  /** Receives lines the worker wrote that are not protocol messages */
  onWarning(message: string): void;
}

/**
 * Describe how a worker's channel ended.
 */
export function describeExit(exit: WorkerExit): string {
  const status = exit.signal ? `signal ${exit.signal}` : `code ${exit.code ?? "unknown"}`;
  const stderr = exit.stderr.trim();
  return stderr ? `exited with ${status}: ${stderr}` : `exited with ${status}`;
}

/**
 * Launch a worker in `scope` and wait for its `process-started` message.
 *
 * @throws WorkerStartupFailure if the launch fails or the handshake does
 *   not arrive within the startup timeout
 */
export function* startWorker(
  scope: Scope,
  launcher: WorkerLauncher,
  vm: VmConfig,
  spec: LaunchSpec,
  opts: WorkerStartOpts,
): Operation<WorkerHandle> {
  const launched = withResolvers<WorkerConnection>();
  let connection: WorkerConnection | undefined;

  const task = scope.run(function* () {
    let live: WorkerConnection;
    try {
      live = yield* launcher.launch(vm, spec);
    } catch (error) {
      launched.reject(toError(error));
      return;
    }
    connection = live;
    launched.resolve(live);
    yield* suspend();
  });

  const framer = createLineFramer();
  const pending: LogMessage[] = [];
  let closed: ChannelClosed | undefined;
  let terminated = false;
  let pid = -1;
  let vmOptions: Readonly<Record<string, string>> = {};

  const accept = (line: string): void => {
    try {
      pending.push(decodeMessage(line));
    } catch (error) {
      if (!(error instanceof ProtocolError)) {
        throw error;
      }
      opts.onWarning(`worker ${spec.workerId} (${vm.name}): ${error.message}`);
    }
  };

  function* receive(): Operation<LogMessage | ChannelClosed> {
    for (;;) {
      const message = pending.shift();
      if (message) {
        if (message.type === "vm-options") {
          vmOptions = Object.freeze({ ...message.options });
          continue;
        }
        return message;
      }
      if (closed) {
        return closed;
      }
      if (!connection) {
        connection = yield* launched.operation;
      }
      const next = yield* connection.output.next();
      if (next.done) {
        framer.flush().forEach(accept);
        closed = { type: "channel-closed", exit: next.value };
      } else {
        framer.push(next.value).forEach(accept);
      }
    }
  }

  function* waitForClose(): Operation<boolean> {
    for (;;) {
      const message = yield* receive();
      if (message.type === "channel-closed") {
        return true;
      }
    }
  }

  function* halt(): Operation<void> {
    if (connection && closed === undefined) {
      connection.kill();
    }
    yield* task.halt();
  }

  function* graceExpired(ms: number): Operation<boolean> {
    yield* sleep(ms);
    return false;
  }

  function* handshake(): Operation<boolean> {
    const first = yield* receive();
    if (first.type === "channel-closed") {
      throw new WorkerStartupFailure(
        `Worker ${spec.workerId} (${vm.name}) ${describeExit(first.exit)} before starting`,
      );
    }
    if (first.type !== "process-started") {
      throw new WorkerStartupFailure(
        `Worker ${spec.workerId} (${vm.name}) sent ${first.type} before process-started`,
      );
    }
    pid = first.pid;
    return true;
  }

  const handle: WorkerHandle = {
    id: spec.workerId,
    vm,
    get pid() {
      return pid;
    },
    get vmOptions() {
      return vmOptions;
    },
    get isOpen() {
      return !terminated && closed === undefined;
    },
    send(request) {
      if (!connection || !handle.isOpen) {
        throw new ProtocolError(`Worker ${spec.workerId} is not open`, encodeRequest(request));
      }
      connection.send(encodeRequest(request));
    },
    receive,
    *terminate(terminateOpts = {}) {
      if (terminated) {
        return;
      }
      const graceful = !terminateOpts.force && handle.isOpen;
      terminated = true;
      try {
        if (graceful && connection) {
          connection.send(encodeRequest({ type: "stop" }));
          yield* race([waitForClose(), graceExpired(opts.terminateGraceMs)]);
        }
      } finally {
        yield* halt();
      }
    },
  };

  let started = false;
  try {
    const ok = yield* race([handshake(), graceExpired(opts.startupTimeoutMs)]);
    if (!ok) {
      throw new WorkerStartupFailure(
        `Worker ${spec.workerId} (${vm.name}) did not start within ${opts.startupTimeoutMs}ms`,
      );
    }
    started = true;
  } catch (error) {
    if (error instanceof WorkerStartupFailure) {
      throw error;
    }
    throw new WorkerStartupFailure(
      `Worker ${spec.workerId} (${vm.name}) failed to launch: ${toError(error).message}`,
    );
  } finally {
    if (!started) {
      terminated = true;
      yield* halt();
    }
  }

  return handle;
}
