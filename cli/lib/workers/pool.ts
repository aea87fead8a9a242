/**
 * Pool of worker handles shared by concurrently running trials.
 *
 * Acquire, release and teardown never suspend between reading and
 * updating the idle and busy sets, so concurrent trials cannot observe
 * or hand out the same worker twice.
 *
 * @module
 */

import { resource, useScope, type Operation } from "effection";
import type { VmConfig } from "../schema.ts";
import { startWorker, type WorkerHandle } from "./handle.ts";
import type { WorkerLauncher } from "./launcher.ts";

/**
 * What to do with a worker when its trial ends.
 * - `reuse`: return it to the pool (or stop it under a fresh-VM policy)
 * - `discard`: stop it gracefully
 * - `kill`: stop it without asking
 */
export type Disposition = "reuse" | "discard" | "kill";

/**
 * Pool options.
 */
export interface WorkerPoolOpts {
  launcher: WorkerLauncher;
  modulePath: string;
  startupTimeoutMs: number;
  terminateGraceMs: number;
  /** Never reuse a worker for a second trial */
  freshVmPerTrial: boolean;
  onWarning(message: string): void;
}

/**
 * Worker pool interface.
 */
export interface WorkerPool {
  /** Take an idle worker for this VM, or start a new one */
  acquire(vm: VmConfig): Operation<WorkerHandle>;
  /** Give a worker back. Releasing a worker that is not checked out does nothing. */
  release(handle: WorkerHandle, disposition?: Disposition): Operation<void>;
  readonly idle: number;
  readonly busy: number;
  /** Worker launches attempted over the pool's lifetime */
  readonly started: number;
}

/**
 * Create a worker pool as a resource.
 * Every worker still alive is stopped when the scope exits.
 */
export function useWorkerPool(opts: WorkerPoolOpts): Operation<WorkerPool> {
  return resource(function* (provide) {
    const scope = yield* useScope();
    const idle = new Map<string, WorkerHandle[]>();
    const busy = new Set<WorkerHandle>();
    let started = 0;

    try {
      yield* provide({
        *acquire(vm) {
          for (;;) {
            const candidate = idle.get(vm.name)?.shift();
            if (!candidate) {
              break;
            }
            if (candidate.isOpen) {
              busy.add(candidate);
              return candidate;
            }
            yield* candidate.terminate({ force: true });
          }
          const workerId = ++started;
          const handle = yield* startWorker(
            scope,
            opts.launcher,
            vm,
            { workerId, modulePath: opts.modulePath },
            opts,
          );
          busy.add(handle);
          return handle;
        },

        *release(handle, disposition = "reuse") {
          if (!busy.delete(handle)) {
            return;
          }
          if (disposition === "reuse" && !opts.freshVmPerTrial && handle.isOpen) {
            const handles = idle.get(handle.vm.name) ?? [];
            handles.push(handle);
            idle.set(handle.vm.name, handles);
            return;
          }
          yield* handle.terminate({ force: disposition === "kill" });
        },

        get idle() {
          let count = 0;
          for (const handles of idle.values()) {
            count += handles.length;
          }
          return count;
        },

        get busy() {
          return busy.size;
        },

        get started() {
          return started;
        },
      });
    } finally {
      const remaining = [...idle.values()].flat();
      idle.clear();
      for (const handle of remaining) {
        yield* handle.terminate();
      }
      const checkedOut = [...busy];
      busy.clear();
      for (const handle of checkedOut) {
        yield* handle.terminate({ force: true });
      }
    }
  });
}
