/**
 * Worker process launching.
 *
 * A launcher turns a VM configuration into a running worker and a raw
 * text channel. The default launcher runs the harness entry point as a
 * subprocess; tests substitute an in-process launcher.
 *
 * @module
 */

import { fileURLToPath } from "node:url";
import { TextDecoder } from "node:util";
import { exec } from "@effectionx/process";
import { createQueue, resource, spawn, type Operation, type Subscription } from "effection";
import type { VmConfig } from "../schema.ts";

/**
 * How a worker's channel ended.
 */
export interface WorkerExit {
  code: number | null;
  signal: string | null;
  /** Last part of the worker's stderr, for diagnostics */
  stderr: string;
}

/**
 * The controller's end of a live worker.
 * Leaving the scope that launched it kills the worker.
 */
export interface WorkerConnection {
  /** Write raw framed text to the worker */
  send(data: string): void;
  /** Kill the worker at once, without letting it clean up */
  kill(): void;
  /** Raw text chunks from the worker, closed with the exit status */
  output: Subscription<string, WorkerExit>;
}

/**
 * Per-worker launch details.
 */
export interface LaunchSpec {
  workerId: number;
  /** Benchmark module the harness loads */
  modulePath: string;
}

/**
 * Launcher interface.
 */
export interface WorkerLauncher {
  launch(vm: VmConfig, spec: LaunchSpec): Operation<WorkerConnection>;
}

const STDERR_TAIL_CHARS = 4_000;

/**
 * Path of the worker harness entry point.
 */
export function harnessEntryPath(): string {
  return fileURLToPath(new URL("../../harness/entry.ts", import.meta.url));
}

/**
 * Build the worker's argument list: VM arguments, then the harness.
 */
export function buildWorkerArgs(vm: VmConfig, spec: LaunchSpec): string[] {
  return [
    ...vm.args,
    harnessEntryPath(),
    "--benchmark", spec.modulePath,
    "--worker-id", String(spec.workerId),
  ];
}

/**
 * Environment for a worker: the controller's environment plus the VM's.
 */
export function buildWorkerEnv(vm: VmConfig): Record<string, string> {
  const env: Record<string, string> = {};
  for (const [key, value] of Object.entries(process.env)) {
    if (value !== undefined) {
      env[key] = value;
    }
  }
  return { ...env, ...vm.env };
}

/**
 * Quote a command so the launcher's shell-word splitting keeps it whole.
 */
export function quoteCommand(command: string): string {
  return /^[\w@%+=:,./-]+$/.test(command) ? command : `"${command.replace(/(["\\$`])/g, "\\$1")}"`;
}

function sigkill(pid: number): boolean {
  try {
    process.kill(pid, "SIGKILL");
    return true;
  } catch (error) {
    // ESRCH: no such process or group
    if (error instanceof Error && "code" in error && error.code === "ESRCH") {
      return false;
    }
    throw error;
  }
}

/**
 * Send SIGKILL to a worker's process group, or to the worker alone when it
 * does not lead one.
 */
export function killProcessGroup(pid: number): void {
  if (process.platform === "win32" || !sigkill(-pid)) {
    sigkill(pid);
  }
}

function textOf(decoder: TextDecoder, chunk: string | Uint8Array): string {
  return typeof chunk === "string" ? chunk : decoder.decode(chunk, { stream: true });
}

/**
 * Launcher that runs each worker as a subprocess.
 */
export function createProcessLauncher(): WorkerLauncher {
  return {
    launch(vm, spec) {
      return resource(function* (provide) {
        const proc = yield* exec(quoteCommand(vm.command), {
          arguments: buildWorkerArgs(vm, spec),
          env: buildWorkerEnv(vm),
        });

        const output = createQueue<string, WorkerExit>();
        let stderr = "";

        yield* spawn(function* () {
          const decoder = new TextDecoder();
          const subscription = yield* proc.stderr;
          let next = yield* subscription.next();
          while (!next.done) {
            stderr = (stderr + textOf(decoder, next.value)).slice(-STDERR_TAIL_CHARS);
            next = yield* subscription.next();
          }
        });

        yield* spawn(function* () {
          const decoder = new TextDecoder();
          const subscription = yield* proc.stdout;
          let next = yield* subscription.next();
          while (!next.done) {
            output.add(textOf(decoder, next.value));
            next = yield* subscription.next();
          }
          const status = yield* proc.join();
          output.close({
            code: status.code ?? null,
            signal: status.signal ?? null,
            stderr,
          });
        });

        yield* provide({
          send(data) {
            proc.stdin.send(data);
          },
          kill() {
            killProcessGroup(proc.pid);
          },
          output,
        });
      });
    },
  };
}
