/**
 * Worker harness entry point.
 *
 * Executed as a subprocess by the controller. Announces itself, loads the
 * benchmark module, then answers requests from stdin until told to stop.
 * Protocol messages are the only thing it writes to stdout.
 *
 * @module
 */

import { constants, PerformanceObserver } from "node:perf_hooks";
import {
  call,
  createQueue,
  exit,
  main,
  resource,
  type Operation,
  type Subscription,
} from "effection";
import { toError } from "../lib/errors.ts";
import { loadBenchmarkDefinition } from "../lib/loader.ts";
import { isOk, wrapResult } from "../lib/result.ts";
import { createLineFramer, decodeRequest, encodeMessage, type LogMessage } from "../lib/protocol.ts";
import { parseWorkerArgs, validateWorkerArgs } from "./args.ts";
import { hrtime } from "./measure.ts";
import { createWorker, type WorkerOutput } from "./worker.ts";

const GC_KINDS: Record<number, string> = {
  [constants.NODE_PERFORMANCE_GC_MINOR]: "minor",
  [constants.NODE_PERFORMANCE_GC_MAJOR]: "major",
  [constants.NODE_PERFORMANCE_GC_INCREMENTAL]: "incremental",
  [constants.NODE_PERFORMANCE_GC_WEAKCB]: "weakcb",
};

const output: WorkerOutput = {
  send(message: LogMessage) {
    process.stdout.write(encodeMessage(message));
  },
};

function gcKind(detail: unknown): string {
  if (typeof detail === "object" && detail !== null && "kind" in detail && typeof detail.kind === "number") {
    return GC_KINDS[detail.kind] ?? "unknown";
  }
  return "unknown";
}

/**
 * Report garbage collections while the scope is alive.
 */
function useGcReports(report: (message: LogMessage) => void): Operation<void> {
  return resource(function* (provide) {
    const observer = new PerformanceObserver((list) => {
      for (const entry of list.getEntries()) {
        report({ type: "gc", kind: gcKind(entry.detail), durationMs: entry.duration });
      }
    });
    observer.observe({ entryTypes: ["gc"] });
    try {
      yield* provide();
    } finally {
      observer.disconnect();
    }
  });
}

/**
 * Lines read from stdin, closed when stdin ends.
 */
function useStdinLines(): Operation<Subscription<string, void>> {
  return resource(function* (provide) {
    const lines = createQueue<string, void>();
    const framer = createLineFramer();
    const onData = (chunk: Buffer) => {
      for (const line of framer.push(chunk)) {
        lines.add(line);
      }
    };
    const onEnd = () => {
      for (const line of framer.flush()) {
        lines.add(line);
      }
      lines.close();
    };

    process.stdin.on("data", onData);
    process.stdin.on("end", onEnd);
    try {
      yield* provide(lines);
    } finally {
      process.stdin.off("data", onData);
      process.stdin.off("end", onEnd);
      process.stdin.pause();
    }
  });
}

function* flushStdout(): Operation<void> {
  yield* call(() => new Promise<void>((resolve) => process.stdout.write("", () => resolve())));
}

main(function* () {
  const args = parseWorkerArgs(process.argv.slice(2));
  const validationError = validateWorkerArgs(args);
  if (validationError) {
    console.error(`Error: ${validationError}`);
    yield* exit(1);
    return;
  }

  output.send({ type: "process-started", workerId: args.workerId, pid: process.pid });
  output.send({
    type: "vm-options",
    options: {
      node: process.version,
      execArgv: process.execArgv.join(" "),
      platform: process.platform,
      arch: process.arch,
    },
  });

  const loaded = yield* wrapResult(args.benchmark, loadBenchmarkDefinition(args.benchmark));
  if (!isOk(loaded)) {
    const { message, stack } = loaded.error;
    output.send(stack === undefined ? { type: "failure", message } : { type: "failure", message, stack });
    yield* flushStdout();
    yield* exit(1);
    return;
  }

  const worker = createWorker(loaded.value, output, hrtime);
  yield* useGcReports((message) => {
    if (worker.emits("gc")) {
      output.send(message);
    }
  });

  const requests = yield* useStdinLines();
  for (let next = yield* requests.next(); !next.done; next = yield* requests.next()) {
    let keepGoing = true;
    try {
      keepGoing = yield* worker.handle(decodeRequest(next.value));
    } catch (error) {
      output.send({ type: "failure", message: toError(error).message });
    }
    if (!keepGoing) {
      break;
    }
  }

  yield* flushStdout();
  yield* exit(0);
});
