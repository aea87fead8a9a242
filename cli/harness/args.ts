/**
 * Argument parsing for the worker harness subprocess.
 *
 * Uses simple manual parsing: the controller builds these arguments
 * itself, so there is nothing to offer beyond the two flags.
 *
 * @module
 */

/**
 * Parsed worker arguments.
 */
export interface WorkerArgs {
  /** Benchmark module to load */
  benchmark: string;
  /** Id the controller assigned to this worker */
  workerId: number;
}

/**
 * Parse worker CLI arguments.
 */
export function parseWorkerArgs(args: readonly string[]): WorkerArgs {
  const result: WorkerArgs = {
    benchmark: "",
    workerId: -1,
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const next = args[i + 1];

    switch (arg) {
      case "--benchmark":
        result.benchmark = next || "";
        i++;
        break;
      case "--worker-id":
        result.workerId = parseInt(next || "-1", 10);
        i++;
        break;
    }
  }

  return result;
}

/**
 * Validate worker arguments.
 */
export function validateWorkerArgs(args: WorkerArgs): string | null {
  if (!args.benchmark) {
    return "Missing required --benchmark argument";
  }
  if (!Number.isInteger(args.workerId) || args.workerId < 0) {
    return "--worker-id must be a non-negative integer";
  }
  return null;
}
