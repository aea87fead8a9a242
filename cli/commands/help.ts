/**
 * Help command implementation.
 *
 * @module
 */

import type { Operation } from "effection";

const MAIN_HELP = `
forkbench

Usage: forkbench <command> [options]

Commands:
  run             Run a benchmark module in worker processes
  help            Show this help message

Run 'forkbench help <command>' for command-specific help.

Examples:
  forkbench run --benchmark cli/scenarios/recursion.ts
  forkbench run -b cli/scenarios/recursion.ts --method effection --parallel 2
`.trim();

const RUN_HELP = `
forkbench run - Run a benchmark module in worker processes

Usage:
  forkbench run --benchmark <path> [options]

Required:
  --benchmark, -b   Module that default-exports defineBenchmark(...)

Options:
  --instrument, -i  Instrument to use (runtime, arbitrary). Can be repeated.
                    Default: runtime
  --method, -m      Only run this benchmark method. Can be repeated.
  --parallel        Trials to run at the same time (default: 1)
  --measurements    Measurements per trial for the selected instruments
                    (default: runtime 9, arbitrary 1)
  --option          Instrument option as <instrument>.<name>=<value>,
                    e.g. runtime.cvThreshold=0.1. Can be repeated.
  --timeout         Per-trial deadline in milliseconds (default: 60000)
  --fresh-vm        Start a new worker for every trial
  --dry-run         Invoke every method once without measuring
  --outliers        none, flag or trim (default: flag)

The report is printed to stdout as JSON; progress goes to stderr.
Exits with 1 when any trial did not succeed.

Examples:
  forkbench run --benchmark cli/scenarios/recursion.ts
  forkbench run -b cli/scenarios/recursion.ts -i runtime -i arbitrary
  forkbench run -b cli/scenarios/recursion.ts --measurements 20 --outliers trim
`.trim();

const COMMAND_HELP: Record<string, string> = {
  run: RUN_HELP,
  help: MAIN_HELP,
};

/**
 * Display help for a command or general usage.
 */
export function* helpCommand(args: string[]): Operation<number> {
  const subcommand = args[0];

  if (subcommand && Object.hasOwn(COMMAND_HELP, subcommand)) {
    console.log(COMMAND_HELP[subcommand]);
  } else if (subcommand) {
    console.error(`Unknown command: ${subcommand}`);
    console.log();
    console.log(MAIN_HELP);
    return 1;
  } else {
    console.log(MAIN_HELP);
  }

  return 0;
}
