/**
 * run command implementation.
 *
 * Loads a benchmark module, runs every trial across the configured VMs
 * and prints the report as JSON on stdout. Progress goes to stderr.
 *
 * @module
 */

import { Command, CommanderError } from "commander";
import { spawn, type Operation } from "effection";
import { z } from "zod";
import { ConfigurationError } from "../lib/errors.ts";
import type { RunEvent } from "../lib/events.ts";
import { loadBenchmarkHandle } from "../lib/loader.ts";
import { isOk, wrapResult } from "../lib/result.ts";
import {
  OutlierPolicySchema,
  RunConfigSchema,
  type OptionMap,
  type OutlierPolicy,
  type RunConfig,
  type RunConfigInput,
  type RunReport,
} from "../lib/schema.ts";
import { createRun, type BenchmarkRun, type RunDeps } from "../lib/setup.ts";

/**
 * Outcome of parsing `run` arguments.
 */
export type ParsedRunArgs =
  | { ok: true; config: RunConfig }
  | { ok: false; summary: string };

const RunFlagsSchema = z.object({
  benchmark: z.string().optional(),
  instrument: z.array(z.string()),
  method: z.array(z.string()),
  parallel: z.string().optional(),
  measurements: z.string().optional(),
  timeout: z.string().optional(),
  option: z.array(z.string()),
  freshVm: z.boolean().optional(),
  dryRun: z.boolean().optional(),
  outliers: z.string().optional(),
});

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

/**
 * `run` flags. Parsing errors are thrown rather than printed.
 */
function createRunProgram(): Command {
  return new Command("run")
    .exitOverride()
    .configureOutput({ writeOut: () => {}, writeErr: () => {} })
    .helpOption(false)
    .showSuggestionAfterError(false)
    .allowExcessArguments(false)
    .option("-b, --benchmark <path>", "Benchmark module to run")
    .option("-i, --instrument <name>", "Instrument to use (repeatable)", collect, [])
    .option("-m, --method <name>", "Benchmark method to run (repeatable)", collect, [])
    .option("--parallel <n>", "Trials run at once")
    .option("--measurements <n>", "Measurements per trial for the selected instruments")
    .option("--timeout <ms>", "Per-trial deadline in milliseconds")
    .option("--option <instrument.name=value>", "Instrument option (repeatable)", collect, [])
    .option("--fresh-vm", "Start a new worker for every trial")
    .option("--dry-run", "Invoke each method once without measuring")
    .option("--outliers <policy>", "Outlier policy: none, flag or trim");
}

function parseOption(raw: string): { instrument: string; key: string; value: string } | undefined {
  const match = /^([^.=]+)\.([^=]+)=(.*)$/.exec(raw);
  if (!match) {
    return undefined;
  }
  const [, instrument, key, value] = match;
  return { instrument, key, value };
}

function parseOutliers(raw: string): OutlierPolicy | undefined {
  const policy = OutlierPolicySchema.safeParse(raw);
  return policy.success ? policy.data : undefined;
}

/**
 * Parse `run` arguments into a validated run configuration.
 */
export function parseRunArgs(args: readonly string[]): ParsedRunArgs {
  const program = createRunProgram();
  try {
    program.parse([...args], { from: "user" });
  } catch (error) {
    if (error instanceof CommanderError) {
      return { ok: false, summary: `  ${error.message}` };
    }
    throw error;
  }
  const flags = RunFlagsSchema.parse(program.opts());

  const errors: string[] = [];
  const instrumentOptions: Record<string, OptionMap> = {};
  const setOption = (instrument: string, key: string, value: string) => {
    instrumentOptions[instrument] = { ...instrumentOptions[instrument], [key]: value };
  };

  for (const raw of flags.option) {
    const option = parseOption(raw);
    if (option) {
      setOption(option.instrument, option.key, option.value);
    } else {
      errors.push(`--option expects <instrument>.<name>=<value>, got "${raw}"`);
    }
  }
  if (flags.measurements !== undefined) {
    for (const instrument of flags.instrument.length > 0 ? flags.instrument : ["runtime"]) {
      setOption(instrument, "measurements", flags.measurements);
    }
  }

  const input: RunConfigInput = {
    benchmark: flags.benchmark ?? "",
    instruments: flags.instrument,
    methods: flags.method,
    instrumentOptions,
  };
  if (flags.parallel !== undefined) {
    input.parallelism = Number(flags.parallel);
  }
  if (flags.timeout !== undefined) {
    input.trialTimeoutMs = Number(flags.timeout);
  }
  if (flags.freshVm) {
    input.freshVmPerTrial = true;
  }
  if (flags.dryRun) {
    input.dryRun = true;
  }
  if (flags.outliers !== undefined) {
    input.outlierPolicy = parseOutliers(flags.outliers);
    if (input.outlierPolicy === undefined) {
      errors.push(`--outliers must be none, flag or trim, got "${flags.outliers}"`);
    }
  }

  const result = RunConfigSchema.safeParse(input);
  if (!result.success) {
    for (const issue of result.error.issues) {
      errors.push(`${issue.path.join(".") || "config"}: ${issue.message}`);
    }
  }
  if (errors.length > 0 || !result.success) {
    return { ok: false, summary: errors.map((e) => `  ${e}`).join("\n") };
  }
  return { ok: true, config: result.data };
}

/**
 * One console line for a run event.
 */
export function formatEvent(event: RunEvent): string {
  switch (event.type) {
    case "warning":
      return `Warning: ${event.message}`;
    case "trial-started":
      return `  start ${event.trialId}/${event.total} ${event.label}`;
    case "trial-finished": {
      const { result } = event;
      const suffix = result.reason ? ` (${result.reason})` : "";
      return `  [${event.completed}/${event.total}] ${event.label} ${result.state}${suffix}`;
    }
  }
}

function printSummary(report: RunReport): number {
  const failed = report.trials.filter((trial) => trial.state !== "SUCCESS");

  if (failed.length > 0) {
    console.error("\nFailures:");
    for (const group of report.groups) {
      for (const trial of group.trials) {
        if (trial.state !== "SUCCESS") {
          console.error(`  #${trial.trialId} ${group.key} on ${trial.vm}: ${trial.state} ${trial.reason ?? ""}`.trimEnd());
        }
      }
    }
  }

  console.error(
    `\nCompleted: ${report.trials.length - failed.length}/${report.trials.length} trial(s) succeeded` +
      (report.dryRun ? " (dry run)" : ""),
  );
  return failed.length > 0 ? 1 : 0;
}

/**
 * Run a benchmark module.
 */
export function* runCommand(args: string[], deps: RunDeps = {}): Operation<number> {
  const parsed = parseRunArgs(args);
  if (!parsed.ok) {
    console.error("Error parsing arguments:");
    console.error(parsed.summary);
    return 1;
  }
  const { config } = parsed;

  const loaded = yield* wrapResult(config.benchmark, loadBenchmarkHandle(config.benchmark));
  if (!isOk(loaded)) {
    console.error(`Could not load ${loaded.context}: ${loaded.error.message}`);
    return 1;
  }
  const handle = loaded.value;

  let run: BenchmarkRun;
  try {
    run = createRun(config, handle, deps);
  } catch (error) {
    if (error instanceof ConfigurationError) {
      console.error(`${error.name}: ${error.message}`);
      return 1;
    }
    throw error;
  }

  console.error(`\nRunning ${handle.name} (${handle.modulePath})`);
  console.error(`VMs: ${config.vms.map((vm) => vm.name).join(", ")}`);
  console.error(`Trials: ${run.trials.length}, parallelism ${config.parallelism}`);
  if (config.dryRun) {
    console.error("Dry run: methods are invoked once, nothing is measured");
  }
  console.error();

  const events = yield* run.events;
  const logger = yield* spawn(function* () {
    for (let next = yield* events.next(); !next.done; next = yield* events.next()) {
      if (next.value.type !== "trial-started") {
        console.error(formatEvent(next.value));
      }
    }
  });

  const report = yield* run.run();
  yield* logger;

  console.log(JSON.stringify(report, null, 2));
  return printSummary(report);
}
