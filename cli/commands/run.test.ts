import { fileURLToPath } from "node:url";
import { run } from "effection";
import { afterEach, describe, expect, it, vi } from "vitest";
import recursion from "../scenarios/recursion.ts";
import { createFakeLauncher } from "../lib/workers/fake-launcher.ts";
import { formatEvent, parseRunArgs, runCommand } from "./run.ts";

const recursionPath = fileURLToPath(new URL("../scenarios/recursion.ts", import.meta.url));

describe("parseRunArgs", () => {
  it("builds a run configuration from flags", () => {
    const parsed = parseRunArgs([
      "--benchmark", "bench.ts",
      "-i", "runtime",
      "-i", "arbitrary",
      "-m", "concat",
      "--measurements", "4",
      "--parallel", "2",
      "--timeout", "500",
      "--option", "runtime.cvThreshold=0.1",
      "--fresh-vm",
      "--outliers", "trim",
    ]);

    expect(parsed.ok).toBe(true);
    if (!parsed.ok) return;
    expect(parsed.config).toMatchObject({
      benchmark: "bench.ts",
      instruments: ["runtime", "arbitrary"],
      methods: ["concat"],
      parallelism: 2,
      trialTimeoutMs: 500,
      freshVmPerTrial: true,
      dryRun: false,
      outlierPolicy: "trim",
      instrumentOptions: {
        runtime: { cvThreshold: "0.1", measurements: "4" },
        arbitrary: { measurements: "4" },
      },
    });
    expect(parsed.config.vms.map((vm) => vm.name)).toEqual(["node"]);
  });

  it("applies --measurements to the default instrument", () => {
    const parsed = parseRunArgs(["-b", "bench.ts", "--measurements", "2"]);

    expect(parsed.ok && parsed.config.instrumentOptions).toEqual({
      runtime: { measurements: "2" },
    });
  });

  it("reports an unknown flag", () => {
    expect(parseRunArgs(["-b", "bench.ts", "--nope"])).toEqual({
      ok: false,
      summary: "  error: unknown option '--nope'",
    });
  });

  it("reports a flag without its value", () => {
    expect(parseRunArgs(["--benchmark"])).toEqual({
      ok: false,
      summary: "  error: option '-b, --benchmark <path>' argument missing",
    });
  });

  it("collects every problem with the flag values", () => {
    const parsed = parseRunArgs(["--outliers", "sometimes", "--option", "broken"]);

    expect(parsed).toEqual({
      ok: false,
      summary: [
        '  --option expects <instrument>.<name>=<value>, got "broken"',
        '  --outliers must be none, flag or trim, got "sometimes"',
        "  benchmark: String must contain at least 1 character(s)",
      ].join("\n"),
    });
  });

  it("accepts attached short values", () => {
    const parsed = parseRunArgs(["-bbench.ts", "-mconcat"]);

    expect(parsed.ok && [parsed.config.benchmark, parsed.config.methods]).toEqual(["bench.ts", ["concat"]]);
  });

  it("rejects a non-numeric parallelism", () => {
    const parsed = parseRunArgs(["-b", "bench.ts", "--parallel", "lots"]);

    expect(parsed.ok).toBe(false);
  });
});

describe("formatEvent", () => {
  it("formats warnings and finished trials", () => {
    expect(formatEvent({ type: "warning", message: "careful" })).toBe("Warning: careful");
    expect(
      formatEvent({
        type: "trial-finished",
        label: "runtime:loop on node",
        completed: 2,
        total: 3,
        result: {
          trialId: 2,
          method: "loop",
          instrument: "runtime",
          vm: "node",
          params: {},
          state: "TIMED_OUT",
          reason: "Trial exceeded its 10ms deadline",
          measurements: [],
          partialWarmup: false,
          reps: 1,
          gcEvents: 0,
          vmOptions: {},
        },
      }),
    ).toBe("  [2/3] runtime:loop on node TIMED_OUT (Trial exceeded its 10ms deadline)");
  });
});

describe("runCommand", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("dry-runs a benchmark module and prints the report", async () => {
    const stdout = vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
    const launcher = createFakeLauncher({ definition: recursion });

    const code = await run(() =>
      runCommand(["--benchmark", recursionPath, "--method", "async-await", "--dry-run"], { launcher }),
    );

    expect(code).toBe(0);
    const printed: unknown = JSON.parse(String(stdout.mock.calls[0][0]));
    expect(printed).toMatchObject({
      benchmark: "recursion",
      dryRun: true,
      groups: [
        { key: "runtime:async-await[depth=10]", stats: null },
        { key: "runtime:async-await[depth=100]", stats: null },
      ],
    });
  });

  it("fails on setup errors before starting workers", async () => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    const stderr = vi.spyOn(console, "error").mockImplementation(() => {});
    const launcher = createFakeLauncher({ definition: recursion });

    const code = await run(() =>
      runCommand(["--benchmark", recursionPath, "--instrument", "allocation"], { launcher }),
    );

    expect(code).toBe(1);
    expect(stderr).toHaveBeenCalledWith(
      "ConfigurationError: allocation is not a configured instrument (runtime, arbitrary)",
    );
    expect(launcher.workers).toHaveLength(0);
  });
});
