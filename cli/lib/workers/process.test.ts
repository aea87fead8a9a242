import { mkdtempSync, readFileSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import { run } from "effection";
import { afterEach, describe, expect, it, vi } from "vitest";
import { loadBenchmarkHandle } from "../loader.ts";
import { defaultVm, validateRunConfig } from "../schema.ts";
import { createRun } from "../setup.ts";

const busy = fileURLToPath(new URL("../fixtures/busy.ts", import.meta.url));

function isAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    return !(error instanceof Error && "code" in error && error.code === "ESRCH");
  }
}

describe("subprocess workers", () => {
  let dir: string | undefined;

  afterEach(() => {
    if (dir) {
      rmSync(dir, { recursive: true, force: true });
      dir = undefined;
    }
  });

  it("measures a quick method and kills a busy worker at its deadline", async () => {
    dir = mkdtempSync(join(tmpdir(), "forkbench-"));
    const pidFile = join(dir, "worker.pid");
    const config = validateRunConfig({
      benchmark: busy,
      methods: ["quick", "spin"],
      vms: [{ ...defaultVm(), env: { FORKBENCH_PID_FILE: pidFile } }],
      instrumentOptions: {
        runtime: { measurements: "2", warmupStrategy: "duration", minLoopNs: "100000" },
      },
      trialTimeoutMs: 3_000,
      terminateGraceMs: 200,
    });

    const started = Date.now();
    const report = await run(function* () {
      const handle = yield* loadBenchmarkHandle(busy);
      return yield* createRun(config, handle).run();
    });
    const elapsedMs = Date.now() - started;

    expect(report.trials.map((t) => [t.method, t.state])).toEqual([
      ["quick", "SUCCESS"],
      ["spin", "TIMED_OUT"],
    ]);
    expect(report.trials[0].measurements).toHaveLength(2);
    expect(report.trials[1].reason).toBe("Trial exceeded its 3000ms deadline");
    expect(elapsedMs).toBeLessThan(12_000);

    const pid = Number(readFileSync(pidFile, "utf8"));
    await vi.waitFor(() => expect(isAlive(pid)).toBe(false), { timeout: 2_000, interval: 50 });
  }, 30_000);
});
