import { describe, expect, it } from "vitest";
import { ConfigurationError, InvalidBenchmarkError, InvalidCommandError, MeasurementFailure } from "../errors.ts";
import type { BenchmarkHandle } from "../loader.ts";
import type { BenchmarkMethod, VmConfig } from "../schema.ts";
import {
  createInstrumentedMethods,
  findAllBenchmarkMethods,
  getInstrument,
  resolveInstrumentConfig,
  selectInstruments,
} from "./mod.ts";
import { checkedMeasurement } from "./measurement.ts";

function vm(name: string, instruments?: string[]): VmConfig {
  return { name, command: "node", args: [], env: {}, ...(instruments ? { instruments } : {}) };
}

function handle(methods: BenchmarkMethod[]): BenchmarkHandle {
  return { name: "target", modulePath: "/tmp/target.ts", methods, params: {} };
}

const timed = (name: string): BenchmarkMethod => ({
  name,
  kind: "timed-loop",
  parameters: ["reps", "params"],
});

const shot = (name: string): BenchmarkMethod => ({
  name,
  kind: "single-shot",
  parameters: ["params"],
  unit: "bytes",
});

describe("getInstrument", () => {
  it("rejects unregistered instruments", () => {
    expect(() => getInstrument("allocation")).toThrow(
      new ConfigurationError("allocation is not a configured instrument (runtime, arbitrary)"),
    );
  });

  it("does not treat prototype keys as instruments", () => {
    expect(() => getInstrument("toString")).toThrow(ConfigurationError);
  });
});

describe("selectInstruments", () => {
  it("falls back to the default instruments", () => {
    const { instruments, warnings } = selectInstruments({
      selected: [],
      defaults: ["runtime"],
      options: {},
      vms: [vm("node")],
    });

    expect(instruments.map((s) => s.instrument.id)).toEqual(["runtime"]);
    expect(warnings).toEqual([]);
  });

  it("drops instruments a VM cannot host, with a warning", () => {
    const { instruments, warnings } = selectInstruments({
      selected: ["runtime", "arbitrary"],
      defaults: [],
      options: {},
      vms: [vm("a"), vm("b", ["arbitrary"])],
    });

    expect(instruments.map((s) => s.instrument.id)).toEqual(["arbitrary"]);
    expect(warnings).toEqual([
      "Instrument runtime not supported on at least one target VM; ignoring",
    ]);
  });

  it("fails when nothing usable remains", () => {
    expect(() =>
      selectInstruments({
        selected: ["runtime"],
        defaults: [],
        options: {},
        vms: [vm("a", [])],
      }),
    ).toThrow(new InvalidCommandError("No usable instrument remains (requested: runtime)"));
  });

  it("resolves options with keys in a stable order", () => {
    const { instruments } = selectInstruments({
      selected: ["runtime"],
      defaults: [],
      options: { runtime: { windowSize: 3, measurements: 4 } },
      vms: [vm("node")],
    });

    expect(Object.keys(instruments[0].config.options)).toEqual(["measurements", "windowSize"]);
    expect(Object.isFrozen(instruments[0].config.options)).toBe(true);
  });
});

describe("findAllBenchmarkMethods", () => {
  it("keeps methods the instrument accepts, sorted by name", () => {
    const methods = findAllBenchmarkMethods(
      handle([timed("zeta"), shot("size"), timed("alpha")]),
      getInstrument("runtime"),
    );

    expect(methods.map((m) => m.name)).toEqual(["alpha", "zeta"]);
  });

  it("lists exactly the overloaded names", () => {
    expect(() =>
      findAllBenchmarkMethods(
        handle([timed("b"), timed("a"), timed("b"), timed("c"), timed("a")]),
        getInstrument("runtime"),
      ),
    ).toThrow(
      new InvalidBenchmarkError(
        "Overloads are disallowed for benchmark methods, found overloads of [a, b] in benchmark target",
      ),
    );
  });
});

describe("createInstrumentedMethods", () => {
  const selection = () =>
    selectInstruments({
      selected: ["runtime", "arbitrary"],
      defaults: [],
      options: {},
      vms: [vm("node")],
    }).instruments;

  it("binds each method to the instrument that measures it", () => {
    const bound = createInstrumentedMethods(
      handle([timed("loop"), shot("size")]),
      selection(),
    );

    expect(bound.map((b) => `${b.instrument.id}:${b.method.name}`)).toEqual([
      "runtime:loop",
      "arbitrary:size",
    ]);
  });

  it("applies the method filter", () => {
    const bound = createInstrumentedMethods(
      handle([timed("loop"), timed("other"), shot("size")]),
      selection(),
      ["other"],
    );

    expect(bound.map((b) => b.method.name)).toEqual(["other"]);
  });

  it("reports filter names that matched nothing", () => {
    expect(() =>
      createInstrumentedMethods(handle([timed("loop")]), selection(), ["zz", "loop", "aa"]),
    ).toThrow(
      new InvalidBenchmarkError("Invalid benchmark method(s) specified in options: [aa, zz]"),
    );
  });

  it("rejects timed methods that ignore the rep count", () => {
    expect(() =>
      createInstrumentedMethods(
        handle([{ name: "noreps", kind: "timed-loop", parameters: [] }]),
        selection(),
      ),
    ).toThrow(InvalidBenchmarkError);
  });

  it("rejects invalid instrument options at setup", () => {
    const instruments = selectInstruments({
      selected: ["runtime"],
      defaults: [],
      options: { runtime: { measurements: "many" } },
      vms: [vm("node")],
    }).instruments;

    expect(() => createInstrumentedMethods(handle([timed("loop")]), instruments)).toThrow(
      ConfigurationError,
    );
  });
});

describe("runtime instrument", () => {
  const runtime = getInstrument("runtime");
  const config = resolveInstrumentConfig("runtime", { measurements: "5", warmupStrategy: "duration" });

  it("turns a stop-measurement into a weighted reading", () => {
    expect(
      runtime.toMeasurement([
        { type: "gc", kind: "minor", durationMs: 1 },
        { type: "stop-measurement", reps: 40, elapsedNs: 8_000 },
      ]),
    ).toEqual({ description: "runtime", value: 8_000, unit: "ns", weight: 40 });
  });

  it("rejects non-finite readings", () => {
    expect(() =>
      runtime.toMeasurement([{ type: "stop-measurement", reps: 1, elapsedNs: Infinity }]),
    ).toThrow(new MeasurementFailure("Rejected runtime reading: Infinity ns"));
  });

  it("fails without a reading", () => {
    expect(() => runtime.toMeasurement([{ type: "configured", trialId: 1 }])).toThrow(
      MeasurementFailure,
    );
  });

  it("reads its measurement count and calibration settings from options", () => {
    expect(runtime.measurementCount(config)).toBe(5);
    expect(runtime.calibration?.(config)).toMatchObject({
      warmupStrategy: "duration",
      cvThreshold: 0.05,
      windowSize: 5,
    });
    expect(runtime.newWorkerLoop(config)).toEqual({
      mode: "fixed-reps",
      emits: ["stop-measurement", "gc"],
    });
  });
});

describe("checkedMeasurement", () => {
  it("keeps whole weights of at least one", () => {
    expect(checkedMeasurement({ description: "runtime", value: 10, unit: "ns", weight: 3 })).toEqual({
      description: "runtime",
      value: 10,
      unit: "ns",
      weight: 3,
    });
  });

  it("rejects fractional and zero weights", () => {
    expect(() => checkedMeasurement({ description: "runtime", value: 10, unit: "ns", weight: 2.5 })).toThrow(
      new MeasurementFailure("Rejected runtime reading with weight 2.5"),
    );
    expect(() => checkedMeasurement({ description: "runtime", value: 10, unit: "ns", weight: 0 })).toThrow(
      new MeasurementFailure("Rejected runtime reading with weight 0"),
    );
  });
});

describe("arbitrary instrument", () => {
  const arbitrary = getInstrument("arbitrary");
  const config = resolveInstrumentConfig("arbitrary");

  it("records the returned value with weight 1", () => {
    expect(
      arbitrary.toMeasurement([
        { type: "value-measurement", description: "heap", value: 512, unit: "bytes" },
      ]),
    ).toEqual({ description: "heap", value: 512, unit: "bytes", weight: 1 });
  });

  it("rejects negative values", () => {
    expect(() =>
      arbitrary.toMeasurement([
        { type: "value-measurement", description: "heap", value: -1, unit: "bytes" },
      ]),
    ).toThrow(new MeasurementFailure("Rejected heap reading: -1 bytes"));
  });

  it("takes one measurement and skips calibration by default", () => {
    expect(arbitrary.measurementCount(config)).toBe(1);
    expect(arbitrary.calibration).toBeUndefined();
  });

  it("requires a unit", () => {
    expect(() =>
      arbitrary.createInstrumentedMethod(
        { name: "bare", kind: "single-shot", parameters: [] },
        config,
      ),
    ).toThrow(new InvalidBenchmarkError("Arbitrary measurement method bare must declare a unit"));
  });
});
