/**
 * Zod schemas for run configuration, benchmark descriptors and reports.
 * This is the single source of truth for the data formats the engine
 * accepts and produces (wire messages live in protocol.ts).
 *
 * @module
 */

import { z } from "zod";

/**
 * Report format version.
 * Increment when making breaking changes to the report layout.
 */
export const SCHEMA_VERSION = 1;

/**
 * A single instrument option value, as it arrives from the command line
 * or from a configuration object.
 */
export const OptionValueSchema = z.union([z.string(), z.number(), z.boolean()]);

/**
 * Option value type.
 */
export type OptionValue = z.infer<typeof OptionValueSchema>;

/**
 * Ordered mapping of option name to value.
 */
export const OptionMapSchema = z.record(OptionValueSchema);

/**
 * Option map type.
 */
export type OptionMap = z.infer<typeof OptionMapSchema>;

/**
 * A VM configuration: how to launch one kind of worker process.
 */
export const VmConfigSchema = z.object({
  name: z.string().min(1),
  command: z.string().min(1),
  args: z.array(z.string()).default([]),
  env: z.record(z.string()).default({}),
  /** Instruments this VM can host. Absent means every instrument. */
  instruments: z.array(z.string().min(1)).optional(),
});

/**
 * VM configuration type.
 */
export type VmConfig = z.infer<typeof VmConfigSchema>;

/**
 * The VM used when a run names none: the current Node.js binary with tsx
 * loaded so the harness can import TypeScript benchmark modules.
 */
export function defaultVm(): VmConfig {
  return {
    name: "node",
    command: process.execPath,
    args: ["--import", "tsx"],
    env: {},
  };
}

/**
 * How outliers are treated when summarising a group of trials.
 */
export const OutlierPolicySchema = z.enum(["none", "flag", "trim"]);

/**
 * Outlier policy type.
 */
export type OutlierPolicy = z.infer<typeof OutlierPolicySchema>;

/**
 * Run configuration schema.
 */
export const RunConfigSchema = z.object({
  benchmark: z.string().min(1),
  instruments: z.array(z.string().min(1)).default([]),
  defaultInstruments: z.array(z.string().min(1)).default(["runtime"]),
  instrumentOptions: z.record(OptionMapSchema).default({}),
  methods: z.array(z.string().min(1)).default([]),
  vms: z.array(VmConfigSchema).min(1).default(() => [defaultVm()]),
  parallelism: z.number().int().positive().default(1),
  trialTimeoutMs: z.number().int().positive().default(60_000),
  startupTimeoutMs: z.number().int().positive().default(10_000),
  terminateGraceMs: z.number().int().nonnegative().default(1_000),
  startupRetryBackoffMs: z.number().int().nonnegative().default(250),
  freshVmPerTrial: z.boolean().default(false),
  dryRun: z.boolean().default(false),
  outlierPolicy: OutlierPolicySchema.default("flag"),
});

/**
 * Fully resolved run configuration.
 */
export type RunConfig = z.infer<typeof RunConfigSchema>;

/**
 * Run configuration before defaults are applied.
 */
export type RunConfigInput = z.input<typeof RunConfigSchema>;

/**
 * Validate a run configuration and apply defaults.
 * Throws ZodError if validation fails.
 */
export function validateRunConfig(data: unknown): RunConfig {
  return RunConfigSchema.parse(data);
}

/**
 * How a benchmark method expects to be invoked.
 */
export const MethodKindSchema = z.enum(["timed-loop", "single-shot"]);

/**
 * Method kind type.
 */
export type MethodKind = z.infer<typeof MethodKindSchema>;

/**
 * Descriptor of one benchmark method.
 */
export const BenchmarkMethodSchema = z.object({
  name: z.string().min(1),
  kind: MethodKindSchema,
  /** Parameter signature, e.g. ["reps", "params"] */
  parameters: z.array(z.string()).default([]),
  /** Unit of the value a single-shot method returns */
  unit: z.string().min(1).optional(),
});

/**
 * Benchmark method type.
 */
export type BenchmarkMethod = Readonly<z.infer<typeof BenchmarkMethodSchema>>;

/**
 * Values a declared benchmark parameter sweeps over.
 */
export const ParamValueSchema = z.union([z.string(), z.number(), z.boolean()]);

/**
 * Parameter value type.
 */
export type ParamValue = z.infer<typeof ParamValueSchema>;

/**
 * One assignment of a value to every declared parameter.
 */
export type ParamAssignment = Readonly<Record<string, ParamValue>>;

/**
 * A measurement: a named numeric value with a unit and the number of
 * underlying reps it represents.
 */
export const MeasurementSchema = z.object({
  description: z.string().min(1),
  value: z.number().finite().nonnegative(),
  unit: z.string().min(1),
  weight: z.number().int().min(1),
});

/**
 * Measurement type.
 */
export type Measurement = Readonly<z.infer<typeof MeasurementSchema>>;

/**
 * Terminal state of a trial.
 */
export const TrialStateSchema = z.enum(["SUCCESS", "FAILED", "TIMED_OUT"]);

/**
 * Trial state type.
 */
export type TrialState = z.infer<typeof TrialStateSchema>;

/**
 * Computed summary statistics over per-rep values.
 */
export interface SummaryStats {
  count: number;
  mean: number;
  min: number;
  max: number;
  stdDev: number;
  p50: number;
  p95: number;
  p99: number;
}

/**
 * The outcome of one trial.
 */
export interface TrialResult {
  trialId: number;
  method: string;
  instrument: string;
  vm: string;
  params: ParamAssignment;
  state: TrialState;
  /** Human-readable cause when state is not SUCCESS */
  reason?: string;
  measurements: readonly Measurement[];
  /** Warmup hit its time cap before the timings stabilised */
  partialWarmup: boolean;
  /** Reps per timed loop chosen by calibration (1 when not calibrated) */
  reps: number;
  gcEvents: number;
  vmOptions: Readonly<Record<string, string>>;
}

/**
 * A trial as listed under its report group.
 */
export interface TrialSummary {
  trialId: number;
  vm: string;
  state: TrialState;
  reason?: string;
  partialWarmup: boolean;
}

/**
 * Aggregated results for one (method, instrument, parameters) key.
 */
export interface ReportGroup {
  key: string;
  method: string;
  instrument: string;
  params: ParamAssignment;
  unit: string | null;
  stats: SummaryStats | null;
  outliers: number;
  trimmed: boolean;
  partialWarmup: boolean;
  trials: readonly TrialSummary[];
}

/**
 * The final, immutable run report.
 */
export interface RunReport {
  schemaVersion: number;
  benchmark: string;
  dryRun: boolean;
  groups: readonly ReportGroup[];
  trials: readonly TrialResult[];
  warnings: readonly string[];
}
