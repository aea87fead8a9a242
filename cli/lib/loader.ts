/**
 * Loads a benchmark module and describes it as a read-only handle.
 *
 * Both the controller and the worker harness load the same module: the
 * controller only needs method descriptors, the harness needs the functions.
 *
 * @module
 */

import { resolve } from "node:path";
import { pathToFileURL } from "node:url";
import { call, type Operation } from "effection";
import { z } from "zod";
import type {
  BenchmarkDefinition,
  BenchmarkMethodDefinition,
  TimedFn,
  ValueFn,
} from "../harness/types.ts";
import { InvalidBenchmarkError } from "./errors.ts";
import {
  ParamValueSchema,
  type BenchmarkMethod,
  type ParamAssignment,
  type ParamValue,
} from "./schema.ts";

/**
 * Read-only description of a benchmark target.
 */
export interface BenchmarkHandle {
  name: string;
  /** Absolute path the worker harness imports */
  modulePath: string;
  methods: readonly BenchmarkMethod[];
  params: Readonly<Record<string, readonly ParamValue[]>>;
}

const TimedFnSchema = z.custom<TimedFn>((value) => typeof value === "function", {
  message: "fn must be a function",
});

const ValueFnSchema = z.custom<ValueFn>((value) => typeof value === "function", {
  message: "fn must be a function",
});

const MethodDefinitionSchema = z.discriminatedUnion("kind", [
  z.object({
    name: z.string().min(1),
    kind: z.literal("timed-loop"),
    fn: TimedFnSchema,
  }),
  z.object({
    name: z.string().min(1),
    kind: z.literal("single-shot"),
    unit: z.string().min(1),
    description: z.string().min(1).optional(),
    fn: ValueFnSchema,
  }),
]);

const BenchmarkModuleSchema = z.object({
  default: z.object({
    name: z.string().min(1),
    params: z.record(z.array(ParamValueSchema).min(1)).optional(),
    methods: z.array(MethodDefinitionSchema),
  }),
});

/**
 * Import a benchmark module and validate its default export.
 * @throws InvalidBenchmarkError if the module does not export a benchmark
 */
export function* loadBenchmarkDefinition(modulePath: string): Operation<BenchmarkDefinition> {
  const url = pathToFileURL(resolve(modulePath)).href;
  const mod: unknown = yield* call(() => import(url));
  const result = BenchmarkModuleSchema.safeParse(mod);
  if (!result.success) {
    throw new InvalidBenchmarkError(
      `${modulePath} does not default-export a benchmark definition: ${result.error.message}`,
    );
  }
  return result.data.default;
}

/**
 * Parameter signature of a method definition, derived from the arity of
 * its function. A timed method that ignores its rep count has no "reps".
 */
function signatureOf(definition: BenchmarkMethodDefinition): string[] {
  const names = definition.kind === "timed-loop" ? ["reps", "params"] : ["params"];
  return names.slice(0, definition.fn.length);
}

/**
 * Describe a loaded definition as a benchmark handle.
 */
export function toBenchmarkHandle(
  definition: BenchmarkDefinition,
  modulePath: string,
): BenchmarkHandle {
  const methods = definition.methods.map((method): BenchmarkMethod => {
    const descriptor: BenchmarkMethod =
      method.kind === "single-shot"
        ? { name: method.name, kind: method.kind, parameters: signatureOf(method), unit: method.unit }
        : { name: method.name, kind: method.kind, parameters: signatureOf(method) };
    return Object.freeze(descriptor);
  });

  return Object.freeze({
    name: definition.name,
    modulePath: resolve(modulePath),
    methods: Object.freeze(methods),
    params: Object.freeze({ ...definition.params }),
  });
}

/**
 * Import a benchmark module and describe it.
 */
export function* loadBenchmarkHandle(modulePath: string): Operation<BenchmarkHandle> {
  const definition = yield* loadBenchmarkDefinition(modulePath);
  return toBenchmarkHandle(definition, modulePath);
}

/**
 * Every assignment of the declared parameter values.
 * Keys are visited in sorted order, values in declared order.
 * No declared parameters yields a single empty assignment.
 */
export function parameterCombinations(
  params: Readonly<Record<string, readonly ParamValue[]>>,
): ParamAssignment[] {
  let combinations: Record<string, ParamValue>[] = [{}];
  for (const key of Object.keys(params).sort()) {
    const next: Record<string, ParamValue>[] = [];
    for (const combination of combinations) {
      for (const value of params[key]) {
        next.push({ ...combination, [key]: value });
      }
    }
    combinations = next;
  }
  return combinations.map((combination) => Object.freeze(combination));
}

/**
 * Stable text form of a parameter assignment, e.g. "size=10,unit=kb".
 */
export function formatParams(params: ParamAssignment): string {
  return Object.keys(params)
    .sort()
    .map((key) => `${key}=${String(params[key])}`)
    .join(",");
}
