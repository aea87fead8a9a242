/**
 * Instrument registry, selection and benchmark method discovery.
 *
 * @module
 */

import { ConfigurationError, InvalidBenchmarkError, InvalidCommandError } from "../errors.ts";
import type { BenchmarkHandle } from "../loader.ts";
import type { BenchmarkMethod, OptionMap, VmConfig } from "../schema.ts";
import { createArbitraryInstrument } from "./arbitrary.ts";
import { createRuntimeInstrument } from "./runtime.ts";
import type {
  Instrument,
  InstrumentConfig,
  InstrumentFactory,
  InstrumentedMethod,
} from "./types.ts";

export type { Instrument, InstrumentConfig, InstrumentFactory, InstrumentedMethod } from "./types.ts";

/**
 * Registry of available instruments by stable key.
 */
export const instruments: Readonly<Record<string, InstrumentFactory>> = {
  runtime: createRuntimeInstrument,
  arbitrary: createArbitraryInstrument,
};

/**
 * Look up an instrument factory.
 * @throws ConfigurationError for an unregistered key
 */
export function getInstrument(
  id: string,
  registry: Readonly<Record<string, InstrumentFactory>> = instruments,
): Instrument {
  const factory = Object.hasOwn(registry, id) ? registry[id] : undefined;
  if (!factory) {
    throw new ConfigurationError(
      `${id} is not a configured instrument (${Object.keys(registry).join(", ")})`,
    );
  }
  return factory();
}

/**
 * Freeze an instrument's options with keys in a stable order.
 */
export function resolveInstrumentConfig(instrument: string, options: OptionMap = {}): InstrumentConfig {
  const ordered: OptionMap = {};
  for (const key of Object.keys(options).sort()) {
    ordered[key] = options[key];
  }
  return Object.freeze({ instrument, options: Object.freeze(ordered) });
}

/**
 * A selected instrument with its resolved configuration.
 */
export interface SelectedInstrument {
  instrument: Instrument;
  config: InstrumentConfig;
}

/**
 * Options for instrument selection.
 */
export interface SelectionOpts {
  /** Instruments named explicitly for this run */
  selected: readonly string[];
  /** Used when nothing is selected explicitly */
  defaults: readonly string[];
  /** Per-instrument option maps */
  options: Readonly<Record<string, OptionMap>>;
  vms: readonly VmConfig[];
  registry?: Readonly<Record<string, InstrumentFactory>>;
}

/**
 * Outcome of instrument selection.
 */
export interface Selection {
  instruments: SelectedInstrument[];
  warnings: string[];
}

function isSupportedByAllVms(id: string, vms: readonly VmConfig[]): boolean {
  return vms.every((vm) => vm.instruments === undefined || vm.instruments.includes(id));
}

/**
 * Resolve the instruments for a run.
 *
 * Instruments that some target VM cannot host are dropped with a warning.
 *
 * @throws ConfigurationError if a name is not registered
 * @throws InvalidCommandError if no instrument remains
 */
export function selectInstruments(opts: SelectionOpts): Selection {
  const names = opts.selected.length > 0 ? opts.selected : opts.defaults;
  const selected: SelectedInstrument[] = [];
  const warnings: string[] = [];

  for (const name of new Set(names)) {
    const instrument = getInstrument(name, opts.registry);
    if (!isSupportedByAllVms(name, opts.vms)) {
      warnings.push(`Instrument ${name} not supported on at least one target VM; ignoring`);
      continue;
    }
    selected.push({
      instrument,
      config: resolveInstrumentConfig(name, opts.options[name]),
    });
  }

  if (selected.length === 0) {
    throw new InvalidCommandError(
      `No usable instrument remains (requested: ${[...names].join(", ") || "none"})`,
    );
  }

  return { instruments: selected, warnings };
}

/**
 * Methods of a benchmark that an instrument can measure, sorted by name.
 *
 * @throws InvalidBenchmarkError listing every overloaded name
 */
export function findAllBenchmarkMethods(
  handle: BenchmarkHandle,
  instrument: Instrument,
): BenchmarkMethod[] {
  const seen = new Set<string>();
  const overloaded = new Set<string>();
  const methods: BenchmarkMethod[] = [];

  for (const method of handle.methods) {
    if (!instrument.isBenchmarkMethod(method)) {
      continue;
    }
    if (seen.has(method.name)) {
      overloaded.add(method.name);
    } else {
      seen.add(method.name);
      methods.push(method);
    }
  }

  if (overloaded.size > 0) {
    throw new InvalidBenchmarkError(
      `Overloads are disallowed for benchmark methods, found overloads of ` +
        `[${[...overloaded].sort().join(", ")}] in benchmark ${handle.name}`,
    );
  }

  return methods.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
}

/**
 * Bind every eligible benchmark method to every selected instrument.
 *
 * @param methodNames - restricts the methods; empty means all
 * @throws InvalidBenchmarkError for overloads, incompatible signatures,
 *   or filter names that matched nothing
 */
export function createInstrumentedMethods(
  handle: BenchmarkHandle,
  selected: readonly SelectedInstrument[],
  methodNames: readonly string[] = [],
): InstrumentedMethod[] {
  const unused = new Set(methodNames);
  const result: InstrumentedMethod[] = [];

  for (const { instrument, config } of selected) {
    for (const method of findAllBenchmarkMethods(handle, instrument)) {
      if (methodNames.length === 0 || methodNames.includes(method.name)) {
        result.push(instrument.createInstrumentedMethod(method, config));
        unused.delete(method.name);
      }
    }
  }

  if (unused.size > 0) {
    throw new InvalidBenchmarkError(
      `Invalid benchmark method(s) specified in options: [${[...unused].sort().join(", ")}]`,
    );
  }

  return result;
}
