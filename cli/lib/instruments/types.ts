/**
 * The instrument contract.
 *
 * An instrument decides which benchmark methods it can measure, how the
 * worker should drive them, and how raw worker readings become
 * {@link Measurement}s. The scheduler only talks to this interface, so a
 * new kind of instrument needs no scheduler change.
 *
 * @module
 */

import type { CalibrationSettings } from "../calibration.ts";
import type { LogMessage, WorkerLoopSpec } from "../protocol.ts";
import type { BenchmarkMethod, Measurement, OptionMap } from "../schema.ts";

/**
 * Resolved options for one selected instrument.
 * Frozen after resolution and shared by every trial that uses it.
 */
export interface InstrumentConfig {
  readonly instrument: string;
  readonly options: Readonly<OptionMap>;
}

/**
 * A benchmark method bound to the instrument that measures it.
 */
export interface InstrumentedMethod {
  readonly method: BenchmarkMethod;
  readonly instrument: Instrument;
  readonly config: InstrumentConfig;
}

/**
 * Instrument interface.
 */
export interface Instrument {
  /** Registry key, e.g. "runtime" */
  readonly id: string;

  /**
   * Whether this instrument can measure the given method.
   * Pure: no side effects, no option parsing.
   */
  isBenchmarkMethod(method: BenchmarkMethod): boolean;

  /**
   * Bind a method to this instrument and its configuration.
   * @throws InvalidBenchmarkError if the method's signature does not fit
   * @throws ConfigurationError if the options are invalid
   */
  createInstrumentedMethod(
    method: BenchmarkMethod,
    config: InstrumentConfig,
  ): InstrumentedMethod;

  /**
   * Describe how the worker should invoke the method for one run request.
   */
  newWorkerLoop(config: InstrumentConfig): WorkerLoopSpec;

  /**
   * Reduce the messages produced by one execution to a single measurement.
   * @throws MeasurementFailure if the reading is missing or not usable
   */
  toMeasurement(messages: readonly LogMessage[]): Measurement;

  /**
   * Number of measured executions per trial.
   */
  measurementCount(config: InstrumentConfig): number;

  /**
   * Calibration settings for instruments that time loops.
   * Instruments without this skip calibration and warmup entirely.
   */
  calibration?(config: InstrumentConfig): CalibrationSettings;
}

/**
 * Creates an instrument instance. Registered under a stable key.
 */
export type InstrumentFactory = () => Instrument;
