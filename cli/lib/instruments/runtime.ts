/**
 * Runtime instrument: times fixed-rep loops and reports nanoseconds per loop.
 *
 * @module
 */

import { z } from "zod";
import { DEFAULT_CALIBRATION, type CalibrationSettings } from "../calibration.ts";
import { ConfigurationError, InvalidBenchmarkError, MeasurementFailure } from "../errors.ts";
import type { LogMessage, LogMessageOf } from "../protocol.ts";
import type { Instrument, InstrumentConfig } from "./types.ts";
import { checkedMeasurement } from "./measurement.ts";

/**
 * Options accepted by the runtime instrument.
 * Values may arrive as strings from the command line.
 */
export const RuntimeOptionsSchema = z.object({
  measurements: z.coerce.number().int().positive().default(9),
  granularityMargin: z.coerce.number().positive().default(DEFAULT_CALIBRATION.granularityMargin),
  minLoopNs: z.coerce.number().nonnegative().default(DEFAULT_CALIBRATION.minLoopNs),
  maxProbeAttempts: z.coerce.number().int().positive().default(DEFAULT_CALIBRATION.maxProbeAttempts),
  warmupStrategy: z.enum(["cv", "duration"]).default(DEFAULT_CALIBRATION.warmupStrategy),
  cvThreshold: z.coerce.number().positive().default(DEFAULT_CALIBRATION.cvThreshold),
  windowSize: z.coerce.number().int().positive().default(DEFAULT_CALIBRATION.windowSize),
  minWarmupNs: z.coerce.number().nonnegative().default(DEFAULT_CALIBRATION.minWarmupNs),
  maxWarmupNs: z.coerce.number().nonnegative().default(DEFAULT_CALIBRATION.maxWarmupNs),
  maxWarmupLoops: z.coerce.number().int().positive().default(DEFAULT_CALIBRATION.maxWarmupLoops),
});

export type RuntimeOptions = z.infer<typeof RuntimeOptionsSchema>;

/**
 * Parse runtime instrument options.
 * @throws ConfigurationError if an option has an invalid value
 */
export function parseRuntimeOptions(config: InstrumentConfig): RuntimeOptions {
  const result = RuntimeOptionsSchema.safeParse(config.options);
  if (!result.success) {
    throw new ConfigurationError(
      `Invalid options for instrument ${config.instrument}: ${result.error.message}`,
    );
  }
  return result.data;
}

function isStopMeasurement(message: LogMessage): message is LogMessageOf<"stop-measurement"> {
  return message.type === "stop-measurement";
}

/**
 * Create the runtime instrument.
 */
export function createRuntimeInstrument(): Instrument {
  return {
    id: "runtime",

    isBenchmarkMethod(method) {
      return method.kind === "timed-loop";
    },

    createInstrumentedMethod(method, config) {
      if (method.parameters[0] !== "reps") {
        throw new InvalidBenchmarkError(
          `Timed benchmark method ${method.name} must take the rep count as its first parameter`,
        );
      }
      parseRuntimeOptions(config);
      return { method, instrument: this, config };
    },

    newWorkerLoop() {
      return { mode: "fixed-reps", emits: ["stop-measurement", "gc"] };
    },

    toMeasurement(messages) {
      const reading = messages.find(isStopMeasurement);
      if (!reading) {
        throw new MeasurementFailure("Worker sent no stop-measurement for a timed loop");
      }
      return checkedMeasurement({
        description: "runtime",
        value: reading.elapsedNs,
        unit: "ns",
        weight: reading.reps,
      });
    },

    measurementCount(config) {
      return parseRuntimeOptions(config).measurements;
    },

    calibration(config): CalibrationSettings {
      const { measurements: _measurements, ...settings } = parseRuntimeOptions(config);
      return settings;
    },
  };
}
