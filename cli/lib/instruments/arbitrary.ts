/**
 * Arbitrary measurement instrument: the benchmark method computes and
 * returns the value to record, e.g. a byte count or a compression ratio.
 * Each measurement is one invocation, so there is nothing to calibrate.
 *
 * @module
 */

import { z } from "zod";
import { ConfigurationError, InvalidBenchmarkError, MeasurementFailure } from "../errors.ts";
import type { LogMessage, LogMessageOf } from "../protocol.ts";
import type { Instrument, InstrumentConfig } from "./types.ts";
import { checkedMeasurement } from "./measurement.ts";

export const ArbitraryOptionsSchema = z.object({
  measurements: z.coerce.number().int().positive().default(1),
});

function measurementsOption(config: InstrumentConfig): number {
  const result = ArbitraryOptionsSchema.safeParse(config.options);
  if (!result.success) {
    throw new ConfigurationError(
      `Invalid options for instrument ${config.instrument}: ${result.error.message}`,
    );
  }
  return result.data.measurements;
}

function isValueMeasurement(message: LogMessage): message is LogMessageOf<"value-measurement"> {
  return message.type === "value-measurement";
}

/**
 * Create the arbitrary measurement instrument.
 */
export function createArbitraryInstrument(): Instrument {
  return {
    id: "arbitrary",

    isBenchmarkMethod(method) {
      return method.kind === "single-shot";
    },

    createInstrumentedMethod(method, config) {
      if (method.parameters.includes("reps")) {
        throw new InvalidBenchmarkError(
          `Arbitrary measurement method ${method.name} must not take a rep count`,
        );
      }
      if (!method.unit) {
        throw new InvalidBenchmarkError(
          `Arbitrary measurement method ${method.name} must declare a unit`,
        );
      }
      measurementsOption(config);
      return { method, instrument: this, config };
    },

    newWorkerLoop() {
      return { mode: "single-invocation", emits: ["value-measurement", "gc"] };
    },

    toMeasurement(messages) {
      const reading = messages.find(isValueMeasurement);
      if (!reading) {
        throw new MeasurementFailure("Worker sent no value-measurement for a single invocation");
      }
      return checkedMeasurement({
        description: reading.description,
        value: reading.value,
        unit: reading.unit,
        weight: 1,
      });
    },

    measurementCount(config) {
      return measurementsOption(config);
    },
  };
}
