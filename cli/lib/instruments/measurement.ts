import { MeasurementFailure } from "../errors.ts";
import { MeasurementSchema, type Measurement } from "../schema.ts";

/**
 * Freeze a measurement after checking its value and weight.
 * @throws MeasurementFailure for non-finite or negative values, or a weight
 *   that is not a whole number of at least 1
 */
export function checkedMeasurement(measurement: Measurement): Measurement {
  const { description, value, unit, weight } = measurement;
  if (!Number.isFinite(value) || value < 0) {
    throw new MeasurementFailure(`Rejected ${description} reading: ${value} ${unit}`);
  }
  if (!MeasurementSchema.shape.weight.safeParse(weight).success) {
    throw new MeasurementFailure(`Rejected ${description} reading with weight ${weight}`);
  }
  return Object.freeze({ description, value, unit, weight });
}
