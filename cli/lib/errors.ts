/**
 * Error taxonomy for benchmark runs.
 *
 * Only {@link ConfigurationError} and its subclasses abort a whole run.
 * Every other error is caught per trial and recorded in the report.
 *
 * @module
 */

/**
 * Invalid setup: unknown or unsupported instruments, bad benchmark methods.
 * Raised before any worker process is started.
 */
export class ConfigurationError extends Error {
  override name = "ConfigurationError";
}

/**
 * The requested command cannot run, e.g. no usable instrument remains.
 */
export class InvalidCommandError extends ConfigurationError {
  override name = "InvalidCommandError";
}

/**
 * The benchmark target is malformed (overloads, incompatible signatures,
 * unknown method names).
 */
export class InvalidBenchmarkError extends ConfigurationError {
  override name = "InvalidBenchmarkError";
}

/**
 * A wire message could not be decoded.
 */
export class ProtocolError extends Error {
  override name = "ProtocolError";

  constructor(
    message: string,
    readonly line: string,
  ) {
    super(message);
  }
}

/**
 * A worker process failed to launch or did not complete its handshake.
 */
export class WorkerStartupFailure extends Error {
  override name = "WorkerStartupFailure";
}

/**
 * Timer calibration never converged for a benchmark method.
 */
export class CalibrationFailure extends Error {
  override name = "CalibrationFailure";
}

/**
 * The worker's channel closed while a reply was still expected.
 */
export class ChannelClosedError extends Error {
  override name = "ChannelClosedError";
}

/**
 * The benchmark code itself failed inside the worker.
 */
export class WorkerFailure extends Error {
  override name = "WorkerFailure";

  constructor(
    message: string,
    readonly workerStack?: string,
  ) {
    super(message);
  }
}

/**
 * An instrument rejected a raw reading.
 */
export class MeasurementFailure extends Error {
  override name = "MeasurementFailure";
}

/**
 * Safely convert an unknown caught value to an Error.
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
