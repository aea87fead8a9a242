/**
 * Wire protocol between the controller and a worker process.
 *
 * Every message is one JSON object on its own line. The worker writes
 * {@link LogMessage}s to stdout and reads {@link WorkerRequest}s from
 * stdin, answering requests strictly in order.
 *
 * @module
 */

import { z } from "zod";
import { ProtocolError } from "./errors.ts";
import { OptionValueSchema, ParamValueSchema } from "./schema.ts";

/**
 * Numbers that may be non-finite. JSON has no NaN or Infinity, so they
 * travel as strings and are restored on decode.
 */
const WireNumberSchema = z.union([
  z.number(),
  z.enum(["NaN", "Infinity", "-Infinity"]).transform(Number),
]);

/**
 * How the worker should invoke a benchmark method for one `run` request.
 */
export const WorkerLoopSpecSchema = z.discriminatedUnion("mode", [
  z.object({
    mode: z.literal("fixed-reps"),
    emits: z.array(z.string()),
  }),
  z.object({
    mode: z.literal("single-invocation"),
    emits: z.array(z.string()),
  }),
]);

/**
 * Worker loop specification type.
 */
export type WorkerLoopSpec = z.infer<typeof WorkerLoopSpecSchema>;

/**
 * Messages a worker sends to the controller.
 */
export const LogMessageSchema = z.discriminatedUnion("type", [
  z.object({
    type: z.literal("process-started"),
    workerId: z.number().int().nonnegative(),
    pid: z.number().int(),
  }),
  z.object({
    type: z.literal("vm-options"),
    options: z.record(z.string()),
  }),
  z.object({
    type: z.literal("gc"),
    kind: z.string(),
    durationMs: z.number().nonnegative(),
  }),
  z.object({
    type: z.literal("failure"),
    message: z.string(),
    stack: z.string().optional(),
  }),
  z.object({
    type: z.literal("timer-granularity"),
    nanos: z.number().positive(),
  }),
  z.object({
    type: z.literal("configured"),
    trialId: z.number().int(),
  }),
  z.object({
    type: z.literal("stop-measurement"),
    reps: z.number().int().positive(),
    elapsedNs: WireNumberSchema,
  }),
  z.object({
    type: z.literal("value-measurement"),
    description: z.string(),
    value: WireNumberSchema,
    unit: z.string(),
  }),
  z.object({
    type: z.literal("dry-run-success"),
    ids: z.array(z.number().int()),
  }),
  z.object({
    type: z.literal("stopped"),
  }),
]);

/**
 * Worker to controller message.
 */
export type LogMessage = z.infer<typeof LogMessageSchema>;

/**
 * Narrow a LogMessage union by its `type` tag.
 */
export type LogMessageOf<T extends LogMessage["type"]> = Extract<
  LogMessage,
  { type: T }
>;

/**
 * Requests the controller sends to a worker.
 */
export const WorkerRequestSchema = z.discriminatedUnion("type", [
  z.object({
    type: z.literal("configure"),
    trialId: z.number().int(),
    method: z.string(),
    params: z.record(ParamValueSchema),
    options: z.record(OptionValueSchema),
    loop: WorkerLoopSpecSchema,
  }),
  z.object({
    type: z.literal("probe-timer"),
  }),
  z.object({
    type: z.literal("run"),
    reps: z.number().int().positive(),
  }),
  z.object({
    type: z.literal("dry-run"),
    trialId: z.number().int(),
  }),
  z.object({
    type: z.literal("stop"),
  }),
]);

/**
 * Controller to worker request.
 */
export type WorkerRequest = z.infer<typeof WorkerRequestSchema>;

function encode(value: unknown): string {
  const json = JSON.stringify(value, (_key, field: unknown) =>
    typeof field === "number" && !Number.isFinite(field) ? String(field) : field,
  );
  return `${json}\n`;
}

function decode<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, line: string): T {
  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch {
    throw new ProtocolError(`Malformed message: ${truncate(line)}`, line);
  }

  const result = schema.safeParse(parsed);
  if (!result.success) {
    throw new ProtocolError(
      `Unrecognized message: ${truncate(line)} (${result.error.issues[0]?.message ?? "invalid"})`,
      line,
    );
  }
  return result.data;
}

function truncate(line: string): string {
  return line.length > 120 ? `${line.slice(0, 117)}...` : line;
}

/**
 * Serialize a worker message as one framed line.
 */
export function encodeMessage(message: LogMessage): string {
  return encode(message);
}

/**
 * Parse one line into a worker message.
 * @throws ProtocolError if the line is not a known message
 */
export function decodeMessage(line: string): LogMessage {
  return decode(LogMessageSchema, line);
}

/**
 * Serialize a controller request as one framed line.
 */
export function encodeRequest(request: WorkerRequest): string {
  return encode(request);
}

/**
 * Parse one line into a controller request.
 * @throws ProtocolError if the line is not a known request
 */
export function decodeRequest(line: string): WorkerRequest {
  return decode(WorkerRequestSchema, line);
}

/**
 * Reassembles newline-delimited frames from arbitrarily split chunks.
 */
export interface LineFramer {
  /** Feed a chunk, returning every line it completes. */
  push(chunk: string | Uint8Array): string[];
  /** Return whatever partial line remains once the stream has ended. */
  flush(): string[];
}

/**
 * Create a line framer. Blank lines are skipped.
 */
export function createLineFramer(): LineFramer {
  const decoder = new TextDecoder();
  let pending = "";

  const complete = (): string[] => {
    const parts = pending.split("\n");
    pending = parts.pop() ?? "";
    return parts.map((part) => part.replace(/\r$/, "")).filter((part) => part.length > 0);
  };

  return {
    push(chunk) {
      pending += typeof chunk === "string" ? chunk : decoder.decode(chunk, { stream: true });
      return complete();
    },
    flush() {
      pending += decoder.decode();
      const rest = pending.trim();
      pending = "";
      return rest.length > 0 ? [rest] : [];
    },
  };
}
