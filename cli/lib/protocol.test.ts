import { describe, expect, it } from "vitest";
import { ProtocolError } from "./errors.ts";
import {
  createLineFramer,
  decodeMessage,
  decodeRequest,
  encodeMessage,
  encodeRequest,
  type LogMessage,
  type WorkerRequest,
} from "./protocol.ts";

describe("protocol", () => {
  it("round-trips every worker message variant", () => {
    const messages: LogMessage[] = [
      { type: "process-started", workerId: 3, pid: 4242 },
      { type: "vm-options", options: { node: "v20.11.0" } },
      { type: "gc", kind: "minor", durationMs: 0.5 },
      { type: "failure", message: "boom", stack: "Error: boom\n    at fn" },
      { type: "timer-granularity", nanos: 40 },
      { type: "configured", trialId: 7 },
      { type: "stop-measurement", reps: 100, elapsedNs: 1_250_000 },
      { type: "value-measurement", description: "heap", value: 2048, unit: "bytes" },
      { type: "dry-run-success", ids: [1, 2] },
      { type: "stopped" },
    ];

    for (const message of messages) {
      expect(decodeMessage(encodeMessage(message))).toEqual(message);
    }
  });

  it("round-trips controller requests", () => {
    const requests: WorkerRequest[] = [
      {
        type: "configure",
        trialId: 1,
        method: "concat",
        params: { size: 10, mode: "fast", warm: true },
        options: { measurements: "3" },
        loop: { mode: "fixed-reps", emits: ["stop-measurement", "gc"] },
      },
      { type: "probe-timer" },
      { type: "run", reps: 1000 },
      { type: "dry-run", trialId: 1 },
      { type: "stop" },
    ];

    for (const request of requests) {
      expect(decodeRequest(encodeRequest(request))).toEqual(request);
    }
  });

  it("frames each message as one line", () => {
    expect(encodeMessage({ type: "stopped" })).toBe('{"type":"stopped"}\n');
  });

  it("carries non-finite readings as strings", () => {
    const line = encodeMessage({ type: "stop-measurement", reps: 1, elapsedNs: Number.NaN });

    expect(line).toBe('{"type":"stop-measurement","reps":1,"elapsedNs":"NaN"}\n');
    expect(decodeMessage(line)).toEqual({ type: "stop-measurement", reps: 1, elapsedNs: Number.NaN });
    expect(
      decodeMessage('{"type":"value-measurement","description":"d","value":"-Infinity","unit":"u"}'),
    ).toEqual({ type: "value-measurement", description: "d", value: -Infinity, unit: "u" });
  });

  it("rejects malformed lines", () => {
    expect(() => decodeMessage("not json")).toThrow(
      new ProtocolError("Malformed message: not json", "not json"),
    );
  });

  it("rejects unknown message types and keeps the line", () => {
    try {
      decodeMessage('{"type":"mystery"}');
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ProtocolError);
      if (error instanceof ProtocolError) {
        expect(error.line).toBe('{"type":"mystery"}');
        expect(error.message).toMatch(/^Unrecognized message: \{"type":"mystery"\} \(/);
      }
    }
  });

  it("truncates long lines in error messages", () => {
    const line = "x".repeat(200);
    expect(() => decodeRequest(line)).toThrow(`Malformed message: ${"x".repeat(117)}...`);
  });

  it("rejects a run request without a positive rep count", () => {
    expect(() => decodeRequest('{"type":"run","reps":0}')).toThrow(ProtocolError);
  });
});

describe("createLineFramer", () => {
  it("reassembles lines split across chunks", () => {
    const framer = createLineFramer();

    expect(framer.push('{"type":')).toEqual([]);
    expect(framer.push('"stopped"}\n{"type"')).toEqual(['{"type":"stopped"}']);
    expect(framer.push(':"probe-timer"}\r\n\n')).toEqual(['{"type":"probe-timer"}']);
  });

  it("decodes byte chunks split inside a multi-byte character", () => {
    const framer = createLineFramer();
    const bytes = new TextEncoder().encode("héllo\n");

    expect(framer.push(bytes.slice(0, 2))).toEqual([]);
    expect(framer.push(bytes.slice(2))).toEqual(["héllo"]);
  });

  it("returns the unterminated tail on flush", () => {
    const framer = createLineFramer();
    framer.push("first\nsecond");

    expect(framer.flush()).toEqual(["second"]);
    expect(framer.flush()).toEqual([]);
  });
});
