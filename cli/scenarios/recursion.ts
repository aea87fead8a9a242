/**
 * Recursion benchmark: structured concurrency overhead of nested calls.
 *
 * A recursive chain of depth `depth` that bottoms out with 100 resolved
 * promises, once with native async/await and once with Effection
 * operations.
 *
 * @module
 */

import { call, run, type Operation } from "effection";
import { defineBenchmark } from "../harness/types.ts";
import type { ParamAssignment } from "../lib/schema.ts";

async function recurseAsync(depth: number): Promise<void> {
  if (depth > 1) {
    await recurseAsync(depth - 1);
  } else {
    for (let i = 0; i < 100; i++) {
      await Promise.resolve();
    }
  }
}

function* recurse(depth: number): Operation<void> {
  if (depth > 1) {
    yield* recurse(depth - 1);
  } else {
    for (let i = 0; i < 100; i++) {
      yield* call(() => Promise.resolve());
    }
  }
}

function depthOf(params: ParamAssignment): number {
  return Number(params.depth);
}

export default defineBenchmark({
  name: "recursion",
  params: {
    depth: [10, 100],
  },
  methods: [
    {
      name: "async-await",
      kind: "timed-loop",
      fn: async (reps, params) => {
        for (let i = 0; i < reps; i++) {
          await recurseAsync(depthOf(params));
        }
      },
    },
    {
      name: "effection",
      kind: "timed-loop",
      fn: async (reps, params) => {
        for (let i = 0; i < reps; i++) {
          await run(() => recurse(depthOf(params)));
        }
      },
    },
    {
      name: "effection-heap",
      kind: "single-shot",
      unit: "bytes",
      description: "heap growth",
      fn: async (params) => {
        const before = process.memoryUsage().heapUsed;
        await run(() => recurse(depthOf(params)));
        return Math.max(0, process.memoryUsage().heapUsed - before);
      },
    },
  ],
});
