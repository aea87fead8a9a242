import { writeFileSync } from "node:fs";
import { defineBenchmark } from "../../harness/types.ts";

export default defineBenchmark({
  name: "busy",
  methods: [
    {
      name: "quick",
      kind: "timed-loop",
      fn: (reps) => {
        let total = 0;
        for (let i = 0; i < reps; i++) {
          total += i;
        }
        return total;
      },
    },
    {
      name: "spin",
      kind: "timed-loop",
      fn: (_reps) => {
        const pidFile = process.env.FORKBENCH_PID_FILE;
        if (pidFile) {
          writeFileSync(pidFile, String(process.pid));
        }
        const until = Date.now() + 30_000;
        let spins = 0;
        while (Date.now() < until) {
          spins++;
        }
        return spins;
      },
    },
  ],
});
