/**
 * Events published while a run is in progress.
 *
 * @module
 */

import type { TrialResult } from "./schema.ts";

/**
 * A run event. The engine publishes these instead of writing to the console.
 */
export type RunEvent =
  | { type: "warning"; message: string }
  | { type: "trial-started"; trialId: number; label: string; total: number }
  | { type: "trial-finished"; result: TrialResult; label: string; completed: number; total: number };
