// ---------------------------------------------------------------------------
// Compile-Fix Types – loop states, attempts, run configuration and events
// ---------------------------------------------------------------------------

import type { BoardProfile } from "../boards/catalog.js";
import type { InstallationOutcome } from "../libraries/types.js";

export const LOOP_STATES = [
  "RESOLVING",
  "COMPILING",
  "REQUESTING_FIX",
  "REWRITING",
  "SUCCESS",
  "FAILURE",
] as const;
export type LoopState = (typeof LOOP_STATES)[number];

export type TerminalState = Extract<LoopState, "SUCCESS" | "FAILURE">;

/** One compile per iteration; frozen once recorded. */
export type CompileAttempt = Readonly<{
  index: number;
  output: string;
  success: boolean;
}>;

/** Everything a run needs to know up front; nothing is read from ambient state. */
export type RunConfig = {
  sketchPath: string;
  board: BoardProfile;
  retryBudget: number;
};

// ---------------------------------------------------------------------------
// Observer events
// ---------------------------------------------------------------------------

export type CompileFixEvent =
  | { type: "state_changed"; runId: string; state: LoopState; attempt: number; timestamp: number }
  | { type: "log"; runId: string; text: string; timestamp: number }
  | {
      type: "libraries_resolved";
      runId: string;
      attempt: number;
      outcomes: InstallationOutcome[];
      timestamp: number;
    }
  | { type: "compile_attempt"; runId: string; attempt: CompileAttempt; timestamp: number }
  | { type: "sketch_rewritten"; runId: string; attempt: number; source: string; timestamp: number }
  | {
      type: "run_completed";
      runId: string;
      status: TerminalState;
      cancelled: boolean;
      error?: string;
      timestamp: number;
      totalDurationMs: number;
    };

export type CompileFixEventCallback = (event: CompileFixEvent) => void;

// ---------------------------------------------------------------------------
// Result
// ---------------------------------------------------------------------------

export type CompileFixResult = {
  runId: string;
  status: TerminalState;
  attempts: CompileAttempt[];
  /** Output of the last compile; empty when no compile ran. */
  lastOutput: string;
  /** Sketch source as it stands on disk at the end of the run. */
  source: string;
  cancelled: boolean;
  /** Set when a step ended the run early (fix request, rewrite, cancellation). */
  error?: string;
  startedAtMs: number;
  completedAtMs: number;
};
