// ---------------------------------------------------------------------------
// Compile-Fix Loop – resolve libraries, compile, request a fix, repeat
// ---------------------------------------------------------------------------
// States:
//   RESOLVING → COMPILING → SUCCESS
//                         → REQUESTING_FIX → REWRITING → RESOLVING
//                         → FAILURE (budget spent)
//
// Budget accounting:
//   - every iteration consumes one unit, whether or not a compile ran
//   - a failed library-list request or an unstartable toolchain is a failed
//     attempt; the next iteration retries with the same source
//   - a failed fix request or rewrite ends the run (the sketch state is no
//     longer known to be coherent)
// Cancellation is checked between iterations only.
// ---------------------------------------------------------------------------

import { randomUUID } from "node:crypto";
import { OracleError, RunCancelledError, formatErrorMessage } from "../errors.js";
import type { ServiceLog } from "../logging.js";
import { buildFixPrompt, buildLibraryListPrompt } from "../oracle/prompts.js";
import { parseLibraryList, sanitizeSketchSource } from "../oracle/replies.js";
import type { Oracle } from "../oracle/types.js";
import type { DependencyResolver } from "../libraries/types.js";
import { withSketchLock } from "../sketch/lock.js";
import { readSketch, writeSketchAtomic } from "../sketch/store.js";
import type { Toolchain } from "../toolchain/types.js";
import { appendRun, sketchNameOf } from "./run-log.js";
import type {
  CompileAttempt,
  CompileFixEventCallback,
  CompileFixResult,
  LoopState,
  RunConfig,
  TerminalState,
} from "./types.js";

export type CompileFixDeps = {
  oracle: Oracle;
  toolchain: Toolchain;
  resolver: DependencyResolver;
  log: ServiceLog;
  /** When set, every finished run is appended to the run log here. */
  runsDir?: string;
  nowMs?: () => number;
};

export type CompileFixOptions = {
  onEvent?: CompileFixEventCallback;
  signal?: AbortSignal;
};

// ---------------------------------------------------------------------------
// executeCompileFix – the loop itself; the caller holds the sketch lock
// ---------------------------------------------------------------------------

export async function executeCompileFix(
  deps: CompileFixDeps,
  config: RunConfig,
  opts: CompileFixOptions = {},
): Promise<CompileFixResult> {
  if (!Number.isInteger(config.retryBudget) || config.retryBudget < 1) {
    throw new RangeError(`retryBudget must be a positive integer, got ${config.retryBudget}`);
  }

  const now = deps.nowMs ?? Date.now;
  const runId = randomUUID();
  const startedAtMs = now();
  const { board, sketchPath } = config;
  const emit: CompileFixEventCallback = opts.onEvent ?? (() => {});

  const setState = (state: LoopState, attempt: number) => {
    emit({ type: "state_changed", runId, state, attempt, timestamp: now() });
  };
  // Progress goes to the observer; `deps.log` carries warnings and failures.
  const logLine = (text: string) => {
    emit({ type: "log", runId, text, timestamp: now() });
  };

  let source = await readSketch(sketchPath);
  const attempts: CompileAttempt[] = [];
  let lastOutput = "";

  const finish = async (
    status: TerminalState,
    extra: { cancelled?: boolean; error?: string } = {},
  ): Promise<CompileFixResult> => {
    setState(status, attempts.length);
    const completedAtMs = now();
    const result: CompileFixResult = {
      runId,
      status,
      attempts,
      lastOutput,
      source,
      cancelled: extra.cancelled ?? false,
      ...(extra.error !== undefined ? { error: extra.error } : {}),
      startedAtMs,
      completedAtMs,
    };
    if (deps.runsDir) {
      await persistRun(deps, config, result);
    }
    emit({
      type: "run_completed",
      runId,
      status,
      cancelled: result.cancelled,
      ...(result.error !== undefined ? { error: result.error } : {}),
      timestamp: completedAtMs,
      totalDurationMs: completedAtMs - startedAtMs,
    });
    return result;
  };

  const recordAttempt = (index: number, output: string, success: boolean): CompileAttempt => {
    const attempt: CompileAttempt = Object.freeze({ index, output, success });
    attempts.push(attempt);
    emit({ type: "compile_attempt", runId, attempt, timestamp: now() });
    return attempt;
  };

  for (let index = 0; index < config.retryBudget; index++) {
    if (opts.signal?.aborted) {
      const cancelled = new RunCancelledError();
      deps.log.warn(`${cancelled.message} before attempt ${index + 1}`);
      return finish("FAILURE", { cancelled: true, error: cancelled.message });
    }

    // -- RESOLVING ----------------------------------------------------------
    setState("RESOLVING", index);
    logLine(`Attempt ${index + 1}/${config.retryBudget}: resolving libraries for ${board.name}`);
    try {
      const reply = await deps.oracle.generate(buildLibraryListPrompt(source, board.name));
      const libraries = parseLibraryList(reply);
      logLine(libraries.length > 0 ? `Required libraries: ${libraries.join(", ")}` : "No libraries required");
      const outcomes = await deps.resolver.resolve(libraries, board.name);
      emit({ type: "libraries_resolved", runId, attempt: index, outcomes, timestamp: now() });
    } catch (err) {
      const message = `Library resolution failed: ${formatErrorMessage(err)}`;
      deps.log.error(message);
      recordAttempt(index, message, false);
      continue;
    }

    // -- COMPILING ----------------------------------------------------------
    setState("COMPILING", index);
    const compiled = await deps.toolchain.compile(sketchPath, board.fqbn);
    lastOutput = compiled.output;
    recordAttempt(index, compiled.output, compiled.ok);

    if (compiled.ok) {
      logLine(`Compilation succeeded on attempt ${index + 1}`);
      return finish("SUCCESS");
    }
    if (compiled.unavailable) {
      deps.log.error(compiled.unavailable.message);
      continue;
    }
    logLine(`Compilation failed on attempt ${index + 1}`);
    if (index + 1 >= config.retryBudget) {
      break;
    }

    // -- REQUESTING_FIX / REWRITING ----------------------------------------
    setState("REQUESTING_FIX", index);
    try {
      const reply = await deps.oracle.generate(buildFixPrompt(compiled.output, source));
      setState("REWRITING", index);
      const rewritten = sanitizeSketchSource(reply);
      if (!rewritten.trim()) {
        throw new OracleError("Fix reply contained no code");
      }
      await writeSketchAtomic(sketchPath, rewritten);
      source = rewritten;
      emit({ type: "sketch_rewritten", runId, attempt: index, source, timestamp: now() });
      logLine(`Applied fix from attempt ${index + 1}`);
    } catch (err) {
      const message = `Fix step failed: ${formatErrorMessage(err)}`;
      deps.log.error(message);
      return finish("FAILURE", { error: message });
    }
  }

  deps.log.error(`Giving up after ${attempts.length} attempt(s)`);
  return finish("FAILURE");
}

async function persistRun(deps: CompileFixDeps, config: RunConfig, result: CompileFixResult): Promise<void> {
  if (!deps.runsDir) {
    return;
  }
  try {
    await appendRun(deps.runsDir, {
      id: result.runId,
      sketchName: sketchNameOf(config.sketchPath),
      sketchPath: config.sketchPath,
      boardName: config.board.name,
      fqbn: config.board.fqbn,
      retryBudget: config.retryBudget,
      status: result.status,
      cancelled: result.cancelled,
      ...(result.error !== undefined ? { error: result.error } : {}),
      attempts: result.attempts.map((a) => ({ index: a.index, success: a.success, output: a.output })),
      startedAtMs: result.startedAtMs,
      completedAtMs: result.completedAtMs,
    });
  } catch (err) {
    // History is advisory; the run's own result stands.
    deps.log.warn(`Failed to record run ${result.runId}: ${formatErrorMessage(err)}`);
  }
}

// ---------------------------------------------------------------------------
// runCompileFixLoop – exclusive run against one sketch
// ---------------------------------------------------------------------------

/**
 * Run the loop while holding the sketch's lock. Throws `SketchBusyError`
 * when another run already owns the sketch.
 */
export function runCompileFixLoop(
  deps: CompileFixDeps,
  config: RunConfig,
  opts: CompileFixOptions = {},
): Promise<CompileFixResult> {
  return withSketchLock(config.sketchPath, () => executeCompileFix(deps, config, opts));
}
