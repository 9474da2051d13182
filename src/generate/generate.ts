// ---------------------------------------------------------------------------
// Sketch generation – request → initial sketch → compile-fix loop
// ---------------------------------------------------------------------------

import { OracleError } from "../errors.js";
import { executeCompileFix, type CompileFixDeps, type CompileFixOptions } from "../compile-fix/loop.js";
import type { CompileFixResult, RunConfig } from "../compile-fix/types.js";
import { buildSketchPrompt } from "../oracle/prompts.js";
import { sanitizeSketchSource } from "../oracle/replies.js";
import { withSketchLock } from "../sketch/lock.js";
import { writeSketchAtomic } from "../sketch/store.js";

export type GenerateSketchParams = RunConfig & {
  request: string;
};

/**
 * Write a fresh sketch for `request` and drive it to a compiling state.
 * The sketch lock covers both the initial write and the whole loop.
 */
export async function generateSketch(
  deps: CompileFixDeps,
  params: GenerateSketchParams,
  opts: CompileFixOptions = {},
): Promise<CompileFixResult> {
  const request = params.request.trim();
  if (!request) {
    throw new TypeError("Sketch request must not be empty");
  }
  const config: RunConfig = {
    sketchPath: params.sketchPath,
    board: params.board,
    retryBudget: params.retryBudget,
  };

  return withSketchLock(config.sketchPath, async () => {
    deps.log.info(`Generating sketch for ${config.board.name}: ${request}`);
    const reply = await deps.oracle.generate(buildSketchPrompt(request, config.board.name));
    const source = sanitizeSketchSource(reply);
    if (!source.trim()) {
      throw new OracleError("Generated sketch contained no code");
    }
    await writeSketchAtomic(config.sketchPath, source);
    deps.log.info(`Wrote initial sketch to ${config.sketchPath}`);
    return executeCompileFix(deps, config, opts);
  });
}
