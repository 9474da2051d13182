import type { BoardProfile } from "../boards/catalog.js";
import type { ServiceLog } from "../logging.js";
import { buildWiringPrompt } from "../oracle/prompts.js";
import type { Oracle } from "../oracle/types.js";
import { readSketch } from "../sketch/store.js";

/** Pin-by-pin wiring table for the sketch as it stands on disk. */
export async function suggestWiring(
  deps: { oracle: Oracle; log: ServiceLog },
  params: { sketchPath: string; board: BoardProfile },
): Promise<string> {
  const source = await readSketch(params.sketchPath);
  if (!source.trim()) {
    throw new TypeError(`Sketch ${params.sketchPath} is empty`);
  }
  deps.log.info(`Requesting wiring suggestion for ${params.board.name}`);
  const reply = await deps.oracle.generate(buildWiringPrompt(source, params.board.name));
  return reply.trim();
}
