// ---------------------------------------------------------------------------
// Sketch Store – read and atomically replace sketch source on disk
// ---------------------------------------------------------------------------
// A concurrent reader (a preview, an editor) sees either the old or the new
// content, never a partial file.
// ---------------------------------------------------------------------------

import * as fs from "node:fs/promises";
import { writeFileAtomic } from "../infra/fs-atomic.js";

export async function readSketch(sketchPath: string): Promise<string> {
  return fs.readFile(sketchPath, "utf-8");
}

export async function writeSketchAtomic(sketchPath: string, source: string): Promise<void> {
  await writeFileAtomic(sketchPath, source);
}
