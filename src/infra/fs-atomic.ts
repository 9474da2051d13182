// ---------------------------------------------------------------------------
// Atomic file writes – temp file beside the target, then rename
// ---------------------------------------------------------------------------

import { randomUUID } from "node:crypto";
import * as fs from "node:fs/promises";
import * as path from "node:path";

/** Sibling temp path, unique per process and call. */
export function tempPathFor(filePath: string): string {
  return path.join(path.dirname(filePath), `.${path.basename(filePath)}.${process.pid}.${randomUUID()}.tmp`);
}

/**
 * Replace `filePath` in one rename so readers see the old or the new content,
 * never a partial file. Creates missing parent directories.
 */
export async function writeFileAtomic(filePath: string, content: string | Uint8Array): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  // Same directory as the target so the rename never crosses filesystems.
  const tmpPath = tempPathFor(filePath);
  try {
    await fs.writeFile(tmpPath, content);
    await fs.rename(tmpPath, filePath);
  } catch (err) {
    await fs.rm(tmpPath, { force: true });
    throw err;
  }
}

export async function writeJsonAtomic(filePath: string, data: unknown): Promise<void> {
  await writeFileAtomic(filePath, JSON.stringify(data, null, 2));
}
