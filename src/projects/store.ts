// ---------------------------------------------------------------------------
// Project Store – the registry file, `{ version: 1, projects: Project[] }`
// ---------------------------------------------------------------------------

import * as fs from "node:fs/promises";
import { Value } from "@sinclair/typebox/value";
import { writeJsonAtomic } from "../infra/fs-atomic.js";
import { ProjectStoreFileSchema, type ProjectStoreFile } from "./types.js";

export function emptyStore(): ProjectStoreFile {
  return { version: 1, projects: [] };
}

/** Missing, unreadable or malformed stores read as empty. */
export async function readProjectStore(filePath: string): Promise<ProjectStoreFile> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(await fs.readFile(filePath, "utf-8"));
  } catch {
    return emptyStore();
  }
  return Value.Check(ProjectStoreFileSchema, parsed) ? parsed : emptyStore();
}

export async function writeProjectStore(filePath: string, data: ProjectStoreFile): Promise<void> {
  await writeJsonAtomic(filePath, data);
}
