// ---------------------------------------------------------------------------
// Compile-Fix Run Log – persisted history of finished runs
// ---------------------------------------------------------------------------
// Each run is stored as an individual JSON file under:
//   {runsDir}/{sketchName}/{runId}.json
//
// One file per run keeps history per sketch easy to list and to purge.
// ---------------------------------------------------------------------------

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { writeJsonAtomic } from "../infra/fs-atomic.js";
import { stringEnum } from "../schema/typebox.js";

export const CompileFixRunRecordSchema = Type.Object({
  id: Type.String(),
  sketchName: Type.String(),
  sketchPath: Type.String(),
  boardName: Type.String(),
  fqbn: Type.String(),
  retryBudget: Type.Integer(),
  status: stringEnum(["SUCCESS", "FAILURE"] as const),
  cancelled: Type.Boolean(),
  error: Type.Optional(Type.String()),
  attempts: Type.Array(
    Type.Object({
      index: Type.Integer(),
      success: Type.Boolean(),
      output: Type.String(),
    }),
  ),
  startedAtMs: Type.Number(),
  completedAtMs: Type.Number(),
});

export type CompileFixRunRecord = Static<typeof CompileFixRunRecordSchema>;

// ---------------------------------------------------------------------------
// Path helpers
// ---------------------------------------------------------------------------

/** `blink` for `/work/blink/blink.ino`. */
export function sketchNameOf(sketchPath: string): string {
  return path.basename(sketchPath, path.extname(sketchPath));
}

function runsDirFor(runsDir: string, sketchName: string): string {
  return path.join(runsDir, sketchName);
}

// ---------------------------------------------------------------------------
// appendRun
// ---------------------------------------------------------------------------

/** Persist a finished run. Creates the directory if missing. */
export async function appendRun(runsDir: string, record: CompileFixRunRecord): Promise<string> {
  const filePath = path.join(runsDirFor(runsDir, record.sketchName), `${record.id}.json`);
  await writeJsonAtomic(filePath, record);
  return filePath;
}

// ---------------------------------------------------------------------------
// loadRuns / loadRun
// ---------------------------------------------------------------------------

async function readRecord(filePath: string): Promise<CompileFixRunRecord | null> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(await fs.readFile(filePath, "utf-8"));
  } catch {
    return null;
  }
  return Value.Check(CompileFixRunRecordSchema, parsed) ? parsed : null;
}

export type LoadRunsOptions = {
  limit?: number;
  /** Keep only runs of this file; sketches in different folders can share a name. */
  sketchPath?: string;
};

/**
 * Runs recorded for a sketch, newest first by `startedAtMs`. Malformed files
 * are skipped; a missing directory means no runs yet.
 */
export async function loadRuns(
  runsDir: string,
  sketchName: string,
  opts: LoadRunsOptions = {},
): Promise<CompileFixRunRecord[]> {
  const { limit } = opts;
  const wanted = opts.sketchPath !== undefined ? path.resolve(opts.sketchPath) : undefined;
  const dir = runsDirFor(runsDir, sketchName);

  let entries: string[];
  try {
    entries = await fs.readdir(dir);
  } catch {
    return [];
  }

  const runs: CompileFixRunRecord[] = [];
  for (const file of entries.filter((f) => f.endsWith(".json"))) {
    const record = await readRecord(path.join(dir, file));
    if (record && (wanted === undefined || path.resolve(record.sketchPath) === wanted)) {
      runs.push(record);
    }
  }

  runs.sort((a, b) => b.startedAtMs - a.startedAtMs);

  if (limit !== undefined && limit > 0) {
    return runs.slice(0, limit);
  }
  return runs;
}

export async function loadRun(
  runsDir: string,
  sketchName: string,
  runId: string,
): Promise<CompileFixRunRecord | null> {
  return readRecord(path.join(runsDirFor(runsDir, sketchName), `${runId}.json`));
}
