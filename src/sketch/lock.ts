// ---------------------------------------------------------------------------
// Sketch Lock – one active run per sketch path
// ---------------------------------------------------------------------------
// Two layers:
//   - an in-process registry keyed by resolved path
//   - a `<sketch>.lock` file published with its owner's pid already in it
// A lock whose pid is no longer alive, or that has held no readable pid for
// the grace period, is taken over.
// ---------------------------------------------------------------------------

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { SketchBusyError } from "../errors.js";
import { tempPathFor } from "../infra/fs-atomic.js";

export type SketchLock = {
  readonly sketchPath: string;
  readonly lockPath: string;
  release(): Promise<void>;
};

const heldPaths = new Set<string>();

export function lockPathFor(sketchPath: string): string {
  return `${path.resolve(sketchPath)}.lock`;
}

export function isSketchLocked(sketchPath: string): boolean {
  return heldPaths.has(path.resolve(sketchPath));
}

function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (err) {
    // EPERM: the process exists but belongs to someone else.
    return err instanceof Error && "code" in err && err.code === "EPERM";
  }
}

/** A lock file with no readable pid is a holder mid-write until it is this old. */
export const UNREADABLE_LOCK_GRACE_MS = 10_000;

async function readHolderPid(lockPath: string): Promise<number | null> {
  try {
    const raw = await fs.readFile(lockPath, "utf-8");
    const pid = Number.parseInt(raw.trim(), 10);
    return Number.isFinite(pid) && pid > 0 ? pid : null;
  } catch {
    return null;
  }
}

async function lockAgeMs(lockPath: string): Promise<number> {
  try {
    const stat = await fs.stat(lockPath);
    return Date.now() - stat.mtimeMs;
  } catch {
    return 0;
  }
}

/** Write our pid to a private temp file so the lock never exists without its owner. */
async function writePidFile(lockPath: string): Promise<string> {
  const tmpPath = tempPathFor(lockPath);
  await fs.writeFile(tmpPath, String(process.pid), "utf-8");
  return tmpPath;
}

/** Publish the lock only if none exists. */
async function createLockFile(lockPath: string): Promise<boolean> {
  const tmpPath = await writePidFile(lockPath);
  try {
    await fs.link(tmpPath, lockPath);
    return true;
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "EEXIST") {
      return false;
    }
    throw err;
  } finally {
    await fs.rm(tmpPath, { force: true });
  }
}

/** Replace a stale lock in one rename; the last writer wins and the pid says who. */
async function takeOverLockFile(lockPath: string): Promise<boolean> {
  const tmpPath = await writePidFile(lockPath);
  try {
    await fs.rename(tmpPath, lockPath);
  } catch (err) {
    await fs.rm(tmpPath, { force: true });
    throw err;
  }
  return (await readHolderPid(lockPath)) === process.pid;
}

async function isStale(lockPath: string, holder: number | null): Promise<boolean> {
  if (holder === null) {
    return (await lockAgeMs(lockPath)) >= UNREADABLE_LOCK_GRACE_MS;
  }
  // Our own pid outside `heldPaths` is a leftover from an earlier lock.
  return holder === process.pid || !isProcessAlive(holder);
}

export async function acquireSketchLock(sketchPath: string): Promise<SketchLock> {
  const resolved = path.resolve(sketchPath);
  if (heldPaths.has(resolved)) {
    throw new SketchBusyError(resolved, "held by this process");
  }
  heldPaths.add(resolved);

  const lockPath = lockPathFor(resolved);
  try {
    await fs.mkdir(path.dirname(lockPath), { recursive: true });
    if (!(await createLockFile(lockPath))) {
      const holder = await readHolderPid(lockPath);
      if (!(await isStale(lockPath, holder))) {
        throw new SketchBusyError(resolved, holder === null ? "lock file being written" : `pid ${holder}`);
      }
      if (!(await takeOverLockFile(lockPath))) {
        throw new SketchBusyError(resolved, "lock taken over concurrently");
      }
    }
  } catch (err) {
    heldPaths.delete(resolved);
    throw err;
  }

  let released = false;
  return {
    sketchPath: resolved,
    lockPath,
    async release() {
      if (released) {
        return;
      }
      released = true;
      heldPaths.delete(resolved);
      // Leave a lock that another process has since taken over.
      if ((await readHolderPid(lockPath)) === process.pid) {
        await fs.rm(lockPath, { force: true });
      }
    },
  };
}

/** Run `fn` while holding the sketch's lock. */
export async function withSketchLock<T>(sketchPath: string, fn: () => Promise<T>): Promise<T> {
  const lock = await acquireSketchLock(sketchPath);
  try {
    return await fn();
  } finally {
    await lock.release();
  }
}
