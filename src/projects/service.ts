// ---------------------------------------------------------------------------
// ProjectService – registry of sketch projects and their boards
// ---------------------------------------------------------------------------
// Dependency-injected and file-backed, with promise-based locking so
// concurrent calls against one store file never interleave.
// ---------------------------------------------------------------------------

import { randomUUID } from "node:crypto";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import { DEFAULT_BOARD_NAME, resolveBoard } from "../boards/catalog.js";
import type { ServiceLog } from "../logging.js";
import type { Project, ProjectCreateInput } from "./types.js";
import { readProjectStore, writeProjectStore } from "./store.js";

export const SKETCH_EXTENSION = ".ino";

// ---------------------------------------------------------------------------
// Dependencies (injected at construction)
// ---------------------------------------------------------------------------

export type ProjectServiceDeps = {
  storePath: string;
  log: ServiceLog;
  broadcast: (event: string, payload: unknown) => void;
  nowMs?: () => number;
};

// ---------------------------------------------------------------------------
// Service state
// ---------------------------------------------------------------------------

type ProjectServiceState = {
  deps: ProjectServiceDeps;
  op: Promise<unknown>;
};

function createServiceState(deps: ProjectServiceDeps): ProjectServiceState {
  return { deps, op: Promise.resolve() };
}

// ---------------------------------------------------------------------------
// Serialised lock
// ---------------------------------------------------------------------------

const storeLocks = new Map<string, Promise<unknown>>();

function resolveChain(p: Promise<unknown>): Promise<void> {
  return p.then(
    () => {},
    () => {},
  );
}

async function locked<T>(state: ProjectServiceState, fn: () => Promise<T>): Promise<T> {
  const storePath = state.deps.storePath;
  const storeOp = storeLocks.get(storePath) ?? Promise.resolve();
  const next = Promise.all([resolveChain(state.op), resolveChain(storeOp)]).then(fn);
  const keepAlive = resolveChain(next);
  state.op = keepAlive;
  storeLocks.set(storePath, keepAlive);
  return next;
}

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

/** Project names become a folder and a file name; keep them to one segment. */
export function validateProjectName(name: string): string {
  if (!name) {
    throw new TypeError("Project name must not be empty");
  }
  if (/[\s/\\]/.test(name)) {
    throw new TypeError(`Project name "${name}" must not contain whitespace or path separators`);
  }
  if (name === "." || name === "..") {
    throw new TypeError(`Project name "${name}" is reserved`);
  }
  return name;
}

// ---------------------------------------------------------------------------
// ProjectService
// ---------------------------------------------------------------------------

export class ProjectService {
  private readonly state: ProjectServiceState;

  constructor(deps: ProjectServiceDeps) {
    this.state = createServiceState(deps);
  }

  private now(): number {
    return this.state.deps.nowMs?.() ?? Date.now();
  }

  private emit(event: string, payload: unknown): void {
    this.state.deps.broadcast(event, payload);
  }

  // =========================================================================
  // Create / open
  // =========================================================================

  /** Create `{parentDir}/{name}/{name}.ino` (empty) and register it. */
  async create(input: ProjectCreateInput): Promise<Project> {
    const name = validateProjectName(input.name);
    const board = resolveBoard(input.boardName);
    const dir = path.resolve(input.parentDir, name);
    const sketchPath = path.join(dir, `${name}${SKETCH_EXTENSION}`);

    return locked(this.state, async () => {
      await fs.mkdir(dir, { recursive: true });
      // `wx`: an existing sketch is never truncated.
      await fs.writeFile(sketchPath, "", { encoding: "utf-8", flag: "wx" });

      const store = await readProjectStore(this.state.deps.storePath);
      const now = this.now();
      const project: Project = {
        id: randomUUID(),
        name,
        dir,
        sketchPath,
        boardName: board.name,
        createdAtMs: now,
        updatedAtMs: now,
      };

      store.projects.push(project);
      await writeProjectStore(this.state.deps.storePath, store);

      this.emit("project.created", project);
      this.state.deps.log.info(`project created: ${project.id} — ${project.sketchPath}`);
      return project;
    });
  }

  /**
   * Register an existing sketch. Opening a path that is already registered
   * returns that entry, updating its board when one is given.
   */
  async open(sketchPath: string, boardName?: string): Promise<Project> {
    const resolved = path.resolve(sketchPath);
    if (path.extname(resolved) !== SKETCH_EXTENSION) {
      throw new TypeError(`Not a sketch file: ${resolved}`);
    }
    const board = boardName !== undefined ? resolveBoard(boardName) : undefined;
    const stat = await fs.stat(resolved);
    if (!stat.isFile()) {
      throw new TypeError(`Not a sketch file: ${resolved}`);
    }

    return locked(this.state, async () => {
      const store = await readProjectStore(this.state.deps.storePath);
      const existing = store.projects.find((p) => p.sketchPath === resolved);
      if (existing) {
        if (board && existing.boardName !== board.name) {
          existing.boardName = board.name;
          existing.updatedAtMs = this.now();
          await writeProjectStore(this.state.deps.storePath, store);
          this.emit("project.updated", existing);
        }
        return existing;
      }

      const now = this.now();
      const project: Project = {
        id: randomUUID(),
        name: path.basename(resolved, SKETCH_EXTENSION),
        dir: path.dirname(resolved),
        sketchPath: resolved,
        boardName: (board ?? resolveBoard(DEFAULT_BOARD_NAME)).name,
        createdAtMs: now,
        updatedAtMs: now,
      };
      store.projects.push(project);
      await writeProjectStore(this.state.deps.storePath, store);

      this.emit("project.created", project);
      this.state.deps.log.info(`project opened: ${project.id} — ${project.sketchPath}`);
      return project;
    });
  }

  // =========================================================================
  // Queries
  // =========================================================================

  async get(projectId: string): Promise<Project | null> {
    const store = await readProjectStore(this.state.deps.storePath);
    return store.projects.find((p) => p.id === projectId) ?? null;
  }

  async findBySketch(sketchPath: string): Promise<Project | null> {
    const resolved = path.resolve(sketchPath);
    const store = await readProjectStore(this.state.deps.storePath);
    return store.projects.find((p) => p.sketchPath === resolved) ?? null;
  }

  async list(): Promise<Project[]> {
    const store = await readProjectStore(this.state.deps.storePath);
    return store.projects;
  }

  // =========================================================================
  // Mutations
  // =========================================================================

  async setBoard(projectId: string, boardName: string): Promise<Project | null> {
    const board = resolveBoard(boardName);
    return locked(this.state, async () => {
      const store = await readProjectStore(this.state.deps.storePath);
      const project = store.projects.find((p) => p.id === projectId);
      if (!project) {
        return null;
      }

      project.boardName = board.name;
      project.updatedAtMs = this.now();
      await writeProjectStore(this.state.deps.storePath, store);

      this.emit("project.updated", project);
      this.state.deps.log.info(`project board set: ${project.id} — ${board.name}`);
      return project;
    });
  }

  /** Unregister a project. Its files stay where they are. */
  async remove(projectId: string): Promise<boolean> {
    return locked(this.state, async () => {
      const store = await readProjectStore(this.state.deps.storePath);
      const idx = store.projects.findIndex((p) => p.id === projectId);
      if (idx === -1) {
        return false;
      }

      store.projects.splice(idx, 1);
      await writeProjectStore(this.state.deps.storePath, store);

      this.emit("project.deleted", { id: projectId });
      this.state.deps.log.info(`project removed: ${projectId}`);
      return true;
    });
  }
}
