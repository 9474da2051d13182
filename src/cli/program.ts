// ---------------------------------------------------------------------------
// sketchforge CLI – commander program
// ---------------------------------------------------------------------------
// The CLI is a pure observer of a running loop: it prints progress, compile
// output and the final signal, and only ever feeds back a cancellation.
// ---------------------------------------------------------------------------

import * as path from "node:path";
import { Command, CommanderError, InvalidArgumentError } from "commander";
import { listBoards, resolveBoard, type BoardProfile } from "../boards/catalog.js";
import { runCompileFixLoop } from "../compile-fix/loop.js";
import { loadRuns, sketchNameOf } from "../compile-fix/run-log.js";
import type { CompileFixEvent, CompileFixResult } from "../compile-fix/types.js";
import { SketchforgeError, formatErrorMessage } from "../errors.js";
import { generateSketch } from "../generate/generate.js";
import { suggestWiring } from "../generate/wiring.js";
import { describeOutcome } from "../libraries/resolver.js";
import { toServiceLog } from "../logging.js";
import { buildLibraryListPrompt } from "../oracle/prompts.js";
import { parseLibraryList } from "../oracle/replies.js";
import type { Project } from "../projects/types.js";
import { withSketchLock } from "../sketch/lock.js";
import { readSketch } from "../sketch/store.js";
import { uploadWithFallback } from "../upload/upload.js";
import { createCliContext, type CliContext } from "./context.js";

export type CliIo = {
  out: (line: string) => void;
  err: (line: string) => void;
};

export type CliDeps = {
  io: CliIo;
  createContext: (opts: { configPath?: string }) => CliContext;
  /** Register an interrupt handler; returns the unregister function. */
  onInterrupt: (handler: () => void) => () => void;
};

export function defaultCliDeps(): CliDeps {
  return {
    io: {
      out: (line) => process.stdout.write(`${line}\n`),
      err: (line) => process.stderr.write(`${line}\n`),
    },
    createContext: createCliContext,
    onInterrupt: (handler) => {
      process.once("SIGINT", handler);
      return () => process.off("SIGINT", handler);
    },
  };
}

class BoardNotKnownError extends SketchforgeError {
  constructor(sketchPath: string) {
    super(
      `No board given for ${sketchPath} and the sketch is not registered; pass --board`,
      "board_not_known",
    );
  }
}

// ---------------------------------------------------------------------------
// Option parsing
// ---------------------------------------------------------------------------

function parsePositiveInt(raw: string): number {
  const n = Number(raw);
  if (!Number.isInteger(n) || n < 1) {
    throw new InvalidArgumentError("Must be a positive integer.");
  }
  return n;
}

// ---------------------------------------------------------------------------
// Rendering
// ---------------------------------------------------------------------------

export function renderEvent(event: CompileFixEvent): string[] {
  switch (event.type) {
    case "log":
      return [event.text];
    case "libraries_resolved":
      return event.outcomes.map((o) => `  ${describeOutcome(o)}`);
    case "compile_attempt": {
      const { index, success, output } = event.attempt;
      const header = `--- attempt ${index + 1}: ${success ? "compiled" : "failed"} ---`;
      return output ? [header, output] : [header];
    }
    case "sketch_rewritten":
      return [];
    case "state_changed":
      return [];
    case "run_completed":
      return [
        `Run ${event.status}${event.cancelled ? " (cancelled)" : ""}${event.error ? `: ${event.error}` : ""}`,
      ];
  }
}

function renderProject(p: Project): string {
  return `${p.id}  ${p.name}  [${p.boardName}]  ${p.sketchPath}`;
}

// ---------------------------------------------------------------------------
// Program
// ---------------------------------------------------------------------------

/**
 * Parse `argv` (without the node and script entries) and run the command.
 * Resolves to the process exit code.
 */
export async function runCli(argv: string[], deps: CliDeps = defaultCliDeps()): Promise<number> {
  const { io } = deps;
  let exitCode = 0;
  let ctx: CliContext | undefined;

  const program = new Command();
  program
    .name("sketchforge")
    .description("Generate, repair and upload Arduino sketches with an LLM in the loop")
    .option("-c, --config <path>", "configuration file")
    .exitOverride()
    .configureOutput({
      writeOut: (str) => io.out(str.trimEnd()),
      writeErr: (str) => io.err(str.trimEnd()),
    });

  const context = (): CliContext => {
    ctx ??= deps.createContext({ configPath: program.opts<{ config?: string }>().config });
    return ctx;
  };

  const boardFor = async (sketchPath: string, boardOpt?: string): Promise<BoardProfile> => {
    if (boardOpt) {
      return resolveBoard(boardOpt);
    }
    const project = await context().projects.findBySketch(sketchPath);
    if (!project) {
      throw new BoardNotKnownError(sketchPath);
    }
    return resolveBoard(project.boardName);
  };

  const observe = async (run: (signal: AbortSignal, onEvent: (e: CompileFixEvent) => void) => Promise<CompileFixResult>) => {
    const ac = new AbortController();
    const unregister = deps.onInterrupt(() => {
      io.err("Interrupt received; stopping after the current step");
      ac.abort();
    });
    try {
      const result = await run(ac.signal, (event) => {
        for (const line of renderEvent(event)) {
          io.out(line);
        }
      });
      exitCode = result.status === "SUCCESS" ? 0 : 1;
    } finally {
      unregister();
    }
  };

  // -- boards -----------------------------------------------------------------

  program
    .command("boards")
    .description("list supported boards")
    .action(() => {
      for (const board of listBoards()) {
        io.out(`${board.name}\t${board.fqbn}`);
      }
    });

  // -- generate ---------------------------------------------------------------

  program
    .command("generate")
    .description("generate a sketch from a request and compile it")
    .argument("<request...>", "what the sketch should do")
    .requiredOption("-s, --sketch <path>", "sketch file to write")
    .option("-b, --board <name>", "board name or FQBN")
    .option("--budget <n>", "maximum compile attempts", parsePositiveInt)
    .action(async (words: string[], opts: { sketch: string; board?: string; budget?: number }) => {
      const sketchPath = path.resolve(opts.sketch);
      const board = await boardFor(sketchPath, opts.board);
      const c = context();
      await observe((signal, onEvent) =>
        generateSketch(
          c.compileFixDeps(),
          {
            request: words.join(" "),
            sketchPath,
            board,
            retryBudget: opts.budget ?? c.config.loop.retryBudget,
          },
          { signal, onEvent },
        ),
      );
    });

  // -- fix --------------------------------------------------------------------

  program
    .command("fix")
    .description("resolve libraries and compile, repairing the sketch until it builds")
    .requiredOption("-s, --sketch <path>", "sketch file")
    .option("-b, --board <name>", "board name or FQBN")
    .option("--budget <n>", "maximum compile attempts", parsePositiveInt)
    .action(async (opts: { sketch: string; board?: string; budget?: number }) => {
      const sketchPath = path.resolve(opts.sketch);
      const board = await boardFor(sketchPath, opts.board);
      const c = context();
      await observe((signal, onEvent) =>
        runCompileFixLoop(
          c.compileFixDeps(),
          { sketchPath, board, retryBudget: opts.budget ?? c.config.loop.retryBudget },
          { signal, onEvent },
        ),
      );
    });

  // -- libs -------------------------------------------------------------------

  program
    .command("libs")
    .description("resolve and install the libraries a sketch needs (one pass)")
    .requiredOption("-s, --sketch <path>", "sketch file")
    .option("-b, --board <name>", "board name or FQBN")
    .action(async (opts: { sketch: string; board?: string }) => {
      const sketchPath = path.resolve(opts.sketch);
      const board = await boardFor(sketchPath, opts.board);
      const c = context();
      await withSketchLock(sketchPath, async () => {
        const source = await readSketch(sketchPath);
        const libraries = parseLibraryList(await c.oracle().generate(buildLibraryListPrompt(source, board.name)));
        if (libraries.length === 0) {
          io.out("No libraries required");
          return;
        }
        const outcomes = await c.resolver().resolve(libraries, board.name);
        for (const outcome of outcomes) {
          io.out(describeOutcome(outcome));
        }
        exitCode = outcomes.some((o) => o.tier === "FAILED") ? 1 : 0;
      });
    });

  // -- upload -----------------------------------------------------------------

  program
    .command("upload")
    .description("compile and upload, falling back across serial ports")
    .requiredOption("-s, --sketch <path>", "sketch file")
    .option("-b, --board <name>", "board name or FQBN")
    .option("-p, --port <port>", "serial port to try first")
    .action(async (opts: { sketch: string; board?: string; port?: string }) => {
      const sketchPath = path.resolve(opts.sketch);
      const board = await boardFor(sketchPath, opts.board);
      const c = context();
      const result = await withSketchLock(sketchPath, () =>
        uploadWithFallback(
          { toolchain: c.toolchain, log: toServiceLog(c.log.child({ module: "upload" })) },
          { sketchPath, fqbn: board.fqbn, port: opts.port },
        ),
      );
      if (result.ok) {
        io.out(`Uploaded to ${result.port ?? "?"}`);
      } else {
        io.err(`Upload failed (tried: ${result.tried.join(", ") || "none"})`);
        if (result.output) {
          io.err(result.output);
        }
        exitCode = 1;
      }
    });

  // -- wiring -----------------------------------------------------------------

  program
    .command("wiring")
    .description("suggest a pin-by-pin wiring table for the sketch")
    .requiredOption("-s, --sketch <path>", "sketch file")
    .option("-b, --board <name>", "board name or FQBN")
    .action(async (opts: { sketch: string; board?: string }) => {
      const sketchPath = path.resolve(opts.sketch);
      const board = await boardFor(sketchPath, opts.board);
      const c = context();
      io.out(await suggestWiring({ oracle: c.oracle(), log: toServiceLog(c.log) }, { sketchPath, board }));
    });

  // -- project ----------------------------------------------------------------

  const project = program.command("project").description("manage registered sketch projects");

  project
    .command("new")
    .description("create {dir}/{name}/{name}.ino and register it")
    .argument("<name>", "project name (no whitespace or separators)")
    .requiredOption("-d, --dir <parent>", "parent directory")
    .requiredOption("-b, --board <name>", "board name or FQBN")
    .action(async (name: string, opts: { dir: string; board: string }) => {
      const created = await context().projects.create({ name, parentDir: opts.dir, boardName: opts.board });
      io.out(renderProject(created));
    });

  project
    .command("open")
    .description("register an existing sketch")
    .argument("<sketch>", "path to a .ino file")
    .option("-b, --board <name>", "board name or FQBN")
    .action(async (sketch: string, opts: { board?: string }) => {
      io.out(renderProject(await context().projects.open(sketch, opts.board)));
    });

  project
    .command("list")
    .description("list registered projects")
    .action(async () => {
      for (const p of await context().projects.list()) {
        io.out(renderProject(p));
      }
    });

  project
    .command("board")
    .description("change a project's board")
    .argument("<id>", "project id")
    .argument("<board>", "board name or FQBN")
    .action(async (id: string, boardName: string) => {
      const updated = await context().projects.setBoard(id, boardName);
      if (!updated) {
        io.err(`No project ${id}`);
        exitCode = 1;
        return;
      }
      io.out(renderProject(updated));
    });

  project
    .command("remove")
    .description("unregister a project (files are kept)")
    .argument("<id>", "project id")
    .action(async (id: string) => {
      if (!(await context().projects.remove(id))) {
        io.err(`No project ${id}`);
        exitCode = 1;
      }
    });

  // -- runs -------------------------------------------------------------------

  program
    .command("runs")
    .description("show recorded compile-fix runs for a sketch")
    .requiredOption("-s, --sketch <path>", "sketch file")
    .option("-n, --limit <n>", "most recent runs to show", parsePositiveInt)
    .action(async (opts: { sketch: string; limit?: number }) => {
      const sketchPath = path.resolve(opts.sketch);
      const runs = await loadRuns(context().config.runs.dir, sketchNameOf(sketchPath), {
        limit: opts.limit,
        sketchPath,
      });
      if (runs.length === 0) {
        io.out("No runs recorded");
        return;
      }
      for (const run of runs) {
        const flag = run.cancelled ? " (cancelled)" : "";
        io.out(
          `${new Date(run.startedAtMs).toISOString()}  ${run.status}${flag}  ` +
            `${run.attempts.length}/${run.retryBudget} attempt(s)  ${run.boardName}  ${run.id}`,
        );
      }
    });

  try {
    await program.parseAsync(argv, { from: "user" });
    return exitCode;
  } catch (err) {
    if (err instanceof CommanderError) {
      // Help and version exit cleanly; commander has already printed them.
      return err.exitCode;
    }
    io.err(`error: ${formatErrorMessage(err)}`);
    return 1;
  }
}
