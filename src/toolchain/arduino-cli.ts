// ---------------------------------------------------------------------------
// arduino-cli – Toolchain adapter over the vendor command-line tool
// ---------------------------------------------------------------------------
// Every operation shells out through `execFile`. Nonzero exits and spawn
// failures come back as `ok: false` results; nothing throws past this file.
// ---------------------------------------------------------------------------

import { execFile } from "node:child_process";
import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { ToolchainUnavailable } from "../errors.js";
import type { SubsystemLogger } from "../logging.js";
import { combineToolOutput } from "../terminal/ansi.js";
import type { SerialPortInfo, ToolResult, Toolchain } from "./types.js";

const DEFAULT_TIMEOUT_MS = 300_000;
const MAX_BUFFER = 10 * 1024 * 1024;

// ---------------------------------------------------------------------------
// Process execution
// ---------------------------------------------------------------------------

export type CliRun = {
  exitCode: number | null;
  stdout: string;
  stderr: string;
  /** Set when the executable could not be started at all. */
  spawnError?: string;
};

export type CliExecutor = (
  bin: string,
  args: string[],
  opts: { env: NodeJS.ProcessEnv; timeoutMs: number },
) => Promise<CliRun>;

export const execCli: CliExecutor = (bin, args, opts) =>
  new Promise((resolve) => {
    execFile(
      bin,
      args,
      {
        env: opts.env,
        timeout: opts.timeoutMs,
        maxBuffer: MAX_BUFFER,
        encoding: "utf8",
        windowsHide: true,
      },
      (error, stdout, stderr) => {
        if (!error) {
          resolve({ exitCode: 0, stdout, stderr });
          return;
        }
        const spawnFailed = typeof error.syscall === "string" && error.syscall.startsWith("spawn");
        resolve({
          exitCode: typeof error.code === "number" ? error.code : null,
          stdout: stdout ?? "",
          stderr: stderr || (error.killed ? `terminated after ${opts.timeoutMs}ms` : ""),
          spawnError: spawnFailed ? error.message : undefined,
        });
      },
    );
  });

// ---------------------------------------------------------------------------
// JSON shapes (current object form and the older bare-array form)
// ---------------------------------------------------------------------------

const LibraryEntry = Type.Object({
  library: Type.Object({ name: Type.String() }),
});
const LibraryListNew = Type.Object({
  installed_libraries: Type.Optional(Type.Array(LibraryEntry)),
});
const LibraryListOld = Type.Array(LibraryEntry);

const PortEntry = Type.Object({
  port: Type.Object({
    address: Type.String(),
    label: Type.Optional(Type.String()),
    protocol_label: Type.Optional(Type.String()),
  }),
  matching_boards: Type.Optional(
    Type.Array(Type.Object({ name: Type.String(), fqbn: Type.Optional(Type.String()) })),
  ),
});
const PortListNew = Type.Object({
  detected_ports: Type.Optional(Type.Array(PortEntry)),
});
const PortListOld = Type.Array(PortEntry);

export function parseInstalledLibraries(json: string): string[] {
  const parsed = safeJsonParse(json);
  let entries: Static<typeof LibraryEntry>[] = [];
  if (Value.Check(LibraryListOld, parsed)) {
    entries = parsed;
  } else if (Value.Check(LibraryListNew, parsed)) {
    entries = parsed.installed_libraries ?? [];
  }
  return entries.map((e) => e.library.name);
}

export function parsePortList(json: string): SerialPortInfo[] {
  const parsed = safeJsonParse(json);
  let entries: Static<typeof PortEntry>[] = [];
  if (Value.Check(PortListOld, parsed)) {
    entries = parsed;
  } else if (Value.Check(PortListNew, parsed)) {
    entries = parsed.detected_ports ?? [];
  }
  return entries.map((entry) => {
    const board = entry.matching_boards?.[0];
    return {
      address: entry.port.address,
      label: entry.port.protocol_label ?? entry.port.label ?? entry.port.address,
      ...(board ? { boardName: board.name, fqbn: board.fqbn } : {}),
    };
  });
}

function safeJsonParse(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return undefined;
  }
}

// ---------------------------------------------------------------------------
// ArduinoCli
// ---------------------------------------------------------------------------

export type ArduinoCliOptions = {
  cliPath: string;
  timeoutMs?: number;
  exec?: CliExecutor;
  env?: NodeJS.ProcessEnv;
  log?: SubsystemLogger;
};

export class ArduinoCli implements Toolchain {
  private readonly cliPath: string;
  private readonly timeoutMs: number;
  private readonly exec: CliExecutor;
  private readonly env: NodeJS.ProcessEnv;
  private readonly log?: SubsystemLogger;

  constructor(opts: ArduinoCliOptions) {
    this.cliPath = opts.cliPath;
    this.timeoutMs = opts.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.exec = opts.exec ?? execCli;
    this.env = opts.env ?? process.env;
    this.log = opts.log;
  }

  private async invoke(
    args: string[],
    extraEnv?: NodeJS.ProcessEnv,
  ): Promise<{ result: ToolResult; stdout: string }> {
    const startedAt = Date.now();
    const env = extraEnv ? { ...this.env, ...extraEnv } : this.env;
    const run = await this.exec(this.cliPath, args, { env, timeoutMs: this.timeoutMs });
    const latency = Date.now() - startedAt;
    const command = `${this.cliPath} ${args.join(" ")}`;

    if (run.spawnError !== undefined) {
      const unavailable = new ToolchainUnavailable(command, run.spawnError);
      this.log?.error(unavailable.message);
      return { result: { ok: false, output: unavailable.message, unavailable }, stdout: "" };
    }

    this.log?.debug(`${command} exit=${run.exitCode ?? "null"} latencyMs=${latency}`);
    return {
      result: { ok: run.exitCode === 0, output: combineToolOutput(run.stdout, run.stderr) },
      stdout: run.stdout,
    };
  }

  private async run(args: string[], extraEnv?: NodeJS.ProcessEnv): Promise<ToolResult> {
    return (await this.invoke(args, extraEnv)).result;
  }

  compile(sketchPath: string, fqbn: string): Promise<ToolResult> {
    return this.run(["compile", "--fqbn", fqbn, sketchPath]);
  }

  async listInstalledLibraries(): Promise<string[]> {
    const { result, stdout } = await this.invoke(["lib", "list", "--format", "json"]);
    if (!result.ok) {
      this.log?.warn(`cannot list installed libraries: ${result.output}`);
      return [];
    }
    return parseInstalledLibraries(stdout);
  }

  installLibrary(name: string): Promise<ToolResult> {
    return this.run(["lib", "install", name]);
  }

  installArchive(archivePath: string): Promise<ToolResult> {
    // --zip-path is refused unless unsafe installs are enabled.
    return this.run(["lib", "install", "--zip-path", archivePath], {
      ARDUINO_LIBRARY_ENABLE_UNSAFE_INSTALL: "true",
    });
  }

  upload(sketchPath: string, fqbn: string, port: string): Promise<ToolResult> {
    return this.run(["upload", "--fqbn", fqbn, "--port", port, sketchPath]);
  }

  async listPorts(): Promise<SerialPortInfo[]> {
    const { result, stdout } = await this.invoke(["board", "list", "--format", "json"]);
    if (!result.ok) {
      this.log?.warn(`cannot list ports: ${result.output}`);
      return [];
    }
    return parsePortList(stdout);
  }
}
