import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import { resolveConfig } from "../config/config.js";
import { getChildLogger } from "../logging.js";
import { ScriptedOracle, type OracleScript } from "../oracle/scripted.js";
import { FakeToolchain, type FakeToolchainOptions } from "../toolchain/fake.js";
import { appendRun } from "../compile-fix/run-log.js";
import { InstallFailure } from "../errors.js";
import { acquireSketchLock } from "../sketch/lock.js";
import { assembleContext } from "./context.js";
import { renderEvent, runCli, type CliDeps } from "./program.js";

let tmpDir: string;
let sketchPath: string;

beforeEach(async () => {
  tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), "cli-test-"));
  sketchPath = path.join(tmpDir, "blink", "blink.ino");
  await fs.mkdir(path.dirname(sketchPath), { recursive: true });
  await fs.writeFile(sketchPath, "void setup() {}\nvoid loop() {}\n", "utf-8");
});

afterEach(async () => {
  await fs.rm(tmpDir, { recursive: true, force: true });
});

function harness(
  opts: { toolchain?: FakeToolchainOptions; script?: OracleScript; interruptImmediately?: boolean } = {},
) {
  const out: string[] = [];
  const err: string[] = [];
  const toolchain = new FakeToolchain(opts.toolchain);
  const oracle = new ScriptedOracle({ list_libraries: () => "", ...opts.script });
  const config = resolveConfig({}, null, { HOME: tmpDir });
  const ctx = assembleContext({
    config,
    log: getChildLogger({ module: "cli-test" }),
    toolchain,
    createOracle: () => oracle,
    registry: { getDefaultBranch: async () => "main" },
    transfer: { download: async () => ({ status: 404, bytes: new Uint8Array() }) },
  });
  const deps: CliDeps = {
    io: { out: (line) => out.push(line), err: (line) => err.push(line) },
    createContext: vi.fn(() => ctx),
    onInterrupt: (handler) => {
      if (opts.interruptImmediately) handler();
      return () => {};
    },
  };
  return { deps, out, err, toolchain, oracle, config };
}

describe("runCli", () => {
  it("lists the board catalog", async () => {
    const { deps, out } = harness();

    expect(await runCli(["boards"], deps)).toBe(0);
    expect(out).toHaveLength(9);
    expect(out[0]).toBe("Arduino Uno\tarduino:avr:uno");
  });

  it("runs the compile-fix loop and exits 0 on success", async () => {
    const { deps, out, toolchain } = harness({ toolchain: { compile: () => ({ ok: true, output: "Sketch uses 924 bytes" }) } });

    const code = await runCli(["fix", "--sketch", sketchPath, "--board", "Arduino Mega"], deps);

    expect(code).toBe(0);
    expect(toolchain.callsOf("compile")).toEqual([{ op: "compile", sketchPath, fqbn: "arduino:avr:mega" }]);
    expect(out).toEqual([
      "Attempt 1/5: resolving libraries for Arduino Mega",
      "No libraries required",
      "--- attempt 1: compiled ---",
      "Sketch uses 924 bytes",
      "Compilation succeeded on attempt 1",
      "Run SUCCESS",
    ]);
  });

  it("exits 1 when the budget runs out", async () => {
    const { deps, out } = harness({ script: { fix_sketch: () => "int x = 1;" } });

    const code = await runCli(["fix", "--sketch", sketchPath, "--board", "Arduino Uno", "--budget", "2"], deps);

    expect(code).toBe(1);
    expect(out.at(-1)).toBe("Run FAILURE");
  });

  it("needs a board when the sketch is not registered", async () => {
    const { deps, err } = harness();

    const code = await runCli(["fix", "--sketch", sketchPath], deps);

    expect(code).toBe(1);
    expect(err).toEqual([
      `error: No board given for ${sketchPath} and the sketch is not registered; pass --board`,
    ]);
  });

  it("takes the board from the project registry", async () => {
    const { deps, toolchain } = harness({ toolchain: { compile: () => ({ ok: true, output: "" }) } });
    expect(await runCli(["project", "open", sketchPath, "--board", "ESP32 Dev"], deps)).toBe(0);

    expect(await runCli(["fix", "--sketch", sketchPath], deps)).toBe(0);
    expect(toolchain.callsOf("compile")[0]?.fqbn).toBe("esp32:esp32:esp32");
  });

  it("cancels cooperatively on interrupt", async () => {
    const { deps, out, err, toolchain } = harness({ interruptImmediately: true });

    const code = await runCli(["fix", "--sketch", sketchPath, "--board", "Arduino Uno"], deps);

    expect(code).toBe(1);
    expect(toolchain.compileCalls).toBe(0);
    expect(err).toEqual(["Interrupt received; stopping after the current step"]);
    expect(out).toEqual(["Run FAILURE (cancelled): Run cancelled"]);
  });

  it("lists recorded runs after a fix", async () => {
    const { deps, out } = harness({ toolchain: { compile: () => ({ ok: true, output: "" }) } });
    await runCli(["fix", "--sketch", sketchPath, "--board", "Arduino Uno"], deps);
    out.length = 0;

    expect(await runCli(["runs", "--sketch", sketchPath], deps)).toBe(0);
    expect(out).toHaveLength(1);
    expect(out[0]).toMatch(/^\S+Z {2}SUCCESS {2}1\/5 attempt\(s\) {2}Arduino Uno {2}[\da-f-]{36}$/);
  });

  it("lists only the runs of the sketch at the given path", async () => {
    const { deps, out, config } = harness();
    const base = {
      sketchName: "blink",
      boardName: "Arduino Uno",
      fqbn: "arduino:avr:uno",
      retryBudget: 5,
      status: "SUCCESS" as const,
      cancelled: false,
      attempts: [],
      completedAtMs: 0,
    };
    await appendRun(config.runs.dir, { ...base, id: "mine", sketchPath, startedAtMs: 0 });
    await appendRun(config.runs.dir, {
      ...base,
      id: "other",
      sketchPath: path.join(tmpDir, "elsewhere", "blink", "blink.ino"),
      startedAtMs: 1,
    });

    expect(await runCli(["runs", "--sketch", sketchPath], deps)).toBe(0);
    expect(out).toEqual(["1970-01-01T00:00:00.000Z  SUCCESS  0/5 attempt(s)  Arduino Uno  mine"]);
  });

  it("refuses to resolve libraries while the sketch is locked", async () => {
    const { deps, err, oracle } = harness();
    const lock = await acquireSketchLock(sketchPath);

    const code = await runCli(["libs", "--sketch", sketchPath, "--board", "Arduino Uno"], deps);
    await lock.release();

    expect(code).toBe(1);
    expect(err).toEqual([`error: Sketch ${sketchPath} is already being processed (held by this process)`]);
    expect(oracle.requestsFor("list_libraries")).toEqual([]);
  });

  it("refuses to upload while the sketch is locked", async () => {
    const { deps, err, toolchain } = harness();
    const lock = await acquireSketchLock(sketchPath);

    const code = await runCli(["upload", "--sketch", sketchPath, "--board", "Arduino Uno"], deps);
    await lock.release();

    expect(code).toBe(1);
    expect(err).toEqual([`error: Sketch ${sketchPath} is already being processed (held by this process)`]);
    expect(toolchain.callsOf("upload")).toEqual([]);
  });

  it("reports library outcomes for one resolution pass", async () => {
    const { deps, out } = harness({
      toolchain: { installed: ["Servo"], packageIndex: ["DHT sensor library"] },
      script: { list_libraries: ["Servo\nDHT sensor library"] },
    });

    const code = await runCli(["libs", "--sketch", sketchPath, "--board", "Arduino Uno"], deps);

    expect(code).toBe(0);
    expect(out).toEqual(["Servo: already installed", "DHT sensor library: installed via package manager"]);
  });

  it("creates and lists projects", async () => {
    const { deps, out } = harness();

    expect(await runCli(["project", "new", "thermo", "--dir", tmpDir, "--board", "Arduino Nano"], deps)).toBe(0);
    out.length = 0;
    expect(await runCli(["project", "list"], deps)).toBe(0);

    expect(out).toHaveLength(1);
    expect(out[0]).toContain(`thermo  [Arduino Nano]  ${path.join(tmpDir, "thermo", "thermo.ino")}`);
  });

  it("fails an upload when no ports are detected", async () => {
    const { deps, err } = harness({ toolchain: { ports: [] } });

    const code = await runCli(["upload", "--sketch", sketchPath, "--board", "Arduino Uno"], deps);

    expect(code).toBe(1);
    expect(err).toEqual(["Upload failed (tried: none)", "no serial ports detected"]);
  });

  it("returns commander's exit code for a missing required option", async () => {
    const { deps, err } = harness();

    expect(await runCli(["fix"], deps)).toBe(1);
    expect(err[0]).toBe("error: required option '-s, --sketch <path>' not specified");
  });
});

describe("renderEvent", () => {
  it("omits the output block for a silent compile", () => {
    expect(
      renderEvent({
        type: "compile_attempt",
        runId: "r",
        attempt: { index: 2, output: "", success: false },
        timestamp: 0,
      }),
    ).toEqual(["--- attempt 3: failed ---"]);
  });

  it("shows a library that could not be installed", () => {
    const failure = new InstallFailure({ library: "NoSuchLib", tier: "SOURCE_ARCHIVE", reason: "HTTP 404" });

    expect(
      renderEvent({
        type: "libraries_resolved",
        runId: "r",
        attempt: 0,
        outcomes: [{ library: "NoSuchLib", tier: "FAILED", archive: { installed: false }, failure }],
        timestamp: 0,
      }),
    ).toEqual(["  NoSuchLib: FAILED (HTTP 404)"]);
  });
});
