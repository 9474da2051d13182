import { describe, it, expect, vi } from "vitest";
import { ToolchainUnavailable } from "../errors.js";
import { ArduinoCli, parseInstalledLibraries, parsePortList, type CliExecutor, type CliRun } from "./arduino-cli.js";

function executorReturning(run: Partial<CliRun>) {
  const exec = vi.fn<CliExecutor>(async () => ({ exitCode: 0, stdout: "", stderr: "", ...run }));
  return exec;
}

describe("parseInstalledLibraries", () => {
  it("reads the object form", () => {
    const json = JSON.stringify({
      installed_libraries: [
        { library: { name: "Servo", version: "1.2.1" } },
        { library: { name: "DHT sensor library" } },
      ],
    });
    expect(parseInstalledLibraries(json)).toEqual(["Servo", "DHT sensor library"]);
  });

  it("reads the legacy array form", () => {
    expect(parseInstalledLibraries(JSON.stringify([{ library: { name: "Wire" } }]))).toEqual(["Wire"]);
  });

  it("returns an empty list for empty or unparseable output", () => {
    expect(parseInstalledLibraries("{}")).toEqual([]);
    expect(parseInstalledLibraries("No libraries installed.")).toEqual([]);
  });
});

describe("parsePortList", () => {
  it("maps detected ports and the first matching board", () => {
    const json = JSON.stringify({
      detected_ports: [
        {
          port: { address: "/dev/ttyACM0", label: "/dev/ttyACM0", protocol_label: "Serial Port (USB)" },
          matching_boards: [{ name: "Arduino Uno", fqbn: "arduino:avr:uno" }],
        },
        { port: { address: "/dev/ttyS0" } },
      ],
    });
    expect(parsePortList(json)).toEqual([
      { address: "/dev/ttyACM0", label: "Serial Port (USB)", boardName: "Arduino Uno", fqbn: "arduino:avr:uno" },
      { address: "/dev/ttyS0", label: "/dev/ttyS0" },
    ]);
  });
});

describe("ArduinoCli", () => {
  it("compiles with the board identifier and combines both streams", async () => {
    const exec = executorReturning({ exitCode: 1, stdout: "Compiling sketch...\n", stderr: "\x1b[31mblink.ino:3: error\x1b[0m\n" });
    const cli = new ArduinoCli({ cliPath: "/opt/arduino-cli", exec, env: {} });

    const result = await cli.compile("/work/blink/blink.ino", "arduino:avr:uno");

    expect(result).toEqual({ ok: false, output: "Compiling sketch...\nblink.ino:3: error" });
    expect(exec).toHaveBeenCalledWith(
      "/opt/arduino-cli",
      ["compile", "--fqbn", "arduino:avr:uno", "/work/blink/blink.ino"],
      { env: {}, timeoutMs: 300_000 },
    );
  });

  it("reports a missing executable as unavailable instead of throwing", async () => {
    const exec = executorReturning({ exitCode: null, spawnError: "spawn arduino-cli ENOENT" });
    const cli = new ArduinoCli({ cliPath: "arduino-cli", exec, env: {} });

    const result = await cli.compile("/s.ino", "arduino:avr:uno");

    expect(result.ok).toBe(false);
    expect(result.unavailable).toBeInstanceOf(ToolchainUnavailable);
    expect(result.output).toBe(
      "Toolchain could not be started (arduino-cli compile --fqbn arduino:avr:uno /s.ino): spawn arduino-cli ENOENT",
    );
  });

  it("lists installed libraries from stdout only", async () => {
    const exec = executorReturning({
      stdout: JSON.stringify({ installed_libraries: [{ library: { name: "Servo" } }] }),
      stderr: "warning: index is stale",
    });
    const cli = new ArduinoCli({ cliPath: "arduino-cli", exec, env: {} });

    expect(await cli.listInstalledLibraries()).toEqual(["Servo"]);
    expect(exec.mock.calls[0]?.[1]).toEqual(["lib", "list", "--format", "json"]);
  });

  it("returns no libraries when listing fails", async () => {
    const exec = executorReturning({ exitCode: 2, stderr: "boom" });
    const cli = new ArduinoCli({ cliPath: "arduino-cli", exec, env: {} });

    expect(await cli.listInstalledLibraries()).toEqual([]);
  });

  it("enables unsafe installs only for archive installs", async () => {
    const exec = executorReturning({ stdout: "Library installed" });
    const cli = new ArduinoCli({ cliPath: "arduino-cli", exec, env: { PATH: "/usr/bin" } });

    const result = await cli.installArchive("/tmp/DHT-master.zip");
    await cli.installLibrary("Servo");

    expect(result).toEqual({ ok: true, output: "Library installed" });
    expect(exec.mock.calls[0]?.[1]).toEqual(["lib", "install", "--zip-path", "/tmp/DHT-master.zip"]);
    expect(exec.mock.calls[0]?.[2].env).toEqual({
      PATH: "/usr/bin",
      ARDUINO_LIBRARY_ENABLE_UNSAFE_INSTALL: "true",
    });
    expect(exec.mock.calls[1]?.[1]).toEqual(["lib", "install", "Servo"]);
    expect(exec.mock.calls[1]?.[2].env).toEqual({ PATH: "/usr/bin" });
  });

  it("uploads to the given port", async () => {
    const exec = executorReturning({});
    const cli = new ArduinoCli({ cliPath: "arduino-cli", exec, env: {}, timeoutMs: 5000 });

    await cli.upload("/s.ino", "arduino:avr:uno", "/dev/ttyACM0");

    expect(exec).toHaveBeenCalledWith(
      "arduino-cli",
      ["upload", "--fqbn", "arduino:avr:uno", "--port", "/dev/ttyACM0", "/s.ino"],
      { env: {}, timeoutMs: 5000 },
    );
  });
});
