import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { ConfigError } from "../errors.js";
import {
  DEFAULT_ARCHIVE_HOST,
  DEFAULT_CLI_PATH,
  DEFAULT_MODEL,
  DEFAULT_RETRY_BUDGET,
  clearConfigCache,
  loadConfig,
  resolveConfigPath,
} from "./config.js";

let tmpDir: string;

beforeEach(async () => {
  tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), "sketchforge-config-"));
  clearConfigCache();
});

afterEach(async () => {
  clearConfigCache();
  await fs.rm(tmpDir, { recursive: true, force: true });
});

describe("resolveConfigPath", () => {
  it("prefers the explicit path", () => {
    const result = resolveConfigPath({ configPath: "/etc/sf.yaml", env: { SKETCHFORGE_CONFIG: "/x.yaml" } });
    expect(result).toBe(path.resolve("/etc/sf.yaml"));
  });

  it("falls back to SKETCHFORGE_CONFIG", () => {
    expect(resolveConfigPath({ env: { SKETCHFORGE_CONFIG: "/x.yaml" } })).toBe(path.resolve("/x.yaml"));
  });

  it("defaults to ~/.sketchforge/config.yaml", () => {
    expect(resolveConfigPath({ env: { HOME: "/home/maker" } })).toBe(
      path.join("/home/maker", ".sketchforge", "config.yaml"),
    );
  });
});

describe("loadConfig", () => {
  it("returns defaults when the file is missing", () => {
    const config = loadConfig({ configPath: path.join(tmpDir, "missing.yaml"), env: { HOME: tmpDir } });

    expect(config.source).toBeNull();
    expect(config.oracle.model).toBe(DEFAULT_MODEL);
    expect(config.oracle.apiKey).toBeUndefined();
    expect(config.toolchain.cliPath).toBe(DEFAULT_CLI_PATH);
    expect(config.loop.retryBudget).toBe(DEFAULT_RETRY_BUDGET);
    expect(config.libraries.archiveHost).toBe(DEFAULT_ARCHIVE_HOST);
    expect(config.projects.store).toBe(path.join(tmpDir, ".sketchforge", "projects", "store.json"));
    expect(config.logging.level).toBe("info");
  });

  it("reads YAML values and resolves relative paths against the file", async () => {
    const file = path.join(tmpDir, "config.yaml");
    await fs.writeFile(
      file,
      [
        "oracle:",
        "  model: test-model",
        "  apiKey: test-secret",
        "toolchain:",
        "  cliPath: /opt/arduino/arduino-cli",
        "libraries:",
        "  downloadDir: downloads",
        "  archiveHost: https://git.example.com/",
        "loop:",
        "  retryBudget: 3",
        "logging:",
        "  level: debug",
      ].join("\n"),
      "utf-8",
    );

    const config = loadConfig({ configPath: file, env: { HOME: tmpDir } });

    expect(config.source).toBe(file);
    expect(config.oracle).toEqual({ model: "test-model", apiKey: "test-secret" });
    expect(config.toolchain.cliPath).toBe("/opt/arduino/arduino-cli");
    expect(config.libraries.downloadDir).toBe(path.join(tmpDir, "downloads"));
    expect(config.libraries.archiveHost).toBe("https://git.example.com");
    expect(config.loop.retryBudget).toBe(3);
    expect(config.logging.level).toBe("debug");
  });

  it("fills missing values from the environment", () => {
    const config = loadConfig({
      configPath: path.join(tmpDir, "none.yaml"),
      env: { HOME: tmpDir, GEMINI_API_KEY: "test-secret", ARDUINO_CLI: "/usr/bin/acli", SKETCHFORGE_RETRY_BUDGET: "7" },
    });

    expect(config.oracle.apiKey).toBe("test-secret");
    expect(config.toolchain.cliPath).toBe("/usr/bin/acli");
    expect(config.loop.retryBudget).toBe(7);
  });

  it("treats an empty file as defaults", async () => {
    const file = path.join(tmpDir, "empty.yaml");
    await fs.writeFile(file, "", "utf-8");

    const config = loadConfig({ configPath: file, env: { HOME: tmpDir } });
    expect(config.source).toBe(file);
    expect(config.loop.retryBudget).toBe(DEFAULT_RETRY_BUDGET);
  });

  it("rejects values that fail the schema", async () => {
    const file = path.join(tmpDir, "bad.yaml");
    await fs.writeFile(file, "loop:\n  retryBudget: 0\n", "utf-8");

    expect(() => loadConfig({ configPath: file, env: { HOME: tmpDir } })).toThrow(ConfigError);
  });

  it("rejects unknown keys", async () => {
    const file = path.join(tmpDir, "unknown.yaml");
    await fs.writeFile(file, "board: uno\n", "utf-8");

    expect(() => loadConfig({ configPath: file, env: { HOME: tmpDir } })).toThrow(ConfigError);
  });

  it("rejects malformed YAML", async () => {
    const file = path.join(tmpDir, "broken.yaml");
    await fs.writeFile(file, "loop: [unclosed\n", "utf-8");

    expect(() => loadConfig({ configPath: file, env: { HOME: tmpDir } })).toThrow(/YAML parse error/);
  });

  it("caches by resolved path", async () => {
    const file = path.join(tmpDir, "cached.yaml");
    await fs.writeFile(file, "loop:\n  retryBudget: 2\n", "utf-8");
    const first = loadConfig({ configPath: file, env: { HOME: tmpDir } });

    await fs.writeFile(file, "loop:\n  retryBudget: 9\n", "utf-8");
    expect(loadConfig({ configPath: file, env: { HOME: tmpDir } })).toBe(first);

    clearConfigCache();
    expect(loadConfig({ configPath: file, env: { HOME: tmpDir } }).loop.retryBudget).toBe(9);
  });
});
