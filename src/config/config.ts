// ---------------------------------------------------------------------------
// Configuration loader
// ---------------------------------------------------------------------------
// Lookup order: explicit path → SKETCHFORGE_CONFIG → ~/.sketchforge/config.yaml.
// A missing file means defaults; a malformed or invalid one is a ConfigError.
// Environment variables fill the values the file leaves out.
// ---------------------------------------------------------------------------

import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { Value } from "@sinclair/typebox/value";
import { parse as parseYaml } from "yaml";
import { ConfigError, formatErrorMessage } from "../errors.js";
import { normaliseLevel } from "../logging.js";
import { SketchforgeConfigSchema, type SketchforgeConfig, type SketchforgeConfigFile } from "./types.js";

export const CONFIG_DIR_NAME = ".sketchforge";
export const DEFAULT_MODEL = "gemini-2.5-flash";
export const DEFAULT_CLI_PATH = "arduino-cli";
export const DEFAULT_TOOLCHAIN_TIMEOUT_MS = 300_000;
export const DEFAULT_RETRY_BUDGET = 5;
export const DEFAULT_HOSTING_API_BASE = "https://api.github.com";
export const DEFAULT_ARCHIVE_HOST = "https://github.com";

export type LoadConfigOptions = {
  configPath?: string;
  env?: NodeJS.ProcessEnv;
};

const configCache = new Map<string, SketchforgeConfig>();

function homeDir(env: NodeJS.ProcessEnv): string {
  return env.HOME ?? env.USERPROFILE ?? os.homedir();
}

export function resolveConfigPath(opts: LoadConfigOptions = {}): string {
  const env = opts.env ?? process.env;
  if (opts.configPath) {
    return path.resolve(opts.configPath);
  }
  if (env.SKETCHFORGE_CONFIG) {
    return path.resolve(env.SKETCHFORGE_CONFIG);
  }
  return path.join(homeDir(env), CONFIG_DIR_NAME, "config.yaml");
}

function readConfigFile(filePath: string): SketchforgeConfigFile | null {
  let raw: string;
  try {
    raw = fs.readFileSync(filePath, "utf-8");
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") {
      return null;
    }
    throw new ConfigError(filePath, [formatErrorMessage(err)], { cause: err });
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(raw);
  } catch (err) {
    throw new ConfigError(filePath, [`YAML parse error: ${formatErrorMessage(err)}`], { cause: err });
  }

  // An empty file parses to null.
  if (parsed === null || parsed === undefined) {
    return {};
  }
  if (!Value.Check(SketchforgeConfigSchema, parsed)) {
    const issues = [...Value.Errors(SketchforgeConfigSchema, parsed)].map(
      (e) => `${e.path || "/"}: ${e.message}`,
    );
    throw new ConfigError(filePath, issues);
  }
  return parsed;
}

function parsePositiveInt(raw: string | undefined): number | undefined {
  if (!raw || !raw.trim()) {
    return undefined;
  }
  const n = Number(raw.trim());
  return Number.isInteger(n) && n > 0 ? n : undefined;
}

function resolveFrom(base: string, value: string | undefined): string | undefined {
  return value ? path.resolve(base, value) : undefined;
}

/** Merge file values, environment and defaults into a resolved config. */
export function resolveConfig(
  file: SketchforgeConfigFile,
  source: string | null,
  env: NodeJS.ProcessEnv = process.env,
): SketchforgeConfig {
  const home = homeDir(env);
  const baseDir = source ? path.dirname(source) : process.cwd();
  const stateDir = path.join(home, CONFIG_DIR_NAME);

  return {
    source,
    oracle: {
      model: file.oracle?.model ?? env.SKETCHFORGE_MODEL ?? DEFAULT_MODEL,
      apiKey: file.oracle?.apiKey ?? (env.GEMINI_API_KEY || undefined),
    },
    toolchain: {
      cliPath: file.toolchain?.cliPath ?? (env.ARDUINO_CLI || DEFAULT_CLI_PATH),
      timeoutMs: file.toolchain?.timeoutMs ?? DEFAULT_TOOLCHAIN_TIMEOUT_MS,
    },
    libraries: {
      downloadDir:
        resolveFrom(baseDir, file.libraries?.downloadDir) ??
        path.join(os.tmpdir(), "sketchforge-downloads"),
      hostingApiBase: stripTrailingSlash(file.libraries?.hostingApiBase ?? DEFAULT_HOSTING_API_BASE),
      archiveHost: stripTrailingSlash(file.libraries?.archiveHost ?? DEFAULT_ARCHIVE_HOST),
    },
    loop: {
      retryBudget:
        file.loop?.retryBudget ?? parsePositiveInt(env.SKETCHFORGE_RETRY_BUDGET) ?? DEFAULT_RETRY_BUDGET,
    },
    projects: {
      store:
        resolveFrom(baseDir, file.projects?.store) ?? path.join(stateDir, "projects", "store.json"),
    },
    runs: {
      dir: resolveFrom(baseDir, file.runs?.dir) ?? path.join(stateDir, "runs"),
    },
    logging: {
      level: file.logging?.level ?? normaliseLevel(env.LOG_LEVEL) ?? "info",
      file: resolveFrom(baseDir, file.logging?.file),
    },
  };
}

export function loadConfig(opts: LoadConfigOptions = {}): SketchforgeConfig {
  const configPath = resolveConfigPath(opts);
  const cached = configCache.get(configPath);
  if (cached) {
    return cached;
  }
  const file = readConfigFile(configPath);
  const config = resolveConfig(file ?? {}, file ? configPath : null, opts.env ?? process.env);
  configCache.set(configPath, config);
  return config;
}

export function clearConfigCache(): void {
  configCache.clear();
}

function stripTrailingSlash(input: string): string {
  return input.replace(/\/+$/, "");
}
