// ---------------------------------------------------------------------------
// CLI context – configuration, logging and collaborators for one invocation
// ---------------------------------------------------------------------------

import type { CompileFixDeps } from "../compile-fix/loop.js";
import { loadConfig } from "../config/config.js";
import type { SketchforgeConfig } from "../config/types.js";
import { createFetchTransfer, type ArchiveTransfer } from "../libraries/archive.js";
import { GitHubRegistry, type HostingRegistry } from "../libraries/repository.js";
import { createDependencyResolver } from "../libraries/resolver.js";
import type { DependencyResolver } from "../libraries/types.js";
import { configureLogging, getChildLogger, toServiceLog, type SubsystemLogger } from "../logging.js";
import { GeminiOracle } from "../oracle/gemini.js";
import type { Oracle } from "../oracle/types.js";
import { ProjectService } from "../projects/service.js";
import { ArduinoCli } from "../toolchain/arduino-cli.js";
import type { Toolchain } from "../toolchain/types.js";

export type CliContext = {
  config: SketchforgeConfig;
  log: SubsystemLogger;
  toolchain: Toolchain;
  projects: ProjectService;
  /** Built on first use so commands that never query the oracle need no API key. */
  oracle(): Oracle;
  resolver(): DependencyResolver;
  compileFixDeps(): CompileFixDeps;
};

export type ContextParts = {
  config: SketchforgeConfig;
  log: SubsystemLogger;
  toolchain: Toolchain;
  createOracle: () => Oracle;
  registry: HostingRegistry;
  transfer: ArchiveTransfer;
};

/** Wire collaborators into the services the commands use. */
export function assembleContext(parts: ContextParts): CliContext {
  const { config, log, toolchain } = parts;
  let oracle: Oracle | undefined;
  const getOracle = () => (oracle ??= parts.createOracle());

  const projects = new ProjectService({
    storePath: config.projects.store,
    log: toServiceLog(log.child({ module: "projects" })),
    broadcast: (event, payload) => log.debug(event, { payload }),
  });

  const resolver = (): DependencyResolver =>
    createDependencyResolver({
      oracle: getOracle(),
      toolchain,
      registry: parts.registry,
      transfer: parts.transfer,
      archiveHost: config.libraries.archiveHost,
      downloadDir: config.libraries.downloadDir,
      log: toServiceLog(log.child({ module: "libraries" })),
    });

  return {
    config,
    log,
    toolchain,
    projects,
    oracle: getOracle,
    resolver,
    compileFixDeps: () => ({
      oracle: getOracle(),
      toolchain,
      resolver: resolver(),
      log: toServiceLog(log.child({ module: "compile-fix" })),
      runsDir: config.runs.dir,
    }),
  };
}

/** Production context: config file, winston, arduino-cli, Gemini, GitHub. */
export function createCliContext(opts: { configPath?: string } = {}): CliContext {
  const config = loadConfig({ configPath: opts.configPath });
  configureLogging({ level: config.logging.level, file: config.logging.file });
  const log = getChildLogger({ module: "cli" });

  return assembleContext({
    config,
    log,
    toolchain: new ArduinoCli({
      cliPath: config.toolchain.cliPath,
      timeoutMs: config.toolchain.timeoutMs,
      log: log.child({ module: "toolchain" }),
    }),
    createOracle: () =>
      new GeminiOracle({
        model: config.oracle.model,
        apiKey: config.oracle.apiKey,
        log: log.child({ module: "oracle" }),
      }),
    registry: new GitHubRegistry({
      apiBase: config.libraries.hostingApiBase,
      token: process.env.GITHUB_TOKEN || undefined,
    }),
    transfer: createFetchTransfer(),
  });
}
