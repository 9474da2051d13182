// ---------------------------------------------------------------------------
// Dependency Resolver – three-tier install cascade per required library
// ---------------------------------------------------------------------------
// Tiers, in order:
//   ALREADY_INSTALLED  – name present in the toolchain's installed list
//   PACKAGE_MANAGER    – package-manager install, confirmed by re-listing
//   SOURCE_ARCHIVE     – repository lookup + archive download + zip install
// Anything else is FAILED. Libraries are independent: one failure never
// stops the rest, and no tier is retried within a pass.
// ---------------------------------------------------------------------------

import { InstallFailure, formatErrorMessage } from "../errors.js";
import type { ServiceLog } from "../logging.js";
import type { Oracle } from "../oracle/types.js";
import type { Toolchain } from "../toolchain/types.js";
import { installArchive, type ArchiveTransfer } from "./archive.js";
import { resolveRepository, type HostingRegistry } from "./repository.js";
import type { ArchiveAttempt, DependencyResolver, InstallationOutcome } from "./types.js";

export type DependencyResolverDeps = {
  oracle: Oracle;
  toolchain: Toolchain;
  registry: HostingRegistry;
  transfer: ArchiveTransfer;
  archiveHost: string;
  downloadDir: string;
  log: ServiceLog;
};

function containsIgnoreCase(names: readonly string[], wanted: string): boolean {
  const needle = wanted.toLowerCase();
  return names.some((n) => n.toLowerCase() === needle);
}

export function createDependencyResolver(deps: DependencyResolverDeps): DependencyResolver {
  const { toolchain, log } = deps;

  async function isInstalled(library: string): Promise<boolean> {
    return containsIgnoreCase(await toolchain.listInstalledLibraries(), library);
  }

  async function viaArchive(library: string, boardName: string): Promise<InstallationOutcome> {
    const attempt: ArchiveAttempt = { installed: false };
    try {
      const location = await resolveRepository(
        { oracle: deps.oracle, registry: deps.registry, archiveHost: deps.archiveHost, log },
        library,
        boardName,
      );
      attempt.repositoryUrl = location.repositoryUrl;
      attempt.archiveUrl = location.archiveUrl;

      const result = await installArchive(
        { toolchain, transfer: deps.transfer, log },
        { archive: location, destinationDir: deps.downloadDir },
      );
      attempt.installed = result.installed;
      attempt.output = result.output;

      if (result.installed) {
        log.info(`Installed ${library} from ${location.repositoryUrl}`);
        return { library, tier: "SOURCE_ARCHIVE", archive: attempt };
      }
      const failure = new InstallFailure({
        library,
        tier: "SOURCE_ARCHIVE",
        reason: result.output || "archive install reported failure",
      });
      log.error(failure.message);
      return { library, tier: "FAILED", archive: attempt, failure };
    } catch (err) {
      const failure = new InstallFailure({
        library,
        tier: "SOURCE_ARCHIVE",
        reason: formatErrorMessage(err),
        cause: err,
      });
      log.error(failure.message);
      return { library, tier: "FAILED", archive: attempt, failure };
    }
  }

  async function resolveOne(library: string, boardName: string): Promise<InstallationOutcome> {
    if (await isInstalled(library)) {
      log.info(`Library already installed: ${library}`);
      return { library, tier: "ALREADY_INSTALLED" };
    }

    log.info(`Installing library via package manager: ${library}`);
    const install = await toolchain.installLibrary(library);
    // A reported success is only trusted once the library shows up.
    if (await isInstalled(library)) {
      log.info(`Installed via package manager: ${library}`);
      return { library, tier: "PACKAGE_MANAGER" };
    }
    log.warn(
      install.ok
        ? `Package manager reported success for ${library} but it is not listed; trying source archive`
        : `Package manager could not install ${library}; trying source archive`,
    );

    return viaArchive(library, boardName);
  }

  return {
    async resolve(libraries, boardName) {
      const outcomes: InstallationOutcome[] = [];
      for (const library of libraries) {
        outcomes.push(await resolveOne(library, boardName));
      }
      return outcomes;
    },
  };
}

/** One line per outcome, for log sinks. */
export function describeOutcome(outcome: InstallationOutcome): string {
  switch (outcome.tier) {
    case "ALREADY_INSTALLED":
      return `${outcome.library}: already installed`;
    case "PACKAGE_MANAGER":
      return `${outcome.library}: installed via package manager`;
    case "SOURCE_ARCHIVE":
      return `${outcome.library}: installed from ${outcome.archive.repositoryUrl ?? "source archive"}`;
    case "FAILED":
      return `${outcome.library}: FAILED (${outcome.failure.reason})`;
  }
}
