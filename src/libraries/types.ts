// ---------------------------------------------------------------------------
// Library resolution types
// ---------------------------------------------------------------------------

import type { InstallFailure } from "../errors.js";

export const INSTALL_TIERS = ["ALREADY_INSTALLED", "PACKAGE_MANAGER", "SOURCE_ARCHIVE", "FAILED"] as const;
export type InstallTier = (typeof INSTALL_TIERS)[number];

/** Where a library's source archive lives, derived from its repository. */
export type ArchiveLocation = {
  repositoryUrl: string;
  owner: string;
  repo: string;
  branch: string;
  archiveUrl: string;
};

/** What the source-archive tier got to before it finished. */
export type ArchiveAttempt = {
  repositoryUrl?: string;
  archiveUrl?: string;
  installed: boolean;
  output?: string;
};

export type InstallationOutcome =
  | { library: string; tier: "ALREADY_INSTALLED" }
  | { library: string; tier: "PACKAGE_MANAGER" }
  | { library: string; tier: "SOURCE_ARCHIVE"; archive: ArchiveAttempt }
  | { library: string; tier: "FAILED"; archive: ArchiveAttempt; failure: InstallFailure };

export interface DependencyResolver {
  /** One outcome per requested name, in input order. */
  resolve(libraries: readonly string[], boardName: string): Promise<InstallationOutcome[]>;
}
