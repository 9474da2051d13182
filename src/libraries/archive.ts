// ---------------------------------------------------------------------------
// Archive Installer – download a source archive and hand it to the toolchain
// ---------------------------------------------------------------------------
// The archive lives on disk only for the duration of the install. Removal
// runs on every exit path; a removal failure is logged, never thrown.
// ---------------------------------------------------------------------------

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { ArchiveCleanupWarning, ArchiveDownloadError, formatErrorMessage } from "../errors.js";
import type { ServiceLog } from "../logging.js";
import type { Toolchain } from "../toolchain/types.js";
import type { ArchiveLocation } from "./types.js";

const DOWNLOAD_TIMEOUT_MS = 60_000;

// ---------------------------------------------------------------------------
// Transfer
// ---------------------------------------------------------------------------

export type TransferResponse = {
  status: number;
  bytes: Uint8Array;
};

export interface ArchiveTransfer {
  download(url: string): Promise<TransferResponse>;
}

export function createFetchTransfer(opts?: { fetchImpl?: typeof fetch; timeoutMs?: number }): ArchiveTransfer {
  const fetchImpl = opts?.fetchImpl ?? fetch;
  const timeoutMs = opts?.timeoutMs ?? DOWNLOAD_TIMEOUT_MS;
  return {
    async download(url) {
      const ac = new AbortController();
      const timer = setTimeout(() => ac.abort(), timeoutMs);
      try {
        const res = await fetchImpl(url, { redirect: "follow", signal: ac.signal });
        if (res.status !== 200) {
          return { status: res.status, bytes: new Uint8Array() };
        }
        return { status: res.status, bytes: new Uint8Array(await res.arrayBuffer()) };
      } catch (err) {
        throw new ArchiveDownloadError(url, 0, { cause: err });
      } finally {
        clearTimeout(timer);
      }
    },
  };
}

// ---------------------------------------------------------------------------
// installArchive
// ---------------------------------------------------------------------------

export type ArchiveInstallDeps = {
  toolchain: Toolchain;
  transfer: ArchiveTransfer;
  log: ServiceLog;
};

export type ArchiveInstallResult = {
  installed: boolean;
  output: string;
  archivePath: string;
};

/** Branches such as `release/v2` are flattened so the archive stays in one directory. */
export function archiveFileName(location: Pick<ArchiveLocation, "repo" | "branch">): string {
  return `${location.repo}-${location.branch.replace(/[\\/]/g, "-")}.zip`;
}

export async function installArchive(
  deps: ArchiveInstallDeps,
  params: { archive: ArchiveLocation; destinationDir: string },
): Promise<ArchiveInstallResult> {
  const { archive, destinationDir } = params;
  const archivePath = path.join(destinationDir, archiveFileName(archive));

  deps.log.info(`Downloading ${archive.archiveUrl}`);
  const response = await deps.transfer.download(archive.archiveUrl);
  if (response.status !== 200) {
    throw new ArchiveDownloadError(archive.archiveUrl, response.status);
  }

  await fs.mkdir(destinationDir, { recursive: true });
  try {
    await fs.writeFile(archivePath, response.bytes);
    deps.log.info(`Installing archive ${archivePath}`);
    const result = await deps.toolchain.installArchive(archivePath);
    return { installed: result.ok, output: result.output, archivePath };
  } finally {
    await removeArchive(archivePath, deps.log);
  }
}

async function removeArchive(archivePath: string, log: ServiceLog): Promise<void> {
  try {
    await fs.rm(archivePath, { force: true });
  } catch (err) {
    const warning = new ArchiveCleanupWarning(archivePath, err);
    log.warn(`${warning.code}: ${formatErrorMessage(warning)}`);
  }
}
