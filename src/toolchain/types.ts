// ---------------------------------------------------------------------------
// Toolchain – vendor compiler / uploader / library manager contract
// ---------------------------------------------------------------------------

import type { ToolchainUnavailable } from "../errors.js";

/**
 * Outcome of one toolchain invocation. A nonzero exit is `ok: false` with the
 * captured output; `unavailable` is set when the executable never started.
 */
export type ToolResult = {
  ok: boolean;
  output: string;
  unavailable?: ToolchainUnavailable;
};

export type SerialPortInfo = {
  address: string;
  /** Protocol label reported for the port (e.g. "Serial Port (USB)"). */
  label: string;
  boardName?: string;
  fqbn?: string;
};

export interface Toolchain {
  compile(sketchPath: string, fqbn: string): Promise<ToolResult>;
  /** Installed library names; an invocation failure yields an empty list. */
  listInstalledLibraries(): Promise<string[]>;
  installLibrary(name: string): Promise<ToolResult>;
  installArchive(archivePath: string): Promise<ToolResult>;
  upload(sketchPath: string, fqbn: string, port: string): Promise<ToolResult>;
  listPorts(): Promise<SerialPortInfo[]>;
}
