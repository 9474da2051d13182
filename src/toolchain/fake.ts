// ---------------------------------------------------------------------------
// Fake toolchain – in-memory Toolchain for tests and dry runs
// ---------------------------------------------------------------------------

import type { SerialPortInfo, ToolResult, Toolchain } from "./types.js";

export type FakeToolchainCall =
  | { op: "compile"; sketchPath: string; fqbn: string }
  | { op: "listInstalledLibraries" }
  | { op: "installLibrary"; name: string }
  | { op: "installArchive"; archivePath: string }
  | { op: "upload"; sketchPath: string; fqbn: string; port: string }
  | { op: "listPorts" };

export type FakeToolchainOptions = {
  installed?: string[];
  /** Names the package manager can install (case-insensitive). */
  packageIndex?: string[];
  /**
   * When set, `installLibrary` reports success without registering the
   * library, mimicking an install that claims success but leaves no entry.
   */
  phantomInstalls?: boolean;
  /** Library name an archive provides; `undefined` fails the install. */
  archiveProvides?: (archivePath: string) => string | undefined;
  /** Result per compile call (1-based). Defaults to failure. */
  compile?: (call: number, sketchPath: string) => ToolResult | Promise<ToolResult>;
  ports?: SerialPortInfo[];
  uploadOk?: (port: string) => boolean;
};

export class FakeToolchain implements Toolchain {
  readonly calls: FakeToolchainCall[] = [];
  readonly installed: string[];
  private compileCount = 0;

  constructor(private readonly opts: FakeToolchainOptions = {}) {
    this.installed = [...(opts.installed ?? [])];
  }

  get compileCalls(): number {
    return this.compileCount;
  }

  async compile(sketchPath: string, fqbn: string): Promise<ToolResult> {
    this.calls.push({ op: "compile", sketchPath, fqbn });
    this.compileCount += 1;
    if (this.opts.compile) {
      return this.opts.compile(this.compileCount, sketchPath);
    }
    return { ok: false, output: `error: attempt ${this.compileCount} failed` };
  }

  async listInstalledLibraries(): Promise<string[]> {
    this.calls.push({ op: "listInstalledLibraries" });
    return [...this.installed];
  }

  async installLibrary(name: string): Promise<ToolResult> {
    this.calls.push({ op: "installLibrary", name });
    const match = (this.opts.packageIndex ?? []).find((n) => n.toLowerCase() === name.toLowerCase());
    if (!match) {
      return { ok: false, output: `Error installing ${name}: library not found` };
    }
    if (!this.opts.phantomInstalls) {
      this.installed.push(match);
    }
    return { ok: true, output: `Installed ${match}` };
  }

  async installArchive(archivePath: string): Promise<ToolResult> {
    this.calls.push({ op: "installArchive", archivePath });
    const provided = this.opts.archiveProvides?.(archivePath);
    if (!provided) {
      return { ok: false, output: `Error installing archive ${archivePath}` };
    }
    this.installed.push(provided);
    return { ok: true, output: `Library installed from ${archivePath}` };
  }

  async upload(sketchPath: string, fqbn: string, port: string): Promise<ToolResult> {
    this.calls.push({ op: "upload", sketchPath, fqbn, port });
    const ok = this.opts.uploadOk?.(port) ?? true;
    return { ok, output: ok ? `Uploaded to ${port}` : `Failed uploading to ${port}` };
  }

  async listPorts(): Promise<SerialPortInfo[]> {
    this.calls.push({ op: "listPorts" });
    return [...(this.opts.ports ?? [])];
  }

  callsOf<K extends FakeToolchainCall["op"]>(op: K): Extract<FakeToolchainCall, { op: K }>[] {
    return this.calls.filter((c): c is Extract<FakeToolchainCall, { op: K }> => c.op === op);
  }
}
