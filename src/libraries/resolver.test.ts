import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import { InstallFailure, OracleError } from "../errors.js";
import { ScriptedOracle, type OracleScript } from "../oracle/scripted.js";
import { FakeToolchain, type FakeToolchainOptions } from "../toolchain/fake.js";
import type { ArchiveTransfer } from "./archive.js";
import type { HostingRegistry } from "./repository.js";
import { createDependencyResolver, describeOutcome } from "./resolver.js";

let tmpDir: string;

beforeEach(async () => {
  tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), "resolver-test-"));
});

afterEach(async () => {
  await fs.rm(tmpDir, { recursive: true, force: true });
});

function setup(opts: { toolchain?: FakeToolchainOptions; script?: OracleScript; transferStatus?: number } = {}) {
  const toolchain = new FakeToolchain(opts.toolchain);
  const oracle = new ScriptedOracle(opts.script ?? {});
  const registry: HostingRegistry = { getDefaultBranch: vi.fn(async () => "main") };
  const transfer: ArchiveTransfer = {
    download: vi.fn(async () => ({ status: opts.transferStatus ?? 200, bytes: new Uint8Array([1]) })),
  };
  const log = { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
  const resolver = createDependencyResolver({
    oracle,
    toolchain,
    registry,
    transfer,
    archiveHost: "https://github.com",
    downloadDir: tmpDir,
    log,
  });
  return { resolver, toolchain, oracle, registry, transfer, log };
}

describe("createDependencyResolver", () => {
  it("reports Servo as already installed and installs DHT via the package manager", async () => {
    const { resolver, toolchain } = setup({ toolchain: { installed: ["servo"], packageIndex: ["dht"] } });

    const outcomes = await resolver.resolve(["Servo", "DHT"], "Arduino Uno");

    expect(outcomes).toEqual([
      { library: "Servo", tier: "ALREADY_INSTALLED" },
      { library: "DHT", tier: "PACKAGE_MANAGER" },
    ]);
    expect(toolchain.callsOf("installLibrary")).toEqual([{ op: "installLibrary", name: "DHT" }]);
  });

  it("returns one outcome per name in input order, failures included", async () => {
    const { resolver } = setup({
      toolchain: { installed: ["Wire"], packageIndex: ["Servo"] },
      script: { repository_url: ["no idea", "no idea either"] },
    });

    const outcomes = await resolver.resolve(["Ghost", "Wire", "Phantom", "Servo"], "Arduino Uno");

    expect(outcomes.map((o) => [o.library, o.tier])).toEqual([
      ["Ghost", "FAILED"],
      ["Wire", "ALREADY_INSTALLED"],
      ["Phantom", "FAILED"],
      ["Servo", "PACKAGE_MANAGER"],
    ]);
  });

  it("resolves an empty list to no outcomes", async () => {
    const { resolver, toolchain } = setup();

    expect(await resolver.resolve([], "Arduino Uno")).toEqual([]);
    expect(toolchain.calls).toEqual([]);
  });

  it("does not trust a package-manager success that leaves no installed entry", async () => {
    const { resolver, toolchain } = setup({
      toolchain: { packageIndex: ["Ghost"], phantomInstalls: true },
      script: { repository_url: [new OracleError("quota exceeded")] },
    });

    const [outcome] = await resolver.resolve(["Ghost"], "Arduino Uno");

    expect(outcome?.tier).toBe("FAILED");
    expect(toolchain.callsOf("installLibrary")).toHaveLength(1);
    expect(toolchain.callsOf("listInstalledLibraries")).toHaveLength(2);
  });

  it("falls through to the source archive and records the repository", async () => {
    const { resolver, toolchain, registry } = setup({
      toolchain: { archiveProvides: (p) => (path.basename(p) === "Thing-main.zip" ? "Thing" : undefined) },
      script: { repository_url: ["https://github.com/acme/Thing"] },
    });

    const [outcome] = await resolver.resolve(["Thing"], "Arduino Mega");

    expect(outcome).toEqual({
      library: "Thing",
      tier: "SOURCE_ARCHIVE",
      archive: {
        repositoryUrl: "https://github.com/acme/Thing",
        archiveUrl: "https://github.com/acme/Thing/archive/refs/heads/main.zip",
        installed: true,
        output: `Library installed from ${path.join(tmpDir, "Thing-main.zip")}`,
      },
    });
    expect(registry.getDefaultBranch).toHaveBeenCalledWith("acme", "Thing");
    expect(toolchain.installed).toEqual(["Thing"]);
  });

  it("carries the failing step's diagnostic in a FAILED outcome", async () => {
    const { resolver } = setup({
      script: { repository_url: ["https://github.com/acme/Thing"] },
      transferStatus: 404,
    });

    const [outcome] = await resolver.resolve(["Thing"], "Arduino Uno");

    expect(outcome?.tier).toBe("FAILED");
    if (outcome?.tier !== "FAILED") return;
    expect(outcome.failure).toBeInstanceOf(InstallFailure);
    expect(outcome.failure.tier).toBe("SOURCE_ARCHIVE");
    expect(outcome.failure.reason).toBe(
      "Failed to download archive from https://github.com/acme/Thing/archive/refs/heads/main.zip, HTTP 404",
    );
    expect(outcome.archive).toEqual({
      repositoryUrl: "https://github.com/acme/Thing",
      archiveUrl: "https://github.com/acme/Thing/archive/refs/heads/main.zip",
      installed: false,
    });
  });

  it("marks an archive the toolchain refuses as FAILED with its output", async () => {
    const { resolver } = setup({ script: { repository_url: ["https://github.com/acme/Thing"] } });

    const [outcome] = await resolver.resolve(["Thing"], "Arduino Uno");

    expect(outcome?.tier).toBe("FAILED");
    if (outcome?.tier !== "FAILED") return;
    expect(outcome.archive.installed).toBe(false);
    expect(outcome.failure.reason).toBe(`Error installing archive ${path.join(tmpDir, "Thing-main.zip")}`);
  });

  it("is idempotent after a package-manager install", async () => {
    const { resolver } = setup({ toolchain: { packageIndex: ["Servo"] } });

    await resolver.resolve(["Servo"], "Arduino Uno");
    const second = await resolver.resolve(["servo"], "Arduino Uno");

    expect(second).toEqual([{ library: "servo", tier: "ALREADY_INSTALLED" }]);
  });

  it("is idempotent after a source-archive install", async () => {
    const { resolver, oracle } = setup({
      toolchain: { archiveProvides: () => "Thing" },
      script: { repository_url: ["https://github.com/acme/Thing"] },
    });

    const first = await resolver.resolve(["Thing"], "Arduino Uno");
    const second = await resolver.resolve(["Thing"], "Arduino Uno");

    expect(first[0]?.tier).toBe("SOURCE_ARCHIVE");
    expect(second).toEqual([{ library: "Thing", tier: "ALREADY_INSTALLED" }]);
    expect(oracle.requestsFor("repository_url")).toHaveLength(1);
  });
});

describe("describeOutcome", () => {
  it("renders each tier on one line", () => {
    const failure = new InstallFailure({ library: "X", tier: "SOURCE_ARCHIVE", reason: "HTTP 404" });
    expect(describeOutcome({ library: "Servo", tier: "ALREADY_INSTALLED" })).toBe("Servo: already installed");
    expect(describeOutcome({ library: "DHT", tier: "PACKAGE_MANAGER" })).toBe("DHT: installed via package manager");
    expect(
      describeOutcome({
        library: "Thing",
        tier: "SOURCE_ARCHIVE",
        archive: { repositoryUrl: "https://github.com/acme/Thing", installed: true },
      }),
    ).toBe("Thing: installed from https://github.com/acme/Thing");
    expect(describeOutcome({ library: "X", tier: "FAILED", archive: { installed: false }, failure })).toBe(
      "X: FAILED (HTTP 404)",
    );
  });
});
