// ---------------------------------------------------------------------------
// Error taxonomy
// ---------------------------------------------------------------------------
// Every failure the core can name is a `SketchforgeError` with a stable
// `code`. Per-library install failures travel inside tagged outcomes rather
// than being thrown; the classes still carry their diagnostics.
// ---------------------------------------------------------------------------

export type ErrorDetails = Record<string, unknown>;

export class SketchforgeError extends Error {
  readonly code: string;
  readonly details?: ErrorDetails;

  constructor(message: string, code: string, options?: { details?: ErrorDetails; cause?: unknown }) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = this.constructor.name;
    this.code = code;
    this.details = options?.details;
  }
}

// ---------------------------------------------------------------------------
// Collaborators
// ---------------------------------------------------------------------------

export class OracleError extends SketchforgeError {
  constructor(message: string, options?: { details?: ErrorDetails; cause?: unknown }) {
    super(message, "oracle_error", options);
  }
}

export class ToolchainUnavailable extends SketchforgeError {
  readonly command: string;

  constructor(command: string, reason: string, options?: { cause?: unknown }) {
    super(`Toolchain could not be started (${command}): ${reason}`, "toolchain_unavailable", {
      details: { command },
      cause: options?.cause,
    });
    this.command = command;
  }
}

// ---------------------------------------------------------------------------
// Library resolution
// ---------------------------------------------------------------------------

export class InstallFailure extends SketchforgeError {
  readonly library: string;
  readonly tier: string;
  readonly reason: string;

  constructor(params: { library: string; tier: string; reason: string; cause?: unknown }) {
    super(`Could not install "${params.library}" (${params.tier}): ${params.reason}`, "install_failure", {
      details: { library: params.library, tier: params.tier },
      cause: params.cause,
    });
    this.library = params.library;
    this.tier = params.tier;
    this.reason = params.reason;
  }
}

export class NoRepositoryFound extends SketchforgeError {
  readonly library: string;
  readonly rawText: string;

  constructor(library: string, rawText: string) {
    super(`No repository URL found for "${library}": [${rawText.trim()}]`, "no_repository_found", {
      details: { library },
    });
    this.library = library;
    this.rawText = rawText;
  }
}

export class InvalidRepositoryURL extends SketchforgeError {
  readonly url: string;

  constructor(url: string, reason: string) {
    super(`Invalid repository URL ${url}: ${reason}`, "invalid_repository_url", { details: { url } });
    this.url = url;
  }
}

export class RegistryLookupError extends SketchforgeError {
  readonly status: number;
  readonly body: string;

  constructor(status: number, body: string, options?: { cause?: unknown }) {
    super(`Repository lookup failed: ${status} - ${body}`, "registry_lookup_error", {
      details: { status },
      cause: options?.cause,
    });
    this.status = status;
    this.body = body;
  }
}

export class ArchiveDownloadError extends SketchforgeError {
  readonly status: number;
  readonly url: string;

  constructor(url: string, status: number, options?: { cause?: unknown }) {
    super(`Failed to download archive from ${url}, HTTP ${status}`, "archive_download_error", {
      details: { url, status },
      cause: options?.cause,
    });
    this.status = status;
    this.url = url;
  }
}

/** Never thrown: built only so the warning is logged with a stable code. */
export class ArchiveCleanupWarning extends SketchforgeError {
  readonly path: string;

  constructor(path: string, cause: unknown) {
    super(`Failed to delete archive ${path}: ${formatErrorMessage(cause)}`, "archive_cleanup_warning", {
      details: { path },
      cause,
    });
    this.path = path;
  }
}

// ---------------------------------------------------------------------------
// Runs and configuration
// ---------------------------------------------------------------------------

export class SketchBusyError extends SketchforgeError {
  readonly sketchPath: string;

  constructor(sketchPath: string, holder?: string) {
    super(
      `Sketch ${sketchPath} is already being processed${holder ? ` (${holder})` : ""}`,
      "sketch_busy",
      { details: { sketchPath } },
    );
    this.sketchPath = sketchPath;
  }
}

export class UnknownBoardError extends SketchforgeError {
  constructor(board: string) {
    super(`Unknown board selected: ${board}`, "unknown_board", { details: { board } });
  }
}

export class RunCancelledError extends SketchforgeError {
  constructor() {
    super("Run cancelled", "run_cancelled");
  }
}

export class ConfigError extends SketchforgeError {
  readonly issues: string[];

  constructor(source: string, issues: string[], options?: { cause?: unknown }) {
    super(`Invalid configuration in ${source}: ${issues.join("; ")}`, "config_error", {
      details: { source },
      cause: options?.cause,
    });
    this.issues = issues;
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** One-line rendering of any thrown value, for logs and outcome reasons. */
export function formatErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return collapseWhitespace(error.message || error.name || "Error");
  }
  if (error === null || error === undefined) {
    return "unknown error";
  }
  return collapseWhitespace(String(error));
}

function collapseWhitespace(input: string): string {
  return input.replace(/\s+/g, " ").trim();
}
