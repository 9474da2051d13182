// ---------------------------------------------------------------------------
// Repository Resolver – library name → source repository → archive location
// ---------------------------------------------------------------------------
// One oracle call for the repository homepage, one registry round trip for
// the default branch. Failures are thrown as taxonomy errors; the dependency
// resolver turns them into FAILED outcomes.
// ---------------------------------------------------------------------------

import { Type } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { InvalidRepositoryURL, NoRepositoryFound, RegistryLookupError, formatErrorMessage } from "../errors.js";
import type { ServiceLog } from "../logging.js";
import { buildRepositoryPrompt } from "../oracle/prompts.js";
import { extractFirstUrl } from "../oracle/replies.js";
import type { Oracle } from "../oracle/types.js";
import type { ArchiveLocation } from "./types.js";

const LOOKUP_TIMEOUT_MS = 15_000;
const FALLBACK_BRANCH = "main";

// ---------------------------------------------------------------------------
// Source-hosting registry
// ---------------------------------------------------------------------------

export interface HostingRegistry {
  getDefaultBranch(owner: string, repo: string): Promise<string>;
}

const RepositoryInfo = Type.Object({
  default_branch: Type.Optional(Type.String({ minLength: 1 })),
});

export type GitHubRegistryOptions = {
  apiBase: string;
  fetchImpl?: typeof fetch;
  timeoutMs?: number;
  token?: string;
};

export class GitHubRegistry implements HostingRegistry {
  private readonly apiBase: string;
  private readonly fetchImpl: typeof fetch;
  private readonly timeoutMs: number;
  private readonly token?: string;

  constructor(opts: GitHubRegistryOptions) {
    this.apiBase = opts.apiBase.replace(/\/+$/, "");
    this.fetchImpl = opts.fetchImpl ?? fetch;
    this.timeoutMs = opts.timeoutMs ?? LOOKUP_TIMEOUT_MS;
    this.token = opts.token;
  }

  async getDefaultBranch(owner: string, repo: string): Promise<string> {
    const url = `${this.apiBase}/repos/${encodeURIComponent(owner)}/${encodeURIComponent(repo)}`;
    const headers: Record<string, string> = { Accept: "application/vnd.github+json" };
    if (this.token) {
      headers.Authorization = `Bearer ${this.token}`;
    }

    const ac = new AbortController();
    const timer = setTimeout(() => ac.abort(), this.timeoutMs);
    let res: Response;
    try {
      res = await this.fetchImpl(url, { headers, signal: ac.signal });
    } catch (err) {
      // Status 0: the request never produced a response.
      throw new RegistryLookupError(0, formatErrorMessage(err), { cause: err });
    } finally {
      clearTimeout(timer);
    }

    if (res.status !== 200) {
      const body = await res.text().catch(() => "");
      throw new RegistryLookupError(res.status, body);
    }

    const body: unknown = await res.json().catch(() => undefined);
    if (Value.Check(RepositoryInfo, body) && body.default_branch) {
      return body.default_branch;
    }
    return FALLBACK_BRANCH;
  }
}

// ---------------------------------------------------------------------------
// URL handling
// ---------------------------------------------------------------------------

/** Split a repository homepage URL into exactly `owner` and `repo`. */
export function parseRepositoryPath(url: string): { owner: string; repo: string } {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    throw new InvalidRepositoryURL(url, "not a parseable URL");
  }
  const segments = parsed.pathname.replace(/^\/+|\/+$/g, "").split("/");
  const [owner, rawRepo] = segments;
  if (segments.length !== 2 || !owner || !rawRepo) {
    throw new InvalidRepositoryURL(url, `expected owner/repository, got ${segments.filter(Boolean).length} path segment(s)`);
  }
  const repo = rawRepo.replace(/\.git$/, "");
  if (!repo) {
    throw new InvalidRepositoryURL(url, "empty repository name");
  }
  return { owner, repo };
}

export function buildArchiveUrl(archiveHost: string, owner: string, repo: string, branch: string): string {
  return `${archiveHost.replace(/\/+$/, "")}/${owner}/${repo}/archive/refs/heads/${branch}.zip`;
}

// ---------------------------------------------------------------------------
// resolveRepository
// ---------------------------------------------------------------------------

export type RepositoryResolverDeps = {
  oracle: Oracle;
  registry: HostingRegistry;
  archiveHost: string;
  log: ServiceLog;
};

export async function resolveRepository(
  deps: RepositoryResolverDeps,
  library: string,
  boardName: string,
): Promise<ArchiveLocation> {
  deps.log.info(`Querying repository URL for library: ${library}`);
  const reply = await deps.oracle.generate(buildRepositoryPrompt(library, boardName));
  const repositoryUrl = extractFirstUrl(reply);
  if (!repositoryUrl) {
    throw new NoRepositoryFound(library, reply);
  }

  const { owner, repo } = parseRepositoryPath(repositoryUrl);
  const branch = await deps.registry.getDefaultBranch(owner, repo);
  const archiveUrl = buildArchiveUrl(deps.archiveHost, owner, repo, branch);

  deps.log.info(`Resolved ${library} → ${owner}/${repo}@${branch}`);
  return { repositoryUrl, owner, repo, branch, archiveUrl };
}
