import type { GitRunner } from "./git.js";
import type { Logger } from "./output.js";

export type RepoTarget = {
  workspace: string;
  repo: string;
};

export class RepoTargetError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "RepoTargetError";
  }
}

const BITBUCKET_HOST = "bitbucket.org";

/**
 * Parses `https://bitbucket.org/ws/repo.git` and `git@bitbucket.org:ws/repo.git`
 * style remotes. Anything not hosted on bitbucket.org yields undefined.
 */
export function parseBitbucketRemote(remote: string): RepoTarget | undefined {
  const trimmed = remote.trim();
  if (trimmed === "") {
    return undefined;
  }

  if (trimmed.includes("://")) {
    let url: URL;
    try {
      url = new URL(trimmed);
    } catch (_error) {
      return undefined;
    }
    if (url.hostname.toLowerCase() !== BITBUCKET_HOST) {
      return undefined;
    }
    return parseRepoPath(url.pathname);
  }

  const separator = trimmed.indexOf(":");
  if (separator < 0) {
    return undefined;
  }
  let host = trimmed.slice(0, separator);
  const at = host.lastIndexOf("@");
  if (at >= 0) {
    host = host.slice(at + 1);
  }
  if (host.trim().toLowerCase() !== BITBUCKET_HOST) {
    return undefined;
  }
  return parseRepoPath(trimmed.slice(separator + 1));
}

function parseRepoPath(rawPath: string): RepoTarget | undefined {
  let value = rawPath.trim();
  if (value.startsWith("/")) value = value.slice(1);
  if (value.endsWith("/")) value = value.slice(0, -1);
  const parts = value.split("/");
  if (parts.length !== 2) {
    return undefined;
  }
  const workspace = (parts[0] ?? "").trim();
  let repo = (parts[1] ?? "").trim();
  if (repo.endsWith(".git")) repo = repo.slice(0, -".git".length).trim();
  if (workspace === "" || repo === "") {
    return undefined;
  }
  return { workspace, repo };
}

export async function inferRepoFromGit(git: GitRunner, cwd?: string): Promise<RepoTarget> {
  const output = await git(["config", "--get", "remote.origin.url"], cwd ? { cwd } : {});
  const remote = output.trim();
  if (remote === "") {
    throw new RepoTargetError("remote.origin.url not set");
  }
  const target = parseBitbucketRemote(remote);
  if (!target) {
    throw new RepoTargetError("origin remote is not a Bitbucket repository");
  }
  return target;
}

/**
 * Fills in whatever --workspace/--repo left blank from the origin remote of
 * the current checkout.
 */
export async function resolveRepoTarget(
  flags: { workspace?: string | undefined; repo?: string | undefined },
  requireRepo: boolean,
  git: GitRunner,
  logger: Logger
): Promise<RepoTarget> {
  let workspace = flags.workspace?.trim() ?? "";
  let repo = flags.repo?.trim() ?? "";

  if (workspace === "" || (requireRepo && repo === "")) {
    try {
      const inferred = await inferRepoFromGit(git);
      if (workspace === "") workspace = inferred.workspace;
      if (repo === "") repo = inferred.repo;
    } catch (error) {
      logger.debug(`Could not infer repository from git: ${error instanceof Error ? error.message : String(error)}`);
    }
  }

  if (workspace === "") {
    throw new RepoTargetError("--workspace is required");
  }
  if (requireRepo && repo === "") {
    throw new RepoTargetError("--repo is required");
  }
  return { workspace, repo };
}
