import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import type { Profile } from "./config.js";
import type { GitRunner } from "./git.js";

export type WikiPageRow = {
  path: string;
  size: number;
};

export type WikiPutResult = {
  page: string;
  status: "updated" | "no_change";
};

export class WikiError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "WikiError";
  }
}

export function normalizeWikiPagePath(page: string): string {
  const trimmed = page.trim();
  if (trimmed === "") {
    throw new WikiError("--page is required");
  }
  let clean = path.posix.normalize(trimmed);
  if (clean.length > 1 && clean.endsWith("/")) {
    clean = clean.slice(0, -1);
  }
  if (clean === "." || clean === "/" || clean === ".." || clean.startsWith("../")) {
    throw new WikiError("invalid --page value");
  }
  // Absolute paths are taken relative to the wiki root.
  clean = clean.replace(/^\/+/, "");
  if (clean === "") {
    throw new WikiError("invalid --page value");
  }
  return clean;
}

/**
 * Username for git-over-HTTPS. Token-only profiles use x-token-auth; e-mail
 * usernames belong to API tokens, which git accepts as
 * x-bitbucket-api-token-auth.
 */
export function resolveWikiAuthUser(username: string | undefined): string {
  const user = username?.trim() ?? "";
  if (user === "") {
    return "x-token-auth";
  }
  if (user.includes("@")) {
    return "x-bitbucket-api-token-auth";
  }
  return user;
}

export function buildWikiRemoteUrl(profile: Profile, workspace: string, repo: string): string {
  if (profile.token.trim() === "") {
    throw new WikiError("profile has no token configured");
  }
  // An unparseable base URL keeps the public host.
  let host = "bitbucket.org";
  const baseUrl = profile.baseUrl.trim();
  if (URL.canParse(baseUrl)) {
    const parsed = new URL(baseUrl);
    if (parsed.host !== "" && parsed.host !== "api.bitbucket.org") {
      host = parsed.host;
    }
  }

  const url = new URL(`https://${host}`);
  url.pathname = `/${workspace}/${repo}.git/wiki`;
  url.username = resolveWikiAuthUser(profile.username);
  url.password = profile.token;
  return url.toString();
}

export function commitIdentity(username: string | undefined): { name: string; email: string } {
  const user = username?.trim() ?? "";
  if (user.includes("@")) {
    return { name: user.slice(0, user.indexOf("@")), email: user };
  }
  return { name: "bb-cli", email: "bb-cli@local" };
}

export function redactToken(input: string, token: string): string {
  const secret = token.trim();
  if (secret === "") {
    return input;
  }
  return input.split(secret).join("***");
}

export class WikiCheckout {
  private constructor(
    readonly dir: string,
    private readonly git: GitRunner,
    private readonly signal: AbortSignal | undefined
  ) {}

  /** Shallow-clones the wiki into a fresh temp directory. */
  static async clone(
    remoteUrl: string,
    git: GitRunner,
    signal?: AbortSignal
  ): Promise<WikiCheckout> {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "bb-wiki-"));
    try {
      await git(["clone", "--depth", "1", remoteUrl, dir], { signal });
    } catch (error) {
      fs.rmSync(dir, { recursive: true, force: true });
      throw error;
    }
    return new WikiCheckout(dir, git, signal);
  }

  listPages(): WikiPageRow[] {
    const rows: WikiPageRow[] = [];
    const walk = (current: string) => {
      for (const entry of fs.readdirSync(current, { withFileTypes: true })) {
        const full = path.join(current, entry.name);
        if (entry.isDirectory()) {
          if (entry.name === ".git") continue;
          walk(full);
          continue;
        }
        rows.push({
          path: path.relative(this.dir, full).split(path.sep).join("/"),
          size: fs.statSync(full).size
        });
      }
    };
    walk(this.dir);
    return rows.sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));
  }

  readPage(page: string): string {
    const file = this.pageFile(page);
    if (!fs.existsSync(file) || !fs.statSync(file).isFile()) {
      throw new WikiError(`wiki page not found: ${page}`);
    }
    return fs.readFileSync(file, "utf8");
  }

  /**
   * Writes the page and, when git sees a change, commits and pushes it to
   * the wiki's default branch.
   */
  async putPage(
    page: string,
    content: string,
    options: { message?: string | undefined; username?: string | undefined }
  ): Promise<WikiPutResult> {
    const file = this.pageFile(page);
    fs.mkdirSync(path.dirname(file), { recursive: true });
    fs.writeFileSync(file, content, "utf8");

    await this.run(["add", "--", page]);
    const status = await this.run(["status", "--porcelain", "--", page]);
    if (status.trim() === "") {
      return { page, status: "no_change" };
    }

    const identity = commitIdentity(options.username);
    const message = options.message?.trim() || `Update wiki page ${page}`;
    await this.run(["config", "user.name", identity.name]);
    await this.run(["config", "user.email", identity.email]);
    await this.run(["commit", "-m", message]);
    await this.run(["push", "origin", "HEAD"]);
    return { page, status: "updated" };
  }

  dispose(): void {
    fs.rmSync(this.dir, { recursive: true, force: true });
  }

  private pageFile(page: string): string {
    return path.join(this.dir, ...page.split("/"));
  }

  private run(args: string[]): Promise<string> {
    return this.git(args, { cwd: this.dir, signal: this.signal });
  }
}

/** Clones, hands the checkout to `action`, and always removes the clone. */
export async function withWikiCheckout<T>(
  remoteUrl: string,
  git: GitRunner,
  signal: AbortSignal | undefined,
  action: (checkout: WikiCheckout) => Promise<T> | T
): Promise<T> {
  const checkout = await WikiCheckout.clone(remoteUrl, git, signal);
  try {
    return await action(checkout);
  } finally {
    checkout.dispose();
  }
}
