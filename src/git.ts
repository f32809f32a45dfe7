import { execFile } from "node:child_process";

export type GitRunOptions = {
  cwd?: string;
  signal?: AbortSignal | undefined;
};

/** Runs `git <args>` and resolves with stdout. */
export type GitRunner = (args: string[], options?: GitRunOptions) => Promise<string>;

export class GitCommandError extends Error {
  constructor(message: string, cause: unknown) {
    super(`git command failed: ${message}`, { cause });
    this.name = "GitCommandError";
  }
}

export const runGitCommand: GitRunner = (args, options = {}) =>
  new Promise((resolve, reject) => {
    const execOptions: { cwd?: string; signal?: AbortSignal; encoding: "utf8"; maxBuffer: number } = {
      encoding: "utf8",
      maxBuffer: 16 * 1024 * 1024
    };
    if (options.cwd && options.cwd.trim().length > 0) execOptions.cwd = options.cwd;
    if (options.signal) execOptions.signal = options.signal;

    execFile("git", args, execOptions, (error, stdout, stderr) => {
      if (error) {
        const combined = `${stdout}${stderr}`.trim();
        reject(new GitCommandError(combined.length > 0 ? combined : error.message, error));
        return;
      }
      resolve(stdout);
    });
  });
