import { spawnSync } from "node:child_process";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { describe, expect, it } from "vitest";

function runCli(args: string[], options?: { env?: NodeJS.ProcessEnv; input?: string; cwd?: string }) {
  const tsxPath = path.join(
    process.cwd(),
    "node_modules",
    ".bin",
    process.platform === "win32" ? "tsx.cmd" : "tsx",
  );
  const cliPath = path.join(process.cwd(), "src", "cli.ts");

  if (!fs.existsSync(tsxPath)) {
    throw new Error(`tsx binary not found at ${tsxPath}`);
  }

  const isolatedConfigHome =
    options?.env?.XDG_CONFIG_HOME ?? fs.mkdtempSync(path.join(os.tmpdir(), "bb-cli-test-"));
  const result = spawnSync(tsxPath, [cliPath, ...args], {
    encoding: "utf8",
    cwd: options?.cwd ?? process.cwd(),
    env: {
      ...process.env,
      NODE_NO_WARNINGS: "1",
      BB_CONFIG_PATH: "",
      BB_PROFILE: "",
      BB_TIMEOUT: "",
      BITBUCKET_TOKEN: "",
      BITBUCKET_USERNAME: "",
      XDG_CONFIG_HOME: isolatedConfigHome,
      ...options?.env,
    },
    ...(options?.input !== undefined ? { input: options.input } : {}),
  });

  return {
    status: result.status ?? -1,
    stdout: result.stdout ?? "",
    stderr: result.stderr ?? "",
    error: result.error,
  };
}

function freshHome(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), "bb-cli-home-"));
}

// A directory outside any git checkout, so origin inference finds nothing.
function outsideGit(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), "bb-cli-cwd-"));
}

describe("cli error handling", () => {
  it("returns JSON error envelope with E_USAGE for conflicting output flags", () => {
    const result = runCli(["--json", "--plain", "config", "path"]);
    expect(result.error).toBeUndefined();
    expect(result.status).toBe(2);
    const payload = JSON.parse(result.stdout.trim());
    expect(payload.schema).toBe("bb.error.v1");
    expect(payload.status).toBe("error");
    expect(payload.errors?.[0]?.code).toBe("E_USAGE");
  });

  it("renders help command cleanly even when --json and --plain are both provided", () => {
    const result = runCli(["--json", "--plain", "help"]);
    expect(result.error).toBeUndefined();
    expect(result.status).toBe(0);
    expect(result.stdout).toContain("bb [global flags] <command> <subcommand> [flags]");
    expect(result.stdout).not.toContain("\"bb.error.v1\"");
  });

  it("returns startup E_VALIDATION when BB_TIMEOUT is invalid", () => {
    const result = runCli(["--json", "config", "path"], { env: { BB_TIMEOUT: "soon" } });
    expect(result.status).toBe(2);
    const payload = JSON.parse(result.stdout.trim());
    expect(payload.schema).toBe("bb.error.v1");
    expect(payload.errors?.[0]?.code).toBe("E_VALIDATION");
    expect(payload.summary).toBe("BB_TIMEOUT must be a finite number.");
  });

  it("returns E_VALIDATION for fractional timeout values", () => {
    const result = runCli(["--json", "--timeout", "1.5", "config", "path"]);
    expect(result.status).toBe(2);
    const payload = JSON.parse(result.stdout.trim());
    expect(payload.errors?.[0]?.code).toBe("E_VALIDATION");
    expect(payload.summary).toBe("timeout must be an integer.");
  });

  it("returns E_IO when a successful command cannot write to -o path", () => {
    const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "bb-cli-"));
    const result = runCli(["--json", "-o", tmpDir, "config", "path"]);
    expect(result.status).toBe(1);
    const payload = JSON.parse(result.stdout.trim());
    expect(payload.schema).toBe("bb.error.v1");
    expect(payload.errors?.[0]?.code).toBe("E_IO");
  });

  it("carries the request id into error envelopes", () => {
    const result = runCli(["--json", "--request-id", "req-42", "auth", "status"]);
    expect(result.status).toBe(3);
    const payload = JSON.parse(result.stdout.trim());
    expect(payload.meta?.request_id).toBe("req-42");
    expect(payload.errors?.[0]).toEqual({ message: "not logged in: run `bb auth login`", code: "E_AUTH" });
  });

  it("rejects unknown commands as usage errors", () => {
    const result = runCli(["--json", "frobnicate"]);
    expect(result.status).toBe(2);
    const payload = JSON.parse(result.stdout.trim());
    expect(payload.errors?.[0]?.code).toBe("E_USAGE");
  });
});

describe("cli auth", () => {
  it("reports missing login with exit code 3", () => {
    const result = runCli(["auth", "status"]);
    expect(result.status).toBe(3);
    expect(result.stdout).toBe("");
    expect(result.stderr.trim()).toBe("not logged in: run `bb auth login`");
  });

  it("logs in from BITBUCKET_TOKEN with bearer auth", () => {
    const home = freshHome();
    const result = runCli(["auth", "login"], { env: { XDG_CONFIG_HOME: home, BITBUCKET_TOKEN: "test-secret" } });

    expect(result.status).toBe(0);
    expect(result.stdout).toBe('authenticated profile "default"\nauth mode: bearer token\n');

    const file = path.join(home, "bb", "config.json");
    expect(fs.statSync(file).mode & 0o777).toBe(0o600);
    expect(JSON.parse(fs.readFileSync(file, "utf8"))).toEqual({
      current: "default",
      profiles: { default: { base_url: "https://api.bitbucket.org/2.0", token: "test-secret" } }
    });
  });

  it("logs in with a username as basic auth", () => {
    const result = runCli([
      "auth",
      "login",
      "--profile-name",
      "work",
      "--username",
      "me@example.com",
      "--token",
      "test-secret"
    ]);
    expect(result.status).toBe(0);
    expect(result.stdout).toBe('authenticated profile "work"\nauth mode: basic (me@example.com)\n');
  });

  it("reads the token from stdin with --with-token", () => {
    const home = freshHome();
    const result = runCli(["auth", "login", "--with-token"], {
      env: { XDG_CONFIG_HOME: home },
      input: "test-secret\n"
    });
    expect(result.status).toBe(0);
    const stored = JSON.parse(fs.readFileSync(path.join(home, "bb", "config.json"), "utf8"));
    expect(stored.profiles.default.token).toBe("test-secret");
  });

  it("requires a token", () => {
    const result = runCli(["--json", "auth", "login"]);
    expect(result.status).toBe(2);
    const payload = JSON.parse(result.stdout.trim());
    expect(payload.errors?.[0]).toEqual({
      message: "token is required: use --token <value>, --with-token, or BITBUCKET_TOKEN",
      code: "E_USAGE"
    });
  });

  it("rejects more than one token source", () => {
    const result = runCli(["--json", "auth", "login", "--token", "test-secret", "--token-env", "OTHER"]);
    expect(result.status).toBe(2);
    const payload = JSON.parse(result.stdout.trim());
    expect(payload.summary).toBe(
      "Provide only one token source: --token, --token-file, --token-stdin, or --token-env."
    );
  });

  it("rejects a non-http base URL", () => {
    const result = runCli(["--json", "auth", "login", "--token", "test-secret", "--base-url", "ftp://example.test"]);
    expect(result.status).toBe(2);
    const payload = JSON.parse(result.stdout.trim());
    expect(payload.errors?.[0]?.code).toBe("E_VALIDATION");
  });

  it("shows status for the active profile", () => {
    const home = freshHome();
    runCli(["auth", "login", "--token", "test-secret"], { env: { XDG_CONFIG_HOME: home } });

    const result = runCli(["auth", "status"], { env: { XDG_CONFIG_HOME: home } });

    expect(result.status).toBe(0);
    expect(result.stdout).toBe(
      "Profile: default\nBase URL: https://api.bitbucket.org/2.0\nAuth: bearer token\nToken: configured\n"
    );
  });

  it("returns a status envelope in JSON mode", () => {
    const home = freshHome();
    runCli(["auth", "login", "--username", "me", "--token", "test-secret"], { env: { XDG_CONFIG_HOME: home } });

    const result = runCli(["--json", "auth", "status"], { env: { XDG_CONFIG_HOME: home } });

    const payload = JSON.parse(result.stdout.trim());
    expect(payload.schema).toBe("bb.auth.status.v1");
    expect(payload.data).toEqual({
      profile: "default",
      baseUrl: "https://api.bitbucket.org/2.0",
      authMode: "basic",
      username: "me",
      tokenConfigured: true
    });
    expect(result.stdout).not.toContain("test-secret");
  });

  it("fails for an unknown --profile", () => {
    const home = freshHome();
    runCli(["auth", "login", "--token", "test-secret"], { env: { XDG_CONFIG_HOME: home } });

    const result = runCli(["--profile", "nope", "auth", "status"], { env: { XDG_CONFIG_HOME: home } });

    expect(result.status).toBe(3);
    expect(result.stderr.trim()).toBe('profile "nope" not found');
  });

  it("logs out and falls back to the remaining profile", () => {
    const home = freshHome();
    runCli(["auth", "login", "--profile-name", "a", "--token", "test-secret"], { env: { XDG_CONFIG_HOME: home } });
    runCli(["auth", "login", "--profile-name", "b", "--token", "test-secret"], { env: { XDG_CONFIG_HOME: home } });

    const first = runCli(["auth", "logout"], { env: { XDG_CONFIG_HOME: home } });
    expect(first.status).toBe(0);
    expect(first.stdout).toBe('logged out profile "b"\nactive profile: "a"\n');

    const second = runCli(["auth", "logout"], { env: { XDG_CONFIG_HOME: home } });
    expect(second.stdout).toBe('logged out profile "a"\n');

    const third = runCli(["auth", "logout"], { env: { XDG_CONFIG_HOME: home } });
    expect(third.status).toBe(3);
    expect(third.stderr.trim()).toBe("not logged in: run `bb auth login`");
  });
});

describe("cli commands", () => {
  it("prints the config path", () => {
    const home = freshHome();
    const result = runCli(["config", "path"], { env: { XDG_CONFIG_HOME: home } });
    expect(result.status).toBe(0);
    expect(result.stdout).toBe(`${path.join(home, "bb", "config.json")}\n`);
  });

  it("honours BB_CONFIG_PATH for the config path", () => {
    const explicit = path.join(freshHome(), "custom.json");
    const result = runCli(["--json", "config", "path"], { env: { BB_CONFIG_PATH: explicit } });
    const payload = JSON.parse(result.stdout.trim());
    expect(payload.schema).toBe("bb.config.path.v1");
    expect(payload.data).toEqual({ path: explicit });
  });

  it("prints the version", () => {
    const result = runCli(["version"]);
    expect(result.status).toBe(0);
    expect(result.stdout).toBe("bb version 0.1.0\n");
  });

  it("previews an api request without sending it", () => {
    const home = freshHome();
    runCli(["auth", "login", "--token", "test-secret"], { env: { XDG_CONFIG_HOME: home } });

    const result = runCli(
      ["--json", "api", "/repositories/acme", "--q", "is_private=true", "--print-request"],
      { env: { XDG_CONFIG_HOME: home } }
    );

    expect(result.status).toBe(0);
    const payload = JSON.parse(result.stdout.trim());
    expect(payload.schema).toBe("bb.request.preview.v1");
    expect(payload.data).toEqual({
      method: "GET",
      url: "https://api.bitbucket.org/2.0/repositories/acme?q=is_private%3Dtrue",
      headers: {
        accept: "application/json",
        "user-agent": "bb-cli/0.1.0",
        authorization: "<redacted>"
      }
    });
  });

  it("includes the body file in a request preview", () => {
    const home = freshHome();
    runCli(["auth", "login", "--token", "test-secret"], { env: { XDG_CONFIG_HOME: home } });
    const bodyFile = path.join(home, "body.json");
    fs.writeFileSync(bodyFile, '{"title":"x"}', "utf8");

    const result = runCli(
      ["--json", "api", "repositories/acme/widgets/issues", "--method", "post", "--body-file", bodyFile, "--print-request"],
      { env: { XDG_CONFIG_HOME: home } }
    );

    const payload = JSON.parse(result.stdout.trim());
    expect(payload.data.method).toBe("POST");
    expect(payload.data.headers["content-type"]).toBe("application/json");
    expect(payload.data.body).toBe('{"title":"x"}');
  });

  it("requires login before calling the api", () => {
    const result = runCli(["--json", "api", "/user"]);
    expect(result.status).toBe(3);
    const payload = JSON.parse(result.stdout.trim());
    expect(payload.errors?.[0]?.code).toBe("E_AUTH");
  });

  it("asks for --workspace when it cannot be inferred", () => {
    const result = runCli(["repo", "list"], { cwd: outsideGit() });
    expect(result.status).toBe(2);
    expect(result.stderr.trim()).toBe("--workspace is required");
  });

  it("validates pull request flags before any request", () => {
    const result = runCli(["pr", "create", "--workspace", "acme", "--repo", "widgets", "--source", "feature"]);
    expect(result.status).toBe(2);
    expect(result.stderr.trim()).toBe("--title is required");
  });

  it("requires a branch to run a pipeline", () => {
    const result = runCli(["pipeline", "run", "--workspace", "acme", "--repo", "widgets"]);
    expect(result.status).toBe(2);
    expect(result.stderr.trim()).toBe("--branch is required");
  });

  it("refuses an issue update without fields", () => {
    const result = runCli(["issue", "update", "--workspace", "acme", "--repo", "widgets", "--id", "3"]);
    expect(result.status).toBe(2);
    expect(result.stderr.trim()).toBe("at least one field to update is required");
  });

  it("rejects wiki pages outside the wiki root", () => {
    const result = runCli(["wiki", "put", "--workspace", "acme", "--repo", "widgets", "--page", "../x", "--content", "hi"]);
    expect(result.status).toBe(2);
    expect(result.stderr.trim()).toBe("invalid --page value");
  });

  it("requires content for wiki put", () => {
    const result = runCli(["wiki", "put", "--workspace", "acme", "--repo", "widgets", "--page", "Home.md"]);
    expect(result.status).toBe(2);
    expect(result.stderr.trim()).toBe("either --content or --file is required");
  });

  it("rejects an unsupported list format", () => {
    const result = runCli(["--json", "issue", "list", "--workspace", "acme", "--repo", "widgets", "--format", "csv"]);
    expect(result.status).toBe(2);
    const payload = JSON.parse(result.stdout.trim());
    expect(payload.errors?.[0]?.code).toBe("E_USAGE");
  });
});
