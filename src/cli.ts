#!/usr/bin/env node
import yargs from "yargs";
import type { Argv, Arguments } from "yargs";
import { hideBin } from "yargs/helpers";
import {
  createLogger,
  envelope,
  formatPlain,
  resolveCliVersion,
  resolveOutputMode,
  writeOutput
} from "./output.js";
import type { Logger } from "./output.js";
import type { CliGlobals, EnvelopeStatus, LogLevel } from "./types.js";
import { readFile, readStdinLine, promptSecret } from "./io.js";
import { ApiClient, isClientError } from "./client.js";
import type { ClientError } from "./client.js";
import { createDeadline, MAX_TIMER_MS } from "./http.js";
import {
  activeProfile,
  getConfigPath,
  loadConfig,
  ProfileError,
  removeProfile,
  saveConfig,
  setProfile
} from "./config.js";
import type { ConfigFile, Profile } from "./config.js";
import { runGitCommand, GitCommandError } from "./git.js";
import { resolveRepoTarget, RepoTargetError } from "./remote.js";
import type { RepoTarget } from "./remote.js";
import {
  buildWikiRemoteUrl,
  normalizeWikiPagePath,
  redactToken,
  WikiError,
  withWikiCheckout
} from "./wiki.js";
import {
  compactQuery,
  createIssue,
  createPullRequest,
  issueBody,
  issueTable,
  listIssues,
  listPipelines,
  listPullRequests,
  listRepositories,
  pipelineStateLabel,
  pipelineTable,
  pullRequestTable,
  repositoryTable,
  RowDecodeError,
  runPipeline,
  updateIssue,
  wikiTable
} from "./bitbucket.js";
import type { IssueFields, IssueRow, PullRequestRow } from "./bitbucket.js";

const NOT_LOGGED_IN = "not logged in: run `bb auth login`";

class CliError extends Error {
  exitCode: number;
  code: string;

  constructor(message: string, exitCode = 1, code = "E_INTERNAL") {
    super(message);
    this.exitCode = exitCode;
    this.code = code;
  }
}

type RequestPreview = {
  method: string;
  url: string;
  headers: Record<string, string>;
  body?: string;
};

type RepoArgs = CliGlobals & { workspace?: string; repo?: string };

type ListArgs = RepoArgs & {
  all: boolean;
  format: "table" | "json";
  q?: string;
  sort?: string;
  fields?: string;
};

type ShowArgs = RepoArgs & { format: "text" | "json" };

type CommandContext = {
  logger: Logger;
  client: ApiClient;
  profile: Profile;
  signal: AbortSignal | undefined;
};

// Secret of the profile in use, scrubbed from every error message.
let activeToken = "";

function resolveLogLevel(args: CliGlobals): LogLevel {
  if (args.debug) return "debug";
  if (args.verbose) return "verbose";
  if (args.quiet) return "quiet";
  return "info";
}

function resolveOutput(args: CliGlobals): { mode: "plain" | "json" } {
  return { mode: resolveOutputMode(args.json, args.plain) };
}

function readFileOrThrow(filePath: string, purpose: string): string {
  try {
    return readFile(filePath);
  } catch (error) {
    throw new CliError(`Failed to read ${purpose} file "${filePath}": ${errorDetail(error)}`, 1, "E_IO");
  }
}

function errorDetail(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function runIoOrThrow(action: () => void, context: string): void {
  try {
    action();
  } catch (error) {
    throw new CliError(`Failed to ${context}: ${errorDetail(error)}`, 1, "E_IO");
  }
}

function redactSecrets(message: string): string {
  if (activeToken.trim() === "") {
    return message;
  }
  // Tokens embedded in a git remote URL appear percent-encoded.
  return redactToken(redactToken(message, activeToken), encodeURIComponent(activeToken.trim()));
}

const CLIENT_ERROR_CODES: Record<ClientError["kind"], string> = {
  transport: "E_NETWORK",
  api: "E_API",
  decode: "E_DECODE"
};

function toCliError(error: unknown): CliError {
  if (error instanceof CliError) {
    return error;
  }
  if (isClientError(error)) {
    return new CliError(error.message, 1, CLIENT_ERROR_CODES[error.kind]);
  }
  if (error instanceof RowDecodeError) {
    return new CliError(error.message, 1, "E_DECODE");
  }
  if (error instanceof ProfileError) {
    return new CliError(error.message, 3, "E_AUTH");
  }
  if (error instanceof RepoTargetError) {
    return new CliError(error.message, 2, "E_USAGE");
  }
  if (error instanceof GitCommandError) {
    return new CliError(error.message, 1, "E_GIT");
  }
  if (error instanceof WikiError) {
    return new CliError(error.message, 1, "E_IO");
  }
  return new CliError(error instanceof Error ? error.message : "Unexpected error", 1, "E_INTERNAL");
}

function loadConfigOrThrow(): ConfigFile {
  try {
    return loadConfig();
  } catch (error) {
    throw new CliError(`load config: ${errorDetail(error)}`, 1, "E_IO");
  }
}

function requireProfile(args: CliGlobals): { name: string; profile: Profile } {
  const config = loadConfigOrThrow();
  const override = args.profile?.trim() ?? "";
  if (override === "" && config.current === "") {
    throw new CliError(NOT_LOGGED_IN, 3, "E_AUTH");
  }
  const resolved = activeProfile(config, override);
  if (resolved.profile.token.trim() === "") {
    throw new CliError("profile has no token configured", 3, "E_AUTH");
  }
  activeToken = resolved.profile.token;
  return resolved;
}

function createClient(profile: Profile, logger: Logger): ApiClient {
  return new ApiClient({
    baseUrl: profile.baseUrl,
    token: profile.token,
    ...(profile.username ? { username: profile.username } : {}),
    userAgent: `bb-cli/${resolveCliVersion()}`,
    logger
  });
}

/** Runs `action` against the active profile under one invocation deadline. */
async function withApi<T>(args: CliGlobals, action: (context: CommandContext) => Promise<T>): Promise<T> {
  const logger = createLogger(resolveLogLevel(args));
  const { profile } = requireProfile(args);
  const client = createClient(profile, logger);
  const deadline = createDeadline(args.timeout);
  try {
    return await action({ logger, client, profile, signal: deadline.signal });
  } finally {
    deadline.dispose();
  }
}

function resolveTarget(args: RepoArgs, requireRepo: boolean): Promise<RepoTarget> {
  const logger = createLogger(resolveLogLevel(args));
  return resolveRepoTarget({ workspace: args.workspace, repo: args.repo }, requireRepo, runGitCommand, logger);
}

function requireFlag(name: string, value: string | undefined): string {
  const trimmed = value?.trim() ?? "";
  if (trimmed === "") {
    throw new CliError(`--${name} is required`, 2, "E_USAGE");
  }
  return trimmed;
}

function normalizePageOrThrow(page: string | undefined): string {
  try {
    return normalizeWikiPagePath(page ?? "");
  } catch (error) {
    throw new CliError(errorDetail(error), 2, "E_USAGE");
  }
}

function loadEnvOverrides(): Partial<CliGlobals> {
  const overrides: Partial<CliGlobals> = {};
  const env = process.env;
  const profile = env.BB_PROFILE?.trim();
  const timeout = env.BB_TIMEOUT?.trim();

  if (profile && profile.length > 0) overrides.profile = profile;
  if (timeout && timeout.length > 0) {
    const value = Number(timeout);
    assertNumber("BB_TIMEOUT", value, { min: 0, max: MAX_TIMER_MS, integer: true });
    overrides.timeout = value;
  }
  return overrides;
}

function redactHeaders(headers: Record<string, string>): Record<string, string> {
  const redacted: Record<string, string> = { ...headers };
  for (const key of Object.keys(redacted)) {
    const lower = key.toLowerCase();
    if (lower === "authorization" || lower === "cookie") {
      redacted[key] = "<redacted>";
    }
  }
  return redacted;
}

function readNonFlagValue(argv: string[], index: number): string | undefined {
  const candidate = argv[index + 1];
  if (!candidate || candidate.startsWith("-")) {
    return undefined;
  }
  return candidate;
}

function parseRequestIdFromArgv(argv: string[]): string | undefined {
  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    if (!arg) continue;
    if (arg === "--request-id") {
      const value = readNonFlagValue(argv, i);
      if (value) {
        return value;
      }
      continue;
    }
    if (arg.startsWith("--request-id=")) {
      const value = arg.split("=", 2)[1];
      if (value) return value;
    }
  }
  return undefined;
}

function resolveErrorContext(): { mode: "plain" | "json"; output?: string; requestId?: string } {
  const fallback = parseOutputArgsFromArgv(hideBin(process.argv));
  const requestId = lastKnownArgs.requestId ?? parseRequestIdFromArgv(hideBin(process.argv));
  const json = Boolean(lastKnownArgs.json ?? fallback.json);
  const output = lastKnownArgs.output ?? fallback.output;
  const context: { mode: "plain" | "json"; output?: string; requestId?: string } = json
    ? { mode: "json" }
    : { mode: "plain" };
  if (json && output) {
    context.output = output;
  }
  if (requestId) {
    context.requestId = requestId;
  }
  return context;
}

function assertNumber(
  name: string,
  value: number,
  options: { min?: number; max?: number; integer?: boolean }
): void {
  if (!Number.isFinite(value)) {
    throw new CliError(`${name} must be a finite number.`, 2, "E_VALIDATION");
  }
  if (options.integer && !Number.isInteger(value)) {
    throw new CliError(`${name} must be an integer.`, 2, "E_VALIDATION");
  }
  if (options.min !== undefined && value < options.min) {
    throw new CliError(`${name} must be >= ${options.min}.`, 2, "E_VALIDATION");
  }
  if (options.max !== undefined && value > options.max) {
    throw new CliError(`${name} must be <= ${options.max}.`, 2, "E_VALIDATION");
  }
}

function assertHttpUrl(name: string, value: string): void {
  try {
    const parsed = new URL(value);
    if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
      throw new Error("Unsupported protocol");
    }
  } catch (_error) {
    throw new CliError(`${name} must be a valid http(s) URL.`, 2, "E_VALIDATION");
  }
}

function assertHttpMethod(method: string): string {
  const normalized = method.trim().toUpperCase();
  if (!/^[!#$%&'*+.^_`|~0-9A-Z-]+$/.test(normalized)) {
    throw new CliError(`Invalid HTTP method "${method}".`, 2, "E_USAGE");
  }
  return normalized;
}

function resolveEnvVarName(optionFlag: string, providedName: string | undefined, fallbackName: string): {
  name: string;
  explicit: boolean;
} {
  if (typeof providedName === "undefined") {
    return { name: fallbackName, explicit: false };
  }
  const normalized = providedName.trim();
  if (normalized.length === 0) {
    throw new CliError(`${optionFlag} requires a non-empty environment variable name.`, 2, "E_USAGE");
  }
  if (!/^[A-Za-z_][A-Za-z0-9_]*$/.test(normalized)) {
    throw new CliError(`${optionFlag} must be a valid environment variable name.`, 2, "E_USAGE");
  }
  return { name: normalized, explicit: true };
}

function outputResult<T>(
  args: CliGlobals,
  schema: string,
  summary: string,
  data: T,
  render: () => string = () => formatPlain(data),
  status: EnvelopeStatus = "success"
): void {
  const mode = resolveOutput(args).mode;
  if (mode === "json") {
    const payload = envelope(schema, summary, status, data, [], args.requestId);
    writeOutputOrThrow(`${JSON.stringify(payload)}\n`, args.output);
  } else {
    writeOutputOrThrow(render(), args.output);
  }
}

function outputList(
  args: ListArgs,
  schema: string,
  noun: string,
  values: unknown[],
  table: (values: unknown[]) => string
): void {
  outputResult(args, schema, `${values.length} ${noun}`, values, () =>
    args.format === "json" ? formatPlain(values) : table(values)
  );
}

function describeCreated(verb: string, noun: string, row: PullRequestRow | IssueRow): string {
  const lines = [`${verb} ${noun} #${row.id} (${row.state}): ${row.title}`];
  if (row.links.html.href !== "") {
    lines.push(`URL: ${row.links.html.href}`);
  }
  return `${lines.join("\n")}\n`;
}

function authModeLabel(profile: Profile): string {
  return profile.username ? `basic (${profile.username})` : "bearer token";
}

async function resolveTokenInput(
  sources: { token?: string; tokenFile?: string; tokenStdin: boolean; tokenEnv?: string },
  noInput: boolean
): Promise<string> {
  const configuredSources = [
    typeof sources.token !== "undefined",
    typeof sources.tokenFile !== "undefined",
    sources.tokenStdin,
    typeof sources.tokenEnv !== "undefined"
  ].filter(Boolean).length;
  if (configuredSources > 1) {
    throw new CliError(
      "Provide only one token source: --token, --token-file, --token-stdin, or --token-env.",
      2,
      "E_USAGE"
    );
  }
  if (typeof sources.token !== "undefined") {
    const token = sources.token.trim();
    if (token.length === 0) {
      throw new CliError("--token requires a non-empty value.", 2, "E_USAGE");
    }
    return token;
  }
  if (typeof sources.tokenFile !== "undefined") {
    const tokenPath = sources.tokenFile;
    if (tokenPath.trim().length === 0) {
      throw new CliError("--token-file requires a non-empty file path.", 2, "E_USAGE");
    }
    const tokenFromFile = readFileOrThrow(tokenPath, "token").trim();
    if (tokenFromFile.length === 0) {
      throw new CliError("Token input required. Provided --token-file was empty.", 2, "E_USAGE");
    }
    return tokenFromFile;
  }
  if (sources.tokenStdin) {
    const tokenFromStdin = await readStdinLine();
    if (tokenFromStdin.length === 0) {
      throw new CliError("no token provided on stdin", 2, "E_USAGE");
    }
    return tokenFromStdin;
  }
  const { name: envName, explicit: explicitTokenEnv } = resolveEnvVarName(
    "--token-env",
    sources.tokenEnv,
    "BITBUCKET_TOKEN"
  );
  const envToken = process.env[envName];
  if (envToken && envToken.trim().length > 0) return envToken.trim();
  if (explicitTokenEnv) {
    throw new CliError(
      `Token input required. Environment variable ${envName} is not set or empty.`,
      2,
      "E_USAGE"
    );
  }
  const missing = "token is required: use --token <value>, --with-token, or BITBUCKET_TOKEN";
  if (process.stdin.isTTY && !noInput) {
    const promptedToken = await promptSecret("Bitbucket API token: ");
    if (promptedToken.length > 0) {
      return promptedToken;
    }
  }
  throw new CliError(missing, 2, "E_USAGE");
}

function withRepoFlags(y: Argv): Argv {
  return y
    .option("workspace", { type: "string", describe: "Workspace slug (default: from origin remote)" })
    .option("repo", { type: "string", describe: "Repository slug (default: from origin remote)" });
}

function withListFlags(y: Argv, filters: Array<"q" | "sort" | "fields">): Argv {
  let next = y
    .option("all", { type: "boolean", default: false, describe: "Follow pagination and fetch every page" })
    .option("format", { choices: ["table", "json"], default: "table", describe: "Output format" });
  if (filters.includes("q")) next = next.option("q", { type: "string", describe: "Bitbucket query filter" });
  if (filters.includes("sort")) next = next.option("sort", { type: "string", describe: "Sort expression" });
  if (filters.includes("fields")) next = next.option("fields", { type: "string", describe: "Partial response fields" });
  return next;
}

function withShowFormat(y: Argv): Argv {
  return y.option("format", { choices: ["text", "json"], default: "text", describe: "Output format" });
}

function withIssueFields(y: Argv): Argv {
  return y
    .option("title", { type: "string", describe: "Issue title" })
    .option("content", { type: "string", describe: "Issue content (raw text)" })
    .option("state", { type: "string", describe: "Issue state" })
    .option("kind", { type: "string", describe: "Issue kind (bug|enhancement|proposal|task)" })
    .option("priority", { type: "string", describe: "Issue priority (trivial|minor|major|critical|blocker)" });
}

let envOverrides: Partial<CliGlobals> = {};
let envLoadError: CliError | null = null;
try {
  envOverrides = loadEnvOverrides();
} catch (error) {
  envLoadError =
    error instanceof CliError
      ? error
      : new CliError("Invalid environment configuration. Fix and retry.", 2, "E_VALIDATION");
}
const cli = yargs(hideBin(process.argv));

let lastKnownArgs: Partial<CliGlobals> = {};

function parseOutputArgsFromArgv(argv: string[]): { json: boolean; plain: boolean; output?: string } {
  const result: { json: boolean; plain: boolean; output?: string } = { json: false, plain: false };
  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    if (!arg) continue;
    if (arg === "--json") {
      result.json = true;
    } else if (arg === "--plain") {
      result.plain = true;
    } else if (arg === "--output" || arg === "-o") {
      const value = readNonFlagValue(argv, i);
      if (value) {
        result.output = value;
        i += 1;
      }
    } else if (arg.startsWith("-o=")) {
      const value = arg.slice(3);
      if (value) {
        result.output = value;
      }
    } else if (arg.startsWith("-o") && arg.length > 2) {
      result.output = arg.slice(2);
    } else if (arg.startsWith("--output=")) {
      const value = arg.split("=", 2)[1];
      if (value) {
        result.output = value;
      }
    }
  }
  return result;
}

function isHelpLikeInvocation(argv: string[]): boolean {
  if (argv.includes("--help") || argv.includes("-h") || argv.includes("--version")) {
    return true;
  }
  const optionsWithValue = new Set<string>(["--output", "-o", "--request-id", "--profile", "--timeout"]);
  const booleanOptions = new Set<string>([
    "--json",
    "--plain",
    "--quiet",
    "-v",
    "--verbose",
    "--debug",
    "--input",
    "--no-input"
  ]);
  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    if (!arg) continue;
    if (optionsWithValue.has(arg)) {
      i += 1;
      continue;
    }
    if (arg.startsWith("-")) {
      const eqIndex = arg.indexOf("=");
      const flag = eqIndex >= 0 ? arg.slice(0, eqIndex) : arg;
      if (optionsWithValue.has(flag) || booleanOptions.has(flag) || (arg.startsWith("-o") && arg.length > 2)) {
        continue;
      }
      return false;
    }
    return arg === "help";
  }
  return false;
}

function writeErrorEnvelope(error: CliError, output: string | undefined, requestId: string | undefined): void {
  const payload = envelope("bb.error.v1", error.message, "error", null, [{ message: error.message, code: error.code }], requestId);
  try {
    writeOutput(`${JSON.stringify(payload)}\n`, output);
  } catch (_outputError) {
    process.stdout.write(`${JSON.stringify(payload)}\n`);
  }
}

function exitWithStartupError(error: CliError): never {
  const argv = hideBin(process.argv);
  const outputArgs = parseOutputArgsFromArgv(argv);
  if (outputArgs.json) {
    writeErrorEnvelope(error, outputArgs.output, parseRequestIdFromArgv(argv));
    process.exit(error.exitCode);
  }
  process.stderr.write(`${error.message}\n`);
  process.exit(error.exitCode);
}

function writeOutputOrThrow(content: string, output?: string): void {
  try {
    writeOutput(content, output);
  } catch (error) {
    emitUnhandledCliError(new CliError(`Failed to write output: ${errorDetail(error)}`, 1, "E_IO"));
  }
}

function emitUnhandledCliError(error: unknown): never {
  const mapped = toCliError(error);
  const resolved = new CliError(redactSecrets(mapped.message), mapped.exitCode, mapped.code);
  const { mode, output, requestId } = resolveErrorContext();
  if (mode === "json") {
    writeErrorEnvelope(resolved, output, requestId);
    process.exit(resolved.exitCode);
  }
  process.stderr.write(`${resolved.message}\n`);
  process.exit(resolved.exitCode);
}

const startupArgv = hideBin(process.argv);
const isHelpLike = isHelpLikeInvocation(startupArgv);

if (envLoadError && !isHelpLike) {
  exitWithStartupError(envLoadError);
}

cli
  .scriptName("bb")
  .usage("bb [global flags] <command> <subcommand> [flags]")
  .example("bb auth login --username me@example.com --with-token < token.txt", "")
  .example("bb pr list --workspace acme --repo widgets --state open", "")
  .example("bb api /repositories/acme --paginate --q 'is_private=true'", "")
  .example("bb wiki put --page Home.md --file ./Home.md", "")
  .config(envOverrides)
  .middleware((args: Arguments) => {
    lastKnownArgs = args as unknown as CliGlobals;
    if (args.help || isHelpLike) return;
    if (args.json && args.plain) {
      throw new CliError("--json and --plain cannot be used together", 2, "E_USAGE");
    }
  })
  .option("json", { type: "boolean", default: false, describe: "Output machine-readable JSON envelopes" })
  .option("plain", { type: "boolean", default: false, describe: "Output stable plain text" })
  .option("output", { type: "string", alias: "o", describe: "Write output to file (use - for stdout)" })
  // -q is left free for the --q query filter.
  .option("quiet", { type: "boolean", default: false, describe: "Only print errors" })
  .option("verbose", { type: "boolean", default: false, alias: "v" })
  .option("debug", { type: "boolean", default: false, describe: "Log every HTTP exchange to stderr" })
  .option("input", { type: "boolean", default: true, describe: "Enable prompts (use --no-input to disable)" })
  .option("request-id", { type: "string", describe: "Attach a request id to JSON output" })
  .option("profile", { type: "string", describe: "Profile to use instead of the active one (env BB_PROFILE)" })
  .option("timeout", { type: "number", default: 0, describe: "Deadline for the whole command in ms, 0 for none (env BB_TIMEOUT)" })
  .check((args) => {
    const globals = args as unknown as CliGlobals;
    assertNumber("timeout", globals.timeout, { min: 0, max: MAX_TIMER_MS, integer: true });
    return true;
  })
  .command(
    "help [command]",
    "Show help",
    (y: Argv) =>
      y
        .strict(false)
        .positional("command", {
          type: "string",
          describe: "Command to show help for (use <cmd> --help for details)"
        }),
    (args: Arguments) => {
      const globals = args as unknown as CliGlobals & { command?: string; _: unknown[] };
      const extraPieces = (Array.isArray(globals._) ? globals._.slice(1) : [])
        .map((value) => String(value).trim())
        .filter((value) => value.length > 0);
      const pieces = [
        ...(globals.command ? [globals.command.trim()] : []),
        ...extraPieces
      ].filter((value) => value.length > 0);
      if (pieces.length > 0) {
        setImmediate(() => {
          cli.parse([...pieces, "--help"]);
        });
        return;
      }
      cli.showHelp("log");
    }
  )
  .command(
    "version",
    "Show CLI version",
    () => {},
    (args: Arguments) => {
      const globals = args as unknown as CliGlobals;
      const version = resolveCliVersion();
      outputResult(globals, "bb.version.v1", `bb ${version}`, { version }, () => `bb version ${version}\n`);
    }
  )
  .command(
    "config <command>",
    "Inspect CLI configuration",
    (y: Argv) =>
      y
        .command(
          "path",
          "Show config file path",
          () => {},
          (args: Arguments) => {
            const globals = args as unknown as CliGlobals;
            const pathValue = getConfigPath();
            outputResult(globals, "bb.config.path.v1", "Config path", { path: pathValue }, () => `${pathValue}\n`);
          }
        )
        .demandCommand(1),
    () => {}
  )
  .command(
    "auth <command>",
    "Authenticate and inspect auth status",
    (y: Argv) =>
      y
        .command(
          "login",
          "Store an API token in a profile",
          (yy: Argv) =>
            yy
              .option("profile-name", { type: "string", describe: "Profile to store (default: --profile or \"default\")" })
              .option("token", { type: "string", describe: "API token value" })
              .option("token-file", { type: "string", describe: "Read token from file" })
              .option("token-stdin", {
                type: "boolean",
                default: false,
                alias: "with-token",
                describe: "Read token from stdin"
              })
              .option("token-env", { type: "string", describe: "Read token from env var (name)" })
              .option("username", { type: "string", describe: "Username or e-mail for Basic auth (env BITBUCKET_USERNAME)" })
              .option("base-url", { type: "string", describe: "Bitbucket API base URL" }),
          async (args: Arguments) => {
            const globals = args as unknown as CliGlobals & {
              profileName?: string;
              token?: string;
              tokenFile?: string;
              tokenStdin?: boolean;
              tokenEnv?: string;
              username?: string;
              baseUrl?: string;
            };
            if (typeof globals.baseUrl !== "undefined" && globals.baseUrl.trim() !== "") {
              assertHttpUrl("base-url", globals.baseUrl.trim());
            }
            const sources: { token?: string; tokenFile?: string; tokenStdin: boolean; tokenEnv?: string } = {
              tokenStdin: Boolean(globals.tokenStdin)
            };
            if (typeof globals.token !== "undefined") sources.token = globals.token;
            if (typeof globals.tokenFile !== "undefined") sources.tokenFile = globals.tokenFile;
            if (typeof globals.tokenEnv !== "undefined") sources.tokenEnv = globals.tokenEnv;
            const token = await resolveTokenInput(sources, !globals.input);
            activeToken = token;

            const username = globals.username?.trim() || process.env.BITBUCKET_USERNAME?.trim() || undefined;
            const config = loadConfigOrThrow();
            const name = setProfile(config, globals.profileName ?? globals.profile ?? "", {
              token,
              username,
              baseUrl: globals.baseUrl
            });
            runIoOrThrow(() => saveConfig(config), "save config");

            const lines = [
              `authenticated profile "${name}"`,
              `auth mode: ${username ? `basic (${username})` : "bearer token"}`
            ];
            outputResult(
              globals,
              "bb.auth.login.v1",
              `Authenticated profile ${name}`,
              { profile: name, authMode: username ? "basic" : "bearer", ...(username ? { username } : {}) },
              () => `${lines.join("\n")}\n`
            );
          }
        )
        .command(
          "status",
          "Show the active profile",
          () => {},
          (args: Arguments) => {
            const globals = args as unknown as CliGlobals;
            const config = loadConfigOrThrow();
            const override = globals.profile?.trim() ?? "";
            if (override === "" && config.current === "") {
              throw new CliError(NOT_LOGGED_IN, 3, "E_AUTH");
            }
            const { name, profile } = activeProfile(config, override);
            const tokenConfigured = profile.token.trim() !== "";
            const data = {
              profile: name,
              baseUrl: profile.baseUrl,
              authMode: profile.username ? "basic" : "bearer",
              ...(profile.username ? { username: profile.username } : {}),
              tokenConfigured
            };
            outputResult(
              globals,
              "bb.auth.status.v1",
              tokenConfigured ? `Profile ${name} is authenticated` : `Profile ${name} has no token`,
              data,
              () =>
                [
                  `Profile: ${name}`,
                  `Base URL: ${profile.baseUrl}`,
                  `Auth: ${authModeLabel(profile)}`,
                  `Token: ${tokenConfigured ? "configured" : "not configured"}`
                ].join("\n") + "\n",
              tokenConfigured ? "success" : "warn"
            );
          }
        )
        .command(
          "logout",
          "Remove a stored profile",
          () => {},
          (args: Arguments) => {
            const globals = args as unknown as CliGlobals;
            const config = loadConfigOrThrow();
            const { name, removed } = removeProfile(config, globals.profile ?? "");
            if (!removed) {
              throw new CliError(name === "" ? NOT_LOGGED_IN : `profile "${name}" not found`, 3, "E_AUTH");
            }
            runIoOrThrow(() => saveConfig(config), "save config");
            const lines = [`logged out profile "${name}"`];
            if (config.current !== "") {
              lines.push(`active profile: "${config.current}"`);
            }
            outputResult(
              globals,
              "bb.auth.logout.v1",
              `Logged out profile ${name}`,
              { profile: name, active: config.current === "" ? null : config.current },
              () => `${lines.join("\n")}\n`
            );
          }
        )
        .demandCommand(1),
    () => {}
  )
  .command(
    "api <endpoint>",
    "Call a Bitbucket Cloud REST endpoint",
    (y: Argv) =>
      y
        .positional("endpoint", { type: "string", describe: "Path relative to the base URL, or an absolute URL" })
        .option("method", { type: "string", default: "GET", describe: "HTTP method" })
        .option("paginate", { type: "boolean", default: false, describe: "Follow `next` links and print every value" })
        .option("q", { type: "string", describe: "Bitbucket query filter" })
        .option("sort", { type: "string", describe: "Sort expression" })
        .option("fields", { type: "string", describe: "Partial response fields" })
        .option("body-file", { type: "string", describe: "Read a JSON request body from file" })
        .option("print-request", { type: "boolean", default: false, describe: "Print the request and exit" }),
    async (args: Arguments) => {
      const globals = args as unknown as CliGlobals & {
        endpoint: string;
        method: string;
        paginate: boolean;
        q?: string;
        sort?: string;
        fields?: string;
        bodyFile?: string;
        printRequest: boolean;
      };
      const endpoint = globals.endpoint.trim();
      if (endpoint === "") {
        throw new CliError("usage: bb api [flags] <endpoint>", 2, "E_USAGE");
      }
      const method = assertHttpMethod(globals.method);
      let body: string | undefined;
      if (typeof globals.bodyFile !== "undefined") {
        if (globals.bodyFile.trim().length === 0) {
          throw new CliError("--body-file requires a non-empty file path.", 2, "E_USAGE");
        }
        body = readFileOrThrow(globals.bodyFile, "body");
      }
      const query = compactQuery({ q: globals.q, sort: globals.sort, fields: globals.fields });

      if (globals.printRequest) {
        const { profile } = requireProfile(globals);
        const client = createClient(profile, createLogger(resolveLogLevel(globals)));
        const preview: RequestPreview = {
          method: globals.paginate ? "GET" : method,
          url: client.buildUrl(endpoint, query),
          headers: redactHeaders(client.buildHeaders(body !== undefined)),
          ...(body !== undefined ? { body } : {})
        };
        outputResult(globals, "bb.request.preview.v1", "Request preview", preview);
        return;
      }

      const data = await withApi(globals, ({ client, signal }) =>
        globals.paginate
          ? client.getAllValues(endpoint, query, { signal })
          : client.doJSON(method, endpoint, { query, body, signal })
      );
      outputResult(globals, "bb.api.v1", `${method} ${endpoint}`, data);
    }
  )
  .command(
    "repo <command>",
    "Repository operations",
    (y: Argv) =>
      y
        .command(
          "list",
          "List repositories in a workspace",
          (yy: Argv) =>
            withListFlags(
              yy.option("workspace", { type: "string", describe: "Workspace slug (default: from origin remote)" }),
              ["q", "sort", "fields"]
            ),
          async (args: Arguments) => {
            const globals = args as unknown as ListArgs;
            const target = await resolveTarget(globals, false);
            const values = await withApi(globals, ({ client, signal }) =>
              listRepositories(client, target.workspace, {
                all: globals.all,
                query: { q: globals.q, sort: globals.sort, fields: globals.fields },
                signal
              })
            );
            outputList(globals, "bb.repo.list.v1", "repositories", values, repositoryTable);
          }
        )
        .demandCommand(1),
    () => {}
  )
  .command(
    "pr <command>",
    "Pull request operations",
    (y: Argv) =>
      y
        .command(
          "list",
          "List pull requests",
          (yy: Argv) =>
            withListFlags(withRepoFlags(yy), ["q", "sort", "fields"]).option("state", {
              type: "string",
              describe: "State filter (OPEN|MERGED|DECLINED|SUPERSEDED)"
            }),
          async (args: Arguments) => {
            const globals = args as unknown as ListArgs & { state?: string };
            const target = await resolveTarget(globals, true);
            const values = await withApi(globals, ({ client, signal }) =>
              listPullRequests(client, target, {
                all: globals.all,
                query: { state: globals.state, q: globals.q, sort: globals.sort, fields: globals.fields },
                signal
              })
            );
            outputList(globals, "bb.pr.list.v1", "pull requests", values, pullRequestTable);
          }
        )
        .command(
          "create",
          "Open a pull request",
          (yy: Argv) =>
            withShowFormat(withRepoFlags(yy))
              .option("title", { type: "string", describe: "Pull request title" })
              .option("source", { type: "string", describe: "Source branch" })
              .option("destination", { type: "string", describe: "Destination branch" })
              .option("description", { type: "string", describe: "Pull request description" }),
          async (args: Arguments) => {
            const globals = args as unknown as ShowArgs & {
              title?: string;
              source?: string;
              destination?: string;
              description?: string;
            };
            const title = requireFlag("title", globals.title);
            const source = requireFlag("source", globals.source);
            const destination = requireFlag("destination", globals.destination);
            const target = await resolveTarget(globals, true);
            const created = await withApi(globals, ({ client, signal }) =>
              createPullRequest(client, target, { title, source, destination, description: globals.description }, signal)
            );
            outputResult(globals, "bb.pr.create.v1", `Created PR #${created.id}`, created, () =>
              globals.format === "json" ? formatPlain(created) : describeCreated("Created", "PR", created)
            );
          }
        )
        .demandCommand(1),
    () => {}
  )
  .command(
    "pipeline <command>",
    "Pipeline operations",
    (y: Argv) =>
      y
        .command(
          "list",
          "List pipelines",
          (yy: Argv) => withListFlags(withRepoFlags(yy), ["sort", "fields"]),
          async (args: Arguments) => {
            const globals = args as unknown as ListArgs;
            const target = await resolveTarget(globals, true);
            const values = await withApi(globals, ({ client, signal }) =>
              listPipelines(client, target, {
                all: globals.all,
                query: { sort: globals.sort, fields: globals.fields },
                signal
              })
            );
            outputList(globals, "bb.pipeline.list.v1", "pipelines", values, pipelineTable);
          }
        )
        .command(
          "run",
          "Trigger a pipeline on a branch",
          (yy: Argv) =>
            withShowFormat(withRepoFlags(yy)).option("branch", { type: "string", describe: "Target branch" }),
          async (args: Arguments) => {
            const globals = args as unknown as ShowArgs & { branch?: string };
            const branch = requireFlag("branch", globals.branch);
            const target = await resolveTarget(globals, true);
            const triggered = await withApi(globals, ({ client, signal }) =>
              runPipeline(client, target, branch, signal)
            );
            outputResult(globals, "bb.pipeline.run.v1", `Triggered pipeline ${triggered.uuid}`, triggered, () => {
              if (globals.format === "json") return formatPlain(triggered);
              const lines = [`Triggered pipeline ${triggered.uuid}`, `State: ${pipelineStateLabel(triggered)}`];
              if (triggered.target.ref_name !== "") {
                lines.push(`Ref: ${triggered.target.ref_name}`);
              }
              return `${lines.join("\n")}\n`;
            });
          }
        )
        .demandCommand(1),
    () => {}
  )
  .command(
    "issue <command>",
    "Issue tracker operations",
    (y: Argv) =>
      y
        .command(
          "list",
          "List issues",
          (yy: Argv) => withListFlags(withRepoFlags(yy), ["q", "sort", "fields"]),
          async (args: Arguments) => {
            const globals = args as unknown as ListArgs;
            const target = await resolveTarget(globals, true);
            const values = await withApi(globals, ({ client, signal }) =>
              listIssues(client, target, {
                all: globals.all,
                query: { q: globals.q, sort: globals.sort, fields: globals.fields },
                signal
              })
            );
            outputList(globals, "bb.issue.list.v1", "issues", values, issueTable);
          }
        )
        .command(
          "create",
          "Create an issue",
          (yy: Argv) => withIssueFields(withShowFormat(withRepoFlags(yy))),
          async (args: Arguments) => {
            const globals = args as unknown as ShowArgs & IssueFields;
            const title = requireFlag("title", globals.title);
            const target = await resolveTarget(globals, true);
            const created = await withApi(globals, ({ client, signal }) =>
              createIssue(
                client,
                target,
                {
                  title,
                  content: globals.content,
                  state: globals.state,
                  kind: globals.kind,
                  priority: globals.priority
                },
                signal
              )
            );
            outputResult(globals, "bb.issue.create.v1", `Created issue #${created.id}`, created, () =>
              globals.format === "json" ? formatPlain(created) : describeCreated("Created", "issue", created)
            );
          }
        )
        .command(
          "update",
          "Update an issue",
          (yy: Argv) =>
            withIssueFields(withShowFormat(withRepoFlags(yy))).option("id", { type: "number", describe: "Issue id" }),
          async (args: Arguments) => {
            const globals = args as unknown as ShowArgs & IssueFields & { id?: number };
            if (typeof globals.id === "undefined" || !Number.isInteger(globals.id) || globals.id <= 0) {
              throw new CliError("--id is required", 2, "E_USAGE");
            }
            const id = globals.id;
            const fields: IssueFields = {
              title: globals.title,
              content: globals.content,
              state: globals.state,
              kind: globals.kind,
              priority: globals.priority
            };
            if (Object.keys(issueBody(fields)).length === 0) {
              throw new CliError("at least one field to update is required", 2, "E_USAGE");
            }
            const target = await resolveTarget(globals, true);
            const updated = await withApi(globals, ({ client, signal }) =>
              updateIssue(client, target, id, fields, signal)
            );
            outputResult(globals, "bb.issue.update.v1", `Updated issue #${updated.id}`, updated, () =>
              globals.format === "json" ? formatPlain(updated) : describeCreated("Updated", "issue", updated)
            );
          }
        )
        .demandCommand(1),
    () => {}
  )
  .command(
    "wiki <command>",
    "Read and edit the repository wiki over git",
    (y: Argv) =>
      y
        .command(
          "list",
          "List wiki pages",
          (yy: Argv) =>
            withRepoFlags(yy).option("format", { choices: ["table", "json"], default: "table", describe: "Output format" }),
          async (args: Arguments) => {
            const globals = args as unknown as RepoArgs & { format: "table" | "json" };
            const target = await resolveTarget(globals, true);
            const rows = await withApi(globals, ({ profile, signal }) =>
              withWikiCheckout(buildWikiRemoteUrl(profile, target.workspace, target.repo), runGitCommand, signal, (checkout) =>
                checkout.listPages()
              )
            );
            outputResult(globals, "bb.wiki.list.v1", `${rows.length} wiki pages`, rows, () =>
              globals.format === "json" ? formatPlain(rows) : wikiTable(rows)
            );
          }
        )
        .command(
          "get",
          "Print a wiki page",
          (yy: Argv) => withShowFormat(withRepoFlags(yy)).option("page", { type: "string", describe: "Wiki page path" }),
          async (args: Arguments) => {
            const globals = args as unknown as ShowArgs & { page?: string };
            const page = normalizePageOrThrow(globals.page);
            const target = await resolveTarget(globals, true);
            const content = await withApi(globals, ({ profile, signal }) =>
              withWikiCheckout(buildWikiRemoteUrl(profile, target.workspace, target.repo), runGitCommand, signal, (checkout) =>
                checkout.readPage(page)
              )
            );
            const data = { page, content };
            outputResult(globals, "bb.wiki.get.v1", `Wiki page ${page}`, data, () =>
              globals.format === "json" ? formatPlain(data) : content
            );
          }
        )
        .command(
          "put",
          "Write a wiki page, then commit and push it",
          (yy: Argv) =>
            withShowFormat(withRepoFlags(yy))
              .option("page", { type: "string", describe: "Wiki page path" })
              .option("content", { type: "string", describe: "Page content" })
              .option("file", { type: "string", describe: "Read page content from file" })
              .option("message", { type: "string", describe: "Commit message" }),
          async (args: Arguments) => {
            const globals = args as unknown as ShowArgs & {
              page?: string;
              content?: string;
              file?: string;
              message?: string;
            };
            const page = normalizePageOrThrow(globals.page);
            const hasContent = (globals.content?.trim() ?? "") !== "";
            const filePath = globals.file?.trim() ?? "";
            if (!hasContent && filePath === "") {
              throw new CliError("either --content or --file is required", 2, "E_USAGE");
            }
            if (hasContent && filePath !== "") {
              throw new CliError("use only one of --content or --file", 2, "E_USAGE");
            }
            const content = filePath !== "" ? readFileOrThrow(filePath, "page") : globals.content ?? "";
            const target = await resolveTarget(globals, true);
            const result = await withApi(globals, ({ profile, signal }) =>
              withWikiCheckout(buildWikiRemoteUrl(profile, target.workspace, target.repo), runGitCommand, signal, (checkout) =>
                checkout.putPage(page, content, { message: globals.message, username: profile.username })
              )
            );
            const summary =
              result.status === "updated" ? `Updated wiki page: ${page}` : `No changes for wiki page: ${page}`;
            outputResult(globals, "bb.wiki.put.v1", summary, result, () =>
              globals.format === "json" ? formatPlain(result) : `${summary}\n`
            );
          }
        )
        .demandCommand(1),
    () => {}
  )
  .completion("completion", "Generate shell completion script")
  .strict()
  .recommendCommands()
  .demandCommand(1)
  .exitProcess(false)
  .fail((msg, err, y) => {
    const isUsageError = !err || err.name === "YError";
    const mapped = isUsageError ? new CliError(err?.message ?? msg ?? "Unexpected error", 2, "E_USAGE") : toCliError(err);
    const resolved = new CliError(redactSecrets(mapped.message), mapped.exitCode, mapped.code);
    const { mode, output, requestId } = resolveErrorContext();

    if (mode === "json") {
      writeErrorEnvelope(resolved, output, requestId);
      process.exit(resolved.exitCode);
    }

    if (resolved.message) process.stderr.write(`${resolved.message}\n`);
    if (isUsageError) {
      y.showHelp();
    }
    process.exit(resolved.exitCode);
  })
  .help()
  .version(resolveCliVersion());

void (async () => {
  try {
    await cli.parseAsync();
  } catch (error) {
    emitUnhandledCliError(error);
  }
})();
