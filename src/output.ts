import fs from "fs";
import path from "path";
import { fileURLToPath } from "url";
import { z } from "zod";
import type { EnvelopeStatus, JsonEnvelope, LogLevel, OutputMode } from "./types.js";

export type Logger = {
  info: (msg: string) => void;
  verbose: (msg: string) => void;
  debug: (msg: string) => void;
  error: (msg: string) => void;
};

export const silentLogger: Logger = {
  info: () => {},
  verbose: () => {},
  debug: () => {},
  error: () => {}
};

const LEVEL_RANK: Record<LogLevel, number> = {
  quiet: 0,
  info: 1,
  verbose: 2,
  debug: 3
};

export function resolveOutputMode(json: boolean, plain: boolean): OutputMode {
  if (json && plain) {
    throw new Error("--json and --plain cannot be used together");
  }
  return json ? "json" : "plain";
}

/** Line logger on stderr. Errors are written at every level, quiet included. */
export function createLogger(level: LogLevel, stream: NodeJS.WritableStream = process.stderr): Logger {
  const writeLine = (msg: string) => {
    stream.write(`${msg}\n`);
  };
  const at = (target: LogLevel) => (msg: string) => {
    if (level !== "quiet" && LEVEL_RANK[level] >= LEVEL_RANK[target]) writeLine(msg);
  };

  return {
    info: at("info"),
    verbose: at("verbose"),
    debug: at("debug"),
    error: writeLine
  };
}

export function envelope<T>(
  schema: string,
  summary: string,
  status: EnvelopeStatus,
  data: T,
  errors: Array<{ message: string; code?: string }> = [],
  requestId?: string
): JsonEnvelope<T> {
  return {
    schema,
    meta: {
      tool: "bb",
      version: resolveCliVersion(),
      timestamp: new Date().toISOString(),
      ...(requestId !== undefined ? { request_id: requestId } : {})
    },
    summary,
    status,
    data,
    errors
  };
}

/** Writes to stdout, or to `output` (creating its directory) unless it is `-`. */
export function writeOutput(content: string, output?: string): void {
  if (!output || output === "-") {
    process.stdout.write(content);
    return;
  }
  const parent = path.dirname(output);
  if (parent && parent !== ".") {
    fs.mkdirSync(parent, { recursive: true });
  }
  const payload = content.endsWith("\n") ? content : `${content}\n`;
  fs.writeFileSync(output, payload, { encoding: "utf8" });
}

export function formatPlain(data: unknown): string {
  if (typeof data === "string") {
    return data.endsWith("\n") ? data : `${data}\n`;
  }
  return `${JSON.stringify(data, null, 2)}\n`;
}

/**
 * Left-aligned columns separated by two spaces. The last column is never
 * padded, so lines carry no trailing whitespace.
 */
export function renderTable(headers: string[], rows: Array<Array<string | number>>): string {
  const lines = [headers, ...rows.map((row) => row.map((cell) => String(cell)))];
  const widths = headers.map((_header, column) =>
    Math.max(...lines.map((line) => (line[column] ?? "").length))
  );
  const lastColumn = headers.length - 1;
  return lines
    .map((line) =>
      line
        .map((cell, column) => (column === lastColumn ? cell : cell.padEnd((widths[column] ?? 0) + 2)))
        .join("")
    )
    .map((line) => `${line}\n`)
    .join("");
}

const DEV_VERSION = "dev";

const packageVersionSchema = z.object({ version: z.string().trim().min(1) });

let cachedVersion: string | undefined;

/** Version from the package.json beside src/ or dist/, "dev" when it has none. */
export function resolveCliVersion(): string {
  cachedVersion ??= readPackageVersion() ?? DEV_VERSION;
  return cachedVersion;
}

function readPackageVersion(): string | undefined {
  const packagePath = fileURLToPath(new URL("../package.json", import.meta.url));
  if (!fs.existsSync(packagePath)) {
    return undefined;
  }
  const parsed = packageVersionSchema.safeParse(JSON.parse(fs.readFileSync(packagePath, "utf8")));
  return parsed.success ? parsed.data.version : undefined;
}
