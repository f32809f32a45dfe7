import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { Writable } from "node:stream";
import { describe, expect, it } from "vitest";
import {
  createLogger,
  envelope,
  formatPlain,
  renderTable,
  resolveCliVersion,
  resolveOutputMode,
  writeOutput
} from "../src/output.js";
import type { LogLevel } from "../src/types.js";

function collectLines(level: LogLevel): string[] {
  const lines: string[] = [];
  const stream = new Writable({
    write(chunk: Buffer | string, _encoding, callback) {
      lines.push(String(chunk));
      callback();
    }
  });
  const logger = createLogger(level, stream);
  logger.info("info");
  logger.verbose("verbose");
  logger.debug("debug");
  logger.error("error");
  return lines;
}

describe("renderTable", () => {
  it("pads every column but the last", () => {
    expect(renderTable(["A", "LONGER"], [["wide-cell", "x"], ["b", "y"]])).toBe(
      "A          LONGER\nwide-cell  x\nb          y\n"
    );
  });

  it("prints only the header for an empty listing", () => {
    expect(renderTable(["SLUG", "FULL_NAME"], [])).toBe("SLUG  FULL_NAME\n");
  });
});

describe("formatPlain", () => {
  it("passes strings through with a trailing newline", () => {
    expect(formatPlain("done")).toBe("done\n");
    expect(formatPlain("done\n")).toBe("done\n");
  });

  it("pretty-prints everything else", () => {
    expect(formatPlain({ a: 1 })).toBe('{\n  "a": 1\n}\n');
  });
});

describe("resolveOutputMode", () => {
  it("rejects --json with --plain", () => {
    expect(() => resolveOutputMode(true, true)).toThrowError("--json and --plain cannot be used together");
    expect(resolveOutputMode(true, false)).toBe("json");
    expect(resolveOutputMode(false, false)).toBe("plain");
  });
});

describe("createLogger", () => {
  it.each<[LogLevel, string[]]>([
    ["quiet", ["error\n"]],
    ["info", ["info\n", "error\n"]],
    ["verbose", ["info\n", "verbose\n", "error\n"]],
    ["debug", ["info\n", "verbose\n", "debug\n", "error\n"]]
  ])("writes what %s allows", (level, expected) => {
    expect(collectLines(level)).toEqual(expected);
  });
});

describe("envelope", () => {
  it("stamps tool metadata and the request id", () => {
    const payload = envelope("bb.test.v1", "ok", "success", { n: 1 }, [], "req-1");
    expect(payload.schema).toBe("bb.test.v1");
    expect(payload.meta.tool).toBe("bb");
    expect(payload.meta.request_id).toBe("req-1");
    expect(payload.meta.version).toBe(resolveCliVersion());
    expect(payload.data).toEqual({ n: 1 });
    expect(payload.errors).toEqual([]);
  });

  it("omits request_id when none is given", () => {
    expect(envelope("bb.test.v1", "ok", "success", null).meta).not.toHaveProperty("request_id");
  });
});

describe("writeOutput", () => {
  it("creates parent directories and ends files with a newline", () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "bb-output-"));
    const file = path.join(dir, "nested", "out.txt");

    writeOutput("hello", file);

    expect(fs.readFileSync(file, "utf8")).toBe("hello\n");
    fs.rmSync(dir, { recursive: true, force: true });
  });
});

describe("resolveCliVersion", () => {
  it("reads the package version", () => {
    expect(resolveCliVersion()).toBe("0.1.0");
  });
});
