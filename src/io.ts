import fs from "fs";
import readline from "readline";

/** Reads stdin to the end, including anything already buffered. */
export async function readStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  const collect = (chunk: string | Buffer) => {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk));
  };

  let buffered: string | Buffer | null;
  while ((buffered = process.stdin.read()) !== null) {
    collect(buffered);
  }
  if (process.stdin.readableEnded || process.stdin.destroyed) {
    return Buffer.concat(chunks).toString("utf8");
  }

  return new Promise((resolve, reject) => {
    const onEnd = () => {
      cleanup();
      resolve(Buffer.concat(chunks).toString("utf8"));
    };
    const onError = (err: Error) => {
      cleanup();
      reject(err);
    };
    const cleanup = () => {
      process.stdin.removeListener("data", collect);
      process.stdin.removeListener("end", onEnd);
      process.stdin.removeListener("error", onError);
    };

    process.stdin.on("data", collect);
    process.stdin.on("end", onEnd);
    process.stdin.on("error", onError);
  });
}

/** First non-empty line of stdin, trimmed; tokens are single-line. */
export async function readStdinLine(): Promise<string> {
  const content = await readStdin();
  const line = content.split(/\r?\n/).find((candidate) => candidate.trim().length > 0);
  return line?.trim() ?? "";
}

export function readFile(filePath: string): string {
  return fs.readFileSync(filePath, "utf8");
}

/** Prompts on stderr and echoes `*` for every typed character. */
export async function promptSecret(prompt: string): Promise<string> {
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stderr,
    terminal: true
  });
  const masked = rl as unknown as {
    output: NodeJS.WritableStream;
    _writeToOutput?: (text: string) => void;
  };
  const output = masked.output;
  let prompted = false;

  masked._writeToOutput = (text: string) => {
    if (!prompted) {
      prompted = true;
      output.write(text);
      return;
    }
    if (text === "\n" || text === "\r" || text === "\r\n" || text === "\b \b") {
      output.write(text);
      return;
    }
    output.write("*");
  };

  try {
    const value = await new Promise<string>((resolve) => {
      rl.question(prompt, (answer) => resolve(answer));
    });
    return value.trim();
  } finally {
    rl.close();
  }
}
