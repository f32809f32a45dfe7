import type { ZodType, ZodTypeDef } from "zod";
import { z } from "zod";
import { discardBody, readLimited } from "./http.js";
import type { FetchLike } from "./http.js";
import type { Logger } from "./output.js";
import { silentLogger } from "./output.js";

export const DEFAULT_BASE_URL = "https://api.bitbucket.org/2.0";
export const DEFAULT_USER_AGENT = "bb-cli/dev";
export const ERROR_BODY_LIMIT = 4 * 1024;

export type QueryValue = string | number | boolean | ReadonlyArray<string | number>;
export type Query = URLSearchParams | Record<string, QueryValue | undefined>;

export type RequestOptions = {
  query?: Query | undefined;
  body?: string | Uint8Array | undefined;
  signal?: AbortSignal | undefined;
};

export type ClientOptions = {
  baseUrl?: string;
  token?: string;
  username?: string;
  userAgent?: string;
  fetch?: FetchLike;
  logger?: Logger;
};

/** Any zod schema, whatever its input type, producing a T. */
export type Schema<T> = ZodType<T, ZodTypeDef, unknown>;

export type AuthMode = "basic" | "bearer" | "none";

/**
 * The request never produced a response: bad URL, DNS, refused connection,
 * timeout or abort.
 */
export class TransportError extends Error {
  readonly kind = "transport";

  constructor(message: string, cause: unknown) {
    super(message, { cause });
    this.name = "TransportError";
  }
}

/** The service answered with a status of 400 or above. */
export class ApiError extends Error {
  readonly kind = "api";
  readonly status: number;
  readonly body: string;

  constructor(status: number, body: string) {
    super(body === "" ? `api request failed: status ${status}` : `api request failed: status ${status}: ${body}`);
    this.name = "ApiError";
    this.status = status;
    this.body = body;
  }
}

export type DecodePhase = "response" | "list-page";

/** A successful response whose body is not JSON, or not the expected shape. */
export class DecodeError extends Error {
  readonly kind = "decode";
  readonly phase: DecodePhase;

  constructor(phase: DecodePhase, detail: string, cause: unknown) {
    super(`${phase === "list-page" ? "decode list page" : "decode response"}: ${detail}`, { cause });
    this.name = "DecodeError";
    this.phase = phase;
  }
}

export type ClientError = TransportError | ApiError | DecodeError;

export function isClientError(error: unknown): error is ClientError {
  return error instanceof TransportError || error instanceof ApiError || error instanceof DecodeError;
}

const listPageSchema = z.object({
  values: z.array(z.unknown()).nullish(),
  next: z.string().nullish()
});

export type ListPage = {
  values: unknown[];
  next: string;
};

type DoJsonOptions = RequestOptions & { discard?: false };

export class ApiClient {
  readonly baseUrl: string;
  readonly userAgent: string;
  private readonly token: string;
  private readonly username: string;
  private readonly fetchImpl: FetchLike;
  private readonly logger: Logger;

  constructor(options: ClientOptions = {}) {
    const baseUrl = options.baseUrl?.trim() ? options.baseUrl.trim() : DEFAULT_BASE_URL;
    this.baseUrl = baseUrl.replace(/\/+$/, "");
    this.token = options.token ?? "";
    this.username = options.username?.trim() ?? "";
    this.userAgent = options.userAgent ?? DEFAULT_USER_AGENT;
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
    this.logger = options.logger ?? silentLogger;
  }

  get authMode(): AuthMode {
    if (this.token === "") return "none";
    return this.username !== "" ? "basic" : "bearer";
  }

  buildUrl(target: string, query?: Query): string {
    const url = isAbsoluteUrl(target)
      ? parseUrl(target, "parse absolute URL")
      : parseUrl(`${this.baseUrl}/${target.trim().replace(/^\/+/, "")}`, "parse URL");
    // Caller parameters are added next to any the endpoint already carries.
    for (const [key, value] of queryPairs(query)) {
      url.searchParams.append(key, value);
    }
    return url.toString();
  }

  buildHeaders(hasBody: boolean): Record<string, string> {
    const headers: Record<string, string> = {
      accept: "application/json",
      "user-agent": this.userAgent
    };
    const mode = this.authMode;
    if (mode === "basic") {
      const credentials = Buffer.from(`${this.username}:${this.token}`, "utf8").toString("base64");
      headers.authorization = `Basic ${credentials}`;
    } else if (mode === "bearer") {
      headers.authorization = `Bearer ${this.token}`;
    }
    if (hasBody) {
      headers["content-type"] = "application/json";
    }
    return headers;
  }

  /**
   * Sends one request and hands back the unread response. The caller owns
   * the body and must consume or cancel it.
   */
  async request(method: string, target: string, options: RequestOptions = {}): Promise<Response> {
    const url = this.buildUrl(target, options.query);
    const hasBody = options.body !== undefined;
    const init: RequestInit = {
      method,
      headers: this.buildHeaders(hasBody)
    };
    if (options.body !== undefined) init.body = options.body;
    if (options.signal !== undefined) init.signal = options.signal;

    let response: Response;
    try {
      response = await this.fetchImpl(url, init);
    } catch (error) {
      throw new TransportError(`execute request: ${errorDetail(error)}`, error);
    }
    this.logger.debug(`${method} ${url} -> ${response.status}`);
    return response;
  }

  doJSON(method: string, target: string, options: RequestOptions & { discard: true }): Promise<void>;
  doJSON<T>(method: string, target: string, options: DoJsonOptions & { schema: Schema<T> }): Promise<T>;
  doJSON(method: string, target: string, options?: DoJsonOptions): Promise<unknown>;
  async doJSON<T>(
    method: string,
    target: string,
    options: RequestOptions & { discard?: boolean; schema?: Schema<T> } = {}
  ): Promise<unknown> {
    const response = await this.request(method, target, options);
    await rejectErrorStatus(response);
    if (options.discard) {
      await discardBody(response);
      return undefined;
    }
    const text = await readText(response, "response");
    return options.schema ? decodeShaped(text, "response", options.schema) : decodeJson(text, "response");
  }

  /**
   * Follows `next` links until the listing ends and returns every page's
   * `values` in order. The caller's query is only sent with the first request;
   * `next` links already carry it. A failure on any page fails the whole walk.
   */
  async getAllValues(target: string, query?: Query, options: { signal?: AbortSignal | undefined } = {}): Promise<unknown[]> {
    let next = target;
    let currentQuery = query;
    const all: unknown[] = [];
    let pages = 0;

    while (next !== "") {
      const response = await this.request("GET", next, { query: currentQuery, signal: options.signal });
      await rejectErrorStatus(response);
      const page = decodeListPage(await readText(response, "list-page"));
      for (const value of page.values) {
        all.push(value);
      }
      pages += 1;
      next = page.next;
      currentQuery = undefined;
    }

    this.logger.verbose(`Fetched ${all.length} values across ${pages} page(s)`);
    return all;
  }
}

/**
 * Error statuses become ApiError carrying at most ERROR_BODY_LIMIT bytes of
 * the body; the rest of the body is cancelled.
 */
async function rejectErrorStatus(response: Response): Promise<void> {
  if (response.status < 400) {
    return;
  }
  const excerpt = await readLimited(response, ERROR_BODY_LIMIT);
  throw new ApiError(response.status, excerpt.trim());
}

async function readText(response: Response, phase: DecodePhase): Promise<string> {
  try {
    return await response.text();
  } catch (error) {
    throw new DecodeError(phase, errorDetail(error), error);
  }
}

export function decodeListPage(text: string): ListPage {
  const page = decodeShaped(text, "list-page", listPageSchema);
  return {
    values: page.values ?? [],
    next: page.next ?? ""
  };
}

function decodeJson(text: string, phase: DecodePhase): unknown {
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new DecodeError(phase, errorDetail(error), error);
  }
}

function decodeShaped<T>(text: string, phase: DecodePhase, schema: Schema<T>): T {
  const result = schema.safeParse(decodeJson(text, phase));
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? issue.path.join(".") : "(root)";
    throw new DecodeError(phase, `${where}: ${issue?.message ?? "unexpected shape"}`, result.error);
  }
  return result.data;
}

function queryPairs(query: Query | undefined): Array<[string, string]> {
  if (!query) {
    return [];
  }
  if (query instanceof URLSearchParams) {
    return [...query.entries()];
  }
  const pairs: Array<[string, string]> = [];
  for (const [key, value] of Object.entries(query)) {
    if (value === undefined) continue;
    if (typeof value === "object") {
      for (const item of value) {
        pairs.push([key, String(item)]);
      }
      continue;
    }
    pairs.push([key, String(value)]);
  }
  return pairs;
}

function isAbsoluteUrl(target: string): boolean {
  return target.startsWith("http://") || target.startsWith("https://");
}

function parseUrl(value: string, context: string): URL {
  try {
    return new URL(value);
  } catch (error) {
    throw new TransportError(`build request: ${context}: ${errorDetail(error)}`, error);
  }
}

function errorDetail(error: unknown): string {
  if (error instanceof Error) {
    const cause = error.cause;
    if (cause instanceof Error && cause.message && cause.message !== error.message) {
      return `${error.message}: ${cause.message}`;
    }
    return error.message;
  }
  return String(error);
}
