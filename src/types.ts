export type LogLevel = "quiet" | "info" | "verbose" | "debug";

export type OutputMode = "plain" | "json";

export type EnvelopeStatus = "success" | "warn" | "error";

export type JsonEnvelope<T> = {
  schema: string;
  meta: {
    tool: string;
    version: string;
    timestamp: string;
    request_id?: string;
  };
  summary: string;
  status: EnvelopeStatus;
  data: T;
  errors: Array<{ message: string; code?: string }>;
};

export type CliGlobals = {
  json: boolean;
  plain: boolean;
  output?: string;
  quiet: boolean;
  verbose: boolean;
  debug: boolean;
  input: boolean;
  requestId?: string;
  profile?: string;
  timeout: number;
};
