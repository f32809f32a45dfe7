import { z } from "zod";
import type { ApiClient, Query, Schema } from "./client.js";
import { renderTable } from "./output.js";
import type { RepoTarget } from "./remote.js";
import type { WikiPageRow } from "./wiki.js";

export type ListOptions = {
  all: boolean;
  query: Record<string, string | undefined>;
  signal?: AbortSignal | undefined;
};

const text = z
  .string()
  .nullish()
  .transform((value) => value ?? "");

const integer = z
  .number()
  .int()
  .nullish()
  .transform((value) => value ?? 0);

const named = z
  .object({ name: text })
  .nullish()
  .transform((value) => value ?? { name: "" });

const branchRef = z
  .object({ branch: named })
  .nullish()
  .transform((value) => value ?? { branch: { name: "" } });

const htmlLinks = z
  .object({ html: z.object({ href: text }).nullish() })
  .nullish()
  .transform((value) => ({ html: { href: value?.html?.href ?? "" } }));

export const repositoryRowSchema = z.object({
  slug: text,
  full_name: text
});

export const pullRequestRowSchema = z.object({
  id: integer,
  title: text,
  state: text,
  links: htmlLinks,
  source: branchRef,
  destination: branchRef
});

export const pipelineRowSchema = z.object({
  uuid: text,
  state: z
    .object({ name: text, result: named })
    .nullish()
    .transform((value) => value ?? { name: "", result: { name: "" } }),
  target: z
    .object({ ref_name: text })
    .nullish()
    .transform((value) => value ?? { ref_name: "" })
});

export const issueRowSchema = z.object({
  id: integer,
  title: text,
  state: text,
  kind: text,
  priority: text,
  links: htmlLinks
});

export type RepositoryRow = z.infer<typeof repositoryRowSchema>;
export type PullRequestRow = z.infer<typeof pullRequestRowSchema>;
export type PipelineRow = z.infer<typeof pipelineRowSchema>;
export type IssueRow = z.infer<typeof issueRowSchema>;

export class RowDecodeError extends Error {
  constructor(kind: string, detail: string) {
    super(`decode ${kind} row: ${detail}`);
    this.name = "RowDecodeError";
  }
}

const pageSchema = z.object({ values: z.array(z.unknown()).nullish() });

function repoPath(target: RepoTarget, ...parts: Array<string | number>): string {
  const segments = [target.workspace, target.repo, ...parts.map(String)].map((segment) =>
    encodeURIComponent(segment)
  );
  return `/repositories/${segments.join("/")}`;
}

/** Drops blank entries so unset flags never reach the query string. */
export function compactQuery(query: Record<string, string | undefined>): Query {
  const compact: Record<string, string> = {};
  for (const [key, value] of Object.entries(query)) {
    const trimmed = value?.trim() ?? "";
    if (trimmed !== "") compact[key] = trimmed;
  }
  return compact;
}

/** Either the first page's values or, with `all`, every page's. */
export async function listValues(client: ApiClient, path: string, options: ListOptions): Promise<unknown[]> {
  const query = compactQuery(options.query);
  if (options.all) {
    return client.getAllValues(path, query, { signal: options.signal });
  }
  const page = await client.doJSON("GET", path, { query, signal: options.signal, schema: pageSchema });
  return page.values ?? [];
}

export function listRepositories(
  client: ApiClient,
  workspace: string,
  options: ListOptions
): Promise<unknown[]> {
  return listValues(client, `/repositories/${encodeURIComponent(workspace)}`, options);
}

export function listPullRequests(client: ApiClient, target: RepoTarget, options: ListOptions): Promise<unknown[]> {
  const state = options.query.state?.trim().toUpperCase();
  return listValues(client, repoPath(target, "pullrequests"), {
    ...options,
    query: { ...options.query, state }
  });
}

export function listPipelines(client: ApiClient, target: RepoTarget, options: ListOptions): Promise<unknown[]> {
  return listValues(client, repoPath(target, "pipelines"), options);
}

export function listIssues(client: ApiClient, target: RepoTarget, options: ListOptions): Promise<unknown[]> {
  return listValues(client, repoPath(target, "issues"), options);
}

export type PullRequestInput = {
  title: string;
  source: string;
  destination: string;
  description?: string | undefined;
};

export function pullRequestBody(input: PullRequestInput): Record<string, unknown> {
  const body: Record<string, unknown> = {
    title: input.title,
    source: { branch: { name: input.source } },
    destination: { branch: { name: input.destination } }
  };
  if (input.description && input.description.trim() !== "") {
    body.description = input.description;
  }
  return body;
}

export function createPullRequest(
  client: ApiClient,
  target: RepoTarget,
  input: PullRequestInput,
  signal?: AbortSignal
): Promise<PullRequestRow> {
  return client.doJSON("POST", repoPath(target, "pullrequests"), {
    body: JSON.stringify(pullRequestBody(input)),
    signal,
    schema: pullRequestRowSchema
  });
}

export function pipelineRunBody(branch: string): Record<string, unknown> {
  return {
    target: {
      type: "pipeline_ref_target",
      ref_type: "branch",
      ref_name: branch
    }
  };
}

export function runPipeline(
  client: ApiClient,
  target: RepoTarget,
  branch: string,
  signal?: AbortSignal
): Promise<PipelineRow> {
  return client.doJSON("POST", repoPath(target, "pipelines"), {
    body: JSON.stringify(pipelineRunBody(branch)),
    signal,
    schema: pipelineRowSchema
  });
}

export type IssueFields = {
  title?: string | undefined;
  content?: string | undefined;
  state?: string | undefined;
  kind?: string | undefined;
  priority?: string | undefined;
};

/** Only non-blank fields are sent; content travels as `{ raw }`. */
export function issueBody(fields: IssueFields): Record<string, unknown> {
  const body: Record<string, unknown> = {};
  for (const key of ["title", "state", "kind", "priority"] as const) {
    const value = fields[key]?.trim();
    if (value) body[key] = value;
  }
  const content = fields.content?.trim();
  if (content) {
    body.content = { raw: content };
  }
  return body;
}

export function createIssue(
  client: ApiClient,
  target: RepoTarget,
  fields: IssueFields & { title: string },
  signal?: AbortSignal
): Promise<IssueRow> {
  // The title is sent as given; the other fields only when non-blank.
  const body = { ...issueBody(fields), title: fields.title };
  return client.doJSON("POST", repoPath(target, "issues"), {
    body: JSON.stringify(body),
    signal,
    schema: issueRowSchema
  });
}

export async function updateIssue(
  client: ApiClient,
  target: RepoTarget,
  id: number,
  fields: IssueFields,
  signal?: AbortSignal
): Promise<IssueRow> {
  const body = issueBody(fields);
  if (Object.keys(body).length === 0) {
    throw new Error("at least one field to update is required");
  }
  return client.doJSON("PUT", repoPath(target, "issues", id), {
    body: JSON.stringify(body),
    signal,
    schema: issueRowSchema
  });
}

export function pipelineStateLabel(row: PipelineRow): string {
  return row.state.result.name.trim() !== "" ? row.state.result.name : row.state.name;
}

function decodeRows<T>(kind: string, values: unknown[], schema: Schema<T>): T[] {
  return values.map((value) => {
    const result = schema.safeParse(value);
    if (!result.success) {
      const issue = result.error.issues[0];
      const where = issue && issue.path.length > 0 ? issue.path.join(".") : "(root)";
      throw new RowDecodeError(kind, `${where}: ${issue?.message ?? "unexpected shape"}`);
    }
    return result.data;
  });
}

export function repositoryTable(values: unknown[]): string {
  const rows = decodeRows("repo", values, repositoryRowSchema);
  return renderTable(
    ["SLUG", "FULL_NAME"],
    rows.map((row) => [row.slug, row.full_name])
  );
}

export function pullRequestTable(values: unknown[]): string {
  const rows = decodeRows("pull request", values, pullRequestRowSchema);
  return renderTable(
    ["ID", "STATE", "SOURCE", "DEST", "TITLE"],
    rows.map((row) => [row.id, row.state, row.source.branch.name, row.destination.branch.name, row.title])
  );
}

export function pipelineTable(values: unknown[]): string {
  const rows = decodeRows("pipeline", values, pipelineRowSchema);
  return renderTable(
    ["UUID", "STATE", "REF"],
    rows.map((row) => [row.uuid, pipelineStateLabel(row), row.target.ref_name])
  );
}

export function issueTable(values: unknown[]): string {
  const rows = decodeRows("issue", values, issueRowSchema);
  return renderTable(
    ["ID", "STATE", "KIND", "PRIORITY", "TITLE"],
    rows.map((row) => [row.id, row.state, row.kind, row.priority, row.title])
  );
}

export function wikiTable(rows: WikiPageRow[]): string {
  return renderTable(
    ["PATH", "SIZE"],
    rows.map((row) => [row.path, row.size])
  );
}
