import { Octokit } from "@octokit/rest";
import PQueue from "p-queue";
import { z } from "zod";
import { parseRepo } from "./config.js";
import {
  AuthError,
  errorMessage,
  isAbortError,
  IssuedexError,
  RateLimitedError,
  SourceUnavailableError,
  TransientSourceError,
} from "./errors.js";
import { log } from "./log.js";
import type { SourceRecordInput } from "./record.js";
import type { ItemType, RateLimitInfo, SourceAdapter } from "./types.js";

const ReactionsSchema = z
  .object({
    "+1": z.number(),
    "-1": z.number(),
    laugh: z.number(),
    hooray: z.number(),
    confused: z.number(),
    heart: z.number(),
    rocket: z.number(),
    eyes: z.number(),
  })
  .partial()
  .nullish();

const UserSchema = z.object({ login: z.string() }).nullish();

export const GitHubIssueSchema = z.object({
  number: z.number(),
  title: z.string(),
  body: z.string().nullish(),
  state: z.string(),
  html_url: z.string(),
  user: UserSchema,
  labels: z.array(z.union([z.string(), z.object({ name: z.string().nullish() })])).default([]),
  assignees: z.array(z.object({ login: z.string() })).nullish(),
  created_at: z.string(),
  updated_at: z.string(),
  pull_request: z.object({ merged_at: z.string().nullish() }).nullish(),
  reactions: ReactionsSchema,
});
export type GitHubIssue = z.infer<typeof GitHubIssueSchema>;

export const GitHubCommentSchema = z.object({
  id: z.number(),
  user: UserSchema,
  body: z.string().nullish(),
  created_at: z.string(),
  reactions: ReactionsSchema,
});
export type GitHubComment = z.infer<typeof GitHubCommentSchema>;

const CrossReferenceEventSchema = z.object({
  event: z.literal("cross-referenced"),
  source: z.object({
    issue: z.object({
      number: z.number(),
      repository: z.object({ full_name: z.string() }).nullish(),
    }),
  }),
});

const HttpErrorSchema = z.object({
  status: z.number(),
  message: z.string().optional(),
  response: z.object({ headers: z.record(z.unknown()) }).nullish(),
});

export function mapReactions(r: z.infer<typeof ReactionsSchema>) {
  return {
    thumbsUp: r?.["+1"] ?? 0,
    thumbsDown: r?.["-1"] ?? 0,
    laugh: r?.laugh ?? 0,
    hooray: r?.hooray ?? 0,
    confused: r?.confused ?? 0,
    heart: r?.heart ?? 0,
    rocket: r?.rocket ?? 0,
    eyes: r?.eyes ?? 0,
  };
}

export function isPullRequest(issue: GitHubIssue): boolean {
  return issue.pull_request != null;
}

export function mapIssue(issue: GitHubIssue, comments: GitHubComment[], crossReferences: number[]): SourceRecordInput {
  const pr = isPullRequest(issue);
  const merged = pr && issue.pull_request?.merged_at != null;
  return {
    number: issue.number,
    itemType: pr ? "pr" : "issue",
    title: issue.title,
    body: issue.body ?? "",
    state: merged ? "merged" : issue.state,
    url: issue.html_url,
    author: issue.user?.login,
    labels: issue.labels.map((l) => (typeof l === "string" ? l : l.name || "")).filter(Boolean),
    assignees: (issue.assignees ?? []).map((a) => a.login),
    createdAt: issue.created_at,
    updatedAt: issue.updated_at,
    reactions: mapReactions(issue.reactions),
    comments: comments.map((c) => ({
      id: c.id,
      author: c.user?.login,
      body: c.body ?? "",
      createdAt: c.created_at,
      reactions: mapReactions(c.reactions),
    })),
    crossReferences,
  };
}

/** Numbers of same-repository issues that mention this one, from timeline events. */
export function crossReferencesFrom(events: readonly unknown[], repo: string): number[] {
  const target = repo.toLowerCase();
  const found = new Set<number>();
  for (const raw of events) {
    const ev = CrossReferenceEventSchema.safeParse(raw);
    if (!ev.success) continue;
    const source = ev.data.source.issue;
    const from = source.repository?.full_name.toLowerCase();
    if (from === undefined || from === target) found.add(source.number);
  }
  return [...found].sort((a, b) => a - b);
}

function header(headers: Record<string, unknown> | null | undefined, name: string): string | undefined {
  const v = headers?.[name];
  return v === undefined || v === null ? undefined : String(v);
}

/** Maps an Octokit failure onto the source error taxonomy. */
export function toSourceError(err: unknown, now: Date = new Date()): Error {
  if (err instanceof IssuedexError || isAbortError(err)) return err;
  const parsed = HttpErrorSchema.safeParse(err);
  if (!parsed.success) {
    return new TransientSourceError(`GitHub request failed: ${errorMessage(err)}`, { cause: err });
  }
  const { status, message = "" } = parsed.data;
  const headers = parsed.data.response?.headers;
  const remaining = header(headers, "x-ratelimit-remaining");
  const reset = header(headers, "x-ratelimit-reset");
  const retryAfter = header(headers, "retry-after");

  const resetAt = retryAfter
    ? new Date(now.getTime() + Number(retryAfter) * 1000)
    : reset
      ? new Date(Number(reset) * 1000)
      : undefined;

  if (status === 429 || (status === 403 && (remaining === "0" || /rate limit/i.test(message)))) {
    return new RateLimitedError(`GitHub rate limit hit (${status})`, resetAt, { cause: err });
  }
  if (status === 401) return new AuthError("GitHub rejected the token (401). check GITHUB_TOKEN", { cause: err });
  if (status === 403) return new AuthError(`GitHub denied access (403): ${message}`, { cause: err });
  if (status === 404) return new AuthError("repository not found or the token cannot read it (404)", { cause: err });
  if (status >= 500) return new TransientSourceError(`GitHub server error (${status})`, { cause: err });
  return new SourceUnavailableError(`GitHub request failed (${status}): ${message}`, { cause: err });
}

export interface GitHubClientOptions {
  concurrency?: number;
  /** fetch timeline cross-references for every item */
  timeline?: boolean;
  octokit?: Octokit;
}

export class GitHubClient implements SourceAdapter {
  private octokit: Octokit;
  private concurrency: number;
  private timeline: boolean;
  private rateLimit: RateLimitInfo = { remaining: 5000, limit: 5000, resetAt: new Date() };

  constructor(token?: string, opts: GitHubClientOptions = {}) {
    this.octokit = opts.octokit ?? new Octokit({ auth: token });
    this.concurrency = opts.concurrency ?? 4;
    this.timeline = opts.timeline ?? true;
  }

  getRateLimit(): RateLimitInfo {
    return { ...this.rateLimit };
  }

  private updateRateLimit(headers: Record<string, unknown>) {
    const remaining = header(headers, "x-ratelimit-remaining");
    const limit = header(headers, "x-ratelimit-limit");
    const reset = header(headers, "x-ratelimit-reset");
    if (remaining) this.rateLimit.remaining = parseInt(remaining, 10);
    if (limit) this.rateLimit.limit = parseInt(limit, 10);
    if (reset) this.rateLimit.resetAt = new Date(parseInt(reset, 10) * 1000);
  }

  private async guard<T>(fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      throw toSourceError(err);
    }
  }

  async fetch(
    repo: string,
    itemTypes: readonly ItemType[],
    windowStart: Date,
    windowEnd: Date,
    signal?: AbortSignal,
  ): Promise<unknown[]> {
    const { owner, repo: name } = parseRepo(repo);
    const wanted = new Set(itemTypes);
    const issues: GitHubIssue[] = [];

    await this.guard(async () => {
      const pages = this.octokit.paginate.iterator(this.octokit.issues.listForRepo, {
        owner,
        repo: name,
        state: "all",
        sort: "updated",
        direction: "asc",
        since: windowStart.toISOString(),
        per_page: 100,
        request: { signal },
      });
      for await (const response of pages) {
        this.updateRateLimit(response.headers);
        let done = false;
        for (const raw of response.data) {
          const parsed = GitHubIssueSchema.safeParse(raw);
          if (!parsed.success) {
            log.warn(`skipping unreadable GitHub item: ${parsed.error.issues[0]?.message ?? "unknown shape"}`);
            continue;
          }
          const updated = Date.parse(parsed.data.updated_at);
          if (updated >= windowEnd.getTime()) {
            done = true;
            break;
          }
          if (updated < windowStart.getTime()) continue;
          if (!wanted.has(isPullRequest(parsed.data) ? "pr" : "issue")) continue;
          issues.push(parsed.data);
        }
        if (done) break;
      }
    });

    log.debug(`${repo}: ${issues.length} items updated in [${windowStart.toISOString()}, ${windowEnd.toISOString()})`);
    return this.hydrateAll(owner, name, issues, signal);
  }

  /** Re-fetches specific issues regardless of checkpoints. Missing numbers are skipped. */
  async fetchIssues(repo: string, numbers: readonly number[], signal?: AbortSignal): Promise<unknown[]> {
    const { owner, repo: name } = parseRepo(repo);
    const issues: GitHubIssue[] = [];
    for (const issue_number of numbers) {
      signal?.throwIfAborted();
      try {
        const response = await this.guard(() =>
          this.octokit.issues.get({ owner, repo: name, issue_number, request: { signal } }),
        );
        this.updateRateLimit(response.headers);
        const parsed = GitHubIssueSchema.safeParse(response.data);
        if (parsed.success) issues.push(parsed.data);
        else log.warn(`#${issue_number}: unreadable GitHub response`);
      } catch (err) {
        if (!(err instanceof AuthError) || !errorMessage(err).includes("404")) throw err;
        log.warn(`#${issue_number} not found in ${repo}`);
      }
    }
    return this.hydrateAll(owner, name, issues, signal);
  }

  private async hydrateAll(owner: string, name: string, issues: GitHubIssue[], signal?: AbortSignal): Promise<unknown[]> {
    const out: unknown[] = new Array(issues.length);
    const queue = new PQueue({ concurrency: this.concurrency });
    await Promise.all(
      issues.map((issue, i) =>
        queue.add(async () => {
          out[i] = await this.hydrate(owner, name, issue, signal);
        }),
      ),
    );
    return out;
  }

  private async hydrate(owner: string, name: string, issue: GitHubIssue, signal?: AbortSignal): Promise<unknown> {
    const comments: GitHubComment[] = [];
    const rawComments = await this.guard(() =>
      this.octokit.paginate(this.octokit.issues.listComments, {
        owner,
        repo: name,
        issue_number: issue.number,
        per_page: 100,
        request: { signal },
      }),
    );
    for (const raw of rawComments) {
      const parsed = GitHubCommentSchema.safeParse(raw);
      if (parsed.success) comments.push(parsed.data);
    }

    let crossReferences: number[] = [];
    if (this.timeline) {
      const events = await this.guard(() =>
        this.octokit.paginate(this.octokit.issues.listEventsForTimeline, {
          owner,
          repo: name,
          issue_number: issue.number,
          per_page: 100,
          request: { signal },
        }),
      );
      crossReferences = crossReferencesFrom(events, `${owner}/${name}`);
    }

    return mapIssue(issue, comments, crossReferences);
  }

  /** One list call per hundred items, plus comments (and timeline, when enabled) per item. */
  estimateApiCalls(items: number): number {
    return Math.ceil(items / 100) + items * (this.timeline ? 2 : 1);
  }

  /** Null while the remaining budget covers `estimatedCalls` with a fifth to spare. */
  formatRateLimitWarning(estimatedCalls: number, now: Date = new Date()): string | null {
    if (this.rateLimit.remaining > estimatedCalls * 1.2) return null;
    const resetMin = Math.ceil((this.rateLimit.resetAt.getTime() - now.getTime()) / 60000);
    return `${this.rateLimit.remaining}/${this.rateLimit.limit} API calls remaining, ~${estimatedCalls} needed. Resets in ${resetMin}min.`;
  }
}
