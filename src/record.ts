import { z } from "zod";
import { MalformedRecordError } from "./errors.js";
import type { Recommendation } from "./recommendations.js";

const isoTimestamp = z
  .string()
  .refine((v) => !Number.isNaN(Date.parse(v)), "invalid timestamp")
  .transform((v) => new Date(v).toISOString());

const text = z
  .string()
  .nullish()
  .transform((v) => v ?? "");

const login = z
  .string()
  .nullish()
  .transform((v) => v || "ghost");

const count = z.number().int().nonnegative().default(0);

export const ReactionCountsSchema = z.object({
  thumbsUp: count,
  thumbsDown: count,
  laugh: count,
  hooray: count,
  confused: count,
  heart: count,
  rocket: count,
  eyes: count,
});
export type ReactionCounts = z.output<typeof ReactionCountsSchema>;

export const CommentSchema = z.object({
  id: z.union([z.string().min(1), z.number().int()]).transform(String),
  author: login,
  body: text,
  createdAt: isoTimestamp,
  reactions: ReactionCountsSchema.default({}),
});
export type Comment = z.output<typeof CommentSchema>;

export const ItemTypeSchema = z.enum(["issue", "pr"]);

export const StateSchema = z.preprocess(
  (v) => (typeof v === "string" ? v.toLowerCase() : v),
  z.enum(["open", "closed", "merged"]),
);
export type RecordState = z.output<typeof StateSchema>;

const issueNumber = z.number().int().positive();

/** Shape every source adapter must produce. */
export const SourceRecordSchema = z.object({
  number: issueNumber,
  itemType: ItemTypeSchema.default("issue"),
  title: z.string(),
  body: text,
  state: StateSchema,
  url: z.string().default(""),
  author: login,
  labels: z.array(z.string()).default([]),
  assignees: z.array(z.string()).default([]),
  createdAt: isoTimestamp,
  updatedAt: isoTimestamp,
  reactions: ReactionCountsSchema.default({}),
  comments: z.array(CommentSchema).default([]),
  crossReferences: z.array(issueNumber).default([]),
});
export type SourceRecord = z.output<typeof SourceRecordSchema>;
export type SourceRecordInput = z.input<typeof SourceRecordSchema>;

export const METRIC_NAMES = [
  "commentCount",
  "bodyReactions",
  "commentReactions",
  "positiveReactions",
  "negativeReactions",
  "totalReactions",
  "engagements",
  "engagementsPerDay",
  "ageDays",
  "daysSinceUpdate",
  "activityScore",
  "knnDistance",
] as const;
export type MetricName = (typeof METRIC_NAMES)[number];

const metric = z.number().finite();

export const MetricBundleSchema = z.object({
  commentCount: metric,
  bodyReactions: metric,
  commentReactions: metric,
  positiveReactions: metric,
  negativeReactions: metric,
  totalReactions: metric,
  engagements: metric,
  engagementsPerDay: metric,
  ageDays: metric,
  daysSinceUpdate: metric,
  activityScore: metric,
  knnDistance: metric.optional(),
});
export type MetricBundle = z.output<typeof MetricBundleSchema>;

export const QUARTILE_LABELS = ["Bottom25%", "Bottom50%", "Top50%", "Top25%"] as const;
export const QuartileLabelSchema = z.enum(QUARTILE_LABELS);
export type QuartileLabel = z.output<typeof QuartileLabelSchema>;

export const QuartileBundleSchema = z.record(z.enum(METRIC_NAMES), QuartileLabelSchema);
export type QuartileBundle = Partial<Record<MetricName, QuartileLabel>>;

export const NeighborSchema = z.object({
  number: issueNumber,
  title: z.string(),
  distance: z.number(),
});
export type StoredNeighbor = z.output<typeof NeighborSchema>;

/** Stored JSON document: source fields plus derived data. Vectors live in their own column. */
export const StoredRecordSchema = SourceRecordSchema.extend({
  references: z.array(issueNumber).default([]),
  embeddingKey: z.string().optional(),
  metrics: MetricBundleSchema.optional(),
  quartiles: QuartileBundleSchema.optional(),
  /** nearest embedded records at the last enrichment, closest first */
  neighbors: z.array(NeighborSchema).optional(),
  summary: z.string().optional(),
  summaryKey: z.string().optional(),
  firstSeenAt: isoTimestamp.optional(),
});
export type StoredDocument = z.output<typeof StoredRecordSchema>;

export interface IssueRecord extends StoredDocument {
  embedding?: number[];
  recommendations: Recommendation[];
}

function describe(raw: unknown): string {
  const shape = z.object({ number: z.unknown() }).safeParse(raw);
  return shape.success && shape.data.number !== undefined ? `record ${String(shape.data.number)}` : "record";
}

export function parseSourceRecord(raw: unknown): SourceRecord {
  const parsed = SourceRecordSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`);
    throw new MalformedRecordError(`malformed ${describe(raw)}: ${issues.join("; ")}`, issues);
  }
  return parsed.data;
}

export function toDocument(record: IssueRecord): StoredDocument {
  const { embedding: _embedding, recommendations: _recommendations, ...doc } = record;
  return doc;
}

export function positiveReactions(r: ReactionCounts): number {
  return r.thumbsUp + r.laugh + r.hooray + r.heart + r.rocket;
}

export function negativeReactions(r: ReactionCounts): number {
  return r.thumbsDown + r.confused;
}

export function totalReactions(r: ReactionCounts): number {
  return positiveReactions(r) + negativeReactions(r) + r.eyes;
}

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Issue numbers mentioned in `text` that point into `repo`: bare `#12`,
 * `owner/name#12` and github.com issue or pull links. `self` is excluded.
 */
export function extractReferences(text: string, self: number, repo: string): number[] {
  const found = new Set<number>();
  const target = repo.toLowerCase();
  const qualified = /([\w.-]+\/[\w.-]+)#(\d+)\b/g;
  const link = new RegExp(`github\\.com/${escapeRegExp(target)}/(?:issues|pull)/(\\d+)`, "gi");

  let stripped = text;
  for (const m of text.matchAll(link)) {
    found.add(Number(m[1]));
  }
  stripped = stripped.replace(link, " ");

  for (const m of stripped.matchAll(qualified)) {
    if (m[1].toLowerCase() === target) found.add(Number(m[2]));
  }
  stripped = stripped.replace(qualified, " ");

  for (const m of stripped.matchAll(/(?:^|[^\w&/])#(\d+)\b/g)) {
    found.add(Number(m[1]));
  }

  found.delete(self);
  return [...found].filter((n) => n > 0).sort((a, b) => a - b);
}

export function deriveReferences(record: SourceRecord, repo: string): number[] {
  const refs = new Set<number>(record.crossReferences);
  for (const n of extractReferences(record.body, record.number, repo)) refs.add(n);
  for (const c of record.comments) {
    for (const n of extractReferences(c.body, record.number, repo)) refs.add(n);
  }
  refs.delete(record.number);
  return [...refs].sort((a, b) => a - b);
}
