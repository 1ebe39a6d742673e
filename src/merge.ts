import { MalformedRecordError } from "./errors.js";
import { log } from "./log.js";
import { deriveReferences, type IssueRecord, parseSourceRecord, type SourceRecord } from "./record.js";

export interface MergeResult {
  /** A new map; the input map is left as it was. */
  records: Map<number, IssueRecord>;
  /** Records that must be written, one per number. */
  upserts: IssueRecord[];
  inserted: number;
  updated: number;
  /** Numbers whose title, body or comment text changed (or that are new). */
  contentChanged: Set<number>;
  rejected: MalformedRecordError[];
}

function textChanged(prev: IssueRecord, next: SourceRecord): boolean {
  if (prev.title !== next.title || prev.body !== next.body) return true;
  if (prev.comments.length !== next.comments.length) return true;
  return prev.comments.some((c, i) => c.body !== next.comments[i].body);
}

/**
 * Folds a batch of raw source records into the collection. New numbers are
 * inserted; known numbers are replaced only when the incoming updatedAt is
 * strictly newer, and keep their embedding, metrics, quartiles, summary and
 * recommendations. Malformed input is logged and skipped.
 */
export function mergeRecords(
  existing: ReadonlyMap<number, IssueRecord>,
  incoming: readonly unknown[],
  repo: string,
  now: Date = new Date(),
): MergeResult {
  const records = new Map(existing);
  const touched = new Map<number, IssueRecord>();
  const inserted = new Set<number>();
  const updated = new Set<number>();
  const contentChanged = new Set<number>();
  const rejected: MalformedRecordError[] = [];

  for (const raw of incoming) {
    let src: SourceRecord;
    try {
      src = parseSourceRecord(raw);
    } catch (err) {
      if (!(err instanceof MalformedRecordError)) throw err;
      log.warn(err.message);
      rejected.push(err);
      continue;
    }

    const prev = records.get(src.number);
    if (!prev) {
      const record: IssueRecord = {
        ...src,
        references: deriveReferences(src, repo),
        recommendations: [],
        firstSeenAt: now.toISOString(),
      };
      records.set(src.number, record);
      touched.set(src.number, record);
      inserted.add(src.number);
      contentChanged.add(src.number);
      continue;
    }

    if (Date.parse(src.updatedAt) <= Date.parse(prev.updatedAt)) continue;

    const record: IssueRecord = { ...prev, ...src, references: deriveReferences(src, repo) };
    if (textChanged(prev, src)) contentChanged.add(src.number);
    records.set(src.number, record);
    touched.set(src.number, record);
    if (!inserted.has(src.number)) updated.add(src.number);
  }

  return {
    records,
    upserts: [...touched.values()],
    inserted: inserted.size,
    updated: updated.size,
    contentChanged,
    rejected,
  };
}
