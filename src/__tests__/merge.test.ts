import { beforeAll, describe, expect, it } from "vitest";
import { log } from "../log.js";
import { mergeRecords } from "../merge.js";
import { extractReferences } from "../record.js";
import { issueRecord, rawIssue, recordMap, REPO } from "./helpers.js";

beforeAll(() => {
  log.setLevel("silent");
});

const NOW = new Date("2024-02-01T00:00:00.000Z");

describe("mergeRecords", () => {
  it("inserts new records with derived references", () => {
    const result = mergeRecords(new Map(), [rawIssue(1, { body: "see #2 and #1" })], REPO, NOW);
    expect(result.inserted).toBe(1);
    expect(result.updated).toBe(0);
    const rec = result.records.get(1);
    expect(rec?.references).toEqual([2]);
    expect(rec?.firstSeenAt).toBe(NOW.toISOString());
    expect(rec?.recommendations).toEqual([]);
    expect([...result.contentChanged]).toEqual([1]);
  });

  it("replaces on a strictly newer updatedAt and keeps derived data", () => {
    const existing = recordMap([
      issueRecord(1, {}, { embedding: [1, 0], embeddingKey: "m:abc", summary: "old summary" }),
    ]);
    const result = mergeRecords(
      existing,
      [rawIssue(1, { state: "closed", updatedAt: "2024-01-10T00:00:00.000Z" })],
      REPO,
      NOW,
    );
    const rec = result.records.get(1);
    expect(result.updated).toBe(1);
    expect(rec?.state).toBe("closed");
    expect(rec?.embedding).toEqual([1, 0]);
    expect(rec?.embeddingKey).toBe("m:abc");
    expect(rec?.summary).toBe("old summary");
    expect(result.contentChanged.size).toBe(0);
  });

  it("ignores equal or older updatedAt", () => {
    const existing = recordMap([issueRecord(1, { title: "current" })]);
    const result = mergeRecords(existing, [rawIssue(1, { title: "stale", updatedAt: "2024-01-01T00:00:00.000Z" })], REPO);
    expect(result.upserts).toEqual([]);
    expect(result.records.get(1)?.title).toBe("current");
  });

  it("flags content changes in comments", () => {
    const existing = recordMap([
      issueRecord(1, { comments: [{ id: 1, author: "bob", body: "first", createdAt: "2024-01-02T00:00:00Z" }] }),
    ]);
    const result = mergeRecords(
      existing,
      [
        rawIssue(1, {
          updatedAt: "2024-01-05T00:00:00.000Z",
          comments: [{ id: 1, author: "bob", body: "first, edited", createdAt: "2024-01-02T00:00:00Z" }],
        }),
      ],
      REPO,
    );
    expect(result.contentChanged.has(1)).toBe(true);
  });

  it("does not mutate the input map", () => {
    const existing = recordMap([issueRecord(1)]);
    mergeRecords(existing, [rawIssue(2)], REPO);
    expect([...existing.keys()]).toEqual([1]);
  });

  it("is idempotent", () => {
    const batch = [rawIssue(1), rawIssue(2, { body: "dup of #1" })];
    const once = mergeRecords(new Map(), batch, REPO, NOW);
    const twice = mergeRecords(once.records, batch, REPO, NOW);
    expect(twice.records).toEqual(once.records);
    expect(twice.upserts).toEqual([]);
  });

  it("skips malformed records without touching the rest", () => {
    const result = mergeRecords(new Map(), [{ title: "no number" }, rawIssue(3)], REPO);
    expect(result.rejected).toHaveLength(1);
    expect(result.rejected[0].code).toBe("MalformedRecord");
    expect([...result.records.keys()]).toEqual([3]);
  });

  it("keeps the newest of duplicates within one batch", () => {
    const result = mergeRecords(
      new Map(),
      [rawIssue(1, { title: "a" }), rawIssue(1, { title: "b", updatedAt: "2024-01-09T00:00:00.000Z" })],
      REPO,
    );
    expect(result.upserts).toHaveLength(1);
    expect(result.upserts[0].title).toBe("b");
    expect(result.inserted).toBe(1);
    expect(result.updated).toBe(0);
  });
});

describe("extractReferences", () => {
  it("finds bare, qualified and linked references", () => {
    const text = [
      "dup of #12",
      "related acme/widgets#40 and other/repo#41",
      "https://github.com/acme/widgets/pull/7",
      "https://github.com/other/repo/issues/8",
    ].join("\n");
    expect(extractReferences(text, 99, REPO)).toEqual([7, 12, 40]);
  });

  it("excludes the record itself and html entities", () => {
    expect(extractReferences("#5 and &#39; and #6", 5, REPO)).toEqual([6]);
  });
});
