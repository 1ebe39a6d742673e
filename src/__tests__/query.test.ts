import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { resolve } from "node:path";
import { afterEach, beforeAll, beforeEach, describe, expect, it } from "vitest";
import { EmbeddingEngine } from "../embeddings.js";
import { EmbeddingUnavailableError, InvalidMetricError, NotFoundError, ValidationError } from "../errors.js";
import { log } from "../log.js";
import { buildReferenceGraph, QueryService } from "../query.js";
import type { MetricBundle } from "../record.js";
import { IssueStore } from "../store.js";
import type { EmbeddingProvider } from "../types.js";
import { issueRecord, MemoryEmbeddingCache, recordMap } from "./helpers.js";

beforeAll(() => {
  log.setLevel("silent");
});

const C = "acme/widgets";

function metrics(overrides: Partial<MetricBundle>): MetricBundle {
  return {
    commentCount: 0,
    bodyReactions: 0,
    commentReactions: 0,
    positiveReactions: 0,
    negativeReactions: 0,
    totalReactions: 0,
    engagements: 0,
    engagementsPerDay: 0,
    ageDays: 0,
    daysSinceUpdate: 0,
    activityScore: 0,
    ...overrides,
  };
}

const fixedProvider: EmbeddingProvider = {
  name: "fixed",
  model: "fixed-v1",
  dimensions: 2,
  embed: async () => [0, 1],
  embedBatch: async (texts) => texts.map(() => [0, 1]),
};

const recommendationInput = {
  issue_number: 1,
  recommendation: "priority_high",
  confidence: "high",
  summary: "Fix the crash",
  rationale: "Many users hit it",
  report: "# Crash report",
  severity: "high",
  frequency: "medium",
  prevalence: "low",
  solution_complexity: "low",
  solution_risk: "low",
};

describe("buildReferenceGraph", () => {
  it("is symmetric and ignores missing or self references", () => {
    const graph = buildReferenceGraph(
      recordMap([
        issueRecord(1, {}, { references: [2, 1] }),
        issueRecord(2),
        issueRecord(3, {}, { references: [1, 99] }),
      ]),
    );
    expect(Object.fromEntries(graph)).toEqual({ 1: [2, 3], 2: [1], 3: [1] });
  });
});

describe("QueryService", () => {
  let dir: string;
  let store: IssueStore;
  let query: QueryService;

  beforeEach(() => {
    dir = mkdtempSync(resolve(tmpdir(), "issuedex-query-"));
    store = IssueStore.open(dir);
    store.upsertRecords(C, [
      issueRecord(1, { title: "Crash on save" }, { references: [2], embedding: [1, 0], metrics: metrics({ engagements: 5, activityScore: 0.2 }) }),
      issueRecord(
        2,
        { state: "closed" },
        { embedding: [0.9, 0.1], metrics: metrics({ engagements: 9, activityScore: 0.6 }), summary: "Saving crashes the editor" },
      ),
      issueRecord(3, {}, { references: [1], embedding: [0, 1], metrics: metrics({ engagements: 5 }) }),
      issueRecord(4),
    ]);
    query = new QueryService(store, C, new EmbeddingEngine(fixedProvider, new MemoryEmbeddingCache()));
  });

  afterEach(() => {
    store.close();
    rmSync(dir, { recursive: true, force: true });
  });

  it("returns an issue without its vector", () => {
    const issue = query.getIssue(1);
    expect(issue.title).toBe("Crash on save");
    expect("embedding" in issue).toBe(false);
    expect(() => query.getIssue(42)).toThrow(NotFoundError);
  });

  it("finds similar issues by number with an optional state filter", () => {
    expect(query.findSimilarIssues(1, 2).map((s) => s.number)).toEqual([2, 3]);
    expect(query.findSimilarIssues(1, 2, { state: "open" }).map((s) => s.number)).toEqual([3]);
    expect(() => query.findSimilarIssues(4)).toThrow(NotFoundError);
  });

  it("finds similar issues by free text", async () => {
    const hits = await query.findSimilarIssuesByText("anything", 2);
    expect(hits.map((s) => s.number)).toEqual([3, 2]);
    expect(hits[0].distance).toBe(0);

    const bare = new QueryService(store, C);
    await expect(bare.findSimilarIssuesByText("anything")).rejects.toBeInstanceOf(EmbeddingUnavailableError);
  });

  it("lists cross-referenced issues in both directions", () => {
    expect(query.findCrossReferencedIssues(1).map((s) => s.number)).toEqual([2, 3]);
    expect(query.findCrossReferencedIssues(2).map((s) => s.number)).toEqual([1]);
    expect(query.findCrossReferencedIssues(4)).toEqual([]);
  });

  it("ranks by a metric with ties in issue order", () => {
    expect(query.getTopIssues("engagements").map((r) => [r.number, r.value])).toEqual([
      [2, 9],
      [1, 5],
      [3, 5],
    ]);
    expect(query.getTopIssues("engagements", 10, "asc").map((r) => r.number)).toEqual([1, 3, 2]);
    expect(query.getTopIssues("engagements", 10, "desc", { state: "open" }).map((r) => r.number)).toEqual([1, 3]);
    expect(query.getTopIssues("engagements", 1).map((r) => r.number)).toEqual([2]);
    expect(() => query.getTopIssues("popularity")).toThrow(InvalidMetricError);
  });

  it("includes each ranked issue's summary", () => {
    const [first, second] = query.getTopIssues("engagements", 2);
    expect(first).toEqual({
      number: 2,
      title: "Issue 2",
      state: "closed",
      url: "https://github.com/acme/widgets/issues/2",
      summary: "Saving crashes the editor",
      value: 9,
    });
    expect(second.summary).toBeNull();
  });

  it("reports metrics and the metric catalogue", () => {
    expect(query.getIssueMetrics(1).metrics.engagements).toBe(5);
    expect(() => query.getIssueMetrics(4)).toThrow(NotFoundError);
    const names = query.getAvailableMetrics().map((m) => m.name);
    expect(names).toContain("knnDistance");
    expect(names).toHaveLength(12);
  });

  it("clusters near-duplicates around the most active member", () => {
    const clusters = query.findClusters(0.99);
    expect(clusters).toHaveLength(1);
    expect(clusters[0]).toMatchObject({ id: 1, members: [1, 2], representative: 2 });
  });

  it("stores recommendations and publishes a new snapshot", () => {
    const before = query.snapshot;
    expect(query.getFirstIssueWithoutRecommendation().number).toBe(1);

    const rec = query.addRecommendation(recommendationInput, new Date("2024-03-01T00:00:00.000Z"));
    expect(rec.priorityScore).toBe(12);
    expect(rec.meta.timestamp).toBe("2024-03-01T00:00:00.000Z");

    expect(before.records.get(1)?.recommendations).toEqual([]);
    expect(query.getIssue(1).recommendations).toEqual([rec]);
    expect(store.loadCollection(C).get(1)?.recommendations).toEqual([rec]);
    expect(query.getFirstIssueWithoutRecommendation().number).toBe(3);

    expect(query.getIssueByDifficulty("easy")).toEqual([
      { number: 1, title: "Crash on save", state: "open", url: "https://github.com/acme/widgets/issues/1", priorityScore: 12, recommendation: "priority_high" },
    ]);
    expect(query.getIssueByDifficulty("hard")).toEqual([]);
  });

  it("rejects recommendations for unknown issues or with bad fields", () => {
    expect(() => query.addRecommendation({ ...recommendationInput, issue_number: 42 })).toThrow(NotFoundError);
    expect(() => query.addRecommendation({ ...recommendationInput, summary: "  " })).toThrow(ValidationError);
  });

  it("describes the recommendation format", () => {
    expect(query.getRecommendationSchema().fields.recommendation.enum).toContain("close_completed");
  });

  it("sees new records only after refresh", () => {
    store.upsertRecords(C, [issueRecord(5)]);
    expect(() => query.getIssue(5)).toThrow(NotFoundError);
    query.refresh();
    expect(query.getIssue(5).number).toBe(5);
  });
});
