import { describe, expect, it } from "vitest";
import { findClusters, recencyFactor } from "../cluster.js";
import { SimilarityIndex } from "../similarity.js";
import { issueRecord, recordMap } from "./helpers.js";

const NOW = new Date("2024-02-01T00:00:00.000Z");

describe("recencyFactor", () => {
  it("halves every 30 days", () => {
    expect(recencyFactor("2024-02-01T00:00:00.000Z", NOW)).toBe(1);
    expect(recencyFactor("2024-01-02T00:00:00.000Z", NOW)).toBeCloseTo(0.5);
  });
});

describe("findClusters", () => {
  const records = recordMap([
    issueRecord(1, { title: "crash on save", updatedAt: "2024-01-05T00:00:00.000Z" }),
    issueRecord(2, { title: "save crashes editor", updatedAt: "2024-01-30T00:00:00.000Z" }),
    issueRecord(3, { title: "saving fails", updatedAt: "2024-01-10T00:00:00.000Z" }),
    issueRecord(4, { title: "dark mode", updatedAt: "2024-01-10T00:00:00.000Z" }),
    issueRecord(5, { title: "dark theme please", updatedAt: "2024-01-20T00:00:00.000Z" }),
    issueRecord(6, { title: "unrelated", updatedAt: "2024-01-20T00:00:00.000Z" }),
  ]);

  const index = SimilarityIndex.build([
    { number: 1, vector: [1, 0, 0] },
    { number: 2, vector: [1, 0.05, 0] },
    { number: 3, vector: [1, 0.1, 0] },
    { number: 4, vector: [0, 1, 0] },
    { number: 5, vector: [0, 1, 0.05] },
    { number: 6, vector: [0, 0, 1] },
  ]);

  it("groups connected components largest first", () => {
    const clusters = findClusters(index, records, { threshold: 0.95, now: NOW });
    expect(clusters.map((c) => c.members)).toEqual([
      [1, 2, 3],
      [4, 5],
    ]);
    expect(clusters.map((c) => c.id)).toEqual([1, 2]);
  });

  it("picks the most recently active member as representative", () => {
    const [first, second] = findClusters(index, records, { threshold: 0.95, now: NOW });
    expect(first.representative).toBe(2);
    expect(first.theme).toBe("save crashes editor");
    expect(second.representative).toBe(5);
  });

  it("reports the mean pairwise similarity", () => {
    const [, second] = findClusters(index, records, { threshold: 0.95, now: NOW });
    expect(second.avgSimilarity).toBeCloseTo(1 / Math.sqrt(1.0025), 5);
  });

  it("returns nothing when no pair clears the threshold", () => {
    expect(findClusters(index, records, { threshold: 0.9999, now: NOW })).toEqual([]);
  });
});
