import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { resolve } from "node:path";
import { afterEach, beforeAll, beforeEach, describe, expect, it } from "vitest";
import { collectionName, type IssuedexConfig, parseConfig } from "../config.js";
import { EmbeddingEngine } from "../embeddings.js";
import { CollectionLockedError, SourceUnavailableError, TransientSourceError } from "../errors.js";
import { log } from "../log.js";
import { runClean, runEnrich, runPull, runUpdate } from "../pipeline.js";
import { QueryService } from "../query.js";
import type { SourceRecordInput } from "../record.js";
import { IssueStore } from "../store.js";
import type { ItemType, LLMProvider, SourceAdapter } from "../types.js";
import { KeywordEmbeddings, rawIssue, REPO } from "./helpers.js";

beforeAll(() => {
  log.setLevel("silent");
});

class FakeSource implements SourceAdapter {
  items: SourceRecordInput[] = [];
  readonly calls: Array<{ start: string; end: string }> = [];
  failWhen?: (start: Date) => Error | undefined;

  async fetch(_repo: string, itemTypes: readonly ItemType[], start: Date, end: Date): Promise<unknown[]> {
    this.calls.push({ start: start.toISOString(), end: end.toISOString() });
    const failure = this.failWhen?.(start);
    if (failure) throw failure;
    return this.items
      .filter((i) => itemTypes.includes(i.itemType ?? "issue"))
      .filter((i) => {
        const t = Date.parse(i.updatedAt);
        return t >= start.getTime() && t < end.getTime();
      })
      .map((i) => ({ ...i }));
  }

  async fetchIssues(_repo: string, numbers: readonly number[]): Promise<unknown[]> {
    return this.items.filter((i) => numbers.includes(i.number)).map((i) => ({ ...i }));
  }

  upsert(item: SourceRecordInput): void {
    this.items = [...this.items.filter((i) => i.number !== item.number), item];
  }
}

const NOTEBOOK = { body: "Cell execution in the notebook never finishes." };
const KEYBOARD = { body: "The keyboard shortcut does nothing." };

function notebookIssue(number: number, updatedAt: string) {
  return rawIssue(number, { ...NOTEBOOK, title: "Notebook execution stalls", updatedAt });
}

function keyboardIssue(number: number, updatedAt: string, overrides: Partial<SourceRecordInput> = {}) {
  return rawIssue(number, { ...KEYBOARD, title: "Keyboard shortcut ignored", updatedAt, ...overrides });
}

const FIRST_NOW = new Date("2024-01-23T12:00:00.000Z");
const C = collectionName(REPO);

describe("pipeline", () => {
  let dir: string;
  let store: IssueStore;
  let source: FakeSource;
  let config: IssuedexConfig;
  let provider: KeywordEmbeddings;
  let engine: EmbeddingEngine;

  beforeEach(() => {
    dir = mkdtempSync(resolve(tmpdir(), "issuedex-pipeline-"));
    store = IssueStore.open(dir);
    source = new FakeSource();
    source.items = [
      notebookIssue(1001, "2024-01-03T00:00:00.000Z"),
      keyboardIssue(1002, "2024-01-04T00:00:00.000Z"),
      notebookIssue(1005, "2024-01-09T00:00:00.000Z"),
      keyboardIssue(1006, "2024-01-10T00:00:00.000Z"),
      notebookIssue(1008, "2024-01-16T00:00:00.000Z"),
      keyboardIssue(1009, "2024-01-17T00:00:00.000Z"),
      notebookIssue(1010, "2024-01-23T01:00:00.000Z"),
    ];
    config = parseConfig({ repo: REPO, start_date: "2024-01-01", fetch: { window_days: 7, max_attempts: 2 } });
    provider = new KeywordEmbeddings();
    engine = new EmbeddingEngine(provider, store, { maxAttempts: 1 });
  });

  afterEach(() => {
    store.close();
    rmSync(dir, { recursive: true, force: true });
  });

  const pull = (now: Date, extra: { force?: boolean; issues?: number[] } = {}) =>
    runPull({ store, source, config, collection: C, now, sleep: async () => {}, ...extra });

  it("fetches every window in order and checkpoints the last complete one", async () => {
    const result = await pull(FIRST_NOW);
    expect(source.calls).toEqual([
      { start: "2024-01-01T00:00:00.000Z", end: "2024-01-08T00:00:00.000Z" },
      { start: "2024-01-08T00:00:00.000Z", end: "2024-01-15T00:00:00.000Z" },
      { start: "2024-01-15T00:00:00.000Z", end: "2024-01-22T00:00:00.000Z" },
      { start: "2024-01-22T00:00:00.000Z", end: "2024-01-23T12:00:00.000Z" },
    ]);
    expect(result).toMatchObject({ windows: 4, fetched: 7, inserted: 7, updated: 0, rejected: 0 });
    expect(store.getCheckpoint(C, "issue")).toEqual({ startDate: "2024-01-01", lastWindowEnd: "2024-01-22T00:00:00.000Z" });
  });

  it("groups notebook and keyboard issues after enrichment", async () => {
    await pull(FIRST_NOW);
    const enriched = await runEnrich({ store, config, collection: C, engine, now: FIRST_NOW });
    expect(enriched.embedded).toBe(7);
    expect(enriched.saved).toBe(7);

    const query = new QueryService(store, C, engine, enriched.snapshot);
    expect(query.findSimilarIssues(1001, 3).map((s) => s.number)).toEqual([1005, 1008, 1010]);
    expect(query.findSimilarIssues(1002, 2).map((s) => s.number)).toEqual([1006, 1009]);
    expect(query.findSimilarIssues(1001, 3)[0].similarity).toBe(1);

    const persisted = store.loadCollection(C);
    expect(persisted.get(1001)?.metrics?.commentCount).toBe(0);
    expect(persisted.get(1001)?.quartiles).toBeDefined();

    const neighbors = persisted.get(1001)?.neighbors ?? [];
    expect(neighbors.map((n) => n.number)).toEqual([1005, 1008, 1010, 1002]);
    expect(neighbors[0]).toEqual({ number: 1005, title: "Notebook execution stalls", distance: 0 });
    expect(neighbors[3].title).toBe("Keyboard shortcut ignored");
    expect(persisted.get(1001)?.metrics?.knnDistance).toBeCloseTo(neighbors[3].distance / 4);
    expect(query.getIssueMetrics(1001).neighbors).toEqual(neighbors);
  });

  it("leaves rows and checkpoint alone when nothing new arrives", async () => {
    await pull(FIRST_NOW);
    const rows = store.loadRawRows(C);
    const checkpoint = store.getCheckpoint(C, "issue");

    const again = await pull(new Date("2024-01-23T18:00:00.000Z"));
    expect(again).toMatchObject({ windows: 1, fetched: 1, inserted: 0, updated: 0 });
    expect(store.loadRawRows(C)).toEqual(rows);
    expect(store.getCheckpoint(C, "issue")).toEqual(checkpoint);
  });

  it("keeps an existing embedding when only the state changes", async () => {
    await pull(FIRST_NOW);
    await runEnrich({ store, config, collection: C, engine, now: FIRST_NOW });
    const before = store.loadCollection(C);

    source.upsert(keyboardIssue(1011, "2024-01-24T00:00:00.000Z"));
    source.upsert({ ...notebookIssue(1001, "2024-01-24T01:00:00.000Z"), state: "closed" });
    const second = await pull(new Date("2024-01-25T00:00:00.000Z"));
    expect(second).toMatchObject({ inserted: 1, updated: 1 });
    expect(second.contentChanged).toEqual([1011]);

    const after = store.loadCollection(C);
    expect(after.get(1001)?.state).toBe("closed");
    expect(after.get(1001)?.embedding).toEqual(before.get(1001)?.embedding);
    expect(after.get(1001)?.embeddingKey).toBe(before.get(1001)?.embeddingKey);
    expect(after.get(1011)?.embedding).toBeUndefined();

    const next = await runEnrich({ store, config, collection: C, engine, now: new Date("2024-01-25T00:00:00.000Z") });
    expect(next.embedded).toBe(1);
    expect(store.loadCollection(C).get(1011)?.embedding).toHaveLength(3);
  });

  it("drops a stale embedding when re-embedding fails", async () => {
    await pull(FIRST_NOW);
    await runEnrich({ store, config, collection: C, engine, now: FIRST_NOW });

    source.upsert(keyboardIssue(1002, "2024-01-24T00:00:00.000Z", { body: "The keyboard shortcut does nothing. BROKEN" }));
    await pull(new Date("2024-01-25T00:00:00.000Z"));
    provider.failOn.add("BROKEN");

    const result = await runEnrich({ store, config, collection: C, engine, now: new Date("2024-01-25T00:00:00.000Z") });
    expect(result).toMatchObject({ embedded: 0, embeddingFailed: 1 });
    const rec = store.loadCollection(C).get(1002);
    expect(rec?.embedding).toBeUndefined();
    expect(rec?.embeddingKey).toBeUndefined();
    expect(rec?.metrics?.knnDistance).toBeUndefined();
    expect(rec?.neighbors).toEqual([]);
  });

  it("stops at the failing window and keeps the earlier checkpoint", async () => {
    source.failWhen = (start) =>
      start.getTime() >= Date.parse("2024-01-08T00:00:00.000Z") ? new TransientSourceError("bad gateway") : undefined;

    await expect(pull(FIRST_NOW)).rejects.toBeInstanceOf(SourceUnavailableError);
    expect(source.calls).toHaveLength(3);
    expect(store.getCheckpoint(C, "issue")).toEqual({ startDate: "2024-01-01", lastWindowEnd: "2024-01-08T00:00:00.000Z" });
    expect([...store.loadCollection(C).keys()]).toEqual([1001, 1002]);
    expect(() => store.acquireLock(C, "someone-else", 60_000)).not.toThrow();
  });

  it("refuses to run while another process holds the collection", async () => {
    store.acquireLock(C, "someone-else", 60_000);
    await expect(pull(FIRST_NOW)).rejects.toBeInstanceOf(CollectionLockedError);
    await expect(runEnrich({ store, config, collection: C, engine })).rejects.toBeInstanceOf(CollectionLockedError);
    expect(source.calls).toHaveLength(0);
  });

  it("stops committing once another run takes over an expired lock", async () => {
    source.failWhen = (start) => {
      if (start.getTime() >= Date.parse("2024-01-08T00:00:00.000Z")) {
        store.acquireLock(C, "enrich@other-host", 30 * 60_000, new Date(Date.now() + 31 * 60_000));
      }
      return undefined;
    };

    await expect(pull(FIRST_NOW)).rejects.toBeInstanceOf(CollectionLockedError);
    expect(source.calls).toHaveLength(2);
    expect(store.getCheckpoint(C, "issue")).toEqual({ startDate: "2024-01-01", lastWindowEnd: "2024-01-08T00:00:00.000Z" });
    expect([...store.loadCollection(C).keys()]).toEqual([1001, 1002]);
    expect(() => store.acquireLock(C, "someone-else", 60_000)).toThrow("locked by enrich@other-host");
  });

  it("does not save an enrichment after losing the lock", async () => {
    await pull(FIRST_NOW);
    const before = store.loadCollection(C).get(1001);
    const result = runEnrich({
      store,
      config,
      collection: C,
      engine,
      onProgress: () => store.acquireLock(C, "pull@other-host", 30 * 60_000, new Date(Date.now() + 31 * 60_000)),
    });

    await expect(result).rejects.toBeInstanceOf(CollectionLockedError);
    expect(store.loadCollection(C).get(1001)?.embedding).toEqual(before?.embedding);
    expect(store.loadCollection(C).get(1001)?.metrics).toEqual(before?.metrics);
  });

  it("cleans only while no other run holds the collection", async () => {
    await pull(FIRST_NOW);
    store.acquireLock(C, "pull@other-host", 60_000);
    await expect(runClean(store, C, { ttlMinutes: 30 })).rejects.toBeInstanceOf(CollectionLockedError);
    expect(store.loadCollection(C).size).toBe(7);

    store.releaseLock(C, "pull@other-host");
    store.putEmbedding("m:abc", "m", [1, 2]);
    await expect(runClean(store, C, { ttlMinutes: 30, caches: true })).resolves.toEqual({
      caches: { embeddings: 1, completions: 0 },
    });
    expect(store.loadCollection(C).size).toBe(0);
    expect(store.getCheckpoint(C, "issue")).toBeUndefined();
  });

  it("fetches specific issues without touching checkpoints", async () => {
    const result = await pull(FIRST_NOW, { issues: [1002, 1006] });
    expect(result).toMatchObject({ fetched: 2, inserted: 2, windows: 0 });
    expect(store.getCheckpoint(C, "issue")).toBeUndefined();
    expect(source.calls).toHaveLength(0);
  });

  it("force replans from the start date", async () => {
    await pull(FIRST_NOW);
    const result = await pull(new Date("2024-01-23T18:00:00.000Z"), { force: true });
    expect(result.windows).toBe(4);
    expect(result.inserted).toBe(0);
  });

  it("update pulls then enriches and stores summaries", async () => {
    const llm: LLMProvider = { model: "fake-llm", complete: async () => "Short summary." };
    const result = await runUpdate({ store, source, config, collection: C, engine, llm, now: FIRST_NOW });
    expect(result.pull.inserted).toBe(7);
    expect(result.enrich.summarized).toBe(7);
    expect(store.loadCollection(C).get(1001)?.summary).toBe("Short summary.");
  });
});
