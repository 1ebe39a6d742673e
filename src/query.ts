import { findClusters } from "./cluster.js";
import type { EmbeddingEngine } from "./embeddings.js";
import { EmbeddingUnavailableError, InvalidMetricError, NotFoundError } from "./errors.js";
import { isMetricName, METRIC_DESCRIPTIONS, METRIC_NAMES, type MetricName } from "./metrics.js";
import {
  buildRecommendation,
  type Difficulty,
  difficultyOf,
  parseRecommendationInput,
  type Recommendation,
  recommendationSchemaDoc,
} from "./recommendations.js";
import type { IssueRecord, MetricBundle, QuartileBundle, RecordState, StoredNeighbor } from "./record.js";
import { SimilarityIndex } from "./similarity.js";
import type { IssueStore } from "./store.js";
import type { Cluster, Neighbor } from "./types.js";

/** What readers see. Never mutated; writers publish a new one. */
export interface CollectionSnapshot {
  readonly collection: string;
  readonly records: ReadonlyMap<number, IssueRecord>;
  readonly index: SimilarityIndex;
  readonly referenceGraph: ReadonlyMap<number, readonly number[]>;
  readonly builtAt: Date;
}

/**
 * Symmetric "mentions" relation over records present in the collection:
 * if a references b, both a→b and b→a appear. Lists are ascending.
 */
export function buildReferenceGraph(records: ReadonlyMap<number, IssueRecord>): Map<number, number[]> {
  const edges = new Map<number, Set<number>>();
  const link = (a: number, b: number) => {
    let set = edges.get(a);
    if (!set) {
      set = new Set();
      edges.set(a, set);
    }
    set.add(b);
  };
  for (const r of records.values()) {
    for (const ref of r.references) {
      if (ref === r.number || !records.has(ref)) continue;
      link(r.number, ref);
      link(ref, r.number);
    }
  }
  const graph = new Map<number, number[]>();
  for (const [n, set] of edges) graph.set(n, [...set].sort((a, b) => a - b));
  return graph;
}

export function buildSnapshot(
  collection: string,
  records: ReadonlyMap<number, IssueRecord>,
  index?: SimilarityIndex,
  now: Date = new Date(),
): CollectionSnapshot {
  const idx =
    index ??
    SimilarityIndex.build(
      (function* () {
        for (const r of records.values()) if (r.embedding) yield { number: r.number, vector: r.embedding };
      })(),
    );
  return { collection, records, index: idx, referenceGraph: buildReferenceGraph(records), builtAt: now };
}

export function loadSnapshot(store: IssueStore, collection: string): CollectionSnapshot {
  return buildSnapshot(collection, store.loadCollection(collection));
}

export interface IssueSummary {
  number: number;
  title: string;
  state: RecordState;
  url: string;
}

export interface SimilarIssue extends IssueSummary {
  similarity: number;
  distance: number;
}

export type IssueView = Omit<IssueRecord, "embedding">;

export interface StateFilter {
  state?: RecordState;
}

export type SortDirection = "asc" | "desc";

function summarize(r: IssueRecord): IssueSummary {
  return { number: r.number, title: r.title, state: r.state, url: r.url };
}

function view(r: IssueRecord): IssueView {
  const { embedding: _embedding, ...rest } = r;
  return rest;
}

const round = (x: number) => Math.round(x * 10_000) / 10_000;

export class QueryService {
  private current: CollectionSnapshot;

  constructor(
    private readonly store: IssueStore,
    readonly collection: string,
    private readonly engine?: EmbeddingEngine,
    snapshot?: CollectionSnapshot,
  ) {
    this.current = snapshot ?? loadSnapshot(store, collection);
  }

  get snapshot(): CollectionSnapshot {
    return this.current;
  }

  /** Swaps in a new snapshot. Calls already running keep the one they started with. */
  publish(snapshot: CollectionSnapshot): void {
    this.current = snapshot;
  }

  refresh(): CollectionSnapshot {
    this.publish(loadSnapshot(this.store, this.collection));
    return this.current;
  }

  private require(snap: CollectionSnapshot, number: number): IssueRecord {
    const r = snap.records.get(number);
    if (!r) throw new NotFoundError(`issue #${number} not found in ${this.collection}`);
    return r;
  }

  getIssue(number: number): IssueView {
    return view(this.require(this.current, number));
  }

  findSimilarIssues(number: number, k = 5, filter: StateFilter = {}): SimilarIssue[] {
    const snap = this.current;
    this.require(snap, number);
    if (!snap.index.has(number)) {
      throw new NotFoundError(`issue #${number} has no embedding yet. run \`issuedex enrich\` first`);
    }
    return this.pick(snap, snap.index.nearestTo(number, snap.index.size), k, filter);
  }

  async findSimilarIssuesByText(text: string, k = 5, filter: StateFilter = {}): Promise<SimilarIssue[]> {
    if (!this.engine) throw new EmbeddingUnavailableError("no embedding provider configured for text search");
    const snap = this.current;
    const vector = await this.engine.embedText(text);
    if (!vector) throw new EmbeddingUnavailableError("could not embed the query text");
    return this.pick(snap, snap.index.nearest(vector, snap.index.size), k, filter);
  }

  private pick(snap: CollectionSnapshot, neighbors: readonly Neighbor[], k: number, filter: StateFilter): SimilarIssue[] {
    const out: SimilarIssue[] = [];
    for (const n of neighbors) {
      if (out.length >= k) break;
      const r = snap.records.get(n.number);
      if (!r || (filter.state && r.state !== filter.state)) continue;
      out.push({ ...summarize(r), similarity: round(1 - n.distance), distance: round(n.distance) });
    }
    return out;
  }

  findCrossReferencedIssues(number: number): IssueSummary[] {
    const snap = this.current;
    this.require(snap, number);
    const out: IssueSummary[] = [];
    for (const n of snap.referenceGraph.get(number) ?? []) {
      const r = snap.records.get(n);
      if (r) out.push(summarize(r));
    }
    return out;
  }

  getIssueMetrics(number: number): {
    number: number;
    metrics: MetricBundle;
    quartiles: QuartileBundle;
    neighbors: StoredNeighbor[];
  } {
    const r = this.require(this.current, number);
    if (!r.metrics) throw new NotFoundError(`issue #${number} has no metrics yet. run \`issuedex enrich\` first`);
    return { number, metrics: r.metrics, quartiles: r.quartiles ?? {}, neighbors: r.neighbors ?? [] };
  }

  /** Ties keep ascending issue numbers in either direction. Records without the metric are left out. */
  getTopIssues(metric: string, n = 10, direction: SortDirection = "desc", filter: StateFilter = {}) {
    if (!isMetricName(metric)) throw new InvalidMetricError(metric, METRIC_NAMES);
    const rows: Array<IssueSummary & { summary: string | null; value: number }> = [];
    for (const r of this.current.records.values()) {
      const value = r.metrics?.[metric];
      if (value === undefined) continue;
      if (filter.state && r.state !== filter.state) continue;
      rows.push({ ...summarize(r), summary: r.summary ?? null, value });
    }
    const sign = direction === "asc" ? 1 : -1;
    rows.sort((a, b) => sign * (a.value - b.value) || a.number - b.number);
    return rows.slice(0, n);
  }

  getAvailableMetrics(): Array<{ name: MetricName; description: string }> {
    return METRIC_NAMES.map((name) => ({ name, description: METRIC_DESCRIPTIONS[name] }));
  }

  findClusters(threshold = 0.85, minSize = 2, now: Date = new Date()): Cluster[] {
    const snap = this.current;
    return findClusters(snap.index, snap.records, { threshold, minSize, now });
  }

  /** Validates and stores a recommendation, then publishes a snapshot that includes it. */
  addRecommendation(input: unknown, now: Date = new Date()): Recommendation {
    const parsed = parseRecommendationInput(input);
    const snap = this.current;
    const record = this.require(snap, parsed.issue_number);
    const rec = buildRecommendation(parsed, now);
    this.store.addRecommendation(this.collection, record.number, rec);

    const records = new Map(snap.records);
    records.set(record.number, { ...record, recommendations: [...record.recommendations, rec] });
    this.publish({ ...snap, records });
    return rec;
  }

  getRecommendationSchema() {
    return recommendationSchemaDoc();
  }

  getFirstIssueWithoutRecommendation(state: RecordState = "open"): IssueView {
    const candidates = [...this.current.records.values()]
      .filter((r) => r.state === state && r.recommendations.length === 0)
      .sort((a, b) => a.number - b.number);
    const first = candidates[0];
    if (!first) throw new NotFoundError(`every ${state} issue already has a recommendation`);
    return view(first);
  }

  /** Issues whose latest recommendation has the given difficulty, highest priority first. */
  getIssueByDifficulty(difficulty: Difficulty, limit = 10): Array<IssueSummary & { priorityScore: number; recommendation: string }> {
    const out: Array<IssueSummary & { priorityScore: number; recommendation: string }> = [];
    for (const r of this.current.records.values()) {
      const latest = r.recommendations.at(-1);
      if (!latest || r.state !== "open" || difficultyOf(latest) !== difficulty) continue;
      out.push({ ...summarize(r), priorityScore: latest.priorityScore, recommendation: latest.recommendation });
    }
    out.sort((a, b) => b.priorityScore - a.priorityScore || a.number - b.number);
    return out.slice(0, limit);
  }
}
