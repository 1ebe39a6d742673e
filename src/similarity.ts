import { NotFoundError } from "./errors.js";
import type { Neighbor } from "./types.js";

/**
 * Cosine similarity of two equal-length vectors, 0 when either is all zeros.
 * Accepts Float32Array or number[]; only index access is used.
 */
export function cosineSimilarity(a: ArrayLike<number>, b: ArrayLike<number>): number {
  let dot = 0,
    normA = 0,
    normB = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }
  const denom = Math.sqrt(normA) * Math.sqrt(normB);
  return denom === 0 ? 0 : dot / denom;
}

/**
 * Check if a vector is all zeros (failed embedding).
 */
export function isZeroVector(v: ArrayLike<number>): boolean {
  for (let i = 0; i < v.length; i++) {
    if (v[i] !== 0) return false;
  }
  return true;
}

export interface IndexEntry {
  number: number;
  vector: ArrayLike<number>;
}

interface Stored {
  number: number;
  vector: Float32Array;
  norm: number;
}

function byDistanceThenNumber(a: Neighbor, b: Neighbor): number {
  return a.distance - b.distance || a.number - b.number;
}

/**
 * Exact, immutable nearest-neighbour index over cosine distance
 * (1 - cosine similarity). Ties go to the lower issue number.
 */
export class SimilarityIndex {
  private readonly entries: Stored[];
  private readonly byNumber: Map<number, Stored>;
  readonly dimensions: number;
  /** entries rejected at build time (zero or wrong-dimension vectors) */
  readonly skipped: number;

  private constructor(entries: Stored[], dimensions: number, skipped: number) {
    this.entries = entries;
    this.byNumber = new Map(entries.map((e) => [e.number, e]));
    this.dimensions = dimensions;
    this.skipped = skipped;
  }

  static empty(): SimilarityIndex {
    return new SimilarityIndex([], 0, 0);
  }

  /** Zero vectors and vectors whose dimension differs from the majority are left out. */
  static build(input: Iterable<IndexEntry>): SimilarityIndex {
    const all = [...input];
    const candidates = all.filter((e) => e.vector.length > 0);
    const dimCounts = new Map<number, number>();
    for (const e of candidates) dimCounts.set(e.vector.length, (dimCounts.get(e.vector.length) ?? 0) + 1);
    let dimensions = 0;
    let best = 0;
    for (const [dim, n] of dimCounts) {
      if (n > best || (n === best && dim > dimensions)) {
        dimensions = dim;
        best = n;
      }
    }

    const entries: Stored[] = [];
    let skipped = 0;
    for (const e of candidates) {
      if (e.vector.length !== dimensions || isZeroVector(e.vector)) {
        skipped++;
        continue;
      }
      const vector = Float32Array.from(e.vector);
      let sq = 0;
      for (let i = 0; i < vector.length; i++) sq += vector[i] * vector[i];
      entries.push({ number: e.number, vector, norm: Math.sqrt(sq) });
    }
    entries.sort((a, b) => a.number - b.number);
    return new SimilarityIndex(entries, dimensions, skipped + (all.length - candidates.length));
  }

  get size(): number {
    return this.entries.length;
  }

  has(number: number): boolean {
    return this.byNumber.has(number);
  }

  numbers(): number[] {
    return this.entries.map((e) => e.number);
  }

  private distance(query: ArrayLike<number>, queryNorm: number, entry: Stored): number {
    if (queryNorm === 0 || entry.norm === 0) return 1;
    let dot = 0;
    for (let i = 0; i < entry.vector.length; i++) dot += query[i] * entry.vector[i];
    const d = 1 - dot / (queryNorm * entry.norm);
    // float noise around identical vectors
    return Math.abs(d) < 1e-9 ? 0 : d;
  }

  /** k nearest entries to `vector`, excluding the numbers in `exclude`. */
  nearest(vector: ArrayLike<number>, k: number, exclude: ReadonlySet<number> = new Set()): Neighbor[] {
    if (k <= 0 || vector.length !== this.dimensions) return [];
    let sq = 0;
    for (let i = 0; i < vector.length; i++) sq += vector[i] * vector[i];
    const norm = Math.sqrt(sq);
    const scored: Neighbor[] = [];
    for (const e of this.entries) {
      if (exclude.has(e.number)) continue;
      scored.push({ number: e.number, distance: this.distance(vector, norm, e) });
    }
    scored.sort(byDistanceThenNumber);
    return scored.slice(0, k);
  }

  nearestTo(number: number, k: number, exclude: ReadonlySet<number> = new Set()): Neighbor[] {
    const entry = this.byNumber.get(number);
    if (!entry) throw new NotFoundError(`issue #${number} has no embedding`);
    return this.nearest(entry.vector, k, new Set([...exclude, number]));
  }

  /**
   * The k nearest other entries, or undefined when the number is not
   * indexed or fewer than k others exist.
   */
  knnNeighbors(number: number, k = 4): Neighbor[] | undefined {
    if (!this.byNumber.has(number) || this.entries.length - 1 < k) return undefined;
    return this.nearestTo(number, k);
  }

  /** Mean distance over {@link knnNeighbors}. */
  knnDistance(number: number, k = 4): number | undefined {
    const neighbors = this.knnNeighbors(number, k);
    if (!neighbors) return undefined;
    return neighbors.reduce((sum, n) => sum + n.distance, 0) / neighbors.length;
  }

  /** Cosine similarity between two indexed records, undefined if either is missing. */
  similarity(a: number, b: number): number | undefined {
    const ea = this.byNumber.get(a);
    const eb = this.byNumber.get(b);
    if (!ea || !eb) return undefined;
    return cosineSimilarity(ea.vector, eb.vector);
  }

  /** Unordered pairs with similarity >= threshold, scanned brute force. */
  similarPairs(threshold: number): Array<[number, number, number]> {
    const pairs: Array<[number, number, number]> = [];
    for (let i = 0; i < this.entries.length; i++) {
      const a = this.entries[i];
      for (let j = i + 1; j < this.entries.length; j++) {
        const b = this.entries[j];
        const sim = 1 - this.distance(a.vector, a.norm, b);
        if (sim >= threshold) pairs.push([a.number, b.number, sim]);
      }
    }
    return pairs;
  }
}
