export type ItemType = "issue" | "pr";

export const ITEM_TYPES: readonly ItemType[] = ["issue", "pr"];

export interface FetchCheckpoint {
  startDate: string;
  /** End of the last complete window whose records were durably merged. */
  lastWindowEnd?: string;
}

export interface FetchWindow {
  index: number;
  start: Date;
  end: Date;
  /** false for the trailing window that stops at "now" */
  complete: boolean;
}

/**
 * Upstream issue tracker. Returns loosely shaped records updated in
 * [windowStart, windowEnd); the merge engine validates them.
 */
export interface SourceAdapter {
  fetch(
    repo: string,
    itemTypes: readonly ItemType[],
    windowStart: Date,
    windowEnd: Date,
    signal?: AbortSignal,
  ): Promise<unknown[]>;
  fetchIssues?(repo: string, numbers: readonly number[], signal?: AbortSignal): Promise<unknown[]>;
}

export interface RateLimitInfo {
  remaining: number;
  limit: number;
  resetAt: Date;
}

export interface EmbeddingProvider {
  readonly name: string;
  readonly model: string;
  dimensions: number;
  embed(text: string): Promise<number[]>;
  embedBatch(texts: string[]): Promise<number[][]>;
}

export interface LLMProvider {
  readonly model: string;
  complete(prompt: string, systemPrompt?: string): Promise<string>;
}

/** Content-addressed: key = hash of the exact payload. Never evicted. */
export interface EmbeddingCache {
  getEmbedding(key: string): number[] | undefined;
  putEmbedding(key: string, model: string, vector: number[]): void;
}

export interface CompletionCache {
  getCompletion(key: string): string | undefined;
  putCompletion(key: string, model: string, text: string): void;
}

export interface Neighbor {
  number: number;
  distance: number;
}

export interface Cluster {
  id: number;
  members: number[];
  representative: number;
  avgSimilarity: number;
  theme: string;
}
