import { randomUUID } from "node:crypto";
import { hostname } from "node:os";
import type { IssuedexConfig } from "./config.js";
import { type EmbeddingEngine, prepareEmbeddingText } from "./embeddings.js";
import { AuthError, errorMessage, isAbortError, isRetryable, IssuedexError, SourceUnavailableError, ValidationError } from "./errors.js";
import { log } from "./log.js";
import { mergeRecords } from "./merge.js";
import { assignQuartiles, computeMetrics, type ActivityWeights } from "./metrics.js";
import { advanceCheckpoint, parseStartDate, planWindows } from "./planner.js";
import { buildSnapshot, type CollectionSnapshot } from "./query.js";
import type { IssueRecord } from "./record.js";
import { withRetry } from "./retry.js";
import { SimilarityIndex } from "./similarity.js";
import type { IssueStore } from "./store.js";
import { summarizeRecords } from "./summarizer.js";
import type { FetchCheckpoint, FetchWindow, ItemType, LLMProvider, SourceAdapter } from "./types.js";

type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export function lockHolder(task: string): string {
  return `${task}@${hostname()}:${process.pid}:${randomUUID().slice(0, 8)}`;
}

/** A held collection lock, as handed to the body of {@link withCollectionLock}. */
export interface CollectionLock {
  readonly holder: string;
  /** Restarts the expiry clock. Throws CollectionLockedError once another run has taken the lock. */
  renew(): void;
}

/**
 * Runs `fn` while holding the collection lock; the lock is released however
 * `fn` ends. Besides the renewals `fn` makes between steps, a timer renews
 * the lock every third of its TTL.
 */
export async function withCollectionLock<T>(
  store: IssueStore,
  collection: string,
  opts: { holder: string; ttlMinutes: number; now?: Date },
  fn: (lock: CollectionLock) => Promise<T>,
): Promise<T> {
  const ttlMs = opts.ttlMinutes * 60_000;
  store.acquireLock(collection, opts.holder, ttlMs, opts.now);
  const lock: CollectionLock = { holder: opts.holder, renew: () => store.renewLock(collection, opts.holder) };

  const heartbeat = setInterval(() => {
    try {
      lock.renew();
    } catch (err) {
      // the next holder-checked write fails the run
      log.warn(`lock renewal for ${collection} failed: ${errorMessage(err)}`);
      clearInterval(heartbeat);
    }
  }, Math.max(1_000, Math.floor(ttlMs / 3)));
  heartbeat.unref();

  try {
    return await fn(lock);
  } finally {
    clearInterval(heartbeat);
    store.releaseLock(collection, opts.holder);
  }
}

export interface PullOptions {
  store: IssueStore;
  source: SourceAdapter;
  config: IssuedexConfig;
  collection: string;
  /** replan from start_date, ignoring checkpoints */
  force?: boolean;
  /** fetch only these issue numbers; checkpoints are not touched */
  issues?: readonly number[];
  now?: Date;
  signal?: AbortSignal;
  sleep?: Sleep;
  onWindow?: (itemType: ItemType, window: FetchWindow, fetched: number) => void;
}

export interface PullResult {
  windows: number;
  fetched: number;
  inserted: number;
  updated: number;
  rejected: number;
  /** numbers whose text changed and need a new embedding */
  contentChanged: number[];
}

function emptyPull(): PullResult {
  return { windows: 0, fetched: 0, inserted: 0, updated: 0, rejected: 0, contentChanged: [] };
}

async function fetchWithRetry<T>(what: string, fn: () => Promise<T>, opts: PullOptions): Promise<T> {
  try {
    return await withRetry(fn, {
      maxAttempts: opts.config.fetch.max_attempts,
      signal: opts.signal,
      sleep: opts.sleep,
      onRetry: (err, attempt, waitMs) =>
        log.warn(`${what}: attempt ${attempt} failed (${errorMessage(err)}), retrying in ${Math.ceil(waitMs / 1000)}s`),
    });
  } catch (err) {
    if (isAbortError(err) || err instanceof AuthError || err instanceof SourceUnavailableError) throw err;
    if (isRetryable(err) || !(err instanceof IssuedexError)) {
      throw new SourceUnavailableError(`${what}: giving up after ${opts.config.fetch.max_attempts} attempts: ${errorMessage(err)}`, {
        cause: err,
      });
    }
    throw err;
  }
}

/**
 * Fetches every planned window in order, merging and committing each one
 * together with its checkpoint before the next is requested. A failed window
 * ends the run and leaves the checkpoint at the last committed window.
 */
export async function runPull(opts: PullOptions): Promise<PullResult> {
  const { store, config, collection, signal } = opts;
  const now = opts.now ?? new Date();
  const result = emptyPull();
  const changed = new Set<number>();

  return withCollectionLock(store, collection, { holder: lockHolder("pull"), ttlMinutes: config.lock_ttl_minutes }, async (lock) => {
    let records = store.loadCollection(collection);

    if (opts.issues && opts.issues.length > 0) {
      const fetchIssues = opts.source.fetchIssues?.bind(opts.source);
      if (!fetchIssues) throw new ValidationError("this source cannot fetch individual issues", []);
      const numbers = opts.issues;
      const raw = await fetchWithRetry(`issues ${numbers.join(",")}`, () => fetchIssues(config.repo, numbers, signal), opts);
      const merged = mergeRecords(records, raw, config.repo, now);
      store.upsertRecords(collection, merged.upserts, lock.holder);
      result.fetched = raw.length;
      result.inserted = merged.inserted;
      result.updated = merged.updated;
      result.rejected = merged.rejected.length;
      result.contentChanged = [...merged.contentChanged].sort((a, b) => a - b);
      return result;
    }

    const startDate = parseStartDate(config.start_date);
    for (const itemType of config.item_types) {
      const stored = store.getCheckpoint(collection, itemType);
      let checkpoint: FetchCheckpoint =
        !stored || stored.startDate !== config.start_date ? { startDate: config.start_date } : stored;
      if (stored && stored.startDate !== config.start_date) {
        log.info(`${itemType}: start date changed from ${stored.startDate} to ${config.start_date}, replanning`);
      }

      for (const window of planWindows({ startDate, checkpoint, now, widthDays: config.fetch.window_days, force: opts.force })) {
        signal?.throwIfAborted();
        const label = `${itemType} window ${window.start.toISOString().slice(0, 10)}..${window.end.toISOString().slice(0, 10)}`;
        const raw = await fetchWithRetry(label, () => opts.source.fetch(config.repo, [itemType], window.start, window.end, signal), opts);

        const merged = mergeRecords(records, raw, config.repo, now);
        records = merged.records;
        checkpoint = advanceCheckpoint(checkpoint, window);
        store.commitWindow(collection, itemType, merged.upserts, checkpoint, lock.holder);
        lock.renew();

        result.windows++;
        result.fetched += raw.length;
        result.inserted += merged.inserted;
        result.updated += merged.updated;
        result.rejected += merged.rejected.length;
        for (const n of merged.contentChanged) changed.add(n);
        log.debug(`${label}: ${raw.length} fetched, ${merged.inserted} new, ${merged.updated} updated`);
        opts.onWindow?.(itemType, window, raw.length);
      }
    }

    result.contentChanged = [...changed].sort((a, b) => a - b);
    return result;
  });
}

export interface EnrichOptions {
  store: IssueStore;
  config: IssuedexConfig;
  collection: string;
  engine: EmbeddingEngine;
  /** summaries are generated only when set */
  llm?: LLMProvider;
  now?: Date;
  signal?: AbortSignal;
  onProgress?: (stage: "embed" | "summarize", done: number, total: number) => void;
}

export interface EnrichResult {
  embedded: number;
  /** records left without an embedding because the provider failed for them */
  embeddingFailed: number;
  summarized: number;
  saved: number;
  snapshot: CollectionSnapshot;
}

function activityWeights(config: IssuedexConfig): ActivityWeights {
  const a = config.metrics.activity;
  return { recencyWeight: a.recency_weight, engagementWeight: a.engagement_weight, halfLifeDays: a.half_life_days };
}

/**
 * Embeds records whose text changed since their last embedding, rebuilds
 * the similarity index, recomputes metrics and quartiles over the whole
 * collection, and writes everything back under the collection lock.
 */
export async function runEnrich(opts: EnrichOptions): Promise<EnrichResult> {
  const { store, config, collection, engine, signal } = opts;
  const now = opts.now ?? new Date();

  return withCollectionLock(store, collection, { holder: lockHolder("enrich"), ttlMinutes: config.lock_ttl_minutes }, async (lock) => {
    const loaded = store.loadCollection(collection);
    const records: IssueRecord[] = [...loaded.values()].map((r) => ({ ...r }));

    const stale: Array<{ record: IssueRecord; text: string; key: string }> = [];
    for (const record of records) {
      const text = prepareEmbeddingText(record);
      const key = engine.keyFor(text);
      if (!record.embedding || record.embeddingKey !== key) stale.push({ record, text, key });
    }

    let embedded = 0;
    let embeddingFailed = 0;
    if (stale.length > 0) {
      log.info(`embedding ${stale.length} of ${records.length} records with ${engine.model}`);
      const vectors = await engine.embedTexts(
        stale.map((s) => s.text),
        {
          signal,
          onProgress: (done, total) => {
            lock.renew();
            opts.onProgress?.("embed", done, total);
          },
        },
      );
      stale.forEach(({ record, key }, i) => {
        const vector = vectors[i];
        if (vector) {
          record.embedding = vector;
          record.embeddingKey = key;
          embedded++;
        } else {
          delete record.embedding;
          delete record.embeddingKey;
          embeddingFailed++;
        }
      });
      if (embeddingFailed > 0) log.warn(`${embeddingFailed} records could not be embedded and are left out of similarity`);
    }

    const index = SimilarityIndex.build(
      records.flatMap((r) => (r.embedding ? [{ number: r.number, vector: r.embedding }] : [])),
    );
    if (index.skipped > 0) log.warn(`${index.skipped} embeddings skipped (zero vector or dimension mismatch)`);

    const activity = activityWeights(config);
    const titles = new Map(records.map((r) => [r.number, r.title]));
    for (const r of records) {
      const near = index.knnNeighbors(r.number, config.metrics.knn_k);
      const knnDistance = near && near.reduce((sum, n) => sum + n.distance, 0) / near.length;
      r.metrics = computeMetrics(r, { now, activity, knnDistance });
      r.neighbors = (near ?? []).map((n) => ({ number: n.number, title: titles.get(n.number) ?? "", distance: n.distance }));
    }
    const quartiles = assignQuartiles(records);
    for (const r of records) r.quartiles = quartiles.get(r.number) ?? {};

    let summarized = 0;
    if (opts.llm) {
      signal?.throwIfAborted();
      const summaries = await summarizeRecords(records, opts.llm, store, {
        signal,
        onProgress: (done, total) => {
          lock.renew();
          opts.onProgress?.("summarize", done, total);
        },
      });
      for (const r of records) {
        const s = summaries.get(r.number);
        if (!s) continue;
        if (r.summaryKey !== s.key) summarized++;
        r.summary = s.text;
        r.summaryKey = s.key;
      }
    }

    signal?.throwIfAborted();
    const saved = store.saveEnrichment(collection, records, lock.holder);
    if (saved < records.length) {
      log.info(`${records.length - saved} records changed or were removed during enrichment and were not overwritten`);
    }

    const byNumber = new Map(records.map((r) => [r.number, r]));
    return { embedded, embeddingFailed, summarized, saved, snapshot: buildSnapshot(collection, byNumber, index, now) };
  });
}

export type UpdateOptions = PullOptions & EnrichOptions;

export async function runUpdate(opts: UpdateOptions): Promise<{ pull: PullResult; enrich: EnrichResult }> {
  const pull = await runPull(opts);
  const enrich = await runEnrich(opts);
  return { pull, enrich };
}

export interface CleanResult {
  /** set when caches were cleared too */
  caches?: { embeddings: number; completions: number };
}

/**
 * Deletes the collection's records, checkpoints and recommendations under
 * the collection lock, so a running pull or enrich is never cut short.
 */
export async function runClean(
  store: IssueStore,
  collection: string,
  opts: { ttlMinutes: number; caches?: boolean },
): Promise<CleanResult> {
  return withCollectionLock(store, collection, { holder: lockHolder("clean"), ttlMinutes: opts.ttlMinutes }, async () => {
    store.dropCollection(collection);
    return opts.caches ? { caches: store.clearCaches() } : {};
  });
}
