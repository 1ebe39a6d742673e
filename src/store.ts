import { mkdirSync } from "node:fs";
import { resolve } from "node:path";
import Database from "better-sqlite3";
import { z } from "zod";
import { CollectionLockedError } from "./errors.js";
import { log } from "./log.js";
import { type Recommendation, RecommendationSchema } from "./recommendations.js";
import { type IssueRecord, StoredRecordSchema, toDocument } from "./record.js";
import type { CompletionCache, EmbeddingCache, FetchCheckpoint, ItemType } from "./types.js";

export const DB_FILE = "issuedex.db";
const SCHEMA_VERSION = "1";

const RecordRowSchema = z.object({
  number: z.number().int(),
  data_json: z.string(),
  embedding: z.instanceof(Buffer).nullable(),
});

const RecommendationRowSchema = z.object({
  number: z.number().int(),
  json: z.string(),
});

const CheckpointRowSchema = z.object({
  start_date: z.string(),
  last_window_end: z.string().nullable(),
});

const LockRowSchema = z.object({
  holder: z.string(),
  acquired_at: z.string(),
});

const ValueRowSchema = z.object({ value: z.string() });
const VectorRowSchema = z.object({ vector: z.instanceof(Buffer) });
const TextRowSchema = z.object({ text: z.string() });
const CountRowSchema = z.object({ c: z.number() });
const CollectionRowSchema = z.object({ collection: z.string() });

export interface RawRecordRow {
  number: number;
  data: unknown;
  embedding?: number[];
  recommendations: unknown[];
}

export interface CollectionStats {
  records: number;
  issues: number;
  prs: number;
  embedded: number;
  recommendations: number;
  checkpoints: Array<{ itemType: string; lastWindowEnd: string | null }>;
}

export function encodeVector(vector: ArrayLike<number>): Buffer {
  return Buffer.from(Float32Array.from(vector).buffer);
}

export function decodeVector(buf: Buffer): number[] {
  // copy first: the blob's byteOffset is not guaranteed to be 4-aligned
  return Array.from(new Float32Array(new Uint8Array(buf).buffer));
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/**
 * SQLite-backed persistence for collections, their checkpoints and
 * recommendations, the content-addressed caches and collection locks.
 */
export class IssueStore implements EmbeddingCache, CompletionCache {
  private db: Database.Database;

  constructor(dbPath?: string) {
    const p = dbPath || resolve(process.cwd(), "data", DB_FILE);
    mkdirSync(resolve(p, ".."), { recursive: true });
    this.db = new Database(p);
    this.init();
  }

  static open(dataDir: string): IssueStore {
    return new IssueStore(resolve(dataDir, DB_FILE));
  }

  private init() {
    this.db.pragma("journal_mode = WAL");
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS meta (key TEXT PRIMARY KEY, value TEXT NOT NULL);

      CREATE TABLE IF NOT EXISTS records (
        collection TEXT NOT NULL,
        number INTEGER NOT NULL,
        item_type TEXT NOT NULL,
        updated_at TEXT NOT NULL,
        data_json TEXT NOT NULL,
        embedding BLOB,
        PRIMARY KEY (collection, number)
      );

      CREATE TABLE IF NOT EXISTS recommendations (
        review_id TEXT PRIMARY KEY,
        collection TEXT NOT NULL,
        number INTEGER NOT NULL,
        json TEXT NOT NULL,
        created_at TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS checkpoints (
        collection TEXT NOT NULL,
        item_type TEXT NOT NULL,
        start_date TEXT NOT NULL,
        last_window_end TEXT,
        PRIMARY KEY (collection, item_type)
      );

      CREATE TABLE IF NOT EXISTS embedding_cache (
        key TEXT PRIMARY KEY,
        model TEXT NOT NULL,
        vector BLOB NOT NULL,
        created_at TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS completion_cache (
        key TEXT PRIMARY KEY,
        model TEXT NOT NULL,
        text TEXT NOT NULL,
        created_at TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS locks (
        collection TEXT PRIMARY KEY,
        holder TEXT NOT NULL,
        acquired_at TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_recommendations_number ON recommendations(collection, number);
    `);
    if (!this.getMeta("schema_version")) this.setMeta("schema_version", SCHEMA_VERSION);
  }

  getMeta(key: string): string | undefined {
    const row = ValueRowSchema.safeParse(this.db.prepare("SELECT value FROM meta WHERE key = ?").get(key));
    return row.success ? row.data.value : undefined;
  }

  setMeta(key: string, value: string): void {
    this.db
      .prepare("INSERT INTO meta (key, value) VALUES (?, ?) ON CONFLICT(key) DO UPDATE SET value = excluded.value")
      .run(key, value);
  }

  // ── records ───────────────────────────────────────────────────

  private writeRecord(collection: string, record: IssueRecord): void {
    this.db
      .prepare(`
      INSERT INTO records (collection, number, item_type, updated_at, data_json, embedding)
      VALUES (?, ?, ?, ?, ?, ?)
      ON CONFLICT(collection, number) DO UPDATE SET
        item_type = excluded.item_type,
        updated_at = excluded.updated_at,
        data_json = excluded.data_json,
        embedding = excluded.embedding
    `)
      .run(
        collection,
        record.number,
        record.itemType,
        record.updatedAt,
        JSON.stringify(toDocument(record)),
        record.embedding ? encodeVector(record.embedding) : null,
      );
  }

  /** Stored rows with documents left unparsed, for validation. */
  loadRawRows(collection: string): RawRecordRow[] {
    const recs = this.loadRecommendations(collection);
    const rows = this.db
      .prepare("SELECT number, data_json, embedding FROM records WHERE collection = ? ORDER BY number")
      .all(collection);
    return rows.map((raw) => {
      const row = RecordRowSchema.parse(raw);
      return {
        number: row.number,
        data: parseJson(row.data_json),
        embedding: row.embedding ? decodeVector(row.embedding) : undefined,
        recommendations: recs.get(row.number) ?? [],
      };
    });
  }

  /** Every record of the collection, ordered by number. Unreadable rows are skipped with a warning. */
  loadCollection(collection: string): Map<number, IssueRecord> {
    const out = new Map<number, IssueRecord>();
    let bad = 0;
    for (const row of this.loadRawRows(collection)) {
      const doc = StoredRecordSchema.safeParse(row.data);
      if (!doc.success) {
        bad++;
        continue;
      }
      const recommendations: Recommendation[] = [];
      for (const r of row.recommendations) {
        const parsed = RecommendationSchema.safeParse(r);
        if (parsed.success) recommendations.push(parsed.data);
      }
      const record: IssueRecord = { ...doc.data, recommendations };
      if (row.embedding) record.embedding = row.embedding;
      out.set(record.number, record);
    }
    if (bad > 0) log.warn(`${bad} stored records in ${collection} failed to parse. run \`issuedex validate\``);
    return out;
  }

  upsertRecords(collection: string, records: Iterable<IssueRecord>, holder?: string): number {
    let n = 0;
    this.db.transaction(() => {
      if (holder !== undefined) this.assertLockHeld(collection, holder);
      for (const r of records) {
        this.writeRecord(collection, r);
        n++;
      }
    })();
    return n;
  }

  /** Atomically replaces every record of the collection. */
  replaceCollection(collection: string, records: Iterable<IssueRecord>): void {
    this.db.transaction(() => {
      this.db.prepare("DELETE FROM records WHERE collection = ?").run(collection);
      for (const r of records) this.writeRecord(collection, r);
    })();
  }

  /**
   * Writes a window's merged records and its checkpoint in one transaction.
   * Returns false, without touching the database, when there is nothing to change.
   * With `holder`, the write is refused unless that holder still owns the collection lock.
   */
  commitWindow(
    collection: string,
    itemType: ItemType,
    upserts: readonly IssueRecord[],
    checkpoint: FetchCheckpoint,
    holder?: string,
  ): boolean {
    const current = this.getCheckpoint(collection, itemType);
    const same =
      current !== undefined &&
      current.startDate === checkpoint.startDate &&
      current.lastWindowEnd === checkpoint.lastWindowEnd;
    if (upserts.length === 0 && same) return false;

    this.db.transaction(() => {
      if (holder !== undefined) this.assertLockHeld(collection, holder);
      for (const r of upserts) this.writeRecord(collection, r);
      if (!same) {
        this.db
          .prepare(`
          INSERT INTO checkpoints (collection, item_type, start_date, last_window_end)
          VALUES (?, ?, ?, ?)
          ON CONFLICT(collection, item_type) DO UPDATE SET
            start_date = excluded.start_date,
            last_window_end = excluded.last_window_end
        `)
          .run(collection, itemType, checkpoint.startDate, checkpoint.lastWindowEnd ?? null);
      }
    }).immediate();
    return true;
  }

  /**
   * Writes derived data back for records that still exist. Records purged
   * while enrichment ran are not resurrected. With `holder`, nothing is
   * written unless that holder still owns the collection lock.
   */
  saveEnrichment(collection: string, records: Iterable<IssueRecord>, holder?: string): number {
    const stmt = this.db.prepare(
      "UPDATE records SET data_json = ?, embedding = ? WHERE collection = ? AND number = ? AND updated_at = ?",
    );
    let n = 0;
    this.db.transaction(() => {
      if (holder !== undefined) this.assertLockHeld(collection, holder);
      for (const r of records) {
        const res = stmt.run(
          JSON.stringify(toDocument(r)),
          r.embedding ? encodeVector(r.embedding) : null,
          collection,
          r.number,
          r.updatedAt,
        );
        n += res.changes;
      }
    }).immediate();
    return n;
  }

  getCheckpoint(collection: string, itemType: ItemType): FetchCheckpoint | undefined {
    const row = CheckpointRowSchema.safeParse(
      this.db.prepare("SELECT start_date, last_window_end FROM checkpoints WHERE collection = ? AND item_type = ?").get(collection, itemType),
    );
    if (!row.success) return undefined;
    const cp: FetchCheckpoint = { startDate: row.data.start_date };
    if (row.data.last_window_end) cp.lastWindowEnd = row.data.last_window_end;
    return cp;
  }

  purgeRecords(collection: string, numbers: readonly number[]): number {
    let n = 0;
    this.db.transaction(() => {
      for (const number of numbers) {
        n += this.db.prepare("DELETE FROM records WHERE collection = ? AND number = ?").run(collection, number).changes;
        this.db.prepare("DELETE FROM recommendations WHERE collection = ? AND number = ?").run(collection, number);
      }
    })();
    return n;
  }

  dropCollection(collection: string): void {
    this.db.transaction(() => {
      for (const table of ["records", "recommendations", "checkpoints"]) {
        this.db.prepare(`DELETE FROM ${table} WHERE collection = ?`).run(collection);
      }
    })();
  }

  listCollections(): string[] {
    const rows = this.db
      .prepare("SELECT DISTINCT collection FROM records UNION SELECT DISTINCT collection FROM checkpoints ORDER BY collection")
      .all();
    return rows.map((r) => CollectionRowSchema.parse(r).collection);
  }

  private count(sql: string, ...params: unknown[]): number {
    return CountRowSchema.parse(this.db.prepare(sql).get(...params)).c;
  }

  getStats(collection: string): CollectionStats {
    const checkpoints = this.db
      .prepare("SELECT item_type, last_window_end FROM checkpoints WHERE collection = ? ORDER BY item_type")
      .all(collection)
      .map((r) => {
        const row = z.object({ item_type: z.string(), last_window_end: z.string().nullable() }).parse(r);
        return { itemType: row.item_type, lastWindowEnd: row.last_window_end };
      });
    return {
      records: this.count("SELECT COUNT(*) as c FROM records WHERE collection = ?", collection),
      issues: this.count("SELECT COUNT(*) as c FROM records WHERE collection = ? AND item_type = 'issue'", collection),
      prs: this.count("SELECT COUNT(*) as c FROM records WHERE collection = ? AND item_type = 'pr'", collection),
      embedded: this.count("SELECT COUNT(*) as c FROM records WHERE collection = ? AND embedding IS NOT NULL", collection),
      recommendations: this.count("SELECT COUNT(*) as c FROM recommendations WHERE collection = ?", collection),
      checkpoints,
    };
  }

  // ── recommendations ───────────────────────────────────────────

  addRecommendation(collection: string, number: number, rec: Recommendation): void {
    this.db
      .prepare("INSERT INTO recommendations (review_id, collection, number, json, created_at) VALUES (?, ?, ?, ?, ?)")
      .run(rec.meta.reviewId, collection, number, JSON.stringify(rec), rec.meta.timestamp);
  }

  private loadRecommendations(collection: string): Map<number, unknown[]> {
    const out = new Map<number, unknown[]>();
    const rows = this.db
      .prepare("SELECT number, json FROM recommendations WHERE collection = ? ORDER BY created_at, rowid")
      .all(collection);
    for (const raw of rows) {
      const row = RecommendationRowSchema.parse(raw);
      const list = out.get(row.number) ?? [];
      list.push(parseJson(row.json));
      out.set(row.number, list);
    }
    return out;
  }

  // ── caches ────────────────────────────────────────────────────

  getEmbedding(key: string): number[] | undefined {
    const row = VectorRowSchema.safeParse(this.db.prepare("SELECT vector FROM embedding_cache WHERE key = ?").get(key));
    return row.success ? decodeVector(row.data.vector) : undefined;
  }

  putEmbedding(key: string, model: string, vector: number[]): void {
    this.db
      .prepare("INSERT OR REPLACE INTO embedding_cache (key, model, vector, created_at) VALUES (?, ?, ?, ?)")
      .run(key, model, encodeVector(vector), new Date().toISOString());
  }

  getCompletion(key: string): string | undefined {
    const row = TextRowSchema.safeParse(this.db.prepare("SELECT text FROM completion_cache WHERE key = ?").get(key));
    return row.success ? row.data.text : undefined;
  }

  putCompletion(key: string, model: string, text: string): void {
    this.db
      .prepare("INSERT OR REPLACE INTO completion_cache (key, model, text, created_at) VALUES (?, ?, ?, ?)")
      .run(key, model, text, new Date().toISOString());
  }

  clearCaches(): { embeddings: number; completions: number } {
    const embeddings = this.db.prepare("DELETE FROM embedding_cache").run().changes;
    const completions = this.db.prepare("DELETE FROM completion_cache").run().changes;
    return { embeddings, completions };
  }

  // ── locks ─────────────────────────────────────────────────────

  /** Takes the collection lock or throws CollectionLockedError. Expired locks are taken over. */
  acquireLock(collection: string, holder: string, ttlMs: number, now: Date = new Date()): void {
    this.db.transaction(() => {
      const row = LockRowSchema.safeParse(
        this.db.prepare("SELECT holder, acquired_at FROM locks WHERE collection = ?").get(collection),
      );
      if (row.success && row.data.holder !== holder) {
        const age = now.getTime() - Date.parse(row.data.acquired_at);
        if (age < ttlMs) throw new CollectionLockedError(collection, row.data.holder, row.data.acquired_at);
        log.warn(`taking over expired lock on ${collection} held by ${row.data.holder}`);
      }
      this.db
        .prepare("INSERT OR REPLACE INTO locks (collection, holder, acquired_at) VALUES (?, ?, ?)")
        .run(collection, holder, now.toISOString());
    }).immediate();
  }

  /** Restarts the lock's expiry clock. Throws CollectionLockedError when `holder` no longer owns it. */
  renewLock(collection: string, holder: string, now: Date = new Date()): void {
    this.db.transaction(() => {
      this.assertLockHeld(collection, holder);
      this.db
        .prepare("UPDATE locks SET acquired_at = ? WHERE collection = ? AND holder = ?")
        .run(now.toISOString(), collection, holder);
    }).immediate();
  }

  private assertLockHeld(collection: string, holder: string): void {
    const row = LockRowSchema.safeParse(
      this.db.prepare("SELECT holder, acquired_at FROM locks WHERE collection = ?").get(collection),
    );
    if (row.success && row.data.holder === holder) return;
    throw CollectionLockedError.lost(
      collection,
      holder,
      row.success ? { holder: row.data.holder, acquiredAt: row.data.acquired_at } : undefined,
    );
  }

  releaseLock(collection: string, holder: string): void {
    this.db.prepare("DELETE FROM locks WHERE collection = ? AND holder = ?").run(collection, holder);
  }

  clearLocks(collection?: string): number {
    if (collection) return this.db.prepare("DELETE FROM locks WHERE collection = ?").run(collection).changes;
    return this.db.prepare("DELETE FROM locks").run().changes;
  }

  close(): void {
    this.db.close();
  }
}
