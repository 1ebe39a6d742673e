import { createHash } from "node:crypto";
import PQueue from "p-queue";
import { z } from "zod";
import { EmbeddingUnavailableError, errorMessage, isAbortError, ProviderError } from "./errors.js";
import { DEFAULT_TIMEOUT_MS, postJson } from "./http.js";
import { log } from "./log.js";
import type { Comment } from "./record.js";
import { withRetry } from "./retry.js";
import { isZeroVector } from "./similarity.js";
import type { EmbeddingCache, EmbeddingProvider } from "./types.js";

export type EmbeddingProviderName = "openai" | "mistral" | "jina" | "voyageai" | "ollama" | "kimi";

export interface ProviderConfig {
  provider: EmbeddingProviderName;
  apiKey?: string;
  model?: string;
  baseUrl?: string;
  timeoutMs?: number;
}

const EmbeddingListSchema = z.object({
  data: z.array(z.object({ embedding: z.array(z.number()), index: z.number().int().optional() })),
});

const OllamaResponseSchema = z.object({
  embeddings: z.array(z.array(z.number())),
});

function hasCode(err: unknown, code: string): boolean {
  const cause = err instanceof Error ? err.cause : undefined;
  return typeof cause === "object" && cause !== null && "code" in cause && cause.code === code;
}

function parseEmbeddingList(label: string, payload: unknown, expected: number): number[][] {
  const parsed = EmbeddingListSchema.safeParse(payload);
  if (!parsed.success) throw new ProviderError(`${label} returned an unexpected response shape`);
  const rows = [...parsed.data.data].sort((a, b) => (a.index ?? 0) - (b.index ?? 0));
  if (rows.length !== expected) {
    throw new ProviderError(`${label} returned ${rows.length} embeddings for ${expected} inputs`);
  }
  return rows.map((d) => d.embedding);
}

class OpenAIEmbeddings implements EmbeddingProvider {
  readonly name: string = "openai";
  readonly model: string;
  protected readonly apiKey: string;
  protected readonly baseUrl: string;
  protected readonly timeoutMs: number;
  dimensions = 1536;

  constructor(config: ProviderConfig, defaults: { baseUrl: string; model: string } = { baseUrl: "https://api.openai.com/v1", model: "text-embedding-3-small" }) {
    if (!config.apiKey) throw new ProviderError(`EMBEDDING_API_KEY required for ${config.provider}`);
    this.apiKey = config.apiKey;
    this.model = config.model || defaults.model;
    this.baseUrl = config.baseUrl || defaults.baseUrl;
    this.timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    if (this.model.includes("3-large")) this.dimensions = 3072;
  }

  async embed(text: string): Promise<number[]> {
    const [result] = await this.embedBatch([text]);
    return result;
  }

  async embedBatch(texts: string[]): Promise<number[][]> {
    const input = texts.map((t) => sanitizeText(t) || " ");
    const payload = await postJson(
      `${this.name} embeddings`,
      `${this.baseUrl}/embeddings`,
      { input, model: this.model },
      { Authorization: `Bearer ${this.apiKey}` },
      this.timeoutMs,
    );
    const vectors = parseEmbeddingList(this.name, payload, texts.length);
    if (vectors[0]) this.dimensions = vectors[0].length;
    return vectors;
  }
}

class MistralEmbeddings extends OpenAIEmbeddings {
  override readonly name = "mistral";

  constructor(config: ProviderConfig) {
    super(config, { baseUrl: "https://api.mistral.ai/v1", model: "mistral-embed" });
    this.dimensions = 1024;
  }
}

class KimiEmbeddings extends OpenAIEmbeddings {
  override readonly name = "kimi";

  constructor(config: ProviderConfig) {
    super(config, { baseUrl: "https://api.moonshot.cn/v1", model: "moonshot-embedding-v1" });
    this.dimensions = 1024;
  }
}

class JinaEmbeddings extends OpenAIEmbeddings {
  override readonly name = "jina";

  constructor(config: ProviderConfig) {
    super(config, { baseUrl: "https://api.jina.ai/v1", model: "jina-embeddings-v3" });
    this.dimensions = 1024;
  }
}

class VoyageEmbeddings extends OpenAIEmbeddings {
  override readonly name = "voyageai";

  constructor(config: ProviderConfig) {
    super(config, { baseUrl: "https://api.voyageai.com/v1", model: "voyage-2" });
    this.dimensions = 1024;
  }
}

class OllamaEmbeddings implements EmbeddingProvider {
  readonly name = "ollama";
  readonly model: string;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  dimensions = 0; // set by init()
  private initialized = false;

  constructor(config: ProviderConfig) {
    this.model = config.model || "qwen3-embedding:0.6b";
    this.baseUrl = config.baseUrl || "http://localhost:11434";
    this.timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  async init(): Promise<void> {
    if (this.initialized) return;
    const sample = await this.embed("dimension check");
    this.dimensions = sample.length;
    this.initialized = true;
  }

  async embed(text: string): Promise<number[]> {
    const [result] = await this.embedBatch([text]);
    return result;
  }

  async embedBatch(texts: string[]): Promise<number[][]> {
    let payload: unknown;
    try {
      payload = await postJson("ollama", `${this.baseUrl}/api/embed`, { model: this.model, input: texts }, {}, this.timeoutMs);
    } catch (err) {
      if (hasCode(err instanceof ProviderError ? err.cause : err, "ECONNREFUSED")) {
        throw new ProviderError("Ollama not running. start it with: ollama serve", undefined, { cause: err });
      }
      throw err;
    }
    const parsed = OllamaResponseSchema.safeParse(payload);
    if (!parsed.success) throw new ProviderError("ollama returned an unexpected response shape");
    const vectors = parsed.data.embeddings;
    if (vectors.length !== texts.length) {
      throw new ProviderError(`ollama returned ${vectors.length} embeddings for ${texts.length} inputs`);
    }
    if (!this.initialized && vectors[0]) {
      this.dimensions = vectors[0].length;
      this.initialized = true;
    }
    return vectors;
  }
}

export async function createEmbeddingProvider(config: ProviderConfig): Promise<EmbeddingProvider> {
  switch (config.provider) {
    case "openai": return new OpenAIEmbeddings(config);
    case "mistral": return new MistralEmbeddings(config);
    case "kimi": return new KimiEmbeddings(config);
    case "jina": return new JinaEmbeddings(config);
    case "voyageai": return new VoyageEmbeddings(config);
    case "ollama": {
      const provider = new OllamaEmbeddings(config);
      await provider.init();
      return provider;
    }
  }
}

const BODY_LIMIT = 15_000;
const COMMENTS_LIMIT = 8_000;
export const COMMENTS_TRUNCATED = "[... more comments truncated]";

export function sanitizeText(text: string): string {
  return text.replace(/[\x00-\x08\x0B\x0C\x0E-\x1F\x7F]/g, "").trim();
}

export interface EmbeddableRecord {
  itemType: "issue" | "pr";
  title: string;
  body: string;
  comments: readonly Pick<Comment, "author" | "body">[];
}

/**
 * Title, body (first 15 000 chars) and comments until 8 000 chars of
 * comment text have been taken, then a truncation marker.
 */
export function prepareEmbeddingText(item: EmbeddableRecord): string {
  const prefix = item.itemType === "pr" ? "Pull Request" : "Issue";
  const title = (item.title || "Untitled").trim();
  const body = item.body.trim().slice(0, BODY_LIMIT);
  let text = `${prefix}: ${title}${body ? `\n\n${body}` : ""}`;

  const parts: string[] = [];
  let used = 0;
  for (const c of item.comments) {
    const commentBody = c.body.trim();
    if (!commentBody) continue;
    if (used + commentBody.length > COMMENTS_LIMIT) {
      parts.push(COMMENTS_TRUNCATED);
      break;
    }
    used += commentBody.length;
    parts.push(`${c.author}: ${commentBody}`);
  }
  if (parts.length > 0) text += `\n\nComments:\n${parts.join("\n\n")}`;
  return sanitizeText(text);
}

export function contentKey(model: string, text: string): string {
  return `${model}:${createHash("sha256").update(text).digest("hex")}`;
}

export interface EmbeddingEngineOptions {
  batchSize?: number;
  concurrency?: number;
  maxAttempts?: number;
  retryDelayMs?: number;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

export interface EmbedOptions {
  signal?: AbortSignal;
  onProgress?: (done: number, total: number) => void;
}

function usable(vector: number[] | undefined): vector is number[] {
  return vector !== undefined && vector.length > 0 && vector.every(Number.isFinite) && !isZeroVector(vector);
}

/**
 * Embeds text through a provider with a content-addressed cache in front.
 * Identical payloads are embedded once; failures come back as null.
 */
export class EmbeddingEngine {
  private readonly batchSize: number;
  private readonly concurrency: number;
  private readonly maxAttempts: number;
  private readonly retryDelayMs: number;
  private readonly sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;

  constructor(
    private readonly provider: EmbeddingProvider,
    private readonly cache: EmbeddingCache,
    opts: EmbeddingEngineOptions = {},
  ) {
    this.batchSize = opts.batchSize ?? 32;
    this.concurrency = opts.concurrency ?? 2;
    this.maxAttempts = opts.maxAttempts ?? 4;
    this.retryDelayMs = opts.retryDelayMs ?? 1000;
    this.sleep = opts.sleep;
  }

  get model(): string {
    return this.provider.model;
  }

  keyFor(text: string): string {
    return contentKey(this.provider.model, text);
  }

  async embedText(text: string, opts: EmbedOptions = {}): Promise<number[] | null> {
    const [vector] = await this.embedTexts([text], opts);
    return vector ?? null;
  }

  async embedTexts(texts: readonly string[], opts: EmbedOptions = {}): Promise<Array<number[] | null>> {
    const { signal, onProgress } = opts;
    const keys = texts.map((t) => this.keyFor(t));
    const results = new Map<string, number[] | null>();
    const pending = new Map<string, string>();

    keys.forEach((key, i) => {
      if (results.has(key) || pending.has(key)) return;
      const cached = this.cache.getEmbedding(key);
      if (cached) results.set(key, cached);
      else pending.set(key, texts[i]);
    });

    const work = [...pending.entries()];
    const batches: Array<Array<[string, string]>> = [];
    for (let i = 0; i < work.length; i += this.batchSize) {
      batches.push(work.slice(i, i + this.batchSize));
    }

    let done = 0;
    const queue = new PQueue({ concurrency: this.concurrency });
    await Promise.all(
      batches.map((batch) =>
        queue.add(async () => {
          if (signal?.aborted) return;
          await this.runBatch(batch, results, signal);
          done += batch.length;
          onProgress?.(done, work.length);
        }),
      ),
    );
    signal?.throwIfAborted();

    return keys.map((key) => results.get(key) ?? null);
  }

  private async request(texts: string[], signal?: AbortSignal): Promise<number[][]> {
    return withRetry(() => this.provider.embedBatch(texts), {
      maxAttempts: this.maxAttempts,
      baseDelayMs: this.retryDelayMs,
      signal,
      sleep: this.sleep,
      onRetry: (err, attempt, waitMs) =>
        log.debug(`embedding attempt ${attempt} failed (${errorMessage(err)}), retrying in ${waitMs}ms`),
    });
  }

  private store(key: string, vector: number[] | undefined, results: Map<string, number[] | null>): boolean {
    if (!usable(vector)) return false;
    this.cache.putEmbedding(key, this.provider.model, vector);
    results.set(key, vector);
    return true;
  }

  private async runBatch(batch: Array<[string, string]>, results: Map<string, number[] | null>, signal?: AbortSignal): Promise<void> {
    try {
      const vectors = await this.request(batch.map(([, text]) => text), signal);
      if (vectors.length !== batch.length) {
        throw new ProviderError(`provider returned ${vectors.length} embeddings for ${batch.length} inputs`);
      }
      const failed = batch.filter(([key], i) => !this.store(key, vectors[i], results));
      if (failed.length === 0) return;
      batch = failed;
    } catch (err) {
      if (signal?.aborted && isAbortError(err)) return;
      if (batch.length === 1) {
        this.fail(batch[0][0], err, results);
        return;
      }
      log.debug(`batch of ${batch.length} failed (${errorMessage(err)}), falling back to single requests`);
    }

    for (const [key, text] of batch) {
      if (signal?.aborted) return;
      try {
        const [vector] = await this.request([text], signal);
        if (!this.store(key, vector, results)) {
          this.fail(key, new ProviderError("provider returned an empty or zero vector"), results);
        }
      } catch (err) {
        if (signal?.aborted && isAbortError(err)) return;
        this.fail(key, err, results);
      }
    }
  }

  private fail(key: string, cause: unknown, results: Map<string, number[] | null>): void {
    const err = new EmbeddingUnavailableError(`embedding unavailable for ${key.slice(0, 24)}…: ${errorMessage(cause)}`, { cause });
    log.warn(err.message);
    results.set(key, null);
  }
}
