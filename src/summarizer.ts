import PQueue from "p-queue";
import { z } from "zod";
import { contentKey, prepareEmbeddingText } from "./embeddings.js";
import { errorMessage, ProviderError } from "./errors.js";
import { DEFAULT_TIMEOUT_MS, postJson } from "./http.js";
import { log } from "./log.js";
import type { IssueRecord } from "./record.js";
import type { CompletionCache, LLMProvider } from "./types.js";

export type LLMProviderName = "openai" | "mistral" | "anthropic" | "ollama";

export interface LLMConfig {
  provider: LLMProviderName;
  apiKey?: string;
  model?: string;
  baseUrl?: string;
  timeoutMs?: number;
}

const ChatResponseSchema = z.object({
  choices: z.array(z.object({ message: z.object({ content: z.string().nullable() }) })).min(1),
});

const AnthropicResponseSchema = z.object({
  content: z.array(z.object({ type: z.string(), text: z.string().optional() })),
});

interface ChatMessage {
  role: "system" | "user";
  content: string;
}

class OpenAILLM implements LLMProvider {
  readonly model: string;
  private apiKey: string;
  private baseUrl: string;
  private timeoutMs: number;

  constructor(config: LLMConfig, defaults: { baseUrl: string; model: string }) {
    if (!config.apiKey) throw new ProviderError(`LLM_API_KEY required for ${config.provider}`);
    this.apiKey = config.apiKey;
    this.model = config.model || defaults.model;
    this.baseUrl = config.baseUrl || defaults.baseUrl;
    this.timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  async complete(prompt: string, systemPrompt?: string): Promise<string> {
    const messages: ChatMessage[] = [];
    if (systemPrompt) messages.push({ role: "system", content: systemPrompt });
    messages.push({ role: "user", content: prompt });

    const payload = await postJson(
      "LLM API",
      `${this.baseUrl}/chat/completions`,
      { model: this.model, messages, temperature: 0.3 },
      { Authorization: `Bearer ${this.apiKey}` },
      this.timeoutMs,
    );
    const parsed = ChatResponseSchema.safeParse(payload);
    if (!parsed.success) throw new ProviderError("LLM API returned an unexpected response shape");
    return parsed.data.choices[0].message.content ?? "";
  }
}

class AnthropicLLM implements LLMProvider {
  readonly model: string;
  private apiKey: string;
  private timeoutMs: number;

  constructor(config: LLMConfig) {
    if (!config.apiKey) throw new ProviderError("LLM_API_KEY required for anthropic");
    this.apiKey = config.apiKey;
    this.model = config.model || "claude-3-5-haiku-latest";
    this.timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  async complete(prompt: string, systemPrompt?: string): Promise<string> {
    const body: Record<string, unknown> = {
      model: this.model,
      max_tokens: 4096,
      messages: [{ role: "user", content: prompt }],
    };
    if (systemPrompt) body.system = systemPrompt;

    const payload = await postJson(
      "Anthropic API",
      "https://api.anthropic.com/v1/messages",
      body,
      { "x-api-key": this.apiKey, "anthropic-version": "2023-06-01" },
      this.timeoutMs,
    );
    const parsed = AnthropicResponseSchema.safeParse(payload);
    if (!parsed.success) throw new ProviderError("Anthropic API returned an unexpected response shape");
    return parsed.data.content
      .filter((c) => c.type === "text")
      .map((c) => c.text ?? "")
      .join("");
  }
}

export function createLLMProvider(config: LLMConfig): LLMProvider {
  switch (config.provider) {
    case "openai":
      return new OpenAILLM(config, { baseUrl: "https://api.openai.com/v1", model: "gpt-4o-mini" });
    case "mistral":
      return new OpenAILLM(config, { baseUrl: "https://api.mistral.ai/v1", model: "mistral-small-latest" });
    case "ollama":
      return new OpenAILLM(
        { ...config, apiKey: config.apiKey || "ollama" },
        { baseUrl: "http://localhost:11434/v1", model: "llama3.2" },
      );
    case "anthropic":
      return new AnthropicLLM(config);
  }
}

/** The slice of an issue the summarizer sees. Time-relative metrics are left out so the prompt stays stable between runs. */
export function summaryView(record: IssueRecord): Record<string, unknown> {
  const m = record.metrics;
  const q = record.quartiles ?? {};
  return {
    number: record.number,
    url: record.url,
    title: record.title,
    conversation: prepareEmbeddingText(record),
    author: record.author,
    updatedAt: record.updatedAt,
    labels: record.labels,
    state: record.state,
    age_days: m?.ageDays,
    age_days_quartile: q.ageDays,
    comment_count: m?.commentCount,
    comment_count_quartile: q.commentCount,
    engagements: m?.engagements,
    engagements_quartile: q.engagements,
    engagements_per_day: m?.engagementsPerDay,
    engagements_per_day_quartile: q.engagementsPerDay,
    body_emojis: m?.bodyReactions,
    body_emojis_quartile: q.bodyReactions,
    comment_emojis: m?.commentReactions,
    comment_emojis_quartile: q.commentReactions,
    total_emojis: m?.totalReactions,
    total_emojis_quartile: q.totalReactions,
  };
}

export function summaryPrompt(record: IssueRecord): string {
  return `Analyze this GitHub issue and write a concise 3 sentence summary:
- The main problem or request, NOT restating issue number or url.
- Key discussion points and current status (open, fixed & closed, not fixed & closed, etc)
- Community engagement using engagement, age, comment and emoji metrics and their associated quartiles fields.

Issue:
${JSON.stringify(summaryView(record))}`;
}

export interface Summary {
  text: string;
  key: string;
}

/** Cached by prompt content; a record whose summaryKey already matches is returned as is. */
export async function summarizeIssue(record: IssueRecord, llm: LLMProvider, cache?: CompletionCache): Promise<Summary> {
  const prompt = summaryPrompt(record);
  const key = contentKey(llm.model, prompt);
  if (record.summaryKey === key && record.summary !== undefined) return { text: record.summary, key };

  const cached = cache?.getCompletion(key);
  if (cached !== undefined) return { text: cached, key };

  const text = (await llm.complete(prompt)).trim();
  if (!text) throw new ProviderError(`empty summary for #${record.number}`);
  cache?.putCompletion(key, llm.model, text);
  return { text, key };
}

export interface SummarizeOptions {
  concurrency?: number;
  signal?: AbortSignal;
  onProgress?: (done: number, total: number) => void;
}

/** Summaries by issue number. Records whose summary fails are logged and left out. */
export async function summarizeRecords(
  records: readonly IssueRecord[],
  llm: LLMProvider,
  cache: CompletionCache | undefined,
  opts: SummarizeOptions = {},
): Promise<Map<number, Summary>> {
  const out = new Map<number, Summary>();
  const queue = new PQueue({ concurrency: opts.concurrency ?? 2 });
  let done = 0;

  await Promise.all(
    records.map((record) =>
      queue.add(async () => {
        opts.signal?.throwIfAborted();
        try {
          out.set(record.number, await summarizeIssue(record, llm, cache));
        } catch (err) {
          log.warn(`summary for #${record.number} failed: ${errorMessage(err)}`);
        }
        done++;
        opts.onProgress?.(done, records.length);
      }),
    ),
  );
  return out;
}
