import { afterEach, beforeAll, describe, expect, it, vi } from "vitest";
import { contentKey } from "../embeddings.js";
import { ProviderError } from "../errors.js";
import { log } from "../log.js";
import { createLLMProvider, summarizeIssue, summarizeRecords, summaryPrompt, summaryView } from "../summarizer.js";
import type { CompletionCache, LLMProvider } from "../types.js";
import { issueRecord } from "./helpers.js";

beforeAll(() => {
  log.setLevel("silent");
});

afterEach(() => {
  vi.unstubAllGlobals();
});

class FakeLLM implements LLMProvider {
  readonly model = "fake-llm";
  readonly prompts: string[] = [];
  failFor = new Set<number>();

  async complete(prompt: string): Promise<string> {
    this.prompts.push(prompt);
    for (const n of this.failFor) {
      if (prompt.includes(`"number":${n},`)) throw new ProviderError("upstream down", 503);
    }
    return `  Summary ${this.prompts.length}.  `;
  }
}

class MemoryCompletions implements CompletionCache {
  readonly entries = new Map<string, string>();

  getCompletion(key: string): string | undefined {
    return this.entries.get(key);
  }

  putCompletion(key: string, _model: string, text: string): void {
    this.entries.set(key, text);
  }
}

describe("summaryView", () => {
  it("carries metrics with their quartiles and leaves out time-relative ones", () => {
    const rec = issueRecord(
      3,
      { title: "Crash", body: "It crashes", labels: ["bug"] },
      {
        metrics: {
          commentCount: 2,
          bodyReactions: 1,
          commentReactions: 0,
          positiveReactions: 1,
          negativeReactions: 0,
          totalReactions: 1,
          engagements: 3,
          engagementsPerDay: 3,
          ageDays: 1,
          daysSinceUpdate: 12.5,
          activityScore: 0.4,
        },
        quartiles: { engagements: "Top25%", ageDays: "Bottom25%" },
      },
    );
    const view = summaryView(rec);
    expect(view).toMatchObject({
      number: 3,
      title: "Crash",
      conversation: "Issue: Crash\n\nIt crashes",
      labels: ["bug"],
      state: "open",
      engagements: 3,
      engagements_quartile: "Top25%",
      age_days: 1,
      age_days_quartile: "Bottom25%",
      comment_count_quartile: undefined,
    });
    expect(Object.keys(view)).not.toContain("days_since_update");
    expect(Object.keys(view)).not.toContain("activity_score");
  });

  it("prompt asks for three sentences and embeds the JSON", () => {
    const rec = issueRecord(4);
    const prompt = summaryPrompt(rec);
    expect(prompt.startsWith("Analyze this GitHub issue and write a concise 3 sentence summary:\n")).toBe(true);
    expect(prompt.endsWith(`Issue:\n${JSON.stringify(summaryView(rec))}`)).toBe(true);
  });
});

describe("summarizeIssue", () => {
  it("trims the completion and caches it by prompt", async () => {
    const llm = new FakeLLM();
    const cache = new MemoryCompletions();
    const rec = issueRecord(1);
    const first = await summarizeIssue(rec, llm, cache);
    expect(first).toEqual({ text: "Summary 1.", key: contentKey("fake-llm", summaryPrompt(rec)) });

    const again = await summarizeIssue(rec, llm, cache);
    expect(again.text).toBe("Summary 1.");
    expect(llm.prompts).toHaveLength(1);
  });

  it("reuses the stored summary when the key matches", async () => {
    const llm = new FakeLLM();
    const rec = issueRecord(1);
    const key = contentKey("fake-llm", summaryPrompt(rec));
    const result = await summarizeIssue({ ...rec, summary: "kept", summaryKey: key }, llm);
    expect(result).toEqual({ text: "kept", key });
    expect(llm.prompts).toHaveLength(0);
  });

  it("rejects an empty completion", async () => {
    const llm: LLMProvider = { model: "blank", complete: async () => "   " };
    await expect(summarizeIssue(issueRecord(2), llm)).rejects.toBeInstanceOf(ProviderError);
  });
});

describe("summarizeRecords", () => {
  it("leaves out records whose summary fails", async () => {
    const llm = new FakeLLM();
    llm.failFor.add(2);
    const progress: number[] = [];
    const out = await summarizeRecords([issueRecord(1), issueRecord(2), issueRecord(3)], llm, undefined, {
      concurrency: 1,
      onProgress: (done) => progress.push(done),
    });
    expect([...out.keys()].sort()).toEqual([1, 3]);
    expect(progress).toEqual([1, 2, 3]);
  });
});

describe("createLLMProvider", () => {
  it("requires an API key for hosted providers", () => {
    expect(() => createLLMProvider({ provider: "mistral" })).toThrow(ProviderError);
  });

  it("talks to an OpenAI-compatible chat endpoint", async () => {
    const calls: Array<{ url: string; body: unknown }> = [];
    vi.stubGlobal("fetch", async (url: string, init: { body: string }) => {
      calls.push({ url, body: JSON.parse(init.body) });
      return new Response(JSON.stringify({ choices: [{ message: { content: "hello" } }] }), { status: 200 });
    });
    const llm = createLLMProvider({ provider: "mistral", apiKey: "test-secret" });
    expect(llm.model).toBe("mistral-small-latest");
    expect(await llm.complete("hi", "be brief")).toBe("hello");
    expect(calls[0]).toEqual({
      url: "https://api.mistral.ai/v1/chat/completions",
      body: {
        model: "mistral-small-latest",
        messages: [
          { role: "system", content: "be brief" },
          { role: "user", content: "hi" },
        ],
        temperature: 0.3,
      },
    });
  });

  it("joins Anthropic text blocks", async () => {
    vi.stubGlobal(
      "fetch",
      async () =>
        new Response(JSON.stringify({ content: [{ type: "text", text: "a" }, { type: "text", text: "b" }] }), { status: 200 }),
    );
    const llm = createLLMProvider({ provider: "anthropic", apiKey: "test-secret", model: "test-model" });
    expect(await llm.complete("hi")).toBe("ab");
  });

  it("surfaces HTTP errors with their status", async () => {
    vi.stubGlobal("fetch", async () => new Response("nope", { status: 429 }));
    const llm = createLLMProvider({ provider: "ollama" });
    await expect(llm.complete("hi")).rejects.toMatchObject({ status: 429 });
  });
});
