import { ProviderError } from "../errors.js";
import type { IssueRecord, SourceRecordInput } from "../record.js";
import { parseSourceRecord } from "../record.js";
import type { EmbeddingCache, EmbeddingProvider } from "../types.js";

export const REPO = "acme/widgets";

export function rawIssue(number: number, overrides: Partial<SourceRecordInput> = {}): SourceRecordInput {
  return {
    number,
    itemType: "issue",
    title: `Issue ${number}`,
    body: "",
    state: "open",
    url: `https://github.com/${REPO}/issues/${number}`,
    author: "alice",
    labels: [],
    assignees: [],
    createdAt: "2024-01-02T00:00:00.000Z",
    updatedAt: "2024-01-03T00:00:00.000Z",
    comments: [],
    crossReferences: [],
    ...overrides,
  };
}

export function issueRecord(number: number, overrides: Partial<SourceRecordInput> = {}, extra: Partial<IssueRecord> = {}): IssueRecord {
  const src = parseSourceRecord(rawIssue(number, overrides));
  return { ...src, references: [], recommendations: [], ...extra };
}

export function recordMap(records: IssueRecord[]): Map<number, IssueRecord> {
  return new Map(records.map((r) => [r.number, r]));
}

export class MemoryEmbeddingCache implements EmbeddingCache {
  readonly entries = new Map<string, number[]>();

  getEmbedding(key: string): number[] | undefined {
    return this.entries.get(key);
  }

  putEmbedding(key: string, _model: string, vector: number[]): void {
    this.entries.set(key, vector);
  }
}

function occurrences(text: string, word: string): number {
  return text.split(word).length - 1;
}

/** [notebook/execution, keyboard/shortcut, constant] term counts. */
export function keywordVector(text: string): number[] {
  const t = text.toLowerCase();
  return [
    occurrences(t, "notebook") + occurrences(t, "execution"),
    occurrences(t, "keyboard") + occurrences(t, "shortcut"),
    0.01,
  ];
}

export class KeywordEmbeddings implements EmbeddingProvider {
  readonly name = "keyword";
  readonly model: string;
  dimensions = 3;
  readonly calls: string[][] = [];
  /** texts containing any of these fail */
  readonly failOn = new Set<string>();
  rejectBatches = false;

  constructor(model = "keyword-v1") {
    this.model = model;
  }

  async embed(text: string): Promise<number[]> {
    const [v] = await this.embedBatch([text]);
    return v;
  }

  async embedBatch(texts: string[]): Promise<number[][]> {
    this.calls.push([...texts]);
    if (this.rejectBatches && texts.length > 1) throw new ProviderError("batch too large", 413);
    for (const t of texts) {
      for (const bad of this.failOn) {
        if (t.includes(bad)) throw new ProviderError("invalid input", 400);
      }
    }
    return texts.map(keywordVector);
  }
}
