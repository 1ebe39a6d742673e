import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { resolve } from "node:path";
import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import { type CallToolResult, CallToolResultSchema } from "@modelcontextprotocol/sdk/types.js";
import { afterEach, beforeAll, beforeEach, describe, expect, it } from "vitest";
import { log } from "../log.js";
import { QueryService } from "../query.js";
import { callTool, createServer, TOOLS } from "../server.js";
import { IssueStore } from "../store.js";
import { issueRecord } from "./helpers.js";

beforeAll(() => {
  log.setLevel("silent");
});

const C = "acme/widgets";

function payload(result: CallToolResult): unknown {
  const first = result.content[0];
  if (first?.type !== "text") throw new Error("expected a text result");
  return JSON.parse(first.text);
}

describe("MCP tools", () => {
  let dir: string;
  let store: IssueStore;
  let query: QueryService;

  beforeEach(() => {
    dir = mkdtempSync(resolve(tmpdir(), "issuedex-server-"));
    store = IssueStore.open(dir);
    store.upsertRecords(C, [
      issueRecord(1, { title: "Crash on save" }, { references: [2], embedding: [1, 0] }),
      issueRecord(2, { title: "Crash on load" }, { embedding: [0.8, 0.2] }),
    ]);
    query = new QueryService(store, C);
  });

  afterEach(() => {
    store.close();
    rmSync(dir, { recursive: true, force: true });
  });

  it("exposes every query operation", () => {
    expect(TOOLS.map((t) => t.name)).toEqual([
      "get_issue",
      "find_similar_issues",
      "find_similar_issues_by_text",
      "find_cross_referenced_issues",
      "get_issue_metrics",
      "get_top_issues",
      "get_available_metrics",
      "find_issue_clusters",
      "add_recommendation",
      "get_recommendation_schema",
      "get_first_issue_without_recommendation",
      "get_issue_by_difficulty",
    ]);
  });

  it("returns tool output as JSON text", async () => {
    const result = await callTool(query, "find_cross_referenced_issues", { issue_number: 2 });
    expect(result.isError).toBeUndefined();
    expect(payload(result)).toEqual([
      { number: 1, title: "Crash on save", state: "open", url: "https://github.com/acme/widgets/issues/1" },
    ]);
  });

  it("applies argument defaults", async () => {
    const result = await callTool(query, "get_first_issue_without_recommendation", {});
    expect(payload(result)).toMatchObject({ number: 1 });
  });

  it("reports typed failures with their code", async () => {
    expect(payload(await callTool(query, "get_issue", { issue_number: 9 }))).toEqual({
      error: "NotFound",
      message: "issue #9 not found in acme/widgets",
    });
    expect(payload(await callTool(query, "get_top_issues", { metric: "popularity" }))).toMatchObject({ error: "InvalidMetric" });

    const bad = await callTool(query, "get_issue", { issue_number: "one" });
    expect(bad.isError).toBe(true);
    expect(payload(bad)).toMatchObject({ error: "ValidationError", message: "invalid arguments for get_issue" });

    expect(payload(await callTool(query, "drop_tables", {}))).toEqual({ error: "UnknownTool", message: "unknown tool: drop_tables" });
  });

  it("serves tools over an MCP transport", async () => {
    const server = createServer(query);
    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    await server.connect(serverTransport);
    const client = new Client({ name: "test-client", version: "1.0.0" });
    await client.connect(clientTransport);

    const listed = await client.listTools();
    expect(listed.tools).toHaveLength(12);

    const raw = await client.callTool({ name: "find_similar_issues", arguments: { issue_number: 1, k: 1 } });
    const hits = payload(CallToolResultSchema.parse(raw));
    expect(hits).toMatchObject([{ number: 2 }]);

    await client.close();
    await server.close();
  });
});
