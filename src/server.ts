import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { CallToolRequestSchema, type CallToolResult, ListToolsRequestSchema, type Tool } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import { errorMessage, IssuedexError, ValidationError } from "./errors.js";
import { log } from "./log.js";
import type { QueryService } from "./query.js";

export const VERSION = "0.1.0";

const issueNumber = z.number().int().positive();
const state = z.enum(["open", "closed", "merged"]).optional();
const k = z.number().int().min(1).max(100).default(5);

interface ToolDef<S extends z.ZodTypeAny> {
  name: string;
  description: string;
  inputSchema: Tool["inputSchema"];
  args: S;
  run: (query: QueryService, args: z.output<S>) => unknown;
}

export interface RegisteredTool {
  name: string;
  description: string;
  inputSchema: Tool["inputSchema"];
  call: (query: QueryService, raw: unknown) => Promise<unknown>;
}

function tool<S extends z.ZodTypeAny>(def: ToolDef<S>): RegisteredTool {
  return {
    name: def.name,
    description: def.description,
    inputSchema: def.inputSchema,
    call: async (query, raw) => {
      const parsed = def.args.safeParse(raw ?? {});
      if (!parsed.success) {
        const errors = parsed.error.issues.map((i) => `${i.path.join(".") || "arguments"}: ${i.message}`);
        throw new ValidationError(`invalid arguments for ${def.name}`, errors);
      }
      return def.run(query, parsed.data);
    },
  };
}

const issueArg = { issue_number: { type: "integer", description: "Issue number" } };
const stateArg = { state: { type: "string", enum: ["open", "closed", "merged"], description: "Only return issues in this state" } };
const kArg = { k: { type: "integer", description: "Number of results (default 5)" } };

export const TOOLS: RegisteredTool[] = [
  tool({
    name: "get_issue",
    description: "Full stored record of an issue: text, comments, labels, metrics, quartiles, summary and recommendations",
    inputSchema: { type: "object", properties: issueArg, required: ["issue_number"] },
    args: z.object({ issue_number: issueNumber }),
    run: (q, a) => q.getIssue(a.issue_number),
  }),
  tool({
    name: "find_similar_issues",
    description: "Nearest issues by embedding similarity to the given issue",
    inputSchema: { type: "object", properties: { ...issueArg, ...kArg, ...stateArg }, required: ["issue_number"] },
    args: z.object({ issue_number: issueNumber, k, state }),
    run: (q, a) => q.findSimilarIssues(a.issue_number, a.k, { state: a.state }),
  }),
  tool({
    name: "find_similar_issues_by_text",
    description: "Nearest issues to a free-text description",
    inputSchema: {
      type: "object",
      properties: { text: { type: "string", description: "Text to search for" }, ...kArg, ...stateArg },
      required: ["text"],
    },
    args: z.object({ text: z.string().trim().min(1), k, state }),
    run: (q, a) => q.findSimilarIssuesByText(a.text, a.k, { state: a.state }),
  }),
  tool({
    name: "find_cross_referenced_issues",
    description: "Issues that mention, or are mentioned by, the given issue",
    inputSchema: { type: "object", properties: issueArg, required: ["issue_number"] },
    args: z.object({ issue_number: issueNumber }),
    run: (q, a) => q.findCrossReferencedIssues(a.issue_number),
  }),
  tool({
    name: "get_issue_metrics",
    description: "Engagement metrics of an issue with the quartile each value falls in and its nearest neighbours",
    inputSchema: { type: "object", properties: issueArg, required: ["issue_number"] },
    args: z.object({ issue_number: issueNumber }),
    run: (q, a) => q.getIssueMetrics(a.issue_number),
  }),
  tool({
    name: "get_top_issues",
    description: "Issues ranked by a metric, with their summaries. Call get_available_metrics for the names",
    inputSchema: {
      type: "object",
      properties: {
        metric: { type: "string", description: "Metric name" },
        n: { type: "integer", description: "Number of results (default 10)" },
        direction: { type: "string", enum: ["asc", "desc"], description: "Sort order (default desc)" },
        ...stateArg,
      },
      required: ["metric"],
    },
    args: z.object({
      metric: z.string(),
      n: z.number().int().min(1).max(500).default(10),
      direction: z.enum(["asc", "desc"]).default("desc"),
      state,
    }),
    run: (q, a) => q.getTopIssues(a.metric, a.n, a.direction, { state: a.state }),
  }),
  tool({
    name: "get_available_metrics",
    description: "Names and meanings of the metrics get_top_issues accepts",
    inputSchema: { type: "object", properties: {} },
    args: z.object({}),
    run: (q) => q.getAvailableMetrics(),
  }),
  tool({
    name: "find_issue_clusters",
    description: "Groups of near-duplicate issues, largest first",
    inputSchema: {
      type: "object",
      properties: {
        threshold: { type: "number", description: "Minimum cosine similarity (default 0.85)" },
        min_size: { type: "integer", description: "Smallest cluster to report (default 2)" },
      },
    },
    args: z.object({ threshold: z.number().min(0).max(1).default(0.85), min_size: z.number().int().min(2).default(2) }),
    run: (q, a) => q.findClusters(a.threshold, a.min_size),
  }),
  tool({
    name: "add_recommendation",
    description: "Record a triage recommendation for an issue. Call get_recommendation_schema for the fields",
    inputSchema: {
      type: "object",
      properties: {
        ...issueArg,
        recommendation: { type: "string" },
        confidence: { type: "string" },
        summary: { type: "string" },
        rationale: { type: "string" },
        report: { type: "string" },
        severity: { type: "string" },
        frequency: { type: "string" },
        prevalence: { type: "string" },
        solution_complexity: { type: "string" },
        solution_risk: { type: "string" },
        affected_packages: { type: "array", items: { type: "string" } },
        affected_paths: { type: "array", items: { type: "string" } },
        affected_components: { type: "array", items: { type: "string" } },
        merge_with: { type: "array", items: { type: "integer" } },
        relevant_issues: { type: "array", items: { type: "object" } },
        reviewer: { type: "string" },
        model_version: { type: "string" },
      },
      required: [
        "issue_number",
        "recommendation",
        "confidence",
        "summary",
        "rationale",
        "report",
        "severity",
        "frequency",
        "prevalence",
        "solution_complexity",
        "solution_risk",
      ],
    },
    args: z.record(z.unknown()),
    run: (q, a) => q.addRecommendation(a),
  }),
  tool({
    name: "get_recommendation_schema",
    description: "Fields, allowed values and scoring of recommendations",
    inputSchema: { type: "object", properties: {} },
    args: z.object({}),
    run: (q) => q.getRecommendationSchema(),
  }),
  tool({
    name: "get_first_issue_without_recommendation",
    description: "Lowest-numbered issue in the given state that has no recommendation yet",
    inputSchema: { type: "object", properties: stateArg },
    args: z.object({ state: z.enum(["open", "closed", "merged"]).default("open") }),
    run: (q, a) => q.getFirstIssueWithoutRecommendation(a.state),
  }),
  tool({
    name: "get_issue_by_difficulty",
    description: "Open issues whose latest recommendation rates them easy, medium or hard to solve",
    inputSchema: {
      type: "object",
      properties: {
        difficulty: { type: "string", enum: ["easy", "medium", "hard"] },
        limit: { type: "integer", description: "Number of results (default 10)" },
      },
      required: ["difficulty"],
    },
    args: z.object({ difficulty: z.enum(["easy", "medium", "hard"]), limit: z.number().int().min(1).max(100).default(10) }),
    run: (q, a) => q.getIssueByDifficulty(a.difficulty, a.limit),
  }),
];

function textResult(payload: unknown, isError = false): CallToolResult {
  const result: CallToolResult = { content: [{ type: "text", text: JSON.stringify(payload, null, 2) }] };
  if (isError) result.isError = true;
  return result;
}

/** Runs a tool by name. Failures come back as `isError` results carrying the error code. */
export async function callTool(query: QueryService, name: string, args: unknown): Promise<CallToolResult> {
  const def = TOOLS.find((t) => t.name === name);
  if (!def) return textResult({ error: "UnknownTool", message: `unknown tool: ${name}` }, true);
  try {
    return textResult(await def.call(query, args));
  } catch (err) {
    if (err instanceof ValidationError) {
      return textResult({ error: err.code, message: err.message, details: err.errors }, true);
    }
    if (err instanceof IssuedexError) return textResult({ error: err.code, message: err.message }, true);
    log.error(`${name} failed: ${errorMessage(err)}`);
    return textResult({ error: "InternalError", message: errorMessage(err) }, true);
  }
}

export function createServer(query: QueryService): Server {
  const server = new Server({ name: "issuedex", version: VERSION }, { capabilities: { tools: {} } });

  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: TOOLS.map(({ name, description, inputSchema }) => ({ name, description, inputSchema })),
  }));

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;
    log.debug(`tool call ${name}`);
    return callTool(query, name, args);
  });

  return server;
}

/** Serves the collection over stdio until the transport closes. Stdout belongs to the protocol. */
export async function startServer(query: QueryService): Promise<Server> {
  const server = createServer(query);
  await server.connect(new StdioServerTransport());
  log.info(`issuedex MCP server ready for ${query.collection} (${query.snapshot.records.size} records)`);
  return server;
}
