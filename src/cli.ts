#!/usr/bin/env node
import { Command } from "commander";
import chalk from "chalk";
import ora, { type Ora } from "ora";
import Table from "cli-table3";
import { copyFileSync, existsSync, readFileSync, writeFileSync } from "node:fs";
import { dirname, resolve } from "node:path";
import { createInterface } from "node:readline";
import { fileURLToPath } from "node:url";
import { parseDocument } from "yaml";
import {
  CleanCommandSchema,
  CommonOptionsSchema,
  configOverrides,
  describeEnrich,
  describeFindings,
  describePull,
  EnrichCommandSchema,
  formatValue,
  parseIssueNumbers,
  parseItemTypes,
  parsePositiveInt,
  parseState,
  PullCommandSchema,
  readOptions,
  SimilarCommandSchema,
  TopCommandSchema,
  truncate,
  UpdateCommandSchema,
  ValidateCommandSchema,
  type CommonOptions,
} from "./cli-helpers.js";
import { CONFIG_FILE, collectionName, loadConfig, loadEnvConfig, type EnvConfig, type IssuedexConfig } from "./config.js";
import { createEmbeddingProvider, EmbeddingEngine } from "./embeddings.js";
import { errorMessage, isAbortError, ValidationError } from "./errors.js";
import { GitHubClient } from "./github.js";
import { log } from "./log.js";
import { lockHolder, runClean, runEnrich, runPull, runUpdate, withCollectionLock } from "./pipeline.js";
import { QueryService } from "./query.js";
import { startServer, VERSION } from "./server.js";
import { IssueStore } from "./store.js";
import { createLLMProvider } from "./summarizer.js";
import type { FetchWindow, ItemType, LLMProvider } from "./types.js";
import { validateCollection } from "./validate.js";

const program = new Command();

program
  .name("issuedex")
  .description("Incremental GitHub issue ingestion with embeddings, engagement metrics and similarity search for AI triage")
  .version(VERSION);

// ── context ─────────────────────────────────────────────────────

interface CommandContext {
  config: IssuedexConfig;
  env: EnvConfig;
  collection: string;
  store: IssueStore;
}

function openContext(opts: CommonOptions, overrides: Record<string, unknown> = {}): CommandContext {
  const env = loadEnvConfig();
  log.setLevel(opts.verbose ? "debug" : env.ISSUEDEX_LOG_LEVEL);
  const config = loadConfig(opts.config, { ...configOverrides(opts), ...overrides });
  const collection = collectionName(config.repo, config.collection_prefix);
  return { config, env, collection, store: IssueStore.open(config.data_dir) };
}

async function withContext(
  opts: CommonOptions,
  fn: (ctx: CommandContext) => Promise<void> | void,
  overrides: Record<string, unknown> = {},
): Promise<void> {
  const ctx = openContext(opts, overrides);
  try {
    await fn(ctx);
  } finally {
    ctx.store.close();
  }
}

async function embeddingEngine(ctx: CommandContext): Promise<EmbeddingEngine> {
  const provider = await createEmbeddingProvider({
    provider: ctx.env.EMBEDDING_PROVIDER,
    apiKey: ctx.env.EMBEDDING_API_KEY,
    model: ctx.env.EMBEDDING_MODEL,
    timeoutMs: ctx.config.embedding.timeout_ms,
  });
  const e = ctx.config.embedding;
  return new EmbeddingEngine(provider, ctx.store, {
    batchSize: e.batch_size,
    concurrency: e.concurrency,
    maxAttempts: e.max_attempts,
  });
}

function llmProvider(ctx: CommandContext, requested: boolean): LLMProvider | undefined {
  if (!requested && !ctx.config.summaries.enabled) return undefined;
  return createLLMProvider({
    provider: ctx.env.LLM_PROVIDER,
    apiKey: ctx.env.LLM_API_KEY,
    model: ctx.env.LLM_MODEL,
    timeoutMs: ctx.config.embedding.timeout_ms,
  });
}

function githubClient(ctx: CommandContext): GitHubClient {
  if (!ctx.env.GITHUB_TOKEN) log.warn("GITHUB_TOKEN is not set, GitHub allows 60 unauthenticated requests per hour");
  return new GitHubClient(ctx.env.GITHUB_TOKEN, {
    concurrency: ctx.config.fetch.concurrency,
    timeline: ctx.config.fetch.timeline,
  });
}

/** First Ctrl-C stops after the current window or batch; a second one kills the process. */
function interruptSignal(): AbortSignal {
  const controller = new AbortController();
  process.once("SIGINT", () => {
    process.stderr.write(chalk.yellow("\nInterrupted, stopping after the current step (Ctrl-C again to kill)\n"));
    controller.abort();
  });
  return controller.signal;
}

async function spin<T>(text: string, fn: (spinner: Ora) => Promise<T>): Promise<T> {
  const spinner = ora(text).start();
  try {
    return await fn(spinner);
  } catch (err) {
    spinner.fail(`${text.replace(/\.+$/, "")} failed`);
    throw err;
  }
}

function windowText(itemType: ItemType, window: FetchWindow, fetched: number): string {
  const day = (d: Date) => d.toISOString().slice(0, 10);
  return `Pulling ${itemType}s ${day(window.start)} → ${day(window.end)} (${fetched} in window)`;
}

/** Warns, once per run, when another window the size of the last one would exhaust the API budget. */
function budgetWarner(github: GitHubClient, spinner: Ora): (fetched: number) => void {
  let warned = false;
  return (fetched) => {
    const warning = warned ? null : github.formatRateLimitWarning(github.estimateApiCalls(fetched));
    if (!warning) return;
    warned = true;
    spinner.clear();
    console.log(chalk.yellow(`⚠ ${warning}`));
  };
}

function progressText(stage: "embed" | "summarize", done: number, total: number): string {
  return `${stage === "embed" ? "Embedding" : "Summarizing"}... ${done}/${total}`;
}

async function confirm(question: string): Promise<boolean> {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  const answer = await new Promise<string>((resolve) => {
    rl.question(chalk.yellow(`${question} (y/N) `), resolve);
  });
  rl.close();
  return answer.trim().toLowerCase() === "y";
}

function packageRoot(): string {
  let dir = dirname(fileURLToPath(import.meta.url));
  while (!existsSync(resolve(dir, "package.json"))) {
    const parent = dirname(dir);
    if (parent === dir) throw new Error("cannot locate the issuedex package directory");
    dir = parent;
  }
  return dir;
}

function withCollectionOptions(cmd: Command): Command {
  return cmd
    .option("-r, --repo <owner/repo>", "Repository (overrides the config file)")
    .option("-p, --prefix <prefix>", "Collection prefix, keeps separate collections for one repository")
    .option("-c, --config <path>", `Config file (default ./${CONFIG_FILE})`)
    .option("-v, --verbose", "Debug logging");
}

// ── init ────────────────────────────────────────────────────────
withCollectionOptions(program.command("init"))
  .description("Create .env and issuedex.config.yaml in the current directory")
  .action((raw: unknown) => {
    const opts = readOptions(CommonOptionsSchema, raw);
    const root = packageRoot();
    const envExample = resolve(root, ".env.example");
    const configExample = resolve(root, CONFIG_FILE);

    if (!existsSync(".env") && existsSync(envExample)) {
      copyFileSync(envExample, ".env");
      console.log(chalk.green("✓") + " Created .env (edit with your API keys)");
    } else if (existsSync(".env")) {
      console.log(chalk.yellow("⊘") + " .env already exists");
    }

    if (!existsSync(CONFIG_FILE) && existsSync(configExample)) {
      const doc = parseDocument(readFileSync(configExample, "utf-8"));
      if (opts.repo) doc.set("repo", opts.repo);
      if (opts.prefix) doc.set("collection_prefix", opts.prefix);
      writeFileSync(CONFIG_FILE, doc.toString());
      console.log(chalk.green("✓") + ` Created ${CONFIG_FILE} (edit repo and settings)`);
    } else if (existsSync(CONFIG_FILE)) {
      console.log(chalk.yellow("⊘") + ` ${CONFIG_FILE} already exists`);
    }

    console.log("\n" + chalk.bold("Next steps:"));
    console.log("  1. Edit .env with your GitHub token and embedding provider key");
    console.log(`  2. Edit ${CONFIG_FILE} with your repo and start date`);
    console.log("  3. Run: issuedex update");
  });

// ── pull ────────────────────────────────────────────────────────
withCollectionOptions(program.command("pull"))
  .description("Fetch items updated since the last checkpoint and merge them into the collection")
  .option("--force", "Refetch every window from the start date")
  .option("--start-date <YYYY-MM-DD>", "First day to fetch")
  .option("--item-types <list>", "Item types to fetch (issue,pr)", parseItemTypes)
  .option("--issues <list>", "Fetch only these issue numbers, e.g. 12,40-45", parseIssueNumbers)
  .action(async (raw: unknown) => {
    const opts = readOptions(PullCommandSchema, raw);
    await withContext(opts, async (ctx) => {
      const github = githubClient(ctx);
      const result = await spin(`Pulling from ${ctx.config.repo}...`, async (spinner) => {
        const warnBudget = budgetWarner(github, spinner);
        const pulled = await runPull({
          store: ctx.store,
          source: github,
          config: ctx.config,
          collection: ctx.collection,
          force: opts.force,
          issues: opts.issues,
          signal: interruptSignal(),
          onWindow: (itemType, window, fetched) => {
            spinner.text = windowText(itemType, window, fetched);
            warnBudget(fetched);
          },
        });
        spinner.succeed(describePull(pulled));
        return pulled;
      });
      if (result.contentChanged.length > 0) {
        console.log(chalk.dim(`${result.contentChanged.length} items changed text. Run \`issuedex enrich\` to re-embed them`));
      }
      const rl = github.getRateLimit();
      console.log(chalk.dim(`API budget: ${rl.remaining}/${rl.limit} remaining`));
    }, configOverrides(opts));
  });

// ── enrich ──────────────────────────────────────────────────────
withCollectionOptions(program.command("enrich"))
  .description("Embed changed records, then recompute metrics and quartiles for the collection")
  .option("--summaries", "Also generate LLM summaries")
  .action(async (raw: unknown) => {
    const opts = readOptions(EnrichCommandSchema, raw);
    await withContext(opts, async (ctx) => {
      const engine = await embeddingEngine(ctx);
      const llm = llmProvider(ctx, opts.summaries);
      const result = await spin("Enriching collection...", async (spinner) => {
        const enriched = await runEnrich({
          store: ctx.store,
          config: ctx.config,
          collection: ctx.collection,
          engine,
          llm,
          signal: interruptSignal(),
          onProgress: (stage, done, total) => {
            spinner.text = progressText(stage, done, total);
          },
        });
        spinner.succeed(describeEnrich(enriched));
        return enriched;
      });
      if (result.embeddingFailed > 0) {
        console.log(chalk.yellow(`${result.embeddingFailed} records could not be embedded and have no vector until the next run`));
      }
    });
  });

// ── update ──────────────────────────────────────────────────────
withCollectionOptions(program.command("update"))
  .description("Pull, then enrich")
  .option("--force", "Refetch every window from the start date")
  .option("--start-date <YYYY-MM-DD>", "First day to fetch")
  .option("--item-types <list>", "Item types to fetch (issue,pr)", parseItemTypes)
  .option("--issues <list>", "Fetch only these issue numbers, e.g. 12,40-45", parseIssueNumbers)
  .option("--summaries", "Also generate LLM summaries")
  .action(async (raw: unknown) => {
    const opts = readOptions(UpdateCommandSchema, raw);
    await withContext(opts, async (ctx) => {
      const github = githubClient(ctx);
      const engine = await embeddingEngine(ctx);
      const llm = llmProvider(ctx, opts.summaries);
      await spin(`Updating ${ctx.collection}...`, async (spinner) => {
        const warnBudget = budgetWarner(github, spinner);
        const { pull, enrich } = await runUpdate({
          store: ctx.store,
          source: github,
          config: ctx.config,
          collection: ctx.collection,
          force: opts.force,
          issues: opts.issues,
          engine,
          llm,
          signal: interruptSignal(),
          onWindow: (itemType, window, fetched) => {
            spinner.text = windowText(itemType, window, fetched);
            warnBudget(fetched);
          },
          onProgress: (stage, done, total) => {
            spinner.text = progressText(stage, done, total);
          },
        });
        spinner.succeed(describePull(pull));
        console.log(chalk.green("✔") + ` ${describeEnrich(enrich)}`);
        if (enrich.embeddingFailed > 0) {
          console.log(chalk.yellow(`${enrich.embeddingFailed} records could not be embedded and have no vector until the next run`));
        }
      });
      const rl = github.getRateLimit();
      console.log(chalk.dim(`API budget: ${rl.remaining}/${rl.limit} remaining`));
    }, configOverrides(opts));
  });

// ── serve ───────────────────────────────────────────────────────
withCollectionOptions(program.command("serve"))
  .description("Serve the collection to MCP clients over stdio (SIGHUP reloads it)")
  .action(async (raw: unknown) => {
    const opts = readOptions(CommonOptionsSchema, raw);
    const ctx = openContext(opts);
    let engine: EmbeddingEngine | undefined;
    try {
      engine = await embeddingEngine(ctx);
    } catch (err) {
      log.warn(`text search disabled: ${errorMessage(err)}`);
    }

    const query = new QueryService(ctx.store, ctx.collection, engine);
    const server = await startServer(query);
    server.onclose = () => ctx.store.close();
    process.on("SIGHUP", () => {
      const snapshot = query.refresh();
      log.info(`reloaded ${ctx.collection} (${snapshot.records.size} records)`);
    });
  });

// ── validate ────────────────────────────────────────────────────
withCollectionOptions(program.command("validate"))
  .description("Check every stored record for consistency")
  .option("--delete-invalid", "Delete the records that fail")
  .action(async (raw: unknown) => {
    const opts = readOptions(ValidateCommandSchema, raw);
    await withContext(opts, async (ctx) => {
      const report = validateCollection(ctx.store.loadRawRows(ctx.collection));
      console.log(chalk.bold(`${ctx.collection}: ${report.total} records, ${report.valid} valid, ${report.invalid.length} invalid`));
      if (report.invalid.length === 0) return;

      const table = new Table({ head: ["Category", "Problems"], colWidths: [18, 10] });
      for (const [category, count] of Object.entries(report.counts)) table.push([category, count ?? 0]);
      console.log(table.toString());
      for (const line of describeFindings(report)) console.log(chalk.dim(`  ${line}`));

      if (!opts.deleteInvalid) {
        process.exitCode = 1;
        return;
      }
      const numbers = report.invalid.map((f) => f.number);
      const deleted = await withCollectionLock(
        ctx.store,
        ctx.collection,
        { holder: lockHolder("validate"), ttlMinutes: ctx.config.lock_ttl_minutes },
        async () => ctx.store.purgeRecords(ctx.collection, numbers),
      );
      console.log(chalk.green("✓") + ` Deleted ${deleted} invalid records. Run \`issuedex pull --issues ${numbers.join(",")}\` to refetch them`);
    });
  });

// ── clean ───────────────────────────────────────────────────────
withCollectionOptions(program.command("clean"))
  .description("Delete the collection's records, checkpoints and recommendations")
  .option("-y, --yes", "Skip confirmation prompt")
  .option("--locks", "Only release locks left behind by interrupted runs")
  .option("--caches", "Also clear the embedding and summary caches")
  .action(async (raw: unknown) => {
    const opts = readOptions(CleanCommandSchema, raw);
    await withContext(opts, async (ctx) => {
      if (opts.locks) {
        const released = ctx.store.clearLocks(ctx.collection);
        console.log(chalk.green("✓") + ` Released ${released} lock${released === 1 ? "" : "s"} on ${ctx.collection}`);
        return;
      }

      if (!opts.yes && !(await confirm(`Delete every record, checkpoint and recommendation in ${ctx.collection}?`))) {
        console.log("Cancelled.");
        return;
      }

      const { caches } = await runClean(ctx.store, ctx.collection, { ttlMinutes: ctx.config.lock_ttl_minutes, caches: opts.caches });
      console.log(chalk.green("✓") + ` Deleted ${ctx.collection}. Run \`issuedex update\` to rebuild.`);
      if (caches) {
        console.log(chalk.green("✓") + ` Cleared ${caches.embeddings} cached embeddings and ${caches.completions} cached summaries`);
      }
    });
  });

// ── status ──────────────────────────────────────────────────────
withCollectionOptions(program.command("status"))
  .description("Show collection stats and checkpoints")
  .action(async (raw: unknown) => {
    const opts = readOptions(CommonOptionsSchema, raw);
    await withContext(opts, (ctx) => {
      const stats = ctx.store.getStats(ctx.collection);

      console.log(chalk.bold("issuedex status\n"));
      console.log(`  Collection:      ${ctx.collection}`);
      console.log(`  Issues:          ${stats.issues}`);
      console.log(`  PRs:             ${stats.prs}`);
      console.log(`  Embedded:        ${stats.embedded}/${stats.records}`);
      console.log(`  Recommendations: ${stats.recommendations}`);
      console.log(`  Start date:      ${ctx.config.start_date}\n`);

      if (stats.checkpoints.length === 0) {
        console.log(chalk.dim("  No checkpoints yet. Run `issuedex pull`."));
      }
      for (const cp of stats.checkpoints) {
        console.log(`  Checkpoint (${cp.itemType}): ${cp.lastWindowEnd ?? "no complete window"}`);
      }

      console.log(`\n  Embeddings: ${ctx.env.EMBEDDING_PROVIDER} (${ctx.env.EMBEDDING_MODEL ?? "default model"})`);
      console.log(`  LLM:        ${ctx.env.LLM_PROVIDER} (${ctx.env.LLM_MODEL ?? "default model"})`);
    });
  });

// ── top ─────────────────────────────────────────────────────────
withCollectionOptions(program.command("top"))
  .description("Rank issues by a metric")
  .argument("<metric>", "Metric name, e.g. engagements, activityScore, knnDistance")
  .option("-n, --limit <number>", "Show top N results", parsePositiveInt)
  .option("--asc", "Lowest values first")
  .option("--state <state>", "Only issues in this state (open, closed, merged)", parseState)
  .action(async (metric: string, raw: unknown) => {
    const opts = readOptions(TopCommandSchema, raw);
    await withContext(opts, (ctx) => {
      const query = new QueryService(ctx.store, ctx.collection);
      const rows = query.getTopIssues(metric, opts.limit, opts.asc ? "asc" : "desc", { state: opts.state });
      if (rows.length === 0) {
        console.log(chalk.yellow(`No issues with metrics in ${ctx.collection}. Run \`issuedex enrich\` first.`));
        return;
      }

      const table = new Table({ head: ["Rank", "#", metric, "State", "Title"], colWidths: [6, 8, 16, 8, 50] });
      rows.forEach((r, i) => {
        table.push([i + 1, r.number, formatValue(r.value), r.state, truncate(r.title, 48)]);
      });
      console.log(table.toString());
    });
  });

// ── similar ─────────────────────────────────────────────────────
withCollectionOptions(program.command("similar"))
  .description("List the issues most similar to an issue")
  .argument("<number>", "Issue number", parsePositiveInt)
  .option("-n, --limit <number>", "Number of results", parsePositiveInt)
  .option("--state <state>", "Only issues in this state (open, closed, merged)", parseState)
  .action(async (number: number, raw: unknown) => {
    const opts = readOptions(SimilarCommandSchema, raw);
    await withContext(opts, (ctx) => {
      const query = new QueryService(ctx.store, ctx.collection);
      const issue = query.getIssue(number);
      const hits = query.findSimilarIssues(number, opts.limit, { state: opts.state });

      console.log(chalk.bold(`\n#${issue.number} ${issue.title}\n`));
      const table = new Table({ head: ["#", "Similarity", "State", "Title"], colWidths: [8, 12, 8, 56] });
      for (const hit of hits) {
        table.push([hit.number, `${(hit.similarity * 100).toFixed(1)}%`, hit.state, truncate(hit.title, 54)]);
      }
      console.log(table.toString());
    });
  });

program.parseAsync().catch((err: unknown) => {
  if (isAbortError(err)) {
    console.error(chalk.yellow("Stopped. Progress up to the last completed step is saved."));
    process.exitCode = 130;
    return;
  }
  console.error(chalk.red(`error: ${errorMessage(err)}`));
  if (err instanceof ValidationError) {
    for (const detail of err.errors) console.error(chalk.dim(`  ${detail}`));
  }
  process.exitCode = 1;
});
