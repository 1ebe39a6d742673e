import { existsSync, readFileSync } from "node:fs";
import { resolve } from "node:path";
import { config as loadEnv } from "dotenv";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import { ValidationError } from "./errors.js";

export const CONFIG_FILE = "issuedex.config.yaml";
const SUPPORTED_VERSION = 1;

const FetchSchema = z.object({
  window_days: z.number().int().positive().default(7),
  concurrency: z.number().int().positive().default(4),
  max_attempts: z.number().int().positive().default(5),
  timeline: z.boolean().default(true),
});

const EmbeddingSchema = z.object({
  batch_size: z.number().int().positive().default(32),
  concurrency: z.number().int().positive().default(2),
  max_attempts: z.number().int().positive().default(4),
  timeout_ms: z.number().int().positive().default(60_000),
});

const ActivitySchema = z.object({
  recency_weight: z.number().nonnegative().default(0.5),
  engagement_weight: z.number().nonnegative().default(0.5),
  half_life_days: z.number().positive().default(30),
});

const MetricsSchema = z.object({
  knn_k: z.number().int().positive().default(4),
  activity: ActivitySchema.optional().transform((v) => ActivitySchema.parse(v ?? {})),
});

const SummariesSchema = z.object({
  enabled: z.boolean().default(false),
});

const isoDay = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, "expected YYYY-MM-DD");

const ConfigSchema = z.object({
  version: z.number().optional().default(1),
  repo: z.string(),
  collection_prefix: z.string().default(""),
  start_date: isoDay.default("2024-01-01"),
  item_types: z.array(z.enum(["issue", "pr"])).min(1).default(["issue"]),
  data_dir: z.string().default("./data"),
  lock_ttl_minutes: z.number().positive().default(30),
  fetch: FetchSchema.optional().transform((v) => FetchSchema.parse(v ?? {})),
  embedding: EmbeddingSchema.optional().transform((v) => EmbeddingSchema.parse(v ?? {})),
  metrics: MetricsSchema.optional().transform((v) => MetricsSchema.parse(v ?? {})),
  summaries: SummariesSchema.optional().transform((v) => SummariesSchema.parse(v ?? {})),
});

export type IssuedexConfig = z.infer<typeof ConfigSchema>;

const EnvSchema = z.object({
  GITHUB_TOKEN: z.string().optional(),
  EMBEDDING_PROVIDER: z.enum(["openai", "mistral", "jina", "voyageai", "ollama", "kimi"]).default("openai"),
  EMBEDDING_API_KEY: z.string().optional(),
  EMBEDDING_MODEL: z.string().optional(),
  LLM_PROVIDER: z.enum(["openai", "mistral", "anthropic", "ollama"]).default("openai"),
  LLM_API_KEY: z.string().optional(),
  LLM_MODEL: z.string().optional(),
  ISSUEDEX_LOG_LEVEL: z.enum(["debug", "info", "warn", "error", "silent"]).default("info"),
});

export type EnvConfig = z.infer<typeof EnvSchema>;

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`);
}

/** Validates an already-parsed config object. `overrides` win over file values. */
export function parseConfig(raw: unknown, overrides: Record<string, unknown> = {}): IssuedexConfig {
  const base = raw !== null && typeof raw === "object" ? raw : {};
  const parsed = ConfigSchema.safeParse({ ...base, ...overrides });
  if (!parsed.success) {
    const issues = formatIssues(parsed.error);
    throw new ValidationError(`invalid config: ${issues.join("; ")}`, issues);
  }
  if (parsed.data.version > SUPPORTED_VERSION) {
    throw new ValidationError(
      `config version ${parsed.data.version} requires a newer version of issuedex. run \`npm install -g issuedex\` to upgrade.`,
      [],
    );
  }
  return parsed.data;
}

/**
 * Reads the YAML project file. When it is missing, a `--repo` override is
 * enough to run with defaults.
 */
export function loadConfig(configPath?: string, overrides: Record<string, unknown> = {}): IssuedexConfig {
  const p = configPath || resolve(process.cwd(), CONFIG_FILE);
  if (!existsSync(p)) {
    if (configPath || overrides.repo === undefined) {
      throw new ValidationError(`config not found at ${p}. run \`issuedex init\` or pass \`--repo owner/name\``, []);
    }
    return parseConfig({}, overrides);
  }
  return parseConfig(parseYaml(readFileSync(p, "utf-8")), overrides);
}

export function loadEnvConfig(envPath?: string): EnvConfig {
  loadEnv({ path: envPath || resolve(process.cwd(), ".env") });
  return parseEnv(process.env);
}

export function parseEnv(env: Record<string, string | undefined>): EnvConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = formatIssues(parsed.error);
    throw new ValidationError(`invalid environment: ${issues.join("; ")}`, issues);
  }
  return parsed.data;
}

export function parseRepo(repo: string): { owner: string; repo: string } {
  let cleaned = repo.trim();
  cleaned = cleaned.replace(/^https?:\/\/github\.com\//, "");
  cleaned = cleaned.replace(/^github\.com\//, "");
  cleaned = cleaned.replace(/\.git$/, "");
  cleaned = cleaned.replace(/\/$/, "");

  const parts = cleaned.split("/").filter(Boolean);
  const [owner, name] = parts;
  if (parts.length !== 2 || !owner || !name) {
    throw new ValidationError(`invalid repo format: "${repo}". expected owner/repo`, []);
  }
  return { owner, repo: name };
}

/**
 * Storage key for a (repository, prefix) pair. Distinct prefixes never share
 * records, checkpoints or indexes.
 */
export function collectionName(repo: string, prefix = ""): string {
  const { owner, repo: name } = parseRepo(repo);
  const base = `${owner}/${name}`.toLowerCase();
  const p = prefix.trim();
  return p ? `${p}:${base}` : base;
}
