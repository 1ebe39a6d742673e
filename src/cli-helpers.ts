import { InvalidArgumentError } from "commander";
import { z } from "zod";
import { ValidationError } from "./errors.js";
import type { EnrichResult, PullResult } from "./pipeline.js";
import type { RecordState } from "./record.js";
import { ITEM_TYPES, type ItemType } from "./types.js";
import { FINDING_CATEGORIES, type ValidationReport } from "./validate.js";

// ── option parsers (commander argParser callbacks) ──────────────

function isItemType(value: string): value is ItemType {
  return ITEM_TYPES.some((t) => t === value);
}

export function parseItemTypes(value: string): ItemType[] {
  const types: ItemType[] = [];
  for (const part of value.split(",").map((s) => s.trim().toLowerCase()).filter(Boolean)) {
    if (!isItemType(part)) throw new InvalidArgumentError(`unknown item type "${part}". expected ${ITEM_TYPES.join(" or ")}`);
    if (!types.includes(part)) types.push(part);
  }
  if (types.length === 0) throw new InvalidArgumentError("no item types given");
  return types;
}

export function parsePositiveInt(value: string): number {
  if (!/^\d+$/.test(value.trim())) throw new InvalidArgumentError(`"${value}" is not a positive integer`);
  const n = parseInt(value, 10);
  if (n < 1) throw new InvalidArgumentError(`"${value}" is not a positive integer`);
  return n;
}

/** "12,40-42" → [12, 40, 41, 42]; sorted, without repeats */
export function parseIssueNumbers(value: string): number[] {
  const numbers = new Set<number>();
  for (const part of value.split(",").map((s) => s.trim()).filter(Boolean)) {
    const range = part.match(/^(\d+)-(\d+)$/);
    if (range) {
      const from = parsePositiveInt(range[1]);
      const to = parsePositiveInt(range[2]);
      if (to < from) throw new InvalidArgumentError(`range "${part}" runs backwards`);
      if (to - from >= 1000) throw new InvalidArgumentError(`range "${part}" is too large (1000 issues at most)`);
      for (let n = from; n <= to; n++) numbers.add(n);
    } else {
      numbers.add(parsePositiveInt(part));
    }
  }
  if (numbers.size === 0) throw new InvalidArgumentError("no issue numbers given");
  return [...numbers].sort((a, b) => a - b);
}

const STATES: readonly RecordState[] = ["open", "closed", "merged"];

export function parseState(value: string): RecordState {
  const state = STATES.find((s) => s === value.trim().toLowerCase());
  if (!state) throw new InvalidArgumentError(`unknown state "${value}". expected ${STATES.join(", ")}`);
  return state;
}

// ── parsed option shapes ────────────────────────────────────────

export const CommonOptionsSchema = z.object({
  repo: z.string().optional(),
  prefix: z.string().optional(),
  config: z.string().optional(),
  verbose: z.boolean().default(false),
});
export type CommonOptions = z.output<typeof CommonOptionsSchema>;

export const PullCommandSchema = CommonOptionsSchema.extend({
  force: z.boolean().default(false),
  startDate: z.string().optional(),
  itemTypes: z.array(z.enum(["issue", "pr"])).optional(),
  issues: z.array(z.number().int().positive()).optional(),
});

export const EnrichCommandSchema = CommonOptionsSchema.extend({
  summaries: z.boolean().default(false),
});

export const UpdateCommandSchema = PullCommandSchema.merge(EnrichCommandSchema);

export const ValidateCommandSchema = CommonOptionsSchema.extend({
  deleteInvalid: z.boolean().default(false),
});

export const CleanCommandSchema = CommonOptionsSchema.extend({
  yes: z.boolean().default(false),
  locks: z.boolean().default(false),
  caches: z.boolean().default(false),
});

export const TopCommandSchema = CommonOptionsSchema.extend({
  limit: z.number().int().positive().default(10),
  asc: z.boolean().default(false),
  state: z.enum(["open", "closed", "merged"]).optional(),
});

export const SimilarCommandSchema = CommonOptionsSchema.extend({
  limit: z.number().int().positive().default(5),
  state: z.enum(["open", "closed", "merged"]).optional(),
});

/** Commander hands actions an untyped options bag; this gives it a shape. */
export function readOptions<S extends z.ZodTypeAny>(schema: S, raw: unknown): z.output<S> {
  const parsed = schema.safeParse(raw ?? {});
  if (!parsed.success) {
    const errors = parsed.error.issues.map((i) => `--${i.path.join(".")}: ${i.message}`);
    throw new ValidationError("invalid options", errors);
  }
  return parsed.data;
}

/** Command-line values that replace the matching config file keys. */
export function configOverrides(opts: {
  repo?: string;
  prefix?: string;
  startDate?: string;
  itemTypes?: readonly ItemType[];
}): Record<string, unknown> {
  const overrides: Record<string, unknown> = {};
  if (opts.repo !== undefined) overrides.repo = opts.repo;
  if (opts.prefix !== undefined) overrides.collection_prefix = opts.prefix;
  if (opts.startDate !== undefined) overrides.start_date = opts.startDate;
  if (opts.itemTypes !== undefined) overrides.item_types = [...opts.itemTypes];
  return overrides;
}

// ── output ──────────────────────────────────────────────────────

export function formatValue(value: number): string {
  return Number.isInteger(value) ? String(value) : value.toFixed(2);
}

export function truncate(text: string, width: number): string {
  return text.length <= width ? text : `${text.slice(0, width - 1)}…`;
}

export function describePull(result: PullResult): string {
  let line = `Pulled ${result.fetched} items`;
  if (result.windows > 0) line += ` in ${result.windows} window${result.windows === 1 ? "" : "s"}`;
  line += `: ${result.inserted} new, ${result.updated} updated`;
  if (result.rejected > 0) line += `, ${result.rejected} rejected`;
  return line;
}

export function describeEnrich(result: EnrichResult): string {
  let line = `Enriched ${result.saved} records: ${result.embedded} embedded`;
  if (result.summarized > 0) line += `, ${result.summarized} summarized`;
  return line;
}

/** One line per problem, at most `limit` lines, with a count of what was left out. */
export function describeFindings(report: ValidationReport, limit = 20): string[] {
  const lines: string[] = [];
  let total = 0;
  for (const finding of report.invalid) {
    for (const category of FINDING_CATEGORIES) {
      for (const problem of finding.problems[category] ?? []) {
        total++;
        if (lines.length < limit) lines.push(`#${finding.number} ${category}: ${problem}`);
      }
    }
  }
  if (total > lines.length) lines.push(`… and ${total - lines.length} more`);
  return lines;
}
