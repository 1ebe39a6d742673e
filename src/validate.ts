import { RecommendationSchema } from "./recommendations.js";
import { StoredRecordSchema, type StoredDocument } from "./record.js";
import type { RawRecordRow } from "./store.js";

export const FINDING_CATEGORIES = ["document", "comments", "references", "timestamps", "embedding", "recommendations"] as const;
export type FindingCategory = (typeof FINDING_CATEGORIES)[number];

export interface RecordFinding {
  number: number;
  problems: Partial<Record<FindingCategory, string[]>>;
}

export interface ValidationReport {
  total: number;
  valid: number;
  invalid: RecordFinding[];
  /** problems per category across the collection */
  counts: Partial<Record<FindingCategory, number>>;
}

function checkDocument(doc: StoredDocument): Partial<Record<FindingCategory, string[]>> {
  const problems: Partial<Record<FindingCategory, string[]>> = {};
  const add = (category: FindingCategory, message: string) => {
    (problems[category] ??= []).push(message);
  };

  const seen = new Set<string>();
  for (const c of doc.comments) {
    if (seen.has(c.id)) add("comments", `duplicate comment id ${c.id}`);
    seen.add(c.id);
  }

  if (doc.references.includes(doc.number)) add("references", "references include the record itself");
  if (doc.crossReferences.includes(doc.number)) add("references", "cross-references include the record itself");

  if (Date.parse(doc.updatedAt) < Date.parse(doc.createdAt)) {
    add("timestamps", `updatedAt ${doc.updatedAt} is before createdAt ${doc.createdAt}`);
  }
  if (doc.itemType === "issue" && doc.state === "merged") add("document", "issue has state merged");
  return problems;
}

/** Most common embedding length; ties go to the larger dimension. */
function majorityDimension(rows: readonly RawRecordRow[]): number | undefined {
  const counts = new Map<number, number>();
  for (const r of rows) {
    if (r.embedding) counts.set(r.embedding.length, (counts.get(r.embedding.length) ?? 0) + 1);
  }
  let best: number | undefined;
  let bestCount = 0;
  for (const [dim, n] of counts) {
    if (n > bestCount || (n === bestCount && best !== undefined && dim > best)) {
      best = dim;
      bestCount = n;
    }
  }
  return best;
}

/**
 * Checks every stored row: the document must parse, and its contents must
 * be internally consistent. Rows with no problems count as valid.
 */
export function validateCollection(rows: readonly RawRecordRow[]): ValidationReport {
  const dimension = majorityDimension(rows);
  const invalid: RecordFinding[] = [];
  const counts: Partial<Record<FindingCategory, number>> = {};

  for (const row of rows) {
    let problems: Partial<Record<FindingCategory, string[]>> = {};
    const parsed = StoredRecordSchema.safeParse(row.data);
    if (!parsed.success) {
      problems.document = parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`);
    } else {
      problems = checkDocument(parsed.data);
      if (parsed.data.number !== row.number) {
        (problems.document ??= []).push(`stored under #${row.number} but the document says #${parsed.data.number}`);
      }
    }

    if (row.embedding) {
      const emb: string[] = [];
      if (dimension !== undefined && row.embedding.length !== dimension) {
        emb.push(`embedding has ${row.embedding.length} dimensions, collection uses ${dimension}`);
      }
      if (!row.embedding.every(Number.isFinite)) emb.push("embedding has non-finite values");
      if (emb.length > 0) problems.embedding = emb;
    }

    row.recommendations.forEach((raw, i) => {
      const rec = RecommendationSchema.safeParse(raw);
      if (!rec.success) {
        (problems.recommendations ??= []).push(
          `recommendation ${i + 1}: ${rec.error.issues.map((e) => `${e.path.join(".")}: ${e.message}`).join("; ")}`,
        );
      }
    });

    const categories = FINDING_CATEGORIES.filter((c) => problems[c] !== undefined);
    if (categories.length === 0) continue;
    for (const c of categories) counts[c] = (counts[c] ?? 0) + (problems[c]?.length ?? 0);
    invalid.push({ number: row.number, problems });
  }

  return { total: rows.length, valid: rows.length - invalid.length, invalid, counts };
}
