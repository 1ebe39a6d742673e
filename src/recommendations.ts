import { randomUUID } from "node:crypto";
import { z } from "zod";
import { ValidationError } from "./errors.js";

export const LEVELS = ["low", "medium", "high"] as const;

export const RECOMMENDATION_KINDS = [
  "close_completed",
  "close_merge",
  "close_not_planned",
  "close_invalid",
  "almost_done",
  "priority_high",
  "priority_medium",
  "priority_low",
  "needs_more_info",
] as const;

const KIND_DESCRIPTIONS: Record<(typeof RECOMMENDATION_KINDS)[number], string> = {
  close_completed: "Issue has been completed/fixed",
  close_merge: "Issue should be merged with another issue",
  close_not_planned: "Valid issue but not aligned with roadmap",
  close_invalid: "Invalid issue (spam, off-topic, etc.)",
  almost_done: "Issue is nearly complete, needs minor work",
  priority_high: "Critical issue needing immediate attention",
  priority_medium: "Important issue for next sprint/release",
  priority_low: "Valid issue but lower priority",
  needs_more_info: "Requires additional details from reporter",
};

const LevelSchema = z.enum(LEVELS);
export type Level = z.infer<typeof LevelSchema>;

const RelevantIssueSchema = z.object({
  number: z.number().int().positive(),
  title: z.string(),
  url: z.string(),
});

const AnalysisSchema = z.object({
  severity: LevelSchema,
  frequency: LevelSchema,
  prevalence: LevelSchema,
  solutionComplexity: LevelSchema,
  solutionRisk: LevelSchema,
});
export type Analysis = z.infer<typeof AnalysisSchema>;

export const RecommendationSchema = z.object({
  recommendation: z.enum(RECOMMENDATION_KINDS),
  confidence: LevelSchema,
  summary: z.string().min(1),
  rationale: z.string().min(1),
  report: z.string().min(1),
  analysis: AnalysisSchema,
  priorityScore: z.number().int().min(5).max(15),
  context: z.object({
    affectedPackages: z.array(z.string()),
    affectedPaths: z.array(z.string()),
    affectedComponents: z.array(z.string()),
    mergeWith: z.array(z.number().int().positive()),
    relevantIssues: z.array(RelevantIssueSchema),
  }),
  meta: z.object({
    reviewer: z.string(),
    timestamp: z.string(),
    modelVersion: z.string().nullable(),
    reviewId: z.string(),
  }),
});
export type Recommendation = z.infer<typeof RecommendationSchema>;

const nonEmpty = (field: string) => z.string().trim().min(1, `${field} must be a non-empty string`);

/** Tool-facing shape: snake_case, flat analysis fields. */
export const RecommendationInputSchema = z.object({
  issue_number: z.number().int().positive(),
  recommendation: z.enum(RECOMMENDATION_KINDS),
  confidence: LevelSchema,
  summary: nonEmpty("summary"),
  rationale: nonEmpty("rationale"),
  report: nonEmpty("report"),
  severity: LevelSchema,
  frequency: LevelSchema,
  prevalence: LevelSchema,
  solution_complexity: LevelSchema,
  solution_risk: LevelSchema,
  affected_packages: z.array(z.string()).default([]),
  affected_paths: z.array(z.string()).default([]),
  affected_components: z.array(z.string()).default([]),
  merge_with: z.array(z.number().int().positive()).default([]),
  relevant_issues: z.array(RelevantIssueSchema).default([]),
  reviewer: z.string().default("ai"),
  model_version: z.string().optional(),
});
export type RecommendationInput = z.output<typeof RecommendationInputSchema>;

export function parseRecommendationInput(raw: unknown): RecommendationInput {
  const parsed = RecommendationInputSchema.safeParse(raw);
  if (!parsed.success) {
    const errors = parsed.error.issues.map((i) => `${i.path.join(".") || "input"}: ${i.message}`);
    throw new ValidationError("recommendation validation failed", errors);
  }
  return parsed.data;
}

const RISING: Record<Level, number> = { low: 1, medium: 2, high: 3 };
const FALLING: Record<Level, number> = { low: 3, medium: 2, high: 1 };

/**
 * 5..15. Severity, frequency and prevalence raise priority; solution
 * complexity and risk lower it.
 */
export function calculatePriorityScore(analysis: Analysis): number {
  return (
    RISING[analysis.severity] +
    RISING[analysis.frequency] +
    RISING[analysis.prevalence] +
    FALLING[analysis.solutionComplexity] +
    FALLING[analysis.solutionRisk]
  );
}

export function buildRecommendation(
  input: RecommendationInput,
  now: Date = new Date(),
  reviewId: string = randomUUID(),
): Recommendation {
  const analysis: Analysis = {
    severity: input.severity,
    frequency: input.frequency,
    prevalence: input.prevalence,
    solutionComplexity: input.solution_complexity,
    solutionRisk: input.solution_risk,
  };
  return {
    recommendation: input.recommendation,
    confidence: input.confidence,
    summary: input.summary,
    rationale: input.rationale,
    report: input.report,
    analysis,
    priorityScore: calculatePriorityScore(analysis),
    context: {
      affectedPackages: input.affected_packages,
      affectedPaths: input.affected_paths,
      affectedComponents: input.affected_components,
      mergeWith: input.merge_with,
      relevantIssues: input.relevant_issues,
    },
    meta: {
      reviewer: input.reviewer,
      timestamp: now.toISOString(),
      modelVersion: input.model_version ?? null,
      reviewId,
    },
  };
}

export type Difficulty = "easy" | "medium" | "hard";

export function difficultyOf(rec: Recommendation): Difficulty {
  const { solutionComplexity, solutionRisk } = rec.analysis;
  if (solutionComplexity === "low" && solutionRisk === "low") return "easy";
  if (solutionComplexity === "high" || solutionRisk === "high") return "hard";
  return "medium";
}

/** Self-description handed to agents before they write recommendations. */
export function recommendationSchemaDoc() {
  return {
    schema_version: "1.0",
    description: "Schema for issue recommendations with structured analysis",
    fields: {
      recommendation: { type: "string", required: true, enum: RECOMMENDATION_KINDS, enum_descriptions: KIND_DESCRIPTIONS },
      confidence: { type: "string", required: true, enum: LEVELS },
      summary: { type: "string", required: true, example: "Close as duplicate of #123" },
      rationale: { type: "string", required: true, example: "Same root cause as #123" },
      report: { type: "string", required: true, description: "Full markdown report" },
      severity: { type: "string", required: true, enum: LEVELS, description: "Impact on users/system" },
      frequency: { type: "string", required: true, enum: LEVELS, description: "How often the issue occurs" },
      prevalence: { type: "string", required: true, enum: LEVELS, description: "How many users are affected" },
      solution_complexity: { type: "string", required: true, enum: LEVELS, description: "Estimated effort" },
      solution_risk: { type: "string", required: true, enum: LEVELS, description: "Risk of breaking changes" },
      affected_packages: { type: "array", items: "string" },
      affected_paths: { type: "array", items: "string", example: ["src/widget.ts:42", "src/model.ts:120-145"] },
      affected_components: { type: "array", items: "string" },
      merge_with: { type: "array", items: "integer", description: "Issue numbers to merge with (close_merge)" },
      relevant_issues: { type: "array", items: { number: "integer", title: "string", url: "string" } },
      reviewer: { type: "string", default: "ai" },
      model_version: { type: "string" },
    },
    priority_score: "severity + frequency + prevalence (low=1..high=3) + complexity + risk (low=3..high=1), range 5-15",
  };
}
