import {
  type IssueRecord,
  METRIC_NAMES,
  type MetricBundle,
  type MetricName,
  negativeReactions,
  positiveReactions,
  QUARTILE_LABELS,
  type QuartileBundle,
  totalReactions,
} from "./record.js";

export { METRIC_NAMES, type MetricName } from "./record.js";

const DAY_MS = 24 * 60 * 60 * 1000;

export interface ActivityWeights {
  recencyWeight: number;
  engagementWeight: number;
  halfLifeDays: number;
}

export const DEFAULT_ACTIVITY: ActivityWeights = { recencyWeight: 0.5, engagementWeight: 0.5, halfLifeDays: 30 };

export interface MetricOptions {
  now: Date;
  knnDistance?: number;
  activity?: ActivityWeights;
}

export const METRIC_DESCRIPTIONS: Record<MetricName, string> = {
  commentCount: "Number of comments",
  bodyReactions: "Reactions on the issue body",
  commentReactions: "Reactions across all comments",
  positiveReactions: "Thumbs up, laugh, hooray, heart and rocket reactions",
  negativeReactions: "Thumbs down and confused reactions",
  totalReactions: "Body plus comment reactions",
  engagements: "Comments plus reactions",
  engagementsPerDay: "Engagements divided by age in days",
  ageDays: "Whole days between creation and last update",
  daysSinceUpdate: "Days since the last update",
  activityScore: "Blend of recency and engagement, higher is more active",
  knnDistance: "Mean cosine distance to the nearest neighbours, lower means more duplicates nearby",
};

export function isMetricName(name: string): name is MetricName {
  return METRIC_NAMES.some((m) => m === name);
}

/**
 * Recency decays by half every `halfLifeDays`; engagement saturates as
 * ln(1+e)/(1+ln(1+e)). Non-decreasing in both engagement and recency.
 */
export function activityScore(daysSinceUpdate: number, engagements: number, weights: ActivityWeights = DEFAULT_ACTIVITY): number {
  const recency = 0.5 ** (Math.max(0, daysSinceUpdate) / weights.halfLifeDays);
  const l = Math.log1p(Math.max(0, engagements));
  return weights.recencyWeight * recency + weights.engagementWeight * (l / (1 + l));
}

export function computeMetrics(record: IssueRecord, opts: MetricOptions): MetricBundle {
  const created = Date.parse(record.createdAt);
  const updated = Date.parse(record.updatedAt);

  const commentCount = record.comments.length;
  const bodyReactions = totalReactions(record.reactions);
  let commentReactions = 0;
  let positive = positiveReactions(record.reactions);
  let negative = negativeReactions(record.reactions);
  for (const c of record.comments) {
    commentReactions += totalReactions(c.reactions);
    positive += positiveReactions(c.reactions);
    negative += negativeReactions(c.reactions);
  }

  const totalReactionCount = bodyReactions + commentReactions;
  const engagements = commentCount + totalReactionCount;
  const ageDays = Math.max(0, Math.floor((updated - created) / DAY_MS));
  const daysSinceUpdate = Math.max(0, (opts.now.getTime() - updated) / DAY_MS);

  const bundle: MetricBundle = {
    commentCount,
    bodyReactions,
    commentReactions,
    positiveReactions: positive,
    negativeReactions: negative,
    totalReactions: totalReactionCount,
    engagements,
    engagementsPerDay: ageDays > 0 ? engagements / ageDays : 0,
    ageDays,
    daysSinceUpdate,
    activityScore: activityScore(daysSinceUpdate, engagements, opts.activity),
  };
  if (opts.knnDistance !== undefined) bundle.knnDistance = opts.knnDistance;
  return bundle;
}

/**
 * Per metric: stable ascending sort over the records that have a value,
 * label index floor(i*4/n). Ties keep collection order.
 */
export function assignQuartiles(records: readonly IssueRecord[]): Map<number, QuartileBundle> {
  const out = new Map<number, QuartileBundle>();
  for (const r of records) out.set(r.number, {});

  for (const metric of METRIC_NAMES) {
    const values: Array<{ number: number; value: number }> = [];
    for (const r of records) {
      const value = r.metrics?.[metric];
      if (value !== undefined) values.push({ number: r.number, value });
    }
    values.sort((a, b) => a.value - b.value);
    const n = values.length;
    values.forEach(({ number }, i) => {
      const bundle = out.get(number);
      if (bundle) bundle[metric] = QUARTILE_LABELS[Math.floor((i * 4) / n)];
    });
  }
  return out;
}
