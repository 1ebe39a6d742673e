// Public API: pipeline, query and serving functions for programmatic use

export { findClusters, type ClusterOptions } from "./cluster.js";
export { collectionName, loadConfig, loadEnvConfig, parseConfig, parseRepo, type EnvConfig, type IssuedexConfig } from "./config.js";
export { createEmbeddingProvider, EmbeddingEngine, prepareEmbeddingText, type ProviderConfig } from "./embeddings.js";
export {
  AuthError,
  CollectionLockedError,
  EmbeddingUnavailableError,
  InvalidMetricError,
  IssuedexError,
  MalformedRecordError,
  NotFoundError,
  ProviderError,
  RateLimitedError,
  SourceUnavailableError,
  TransientSourceError,
  ValidationError,
  type ErrorCode,
} from "./errors.js";
export { GitHubClient, type GitHubClientOptions } from "./github.js";
export { log, type LogLevel } from "./log.js";
export { mergeRecords, type MergeResult } from "./merge.js";
export { assignQuartiles, computeMetrics, METRIC_DESCRIPTIONS, METRIC_NAMES, type MetricName } from "./metrics.js";
export {
  runClean,
  runEnrich,
  runPull,
  runUpdate,
  withCollectionLock,
  type EnrichOptions,
  type CleanResult,
  type CollectionLock,
  type EnrichResult,
  type PullOptions,
  type PullResult,
  type UpdateOptions,
} from "./pipeline.js";
export { advanceCheckpoint, planWindows } from "./planner.js";
export {
  buildSnapshot,
  loadSnapshot,
  QueryService,
  type CollectionSnapshot,
  type IssueSummary,
  type IssueView,
  type SimilarIssue,
} from "./query.js";
export { RecommendationSchema, type Recommendation } from "./recommendations.js";
export type { IssueRecord, MetricBundle, QuartileBundle, SourceRecord } from "./record.js";
export { callTool, createServer, startServer, TOOLS, VERSION } from "./server.js";
export { cosineSimilarity, SimilarityIndex } from "./similarity.js";
export { IssueStore } from "./store.js";
export { createLLMProvider, summarizeIssue, summarizeRecords, type LLMConfig } from "./summarizer.js";
export type {
  Cluster,
  EmbeddingProvider,
  FetchCheckpoint,
  FetchWindow,
  ItemType,
  LLMProvider,
  Neighbor,
  RateLimitInfo,
  SourceAdapter,
} from "./types.js";
export { validateCollection, type RecordFinding, type ValidationReport } from "./validate.js";
