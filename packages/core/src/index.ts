export {
  MATCHING_ERROR_CODES,
  MatchingError,
  isMatchingError,
  toPublicErrorBody,
  type MatchingErrorCode,
  type PublicErrorBody,
} from "./errors.ts";
export { createEnvReader, readEnv, type EnvReader, type EnvSource } from "./config/env.ts";
export { readMatchingConfig, type MatchingConfig } from "./config/matching-config.ts";
export { ProfileStore, ProfileGraphView, type PopulationLoadSummary } from "./graph/profile-store.ts";
export type {
  ConnectionEdge,
  EducationRecord,
  InteractionEdge,
  InteractionRecord,
  PopulationInput,
  Profile,
  ProfileInput,
  ProfileSummary,
  WorkHistoryEntry,
} from "./graph/profile-types.ts";
export {
  classifyConnectionPath,
  findMutualConnections,
  MAX_MUTUAL_CONNECTIONS,
  type ConnectionPath,
} from "./graph/graph-queries.ts";
export {
  DEFAULT_SIMILARITY_WEIGHTS,
  resolveSimilarityWeights,
  SIMILARITY_METRIC_KEYS,
  type SimilarityMetricKey,
  type SimilarityWeights,
} from "./similarity/scoring-weights.ts";
export { scoreCandidate, type SimilarityBreakdown } from "./similarity/similarity-engine.ts";
export { computeNetworkStats, type NetworkStats } from "./stats/network-stats.ts";
export {
  emptyParsedQuery,
  type Embedder,
  type Embedding,
  type ParsedQuery,
  type ProfileSource,
  type QueryParser,
  type Reranker,
} from "./matching/collaborators.ts";
export {
  createLocalScoringStrategy,
  createRerankStrategy,
  type RankingStrategy,
} from "./matching/ranking-strategies.ts";
export { createProfileEmbeddingIndex } from "./matching/profile-embedding-index.ts";
export {
  createNetworkMatchingEngine,
  type FindConnectionsInput,
  type MatchResponse,
  type MatchResult,
  type NetworkMatchingEngine,
} from "./matching/network-matching-engine.ts";
export {
  createSyntheticProfileSource,
  generateSyntheticPopulation,
} from "./fixtures/synthetic-network.ts";
export { createLogger, logEvent, type StructuredLogger } from "./observability/logger.ts";
