import { randomUUID } from "node:crypto";
import {
  MATCHING_ERROR_CODES,
  MatchingError,
  isMatchingError,
  validationFailed,
} from "../errors.ts";
import {
  classifyConnectionPath,
  findMutualConnections,
  type ConnectionPath,
} from "../graph/graph-queries.ts";
import {
  ProfileStore,
  type PopulationLoadSummary,
  type ProfileGraphView,
} from "../graph/profile-store.ts";
import {
  toProfileSummary,
  type EducationRecord,
  type Profile,
  type ProfileSummary,
} from "../graph/profile-types.ts";
import { createLogger, type StructuredLogger } from "../observability/logger.ts";
import {
  elapsedMetricMs,
  emitMetricBestEffort,
  nowMetricMs,
} from "../observability/metrics.ts";
import { startSentrySpan, withSentryContext } from "../observability/sentry.ts";
import type { SimilarityBreakdown } from "../similarity/similarity-engine.ts";
import { computeNetworkStats, type NetworkStats } from "../stats/network-stats.ts";
import type {
  Embedder,
  Embedding,
  ParsedQuery,
  ProfileSource,
  QueryParser,
} from "./collaborators.ts";
import { buildMatchExplanation } from "./explanations.ts";
import type { RankedCandidate, RankingStrategy, RankingStrategyName } from "./ranking-strategies.ts";

export const DEFAULT_MAX_RESULTS = 10;
export const DEFAULT_MAX_RESULTS_LIMIT = 50;
export const DEFAULT_PIPELINE_TIMEOUT_MS = 30_000;
export const MATCHED_PROFILE_SKILL_LIMIT = 5;

export type FindConnectionsInput = {
  requester_id: string;
  query: string;
  max_results?: number;
  include_explanations?: boolean;
  correlation_id?: string | null;
};

export type MatchedProfileView = {
  id: string;
  name: string;
  job_title: string;
  company: string;
  bio: string;
  skills: string[];
  education: EducationRecord | null;
  industry: string | null;
};

export type MatchResult = {
  rank: number;
  profile: MatchedProfileView;
  match_score: number;
  score_breakdown: SimilarityBreakdown | { rerank_score: number };
  mutual_connections: ProfileSummary[];
  connection_path: ConnectionPath;
  explanation: string | null;
};

export type MatchResponse = {
  query: string;
  parsed_query: ParsedQuery;
  requester: ProfileSummary;
  strategy: RankingStrategyName;
  results: MatchResult[];
  metadata: {
    total_candidates_evaluated: number;
    processing_time_ms: number;
    timestamp: string;
    generation: number;
    query_embedding_available: boolean;
  };
};

export type InitializeResult = {
  profile_count: number;
  connection_count: number;
};

export type NetworkMatchingEngine = {
  readonly store: ProfileStore;
  findConnections(input: FindConnectionsInput): Promise<MatchResponse>;
  initialize(candidateCount: number): Promise<InitializeResult>;
  networkStats(): NetworkStats;
  mutualConnections(leftId: string, rightId: string): ProfileSummary[];
  connectionPath(fromId: string, toId: string): ConnectionPath;
};

export type NetworkMatchingEngineOptions = {
  store?: ProfileStore;
  queryParser: QueryParser;
  embedder?: Embedder | null;
  strategy: RankingStrategy;
  profileSource?: ProfileSource | null;
  maxResultsLimit?: number;
  timeoutMs?: number;
  logger?: StructuredLogger;
  now?: () => Date;
  createCorrelationId?: () => string;
};

export function createNetworkMatchingEngine(
  options: NetworkMatchingEngineOptions,
): NetworkMatchingEngine {
  const store = options.store ?? new ProfileStore();
  const embedder = options.embedder ?? null;
  const strategy = options.strategy;
  const maxResultsLimit = options.maxResultsLimit ?? DEFAULT_MAX_RESULTS_LIMIT;
  const timeoutMs = options.timeoutMs ?? DEFAULT_PIPELINE_TIMEOUT_MS;
  const log = options.logger ?? createLogger();
  const now = options.now ?? (() => new Date());
  const correlationFactory = options.createCorrelationId ?? randomUUID;

  async function parseQuery(query: string, correlationId: string): Promise<ParsedQuery> {
    try {
      return await options.queryParser.parse(query);
    } catch (error) {
      throw collaboratorFailure("parse", error, correlationId);
    }
  }

  async function embedQuery(
    query: string,
    requesterId: string,
    correlationId: string,
  ): Promise<Embedding | null> {
    if (!embedder) {
      return null;
    }

    try {
      const [embedding] = await embedder.embed([query], "query");
      if (embedding && embedding.length > 0) {
        return embedding;
      }
      logDegraded(requesterId, correlationId, "empty_embedding");
      return null;
    } catch (error) {
      logDegraded(requesterId, correlationId, errorName(error));
      return null;
    }
  }

  function logDegraded(requesterId: string, correlationId: string, reason: string): void {
    log({
      level: "warn",
      event: "matching.query_embedding_degraded",
      correlation_id: correlationId,
      profile_id: requesterId,
      payload: { requester_id: requesterId, reason },
    });
  }

  function collaboratorFailure(
    operation: "parse" | "rank",
    error: unknown,
    correlationId: string,
  ): MatchingError {
    if (isMatchingError(error)) {
      return error;
    }

    log({
      level: "error",
      event: "matching.collaborator_failed",
      correlation_id: correlationId,
      payload: {
        operation,
        strategy: strategy.name,
        error_name: errorName(error),
        error_message: error instanceof Error ? error.message : String(error),
      },
    });

    return new MatchingError(
      MATCHING_ERROR_CODES.COLLABORATOR_FAILED,
      operation === "parse" ? "Query parsing failed." : "Candidate ranking failed.",
      { context: { operation }, cause: error },
    );
  }

  async function runPipeline(
    input: FindConnectionsInput,
    graph: ProfileGraphView,
    correlationId: string,
    startedAt: number,
  ): Promise<MatchResponse> {
    const query = typeof input.query === "string" ? input.query.trim() : "";
    if (!query) {
      throw validationFailed("query must be a non-empty string.", { field: "query" });
    }

    const maxResults = input.max_results ?? DEFAULT_MAX_RESULTS;
    if (!Number.isInteger(maxResults) || maxResults <= 0 || maxResults > maxResultsLimit) {
      throw validationFailed(
        `max_results must be an integer between 1 and ${maxResultsLimit}.`,
        { field: "max_results", max_results: maxResults },
      );
    }

    const requester = graph.get(input.requester_id, "requester");

    const [parsedQuery, queryEmbedding] = await Promise.all([
      parseQuery(query, correlationId),
      embedQuery(query, requester.id, correlationId),
    ]);

    const candidates = graph.allExcept(requester.id);

    let ranked: RankedCandidate[];
    try {
      ranked = await startSentrySpan(
        { name: "matching.rank", op: "matching", attributes: { strategy: strategy.name } },
        () =>
          strategy.rank({
            generation: graph.generation,
            requester,
            candidates,
            query,
            parsedQuery,
            queryEmbedding,
            maxResults,
          }),
      );
    } catch (error) {
      throw collaboratorFailure("rank", error, correlationId);
    }

    const includeExplanations = input.include_explanations ?? true;
    const results = ranked.slice(0, maxResults).map((candidate, index) =>
      formatResult(graph, requester, candidate, index + 1, includeExplanations)
    );

    return {
      query,
      parsed_query: parsedQuery,
      requester: toProfileSummary(requester),
      strategy: strategy.name,
      results,
      metadata: {
        total_candidates_evaluated: candidates.length,
        processing_time_ms: elapsedMetricMs(startedAt),
        timestamp: now().toISOString(),
        generation: graph.generation,
        query_embedding_available: queryEmbedding !== null,
      },
    };
  }

  return {
    store,

    async findConnections(input) {
      const startedAt = nowMetricMs();
      const correlationId = input.correlation_id ?? correlationFactory();
      const graph = store.view();

      try {
        const response = await withSentryContext(
          { correlation_id: correlationId, profile_id: input.requester_id },
          () => withDeadline(runPipeline(input, graph, correlationId, startedAt), timeoutMs),
        );

        log({
          event: "matching.request_completed",
          correlation_id: correlationId,
          profile_id: response.requester.id,
          payload: {
            requester_id: response.requester.id,
            strategy: response.strategy,
            candidate_count: response.metadata.total_candidates_evaluated,
            result_count: response.results.length,
            duration_ms: response.metadata.processing_time_ms,
          },
        });
        emitMatchingMetrics(strategy.name, correlationId, {
          candidates: response.metadata.total_candidates_evaluated,
          results: response.results.length,
          durationMs: response.metadata.processing_time_ms,
          outcome: "success",
        });
        return response;
      } catch (error) {
        const unhandled = !isMatchingError(error);
        const failure = isMatchingError(error)
          ? error
          : new MatchingError(
            MATCHING_ERROR_CODES.COLLABORATOR_FAILED,
            "Matching service failed.",
            { cause: error },
          );
        const durationMs = elapsedMetricMs(startedAt);

        if (unhandled) {
          log({
            level: "error",
            event: "system.unhandled_error",
            correlation_id: correlationId,
            payload: {
              phase: "find_connections",
              error_name: errorName(error),
              error_message: error instanceof Error ? error.message : String(error),
            },
          });
        }

        log({
          // Unhandled errors were already reported above.
          level: failure.isCallerCorrectable ? "info" : unhandled ? "warn" : "error",
          event: "matching.request_failed",
          correlation_id: correlationId,
          profile_id: typeof input.requester_id === "string" ? input.requester_id : null,
          payload: {
            error_code: failure.code,
            error_name: failure.name,
            error_message: failure.message,
            duration_ms: durationMs,
          },
        });
        emitMatchingMetrics(strategy.name, correlationId, {
          candidates: null,
          results: null,
          durationMs,
          outcome: "error",
        });
        throw failure;
      }
    },

    async initialize(candidateCount) {
      if (!options.profileSource) {
        throw validationFailed("No population source is configured.");
      }
      if (!Number.isInteger(candidateCount) || candidateCount <= 0) {
        throw validationFailed("candidate_count must be a positive integer.", {
          field: "candidate_count",
        });
      }

      const startedAt = nowMetricMs();
      const population = await options.profileSource.loadPopulation({ count: candidateCount });

      let summary: PopulationLoadSummary;
      try {
        summary = store.load(population);
      } catch (error) {
        log({
          level: "error",
          event: "graph.population_rejected",
          payload: {
            source: options.profileSource.name,
            violation: isMatchingError(error) ? String(error.context.violation ?? "unknown") : "unknown",
            error_name: errorName(error),
            error_message: error instanceof Error ? error.message : String(error),
          },
        });
        throw error;
      }

      log({
        event: "graph.population_loaded",
        payload: {
          source: options.profileSource.name,
          generation: summary.generation,
          profile_count: summary.profile_count,
          connection_count: summary.connection_count,
          interaction_count: summary.interaction_count,
        },
      });
      emitMetricBestEffort({
        metric: "graph.population.loaded",
        value: summary.profile_count,
        tags: { component: "profile_store", source: options.profileSource.name },
      });
      emitMetricBestEffort({
        metric: "system.request.latency",
        value: elapsedMetricMs(startedAt),
        tags: { component: "profile_store", operation: "initialize", outcome: "success" },
      });

      return {
        profile_count: summary.profile_count,
        connection_count: summary.connection_count,
      };
    },

    networkStats() {
      return computeNetworkStats(store.view());
    },

    mutualConnections(leftId, rightId) {
      const graph = store.view();
      return findMutualConnections(graph, graph.get(leftId, "requester"), graph.get(rightId));
    },

    connectionPath(fromId, toId) {
      const graph = store.view();
      return classifyConnectionPath(graph, graph.get(fromId, "requester"), graph.get(toId));
    },
  };
}

function formatResult(
  graph: ProfileGraphView,
  requester: Profile,
  candidate: RankedCandidate,
  rank: number,
  includeExplanations: boolean,
): MatchResult {
  const profile = candidate.profile;
  const mutualConnections = findMutualConnections(graph, requester, profile);
  const scores = candidate.scores;

  return {
    rank,
    profile: {
      id: profile.id,
      name: profile.name,
      job_title: profile.job_title,
      company: profile.company,
      bio: profile.bio,
      skills: profile.skills.slice(0, MATCHED_PROFILE_SKILL_LIMIT),
      education: profile.education ? { ...profile.education } : null,
      industry: profile.industry,
    },
    match_score: candidate.total_score,
    score_breakdown: { ...scores.breakdown },
    mutual_connections: mutualConnections,
    connection_path: classifyConnectionPath(graph, requester, profile),
    explanation: includeExplanations
      ? buildMatchExplanation({
        scoreLabel: scores.strategy === "local" ? "Composite score" : "Rerank score",
        score: candidate.total_score,
        mutualConnectionCount: mutualConnections.length,
        breakdown: scores.strategy === "local" ? scores.breakdown : null,
      })
      : null,
  };
}

function emitMatchingMetrics(
  strategy: RankingStrategyName,
  correlationId: string,
  input: {
    candidates: number | null;
    results: number | null;
    durationMs: number;
    outcome: "success" | "error";
  },
): void {
  if (input.candidates !== null) {
    emitMetricBestEffort({
      metric: "matching.candidates.evaluated",
      value: input.candidates,
      correlation_id: correlationId,
      tags: { component: "matching_pipeline", strategy },
    });
  }
  if (input.results !== null) {
    emitMetricBestEffort({
      metric: "matching.results.returned",
      value: input.results,
      correlation_id: correlationId,
      tags: { component: "matching_pipeline", strategy },
    });
  }
  emitMetricBestEffort({
    metric: "system.request.latency",
    value: input.durationMs,
    correlation_id: correlationId,
    tags: { component: "matching_pipeline", operation: "find_connections", outcome: input.outcome },
  });
}

async function withDeadline<T>(work: Promise<T>, timeoutMs: number): Promise<T> {
  if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
    return work;
  }

  let timeoutId: ReturnType<typeof setTimeout> | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => {
      reject(
        new MatchingError(MATCHING_ERROR_CODES.TIMEOUT, "Matching call exceeded its deadline.", {
          context: { timeout_ms: timeoutMs },
        }),
      );
    }, timeoutMs);
  });

  try {
    return await Promise.race([work, deadline]);
  } finally {
    clearTimeout(timeoutId);
  }
}

function errorName(error: unknown): string {
  if (error instanceof Error) {
    return error.name;
  }
  return "UnknownError";
}
