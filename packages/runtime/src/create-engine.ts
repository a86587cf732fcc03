import { createEnvReader, type EnvReader } from "../../core/src/config/env.ts";
import {
  readMatchingConfig,
  requireEnv,
  type MatchingConfig,
} from "../../core/src/config/matching-config.ts";
import { validationFailed } from "../../core/src/errors.ts";
import { createSyntheticProfileSource } from "../../core/src/fixtures/synthetic-network.ts";
import type { ProfileSource } from "../../core/src/matching/collaborators.ts";
import {
  createNetworkMatchingEngine,
  type NetworkMatchingEngine,
} from "../../core/src/matching/network-matching-engine.ts";
import { createProfileEmbeddingIndex } from "../../core/src/matching/profile-embedding-index.ts";
import {
  createLocalScoringStrategy,
  createRerankStrategy,
  type RankingStrategy,
} from "../../core/src/matching/ranking-strategies.ts";
import { createServiceRoleDbClient } from "../../db/src/client.ts";
import { createSupabaseProfileSource } from "../../db/src/queries/profile-population.ts";
import { createCohereClient, type CohereClient } from "../../llm/src/cohere-client.ts";
import { createAnthropicProvider } from "../../llm/src/provider.ts";
import { createQueryParser } from "../../llm/src/query-parser.ts";
import { initializeNodeSentry } from "./sentry-node.ts";

export type CreateEngineFromEnvOptions = {
  env?: Record<string, string | undefined>;
  fetchImpl?: typeof fetch;
  installSentry?: boolean;
};

export type EngineBootstrap = {
  engine: NetworkMatchingEngine;
  config: MatchingConfig;
  sentryEnabled: boolean;
};

function buildStrategy(
  config: MatchingConfig,
  cohere: CohereClient | null,
): RankingStrategy {
  if (config.strategy === "rerank") {
    if (!cohere) {
      throw validationFailed("MATCHING_STRATEGY=rerank requires COHERE_API_KEY.", {
        variable: "COHERE_API_KEY",
      });
    }
    return createRerankStrategy({ reranker: cohere });
  }

  return createLocalScoringStrategy({
    weights: config.weights,
    profileEmbeddings: config.embedProfiles && cohere
      ? createProfileEmbeddingIndex({ embedder: cohere })
      : null,
  });
}

function buildProfileSource(config: MatchingConfig, read: EnvReader): ProfileSource {
  if (config.populationSource === "supabase") {
    return createSupabaseProfileSource(createServiceRoleDbClient({ read }));
  }
  return createSyntheticProfileSource({ seed: config.populationSeed });
}

/**
 * Wires a matching engine from environment variables. The rerank strategy and
 * profile embeddings need COHERE_API_KEY; the query parser always needs
 * ANTHROPIC_API_KEY.
 */
export function createEngineFromEnv(options: CreateEngineFromEnvOptions = {}): EngineBootstrap {
  const read = createEnvReader(options.env);
  const config = readMatchingConfig(read);
  const sentryEnabled = options.installSentry === false ? false : initializeNodeSentry(read);

  const needsCohere = config.strategy === "rerank" || config.embedProfiles;
  const cohere = read("COHERE_API_KEY") || needsCohere
    ? createCohereClient({
      apiKey: needsCohere ? requireEnv(read, "COHERE_API_KEY") : read("COHERE_API_KEY"),
      embedModel: read("COHERE_EMBED_MODEL"),
      rerankModel: read("COHERE_RERANK_MODEL"),
      fetchImpl: options.fetchImpl,
    })
    : null;

  const queryParser = createQueryParser({
    provider: createAnthropicProvider({
      apiKey: requireEnv(read, "ANTHROPIC_API_KEY"),
      model: read("ANTHROPIC_MODEL"),
      fetchImpl: options.fetchImpl,
    }),
  });

  const engine = createNetworkMatchingEngine({
    queryParser,
    embedder: cohere,
    strategy: buildStrategy(config, cohere),
    profileSource: buildProfileSource(config, read),
    maxResultsLimit: config.maxResultsLimit,
    timeoutMs: config.timeoutMs,
  });

  return { engine, config, sentryEnabled };
}
