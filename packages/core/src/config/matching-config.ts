import { validationFailed } from "../errors.ts";
import type { RankingStrategyName } from "../matching/ranking-strategies.ts";
import {
  isSimilarityMetricKey,
  resolveSimilarityWeights,
  type SimilarityMetricKey,
  type SimilarityWeights,
} from "../similarity/scoring-weights.ts";
import { readEnv, type EnvReader } from "./env.ts";

export type PopulationSourceName = "synthetic" | "supabase";

export type MatchingConfig = {
  strategy: RankingStrategyName;
  weights: SimilarityWeights;
  embedProfiles: boolean;
  maxResultsLimit: number;
  timeoutMs: number;
  populationSource: PopulationSourceName;
  populationSeed: number;
};

export const MATCHING_CONFIG_DEFAULTS = {
  strategy: "local",
  embedProfiles: false,
  maxResultsLimit: 50,
  timeoutMs: 30_000,
  populationSource: "synthetic",
  populationSeed: 42,
} as const;

export function readMatchingConfig(read: EnvReader = readEnv): MatchingConfig {
  return {
    strategy: parseStrategy(read("MATCHING_STRATEGY")),
    weights: resolveSimilarityWeights(parseWeightOverrides(read("MATCHING_WEIGHTS"))),
    embedProfiles: parseBoolean("MATCHING_EMBED_PROFILES", read("MATCHING_EMBED_PROFILES"), MATCHING_CONFIG_DEFAULTS.embedProfiles),
    maxResultsLimit: parseInteger("MATCHING_MAX_RESULTS_LIMIT", read("MATCHING_MAX_RESULTS_LIMIT"), {
      fallback: MATCHING_CONFIG_DEFAULTS.maxResultsLimit,
      min: 1,
    }),
    timeoutMs: parseInteger("MATCHING_TIMEOUT_MS", read("MATCHING_TIMEOUT_MS"), {
      fallback: MATCHING_CONFIG_DEFAULTS.timeoutMs,
      min: 0,
    }),
    populationSource: parsePopulationSource(read("POPULATION_SOURCE")),
    populationSeed: parseInteger("POPULATION_SEED", read("POPULATION_SEED"), {
      fallback: MATCHING_CONFIG_DEFAULTS.populationSeed,
      min: 0,
    }),
  };
}

export function requireEnv(read: EnvReader, name: string): string {
  const value = read(name);
  if (!value) {
    throw validationFailed(`Missing required environment variable ${name}.`, { variable: name });
  }
  return value;
}

function parseStrategy(raw: string | undefined): RankingStrategyName {
  const value = (raw ?? MATCHING_CONFIG_DEFAULTS.strategy).toLowerCase();
  if (value === "local" || value === "rerank") {
    return value;
  }
  throw validationFailed("MATCHING_STRATEGY must be 'local' or 'rerank'.", {
    variable: "MATCHING_STRATEGY",
  });
}

function parsePopulationSource(raw: string | undefined): PopulationSourceName {
  const value = (raw ?? MATCHING_CONFIG_DEFAULTS.populationSource).toLowerCase();
  if (value === "synthetic" || value === "supabase") {
    return value;
  }
  throw validationFailed("POPULATION_SOURCE must be 'synthetic' or 'supabase'.", {
    variable: "POPULATION_SOURCE",
  });
}

function parseWeightOverrides(
  raw: string | undefined,
): Partial<Record<SimilarityMetricKey, number>> {
  if (!raw) {
    return {};
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw validationFailed("MATCHING_WEIGHTS must be a JSON object.", {
      variable: "MATCHING_WEIGHTS",
    });
  }

  if (!parsed || typeof parsed !== "object" || Array.isArray(parsed)) {
    throw validationFailed("MATCHING_WEIGHTS must be a JSON object.", {
      variable: "MATCHING_WEIGHTS",
    });
  }

  const overrides: Partial<Record<SimilarityMetricKey, number>> = {};
  for (const [key, value] of Object.entries(parsed)) {
    if (!isSimilarityMetricKey(key)) {
      throw validationFailed(`Unknown similarity weight '${key}'.`, { weight: key });
    }
    if (typeof value !== "number") {
      throw validationFailed(`Similarity weight '${key}' must be a number.`, { weight: key });
    }
    overrides[key] = value;
  }
  return overrides;
}

function parseBoolean(name: string, raw: string | undefined, fallback: boolean): boolean {
  if (raw === undefined) {
    return fallback;
  }
  const normalized = raw.toLowerCase();
  if (["1", "true", "yes", "on"].includes(normalized)) {
    return true;
  }
  if (["0", "false", "no", "off"].includes(normalized)) {
    return false;
  }
  throw validationFailed(`${name} must be a boolean.`, { variable: name });
}

function parseInteger(
  name: string,
  raw: string | undefined,
  options: { fallback: number; min: number },
): number {
  if (raw === undefined) {
    return options.fallback;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value < options.min) {
    throw validationFailed(`${name} must be an integer >= ${options.min}.`, { variable: name });
  }
  return value;
}
