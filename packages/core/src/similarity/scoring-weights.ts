import { validationFailed } from "../errors.ts";

export const SIMILARITY_SCORE_VERSION = "v1";
export const SIMILARITY_SCORE_ROUND_DIGITS = 6;

export const SIMILARITY_METRIC_KEYS = [
  "semantic_similarity",
  "relationship_strength",
  "mutual_connections",
  "company_overlap",
  "education_similarity",
  "query_relevance",
] as const;

export type SimilarityMetricKey = (typeof SIMILARITY_METRIC_KEYS)[number];

export type SimilarityWeights = Readonly<Record<SimilarityMetricKey, number>>;

export const DEFAULT_SIMILARITY_WEIGHTS: SimilarityWeights = Object.freeze({
  semantic_similarity: 0.25,
  relationship_strength: 0.2,
  mutual_connections: 0.15,
  company_overlap: 0.15,
  education_similarity: 0.1,
  query_relevance: 0.15,
});

const WEIGHT_SUM_TOLERANCE = 0.000001;

/**
 * Merges overrides onto the defaults and rejects sets that would let the composite
 * leave [0,1]: negative weights, or a sum other than 1.
 */
export function resolveSimilarityWeights(
  overrides: Partial<Record<SimilarityMetricKey, number>> = {},
): SimilarityWeights {
  const resolved: Record<SimilarityMetricKey, number> = { ...DEFAULT_SIMILARITY_WEIGHTS };

  for (const [key, value] of Object.entries(overrides)) {
    if (!isSimilarityMetricKey(key)) {
      throw validationFailed(`Unknown similarity weight '${key}'.`, { weight: key });
    }
    if (typeof value !== "number" || !Number.isFinite(value) || value < 0) {
      throw validationFailed(`Similarity weight '${key}' must be a non-negative number.`, {
        weight: key,
      });
    }
    resolved[key] = value;
  }

  const sum = SIMILARITY_METRIC_KEYS.reduce((total, key) => total + resolved[key], 0);
  if (Math.abs(sum - 1) > WEIGHT_SUM_TOLERANCE) {
    throw validationFailed("Similarity weights must sum to 1.", { weight_sum: sum });
  }

  return Object.freeze(resolved);
}

export function isSimilarityMetricKey(value: string): value is SimilarityMetricKey {
  return (SIMILARITY_METRIC_KEYS as readonly string[]).includes(value);
}
