import { MATCHING_ERROR_CODES, MatchingError } from "../errors.ts";
import type { Profile } from "../graph/profile-types.ts";
import { DEFAULT_SIMILARITY_WEIGHTS, type SimilarityWeights } from "../similarity/scoring-weights.ts";
import { scoreCandidate, type SimilarityBreakdown } from "../similarity/similarity-engine.ts";
import type { Embedding, ParsedQuery, Reranker } from "./collaborators.ts";
import { formatProfileDocument } from "./profile-document.ts";
import type { ProfileEmbeddingIndex } from "./profile-embedding-index.ts";

export type RankingStrategyName = "local" | "rerank";

export type CandidateScores =
  | { strategy: "local"; breakdown: SimilarityBreakdown }
  | { strategy: "rerank"; breakdown: { rerank_score: number } };

export type RankedCandidate = {
  profile: Profile;
  total_score: number;
  scores: CandidateScores;
};

export type RankingContext = {
  generation: number;
  requester: Profile;
  candidates: readonly Profile[];
  query: string;
  parsedQuery: ParsedQuery;
  queryEmbedding: Embedding | null;
  maxResults: number;
};

export interface RankingStrategy {
  readonly name: RankingStrategyName;
  /** Candidates ordered best first. May return more than `maxResults`. */
  rank(context: RankingContext): Promise<RankedCandidate[]>;
}

export function createLocalScoringStrategy(options: {
  weights?: SimilarityWeights;
  profileEmbeddings?: ProfileEmbeddingIndex | null;
} = {}): RankingStrategy {
  const weights = options.weights ?? DEFAULT_SIMILARITY_WEIGHTS;
  const profileEmbeddings = options.profileEmbeddings ?? null;

  return {
    name: "local",
    async rank(context) {
      const embeddings = profileEmbeddings
        ? await profileEmbeddings.embeddingsFor(context.generation, [
          context.requester,
          ...context.candidates,
        ])
        : null;
      const requesterEmbedding = embeddings?.get(context.requester.id) ?? null;

      const ranked = context.candidates.map((candidate): RankedCandidate => {
        const result = scoreCandidate({
          requester: context.requester,
          candidate,
          requesterEmbedding,
          candidateEmbedding: embeddings?.get(candidate.id) ?? null,
          parsedQuery: context.parsedQuery,
          queryEmbedding: context.queryEmbedding,
        }, weights);

        return {
          profile: candidate,
          total_score: result.composite_score,
          scores: { strategy: "local", breakdown: result.breakdown },
        };
      });

      return ranked.sort(compareRankedCandidates);
    },
  };
}

export function createRerankStrategy(options: { reranker: Reranker }): RankingStrategy {
  return {
    name: "rerank",
    async rank(context) {
      if (context.candidates.length === 0) {
        return [];
      }

      const candidatesById = new Map(context.candidates.map((profile) => [profile.id, profile]));
      const documents = context.candidates.map((profile) => ({
        id: profile.id,
        text: formatProfileDocument(profile),
      }));

      const reranked = await options.reranker.rerank(context.query, documents, context.maxResults);

      const seen = new Set<string>();
      const ranked = [...reranked]
        .sort((left, right) =>
          right.relevance_score - left.relevance_score || left.rank - right.rank
        )
        .map((entry): RankedCandidate => {
          const profile = candidatesById.get(entry.id);
          if (!profile || seen.has(entry.id) || !Number.isFinite(entry.relevance_score)) {
            throw new MatchingError(
              MATCHING_ERROR_CODES.COLLABORATOR_FAILED,
              "Reranker returned a result that does not map onto the candidate set.",
              { context: { document_id: entry.id } },
            );
          }
          seen.add(entry.id);
          return {
            profile,
            total_score: entry.relevance_score,
            scores: { strategy: "rerank", breakdown: { rerank_score: entry.relevance_score } },
          };
        });

      return ranked;
    },
  };
}

/** Score descending, then candidate id ascending. */
export function compareRankedCandidates(left: RankedCandidate, right: RankedCandidate): number {
  if (right.total_score !== left.total_score) {
    return right.total_score - left.total_score;
  }
  if (left.profile.id < right.profile.id) {
    return -1;
  }
  return left.profile.id > right.profile.id ? 1 : 0;
}
