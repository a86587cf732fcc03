import type { SimilarityBreakdown } from "../similarity/similarity-engine.ts";

export const EXPLANATION_SEPARATOR = " • ";

export function explainBreakdown(breakdown: SimilarityBreakdown): string[] {
  const reasons: string[] = [];

  if (breakdown.semantic_similarity > 0.7) {
    reasons.push("Strong professional profile alignment");
  } else if (breakdown.semantic_similarity > 0.5) {
    reasons.push("Good professional background match");
  }

  if (breakdown.relationship_strength > 0.5) {
    reasons.push("Existing communication history");
  }

  if (breakdown.mutual_connections > 0.1) {
    reasons.push("Shared connections");
  }

  if (breakdown.company_overlap > 0.5) {
    reasons.push("Worked at same companies");
  } else if (breakdown.company_overlap > 0) {
    reasons.push("Some company overlap in career history");
  }

  if (breakdown.education_similarity > 0.5) {
    reasons.push("Similar educational background");
  }

  if (breakdown.query_relevance > 0.7) {
    reasons.push("Excellent match for your specific criteria");
  } else if (breakdown.query_relevance > 0.4) {
    reasons.push("Good match for your requirements");
  }

  if (reasons.length === 0) {
    reasons.push("Potential networking opportunity");
  }

  return reasons;
}

export function buildMatchExplanation(input: {
  scoreLabel: string;
  score: number;
  mutualConnectionCount: number;
  breakdown: SimilarityBreakdown | null;
}): string {
  const parts = input.breakdown ? explainBreakdown(input.breakdown) : [];
  parts.push(`${input.scoreLabel}: ${input.score.toFixed(3)}`);
  parts.push(
    `${input.mutualConnectionCount} mutual connection${input.mutualConnectionCount === 1 ? "" : "s"}`,
  );
  return parts.join(EXPLANATION_SEPARATOR);
}
