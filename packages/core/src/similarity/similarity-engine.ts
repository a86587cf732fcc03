import type { Profile } from "../graph/profile-types.ts";
import type { Embedding, ParsedQuery } from "../matching/collaborators.ts";
import {
  DEFAULT_SIMILARITY_WEIGHTS,
  SIMILARITY_METRIC_KEYS,
  SIMILARITY_SCORE_ROUND_DIGITS,
  SIMILARITY_SCORE_VERSION,
  type SimilarityMetricKey,
  type SimilarityWeights,
} from "./scoring-weights.ts";

export type SimilarityBreakdown = Record<SimilarityMetricKey, number>;

export type CompositeScoreResult = {
  composite_score: number;
  breakdown: SimilarityBreakdown;
  version: string;
};

export type PairScoringInput = {
  requester: Profile;
  candidate: Profile;
  requesterEmbedding?: Embedding | null;
  candidateEmbedding?: Embedding | null;
  parsedQuery?: ParsedQuery | null;
  queryEmbedding?: Embedding | null;
};

type DegreeLevel = "bachelor" | "master" | "doctorate";

const DEGREE_LEVEL_BY_ABBREVIATION: Readonly<Record<string, DegreeLevel>> = {
  ba: "bachelor",
  bs: "bachelor",
  bsc: "bachelor",
  beng: "bachelor",
  ma: "master",
  ms: "master",
  msc: "master",
  meng: "master",
  mba: "master",
  phd: "doctorate",
  dphil: "doctorate",
  edd: "doctorate",
};

const SENIOR_TITLE_KEYWORDS = ["senior", "principal", "staff"] as const;
const EXECUTIVE_TITLE_KEYWORDS = ["vp", "director", "head", "ceo", "cto", "cpo"] as const;

export function scoreCandidate(
  input: PairScoringInput,
  weights: SimilarityWeights = DEFAULT_SIMILARITY_WEIGHTS,
): CompositeScoreResult {
  const breakdown: SimilarityBreakdown = {
    semantic_similarity: round(semanticSimilarity(input.requesterEmbedding, input.candidateEmbedding)),
    relationship_strength: round(relationshipStrength(input.requester, input.candidate)),
    mutual_connections: round(mutualConnectionOverlap(input.requester, input.candidate)),
    company_overlap: round(companyOverlap(input.requester, input.candidate)),
    education_similarity: round(educationSimilarity(input.requester, input.candidate)),
    query_relevance: input.parsedQuery
      ? round(queryRelevance(input.candidate, input.parsedQuery, {
        queryEmbedding: input.queryEmbedding,
        profileEmbedding: input.candidateEmbedding,
      }))
      : 0,
  };

  let composite = 0;
  for (const key of SIMILARITY_METRIC_KEYS) {
    composite += breakdown[key] * weights[key];
  }

  return {
    composite_score: round(clamp(composite, 0, 1)),
    breakdown,
    version: SIMILARITY_SCORE_VERSION,
  };
}

/** Cosine similarity floored at 0. Absent, empty, zero or mismatched vectors score 0. */
export function semanticSimilarity(
  left: Embedding | null | undefined,
  right: Embedding | null | undefined,
): number {
  if (!left || !right || left.length === 0 || left.length !== right.length) {
    return 0;
  }

  let dot = 0;
  let leftSquared = 0;
  let rightSquared = 0;

  for (let index = 0; index < left.length; index += 1) {
    const leftValue = left[index] ?? 0;
    const rightValue = right[index] ?? 0;

    dot += leftValue * rightValue;
    leftSquared += leftValue * leftValue;
    rightSquared += rightValue * rightValue;
  }

  if (leftSquared === 0 || rightSquared === 0) {
    return 0;
  }

  const similarity = dot / (Math.sqrt(leftSquared) * Math.sqrt(rightSquared));
  return clamp(similarity, 0, 1);
}

export function relationshipStrength(left: Profile, right: Profile): number {
  const forward = left.interactions.get(right.id)?.strength ?? 0;
  const backward = right.interactions.get(left.id)?.strength ?? 0;
  return Math.max(forward, backward);
}

export function mutualConnectionOverlap(left: Profile, right: Profile): number {
  return jaccard(new Set(left.connections), new Set(right.connections));
}

export function companyOverlap(left: Profile, right: Profile): number {
  return jaccard(companySet(left), companySet(right));
}

export function educationSimilarity(left: Profile, right: Profile): number {
  const leftEducation = left.education;
  const rightEducation = right.education;
  if (!leftEducation || !rightEducation) {
    return 0;
  }

  let similarity = 0;

  if (
    leftEducation.university &&
    rightEducation.university &&
    leftEducation.university.toLowerCase() === rightEducation.university.toLowerCase()
  ) {
    similarity += 0.7;
  }

  if (leftEducation.degree && rightEducation.degree) {
    const leftDegree = leftEducation.degree.toLowerCase();
    const rightDegree = rightEducation.degree.toLowerCase();

    if (leftDegree === rightDegree) {
      similarity += 0.3;
    } else if (areAdjacentDegreeLevels(degreeLevel(leftDegree), degreeLevel(rightDegree))) {
      similarity += 0.15;
    }
  }

  return similarity;
}

/**
 * Average match over the criteria the query actually populates. Experience level
 * "any" is not a criterion. A query with no criteria and no embedding scores 0.
 */
export function queryRelevance(
  profile: Profile,
  query: ParsedQuery,
  embeddings: {
    queryEmbedding?: Embedding | null;
    profileEmbedding?: Embedding | null;
  } = {},
): number {
  let relevance = 0;
  let criteria = 0;

  const title = profile.job_title.toLowerCase();
  const companies = companySet(profile);

  if (query.job_titles.length > 0) {
    criteria += 1;
    const matched = title.length > 0 && query.job_titles.some((queryTitle) => {
      const normalized = queryTitle.trim().toLowerCase();
      return normalized.length > 0 && (title.includes(normalized) || normalized.includes(title));
    });
    relevance += matched ? 1 : 0;
  }

  if (query.companies.length > 0) {
    criteria += 1;
    const matched = query.companies.some((company) => companies.has(company.trim().toLowerCase()));
    relevance += matched ? 1 : 0;
  }

  if (query.skills.length > 0) {
    criteria += 1;
    const profileSkills = new Set(profile.skills.map((skill) => skill.toLowerCase()));
    const matchedSkills = query.skills.filter((skill) =>
      profileSkills.has(skill.trim().toLowerCase())
    ).length;
    relevance += matchedSkills / query.skills.length;
  }

  if (query.industries.length > 0) {
    criteria += 1;
    const industry = (profile.industry ?? "").toLowerCase();
    relevance += containsAny(industry, query.industries) ? 1 : 0;
  }

  if (query.education.length > 0) {
    criteria += 1;
    const university = (profile.education?.university ?? "").toLowerCase();
    const degree = (profile.education?.degree ?? "").toLowerCase();
    const matched = containsAny(university, query.education) ||
      containsAny(degree, query.education);
    relevance += matched ? 1 : 0;
  }

  if (query.experience_level !== "any") {
    criteria += 1;
    relevance += matchesExperienceLevel(title, query.experience_level) ? 1 : 0;
  }

  if (embeddings.queryEmbedding && embeddings.profileEmbedding) {
    criteria += 1;
    relevance += semanticSimilarity(embeddings.queryEmbedding, embeddings.profileEmbedding);
  }

  return criteria > 0 ? relevance / criteria : 0;
}

function matchesExperienceLevel(
  title: string,
  level: Exclude<ParsedQuery["experience_level"], "any">,
): boolean {
  switch (level) {
    case "senior":
      return SENIOR_TITLE_KEYWORDS.some((keyword) => title.includes(keyword));
    case "junior":
      return title.includes("junior") ||
        (!title.includes("senior") && !title.includes("principal"));
    case "executive":
      return EXECUTIVE_TITLE_KEYWORDS.some((keyword) => title.includes(keyword));
  }
}

function degreeLevel(degree: string): DegreeLevel | null {
  const compact = degree.replace(/[^a-z]/g, "");
  const byAbbreviation = DEGREE_LEVEL_BY_ABBREVIATION[compact];
  if (byAbbreviation) {
    return byAbbreviation;
  }
  if (compact.startsWith("bachelor")) {
    return "bachelor";
  }
  if (compact.startsWith("master")) {
    return "master";
  }
  if (compact.startsWith("doctor")) {
    return "doctorate";
  }
  return null;
}

function areAdjacentDegreeLevels(left: DegreeLevel | null, right: DegreeLevel | null): boolean {
  if (!left || !right) {
    return false;
  }
  if (left === "bachelor" || right === "bachelor") {
    return left === right;
  }
  return true;
}

function companySet(profile: Profile): Set<string> {
  const companies = new Set<string>();
  if (profile.company) {
    companies.add(profile.company.toLowerCase());
  }
  for (const entry of profile.work_history) {
    if (entry.company) {
      companies.add(entry.company.toLowerCase());
    }
  }
  return companies;
}

function containsAny(haystack: string, needles: readonly string[]): boolean {
  if (!haystack) {
    return false;
  }
  return needles.some((needle) => {
    const normalized = needle.trim().toLowerCase();
    return normalized.length > 0 && haystack.includes(normalized);
  });
}

function jaccard(left: ReadonlySet<string>, right: ReadonlySet<string>): number {
  if (left.size === 0 || right.size === 0) {
    return 0;
  }

  let intersection = 0;
  for (const value of left) {
    if (right.has(value)) {
      intersection += 1;
    }
  }
  const union = left.size + right.size - intersection;
  return union === 0 ? 0 : intersection / union;
}

function clamp(value: number, min: number, max: number): number {
  if (!Number.isFinite(value)) {
    return min;
  }
  return Math.min(max, Math.max(min, value));
}

function round(value: number): number {
  const multiplier = 10 ** SIMILARITY_SCORE_ROUND_DIGITS;
  return Math.round(value * multiplier) / multiplier;
}
