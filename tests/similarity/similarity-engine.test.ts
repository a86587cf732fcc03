import { describe, expect, it } from "vitest";
import {
  companyOverlap,
  educationSimilarity,
  mutualConnectionOverlap,
  queryRelevance,
  relationshipStrength,
  scoreCandidate,
  semanticSimilarity,
} from "../../packages/core/src/similarity/similarity-engine";
import {
  DEFAULT_SIMILARITY_WEIGHTS,
  resolveSimilarityWeights,
} from "../../packages/core/src/similarity/scoring-weights";
import { MatchingError } from "../../packages/core/src/errors";
import { loadedStore, parsedQuery, profileInput } from "../fixtures/profile-builders";

describe("semanticSimilarity", () => {
  it("scores identical directions as 1 and orthogonal ones as 0", () => {
    expect(semanticSimilarity([1, 0], [2, 0])).toBe(1);
    expect(semanticSimilarity([1, 0], [0, 1])).toBe(0);
  });

  it("floors negative cosine at 0", () => {
    expect(semanticSimilarity([1, 0], [-1, 0])).toBe(0);
  });

  it("scores absent, zero and mismatched vectors as 0", () => {
    expect(semanticSimilarity(null, [1, 0])).toBe(0);
    expect(semanticSimilarity([0, 0], [1, 0])).toBe(0);
    expect(semanticSimilarity([1, 0, 0], [1, 0])).toBe(0);
    expect(semanticSimilarity([], [])).toBe(0);
  });
});

describe("pairwise metrics", () => {
  it("uses Jaccard over connection sets: 0 when either is empty, 1 when identical", () => {
    const store = loadedStore([
      profileInput("a", { connections: ["c", "d"] }),
      profileInput("b", { connections: ["c", "d"] }),
      profileInput("c"),
      profileInput("d"),
      profileInput("lonely"),
    ]);

    expect(mutualConnectionOverlap(store.get("a"), store.get("b"))).toBe(1);
    expect(mutualConnectionOverlap(store.get("a"), store.get("lonely"))).toBe(0);
    expect(mutualConnectionOverlap(store.get("lonely"), store.get("lonely"))).toBe(0);
  });

  it("compares current and past companies case-insensitively", () => {
    const store = loadedStore([
      profileInput("a", {
        company: "Acme",
        work_history: [{ company: "Initech", title: "Engineer", start: null, end: null, is_current: false }],
      }),
      profileInput("b", { company: "INITECH" }),
    ]);

    expect(companyOverlap(store.get("a"), store.get("b"))).toBe(0.5);
  });

  it("takes the stronger direction of a two-way interaction", () => {
    const store = loadedStore([profileInput("a"), profileInput("b")]);
    const withInteractions = loadedStore([
      profileInput("a", { interactions: { b: { frequency: 1, last_contact: null, strength: 0.3 } } }),
      profileInput("b", { interactions: { a: { frequency: 9, last_contact: null, strength: 0.8 } } }),
    ]);

    expect(relationshipStrength(withInteractions.get("a"), withInteractions.get("b"))).toBe(0.8);
    expect(relationshipStrength(withInteractions.get("b"), withInteractions.get("a"))).toBe(0.8);
    expect(relationshipStrength(store.get("a"), store.get("b"))).toBe(0);
  });

  it("scores same university with adjacent graduate degrees at 0.85", () => {
    const store = loadedStore([
      profileInput("ms", { education: { university: "MIT", degree: "MS", field: "Physics" } }),
      profileInput("phd", { education: { university: "mit", degree: "PhD", field: "Mathematics" } }),
      profileInput("bs", { education: { university: "Caltech", degree: "BS", field: null } }),
      profileInput("ba", { education: { university: "Cornell", degree: "BA", field: null } }),
      profileInput("none"),
    ]);

    expect(educationSimilarity(store.get("ms"), store.get("phd"))).toBeCloseTo(0.85, 10);
    expect(educationSimilarity(store.get("bs"), store.get("ba"))).toBe(0.15);
    expect(educationSimilarity(store.get("bs"), store.get("ms"))).toBe(0);
    expect(educationSimilarity(store.get("ms"), store.get("none"))).toBe(0);
  });
});

describe("queryRelevance", () => {
  const store = loadedStore([
    profileInput("ml", {
      job_title: "Senior ML Engineer",
      company: "Cinder AI",
      industry: "AI Research",
      skills: ["Python", "PyTorch"],
      education: { university: "Stanford University", degree: "MS", field: null },
    }),
    profileInput("untitled", { job_title: "" }),
  ]);

  it("averages the criteria the query populates", () => {
    const score = queryRelevance(
      store.get("ml"),
      parsedQuery({ job_titles: ["ml engineer"], skills: ["python", "rust"], industries: ["research"] }),
    );

    expect(score).toBeCloseTo(2.5 / 3, 10);
  });

  it("matches experience levels by title keywords", () => {
    expect(queryRelevance(store.get("ml"), parsedQuery({ experience_level: "senior" }))).toBe(1);
    expect(queryRelevance(store.get("ml"), parsedQuery({ experience_level: "executive" }))).toBe(0);
  });

  it("matches education against university or degree", () => {
    expect(queryRelevance(store.get("ml"), parsedQuery({ education: ["Stanford"] }))).toBe(1);
    expect(queryRelevance(store.get("ml"), parsedQuery({ education: ["Harvard"] }))).toBe(0);
  });

  it("never matches a job-title criterion against an empty title", () => {
    expect(queryRelevance(store.get("untitled"), parsedQuery({ job_titles: ["engineer"] }))).toBe(0);
  });

  it("scores 0 when the query has no criteria", () => {
    expect(queryRelevance(store.get("ml"), parsedQuery())).toBe(0);
  });

  it("adds embedding similarity as one more criterion when both vectors exist", () => {
    const score = queryRelevance(store.get("ml"), parsedQuery({ companies: ["cinder ai"] }), {
      queryEmbedding: [1, 0],
      profileEmbedding: [0, 1],
    });

    expect(score).toBe(0.5);
  });
});

describe("scoreCandidate", () => {
  it("weights each metric into the composite", () => {
    const store = loadedStore([
      profileInput("a", {
        connections: ["c"],
        education: { university: "MIT", degree: "MS", field: null },
        interactions: { b: { frequency: 3, last_contact: null, strength: 0.5 } },
      }),
      profileInput("b", {
        connections: ["c"],
        education: { university: "MIT", degree: "MS", field: null },
      }),
      profileInput("c"),
    ]);

    const result = scoreCandidate({ requester: store.get("a"), candidate: store.get("b") });

    expect(result.breakdown).toEqual({
      semantic_similarity: 0,
      relationship_strength: 0.5,
      mutual_connections: 1,
      company_overlap: 1,
      education_similarity: 1,
      query_relevance: 0,
    });
    expect(result.composite_score).toBe(0.5);
    expect(result.version).toBe("v1");
  });

  it("keeps the composite inside [0,1] when every metric is maxed", () => {
    const store = loadedStore([
      profileInput("a", {
        job_title: "CTO",
        connections: ["c"],
        education: { university: "MIT", degree: "PhD", field: null },
        interactions: { b: { frequency: 3, last_contact: null, strength: 1 } },
      }),
      profileInput("b", {
        job_title: "CTO",
        connections: ["c"],
        education: { university: "MIT", degree: "PhD", field: null },
      }),
      profileInput("c"),
    ]);

    const result = scoreCandidate({
      requester: store.get("a"),
      candidate: store.get("b"),
      requesterEmbedding: [1, 1],
      candidateEmbedding: [1, 1],
      queryEmbedding: [1, 1],
      parsedQuery: parsedQuery({ job_titles: ["CTO"], experience_level: "executive" }),
    });

    expect(result.composite_score).toBe(1);
  });
});

describe("resolveSimilarityWeights", () => {
  it("returns the defaults without overrides", () => {
    expect(resolveSimilarityWeights()).toEqual(DEFAULT_SIMILARITY_WEIGHTS);
  });

  it("accepts overrides that keep the sum at 1", () => {
    const weights = resolveSimilarityWeights({ semantic_similarity: 0.1, query_relevance: 0.3 });
    expect(weights.semantic_similarity).toBe(0.1);
    expect(weights.query_relevance).toBe(0.3);
  });

  it("rejects sums other than 1, negative weights and unknown keys", () => {
    const unknownKey: Record<string, number> = { bogus: 1 };

    expect(() => resolveSimilarityWeights({ query_relevance: 0.5 })).toThrow(MatchingError);
    expect(() => resolveSimilarityWeights({ semantic_similarity: -0.1, query_relevance: 0.5 }))
      .toThrow("non-negative");
    expect(() => resolveSimilarityWeights(unknownKey)).toThrow("Unknown similarity weight 'bogus'");
  });
});
