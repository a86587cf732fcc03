import type { PopulationInput } from "../graph/profile-types.ts";

export type Embedding = readonly number[];

export const EXPERIENCE_LEVELS = ["junior", "senior", "executive", "any"] as const;

export type ExperienceLevel = (typeof EXPERIENCE_LEVELS)[number];

export type ParsedQuery = {
  job_titles: string[];
  companies: string[];
  skills: string[];
  industries: string[];
  experience_level: ExperienceLevel;
  education: string[];
  other_criteria: string;
};

export interface QueryParser {
  parse(text: string): Promise<ParsedQuery>;
}

export type EmbeddingPurpose = "document" | "query";

export interface Embedder {
  /** One vector per input text, in input order. */
  embed(texts: readonly string[], purpose: EmbeddingPurpose): Promise<Embedding[]>;
}

export type RerankDocument = {
  id: string;
  text: string;
};

export type RerankedDocument = {
  id: string;
  relevance_score: number;
  rank: number;
};

export interface Reranker {
  rerank(query: string, documents: readonly RerankDocument[], topN: number): Promise<RerankedDocument[]>;
}

export interface ProfileSource {
  readonly name: string;
  loadPopulation(params: { count: number }): Promise<PopulationInput>;
}

export function emptyParsedQuery(): ParsedQuery {
  return {
    job_titles: [],
    companies: [],
    skills: [],
    industries: [],
    experience_level: "any",
    education: [],
    other_criteria: "",
  };
}
