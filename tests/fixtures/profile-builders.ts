import type { ProfileInput } from "../../packages/core/src/graph/profile-types";
import { ProfileStore } from "../../packages/core/src/graph/profile-store";
import type {
  Embedder,
  ParsedQuery,
  QueryParser,
} from "../../packages/core/src/matching/collaborators";

export function profileInput(id: string, overrides: Partial<ProfileInput> = {}): ProfileInput {
  return {
    id,
    name: `Person ${id}`,
    job_title: "Software Engineer",
    company: "Acme",
    industry: "Technology",
    bio: "",
    skills: [],
    education: null,
    work_history: [],
    connections: [],
    ...overrides,
  };
}

export function loadedStore(profiles: ProfileInput[]): ProfileStore {
  const store = new ProfileStore();
  store.load({ profiles });
  return store;
}

export function parsedQuery(overrides: Partial<ParsedQuery> = {}): ParsedQuery {
  return {
    job_titles: [],
    companies: [],
    skills: [],
    industries: [],
    experience_level: "any",
    education: [],
    other_criteria: "",
    ...overrides,
  };
}

export function staticQueryParser(result: ParsedQuery = parsedQuery()): QueryParser & {
  calls: string[];
} {
  const calls: string[] = [];
  return {
    calls,
    async parse(text) {
      calls.push(text);
      return result;
    },
  };
}

/** Deterministic bag-of-letters embedding so related texts land near each other. */
export function letterEmbedder(): Embedder & { calls: Array<{ count: number; purpose: string }> } {
  const calls: Array<{ count: number; purpose: string }> = [];
  return {
    calls,
    async embed(texts, purpose) {
      calls.push({ count: texts.length, purpose });
      return texts.map((text) => {
        const vector = new Array<number>(26).fill(0);
        for (const char of text.toLowerCase()) {
          const index = char.charCodeAt(0) - 97;
          if (index >= 0 && index < 26) {
            vector[index] = (vector[index] ?? 0) + 1;
          }
        }
        return vector;
      });
    },
  };
}
