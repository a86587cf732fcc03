import { beforeEach, describe, expect, it, vi } from "vitest";
import { MatchingError, toPublicErrorBody } from "../../packages/core/src/errors";
import { createSyntheticProfileSource } from "../../packages/core/src/fixtures/synthetic-network";
import { ProfileStore } from "../../packages/core/src/graph/profile-store";
import type { Embedder, QueryParser, Reranker } from "../../packages/core/src/matching/collaborators";
import {
  createNetworkMatchingEngine,
  type NetworkMatchingEngineOptions,
} from "../../packages/core/src/matching/network-matching-engine";
import {
  createLocalScoringStrategy,
  createRerankStrategy,
} from "../../packages/core/src/matching/ranking-strategies";
import {
  clearInMemoryMetrics,
  getInMemoryMetrics,
} from "../../packages/core/src/observability/metrics";
import {
  letterEmbedder,
  loadedStore,
  parsedQuery,
  profileInput,
  staticQueryParser,
} from "../fixtures/profile-builders";

const FIXED_NOW = new Date("2026-03-01T12:00:00.000Z");

type LoggedLine = { event: string; level: string; payload: Record<string, unknown> };

function logLines(): LoggedLine[] {
  return vi.mocked(console.info).mock.calls.map(([line]): LoggedLine => JSON.parse(String(line)));
}

function engineWith(overrides: Partial<NetworkMatchingEngineOptions> = {}) {
  return createNetworkMatchingEngine({
    queryParser: staticQueryParser(),
    strategy: createLocalScoringStrategy(),
    now: () => FIXED_NOW,
    createCorrelationId: () => "corr_test",
    ...overrides,
  });
}

async function syntheticEngine(overrides: Partial<NetworkMatchingEngineOptions> = {}) {
  const engine = engineWith({
    profileSource: createSyntheticProfileSource({
      seed: 7,
      referenceDate: new Date("2026-01-01T00:00:00.000Z"),
    }),
    ...overrides,
  });
  await engine.initialize(50);
  return engine;
}

describe("network matching engine", () => {
  beforeEach(() => {
    vi.spyOn(console, "info").mockImplementation(() => undefined);
    clearInMemoryMetrics();
  });

  it("returns max_results ranked matches with non-increasing scores", async () => {
    const engine = await syntheticEngine();

    const response = await engine.findConnections({
      requester_id: "synthetic-0001",
      query: "ML engineers in AI research",
      max_results: 3,
    });

    expect(response.results).toHaveLength(3);
    expect(response.results.map((result) => result.rank)).toEqual([1, 2, 3]);
    const scores = response.results.map((result) => result.match_score);
    expect(scores[0]).toBeGreaterThanOrEqual(scores[1] ?? 0);
    expect(scores[1]).toBeGreaterThanOrEqual(scores[2] ?? 0);
    expect(response.results.some((result) => result.profile.id === "synthetic-0001")).toBe(false);
    expect(response.metadata.total_candidates_evaluated).toBe(49);
    expect(response.metadata.timestamp).toBe("2026-03-01T12:00:00.000Z");
    expect(response.strategy).toBe("local");
  });

  it("is deterministic for the same population and query", async () => {
    const engine = await syntheticEngine();
    const input = { requester_id: "synthetic-0010", query: "product leaders", max_results: 5 };

    const first = await engine.findConnections(input);
    const second = await engine.findConnections(input);

    expect(second.results.map((result) => [result.profile.id, result.match_score])).toEqual(
      first.results.map((result) => [result.profile.id, result.match_score]),
    );
  });

  it("rejects an unknown requester before calling any collaborator", async () => {
    const queryParser = staticQueryParser();
    const embedder = letterEmbedder();
    const engine = engineWith({
      store: loadedStore([profileInput("a")]),
      queryParser,
      embedder,
    });

    await expect(engine.findConnections({ requester_id: "ghost", query: "anyone" })).rejects.toMatchObject({
      code: "MATCH_PROFILE_NOT_FOUND",
      status: 404,
    });
    expect(queryParser.calls).toEqual([]);
    expect(embedder.calls).toEqual([]);
  });

  it("validates max_results and the query text", async () => {
    const engine = engineWith({ store: loadedStore([profileInput("a"), profileInput("b")]) });

    await expect(engine.findConnections({ requester_id: "a", query: "x", max_results: 0 })).rejects
      .toMatchObject({ code: "MATCH_VALIDATION_FAILED" });
    await expect(engine.findConnections({ requester_id: "a", query: "x", max_results: 51 })).rejects
      .toMatchObject({ code: "MATCH_VALIDATION_FAILED" });
    await expect(engine.findConnections({ requester_id: "a", query: "   " })).rejects
      .toMatchObject({ code: "MATCH_VALIDATION_FAILED" });
  });

  it("builds explanations, mutual connections and paths per result", async () => {
    const engine = engineWith({
      store: loadedStore([
        profileInput("a", { connections: ["c"] }),
        profileInput("c"),
        profileInput("d", { connections: ["c"] }),
      ]),
    });

    const response = await engine.findConnections({ requester_id: "a", query: "people I know" });

    expect(response.results.map((result) => result.profile.id)).toEqual(["d", "c"]);
    const [first, second] = response.results;
    expect(first?.match_score).toBe(0.3);
    expect(first?.connection_path).toEqual(["2-hop", "Person c"]);
    expect(first?.mutual_connections).toEqual([
      { id: "c", name: "Person c", job_title: "Software Engineer", company: "Acme" },
    ]);
    expect(first?.explanation).toBe(
      "Shared connections • Worked at same companies • Composite score: 0.300 • 1 mutual connection",
    );
    expect(second?.connection_path).toEqual(["direct"]);
    expect(second?.explanation).toBe("Worked at same companies • Composite score: 0.150 • 0 mutual connections");
  });

  it("omits explanations when they are not requested", async () => {
    const engine = engineWith({ store: loadedStore([profileInput("a"), profileInput("b")]) });

    const response = await engine.findConnections({
      requester_id: "a",
      query: "anyone",
      include_explanations: false,
    });

    expect(response.results[0]?.explanation).toBeNull();
  });

  it("degrades to no query embedding when the embedder fails", async () => {
    const embedder: Embedder = {
      embed: async () => {
        throw new Error("embedding service unavailable");
      },
    };
    const engine = engineWith({
      store: loadedStore([profileInput("a"), profileInput("b")]),
      embedder,
    });

    const response = await engine.findConnections({ requester_id: "a", query: "anyone" });

    expect(response.results).toHaveLength(1);
    expect(response.metadata.query_embedding_available).toBe(false);
    const degraded = logLines().find((line) => line.event === "matching.query_embedding_degraded");
    expect(degraded?.level).toBe("warn");
    expect(degraded?.payload).toEqual({ requester_id: "a", reason: "Error" });
  });

  it("fails the call when query parsing fails", async () => {
    const queryParser: QueryParser = {
      parse: async () => {
        throw new Error("parser offline");
      },
    };
    const engine = engineWith({ store: loadedStore([profileInput("a"), profileInput("b")]), queryParser });

    const failure = await engine.findConnections({ requester_id: "a", query: "anyone" }).catch(
      (error: unknown) => error,
    );

    expect(failure).toBeInstanceOf(MatchingError);
    expect(failure).toMatchObject({ code: "MATCH_COLLABORATOR_FAILED", status: 500 });
    expect(toPublicErrorBody(failure)).toEqual({
      error: { code: "MATCH_COLLABORATOR_FAILED", message: "Matching service failed.", status: 500 },
    });
    const failed = logLines().find((line) => line.event === "matching.request_failed");
    expect(failed?.payload.error_code).toBe("MATCH_COLLABORATOR_FAILED");
  });

  it("times out a call that outlives its deadline", async () => {
    const queryParser: QueryParser = { parse: () => new Promise(() => undefined) };
    const engine = engineWith({
      store: loadedStore([profileInput("a"), profileInput("b")]),
      queryParser,
      timeoutMs: 20,
    });

    await expect(engine.findConnections({ requester_id: "a", query: "anyone" })).rejects.toMatchObject({
      code: "MATCH_TIMEOUT",
      status: 504,
    });
  });

  it("ranks through the rerank collaborator when configured", async () => {
    const reranker: Reranker = {
      rerank: async (_query, documents) =>
        documents.map((document, index) => ({
          id: document.id,
          relevance_score: index === documents.length - 1 ? 0.95 : 0.1,
          rank: index + 1,
        })),
    };
    const engine = engineWith({
      store: loadedStore([profileInput("a"), profileInput("b"), profileInput("c")]),
      strategy: createRerankStrategy({ reranker }),
    });

    const response = await engine.findConnections({ requester_id: "a", query: "anyone", max_results: 2 });

    expect(response.strategy).toBe("rerank");
    expect(response.results.map((result) => result.profile.id)).toEqual(["c", "b"]);
    expect(response.results[0]?.score_breakdown).toEqual({ rerank_score: 0.95 });
    expect(response.results[0]?.explanation).toBe("Rerank score: 0.950 • 0 mutual connections");
  });

  it("passes the parsed query through to the response", async () => {
    const criteria = parsedQuery({ skills: ["Rust"], experience_level: "senior" });
    const engine = engineWith({
      store: loadedStore([profileInput("a"), profileInput("b")]),
      queryParser: staticQueryParser(criteria),
    });

    const response = await engine.findConnections({ requester_id: "a", query: "senior rust people" });

    expect(response.parsed_query).toEqual(criteria);
    expect(response.requester.id).toBe("a");
  });

  it("emits matching metrics for a completed call", async () => {
    const engine = engineWith({ store: loadedStore([profileInput("a"), profileInput("b"), profileInput("c")]) });

    await engine.findConnections({ requester_id: "a", query: "anyone", max_results: 1 });

    const returned = getInMemoryMetrics().find((metric) => metric.metric === "matching.results.returned");
    const evaluated = getInMemoryMetrics().find((metric) => metric.metric === "matching.candidates.evaluated");
    expect(returned?.value).toBe(1);
    expect(evaluated?.value).toBe(2);
    expect(returned?.tags).toEqual({ component: "matching_pipeline", strategy: "local" });
  });
});

describe("network matching engine administration", () => {
  beforeEach(() => {
    vi.spyOn(console, "info").mockImplementation(() => undefined);
  });

  it("initializes the store from its population source", async () => {
    const store = new ProfileStore();
    const engine = engineWith({
      store,
      profileSource: createSyntheticProfileSource({ seed: 3, referenceDate: new Date("2026-01-01") }),
    });

    const summary = await engine.initialize(25);

    expect(summary.profile_count).toBe(25);
    expect(summary.connection_count).toBe(store.connectionCount);
    expect(store.generation).toBe(1);
  });

  it("rejects initialization without a source or with a bad count", async () => {
    await expect(engineWith().initialize(10)).rejects.toMatchObject({ code: "MATCH_VALIDATION_FAILED" });

    const engine = engineWith({ profileSource: createSyntheticProfileSource() });
    await expect(engine.initialize(0)).rejects.toMatchObject({ code: "MATCH_VALIDATION_FAILED" });
  });

  it("exposes stats, mutual connections and paths over the loaded graph", () => {
    const engine = engineWith({
      store: loadedStore([
        profileInput("a", { connections: ["b", "c"] }),
        profileInput("b"),
        profileInput("c"),
        profileInput("d", { connections: ["c"] }),
      ]),
    });

    expect(engine.mutualConnections("a", "d").map((summary) => summary.id)).toEqual(["c"]);
    expect(engine.connectionPath("a", "d")).toEqual(["2-hop", "Person c"]);
    expect(engine.networkStats().total_connections).toBe(3);
    expect(() => engine.mutualConnections("a", "ghost")).toThrow("Profile 'ghost' not found.");
  });
});
