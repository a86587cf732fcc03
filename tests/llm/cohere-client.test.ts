import { beforeEach, describe, expect, it, vi } from "vitest";
import { CohereClientError, createCohereClient } from "../../packages/llm/src/cohere-client";
import { fetchStub, jsonResponse } from "../fixtures/fetch-stub";

const DOCUMENTS = [
  { id: "p1", text: "Name: Avery" },
  { id: "p2", text: "Name: Blake" },
  { id: "p3", text: "Name: Casey" },
];

describe("cohere client", () => {
  beforeEach(() => {
    vi.spyOn(console, "info").mockImplementation(() => undefined);
  });

  it("embeds texts with the input type for their purpose", async () => {
    const { fetchImpl, requests } = fetchStub(jsonResponse({ embeddings: { float: [[0.1, 0.2], [0.3, 0.4]] } }));
    const client = createCohereClient({ apiKey: "test-secret", embedModel: "embed-test", fetchImpl });

    const vectors = await client.embed(["alpha", "beta"], "document");

    expect(vectors).toEqual([[0.1, 0.2], [0.3, 0.4]]);
    expect(requests[0]?.url).toBe("https://api.cohere.com/v2/embed");
    expect(requests[0]?.headers.authorization).toBe("Bearer test-secret");
    expect(requests[0]?.body).toEqual({
      model: "embed-test",
      texts: ["alpha", "beta"],
      input_type: "search_document",
      embedding_types: ["float"],
    });
  });

  it("uses the query input type for query embeddings", async () => {
    const { fetchImpl, requests } = fetchStub(jsonResponse({ embeddings: { float: [[1, 0]] } }));

    await createCohereClient({ apiKey: "test-secret", fetchImpl }).embed(["who knows Rust"], "query");

    expect(requests[0]?.body).toMatchObject({ input_type: "search_query" });
  });

  it("rejects embedding responses whose count does not match the input", async () => {
    const { fetchImpl } = fetchStub(jsonResponse({ embeddings: { float: [[1, 0]] } }));

    await expect(
      createCohereClient({ apiKey: "test-secret", fetchImpl }).embed(["a", "b"], "document"),
    ).rejects.toThrow("Cohere embed response has an unexpected shape.");
  });

  it("maps rerank indexes back to document ids", async () => {
    const { fetchImpl, requests } = fetchStub(jsonResponse({
      results: [
        { index: 2, relevance_score: 0.91 },
        { index: 0, relevance_score: 0.42 },
      ],
    }));
    const client = createCohereClient({ apiKey: "test-secret", rerankModel: "rerank-test", fetchImpl });

    const ranked = await client.rerank("data people", DOCUMENTS, 10);

    expect(ranked).toEqual([
      { id: "p3", relevance_score: 0.91, rank: 1 },
      { id: "p1", relevance_score: 0.42, rank: 2 },
    ]);
    expect(requests[0]?.url).toBe("https://api.cohere.com/v2/rerank");
    expect(requests[0]?.body).toEqual({
      model: "rerank-test",
      query: "data people",
      documents: ["Name: Avery", "Name: Blake", "Name: Casey"],
      top_n: 3,
    });
  });

  it("rejects rerank results that point outside the submitted documents", async () => {
    const { fetchImpl } = fetchStub(jsonResponse({ results: [{ index: 9, relevance_score: 0.5 }] }));

    await expect(
      createCohereClient({ apiKey: "test-secret", fetchImpl }).rerank("q", DOCUMENTS, 2),
    ).rejects.toBeInstanceOf(CohereClientError);
  });

  it("short-circuits empty input without a request", async () => {
    const { fetchImpl, requests } = fetchStub();
    const client = createCohereClient({ apiKey: "test-secret", fetchImpl });

    expect(await client.embed([], "document")).toEqual([]);
    expect(await client.rerank("q", [], 5)).toEqual([]);
    expect(requests).toEqual([]);
  });

  it("raises retryable errors for server failures and logs the status", async () => {
    const { fetchImpl } = fetchStub(jsonResponse({ message: "unavailable" }, 503));

    const error = await createCohereClient({ apiKey: "test-secret", fetchImpl })
      .embed(["a"], "query")
      .catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(CohereClientError);
    expect(error).toMatchObject({ operation: "embed", retryable: true, status: 503 });
    const failure = vi.mocked(console.info).mock.calls
      .map(([line]) => JSON.parse(String(line)))
      .find((line) => line.event === "collaborator.failure");
    expect(failure?.payload).toEqual({
      component: "cohere_embed",
      attempt: 1,
      error_code: "http_503",
      retryable: true,
    });
  });
});
