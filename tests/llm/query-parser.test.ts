import { beforeEach, describe, expect, it, vi } from "vitest";
import {
  clearInMemoryMetrics,
  getInMemoryMetrics,
} from "../../packages/core/src/observability/metrics";
import { QUERY_PARSING_SYSTEM_PROMPT } from "../../packages/llm/src/prompts/query-parsing-system-prompt";
import { LlmProviderError, type LlmProviderResponse } from "../../packages/llm/src/provider";
import { createQueryParser, QueryParserError } from "../../packages/llm/src/query-parser";

function completion(text: string): LlmProviderResponse {
  return {
    text,
    model: "test-model",
    provider: "anthropic",
    usage: { input_tokens: 120, output_tokens: 30 },
  };
}

function providerReturning(...results: Array<LlmProviderResponse | Error>) {
  const generateText = vi.fn();
  for (const result of results) {
    if (result instanceof Error) {
      generateText.mockRejectedValueOnce(result);
    } else {
      generateText.mockResolvedValueOnce(result);
    }
  }
  return { generateText };
}

async function parseFailure(promise: Promise<unknown>): Promise<QueryParserError> {
  const error = await promise.catch((caught: unknown) => caught);
  if (!(error instanceof QueryParserError)) {
    throw new Error("Expected a QueryParserError.");
  }
  return error;
}

describe("query parser", () => {
  beforeEach(() => {
    vi.spyOn(console, "info").mockImplementation(() => undefined);
    clearInMemoryMetrics();
  });

  it("parses fenced model output into structured criteria", async () => {
    const provider = providerReturning(
      completion("```json\n{\"job_titles\":[\"ML Engineer\"],\"skills\":\"Python\",\"experience_level\":\"Senior\"}\n```"),
    );
    const parser = createQueryParser({ provider, createCorrelationId: () => "corr_parse" });

    const parsed = await parser.parse("  senior ML engineers who know Python ");

    expect(parsed).toEqual({
      job_titles: ["ML Engineer"],
      companies: [],
      skills: ["Python"],
      industries: [],
      experience_level: "senior",
      education: [],
      other_criteria: "",
    });
    expect(provider.generateText).toHaveBeenCalledTimes(1);
    expect(provider.generateText).toHaveBeenCalledWith(expect.objectContaining({
      systemPrompt: QUERY_PARSING_SYSTEM_PROMPT,
      userPrompt: "PromptVersion: query_parsing_v1\nQuery:\n\"senior ML engineers who know Python\"",
      timeoutMs: 8_000,
    }));
  });

  it("returns empty criteria for blank text without calling the provider", async () => {
    const provider = providerReturning();
    const parsed = await createQueryParser({ provider }).parse("   ");

    expect(parsed.experience_level).toBe("any");
    expect(parsed.skills).toEqual([]);
    expect(provider.generateText).not.toHaveBeenCalled();
  });

  it("gives up on the first transient failure by default", async () => {
    const provider = providerReturning(
      new LlmProviderError("unavailable", { transient: true, status: 503 }),
      completion("{\"companies\":[\"Ledgerly\"]}"),
    );

    const error = await parseFailure(createQueryParser({ provider }).parse("people at Ledgerly"));

    expect(error.code).toBe("provider_transient");
    expect(error.transient).toBe(true);
    expect(provider.generateText).toHaveBeenCalledTimes(1);
  });

  it("retries transient failures when a retry count is configured", async () => {
    const provider = providerReturning(
      new LlmProviderError("overloaded", { transient: true, status: 529 }),
      completion("{\"companies\":[\"Ledgerly\"]}"),
    );

    const parsed = await createQueryParser({ provider, retryCount: 1 }).parse("people at Ledgerly");

    expect(parsed.companies).toEqual(["Ledgerly"]);
    expect(provider.generateText).toHaveBeenCalledTimes(2);
  });

  it("gives up after the configured retry budget on repeated timeouts", async () => {
    const provider = providerReturning(
      new LlmProviderError("timed out", { transient: true, timedOut: true }),
      new LlmProviderError("timed out", { transient: true, timedOut: true }),
    );

    const error = await parseFailure(createQueryParser({ provider, retryCount: 1 }).parse("anyone"));

    expect(error.code).toBe("timeout");
    expect(error.transient).toBe(true);
    expect(provider.generateText).toHaveBeenCalledTimes(2);
  });

  it("does not retry non-transient provider failures", async () => {
    const provider = providerReturning(
      new LlmProviderError("bad request", { transient: false, status: 400 }),
    );

    const error = await parseFailure(
      createQueryParser({ provider, createCorrelationId: () => "corr_fail" }).parse("anyone"),
    );

    expect(error.code).toBe("provider_non_transient");
    expect(error.correlationId).toBe("corr_fail");
    expect(error.promptVersion).toBe("query_parsing_v1");
    expect(provider.generateText).toHaveBeenCalledTimes(1);
  });

  it("classifies unparseable and mistyped output", async () => {
    const invalidJson = await parseFailure(
      createQueryParser({ provider: providerReturning(completion("no idea, sorry")) }).parse("anyone"),
    );
    const schemaInvalid = await parseFailure(
      createQueryParser({ provider: providerReturning(completion("{\"skills\":[1]}")) }).parse("anyone"),
    );

    expect(invalidJson.code).toBe("invalid_json");
    expect(schemaInvalid.code).toBe("schema_invalid");
    expect(schemaInvalid.message).toBe("Query parsing failed: parsed_query.skills[0] must be a string.");
  });

  it("records token usage and call metrics", async () => {
    const provider = providerReturning(completion("{}"));

    await createQueryParser({ provider }).parse("anyone");

    const metrics = getInMemoryMetrics();
    expect(metrics.find((metric) => metric.metric === "llm.token.input")?.value).toBe(120);
    expect(metrics.find((metric) => metric.metric === "llm.token.output")?.value).toBe(30);
    expect(metrics.find((metric) => metric.metric === "collaborator.request.count")?.tags).toEqual({
      component: "query_parser",
      model: "test-model",
      attempt: "1",
      outcome: "success",
    });
  });
});
