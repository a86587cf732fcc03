import { readEnv } from "../../core/src/config/env.ts";
import type {
  Embedder,
  Embedding,
  EmbeddingPurpose,
  RerankDocument,
  RerankedDocument,
  Reranker,
} from "../../core/src/matching/collaborators.ts";
import { createLogger, type StructuredLogger } from "../../core/src/observability/logger.ts";
import {
  elapsedMetricMs,
  emitMetricBestEffort,
  nowMetricMs,
} from "../../core/src/observability/metrics.ts";
import { isRecord, isRetryableStatus, postJson, type JsonPostOutcome } from "./http.ts";

const COHERE_BASE_URL = "https://api.cohere.com";
export const COHERE_DEFAULT_EMBED_MODEL = "embed-v4.0";
export const COHERE_DEFAULT_RERANK_MODEL = "rerank-english-v3.0";
const DEFAULT_TIMEOUT_MS = 15_000;

const INPUT_TYPE_BY_PURPOSE: Record<EmbeddingPurpose, string> = {
  document: "search_document",
  query: "search_query",
};

export class CohereClientError extends Error {
  readonly status: number | null;
  readonly retryable: boolean;
  readonly operation: "embed" | "rerank";

  constructor(
    message: string,
    options: { operation: "embed" | "rerank"; retryable: boolean; status?: number | null },
  ) {
    super(message);
    this.name = "CohereClientError";
    this.operation = options.operation;
    this.retryable = options.retryable;
    this.status = options.status ?? null;
  }
}

export type CohereClient = Embedder & Reranker;

type CreateCohereClientOptions = {
  apiKey?: string | null;
  embedModel?: string;
  rerankModel?: string;
  baseUrl?: string;
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
  logger?: StructuredLogger;
};

function parseEmbeddings(body: unknown, expected: number): Embedding[] {
  const floats = isRecord(body) && isRecord(body.embeddings) ? body.embeddings.float : null;
  if (!Array.isArray(floats) || floats.length !== expected) {
    throw new CohereClientError("Cohere embed response has an unexpected shape.", {
      operation: "embed",
      retryable: false,
    });
  }

  return floats.map((vector) => {
    if (!Array.isArray(vector) || !vector.every((entry) => typeof entry === "number")) {
      throw new CohereClientError("Cohere embed response contains a non-numeric vector.", {
        operation: "embed",
        retryable: false,
      });
    }
    return vector.map(Number);
  });
}

function parseRerankResults(
  body: unknown,
  documents: readonly RerankDocument[],
): RerankedDocument[] {
  const results = isRecord(body) ? body.results : null;
  if (!Array.isArray(results)) {
    throw new CohereClientError("Cohere rerank response is missing results.", {
      operation: "rerank",
      retryable: false,
    });
  }

  return results.map((entry, position) => {
    const index = isRecord(entry) ? entry.index : null;
    const score = isRecord(entry) ? entry.relevance_score : null;
    const document = typeof index === "number" ? documents[index] : undefined;
    if (!document || typeof score !== "number") {
      throw new CohereClientError("Cohere rerank result does not reference a submitted document.", {
        operation: "rerank",
        retryable: false,
      });
    }
    return { id: document.id, relevance_score: score, rank: position + 1 };
  });
}

function bodyOrThrow(operation: "embed" | "rerank", result: JsonPostOutcome): unknown {
  switch (result.kind) {
    case "ok":
      return result.body;
    case "network_error":
      throw new CohereClientError(result.timedOut ? "Cohere call timed out." : "Cohere network failure.", {
        operation,
        retryable: true,
      });
    case "http_error":
      throw new CohereClientError(`Cohere ${operation} returned status ${result.status}.`, {
        operation,
        retryable: isRetryableStatus(result.status),
        status: result.status,
      });
    case "invalid_json":
      throw new CohereClientError("Cohere returned non-JSON payload.", {
        operation,
        retryable: false,
        status: result.status,
      });
  }
}

export function createCohereClient(options: CreateCohereClientOptions = {}): CohereClient {
  const apiKey = options.apiKey ?? readEnv("COHERE_API_KEY") ?? null;
  const embedModel = options.embedModel ?? readEnv("COHERE_EMBED_MODEL") ?? COHERE_DEFAULT_EMBED_MODEL;
  const rerankModel = options.rerankModel ?? readEnv("COHERE_RERANK_MODEL") ??
    COHERE_DEFAULT_RERANK_MODEL;
  const baseUrl = options.baseUrl ?? COHERE_BASE_URL;
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const fetchImpl = options.fetchImpl ?? fetch;
  const log = options.logger ?? createLogger();

  async function post(
    operation: "embed" | "rerank",
    path: string,
    payload: Record<string, unknown>,
  ): Promise<unknown> {
    if (!apiKey) {
      throw new CohereClientError("COHERE_API_KEY is not configured.", {
        operation,
        retryable: false,
      });
    }

    const component = `cohere_${operation}`;
    log({ event: "collaborator.call", payload: { component, attempt: 1 } });

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs);
    const startedAt = nowMetricMs();
    let outcome: "success" | "error" = "error";

    try {
      const result = await postJson(fetchImpl, `${baseUrl}${path}`, {
        headers: { accept: "application/json", authorization: `Bearer ${apiKey}` },
        body: payload,
        signal: controller.signal,
      });
      const body = bodyOrThrow(operation, result);
      outcome = "success";
      return body;
    } catch (error) {
      log({
        level: "warn",
        event: "collaborator.failure",
        payload: {
          component,
          attempt: 1,
          error_code: error instanceof CohereClientError && error.status !== null
            ? `http_${error.status}`
            : "request_failed",
          retryable: error instanceof CohereClientError ? error.retryable : false,
        },
      });
      throw error;
    } finally {
      clearTimeout(timeoutId);
      emitMetricBestEffort({
        metric: "collaborator.request.count",
        value: 1,
        tags: { component, outcome },
      });
      emitMetricBestEffort({
        metric: "system.request.latency",
        value: elapsedMetricMs(startedAt),
        tags: { component: "collaborator_call", operation: component, outcome },
      });
    }
  }

  return {
    async embed(texts, purpose) {
      if (texts.length === 0) {
        return [];
      }

      const body = await post("embed", "/v2/embed", {
        model: embedModel,
        texts,
        input_type: INPUT_TYPE_BY_PURPOSE[purpose],
        embedding_types: ["float"],
      });
      return parseEmbeddings(body, texts.length);
    },

    async rerank(query, documents, topN) {
      if (documents.length === 0) {
        return [];
      }

      const body = await post("rerank", "/v2/rerank", {
        model: rerankModel,
        query,
        documents: documents.map((document) => document.text),
        top_n: Math.max(1, Math.min(topN, documents.length)),
      });
      try {
        return parseRerankResults(body, documents);
      } catch (error) {
        log({
          level: "warn",
          event: "collaborator.failure",
          payload: { component: "cohere_rerank", attempt: 1, error_code: "invalid_response" },
        });
        throw error;
      }
    },
  };
}
