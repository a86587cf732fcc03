import { randomUUID } from "node:crypto";
import {
  emptyParsedQuery,
  type ParsedQuery,
  type QueryParser,
} from "../../core/src/matching/collaborators.ts";
import { createLogger, type StructuredLogger } from "../../core/src/observability/logger.ts";
import {
  elapsedMetricMs,
  emitMetricBestEffort,
  nowMetricMs,
} from "../../core/src/observability/metrics.ts";
import { captureSentryException } from "../../core/src/observability/sentry.ts";
import { validateModelOutput } from "./output-validator.ts";
import {
  QUERY_PARSING_PROMPT_VERSION,
  QUERY_PARSING_SYSTEM_PROMPT,
} from "./prompts/query-parsing-system-prompt.ts";
import { isAbortError } from "./http.ts";
import {
  createAnthropicProvider,
  LlmProviderError,
  type LlmProvider,
  type LlmProviderResponse,
} from "./provider.ts";
import { parseParsedQueryOutput } from "./schemas/parsed-query.schema.ts";

export type QueryParserFailureCode =
  | "provider_transient"
  | "provider_non_transient"
  | "timeout"
  | "invalid_json"
  | "schema_invalid";

export class QueryParserError extends Error {
  readonly code: QueryParserFailureCode;
  readonly transient: boolean;
  readonly correlationId: string;
  readonly promptVersion: string;

  constructor(
    message: string,
    options: {
      code: QueryParserFailureCode;
      correlationId: string;
      transient: boolean;
      cause?: unknown;
    },
  ) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = "QueryParserError";
    this.code = options.code;
    this.transient = options.transient;
    this.correlationId = options.correlationId;
    this.promptVersion = QUERY_PARSING_PROMPT_VERSION;
  }
}

type CreateQueryParserOptions = {
  provider?: LlmProvider;
  timeoutMs?: number;
  retryCount?: number;
  logger?: StructuredLogger;
  createCorrelationId?: () => string;
};

const DEFAULT_TIMEOUT_MS = 8_000;
// Parse failures are fatal to the matching call; callers opt into retries.
const DEFAULT_RETRY_COUNT = 0;
const MAX_QUERY_LENGTH = 2_000;

function buildQueryParsingUserPrompt(query: string): string {
  return [
    `PromptVersion: ${QUERY_PARSING_PROMPT_VERSION}`,
    "Query:",
    JSON.stringify(query.slice(0, MAX_QUERY_LENGTH)),
  ].join("\n");
}

function withTimeoutSignal(timeoutMs: number): { signal: AbortSignal; clear: () => void } {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);
  return {
    signal: controller.signal,
    clear: () => clearTimeout(timeoutId),
  };
}

function classifyFailure(error: unknown): { code: QueryParserFailureCode; transient: boolean } {
  if (error instanceof QueryParserError) {
    return { code: error.code, transient: error.transient };
  }
  if (isAbortError(error) || (error instanceof LlmProviderError && error.timedOut)) {
    return { code: "timeout", transient: true };
  }
  if (error instanceof LlmProviderError) {
    return {
      code: error.transient ? "provider_transient" : "provider_non_transient",
      transient: error.transient,
    };
  }
  if (error instanceof SyntaxError) {
    return { code: "invalid_json", transient: false };
  }
  return { code: "schema_invalid", transient: false };
}

function recordTokenUsage(response: LlmProviderResponse, correlationId: string): void {
  const tags = { component: "query_parser", provider: response.provider, model: response.model };
  emitMetricBestEffort({
    metric: "llm.token.input",
    value: response.usage?.input_tokens ?? 0,
    correlation_id: correlationId,
    tags,
  });
  emitMetricBestEffort({
    metric: "llm.token.output",
    value: response.usage?.output_tokens ?? 0,
    correlation_id: correlationId,
    tags,
  });
}

/**
 * Makes one provider call by default. With `retryCount`, only transient provider
 * failures are retried; malformed output fails on the first attempt.
 */
export function createQueryParser(options: CreateQueryParserOptions = {}): QueryParser {
  const provider = options.provider ?? createAnthropicProvider();
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const attempts = (options.retryCount ?? DEFAULT_RETRY_COUNT) + 1;
  const log = options.logger ?? createLogger();
  const nextCorrelationId = options.createCorrelationId ?? randomUUID;

  async function attemptParse(userPrompt: string, correlationId: string, attempt: number): Promise<ParsedQuery> {
    log({
      event: "collaborator.call",
      correlation_id: correlationId,
      payload: { component: "query_parser", prompt_version: QUERY_PARSING_PROMPT_VERSION, attempt },
    });

    const timeout = withTimeoutSignal(timeoutMs);
    const startedAt = nowMetricMs();
    let outcome: "success" | "error" = "error";
    let model = "unknown";
    try {
      const response = await provider.generateText({
        systemPrompt: QUERY_PARSING_SYSTEM_PROMPT,
        userPrompt,
        timeoutMs,
        signal: timeout.signal,
      });
      model = response.model;
      recordTokenUsage(response, correlationId);

      const validation = validateModelOutput({ rawText: response.text });
      if (!validation.ok) {
        throw new QueryParserError("Model output is not valid JSON.", {
          code: "invalid_json",
          correlationId,
          transient: false,
        });
      }
      const parsed = parseParsedQueryOutput(validation.parsedJson);
      outcome = "success";
      return parsed;
    } finally {
      timeout.clear();
      emitMetricBestEffort({
        metric: "collaborator.request.count",
        value: 1,
        correlation_id: correlationId,
        tags: { component: "query_parser", model, attempt, outcome },
      });
      emitMetricBestEffort({
        metric: "system.request.latency",
        value: elapsedMetricMs(startedAt),
        correlation_id: correlationId,
        tags: { component: "llm_call", operation: "query_parser", outcome },
      });
    }
  }

  return {
    async parse(text: string): Promise<ParsedQuery> {
      const query = text.trim();
      if (!query) {
        return emptyParsedQuery();
      }

      const correlationId = nextCorrelationId();
      const userPrompt = buildQueryParsingUserPrompt(query);

      for (let attempt = 1; ; attempt += 1) {
        try {
          return await attemptParse(userPrompt, correlationId, attempt);
        } catch (error) {
          const { code, transient } = classifyFailure(error);
          log({
            level: "warn",
            event: "collaborator.failure",
            correlation_id: correlationId,
            payload: {
              component: "query_parser",
              prompt_version: QUERY_PARSING_PROMPT_VERSION,
              attempt,
              error_code: code,
              transient,
            },
          });

          // Malformed output reaches Sentry even though the failure logs at warn.
          if (code === "invalid_json" || code === "schema_invalid") {
            captureSentryException(error, {
              level: "error",
              event: "collaborator.failure",
              context: {
                category: "collaborator",
                correlation_id: correlationId,
                tags: { component: "query_parser", attempt },
              },
              payload: { prompt_version: QUERY_PARSING_PROMPT_VERSION, error_code: code },
            });
          }

          if (transient && attempt < attempts) {
            continue;
          }
          const detail = error instanceof Error ? error.message : "unknown_error";
          throw new QueryParserError(`Query parsing failed: ${detail}`, {
            code,
            correlationId,
            transient,
            cause: error,
          });
        }
      }
    },
  };
}
