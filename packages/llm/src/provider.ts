import { readEnv } from "../../core/src/config/env.ts";
import { isRecord, isRetryableStatus, postJson } from "./http.ts";

export type LlmProviderRequest = {
  systemPrompt: string;
  userPrompt: string;
  timeoutMs: number;
  maxTokens?: number;
  signal?: AbortSignal;
};

export type LlmTokenUsage = {
  input_tokens: number;
  output_tokens: number;
};

export type LlmProviderResponse = {
  text: string;
  model: string;
  provider: "anthropic";
  usage?: LlmTokenUsage;
};

/** Text-completion backend behind the query parser. */
export interface LlmProvider {
  generateText(request: LlmProviderRequest): Promise<LlmProviderResponse>;
}

export class LlmProviderError extends Error {
  readonly transient: boolean;
  readonly status: number | null;
  readonly timedOut: boolean;

  constructor(
    message: string,
    options: { transient: boolean; status?: number | null; timedOut?: boolean },
  ) {
    super(message);
    this.name = "LlmProviderError";
    this.transient = options.transient;
    this.status = options.status ?? null;
    this.timedOut = options.timedOut ?? false;
  }
}

const MESSAGES_URL = "https://api.anthropic.com/v1/messages";
const API_VERSION = "2023-06-01";
export const ANTHROPIC_DEFAULT_MODEL = "claude-3-5-haiku-latest";
const DEFAULT_MAX_TOKENS = 500;

function firstTextBlock(body: unknown): string {
  const content = isRecord(body) ? body.content : undefined;
  if (!Array.isArray(content)) {
    throw new LlmProviderError("Anthropic response is missing content array.", { transient: false });
  }

  for (const block of content) {
    if (isRecord(block) && block.type === "text" && typeof block.text === "string" && block.text.trim() !== "") {
      return block.text;
    }
  }
  throw new LlmProviderError("Anthropic response does not include text content.", { transient: false });
}

function tokenUsage(body: unknown): LlmTokenUsage {
  const usage: Record<string, unknown> = isRecord(body) && isRecord(body.usage) ? body.usage : {};
  const count = (value: unknown): number => {
    const parsed = Number(value ?? 0);
    return Number.isFinite(parsed) && parsed > 0 ? Math.floor(parsed) : 0;
  };
  return { input_tokens: count(usage.input_tokens), output_tokens: count(usage.output_tokens) };
}

export function createAnthropicProvider(params?: {
  apiKey?: string | null;
  model?: string;
  fetchImpl?: typeof fetch;
}): LlmProvider {
  const apiKey = params?.apiKey ?? readEnv("ANTHROPIC_API_KEY") ?? null;
  const model = params?.model ?? readEnv("ANTHROPIC_MODEL") ?? ANTHROPIC_DEFAULT_MODEL;
  const fetchImpl = params?.fetchImpl ?? fetch;

  return {
    async generateText(request) {
      if (!apiKey) {
        throw new LlmProviderError("ANTHROPIC_API_KEY is not configured.", { transient: false });
      }

      const outcome = await postJson(fetchImpl, MESSAGES_URL, {
        headers: { "x-api-key": apiKey, "anthropic-version": API_VERSION },
        body: {
          model,
          max_tokens: request.maxTokens ?? DEFAULT_MAX_TOKENS,
          temperature: 0,
          system: request.systemPrompt,
          messages: [{ role: "user", content: [{ type: "text", text: request.userPrompt }] }],
        },
        signal: request.signal,
      });

      switch (outcome.kind) {
        case "network_error":
          throw new LlmProviderError(
            outcome.timedOut ? "LLM provider call timed out." : "LLM provider network failure.",
            { transient: true, timedOut: outcome.timedOut },
          );
        case "http_error":
          throw new LlmProviderError("LLM provider returned non-OK status.", {
            transient: isRetryableStatus(outcome.status, { conflictIsRetryable: true }),
            status: outcome.status,
          });
        case "invalid_json":
          throw new LlmProviderError("LLM provider returned non-JSON payload.", {
            transient: false,
            status: outcome.status,
          });
        case "ok":
          return {
            text: firstTextBlock(outcome.body),
            model,
            provider: "anthropic",
            usage: tokenUsage(outcome.body),
          };
      }
    },
  };
}
