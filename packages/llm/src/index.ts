export {
  createQueryParser,
  QueryParserError,
  type QueryParserFailureCode,
} from "./query-parser.ts";
export {
  PROMPT_VERSION,
  QUERY_PARSING_PROMPT_VERSION,
  QUERY_PARSING_SYSTEM_PROMPT,
} from "./prompts/query-parsing-system-prompt.ts";
export {
  validateModelOutput,
  type OutputViolation,
  type ValidateModelOutputResult,
} from "./output-validator.ts";
export {
  parseParsedQueryOutput,
  ParsedQuerySchemaError,
} from "./schemas/parsed-query.schema.ts";
export {
  ANTHROPIC_DEFAULT_MODEL,
  createAnthropicProvider,
  LlmProviderError,
  type LlmProvider,
  type LlmProviderRequest,
  type LlmProviderResponse,
} from "./provider.ts";
export {
  COHERE_DEFAULT_EMBED_MODEL,
  COHERE_DEFAULT_RERANK_MODEL,
  CohereClientError,
  createCohereClient,
  type CohereClient,
} from "./cohere-client.ts";
