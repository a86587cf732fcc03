import { redactPII } from "../../core/src/observability/redaction.ts";

export const DB_ERROR_CODES = {
  MISSING_ENV: "DB_MISSING_ENV",
  INVALID_ENV: "DB_INVALID_ENV",
  CLIENT_INIT_FAILED: "DB_CLIENT_INIT_FAILED",
  QUERY_FAILED: "DB_QUERY_FAILED",
  UNEXPECTED_RESPONSE: "DB_UNEXPECTED_RESPONSE",
} as const;

export type DbErrorCode = (typeof DB_ERROR_CODES)[keyof typeof DB_ERROR_CODES];

/** Context attached to a DbError passes through the same redaction as log payloads. */
export function sanitizeForError(value: unknown): unknown {
  if (value === null || value === undefined) {
    return value;
  }
  return redactPII(value);
}

export class DbError extends Error {
  readonly code: DbErrorCode;
  readonly status: number;
  readonly context: unknown;

  constructor(
    code: DbErrorCode,
    message: string,
    options: {
      status?: number;
      context?: unknown;
      cause?: unknown;
    } = {},
  ) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = "DbError";
    this.code = code;
    this.status = options.status ?? 500;
    this.context = sanitizeForError(options.context ?? null);
  }

  toJSON(): {
    name: string;
    code: DbErrorCode;
    message: string;
    status: number;
    context: unknown;
  } {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      status: this.status,
      context: this.context,
    };
  }

  static fromUnknown(params: {
    code: DbErrorCode;
    message: string;
    error: unknown;
    status?: number;
    context?: unknown;
  }): DbError {
    if (params.error instanceof DbError) {
      return params.error;
    }
    return new DbError(params.code, params.message, {
      status: params.status,
      context: params.context,
      cause: params.error,
    });
  }
}

export function assertRequiredEnv(name: string, value: string | undefined | null): string {
  const trimmed = value?.trim();
  if (!trimmed) {
    throw new DbError(DB_ERROR_CODES.MISSING_ENV, `Missing required environment variable ${name}.`, {
      context: { variable: name },
    });
  }
  return trimmed;
}
