import { redactPII } from "./observability/redaction.ts";

export const MATCHING_ERROR_CODES = {
  PROFILE_NOT_FOUND: "MATCH_PROFILE_NOT_FOUND",
  VALIDATION_FAILED: "MATCH_VALIDATION_FAILED",
  COLLABORATOR_FAILED: "MATCH_COLLABORATOR_FAILED",
  DATA_INTEGRITY: "MATCH_DATA_INTEGRITY",
  TIMEOUT: "MATCH_TIMEOUT",
} as const;

export type MatchingErrorCode = (typeof MATCHING_ERROR_CODES)[keyof typeof MATCHING_ERROR_CODES];

const DEFAULT_STATUS: Record<MatchingErrorCode, number> = {
  MATCH_PROFILE_NOT_FOUND: 404,
  MATCH_VALIDATION_FAILED: 400,
  MATCH_COLLABORATOR_FAILED: 500,
  MATCH_DATA_INTEGRITY: 500,
  MATCH_TIMEOUT: 504,
};

// Codes whose message and context are safe to hand back to a caller.
const CALLER_CORRECTABLE_CODES: ReadonlySet<MatchingErrorCode> = new Set([
  MATCHING_ERROR_CODES.PROFILE_NOT_FOUND,
  MATCHING_ERROR_CODES.VALIDATION_FAILED,
]);

export class MatchingError extends Error {
  readonly code: MatchingErrorCode;
  readonly status: number;
  readonly context: Record<string, unknown>;

  constructor(
    code: MatchingErrorCode,
    message: string,
    options: {
      status?: number;
      context?: Record<string, unknown>;
      cause?: unknown;
    } = {},
  ) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = "MatchingError";
    this.code = code;
    this.status = options.status ?? DEFAULT_STATUS[code];
    this.context = redactPII(options.context ?? {});
  }

  get isCallerCorrectable(): boolean {
    return CALLER_CORRECTABLE_CODES.has(this.code);
  }

  toJSON(): {
    name: string;
    code: MatchingErrorCode;
    message: string;
    status: number;
    context: Record<string, unknown>;
  } {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      status: this.status,
      context: this.context,
    };
  }
}

export function profileNotFound(profileId: string, role: "requester" | "target"): MatchingError {
  return new MatchingError(
    MATCHING_ERROR_CODES.PROFILE_NOT_FOUND,
    `Profile '${profileId}' not found.`,
    { context: { profile_id: profileId, role } },
  );
}

export function validationFailed(
  message: string,
  context: Record<string, unknown> = {},
): MatchingError {
  return new MatchingError(MATCHING_ERROR_CODES.VALIDATION_FAILED, message, { context });
}

export function dataIntegrityViolation(
  violation: string,
  message: string,
  context: Record<string, unknown> = {},
): MatchingError {
  return new MatchingError(MATCHING_ERROR_CODES.DATA_INTEGRITY, message, {
    context: { violation, ...context },
  });
}

export function isMatchingError(error: unknown): error is MatchingError {
  return error instanceof MatchingError;
}

export type PublicErrorBody = {
  error: {
    code: MatchingErrorCode | "INTERNAL_ERROR";
    message: string;
    status: number;
    context?: Record<string, unknown>;
  };
};

export function toPublicErrorBody(error: unknown): PublicErrorBody {
  if (!isMatchingError(error)) {
    return {
      error: { code: "INTERNAL_ERROR", message: "Internal error.", status: 500 },
    };
  }

  if (error.isCallerCorrectable) {
    return {
      error: {
        code: error.code,
        message: error.message,
        status: error.status,
        context: error.context,
      },
    };
  }

  return {
    error: {
      code: error.code,
      message: error.code === MATCHING_ERROR_CODES.TIMEOUT
        ? "Matching request timed out."
        : "Matching service failed.",
      status: error.status,
    },
  };
}
