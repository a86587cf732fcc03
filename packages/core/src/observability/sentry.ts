import type { LogLevel } from "./logger.ts";

export type SentryContext = {
  correlation_id?: string | null;
  profile_id?: string | null;
  category?: string | null;
  tags?: Record<string, string | number | boolean | null | undefined>;
};

export type SentryCaptureInput = {
  level?: LogLevel;
  event?: string;
  context?: SentryContext;
  payload?: Record<string, unknown>;
};

export type SentrySpanOptions = {
  name: string;
  op?: string;
  attributes?: Record<string, unknown>;
};

/**
 * Runtime-neutral view of an error tracker. Core code reports through this
 * bridge; the runtime package installs the @sentry/node implementation.
 */
export type SentryBridge = {
  captureException: (error: unknown, input?: SentryCaptureInput) => void;
  captureMessage: (message: string, input?: SentryCaptureInput) => void;
  startSpan: <T>(options: SentrySpanOptions, callback: () => T) => T;
  withScope: <T>(context: SentryContext, callback: () => T) => T;
};

const BRIDGE_SLOT = Symbol.for("intro_graph.observability.sentry_bridge");

type BridgeHolder = {
  [BRIDGE_SLOT]?: SentryBridge | null;
};

export function registerSentryBridge(bridge: SentryBridge | null): void {
  const holder = globalThis as BridgeHolder;
  holder[BRIDGE_SLOT] = bridge;
}

export function getSentryBridge(): SentryBridge | null {
  const holder = globalThis as BridgeHolder;
  return holder[BRIDGE_SLOT] ?? null;
}

type Settled<T> = { ok: true; value: T } | { ok: false; error: unknown };

// A bridge that fails before running the callback falls back to running it
// bare; once the callback has run, its own result or error stands.
function wrapWithBridge<T>(
  callback: () => T,
  wrap: (bridge: SentryBridge, run: () => T) => T,
): T {
  const bridge = getSentryBridge();
  if (!bridge) {
    return callback();
  }

  const settled: Settled<T>[] = [];
  const run = (): T => {
    try {
      const value = callback();
      settled.push({ ok: true, value });
      return value;
    } catch (error) {
      settled.push({ ok: false, error });
      throw error;
    }
  };

  try {
    return wrap(bridge, run);
  } catch {
    const outcome = settled[0];
    if (!outcome) {
      return callback();
    }
    if (!outcome.ok) {
      throw outcome.error;
    }
    return outcome.value;
  }
}

function reportToBridge(report: (bridge: SentryBridge) => void): void {
  const bridge = getSentryBridge();
  if (!bridge) {
    return;
  }
  try {
    report(bridge);
  } catch {
    // best effort
  }
}

export function withSentryContext<T>(context: SentryContext, callback: () => T): T {
  return wrapWithBridge(callback, (bridge, run) => bridge.withScope(context, run));
}

export function startSentrySpan<T>(options: SentrySpanOptions, callback: () => T): T {
  return wrapWithBridge(callback, (bridge, run) => bridge.startSpan(options, run));
}

export function captureSentryException(error: unknown, input?: SentryCaptureInput): void {
  reportToBridge((bridge) => bridge.captureException(error, input));
}

export function captureSentryMessage(message: string, input?: SentryCaptureInput): void {
  reportToBridge((bridge) => bridge.captureMessage(message, input));
}

type CapturableLogEvent = {
  level: LogLevel;
  event: string;
  category: string;
  correlation_id: string | null;
  profile_id: string | null;
  payload: Record<string, unknown>;
};

/** Error and fatal structured logs become Sentry exceptions, or messages when no error detail exists. */
export function captureSentryFromStructuredLog(logged: CapturableLogEvent): void {
  if (logged.level !== "error" && logged.level !== "fatal") {
    return;
  }

  const input: SentryCaptureInput = {
    level: logged.level,
    event: logged.event,
    context: {
      category: logged.category,
      correlation_id: logged.correlation_id,
      profile_id: logged.profile_id,
    },
    payload: logged.payload,
  };

  const error = errorFromPayload(logged.payload);
  if (error) {
    captureSentryException(error, input);
  } else {
    captureSentryMessage(`structured_log.${logged.event}`, input);
  }
}

function errorFromPayload(payload: Record<string, unknown>): Error | null {
  if (payload.error instanceof Error) {
    return payload.error;
  }
  const message = nonBlank(payload.error_message);
  if (!message) {
    return null;
  }
  const error = new Error(message);
  error.name = nonBlank(payload.error_name) ?? "StructuredLogError";
  return error;
}

function nonBlank(value: unknown): string | null {
  if (typeof value !== "string") {
    return null;
  }
  const trimmed = value.trim();
  return trimmed === "" ? null : trimmed;
}
