import * as Sentry from "@sentry/node";
import { createEnvReader, type EnvReader } from "../../core/src/config/env.ts";
import {
  createSentryBeforeSend,
  resolveSentryRuntimeConfig,
} from "../../core/src/observability/sentry-config.ts";
import {
  registerSentryBridge,
  type SentryBridge,
  type SentryCaptureInput,
  type SentryContext,
  type SentrySpanOptions,
} from "../../core/src/observability/sentry.ts";

type Primitive = string | number | boolean;
type SeverityLevel = "debug" | "info" | "warning" | "error" | "fatal";

// The slice of a Sentry scope the bridge writes to.
type ScopeWriter = {
  setTag: (key: string, value: string) => void;
  setLevel: (level: SeverityLevel) => void;
  setContext: (name: string, context: Record<string, Primitive | null>) => void;
};

let installed = false;

export function buildSentryInitOptions(read: EnvReader = createEnvReader()): Sentry.NodeOptions {
  const config = resolveSentryRuntimeConfig(read);

  return {
    dsn: config.dsn ?? undefined,
    environment: config.environment,
    release: config.release ?? undefined,
    tracesSampleRate: config.tracesSampleRate,
    enabled: config.enabled,
    beforeSend: createSentryBeforeSend(),
    sendDefaultPii: false,
  };
}

/** Initialises @sentry/node once and routes core observability through it. */
export function initializeNodeSentry(read: EnvReader = createEnvReader()): boolean {
  if (installed) {
    return true;
  }

  const options = buildSentryInitOptions(read);
  if (!options.enabled) {
    return false;
  }

  Sentry.init(options);
  registerSentryBridge(createNodeSentryBridge());
  installed = true;
  return true;
}

export function resetNodeSentryForTests(): void {
  registerSentryBridge(null);
  installed = false;
}

export function createNodeSentryBridge(): SentryBridge {
  return {
    captureException(error, input) {
      Sentry.withScope((scope) => {
        describeCapture(scope, input);
        Sentry.captureException(error instanceof Error ? error : new Error(String(error)));
      });
    },
    captureMessage(message, input) {
      Sentry.withScope((scope) => {
        describeCapture(scope, input);
        Sentry.captureMessage(message, severityOf(input?.level));
      });
    },
    startSpan<T>(options: SentrySpanOptions, callback: () => T): T {
      const attributes: Record<string, Primitive> = {};
      for (const [key, value] of Object.entries(options.attributes ?? {})) {
        const primitive = toPrimitive(value);
        if (primitive !== null) {
          attributes[key] = primitive;
        }
      }
      return Sentry.startSpan({ name: options.name, op: options.op ?? options.name, attributes }, callback);
    },
    withScope<T>(context: SentryContext, callback: () => T): T {
      return Sentry.withScope((scope) => {
        tagScope(scope, context);
        return callback();
      });
    },
  };
}

function describeCapture(scope: ScopeWriter, input: SentryCaptureInput | undefined): void {
  if (!input) {
    return;
  }
  tagScope(scope, input.context ?? {});

  const severity = severityOf(input.level);
  if (severity) {
    scope.setLevel(severity);
  }
  if (input.event) {
    scope.setTag("event", input.event);
  }
  if (input.payload) {
    const payload: Record<string, Primitive | null> = {};
    for (const [key, value] of Object.entries(input.payload)) {
      payload[key] = toPrimitive(value);
    }
    scope.setContext("payload", payload);
  }
}

function tagScope(scope: ScopeWriter, context: SentryContext): void {
  const tags: Record<string, unknown> = {
    category: context.category,
    correlation_id: context.correlation_id,
    profile_id: context.profile_id,
    ...context.tags,
  };
  for (const [key, value] of Object.entries(tags)) {
    const primitive = toPrimitive(value);
    if (primitive !== null && primitive !== "") {
      scope.setTag(key, String(primitive));
    }
  }
}

function toPrimitive(value: unknown): Primitive | null {
  if (typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
    return value;
  }
  if (value === null || value === undefined) {
    return null;
  }
  return JSON.stringify(value);
}

function severityOf(level: string | undefined): SeverityLevel | undefined {
  switch (level) {
    case "debug":
    case "info":
    case "error":
    case "fatal":
      return level;
    case "warn":
      return "warning";
    default:
      return undefined;
  }
}
