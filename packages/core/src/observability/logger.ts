import { detectRuntimeEnv, normalizeRuntimeEnv } from "../config/env.ts";
import {
  EVENT_CATALOG_BY_NAME,
  type CanonicalEventName,
  type EventCatalogEntry,
} from "./event-catalog.ts";
import type { MetricName } from "./metrics-catalog.ts";
import { emitMetricBestEffort } from "./metrics.ts";
import { redactPII } from "./redaction.ts";
import { captureSentryFromStructuredLog } from "./sentry.ts";

export type LogLevel = "debug" | "info" | "warn" | "error" | "fatal";

export type StructuredLogEventInput = {
  event: CanonicalEventName;
  correlation_id?: string | null;
  profile_id?: string | null;
  payload: Record<string, unknown>;
  level?: LogLevel;
};

/** One JSON line on stdout. `payload` has already been redacted. */
export type StructuredLogEvent = {
  ts: string;
  level: LogLevel;
  event: string;
  category: string;
  env: string;
  correlation_id: string | null;
  profile_id: string | null;
  payload: Record<string, unknown>;
};

export type LoggerContext = {
  env?: string;
  correlation_id?: string | null;
  profile_id?: string | null;
};

export type StructuredLogger = (input: StructuredLogEventInput) => StructuredLogEvent;

/** Binds a correlation id and profile id that individual calls may override. */
export function createLogger(context: LoggerContext = {}): StructuredLogger {
  return (input) =>
    logEvent(
      {
        ...input,
        correlation_id: trimmedOrNull(input.correlation_id) ?? trimmedOrNull(context.correlation_id),
        profile_id: trimmedOrNull(input.profile_id) ?? trimmedOrNull(context.profile_id),
      },
      context.env,
    );
}

/**
 * Validates the event against the catalog, redacts the payload, writes the line
 * and forwards error-level events to Sentry. Throws on unknown events and on
 * missing required fields so a bad call site fails in tests.
 */
export function logEvent(input: StructuredLogEventInput, env?: string): StructuredLogEvent {
  const entry = catalogEntryFor(input.event);
  if (typeof input.payload !== "object" || input.payload === null || Array.isArray(input.payload)) {
    throw new Error("Structured log payload must be an object.");
  }
  const missing = entry.required_fields.find((field) => !hasValue(input.payload[field]));
  if (missing) {
    throw new Error(`Missing required field '${missing}' for log event '${entry.event_name}'.`);
  }

  const line: StructuredLogEvent = {
    ts: new Date().toISOString(),
    level: input.level ?? "info",
    event: entry.event_name,
    category: entry.category,
    env: env ? normalizeRuntimeEnv(env) : detectRuntimeEnv(),
    correlation_id: trimmedOrNull(input.correlation_id),
    profile_id: trimmedOrNull(input.profile_id),
    payload: redactPII(input.payload),
  };

  emitLogDerivedMetric(line);
  console.info(JSON.stringify(line));
  captureSentryFromStructuredLog(line);
  return line;
}

function catalogEntryFor(event: string): EventCatalogEntry {
  const entry = EVENT_CATALOG_BY_NAME[event.trim()];
  if (!entry) {
    throw new Error(`Unknown structured log event: '${event}'.`);
  }
  return entry;
}

function hasValue(value: unknown): boolean {
  if (typeof value === "string") {
    return value.trim() !== "";
  }
  return value !== null && value !== undefined;
}

function trimmedOrNull(value: unknown): string | null {
  if (typeof value !== "string") {
    return null;
  }
  const trimmed = value.trim();
  return trimmed === "" ? null : trimmed;
}

type DerivedMetric = {
  metric: MetricName;
  component: string;
  tagsFrom: Record<string, string>;
  fallbacks: Record<string, string>;
};

// Events that also count toward a metric. `tagsFrom` maps a tag to the payload
// field it is read from, with the fallback used when the field is absent.
const LOG_DERIVED_METRICS: Partial<Record<string, DerivedMetric>> = {
  "system.unhandled_error": {
    metric: "system.error.count",
    component: "structured_logger",
    tagsFrom: { phase: "phase", error_name: "error_name" },
    fallbacks: { phase: "unknown", error_name: "Error" },
  },
  "matching.query_embedding_degraded": {
    metric: "matching.query_embedding.degraded",
    component: "matching_pipeline",
    tagsFrom: { reason: "reason" },
    fallbacks: { reason: "unknown" },
  },
};

function emitLogDerivedMetric(line: StructuredLogEvent): void {
  const derived = LOG_DERIVED_METRICS[line.event];
  if (!derived) {
    return;
  }

  const tags: Record<string, string> = { component: derived.component };
  for (const [tag, field] of Object.entries(derived.tagsFrom)) {
    tags[tag] = tagValue(line.payload[field]) ?? derived.fallbacks[tag] ?? "unknown";
  }
  emitMetricBestEffort({
    metric: derived.metric,
    value: 1,
    correlation_id: line.correlation_id,
    tags,
  });
}

function tagValue(value: unknown): string | null {
  if (typeof value === "number") {
    return Number.isFinite(value) ? String(value) : null;
  }
  if (typeof value === "boolean") {
    return String(value);
  }
  return trimmedOrNull(value);
}
