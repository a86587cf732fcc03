import { detectRuntimeEnv, type RuntimeEnv } from "../config/env.ts";
import {
  METRIC_CATALOG_BY_NAME,
  type MetricName,
  type MetricType,
} from "./metrics-catalog.ts";

export type MetricTags = Record<string, string | number | boolean | null | undefined>;

export type EmitMetricInput = {
  metric: MetricName;
  value: number;
  tags?: MetricTags;
  correlation_id?: string | null;
  ts?: string | Date;
};

export type EmittedMetric = {
  ts: string;
  metric: MetricName;
  type: MetricType;
  unit: string;
  value: number;
  env: RuntimeEnv;
  correlation_id: string | null;
  tags: Record<string, string>;
};

/** Destination for emitted metrics. The default keeps a bounded in-process buffer. */
export type MetricAdapter = {
  emit(metric: EmittedMetric): void;
};

const TAG_KEY = /^[a-z][a-z0-9_]*$/;
// Tags are low-cardinality labels; profile names, bios and query text never qualify.
const PERSONAL_TAG_KEY = /(email|phone|^name$|full_name|bio|query_text|free_text)/i;
const EMAIL_LIKE = /\b[A-Z0-9._%+-]+@[A-Z0-9.-]+\.[A-Z]{2,}\b/i;
const TAG_VALUE_LIMIT = 96;

function createBufferedAdapter(capacity: number) {
  let buffer: EmittedMetric[] = [];
  return {
    emit(metric: EmittedMetric): void {
      buffer.push(metric);
      if (buffer.length > capacity) {
        buffer = buffer.slice(buffer.length - capacity);
      }
    },
    read(limit?: number): EmittedMetric[] {
      return limit && limit > 0 ? buffer.slice(-limit) : [...buffer];
    },
    clear(): void {
      buffer = [];
    },
  };
}

const inMemory = createBufferedAdapter(2_000);
let adapter: MetricAdapter = inMemory;

export function setMetricAdapter(next: MetricAdapter): void {
  adapter = next;
}

export function resetMetricAdapter(): void {
  adapter = inMemory;
}

export function clearInMemoryMetrics(): void {
  inMemory.clear();
}

export function getInMemoryMetrics(limit?: number): EmittedMetric[] {
  return inMemory.read(limit);
}

export function emitMetric(input: EmitMetricInput): EmittedMetric {
  const entry = METRIC_CATALOG_BY_NAME[input.metric];
  if (!entry) {
    throw new Error(`Unknown metric '${input.metric}'.`);
  }
  if (!Number.isFinite(input.value)) {
    throw new Error("Metric value must be a finite number.");
  }

  const emitted: EmittedMetric = {
    ts: toIsoTimestamp(input.ts),
    metric: input.metric,
    type: entry.type,
    unit: entry.unit,
    value: entry.unit === "count" || entry.unit === "tokens" ? Math.round(input.value) : round3(input.value),
    env: detectRuntimeEnv(),
    correlation_id: tagText(input.correlation_id),
    tags: cleanTags(input.tags ?? {}),
  };

  adapter.emit(emitted);
  return emitted;
}

/** Metrics must never fail a matching call; unknown names and bad values are dropped. */
export function emitMetricBestEffort(input: EmitMetricInput): EmittedMetric | null {
  try {
    return emitMetric(input);
  } catch {
    return null;
  }
}

export function nowMetricMs(): number {
  return performance.now();
}

export function elapsedMetricMs(startedAtMs: number): number {
  const elapsed = nowMetricMs() - startedAtMs;
  return Number.isFinite(elapsed) && elapsed > 0 ? round3(elapsed) : 0;
}

function cleanTags(tags: MetricTags): Record<string, string> {
  const cleaned: Record<string, string> = {};
  for (const [rawKey, rawValue] of Object.entries(tags)) {
    const key = rawKey.trim().toLowerCase();
    const value = tagText(rawValue);
    if (!TAG_KEY.test(key) || PERSONAL_TAG_KEY.test(key) || !value || EMAIL_LIKE.test(value)) {
      continue;
    }
    cleaned[key] = value.slice(0, TAG_VALUE_LIMIT);
  }
  return cleaned;
}

function tagText(value: unknown): string | null {
  switch (typeof value) {
    case "boolean":
      return String(value);
    case "number":
      return Number.isFinite(value) ? String(value) : null;
    case "string": {
      const trimmed = value.trim();
      return trimmed === "" ? null : trimmed;
    }
    default:
      return null;
  }
}

function toIsoTimestamp(ts: string | Date | undefined): string {
  const parsed = ts === undefined ? new Date() : new Date(ts);
  return Number.isNaN(parsed.getTime()) ? new Date().toISOString() : parsed.toISOString();
}

function round3(value: number): number {
  return Math.round(value * 1_000) / 1_000;
}
