import { afterEach, describe, expect, it } from "vitest";
import {
  clearInMemoryMetrics,
  emitMetric,
  emitMetricBestEffort,
  elapsedMetricMs,
  getInMemoryMetrics,
  nowMetricMs,
  resetMetricAdapter,
  setMetricAdapter,
  type EmittedMetric,
} from "../../packages/core/src/observability/metrics";
import {
  METRIC_CATALOG,
  validateMetricCatalog,
} from "../../packages/core/src/observability/metrics-catalog";

describe("metrics emitter", () => {
  afterEach(() => {
    resetMetricAdapter();
    clearInMemoryMetrics();
  });

  it("rejects unknown metric names", () => {
    expect(() =>
      emitMetric({
        metric: "unknown.metric" as never,
        value: 1,
      })
    ).toThrow("Unknown metric");
  });

  it("swallows emit failures in the best-effort variant", () => {
    expect(emitMetricBestEffort({ metric: "unknown.metric" as never, value: 1 })).toBeNull();
  });

  it("validates the canonical metrics catalog", () => {
    expect(validateMetricCatalog(METRIC_CATALOG)).toEqual({ valid: true });
  });

  it("rejects catalog entries with malformed names", () => {
    expect(() =>
      validateMetricCatalog([
        { metric_name: "NoDots", type: "counter", description: "bad", tags: [], unit: "count" },
      ])
    ).toThrow("Invalid metric_name 'NoDots'.");
  });

  it("drops PII-like tags from emitted payloads", () => {
    const emitted = emitMetric({
      metric: "system.error.count",
      value: 1,
      correlation_id: "corr_metrics_1",
      tags: {
        component: "unit_test",
        email: "alex@example.com",
        full_name: "Alex Doe",
        query_text: "who knows alex",
        error_name: "TypeError",
        phase: "handler",
      },
    });

    expect(emitted.tags).toEqual({
      component: "unit_test",
      error_name: "TypeError",
      phase: "handler",
    });
    expect(emitted.correlation_id).toBe("corr_metrics_1");
  });

  it("emits latency histogram metrics with millisecond values", () => {
    const startedAt = nowMetricMs();
    const elapsed = elapsedMetricMs(startedAt);

    const emitted = emitMetric({
      metric: "system.request.latency",
      value: elapsed,
      tags: {
        component: "unit_test",
        operation: "latency_check",
        outcome: "success",
      },
    });

    expect(emitted.metric).toBe("system.request.latency");
    expect(emitted.type).toBe("histogram");
    expect(emitted.unit).toBe("ms");
    expect(emitted.value).toBeGreaterThanOrEqual(0);
    expect(getInMemoryMetrics()).toHaveLength(1);
  });

  it("routes metrics to a custom adapter", () => {
    const received: EmittedMetric[] = [];
    setMetricAdapter({ emit: (metric) => received.push(metric) });

    emitMetric({ metric: "matching.results.returned", value: 3, tags: { strategy: "local" } });

    expect(received.map((metric) => [metric.metric, metric.value, metric.type])).toEqual([
      ["matching.results.returned", 3, "histogram"],
    ]);
    expect(getInMemoryMetrics()).toEqual([]);
  });
});
