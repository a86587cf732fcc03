export type MetricType = "counter" | "histogram" | "gauge";

export type MetricCatalogEntry = {
  metric_name: string;
  type: MetricType;
  description: string;
  tags: readonly string[];
  unit: string;
};

export const METRIC_CATALOG = [
  {
    metric_name: "system.error.count",
    type: "counter",
    description: "Unhandled runtime errors across the matching engine and its clients.",
    tags: ["component", "phase", "error_name"],
    unit: "count",
  },
  {
    metric_name: "system.request.latency",
    type: "histogram",
    description: "Latency of matching calls, population loads and collaborator calls.",
    tags: ["component", "operation", "outcome"],
    unit: "ms",
  },
  {
    metric_name: "matching.candidates.evaluated",
    type: "histogram",
    description: "Candidate pool size handed to the ranking strategy.",
    tags: ["component", "strategy"],
    unit: "count",
  },
  {
    metric_name: "matching.results.returned",
    type: "histogram",
    description: "Ranked results returned to the caller after truncation.",
    tags: ["component", "strategy"],
    unit: "count",
  },
  {
    metric_name: "matching.query_embedding.degraded",
    type: "counter",
    description: "Matching calls that continued without a query embedding.",
    tags: ["component", "reason"],
    unit: "count",
  },
  {
    metric_name: "graph.population.loaded",
    type: "gauge",
    description: "Profiles visible after the latest successful population load.",
    tags: ["component", "source"],
    unit: "count",
  },
  {
    metric_name: "collaborator.request.count",
    type: "counter",
    description: "Calls issued to the query parser, embedder and reranker.",
    tags: ["component", "operation", "outcome"],
    unit: "count",
  },
  {
    metric_name: "llm.token.input",
    type: "counter",
    description: "Input tokens consumed by query parsing calls.",
    tags: ["component", "provider", "model"],
    unit: "tokens",
  },
  {
    metric_name: "llm.token.output",
    type: "counter",
    description: "Output tokens consumed by query parsing calls.",
    tags: ["component", "provider", "model"],
    unit: "tokens",
  },
] as const satisfies readonly MetricCatalogEntry[];

export type MetricName = (typeof METRIC_CATALOG)[number]["metric_name"];

export const METRIC_CATALOG_BY_NAME: Readonly<Record<string, MetricCatalogEntry | undefined>> =
  Object.freeze(Object.fromEntries(METRIC_CATALOG.map((entry) => [entry.metric_name, entry])));

const METRIC_NAME = /^[a-z][a-z0-9_]*(\.[a-z0-9_]+)+$/;
const TAG_NAME = /^[a-z][a-z0-9_]*$/;

/** Checked at module load so a malformed catalog entry fails every test run. */
export function validateMetricCatalog(
  entries: readonly MetricCatalogEntry[] = METRIC_CATALOG,
): { valid: true } {
  const names = new Set<string>();
  for (const { metric_name: name, description, unit, tags } of entries) {
    if (!METRIC_NAME.test(name)) {
      throw new Error(`Invalid metric_name '${name}'.`);
    }
    if (names.has(name)) {
      throw new Error(`Duplicate metric_name '${name}'.`);
    }
    names.add(name);

    if (description.trim() === "" || unit.trim() === "") {
      throw new Error(`Metric '${name}' requires a description and a unit.`);
    }
    const badTag = tags.find((tag, index) => !TAG_NAME.test(tag) || tags.indexOf(tag) !== index);
    if (badTag !== undefined) {
      throw new Error(`Metric '${name}' has an invalid or duplicate tag '${badTag}'.`);
    }
  }
  return { valid: true };
}

validateMetricCatalog(METRIC_CATALOG);
