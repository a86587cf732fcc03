export type EventCategory = "matching" | "graph" | "collaborator" | "system";

export type EventCatalogEntry = {
  event_name: string;
  category: EventCategory;
  description: string;
  required_fields: readonly string[];
};

export const EVENT_CATALOG = [
  {
    event_name: "matching.request_completed",
    category: "matching",
    description: "A findConnections call returned ranked results.",
    required_fields: ["requester_id", "strategy", "candidate_count", "result_count", "duration_ms"],
  },
  {
    event_name: "matching.request_failed",
    category: "matching",
    description: "A findConnections call was rejected or aborted.",
    required_fields: ["error_code", "duration_ms"],
  },
  {
    event_name: "matching.query_embedding_degraded",
    category: "matching",
    description: "The query embedding could not be produced; semantic signals score 0.",
    required_fields: ["requester_id", "reason"],
  },
  {
    event_name: "matching.collaborator_failed",
    category: "matching",
    description: "A fatal collaborator call (parse, rerank, document embedding) failed.",
    required_fields: ["operation", "error_name"],
  },
  {
    event_name: "graph.population_loaded",
    category: "graph",
    description: "A population generation was built and swapped into the store.",
    required_fields: ["generation", "profile_count", "connection_count"],
  },
  {
    event_name: "graph.population_rejected",
    category: "graph",
    description: "A population load aborted on a data integrity violation.",
    required_fields: ["violation", "error_message"],
  },
  {
    event_name: "collaborator.call",
    category: "collaborator",
    description: "A collaborator client issued an upstream request.",
    required_fields: ["component", "attempt"],
  },
  {
    event_name: "collaborator.failure",
    category: "collaborator",
    description: "A collaborator client request failed.",
    required_fields: ["component", "attempt", "error_code"],
  },
  {
    event_name: "system.unhandled_error",
    category: "system",
    description: "An error escaped to the outermost handler.",
    required_fields: ["phase", "error_name", "error_message"],
  },
] as const satisfies readonly EventCatalogEntry[];

export type CanonicalEventName = (typeof EVENT_CATALOG)[number]["event_name"];

export const EVENT_CATALOG_BY_NAME: Readonly<Record<string, EventCatalogEntry | undefined>> =
  Object.freeze(
    EVENT_CATALOG.reduce<Record<string, EventCatalogEntry>>((accumulator, entry) => {
      accumulator[entry.event_name] = entry;
      return accumulator;
    }, {}),
  );
