import type { ProfileLookup } from "./profile-store.ts";
import { toProfileSummary, type Profile, type ProfileSummary } from "./profile-types.ts";

export const MAX_MUTUAL_CONNECTIONS = 5;

export type ConnectionPath =
  | readonly ["direct"]
  | readonly ["2-hop", string]
  | readonly ["no_direct_path"];

/** Mutual ids in the order they appear on `left`'s connection list. */
export function mutualConnectionIds(left: Profile, right: Profile): string[] {
  const rightConnections = new Set(right.connections);
  return left.connections.filter((id) => rightConnections.has(id));
}

export function findMutualConnections(
  store: ProfileLookup,
  left: Profile,
  right: Profile,
  limit: number = MAX_MUTUAL_CONNECTIONS,
): ProfileSummary[] {
  const summaries: ProfileSummary[] = [];
  for (const id of mutualConnectionIds(left, right)) {
    if (summaries.length >= limit) {
      break;
    }
    summaries.push(toProfileSummary(store.get(id)));
  }
  return summaries;
}

/**
 * Relationship-distance label, not a shortest-path search: it looks no further than
 * one intermediary.
 */
export function classifyConnectionPath(
  store: ProfileLookup,
  from: Profile,
  to: Profile,
): ConnectionPath {
  if (from.connections.includes(to.id)) {
    return ["direct"];
  }

  const [firstMutual] = findMutualConnections(store, from, to, 1);
  if (firstMutual) {
    return ["2-hop", firstMutual.name];
  }

  return ["no_direct_path"];
}
