import { dataIntegrityViolation, profileNotFound } from "../errors.ts";
import type {
  EducationRecord,
  InteractionRecord,
  PopulationInput,
  Profile,
  ProfileInput,
  WorkHistoryEntry,
} from "./profile-types.ts";

export type PopulationLoadSummary = {
  generation: number;
  profile_count: number;
  connection_count: number;
  interaction_count: number;
};

export type PopulationSnapshot = {
  readonly generation: number;
  readonly order: readonly Profile[];
  readonly byId: ReadonlyMap<string, Profile>;
  readonly connectionCount: number;
  readonly interactionCount: number;
};

const EMPTY_SNAPSHOT: PopulationSnapshot = {
  generation: 0,
  order: [],
  byId: new Map(),
  connectionCount: 0,
  interactionCount: 0,
};

export interface ProfileLookup {
  readonly generation: number;
  readonly size: number;
  has(id: string): boolean;
  find(id: string): Profile | null;
  get(id: string, role?: "requester" | "target"): Profile;
  all(): readonly Profile[];
  allExcept(id: string): Profile[];
}

/** Read-only view pinned to one generation. */
export class ProfileGraphView implements ProfileLookup {
  constructor(private readonly snapshot: PopulationSnapshot) {}

  get generation(): number {
    return this.snapshot.generation;
  }

  get size(): number {
    return this.snapshot.order.length;
  }

  get connectionCount(): number {
    return this.snapshot.connectionCount;
  }

  has(id: string): boolean {
    return this.snapshot.byId.has(id);
  }

  find(id: string): Profile | null {
    return this.snapshot.byId.get(id) ?? null;
  }

  get(id: string, role: "requester" | "target" = "target"): Profile {
    const profile = this.snapshot.byId.get(id);
    if (!profile) {
      throw profileNotFound(id, role);
    }
    return profile;
  }

  all(): readonly Profile[] {
    return this.snapshot.order;
  }

  allExcept(id: string): Profile[] {
    return this.snapshot.order.filter((profile) => profile.id !== id);
  }

  interaction(fromId: string, toId: string): Readonly<InteractionRecord> | null {
    return this.snapshot.byId.get(fromId)?.interactions.get(toId) ?? null;
  }
}

/**
 * In-memory arena of profiles keyed by id.
 *
 * `load` builds a complete snapshot off to the side and swaps it in with a single
 * assignment, so readers see either the previous generation or the new one, never a
 * partial graph. A rejected load leaves the previous generation in place. Callers
 * that await between reads should take a `view()` first.
 */
export class ProfileStore implements ProfileLookup {
  private current = new ProfileGraphView(EMPTY_SNAPSHOT);

  get generation(): number {
    return this.current.generation;
  }

  get size(): number {
    return this.current.size;
  }

  get connectionCount(): number {
    return this.current.connectionCount;
  }

  load(population: PopulationInput): PopulationLoadSummary {
    const next = buildSnapshot(population, this.current.generation + 1);
    this.current = new ProfileGraphView(next);
    return {
      generation: next.generation,
      profile_count: next.order.length,
      connection_count: next.connectionCount,
      interaction_count: next.interactionCount,
    };
  }

  view(): ProfileGraphView {
    return this.current;
  }

  has(id: string): boolean {
    return this.current.has(id);
  }

  find(id: string): Profile | null {
    return this.current.find(id);
  }

  get(id: string, role: "requester" | "target" = "target"): Profile {
    return this.current.get(id, role);
  }

  all(): readonly Profile[] {
    return this.current.all();
  }

  allExcept(id: string): Profile[] {
    return this.current.allExcept(id);
  }

  interaction(fromId: string, toId: string): Readonly<InteractionRecord> | null {
    return this.current.interaction(fromId, toId);
  }
}

// References are matched the way profile ids are stored: trimmed.
function referenceId(value: unknown): string {
  return typeof value === "string" ? value.trim() : "";
}

function buildSnapshot(population: PopulationInput, generation: number): PopulationSnapshot {
  if (!population || !Array.isArray(population.profiles)) {
    throw dataIntegrityViolation("invalid_population", "Population must include a profiles array.");
  }

  const inputsById = new Map<string, ProfileInput>();
  for (const input of population.profiles) {
    const id = referenceId(input?.id);
    if (!id) {
      throw dataIntegrityViolation("invalid_profile", "Every profile requires a non-empty id.");
    }
    if (inputsById.has(id)) {
      throw dataIntegrityViolation("duplicate_profile", `Profile '${id}' is defined more than once.`, {
        profile_id: id,
      });
    }
    inputsById.set(id, input);
  }

  const adjacency = new Map<string, Set<string>>();
  for (const id of inputsById.keys()) {
    adjacency.set(id, new Set());
  }

  const link = (rawA: string, rawB: string, source: string): void => {
    const a = referenceId(rawA);
    const b = referenceId(rawB);
    const left = adjacency.get(a);
    const right = adjacency.get(b);
    if (!left) {
      throw danglingReference(source, a, b);
    }
    if (!right) {
      throw danglingReference(source, a, b);
    }
    if (a === b) {
      throw dataIntegrityViolation("self_connection", `Profile '${a}' lists itself as a connection.`, {
        profile_id: a,
      });
    }
    left.add(b);
    right.add(a);
  };

  for (const [id, input] of inputsById) {
    for (const connectionId of input.connections ?? []) {
      link(id, connectionId, "profile.connections");
    }
  }
  for (const edge of population.connections ?? []) {
    link(edge.a, edge.b, "connections");
  }

  const interactions = new Map<string, Map<string, InteractionRecord>>();
  for (const id of inputsById.keys()) {
    interactions.set(id, new Map());
  }

  const record = (rawFrom: string, rawTo: string, value: InteractionRecord, source: string): void => {
    const from = referenceId(rawFrom);
    const to = referenceId(rawTo);
    const outgoing = interactions.get(from);
    if (!outgoing || !inputsById.has(to)) {
      throw danglingReference(source, from, to);
    }
    if (from === to) {
      throw dataIntegrityViolation("self_interaction", `Profile '${from}' records an interaction with itself.`, {
        profile_id: from,
      });
    }
    outgoing.set(to, normalizeInteraction(value, from, to));
  };

  for (const [id, input] of inputsById) {
    for (const [targetId, value] of Object.entries(input.interactions ?? {})) {
      record(id, targetId, value, "profile.interactions");
    }
  }
  for (const edge of population.interactions ?? []) {
    record(edge.from, edge.to, edge.record, "interactions");
  }

  const order: Profile[] = [];
  const byId = new Map<string, Profile>();
  let degreeSum = 0;
  let interactionCount = 0;

  for (const [id, input] of inputsById) {
    const connections = [...(adjacency.get(id) ?? [])];
    const outgoing = interactions.get(id) ?? new Map<string, InteractionRecord>();
    degreeSum += connections.length;
    interactionCount += outgoing.size;

    const profile: Profile = Object.freeze({
      id,
      name: normalizeText(input.name),
      job_title: normalizeText(input.job_title),
      company: normalizeText(input.company),
      company_size: normalizeOptionalText(input.company_size),
      industry: normalizeOptionalText(input.industry),
      bio: normalizeText(input.bio),
      skills: Object.freeze(dedupeSkills(input.skills ?? [])),
      education: normalizeEducation(input.education),
      work_history: Object.freeze((input.work_history ?? []).map(normalizeWorkHistoryEntry)),
      connections: Object.freeze(connections),
      interactions: outgoing,
    });

    order.push(profile);
    byId.set(id, profile);
  }

  return {
    generation,
    order: Object.freeze(order),
    byId,
    connectionCount: degreeSum / 2,
    interactionCount,
  };
}

function danglingReference(source: string, from: string, to: string) {
  return dataIntegrityViolation(
    "dangling_reference",
    `Reference from '${from}' to '${to}' in ${source} does not resolve to a loaded profile.`,
    { source, from_id: from, to_id: to },
  );
}

function normalizeInteraction(value: InteractionRecord, from: string, to: string): InteractionRecord {
  const strength = value?.strength;
  if (typeof strength !== "number" || !Number.isFinite(strength) || strength < 0 || strength > 1) {
    throw dataIntegrityViolation(
      "invalid_interaction_strength",
      `Interaction strength from '${from}' to '${to}' must be a finite number in [0,1].`,
      { from_id: from, to_id: to },
    );
  }

  const frequency = Number.isFinite(value.frequency) && value.frequency > 0 ? value.frequency : 0;
  return Object.freeze({
    frequency,
    last_contact: normalizeOptionalText(value.last_contact),
    strength,
  });
}

function normalizeEducation(
  education: Partial<EducationRecord> | null | undefined,
): Readonly<EducationRecord> | null {
  if (!education) {
    return null;
  }

  const normalized: EducationRecord = {
    university: normalizeOptionalText(education.university),
    degree: normalizeOptionalText(education.degree),
    field: normalizeOptionalText(education.field),
  };

  if (!normalized.university && !normalized.degree && !normalized.field) {
    return null;
  }
  return Object.freeze(normalized);
}

function normalizeWorkHistoryEntry(entry: Partial<WorkHistoryEntry>): Readonly<WorkHistoryEntry> {
  return Object.freeze({
    company: normalizeText(entry.company),
    title: normalizeText(entry.title),
    start: normalizeOptionalText(entry.start),
    end: normalizeOptionalText(entry.end),
    is_current: entry.is_current === true,
  });
}

function dedupeSkills(skills: readonly string[]): string[] {
  const seen = new Set<string>();
  const output: string[] = [];
  for (const skill of skills) {
    const normalized = normalizeText(skill);
    const key = normalized.toLowerCase();
    if (!normalized || seen.has(key)) {
      continue;
    }
    seen.add(key);
    output.push(normalized);
  }
  return output;
}

function normalizeText(value: unknown): string {
  return typeof value === "string" ? value.trim() : "";
}

function normalizeOptionalText(value: unknown): string | null {
  const normalized = normalizeText(value);
  return normalized.length > 0 ? normalized : null;
}
