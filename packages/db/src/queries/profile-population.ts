import type {
  ConnectionEdge,
  EducationRecord,
  InteractionEdge,
  PopulationInput,
  ProfileInput,
  WorkHistoryEntry,
} from "../../../core/src/graph/profile-types.ts";
import type { ProfileSource } from "../../../core/src/matching/collaborators.ts";
import type { DbClient } from "../client.ts";
import { DB_ERROR_CODES, DbError } from "../errors.ts";

const PROFILE_COLUMNS =
  "id, name, job_title, company, company_size, industry, bio, skills, education, work_history";

type Row = Record<string, unknown>;

function isRow(value: unknown): value is Row {
  return !!value && typeof value === "object" && !Array.isArray(value);
}

function asRows(data: unknown, table: string): Row[] {
  if (data === null || data === undefined) {
    return [];
  }
  if (!Array.isArray(data) || !data.every(isRow)) {
    throw new DbError(DB_ERROR_CODES.UNEXPECTED_RESPONSE, "Query returned an unexpected shape.", {
      context: { table },
    });
  }
  return data;
}

function optionalString(value: unknown): string | null {
  return typeof value === "string" ? value : null;
}

function requiredString(row: Row, key: string, table: string): string {
  const value = row[key];
  if (typeof value !== "string" || value.trim().length === 0) {
    throw new DbError(DB_ERROR_CODES.UNEXPECTED_RESPONSE, `Row is missing ${key}.`, {
      context: { table, column: key },
    });
  }
  return value;
}

function toStringList(value: unknown): string[] {
  return Array.isArray(value) ? value.filter((entry): entry is string => typeof entry === "string") : [];
}

function toEducation(value: unknown): Partial<EducationRecord> | null {
  if (!isRow(value)) {
    return null;
  }
  return {
    university: optionalString(value.university),
    degree: optionalString(value.degree),
    field: optionalString(value.field),
  };
}

function toWorkHistory(value: unknown): Partial<WorkHistoryEntry>[] {
  if (!Array.isArray(value)) {
    return [];
  }
  return value.filter(isRow).map((entry) => ({
    company: optionalString(entry.company) ?? "",
    title: optionalString(entry.title) ?? "",
    start: optionalString(entry.start_date ?? entry.start),
    end: optionalString(entry.end_date ?? entry.end),
    is_current: entry.is_current === true,
  }));
}

export function mapProfileRow(row: Row): ProfileInput {
  return {
    id: requiredString(row, "id", "profiles"),
    name: optionalString(row.name) ?? "",
    job_title: optionalString(row.job_title),
    company: optionalString(row.company),
    company_size: optionalString(row.company_size),
    industry: optionalString(row.industry),
    bio: optionalString(row.bio),
    skills: toStringList(row.skills),
    education: toEducation(row.education),
    work_history: toWorkHistory(row.work_history),
  };
}

// PostgREST caps every response at `max-rows` (1000 by default) without reporting it.
export const POPULATION_PAGE_SIZE = 1_000;

type PageResult = { data: unknown; error: unknown };

/** Requests consecutive `range` windows until a short page comes back or `max` rows are read. */
async function readAllPages(
  table: string,
  fetchPage: (from: number, to: number) => PromiseLike<PageResult>,
  options: { pageSize: number; max?: number; failure: string; context: Record<string, unknown> },
): Promise<Row[]> {
  const rows: Row[] = [];
  for (let from = 0; ; ) {
    const size =
      options.max === undefined ? options.pageSize : Math.min(options.pageSize, options.max - from);
    if (size <= 0) {
      return rows;
    }

    const { data, error } = await fetchPage(from, from + size - 1);
    if (error) {
      throw new DbError(DB_ERROR_CODES.QUERY_FAILED, options.failure, {
        status: 500,
        cause: error,
        context: options.context,
      });
    }

    const page = asRows(data, table);
    rows.push(...page);
    if (page.length < size) {
      return rows;
    }
    from += size;
  }
}

/** Loads the first `limit` profiles by id and every edge whose ends both fall inside them. */
export async function loadProfilePopulation(
  db: DbClient,
  params: { limit: number; pageSize?: number },
): Promise<PopulationInput> {
  const pageSize = Math.max(1, Math.floor(params.pageSize ?? POPULATION_PAGE_SIZE));

  const profileRows = await readAllPages(
    "profiles",
    (from, to) =>
      db.from("profiles").select(PROFILE_COLUMNS).order("id", { ascending: true }).range(from, to),
    {
      pageSize,
      max: params.limit,
      failure: "Unable to load profiles.",
      context: { table: "profiles", limit: params.limit },
    },
  );

  const profiles = profileRows.map(mapProfileRow);
  if (profiles.length === 0) {
    return { profiles: [], connections: [], interactions: [] };
  }

  const ids = profiles.map((profile) => profile.id);
  const inPopulation = new Set(ids);

  const connectionRows = await readAllPages(
    "profile_connections",
    (from, to) =>
      db
        .from("profile_connections")
        .select("profile_a_id, profile_b_id")
        .in("profile_a_id", ids)
        .order("profile_a_id", { ascending: true })
        .order("profile_b_id", { ascending: true })
        .range(from, to),
    {
      pageSize,
      failure: "Unable to load profile connections.",
      context: { table: "profile_connections" },
    },
  );

  const connections: ConnectionEdge[] = connectionRows
    .map((row) => ({
      a: requiredString(row, "profile_a_id", "profile_connections"),
      b: requiredString(row, "profile_b_id", "profile_connections"),
    }))
    .filter((edge) => inPopulation.has(edge.a) && inPopulation.has(edge.b));

  const interactionRows = await readAllPages(
    "profile_interactions",
    (from, to) =>
      db
        .from("profile_interactions")
        .select("from_profile_id, to_profile_id, frequency, last_contact, strength")
        .in("from_profile_id", ids)
        .order("from_profile_id", { ascending: true })
        .order("to_profile_id", { ascending: true })
        .range(from, to),
    {
      pageSize,
      failure: "Unable to load profile interactions.",
      context: { table: "profile_interactions" },
    },
  );

  const interactions: InteractionEdge[] = interactionRows
    .map((row) => ({
      from: requiredString(row, "from_profile_id", "profile_interactions"),
      to: requiredString(row, "to_profile_id", "profile_interactions"),
      record: {
        frequency: Number(row.frequency ?? 0),
        last_contact: optionalString(row.last_contact),
        strength: Number(row.strength),
      },
    }))
    .filter((edge) => inPopulation.has(edge.from) && inPopulation.has(edge.to));

  return { profiles, connections, interactions };
}

export function createSupabaseProfileSource(db: DbClient): ProfileSource {
  return {
    name: "supabase",
    loadPopulation: ({ count }) => loadProfilePopulation(db, { limit: count }),
  };
}
