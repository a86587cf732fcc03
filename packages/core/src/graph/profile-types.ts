export type EducationRecord = {
  university: string | null;
  degree: string | null;
  field: string | null;
};

export type WorkHistoryEntry = {
  company: string;
  title: string;
  start: string | null;
  end: string | null;
  is_current: boolean;
};

export type InteractionRecord = {
  /** Contacts per month. */
  frequency: number;
  last_contact: string | null;
  strength: number;
};

/**
 * A loaded profile. Graph edges are held as ids only; the store resolves them.
 * Records are frozen once a generation is built.
 */
export type Profile = {
  readonly id: string;
  readonly name: string;
  readonly job_title: string;
  readonly company: string;
  readonly company_size: string | null;
  readonly industry: string | null;
  readonly bio: string;
  readonly skills: readonly string[];
  readonly education: Readonly<EducationRecord> | null;
  readonly work_history: readonly Readonly<WorkHistoryEntry>[];
  readonly connections: readonly string[];
  readonly interactions: ReadonlyMap<string, Readonly<InteractionRecord>>;
};

export type ProfileSummary = {
  id: string;
  name: string;
  job_title: string;
  company: string;
};

/** Raw profile as a population source provides it. */
export type ProfileInput = {
  id: string;
  name: string;
  job_title?: string | null;
  company?: string | null;
  company_size?: string | null;
  industry?: string | null;
  bio?: string | null;
  skills?: readonly string[] | null;
  education?: Partial<EducationRecord> | null;
  work_history?: readonly Partial<WorkHistoryEntry>[] | null;
  connections?: readonly string[] | null;
  interactions?: Readonly<Record<string, InteractionRecord>> | null;
};

export type ConnectionEdge = {
  a: string;
  b: string;
};

export type InteractionEdge = {
  from: string;
  to: string;
  record: InteractionRecord;
};

export type PopulationInput = {
  profiles: readonly ProfileInput[];
  connections?: readonly ConnectionEdge[];
  interactions?: readonly InteractionEdge[];
};

export function toProfileSummary(profile: Profile): ProfileSummary {
  return {
    id: profile.id,
    name: profile.name,
    job_title: profile.job_title,
    company: profile.company,
  };
}
