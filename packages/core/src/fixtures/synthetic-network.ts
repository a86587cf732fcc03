import { validationFailed } from "../errors.ts";
import type {
  InteractionRecord,
  PopulationInput,
  ProfileInput,
  WorkHistoryEntry,
} from "../graph/profile-types.ts";
import type { ProfileSource } from "../matching/collaborators.ts";
import vocabulary from "./synthetic-vocabulary.json";

export const DEFAULT_SYNTHETIC_SEED = 42;

const MIN_CONNECTIONS = 10;
const MAX_CONNECTIONS = 30;
const SAME_COMPANY_SHARE = 0.4;
const SAME_INDUSTRY_SHARE = 0.3;
const INTERACTION_RATE = 0.3;
const MAX_SKILLS = 8;
const DAY_MS = 24 * 60 * 60 * 1000;

type Random = () => number;

type CompanyEntry = {
  name: string;
  size: string;
  industry: string;
};

// Fixed so a seed alone reproduces the same population on any day.
export const SYNTHETIC_REFERENCE_DATE = new Date("2026-01-01T00:00:00.000Z");

export type SyntheticPopulationOptions = {
  seed?: number;
  /** Anchor for generated dates. Defaults to `SYNTHETIC_REFERENCE_DATE`. */
  referenceDate?: Date;
};

export function createSyntheticProfileSource(
  options: SyntheticPopulationOptions = {},
): ProfileSource {
  return {
    name: "synthetic",
    async loadPopulation({ count }) {
      return generateSyntheticPopulation(count, options);
    },
  };
}

export function generateSyntheticPopulation(
  count: number,
  options: SyntheticPopulationOptions = {},
): PopulationInput {
  if (!Number.isInteger(count) || count <= 0) {
    throw validationFailed("candidate_count must be a positive integer.", {
      field: "candidate_count",
    });
  }

  const random = createSeededRandom(options.seed ?? DEFAULT_SYNTHETIC_SEED);
  const referenceDate = options.referenceDate ?? SYNTHETIC_REFERENCE_DATE;

  const drafts: Array<ProfileInput & { company: string; industry: string }> = [];
  for (let index = 0; index < count; index += 1) {
    drafts.push(generateProfile(random, index, referenceDate));
  }

  const profiles = drafts.map((profile) => {
    const connections = pickConnections(random, profile, drafts);
    const interactions: Record<string, InteractionRecord> = {};
    for (const connectionId of connections) {
      if (random() < INTERACTION_RATE) {
        interactions[connectionId] = generateInteraction(random, referenceDate);
      }
    }
    return { ...profile, connections, interactions };
  });

  return { profiles };
}

function generateProfile(
  random: Random,
  index: number,
  referenceDate: Date,
): ProfileInput & { company: string; industry: string } {
  const company = pick(random, vocabulary.companies);
  const [, titles] = pick(random, Object.entries(vocabulary.job_titles));
  const jobTitle = pick(random, titles);
  const skills = generateSkills(random, jobTitle);

  return {
    id: `synthetic-${String(index + 1).padStart(4, "0")}`,
    name: `${pick(random, vocabulary.first_names)} ${pick(random, vocabulary.last_names)}`,
    job_title: jobTitle,
    company: company.name,
    company_size: company.size,
    industry: company.industry,
    bio: generateBio(random, jobTitle, company.name, skills),
    skills,
    education: {
      university: pick(random, vocabulary.universities),
      degree: pick(random, vocabulary.degrees),
      field: pick(random, vocabulary.fields),
    },
    work_history: generateWorkHistory(random, company, referenceDate),
  };
}

function generateSkills(random: Random, jobTitle: string): string[] {
  const byCategory: Readonly<Record<string, readonly string[]>> = vocabulary.skills;
  const category = (name: string): readonly string[] => byCategory[name] ?? [];
  const skills: string[] = [];

  if (jobTitle.includes("Engineer")) {
    skills.push(...sample(random, category("Programming"), 3));
    skills.push(...sample(random, category("Cloud"), 2));
  }
  if (/\b(AI|ML|Data)\b/.test(jobTitle)) {
    skills.push(...sample(random, category("AI/ML"), 4));
    skills.push(...sample(random, category("Data"), 2));
  }
  if (jobTitle.includes("Product")) {
    skills.push(...sample(random, category("Product"), 3));
  }
  if (jobTitle.includes("Frontend")) {
    skills.push(...sample(random, category("Frontend"), 3));
  }
  if (/\b(VP|Director|Head|Manager)\b/.test(jobTitle)) {
    skills.push(...sample(random, category("Leadership"), 2));
  }

  const remaining = Object.values(byCategory).flat().filter((skill) => !skills.includes(skill));
  skills.push(...sample(random, remaining, 2));

  return [...new Set(skills)].slice(0, MAX_SKILLS);
}

function generateBio(random: Random, jobTitle: string, company: string, skills: string[]): string {
  const [skillA = "technology", skillB = "product", skillC = "data"] = skills;
  return pick(random, vocabulary.bio_templates)
    .replaceAll("{title_lower}", jobTitle.toLowerCase())
    .replaceAll("{title}", jobTitle)
    .replaceAll("{company}", company)
    .replaceAll("{skill_a}", skillA)
    .replaceAll("{skill_b}", skillB)
    .replaceAll("{skill_c}", skillC);
}

function generateWorkHistory(
  random: Random,
  current: CompanyEntry,
  referenceDate: Date,
): WorkHistoryEntry[] {
  let start = addDays(referenceDate, -randomInt(random, 180, 3 * 365));
  const history: WorkHistoryEntry[] = [{
    company: current.name,
    title: "Current Role",
    start: toIsoDate(start),
    end: null,
    is_current: true,
  }];

  const previousCompanies = vocabulary.companies.filter((company) => company.name !== current.name);
  const previousCount = randomInt(random, 1, 3);
  for (let index = 0; index < previousCount; index += 1) {
    const end = addDays(start, -randomInt(random, 30, 90));
    start = addDays(end, -randomInt(random, 365, 1095));
    history.push({
      company: pick(random, previousCompanies).name,
      title: `Previous Role ${index + 1}`,
      start: toIsoDate(start),
      end: toIsoDate(end),
      is_current: false,
    });
  }

  return history;
}

/** Same-company first, then same-industry, then anyone. Edges are symmetrised on load. */
function pickConnections(
  random: Random,
  profile: { id: string; company: string; industry: string },
  population: ReadonlyArray<{ id: string; company: string; industry: string }>,
): string[] {
  const target = randomInt(random, MIN_CONNECTIONS, MAX_CONNECTIONS);
  const others = population.filter((candidate) => candidate.id !== profile.id);
  const chosen = new Set<string>();

  const take = (pool: ReadonlyArray<{ id: string }>, size: number): void => {
    const available = pool.filter((candidate) => !chosen.has(candidate.id));
    for (const candidate of sample(random, available, Math.min(size, available.length))) {
      chosen.add(candidate.id);
    }
  };

  take(others.filter((candidate) => candidate.company === profile.company), Math.floor(target * SAME_COMPANY_SHARE));
  take(others.filter((candidate) => candidate.industry === profile.industry), Math.floor(target * SAME_INDUSTRY_SHARE));
  take(others, Math.max(0, target - chosen.size));

  return [...chosen];
}

function generateInteraction(random: Random, referenceDate: Date): InteractionRecord {
  const frequency = randomInt(random, 1, 20);
  const daysAgo = randomInt(random, 0, 30);
  const recencyScore = Math.max(0, 1 - daysAgo / 30);
  const frequencyScore = Math.min(1, frequency / 20);

  return {
    frequency,
    last_contact: toIsoDate(addDays(referenceDate, -daysAgo)),
    strength: Math.round((recencyScore * 0.6 + frequencyScore * 0.4) * 1000) / 1000,
  };
}

// mulberry32
function createSeededRandom(seed: number): Random {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

function randomInt(random: Random, min: number, max: number): number {
  return min + Math.floor(random() * (max - min + 1));
}

function pick<T>(random: Random, items: readonly T[]): T {
  const item = items[Math.floor(random() * items.length)];
  if (item === undefined) {
    throw new Error("Cannot pick from an empty list.");
  }
  return item;
}

function sample<T>(random: Random, items: readonly T[], size: number): T[] {
  const pool = [...items];
  const output: T[] = [];
  while (output.length < size && pool.length > 0) {
    const [item] = pool.splice(Math.floor(random() * pool.length), 1);
    if (item !== undefined) {
      output.push(item);
    }
  }
  return output;
}

function addDays(date: Date, days: number): Date {
  return new Date(date.getTime() + days * DAY_MS);
}

function toIsoDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}
