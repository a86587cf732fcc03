import {
  EXPERIENCE_LEVELS,
  type ExperienceLevel,
  type ParsedQuery,
} from "../../../core/src/matching/collaborators.ts";

const MAX_LIST_ENTRIES = 20;
const MAX_ENTRY_LENGTH = 120;
const MAX_OTHER_CRITERIA_LENGTH = 500;

export class ParsedQuerySchemaError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ParsedQuerySchemaError";
  }
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return !!value && typeof value === "object" && !Array.isArray(value);
}

function parseStringList(value: unknown, path: string): string[] {
  if (value === undefined || value === null) {
    return [];
  }
  if (typeof value === "string") {
    return parseStringList([value], path);
  }
  if (!Array.isArray(value)) {
    throw new ParsedQuerySchemaError(`${path} must be an array of strings.`);
  }

  const seen = new Set<string>();
  const output: string[] = [];
  value.forEach((entry, index) => {
    if (typeof entry !== "string") {
      throw new ParsedQuerySchemaError(`${path}[${index}] must be a string.`);
    }
    const trimmed = entry.trim().slice(0, MAX_ENTRY_LENGTH);
    const key = trimmed.toLowerCase();
    if (!trimmed || seen.has(key)) {
      return;
    }
    seen.add(key);
    output.push(trimmed);
  });
  return output.slice(0, MAX_LIST_ENTRIES);
}

function parseExperienceLevel(value: unknown): ExperienceLevel {
  if (typeof value !== "string") {
    return "any";
  }
  const normalized = value.trim().toLowerCase();
  return EXPERIENCE_LEVELS.find((level) => level === normalized) ?? "any";
}

function parseOtherCriteria(value: unknown, path: string): string {
  if (value === undefined || value === null) {
    return "";
  }
  if (typeof value !== "string") {
    throw new ParsedQuerySchemaError(`${path} must be a string.`);
  }
  return value.trim().slice(0, MAX_OTHER_CRITERIA_LENGTH);
}

/**
 * Missing keys default to empty; keys outside the contract are ignored. Wrong types
 * are rejected so a malformed completion never reaches scoring.
 */
export function parseParsedQueryOutput(value: unknown): ParsedQuery {
  if (!isPlainObject(value)) {
    throw new ParsedQuerySchemaError("parsed_query must be an object.");
  }

  return {
    job_titles: parseStringList(value.job_titles, "parsed_query.job_titles"),
    companies: parseStringList(value.companies, "parsed_query.companies"),
    skills: parseStringList(value.skills, "parsed_query.skills"),
    industries: parseStringList(value.industries, "parsed_query.industries"),
    experience_level: parseExperienceLevel(value.experience_level),
    education: parseStringList(value.education, "parsed_query.education"),
    other_criteria: parseOtherCriteria(value.other_criteria, "parsed_query.other_criteria"),
  };
}
