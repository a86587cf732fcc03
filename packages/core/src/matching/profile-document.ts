import type { Profile } from "../graph/profile-types.ts";

const FIELD_SEPARATOR = " | ";

/**
 * Single text block describing a profile, used as the document for reranking and
 * document embeddings. Absent fields are omitted; field order is fixed.
 */
export function formatProfileDocument(profile: Profile): string {
  const parts: string[] = [];

  if (profile.name) {
    parts.push(`Name: ${profile.name}`);
  }
  if (profile.job_title) {
    parts.push(`Role: ${profile.job_title}`);
  }
  if (profile.company) {
    parts.push(`Company: ${profile.company}`);
  }
  if (profile.bio) {
    parts.push(`Bio: ${profile.bio}`);
  }
  if (profile.skills.length > 0) {
    parts.push(`Skills: ${profile.skills.join(", ")}`);
  }

  const education = describeEducation(profile);
  if (education) {
    parts.push(`Education: ${education}`);
  }

  const previousCompanies = [
    ...new Set(profile.work_history.map((entry) => entry.company).filter(Boolean)),
  ];
  if (previousCompanies.length > 0) {
    parts.push(`Previous companies: ${previousCompanies.join(", ")}`);
  }

  if (profile.industry) {
    parts.push(`Industry: ${profile.industry}`);
  }

  return parts.join(FIELD_SEPARATOR);
}

function describeEducation(profile: Profile): string | null {
  const education = profile.education;
  if (!education) {
    return null;
  }

  const description = [
    education.degree,
    education.field ? `in ${education.field}` : null,
    education.university ? `from ${education.university}` : null,
  ]
    .filter((part): part is string => Boolean(part))
    .join(" ");

  return description.length > 0 ? description : null;
}
