import type { ProfileLookup } from "../graph/profile-store.ts";
import type { Profile } from "../graph/profile-types.ts";

export type FrequencyEntry = {
  value: string;
  count: number;
};

export type DegreeBucket = {
  degree: number;
  profiles: number;
};

export type NetworkStats = {
  generation: number;
  total_profiles: number;
  total_connections: number;
  average_connections_per_person: number;
  isolated_profiles: number;
  degree_distribution: DegreeBucket[];
  top_companies: FrequencyEntry[];
  top_industries: FrequencyEntry[];
  top_job_titles: FrequencyEntry[];
};

export type NetworkStatsLimits = {
  companies: number;
  industries: number;
  jobTitles: number;
};

export const DEFAULT_NETWORK_STATS_LIMITS: NetworkStatsLimits = {
  companies: 10,
  industries: 5,
  jobTitles: 10,
};

export function computeNetworkStats(
  store: ProfileLookup,
  limits: NetworkStatsLimits = DEFAULT_NETWORK_STATS_LIMITS,
): NetworkStats {
  const profiles = store.all();
  const degreeCounts = new Map<number, number>();
  let degreeSum = 0;

  for (const profile of profiles) {
    const degree = profile.connections.length;
    degreeSum += degree;
    degreeCounts.set(degree, (degreeCounts.get(degree) ?? 0) + 1);
  }

  const totalConnections = degreeSum / 2;

  return {
    generation: store.generation,
    total_profiles: profiles.length,
    total_connections: totalConnections,
    average_connections_per_person: profiles.length === 0
      ? 0
      : Math.round((degreeSum / profiles.length) * 10) / 10,
    isolated_profiles: degreeCounts.get(0) ?? 0,
    degree_distribution: [...degreeCounts.entries()]
      .sort(([left], [right]) => left - right)
      .map(([degree, count]) => ({ degree, profiles: count })),
    top_companies: topByFrequency(profiles, (profile) => profile.company, limits.companies),
    top_industries: topByFrequency(profiles, (profile) => profile.industry, limits.industries),
    top_job_titles: topByFrequency(profiles, (profile) => profile.job_title, limits.jobTitles),
  };
}

/** Descending by count; ties keep first-seen order (Array#sort is stable). */
function topByFrequency(
  profiles: readonly Profile[],
  select: (profile: Profile) => string | null,
  limit: number,
): FrequencyEntry[] {
  const counts = new Map<string, number>();
  for (const profile of profiles) {
    const value = select(profile);
    if (!value) {
      continue;
    }
    counts.set(value, (counts.get(value) ?? 0) + 1);
  }

  return [...counts.entries()]
    .map(([value, count]) => ({ value, count }))
    .sort((left, right) => right.count - left.count)
    .slice(0, Math.max(0, limit));
}
