export type EnvSource = Record<string, string | undefined>;

export type EnvReader = (name: string) => string | undefined;

export function createEnvReader(source: EnvSource = process.env): EnvReader {
  return (name) => {
    const value = source[name];
    if (typeof value !== "string") {
      return undefined;
    }
    const trimmed = value.trim();
    return trimmed.length > 0 ? trimmed : undefined;
  };
}

export const readEnv: EnvReader = (name) => createEnvReader()(name);

export type RuntimeEnv = "local" | "staging" | "production";

export function detectRuntimeEnv(read: EnvReader = readEnv): RuntimeEnv {
  return normalizeRuntimeEnv(read("APP_ENV") ?? read("SENTRY_ENVIRONMENT") ?? null);
}

export function normalizeRuntimeEnv(value: string | null | undefined): RuntimeEnv {
  const normalized = (value ?? "").trim().toLowerCase();
  if (normalized === "staging") {
    return "staging";
  }
  if (normalized === "production" || normalized === "prod") {
    return "production";
  }
  return "local";
}
