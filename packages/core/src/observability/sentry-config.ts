import { redactPII } from "./redaction.ts";
import { normalizeRuntimeEnv, type EnvReader, type RuntimeEnv } from "../config/env.ts";

export type SentryRuntimeConfig = {
  dsn: string | null;
  environment: RuntimeEnv;
  release: string | null;
  enabled: boolean;
  tracesSampleRate: number;
};

export function resolveSentryRuntimeConfig(read: EnvReader): SentryRuntimeConfig {
  const dsn = read("SENTRY_DSN") ?? null;
  const environment = normalizeRuntimeEnv(read("SENTRY_ENVIRONMENT") ?? read("APP_ENV"));

  return {
    dsn,
    environment,
    release: read("SENTRY_RELEASE") ?? null,
    // Local runs never report, even with a DSN configured.
    enabled: Boolean(dsn) && environment !== "local",
    tracesSampleRate: environment === "staging" ? 1.0 : 0.2,
  };
}

/** Events leave the process with the same redaction structured logs get. */
export function createSentryBeforeSend() {
  return <T>(event: T): T => redactPII(event);
}
