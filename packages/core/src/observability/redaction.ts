const EMAIL_PATTERN = /\b[A-Z0-9._%+-]+@[A-Z0-9.-]+\.[A-Z]{2,}\b/gi;
const PHONE_PATTERN = /(?:\+?\d[\d().\-\s]{8,}\d)/g;

const SECRET_KEY_PATTERN =
  /(api[_-]?key|authorization|secret|token|password|service[_-]?role)/i;
const FREE_TEXT_KEY_PATTERN = /^(bio|query|query_text|raw_query|other_criteria)$/i;

export const REDACTED_SECRET = "[REDACTED]";
export const REDACTED_FREE_TEXT = "[REDACTED_FREE_TEXT]";

export function redactPII<T>(input: T): T {
  const seen = new WeakSet<object>();
  // Same shape in, same shape out; only leaf strings are replaced.
  return redactValue(input, "", seen) as T;
}

function redactValue(input: unknown, keyName: string, seen: WeakSet<object>): unknown {
  if (input === null || input === undefined) {
    return input;
  }

  if (SECRET_KEY_PATTERN.test(keyName)) {
    return REDACTED_SECRET;
  }
  if (FREE_TEXT_KEY_PATTERN.test(keyName)) {
    return REDACTED_FREE_TEXT;
  }

  if (typeof input === "string") {
    return redactString(input);
  }

  if (typeof input !== "object") {
    return input;
  }

  if (input instanceof Error) {
    return input;
  }

  if (seen.has(input)) {
    return "[Circular]";
  }
  seen.add(input);

  if (Array.isArray(input)) {
    return input.map((value) => redactValue(value, keyName, seen));
  }

  const output: Record<string, unknown> = {};
  for (const [childKey, childValue] of Object.entries(input)) {
    output[childKey] = redactValue(childValue, childKey, seen);
  }
  return output;
}

function redactString(input: string): string {
  let redacted = input.replace(EMAIL_PATTERN, "[REDACTED_EMAIL]");
  redacted = redacted.replace(PHONE_PATTERN, (candidate) => {
    const digits = candidate.replace(/\D/g, "");
    if (digits.length < 10 || digits.length > 15) {
      return candidate;
    }
    return "[REDACTED_PHONE]";
  });
  return redacted;
}
