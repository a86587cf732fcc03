export type JsonPostOutcome =
  | { kind: "ok"; status: number; body: unknown }
  | { kind: "network_error"; timedOut: boolean }
  | { kind: "http_error"; status: number }
  | { kind: "invalid_json"; status: number };

/**
 * POSTs a JSON body and reports what happened instead of throwing, so each
 * client can map failures onto its own error type and retry policy.
 */
export async function postJson(
  fetchImpl: typeof fetch,
  url: string,
  init: { headers: Record<string, string>; body: unknown; signal?: AbortSignal },
): Promise<JsonPostOutcome> {
  let response: Response;
  try {
    response = await fetchImpl(url, {
      method: "POST",
      headers: { "content-type": "application/json", ...init.headers },
      body: JSON.stringify(init.body),
      signal: init.signal,
    });
  } catch (error) {
    return { kind: "network_error", timedOut: isAbortError(error) };
  }

  const rawText = await response.text();
  if (!response.ok) {
    return { kind: "http_error", status: response.status };
  }
  try {
    return { kind: "ok", status: response.status, body: JSON.parse(rawText) };
  } catch {
    return { kind: "invalid_json", status: response.status };
  }
}

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && (error.name === "AbortError" || error.name === "TimeoutError");
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Timeouts, rate limits and server errors; 409 only where the upstream uses it for overload. */
export function isRetryableStatus(status: number, options: { conflictIsRetryable?: boolean } = {}): boolean {
  return status === 408 || status === 429 || status >= 500 ||
    (status === 409 && options.conflictIsRetryable === true);
}
