export type RecordedRequest = {
  url: string;
  method: string | undefined;
  headers: Record<string, string>;
  body: unknown;
};

/** Replays the given responses in order and records each request. */
export function fetchStub(...responses: Array<Response | Error>): {
  fetchImpl: typeof fetch;
  requests: RecordedRequest[];
} {
  const queue = [...responses];
  const requests: RecordedRequest[] = [];

  const fetchImpl = async (input: string | URL | Request, init?: RequestInit): Promise<Response> => {
    requests.push({
      url: String(input),
      method: init?.method,
      headers: Object.fromEntries(new Headers(init?.headers).entries()),
      body: typeof init?.body === "string" ? JSON.parse(init.body) : null,
    });
    const next = queue.shift();
    if (!next) {
      throw new Error("Unexpected fetch call.");
    }
    if (next instanceof Error) {
      throw next;
    }
    return next;
  };

  return { fetchImpl, requests };
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "content-type": "application/json" },
  });
}

/** Answers each request from the first route whose key the URL contains. */
export function routedFetch(routes: Record<string, () => Response>): {
  fetchImpl: typeof fetch;
  urls: string[];
} {
  const urls: string[] = [];
  const fetchImpl = async (input: string | URL | Request): Promise<Response> => {
    const url = String(input);
    urls.push(url);
    const route = Object.entries(routes).find(([fragment]) => url.includes(fragment));
    if (!route) {
      throw new Error(`No route for ${url}.`);
    }
    return route[1]();
  };
  return { fetchImpl, urls };
}
