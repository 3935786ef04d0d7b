export interface JsonResponse {
  ok: boolean;
  status: number;
  payload: unknown;
}

type QueryValue = string | number | (string | number)[] | undefined;

export function buildUrl(baseUrl: string, path: string, params: Record<string, QueryValue>): string {
  const url = new URL(`${baseUrl.replace(/\/+$/, "")}/${path.replace(/^\/+/, "")}`);
  for (const [name, value] of Object.entries(params)) {
    if (value === undefined) {
      continue;
    }
    if (Array.isArray(value)) {
      for (const item of value) {
        url.searchParams.append(name, String(item));
      }
    } else {
      url.searchParams.append(name, String(value));
    }
  }
  return url.toString();
}

/**
 * GET a JSON document with a per-request timeout. Aborting `signal` aborts the
 * request as well. The body is only read for successful responses.
 */
export async function requestJson(url: string, timeoutMs: number, signal?: AbortSignal): Promise<JsonResponse> {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), timeoutMs);
  const forwardAbort = () => controller.abort();
  signal?.addEventListener("abort", forwardAbort, {once: true});
  try {
    const response = await fetch(url, {
      headers: {Accept: "application/json"},
      signal: controller.signal,
    });
    if (!response.ok) {
      return {ok: false, status: response.status, payload: null};
    }
    return {ok: true, status: response.status, payload: await readJson(response)};
  } finally {
    clearTimeout(timer);
    signal?.removeEventListener("abort", forwardAbort);
  }
}

export function nextIsoDate(isoDate: string): string {
  return new Date(Date.parse(`${isoDate}T00:00:00Z`) + 24 * 60 * 60 * 1000).toISOString().slice(0, 10);
}

async function readJson(response: Response): Promise<unknown> {
  const payload: unknown = await response.json();
  return payload;
}
