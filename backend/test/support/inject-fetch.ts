import type { FastifyInstance } from "fastify";

interface InjectRequestInit {
  method?: string;
  body?: unknown;
  headers?: unknown;
}

function toHeaderRecord(headers: unknown): Record<string, string> {
  const record: Record<string, string> = {};
  if (headers instanceof Headers) {
    headers.forEach((value, key) => {
      record[key] = value;
    });
    return record;
  }
  if (Array.isArray(headers)) {
    for (const pair of headers) {
      if (Array.isArray(pair) && typeof pair[0] === "string" && typeof pair[1] === "string") {
        record[pair[0]] = pair[1];
      }
    }
    return record;
  }
  if (headers !== null && typeof headers === "object") {
    for (const [key, value] of Object.entries(headers)) {
      if (typeof value === "string") {
        record[key] = value;
      }
    }
  }
  return record;
}

function toUrl(input: unknown): string {
  if (typeof input === "string") {
    return input;
  }
  if (input instanceof URL) {
    return input.toString();
  }
  if (input instanceof Request) {
    return input.url;
  }
  throw new Error("Unsupported request input for tRPC client");
}

/** A fetch implementation that routes tRPC client calls through `fastify.inject`. */
export function injectFetch(fastify: FastifyInstance) {
  return async (input: unknown, init?: InjectRequestInit): Promise<Response> => {
    const response = await fastify.inject({
      method: init?.method?.toUpperCase() === "POST" ? "POST" : "GET",
      url: toUrl(input),
      payload: typeof init?.body === "string" ? init.body : undefined,
      headers: toHeaderRecord(init?.headers),
    });

    const headers = new Headers();
    for (const [key, value] of Object.entries(response.headers)) {
      if (value === undefined) {
        continue;
      }
      headers.set(key, Array.isArray(value) ? value.join(",") : String(value));
    }
    return new Response(response.payload, {status: response.statusCode, headers});
  };
}
