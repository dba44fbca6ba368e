import { Headers, Response, type RequestInfo } from "undici";

import type { HttpFetch } from "../../src/index.ts";

type Route = () => Response;

export type FakeFetch = {
  fetch: HttpFetch;
  /** urls in request order */
  requests: string[];
  /** user agent header of every request */
  userAgents: string[];
};

function requestUrl(input: RequestInfo): string {
  if (typeof input === "string") return input;
  if (input instanceof URL) return input.href;
  return input.url;
}

/** In-process fetch serving fixed routes; anything else is a 404 */
export function createFakeFetch(routes: Record<string, Route>): FakeFetch {
  const requests: string[] = [];
  const userAgents: string[] = [];

  const fetch: HttpFetch = async (input, init) => {
    const url = requestUrl(input);
    requests.push(url);
    userAgents.push(new Headers(init?.headers).get("user-agent") ?? "");

    const route = routes[url];
    if (!route) {
      return new Response("not found", { status: 404, statusText: "Not Found" });
    }
    return route();
  };

  return { fetch, requests, userAgents };
}

export function bytesResponse(data: Buffer): Response {
  return new Response(data, {
    status: 200,
    headers: { "content-length": String(data.length) },
  });
}

/** Body delivered as separate chunks, without a content length */
export function chunkedResponse(chunks: Buffer[]): Response {
  async function* body(): AsyncGenerator<Uint8Array> {
    for (const chunk of chunks) {
      yield chunk;
    }
  }
  return new Response(body(), { status: 200 });
}

export function textResponse(text: string): Response {
  return new Response(text, { status: 200 });
}

export function jsonResponse(value: unknown): Response {
  return new Response(JSON.stringify(value), {
    status: 200,
    headers: { "content-type": "application/json" },
  });
}
