import { fetch as undiciFetch } from "undici";

import { HttpError, formatError } from "./errors.ts";

export type HttpFetch = typeof undiciFetch;

type FetchResponse = Awaited<ReturnType<HttpFetch>>;

export const DEFAULT_USER_AGENT = "distrofs/0.1.0";

export function resolveUserAgent(): string {
  const value = process.env.DISTROFS_USER_AGENT?.trim();
  return value && value.length > 0 ? value : DEFAULT_USER_AGENT;
}

export type HttpOptions = {
  /** fetch implementation (default: undici `fetch`) */
  fetch?: HttpFetch;
  /** user agent header (default: `DISTROFS_USER_AGENT` or `distrofs/<version>`) */
  userAgent?: string;
  /** abort signal forwarded to the request */
  signal?: AbortSignal;
};

/**
 * Issue a GET request and fail on transport errors or non-2xx responses.
 */
export async function httpGet(
  url: string,
  options: HttpOptions = {},
): Promise<FetchResponse> {
  const fetcher = options.fetch ?? undiciFetch;

  let response: FetchResponse;
  try {
    response = await fetcher(url, {
      headers: {
        "User-Agent": options.userAgent ?? resolveUserAgent(),
      },
      signal: options.signal,
    });
  } catch (error) {
    throw new HttpError(
      url,
      `HTTP request failed: ${formatError(error)} (${url})`,
      undefined,
      error,
    );
  }

  if (!response.ok) {
    throw new HttpError(
      url,
      `HTTP request failed: ${response.status} ${response.statusText} (${url})`,
      response.status,
    );
  }

  return response;
}

/** Parse a `content-length` header, `0` when absent or not numeric */
export function contentLength(response: FetchResponse): number {
  const raw = response.headers.get("content-length");
  return raw && /^\d+$/.test(raw) ? Number.parseInt(raw, 10) : 0;
}

export async function fetchText(url: string, options: HttpOptions = {}): Promise<string> {
  const response = await httpGet(url, options);
  return response.text();
}
