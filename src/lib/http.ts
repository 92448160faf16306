import { hit, miss, type Attempt } from "./attempt.js";
import { errorMessage } from "./errors.js";

export type FetchInit = {
  method?: string;
  headers?: Record<string, string>;
  body?: string;
  signal?: AbortSignal;
};

export type FetchResponseLike = {
  ok: boolean;
  status: number;
  url: string;
  json: () => Promise<unknown>;
  text: () => Promise<string>;
  arrayBuffer: () => Promise<ArrayBuffer>;
};

export type FetchLike = (input: string, init?: FetchInit) => Promise<FetchResponseLike>;

// Global fetch follows redirects by default; `response.url` is the final URL.
export const defaultFetch: FetchLike = fetch;

export type RequestOptions = {
  headers?: Record<string, string>;
  timeoutMs: number;
};

export type FetchedBytes = {
  url: string;
  bytes: Buffer;
};

async function send(
  fetchFn: FetchLike,
  url: string,
  options: RequestOptions
): Promise<Attempt<FetchResponseLike>> {
  let response: FetchResponseLike;
  try {
    response = await fetchFn(url, {
      headers: options.headers ?? {},
      signal: AbortSignal.timeout(options.timeoutMs),
    });
  } catch (err) {
    return miss(`network error: ${errorMessage(err)} (${url})`);
  }
  if (!response.ok) {
    return miss(`HTTP ${response.status} (${url})`);
  }
  return hit(response);
}

export async function fetchJson(
  fetchFn: FetchLike,
  url: string,
  options: RequestOptions
): Promise<Attempt<unknown>> {
  const sent = await send(fetchFn, url, options);
  if (!sent.ok) return sent;
  try {
    return hit(await sent.value.json());
  } catch (err) {
    return miss(`invalid JSON: ${errorMessage(err)} (${url})`);
  }
}

/**
 * GET a binary resource. Succeeds only on a 2xx with a non-empty body and
 * reports the URL the response finally came from.
 */
export async function fetchBytes(
  fetchFn: FetchLike,
  url: string,
  options: RequestOptions
): Promise<Attempt<FetchedBytes>> {
  const sent = await send(fetchFn, url, options);
  if (!sent.ok) return sent;
  let bytes: Buffer;
  try {
    bytes = Buffer.from(await sent.value.arrayBuffer());
  } catch (err) {
    return miss(`body read failed: ${errorMessage(err)} (${url})`);
  }
  if (bytes.length === 0) {
    return miss(`empty body (${url})`);
  }
  return hit({ url: sent.value.url || url, bytes });
}
