import { hit, type Attempt } from "../lib/attempt.js";
import { defaultFetch, fetchBytes, type FetchLike } from "../lib/http.js";

export type ImageDownloaderOptions = {
  fetchFn?: FetchLike;
  userAgent?: string;
  timeoutMs?: number;
};

const DEFAULT_TIMEOUT_MS = 15000;

export type ImageDownloader = (url: string) => Promise<Attempt<Buffer>>;

export function createImageDownloader(options: ImageDownloaderOptions = {}): ImageDownloader {
  const fetchFn = options.fetchFn ?? defaultFetch;
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const headers: Record<string, string> = { Accept: "image/*" };
  if (options.userAgent) headers["User-Agent"] = options.userAgent;

  return async (url) => {
    const result = await fetchBytes(fetchFn, url, { headers, timeoutMs });
    return result.ok ? hit(result.value.bytes) : result;
  };
}
