/**
 * iTunes Search API: secondary artwork index, no key required.
 *
 * API: https://itunes.apple.com/search?term=...&media=music&entity=album&limit=1
 * Artwork URLs come at 100x100; the same path serves larger renditions.
 */

import { hit, miss, type Attempt } from "../lib/attempt.js";
import { defaultFetch, fetchJson, type FetchLike } from "../lib/http.js";
import { isRecord, readRecords, readString } from "../lib/json.js";

export type ItunesClientOptions = {
  fetchFn?: FetchLike;
  baseUrl?: string;
  timeoutMs?: number;
};

const ITUNES_SEARCH_URL = "https://itunes.apple.com/search";
const DEFAULT_TIMEOUT_MS = 8000;

export const SMALL_ARTWORK_MARKER = "100x100bb";
export const LARGE_ARTWORK_MARKER = "600x600bb";

/**
 * Swap the 100px rendition for the 600px one. Returns null when the URL has
 * no size marker, so a small image is never passed off as a large one.
 */
export function upsizeArtworkUrl(url: string): string | null {
  if (!url.includes(SMALL_ARTWORK_MARKER)) return null;
  return url.replaceAll(SMALL_ARTWORK_MARKER, LARGE_ARTWORK_MARKER);
}

export function createItunesClient(options: ItunesClientOptions = {}) {
  const fetchFn = options.fetchFn ?? defaultFetch;
  const baseUrl = options.baseUrl ?? ITUNES_SEARCH_URL;
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;

  /** Best single album match for "<artist> <album>", upsized. */
  async function searchAlbumArtwork(artist: string, album: string): Promise<Attempt<string>> {
    const term = `${artist} ${album}`.trim();
    if (!term) return miss("empty search term");

    const query = new URLSearchParams({
      term,
      media: "music",
      entity: "album",
      limit: "1",
    });
    const result = await fetchJson(fetchFn, `${baseUrl}?${query}`, { timeoutMs });
    if (!result.ok) return result;
    if (!isRecord(result.value)) return miss("unexpected search payload");

    const [best] = readRecords(result.value, "results");
    const artwork = best ? readString(best, "artworkUrl100") : undefined;
    if (!artwork) return miss(`no artwork for "${term}"`);

    const upsized = upsizeArtworkUrl(artwork);
    return upsized ? hit(upsized) : miss(`artwork URL has no size marker (${artwork})`);
  }

  return { searchAlbumArtwork };
}

export type ItunesClient = ReturnType<typeof createItunesClient>;
