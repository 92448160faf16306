import { hit, miss, valueOrNull, type Attempt } from "../lib/attempt.js";
import { defaultFetch, fetchJson, type FetchLike } from "../lib/http.js";
import { isRecord, readRecords, readString, type JsonRecord } from "../lib/json.js";
import { log } from "../lib/logger.js";
import type { Artist, ReleaseGroup, ReleaseGroupDetail } from "../covers/types.js";

export type MusicBrainzClientOptions = {
  fetchFn?: FetchLike;
  baseUrl?: string;
  userAgent?: string;
  timeoutMs?: number;
  /** Also list singles when enumerating an artist's release groups. */
  includeSingles?: boolean;
};

const MB_BASE_URL = "https://musicbrainz.org/ws/2";
const DEFAULT_USER_AGENT = "coverboard/0.1 (contact@example.com)";
const DEFAULT_TIMEOUT_MS = 20000;

export function releaseGroupUrl(id: string): string {
  return `https://musicbrainz.org/release-group/${id}`;
}

function parseArtists(data: JsonRecord): Artist[] {
  const artists: Artist[] = [];
  for (const entry of readRecords(data, "artists")) {
    const id = readString(entry, "id");
    const name = readString(entry, "name");
    if (id && name) artists.push({ id, name });
  }
  return artists;
}

function parseReleaseGroups(data: JsonRecord): ReleaseGroup[] {
  const groups: ReleaseGroup[] = [];
  for (const entry of readRecords(data, "release-groups")) {
    const id = readString(entry, "id");
    if (!id) continue;
    groups.push({
      id,
      title: readString(entry, "title") ?? "Untitled",
      firstReleaseDate: readString(entry, "first-release-date"),
    });
  }
  return groups;
}

function firstCreditName(data: JsonRecord): string | undefined {
  const [credit] = readRecords(data, "artist-credit");
  if (!credit) return undefined;
  const artist = credit.artist;
  return (isRecord(artist) ? readString(artist, "name") : undefined) ?? readString(credit, "name");
}

/**
 * Lucene phrase for a tag; multi-word tags ("death metal") must stay one term.
 */
export function tagQuery(tag: string): string {
  const cleaned = tag.replace(/"/g, "").trim();
  return cleaned.includes(" ") ? `tag:"${cleaned}"` : `tag:${cleaned}`;
}

/**
 * Metadata directory client. Every operation is fail-soft: transport and
 * HTTP failures are logged and come back as "no data".
 */
export function createMusicBrainzClient(options: MusicBrainzClientOptions = {}) {
  const fetchFn = options.fetchFn ?? defaultFetch;
  const baseUrl = (options.baseUrl ?? MB_BASE_URL).replace(/\/+$/, "");
  const userAgent = options.userAgent ?? DEFAULT_USER_AGENT;
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const releaseTypes = options.includeSingles ? "album|ep|single" : "album|ep";

  async function mbFetch(
    path: string,
    params: Record<string, string>
  ): Promise<Attempt<JsonRecord>> {
    const query = new URLSearchParams({ ...params, fmt: "json" });
    const result = await fetchJson(fetchFn, `${baseUrl}/${path}?${query}`, {
      headers: { "User-Agent": userAgent, Accept: "application/json" },
      timeoutMs,
    });
    if (!result.ok) {
      log(`[musicbrainz] ${result.reason}`);
      return result;
    }
    if (!isRecord(result.value)) {
      log(`[musicbrainz] unexpected payload for ${path}`);
      return miss("unexpected payload");
    }
    return hit(result.value);
  }

  async function searchArtistsByName(query: string, limit = 3): Promise<Artist[]> {
    const data = valueOrNull(await mbFetch("artist", { query, limit: String(limit) }));
    return data ? parseArtists(data) : [];
  }

  async function searchArtistsByTag(tag: string, limit = 5): Promise<Artist[]> {
    const data = valueOrNull(
      await mbFetch("artist", { query: tagQuery(tag), limit: String(limit) })
    );
    return data ? parseArtists(data) : [];
  }

  async function listReleaseGroupsForArtist(
    artistId: string,
    limit = 12
  ): Promise<ReleaseGroup[]> {
    const data = valueOrNull(
      await mbFetch("release-group", {
        artist: artistId,
        type: releaseTypes,
        limit: String(limit),
      })
    );
    return data ? parseReleaseGroups(data) : [];
  }

  /** Release ids grouped under a release group, in directory order. */
  async function listReleaseIdsForGroup(
    releaseGroupId: string,
    limit = 10
  ): Promise<string[]> {
    const data = valueOrNull(
      await mbFetch("release", { "release-group": releaseGroupId, limit: String(limit) })
    );
    if (!data) return [];
    return readRecords(data, "releases")
      .map((release) => readString(release, "id"))
      .filter((id): id is string => id !== undefined);
  }

  async function fetchReleaseGroupDetail(id: string): Promise<ReleaseGroupDetail | null> {
    const data = valueOrNull(
      await mbFetch(`release-group/${encodeURIComponent(id)}`, { inc: "artist-credits" })
    );
    if (!data) return null;
    const secondary = data["secondary-types"];
    return {
      id: readString(data, "id") ?? id,
      title: readString(data, "title") ?? "Unknown release-group",
      artistName: firstCreditName(data),
      firstReleaseDate: readString(data, "first-release-date"),
      primaryType: readString(data, "primary-type"),
      secondaryTypes: Array.isArray(secondary)
        ? secondary.filter((t): t is string => typeof t === "string")
        : [],
    };
  }

  return {
    searchArtistsByName,
    searchArtistsByTag,
    listReleaseGroupsForArtist,
    listReleaseIdsForGroup,
    fetchReleaseGroupDetail,
  };
}

export type MusicBrainzClient = ReturnType<typeof createMusicBrainzClient>;
