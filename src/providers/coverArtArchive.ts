import { hit, miss, type Attempt } from "../lib/attempt.js";
import { defaultFetch, fetchBytes, fetchJson, type FetchLike } from "../lib/http.js";
import { isRecord, readRecords, readString, type JsonRecord } from "../lib/json.js";

export type CoverArtArchiveOptions = {
  fetchFn?: FetchLike;
  baseUrl?: string;
  userAgent?: string;
  timeoutMs?: number;
};

const CAA_BASE_URL = "https://coverartarchive.org";
const DEFAULT_TIMEOUT_MS = 12000;

// Size-suffixed endpoints redirect straight to image bytes.
const FRONT_SUFFIXES = [
  "front-500",
  "front-250",
  "front",
  "front?size=500",
  "front?size=250",
];

export function frontImageCandidates(baseUrl: string, releaseId: string): string[] {
  const base = `${baseUrl}/release/${encodeURIComponent(releaseId)}`;
  return FRONT_SUFFIXES.map((suffix) => `${base}/${suffix}`);
}

export function createCoverArtArchiveClient(options: CoverArtArchiveOptions = {}) {
  const fetchFn = options.fetchFn ?? defaultFetch;
  const baseUrl = (options.baseUrl ?? CAA_BASE_URL).replace(/\/+$/, "");
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const headers: Record<string, string> = options.userAgent
    ? { "User-Agent": options.userAgent }
    : {};

  async function frontImageEntry(releaseGroupId: string): Promise<Attempt<JsonRecord>> {
    const result = await fetchJson(
      fetchFn,
      `${baseUrl}/release-group/${encodeURIComponent(releaseGroupId)}`,
      { headers: { ...headers, Accept: "application/json" }, timeoutMs }
    );
    if (!result.ok) return result;
    if (!isRecord(result.value)) return miss("unexpected image list payload");

    for (const image of readRecords(result.value, "images")) {
      if (image.front === true && readString(image, "image")) return hit(image);
    }
    return miss(`no front image for release group ${releaseGroupId}`);
  }

  /**
   * Release-group image list: the first image flagged as the front cover
   * with a non-empty URL.
   */
  async function frontCoverForReleaseGroup(releaseGroupId: string): Promise<Attempt<string>> {
    const entry = await frontImageEntry(releaseGroupId);
    if (!entry.ok) return entry;
    const url = readString(entry.value, "image");
    return url ? hit(url) : miss(`no front image for release group ${releaseGroupId}`);
  }

  /**
   * Same front image as its 500px rendition ("large" on older entries),
   * falling back to the original when no rendition is listed.
   */
  async function frontPreviewForReleaseGroup(releaseGroupId: string): Promise<Attempt<string>> {
    const entry = await frontImageEntry(releaseGroupId);
    if (!entry.ok) return entry;
    const thumbnails = entry.value.thumbnails;
    const preview = isRecord(thumbnails)
      ? readString(thumbnails, "500") ?? readString(thumbnails, "large")
      : undefined;
    const url = preview ?? readString(entry.value, "image");
    return url ? hit(url) : miss(`no front image for release group ${releaseGroupId}`);
  }

  /** Probes the release's front-cover endpoints in order; returns the final URL. */
  async function probeReleaseFront(releaseId: string): Promise<Attempt<string>> {
    for (const candidate of frontImageCandidates(baseUrl, releaseId)) {
      const result = await fetchBytes(fetchFn, candidate, { headers, timeoutMs });
      if (result.ok) return hit(result.value.url);
    }
    return miss(`no front image for release ${releaseId}`);
  }

  return {
    frontCoverForReleaseGroup,
    frontPreviewForReleaseGroup,
    probeReleaseFront,
  };
}

export type CoverArtArchiveClient = ReturnType<typeof createCoverArtArchiveClient>;
