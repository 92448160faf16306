import { createCoverResolver } from "./covers/resolver.js";
import { route } from "./covers/router.js";
import { createCoverSearch } from "./covers/search.js";
import { releaseGroupDocument, type ReleaseGroupDocument } from "./covers/detail.js";
import type { CoverboardConfig } from "./lib/config.js";
import { defaultFetch, type FetchLike } from "./lib/http.js";
import { createCoverArtArchiveClient } from "./providers/coverArtArchive.js";
import { createImageDownloader } from "./providers/images.js";
import { createItunesClient } from "./providers/itunes.js";
import { createMusicBrainzClient, releaseGroupUrl } from "./providers/musicbrainz.js";
import { getNarrativeProvider } from "./services/narrative/index.js";
import { createVibeBoardBuilder, DEFAULT_MAX_ITEMS } from "./vibe/board.js";
import type { VibeBoard } from "./vibe/types.js";

export const DEFAULT_HIT_LIMIT = 12;

export type ReleaseGroupHit = {
  id: string;
  /** "<Artist> — <Title>" */
  title: string;
  url: string;
  artist: string;
  releaseTitle: string;
};

export type NarrativeResult = {
  query: string;
  summary: string;
  board: VibeBoard;
};

export type CoverboardOptions = {
  fetchFn?: FetchLike;
};

/**
 * Wires the clients from one config value and exposes the operations every
 * transport (CLI, HTTP, tool server) calls.
 */
export function createCoverboard(config: CoverboardConfig, options: CoverboardOptions = {}) {
  const fetchFn = options.fetchFn ?? defaultFetch;
  const userAgent = config.musicbrainz.user_agent;

  const musicBrainz = createMusicBrainzClient({
    fetchFn,
    baseUrl: config.musicbrainz.base_url,
    userAgent,
    timeoutMs: config.musicbrainz.timeout_ms,
    includeSingles: config.search.include_singles,
  });
  const coverArt = createCoverArtArchiveClient({
    fetchFn,
    baseUrl: config.cover_art.base_url,
    userAgent,
    timeoutMs: config.cover_art.timeout_ms,
  });
  const itunes = createItunesClient({
    fetchFn,
    baseUrl: config.itunes.base_url,
    timeoutMs: config.itunes.timeout_ms,
  });
  const resolver = createCoverResolver({ musicBrainz, coverArt, itunes });
  const coverSearch = createCoverSearch({ musicBrainz, resolver });
  const vibe = createVibeBoardBuilder({
    resolver,
    downloadImage: createImageDownloader({
      fetchFn,
      userAgent,
      timeoutMs: config.cover_art.image_timeout_ms,
    }),
  });

  async function searchReleaseGroups(
    query: string,
    limit = DEFAULT_HIT_LIMIT
  ): Promise<ReleaseGroupHit[]> {
    const { artist, releaseGroups } = await coverSearch.findReleaseGroups(query, limit);
    if (!artist) return [];
    return releaseGroups.map((group) => ({
      id: group.id,
      title: `${artist.name} — ${group.title}`,
      url: releaseGroupUrl(group.id),
      artist: artist.name,
      releaseTitle: group.title,
    }));
  }

  async function fetchReleaseGroup(id: string): Promise<ReleaseGroupDocument> {
    return releaseGroupDocument(id, await musicBrainz.fetchReleaseGroupDetail(id));
  }

  async function vibeBoard(
    query: string,
    maxItems = DEFAULT_MAX_ITEMS,
    debug = false
  ): Promise<VibeBoard> {
    const hits = await searchReleaseGroups(query, maxItems);
    const candidates = hits.map((hit) => ({
      id: hit.id,
      title: hit.releaseTitle,
      url: hit.url,
      artist: hit.artist,
    }));
    return vibe.buildVibeBoard(candidates, maxItems, debug);
  }

  async function summarize(
    query: string,
    style = "",
    maxItems = DEFAULT_MAX_ITEMS
  ): Promise<NarrativeResult> {
    // Resolve the backend first so a missing one fails before any lookups.
    const provider = getNarrativeProvider(config.narrative, options.fetchFn);
    const board = await vibeBoard(query, maxItems);
    const summary = await provider.summarize(JSON.stringify({ groups: board.groups }), style);
    return { query, summary, board };
  }

  return {
    route,
    searchCoverArt: coverSearch.searchCoverArt,
    searchReleaseGroups,
    fetchReleaseGroup,
    vibeBoard,
    summarize,
  };
}

export type Coverboard = ReturnType<typeof createCoverboard>;
