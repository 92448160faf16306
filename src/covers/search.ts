import { log } from "../lib/logger.js";
import type { MusicBrainzClient } from "../providers/musicbrainz.js";
import type { CoverResolver } from "./resolver.js";
import { route } from "./router.js";
import type { Artist, CoverResult, ReleaseGroup, RoutedQuery } from "./types.js";

export const MAX_RELEASE_GROUPS = 24;
export const DEFAULT_LIMIT = 8;

export type CoverSearchDeps = {
  musicBrainz: Pick<
    MusicBrainzClient,
    "searchArtistsByName" | "searchArtistsByTag" | "listReleaseGroupsForArtist"
  >;
  resolver: Pick<CoverResolver, "resolveCover">;
};

export type CoverSearchDebug = {
  routed: RoutedQuery;
  artist?: Artist;
};

export type CoverSearchResponse = {
  results: CoverResult[];
  debug?: CoverSearchDebug;
};

export type ArtistReleaseGroups = {
  routed: RoutedQuery;
  artist: Artist | null;
  releaseGroups: ReleaseGroup[];
};

export function createCoverSearch(deps: CoverSearchDeps) {
  const { musicBrainz, resolver } = deps;

  /**
   * Pick exactly one artist for a query so results never mix artists.
   * Each fallback runs only when the previous search came back empty.
   */
  async function selectArtist(query: string, routed: RoutedQuery): Promise<Artist | null> {
    if (routed.kind === "artist" && routed.forced) {
      const matches = await musicBrainz.searchArtistsByName(routed.value, 5);
      const wanted = routed.value.toLowerCase();
      const exact = matches.find((artist) => artist.name.toLowerCase() === wanted);
      return exact ?? matches[0] ?? null;
    }

    const raw = await musicBrainz.searchArtistsByName(query, 3);
    if (raw[0]) return raw[0];

    if (routed.value !== query) {
      const byValue = await musicBrainz.searchArtistsByName(routed.value, 3);
      if (byValue[0]) return byValue[0];
    }

    if (routed.kind === "tag") {
      const byTag = await musicBrainz.searchArtistsByTag(routed.value, 5);
      if (byTag[0]) return byTag[0];
    }

    return null;
  }

  /** Route, select one artist, then list its release groups in directory order. */
  async function findReleaseGroups(query: string, limit: number): Promise<ArtistReleaseGroups> {
    const routed = route(query);
    const artist = await selectArtist(query, routed);
    if (!artist) {
      log(`[search] No artist for "${query}" (${routed.kind}: ${routed.value})`);
      return { routed, artist: null, releaseGroups: [] };
    }
    const groupLimit = Math.max(1, Math.min(Math.floor(limit), MAX_RELEASE_GROUPS));
    log(`[search] "${query}" → ${artist.name} (${artist.id})`);
    const releaseGroups = await musicBrainz.listReleaseGroupsForArtist(artist.id, groupLimit);
    return { routed, artist, releaseGroups: releaseGroups.slice(0, groupLimit) };
  }

  async function searchCoverArt(
    query: string,
    limit = DEFAULT_LIMIT,
    debug = false
  ): Promise<CoverSearchResponse> {
    const cap = Number.isFinite(limit) ? Math.floor(limit) : DEFAULT_LIMIT;
    const { routed, artist, releaseGroups } = await findReleaseGroups(query, cap);
    if (!artist) {
      return debug ? { results: [], debug: { routed } } : { results: [] };
    }

    const results: CoverResult[] = [];
    for (const group of releaseGroups) {
      if (results.length >= cap) break;
      const coverUrl = await resolver.resolveCover(group.id, artist.name, group.title);
      if (!coverUrl) continue;
      results.push({
        artist: artist.name,
        releaseTitle: group.title,
        releaseDate: group.firstReleaseDate,
        coverUrl,
      });
    }
    log(`[search] ${results.length}/${releaseGroups.length} release groups with covers`);

    const capped = results.slice(0, Math.max(0, cap));
    return debug
      ? { results: capped, debug: { routed, artist: { id: artist.id, name: artist.name } } }
      : { results: capped };
  }

  return { selectArtist, findReleaseGroups, searchCoverArt };
}

export type CoverSearch = ReturnType<typeof createCoverSearch>;
