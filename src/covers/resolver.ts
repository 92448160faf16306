import { hit, miss, type Attempt } from "../lib/attempt.js";
import { log } from "../lib/logger.js";
import type { CoverArtArchiveClient } from "../providers/coverArtArchive.js";
import type { ItunesClient } from "../providers/itunes.js";
import type { MusicBrainzClient } from "../providers/musicbrainz.js";
import type { CoverSize, ResolvedCover } from "./types.js";

export const MAX_RELEASE_PROBES = 10;

export type CoverResolverDeps = {
  musicBrainz: Pick<MusicBrainzClient, "listReleaseIdsForGroup">;
  coverArt: Pick<
    CoverArtArchiveClient,
    "frontCoverForReleaseGroup" | "frontPreviewForReleaseGroup" | "probeReleaseFront"
  >;
  itunes: Pick<ItunesClient, "searchAlbumArtwork">;
};

/**
 * Cover fallback chain, first success wins:
 *   1. release-group image list, front-flagged entry (original or 500px preview)
 *   2. up to 10 releases of the group, front endpoint of each in order
 *   3. iTunes album search, artwork upsized
 */
export function createCoverResolver(deps: CoverResolverDeps) {
  const { musicBrainz, coverArt, itunes } = deps;

  async function fromReleases(releaseGroupId: string): Promise<Attempt<ResolvedCover>> {
    const releaseIds = await musicBrainz.listReleaseIdsForGroup(
      releaseGroupId,
      MAX_RELEASE_PROBES
    );
    for (const releaseId of releaseIds.slice(0, MAX_RELEASE_PROBES)) {
      const probed = await coverArt.probeReleaseFront(releaseId);
      if (probed.ok) return hit({ url: probed.value, source: `release:${releaseId}` });
    }
    return miss(`no release-level art among ${releaseIds.length} releases`);
  }

  async function resolveCoverWithSource(
    releaseGroupId: string,
    artistName: string,
    releaseTitle: string,
    size: CoverSize = "original"
  ): Promise<Attempt<ResolvedCover>> {
    const group =
      size === "preview"
        ? await coverArt.frontPreviewForReleaseGroup(releaseGroupId)
        : await coverArt.frontCoverForReleaseGroup(releaseGroupId);
    if (group.ok) return hit({ url: group.value, source: "release-group" });

    const release = await fromReleases(releaseGroupId);
    if (release.ok) return release;

    const fallback = await itunes.searchAlbumArtwork(artistName, releaseTitle);
    if (fallback.ok) return hit({ url: fallback.value, source: "itunes" });

    log(`[covers] No cover for ${releaseGroupId}: ${group.reason}; ${release.reason}; ${fallback.reason}`);
    return miss("no_cover");
  }

  async function resolveCover(
    releaseGroupId: string,
    artistName: string,
    releaseTitle: string
  ): Promise<string | null> {
    const resolved = await resolveCoverWithSource(releaseGroupId, artistName, releaseTitle);
    return resolved.ok ? resolved.value.url : null;
  }

  return { resolveCover, resolveCoverWithSource };
}

export type CoverResolver = ReturnType<typeof createCoverResolver>;
