import { describe, expect, test, vi } from "vitest";

import { hit, miss, type Attempt } from "../../lib/attempt.js";
import { createFakeFetch } from "../../__tests__/fakeFetch.js";
import { TEST_CAA, TEST_ITUNES, TEST_MB, catalogHandler } from "../../__tests__/catalog.js";
import { createCoverArtArchiveClient } from "../../providers/coverArtArchive.js";
import { createItunesClient } from "../../providers/itunes.js";
import { createMusicBrainzClient } from "../../providers/musicbrainz.js";
import { MAX_RELEASE_PROBES, createCoverResolver } from "../resolver.js";

function stubs() {
  return {
    musicBrainz: {
      listReleaseIdsForGroup: vi.fn(async (_id: string, _limit?: number): Promise<string[]> => []),
    },
    coverArt: {
      frontCoverForReleaseGroup: vi.fn(async (_id: string): Promise<Attempt<string>> => miss("no group art")),
      frontPreviewForReleaseGroup: vi.fn(async (_id: string): Promise<Attempt<string>> => miss("no group art")),
      probeReleaseFront: vi.fn(async (_id: string): Promise<Attempt<string>> => miss("no release art")),
    },
    itunes: {
      searchAlbumArtwork: vi.fn(
        async (_artist: string, _album: string): Promise<Attempt<string>> => miss("no itunes match")
      ),
    },
  };
}

describe("createCoverResolver", () => {
  test("release-group art wins without touching later steps", async () => {
    const deps = stubs();
    deps.coverArt.frontCoverForReleaseGroup.mockResolvedValueOnce(hit("https://img.test/group.jpg"));
    const resolver = createCoverResolver(deps);

    const result = await resolver.resolveCoverWithSource("rg-1", "Artist", "Album");

    expect(result).toEqual({ ok: true, value: { url: "https://img.test/group.jpg", source: "release-group" } });
    expect(deps.musicBrainz.listReleaseIdsForGroup).not.toHaveBeenCalled();
    expect(deps.itunes.searchAlbumArtwork).not.toHaveBeenCalled();
  });

  test("preview size reads the rendition from the same image list", async () => {
    const deps = stubs();
    deps.coverArt.frontPreviewForReleaseGroup.mockResolvedValueOnce(hit("https://img.test/group-500.jpg"));
    const resolver = createCoverResolver(deps);

    const result = await resolver.resolveCoverWithSource("rg-1", "Artist", "Album", "preview");

    expect(result).toEqual({ ok: true, value: { url: "https://img.test/group-500.jpg", source: "release-group" } });
    expect(deps.coverArt.frontCoverForReleaseGroup).not.toHaveBeenCalled();
  });

  test("probes releases in order and tags the source with the release id", async () => {
    const deps = stubs();
    deps.musicBrainz.listReleaseIdsForGroup.mockResolvedValueOnce(["rel-a", "rel-b", "rel-c"]);
    deps.coverArt.probeReleaseFront.mockImplementation(async (id: string) =>
      id === "rel-b" ? hit(`https://img.test/${id}.jpg`) : miss("none")
    );
    const resolver = createCoverResolver(deps);

    const result = await resolver.resolveCoverWithSource("rg-1", "Artist", "Album");

    expect(result).toEqual({ ok: true, value: { url: "https://img.test/rel-b.jpg", source: "release:rel-b" } });
    expect(deps.coverArt.probeReleaseFront.mock.calls).toEqual([["rel-a"], ["rel-b"]]);
    expect(deps.musicBrainz.listReleaseIdsForGroup).toHaveBeenCalledWith("rg-1", MAX_RELEASE_PROBES);
  });

  test("never probes more than ten releases", async () => {
    const deps = stubs();
    deps.musicBrainz.listReleaseIdsForGroup.mockResolvedValueOnce(
      Array.from({ length: 15 }, (_, i) => `rel-${i}`)
    );
    const resolver = createCoverResolver(deps);

    await resolver.resolveCoverWithSource("rg-1", "Artist", "Album");

    expect(deps.coverArt.probeReleaseFront).toHaveBeenCalledTimes(10);
  });

  test("falls back to the secondary index with artist and title", async () => {
    const deps = stubs();
    deps.itunes.searchAlbumArtwork.mockResolvedValueOnce(hit("https://itunes.test/600x600bb.jpg"));
    const resolver = createCoverResolver(deps);

    const result = await resolver.resolveCoverWithSource("rg-1", "Artist", "Album");

    expect(result).toEqual({ ok: true, value: { url: "https://itunes.test/600x600bb.jpg", source: "itunes" } });
    expect(deps.itunes.searchAlbumArtwork).toHaveBeenCalledWith("Artist", "Album");
  });

  test("every step missing yields no_cover", async () => {
    const resolver = createCoverResolver(stubs());

    expect(await resolver.resolveCoverWithSource("rg-1", "Artist", "Album")).toEqual({
      ok: false,
      reason: "no_cover",
    });
    expect(await resolver.resolveCover("rg-1", "Artist", "Album")).toBeNull();
  });

  test("resolves against the in-process catalog", async () => {
    const { fetchFn } = createFakeFetch(catalogHandler);
    const resolver = createCoverResolver({
      musicBrainz: createMusicBrainzClient({ fetchFn, baseUrl: TEST_MB }),
      coverArt: createCoverArtArchiveClient({ fetchFn, baseUrl: TEST_CAA }),
      itunes: createItunesClient({ fetchFn, baseUrl: TEST_ITUNES }),
    });

    expect(await resolver.resolveCover("rg-kill", "Metallica", "Kill 'Em All")).toBe(
      "https://caa.test/img/kill.jpg"
    );
    expect(await resolver.resolveCover("rg-ride", "Metallica", "Ride the Lightning")).toBe(
      "https://itunes.test/art/ride/600x600bb.jpg"
    );
    expect(await resolver.resolveCover("rg-unknown", "Nobody", "Nothing")).toBeNull();
  });
});
