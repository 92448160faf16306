import { DEFAULT_CONFIG, type CoverboardConfig } from "../lib/config.js";
import type { FakeHandler, FakeRoute } from "./fakeFetch.js";

export const TEST_MB = "https://mb.test/ws/2";
export const TEST_CAA = "https://caa.test";
export const TEST_ITUNES = "https://itunes.test/search";

export function testConfig(): CoverboardConfig {
  return {
    ...DEFAULT_CONFIG,
    musicbrainz: { ...DEFAULT_CONFIG.musicbrainz, base_url: TEST_MB, user_agent: "coverboard-test/1.0" },
    cover_art: { ...DEFAULT_CONFIG.cover_art, base_url: TEST_CAA },
    itunes: { ...DEFAULT_CONFIG.itunes, base_url: TEST_ITUNES },
  };
}

/**
 * A tiny directory: two artists named like "metallica", three release groups
 * for the real one. Kill and Master have archive art; Ride only has an
 * iTunes match.
 */
export function catalogHandler(url: string): FakeRoute | undefined {
  const parsed = new URL(url);
  const params = parsed.searchParams;
  const path = parsed.pathname;

  if (parsed.origin === "https://mb.test") {
    if (path === "/ws/2/artist") {
      if (params.get("query") !== "metallica") return { json: { artists: [] } };
      return {
        json: {
          artists: [
            { id: "mb-tribute", name: "Metallica Tribute Band" },
            { id: "mb-metallica", name: "Metallica" },
          ],
        },
      };
    }
    if (path === "/ws/2/release-group" && params.get("artist") === "mb-metallica") {
      return {
        json: {
          "release-groups": [
            { id: "rg-kill", title: "Kill 'Em All", "first-release-date": "1983-07-25" },
            { id: "rg-ride", title: "Ride the Lightning", "first-release-date": "1984-07-27" },
            { id: "rg-master", title: "Master of Puppets" },
          ],
        },
      };
    }
    if (path === "/ws/2/release") {
      return { json: { releases: [] } };
    }
    if (path === "/ws/2/release-group/rg-kill") {
      return {
        json: {
          id: "rg-kill",
          title: "Kill 'Em All",
          "first-release-date": "1983-07-25",
          "primary-type": "Album",
          "secondary-types": [],
          "artist-credit": [{ name: "Metallica", artist: { id: "mb-metallica", name: "Metallica" } }],
        },
      };
    }
    return undefined;
  }

  if (parsed.origin === "https://caa.test") {
    if (path === "/release-group/rg-kill") {
      return { json: { images: [{ front: true, image: "https://caa.test/img/kill.jpg" }] } };
    }
    if (path === "/release-group/rg-master") {
      return { json: { images: [{ front: true, image: "https://caa.test/img/master.jpg" }] } };
    }
    return undefined;
  }

  if (parsed.origin === "https://itunes.test") {
    if (params.get("term") === "Metallica Ride the Lightning") {
      return { json: { results: [{ artworkUrl100: "https://itunes.test/art/ride/100x100bb.jpg" }] } };
    }
    return { json: { results: [] } };
  }

  return undefined;
}

export const COVER_URLS = {
  kill: "https://caa.test/img/kill.jpg",
  ride: "https://itunes.test/art/ride/600x600bb.jpg",
  master: "https://caa.test/img/master.jpg",
} as const;

/** The catalog plus image bytes served at the given URLs. */
export function catalogWithImages(images: Record<string, Buffer>): FakeHandler {
  return (url) => {
    const bytes = images[url];
    return bytes ? { body: bytes } : catalogHandler(url);
  };
}
