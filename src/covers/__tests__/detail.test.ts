import { describe, expect, test } from "vitest";

import { releaseGroupDocument } from "../detail.js";

describe("releaseGroupDocument", () => {
  test("renders every known field", () => {
    const doc = releaseGroupDocument("rg-1", {
      id: "rg-1",
      title: "Blue Train",
      artistName: "John Coltrane",
      firstReleaseDate: "1958-01",
      primaryType: "Album",
      secondaryTypes: ["Live", "Compilation"],
    });

    expect(doc).toEqual({
      id: "rg-1",
      title: "John Coltrane — Blue Train",
      text: [
        "Title: Blue Train",
        "Artist: John Coltrane",
        "First release: 1958-01",
        "Primary type: Album",
        "Secondary types: Live, Compilation",
        "MusicBrainz URL: https://musicbrainz.org/release-group/rg-1",
      ].join("\n"),
      url: "https://musicbrainz.org/release-group/rg-1",
      metadata: { mb_release_group_id: "rg-1" },
    });
  });

  test("leaves out missing fields", () => {
    const doc = releaseGroupDocument("rg-2", { id: "rg-2", title: "Untitled", secondaryTypes: [] });

    expect(doc.title).toBe("Untitled");
    expect(doc.text).toBe("Title: Untitled\nMusicBrainz URL: https://musicbrainz.org/release-group/rg-2");
  });

  test("an unknown id still yields a document", () => {
    const doc = releaseGroupDocument("nope", null);

    expect(doc.title).toBe("Unknown release-group");
    expect(doc.text).toBe("Title: Unknown release-group\nMusicBrainz URL: https://musicbrainz.org/release-group/nope");
  });
});
