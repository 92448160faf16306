import { describe, expect, test } from "vitest";

import { createFakeFetch } from "../../__tests__/fakeFetch.js";
import { TEST_CAA } from "../../__tests__/catalog.js";
import { createCoverArtArchiveClient, frontImageCandidates } from "../coverArtArchive.js";

describe("frontImageCandidates", () => {
  test("lists sized endpoints before the plain one", () => {
    expect(frontImageCandidates(TEST_CAA, "rel-1")).toEqual([
      "https://caa.test/release/rel-1/front-500",
      "https://caa.test/release/rel-1/front-250",
      "https://caa.test/release/rel-1/front",
      "https://caa.test/release/rel-1/front?size=500",
      "https://caa.test/release/rel-1/front?size=250",
    ]);
  });
});

describe("frontCoverForReleaseGroup", () => {
  test("takes the first front-flagged image with a URL", async () => {
    const fake = createFakeFetch(() => ({
      json: {
        images: [
          { front: false, image: "https://caa.test/back.jpg" },
          { front: true, image: "" },
          { front: true, image: "https://caa.test/front.jpg" },
          { front: true, image: "https://caa.test/second.jpg" },
        ],
      },
    }));
    const caa = createCoverArtArchiveClient({ fetchFn: fake.fetchFn, baseUrl: TEST_CAA });

    const result = await caa.frontCoverForReleaseGroup("rg-1");

    expect(result).toEqual({ ok: true, value: "https://caa.test/front.jpg" });
    expect(fake.calls[0]?.url).toBe("https://caa.test/release-group/rg-1");
  });

  test("misses when no image is flagged as front", async () => {
    const fake = createFakeFetch(() => ({ json: { images: [{ front: false, image: "https://caa.test/b.jpg" }] } }));
    const caa = createCoverArtArchiveClient({ fetchFn: fake.fetchFn, baseUrl: TEST_CAA });

    expect((await caa.frontCoverForReleaseGroup("rg-1")).ok).toBe(false);
  });

  test("misses on 404", async () => {
    const fake = createFakeFetch(() => undefined);
    const caa = createCoverArtArchiveClient({ fetchFn: fake.fetchFn, baseUrl: TEST_CAA });

    expect((await caa.frontCoverForReleaseGroup("rg-1")).ok).toBe(false);
  });
});

describe("frontPreviewForReleaseGroup", () => {
  function clientFor(images: unknown[]) {
    const fake = createFakeFetch(() => ({ json: { images } }));
    return createCoverArtArchiveClient({ fetchFn: fake.fetchFn, baseUrl: TEST_CAA });
  }

  test("prefers the 500px rendition over the original", async () => {
    const caa = clientFor([
      {
        front: true,
        image: "https://caa.test/rg/full-original-9000px.jpg",
        thumbnails: {
          "250": "https://caa.test/rg/thumb-250.jpg",
          "500": "https://caa.test/rg/thumb-500.jpg",
          large: "https://caa.test/rg/thumb-large.jpg",
        },
      },
    ]);

    expect(await caa.frontPreviewForReleaseGroup("rg-1")).toEqual({
      ok: true,
      value: "https://caa.test/rg/thumb-500.jpg",
    });
    expect(await caa.frontCoverForReleaseGroup("rg-1")).toEqual({
      ok: true,
      value: "https://caa.test/rg/full-original-9000px.jpg",
    });
  });

  test("uses the large rendition on entries without a 500 key", async () => {
    const caa = clientFor([
      { front: true, image: "https://caa.test/rg/original.jpg", thumbnails: { large: "https://caa.test/rg/large.jpg" } },
    ]);

    expect(await caa.frontPreviewForReleaseGroup("rg-1")).toEqual({ ok: true, value: "https://caa.test/rg/large.jpg" });
  });

  test("falls back to the original without renditions", async () => {
    const caa = clientFor([{ front: true, image: "https://caa.test/rg/original.jpg" }]);

    expect(await caa.frontPreviewForReleaseGroup("rg-1")).toEqual({
      ok: true,
      value: "https://caa.test/rg/original.jpg",
    });
  });
});

describe("probeReleaseFront", () => {
  test("returns the redirected URL of the first endpoint serving bytes", async () => {
    const fake = createFakeFetch((url) =>
      url.endsWith("/front") ? { body: "jpeg-bytes", url: "https://img.test/rel-1-front.jpg" } : undefined
    );
    const caa = createCoverArtArchiveClient({ fetchFn: fake.fetchFn, baseUrl: TEST_CAA });

    const result = await caa.probeReleaseFront("rel-1");

    expect(result).toEqual({ ok: true, value: "https://img.test/rel-1-front.jpg" });
    expect(fake.calls.map((c) => c.url)).toEqual([
      "https://caa.test/release/rel-1/front-500",
      "https://caa.test/release/rel-1/front-250",
      "https://caa.test/release/rel-1/front",
    ]);
  });

  test("treats an empty body as a miss", async () => {
    const fake = createFakeFetch(() => ({ body: "" }));
    const caa = createCoverArtArchiveClient({ fetchFn: fake.fetchFn, baseUrl: TEST_CAA });

    expect((await caa.probeReleaseFront("rel-1")).ok).toBe(false);
    expect(fake.calls).toHaveLength(5);
  });
});
