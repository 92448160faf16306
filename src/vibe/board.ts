import { runConcurrent } from "../lib/concurrent.js";
import { errorMessage } from "../lib/errors.js";
import { kmeans } from "../lib/kmeans.js";
import { log } from "../lib/logger.js";
import type { CoverResolver } from "../covers/resolver.js";
import type { ImageDownloader } from "../providers/images.js";
import { releaseGroupUrl } from "../providers/musicbrainz.js";
import { extractFeatures } from "./palette.js";
import { classifyTone, meanHsv, toneLabel, toneSummary } from "./tone.js";
import type {
  ImageFeatures,
  VibeBoard,
  VibeCandidate,
  VibeDebugEntry,
  VibeGroup,
  VibeItem,
} from "./types.js";

export const VIBE_CONCURRENCY = 6;
export const GROUP_COUNT = 2;
export const GROUP_SEED = 42;
export const DEFAULT_MAX_ITEMS = 12;
const GROUP_RESTARTS = 8;

export const EMPTY_GROUP_LABEL = "Mixed";

export type VibeBoardDeps = {
  resolver: Pick<CoverResolver, "resolveCoverWithSource">;
  downloadImage: ImageDownloader;
  extract?: (imageBytes: Buffer) => Promise<ImageFeatures>;
};

type CandidateOutcome = {
  item: VibeItem | null;
  entry: VibeDebugEntry;
};

/**
 * Split items into exactly two tone groups by k-means over mean HSV.
 * Membership is a partition: every item lands in one group. A cluster that
 * ends up empty is kept and labelled "Mixed".
 */
export function groupByTone(items: VibeItem[]): VibeGroup[] {
  if (items.length === 0) return [];

  const points = items.map(({ features: { hsvMean } }) => [hsvMean.h, hsvMean.s, hsvMean.v]);
  const { labels } = kmeans(points, {
    k: GROUP_COUNT,
    seed: GROUP_SEED,
    restarts: GROUP_RESTARTS,
  });

  const buckets: VibeItem[][] = Array.from({ length: GROUP_COUNT }, () => []);
  items.forEach((item, i) => {
    buckets[labels[i] ?? 0]?.push(item);
  });

  return buckets.map((members) => {
    if (members.length === 0) {
      return { label: EMPTY_GROUP_LABEL, summary: "No covers in this group.", items: [] };
    }
    const tone = classifyTone(meanHsv(members.map((m) => m.features.hsvMean)));
    return {
      label: toneLabel(tone),
      summary: toneSummary(tone, members.length),
      items: members,
    };
  });
}

export function createVibeBoardBuilder(deps: VibeBoardDeps) {
  const { resolver, downloadImage } = deps;
  const extract = deps.extract ?? extractFeatures;

  async function processCandidate(candidate: VibeCandidate): Promise<CandidateOutcome> {
    const base = { rgid: candidate.id, title: candidate.title };

    const cover = await resolver.resolveCoverWithSource(
      candidate.id,
      candidate.artist ?? "",
      candidate.title,
      "preview"
    );
    if (!cover.ok) {
      return { item: null, entry: { ...base, hit: false, reason: "no_cover" } };
    }

    const { url: coverUrl, source } = cover.value;
    const image = await downloadImage(coverUrl);
    if (!image.ok) {
      log(`[vibe] Image fetch failed for ${candidate.id}: ${image.reason}`);
      return { item: null, entry: { ...base, hit: false, reason: "fetch_failed", src: source } };
    }

    let features: ImageFeatures;
    try {
      features = await extract(image.value);
    } catch (err) {
      log(`[vibe] ${errorMessage(err)} (${coverUrl})`);
      return {
        item: null,
        entry: { ...base, hit: false, reason: "decode_failed", src: source, error: errorMessage(err) },
      };
    }

    return {
      item: {
        id: candidate.id,
        title: candidate.title,
        url: candidate.url ?? releaseGroupUrl(candidate.id),
        coverUrl,
        features,
      },
      entry: { ...base, hit: true, src: source, url: coverUrl },
    };
  }

  /**
   * Resolve, fetch and analyse up to `maxItems` candidates (six in flight),
   * then group whatever succeeded. Per-candidate failures only show up in
   * the debug records.
   */
  async function buildVibeBoard(
    items: VibeCandidate[],
    maxItems = DEFAULT_MAX_ITEMS,
    debug = false
  ): Promise<VibeBoard> {
    const candidates = items.slice(0, Math.max(0, Math.floor(maxItems)));
    const outcomes = await runConcurrent(
      candidates.map((candidate) => () => processCandidate(candidate)),
      VIBE_CONCURRENCY
    );

    const succeeded: VibeItem[] = [];
    const entries: VibeDebugEntry[] = [];
    outcomes.forEach((outcome, i) => {
      if (!outcome.ok) {
        const candidate = candidates[i];
        entries.push({
          rgid: candidate?.id ?? "",
          title: candidate?.title ?? "",
          hit: false,
          reason: "error",
          error: outcome.reason,
        });
        return;
      }
      entries.push(outcome.value.entry);
      if (outcome.value.item) succeeded.push(outcome.value.item);
    });
    log(`[vibe] ${succeeded.length}/${candidates.length} covers analysed`);

    const groups = groupByTone(succeeded);
    return debug ? { groups, debug: entries } : { groups };
  }

  return { buildVibeBoard };
}

export type VibeBoardBuilder = ReturnType<typeof createVibeBoardBuilder>;
