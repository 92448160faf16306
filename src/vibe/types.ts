import type { CoverSource } from "../covers/types.js";
import type { Hsv } from "../lib/color.js";

export type ImageFeatures = {
  /** Four cluster-center colors as #rrggbb. */
  paletteHex: string[];
  hsvMean: Hsv;
  caption: string;
};

/** A release group offered to the board builder. */
export type VibeCandidate = {
  id: string;
  title: string;
  url?: string | undefined;
  artist?: string | undefined;
};

export type VibeItem = {
  readonly id: string;
  readonly title: string;
  readonly url: string;
  readonly coverUrl: string;
  readonly features: ImageFeatures;
};

export type VibeGroup = {
  label: string;
  summary: string;
  items: VibeItem[];
};

export type VibeMissReason = "no_cover" | "fetch_failed" | "decode_failed" | "error";

export type VibeDebugEntry = {
  rgid: string;
  title: string;
  hit: boolean;
  reason?: VibeMissReason;
  src?: CoverSource;
  url?: string;
  error?: string;
};

export type VibeBoard = {
  groups: VibeGroup[];
  debug?: VibeDebugEntry[];
};
