import sharp from "sharp";
import { rgbToHex, rgbToHsv, type Hsv } from "../lib/color.js";
import { DecodeError, errorMessage } from "../lib/errors.js";
import { kmeans, type Point } from "../lib/kmeans.js";
import { classifyTone, toneCaption } from "./tone.js";
import type { ImageFeatures } from "./types.js";

export const SAMPLE_SIZE = 128;
export const PALETTE_SIZE = 4;
export const PALETTE_SEED = 0;
const PALETTE_RESTARTS = 4;

/**
 * Palette, mean HSV and caption from interleaved 8-bit pixels.
 * One-channel input is treated as grey; channels past the third are ignored.
 */
export function featuresFromPixels(pixels: Uint8Array, channels = 3): ImageFeatures {
  const pixelCount = Math.floor(pixels.length / channels);
  const points: Point[] = [];
  let h = 0;
  let s = 0;
  let v = 0;

  for (let i = 0; i < pixelCount; i++) {
    const offset = i * channels;
    const r = pixels[offset] ?? 0;
    const g = channels >= 3 ? pixels[offset + 1] ?? 0 : r;
    const b = channels >= 3 ? pixels[offset + 2] ?? 0 : r;
    points.push([r, g, b]);
    const hsv = rgbToHsv(r / 255, g / 255, b / 255);
    h += hsv.h;
    s += hsv.s;
    v += hsv.v;
  }

  const hsvMean: Hsv =
    pixelCount > 0
      ? { h: h / pixelCount, s: s / pixelCount, v: v / pixelCount }
      : { h: 0, s: 0, v: 0 };
  const { centers } = kmeans(points, {
    k: PALETTE_SIZE,
    seed: PALETTE_SEED,
    restarts: PALETTE_RESTARTS,
  });

  return {
    paletteHex: centers.map(rgbToHex),
    hsvMean,
    caption: toneCaption(classifyTone(hsvMean)),
  };
}

/** Decode, flatten to RGB at 128×128, then derive features. */
export async function extractFeatures(imageBytes: Buffer): Promise<ImageFeatures> {
  let decoded: { data: Buffer; info: sharp.OutputInfo };
  try {
    decoded = await sharp(imageBytes)
      .removeAlpha()
      .toColourspace("srgb")
      .resize(SAMPLE_SIZE, SAMPLE_SIZE, { fit: "fill" })
      .raw()
      .toBuffer({ resolveWithObject: true });
  } catch (err) {
    throw new DecodeError(`Unable to decode image: ${errorMessage(err)}`, { cause: err });
  }
  return featuresFromPixels(decoded.data, decoded.info.channels);
}
